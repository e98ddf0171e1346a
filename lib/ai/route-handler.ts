// Veloce AI Route Handler
// Server-side proxy shared by the per-provider routes: validates the
// action, builds the provider and returns { result } or { error }.

import { NextResponse, type NextRequest } from 'next/server';
import { z } from 'zod';
import { errorResponse, parseBody } from '../api/http';
import type { ProviderName } from '../config/env';
import { systemContext } from '../logger';
import { createProvider } from './index';

const promptTaskSchema = z.object({
    title: z.string().min(1),
    starRating: z.number().int().min(1).max(3).default(2),
    taskType: z.enum(['create', 'communicate', 'consume', 'coordinate']).default('coordinate'),
    estimatedMinutes: z.number().positive().optional(),
    aiAdvice: z.string().optional(),
    notes: z.string().optional(),
});

const chatTurnSchema = z.object({
    role: z.enum(['user', 'assistant']),
    content: z.string(),
});

export const aiRequestSchema = z.object({
    apiKey: z.string().optional(),
}).and(z.discriminatedUnion('action', [
    z.object({
        action: z.literal('analyzeTask'),
        payload: z.object({ title: z.string().min(1), notes: z.string().optional(), context: z.string().optional() }),
    }),
    z.object({
        action: z.literal('assessPriority'),
        payload: z.object({ title: z.string().min(1) }),
    }),
    z.object({
        action: z.literal('estimateTime'),
        payload: z.object({ title: z.string().min(1), context: z.string().optional() }),
    }),
    z.object({
        action: z.literal('processBrainDump'),
        payload: z.object({ text: z.string().min(1) }),
    }),
    z.object({
        action: z.literal('chat'),
        payload: z.object({
            task: promptTaskSchema,
            history: z.array(chatTurnSchema).default([]),
            message: z.string().min(1),
        }),
    }),
]));

export type AIRequest = z.infer<typeof aiRequestSchema>;

export async function handleAIRequest(request: NextRequest, providerName: ProviderName): Promise<NextResponse> {
    const context = systemContext(`ai:${providerName}`);

    try {
        const body = await parseBody(request, aiRequestSchema);
        const provider = createProvider(providerName, body.apiKey);

        switch (body.action) {
            case 'analyzeTask': {
                const { title, notes, context: extra } = body.payload;
                return NextResponse.json({ result: await provider.analyzeTask(title, notes, extra) });
            }
            case 'assessPriority':
                return NextResponse.json({ result: await provider.assessPriority(body.payload.title) });
            case 'estimateTime':
                return NextResponse.json({ result: await provider.estimateTime(body.payload.title, body.payload.context) });
            case 'processBrainDump':
                return NextResponse.json({ result: await provider.processBrainDump(body.payload.text) });
            case 'chat': {
                const { task, history, message } = body.payload;
                return NextResponse.json({ result: await provider.chat(task, history, message) });
            }
        }
    } catch (error) {
        return errorResponse(error, context);
    }
}
