// Veloce Prompt Route
// Builds a copyable prompt for a task in one of the four styles

import { NextResponse, type NextRequest } from 'next/server';
import { z } from 'zod';
import { errorResponse, parseBody } from '@/lib/api/http';
import { PROMPT_STYLES, PROMPT_STYLE_KEYS, buildTaskPrompt, promptPreview } from '@/lib/ai/prompts';
import { logger, systemContext } from '@/lib/logger';

const promptRequestSchema = z.object({
    task: z.object({
        title: z.string().min(1),
        starRating: z.number().int().min(1).max(3).default(2),
        taskType: z.enum(['create', 'communicate', 'consume', 'coordinate']).default('coordinate'),
        estimatedMinutes: z.number().positive().optional(),
        aiAdvice: z.string().optional(),
        notes: z.string().optional(),
    }),
    style: z.enum(['detailed', 'quick', 'creative', 'coach']).default('detailed'),
});

export async function GET() {
    const styles = PROMPT_STYLE_KEYS.map((key) => ({ key, ...PROMPT_STYLES[key] }));
    return NextResponse.json({ styles });
}

export async function POST(request: NextRequest) {
    const context = systemContext('prompts');
    try {
        const { task, style } = await parseBody(request, promptRequestSchema);
        const prompt = buildTaskPrompt(task, style);

        logger.info('LOG.PROMPT_GENERATED', { style, length: prompt.length }, context);
        return NextResponse.json({ prompt, preview: promptPreview(prompt), style });
    } catch (error) {
        return errorResponse(error, context);
    }
}
