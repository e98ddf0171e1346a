// Veloce Pacts API Route

import { NextResponse, type NextRequest } from 'next/server';
import { z } from 'zod';
import { errorResponse, featureDisabled, parseBody } from '@/lib/api/http';
import { getFeatures } from '@/lib/config/features';
import { statsDB } from '@/lib/db';
import { recordPactEvents, type PactEvent } from '@/lib/gamification/gamification-service';
import { systemContext } from '@/lib/logger';
import {
    PACT_STATUS_TEXT,
    PactService,
    commitmentDescription,
    daysUntilNextMilestone,
    nextMilestone,
    statusForUser,
} from '@/lib/pacts/pact-service';
import { PactError } from '@/lib/errors';

const pactRef = z.object({ pactId: z.string().min(1), userId: z.string().min(1) });

const pactRequestSchema = z.discriminatedUnion('action', [
    z.object({
        action: z.literal('create'),
        payload: z.object({
            initiatorId: z.string().min(1),
            partnerId: z.string().min(1),
            commitmentType: z.enum(['daily_tasks', 'focus_time', 'goal_progress', 'custom']),
            targetValue: z.number().int().positive().optional(),
            customDescription: z.string().optional(),
        }).refine((payload) => payload.initiatorId !== payload.partnerId, {
            message: 'A pact needs two different people',
        }),
    }),
    z.object({ action: z.literal('accept'), payload: pactRef }),
    z.object({ action: z.literal('decline'), payload: pactRef }),
    z.object({ action: z.literal('cancel'), payload: pactRef }),
    z.object({ action: z.literal('end'), payload: pactRef }),
    z.object({ action: z.literal('shield'), payload: pactRef }),
    z.object({ action: z.literal('status'), payload: pactRef }),
    z.object({ action: z.literal('activities'), payload: z.object({ pactId: z.string().min(1) }) }),
    z.object({ action: z.literal('list'), payload: z.object({ userId: z.string().min(1) }) }),
    z.object({
        action: z.literal('progress'),
        payload: pactRef.extend({ amount: z.number().positive().default(1) }),
    }),
]);

const service = new PactService();

async function unlockPactAchievements(events: PactEvent[]) {
    const outcome = recordPactEvents(await statsDB.get(), events);
    await statsDB.save(outcome.stats);
    return outcome.newAchievements;
}

export async function POST(request: NextRequest) {
    const context = systemContext('pacts');
    if (!getFeatures().pacts) return featureDisabled('Pacts');

    try {
        const body = await parseBody(request, pactRequestSchema);

        switch (body.action) {
            case 'create':
                return NextResponse.json({ result: await service.createPact(body.payload) }, { status: 201 });
            case 'accept': {
                const pact = await service.acceptPact(body.payload.pactId, body.payload.userId);
                const newAchievements = await unlockPactAchievements([{ kind: 'accepted' }]);
                return NextResponse.json({ result: pact, newAchievements });
            }
            case 'decline':
                await service.declinePact(body.payload.pactId, body.payload.userId);
                return NextResponse.json({ result: { deleted: true } });
            case 'cancel':
                await service.cancelPact(body.payload.pactId, body.payload.userId);
                return NextResponse.json({ result: { deleted: true } });
            case 'end': {
                const { pactId, userId } = body.payload;
                const pact = await service.endPact(pactId, userId);
                const completedPacts = (await service.pactsForUser(userId))
                    .filter((candidate) => candidate.status === 'completed').length;
                const newAchievements = await unlockPactAchievements([{ kind: 'completed', completedPacts }]);
                return NextResponse.json({ result: pact, newAchievements });
            }
            case 'shield':
                return NextResponse.json({ result: await service.activateShield(body.payload.pactId, body.payload.userId) });
            case 'progress': {
                const { pactId, userId, amount } = body.payload;
                return NextResponse.json({ result: await service.recordProgress(pactId, userId, amount) });
            }
            case 'activities':
                return NextResponse.json({ result: await service.activitiesForPact(body.payload.pactId) });
            case 'list':
                return NextResponse.json({ result: await service.pactsForUser(body.payload.userId) });
            case 'status': {
                const { pactId, userId } = body.payload;
                const pact = (await service.pactsForUser(userId)).find((candidate) => candidate.id === pactId);
                if (!pact) throw new PactError('notFound');
                const status = statusForUser(pact, userId);
                return NextResponse.json({
                    result: {
                        status,
                        text: PACT_STATUS_TEXT[status],
                        commitment: commitmentDescription(pact),
                        currentStreak: pact.currentStreak,
                        nextMilestone: nextMilestone(pact.currentStreak),
                        daysUntilNextMilestone: daysUntilNextMilestone(pact.currentStreak),
                    },
                });
            }
        }
    } catch (error) {
        return errorResponse(error, context);
    }
}
