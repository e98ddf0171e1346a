// Veloce Pact Daily Reset
// Run once per day (cron) to extend, shield or break every active pact.
// Milestones reached along the way unlock the pact streak achievements.

import { NextResponse, type NextRequest } from 'next/server';
import { z } from 'zod';
import { errorResponse, featureDisabled, parseBody } from '@/lib/api/http';
import { getFeatures } from '@/lib/config/features';
import { statsDB } from '@/lib/db';
import { recordPactEvents, type PactEvent } from '@/lib/gamification/gamification-service';
import { systemContext } from '@/lib/logger';
import { PactService } from '@/lib/pacts/pact-service';

const resetSchema = z.object({
    today: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).optional(),
});

const service = new PactService();

export async function POST(request: NextRequest) {
    const context = systemContext('pacts');
    if (!getFeatures().pacts) return featureDisabled('Pacts');

    try {
        const { today } = await parseBody(request, resetSchema);
        const summary = await service.dailyReset(today);

        const outcome = recordPactEvents(
            await statsDB.get(),
            summary.milestones.map((milestone): PactEvent => ({ kind: 'milestone', milestone }))
        );
        await statsDB.save(outcome.stats);

        return NextResponse.json({ result: summary, newAchievements: outcome.newAchievements });
    } catch (error) {
        return errorResponse(error, context);
    }
}
