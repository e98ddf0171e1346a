// Veloce Gamification Route
// Completing tasks and focus sessions against the store: points, streaks,
// achievements, gems, recurring follow-ups and pact progress in one call.

import { subMinutes } from 'date-fns';
import { NextResponse, type NextRequest } from 'next/server';
import { z } from 'zod';
import { errorResponse, parseBody } from '@/lib/api/http';
import { getFeatures } from '@/lib/config/features';
import { ACHIEVEMENT_TYPES } from '@/lib/constants';
import { focusSessionsDB, statsDB, tasksDB } from '@/lib/db';
import { completeRecord, createFocusRecord } from '@/lib/focus/focus-records';
import { flameIntensity } from '@/lib/gamification/flame';
import {
    acknowledgeAchievement,
    recordFocusSession,
    recordTaskCompletion,
    resetDaily,
    unlockAchievement,
} from '@/lib/gamification/gamification-service';
import { levelProgress, pointsToNextLevel } from '@/lib/gamification/points';
import { systemContext } from '@/lib/logger';
import { PactService } from '@/lib/pacts/pact-service';
import { createNextRecurringInstance } from '@/lib/tasks/task-model';

const gamificationSchema = z.discriminatedUnion('action', [
    z.object({
        action: z.literal('completeTask'),
        taskId: z.string().min(1),
        userId: z.string().min(1).optional(),
    }),
    z.object({
        action: z.literal('focusSession'),
        title: z.string().min(1).default('Focus Session'),
        minutes: z.number().int().positive(),
        isDeepFocus: z.boolean().default(false),
        appBlocking: z.boolean().default(false),
        taskId: z.string().optional(),
        userId: z.string().min(1).optional(),
    }),
    z.object({ action: z.literal('stats') }),
    z.object({ action: z.literal('acknowledge'), type: z.enum(ACHIEVEMENT_TYPES).optional() }),
    z.object({ action: z.literal('unlock'), type: z.enum(ACHIEVEMENT_TYPES) }),
    z.object({ action: z.literal('resetDaily') }),
]);

const pacts = new PactService();

function summarizeStats(stats: Awaited<ReturnType<typeof statsDB.get>>) {
    return {
        ...stats,
        flame: flameIntensity(stats.currentStreak),
        levelProgress: levelProgress(stats.totalPoints),
        pointsToNextLevel: pointsToNextLevel(stats.totalPoints),
    };
}

export async function POST(request: NextRequest) {
    const context = systemContext('gamification');
    try {
        const body = await parseBody(request, gamificationSchema);
        const now = new Date();

        switch (body.action) {
            case 'completeTask': {
                const existing = await tasksDB.getById(body.taskId);
                if (!existing) {
                    return NextResponse.json({ error: 'Task not found' }, { status: 404 });
                }
                if (existing.isCompleted) {
                    return NextResponse.json({ error: 'Task is already completed' }, { status: 409 });
                }

                const completed = await tasksDB.complete(body.taskId, now);
                if (!completed) {
                    return NextResponse.json({ error: 'Task not found' }, { status: 404 });
                }

                const outcome = recordTaskCompletion(await statsDB.get(), completed, now);
                await statsDB.save(outcome.stats);
                const task = await tasksDB.update(completed.id, { pointsEarned: outcome.pointsEarned });

                const next = createNextRecurringInstance(completed, now);
                if (next) await tasksDB.create(next);

                if (body.userId && getFeatures().pacts) {
                    await pacts.recordTaskProgress(body.userId);
                }

                return NextResponse.json({
                    result: {
                        task,
                        nextTask: next,
                        pointsEarned: outcome.pointsEarned,
                        leveledUp: outcome.leveledUp,
                        newAchievements: outcome.newAchievements,
                        stats: summarizeStats(outcome.stats),
                    },
                });
            }

            case 'focusSession': {
                const record = completeRecord(
                    createFocusRecord({
                        title: body.title,
                        sessionType: 'timed',
                        scheduledDuration: body.minutes * 60,
                        isDeepFocus: body.isDeepFocus,
                        taskId: body.taskId,
                    }, subMinutes(now, body.minutes)),
                    0,
                    now
                );
                await focusSessionsDB.create(record);

                const outcome = recordFocusSession(await statsDB.get(), {
                    minutes: body.minutes,
                    isDeepFocus: body.isDeepFocus,
                    appBlocking: body.appBlocking,
                }, now);
                await statsDB.save(outcome.stats);

                if (body.userId && getFeatures().pacts) {
                    await pacts.recordFocusProgress(body.userId, body.minutes);
                }

                return NextResponse.json({
                    result: {
                        session: record,
                        newAchievements: outcome.newAchievements,
                        newGems: outcome.newGems,
                        stats: summarizeStats(outcome.stats),
                    },
                });
            }

            case 'stats':
                return NextResponse.json({ result: summarizeStats(await statsDB.get()) });

            case 'acknowledge': {
                const { stats, achievement } = acknowledgeAchievement(await statsDB.get(), body.type);
                await statsDB.save(stats);
                return NextResponse.json({ result: { achievement, pending: stats.pendingAchievements } });
            }

            case 'unlock': {
                const { stats, unlocked } = unlockAchievement(await statsDB.get(), body.type);
                await statsDB.save(stats);
                return NextResponse.json({ result: { unlocked, stats: summarizeStats(stats) } });
            }

            case 'resetDaily': {
                const stats = await statsDB.save(resetDaily(await statsDB.get(), now));
                return NextResponse.json({ result: summarizeStats(stats) });
            }
        }
    } catch (error) {
        return errorResponse(error, context);
    }
}
