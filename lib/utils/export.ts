// Veloce Data Export/Import Utilities
// Backup and restore of everything in the store

import { z } from 'zod';
import { ACHIEVEMENT_TYPES, APP_VERSION, EXPORT_VERSION } from '../constants';
import { focusSessionsDB, journalEntriesDB, pactsDB, statsDB, tasksDB } from '../db';
import { formatIssues } from '../errors';
import { logger, systemContext } from '../logger';
import type { FocusSessionRecord, JournalEntry, Pact, Task, UserStats } from '../schema';

// ============================================
// Schemas
// ============================================

const subTaskSchema = z.object({
    title: z.string(),
    estimatedMinutes: z.number().optional(),
    order: z.number(),
    reasoning: z.string().optional(),
    status: z.enum(['pending', 'completed']),
});

const taskSchema: z.ZodType<Task> = z.object({
    id: z.string().min(1),
    title: z.string(),
    notes: z.string().optional(),
    isCompleted: z.boolean(),
    completedAt: z.string().optional(),
    starRating: z.number().int().min(1).max(3),
    taskType: z.enum(['create', 'communicate', 'consume', 'coordinate']),
    estimatedMinutes: z.number().optional(),
    scheduledTime: z.string().optional(),
    aiAdvice: z.string().optional(),
    aiPriority: z.enum(['low', 'medium', 'high']).optional(),
    aiThoughtProcess: z.string().optional(),
    aiProcessedAt: z.string().optional(),
    aiSubTasks: z.array(subTaskSchema).optional(),
    recurringType: z.enum(['once', 'daily', 'weekdays', 'weekly', 'biweekly', 'monthly', 'custom']),
    recurringDays: z.array(z.number().int().min(0).max(6)).optional(),
    recurringEndDate: z.string().optional(),
    recurringParentId: z.string().optional(),
    timesRescheduled: z.number().int(),
    emotionalBlocker: z.string().optional(),
    pointsEarned: z.number(),
    completedOnTime: z.boolean().optional(),
    createdAt: z.string(),
    updatedAt: z.string(),
});

const focusSessionSchema: z.ZodType<FocusSessionRecord> = z.object({
    id: z.string().min(1),
    title: z.string(),
    sessionType: z.enum(['timed', 'scheduled', 'pomodoro', 'recurring']),
    startedAt: z.string(),
    endedAt: z.string().optional(),
    scheduledDuration: z.number(),
    actualDuration: z.number().optional(),
    isDeepFocus: z.boolean(),
    wasCompleted: z.boolean(),
    wasCanceled: z.boolean(),
    taskId: z.string().optional(),
    taskTitle: z.string().optional(),
    blockListId: z.string().optional(),
    pointsEarned: z.number(),
    createdAt: z.string(),
});

const pactSchema: z.ZodType<Pact> = z.object({
    id: z.string().min(1),
    initiatorId: z.string(),
    partnerId: z.string(),
    commitmentType: z.enum(['daily_tasks', 'focus_time', 'goal_progress', 'custom']),
    targetValue: z.number(),
    customDescription: z.string().optional(),
    status: z.enum(['pending', 'active', 'completed', 'broken']),
    acceptedAt: z.string().optional(),
    brokenAt: z.string().optional(),
    brokenBy: z.string().optional(),
    endedAt: z.string().optional(),
    currentStreak: z.number().int(),
    longestStreak: z.number().int(),
    initiatorProgress: z.number(),
    partnerProgress: z.number(),
    initiatorCompletedToday: z.boolean(),
    partnerCompletedToday: z.boolean(),
    lastCheckedDate: z.string().optional(),
    shieldActive: z.boolean(),
    shieldUsedAt: z.string().optional(),
    totalXpEarned: z.number(),
    milestonesReached: z.array(z.number()),
    createdAt: z.string(),
    updatedAt: z.string(),
});

const journalEntrySchema: z.ZodType<JournalEntry> = z.object({
    id: z.string().min(1),
    type: z.enum(['brain_dump', 'reminder', 'gratitude', 'reflection']),
    text: z.string(),
    mood: z.enum(['excellent', 'good', 'neutral', 'low', 'stressed']).optional(),
    themes: z.array(z.string()),
    sentiment: z.number().min(-1).max(1).optional(),
    summary: z.string().optional(),
    wordCount: z.number().int(),
    date: z.string(),
    createdAt: z.string(),
    updatedAt: z.string(),
});

const statsSchema: z.ZodType<UserStats> = z.object({
    totalPoints: z.number(),
    level: z.number().int(),
    currentStreak: z.number().int(),
    longestStreak: z.number().int(),
    tasksCompletedToday: z.number().int(),
    tasksCompletedThisWeek: z.number().int(),
    totalTasksCompleted: z.number().int(),
    dailyGoal: z.number().int().positive(),
    weeklyGoal: z.number().int().positive(),
    streakCountedDate: z.string().optional(),
    focusMinutesTotal: z.number(),
    focusMinutesToday: z.number(),
    focusSessionsTotal: z.number().int(),
    blockedFocusSessions: z.number().int(),
    deepFocusSessions: z.number().int(),
    focusStreakDays: z.number().int(),
    longestFocusSessionMinutes: z.number(),
    lastFocusDate: z.string().optional(),
    lastActiveDate: z.string().optional(),
    unlockedAchievements: z.array(z.enum(ACHIEVEMENT_TYPES)),
    pendingAchievements: z.array(z.enum(ACHIEVEMENT_TYPES)),
    gems: z.array(z.object({
        type: z.enum(['sapphire', 'emerald', 'ruby', 'diamond', 'amethyst']),
        earnedAt: z.string(),
    })),
});

const exportSchema = z.object({
    version: z.literal(EXPORT_VERSION),
    exportDate: z.string(),
    appVersion: z.string(),
    tasks: z.array(taskSchema),
    focusSessions: z.array(focusSessionSchema),
    pacts: z.array(pactSchema),
    journalEntries: z.array(journalEntrySchema),
    stats: statsSchema.optional(),
});

// ============================================
// Types
// ============================================

export type ExportData = z.infer<typeof exportSchema>;

export interface ImportCounts {
    tasks: number;
    focusSessions: number;
    pacts: number;
    journalEntries: number;
}

export interface ImportResult {
    success: boolean;
    counts: ImportCounts;
    errors: string[];
}

const EMPTY_COUNTS: ImportCounts = { tasks: 0, focusSessions: 0, pacts: 0, journalEntries: 0 };

// ============================================
// Export
// ============================================

export async function exportData(now: Date = new Date()): Promise<ExportData> {
    const [tasks, focusSessions, pacts, journalEntries, stats] = await Promise.all([
        tasksDB.getAll(),
        focusSessionsDB.getAll(),
        pactsDB.getAll(),
        journalEntriesDB.getAll(),
        statsDB.get(),
    ]);

    logger.info('LOG.DATA_EXPORT', {
        tasks: tasks.length,
        focusSessions: focusSessions.length,
        pacts: pacts.length,
        journalEntries: journalEntries.length,
    }, systemContext('store'));

    return {
        version: EXPORT_VERSION,
        exportDate: now.toISOString(),
        appVersion: APP_VERSION,
        tasks,
        focusSessions,
        pacts,
        journalEntries,
        stats,
    };
}

// ============================================
// Import
// ============================================

export type ImportValidation =
    | { valid: true; data: ExportData }
    | { valid: false; errors: string[] };

export function validateImportData(data: unknown): ImportValidation {
    const parsed = exportSchema.safeParse(data);
    if (!parsed.success) {
        return { valid: false, errors: [formatIssues(parsed.error.issues)] };
    }
    return { valid: true, data: parsed.data };
}

/**
 * Restores a backup. Without `merge` the collections the backup carries
 * are cleared first; with it, records sharing an id are overwritten and
 * the rest kept. Pact activities, block lists and scheduled sessions are
 * not part of a backup and survive either way.
 */
export async function importData(data: unknown, options: { merge?: boolean } = {}): Promise<ImportResult> {
    const validation = validateImportData(data);
    if (!validation.valid) {
        logger.warn('LOG.DATA_IMPORT', { success: false, errors: validation.errors }, systemContext('store'));
        return { success: false, counts: { ...EMPTY_COUNTS }, errors: validation.errors };
    }

    const backup = validation.data;
    if (!options.merge) {
        await Promise.all([
            tasksDB.clear(),
            focusSessionsDB.clear(),
            pactsDB.clear(),
            journalEntriesDB.clear(),
            statsDB.clear(),
        ]);
    }

    for (const task of backup.tasks) await tasksDB.create(task);
    for (const session of backup.focusSessions) await focusSessionsDB.create(session);
    for (const pact of backup.pacts) await pactsDB.create(pact);
    for (const entry of backup.journalEntries) await journalEntriesDB.create(entry);
    if (backup.stats) await statsDB.save(backup.stats);

    const counts: ImportCounts = {
        tasks: backup.tasks.length,
        focusSessions: backup.focusSessions.length,
        pacts: backup.pacts.length,
        journalEntries: backup.journalEntries.length,
    };
    logger.info('LOG.DATA_IMPORT', { success: true, merge: options.merge ?? false, ...counts }, systemContext('store'));

    return { success: true, counts, errors: [] };
}
