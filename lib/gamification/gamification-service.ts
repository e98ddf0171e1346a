// Veloce Gamification Service
// Points, levels, streaks, achievements and gems over a UserStats record.
// Every operation returns a new record; persistence is the caller's job.

import { isSameISOWeek, subDays } from 'date-fns';
import { getConfig } from '../config/env';
import { getFeatures } from '../config/features';
import { logger, systemContext } from '../logger';
import type { AchievementDefinition, AchievementType, EarnedGem, Task, UserStats } from '../schema';
import { priorityFromStars } from '../tasks/task-model';
import { getLocalDateString, parseLocalDate } from '../utils';
import { achievementProgress, getAchievement } from './achievements';
import { evaluateGems } from './gems';
import { calculateTaskPoints, levelForPoints } from './points';

export function createInitialStats(goals: { dailyGoal?: number; weeklyGoal?: number } = {}): UserStats {
    const config = getConfig().goals;
    return {
        totalPoints: 0,
        level: 1,
        currentStreak: 0,
        longestStreak: 0,
        tasksCompletedToday: 0,
        tasksCompletedThisWeek: 0,
        totalTasksCompleted: 0,
        dailyGoal: goals.dailyGoal ?? config.dailyTasks,
        weeklyGoal: goals.weeklyGoal ?? config.weeklyTasks,
        focusMinutesTotal: 0,
        focusMinutesToday: 0,
        focusSessionsTotal: 0,
        blockedFocusSessions: 0,
        deepFocusSessions: 0,
        focusStreakDays: 0,
        longestFocusSessionMinutes: 0,
        unlockedAchievements: [],
        pendingAchievements: [],
        gems: [],
    };
}

// ============================================
// Achievements
// ============================================

export interface UnlockResult {
    stats: UserStats;
    unlocked: boolean;
}

/** Grants the bonus and queues the achievement for acknowledgement. No-op when already held. */
export function unlockAchievement(stats: UserStats, type: AchievementType): UnlockResult {
    if (stats.unlockedAchievements.includes(type)) {
        return { stats, unlocked: false };
    }

    const definition = getAchievement(type);
    const totalPoints = stats.totalPoints + definition.bonusPoints;
    logger.info('LOG.ACHIEVEMENT_UNLOCKED', { type, bonusPoints: definition.bonusPoints }, systemContext('gamification'));

    return {
        unlocked: true,
        stats: {
            ...stats,
            totalPoints,
            level: levelForPoints(totalPoints),
            unlockedAchievements: [...stats.unlockedAchievements, type],
            pendingAchievements: [...stats.pendingAchievements, type],
        },
    };
}

export interface AcknowledgeResult {
    stats: UserStats;
    achievement: AchievementDefinition | null;
}

/** Pops the given pending achievement, or the oldest one */
export function acknowledgeAchievement(stats: UserStats, type?: AchievementType): AcknowledgeResult {
    const index = type ? stats.pendingAchievements.indexOf(type) : 0;
    const acknowledged = stats.pendingAchievements[index];
    if (index < 0 || acknowledged === undefined) {
        return { stats, achievement: null };
    }

    return {
        achievement: getAchievement(acknowledged),
        stats: {
            ...stats,
            pendingAchievements: stats.pendingAchievements.filter((_, i) => i !== index),
        },
    };
}

function unlockAll(stats: UserStats, types: AchievementType[]): { stats: UserStats; unlocked: AchievementType[] } {
    let current = stats;
    const unlocked: AchievementType[] = [];
    for (const type of types) {
        const result = unlockAchievement(current, type);
        current = result.stats;
        if (result.unlocked) unlocked.push(type);
    }
    return { stats: current, unlocked };
}

const TASK_CHECKED: AchievementType[] = [
    'firstTask', 'tasksBronze', 'tasksSilver', 'tasksGold', 'tasksDiamond',
    'tenTasks', 'hundredTasks', 'thousandTasks',
    'firstStreak', 'streakBronze', 'streakSilver', 'streakGold', 'streakDiamond',
    'weekStreak', 'monthStreak', 'centuryStreak',
    'productiveDay',
];

const FOCUS_CHECKED: AchievementType[] = ['focusFirst', 'deepFocusMaster', 'distractionFree', 'focusStreak'];

const LEVEL_CHECKED: AchievementType[] = ['levelFive', 'levelTen'];

function reached(stats: UserStats, types: AchievementType[]): AchievementType[] {
    return types.filter((type) => achievementProgress(type, stats) >= 1);
}

/**
 * Unlocks the given candidates, then any level achievements their
 * bonuses pushed the user into.
 */
function applyAchievements(stats: UserStats, candidates: AchievementType[]) {
    const first = unlockAll(stats, candidates);
    const levels = unlockAll(first.stats, reached(first.stats, LEVEL_CHECKED));
    return { stats: levels.stats, unlocked: [...first.unlocked, ...levels.unlocked] };
}

// ============================================
// Task completion
// ============================================

export interface TaskCompletionResult {
    stats: UserStats;
    pointsEarned: number;
    leveledUp: boolean;
    newAchievements: AchievementType[];
}

export function recordTaskCompletion(stats: UserStats, task: Task, now: Date = new Date()): TaskCompletionResult {
    const today = getLocalDateString(now);
    const pointsEarned = calculateTaskPoints({
        priority: task.aiPriority ?? priorityFromStars(task.starRating),
        stars: task.starRating,
        completedOnTime: task.completedOnTime ?? false,
        streak: stats.currentStreak,
        estimatedMinutes: task.estimatedMinutes,
    });

    // Counters roll over on the first completion of a new day or ISO week
    const sameDay = stats.lastActiveDate === today;
    const sameWeek = stats.lastActiveDate === undefined || isSameISOWeek(parseLocalDate(stats.lastActiveDate), now);

    const totalPoints = stats.totalPoints + pointsEarned;
    let next: UserStats = {
        ...stats,
        totalPoints,
        level: levelForPoints(totalPoints),
        tasksCompletedToday: (sameDay ? stats.tasksCompletedToday : 0) + 1,
        tasksCompletedThisWeek: (sameWeek ? stats.tasksCompletedThisWeek : 0) + 1,
        totalTasksCompleted: stats.totalTasksCompleted + 1,
        lastActiveDate: today,
    };

    // The daily goal extends the streak once per day
    if (next.tasksCompletedToday >= next.dailyGoal && next.streakCountedDate !== today) {
        const currentStreak = next.currentStreak + 1;
        next = {
            ...next,
            currentStreak,
            longestStreak: Math.max(next.longestStreak, currentStreak),
            streakCountedDate: today,
        };
    }

    const candidates = reached(next, TASK_CHECKED);
    const hour = now.getHours();
    if (hour < 8) candidates.push('earlyBird');
    if (hour >= 22) candidates.push('nightOwl');

    const applied = applyAchievements(next, candidates);
    const leveledUp = applied.stats.level > stats.level;

    const context = systemContext('gamification', { taskId: task.id });
    logger.info('LOG.TASK_COMPLETION', {
        pointsEarned,
        totalPoints: applied.stats.totalPoints,
        tasksCompletedToday: applied.stats.tasksCompletedToday,
        currentStreak: applied.stats.currentStreak,
    }, context);
    if (leveledUp) {
        logger.info('LOG.LEVEL_UP', { from: stats.level, to: applied.stats.level }, context);
    }

    return { stats: applied.stats, pointsEarned, leveledUp, newAchievements: applied.unlocked };
}

// ============================================
// Focus sessions
// ============================================

export interface FocusSessionInput {
    minutes: number;
    isDeepFocus?: boolean;
    appBlocking?: boolean;
}

export interface FocusSessionResult {
    stats: UserStats;
    leveledUp: boolean;
    newAchievements: AchievementType[];
    newGems: EarnedGem[];
}

export function recordFocusSession(stats: UserStats, session: FocusSessionInput, now: Date = new Date()): FocusSessionResult {
    const today = getLocalDateString(now);
    const yesterday = getLocalDateString(subDays(now, 1));
    const minutes = Math.max(0, Math.floor(session.minutes));
    const blocked = session.appBlocking ?? false;

    let focusStreakDays: number;
    if (stats.lastFocusDate === today) focusStreakDays = Math.max(1, stats.focusStreakDays);
    else if (stats.lastFocusDate === yesterday) focusStreakDays = stats.focusStreakDays + 1;
    else focusStreakDays = 1;

    let next: UserStats = {
        ...stats,
        focusMinutesTotal: stats.focusMinutesTotal + minutes,
        focusMinutesToday: (stats.lastFocusDate === today ? stats.focusMinutesToday : 0) + minutes,
        focusSessionsTotal: stats.focusSessionsTotal + 1,
        blockedFocusSessions: stats.blockedFocusSessions + (blocked ? 1 : 0),
        deepFocusSessions: stats.deepFocusSessions + (session.isDeepFocus ? 1 : 0),
        focusStreakDays,
        longestFocusSessionMinutes: Math.max(stats.longestFocusSessionMinutes, minutes),
        lastFocusDate: today,
    };

    let newGems: EarnedGem[] = [];
    if (getFeatures().gems) {
        newGems = evaluateGems(next, next.gems, now);
        if (newGems.length > 0) {
            next = { ...next, gems: [...next.gems, ...newGems] };
            for (const gem of newGems) {
                logger.info('LOG.GEM_EARNED', { gem: gem.type }, systemContext('gamification'));
            }
        }
    }

    const candidates = reached(next, FOCUS_CHECKED);
    if (blocked && minutes >= getAchievement('focusHour').threshold) {
        candidates.push('focusHour');
    }

    const applied = applyAchievements(next, candidates);
    return {
        stats: applied.stats,
        leveledUp: applied.stats.level > stats.level,
        newAchievements: applied.unlocked,
        newGems,
    };
}

// ============================================
// Pacts
// ============================================

export type PactEvent =
    | { kind: 'accepted' }
    | { kind: 'milestone'; milestone: number }
    | { kind: 'completed'; completedPacts: number };

export interface PactEventResult {
    stats: UserStats;
    leveledUp: boolean;
    newAchievements: AchievementType[];
}

function pactAchievementFor(event: PactEvent): AchievementType | null {
    switch (event.kind) {
        case 'accepted':
            return 'pactFirst';
        case 'milestone':
            if (event.milestone === 7) return 'pactWeek';
            if (event.milestone === 30) return 'pactMonth';
            if (event.milestone === 100) return 'pactCentury';
            return null;
        case 'completed':
            return event.completedPacts >= getAchievement('pactMaster').threshold ? 'pactMaster' : null;
    }
}

export function recordPactEvents(stats: UserStats, events: PactEvent[]): PactEventResult {
    const candidates: AchievementType[] = [];
    for (const event of events) {
        const type = pactAchievementFor(event);
        if (type) candidates.push(type);
    }

    const applied = applyAchievements(stats, candidates);
    return {
        stats: applied.stats,
        leveledUp: applied.stats.level > stats.level,
        newAchievements: applied.unlocked,
    };
}

// ============================================
// Day rollover
// ============================================

/**
 * Start-of-day housekeeping. The streak survives only when yesterday's
 * (or today's) goal was met; a missed day or a short day breaks it.
 */
export function resetDaily(stats: UserStats, now: Date = new Date()): UserStats {
    const today = getLocalDateString(now);
    const yesterday = getLocalDateString(subDays(now, 1));
    let next = { ...stats };

    const goalMet = stats.streakCountedDate === today || stats.streakCountedDate === yesterday;
    if (!goalMet && stats.currentStreak > 0) {
        logger.info('LOG.STREAK_RESET', {
            previousStreak: stats.currentStreak,
            lastCountedDate: stats.streakCountedDate ?? null,
        }, systemContext('gamification'));
        next.currentStreak = 0;
    }

    if (stats.lastActiveDate !== today) {
        next.tasksCompletedToday = 0;
        if (stats.lastActiveDate && !isSameISOWeek(parseLocalDate(stats.lastActiveDate), now)) {
            next.tasksCompletedThisWeek = 0;
        }
    }

    if (stats.lastFocusDate !== today) {
        next.focusMinutesToday = 0;
        if (stats.lastFocusDate !== yesterday) next.focusStreakDays = 0;
    }

    return next;
}
