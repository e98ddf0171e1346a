// Veloce Achievements
// Catalog loaded from data/achievements.json and the per-type progress rules

import { z } from 'zod';
import catalogData from '../../data/achievements.json';
import { ACHIEVEMENT_CATEGORIES, ACHIEVEMENT_TYPES } from '../constants';
import type { AchievementDefinition, AchievementType, UserStats } from '../schema';

const definitionSchema = z.object({
    type: z.enum(ACHIEVEMENT_TYPES),
    title: z.string().min(1),
    description: z.string(),
    icon: z.string(),
    category: z.enum(ACHIEVEMENT_CATEGORIES),
    bonusPoints: z.number().int().nonnegative(),
    threshold: z.number().positive(),
});

export const ACHIEVEMENTS: readonly AchievementDefinition[] = z.array(definitionSchema).parse(catalogData);

const byType = new Map<AchievementType, AchievementDefinition>(
    ACHIEVEMENTS.map((definition) => [definition.type, definition])
);

export function getAchievement(type: AchievementType): AchievementDefinition {
    const definition = byType.get(type);
    if (!definition) {
        throw new Error(`Unknown achievement: ${type}`);
    }
    return definition;
}

export function isAchievementType(value: string): value is AchievementType {
    return ACHIEVEMENT_TYPES.some((type) => type === value);
}

// ============================================
// Progress
// ============================================

/**
 * Current value measured against each achievement's threshold.
 * Types with no tracked counter report null and show as 0 until unlocked.
 */
function currentValue(type: AchievementType, stats: UserStats): number | null {
    switch (type) {
        case 'firstTask':
        case 'tasksBronze':
        case 'tasksSilver':
        case 'tasksGold':
        case 'tasksDiamond':
        case 'tenTasks':
        case 'hundredTasks':
        case 'thousandTasks':
            return stats.totalTasksCompleted;
        case 'firstStreak':
        case 'streakBronze':
        case 'streakSilver':
        case 'streakGold':
        case 'streakDiamond':
        case 'weekStreak':
        case 'monthStreak':
        case 'centuryStreak':
            return stats.longestStreak;
        case 'levelFive':
        case 'levelTen':
            return stats.level;
        case 'productiveDay':
            return stats.tasksCompletedToday;
        case 'focusFirst':
        case 'distractionFree':
            return stats.blockedFocusSessions;
        case 'focusHour':
            return stats.longestFocusSessionMinutes;
        case 'deepFocusMaster':
            return stats.deepFocusSessions;
        case 'focusStreak':
            return stats.focusStreakDays;
        default:
            return null;
    }
}

export function achievementProgress(type: AchievementType, stats: UserStats): number {
    if (stats.unlockedAchievements.includes(type)) return 1;

    const value = currentValue(type, stats);
    if (value === null) return 0;
    return Math.min(1, value / getAchievement(type).threshold);
}
