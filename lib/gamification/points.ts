// Veloce Points & Levels
// Task reward formula and the level curve

import { POINTS } from '../constants';
import type { Priority } from '../constants';

export interface TaskPointsInput {
    priority: Priority;
    stars: number;
    completedOnTime: boolean;
    streak: number;
    estimatedMinutes?: number;
}

export function streakMultiplier(streak: number): number {
    if (streak <= 0) return 1;
    return Math.min(1 + streak * POINTS.streakMultiplierStep, POINTS.maxStreakMultiplier);
}

export function calculateTaskPoints(input: TaskPointsInput): number {
    let points: number = POINTS.taskComplete;

    if (input.priority === 'high') points += POINTS.highPriorityBonus;
    else if (input.priority === 'medium') points += POINTS.mediumPriorityBonus;

    points += input.stars * POINTS.perStar;
    if (input.completedOnTime) points += POINTS.onTimeBonus;

    points = Math.floor(points * streakMultiplier(input.streak));

    // Longer tasks earn a little more
    points += Math.floor((input.estimatedMinutes ?? 0) / 10);
    return points;
}

// ============================================
// Levels
// ============================================

export function pointsForLevel(level: number): number {
    if (level <= 1) return 0;
    return Math.floor(50 * Math.pow(level, 1.5));
}

export function levelForPoints(points: number): number {
    let level = 1;
    while (pointsForLevel(level + 1) <= points) {
        level++;
    }
    return level;
}

/** Fraction of the way from the current level to the next */
export function levelProgress(points: number): number {
    const level = levelForPoints(points);
    const floor = pointsForLevel(level);
    const required = pointsForLevel(level + 1) - floor;
    if (required <= 0) return 1;
    return Math.min(1, (points - floor) / required);
}

export function pointsToNextLevel(points: number): number {
    return pointsForLevel(levelForPoints(points) + 1) - points;
}
