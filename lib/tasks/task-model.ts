// Veloce Task Model
// Pure operations over Task records: recurrence, completion, scoring

import { addDays, addMonths, addWeeks, getDay } from 'date-fns';
import {
    DEFAULT_STAR_RATING,
    ENERGY_THRESHOLDS,
    POINTS,
    PRIORITY_BY_STARS,
    type Priority,
    type TaskType,
} from '../constants';
import type { RecurringType, Task } from '../schema';
import { clamp, formatDuration, generateId, getISOTimestamp, toDate } from '../utils';

export { formatDuration };

export type EnergyTier = 'low' | 'medium' | 'high' | 'max';

// ============================================
// Construction
// ============================================

export interface NewTaskInput {
    title: string;
    notes?: string;
    starRating?: number;
    taskType?: TaskType;
    estimatedMinutes?: number;
    scheduledTime?: string;
    recurringType?: RecurringType;
    recurringDays?: number[];
    recurringEndDate?: string;
}

export function createTask(input: NewTaskInput, now: Date = new Date()): Task {
    const timestamp = getISOTimestamp(now);
    return {
        id: generateId(),
        title: input.title,
        notes: input.notes,
        isCompleted: false,
        starRating: input.starRating ?? DEFAULT_STAR_RATING,
        taskType: input.taskType ?? 'coordinate',
        estimatedMinutes: input.estimatedMinutes,
        scheduledTime: input.scheduledTime,
        recurringType: input.recurringType ?? 'once',
        recurringDays: input.recurringDays,
        recurringEndDate: input.recurringEndDate,
        timesRescheduled: 0,
        pointsEarned: 0,
        createdAt: timestamp,
        updatedAt: timestamp,
    };
}

// ============================================
// Derived properties
// ============================================

export function priorityFromStars(stars: number): Priority {
    if (stars === 1 || stars === 2 || stars === 3) return PRIORITY_BY_STARS[stars];
    return 'medium';
}

export function isRecurring(task: Pick<Task, 'recurringType'>): boolean {
    return task.recurringType !== 'once';
}

export function hasAIProcessing(task: Pick<Task, 'aiAdvice' | 'aiThoughtProcess'>): boolean {
    return Boolean(task.aiAdvice || task.aiThoughtProcess);
}

export function isOverdue(task: Pick<Task, 'isCompleted' | 'scheduledTime'>, now: Date = new Date()): boolean {
    if (task.isCompleted || !task.scheduledTime) return false;
    return toDate(task.scheduledTime).getTime() < now.getTime();
}

// ============================================
// Recurrence
// ============================================

export function nextOccurrence(task: Task, now: Date = new Date()): Date | null {
    const base = task.completedAt ? toDate(task.completedAt) : now;
    let next: Date | null = null;

    switch (task.recurringType) {
        case 'once':
            return null;
        case 'daily':
            next = addDays(base, 1);
            break;
        case 'weekdays': {
            next = addDays(base, 1);
            const weekday = getDay(next);
            if (weekday === 0) next = addDays(next, 1);
            else if (weekday === 6) next = addDays(next, 2);
            break;
        }
        case 'weekly':
            next = addWeeks(base, 1);
            break;
        case 'biweekly':
            next = addWeeks(base, 2);
            break;
        case 'monthly':
            next = addMonths(base, 1);
            break;
        case 'custom':
            next = nextCustomDay(base, task.recurringDays ?? []);
            break;
    }

    if (next && task.recurringEndDate && next.getTime() > toDate(task.recurringEndDate).getTime()) {
        return null;
    }
    return next;
}

function nextCustomDay(base: Date, days: number[]): Date | null {
    if (days.length === 0) return null;
    for (let offset = 1; offset <= 7; offset++) {
        const candidate = addDays(base, offset);
        if (days.includes(getDay(candidate))) return candidate;
    }
    return null;
}

/**
 * Spawns the next instance of a completed recurring task.
 * Returns null when the series has ended.
 */
export function createNextRecurringInstance(task: Task, now: Date = new Date()): Task | null {
    if (!isRecurring(task) || !task.isCompleted) return null;
    if (task.recurringEndDate && toDate(task.recurringEndDate).getTime() < now.getTime()) return null;

    const next = nextOccurrence(task, now);
    if (!next) return null;

    const timestamp = getISOTimestamp(now);
    return {
        id: generateId(),
        title: task.title,
        notes: task.notes,
        isCompleted: false,
        starRating: task.starRating,
        taskType: task.taskType,
        estimatedMinutes: task.estimatedMinutes,
        scheduledTime: getISOTimestamp(next),
        recurringType: task.recurringType,
        recurringDays: task.recurringDays,
        recurringEndDate: task.recurringEndDate,
        recurringParentId: task.recurringParentId ?? task.id,
        timesRescheduled: 0,
        pointsEarned: 0,
        createdAt: timestamp,
        updatedAt: timestamp,
    };
}

// ============================================
// Completion
// ============================================

export function completeTask(task: Task, now: Date = new Date()): Task {
    const completedOnTime = task.scheduledTime
        ? now.getTime() <= toDate(task.scheduledTime).getTime()
        : undefined;

    return {
        ...task,
        isCompleted: true,
        completedAt: getISOTimestamp(now),
        completedOnTime,
        pointsEarned: POINTS.taskComplete + (completedOnTime === true ? POINTS.onTimeBonus : 0),
        updatedAt: getISOTimestamp(now),
    };
}

export function uncompleteTask(task: Task, now: Date = new Date()): Task {
    return {
        ...task,
        isCompleted: false,
        completedAt: undefined,
        completedOnTime: undefined,
        pointsEarned: 0,
        updatedAt: getISOTimestamp(now),
    };
}

export function rescheduleTask(task: Task, scheduledTime: string, now: Date = new Date()): Task {
    return {
        ...task,
        scheduledTime,
        timesRescheduled: task.timesRescheduled + 1,
        updatedAt: getISOTimestamp(now),
    };
}

// ============================================
// Potential points / Energy Core
// ============================================

export function potentialPoints(task: Task, now: Date = new Date()): number {
    let points: number = POINTS.taskComplete;

    if (task.starRating === 3) points += POINTS.highPriorityBonus;
    else if (task.starRating === 2) points += POINTS.mediumPriorityBonus;

    points += task.starRating * POINTS.perStar;

    if (hasAIProcessing(task)) points += POINTS.aiProcessedBonus;
    if (task.scheduledTime) points += POINTS.scheduledBonus;

    if (task.estimatedMinutes !== undefined) {
        points += Math.min(Math.floor(task.estimatedMinutes / 10), POINTS.maxDurationBonus);
    }

    if (isOverdue(task, now)) {
        points = Math.max(points - POINTS.overduePenalty, POINTS.taskComplete);
    }

    return Math.min(points, POINTS.maxPotential);
}

/** 0..1 fill level derived from potential points (10-100) */
export function energyLevel(points: number): number {
    return clamp((points - POINTS.taskComplete) / (POINTS.maxPotential - POINTS.taskComplete), 0, 1);
}

export function energyTier(points: number): EnergyTier {
    if (points <= ENERGY_THRESHOLDS.low) return 'low';
    if (points <= ENERGY_THRESHOLDS.medium) return 'medium';
    if (points <= ENERGY_THRESHOLDS.high) return 'high';
    return 'max';
}

export function formatEstimate(task: Pick<Task, 'estimatedMinutes'>): string | undefined {
    return task.estimatedMinutes !== undefined ? formatDuration(task.estimatedMinutes) : undefined;
}
