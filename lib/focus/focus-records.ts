// Veloce Focus Records
// Session history, saved block lists, scheduled sessions and statistics

import { addDays, differenceInCalendarDays, getDay, isSameDay, set, startOfDay } from 'date-fns';
import { DAY_NAMES } from '../constants';
import type { FocusBlockList, FocusSessionRecord, FocusSessionType, ScheduledFocusSession } from '../schema';
import { formatDuration, generateId, getISOTimestamp, toDate } from '../utils';

// ============================================
// Session records
// ============================================

export interface NewFocusSessionInput {
    title: string;
    sessionType?: FocusSessionType;
    scheduledDuration: number; // seconds
    isDeepFocus?: boolean;
    taskId?: string;
    taskTitle?: string;
    blockListId?: string;
}

export function createFocusRecord(input: NewFocusSessionInput, now: Date = new Date()): FocusSessionRecord {
    const timestamp = getISOTimestamp(now);
    return {
        id: generateId(),
        title: input.title,
        sessionType: input.sessionType ?? 'timed',
        startedAt: timestamp,
        scheduledDuration: input.scheduledDuration,
        isDeepFocus: input.isDeepFocus ?? false,
        wasCompleted: false,
        wasCanceled: false,
        taskId: input.taskId,
        taskTitle: input.taskTitle,
        blockListId: input.blockListId,
        pointsEarned: 0,
        createdAt: timestamp,
    };
}

function elapsedSeconds(record: FocusSessionRecord, now: Date): number {
    return Math.max(0, Math.floor((now.getTime() - toDate(record.startedAt).getTime()) / 1000));
}

export function completeRecord(record: FocusSessionRecord, pointsEarned: number, now: Date = new Date()): FocusSessionRecord {
    return {
        ...record,
        endedAt: getISOTimestamp(now),
        actualDuration: elapsedSeconds(record, now),
        wasCompleted: true,
        wasCanceled: false,
        pointsEarned,
    };
}

export function cancelRecord(record: FocusSessionRecord, now: Date = new Date()): FocusSessionRecord {
    return {
        ...record,
        endedAt: getISOTimestamp(now),
        actualDuration: elapsedSeconds(record, now),
        wasCompleted: false,
        wasCanceled: true,
        pointsEarned: 0,
    };
}

/** Actual duration once ended, otherwise the planned one */
export function recordMinutes(record: Pick<FocusSessionRecord, 'actualDuration' | 'scheduledDuration'>): number {
    return Math.floor((record.actualDuration ?? record.scheduledDuration) / 60);
}

export function formatRecordDuration(record: Pick<FocusSessionRecord, 'actualDuration' | 'scheduledDuration'>): string {
    return formatDuration(recordMinutes(record));
}

// ============================================
// Block lists
// ============================================

export const DEFAULT_BLOCK_LIST_COLOR = '#9440FA';

interface BlockListInput {
    name: string;
    description?: string;
    colorHex?: string;
    isDefault?: boolean;
    isAllowList?: boolean;
    appIdentifiers?: string[];
}

export function createBlockList(input: BlockListInput, now: Date = new Date()): FocusBlockList {
    const timestamp = getISOTimestamp(now);
    return {
        id: generateId(),
        name: input.name,
        description: input.description,
        colorHex: input.colorHex ?? DEFAULT_BLOCK_LIST_COLOR,
        isDefault: input.isDefault ?? false,
        isAllowList: input.isAllowList ?? false,
        appIdentifiers: input.appIdentifiers ?? [],
        useCount: 0,
        createdAt: timestamp,
        updatedAt: timestamp,
    };
}

export const BLOCK_LIST_PRESETS = {
    workMode: {
        name: 'Work Mode',
        description: 'Block social media and entertainment during work',
        colorHex: '#6B73F9',
    },
    socialMediaDetox: {
        name: 'Social Media Detox',
        description: 'Block all social media apps',
        colorHex: '#FF6B6B',
    },
    deepWork: {
        name: 'Deep Work',
        description: 'Block everything except essential apps',
        colorHex: '#14CC8C',
        isAllowList: true,
    },
} as const;

export type BlockListPreset = keyof typeof BLOCK_LIST_PRESETS;

export function createPresetBlockList(preset: BlockListPreset, now: Date = new Date()): FocusBlockList {
    return createBlockList(BLOCK_LIST_PRESETS[preset], now);
}

export function markBlockListUsed(list: FocusBlockList, now: Date = new Date()): FocusBlockList {
    const timestamp = getISOTimestamp(now);
    return { ...list, useCount: list.useCount + 1, lastUsedAt: timestamp, updatedAt: timestamp };
}

// ============================================
// Scheduled sessions
// ============================================

const WEEKDAYS = [1, 2, 3, 4, 5];
const WEEKENDS = [0, 6];
const EVERY_DAY = [0, 1, 2, 3, 4, 5, 6];

function sameDays(a: number[], b: number[]): boolean {
    return a.length === b.length && a.every((day, i) => day === b[i]);
}

export function formatRecurringDays(days: number[] | undefined): string {
    if (!days || days.length === 0) return 'No days selected';

    const sorted = [...days].sort((a, b) => a - b);
    if (sameDays(sorted, WEEKDAYS)) return 'Weekdays';
    if (sameDays(sorted, WEEKENDS)) return 'Weekends';
    if (sameDays(sorted, EVERY_DAY)) return 'Every day';
    return sorted.map((day) => DAY_NAMES[day] ?? String(day)).join(', ');
}

/**
 * Next start time strictly after `now`, scanning today plus the coming week.
 */
export function nextScheduledOccurrence(schedule: ScheduledFocusSession, now: Date = new Date()): Date | null {
    if (!schedule.isEnabled) return null;

    if (!schedule.isRecurring) {
        if (!schedule.startTime) return null;
        const start = toDate(schedule.startTime);
        return start.getTime() > now.getTime() ? start : null;
    }

    const days = schedule.recurringDays ?? [];
    if (days.length === 0) return null;

    for (let offset = 0; offset < 8; offset++) {
        const day = addDays(now, offset);
        if (!days.includes(getDay(day))) continue;

        const candidate = set(day, {
            hours: schedule.startHour,
            minutes: schedule.startMinute,
            seconds: 0,
            milliseconds: 0,
        });
        if (candidate.getTime() > now.getTime()) return candidate;
    }
    return null;
}

// ============================================
// Statistics
// ============================================

export interface FocusStatistics {
    totalSessionsCompleted: number;
    totalMinutesFocused: number;
    deepFocusSessionsCompleted: number;
    averageSessionDuration: number; // minutes
    currentStreak: number;
    longestStreak: number;
    sessionsToday: number;
    minutesToday: number;
    longestSessionMinutes: number;
}

export function calculateFocusStatistics(sessions: FocusSessionRecord[], now: Date = new Date()): FocusStatistics {
    const completed = sessions.filter((session) => session.wasCompleted);
    const totalSeconds = completed.reduce((sum, session) => sum + (session.actualDuration ?? 0), 0);
    const totalMinutesFocused = Math.floor(totalSeconds / 60);

    const today = completed.filter((session) => isSameDay(toDate(session.startedAt), now));
    const todaySeconds = today.reduce((sum, session) => sum + (session.actualDuration ?? 0), 0);

    const { current, longest } = dayStreaks(completed.map((session) => toDate(session.startedAt)), now);

    return {
        totalSessionsCompleted: completed.length,
        totalMinutesFocused,
        deepFocusSessionsCompleted: completed.filter((session) => session.isDeepFocus).length,
        averageSessionDuration: completed.length > 0 ? Math.floor(totalMinutesFocused / completed.length) : 0,
        currentStreak: current,
        longestStreak: longest,
        sessionsToday: today.length,
        minutesToday: Math.floor(todaySeconds / 60),
        longestSessionMinutes: completed.reduce(
            (max, session) => Math.max(max, Math.floor((session.actualDuration ?? 0) / 60)),
            0
        ),
    };
}

/**
 * Consecutive-day runs over distinct calendar days. The current run
 * only counts while its last day is today or yesterday.
 */
export function dayStreaks(dates: Date[], now: Date = new Date()): { current: number; longest: number } {
    const days = Array.from(new Set(dates.map((date) => startOfDay(date).getTime())))
        .sort((a, b) => a - b)
        .map((time) => new Date(time));

    let current = 0;
    let longest = 0;
    let previous: Date | null = null;

    for (const day of days) {
        current = previous && differenceInCalendarDays(day, previous) === 1 ? current + 1 : 1;
        longest = Math.max(longest, current);
        previous = day;
    }

    if (previous && differenceInCalendarDays(now, previous) > 1) {
        current = 0;
    }
    return { current, longest };
}
