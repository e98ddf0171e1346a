// Veloce Domain Types
// Records persisted by the store and exchanged through the API.
// Timestamps are ISO strings; calendar days are YYYY-MM-DD.

import type {
    AchievementCategory,
    AchievementType,
    FlameIntensity,
    JournalEntryType,
    JournalMood,
    PactCommitmentType,
    Priority,
    TaskType,
} from './constants';

export type { AchievementCategory, AchievementType, FlameIntensity, JournalEntryType, JournalMood, PactCommitmentType, Priority, TaskType };

// ============================================
// Tasks
// ============================================

export type RecurringType = 'once' | 'daily' | 'weekdays' | 'weekly' | 'biweekly' | 'monthly' | 'custom';

export interface SubTask {
    title: string;
    estimatedMinutes?: number;
    order: number;
    reasoning?: string;
    status: 'pending' | 'completed';
}

export interface Task {
    id: string;
    title: string;
    notes?: string;

    isCompleted: boolean;
    completedAt?: string;

    starRating: number; // 1-3, drives priority
    taskType: TaskType;
    estimatedMinutes?: number;
    scheduledTime?: string;

    // AI enrichment
    aiAdvice?: string;
    aiPriority?: Priority;
    aiThoughtProcess?: string;
    aiProcessedAt?: string;
    aiSubTasks?: SubTask[];

    // Recurrence
    recurringType: RecurringType;
    recurringDays?: number[]; // 0 = Sunday
    recurringEndDate?: string;
    recurringParentId?: string;

    // Avoidance signals
    timesRescheduled: number;
    emotionalBlocker?: string;

    pointsEarned: number;
    completedOnTime?: boolean;

    createdAt: string;
    updatedAt: string;
}

// ============================================
// Focus
// ============================================

export type FocusSessionType = 'timed' | 'scheduled' | 'pomodoro' | 'recurring';

export interface FocusSessionRecord {
    id: string;
    title: string;
    sessionType: FocusSessionType;
    startedAt: string;
    endedAt?: string;
    scheduledDuration: number; // seconds
    actualDuration?: number;   // seconds
    isDeepFocus: boolean;
    wasCompleted: boolean;
    wasCanceled: boolean;
    taskId?: string;
    taskTitle?: string;
    blockListId?: string;
    pointsEarned: number;
    createdAt: string;
}

export interface FocusBlockList {
    id: string;
    name: string;
    description?: string;
    colorHex: string;
    isDefault: boolean;
    isAllowList: boolean; // Blocks everything except the selection
    appIdentifiers: string[];
    useCount: number;
    lastUsedAt?: string;
    createdAt: string;
    updatedAt: string;
}

export interface ScheduledFocusSession {
    id: string;
    title: string;
    startTime?: string; // One-time schedules
    startHour: number;
    startMinute: number;
    duration: number; // seconds
    isRecurring: boolean;
    recurringDays?: number[];
    recurringEndDate?: string;
    isEnabled: boolean;
    isDeepFocus: boolean;
    blockListId?: string;
    lastTriggeredAt?: string;
    createdAt: string;
    updatedAt: string;
}

// ============================================
// Gamification
// ============================================

export type GemType = 'sapphire' | 'emerald' | 'ruby' | 'diamond' | 'amethyst';

export interface EarnedGem {
    type: GemType;
    earnedAt: string;
}

export interface UserStats {
    totalPoints: number;
    level: number;
    currentStreak: number;
    longestStreak: number;
    tasksCompletedToday: number;
    tasksCompletedThisWeek: number;
    totalTasksCompleted: number;
    dailyGoal: number;
    weeklyGoal: number;
    streakCountedDate?: string; // Day the daily goal last extended the streak

    focusMinutesTotal: number;
    focusMinutesToday: number;
    focusSessionsTotal: number;
    blockedFocusSessions: number;
    deepFocusSessions: number;
    focusStreakDays: number;
    longestFocusSessionMinutes: number;
    lastFocusDate?: string;

    lastActiveDate?: string;
    unlockedAchievements: AchievementType[];
    pendingAchievements: AchievementType[];
    gems: EarnedGem[];
}

export interface AchievementDefinition {
    type: AchievementType;
    title: string;
    description: string;
    icon: string;
    category: AchievementCategory;
    bonusPoints: number;
    threshold: number;
}

// ============================================
// Pacts
// ============================================

export type PactStatus = 'pending' | 'active' | 'completed' | 'broken';

export interface Pact {
    id: string;
    initiatorId: string;
    partnerId: string;

    commitmentType: PactCommitmentType;
    targetValue: number;
    customDescription?: string;

    status: PactStatus;
    acceptedAt?: string;
    brokenAt?: string;
    brokenBy?: string;
    endedAt?: string;

    currentStreak: number;
    longestStreak: number;
    initiatorProgress: number;
    partnerProgress: number;
    initiatorCompletedToday: boolean;
    partnerCompletedToday: boolean;
    lastCheckedDate?: string;

    shieldActive: boolean;
    shieldUsedAt?: string;

    totalXpEarned: number;
    milestonesReached: number[];

    createdAt: string;
    updatedAt: string;
}

export type PactActivityType =
    | 'created'
    | 'accepted'
    | 'declined'
    | 'progress'
    | 'milestone'
    | 'broken'
    | 'completed'
    | 'shield_used';

export interface PactActivity {
    id: string;
    pactId: string;
    userId?: string;
    type: PactActivityType;
    details?: Record<string, string>;
    createdAt: string;
}

// ============================================
// Journal
// ============================================

export interface JournalEntry {
    id: string;
    type: JournalEntryType;
    text: string;
    mood?: JournalMood;
    themes: string[];
    sentiment?: number; // -1..1
    summary?: string;
    wordCount: number;
    date: string; // ISO timestamp of the entry's day
    createdAt: string;
    updatedAt: string;
}
