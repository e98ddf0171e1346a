// Centralized constants for Veloce

// ============================================
// Tasks
// ============================================

export const TASK_TYPES = {
    create: {
        displayName: 'Create',
        shortLabel: 'Create',
        suggestedDuration: 90,
        optimalTimeOfDay: 'morning',
        energyLevel: 'high',
        aiDescription: 'Creative, high-cognitive task requiring focus and deep work',
    },
    communicate: {
        displayName: 'Communicate',
        shortLabel: 'Chat',
        suggestedDuration: 30,
        optimalTimeOfDay: 'afternoon',
        energyLevel: 'medium',
        aiDescription: 'Interpersonal task involving others, needs clear communication',
    },
    consume: {
        displayName: 'Learn',
        shortLabel: 'Learn',
        suggestedDuration: 45,
        optimalTimeOfDay: 'flexible',
        energyLevel: 'medium',
        aiDescription: 'Learning-focused task for absorbing new information',
    },
    coordinate: {
        displayName: 'Coordinate',
        shortLabel: 'Admin',
        suggestedDuration: 15,
        optimalTimeOfDay: 'interstitial',
        energyLevel: 'low',
        aiDescription: 'Administrative task for organizing and managing',
    },
} as const;

export type TaskType = keyof typeof TASK_TYPES;

export const PRIORITY_BY_STARS = {
    1: 'low',
    2: 'medium',
    3: 'high',
} as const;

export type Priority = typeof PRIORITY_BY_STARS[keyof typeof PRIORITY_BY_STARS];

export const DEFAULT_STAR_RATING = 2;

// Energy Core thresholds on potential points (10-100)
export const ENERGY_THRESHOLDS = {
    low: 25,
    medium: 50,
    high: 75,
} as const;

// ============================================
// Gamification
// ============================================

export const POINTS = {
    taskComplete: 10,
    onTimeBonus: 5,
    highPriorityBonus: 15,
    mediumPriorityBonus: 5,
    perStar: 5,
    aiProcessedBonus: 5,
    scheduledBonus: 5,
    maxDurationBonus: 20,
    overduePenalty: 10,
    maxPotential: 100,
    maxStreakMultiplier: 2.0,
    streakMultiplierStep: 0.1,
} as const;

export const STREAK_MILESTONES = [7, 30, 100] as const;

export const ACHIEVEMENT_TYPES = [
    'firstTask', 'tasksBronze', 'tasksSilver', 'tasksGold', 'tasksDiamond',
    'tenTasks', 'hundredTasks', 'thousandTasks',
    'firstStreak', 'streakBronze', 'streakSilver', 'streakGold', 'streakDiamond',
    'weekStreak', 'monthStreak', 'centuryStreak',
    'levelFive', 'levelTen', 'productiveDay',
    'earlyBird', 'nightOwl', 'perfectWeek', 'weekendWarrior',
    'aiExplorer', 'aiCollaborator', 'brainDumpMaster', 'reflectionGuru',
    'goalSetter', 'goalAchiever',
    'focusFirst', 'focusHour', 'deepFocusMaster', 'distractionFree', 'focusStreak',
    'pactFirst', 'pactWeek', 'pactMonth', 'pactCentury', 'pactMaster',
] as const;

export type AchievementType = typeof ACHIEVEMENT_TYPES[number];

export const ACHIEVEMENT_CATEGORIES = ['tasks', 'streaks', 'levels', 'special', 'focus', 'pacts'] as const;

export type AchievementCategory = typeof ACHIEVEMENT_CATEGORIES[number];

export const GEMS = {
    sapphire: { name: 'First Focus', requirement: 'Complete your first focus session' },
    emerald: { name: 'Deep Diver', requirement: 'Complete a 90+ minute deep work session' },
    ruby: { name: 'Week Warrior', requirement: 'Maintain a 7-day focus streak' },
    diamond: { name: 'Month Master', requirement: 'Maintain a 30-day focus streak' },
    amethyst: { name: 'Century Club', requirement: 'Accumulate 100 total focus hours' },
} as const;

// Flame tiers: minimum streak (inclusive) for each intensity
export const FLAME_TIERS = [
    { intensity: 'inferno', minStreak: 30 },
    { intensity: 'large', minStreak: 14 },
    { intensity: 'medium', minStreak: 7 },
    { intensity: 'small', minStreak: 3 },
    { intensity: 'spark', minStreak: 1 },
] as const;

export type FlameIntensity = typeof FLAME_TIERS[number]['intensity'] | 'none';

// ============================================
// Focus
// ============================================

export const POMODORO_DEFAULTS = {
    focusMinutes: 25,
    shortBreakMinutes: 5,
    longBreakMinutes: 15,
    sessionsUntilLongBreak: 4,
} as const;

export const MICRO_CHALLENGE_DEFAULTS = {
    firstStepTitle: 'Open and write just the first line',
    firstStepSeconds: 30,
    finalCountdownFrom: 3,
} as const;

export const WORK_MODES = {
    deepWork: { displayName: 'Deep Work', duration: '90 min' },
    pomodoro: { displayName: 'Pomodoro', duration: '25 min' },
    flowState: { displayName: 'Flow State', duration: 'No limit' },
} as const;

export type WorkMode = keyof typeof WORK_MODES;

export const DAY_NAMES = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'] as const;

// ============================================
// Pacts
// ============================================

export const PACT_COMMITMENTS = {
    daily_tasks: { displayName: 'Daily Tasks', unit: 'tasks', defaultTarget: 3 },
    focus_time: { displayName: 'Focus Time', unit: 'minutes', defaultTarget: 30 },
    goal_progress: { displayName: 'Goal Progress', unit: '%', defaultTarget: 10 },
    custom: { displayName: 'Custom', unit: '', defaultTarget: 1 },
} as const;

export type PactCommitmentType = keyof typeof PACT_COMMITMENTS;

export const PACT_XP_PER_STREAK_DAY = 50;

// ============================================
// Journal
// ============================================

export const JOURNAL_ENTRY_TYPES = {
    brain_dump: {
        displayName: 'Brain Dump',
        placeholder: 'Get it all out of your head...',
        promptSuggestions: ["What's weighing on your mind?", 'Dump all your thoughts here...', 'No filter, just write...'],
    },
    reminder: {
        displayName: 'Reminder',
        placeholder: 'Remember to...',
        promptSuggestions: ["Don't forget to...", 'Important: Remember...', 'Note to self...'],
    },
    gratitude: {
        displayName: 'Gratitude',
        placeholder: "Today I'm grateful for...",
        promptSuggestions: [
            "3 things you're grateful for today",
            'A small moment that made you smile',
            'Someone who helped you recently',
        ],
    },
    reflection: {
        displayName: 'Reflection',
        placeholder: 'Reflecting on today...',
        promptSuggestions: [
            'What did you learn today?',
            'What would you do differently?',
            'How did today align with your goals?',
        ],
    },
} as const;

export type JournalEntryType = keyof typeof JOURNAL_ENTRY_TYPES;

export const JOURNAL_MOODS = {
    excellent: { displayName: 'Excellent', value: 1.0 },
    good: { displayName: 'Good', value: 0.75 },
    neutral: { displayName: 'Neutral', value: 0.5 },
    low: { displayName: 'Low', value: 0.25 },
    stressed: { displayName: 'Stressed', value: 0.15 },
} as const;

export type JournalMood = keyof typeof JOURNAL_MOODS;

// ============================================
// AI
// ============================================

export const ESTIMATE_BOUNDS = {
    fallbackMinutes: 30,
    minMinutes: 5,
    maxMinutes: 480,
} as const;

export const APP_VERSION = '0.1.0';
export const EXPORT_VERSION = 1;
