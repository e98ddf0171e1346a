// Veloce Emotional Check-In
// Surfaced for tasks the user keeps avoiding

import type { Task } from '../schema';

export const RESCHEDULE_CHECKIN_THRESHOLD = 2;

export const EMOTIONS = {
    anxious: {
        label: 'Anxious',
        response:
            "I hear you. Anxiety often protects us from failure—but it can also hold us back. Let's shrink this down to something so tiny your brain won't see it as a threat.",
    },
    overwhelmed: {
        label: 'Overwhelmed',
        response:
            "When something feels too big, our brain protects us by avoiding it. That's completely normal. Let's break this into a 30-second action.",
    },
    unmotivated: {
        label: 'Unmotivated',
        response:
            "Here's a secret: motivation comes AFTER starting, not before. You just need to do the tiniest thing to get momentum going.",
    },
    ready: {
        label: 'Ready',
        response: "Excellent! Let's channel that energy. Your first step is waiting for you below.",
    },
} as const;

export type Emotion = keyof typeof EMOTIONS;

// Reasons a user can record as the task's emotionalBlocker
export const AVOIDANCE_REASONS = {
    tooLarge: {
        label: 'It feels too big',
        suggestion: "Let's break this into 5-minute pieces. What's the smallest first step?",
    },
    unclear: {
        label: "I'm not sure where to start",
        suggestion: "That's okay! Sometimes we need to think before we act. What information do you need?",
    },
    perfectionism: {
        label: 'I want it to be perfect',
        suggestion: "Done is better than perfect. What would 'good enough' look like?",
    },
    energy: {
        label: "I don't have the energy",
        suggestion: 'Your wellbeing matters. Consider a break or switching to a lighter task.',
    },
    distracted: {
        label: 'I keep getting distracted',
        suggestion: "Let's remove distractions. Try a 10-minute focused burst with your phone away.",
    },
    other: {
        label: 'Something else',
        suggestion: "Whatever it is, it's valid. Would you like to reschedule this task?",
    },
} as const;

export type AvoidanceReason = keyof typeof AVOIDANCE_REASONS;

export function isAvoidanceReason(value: string): value is AvoidanceReason {
    return Object.hasOwn(AVOIDANCE_REASONS, value);
}

// Coaching line shown once the user names what is holding them back
export function suggestionFor(reason: AvoidanceReason): string {
    return AVOIDANCE_REASONS[reason].suggestion;
}

export function shouldShowCheckIn(task: Pick<Task, 'timesRescheduled' | 'emotionalBlocker'>): boolean {
    return task.timesRescheduled >= RESCHEDULE_CHECKIN_THRESHOLD || Boolean(task.emotionalBlocker);
}

export function isEmotion(value: string): value is Emotion {
    return Object.hasOwn(EMOTIONS, value);
}

export function respondToEmotion(emotion: Emotion): string {
    return EMOTIONS[emotion].response;
}
