// Veloce Task Heuristics
// Offline keyword rules used when no AI provider is available,
// and to annotate AI breakdowns with the reasoning shown to the user.
// All checks are case-insensitive substring matches on the title.

import { addDays, addWeeks, nextFriday, nextMonday, nextThursday, nextTuesday, nextWednesday, startOfDay } from 'date-fns';
import type { TaskType, WorkMode } from '../constants';
import type { SubTask } from '../schema';

export type TaskCategory =
    | 'Documentation'
    | 'Communication'
    | 'Review'
    | 'Problem-solving'
    | 'Creation'
    | 'General';

export type Complexity = 'Low' | 'Medium' | 'High';

function containsAny(text: string, keywords: readonly string[]): boolean {
    const lower = text.toLowerCase();
    return keywords.some((keyword) => lower.includes(keyword));
}

// ============================================
// Classification
// ============================================

const CATEGORY_RULES: ReadonlyArray<{ category: TaskCategory; keywords: readonly string[] }> = [
    { category: 'Documentation', keywords: ['report', 'document', 'write'] },
    { category: 'Communication', keywords: ['meeting', 'call', 'discuss'] },
    { category: 'Review', keywords: ['review', 'check', 'audit'] },
    { category: 'Problem-solving', keywords: ['fix', 'bug', 'resolve'] },
    { category: 'Creation', keywords: ['create', 'build', 'design'] },
];

export function detectTaskCategory(title: string): TaskCategory {
    return CATEGORY_RULES.find((rule) => containsAny(title, rule.keywords))?.category ?? 'General';
}

const TASK_TYPE_RULES: ReadonlyArray<{ type: TaskType; keywords: readonly string[] }> = [
    { type: 'create', keywords: ['write', 'design', 'build', 'create', 'draft'] },
    { type: 'communicate', keywords: ['email', 'call', 'meeting', 'reply', 'message'] },
    { type: 'consume', keywords: ['read', 'learn', 'watch', 'study', 'research'] },
];

export function classifyTaskType(title: string): TaskType {
    return TASK_TYPE_RULES.find((rule) => containsAny(title, rule.keywords))?.type ?? 'coordinate';
}

export function assessComplexity(title: string, subTaskCount: number): Complexity {
    const wordCount = title.split(/\s+/).filter(Boolean).length;
    if (wordCount > 8 || subTaskCount > 5) return 'High';
    if (wordCount > 4 || subTaskCount > 3) return 'Medium';
    return 'Low';
}

// ============================================
// Breakdown reasoning
// ============================================

export function patternInsights(title: string, estimatedMinutes: number | undefined, stepCount: number): string[] {
    const insights: string[] = [];

    if (containsAny(title, ['report', 'document'])) {
        insights.push('Recognized as a "document creation" task type');
    } else if (containsAny(title, ['meeting', 'call'])) {
        insights.push('Recognized as a "communication" task type');
    } else if (containsAny(title, ['review', 'check'])) {
        insights.push('Recognized as a "review/validation" task type');
    } else {
        insights.push('Analyzed task keywords and structure');
    }

    if (estimatedMinutes !== undefined) {
        insights.push(`Allocated ${estimatedMinutes}min across ${stepCount} logical steps`);
    }

    if (stepCount >= 3 && stepCount <= 7) {
        insights.push('Optimal breakdown: 3-7 steps for focused execution');
    }

    insights.push('Ordered steps by logical dependency and flow');
    return insights;
}

export function contextQuestions(title: string): string[] {
    if (containsAny(title, ['meeting', 'call'])) {
        return ['Who is the meeting with?', "What's the main agenda or goal?"];
    }
    if (containsAny(title, ['report', 'document'])) {
        return ['Who is the audience for this?', "What's the deadline?"];
    }
    if (containsAny(title, ['email', 'message'])) {
        return ['Who is this for?', "What's the key message?"];
    }
    if (containsAny(title, ['project', 'task'])) {
        return ["What's the expected outcome?", 'Are there any dependencies?'];
    }
    return ["What's the goal of this task?", 'Who is this for?', 'What resources do you need?'];
}

// ============================================
// Fallback breakdown
// ============================================

export interface FallbackBreakdown {
    subTasks: SubTask[];
    thoughtProcess: string;
}

type StepSpec = [title: string, minutes: number, reasoning?: string];

function toSubTasks(steps: StepSpec[]): SubTask[] {
    return steps.map(([title, estimatedMinutes, reasoning], index) => ({
        title,
        estimatedMinutes,
        order: index + 1,
        reasoning,
        status: 'pending',
    }));
}

export function fallbackSubTasks(title: string): FallbackBreakdown {
    if (containsAny(title, ['report', 'presentation', 'document'])) {
        return {
            subTasks: toSubTasks([
                ['Research and gather data', 15, 'Start with data collection to inform content'],
                ['Create outline/structure', 10, 'Structure before detailed content'],
                ['Write main content', 25],
                ['Add visuals/formatting', 15],
                ['Review and polish', 10],
            ]),
            thoughtProcess:
                'Recognized this as a document creation task. Structured breakdown follows best practices: research → outline → content → visuals → review.',
        };
    }

    if (containsAny(title, ['meeting', 'call'])) {
        return {
            subTasks: toSubTasks([
                ['Prepare agenda points', 10, 'Clear agenda ensures productive meeting'],
                ['Gather relevant materials', 10],
                ['Send calendar invite/reminder', 5],
                ['Conduct meeting', 30],
            ]),
            thoughtProcess: 'Identified as a meeting task. Breaking into preparation and execution phases.',
        };
    }

    if (containsAny(title, ['email', 'reply', 'respond'])) {
        return {
            subTasks: toSubTasks([
                ['Review context/thread', 5],
                ['Draft response', 10],
                ['Proofread and send', 5],
            ]),
            thoughtProcess: 'Communication task identified. Simple three-step flow: review → draft → send.',
        };
    }

    return {
        subTasks: toSubTasks([
            ['Define clear objectives', 5, 'Clarity on goals improves focus'],
            ['Break into actionable steps', 10],
            ['Execute main work', 20],
            ['Review and complete', 10],
        ]),
        thoughtProcess: 'Created a general task breakdown following the define → plan → execute → review pattern.',
    };
}

// ============================================
// Due context ("Monday", "this week", "soon")
// ============================================

const WEEKDAY_RESOLVERS: ReadonlyArray<[string, (date: Date) => Date]> = [
    ['monday', nextMonday],
    ['tuesday', nextTuesday],
    ['wednesday', nextWednesday],
    ['thursday', nextThursday],
    ['friday', nextFriday],
];

export function parseDueContext(context: string, now: Date = new Date()): Date | null {
    const lower = context.toLowerCase();

    if (lower.includes('today')) return now;
    if (lower.includes('tomorrow')) return addDays(now, 1);

    for (const [name, resolve] of WEEKDAY_RESOLVERS) {
        if (lower.includes(name)) return startOfDay(resolve(now));
    }

    if (lower.includes('this week')) return addDays(now, 3);
    if (lower.includes('next week')) return addWeeks(now, 1);
    if (lower.includes('soon')) return addDays(now, 2);
    return null;
}

// ============================================
// Work mode
// ============================================

export interface WorkModeRecommendation {
    mode: WorkMode;
    reason: string;
}

export function recommendWorkMode(taskType: TaskType): WorkModeRecommendation {
    if (taskType === 'create') {
        return {
            mode: 'deepWork',
            reason: 'Creative tasks need uninterrupted flow. Pomodoro breaks would fragment your thinking.',
        };
    }
    return {
        mode: 'pomodoro',
        reason: 'This task is well-suited for focused sprints with short breaks.',
    };
}
