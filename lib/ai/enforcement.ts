// Veloce AI Response Enforcement
// Centralized parsing and validation of raw model output for all providers

import { z } from 'zod';
import { ESTIMATE_BOUNDS, type Priority } from '../constants';
import { AIServiceError } from '../errors';
import type { SubTask } from '../schema';
import { parseDueContext } from '../tasks/classifier';
import { clamp, getISOTimestamp } from '../utils';
import type { BrainDumpResult, BrainDumpTask, TaskAnalysis } from './ai-provider';

export const PARTIAL_ADVICE = 'Unable to parse AI response';

const DEFAULT_BRAIN_DUMP_MINUTES = 30;

// ============================================
// Text cleanup
// ============================================

/**
 * Strip a surrounding markdown code fence and whitespace.
 */
export function cleanJSONResponse(text: string): string {
    let cleaned = text.trim();
    if (cleaned.startsWith('```json')) {
        cleaned = cleaned.slice(7);
    } else if (cleaned.startsWith('```')) {
        cleaned = cleaned.slice(3);
    }
    if (cleaned.endsWith('```')) {
        cleaned = cleaned.slice(0, -3);
    }
    return cleaned.trim();
}

/** Cut to the outermost {...}, dropping any chatter around it */
export function extractJsonObject(text: string): string {
    const cleaned = text.replace(/```json/g, '').replace(/```/g, '').trim();
    const start = cleaned.indexOf('{');
    const end = cleaned.lastIndexOf('}');
    return start !== -1 && end > start ? cleaned.slice(start, end + 1) : cleaned;
}

function tryParseJson(text: string): unknown {
    try {
        return JSON.parse(text);
    } catch {
        return undefined;
    }
}

// ============================================
// Schemas
// ============================================

const prioritySchema = z
    .string()
    .transform((value): Priority => normalizePriority(value));

const minutesSchema = z.number().positive().transform((minutes) => Math.round(minutes));

const subTaskSchema = z.object({
    title: z.string().min(1),
    estimated_minutes: minutesSchema.optional(),
    reasoning: z.string().optional(),
});

const youtubeSchema = z.object({
    search_query: z.string().min(1),
    relevance_score: z.number().optional(),
    reasoning: z.string().optional(),
});

const scheduleSchema = z.object({
    suggested_time_of_day: z.string().optional(),
    reasoning: z.string().optional(),
    energy_level: z.string().optional(),
    optimal_duration: z.number().optional(),
});

const taskAnalysisSchema = z.object({
    advice: z.string(),
    priority: prioritySchema.optional(),
    estimated_minutes: minutesSchema.optional(),
    thought_process: z.string().optional(),
    sub_tasks: z.array(subTaskSchema).optional(),
    youtube_resources: z.array(youtubeSchema).optional(),
    schedule_suggestion: scheduleSchema.optional(),
});

// Fields read one by one when the full shape does not match
const partialAnalysisSchema = z.object({
    advice: z.unknown(),
    priority: z.unknown(),
    estimated_minutes: z.unknown(),
    estimatedMinutes: z.unknown(),
    thought_process: z.unknown(),
    thoughtProcess: z.unknown(),
}).partial();

const brainDumpTaskSchema = z.object({
    title: z.string().trim().min(1),
    estimatedMinutes: minutesSchema.optional().catch(undefined),
    priority: prioritySchema.optional().catch(undefined),
    category: z.string().optional().catch(undefined),
    suggestion: z.string().nullish().catch(undefined),
    relatedPerson: z.string().nullish().catch(undefined),
    dueContext: z.string().nullish().catch(undefined),
});

const brainDumpSchema = z.object({
    tasks: z.array(z.unknown()).default([]),
    overall_mood: z.string().optional().catch(undefined),
    gentle_observation: z.string().optional().catch(undefined),
    detected_themes: z.array(z.string()).optional().catch(undefined),
});

// ============================================
// Parsers
// ============================================

function normalizePriority(value: string): Priority {
    const cleaned = value.trim().toLowerCase();
    if (cleaned === 'high') return 'high';
    if (cleaned === 'low') return 'low';
    return 'medium';
}

export function parsePriority(text: string): Priority {
    return normalizePriority(text);
}

/**
 * Digits only; anything unusable becomes the fallback estimate.
 */
export function parseEstimate(text: string): number {
    const digits = text.replace(/\D/g, '');
    const minutes = digits ? Number.parseInt(digits, 10) : NaN;
    if (!Number.isFinite(minutes) || minutes <= 0) return ESTIMATE_BOUNDS.fallbackMinutes;
    return clamp(minutes, ESTIMATE_BOUNDS.minMinutes, ESTIMATE_BOUNDS.maxMinutes);
}

export function parseTaskAnalysis(text: string): TaskAnalysis {
    const raw = tryParseJson(cleanJSONResponse(text));
    const full = taskAnalysisSchema.safeParse(raw);

    if (full.success) {
        const data = full.data;
        const subTasks: SubTask[] = (data.sub_tasks ?? []).map((step, index) => ({
            title: step.title,
            estimatedMinutes: step.estimated_minutes,
            order: index + 1,
            reasoning: step.reasoning,
            status: 'pending',
        }));

        return {
            advice: data.advice,
            priority: data.priority ?? 'medium',
            estimatedMinutes: data.estimated_minutes,
            thoughtProcess: data.thought_process,
            subTasks,
            youtubeResources: (data.youtube_resources ?? []).map((resource) => ({
                searchQuery: resource.search_query,
                relevanceScore: resource.relevance_score,
                reasoning: resource.reasoning,
            })),
            scheduleSuggestion: data.schedule_suggestion
                ? {
                      suggestedTimeOfDay: data.schedule_suggestion.suggested_time_of_day,
                      reasoning: data.schedule_suggestion.reasoning,
                      energyLevel: data.schedule_suggestion.energy_level,
                      optimalDuration: data.schedule_suggestion.optimal_duration,
                  }
                : undefined,
            isPartial: false,
        };
    }

    return parsePartialAnalysis(raw);
}

function parsePartialAnalysis(raw: unknown): TaskAnalysis {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw AIServiceError.parsingFailed();
    }
    const fields = partialAnalysisSchema.parse(raw);

    return {
        advice: typeof fields.advice === 'string' ? fields.advice : PARTIAL_ADVICE,
        priority: typeof fields.priority === 'string' ? normalizePriority(fields.priority) : 'medium',
        estimatedMinutes: firstInteger(fields.estimated_minutes, fields.estimatedMinutes),
        thoughtProcess: firstString(fields.thought_process, fields.thoughtProcess),
        subTasks: [],
        youtubeResources: [],
        isPartial: true,
    };
}

function firstInteger(...values: unknown[]): number | undefined {
    return values.find((value): value is number => typeof value === 'number' && Number.isInteger(value));
}

function firstString(...values: unknown[]): string | undefined {
    return values.find((value): value is string => typeof value === 'string');
}

/**
 * Parse the brain dump object. Items without a usable title are dropped;
 * each dueContext is resolved against `now`.
 */
export function parseBrainDump(text: string, now: Date = new Date()): BrainDumpResult {
    const parsed = brainDumpSchema.safeParse(tryParseJson(extractJsonObject(text)));
    if (!parsed.success) {
        throw AIServiceError.parsingFailed();
    }

    const tasks: BrainDumpTask[] = [];
    for (const item of parsed.data.tasks) {
        const result = brainDumpTaskSchema.safeParse(item);
        if (!result.success) continue;

        const task = result.data;
        const dueContext = task.dueContext && task.dueContext !== 'null' ? task.dueContext : undefined;
        const dueDate = dueContext ? parseDueContext(dueContext, now) : null;

        tasks.push({
            title: task.title,
            estimatedMinutes: task.estimatedMinutes ?? DEFAULT_BRAIN_DUMP_MINUTES,
            priority: task.priority ?? 'medium',
            category: task.category ?? 'other',
            suggestion: task.suggestion ?? undefined,
            relatedPerson: task.relatedPerson ?? undefined,
            dueContext,
            dueDate: dueDate ? getISOTimestamp(dueDate) : undefined,
        });
    }

    return {
        tasks,
        overallMood: parsed.data.overall_mood,
        gentleObservation: parsed.data.gentle_observation,
        detectedThemes: parsed.data.detected_themes ?? [],
    };
}
