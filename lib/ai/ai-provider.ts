// Veloce AI Provider Interface
// Pluggable adapter system for Gemini, Claude, and OpenAI

import nlp from 'compromise';
import { TASK_TYPES, type Priority } from '../constants';
import type { SubTask } from '../schema';
import { classifyTaskType, fallbackSubTasks, patternInsights } from '../tasks/classifier';
import type { ChatTurn, PromptTask } from './prompts';

export interface YouTubeResource {
    searchQuery: string;
    relevanceScore?: number;
    reasoning?: string;
}

export interface ScheduleSuggestion {
    suggestedTimeOfDay?: string;
    reasoning?: string;
    energyLevel?: string;
    optimalDuration?: number;
}

/**
 * Structured analysis of a single task.
 * `isPartial` marks a reply that was salvaged from malformed JSON.
 */
export interface TaskAnalysis {
    advice: string;
    priority: Priority;
    estimatedMinutes?: number;
    thoughtProcess?: string;
    subTasks: SubTask[];
    youtubeResources: YouTubeResource[];
    scheduleSuggestion?: ScheduleSuggestion;
    isPartial: boolean;
}

export interface BrainDumpTask {
    title: string;
    estimatedMinutes: number;
    priority: Priority;
    category: string;
    suggestion?: string;
    relatedPerson?: string;
    dueContext?: string;
    dueDate?: string; // Resolved from dueContext
}

export interface BrainDumpResult {
    tasks: BrainDumpTask[];
    overallMood?: string;
    gentleObservation?: string;
    detectedThemes: string[];
}

export interface GenerateOptions {
    temperature?: number;
    maxTokens?: number;
}

/**
 * Provider-agnostic AI interface
 */
export interface AIProvider {
    readonly name: string;
    readonly displayName: string;

    analyzeTask(title: string, notes?: string, context?: string): Promise<TaskAnalysis>;

    /** One-word priority; anything unexpected reads as medium */
    assessPriority(title: string): Promise<Priority>;

    /** Minutes, clamped to 5-480 */
    estimateTime(title: string, context?: string): Promise<number>;

    processBrainDump(text: string): Promise<BrainDumpResult>;

    chat(task: PromptTask, history: ChatTurn[], message: string): Promise<string>;
}

export function defaultChatReply(taskTitle: string): string {
    return `Based on your task '${taskTitle}', I'd suggest starting with the smallest possible action. Would you like me to break this down further?`;
}

const URGENCY_CUES = ['asap', 'urgent', 'deadline', 'must', 'need to'];

/**
 * Fallback provider when no AI is available.
 * Answers from the offline keyword heuristics.
 */
export class ManualProvider implements AIProvider {
    readonly name = 'manual';
    readonly displayName = 'Continue Manually';

    async analyzeTask(title: string): Promise<TaskAnalysis> {
        const { subTasks, thoughtProcess } = fallbackSubTasks(title);
        const estimatedMinutes = subTasks.reduce((sum, step) => sum + (step.estimatedMinutes ?? 0), 0);
        const insights = patternInsights(title, estimatedMinutes, subTasks.length);

        return {
            advice: subTasks[0] ? `Start with "${subTasks[0].title}" and keep the first step small.` : '',
            priority: await this.assessPriority(title),
            estimatedMinutes,
            thoughtProcess: [thoughtProcess, ...insights].join('\n'),
            subTasks,
            youtubeResources: [],
            isPartial: false,
        };
    }

    async assessPriority(title: string): Promise<Priority> {
        const lower = title.toLowerCase();
        return URGENCY_CUES.some((cue) => lower.includes(cue)) ? 'high' : 'medium';
    }

    async estimateTime(title: string): Promise<number> {
        return TASK_TYPES[classifyTaskType(title)].suggestedDuration;
    }

    async processBrainDump(text: string): Promise<BrainDumpResult> {
        const sentences: unknown = nlp(text).sentences().out('array');
        const lines = Array.isArray(sentences)
            ? sentences.filter((line): line is string => typeof line === 'string')
            : [];

        const tasks: BrainDumpTask[] = [];
        for (const line of lines) {
            const title = line.trim().replace(/[.!?]+$/, '');
            if (!title) continue;
            const taskType = classifyTaskType(title);
            tasks.push({
                title,
                estimatedMinutes: TASK_TYPES[taskType].suggestedDuration,
                priority: await this.assessPriority(title),
                category: 'other',
            });
        }

        return { tasks, detectedThemes: [] };
    }

    async chat(task: PromptTask): Promise<string> {
        return defaultChatReply(task.title);
    }
}

export const manualProvider = new ManualProvider();
