// Veloce Completion Adapter
// Shared AIProvider behaviour for SDK-backed providers. Subclasses only
// implement generateCompletion(); prompting, throttling, parsing and
// error normalization live here.

import type { Priority } from '../constants';
import { AIServiceError, toAIServiceError } from '../errors';
import { describeError, logger, systemContext } from '../logger';
import type { AIProvider, BrainDumpResult, GenerateOptions, TaskAnalysis } from './ai-provider';
import { parseBrainDump, parseEstimate, parsePriority, parseTaskAnalysis } from './enforcement';
import {
    getAnalyzeTaskPrompt,
    getBrainDumpPrompt,
    getChatPrompt,
    getEstimatePrompt,
    getPriorityPrompt,
    withJsonInstruction,
    type ChatTurn,
    type PromptTask,
} from './prompts';
import { RequestThrottle } from './request-throttle';

export interface AdapterOptions {
    model?: string;
    minRequestIntervalMs?: number;
}

const JSON_GENERATION: GenerateOptions = { temperature: 0.3, maxTokens: 4096 };
const SHORT_ANSWER: GenerateOptions = { temperature: 0.3, maxTokens: 10 };
const BRAIN_DUMP: GenerateOptions = { temperature: 0.3, maxTokens: 2048 };
const CHAT: GenerateOptions = { temperature: 0.7, maxTokens: 1024 };

export abstract class CompletionAdapter implements AIProvider {
    abstract readonly name: string;
    abstract readonly displayName: string;
    protected readonly model: string;
    private readonly throttle: RequestThrottle;

    protected constructor(defaultModel: string, options: AdapterOptions = {}) {
        this.model = options.model ?? defaultModel;
        this.throttle = new RequestThrottle(options.minRequestIntervalMs);
    }

    /**
     * Raw text completion from the provider SDK.
     */
    protected abstract generateCompletion(prompt: string, options: GenerateOptions): Promise<string>;

    async analyzeTask(title: string, notes?: string, context?: string): Promise<TaskAnalysis> {
        const prompt = withJsonInstruction(getAnalyzeTaskPrompt(title, notes, context));
        const text = await this.generate('analyzeTask', prompt, JSON_GENERATION);
        const analysis = parseTaskAnalysis(text);

        if (analysis.isPartial) {
            logger.warn('LOG.AI_PARSE_PARTIAL', { provider: this.name, title }, systemContext('ai'));
        }
        return analysis;
    }

    async assessPriority(title: string): Promise<Priority> {
        return parsePriority(await this.generate('assessPriority', getPriorityPrompt(title), SHORT_ANSWER));
    }

    async estimateTime(title: string, context?: string): Promise<number> {
        return parseEstimate(await this.generate('estimateTime', getEstimatePrompt(title, context), SHORT_ANSWER));
    }

    async processBrainDump(text: string): Promise<BrainDumpResult> {
        return parseBrainDump(await this.generate('processBrainDump', getBrainDumpPrompt(text), BRAIN_DUMP));
    }

    async chat(task: PromptTask, history: ChatTurn[], message: string): Promise<string> {
        const reply = await this.generate('chat', getChatPrompt(task, history, message), CHAT);
        return reply.trim();
    }

    private async generate(action: string, prompt: string, options: GenerateOptions): Promise<string> {
        const context = systemContext('ai');
        await this.throttle.waitForSlot();

        logger.info('LOG.AI_REQUEST', { provider: this.name, model: this.model, action }, context);
        const startTime = Date.now();

        let text: string;
        try {
            text = await this.generateCompletion(prompt, options);
        } catch (error) {
            const normalized = toAIServiceError(error);
            logger.error('LOG.API_ERROR', {
                provider: this.name,
                action,
                kind: normalized.kind,
                error: describeError(error),
            }, context);
            throw normalized;
        }

        if (!text.trim()) {
            throw AIServiceError.emptyResponse();
        }

        logger.info('LOG.AI_RESPONSE', {
            provider: this.name,
            action,
            durationMs: Date.now() - startTime,
            length: text.length,
        }, context);
        return text;
    }
}
