import { afterEach, describe, expect, it } from 'vitest';
import { loadConfig } from '../config/env';
import { defaultFeatureFlags, getFeatures, resetFeatures, setFeature } from '../config/features';
import { AIServiceError, PactError, ValidationError, httpStatusFor, toAIServiceError } from '../errors';

describe('loadConfig', () => {
    it('fills defaults from an empty environment', () => {
        const config = loadConfig({});

        expect(config.ai.provider).toBe('gemini');
        expect(config.ai.minRequestIntervalMs).toBe(500);
        expect(config.ai.chatResponseDelayMs).toBe(1500);
        expect(config.ai.claude).toEqual({ apiKey: undefined, model: 'claude-3-5-haiku-20241022' });
        expect(config.goals).toEqual({ dailyTasks: 5, weeklyTasks: 25 });
    });

    it('reads overrides and treats blank keys as missing', () => {
        const config = loadConfig({ AI_PROVIDER: 'openai', OPENAI_API_KEY: '', DAILY_TASK_GOAL: '3' });

        expect(config.ai.provider).toBe('openai');
        expect(config.ai.openai.apiKey).toBeUndefined();
        expect(config.goals.dailyTasks).toBe(3);
    });

    it('rejects an unknown provider', () => {
        expect(() => loadConfig({ AI_PROVIDER: 'other' })).toThrow(ValidationError);
    });
});

describe('feature flags', () => {
    afterEach(() => {
        resetFeatures();
    });

    it('starts from the defaults and takes overrides', () => {
        expect(getFeatures()).toEqual(defaultFeatureFlags);

        setFeature('gems', false);
        expect(getFeatures().gems).toBe(false);

        resetFeatures();
        expect(getFeatures().gems).toBe(true);
    });
});

describe('errors', () => {
    it('maps errors to HTTP statuses', () => {
        expect(httpStatusFor(new ValidationError([]))).toBe(400);
        expect(httpStatusFor(new PactError('notFound'))).toBe(404);
        expect(httpStatusFor(new PactError('notMember'))).toBe(409);
        expect(httpStatusFor(AIServiceError.notConfigured())).toBe(400);
        expect(httpStatusFor(AIServiceError.rateLimited())).toBe(429);
        expect(httpStatusFor(AIServiceError.emptyResponse())).toBe(500);
        expect(httpStatusFor(new Error('boom'))).toBe(500);
    });

    it('lists validation issues in the message', () => {
        const error = new ValidationError([
            { code: 'custom', path: ['task', 'title'], message: 'Required' },
            { code: 'custom', path: [], message: 'Bad body' },
        ]);
        expect(error.message).toBe('Invalid request: task.title: Required; Bad body');
    });

    it('normalizes SDK failures', () => {
        expect(toAIServiceError(Object.assign(new Error('slow down'), { status: 429 })).kind).toBe('rateLimited');
        expect(toAIServiceError(Object.assign(new Error(''), { status: 503 })).message).toBe('HTTP error: 503');
        expect(toAIServiceError(new TypeError('fetch failed')).kind).toBe('networkError');
        expect(toAIServiceError('odd').message).toBe('API error: odd');
    });
});
