// Veloce AI Manager
// Provider selection from request keys and environment configuration

import { getConfig, type ProviderName } from '../config/env';
import { getFeatures } from '../config/features';
import { logger, systemContext } from '../logger';
import type { AIProvider } from './ai-provider';
import { manualProvider } from './ai-provider';
import { ClaudeAdapter } from './claude-adapter';
import { GeminiAdapter } from './gemini-adapter';
import { OpenAIAdapter } from './openai-adapter';

export type { ProviderName };

/**
 * Cloud providers that require API keys
 */
export const CLOUD_PROVIDERS: ReadonlyArray<Exclude<ProviderName, 'manual'>> = ['gemini', 'claude', 'openai'];

export function isProviderName(value: string): value is ProviderName {
    return value === 'manual' || CLOUD_PROVIDERS.some((provider) => provider === value);
}

/**
 * Build a provider. A request-supplied key wins over the environment;
 * with neither (or AI breakdown switched off) the manual heuristics answer.
 */
export function createProvider(providerName: ProviderName, apiKey?: string): AIProvider {
    if (providerName === 'manual' || !getFeatures().aiBreakdown) return manualProvider;

    const { ai } = getConfig();
    const settings = ai[providerName];
    const key = apiKey || settings.apiKey;

    if (!key) {
        logger.warn('LOG.AI_FALLBACK', { provider: providerName, reason: 'missing API key' }, systemContext('ai'));
        return manualProvider;
    }

    const options = { model: settings.model, minRequestIntervalMs: ai.minRequestIntervalMs };
    switch (providerName) {
        case 'gemini':
            return new GeminiAdapter(key, options);
        case 'claude':
            return new ClaudeAdapter(key, options);
        case 'openai':
            return new OpenAIAdapter(key, options);
    }
}
