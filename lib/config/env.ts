// Veloce Runtime Configuration
// Environment variables parsed once into a typed config

import { z } from 'zod';
import { ValidationError } from '../errors';

const providerSchema = z.enum(['gemini', 'claude', 'openai', 'manual']);

const intFromEnv = (fallback: number) =>
    z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
    GEMINI_API_KEY: z.string().optional(),
    GEMINI_MODEL: z.string().default('gemini-2.0-flash-lite'),
    ANTHROPIC_API_KEY: z.string().optional(),
    CLAUDE_MODEL: z.string().default('claude-3-5-haiku-20241022'),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_MODEL: z.string().default('gpt-4o-mini'),
    AI_PROVIDER: providerSchema.default('gemini'),
    AI_MIN_REQUEST_INTERVAL_MS: intFromEnv(500),
    CHAT_RESPONSE_DELAY_MS: intFromEnv(1500),
    DAILY_TASK_GOAL: z.coerce.number().int().positive().default(5),
    WEEKLY_TASK_GOAL: z.coerce.number().int().positive().default(25),
});

export type ProviderName = z.infer<typeof providerSchema>;

export interface AppConfig {
    ai: {
        provider: ProviderName;
        minRequestIntervalMs: number;
        chatResponseDelayMs: number;
        gemini: { apiKey?: string; model: string };
        claude: { apiKey?: string; model: string };
        openai: { apiKey?: string; model: string };
    };
    goals: {
        dailyTasks: number;
        weeklyTasks: number;
    };
}

let cached: AppConfig | null = null;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new ValidationError(parsed.error.issues, 'Invalid environment configuration');
    }
    const e = parsed.data;
    return {
        ai: {
            provider: e.AI_PROVIDER,
            minRequestIntervalMs: e.AI_MIN_REQUEST_INTERVAL_MS,
            chatResponseDelayMs: e.CHAT_RESPONSE_DELAY_MS,
            gemini: { apiKey: e.GEMINI_API_KEY || undefined, model: e.GEMINI_MODEL },
            claude: { apiKey: e.ANTHROPIC_API_KEY || undefined, model: e.CLAUDE_MODEL },
            openai: { apiKey: e.OPENAI_API_KEY || undefined, model: e.OPENAI_MODEL },
        },
        goals: {
            dailyTasks: e.DAILY_TASK_GOAL,
            weeklyTasks: e.WEEKLY_TASK_GOAL,
        },
    };
}

export function getConfig(): AppConfig {
    if (!cached) cached = loadConfig();
    return cached;
}

// Tests swap env between cases
export function resetConfigCache(): void {
    cached = null;
}
