// Veloce OpenAI Adapter
// Implements AIProvider using OpenAI's chat completions API

import OpenAI from 'openai';
import type { GenerateOptions } from './ai-provider';
import { CompletionAdapter, type AdapterOptions } from './completion-adapter';

const DEFAULT_MODEL = 'gpt-4o-mini';

export class OpenAIAdapter extends CompletionAdapter {
    readonly name = 'openai';
    readonly displayName = 'GPT (OpenAI)';
    private client: OpenAI;

    constructor(apiKey: string, options: AdapterOptions = {}) {
        super(DEFAULT_MODEL, options);
        this.client = new OpenAI({ apiKey });
    }

    protected async generateCompletion(prompt: string, options: GenerateOptions): Promise<string> {
        const response = await this.client.chat.completions.create({
            model: this.model,
            messages: [{ role: 'user', content: prompt }],
            temperature: options.temperature ?? 0.7,
            max_tokens: options.maxTokens ?? 2048,
        });

        return response.choices[0]?.message?.content ?? '';
    }
}
