// Veloce Claude Adapter
// Implements AIProvider using Anthropic's Claude API

import Anthropic from '@anthropic-ai/sdk';
import type { GenerateOptions } from './ai-provider';
import { CompletionAdapter, type AdapterOptions } from './completion-adapter';

const DEFAULT_MODEL = 'claude-3-5-haiku-20241022';
const DEFAULT_MAX_TOKENS = 2048;
const DEFAULT_TEMPERATURE = 0.7;

export class ClaudeAdapter extends CompletionAdapter {
    readonly name = 'claude';
    readonly displayName = 'Claude (Anthropic)';
    private client: Anthropic;

    constructor(apiKey: string, options: AdapterOptions = {}) {
        super(DEFAULT_MODEL, options);
        this.client = new Anthropic({ apiKey });
    }

    protected async generateCompletion(prompt: string, options: GenerateOptions): Promise<string> {
        const message = await this.client.messages.create({
            model: this.model,
            max_tokens: options.maxTokens ?? DEFAULT_MAX_TOKENS,
            temperature: options.temperature ?? DEFAULT_TEMPERATURE,
            messages: [{ role: 'user', content: prompt }],
        });

        const block = message.content[0];
        return block && block.type === 'text' ? block.text : '';
    }
}
