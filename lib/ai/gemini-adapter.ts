// Veloce Gemini Adapter
// Implements AIProvider using Google's Gemini API

import { GoogleGenerativeAI } from '@google/generative-ai';
import type { GenerateOptions } from './ai-provider';
import { CompletionAdapter, type AdapterOptions } from './completion-adapter';

const DEFAULT_MODEL = 'gemini-2.0-flash-lite';

export class GeminiAdapter extends CompletionAdapter {
    readonly name = 'gemini';
    readonly displayName = 'Gemini (Google)';
    private genAI: GoogleGenerativeAI;

    constructor(apiKey: string, options: AdapterOptions = {}) {
        super(DEFAULT_MODEL, options);
        this.genAI = new GoogleGenerativeAI(apiKey);
    }

    protected async generateCompletion(prompt: string, options: GenerateOptions): Promise<string> {
        const model = this.genAI.getGenerativeModel({
            model: this.model,
            generationConfig: {
                temperature: options.temperature ?? 0.7,
                maxOutputTokens: options.maxTokens ?? 2048,
            },
        });

        const result = await model.generateContent(prompt);
        return result.response.text();
    }
}
