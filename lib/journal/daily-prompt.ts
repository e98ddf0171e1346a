// Veloce Daily Journal Prompt
// One prompt per day: the weekday picks a category, the day of year picks the prompt

import { getDay, getDayOfYear } from 'date-fns';
import { z } from 'zod';
import promptData from '../../data/journal-prompts.json';

export const PROMPT_CATEGORIES = ['reflection', 'gratitude', 'goals', 'emotional', 'creative'] as const;

export type PromptCategory = typeof PROMPT_CATEGORIES[number];

const promptList = z.array(z.string().min(1)).min(1);

const promptsSchema = z.object({
    reflection: promptList,
    gratitude: promptList,
    goals: promptList,
    emotional: promptList,
    creative: promptList,
});

export const JOURNAL_PROMPTS: Record<PromptCategory, string[]> = promptsSchema.parse(promptData);

// Indexed by getDay(): Sunday first
const CATEGORY_BY_WEEKDAY: readonly PromptCategory[] = [
    'reflection',
    'goals',
    'emotional',
    'creative',
    'gratitude',
    'reflection',
    'creative',
];

export function promptCategory(date: Date = new Date()): PromptCategory {
    return CATEGORY_BY_WEEKDAY[getDay(date)] ?? 'reflection';
}

export function dailyPrompt(date: Date = new Date()): { category: PromptCategory; prompt: string } {
    const category = promptCategory(date);
    const prompts = JOURNAL_PROMPTS[category];
    return { category, prompt: prompts[getDayOfYear(date) % prompts.length] };
}
