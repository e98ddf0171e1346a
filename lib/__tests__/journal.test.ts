import { describe, expect, it } from 'vitest';
import { dailyPrompt, promptCategory } from '../journal/daily-prompt';
import { createJournalEntry } from '../journal/entries';
import {
    analyzePatterns,
    analyzeSentiment,
    detectThemes,
    extractTasks,
    processEntry,
    suggestMood,
    summarize,
    type PatternEntry,
} from '../journal/journal-ai';

const friday = new Date(2026, 2, 6, 20, 0);

describe('dailyPrompt', () => {
    it('picks the category from the weekday', () => {
        expect(promptCategory(new Date(2026, 2, 8))).toBe('reflection');
        expect(promptCategory(new Date(2026, 2, 9))).toBe('goals');
        expect(promptCategory(new Date(2026, 2, 12))).toBe('gratitude');
    });

    it('picks the prompt from the day of the year', () => {
        expect(dailyPrompt(new Date(2026, 2, 9))).toEqual({
            category: 'goals',
            prompt: 'What obstacle is standing between you and your goal? How might you overcome it?',
        });
        expect(dailyPrompt(new Date(2026, 2, 8))).toEqual({
            category: 'reflection',
            prompt: "What's something you're proud of accomplishing recently?",
        });
    });
});

describe('analyzeSentiment', () => {
    it('scores positive writing', () => {
        const sentiment = analyzeSentiment('I feel happy and grateful today');
        expect(sentiment).toEqual({ score: 1, label: 'positive', confidence: 1 });
        expect(suggestMood(sentiment)).toBe('excellent');
    });

    it('flips words that follow a negator', () => {
        const sentiment = analyzeSentiment('I am not happy and feel tired');
        expect(sentiment).toEqual({ score: -1, label: 'negative', confidence: 1 });
        expect(suggestMood(sentiment)).toBe('stressed');
    });

    it('balances mixed writing to neutral', () => {
        expect(analyzeSentiment('Today was good but I was tired')).toEqual({ score: 0, label: 'neutral', confidence: 1 });
    });

    it('treats empty text as neutral with no confidence', () => {
        expect(analyzeSentiment('')).toEqual({ score: 0, label: 'neutral', confidence: 0 });
    });

    it('maps milder scores to milder moods', () => {
        expect(suggestMood({ score: 0.5, label: 'positive', confidence: 0.5 })).toBe('good');
        expect(suggestMood({ score: -0.4, label: 'negative', confidence: 0.4 })).toBe('low');
        expect(suggestMood({ score: 0, label: 'neutral', confidence: 1 })).toBe('neutral');
    });
});

describe('detectThemes', () => {
    it('lists emotional themes first', () => {
        expect(detectThemes('I am grateful for my family and worried about work').slice(0, 2)).toEqual([
            'gratitude',
            'connection',
        ]);
    });

    it('keeps at most five themes', () => {
        const themes = detectThemes('I learn, feel grateful, worry, am happy, think, love my friend, achieve success and struggle');
        expect(themes).toEqual(['growth', 'gratitude', 'anxiety', 'joy', 'reflection']);
    });

    it('returns nothing for blank text', () => {
        expect(detectThemes('   ')).toEqual([]);
    });
});

describe('summarize', () => {
    it('keeps the first two sentences', () => {
        expect(summarize('First thought. Second thought. Third thought.')).toBe('First thought. Second thought.');
    });

    it('ends the summary with a period', () => {
        expect(summarize('No punctuation here')).toBe('No punctuation here.');
    });
});

describe('extractTasks', () => {
    it('turns obligations into task titles', () => {
        expect(extractTasks('I need to call the bank. The weather was nice. Remember to buy milk!')).toEqual([
            'Call the bank',
            'Buy milk',
        ]);
    });
});

describe('analyzePatterns', () => {
    const entry = (day: number, mood: PatternEntry['mood'], themes: string[], wordCount: number): PatternEntry => ({
        mood,
        themes,
        wordCount,
        date: new Date(2026, 2, day).toISOString(),
    });

    it('summarizes mood, themes, streak and length', () => {
        const result = analyzePatterns([
            entry(3, 'good', ['growth', 'joy'], 100),
            entry(4, 'good', ['growth'], 200),
            entry(5, 'low', ['work'], 300),
            entry(6, undefined, ['joy', 'growth'], 400),
        ], friday);

        expect(result).toEqual({
            dominantMood: 'good',
            frequentThemes: ['growth', 'joy', 'work'],
            writingStreak: 4,
            averageWordCount: 250,
            insights: [
                'Your dominant mood recently has been good.',
                'Common themes in your writing: growth, joy, work.',
                "You've been journaling for 4 days in a row!",
                'Your entries are thoughtful and detailed, averaging 250 words.',
            ],
        });
    });

    it('breaks mood ties by first appearance', () => {
        const result = analyzePatterns([entry(5, 'low', [], 10), entry(6, 'good', [], 10)], friday);
        expect(result.dominantMood).toBe('low');
        expect(result.insights).toEqual(['Your dominant mood recently has been low.']);
    });

    it('handles an empty history', () => {
        expect(analyzePatterns([], friday)).toEqual({
            dominantMood: null,
            frequentThemes: [],
            writingStreak: 0,
            averageWordCount: 0,
            insights: [],
        });
    });
});

describe('processEntry', () => {
    it('fills derived fields and keeps a chosen mood', () => {
        const entry = createJournalEntry({ text: 'I feel happy and grateful today', mood: 'low' }, friday);
        const processed = processEntry(entry, friday);

        expect(processed.mood).toBe('low');
        expect(processed.sentiment).toBe(1);
        expect(processed.wordCount).toBe(6);
        expect(processed.themes[0]).toBe('gratitude');
        expect(processed.summary).toBeUndefined();
    });

    it('suggests a mood and summarizes long entries', () => {
        const text = 'Today I felt calm and proud. '.repeat(8).trim();
        const processed = processEntry(createJournalEntry({ text }, friday), friday);

        expect(processed.mood).toBe('excellent');
        expect(processed.summary).toBe('Today I felt calm and proud. Today I felt calm and proud.');
    });

    it('dates entries at the start of their day', () => {
        const entry = createJournalEntry({ text: 'Short' }, friday);
        expect(entry.date).toBe(new Date(2026, 2, 6).toISOString());
        expect(entry.type).toBe('reflection');
    });
});
