// Veloce Journal Insights
// Offline analysis of journal text: sentiment, mood, themes, summaries,
// cross-entry patterns and task extraction.

import nlp from 'compromise';
import { z } from 'zod';
import lexiconData from '../../data/sentiment-lexicon.json';
import { JOURNAL_MOODS } from '../constants';
import type { JournalMood } from '../constants';
import { dayStreaks } from '../focus/focus-records';
import type { JournalEntry } from '../schema';
import { countWords, getISOTimestamp, toDate } from '../utils';

const lexiconSchema = z.object({
    positive: z.array(z.string()),
    negative: z.array(z.string()),
    negators: z.array(z.string()),
});

const lexicon = lexiconSchema.parse(lexiconData);
const POSITIVE = new Set(lexicon.positive);
const NEGATIVE = new Set(lexicon.negative);
const NEGATORS = new Set(lexicon.negators);

// ============================================
// compromise helpers
// ============================================

function asStrings(value: unknown): string[] {
    return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function normalizeTerm(term: string): string {
    return term.toLowerCase().replace(/[^a-z']/g, '');
}

function terms(text: string): string[] {
    return asStrings(nlp(text).terms().out('array')).map(normalizeTerm).filter(Boolean);
}

function taggedTerms(text: string, tag: '#Noun' | '#Verb'): string[] {
    return asStrings(nlp(text).match(tag).terms().out('array')).map(normalizeTerm).filter(Boolean);
}

function sentences(text: string): string[] {
    return asStrings(nlp(text).sentences().out('array'))
        .map((sentence) => sentence.trim())
        .filter(Boolean);
}

// ============================================
// Sentiment
// ============================================

export type SentimentLabel = 'positive' | 'negative' | 'neutral';

export interface SentimentResult {
    score: number; // -1..1
    label: SentimentLabel;
    confidence: number;
}

export function analyzeSentiment(text: string): SentimentResult {
    const words = terms(text);
    if (words.length === 0) {
        return { score: 0, label: 'neutral', confidence: 0 };
    }

    let positive = 0;
    let negative = 0;
    words.forEach((word, index) => {
        let polarity = POSITIVE.has(word) ? 1 : NEGATIVE.has(word) ? -1 : 0;
        if (polarity === 0) return;

        const window = words.slice(Math.max(0, index - 2), index);
        if (window.some((previous) => NEGATORS.has(previous))) polarity = -polarity;

        if (polarity > 0) positive++;
        else negative++;
    });

    const score = (positive - negative) / Math.max(1, positive + negative);

    if (score > 0.3) return { score, label: 'positive', confidence: Math.min(score, 1) };
    if (score < -0.3) return { score, label: 'negative', confidence: Math.min(Math.abs(score), 1) };
    return { score, label: 'neutral', confidence: 1 - Math.abs(score) };
}

export function suggestMood(sentiment: SentimentResult): JournalMood {
    switch (sentiment.label) {
        case 'positive':
            return sentiment.score > 0.6 ? 'excellent' : 'good';
        case 'negative':
            return sentiment.score < -0.6 ? 'stressed' : 'low';
        case 'neutral':
            return 'neutral';
    }
}

// ============================================
// Themes
// ============================================

const EMOTION_KEYWORDS: ReadonlyArray<[string, string[]]> = [
    ['growth', ['learn', 'improve', 'progress', 'develop', 'grow', 'better']],
    ['gratitude', ['thankful', 'grateful', 'appreciate', 'blessed', 'fortune']],
    ['anxiety', ['worry', 'anxious', 'nervous', 'stress', 'overwhelm']],
    ['joy', ['happy', 'joy', 'excited', 'wonderful', 'amazing', 'great']],
    ['reflection', ['think', 'reflect', 'consider', 'realize', 'understand']],
    ['connection', ['friend', 'family', 'love', 'together', 'relationship']],
    ['achievement', ['accomplish', 'achieve', 'success', 'complete', 'finish']],
    ['challenge', ['difficult', 'hard', 'struggle', 'challenge', 'tough']],
];

const COMMON_WORDS = new Set([
    'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for',
    'of', 'with', 'by', 'from', 'as', 'is', 'was', 'are', 'were', 'been',
    'be', 'have', 'has', 'had', 'do', 'does', 'did', 'will', 'would',
    'could', 'should', 'may', 'might', 'must', 'shall', 'can', 'need',
    'this', 'that', 'these', 'those', 'i', 'you', 'he', 'she', 'it',
    'we', 'they', 'what', 'which', 'who', 'when', 'where', 'why', 'how',
    'all', 'each', 'every', 'both', 'few', 'more', 'most', 'other',
    'some', 'such', 'no', 'not', 'only', 'own', 'same', 'so', 'than',
    'too', 'very', 'just', 'also', 'now', 'here', 'there', 'then',
]);

const SIGNIFICANT_VERBS = new Set([
    'achieve', 'accomplish', 'learn', 'grow', 'improve', 'create',
    'build', 'develop', 'overcome', 'succeed', 'fail', 'struggle',
    'feel', 'think', 'believe', 'hope', 'dream', 'imagine',
    'love', 'hate', 'fear', 'worry', 'celebrate', 'appreciate',
]);

export const MAX_THEMES = 5;

function emotionalThemes(text: string): string[] {
    const lower = text.toLowerCase();
    return EMOTION_KEYWORDS
        .filter(([, keywords]) => keywords.some((keyword) => lower.includes(keyword)))
        .map(([theme]) => theme);
}

function isContentWord(word: string): boolean {
    return word.length > 3 && !COMMON_WORDS.has(word);
}

/**
 * Emotional themes in keyword-map order, then significant verbs, then
 * the three most frequent nouns. Capped at five.
 */
export function detectThemes(text: string): string[] {
    if (!text.trim()) return [];

    const verbs = taggedTerms(text, '#Verb').filter((word) => isContentWord(word) && SIGNIFICANT_VERBS.has(word));

    const nounCounts = new Map<string, number>();
    for (const noun of taggedTerms(text, '#Noun').filter(isContentWord)) {
        nounCounts.set(noun, (nounCounts.get(noun) ?? 0) + 1);
    }
    const topNouns = Array.from(nounCounts.entries())
        .sort((a, b) => b[1] - a[1])
        .slice(0, 3)
        .map(([noun]) => noun);

    const themes = new Set([...emotionalThemes(text), ...verbs, ...topNouns]);
    return Array.from(themes).slice(0, MAX_THEMES);
}

// ============================================
// Summary
// ============================================

export function summarize(text: string, maxSentences = 2): string {
    if (!text.trim()) return '';

    let parts = sentences(text);
    if (parts.length === 0) {
        parts = text.split('. ').map((part) => part.trim()).filter(Boolean);
    }

    const summary = parts.slice(0, maxSentences).join(' ');
    return /[.!?]$/.test(summary) ? summary : `${summary}.`;
}

// ============================================
// Task extraction
// ============================================

const TASK_CUES = ['need to', 'have to', 'should', 'must', 'remember to', "don't forget"];

/**
 * Sentences that read like an obligation become task titles: the words
 * after the cue, capitalized, without trailing punctuation.
 */
export function extractTasks(text: string): string[] {
    const titles: string[] = [];
    for (const sentence of sentences(text)) {
        const lower = sentence.toLowerCase();
        const cue = TASK_CUES.find((candidate) => lower.includes(candidate));
        if (!cue) continue;

        const rest = sentence.slice(lower.indexOf(cue) + cue.length).trim();
        const raw = (rest || sentence).replace(/^to\s+/i, '').replace(/[.!?]+$/, '').trim();
        if (!raw) continue;
        titles.push(raw.charAt(0).toUpperCase() + raw.slice(1));
    }
    return titles;
}

// ============================================
// Patterns across entries
// ============================================

export interface PatternAnalysis {
    dominantMood: JournalMood | null;
    frequentThemes: string[];
    writingStreak: number;
    averageWordCount: number;
    insights: string[];
}

/** Highest count wins; ties go to whichever appeared first */
function rankByFrequency<T>(items: T[]): T[] {
    const counts = new Map<T, number>();
    for (const item of items) {
        counts.set(item, (counts.get(item) ?? 0) + 1);
    }
    return Array.from(counts.entries())
        .sort((a, b) => b[1] - a[1])
        .map(([item]) => item);
}

export type PatternEntry = Pick<JournalEntry, 'mood' | 'themes' | 'wordCount' | 'date'>;

export function analyzePatterns(entries: PatternEntry[], now: Date = new Date()): PatternAnalysis {
    if (entries.length === 0) {
        return { dominantMood: null, frequentThemes: [], writingStreak: 0, averageWordCount: 0, insights: [] };
    }

    const moods = entries.flatMap((entry) => (entry.mood ? [entry.mood] : []));
    const dominantMood = rankByFrequency(moods)[0] ?? null;
    const frequentThemes = rankByFrequency(entries.flatMap((entry) => entry.themes)).slice(0, 5);
    const writingStreak = dayStreaks(entries.map((entry) => toDate(entry.date)), now).current;

    const totalWords = entries.reduce((sum, entry) => sum + entry.wordCount, 0);
    const averageWordCount = Math.floor(totalWords / entries.length);

    const insights: string[] = [];
    if (dominantMood) {
        insights.push(`Your dominant mood recently has been ${JOURNAL_MOODS[dominantMood].displayName.toLowerCase()}.`);
    }
    if (frequentThemes.length > 0) {
        insights.push(`Common themes in your writing: ${frequentThemes.slice(0, 3).join(', ')}.`);
    }
    if (writingStreak > 3) {
        insights.push(`You've been journaling for ${writingStreak} days in a row!`);
    }
    if (averageWordCount > 200) {
        insights.push(`Your entries are thoughtful and detailed, averaging ${averageWordCount} words.`);
    }

    return { dominantMood, frequentThemes, writingStreak, averageWordCount, insights };
}

// ============================================
// Entry processing
// ============================================

export const SUMMARY_MIN_LENGTH = 200;

/** Fills the derived fields; a mood the writer chose is kept */
export function processEntry(entry: JournalEntry, now: Date = new Date()): JournalEntry {
    const text = entry.text.trim();
    if (!text) return { ...entry, wordCount: 0 };

    const sentiment = analyzeSentiment(text);
    return {
        ...entry,
        sentiment: sentiment.score,
        mood: entry.mood ?? suggestMood(sentiment),
        themes: detectThemes(text),
        summary: text.length > SUMMARY_MIN_LENGTH ? summarize(text) : entry.summary,
        wordCount: countWords(text),
        updatedAt: getISOTimestamp(now),
    };
}
