// Veloce Journal Entries

import { startOfDay } from 'date-fns';
import type { JournalEntryType, JournalMood } from '../constants';
import type { JournalEntry } from '../schema';
import { countWords, generateId, getISOTimestamp } from '../utils';

export interface NewJournalEntryInput {
    type?: JournalEntryType;
    text: string;
    mood?: JournalMood;
    date?: Date;
}

export function createJournalEntry(input: NewJournalEntryInput, now: Date = new Date()): JournalEntry {
    const timestamp = getISOTimestamp(now);
    return {
        id: generateId(),
        type: input.type ?? 'reflection',
        text: input.text,
        mood: input.mood,
        themes: [],
        wordCount: countWords(input.text),
        date: getISOTimestamp(startOfDay(input.date ?? now)),
        createdAt: timestamp,
        updatedAt: timestamp,
    };
}
