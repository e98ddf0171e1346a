import { describe, expect, it } from 'vitest';
import {
    assessComplexity,
    classifyTaskType,
    contextQuestions,
    detectTaskCategory,
    fallbackSubTasks,
    parseDueContext,
    patternInsights,
    recommendWorkMode,
} from '../tasks/classifier';

const friday = new Date(2026, 2, 6, 10, 0);

describe('detectTaskCategory', () => {
    it('matches the first rule that applies', () => {
        expect(detectTaskCategory('Fix login bug')).toBe('Problem-solving');
        expect(detectTaskCategory('Write REPORT')).toBe('Documentation');
        expect(detectTaskCategory('Lunch')).toBe('General');
    });
});

describe('classifyTaskType', () => {
    it('classifies by keyword', () => {
        expect(classifyTaskType('Draft proposal')).toBe('create');
        expect(classifyTaskType('Reply to email')).toBe('communicate');
        expect(classifyTaskType('Study for exam')).toBe('consume');
        expect(classifyTaskType('Renew passport')).toBe('coordinate');
    });
});

describe('assessComplexity', () => {
    it('grows with title length and step count', () => {
        expect(assessComplexity('a b c', 0)).toBe('Low');
        expect(assessComplexity('one two three four five', 0)).toBe('Medium');
        expect(assessComplexity('x', 6)).toBe('High');
    });
});

describe('fallbackSubTasks', () => {
    it('breaks a report into five ordered steps', () => {
        const { subTasks, thoughtProcess } = fallbackSubTasks('Quarterly report');

        expect(subTasks.map((step) => step.title)).toEqual([
            'Research and gather data',
            'Create outline/structure',
            'Write main content',
            'Add visuals/formatting',
            'Review and polish',
        ]);
        expect(subTasks.map((step) => step.order)).toEqual([1, 2, 3, 4, 5]);
        expect(subTasks[0].reasoning).toBe('Start with data collection to inform content');
        expect(subTasks[2].reasoning).toBeUndefined();
        expect(subTasks.reduce((sum, step) => sum + step.estimatedMinutes, 0)).toBe(75);
        expect(thoughtProcess.startsWith('Recognized this as a document creation task.')).toBe(true);
    });

    it('uses the general breakdown for unknown tasks', () => {
        const { subTasks } = fallbackSubTasks('Organize garage');
        expect(subTasks).toHaveLength(4);
        expect(subTasks.every((step) => step.status === 'pending')).toBe(true);
    });
});

describe('patternInsights', () => {
    it('describes a meeting breakdown', () => {
        expect(patternInsights('Team meeting', 55, 4)).toEqual([
            'Recognized as a "communication" task type',
            'Allocated 55min across 4 logical steps',
            'Optimal breakdown: 3-7 steps for focused execution',
            'Ordered steps by logical dependency and flow',
        ]);
    });

    it('skips the allocation line without an estimate', () => {
        expect(patternInsights('Organize garage', undefined, 2)).toEqual([
            'Analyzed task keywords and structure',
            'Ordered steps by logical dependency and flow',
        ]);
    });
});

describe('contextQuestions', () => {
    it('asks about the audience for documents', () => {
        expect(contextQuestions('Budget document')).toEqual(['Who is the audience for this?', "What's the deadline?"]);
    });

    it('falls back to three generic questions', () => {
        expect(contextQuestions('Organize garage')).toHaveLength(3);
    });
});

describe('parseDueContext', () => {
    it('resolves relative days', () => {
        expect(parseDueContext('today', friday)).toEqual(friday);
        expect(parseDueContext('by tomorrow', friday)).toEqual(new Date(2026, 2, 7, 10, 0));
        expect(parseDueContext('next week', friday)).toEqual(new Date(2026, 2, 13, 10, 0));
    });

    it('resolves weekdays to the start of that day', () => {
        expect(parseDueContext('Monday', friday)).toEqual(new Date(2026, 2, 9));
    });

    it('returns null when nothing matches', () => {
        expect(parseDueContext('whenever', friday)).toBeNull();
    });
});

describe('recommendWorkMode', () => {
    it('recommends deep work for creative tasks', () => {
        expect(recommendWorkMode('create').mode).toBe('deepWork');
        expect(recommendWorkMode('coordinate').mode).toBe('pomodoro');
    });
});
