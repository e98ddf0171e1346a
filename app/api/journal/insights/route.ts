// Veloce Journal Insights Route
// { text } analyzes one entry; { entries } looks for patterns across many

import { NextResponse, type NextRequest } from 'next/server';
import { z } from 'zod';
import { errorResponse, featureDisabled, parseBody } from '@/lib/api/http';
import { getFeatures } from '@/lib/config/features';
import { dailyPrompt } from '@/lib/journal/daily-prompt';
import {
    analyzePatterns,
    analyzeSentiment,
    detectThemes,
    extractTasks,
    suggestMood,
    summarize,
} from '@/lib/journal/journal-ai';
import { logger, systemContext } from '@/lib/logger';

const insightsSchema = z.union([
    z.object({ text: z.string().min(1) }),
    z.object({
        entries: z.array(z.object({
            mood: z.enum(['excellent', 'good', 'neutral', 'low', 'stressed']).optional(),
            themes: z.array(z.string()).default([]),
            wordCount: z.number().int().nonnegative(),
            date: z.string().datetime({ offset: true }),
        })),
    }),
]);

export async function GET() {
    return NextResponse.json({ result: dailyPrompt() });
}

export async function POST(request: NextRequest) {
    const context = systemContext('journal');
    if (!getFeatures().journalInsights) return featureDisabled('Journal insights');

    try {
        const body = await parseBody(request, insightsSchema);

        if ('text' in body) {
            const sentiment = analyzeSentiment(body.text);
            const result = {
                sentiment,
                mood: suggestMood(sentiment),
                themes: detectThemes(body.text),
                summary: summarize(body.text),
                tasks: extractTasks(body.text),
            };
            logger.info('LOG.JOURNAL_ANALYSIS', { label: sentiment.label, themes: result.themes.length }, context);
            return NextResponse.json({ result });
        }

        const result = analyzePatterns(body.entries);
        logger.info('LOG.JOURNAL_ANALYSIS', { entries: body.entries.length, streak: result.writingStreak }, context);
        return NextResponse.json({ result });
    } catch (error) {
        return errorResponse(error, context);
    }
}
