// Veloce OpenAI API Route
// Server-side proxy for OpenAI calls

import type { NextRequest } from 'next/server';
import { handleAIRequest } from '@/lib/ai/route-handler';

export async function POST(request: NextRequest) {
    return handleAIRequest(request, 'openai');
}
