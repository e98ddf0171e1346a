// Veloce Route Helpers
// Body parsing and error responses shared by the API routes

import { NextResponse, type NextRequest } from 'next/server';
import type { z } from 'zod';
import { ValidationError, httpStatusFor } from '../errors';
import { describeError, logger, type LogContext } from '../logger';

export async function parseBody<T extends z.ZodTypeAny>(request: NextRequest, schema: T): Promise<z.infer<T>> {
    let body: unknown;
    try {
        body = await request.json();
    } catch {
        throw new ValidationError([], 'Request body must be valid JSON');
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        throw new ValidationError(parsed.error.issues);
    }
    return parsed.data;
}

export function errorResponse(error: unknown, context: LogContext): NextResponse {
    const status = httpStatusFor(error);
    if (status >= 500) {
        logger.error('LOG.API_ERROR', { error: describeError(error), status }, context);
    } else {
        logger.warn('LOG.API_ERROR', { error: describeError(error), status }, context);
    }
    return NextResponse.json({ error: describeError(error) }, { status });
}

export function featureDisabled(feature: string): NextResponse {
    return NextResponse.json({ error: `${feature} is disabled` }, { status: 403 });
}
