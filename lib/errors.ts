// Veloce Error Types
// Typed failures shared by services and route handlers

import type { ZodIssue } from 'zod';

// ============================================
// AI Service
// ============================================

export type AIServiceErrorKind =
    | 'notConfigured'
    | 'invalidURL'
    | 'networkError'
    | 'httpError'
    | 'apiError'
    | 'emptyResponse'
    | 'parsingFailed'
    | 'rateLimited';

export class AIServiceError extends Error {
    readonly kind: AIServiceErrorKind;
    readonly status?: number;

    private constructor(kind: AIServiceErrorKind, message: string, status?: number) {
        super(message);
        this.name = 'AIServiceError';
        this.kind = kind;
        this.status = status;
    }

    static notConfigured(): AIServiceError {
        return new AIServiceError('notConfigured', 'AI service is not configured. Please add your API key.');
    }

    static invalidURL(): AIServiceError {
        return new AIServiceError('invalidURL', 'Invalid API URL');
    }

    static networkError(detail: string): AIServiceError {
        return new AIServiceError('networkError', `Network error: ${detail}`);
    }

    static httpError(code: number): AIServiceError {
        return new AIServiceError('httpError', `HTTP error: ${code}`, code);
    }

    static apiError(detail: string): AIServiceError {
        return new AIServiceError('apiError', `API error: ${detail}`);
    }

    static emptyResponse(): AIServiceError {
        return new AIServiceError('emptyResponse', 'Empty response from AI');
    }

    static parsingFailed(): AIServiceError {
        return new AIServiceError('parsingFailed', 'Failed to parse AI response');
    }

    static rateLimited(): AIServiceError {
        return new AIServiceError('rateLimited', 'Rate limited. Please try again in a moment.', 429);
    }
}

/**
 * Normalize whatever an SDK threw into an AIServiceError.
 * SDK errors carrying an HTTP status keep it (429 becomes rateLimited).
 */
export function toAIServiceError(error: unknown): AIServiceError {
    if (error instanceof AIServiceError) return error;

    const status = readStatus(error);
    if (status === 429) return AIServiceError.rateLimited();

    const message = error instanceof Error ? error.message : String(error);
    if (status !== undefined && !message) return AIServiceError.httpError(status);
    if (error instanceof TypeError && /fetch/i.test(message)) {
        return AIServiceError.networkError(message);
    }
    return AIServiceError.apiError(message || 'Unknown API error');
}

function readStatus(error: unknown): number | undefined {
    if (typeof error !== 'object' || error === null || !('status' in error)) return undefined;
    const { status } = error;
    return typeof status === 'number' ? status : undefined;
}

// ============================================
// Pacts
// ============================================

export type PactErrorKind =
    | 'notFound'
    | 'notActive'
    | 'notMember'
    | 'notPartner'
    | 'notInitiator'
    | 'invalidState'
    | 'alreadyExists';

const PACT_ERROR_MESSAGES: Record<PactErrorKind, string> = {
    notFound: 'Pact not found',
    notActive: 'Pact is not active',
    notMember: 'User is not a member of this pact',
    notPartner: 'Only the invited partner can respond to this pact',
    notInitiator: 'Only the initiator can cancel this pact',
    invalidState: 'Pact is not pending',
    alreadyExists: 'You already have a pact with this person',
};

export class PactError extends Error {
    readonly kind: PactErrorKind;

    constructor(kind: PactErrorKind) {
        super(PACT_ERROR_MESSAGES[kind]);
        this.name = 'PactError';
        this.kind = kind;
    }
}

// ============================================
// Validation
// ============================================

export class ValidationError extends Error {
    readonly issues: ZodIssue[];

    constructor(issues: ZodIssue[], message = 'Invalid request') {
        super(issues.length > 0 ? `${message}: ${formatIssues(issues)}` : message);
        this.name = 'ValidationError';
        this.issues = issues;
    }
}

export function formatIssues(issues: ZodIssue[]): string {
    return issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

// ============================================
// HTTP mapping
// ============================================

export function httpStatusFor(error: unknown): number {
    if (error instanceof ValidationError) return 400;
    if (error instanceof PactError) return error.kind === 'notFound' ? 404 : 409;
    if (error instanceof AIServiceError) {
        if (error.kind === 'notConfigured') return 400;
        if (error.kind === 'rateLimited') return 429;
        return 500;
    }
    return 500;
}
