export interface LogContext {
    traceId: string;
    phase: string;
    taskId?: string;
    pactId?: string;
    timestamp?: string; // Auto-generated if not provided
}

export type LogEvent =
    | 'LOG.AI_REQUEST'
    | 'LOG.AI_RESPONSE'
    | 'LOG.AI_FALLBACK'
    | 'LOG.AI_PARSE_PARTIAL'
    | 'LOG.PROMPT_GENERATED'
    | 'LOG.TASK_COMPLETION'
    | 'LOG.TASK_RECURRENCE'
    | 'LOG.FOCUS_SESSION_START'
    | 'LOG.FOCUS_SESSION_COMPLETE'
    | 'LOG.FOCUS_BLOCKING_UNAVAILABLE'
    | 'LOG.BREAK_COMPLETE'
    | 'LOG.MICRO_CHALLENGE_COMPLETE'
    | 'LOG.ACHIEVEMENT_UNLOCKED'
    | 'LOG.GEM_EARNED'
    | 'LOG.LEVEL_UP'
    | 'LOG.STREAK_RESET'
    | 'LOG.PACT_CREATED'
    | 'LOG.PACT_STATUS_CHANGE'
    | 'LOG.PACT_PROGRESS'
    | 'LOG.PACT_DAILY_RESET'
    | 'LOG.JOURNAL_ANALYSIS'
    | 'LOG.CHAT_FALLBACK'
    | 'LOG.DATA_EXPORT'
    | 'LOG.DATA_IMPORT'
    | 'LOG.API_ERROR';

type LogPayload = Record<string, unknown>;

function write(
    sink: (line: string) => void,
    level: 'WARN' | 'ERROR' | undefined,
    event: LogEvent,
    payload: LogPayload,
    context: LogContext
): void {
    const logEntry = {
        ...(level ? { level } : {}),
        event,
        ...context,
        timestamp: context.timestamp || new Date().toISOString(),
        payload,
    };
    sink(JSON.stringify(logEntry));
}

export const logger = {
    info: (event: LogEvent, payload: LogPayload, context: LogContext) => {
        write((line) => console.log(line), undefined, event, payload, context);
    },

    warn: (event: LogEvent, payload: LogPayload, context: LogContext) => {
        write((line) => console.warn(line), 'WARN', event, payload, context);
    },

    error: (event: LogEvent, payload: LogPayload, context: LogContext) => {
        write((line) => console.error(line), 'ERROR', event, payload, context);
    },
};

export function generateTraceId(): string {
    return Math.random().toString(36).substring(2, 15) + Math.random().toString(36).substring(2, 15);
}

/**
 * Shorthand for modules that log without a caller-supplied trace.
 */
export function systemContext(phase: string, extra: Omit<LogContext, 'traceId' | 'phase'> = {}): LogContext {
    return { traceId: generateTraceId(), phase, ...extra };
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
