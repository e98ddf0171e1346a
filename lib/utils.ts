import { format, parseISO } from 'date-fns';

/**
 * Returns the date in YYYY-MM-DD format based on local time.
 */
export function getLocalDateString(date: Date = new Date()): string {
    return format(date, 'yyyy-MM-dd');
}

/**
 * Parses a YYYY-MM-DD string into a Date object in local time (midnight).
 * new Date("YYYY-MM-DD") would read it as UTC.
 */
export function parseLocalDate(dateStr: string): Date {
    const [year, month, day] = dateStr.split('-').map(Number);
    return new Date(year, month - 1, day);
}

export function toDate(value: string | Date): Date {
    return typeof value === 'string' ? parseISO(value) : value;
}

export function getISOTimestamp(date: Date = new Date()): string {
    return date.toISOString();
}

export function generateId(): string {
    return `${Date.now().toString(36)}-${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Compact duration label used across tasks, focus records and prompts.
 * Examples: "45m", "2h", "1h 30m"
 */
export function formatDuration(minutes: number): string {
    if (minutes >= 60) {
        const hours = Math.floor(minutes / 60);
        const mins = minutes % 60;
        return mins > 0 ? `${hours}h ${mins}m` : `${hours}h`;
    }
    return `${minutes}m`;
}

/** "MM:SS" countdown display */
export function formatClock(totalSeconds: number): string {
    const safe = Math.max(0, totalSeconds);
    const minutes = Math.floor(safe / 60);
    const seconds = safe % 60;
    return `${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

export function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}

export function countWords(text: string): number {
    const trimmed = text.trim();
    return trimmed ? trimmed.split(/\s+/).length : 0;
}
