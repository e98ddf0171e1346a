// Veloce Pomodoro Timer
// Focus/break state machine. Host integrations (app blocking, notifications)
// are injected; the 1s tick can be driven externally or via attach().

import { getFeatures } from '../config/features';
import { POMODORO_DEFAULTS } from '../constants';
import { describeError, logger, systemContext } from '../logger';
import { formatClock, generateId } from '../utils';

export type PomodoroState = 'idle' | 'running' | 'paused' | 'breakTime' | 'completed';

export interface PomodoroConfig {
    focusMinutes: number;
    shortBreakMinutes: number;
    longBreakMinutes: number;
    sessionsUntilLongBreak: number;
}

export interface PomodoroSession {
    id: string;
    taskId?: string;
    taskTitle: string;
    totalSeconds: number;
    remainingSeconds: number;
    state: PomodoroState;
    startedAt: string;
    pausedAt?: string;
    sessionsCompleted: number;
}

export interface PomodoroSnapshot {
    session: PomodoroSession;
    isAppBlockingEnabled: boolean;
    isDeepFocus: boolean;
    lastTickAt: string;
}

export interface AppBlocker {
    readonly isAuthorized: boolean;
    readonly hasSelection: boolean;
    readonly isBlocking: boolean;
    startBlocking(name: string, durationSeconds: number, isDeepFocus: boolean): Promise<void>;
    stopBlocking(): Promise<void>;
}

export interface FocusNotifier {
    schedule(id: string, title: string, body: string, afterSeconds: number): void;
    cancel(id: string): void;
    send(title: string, body: string): void;
}

export interface StartSessionOptions {
    taskId?: string;
    taskTitle: string;
    durationMinutes?: number;
    enableAppBlocking?: boolean;
    isDeepFocus?: boolean;
}

export const COMPLETION_TITLE = 'Focus Session Complete!';

export const noopBlocker: AppBlocker = {
    isAuthorized: false,
    hasSelection: false,
    isBlocking: false,
    async startBlocking() {},
    async stopBlocking() {},
};

export const noopNotifier: FocusNotifier = {
    schedule() {},
    cancel() {},
    send() {},
};

export interface PomodoroTimerDeps {
    config?: Partial<PomodoroConfig>;
    blocker?: AppBlocker;
    notifier?: FocusNotifier;
    onComplete?: (session: PomodoroSession) => void;
    now?: () => Date;
}

export class PomodoroTimer {
    readonly config: PomodoroConfig;
    private session: PomodoroSession | null = null;
    private appBlockingEnabled = false;
    private deepFocus = false;
    private lastTickAt: Date | null = null;
    private interval: ReturnType<typeof setInterval> | null = null;

    private readonly blocker: AppBlocker;
    private readonly notifier: FocusNotifier;
    private readonly onComplete?: (session: PomodoroSession) => void;
    private readonly now: () => Date;

    constructor(deps: PomodoroTimerDeps = {}) {
        this.config = { ...POMODORO_DEFAULTS, ...deps.config };
        this.blocker = deps.blocker ?? noopBlocker;
        this.notifier = deps.notifier ?? noopNotifier;
        this.onComplete = deps.onComplete;
        this.now = deps.now ?? (() => new Date());
    }

    // ============================================
    // Read-only state
    // ============================================

    get currentSession(): PomodoroSession | null {
        return this.session;
    }

    get state(): PomodoroState {
        return this.session?.state ?? 'idle';
    }

    get isRunning(): boolean {
        return this.state === 'running' || this.state === 'breakTime';
    }

    get isAppBlockingEnabled(): boolean {
        return this.appBlockingEnabled;
    }

    get isDeepFocus(): boolean {
        return this.deepFocus;
    }

    get progress(): number {
        if (!this.session || this.session.totalSeconds === 0) return 0;
        return 1 - this.session.remainingSeconds / this.session.totalSeconds;
    }

    get formattedTime(): string {
        return formatClock(this.session?.remainingSeconds ?? 0);
    }

    /** Deep Focus with an active block cannot be stopped early */
    get canStopSession(): boolean {
        if (this.deepFocus && this.appBlockingEnabled) {
            return !this.blocker.isBlocking;
        }
        return true;
    }

    // ============================================
    // Transitions
    // ============================================

    async startSession(options: StartSessionOptions): Promise<PomodoroSession> {
        // Replacing a session drops its pending notification and block
        if (this.session) this.notifier.cancel(this.notificationId());
        if (this.appBlockingEnabled) {
            this.appBlockingEnabled = false;
            await this.blocker.stopBlocking();
        }

        const totalSeconds = (options.durationMinutes ?? this.config.focusMinutes) * 60;
        const session: PomodoroSession = {
            id: generateId(),
            taskId: options.taskId,
            taskTitle: options.taskTitle,
            totalSeconds,
            remainingSeconds: totalSeconds,
            state: 'running',
            startedAt: this.now().toISOString(),
            sessionsCompleted: this.session?.sessionsCompleted ?? 0,
        };

        this.session = session;
        this.lastTickAt = this.now();
        this.deepFocus = options.isDeepFocus ?? false;
        this.appBlockingEnabled = (options.enableAppBlocking ?? false) && getFeatures().appBlocking;

        const context = systemContext('focus', { taskId: options.taskId });
        if (this.appBlockingEnabled) {
            await this.startAppBlocking(session);
        }

        this.scheduleCompletionNotification();
        logger.info('LOG.FOCUS_SESSION_START', {
            sessionId: session.id,
            totalSeconds,
            isDeepFocus: this.deepFocus,
            appBlocking: this.appBlockingEnabled,
        }, context);

        return session;
    }

    private async startAppBlocking(session: PomodoroSession): Promise<void> {
        const context = systemContext('focus', { taskId: session.taskId });

        if (!this.blocker.isAuthorized || !this.blocker.hasSelection) {
            this.appBlockingEnabled = false;
            logger.warn('LOG.FOCUS_BLOCKING_UNAVAILABLE', {
                authorized: this.blocker.isAuthorized,
                hasSelection: this.blocker.hasSelection,
            }, context);
            return;
        }

        try {
            await this.blocker.startBlocking(`Pomodoro: ${session.taskTitle}`, session.totalSeconds, this.deepFocus);
        } catch (error) {
            this.appBlockingEnabled = false;
            logger.error('LOG.FOCUS_BLOCKING_UNAVAILABLE', { error: describeError(error) }, context);
        }
    }

    pause(): void {
        if (!this.session || this.session.state !== 'running') return;
        this.session = { ...this.session, state: 'paused', pausedAt: this.now().toISOString() };
        this.notifier.cancel(this.notificationId());
    }

    resume(): void {
        if (!this.session || this.session.state !== 'paused') return;
        this.session = { ...this.session, state: 'running', pausedAt: undefined };
        this.lastTickAt = this.now();
        this.scheduleCompletionNotification();
    }

    async stop(): Promise<void> {
        if (this.session) this.notifier.cancel(this.notificationId());
        this.session = null;
        this.lastTickAt = null;
        this.deepFocus = false;
        if (this.appBlockingEnabled) {
            this.appBlockingEnabled = false;
            await this.blocker.stopBlocking();
        }
    }

    startBreak(): void {
        if (!this.session) return;
        const isLongBreak = (this.session.sessionsCompleted + 1) % this.config.sessionsUntilLongBreak === 0;
        const breakSeconds = (isLongBreak ? this.config.longBreakMinutes : this.config.shortBreakMinutes) * 60;

        this.session = {
            ...this.session,
            state: 'breakTime',
            totalSeconds: breakSeconds,
            remainingSeconds: breakSeconds,
        };
        this.lastTickAt = this.now();
    }

    skipBreak(): void {
        if (!this.session || this.session.state !== 'breakTime') return;
        this.session = {
            ...this.session,
            state: 'idle',
            sessionsCompleted: this.session.sessionsCompleted + 1,
        };
    }

    // ============================================
    // Ticking
    // ============================================

    /** Advance one second. Completes the phase when it reaches zero. */
    async tick(): Promise<void> {
        if (!this.session || !this.isRunning) return;

        const remainingSeconds = Math.max(0, this.session.remainingSeconds - 1);
        this.session = { ...this.session, remainingSeconds };
        this.lastTickAt = this.now();

        if (remainingSeconds === 0) {
            await this.complete();
        }
    }

    private async complete(): Promise<void> {
        if (!this.session) return;
        const context = systemContext('focus', { taskId: this.session.taskId });

        if (this.session.state === 'running') {
            this.session = {
                ...this.session,
                state: 'completed',
                sessionsCompleted: this.session.sessionsCompleted + 1,
            };
            if (this.appBlockingEnabled) {
                this.appBlockingEnabled = false;
                await this.blocker.stopBlocking();
            }
            this.notifier.send(COMPLETION_TITLE, completionSummary(this.session));
            logger.info('LOG.FOCUS_SESSION_COMPLETE', {
                sessionId: this.session.id,
                totalSeconds: this.session.totalSeconds,
                sessionsCompleted: this.session.sessionsCompleted,
            }, context);
            this.onComplete?.(this.session);
        } else if (this.session.state === 'breakTime') {
            this.session = { ...this.session, state: 'idle' };
            logger.info('LOG.BREAK_COMPLETE', { sessionId: this.session.id }, context);
        }
    }

    attach(): void {
        if (this.interval) return;
        this.interval = setInterval(() => {
            this.tick().catch((error: unknown) => {
                logger.error('LOG.API_ERROR', { error: describeError(error) }, systemContext('focus'));
            });
        }, 1000);
    }

    detach(): void {
        if (this.interval) {
            clearInterval(this.interval);
            this.interval = null;
        }
    }

    // ============================================
    // Persistence
    // ============================================

    snapshot(): PomodoroSnapshot | null {
        if (!this.session) return null;
        return {
            session: { ...this.session },
            isAppBlockingEnabled: this.appBlockingEnabled,
            isDeepFocus: this.deepFocus,
            lastTickAt: (this.lastTickAt ?? this.now()).toISOString(),
        };
    }

    /**
     * Rehydrate a saved session. Wall time since the last tick is
     * subtracted from running sessions, completing them if overdue.
     */
    async restore(snapshot: PomodoroSnapshot): Promise<void> {
        const now = this.now();
        let session = { ...snapshot.session };

        this.appBlockingEnabled = snapshot.isAppBlockingEnabled;
        this.deepFocus = snapshot.isDeepFocus;

        if (session.state === 'running' || session.state === 'breakTime') {
            const elapsed = Math.floor((now.getTime() - new Date(snapshot.lastTickAt).getTime()) / 1000);
            session = { ...session, remainingSeconds: Math.max(0, session.remainingSeconds - Math.max(0, elapsed)) };
        }

        this.session = session;
        this.lastTickAt = now;

        if (this.isRunning && session.remainingSeconds === 0) {
            await this.complete();
        }
    }

    private notificationId(): string {
        return `pomodoro_complete_${this.session?.id ?? ''}`;
    }

    private scheduleCompletionNotification(): void {
        if (!this.session) return;
        this.notifier.schedule(
            this.notificationId(),
            COMPLETION_TITLE,
            `Great work on "${this.session.taskTitle}". Time for a break?`,
            this.session.remainingSeconds
        );
    }
}

export function completionSummary(session: Pick<PomodoroSession, 'totalSeconds' | 'taskTitle'>): string {
    return `You completed a ${Math.floor(session.totalSeconds / 60)} minute focus session on "${session.taskTitle}"`;
}
