import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { resetFeatures, setFeature } from '../config/features';
import {
    calculateFocusStatistics,
    cancelRecord,
    completeRecord,
    createFocusRecord,
    createPresetBlockList,
    dayStreaks,
    formatRecordDuration,
    formatRecurringDays,
    markBlockListUsed,
    nextScheduledOccurrence,
} from '../focus/focus-records';
import { MicroChallenge } from '../focus/micro-challenge';
import { COMPLETION_TITLE, PomodoroTimer, type AppBlocker, type PomodoroSnapshot } from '../focus/pomodoro-timer';
import type { FocusSessionRecord, ScheduledFocusSession } from '../schema';

// Friday, 6 March 2026
const friday = new Date(2026, 2, 6, 10, 0);

function fakeBlocker(overrides: Partial<Pick<AppBlocker, 'isAuthorized' | 'hasSelection' | 'isBlocking'>> = {}) {
    return {
        isAuthorized: true,
        hasSelection: true,
        isBlocking: false,
        startBlocking: vi.fn(async () => undefined),
        stopBlocking: vi.fn(async () => undefined),
        ...overrides,
    };
}

function fakeNotifier() {
    return { schedule: vi.fn(), cancel: vi.fn(), send: vi.fn() };
}

async function tickTimes(timer: PomodoroTimer, count: number): Promise<void> {
    for (let i = 0; i < count; i++) {
        await timer.tick();
    }
}

beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    resetFeatures();
});

afterEach(() => {
    vi.restoreAllMocks();
    resetFeatures();
});

describe('PomodoroTimer', () => {
    it('starts with the default focus length', async () => {
        const timer = new PomodoroTimer({ now: () => friday });
        await timer.startSession({ taskTitle: 'Write' });

        expect(timer.state).toBe('running');
        expect(timer.formattedTime).toBe('25:00');
        expect(timer.progress).toBe(0);
    });

    it('blocks apps and completes when the countdown reaches zero', async () => {
        const blocker = fakeBlocker();
        const notifier = fakeNotifier();
        const onComplete = vi.fn();
        const timer = new PomodoroTimer({ blocker, notifier, onComplete, now: () => friday });

        await timer.startSession({ taskTitle: 'Write', durationMinutes: 1, enableAppBlocking: true });
        expect(timer.isAppBlockingEnabled).toBe(true);
        expect(blocker.startBlocking).toHaveBeenCalledWith('Pomodoro: Write', 60, false);

        await tickTimes(timer, 59);
        expect(timer.formattedTime).toBe('00:01');

        await timer.tick();
        expect(timer.state).toBe('completed');
        expect(timer.currentSession?.sessionsCompleted).toBe(1);
        expect(blocker.stopBlocking).toHaveBeenCalledTimes(1);
        expect(notifier.send).toHaveBeenCalledWith(COMPLETION_TITLE, 'You completed a 1 minute focus session on "Write"');
        expect(onComplete).toHaveBeenCalledTimes(1);
    });

    it('skips blocking when the blocker is not authorized', async () => {
        const blocker = fakeBlocker({ isAuthorized: false });
        const timer = new PomodoroTimer({ blocker, now: () => friday });

        await timer.startSession({ taskTitle: 'Write', enableAppBlocking: true });

        expect(timer.isAppBlockingEnabled).toBe(false);
        expect(blocker.startBlocking).not.toHaveBeenCalled();
    });

    it('skips blocking when the feature is off', async () => {
        setFeature('appBlocking', false);
        const blocker = fakeBlocker();
        const timer = new PomodoroTimer({ blocker, now: () => friday });

        await timer.startSession({ taskTitle: 'Write', enableAppBlocking: true });

        expect(timer.isAppBlockingEnabled).toBe(false);
        expect(blocker.startBlocking).not.toHaveBeenCalled();
    });

    it('does not count down while paused', async () => {
        const notifier = fakeNotifier();
        const timer = new PomodoroTimer({ notifier, now: () => friday });
        await timer.startSession({ taskTitle: 'Write', durationMinutes: 1 });

        timer.pause();
        await tickTimes(timer, 5);
        expect(timer.formattedTime).toBe('01:00');
        expect(notifier.cancel).toHaveBeenCalledTimes(1);

        timer.resume();
        await timer.tick();
        expect(timer.formattedTime).toBe('00:59');
    });

    it('locks deep focus sessions while apps are blocked', async () => {
        const blocker = fakeBlocker({ isBlocking: true });
        const timer = new PomodoroTimer({ blocker, now: () => friday });

        await timer.startSession({ taskTitle: 'Write', enableAppBlocking: true, isDeepFocus: true });

        expect(timer.canStopSession).toBe(false);
    });

    it('stops blocking when stopped early', async () => {
        const blocker = fakeBlocker();
        const timer = new PomodoroTimer({ blocker, now: () => friday });
        await timer.startSession({ taskTitle: 'Write', enableAppBlocking: true });

        await timer.stop();

        expect(timer.state).toBe('idle');
        expect(blocker.stopBlocking).toHaveBeenCalledTimes(1);
    });

    it('releases the previous session when a new one starts', async () => {
        const blocker = fakeBlocker();
        const notifier = fakeNotifier();
        const timer = new PomodoroTimer({ blocker, notifier, now: () => friday });

        const first = await timer.startSession({ taskTitle: 'Write', enableAppBlocking: true });
        const second = await timer.startSession({ taskTitle: 'Read' });

        expect(notifier.cancel).toHaveBeenCalledWith(`pomodoro_complete_${first.id}`);
        expect(blocker.stopBlocking).toHaveBeenCalledTimes(1);
        expect(timer.isAppBlockingEnabled).toBe(false);
        expect(timer.currentSession?.id).toBe(second.id);
        expect(notifier.schedule).toHaveBeenLastCalledWith(
            `pomodoro_complete_${second.id}`,
            COMPLETION_TITLE,
            'Great work on "Read". Time for a break?',
            1500
        );
    });

    it('alternates short and long breaks', async () => {
        const timer = new PomodoroTimer({ config: { sessionsUntilLongBreak: 2 }, now: () => friday });
        await timer.startSession({ taskTitle: 'Write', durationMinutes: 1 });
        await tickTimes(timer, 60);

        timer.startBreak();
        expect(timer.state).toBe('breakTime');
        expect(timer.currentSession?.totalSeconds).toBe(900);

        timer.skipBreak();
        expect(timer.state).toBe('idle');
    });

    it('ends a break when it runs out', async () => {
        const timer = new PomodoroTimer({ now: () => friday });
        await timer.startSession({ taskTitle: 'Write', durationMinutes: 1 });
        await tickTimes(timer, 60);

        timer.startBreak();
        expect(timer.currentSession?.totalSeconds).toBe(300);
        await tickTimes(timer, 300);
        expect(timer.state).toBe('idle');
    });

    it('subtracts elapsed wall time on restore', async () => {
        const timer = new PomodoroTimer({ now: () => friday });
        const snapshot: PomodoroSnapshot = {
            session: {
                id: 'session-1',
                taskTitle: 'Write',
                totalSeconds: 1500,
                remainingSeconds: 100,
                state: 'running',
                startedAt: new Date(2026, 2, 6, 9, 37).toISOString(),
                sessionsCompleted: 0,
            },
            isAppBlockingEnabled: false,
            isDeepFocus: false,
            lastTickAt: new Date(2026, 2, 6, 9, 59, 30).toISOString(),
        };

        await timer.restore(snapshot);
        expect(timer.currentSession?.remainingSeconds).toBe(70);

        const overdue = new PomodoroTimer({ now: () => friday });
        await overdue.restore({ ...snapshot, session: { ...snapshot.session, remainingSeconds: 10 } });
        expect(overdue.state).toBe('completed');
    });
});

describe('MicroChallenge', () => {
    beforeEach(() => {
        vi.useFakeTimers();
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('counts down the final seconds and completes', () => {
        const onCountdownTick = vi.fn();
        const onComplete = vi.fn();
        const challenge = new MicroChallenge({ onCountdownTick, onComplete });

        challenge.start();
        vi.advanceTimersByTime(27_000);
        expect(onCountdownTick.mock.calls).toEqual([[3]]);
        expect(challenge.isCompleted).toBe(false);

        vi.advanceTimersByTime(3_000);
        expect(onCountdownTick.mock.calls).toEqual([[3], [2], [1]]);
        expect(onComplete).toHaveBeenCalledTimes(1);
        expect(challenge.isCompleted).toBe(true);
        expect(challenge.isActive).toBe(false);
    });

    it('resets the countdown on cancel', () => {
        const challenge = new MicroChallenge({ seconds: 10 });
        challenge.start();
        vi.advanceTimersByTime(4_000);
        expect(challenge.countdown).toBe(6);

        challenge.cancel();
        vi.advanceTimersByTime(10_000);
        expect(challenge.countdown).toBe(10);
        expect(challenge.isCompleted).toBe(false);
    });
});

describe('focus records', () => {
    const schedule = (overrides: Partial<ScheduledFocusSession>): ScheduledFocusSession => ({
        id: 'schedule-1',
        title: 'Morning focus',
        startHour: 9,
        startMinute: 0,
        duration: 1500,
        isRecurring: true,
        recurringDays: [1],
        isEnabled: true,
        isDeepFocus: false,
        createdAt: friday.toISOString(),
        updatedAt: friday.toISOString(),
        ...overrides,
    });

    it('labels recurring days', () => {
        expect(formatRecurringDays([5, 1, 2, 3, 4])).toBe('Weekdays');
        expect(formatRecurringDays([6, 0])).toBe('Weekends');
        expect(formatRecurringDays([3, 1])).toBe('Mon, Wed');
        expect(formatRecurringDays([])).toBe('No days selected');
    });

    it('finds the next scheduled start', () => {
        expect(nextScheduledOccurrence(schedule({}), friday)).toEqual(new Date(2026, 2, 9, 9, 0));
        expect(nextScheduledOccurrence(schedule({ recurringDays: [5] }), friday)).toEqual(new Date(2026, 2, 13, 9, 0));
        expect(nextScheduledOccurrence(schedule({ isEnabled: false }), friday)).toBeNull();
    });

    it('handles one-time schedules', () => {
        const later = new Date(2026, 2, 6, 14, 0).toISOString();
        const earlier = new Date(2026, 2, 6, 8, 0).toISOString();
        expect(nextScheduledOccurrence(schedule({ isRecurring: false, startTime: later }), friday)).toEqual(new Date(2026, 2, 6, 14, 0));
        expect(nextScheduledOccurrence(schedule({ isRecurring: false, startTime: earlier }), friday)).toBeNull();
    });

    it('records the actual duration on completion and cancel', () => {
        const record = createFocusRecord({ title: 'Write', scheduledDuration: 1500 }, new Date(2026, 2, 6, 10, 0));

        const done = completeRecord(record, 0, new Date(2026, 2, 6, 10, 25));
        expect(done.actualDuration).toBe(1500);
        expect(done.wasCompleted).toBe(true);
        expect(formatRecordDuration(done)).toBe('25m');

        const canceled = cancelRecord(record, new Date(2026, 2, 6, 10, 5));
        expect(canceled.actualDuration).toBe(300);
        expect(canceled.wasCanceled).toBe(true);
    });

    it('creates preset block lists and counts their use', () => {
        const list = createPresetBlockList('deepWork', friday);
        expect(list.isAllowList).toBe(true);
        expect(list.colorHex).toBe('#14CC8C');

        const used = markBlockListUsed(list, friday);
        expect(used.useCount).toBe(1);
        expect(used.lastUsedAt).toBe(friday.toISOString());
    });

    it('computes statistics over completed sessions', () => {
        const session = (start: Date, seconds: number, extra: Partial<FocusSessionRecord> = {}): FocusSessionRecord => ({
            ...createFocusRecord({ title: 'Focus', scheduledDuration: seconds }, start),
            actualDuration: seconds,
            wasCompleted: true,
            ...extra,
        });

        const stats = calculateFocusStatistics([
            session(new Date(2026, 2, 5, 9, 0), 1500),
            session(new Date(2026, 2, 6, 9, 0), 3000, { isDeepFocus: true }),
            session(new Date(2026, 2, 6, 11, 0), 600, { wasCompleted: false, wasCanceled: true }),
        ], new Date(2026, 2, 6, 18, 0));

        expect(stats).toEqual({
            totalSessionsCompleted: 2,
            totalMinutesFocused: 75,
            deepFocusSessionsCompleted: 1,
            averageSessionDuration: 37,
            currentStreak: 2,
            longestStreak: 2,
            sessionsToday: 1,
            minutesToday: 50,
            longestSessionMinutes: 50,
        });
    });

    it('drops the current streak after a missed day', () => {
        const days = [new Date(2026, 2, 1), new Date(2026, 2, 2), new Date(2026, 2, 4)];
        expect(dayStreaks(days, friday)).toEqual({ current: 0, longest: 2 });
        expect(dayStreaks(days, new Date(2026, 2, 5))).toEqual({ current: 1, longest: 2 });
    });
});
