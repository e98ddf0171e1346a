import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { resetFeatures, setFeature } from '../config/features';
import { achievementProgress, ACHIEVEMENTS, getAchievement, isAchievementType } from '../gamification/achievements';
import { flameIntensity } from '../gamification/flame';
import {
    acknowledgeAchievement,
    createInitialStats,
    recordFocusSession,
    recordPactEvents,
    recordTaskCompletion,
    resetDaily,
    unlockAchievement,
} from '../gamification/gamification-service';
import { evaluateGems, gemInfo, gemProgress } from '../gamification/gems';
import {
    calculateTaskPoints,
    levelForPoints,
    levelProgress,
    pointsForLevel,
    pointsToNextLevel,
    streakMultiplier,
} from '../gamification/points';
import type { UserStats } from '../schema';
import { createTask } from '../tasks/task-model';

// Friday, 6 March 2026
const friday = new Date(2026, 2, 6, 10, 0);

beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    resetFeatures();
});

afterEach(() => {
    vi.restoreAllMocks();
    resetFeatures();
});

describe('points', () => {
    it('caps the streak multiplier at 2x', () => {
        expect(streakMultiplier(0)).toBe(1);
        expect(streakMultiplier(5)).toBe(1.5);
        expect(streakMultiplier(20)).toBe(2);
    });

    it('adds priority, stars, punctuality and duration', () => {
        const input = { priority: 'high' as const, stars: 3, completedOnTime: true, estimatedMinutes: 45 };
        expect(calculateTaskPoints({ ...input, streak: 0 })).toBe(49);
        expect(calculateTaskPoints({ ...input, streak: 5 })).toBe(71);
        expect(calculateTaskPoints({ ...input, streak: 20 })).toBe(94);
    });

    it('follows the level curve', () => {
        expect(pointsForLevel(1)).toBe(0);
        expect(pointsForLevel(2)).toBe(141);
        expect(pointsForLevel(3)).toBe(259);
        expect(pointsForLevel(5)).toBe(559);
        expect(pointsForLevel(10)).toBe(1581);
    });

    it('derives the level from points', () => {
        expect(levelForPoints(0)).toBe(1);
        expect(levelForPoints(140)).toBe(1);
        expect(levelForPoints(141)).toBe(2);
        expect(levelForPoints(259)).toBe(3);
    });

    it('measures progress toward the next level', () => {
        expect(levelProgress(200)).toBe(0.5);
        expect(pointsToNextLevel(200)).toBe(59);
    });
});

describe('flameIntensity', () => {
    it('grows with the streak', () => {
        expect(flameIntensity(0)).toBe('none');
        expect(flameIntensity(2)).toBe('spark');
        expect(flameIntensity(3)).toBe('small');
        expect(flameIntensity(13)).toBe('medium');
        expect(flameIntensity(14)).toBe('large');
        expect(flameIntensity(30)).toBe('inferno');
    });
});

describe('achievement catalog', () => {
    it('loads every achievement', () => {
        expect(ACHIEVEMENTS).toHaveLength(39);
        expect(getAchievement('thousandTasks').threshold).toBe(1000);
        expect(getAchievement('firstTask').title).toBe('Getting Started');
    });

    it('recognizes achievement names', () => {
        expect(isAchievementType('nightOwl')).toBe(true);
        expect(isAchievementType('nope')).toBe(false);
    });

    it('reports progress against thresholds', () => {
        const stats: UserStats = { ...createInitialStats({ dailyGoal: 2 }), totalTasksCompleted: 5 };
        expect(achievementProgress('tenTasks', stats)).toBe(0.5);
        expect(achievementProgress('aiExplorer', stats)).toBe(0);
        expect(achievementProgress('aiExplorer', { ...stats, unlockedAchievements: ['aiExplorer'] })).toBe(1);
    });
});

describe('gems', () => {
    it('measures progress toward each gem', () => {
        const stats = { focusSessionsTotal: 3, longestFocusSessionMinutes: 45, focusStreakDays: 2, focusMinutesTotal: 3000 };
        expect(gemProgress('amethyst', stats)).toBe(0.5);
        expect(gemProgress('emerald', stats)).toBe(0.5);
        expect(gemProgress('sapphire', stats)).toBe(1);
    });

    it('awards each gem once', () => {
        const stats = { focusSessionsTotal: 3, longestFocusSessionMinutes: 95, focusStreakDays: 2, focusMinutesTotal: 300 };
        const earned = evaluateGems(stats, [{ type: 'sapphire', earnedAt: friday.toISOString() }], friday);
        expect(earned).toEqual([{ type: 'emerald', earnedAt: friday.toISOString() }]);
    });

    it('describes gems', () => {
        expect(gemInfo('sapphire')).toEqual({ name: 'First Focus', requirement: 'Complete your first focus session' });
    });
});

describe('unlockAchievement', () => {
    it('grants the bonus once and queues it', () => {
        const first = unlockAchievement(createInitialStats({ dailyGoal: 2 }), 'aiExplorer');
        expect(first.unlocked).toBe(true);
        expect(first.stats.totalPoints).toBe(100);
        expect(first.stats.pendingAchievements).toEqual(['aiExplorer']);

        const second = unlockAchievement(first.stats, 'aiExplorer');
        expect(second.unlocked).toBe(false);
        expect(second.stats.totalPoints).toBe(100);
    });
});

describe('acknowledgeAchievement', () => {
    it('pops the oldest or the named pending achievement', () => {
        const stats: UserStats = { ...createInitialStats({ dailyGoal: 2 }), pendingAchievements: ['firstTask', 'earlyBird'] };

        const named = acknowledgeAchievement(stats, 'earlyBird');
        expect(named.achievement?.type).toBe('earlyBird');
        expect(named.stats.pendingAchievements).toEqual(['firstTask']);

        const oldest = acknowledgeAchievement(stats);
        expect(oldest.achievement?.type).toBe('firstTask');
        expect(oldest.stats.pendingAchievements).toEqual(['earlyBird']);

        expect(acknowledgeAchievement(oldest.stats, 'firstTask').achievement).toBeNull();
        expect(acknowledgeAchievement(createInitialStats({ dailyGoal: 2 })).achievement).toBeNull();
    });
});

describe('recordTaskCompletion', () => {
    const task = createTask({ title: 'Write', starRating: 2, estimatedMinutes: 20 }, friday);

    it('scores the first task and unlocks its achievement', () => {
        const result = recordTaskCompletion(createInitialStats({ dailyGoal: 2 }), task, friday);

        expect(result.pointsEarned).toBe(27);
        expect(result.newAchievements).toEqual(['firstTask']);
        expect(result.stats.totalPoints).toBe(77);
        expect(result.stats.level).toBe(1);
        expect(result.leveledUp).toBe(false);
        expect(result.stats.tasksCompletedToday).toBe(1);
        expect(result.stats.lastActiveDate).toBe('2026-03-06');
        expect(result.stats.currentStreak).toBe(0);
    });

    it('extends the streak once when the daily goal is met', () => {
        let stats = createInitialStats({ dailyGoal: 2 });
        stats = recordTaskCompletion(stats, task, friday).stats;

        const second = recordTaskCompletion(stats, task, friday);
        expect(second.stats.currentStreak).toBe(1);
        expect(second.stats.longestStreak).toBe(1);
        expect(second.stats.streakCountedDate).toBe('2026-03-06');
        expect(second.stats.totalPoints).toBe(104);

        const third = recordTaskCompletion(second.stats, task, friday);
        expect(third.pointsEarned).toBe(29);
        expect(third.stats.currentStreak).toBe(1);

        const fourth = recordTaskCompletion(third.stats, task, friday);
        expect(fourth.stats.totalPoints).toBe(162);
        expect(fourth.stats.level).toBe(2);
        expect(fourth.leveledUp).toBe(true);
    });

    it('starts a fresh day count on the next day', () => {
        const monday = new Date(2026, 2, 2, 10, 0);
        const tuesday = new Date(2026, 2, 3, 10, 0);
        let stats = createInitialStats({ dailyGoal: 5 });
        for (let i = 0; i < 5; i++) {
            stats = recordTaskCompletion(stats, task, monday).stats;
        }
        expect(stats.tasksCompletedToday).toBe(5);
        expect(stats.currentStreak).toBe(1);

        const next = recordTaskCompletion(stats, task, tuesday);

        expect(next.stats.tasksCompletedToday).toBe(1);
        expect(next.stats.tasksCompletedThisWeek).toBe(6);
        expect(next.stats.currentStreak).toBe(1);
        expect(next.stats.streakCountedDate).toBe('2026-03-02');
        expect(next.stats.lastActiveDate).toBe('2026-03-03');
    });

    it('does not carry yesterday\'s tasks into productiveDay', () => {
        let stats = createInitialStats({ dailyGoal: 5 });
        for (let i = 0; i < 6; i++) {
            stats = recordTaskCompletion(stats, task, new Date(2026, 2, 2, 10, 0)).stats;
        }
        for (let i = 0; i < 4; i++) {
            stats = recordTaskCompletion(stats, task, new Date(2026, 2, 3, 10, 0)).stats;
        }

        expect(stats.tasksCompletedToday).toBe(4);
        expect(stats.totalTasksCompleted).toBe(10);
        expect(stats.unlockedAchievements).not.toContain('productiveDay');
    });

    it('starts a fresh week count on Monday', () => {
        const sunday = recordTaskCompletion(createInitialStats({ dailyGoal: 5 }), task, new Date(2026, 2, 8, 10, 0));
        expect(sunday.stats.tasksCompletedThisWeek).toBe(1);

        const monday = recordTaskCompletion(sunday.stats, task, new Date(2026, 2, 9, 10, 0));
        expect(monday.stats.tasksCompletedThisWeek).toBe(1);
        expect(monday.stats.tasksCompletedToday).toBe(1);
    });

    it('unlocks early bird before 8am', () => {
        const result = recordTaskCompletion(createInitialStats({ dailyGoal: 2 }), task, new Date(2026, 2, 6, 7, 0));
        expect(result.newAchievements).toEqual(['firstTask', 'earlyBird']);
    });

    it('unlocks night owl from 10pm', () => {
        const result = recordTaskCompletion(createInitialStats({ dailyGoal: 2 }), task, new Date(2026, 2, 6, 22, 30));
        expect(result.newAchievements).toEqual(['firstTask', 'nightOwl']);
    });

    it('unlocks level achievements after bonuses are applied', () => {
        const stats: UserStats = {
            ...createInitialStats({ dailyGoal: 2 }),
            totalPoints: 550,
            level: 4,
            totalTasksCompleted: 5,
            unlockedAchievements: ['firstTask'],
        };

        const result = recordTaskCompletion(stats, task, friday);

        expect(result.newAchievements).toEqual(['levelFive']);
        expect(result.stats.totalPoints).toBe(877);
        expect(result.stats.level).toBe(6);
        expect(result.leveledUp).toBe(true);
    });
});

describe('recordFocusSession', () => {
    it('tracks focus totals and awards gems and achievements', () => {
        const result = recordFocusSession(
            createInitialStats({ dailyGoal: 2 }),
            { minutes: 95, isDeepFocus: true, appBlocking: true },
            friday
        );

        expect(result.newGems.map((gem) => gem.type)).toEqual(['sapphire', 'emerald']);
        expect(result.newAchievements).toEqual(['focusFirst', 'focusHour']);
        expect(result.stats).toMatchObject({
            focusMinutesTotal: 95,
            focusMinutesToday: 95,
            focusSessionsTotal: 1,
            blockedFocusSessions: 1,
            deepFocusSessions: 1,
            focusStreakDays: 1,
            longestFocusSessionMinutes: 95,
            lastFocusDate: '2026-03-06',
            totalPoints: 150,
            level: 2,
        });
        expect(result.leveledUp).toBe(true);
    });

    it('continues the focus streak on the next day', () => {
        const first = recordFocusSession(createInitialStats({ dailyGoal: 2 }), { minutes: 95 }, friday);
        const second = recordFocusSession(first.stats, { minutes: 30 }, new Date(2026, 2, 7, 9, 0));

        expect(second.stats.focusStreakDays).toBe(2);
        expect(second.stats.focusMinutesToday).toBe(30);
        expect(second.stats.focusMinutesTotal).toBe(125);
        expect(second.newAchievements).toEqual([]);
    });

    it('skips focusHour without app blocking', () => {
        const result = recordFocusSession(createInitialStats({ dailyGoal: 2 }), { minutes: 75 }, friday);
        expect(result.newAchievements).toEqual([]);
    });

    it('unlocks deepFocusMaster on the tenth deep session', () => {
        const stats: UserStats = {
            ...createInitialStats({ dailyGoal: 2 }),
            focusSessionsTotal: 9,
            deepFocusSessions: 9,
            unlockedAchievements: ['focusFirst'],
        };

        const result = recordFocusSession(stats, { minutes: 30, isDeepFocus: true }, friday);

        expect(result.stats.deepFocusSessions).toBe(10);
        expect(result.newAchievements).toEqual(['deepFocusMaster']);
        expect(result.stats.totalPoints).toBe(500);
    });

    it('awards no gems when gems are switched off', () => {
        setFeature('gems', false);
        const result = recordFocusSession(createInitialStats({ dailyGoal: 2 }), { minutes: 95 }, friday);

        expect(result.newGems).toEqual([]);
        expect(result.stats.gems).toEqual([]);
    });
});

describe('recordPactEvents', () => {
    it('unlocks pactFirst once on the first accepted pact', () => {
        const first = recordPactEvents(createInitialStats(), [{ kind: 'accepted' }]);
        expect(first.newAchievements).toEqual(['pactFirst']);
        expect(first.stats.totalPoints).toBe(100);
        expect(first.stats.pendingAchievements).toEqual(['pactFirst']);
        expect(first.leveledUp).toBe(false);

        const second = recordPactEvents(first.stats, [{ kind: 'accepted' }]);
        expect(second.newAchievements).toEqual([]);
        expect(second.stats.totalPoints).toBe(100);
    });

    it('maps streak milestones to pact achievements', () => {
        const result = recordPactEvents(createInitialStats(), [
            { kind: 'milestone', milestone: 7 },
            { kind: 'milestone', milestone: 14 },
            { kind: 'milestone', milestone: 30 },
        ]);

        expect(result.newAchievements).toEqual(['pactWeek', 'pactMonth', 'levelFive']);
        expect(result.stats.totalPoints).toBe(1500);
        expect(result.stats.level).toBe(9);
    });

    it('unlocks pactCentury at 100 days', () => {
        const result = recordPactEvents(createInitialStats(), [{ kind: 'milestone', milestone: 100 }]);
        expect(result.newAchievements).toContain('pactCentury');
    });

    it('unlocks pactMaster after five completed pacts', () => {
        expect(recordPactEvents(createInitialStats(), [{ kind: 'completed', completedPacts: 4 }]).newAchievements).toEqual([]);
        expect(recordPactEvents(createInitialStats(), [{ kind: 'completed', completedPacts: 5 }]).newAchievements).toEqual(['pactMaster']);
    });
});

describe('resetDaily', () => {
    const task = createTask({ title: 'Write' }, friday);

    function afterGoalMetOnFriday(): UserStats {
        let stats = createInitialStats({ dailyGoal: 1 });
        stats = recordTaskCompletion(stats, task, friday).stats;
        return stats;
    }

    it('keeps the streak the morning after the goal was met', () => {
        const next = resetDaily(afterGoalMetOnFriday(), new Date(2026, 2, 7, 8, 0));

        expect(next.currentStreak).toBe(1);
        expect(next.tasksCompletedToday).toBe(0);
        expect(next.tasksCompletedThisWeek).toBe(1);
    });

    it('breaks the streak after a missed day and clears the week counter', () => {
        const next = resetDaily(afterGoalMetOnFriday(), new Date(2026, 2, 9, 8, 0));

        expect(next.currentStreak).toBe(0);
        expect(next.longestStreak).toBe(1);
        expect(next.tasksCompletedThisWeek).toBe(0);
    });

    it('clears today\'s focus minutes and a lapsed focus streak', () => {
        const focused = recordFocusSession(createInitialStats({ dailyGoal: 1 }), { minutes: 30 }, friday).stats;

        const nextDay = resetDaily(focused, new Date(2026, 2, 7, 8, 0));
        expect(nextDay.focusMinutesToday).toBe(0);
        expect(nextDay.focusStreakDays).toBe(1);

        const later = resetDaily(focused, new Date(2026, 2, 9, 8, 0));
        expect(later.focusStreakDays).toBe(0);
    });
});
