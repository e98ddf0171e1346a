// Veloce Pact Service
// Mutual accountability: two users share one streak, and a day either
// of them misses breaks it for both unless a shield is spent.

import { PACT_COMMITMENTS, PACT_XP_PER_STREAK_DAY, STREAK_MILESTONES } from '../constants';
import type { PactCommitmentType } from '../constants';
import { pactActivitiesDB, pactsDB } from '../db';
import { PactError } from '../errors';
import { logger, systemContext } from '../logger';
import type { Pact, PactActivity, PactActivityType } from '../schema';
import { generateId, getISOTimestamp, getLocalDateString } from '../utils';

// ============================================
// Repository
// ============================================

export interface PactRepository {
    getAll(): Promise<Pact[]>;
    getById(id: string): Promise<Pact | undefined>;
    create(pact: Pact): Promise<Pact>;
    update(id: string, data: Partial<Pact>): Promise<Pact | undefined>;
    delete(id: string): Promise<void>;
    addActivity(activity: PactActivity): Promise<void>;
    activitiesFor(pactId: string): Promise<PactActivity[]>;
}

export const storePactRepository: PactRepository = {
    getAll: () => pactsDB.getAll(),
    getById: (id) => pactsDB.getById(id),
    create: (pact) => pactsDB.create(pact),
    update: (id, data) => pactsDB.update(id, data),
    delete: (id) => pactsDB.delete(id),
    async addActivity(activity) {
        await pactActivitiesDB.create(activity);
    },
    activitiesFor: (pactId) => pactActivitiesDB.getForPact(pactId),
};

// ============================================
// Commitment helpers
// ============================================

export function commitmentDescription(
    pact: Pick<Pact, 'commitmentType' | 'targetValue' | 'customDescription'>
): string {
    const n = pact.targetValue;
    switch (pact.commitmentType) {
        case 'daily_tasks':
            return `Complete ${n} task${n === 1 ? '' : 's'} per day`;
        case 'focus_time':
            return `Focus for ${n} minutes per day`;
        case 'goal_progress':
            return `Make ${n}% progress on goal`;
        case 'custom':
            return pact.customDescription ?? 'Custom commitment';
    }
}

export function defaultTarget(type: PactCommitmentType): number {
    return PACT_COMMITMENTS[type].defaultTarget;
}

export function nextMilestone(streak: number): number | null {
    return STREAK_MILESTONES.find((milestone) => streak < milestone) ?? null;
}

export function daysUntilNextMilestone(streak: number): number | null {
    const next = nextMilestone(streak);
    return next === null ? null : next - streak;
}

// ============================================
// Per-user status
// ============================================

export type PactUserStatus = 'bothDone' | 'waitingOnPartner' | 'waitingOnYou' | 'neitherDone' | 'inactive';

export const PACT_STATUS_TEXT: Record<PactUserStatus, string> = {
    bothDone: 'Both done!',
    waitingOnPartner: 'Waiting on partner',
    waitingOnYou: 'Your turn!',
    neitherDone: 'Get started',
    inactive: 'Inactive',
};

export function isMember(pact: Pick<Pact, 'initiatorId' | 'partnerId'>, userId: string): boolean {
    return pact.initiatorId === userId || pact.partnerId === userId;
}

export function statusForUser(pact: Pact, userId: string): PactUserStatus {
    if (pact.status !== 'active') return 'inactive';

    const isInitiator = pact.initiatorId === userId;
    const mine = isInitiator ? pact.initiatorCompletedToday : pact.partnerCompletedToday;
    const theirs = isInitiator ? pact.partnerCompletedToday : pact.initiatorCompletedToday;

    if (mine && theirs) return 'bothDone';
    if (mine) return 'waitingOnPartner';
    if (theirs) return 'waitingOnYou';
    return 'neitherDone';
}

// ============================================
// Service
// ============================================

export interface CreatePactInput {
    initiatorId: string;
    partnerId: string;
    commitmentType: PactCommitmentType;
    targetValue?: number;
    customDescription?: string;
}

export interface DailyResetSummary {
    checked: number;
    extended: number;
    shielded: number;
    broken: number;
    /** Milestones newly reached during this run, one entry per pact */
    milestones: number[];
}

export class PactService {
    constructor(
        private readonly repo: PactRepository = storePactRepository,
        private readonly now: () => Date = () => new Date()
    ) {}

    private async log(pactId: string, type: PactActivityType, userId?: string, details?: Record<string, string>): Promise<void> {
        await this.repo.addActivity({
            id: generateId(),
            pactId,
            userId,
            type,
            details,
            createdAt: getISOTimestamp(this.now()),
        });
    }

    private async require(pactId: string): Promise<Pact> {
        const pact = await this.repo.getById(pactId);
        if (!pact) throw new PactError('notFound');
        return pact;
    }

    private async save(pact: Pact, data: Partial<Pact>): Promise<Pact> {
        const updated = await this.repo.update(pact.id, { ...data, updatedAt: getISOTimestamp(this.now()) });
        if (!updated) throw new PactError('notFound');
        return updated;
    }

    async createPact(input: CreatePactInput): Promise<Pact> {
        const all = await this.repo.getAll();
        const duplicate = all.some((pact) =>
            (pact.status === 'pending' || pact.status === 'active') &&
            isMember(pact, input.initiatorId) &&
            isMember(pact, input.partnerId)
        );
        if (duplicate) throw new PactError('alreadyExists');

        const timestamp = getISOTimestamp(this.now());
        const pact: Pact = {
            id: generateId(),
            initiatorId: input.initiatorId,
            partnerId: input.partnerId,
            commitmentType: input.commitmentType,
            targetValue: input.targetValue ?? defaultTarget(input.commitmentType),
            customDescription: input.customDescription,
            status: 'pending',
            currentStreak: 0,
            longestStreak: 0,
            initiatorProgress: 0,
            partnerProgress: 0,
            initiatorCompletedToday: false,
            partnerCompletedToday: false,
            shieldActive: false,
            totalXpEarned: 0,
            milestonesReached: [],
            createdAt: timestamp,
            updatedAt: timestamp,
        };

        const created = await this.repo.create(pact);
        await this.log(created.id, 'created', input.initiatorId);
        logger.info('LOG.PACT_CREATED', {
            commitmentType: created.commitmentType,
            targetValue: created.targetValue,
        }, systemContext('pacts', { pactId: created.id }));
        return created;
    }

    private async respond(pactId: string, userId: string): Promise<Pact> {
        const pact = await this.require(pactId);
        if (pact.partnerId !== userId) throw new PactError('notPartner');
        if (pact.status !== 'pending') throw new PactError('invalidState');
        return pact;
    }

    async acceptPact(pactId: string, userId: string): Promise<Pact> {
        const pact = await this.respond(pactId, userId);
        const accepted = await this.save(pact, {
            status: 'active',
            acceptedAt: getISOTimestamp(this.now()),
            lastCheckedDate: getLocalDateString(this.now()),
        });
        await this.log(pactId, 'accepted', userId);
        this.logStatus(accepted, 'pending');
        return accepted;
    }

    /** Declined pacts are removed, not kept as a status */
    async declinePact(pactId: string, userId: string): Promise<void> {
        await this.respond(pactId, userId);
        await this.log(pactId, 'declined', userId);
        await this.repo.delete(pactId);
    }

    async cancelPact(pactId: string, userId: string): Promise<void> {
        const pact = await this.require(pactId);
        if (pact.initiatorId !== userId) throw new PactError('notInitiator');
        if (pact.status !== 'pending') throw new PactError('invalidState');
        await this.repo.delete(pactId);
    }

    /** Mutual end of an active pact; the streak is kept, not broken */
    async endPact(pactId: string, userId: string): Promise<Pact> {
        const pact = await this.require(pactId);
        if (pact.status !== 'active') throw new PactError('notActive');
        if (!isMember(pact, userId)) throw new PactError('notMember');

        const ended = await this.save(pact, { status: 'completed', endedAt: getISOTimestamp(this.now()) });
        await this.log(pactId, 'completed', userId);
        this.logStatus(ended, 'active');
        return ended;
    }

    async recordProgress(pactId: string, userId: string, amount: number): Promise<Pact> {
        const pact = await this.require(pactId);
        if (pact.status !== 'active') throw new PactError('notActive');
        if (!isMember(pact, userId)) throw new PactError('notMember');

        const isInitiator = pact.initiatorId === userId;
        const progress = (isInitiator ? pact.initiatorProgress : pact.partnerProgress) + amount;
        const done = progress >= pact.targetValue;

        const updated = await this.save(pact, isInitiator
            ? { initiatorProgress: progress, initiatorCompletedToday: done }
            : { partnerProgress: progress, partnerCompletedToday: done });

        await this.log(pactId, 'progress', userId, { amount: String(amount), progress: String(progress) });
        logger.info('LOG.PACT_PROGRESS', { amount, progress, completedToday: done },
            systemContext('pacts', { pactId }));
        return updated;
    }

    private async progressByType(userId: string, type: PactCommitmentType, amount: number): Promise<Pact[]> {
        const pacts = await this.repo.getAll();
        const matching = pacts.filter((pact) =>
            pact.status === 'active' && pact.commitmentType === type && isMember(pact, userId)
        );

        const updated: Pact[] = [];
        for (const pact of matching) {
            updated.push(await this.recordProgress(pact.id, userId, amount));
        }
        return updated;
    }

    recordTaskProgress(userId: string): Promise<Pact[]> {
        return this.progressByType(userId, 'daily_tasks', 1);
    }

    recordFocusProgress(userId: string, minutes: number): Promise<Pact[]> {
        return this.progressByType(userId, 'focus_time', minutes);
    }

    async activateShield(pactId: string, userId: string): Promise<Pact> {
        const pact = await this.require(pactId);
        if (pact.status !== 'active') throw new PactError('notActive');
        if (!isMember(pact, userId)) throw new PactError('notMember');
        return this.save(pact, { shieldActive: true });
    }

    async activitiesForPact(pactId: string): Promise<PactActivity[]> {
        return this.repo.activitiesFor(pactId);
    }

    async pactsForUser(userId: string): Promise<Pact[]> {
        const pacts = await this.repo.getAll();
        return pacts.filter((pact) => isMember(pact, userId));
    }

    // ============================================
    // Day rollover
    // ============================================

    async dailyReset(today: string = getLocalDateString(this.now())): Promise<DailyResetSummary> {
        const summary: DailyResetSummary = { checked: 0, extended: 0, shielded: 0, broken: 0, milestones: [] };
        const pacts = await this.repo.getAll();

        for (const pact of pacts) {
            if (pact.status !== 'active' || pact.lastCheckedDate === today) continue;
            summary.checked++;

            const timestamp = getISOTimestamp(this.now());
            const reset: Partial<Pact> = {
                initiatorProgress: 0,
                partnerProgress: 0,
                initiatorCompletedToday: false,
                partnerCompletedToday: false,
                lastCheckedDate: today,
            };

            if (pact.initiatorCompletedToday && pact.partnerCompletedToday) {
                const currentStreak = pact.currentStreak + 1;
                const newMilestones = STREAK_MILESTONES.filter((milestone) =>
                    currentStreak >= milestone && !pact.milestonesReached.includes(milestone)
                );

                await this.save(pact, {
                    ...reset,
                    currentStreak,
                    longestStreak: Math.max(pact.longestStreak, currentStreak),
                    milestonesReached: [...pact.milestonesReached, ...newMilestones],
                    totalXpEarned: pact.totalXpEarned + PACT_XP_PER_STREAK_DAY * currentStreak,
                });
                for (const milestone of newMilestones) {
                    await this.log(pact.id, 'milestone', undefined, { milestone: String(milestone) });
                }
                summary.milestones.push(...newMilestones);
                summary.extended++;
            } else if (pact.shieldActive) {
                await this.save(pact, { ...reset, shieldActive: false, shieldUsedAt: timestamp });
                await this.log(pact.id, 'shield_used');
                summary.shielded++;
            } else {
                const brokenBy = pact.initiatorCompletedToday ? pact.partnerId : pact.initiatorId;
                const broken = await this.save(pact, {
                    ...reset,
                    status: 'broken',
                    brokenAt: timestamp,
                    brokenBy,
                    currentStreak: 0,
                });
                await this.log(pact.id, 'broken', brokenBy, { previousStreak: String(pact.currentStreak) });
                this.logStatus(broken, 'active');
                summary.broken++;
            }
        }

        logger.info('LOG.PACT_DAILY_RESET', { today, ...summary }, systemContext('pacts'));
        return summary;
    }

    private logStatus(pact: Pact, from: Pact['status']): void {
        logger.info('LOG.PACT_STATUS_CHANGE', { from, to: pact.status }, systemContext('pacts', { pactId: pact.id }));
    }
}
