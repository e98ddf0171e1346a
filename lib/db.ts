// Veloce Store
// In-memory collections behind the same async CRUD shape for every record type

import { createInitialStats } from './gamification/gamification-service';
import type {
    FocusBlockList,
    FocusSessionRecord,
    JournalEntry,
    Pact,
    PactActivity,
    ScheduledFocusSession,
    Task,
    UserStats,
} from './schema';
import { completeTask } from './tasks/task-model';
import { getISOTimestamp } from './utils';

interface Entity {
    id: string;
}

// Clears every collection; used by resetStore()
const clearers: Array<() => void> = [];

let statsRecord: UserStats | null = null;

// ============================================
// Generic CRUD Helpers
// ============================================

export interface Collection<T extends Entity> {
    getAll(): Promise<T[]>;
    getById(id: string): Promise<T | undefined>;
    create(item: T): Promise<T>;
    update(id: string, data: Partial<T>): Promise<T | undefined>;
    delete(id: string): Promise<void>;
    clear(): Promise<void>;
}

function hasUpdatedAt(item: Entity): item is Entity & { updatedAt: string } {
    return 'updatedAt' in item;
}

/**
 * Each collection keeps its own Map; records are copied in and out
 * so callers never mutate stored state.
 */
function collection<T extends Entity>(): Collection<T> {
    const map = new Map<string, T>();
    clearers.push(() => map.clear());

    return {
        async getAll() {
            return Array.from(map.values(), (item) => ({ ...item }));
        },

        async getById(id) {
            const item = map.get(id);
            return item ? { ...item } : undefined;
        },

        async create(item) {
            map.set(item.id, { ...item });
            return { ...item };
        },

        async update(id, data) {
            const existing = map.get(id);
            if (!existing) return undefined;
            const updated: T = { ...existing, ...data, id };
            if (hasUpdatedAt(updated)) {
                updated.updatedAt = getISOTimestamp();
            }
            map.set(id, updated);
            return { ...updated };
        },

        async delete(id) {
            map.delete(id);
        },

        async clear() {
            map.clear();
        },
    };
}

// ============================================
// Tasks
// ============================================

const taskCollection = collection<Task>();

export const tasksDB = {
    ...taskCollection,

    async getPending(): Promise<Task[]> {
        const all = await taskCollection.getAll();
        return all.filter((task) => !task.isCompleted);
    },

    async complete(id: string, now: Date = new Date()): Promise<Task | undefined> {
        const existing = await taskCollection.getById(id);
        if (!existing) return undefined;
        const completed = completeTask(existing, now);
        await taskCollection.create(completed);
        return completed;
    },
};

// ============================================
// Focus
// ============================================

export const focusSessionsDB = collection<FocusSessionRecord>();
export const blockListsDB = collection<FocusBlockList>();
export const scheduledSessionsDB = collection<ScheduledFocusSession>();

// ============================================
// Pacts
// ============================================

const pactCollection = collection<Pact>();

export const pactsDB = {
    ...pactCollection,

    async getForUser(userId: string): Promise<Pact[]> {
        const all = await pactCollection.getAll();
        return all.filter((pact) => pact.initiatorId === userId || pact.partnerId === userId);
    },

    async getActive(): Promise<Pact[]> {
        const all = await pactCollection.getAll();
        return all.filter((pact) => pact.status === 'active');
    },
};

const activityCollection = collection<PactActivity>();

export const pactActivitiesDB = {
    ...activityCollection,

    /** Newest first */
    async getForPact(pactId: string): Promise<PactActivity[]> {
        const all = await activityCollection.getAll();
        return all
            .filter((activity) => activity.pactId === pactId)
            .sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    },
};

// ============================================
// Journal
// ============================================

export const journalEntriesDB = collection<JournalEntry>();

// ============================================
// Stats (singleton)
// ============================================

export const statsDB = {
    async get(): Promise<UserStats> {
        if (!statsRecord) statsRecord = createInitialStats();
        return { ...statsRecord };
    },

    async save(stats: UserStats): Promise<UserStats> {
        statsRecord = { ...stats };
        return { ...stats };
    },

    async clear(): Promise<void> {
        statsRecord = null;
    },
};

export function resetStore(): void {
    for (const clear of clearers) {
        clear();
    }
    statsRecord = null;
}
