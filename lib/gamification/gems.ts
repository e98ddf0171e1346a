// Veloce Focus Gems
// Collectibles for focus milestones, awarded once each

import { GEMS } from '../constants';
import type { EarnedGem, GemType, UserStats } from '../schema';
import { getISOTimestamp } from '../utils';

export const GEM_TYPES: readonly GemType[] = ['sapphire', 'emerald', 'ruby', 'diamond', 'amethyst'];

type GemStats = Pick<UserStats, 'focusSessionsTotal' | 'longestFocusSessionMinutes' | 'focusStreakDays' | 'focusMinutesTotal'>;

const GEM_TARGETS: Record<GemType, { target: number; value: (stats: GemStats) => number }> = {
    sapphire: { target: 1, value: (stats) => stats.focusSessionsTotal },
    emerald: { target: 90, value: (stats) => stats.longestFocusSessionMinutes },
    ruby: { target: 7, value: (stats) => stats.focusStreakDays },
    diamond: { target: 30, value: (stats) => stats.focusStreakDays },
    amethyst: { target: 100 * 60, value: (stats) => stats.focusMinutesTotal },
};

export function gemInfo(gem: GemType): { name: string; requirement: string } {
    return GEMS[gem];
}

export function gemProgress(gem: GemType, stats: GemStats): number {
    const { target, value } = GEM_TARGETS[gem];
    return Math.min(1, value(stats) / target);
}

/** Gems whose requirement is met but which are not yet in `earned` */
export function evaluateGems(stats: GemStats, earned: EarnedGem[], now: Date = new Date()): EarnedGem[] {
    const owned = new Set(earned.map((gem) => gem.type));
    return GEM_TYPES
        .filter((gem) => !owned.has(gem) && gemProgress(gem, stats) >= 1)
        .map((type) => ({ type, earnedAt: getISOTimestamp(now) }));
}
