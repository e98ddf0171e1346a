import { FLAME_TIERS } from '../constants';
import type { FlameIntensity } from '../constants';

export function flameIntensity(streak: number): FlameIntensity {
    const tier = FLAME_TIERS.find((candidate) => streak >= candidate.minStreak);
    return tier ? tier.intensity : 'none';
}
