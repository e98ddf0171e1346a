export interface FeatureFlags {
    aiBreakdown: boolean;     // Route analysis through a model instead of offline heuristics
    appBlocking: boolean;     // Honour enableAppBlocking on focus sessions
    pacts: boolean;
    journalInsights: boolean;
    gems: boolean;            // Award focus gems alongside achievements
}

export const defaultFeatureFlags: FeatureFlags = {
    aiBreakdown: true,
    appBlocking: true,
    pacts: true,
    journalInsights: true,
    gems: true,
};

const FEATURE_KEYS: ReadonlyArray<keyof FeatureFlags> = [
    'aiBreakdown',
    'appBlocking',
    'pacts',
    'journalInsights',
    'gems',
];

// Server-side overrides: FEATURE_<FLAG>=true|false, e.g. FEATURE_APP_BLOCKING=false
const overrides: Partial<FeatureFlags> = {};

function envKey(key: keyof FeatureFlags): string {
    return `FEATURE_${key.replace(/[A-Z]/g, (c) => `_${c}`).toUpperCase()}`;
}

function fromEnv(key: keyof FeatureFlags): boolean | undefined {
    const raw = process.env[envKey(key)];
    if (raw === undefined) return undefined;
    return raw === 'true' || raw === '1';
}

export function getFeatures(): FeatureFlags {
    const flags: FeatureFlags = { ...defaultFeatureFlags };
    for (const key of FEATURE_KEYS) {
        const envValue = fromEnv(key);
        if (envValue !== undefined) flags[key] = envValue;
    }
    return { ...flags, ...overrides };
}

export function setFeature(key: keyof FeatureFlags, value: boolean): void {
    overrides[key] = value;
}

export function resetFeatures(): void {
    for (const key of FEATURE_KEYS) {
        delete overrides[key];
    }
}
