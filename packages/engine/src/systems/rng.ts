// 1. Unified Hash Function (FNV-1a)
const hashStrToUint = (str: string): number => {
    let h = 2166136261 >>> 0;
    for (let i = 0; i < str.length; i++) {
        h ^= str.charCodeAt(i);
        h = Math.imul(h, 16777619) >>> 0;
    }
    return h >>> 0;
};

// 2. Deterministic PRNG (Mulberry32)
const mulberry32 = (a: number) => {
    return function () {
        let t = (a += 0x6D2B79F5) >>> 0;
        t = Math.imul(t ^ (t >>> 15), t | 1) >>> 0;
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61) >>> 0;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
};

export interface Rng {
    next: () => number;
    /** Inclusive on both ends. */
    int: (min: number, max: number) => number;
    chance: (percent: number) => boolean;
}

/**
 * Creates a deterministic RNG instance. Never falls back to Math.random().
 */
export const createRng = (seed: string | number): Rng => {
    const seedNum = typeof seed === 'number' ? (seed >>> 0) : hashStrToUint(String(seed));
    const rnd = mulberry32(seedNum || 1);

    return {
        next: () => rnd(),
        int: (min, max) => min + Math.floor(rnd() * (max - min + 1)),
        chance: (percent) => rnd() * 100 < percent,
    };
};

/** Seed for the level generated at `depth`, derived from the run's first seed. */
export const seedForDepth = (initialSeed: string, depth: number): string => `${initialSeed}:${depth}`;
