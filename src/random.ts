import seedrandom from 'seedrandom';

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

/**
 * Process-wide source used when a table is not given one.  It lives as long as the
 * process and cannot be reseeded; inject `createSeededRandom(...)` for reproducible draws.
 */
export const defaultRandom: RandomSource = () => Math.random();

export function createSeededRandom(seed: string | number): RandomSource {
    const prng = seedrandom(String(seed));
    return () => prng();
}
