import { defaults } from 'lodash';
import { defaultRandom, RandomSource } from './random';

export interface WeightedTableConfig {
    /** Source for `getRandomItem()` without a roll.  Defaults to the process-wide `Math.random`. */
    random?: RandomSource;
    /**
     * The cached total weight is adjusted incrementally by adds and updates.  After this many
     * incremental adjustments it is recomputed from the stored weights to shed accumulated rounding.
     */
    recomputeInterval?: number;
}

export type LoadedConfig = Required<WeightedTableConfig>;

export const DEFAULT_RECOMPUTE_INTERVAL = 1000;

export function resolveConfig(config: WeightedTableConfig = {}): LoadedConfig {
    const loaded = defaults({}, config, {
        random: defaultRandom,
        recomputeInterval: DEFAULT_RECOMPUTE_INTERVAL,
    });
    if(!Number.isInteger(loaded.recomputeInterval) || loaded.recomputeInterval < 1) {
        throw new RangeError(`recomputeInterval must be a positive integer, got ${loaded.recomputeInterval}`);
    }
    return loaded;
}
