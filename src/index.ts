export { BidirectionalMap, ReadonlyBidirectionalMap } from './bidirectional-map';
export { WeightedTable, WeightedEntry } from './weighted-table';
export { WeightedTableConfig, DEFAULT_RECOMPUTE_INTERVAL } from './config';
export { RandomSource, defaultRandom, createSeededRandom } from './random';
export {
    CollectionError,
    CollectionErrorCode,
    NotFoundError,
    ConflictError,
    InvalidWeightError,
    EmptyError,
    isCollectionError,
} from './errors';
export { setLogger, LogSink } from './logging';
