import assert from 'assert';
import { LoadedConfig, resolveConfig, WeightedTableConfig } from './config';
import { EmptyError, InvalidWeightError, NotFoundError, ConflictError } from './errors';
import { getLoggableItem, log } from './logging';

export interface WeightedEntry<T> {
    item: T;
    weight: number;
}

/**
 * Items tagged with positive weights, drawn at random with probability `weight / totalWeight`.
 *
 * Entries are kept in insertion order with an item -> position index beside them.  Draws walk
 * that order, so a given roll always resolves to the same item for the same table contents.
 */
export class WeightedTable<T extends NonNullable<unknown>> implements Iterable<T> {
    private readonly config: LoadedConfig;
    private entryList: WeightedEntry<T>[] = [];
    private indexOf = new Map<T, number>();
    // Neumaier running sum: `sum + compensation` is the total, with `compensation` holding
    // the low-order bits that `sum` rounded away
    private sum = 0;
    private compensation = 0;
    /** Incremental adjustments to the total since it was last summed from scratch. */
    private driftCount = 0;

    constructor(entries: Iterable<readonly [T, number]> = [], config?: WeightedTableConfig) {
        this.config = resolveConfig(config);
        for(const [item, weight] of entries) {
            this.addItem(item, weight);
        }
    }

    get size() {
        return this.entryList.length;
    }

    /** Sum of the weights of all items present.  Exposed for callers that roll their own draws. */
    get totalWeight() {
        return this.sum + this.compensation;
    }

    has(item: T) {
        return this.indexOf.has(item);
    }

    /** @throws NotFoundError */
    getWeight(item: T): number {
        const weight = this.tryGetWeight(item);
        if(weight === undefined) {
            throw new NotFoundError(`Item ${getLoggableItem(item)} does not exist in the table`, {item});
        }
        return weight;
    }

    tryGetWeight(item: T): number | undefined {
        const index = this.indexOf.get(item);
        return index === undefined ? undefined : this.entryAt(index).weight;
    }

    /** Chance that a single draw picks `item`; 0 when it is absent. */
    probabilityOf(item: T): number {
        const weight = this.tryGetWeight(item);
        const total = this.totalWeight;
        if(weight === undefined || total === 0) return 0;
        return weight / total;
    }

    /**
     * @throws InvalidWeightError if `weight` is not a positive finite number.
     * @throws ConflictError if `item` is already in the table.
     */
    addItem(item: T, weight: number) {
        assertValidWeight(weight);
        if(this.indexOf.has(item)) {
            throw new ConflictError(`Item ${getLoggableItem(item)} already exists in the table`, {item});
        }
        this.entryList.push({item, weight});
        this.indexOf.set(item, this.entryList.length - 1);
        this.adjustTotal(weight);
    }

    /**
     * Remove `item`, keeping the order of the rest.  Returns false if it was not present.
     */
    removeItem(item: T): boolean {
        const index = this.indexOf.get(item);
        if(index === undefined) return false;

        this.entryList.splice(index, 1);
        this.indexOf.delete(item);
        // Everything after the hole moved down one slot
        for(let i = index; i < this.entryList.length; i++) {
            this.indexOf.set(this.entryList[i].item, i);
        }
        // Compaction is already O(n); resum instead of subtracting
        this.recomputeTotal();
        return true;
    }

    /**
     * Replace the weight of an item already in the table.
     * @throws NotFoundError if `item` is absent.
     * @throws InvalidWeightError if `weight` is not a positive finite number.
     */
    updateItem(item: T, weight: number) {
        const index = this.indexOf.get(item);
        if(index === undefined) {
            throw new NotFoundError(`Item ${getLoggableItem(item)} does not exist in the table`, {item});
        }
        assertValidWeight(weight);
        const entry = this.entryAt(index);
        const previous = entry.weight;
        entry.weight = weight;
        // Two terms rather than one delta: `weight - previous` can round away a small weight
        this.adjustTotal(weight, -previous);
    }

    clear() {
        this.entryList = [];
        this.indexOf.clear();
        this.sum = 0;
        this.compensation = 0;
        this.driftCount = 0;
    }

    /** Draw an item using the table's random source. */
    getRandomItem(): T;
    /**
     * Resolve a roll in `[0, totalWeight]` to an item.  Items occupy consecutive sub-intervals of
     * `[0, totalWeight)` in insertion order; a roll equal to the total resolves to the last item.
     * @throws EmptyError if the table has no items.
     * @throws InvalidWeightError if `roll` is negative, NaN, or greater than `totalWeight`.
     */
    getRandomItem(roll: number): T;
    getRandomItem(roll?: number): T {
        if(this.entryList.length === 0) {
            throw new EmptyError('Cannot draw from an empty table');
        }
        const total = this.totalWeight;
        const weightRoll = roll ?? this.config.random() * total;
        if(!(weightRoll >= 0) || weightRoll > total) {
            throw new InvalidWeightError(
                `Roll ${weightRoll} is outside the table's weight range [0, ${total}]`,
                {roll: weightRoll, totalWeight: total}
            );
        }
        let remaining = weightRoll;
        for(const {item, weight} of this.entryList) {
            remaining -= weight;
            if(remaining < 0) return item;
        }
        const last = this.entryAt(this.entryList.length - 1);
        log(`WeightedTable: roll ${weightRoll} of ${total} ran past every item; resolving to last item ${getLoggableItem(last.item)}`);
        return last.item;
    }

    *items() {
        for(const entry of this.entryList) {
            yield entry.item;
        }
    }

    /** Snapshot copies of the entries in draw order; editing them does not touch the table. */
    *entries(): IterableIterator<WeightedEntry<T>> {
        for(const {item, weight} of this.entryList) {
            yield {item, weight};
        }
    }

    [Symbol.iterator]() {
        return this.items();
    }

    private entryAt(index: number): WeightedEntry<T> {
        const entry = this.entryList[index];
        assert(entry !== undefined, `weighted table index out of sync at position ${index}`);
        return entry;
    }

    private adjustTotal(...terms: number[]) {
        for(const term of terms) {
            this.accumulate(term);
        }
        if(++this.driftCount >= this.config.recomputeInterval) {
            const cached = this.totalWeight;
            const adjustments = this.driftCount;
            this.recomputeTotal();
            if(cached !== this.totalWeight) {
                log(`WeightedTable: cached total ${cached} corrected to ${this.totalWeight} after ${adjustments} adjustments`);
            }
        }
    }

    private accumulate(term: number) {
        const next = this.sum + term;
        if(Math.abs(this.sum) >= Math.abs(term)) {
            this.compensation += (this.sum - next) + term;
        } else {
            this.compensation += (term - next) + this.sum;
        }
        this.sum = next;
    }

    private recomputeTotal() {
        this.sum = 0;
        this.compensation = 0;
        for(const entry of this.entryList) {
            this.accumulate(entry.weight);
        }
        this.driftCount = 0;
    }
}

function assertValidWeight(weight: number) {
    if(!(weight > 0) || !Number.isFinite(weight)) {
        throw new InvalidWeightError(`Weight must be a positive finite number, got ${weight}`, {weight});
    }
}
