import { ConflictError, NotFoundError } from './errors';

/** Query half of a `BidirectionalMap`. */
export interface ReadonlyBidirectionalMap<K, V> extends Iterable<[K, V]> {
    readonly size: number;
    getByKey(key: K): V;
    tryGetByKey(key: K): V | undefined;
    getByValue(value: V): K;
    tryGetByValue(value: V): K | undefined;
    containsKey(key: K): boolean;
    containsValue(value: V): boolean;
    keys(): IterableIterator<K>;
    values(): IterableIterator<V>;
    entries(): IterableIterator<[K, V]>;
}

/**
 * One-to-one map: every key has exactly one value and every value exactly one key,
 * so either side can look up the other.
 *
 * Keys and values are compared the way `Map` compares them (SameValueZero; objects by identity).
 */
export class BidirectionalMap<K extends NonNullable<unknown>, V extends NonNullable<unknown>>
    implements ReadonlyBidirectionalMap<K, V>
{
    private forward = new Map<K, V>();
    private backward = new Map<V, K>();

    constructor(entries: Iterable<readonly [K, V]> = []) {
        for(const [key, value] of entries) {
            this.insert(key, value);
        }
    }

    get size() {
        return this.forward.size;
    }

    /** @throws NotFoundError if `key` is not paired. */
    getByKey(key: K): V {
        const value = this.forward.get(key);
        if(value === undefined) {
            throw new NotFoundError(`Key ${String(key)} does not exist in the map`, {key});
        }
        return value;
    }

    tryGetByKey(key: K): V | undefined {
        return this.forward.get(key);
    }

    /** @throws NotFoundError if `value` is not paired. */
    getByValue(value: V): K {
        const key = this.backward.get(value);
        if(key === undefined) {
            throw new NotFoundError(`Value ${String(value)} does not exist in the map`, {value});
        }
        return key;
    }

    tryGetByValue(value: V): K | undefined {
        return this.backward.get(value);
    }

    /**
     * Pair `key` with `value`.  Both sides are checked before either map is touched, so a
     * rejected insert leaves the map as it was.
     * @throws ConflictError if `key` is already a key or `value` is already a value.
     */
    insert(key: K, value: V) {
        if(this.forward.has(key)) {
            throw new ConflictError(`Key ${String(key)} already exists in the map`, {key});
        }
        if(this.backward.has(value)) {
            throw new ConflictError(`Value ${String(value)} already exists in the map`, {value});
        }
        this.forward.set(key, value);
        this.backward.set(value, key);
    }

    /** Remove the pair holding `key`.  Returns its value, or `undefined` if there was none. */
    removeByKey(key: K): V | undefined {
        const value = this.forward.get(key);
        if(value === undefined) return undefined;
        this.forward.delete(key);
        this.backward.delete(value);
        return value;
    }

    /** Remove the pair holding `value`.  Returns its key, or `undefined` if there was none. */
    removeByValue(value: V): K | undefined {
        const key = this.backward.get(value);
        if(key === undefined) return undefined;
        this.backward.delete(value);
        this.forward.delete(key);
        return key;
    }

    containsKey(key: K) {
        return this.forward.has(key);
    }

    containsValue(value: V) {
        return this.backward.has(value);
    }

    clear() {
        this.forward.clear();
        this.backward.clear();
    }

    keys() {
        return this.forward.keys();
    }

    values() {
        return this.forward.values();
    }

    entries() {
        return this.forward.entries();
    }

    [Symbol.iterator]() {
        return this.forward.entries();
    }
}
