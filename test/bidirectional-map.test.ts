import { describe, it, expect } from '@jest/globals';
import { BidirectionalMap } from '../src/bidirectional-map';
import { ConflictError, NotFoundError } from '../src/errors';

describe('BidirectionalMap', () => {
    it('looks pairs up from either side', () => {
        const nicknames = new BidirectionalMap<string, string>();
        nicknames.insert('Cameron', 'Cam');
        nicknames.insert('Tommy', 'Tom');

        expect(nicknames.getByKey('Cameron')).toBe('Cam');
        expect(nicknames.getByValue('Tom')).toBe('Tommy');
        expect(nicknames.size).toBe(2);
    });

    it('throws NotFoundError from direct getters on a miss', () => {
        const map = new BidirectionalMap<string, number>([['a', 1]]);

        expect(() => map.getByKey('b')).toThrow(NotFoundError);
        expect(() => map.getByKey('b')).toThrow('Key b does not exist in the map');
        expect(() => map.getByValue(2)).toThrow('Value 2 does not exist in the map');
    });

    it('returns undefined from try getters on a miss', () => {
        const map = new BidirectionalMap<string, number>([['a', 1]]);

        expect(map.tryGetByKey('a')).toBe(1);
        expect(map.tryGetByKey('b')).toBeUndefined();
        expect(map.tryGetByValue(1)).toBe('a');
        expect(map.tryGetByValue(2)).toBeUndefined();
    });

    it('rejects a reused value and leaves the map unchanged', () => {
        const map = new BidirectionalMap<string, string>();
        map.insert('A', 'X');

        expect(() => map.insert('B', 'X')).toThrow(ConflictError);
        expect(map.size).toBe(1);
        expect(map.containsKey('B')).toBe(false);
        expect(map.getByValue('X')).toBe('A');
        expect([...map]).toStrictEqual([['A', 'X']]);
    });

    it('rejects a reused key and leaves the map unchanged', () => {
        const map = new BidirectionalMap<string, string>();
        map.insert('A', 'X');

        expect(() => map.insert('A', 'Y')).toThrow('Key A already exists in the map');
        expect(map.containsValue('Y')).toBe(false);
        expect(map.getByKey('A')).toBe('X');
    });

    it('reports the conflict code and offending side', () => {
        const map = new BidirectionalMap<string, string>([['A', 'X']]);
        let caught: unknown;
        try {
            map.insert('B', 'X');
        } catch(err) {
            caught = err;
        }

        expect(caught).toBeInstanceOf(ConflictError);
        expect(caught).toMatchObject({code: 'CONFLICT', context: {value: 'X'}});
    });

    it('removes both halves of a pair by key', () => {
        const map = new BidirectionalMap<string, string>([['k', 'v'], ['k2', 'v2']]);

        expect(map.removeByKey('k')).toBe('v');
        expect(map.containsKey('k')).toBe(false);
        expect(map.containsValue('v')).toBe(false);
        expect(map.removeByKey('k')).toBeUndefined();
        expect(map.size).toBe(1);
    });

    it('removes both halves of a pair by value', () => {
        const map = new BidirectionalMap<string, string>([['k', 'v']]);

        expect(map.removeByValue('v')).toBe('k');
        expect(map.containsValue('v')).toBe(false);
        expect(map.containsKey('k')).toBe(false);
        expect(map.removeByValue('v')).toBeUndefined();
    });

    it('frees both sides for reuse after removal', () => {
        const map = new BidirectionalMap<string, string>([['A', 'X']]);
        map.removeByKey('A');
        map.insert('B', 'X');
        map.insert('A', 'Y');

        expect(map.getByValue('X')).toBe('B');
        expect(map.getByKey('A')).toBe('Y');
    });

    it('round-trips through both directions after a mix of inserts and removals', () => {
        const map = new BidirectionalMap<number, string>();
        for(let i = 0; i < 20; i++) {
            map.insert(i, `v${i}`);
        }
        for(let i = 0; i < 20; i += 3) {
            map.removeByKey(i);
        }
        for(let i = 1; i < 20; i += 5) {
            map.removeByValue(`v${i}`);
        }

        for(const key of map.keys()) {
            const value = map.getByKey(key);
            expect(map.getByKey(map.getByValue(value))).toBe(value);
        }
        expect(map.size).toBe([...map.values()].length);
    });

    it('iterates in insertion order and rejects conflicting seed entries', () => {
        const map = new BidirectionalMap([['one', 1], ['two', 2], ['three', 3]] as const);

        expect([...map.keys()]).toStrictEqual(['one', 'two', 'three']);
        expect([...map.values()]).toStrictEqual([1, 2, 3]);
        expect([...map.entries()]).toStrictEqual([['one', 1], ['two', 2], ['three', 3]]);
        expect(() => new BidirectionalMap([['a', 1], ['b', 1]])).toThrow(ConflictError);
    });

    it('clears both directions', () => {
        const map = new BidirectionalMap<string, number>([['a', 1], ['b', 2]]);
        map.clear();

        expect(map.size).toBe(0);
        expect(map.containsKey('a')).toBe(false);
        expect(map.containsValue(2)).toBe(false);
    });

    it('keys objects by identity', () => {
        const left = {id: 1};
        const right = {id: 1};
        const map = new BidirectionalMap<object, string>([[left, 'left']]);

        expect(map.containsKey(left)).toBe(true);
        expect(map.containsKey(right)).toBe(false);
        map.insert(right, 'right');
        expect(map.getByValue('right')).toBe(right);
    });
});
