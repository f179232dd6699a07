import { describe, it, expect } from 'vitest';
import { BTreeIndex } from '../index/BTreeIndex';
import { intValue, textValue } from '../value/Value';

/**
 * Deterministic shuffle driven by a Park-Miller generator.
 */
function shuffled(items: number[], seed: number): number[] {
    const result = [...items];
    let state = seed;
    for (let i = result.length - 1; i > 0; i--) {
        state = (state * 16807) % 2147483647;
        const j = state % (i + 1);
        [result[i], result[j]] = [result[j], result[i]];
    }
    return result;
}

function range(from: number, to: number): number[] {
    return Array.from({ length: to - from + 1 }, (_, i) => from + i);
}

describe('BTreeIndex', () => {
    it('should reject an order below 2', () => {
        expect(() => new BTreeIndex('id', 1)).toThrow(RangeError);
    });

    it('should split the root once it holds 2t-1 entries', () => {
        const index = new BTreeIndex('id', 2);
        for (const key of [1, 2, 3]) {
            index.insert(intValue(key), key);
        }
        expect(index.height()).toBe(1);

        index.insert(intValue(4), 4);
        expect(index.height()).toBe(2);
        expect(index.size()).toBe(4);
    });

    it('should keep entries in key order whatever the insertion order', () => {
        const index = new BTreeIndex('id', 2);
        for (const key of shuffled(range(1, 200), 7)) {
            index.insert(intValue(key), key);
        }

        expect(index.size()).toBe(200);
        expect(index.entries().map(([, slot]) => slot)).toEqual(range(1, 200));
        expect(index.height()).toBeGreaterThan(2);
    });

    it('should find exact keys', () => {
        const index = new BTreeIndex('name');
        ['carol', 'alice', 'bob'].forEach((name, slot) => index.insert(textValue(name), slot));

        expect(index.search(textValue('bob'))).toEqual([2]);
        expect(index.search(textValue('dave'))).toEqual([]);
    });

    it('should return every slot for a duplicated key, in slot order', () => {
        const index = new BTreeIndex('status', 2);
        for (const slot of shuffled(range(0, 29), 3)) {
            index.insert(intValue(slot % 3), slot);
        }

        expect(index.search(intValue(1))).toEqual(range(0, 29).filter(slot => slot % 3 === 1));
    });

    it('should return an inclusive range in key order', () => {
        const index = new BTreeIndex('amount', 2);
        for (const key of shuffled(range(1, 50), 11)) {
            index.insert(intValue(key), key * 10);
        }

        expect(index.rangeSearch(intValue(10), intValue(20))).toEqual(range(10, 20).map(key => key * 10));
        expect(index.rangeSearch(intValue(60), intValue(70))).toEqual([]);
    });

    it('should delete entries and rebalance', () => {
        const index = new BTreeIndex('id', 2);
        const keys = range(1, 100);
        for (const key of shuffled(keys, 5)) {
            index.insert(intValue(key), key);
        }

        for (const key of shuffled(keys.filter(key => key % 2 === 0), 9)) {
            expect(index.delete(intValue(key), key)).toBe(true);
        }

        expect(index.size()).toBe(50);
        expect(index.entries().map(([, slot]) => slot)).toEqual(keys.filter(key => key % 2 === 1));
        expect(index.search(intValue(41))).toEqual([41]);
        expect(index.search(intValue(42))).toEqual([]);
    });

    it('should only delete the matching (key, slot) pair', () => {
        const index = new BTreeIndex('status');
        index.insert(intValue(1), 0);
        index.insert(intValue(1), 1);

        expect(index.delete(intValue(1), 5)).toBe(false);
        expect(index.delete(intValue(1), 0)).toBe(true);
        expect(index.search(intValue(1))).toEqual([1]);
    });

    it('should shrink back to a single empty leaf', () => {
        const index = new BTreeIndex('id', 2);
        const keys = range(1, 40);
        keys.forEach(key => index.insert(intValue(key), key));
        shuffled(keys, 13).forEach(key => index.delete(intValue(key), key));

        expect(index.size()).toBe(0);
        expect(index.height()).toBe(1);
        expect(index.entries()).toEqual([]);
    });

    it('should restore from its serialized form', () => {
        const index = new BTreeIndex('id', 3);
        for (const key of shuffled(range(1, 30), 17)) {
            index.insert(intValue(key), key - 1);
        }

        const restored = BTreeIndex.deserialize(index.serialize());

        expect(restored.getOrder()).toBe(3);
        expect(restored.size()).toBe(30);
        expect(restored.entries()).toEqual(index.entries());
    });
});
