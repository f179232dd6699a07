import { describe, it, expect } from 'vitest';
import { HashIndex } from '../index/HashIndex';
import { createIndex, deserializeIndex } from '../index/TableIndex';
import { BTreeIndex } from '../index/BTreeIndex';
import { NULL, boolValue, floatValue, intValue, textValue } from '../value/Value';

describe('HashIndex', () => {
    it('should map a value to every slot holding it', () => {
        const index = new HashIndex('city');
        index.insert(textValue('Oslo'), 0);
        index.insert(textValue('Lima'), 1);
        index.insert(textValue('Oslo'), 4);

        expect(index.search(textValue('Oslo'))).toEqual([0, 4]);
        expect(index.search(textValue('Rome'))).toEqual([]);
        expect(index.size()).toBe(3);
        expect(index.getStats()).toEqual({ uniqueKeys: 2, totalEntries: 3 });
    });

    it('should put equal ints and floats in one bucket', () => {
        const index = new HashIndex('n');
        index.insert(intValue(1), 0);
        index.insert(floatValue(1), 1);

        expect(index.search(intValue(1))).toEqual([0, 1]);
    });

    it('should keep text and numbers apart', () => {
        expect(HashIndex.hashKey(textValue('1'))).not.toBe(HashIndex.hashKey(intValue(1)));
        expect(HashIndex.hashKey(NULL)).toBe('__NULL__');
    });

    it('should hash booleans as the numbers they compare equal to', () => {
        expect(HashIndex.hashKey(boolValue(true))).toBe('n:1');
        expect(HashIndex.hashKey(boolValue(false))).toBe('n:0');

        const index = new HashIndex('active');
        index.insert(boolValue(true), 0);
        index.insert(boolValue(false), 1);

        expect(index.search(intValue(1))).toEqual([0]);
        expect(index.search(floatValue(0))).toEqual([1]);
    });

    it('should delete single entries and drop empty buckets', () => {
        const index = new HashIndex('city');
        index.insert(textValue('Oslo'), 0);
        index.insert(textValue('Oslo'), 1);

        expect(index.delete(textValue('Oslo'), 0)).toBe(true);
        expect(index.delete(textValue('Oslo'), 0)).toBe(false);
        expect(index.search(textValue('Oslo'))).toEqual([1]);

        index.delete(textValue('Oslo'), 1);
        expect(index.getStats().uniqueKeys).toBe(0);
    });

    it('should return a copy of the slot list', () => {
        const index = new HashIndex('city');
        index.insert(textValue('Oslo'), 0);
        index.search(textValue('Oslo')).push(99);

        expect(index.search(textValue('Oslo'))).toEqual([0]);
    });
});

describe('TableIndex helpers', () => {
    it('should create the requested kind', () => {
        expect(createIndex('HASH', 'a')).toBeInstanceOf(HashIndex);
        expect(createIndex('BTREE', 'a', 4)).toBeInstanceOf(BTreeIndex);
    });

    it('should pick the deserializer by the presence of order', () => {
        const hash = new HashIndex('city');
        hash.insert(textValue('Oslo'), 2);
        const tree = new BTreeIndex('id', 4);
        tree.insert(intValue(9), 0);

        const restoredHash = deserializeIndex(hash.serialize());
        const restoredTree = deserializeIndex(tree.serialize());

        expect(restoredHash).toBeInstanceOf(HashIndex);
        expect(restoredHash.search(textValue('Oslo'))).toEqual([2]);
        expect(restoredTree).toBeInstanceOf(BTreeIndex);
        expect(restoredTree.search(intValue(9))).toEqual([0]);
    });
});
