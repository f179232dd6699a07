/**
 * QuarryDB - Hash Index
 *
 * Implements a hash-based index for exact-match lookups.
 *
 * Design decisions:
 * - Uses JavaScript Map for O(1) average-case lookups
 * - Each key maps to an ordered list of row slots (non-unique keys allowed)
 * - Index is maintained incrementally on insert/update/delete
 * - No range support; range lookups fall back to a scan
 *
 * Time complexity:
 * - Lookup: O(1) average
 * - Insert: O(1) average
 * - Delete: O(k) for k slots sharing the key
 */

import { IndexKind, SerializedHashIndex, Value } from '../types';

interface HashBucket {
    key: Value;
    slots: number[];
}

export class HashIndex {
    readonly kind: IndexKind = 'HASH';

    private columnName: string;
    private entries: Map<string, HashBucket>; // hash key -> bucket

    constructor(columnName: string) {
        this.columnName = columnName;
        this.entries = new Map();
    }

    /**
     * Get the column name this index is built on.
     */
    getColumnName(): string {
        return this.columnName;
    }

    /**
     * Convert a value to a consistent hash key string.
     * Numbers share a prefix so 1 and 1.0 land in the same bucket; booleans
     * hash as 0 and 1, matching how they compare.
     */
    static hashKey(value: Value): string {
        switch (value.type) {
            case 'null':
                return '__NULL__';
            case 'int':
            case 'float':
                return `n:${value.value}`;
            case 'text':
                return `s:${value.value}`;
            case 'bool':
                return `n:${value.value ? 1 : 0}`;
            case 'timestamp':
                return `t:${value.value}`;
        }
    }

    /**
     * Add a value-to-slot mapping to the index.
     */
    insert(key: Value, slot: number): void {
        const hash = HashIndex.hashKey(key);

        let bucket = this.entries.get(hash);
        if (!bucket) {
            bucket = { key, slots: [] };
            this.entries.set(hash, bucket);
        }

        bucket.slots.push(slot);
    }

    /**
     * Remove a value-to-slot mapping. Returns false when it is not present.
     */
    delete(key: Value, slot: number): boolean {
        const hash = HashIndex.hashKey(key);
        const bucket = this.entries.get(hash);
        if (!bucket) {
            return false;
        }

        const position = bucket.slots.indexOf(slot);
        if (position === -1) {
            return false;
        }

        bucket.slots.splice(position, 1);
        if (bucket.slots.length === 0) {
            this.entries.delete(hash);
        }
        return true;
    }

    /**
     * Look up slots by value. Returns an empty list if the value is not found.
     */
    search(key: Value): number[] {
        const bucket = this.entries.get(HashIndex.hashKey(key));
        return bucket ? [...bucket.slots] : [];
    }

    /**
     * Total number of (key, slot) entries.
     */
    size(): number {
        return this.getStats().totalEntries;
    }

    /**
     * Get statistics about the index.
     */
    getStats(): { uniqueKeys: number; totalEntries: number } {
        let totalEntries = 0;
        for (const bucket of this.entries.values()) {
            totalEntries += bucket.slots.length;
        }
        return {
            uniqueKeys: this.entries.size,
            totalEntries,
        };
    }

    serialize(): SerializedHashIndex {
        const index: SerializedHashIndex['index'] = {};
        for (const [hash, bucket] of this.entries) {
            index[hash] = { key: bucket.key, slots: [...bucket.slots] };
        }
        return { columnName: this.columnName, index };
    }

    static deserialize(data: SerializedHashIndex): HashIndex {
        const index = new HashIndex(data.columnName);
        for (const bucket of Object.values(data.index)) {
            for (const slot of bucket.slots) {
                index.insert(bucket.key, slot);
            }
        }
        return index;
    }
}
