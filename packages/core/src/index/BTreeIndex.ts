/**
 * QuarryDB - B-Tree Index
 *
 * Ordered index mapping column values to row slots. Supports exact lookups
 * and inclusive range scans.
 *
 * Design decisions:
 * - Entries are ordered by (key, slot), so every entry is distinct even when
 *   many rows share a key; duplicate keys may therefore straddle a separator
 *   and both lookups descend into every subtree that can hold the key
 * - Insertion splits full nodes on the way down (a full root first), so a
 *   single pass suffices
 * - Deletion is complete: nodes below the minimum borrow from a sibling or
 *   merge with it, so size() always equals the number of stored entries
 *
 * Time complexity (n entries, order t):
 * - Insert/Delete: O(t log_t n)
 * - Search: O(t log_t n + k) for k matches
 * - Range: O(t log_t n + k)
 */

import { IndexKind, SerializedBTreeIndex, Value } from '../types';
import { compareValues } from '../value/Value';

export const DEFAULT_BTREE_ORDER = 3;

interface BTreeEntry {
    key: Value;
    slot: number;
}

interface BTreeNode {
    entries: BTreeEntry[];
    children: BTreeNode[];
    isLeaf: boolean;
}

function createNode(isLeaf: boolean): BTreeNode {
    return { entries: [], children: [], isLeaf };
}

function compareEntries(a: BTreeEntry, b: BTreeEntry): number {
    return compareValues(a.key, b.key) || a.slot - b.slot;
}

function takeLast<T>(items: T[]): T {
    const item = items.pop();
    if (item === undefined) {
        throw new Error('B-tree invariant violated: borrowed from an empty node');
    }
    return item;
}

function takeFirst<T>(items: T[]): T {
    const item = items.shift();
    if (item === undefined) {
        throw new Error('B-tree invariant violated: borrowed from an empty node');
    }
    return item;
}

export class BTreeIndex {
    readonly kind: IndexKind = 'BTREE';

    private columnName: string;
    private order: number;
    private root: BTreeNode;
    private count: number;

    /**
     * @param order - Minimum degree t; nodes hold at most 2t-1 entries
     */
    constructor(columnName: string, order: number = DEFAULT_BTREE_ORDER) {
        if (!Number.isInteger(order) || order < 2) {
            throw new RangeError(`B-tree order must be an integer >= 2, got ${order}`);
        }
        this.columnName = columnName;
        this.order = order;
        this.root = createNode(true);
        this.count = 0;
    }

    getColumnName(): string {
        return this.columnName;
    }

    getOrder(): number {
        return this.order;
    }

    /**
     * Number of (key, slot) entries stored.
     */
    size(): number {
        return this.count;
    }

    /**
     * Number of levels, 1 for a lone leaf.
     */
    height(): number {
        let levels = 1;
        let node = this.root;
        while (!node.isLeaf) {
            node = node.children[0];
            levels++;
        }
        return levels;
    }

    private isFull(node: BTreeNode): boolean {
        return node.entries.length >= 2 * this.order - 1;
    }

    // ==========================================================================
    // INSERT
    // ==========================================================================

    insert(key: Value, slot: number): void {
        if (this.isFull(this.root)) {
            const newRoot = createNode(false);
            newRoot.children.push(this.root);
            this.splitChild(newRoot, 0);
            this.root = newRoot;
        }

        this.insertNonFull(this.root, { key, slot });
        this.count++;
    }

    /**
     * Split the full child at `index`, promoting its median entry into parent.
     */
    private splitChild(parent: BTreeNode, index: number): void {
        const t = this.order;
        const child = parent.children[index];
        const sibling = createNode(child.isLeaf);

        const median = child.entries[t - 1];
        sibling.entries = child.entries.slice(t);
        child.entries = child.entries.slice(0, t - 1);

        if (!child.isLeaf) {
            sibling.children = child.children.slice(t);
            child.children = child.children.slice(0, t);
        }

        parent.entries.splice(index, 0, median);
        parent.children.splice(index + 1, 0, sibling);
    }

    private insertNonFull(node: BTreeNode, entry: BTreeEntry): void {
        let i = 0;
        while (i < node.entries.length && compareEntries(node.entries[i], entry) < 0) {
            i++;
        }

        if (node.isLeaf) {
            node.entries.splice(i, 0, entry);
            return;
        }

        if (this.isFull(node.children[i])) {
            this.splitChild(node, i);
            if (compareEntries(entry, node.entries[i]) > 0) {
                i++;
            }
        }

        this.insertNonFull(node.children[i], entry);
    }

    // ==========================================================================
    // LOOKUP
    // ==========================================================================

    /**
     * Find every slot holding `key`, in slot order.
     */
    search(key: Value): number[] {
        const result: number[] = [];
        this.searchNode(this.root, key, result);
        return result;
    }

    private searchNode(node: BTreeNode, key: Value, result: number[]): void {
        let i = 0;
        while (i < node.entries.length && compareValues(node.entries[i].key, key) < 0) {
            i++;
        }

        if (!node.isLeaf) {
            this.searchNode(node.children[i], key, result);
        }

        // A match in an internal node continues into the child on its right,
        // which can hold further entries with the same key
        while (i < node.entries.length && compareValues(node.entries[i].key, key) === 0) {
            result.push(node.entries[i].slot);
            if (!node.isLeaf) {
                this.searchNode(node.children[i + 1], key, result);
            }
            i++;
        }
    }

    /**
     * Find every slot whose key lies in [low, high], in key order.
     */
    rangeSearch(low: Value, high: Value): number[] {
        const result: number[] = [];
        this.rangeNode(this.root, low, high, result);
        return result;
    }

    private rangeNode(node: BTreeNode, low: Value, high: Value, result: number[]): void {
        for (let i = 0; i < node.entries.length; i++) {
            const entry = node.entries[i];
            const aboveLow = compareValues(entry.key, low) >= 0;

            if (!node.isLeaf && aboveLow) {
                this.rangeNode(node.children[i], low, high, result);
            }

            if (compareValues(entry.key, high) > 0) {
                return;
            }

            if (aboveLow) {
                result.push(entry.slot);
            }
        }

        if (!node.isLeaf) {
            this.rangeNode(node.children[node.entries.length], low, high, result);
        }
    }

    // ==========================================================================
    // DELETE
    // ==========================================================================

    /**
     * Remove the entry (key, slot). Returns false when it is not present.
     */
    delete(key: Value, slot: number): boolean {
        const removed = this.deleteFrom(this.root, { key, slot });

        if (this.root.entries.length === 0 && !this.root.isLeaf) {
            this.root = this.root.children[0];
        }

        if (removed) {
            this.count--;
        }
        return removed;
    }

    /**
     * Every node this is called on, other than the root, holds at least t
     * entries, so removing one never leaves it below the minimum.
     */
    private deleteFrom(node: BTreeNode, target: BTreeEntry): boolean {
        const t = this.order;

        let i = 0;
        while (i < node.entries.length && compareEntries(node.entries[i], target) < 0) {
            i++;
        }

        if (i < node.entries.length && compareEntries(node.entries[i], target) === 0) {
            if (node.isLeaf) {
                node.entries.splice(i, 1);
                return true;
            }

            const left = node.children[i];
            const right = node.children[i + 1];

            if (left.entries.length >= t) {
                const predecessor = this.maxEntry(left);
                node.entries[i] = predecessor;
                return this.deleteFrom(left, predecessor);
            }

            if (right.entries.length >= t) {
                const successor = this.minEntry(right);
                node.entries[i] = successor;
                return this.deleteFrom(right, successor);
            }

            this.merge(node, i);
            return this.deleteFrom(left, target);
        }

        if (node.isLeaf) {
            return false;
        }

        if (node.children[i].entries.length < t) {
            i = this.fill(node, i);
        }

        return this.deleteFrom(node.children[i], target);
    }

    private maxEntry(node: BTreeNode): BTreeEntry {
        let current = node;
        while (!current.isLeaf) {
            current = current.children[current.children.length - 1];
        }
        return current.entries[current.entries.length - 1];
    }

    private minEntry(node: BTreeNode): BTreeEntry {
        let current = node;
        while (!current.isLeaf) {
            current = current.children[0];
        }
        return current.entries[0];
    }

    /**
     * Bring child `index` up to t entries. Returns the index of the child
     * that now covers the original range.
     */
    private fill(node: BTreeNode, index: number): number {
        const t = this.order;
        const lastIndex = node.entries.length;

        if (index > 0 && node.children[index - 1].entries.length >= t) {
            this.borrowFromPrevious(node, index);
            return index;
        }

        if (index < lastIndex && node.children[index + 1].entries.length >= t) {
            this.borrowFromNext(node, index);
            return index;
        }

        if (index < lastIndex) {
            this.merge(node, index);
            return index;
        }

        this.merge(node, index - 1);
        return index - 1;
    }

    private borrowFromPrevious(node: BTreeNode, index: number): void {
        const child = node.children[index];
        const sibling = node.children[index - 1];

        child.entries.unshift(node.entries[index - 1]);
        if (!child.isLeaf) {
            child.children.unshift(takeLast(sibling.children));
        }
        node.entries[index - 1] = takeLast(sibling.entries);
    }

    private borrowFromNext(node: BTreeNode, index: number): void {
        const child = node.children[index];
        const sibling = node.children[index + 1];

        child.entries.push(node.entries[index]);
        if (!child.isLeaf) {
            child.children.push(takeFirst(sibling.children));
        }
        node.entries[index] = takeFirst(sibling.entries);
    }

    /**
     * Merge child `index + 1` and the separator into child `index`.
     */
    private merge(node: BTreeNode, index: number): void {
        const child = node.children[index];
        const sibling = node.children[index + 1];

        child.entries.push(node.entries[index], ...sibling.entries);
        child.children.push(...sibling.children);

        node.entries.splice(index, 1);
        node.children.splice(index + 1, 1);
    }

    // ==========================================================================
    // SERIALIZATION
    // ==========================================================================

    /**
     * All entries in (key, slot) order.
     */
    entries(): Array<[Value, number]> {
        const result: Array<[Value, number]> = [];
        this.collect(this.root, result);
        return result;
    }

    private collect(node: BTreeNode, result: Array<[Value, number]>): void {
        node.entries.forEach((entry, i) => {
            if (!node.isLeaf) {
                this.collect(node.children[i], result);
            }
            result.push([entry.key, entry.slot]);
        });

        if (!node.isLeaf) {
            this.collect(node.children[node.entries.length], result);
        }
    }

    serialize(): SerializedBTreeIndex {
        return {
            columnName: this.columnName,
            order: this.order,
            size: this.count,
            entries: this.entries(),
        };
    }

    static deserialize(data: SerializedBTreeIndex): BTreeIndex {
        const index = new BTreeIndex(data.columnName, data.order);
        for (const [key, slot] of data.entries) {
            index.insert(key, slot);
        }
        return index;
    }
}
