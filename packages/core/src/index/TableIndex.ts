/**
 * QuarryDB - Table Index
 *
 * The index type a table holds, and the helpers that pick an implementation.
 */

import { IndexKind, SerializedBTreeIndex, SerializedIndex } from '../types';
import { BTreeIndex, DEFAULT_BTREE_ORDER } from './BTreeIndex';
import { HashIndex } from './HashIndex';

export type TableIndex = BTreeIndex | HashIndex;

export function createIndex(kind: IndexKind, columnName: string, order: number = DEFAULT_BTREE_ORDER): TableIndex {
    return kind === 'BTREE' ? new BTreeIndex(columnName, order) : new HashIndex(columnName);
}

function isSerializedBTree(data: SerializedIndex): data is SerializedBTreeIndex {
    return 'order' in data;
}

/**
 * Rebuild an index from its serialized form.
 * The presence of an `order` field marks a B-tree.
 */
export function deserializeIndex(data: SerializedIndex): TableIndex {
    return isSerializedBTree(data) ? BTreeIndex.deserialize(data) : HashIndex.deserialize(data);
}
