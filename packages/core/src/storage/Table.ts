/**
 * QuarryDB - Table Storage
 *
 * Implements in-memory row storage for a single table.
 * Each table maintains its schema, row slots, and indexes.
 *
 * Design decisions:
 * - Rows live in an append-only array of slots; a slot's position is the
 *   stable reference index entries point at
 * - Deleted rows leave tombstones - the slot is never compacted or reused
 * - Row ids are assigned once, strictly increasing, never reused
 * - Every PRIMARY KEY and UNIQUE column gets a B-tree index at creation
 * - Indexes are maintained on every write; NULLs are never indexed
 * - Validation runs before any mutation, so a rejected write changes nothing
 */

import {
    ColumnDefinition,
    IndexKind,
    Row,
    RowData,
    RowSlot,
    SerializedIndex,
    SerializedTable,
    Value,
} from '../types';
import { ConstraintError, ErrorCode, ExecutionError, SchemaError, StorageError } from '../errors';
import { validateValue } from '../schema/Column';
import { NULL, compareValues, valuesEqual } from '../value/Value';
import { BTreeIndex, DEFAULT_BTREE_ORDER } from '../index/BTreeIndex';
import { TableIndex, createIndex, deserializeIndex } from '../index/TableIndex';

export interface TableOptions {
    /** Order of the B-tree indexes this table creates */
    btreeOrder?: number;
}

/**
 * A live row together with its slot position.
 */
export interface SlotRow {
    slot: number;
    row: Row;
}

interface ValidateOptions {
    /** Only validate the columns present in the data */
    isUpdate?: boolean;
    /** Slot to ignore in uniqueness checks (the row being updated) */
    excludeSlot?: number;
}

export class Table {
    private name: string;
    private columns: Map<string, ColumnDefinition>;
    private columnOrder: string[];
    private slots: RowSlot[];
    private indexes: Map<string, TableIndex>;
    private nextRowId: number;
    private btreeOrder: number;

    constructor(name: string, columns: ColumnDefinition[], options: TableOptions = {}) {
        this.name = name;
        this.columns = new Map(columns.map(column => [column.name, column]));
        this.columnOrder = columns.map(column => column.name);
        this.slots = [];
        this.indexes = new Map();
        this.nextRowId = 1;
        this.btreeOrder = options.btreeOrder ?? DEFAULT_BTREE_ORDER;

        // Create indexes for PRIMARY KEY and UNIQUE columns
        for (const column of columns) {
            if (column.primaryKey || column.unique) {
                this.createIndex(column.name);
            }
        }
    }

    // ==========================================================================
    // SCHEMA
    // ==========================================================================

    getName(): string {
        return this.name;
    }

    /**
     * Column definitions in declaration order.
     */
    getColumns(): ColumnDefinition[] {
        return this.columnOrder.map(name => this.requireColumn(name));
    }

    getColumnOrder(): string[] {
        return [...this.columnOrder];
    }

    getColumn(name: string): ColumnDefinition | undefined {
        return this.columns.get(name);
    }

    hasColumn(name: string): boolean {
        return this.columns.has(name);
    }

    getPrimaryKeyColumn(): ColumnDefinition | undefined {
        return this.getColumns().find(column => column.primaryKey);
    }

    getNextRowId(): number {
        return this.nextRowId;
    }

    private requireColumn(name: string): ColumnDefinition {
        const column = this.columns.get(name);
        if (!column) {
            throw SchemaError.columnNotFound(name, this.name);
        }
        return column;
    }

    // ==========================================================================
    // INDEXES
    // ==========================================================================

    /**
     * Create an index on a column, built from all live rows in one pass.
     * Returns false when the column is already indexed.
     */
    createIndex(columnName: string, kind: IndexKind = 'BTREE'): boolean {
        this.requireColumn(columnName);

        if (this.indexes.has(columnName)) {
            return false;
        }

        const index = createIndex(kind, columnName, this.btreeOrder);
        for (const { slot, row } of this.scanSlots()) {
            const value = row.data[columnName];
            if (value && value.type !== 'null') {
                index.insert(value, slot);
            }
        }

        this.indexes.set(columnName, index);
        return true;
    }

    getIndex(columnName: string): TableIndex | undefined {
        return this.indexes.get(columnName);
    }

    listIndexes(): Array<{ column: string; kind: IndexKind; size: number }> {
        return Array.from(this.indexes.entries()).map(([column, index]) => ({
            column,
            kind: index.kind,
            size: index.size(),
        }));
    }

    // ==========================================================================
    // VALIDATION
    // ==========================================================================

    /**
     * Validate row data against the schema and uniqueness constraints.
     * Returns the data converted to each column's type.
     */
    validateRow(data: RowData, options: ValidateOptions = {}): RowData {
        for (const columnName of Object.keys(data)) {
            this.requireColumn(columnName);
        }

        const converted: RowData = {};

        for (const columnName of this.columnOrder) {
            if (options.isUpdate && !Object.hasOwn(data, columnName)) {
                continue;
            }

            const column = this.requireColumn(columnName);
            const value = validateValue(column, data[columnName] ?? NULL);

            if ((column.primaryKey || column.unique) && value.type !== 'null') {
                const clashes = this.findSlotsByColumn(columnName, value).filter(
                    slot => slot !== options.excludeSlot
                );
                if (clashes.length > 0) {
                    const constraint = column.primaryKey ? 'PRIMARY KEY' : 'UNIQUE';
                    throw new ConstraintError(
                        `Duplicate value for ${constraint} column '${columnName}'`,
                        ErrorCode.UNIQUE_VIOLATION,
                        { table: this.name, column: columnName }
                    );
                }
            }

            converted[columnName] = value;
        }

        return converted;
    }

    // ==========================================================================
    // WRITES
    // ==========================================================================

    /**
     * Insert a new row. Missing columns take their default, else NULL.
     */
    insert(data: RowData): Row {
        for (const columnName of Object.keys(data)) {
            this.requireColumn(columnName);
        }

        const full: RowData = {};
        for (const column of this.getColumns()) {
            full[column.name] = Object.hasOwn(data, column.name) ? data[column.name] : column.defaultValue;
        }

        const validated = this.validateRow(full);

        const row: Row = { rowId: this.nextRowId++, data: validated };
        const slot = this.slots.length;
        this.slots.push({ state: 'live', row });

        for (const [columnName, index] of this.indexes) {
            const value = validated[columnName];
            if (value.type !== 'null') {
                index.insert(value, slot);
            }
        }

        return row;
    }

    /**
     * Update the row in a slot. Only the changed columns are validated.
     */
    update(slot: number, updates: RowData): Row {
        const row = this.requireLiveRow(slot);
        const converted = this.validateRow(updates, { isUpdate: true, excludeSlot: slot });

        for (const [columnName, newValue] of Object.entries(converted)) {
            const index = this.indexes.get(columnName);
            if (!index) {
                continue;
            }

            const oldValue = row.data[columnName];
            if (oldValue.type !== 'null') {
                index.delete(oldValue, slot);
            }
            if (newValue.type !== 'null') {
                index.insert(newValue, slot);
            }
        }

        row.data = { ...row.data, ...converted };
        return row;
    }

    /**
     * Delete the row in a slot, leaving a tombstone behind.
     */
    delete(slot: number): void {
        const row = this.requireLiveRow(slot);

        for (const [columnName, index] of this.indexes) {
            const value = row.data[columnName];
            if (value.type !== 'null') {
                index.delete(value, slot);
            }
        }

        this.slots[slot] = { state: 'tombstone' };
    }

    private requireLiveRow(slot: number): Row {
        const entry = this.slots[slot];
        if (!Number.isInteger(slot) || entry === undefined || entry.state === 'tombstone') {
            throw new ExecutionError(`Invalid row reference: ${slot}`, ErrorCode.INVALID_ROW_REFERENCE, {
                table: this.name,
                slot,
            });
        }
        return entry.row;
    }

    // ==========================================================================
    // READS
    // ==========================================================================

    getRow(slot: number): Row | undefined {
        const entry = this.slots[slot];
        return entry && entry.state === 'live' ? entry.row : undefined;
    }

    /**
     * Live rows in slot order.
     */
    scan(): Row[] {
        return this.scanSlots().map(({ row }) => row);
    }

    /**
     * Live rows with their slot positions, in slot order.
     */
    scanSlots(): SlotRow[] {
        const result: SlotRow[] = [];
        this.slots.forEach((entry, slot) => {
            if (entry.state === 'live') {
                result.push({ slot, row: entry.row });
            }
        });
        return result;
    }

    private findSlotsByColumn(columnName: string, value: Value): number[] {
        const index = this.indexes.get(columnName);
        if (index && value.type !== 'null') {
            return index.search(value).filter(slot => this.getRow(slot) !== undefined);
        }

        return this.scanSlots()
            .filter(({ row }) => valuesEqual(row.data[columnName], value))
            .map(({ slot }) => slot);
    }

    /**
     * Rows whose column equals `value`, through the index when there is one.
     */
    findByColumn(columnName: string, value: Value): Row[] {
        this.requireColumn(columnName);
        return this.rowsAt(this.findSlotsByColumn(columnName, value));
    }

    /**
     * Rows whose column lies in [low, high]. Only a B-tree index can serve
     * this; otherwise the table is scanned.
     */
    findByRange(columnName: string, low: Value, high: Value): Row[] {
        this.requireColumn(columnName);

        const index = this.indexes.get(columnName);
        if (index instanceof BTreeIndex) {
            return this.rowsAt(index.rangeSearch(low, high));
        }

        return this.scan().filter(row => {
            const value = row.data[columnName];
            return value.type !== 'null' && compareValues(low, value) <= 0 && compareValues(value, high) <= 0;
        });
    }

    private rowsAt(slots: number[]): Row[] {
        const rows: Row[] = [];
        for (const slot of slots) {
            const row = this.getRow(slot);
            if (row) {
                rows.push(row);
            }
        }
        return rows;
    }

    /**
     * Number of live rows.
     */
    count(): number {
        return this.scanSlots().length;
    }

    /**
     * Number of slots, tombstones included.
     */
    slotCount(): number {
        return this.slots.length;
    }

    // ==========================================================================
    // SERIALIZATION
    // ==========================================================================

    serialize(): SerializedTable {
        const indexes: Record<string, SerializedIndex> = {};
        for (const [columnName, index] of this.indexes) {
            indexes[columnName] = index.serialize();
        }

        return {
            name: this.name,
            columns: this.getColumns(),
            columnOrder: [...this.columnOrder],
            rows: this.slots.map(entry =>
                entry.state === 'live' ? { rowId: entry.row.rowId, data: { ...entry.row.data } } : null
            ),
            indexes,
            nextRowId: this.nextRowId,
        };
    }

    /**
     * Restore a table from serialized data, the exact inverse of serialize().
     */
    static deserialize(data: SerializedTable, options: TableOptions = {}): Table {
        const table = new Table(data.name, data.columns, options);

        for (const columnName of data.columnOrder) {
            if (!table.hasColumn(columnName)) {
                throw new StorageError(
                    `Snapshot of table '${data.name}' orders unknown column '${columnName}'`,
                    ErrorCode.CORRUPTED_SNAPSHOT,
                    { table: data.name, column: columnName }
                );
            }
        }

        table.columnOrder = [...data.columnOrder];
        table.nextRowId = data.nextRowId;
        table.slots = data.rows.map((row): RowSlot =>
            row ? { state: 'live', row: { rowId: row.rowId, data: { ...row.data } } } : { state: 'tombstone' }
        );

        table.indexes = new Map();
        for (const [columnName, serialized] of Object.entries(data.indexes)) {
            const index = deserializeIndex(serialized);
            if (!table.hasColumn(columnName)) {
                throw new StorageError(
                    `Snapshot of table '${data.name}' indexes unknown column '${columnName}'`,
                    ErrorCode.CORRUPTED_SNAPSHOT,
                    { table: data.name, column: columnName }
                );
            }
            if (index.getColumnName() !== columnName) {
                throw new StorageError(
                    `Snapshot of table '${data.name}' stores the index of '${index.getColumnName()}' under '${columnName}'`,
                    ErrorCode.CORRUPTED_SNAPSHOT,
                    { table: data.name, column: columnName }
                );
            }
            table.indexes.set(columnName, index);
        }

        // Constrained columns always carry an index, even if the snapshot lost it
        for (const column of data.columns) {
            if (column.primaryKey || column.unique) {
                table.createIndex(column.name);
            }
        }

        return table;
    }
}
