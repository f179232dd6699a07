import { describe, it, expect, beforeEach } from 'vitest';
import { Table } from '../storage/Table';
import { createColumn } from '../schema/Column';
import { ConstraintError, ErrorCode, ExecutionError, SchemaError, StorageError } from '../errors';
import { BTreeIndex } from '../index/BTreeIndex';
import { HashIndex } from '../index/HashIndex';
import { NULL, floatValue, intValue, textValue } from '../value/Value';
import { catchError } from './helpers';

function accountsTable(): Table {
    return new Table('accounts', [
        createColumn('id', 'INT', { primaryKey: true, nullable: false }),
        createColumn('email', 'VARCHAR', { length: 30, unique: true }),
        createColumn('balance', 'FLOAT', { defaultValue: floatValue(0) }),
        createColumn('tier', 'VARCHAR'),
    ]);
}

describe('Table', () => {
    let table: Table;

    beforeEach(() => {
        table = accountsTable();
    });

    describe('schema', () => {
        it('should keep column order', () => {
            expect(table.getColumnOrder()).toEqual(['id', 'email', 'balance', 'tier']);
            expect(table.getPrimaryKeyColumn()?.name).toBe('id');
        });

        it('should index primary key and unique columns at creation', () => {
            expect(table.listIndexes()).toEqual([
                { column: 'id', kind: 'BTREE', size: 0 },
                { column: 'email', kind: 'BTREE', size: 0 },
            ]);
        });
    });

    describe('insert', () => {
        it('should fill defaults and NULLs and assign row ids', () => {
            const first = table.insert({ id: intValue(1), email: textValue('a@example.com') });
            const second = table.insert({ id: intValue(2) });

            expect(first.rowId).toBe(1);
            expect(second.rowId).toBe(2);
            expect(first.data).toEqual({
                id: intValue(1),
                email: textValue('a@example.com'),
                balance: floatValue(0),
                tier: NULL,
            });
            expect(second.data.email).toEqual(NULL);
        });

        it('should convert values to column types', () => {
            const row = table.insert({ id: textValue('7'), balance: intValue(12) });
            expect(row.data.id).toEqual(intValue(7));
            expect(row.data.balance).toEqual(floatValue(12));
        });

        it('should reject unknown columns', () => {
            const error = catchError(() => table.insert({ id: intValue(1), nickname: textValue('x') }));
            expect(error).toBeInstanceOf(SchemaError);
            expect(error).toMatchObject({ code: ErrorCode.COLUMN_NOT_FOUND });
            expect(table.count()).toBe(0);
        });

        it('should reject a duplicate primary key without changing anything', () => {
            table.insert({ id: intValue(1) });

            expect(() => table.insert({ id: intValue(1) })).toThrow(
                "Duplicate value for PRIMARY KEY column 'id'"
            );
            expect(table.count()).toBe(1);
            expect(table.getNextRowId()).toBe(2);
        });

        it('should reject a duplicate unique value but allow several NULLs', () => {
            table.insert({ id: intValue(1), email: textValue('a@example.com') });
            table.insert({ id: intValue(2) });
            table.insert({ id: intValue(3) });

            const error = catchError(() => table.insert({ id: intValue(4), email: textValue('a@example.com') }));
            expect(error).toBeInstanceOf(ConstraintError);
            expect(error).toMatchObject({ code: ErrorCode.UNIQUE_VIOLATION });
        });

        it('should reject a NULL primary key', () => {
            expect(() => table.insert({ email: textValue('b@example.com') })).toThrow("Column 'id' cannot be NULL");
        });
    });

    describe('update', () => {
        it('should change only the given columns and maintain indexes', () => {
            table.insert({ id: intValue(1), email: textValue('old@example.com') });

            table.update(0, { email: textValue('new@example.com') });

            expect(table.getRow(0)?.data.email).toEqual(textValue('new@example.com'));
            expect(table.getRow(0)?.data.id).toEqual(intValue(1));
            expect(table.findByColumn('email', textValue('old@example.com'))).toEqual([]);
            expect(table.findByColumn('email', textValue('new@example.com'))).toHaveLength(1);
        });

        it('should allow a row to keep its own unique value', () => {
            table.insert({ id: intValue(1), email: textValue('a@example.com') });
            expect(() => table.update(0, { id: intValue(1), email: textValue('a@example.com') })).not.toThrow();
        });

        it('should reject taking another row unique value', () => {
            table.insert({ id: intValue(1) });
            table.insert({ id: intValue(2) });

            expect(() => table.update(1, { id: intValue(1) })).toThrow(ConstraintError);
            expect(table.getRow(1)?.data.id).toEqual(intValue(2));
        });

        it('should reject a tombstoned slot', () => {
            table.insert({ id: intValue(1) });
            table.delete(0);

            const error = catchError(() => table.update(0, { tier: textValue('gold') }));
            expect(error).toBeInstanceOf(ExecutionError);
            expect(error).toMatchObject({ code: ErrorCode.INVALID_ROW_REFERENCE });
        });
    });

    describe('delete', () => {
        it('should tombstone the slot and keep row ids increasing', () => {
            table.insert({ id: intValue(1) });
            table.insert({ id: intValue(2) });
            table.delete(0);

            expect(table.scan().map(row => row.rowId)).toEqual([2]);
            expect(table.slotCount()).toBe(2);
            expect(table.findByColumn('id', intValue(1))).toEqual([]);

            const row = table.insert({ id: intValue(1) });
            expect(row.rowId).toBe(3);
            expect(table.scanSlots().map(({ slot }) => slot)).toEqual([1, 2]);
        });

        it('should fail on an out-of-range slot', () => {
            expect(() => table.delete(5)).toThrow('Invalid row reference: 5');
        });
    });

    describe('lookups', () => {
        beforeEach(() => {
            [40, 10, 30, 20, 50].forEach((balance, i) => {
                table.insert({ id: intValue(i + 1), balance: intValue(balance), tier: textValue(i % 2 ? 'gold' : 'basic') });
            });
        });

        it('should find rows by an unindexed column with a scan', () => {
            expect(table.findByColumn('tier', textValue('gold')).map(row => row.rowId)).toEqual([2, 4]);
        });

        it('should build a new index from existing rows', () => {
            expect(table.createIndex('tier', 'HASH')).toBe(true);
            expect(table.createIndex('tier')).toBe(false);
            expect(table.getIndex('tier')).toBeInstanceOf(HashIndex);
            expect(table.findByColumn('tier', textValue('basic')).map(row => row.rowId)).toEqual([1, 3, 5]);
        });

        it('should return the same range through a B-tree index as through a scan', () => {
            const scanned = table.findByRange('balance', intValue(15), intValue(40));

            table.createIndex('balance');
            expect(table.getIndex('balance')).toBeInstanceOf(BTreeIndex);
            const indexed = table.findByRange('balance', intValue(15), intValue(40));

            expect(scanned.map(row => row.rowId).sort()).toEqual([1, 3, 4]);
            expect(indexed.map(row => row.rowId).sort()).toEqual([1, 3, 4]);
        });

        it('should fall back to a scan for ranges over a hash index', () => {
            table.createIndex('balance', 'HASH');
            expect(table.findByRange('balance', intValue(0), intValue(25)).map(row => row.rowId)).toEqual([2, 4]);
        });

        it('should reject lookups on unknown columns', () => {
            expect(() => table.findByColumn('missing', NULL)).toThrow("Unknown column: 'missing' in table 'accounts'");
        });
    });

    describe('serialization', () => {
        it('should restore rows, tombstones, counters and indexes', () => {
            table.insert({ id: intValue(1), email: textValue('a@example.com') });
            table.insert({ id: intValue(2), email: textValue('b@example.com') });
            table.delete(0);
            table.createIndex('tier', 'HASH');

            const restored = Table.deserialize(table.serialize());

            expect(restored.serialize()).toEqual(table.serialize());
            expect(restored.getNextRowId()).toBe(3);
            expect(restored.getRow(0)).toBeUndefined();
            expect(restored.findByColumn('email', textValue('b@example.com')).map(row => row.rowId)).toEqual([2]);
            expect(() => restored.insert({ id: intValue(2) })).toThrow(ConstraintError);
        });

        it('should reject an index stored under another column name', () => {
            table.createIndex('tier', 'HASH');
            const serialized = table.serialize();

            const indexes = { ...serialized.indexes, balance: serialized.indexes.tier };

            const error = catchError(() => Table.deserialize({ ...serialized, indexes }));
            expect(error).toBeInstanceOf(StorageError);
            expect(error).toMatchObject({
                code: ErrorCode.CORRUPTED_SNAPSHOT,
                message: "Snapshot of table 'accounts' stores the index of 'tier' under 'balance'",
            });
        });

        it('should reject an index on a column the table does not have', () => {
            const serialized = table.serialize();

            const indexes = { ...serialized.indexes, ghost: new HashIndex('ghost').serialize() };

            expect(() => Table.deserialize({ ...serialized, indexes })).toThrow("Snapshot of table 'accounts' indexes unknown column 'ghost'");
        });
    });
});
