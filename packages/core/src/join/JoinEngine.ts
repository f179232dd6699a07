/**
 * QuarryDB - Join Engine
 *
 * Implements INNER, LEFT and RIGHT joins using a nested-loop algorithm.
 *
 * Design decisions:
 * - Supports only equality conditions
 * - Joins fold left to right: each JOIN combines the rows built so far with
 *   one more table
 * - Every row carries each column twice, as "table.column" and as the bare
 *   column name; when two tables share a column name the bare key holds the
 *   value of the table merged last
 * - NULL never matches in a join condition
 * - An unmatched left row of a LEFT JOIN gets NULL for every qualified
 *   column of the right table; a bare name it already carries keeps its value
 * - An unmatched right row of a RIGHT JOIN gets NULL for every column of the
 *   left side
 *
 * Time Complexity:
 * - Without index: O(n * m) where n and m are row counts of the two sides
 * - With index on the right join column: O(n * k) where k is average
 *   matches per key
 */

import { Table } from '../storage/Table';
import { JoinClause, Row, RowData } from '../types';
import { SchemaError } from '../errors';
import { NULL, valuesEqual } from '../value/Value';

/**
 * Intermediate result of FROM and JOIN clauses.
 */
export interface RowSet {
    /** Tables folded in so far, base table first */
    tables: Table[];
    /** Every key a row carries, qualified and bare */
    keys: Set<string>;
    rows: RowData[];
}

/**
 * Parse a column reference into table and column parts.
 */
export function parseColumnRef(ref: string): { table?: string; column: string } {
    const dot = ref.indexOf('.');
    if (dot !== -1) {
        return { table: ref.slice(0, dot), column: ref.slice(dot + 1) };
    }
    return { column: ref };
}

/**
 * Row data keyed both by "table.column" and by bare column name.
 */
export function expandRow(table: Table, data: RowData): RowData {
    const name = table.getName();
    const row: RowData = {};
    for (const column of table.getColumnOrder()) {
        const value = data[column] ?? NULL;
        row[`${name}.${column}`] = value;
        row[column] = value;
    }
    return row;
}

function nullRow(tables: Table[]): RowData {
    const row: RowData = {};
    for (const table of tables) {
        for (const column of table.getColumnOrder()) {
            row[`${table.getName()}.${column}`] = NULL;
            row[column] = NULL;
        }
    }
    return row;
}

/**
 * NULL for every qualified column of `tables`; bare names only where the
 * row does not already carry them.
 */
function padRow(row: RowData, tables: Table[]): RowData {
    const padded: RowData = { ...row };
    for (const table of tables) {
        for (const column of table.getColumnOrder()) {
            padded[`${table.getName()}.${column}`] = NULL;
            if (!Object.hasOwn(padded, column)) {
                padded[column] = NULL;
            }
        }
    }
    return padded;
}

function keysOf(table: Table): string[] {
    return table.getColumnOrder().flatMap(column => [`${table.getName()}.${column}`, column]);
}

/**
 * The live rows of a single table.
 */
export function scanTable(table: Table): RowSet {
    return {
        tables: [table],
        keys: new Set(keysOf(table)),
        rows: table.scan().map(row => expandRow(table, row.data)),
    };
}

/**
 * Work out which side of the ON condition belongs to the joined table.
 * Bare names default to the left operand on the rows so far and the right
 * operand on the joined table; qualified names may appear in either order.
 */
function resolveJoinColumns(left: RowSet, right: Table, clause: JoinClause): { leftKey: string; rightColumn: string } {
    const rightName = right.getName();
    let leftRef = parseColumnRef(clause.leftColumn);
    let rightRef = parseColumnRef(clause.rightColumn);

    const leftNames = new Set(left.tables.map(table => table.getName()));
    const namesRight = (ref: { table?: string }) => ref.table === rightName && !leftNames.has(rightName);
    const namesLeft = (ref: { table?: string }) => ref.table !== undefined && leftNames.has(ref.table);

    const bareSwapped =
        leftRef.table === undefined &&
        rightRef.table === undefined &&
        !left.keys.has(leftRef.column) &&
        right.hasColumn(leftRef.column) &&
        left.keys.has(rightRef.column);

    if (namesRight(leftRef) || (namesLeft(rightRef) && !namesLeft(leftRef)) || bareSwapped) {
        [leftRef, rightRef] = [rightRef, leftRef];
    }

    if ((rightRef.table !== undefined && rightRef.table !== rightName) || !right.hasColumn(rightRef.column)) {
        throw SchemaError.columnNotFound(rightRef.column, rightName);
    }

    const leftKey = leftRef.table !== undefined ? `${leftRef.table}.${leftRef.column}` : leftRef.column;
    if (!left.keys.has(leftKey)) {
        throw SchemaError.columnNotFound(leftKey);
    }

    return { leftKey, rightColumn: rightRef.column };
}

/**
 * Join one more table onto a row set.
 */
export function joinTable(left: RowSet, right: Table, clause: JoinClause): RowSet {
    const { leftKey, rightColumn } = resolveJoinColumns(left, right, clause);

    const rightRows = right.scan();
    const rightIndex = right.getIndex(rightColumn);
    const matchedRight = new Set<number>();
    const rows: RowData[] = [];

    for (const leftRow of left.rows) {
        const leftValue = leftRow[leftKey];

        let matches: Row[];
        if (leftValue.type === 'null') {
            matches = [];
        } else if (rightIndex) {
            // Index lookups come back in index order; restore scan order
            matches = right.findByColumn(rightColumn, leftValue).sort((a, b) => a.rowId - b.rowId);
        } else {
            matches = rightRows.filter(row => {
                const value = row.data[rightColumn];
                return value.type !== 'null' && valuesEqual(leftValue, value);
            });
        }

        for (const match of matches) {
            matchedRight.add(match.rowId);
            rows.push({ ...leftRow, ...expandRow(right, match.data) });
        }

        if (matches.length === 0 && clause.type === 'LEFT') {
            rows.push(padRow(leftRow, [right]));
        }
    }

    if (clause.type === 'RIGHT') {
        const padding = nullRow(left.tables);
        for (const row of rightRows) {
            if (!matchedRight.has(row.rowId)) {
                rows.push({ ...padding, ...expandRow(right, row.data) });
            }
        }
    }

    return {
        tables: [...left.tables, right],
        keys: new Set([...left.keys, ...keysOf(right)]),
        rows,
    };
}
