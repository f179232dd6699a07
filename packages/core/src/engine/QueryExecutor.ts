/**
 * QuarryDB - Query Executor
 *
 * Executes parsed SQL statements against the database.
 *
 * Design decisions:
 * - Separates parsing from execution
 * - SELECT runs as a pipeline: scan, joins, WHERE, ORDER BY, LIMIT, projection
 * - Uses an index automatically when a join-free WHERE is a single equality
 *   on an indexed column
 * - Every statement that changes data persists the database once
 * - UPDATE and DELETE apply to matching rows one at a time in scan order;
 *   a failure part way keeps (and persists) the rows already changed
 * - execute() throws typed errors; tryExecute() turns them into outcomes
 */

import { Database } from '../storage/Database';
import { Table } from '../storage/Table';
import { parseSql } from '../parser/Parser';
import { RowSet, expandRow, joinTable, scanTable } from '../join/JoinEngine';
import {
    ComparisonOperator,
    Condition,
    CreateIndexStatement,
    CreateTableStatement,
    DeleteStatement,
    DropTableStatement,
    ExecutionOutcome,
    InsertStatement,
    QueryResult,
    RowData,
    SelectStatement,
    Statement,
    UpdateStatement,
    Value,
    ValueType,
} from '../types';
import { ErrorCode, ExecutionError, QuarryError, SchemaError, errorMessage } from '../errors';
import {
    compareValues,
    isComparable,
    parseTimestamp,
    textValue,
    timestampValue,
    valuesEqual,
} from '../value/Value';

// Sort key substituted for NULL in ORDER BY
const NULL_SORT_KEY = textValue('');

export class QueryExecutor {
    private database: Database;

    constructor(database: Database) {
        this.database = database;
    }

    /**
     * Execute a SQL query string. Throws on any failure.
     */
    execute(sql: string): QueryResult {
        return this.executeStatement(parseSql(sql));
    }

    /**
     * Execute a SQL query string, reporting failure as a value.
     */
    tryExecute(sql: string): ExecutionOutcome {
        try {
            return { success: true, ...this.execute(sql) };
        } catch (error) {
            return {
                success: false,
                error: errorMessage(error),
                code: error instanceof QuarryError ? error.code : ErrorCode.UNKNOWN,
            };
        }
    }

    /**
     * Execute a parsed statement.
     */
    executeStatement(statement: Statement): QueryResult {
        switch (statement.type) {
            case 'SELECT':
                return this.executeSelect(statement);
            case 'INSERT':
                return this.executeInsert(statement);
            case 'UPDATE':
                return this.executeUpdate(statement);
            case 'DELETE':
                return this.executeDelete(statement);
            case 'CREATE_TABLE':
                return this.executeCreateTable(statement);
            case 'CREATE_INDEX':
                return this.executeCreateIndex(statement);
            case 'DROP_TABLE':
                return this.executeDropTable(statement);
        }
    }

    // ==========================================================================
    // SELECT
    // ==========================================================================

    private executeSelect(statement: SelectStatement): QueryResult {
        const table = this.database.requireTable(statement.tableName);

        let rowSet: RowSet;
        if (statement.joins.length === 0) {
            rowSet = this.scanWithIndex(table, statement.where);
        } else {
            rowSet = scanTable(table);
            for (const join of statement.joins) {
                rowSet = joinTable(rowSet, this.database.requireTable(join.table), join);
            }
        }

        let rows = rowSet.rows;

        if (statement.where) {
            const predicate = this.createPredicate(rowSet, statement.where);
            rows = rows.filter(predicate);
        }

        if (statement.orderBy) {
            const key = this.resolveKey(rowSet, statement.orderBy.column);
            const direction = statement.orderBy.direction === 'DESC' ? -1 : 1;
            // Array.prototype.sort is stable
            rows = [...rows].sort((a, b) => direction * compareValues(sortKey(a[key]), sortKey(b[key])));
        }

        if (statement.limit !== undefined) {
            rows = rows.slice(0, statement.limit);
        }

        // '*' is the base table's column order, or the keys of the first row after a join
        const selectors =
            statement.columns === '*'
                ? statement.joins.length === 0
                    ? table.getColumnOrder()
                    : rows.length > 0
                      ? Object.keys(rows[0])
                      : []
                : statement.columns;
        const keys = selectors.map(selector => this.resolveKey(rowSet, selector));

        const projected = rows.map(row => {
            const output: RowData = {};
            selectors.forEach((selector, i) => {
                output[selector] = row[keys[i]];
            });
            return output;
        });

        return {
            columns: selectors,
            rows: projected,
            rowCount: projected.length,
        };
    }

    /**
     * Rows of a single table. A WHERE that is one equality on an indexed
     * column narrows the candidates through the index; the predicate still
     * runs on them afterwards.
     */
    private scanWithIndex(table: Table, where: Condition | undefined): RowSet {
        const rowSet = scanTable(table);

        if (!where || where.type !== 'COMPARISON' || where.operator !== '=' || where.value.type === 'null') {
            return rowSet;
        }

        const key = this.resolveKey(rowSet, where.column);
        const column = table.getColumn(key.slice(key.indexOf('.') + 1));
        if (!column || !table.getIndex(column.name)) {
            return rowSet;
        }

        const literal = coerceLiteral(column.type === 'DATETIME' ? 'timestamp' : where.value.type, where.value);
        const rows = table.findByColumn(column.name, literal).sort((a, b) => a.rowId - b.rowId);

        return { ...rowSet, rows: rows.map(row => expandRow(table, row.data)) };
    }

    // ==========================================================================
    // WRITES
    // ==========================================================================

    private executeInsert(statement: InsertStatement): QueryResult {
        const table = this.database.requireTable(statement.tableName);
        const columns = statement.columns ?? table.getColumnOrder();

        if (columns.length !== statement.values.length) {
            throw new ExecutionError(
                `Column count (${columns.length}) does not match value count (${statement.values.length})`,
                ErrorCode.COLUMN_COUNT_MISMATCH,
                { table: statement.tableName }
            );
        }

        const data: RowData = {};
        columns.forEach((column, i) => {
            data[column] = statement.values[i];
        });

        const row = table.insert(data);
        this.database.persist();

        return {
            columns: [],
            rows: [],
            rowCount: 0,
            affectedRows: 1,
            message: `1 row inserted (id: ${row.rowId})`,
        };
    }

    private executeUpdate(statement: UpdateStatement): QueryResult {
        const table = this.database.requireTable(statement.tableName);

        for (const column of Object.keys(statement.set)) {
            if (!table.hasColumn(column)) {
                throw SchemaError.columnNotFound(column, statement.tableName);
            }
        }

        const slots = this.matchingSlots(table, statement.where);

        let updated = 0;
        try {
            for (const slot of slots) {
                table.update(slot, { ...statement.set });
                updated++;
            }
        } finally {
            if (updated > 0) {
                this.database.persist();
            }
        }

        return {
            columns: [],
            rows: [],
            rowCount: 0,
            affectedRows: updated,
            message: `${pluralRows(updated)} updated`,
        };
    }

    private executeDelete(statement: DeleteStatement): QueryResult {
        const table = this.database.requireTable(statement.tableName);
        const slots = this.matchingSlots(table, statement.where);

        let deleted = 0;
        try {
            for (const slot of slots) {
                table.delete(slot);
                deleted++;
            }
        } finally {
            if (deleted > 0) {
                this.database.persist();
            }
        }

        return {
            columns: [],
            rows: [],
            rowCount: 0,
            affectedRows: deleted,
            message: `${pluralRows(deleted)} deleted`,
        };
    }

    // ==========================================================================
    // DDL
    // ==========================================================================

    private executeCreateTable(statement: CreateTableStatement): QueryResult {
        this.database.createTable(statement.tableName, statement.columns);

        return {
            columns: [],
            rows: [],
            rowCount: 0,
            message: `Table '${statement.tableName}' created`,
        };
    }

    private executeCreateIndex(statement: CreateIndexStatement): QueryResult {
        const table = this.database.requireTable(statement.tableName);
        const target = `${statement.tableName}(${statement.columnName})`;

        if (!table.createIndex(statement.columnName, statement.kind)) {
            return {
                columns: [],
                rows: [],
                rowCount: 0,
                message: `Index on ${target} already exists`,
            };
        }

        this.database.persist();

        return {
            columns: [],
            rows: [],
            rowCount: 0,
            message: `Index '${statement.indexName}' created on ${target} using ${statement.kind}`,
        };
    }

    private executeDropTable(statement: DropTableStatement): QueryResult {
        this.database.dropTable(statement.tableName);

        return {
            columns: [],
            rows: [],
            rowCount: 0,
            message: `Table '${statement.tableName}' dropped`,
        };
    }

    // ==========================================================================
    // HELPER METHODS
    // ==========================================================================

    /**
     * Slots of the live rows matching a WHERE condition, in scan order.
     */
    private matchingSlots(table: Table, where: Condition | undefined): number[] {
        const slotRows = table.scanSlots();
        if (!where) {
            return slotRows.map(({ slot }) => slot);
        }

        const predicate = this.createPredicate(scanTable(table), where);
        return slotRows.filter(({ row }) => predicate(expandRow(table, row.data))).map(({ slot }) => slot);
    }

    /**
     * Map a column reference to a row key: the name as written, else the
     * bare column name of a qualified reference.
     */
    private resolveKey(rowSet: RowSet, column: string): string {
        if (rowSet.keys.has(column)) {
            return column;
        }

        const dot = column.indexOf('.');
        if (dot !== -1 && rowSet.keys.has(column.slice(dot + 1))) {
            return column.slice(dot + 1);
        }

        throw SchemaError.columnNotFound(column);
    }

    /**
     * Create a predicate function from a WHERE condition.
     * Column references are resolved once, before any row is seen.
     */
    private createPredicate(rowSet: RowSet, condition: Condition): (row: RowData) => boolean {
        if (condition.type === 'LOGICAL') {
            const left = this.createPredicate(rowSet, condition.left);
            const right = this.createPredicate(rowSet, condition.right);

            // Both sides are always evaluated
            return condition.operator === 'AND'
                ? row => {
                      const l = left(row);
                      const r = right(row);
                      return l && r;
                  }
                : row => {
                      const l = left(row);
                      const r = right(row);
                      return l || r;
                  };
        }

        const key = this.resolveKey(rowSet, condition.column);
        const { operator, value } = condition;
        return row => compare(row[key], operator, value);
    }
}

/**
 * A text literal compared against a timestamp is read as a timestamp.
 */
function coerceLiteral(target: ValueType, literal: Value): Value {
    if (target === 'timestamp' && literal.type === 'text') {
        const epochMs = parseTimestamp(literal.value);
        if (epochMs !== undefined) {
            return timestampValue(epochMs);
        }
    }
    return literal;
}

/**
 * Evaluate `value operator literal`. Equality treats NULL as equal to NULL;
 * ordering comparisons are false for NULL and for values of different kinds.
 */
function compare(value: Value, operator: ComparisonOperator, literal: Value): boolean {
    const operand = coerceLiteral(value.type, literal);

    switch (operator) {
        case '=':
            return valuesEqual(value, operand);
        case '!=':
        case '<>':
            return !valuesEqual(value, operand);
        case '<':
            return ordered(value, operand, order => order < 0);
        case '>':
            return ordered(value, operand, order => order > 0);
        case '<=':
            return ordered(value, operand, order => order <= 0);
        case '>=':
            return ordered(value, operand, order => order >= 0);
    }
}

function ordered(value: Value, operand: Value, test: (order: number) => boolean): boolean {
    return isComparable(value, operand) && test(compareValues(value, operand));
}

function sortKey(value: Value): Value {
    return value.type === 'null' ? NULL_SORT_KEY : value;
}

function pluralRows(count: number): string {
    return `${count} ${count === 1 ? 'row' : 'rows'}`;
}
