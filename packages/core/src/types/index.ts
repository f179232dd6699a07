/**
 * QuarryDB - Core Type Definitions
 *
 * This module defines the fundamental types used throughout QuarryDB:
 * scalar values, schema definitions, the statement AST, query results
 * and the serialized snapshot shapes.
 */

// =============================================================================
// VALUES
// =============================================================================

/**
 * Supported column data types.
 * - INT: Integer numbers
 * - FLOAT: Floating point numbers
 * - VARCHAR: Text, optionally bounded by a maximum length
 * - BOOLEAN: true/false
 * - DATETIME: A point in time with second precision (UTC)
 */
export type DataType = 'INT' | 'FLOAT' | 'VARCHAR' | 'BOOLEAN' | 'DATETIME';

export interface NullValue {
    type: 'null';
}

export interface IntValue {
    type: 'int';
    value: number;
}

export interface FloatValue {
    type: 'float';
    value: number;
}

export interface TextValue {
    type: 'text';
    value: string;
}

export interface BoolValue {
    type: 'bool';
    value: boolean;
}

/**
 * Timestamps are held as milliseconds since the Unix epoch (UTC).
 */
export interface TimestampValue {
    type: 'timestamp';
    value: number;
}

/**
 * The canonical scalar domain for every stored and compared value.
 */
export type Value =
    | NullValue
    | IntValue
    | FloatValue
    | TextValue
    | BoolValue
    | TimestampValue;

export type ValueType = Value['type'];

/**
 * A mapping from column name to value.
 * Joined rows carry both `table.column` and bare `column` keys.
 */
export type RowData = Record<string, Value>;

/**
 * A stored row. The rowId is assigned once and never reused.
 */
export interface Row {
    rowId: number;
    data: RowData;
}

/**
 * A position in a table's append-only row storage.
 * Deleted rows become tombstones; the position is never reused.
 */
export type RowSlot =
    | { state: 'live'; row: Row }
    | { state: 'tombstone' };

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

/**
 * Defines a single column in a table schema.
 */
export interface ColumnDefinition {
    name: string;
    type: DataType;
    /** Maximum length, VARCHAR only */
    length?: number;
    nullable: boolean;
    primaryKey: boolean;
    unique: boolean;
    /** A null default means "no default" */
    defaultValue: Value;
}

export type IndexKind = 'BTREE' | 'HASH';

// =============================================================================
// STATEMENTS
// =============================================================================

export type StatementType =
    | 'SELECT'
    | 'INSERT'
    | 'UPDATE'
    | 'DELETE'
    | 'CREATE_TABLE'
    | 'CREATE_INDEX'
    | 'DROP_TABLE';

export type ComparisonOperator = '=' | '!=' | '<>' | '<' | '>' | '<=' | '>=';

export type LogicalOperator = 'AND' | 'OR';

/**
 * WHERE clause condition tree.
 * Built left-associative; AND and OR share one precedence level.
 */
export type Condition =
    | {
          type: 'LOGICAL';
          operator: LogicalOperator;
          left: Condition;
          right: Condition;
      }
    | {
          type: 'COMPARISON';
          column: string;
          operator: ComparisonOperator;
          value: Value;
      };

export type JoinType = 'INNER' | 'LEFT' | 'RIGHT';

/**
 * JOIN clause specification. Operands may be qualified ("orders.user_id")
 * or bare ("user_id").
 */
export interface JoinClause {
    type: JoinType;
    table: string;
    leftColumn: string;
    rightColumn: string;
}

export type SortDirection = 'ASC' | 'DESC';

export interface OrderByClause {
    column: string;
    direction: SortDirection;
}

export interface SelectStatement {
    type: 'SELECT';
    columns: string[] | '*';
    tableName: string;
    joins: JoinClause[];
    where?: Condition;
    orderBy?: OrderByClause;
    limit?: number;
}

export interface InsertStatement {
    type: 'INSERT';
    tableName: string;
    /** Absent when the statement maps values positionally */
    columns?: string[];
    values: Value[];
}

export interface UpdateStatement {
    type: 'UPDATE';
    tableName: string;
    set: Record<string, Value>;
    where?: Condition;
}

export interface DeleteStatement {
    type: 'DELETE';
    tableName: string;
    where?: Condition;
}

export interface CreateTableStatement {
    type: 'CREATE_TABLE';
    tableName: string;
    columns: ColumnDefinition[];
}

export interface CreateIndexStatement {
    type: 'CREATE_INDEX';
    indexName: string;
    tableName: string;
    columnName: string;
    kind: IndexKind;
}

export interface DropTableStatement {
    type: 'DROP_TABLE';
    tableName: string;
}

/**
 * Union of all possible parsed statements.
 */
export type Statement =
    | SelectStatement
    | InsertStatement
    | UpdateStatement
    | DeleteStatement
    | CreateTableStatement
    | CreateIndexStatement
    | DropTableStatement;

// =============================================================================
// QUERY RESULTS
// =============================================================================

/**
 * Result of a successfully executed statement.
 * rowCount is always rows.length; affectedRows is set for writes.
 */
export interface QueryResult {
    columns: string[];
    rows: RowData[];
    rowCount: number;
    message?: string;
    affectedRows?: number;
}

export interface QuerySuccess extends QueryResult {
    success: true;
}

export interface QueryFailure {
    success: false;
    error: string;
    code: string;
}

export type ExecutionOutcome = QuerySuccess | QueryFailure;

// =============================================================================
// SNAPSHOT TYPES
// =============================================================================

export interface SerializedBTreeIndex {
    columnName: string;
    order: number;
    size: number;
    entries: Array<[Value, number]>;
}

export interface SerializedHashIndex {
    columnName: string;
    /** Keyed by the index's internal hash key */
    index: Record<string, { key: Value; slots: number[] }>;
}

export type SerializedIndex = SerializedBTreeIndex | SerializedHashIndex;

export interface SerializedRow {
    rowId: number;
    data: RowData;
}

export interface SerializedTable {
    name: string;
    columns: ColumnDefinition[];
    columnOrder: string[];
    /** null marks a tombstoned slot */
    rows: Array<SerializedRow | null>;
    indexes: Record<string, SerializedIndex>;
    nextRowId: number;
}

export interface SerializedDatabase {
    version: string;
    name: string;
    createdAt: string;
    updatedAt: string;
    tables: Record<string, SerializedTable>;
}

// =============================================================================
// STATISTICS
// =============================================================================

export interface TableStats {
    columns: number;
    rows: number;
    indexes: number;
    sizeKb: number;
}

export interface DatabaseStats {
    name: string;
    tableCount: number;
    tables: Record<string, TableStats>;
}
