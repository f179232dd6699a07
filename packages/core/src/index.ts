/**
 * QuarryDB - An Embeddable Relational Database Engine
 *
 * This is the main entry point for the QuarryDB core package.
 * It exports all public APIs for use by other packages or applications.
 *
 * @packageDocumentation
 */

import { Database, DatabaseOptions } from './storage/Database';
import { QueryExecutor } from './engine/QueryExecutor';

// Types
export * from './types';

// Errors & configuration
export * from './errors';
export { DEFAULT_CONFIG, VERSION, configFromEnv, resolveConfig } from './config';
export type { EnvSource, QuarryConfig } from './config';

// Values & columns
export * from './value/Value';
export { DATA_TYPE_NAMES, convertValue, createColumn, describeColumn, validateValue } from './schema/Column';

// Storage
export { Database, Table, SNAPSHOT_VERSION, parseSnapshot, snapshotSchema } from './storage';
export type { DatabaseOptions, SlotRow, TableOptions } from './storage';

// Indexing
export { BTreeIndex, DEFAULT_BTREE_ORDER } from './index/BTreeIndex';
export { HashIndex } from './index/HashIndex';
export { createIndex, deserializeIndex } from './index/TableIndex';
export type { TableIndex } from './index/TableIndex';

// Parser
export { Parser, Tokenizer, parseSql, tokenize } from './parser';
export type { Token, TokenType } from './parser';

// Engine
export { QueryExecutor } from './engine/QueryExecutor';

// Join
export { expandRow, joinTable, parseColumnRef, scanTable } from './join/JoinEngine';
export type { RowSet } from './join/JoinEngine';

// REPL
export { REPL, formatOutcome, formatTable } from './repl';
export type { REPLOptions } from './repl';

/**
 * Create a database with a query executor bound to it.
 * Without a dataDir the database lives in memory only.
 */
export function createDatabase(options: DatabaseOptions = {}): { database: Database; executor: QueryExecutor } {
    const database = new Database(options);
    const executor = new QueryExecutor(database);

    return { database, executor };
}
