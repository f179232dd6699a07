/**
 * QuarryDB - Storage Module
 *
 * Exports all storage-related classes.
 */

export { Table } from './Table';
export type { SlotRow, TableOptions } from './Table';
export { Database } from './Database';
export type { DatabaseOptions } from './Database';
export { SNAPSHOT_VERSION, parseSnapshot, snapshotSchema } from './snapshot';
