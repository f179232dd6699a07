/**
 * QuarryDB - Database Storage
 *
 * Main database class that manages multiple tables and provides
 * persistence capabilities.
 *
 * Design decisions:
 * - Tables are stored in a Map for O(1) lookup by name (case-sensitive)
 * - A database opened with a dataDir snapshots to <dataDir>/<name>.json and
 *   loads that file at construction when it exists; without one it is
 *   memory-only
 * - Saves write <name>.tmp and rename it over the snapshot, so the file on
 *   disk is always a complete snapshot
 * - Catalog changes (create/drop table) persist immediately
 */

import * as fs from 'fs';
import * as path from 'path';
import { Table } from './Table';
import { parseSnapshot, SNAPSHOT_VERSION } from './snapshot';
import { ColumnDefinition, DatabaseStats, SerializedDatabase, TableStats } from '../types';
import { ErrorCode, SchemaError, StorageError, errorMessage } from '../errors';
import { validateValue } from '../schema/Column';
import { DEFAULT_BTREE_ORDER } from '../index/BTreeIndex';
import { valueToText } from '../value/Value';
import { QuarryConfig } from '../config';

export type DatabaseOptions = Partial<QuarryConfig>;

export class Database {
    private tables: Map<string, Table>;
    private name: string;
    private dataDir?: string;
    private btreeOrder: number;
    private createdAt: string;

    constructor(options: DatabaseOptions = {}) {
        this.name = options.name ?? 'default';
        this.dataDir = options.dataDir;
        this.btreeOrder = options.btreeOrder ?? DEFAULT_BTREE_ORDER;
        this.tables = new Map();
        this.createdAt = new Date().toISOString();

        if (this.dataDir !== undefined) {
            try {
                fs.mkdirSync(this.dataDir, { recursive: true });
            } catch (error) {
                throw new StorageError(
                    `Cannot create data directory ${this.dataDir}: ${errorMessage(error)}`,
                    ErrorCode.IO_ERROR,
                    { path: this.dataDir }
                );
            }
            this.load();
        }
    }

    /**
     * Get the database name.
     */
    getName(): string {
        return this.name;
    }

    /**
     * Path of the snapshot file, undefined for a memory-only database.
     */
    getSnapshotPath(): string | undefined {
        return this.dataDir === undefined ? undefined : path.join(this.dataDir, `${this.name}.json`);
    }

    // ==========================================================================
    // CATALOG
    // ==========================================================================

    /**
     * Create a new table and persist the catalog.
     */
    createTable(name: string, columns: ColumnDefinition[]): Table {
        if (this.tables.has(name)) {
            throw new SchemaError(`Table '${name}' already exists`, ErrorCode.TABLE_EXISTS, { table: name });
        }

        if (columns.length === 0) {
            throw new SchemaError(`Table '${name}' must have at least one column`, ErrorCode.EMPTY_TABLE, {
                table: name,
            });
        }

        const columnNames = new Set<string>();
        for (const column of columns) {
            if (columnNames.has(column.name)) {
                throw new SchemaError(`Duplicate column name: '${column.name}'`, ErrorCode.DUPLICATE_COLUMN, {
                    table: name,
                    column: column.name,
                });
            }
            columnNames.add(column.name);
        }

        if (columns.filter(column => column.primaryKey).length > 1) {
            throw new SchemaError(
                `Table '${name}' declares more than one PRIMARY KEY column`,
                ErrorCode.MULTIPLE_PRIMARY_KEYS,
                { table: name }
            );
        }

        // Defaults are stored in their converted form
        const definitions = columns.map(column =>
            column.defaultValue.type === 'null'
                ? { ...column }
                : { ...column, defaultValue: validateValue(column, column.defaultValue) }
        );

        const table = new Table(name, definitions, { btreeOrder: this.btreeOrder });
        this.tables.set(name, table);
        this.persist();

        return table;
    }

    /**
     * Drop a table and persist the catalog.
     */
    dropTable(name: string): void {
        if (!this.tables.delete(name)) {
            throw SchemaError.tableNotFound(name);
        }
        this.persist();
    }

    /**
     * Get a table by name.
     */
    getTable(name: string): Table | undefined {
        return this.tables.get(name);
    }

    /**
     * Get a table by name, failing when it does not exist.
     */
    requireTable(name: string): Table {
        const table = this.tables.get(name);
        if (!table) {
            throw SchemaError.tableNotFound(name);
        }
        return table;
    }

    /**
     * Check if a table exists.
     */
    tableExists(name: string): boolean {
        return this.tables.has(name);
    }

    /**
     * Get all table names, in creation order.
     */
    listTables(): string[] {
        return Array.from(this.tables.keys());
    }

    // ==========================================================================
    // PERSISTENCE
    // ==========================================================================

    serialize(): SerializedDatabase {
        const tables: SerializedDatabase['tables'] = {};
        for (const [name, table] of this.tables) {
            tables[name] = table.serialize();
        }

        return {
            version: SNAPSHOT_VERSION,
            name: this.name,
            createdAt: this.createdAt,
            updatedAt: new Date().toISOString(),
            tables,
        };
    }

    /**
     * Write the whole catalog to the snapshot file.
     */
    save(): void {
        const snapshotPath = this.getSnapshotPath();
        if (this.dataDir === undefined || snapshotPath === undefined) {
            throw new StorageError('No persistence path specified', ErrorCode.NO_SNAPSHOT_PATH);
        }

        const stagingPath = path.join(this.dataDir, `${this.name}.tmp`);
        const content = JSON.stringify(this.serialize(), null, 2);

        try {
            fs.writeFileSync(stagingPath, content);
            fs.renameSync(stagingPath, snapshotPath);
        } catch (error) {
            throw new StorageError(`Failed to save ${snapshotPath}: ${errorMessage(error)}`, ErrorCode.IO_ERROR, {
                path: snapshotPath,
            });
        }
    }

    /**
     * Save when a snapshot path is configured; a memory-only database
     * does nothing.
     */
    persist(): void {
        if (this.dataDir !== undefined) {
            this.save();
        }
    }

    /**
     * Replace the catalog with the snapshot on disk.
     * Returns false when there is no snapshot yet.
     */
    load(): boolean {
        const snapshotPath = this.getSnapshotPath();
        if (snapshotPath === undefined) {
            throw new StorageError('No persistence path specified', ErrorCode.NO_SNAPSHOT_PATH);
        }

        if (!fs.existsSync(snapshotPath)) {
            return false;
        }

        let content: string;
        try {
            content = fs.readFileSync(snapshotPath, 'utf-8');
        } catch (error) {
            throw new StorageError(`Failed to read ${snapshotPath}: ${errorMessage(error)}`, ErrorCode.IO_ERROR, {
                path: snapshotPath,
            });
        }

        const snapshot = parseSnapshot(content, snapshotPath);

        if (snapshot.version !== SNAPSHOT_VERSION) {
            console.warn(
                `Warning: Database version mismatch. File: ${snapshot.version}, Current: ${SNAPSHOT_VERSION}`
            );
        }

        const tables = new Map<string, Table>();
        for (const [name, tableData] of Object.entries(snapshot.tables)) {
            tables.set(name, Table.deserialize(tableData, { btreeOrder: this.btreeOrder }));
        }

        this.tables = tables;
        this.createdAt = snapshot.createdAt;
        return true;
    }

    // ==========================================================================
    // STATISTICS & EXPORT
    // ==========================================================================

    /**
     * Get database statistics.
     */
    getStats(): DatabaseStats {
        const tables: Record<string, TableStats> = {};
        for (const [name, table] of this.tables) {
            const bytes = Buffer.byteLength(JSON.stringify(table.serialize()));
            tables[name] = {
                columns: table.getColumns().length,
                rows: table.count(),
                indexes: table.listIndexes().length,
                sizeKb: Math.round((bytes / 1024) * 100) / 100,
            };
        }
        return {
            name: this.name,
            tableCount: this.tables.size,
            tables,
        };
    }

    /**
     * Write a table's live rows as CSV with a header line.
     * NULL becomes an empty field. Returns the number of rows written.
     */
    exportTableCsv(tableName: string, outputFile: string): number {
        const table = this.requireTable(tableName);
        const columns = table.getColumnOrder();

        const lines = [columns.map(csvField).join(',')];
        const rows = table.scan();
        for (const row of rows) {
            lines.push(
                columns
                    .map(column => {
                        const value = row.data[column];
                        return csvField(value.type === 'null' ? '' : valueToText(value));
                    })
                    .join(',')
            );
        }

        try {
            fs.writeFileSync(outputFile, lines.join('\n') + '\n');
        } catch (error) {
            throw new StorageError(`Failed to export ${outputFile}: ${errorMessage(error)}`, ErrorCode.IO_ERROR, {
                path: outputFile,
            });
        }

        return rows.length;
    }
}

// =============================================================================
// HELPER METHODS
// =============================================================================

function csvField(text: string): string {
    return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}
