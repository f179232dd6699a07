/**
 * QuarryDB - Snapshot Schema
 *
 * zod schema for the snapshot document written by Database.save().
 * Loading validates against it before any table is rebuilt.
 */

import { z } from 'zod';
import { SerializedDatabase } from '../types';
import { ErrorCode, StorageError, errorMessage } from '../errors';

export const SNAPSHOT_VERSION = '1.0.0';

const valueSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('null') }),
    z.object({ type: z.literal('int'), value: z.number().int() }),
    z.object({ type: z.literal('float'), value: z.number() }),
    z.object({ type: z.literal('text'), value: z.string() }),
    z.object({ type: z.literal('bool'), value: z.boolean() }),
    z.object({ type: z.literal('timestamp'), value: z.number() }),
]);

const columnSchema = z.object({
    name: z.string().min(1),
    type: z.enum(['INT', 'FLOAT', 'VARCHAR', 'BOOLEAN', 'DATETIME']),
    length: z.number().int().nonnegative().optional(),
    nullable: z.boolean(),
    primaryKey: z.boolean(),
    unique: z.boolean(),
    defaultValue: valueSchema,
});

const slotSchema = z.number().int().nonnegative();

const btreeIndexSchema = z.object({
    columnName: z.string(),
    order: z.number().int().min(2),
    size: z.number().int().nonnegative(),
    entries: z.array(z.tuple([valueSchema, slotSchema])),
});

const hashIndexSchema = z.object({
    columnName: z.string(),
    index: z.record(z.string(), z.object({ key: valueSchema, slots: z.array(slotSchema) })),
});

const tableSchema = z.object({
    name: z.string().min(1),
    columns: z.array(columnSchema).min(1),
    columnOrder: z.array(z.string()),
    rows: z.array(
        z
            .object({
                rowId: z.number().int(),
                data: z.record(z.string(), valueSchema),
            })
            .nullable()
    ),
    indexes: z.record(z.string(), z.union([btreeIndexSchema, hashIndexSchema])),
    nextRowId: z.number().int(),
});

export const snapshotSchema = z.object({
    version: z.string(),
    name: z.string(),
    createdAt: z.string(),
    updatedAt: z.string(),
    tables: z.record(z.string(), tableSchema),
});

/**
 * Parse and validate snapshot file contents.
 */
export function parseSnapshot(content: string, source: string): SerializedDatabase {
    let raw: unknown;
    try {
        raw = JSON.parse(content);
    } catch (error) {
        throw new StorageError(
            `Snapshot ${source} is not valid JSON: ${errorMessage(error)}`,
            ErrorCode.CORRUPTED_SNAPSHOT,
            { path: source }
        );
    }

    const result = snapshotSchema.safeParse(raw);
    if (!result.success) {
        const issue = result.error.issues[0];
        const location = issue && issue.path.length > 0 ? issue.path.join('.') : '(root)';
        throw new StorageError(
            `Snapshot ${source} is invalid at ${location}: ${issue ? issue.message : 'unknown error'}`,
            ErrorCode.CORRUPTED_SNAPSHOT,
            { path: source, location }
        );
    }

    return result.data;
}
