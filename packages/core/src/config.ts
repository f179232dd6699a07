/**
 * QuarryDB - Configuration
 *
 * Defaults, environment variables and explicit overrides, layered in that
 * order (later wins).
 *
 * Environment variables:
 * - QUARRYDB_NAME: database name, also the snapshot file name
 * - QUARRYDB_DATA_DIR: directory holding snapshots
 * - QUARRYDB_BTREE_ORDER: order of newly created B-tree indexes
 */

import { DEFAULT_BTREE_ORDER } from './index/BTreeIndex';

export const VERSION = '0.1.0';

export interface QuarryConfig {
    name: string;
    /** Snapshot directory; undefined keeps the database in memory */
    dataDir?: string;
    btreeOrder: number;
}

export const DEFAULT_CONFIG: Readonly<QuarryConfig> = Object.freeze({
    name: 'default',
    dataDir: 'data',
    btreeOrder: DEFAULT_BTREE_ORDER,
});

export type EnvSource = Record<string, string | undefined>;

function parseOrder(raw: string | undefined): number | undefined {
    if (raw === undefined || raw.trim() === '') {
        return undefined;
    }
    const order = Number(raw);
    if (!Number.isInteger(order) || order < 2) {
        throw new RangeError(`QUARRYDB_BTREE_ORDER must be an integer >= 2, got '${raw}'`);
    }
    return order;
}

/**
 * Read configuration values from environment variables.
 * Unset variables are left out so they do not override anything.
 */
export function configFromEnv(env: EnvSource = process.env): Partial<QuarryConfig> {
    const config: Partial<QuarryConfig> = {};

    if (env.QUARRYDB_NAME) {
        config.name = env.QUARRYDB_NAME;
    }
    if (env.QUARRYDB_DATA_DIR) {
        config.dataDir = env.QUARRYDB_DATA_DIR;
    }
    const order = parseOrder(env.QUARRYDB_BTREE_ORDER);
    if (order !== undefined) {
        config.btreeOrder = order;
    }

    return config;
}

/**
 * Merge defaults, environment and overrides into a frozen configuration.
 * Undefined override values never replace an existing value.
 */
export function resolveConfig(overrides: Partial<QuarryConfig> = {}, env: EnvSource = process.env): Readonly<QuarryConfig> {
    const result: QuarryConfig = { ...DEFAULT_CONFIG };

    for (const layer of [configFromEnv(env), overrides]) {
        if (layer.name !== undefined) result.name = layer.name;
        if (layer.dataDir !== undefined) result.dataDir = layer.dataDir;
        if (layer.btreeOrder !== undefined) result.btreeOrder = layer.btreeOrder;
    }

    return Object.freeze(result);
}
