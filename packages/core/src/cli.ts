#!/usr/bin/env node
/**
 * QuarryDB - Command Line Entry Point
 *
 * Usage:
 *   quarrydb [--name <name>] [--data-dir <dir>] [--memory] [--btree-order <n>]
 *   quarrydb --execute "SELECT * FROM users;"
 *
 * Options override QUARRYDB_* environment variables, which override the
 * defaults in config.ts. Without --execute an interactive shell starts.
 */

import { Command, InvalidArgumentError } from 'commander';
import { Database } from './storage/Database';
import { QueryExecutor } from './engine/QueryExecutor';
import { REPL, formatOutcome } from './repl';
import { QuarryConfig, VERSION, resolveConfig } from './config';
import { errorMessage } from './errors';

export interface CliOptions {
    name?: string;
    dataDir?: string;
    memory?: boolean;
    btreeOrder?: number;
    execute?: string;
}

function parseOrder(raw: string): number {
    const order = Number(raw);
    if (!Number.isInteger(order) || order < 2) {
        throw new InvalidArgumentError('must be an integer >= 2');
    }
    return order;
}

/**
 * Build the database a CLI invocation asks for.
 */
export function openDatabase(options: CliOptions, env: NodeJS.ProcessEnv = process.env): Database {
    const overrides: Partial<QuarryConfig> = {
        name: options.name,
        dataDir: options.dataDir,
        btreeOrder: options.btreeOrder,
    };
    const config = resolveConfig(overrides, env);

    return new Database({
        name: config.name,
        dataDir: options.memory ? undefined : config.dataDir,
        btreeOrder: config.btreeOrder,
    });
}

export function createProgram(): Command {
    const program = new Command();

    program
        .name('quarrydb')
        .description('Embeddable relational database with a SQL shell')
        .version(VERSION)
        .option('-n, --name <name>', 'database name (snapshot file name)')
        .option('-d, --data-dir <dir>', 'directory holding snapshots')
        .option('--memory', 'keep the database in memory only')
        .option('--btree-order <n>', 'order of new B-tree indexes', parseOrder)
        .option('-e, --execute <sql>', 'run one statement, print the result and exit')
        .action(async () => {
            const options = program.opts<CliOptions>();
            const database = openDatabase(options);

            if (options.execute !== undefined) {
                const startTime = Date.now();
                const result = new QueryExecutor(database).tryExecute(options.execute);
                console.log(formatOutcome(result, Date.now() - startTime));
                if (!result.success) {
                    process.exitCode = 1;
                }
                return;
            }

            await new REPL(database).start();
        });

    return program;
}

// Main entry point
if (require.main === module) {
    createProgram()
        .parseAsync(process.argv)
        .catch((error: unknown) => {
            console.error(`quarrydb: ${errorMessage(error)}`);
            process.exitCode = 1;
        });
}
