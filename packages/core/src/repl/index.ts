/**
 * QuarryDB - Interactive REPL
 *
 * Provides a command-line interface for interacting with the database.
 *
 * Features:
 * - Multi-line SQL input (use semicolon to execute)
 * - Pretty-printed table results
 * - Special commands: .help, .tables, .schema, .stats, .export, .quit
 *
 * evaluate() turns one input line into the text to print, so the shell can
 * be driven without a terminal; start() wires it to readline.
 */

import * as readline from 'readline';
import { Database } from '../storage/Database';
import { QueryExecutor } from '../engine/QueryExecutor';
import { ExecutionOutcome, RowData } from '../types';
import { describeColumn } from '../schema/Column';
import { valueToText } from '../value/Value';
import { errorMessage } from '../errors';
import { VERSION } from '../config';

const HELP_TEXT = `QuarryDB REPL Commands:
  .help                  Show this help message
  .tables                List all tables
  .schema <table>        Show a table's definition and indexes
  .stats                 Show row counts and sizes
  .export <table> <file> Write a table to a CSV file
  .quit                  Exit the REPL

SQL Commands (end with semicolon):
  CREATE TABLE name (col TYPE[(n)] [PRIMARY KEY|UNIQUE|NOT NULL|DEFAULT v], ...);
  CREATE INDEX name ON table (col) [USING BTREE|HASH];
  DROP TABLE name;
  INSERT INTO name [(col, ...)] VALUES (val, ...);
  SELECT cols FROM table [[INNER|LEFT|RIGHT] JOIN t2 ON a = b]
         [WHERE cond] [ORDER BY col [ASC|DESC]] [LIMIT n];
  UPDATE table SET col = val, ... [WHERE cond];
  DELETE FROM table [WHERE cond];

Data Types: INT, FLOAT, VARCHAR(n), BOOLEAN, DATETIME`;

export interface REPLOptions {
    input?: NodeJS.ReadableStream;
    output?: NodeJS.WritableStream;
}

export class REPL {
    private database: Database;
    private executor: QueryExecutor;
    private buffer: string;
    private active: boolean;

    constructor(database: Database) {
        this.database = database;
        this.executor = new QueryExecutor(database);
        this.buffer = '';
        this.active = true;
    }

    /**
     * False once .quit has been entered.
     */
    isActive(): boolean {
        return this.active;
    }

    /**
     * Whether a statement is partly entered.
     */
    hasPendingInput(): boolean {
        return this.buffer.length > 0;
    }

    /**
     * Handle a line of input and return the text to print (possibly empty).
     */
    evaluate(line: string): string {
        const trimmed = line.trim();

        // Check for special commands
        if (!this.buffer && trimmed.startsWith('.')) {
            return this.handleCommand(trimmed);
        }

        if (!this.buffer && !trimmed) {
            return '';
        }

        // Accumulate SQL
        this.buffer += (this.buffer ? '\n' : '') + line;

        // Check if statement is complete (ends with semicolon)
        if (!this.buffer.trim().endsWith(';')) {
            return '';
        }

        const sql = this.buffer.trim();
        this.buffer = '';

        if (sql === ';') {
            return '';
        }

        const startTime = Date.now();
        const result = this.executor.tryExecute(sql);
        return formatOutcome(result, Date.now() - startTime);
    }

    /**
     * Run the shell on a terminal until .quit or end of input.
     */
    start(options: REPLOptions = {}): Promise<void> {
        const output = options.output ?? process.stdout;
        const rl = readline.createInterface({
            input: options.input ?? process.stdin,
            output,
        });
        const print = (text: string) => {
            output.write(`${text}\n`);
        };

        print(`QuarryDB ${VERSION} - database '${this.database.getName()}'`);
        print('Type .help for commands, or enter SQL ending with ;');

        const prompt = () => {
            rl.setPrompt(this.buffer ? '...> ' : 'sql> ');
            rl.prompt();
        };

        return new Promise(resolve => {
            rl.on('line', line => {
                const text = this.evaluate(line);
                if (text) {
                    print(text);
                }
                if (this.active) {
                    prompt();
                } else {
                    rl.close();
                }
            });

            rl.on('close', () => {
                this.active = false;
                resolve();
            });

            prompt();
        });
    }

    // ==========================================================================
    // META-COMMANDS
    // ==========================================================================

    private handleCommand(command: string): string {
        const parts = command.split(/\s+/);
        const cmd = parts[0].toLowerCase();
        const args = parts.slice(1);

        try {
            switch (cmd) {
                case '.help':
                    return HELP_TEXT;
                case '.tables':
                    return this.listTables();
                case '.schema':
                    return args[0] ? this.showSchema(args[0]) : 'Usage: .schema <table>';
                case '.stats':
                    return this.showStats();
                case '.export':
                    return args.length === 2 ? this.exportTable(args[0], args[1]) : 'Usage: .export <table> <file>';
                case '.quit':
                case '.exit':
                    this.active = false;
                    return 'Goodbye!';
                default:
                    return `Unknown command: ${cmd}. Type .help for available commands.`;
            }
        } catch (error) {
            return `❌ Error: ${errorMessage(error)}`;
        }
    }

    private listTables(): string {
        const names = this.database.listTables();
        return names.length === 0 ? '(no tables)' : names.join('\n');
    }

    private showSchema(tableName: string): string {
        const table = this.database.requireTable(tableName);
        const columns = table.getColumns().map(column => `  ${describeColumn(column)}`);

        const lines = [`CREATE TABLE ${tableName} (`, columns.join(',\n'), ');'];
        for (const index of table.listIndexes()) {
            lines.push(`-- ${index.kind} index on ${index.column} (${index.size} entries)`);
        }
        return lines.join('\n');
    }

    private showStats(): string {
        const stats = this.database.getStats();
        const lines = [`Database: ${stats.name}`, `Tables: ${stats.tableCount}`];
        for (const [name, table] of Object.entries(stats.tables)) {
            lines.push(
                `  ${name}: ${table.columns} columns, ${table.rows} rows, ${table.indexes} indexes, ${table.sizeKb} KB`
            );
        }
        return lines.join('\n');
    }

    private exportTable(tableName: string, file: string): string {
        const count = this.database.exportTableCsv(tableName, file);
        return `✓ Exported ${count} row(s) from ${tableName} to ${file}`;
    }
}

// =============================================================================
// FORMATTING
// =============================================================================

/**
 * Render an execution outcome the way the shell prints it.
 */
export function formatOutcome(result: ExecutionOutcome, elapsed: number): string {
    if (!result.success) {
        return `❌ Error: ${result.error}`;
    }

    if (result.columns.length > 0) {
        return `${formatTable(result.rows, result.columns)}\n✓ ${result.rowCount} row(s) returned (${elapsed}ms)`;
    }

    return `✓ ${result.message ?? 'Query executed'} (${elapsed}ms)`;
}

/**
 * Render rows as a box-drawn text table.
 */
export function formatTable(rows: RowData[], columns: string[]): string {
    if (rows.length === 0) {
        return '(empty result set)';
    }

    const cells = rows.map(row => columns.map(column => (row[column] ? valueToText(row[column]) : 'NULL')));
    const widths = columns.map((column, i) => Math.max(column.length, ...cells.map(cell => cell[i].length)));

    const border = (left: string, middle: string, right: string) =>
        left + widths.map(width => '─'.repeat(width + 2)).join(middle) + right;
    const line = (values: string[]) => '│' + values.map((value, i) => ` ${value.padEnd(widths[i])} `).join('│') + '│';

    return [
        border('┌', '┬', '┐'),
        line(columns),
        border('├', '┼', '┤'),
        ...cells.map(line),
        border('└', '┴', '┘'),
    ].join('\n');
}
