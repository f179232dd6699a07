import { describe, it, expect, beforeEach, vi } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { PassThrough } from 'stream';
import { REPL, formatOutcome, formatTable } from '../repl';
import { Database } from '../storage/Database';
import { NULL, intValue, textValue } from '../value/Value';
import { makeTempDir } from './helpers';

describe('REPL', () => {
    let repl: REPL;

    beforeEach(() => {
        repl = new REPL(new Database());
    });

    describe('SQL input', () => {
        it('should ignore blank lines', () => {
            expect(repl.evaluate('   ')).toBe('');
            expect(repl.hasPendingInput()).toBe(false);
        });

        it('should buffer statements until a semicolon', () => {
            expect(repl.evaluate('CREATE TABLE users (id INT PRIMARY KEY,')).toBe('');
            expect(repl.hasPendingInput()).toBe(true);

            const output = repl.evaluate('  name VARCHAR(20) NOT NULL);');
            expect(output).toMatch(/^✓ Table 'users' created \(\d+ms\)$/);
            expect(repl.hasPendingInput()).toBe(false);
        });

        it('should print query results as a table', () => {
            repl.evaluate('CREATE TABLE users (id INT PRIMARY KEY, name VARCHAR(20) NOT NULL);');
            repl.evaluate("INSERT INTO users VALUES (1, 'Ada');");

            const lines = repl.evaluate('SELECT * FROM users;').split('\n');

            expect(lines.slice(0, 5)).toEqual([
                '┌────┬──────┐',
                '│ id │ name │',
                '├────┼──────┤',
                '│ 1  │ Ada  │',
                '└────┴──────┘',
            ]);
            expect(lines[5]).toMatch(/^✓ 1 row\(s\) returned \(\d+ms\)$/);
        });

        it('should print errors without stopping', () => {
            expect(repl.evaluate('SELECT * FROM nope;')).toBe("❌ Error: Table 'nope' does not exist");
            expect(repl.isActive()).toBe(true);
        });

        it('should treat a dot line inside a statement as SQL', () => {
            repl.evaluate('SELECT *');
            expect(repl.evaluate('.tables')).toBe('');
            expect(repl.hasPendingInput()).toBe(true);
        });
    });

    describe('meta-commands', () => {
        beforeEach(() => {
            repl.evaluate('CREATE TABLE users (id INT PRIMARY KEY, name VARCHAR(20) NOT NULL);');
            repl.evaluate("INSERT INTO users VALUES (1, 'Ada');");
        });

        it('should show help', () => {
            expect(repl.evaluate('.help')).toMatch(/^QuarryDB REPL Commands:/);
        });

        it('should list tables', () => {
            expect(repl.evaluate('.tables')).toBe('users');
            expect(new REPL(new Database()).evaluate('.tables')).toBe('(no tables)');
        });

        it('should show a table definition with its indexes', () => {
            expect(repl.evaluate('.schema users')).toBe(
                [
                    'CREATE TABLE users (',
                    '  id INT PRIMARY KEY NOT NULL,',
                    '  name VARCHAR(20) NOT NULL',
                    ');',
                    '-- BTREE index on id (1 entries)',
                ].join('\n')
            );
        });

        it('should explain .schema misuse', () => {
            expect(repl.evaluate('.schema')).toBe('Usage: .schema <table>');
            expect(repl.evaluate('.schema ghosts')).toBe("❌ Error: Table 'ghosts' does not exist");
        });

        it('should show statistics', () => {
            const lines = repl.evaluate('.stats').split('\n');

            expect(lines.slice(0, 2)).toEqual(['Database: default', 'Tables: 1']);
            expect(lines[2]).toMatch(/^ {2}users: 2 columns, 1 rows, 1 indexes, [\d.]+ KB$/);
        });

        it('should export a table to CSV', () => {
            const dir = makeTempDir();
            try {
                const file = path.join(dir, 'users.csv');
                expect(repl.evaluate(`.export users ${file}`)).toBe(`✓ Exported 1 row(s) from users to ${file}`);
                expect(fs.readFileSync(file, 'utf-8')).toBe('id,name\n1,Ada\n');
            } finally {
                fs.rmSync(dir, { recursive: true, force: true });
            }
        });

        it('should explain .export misuse', () => {
            expect(repl.evaluate('.export users')).toBe('Usage: .export <table> <file>');
        });

        it('should reject unknown commands', () => {
            expect(repl.evaluate('.frobnicate')).toBe('Unknown command: .frobnicate. Type .help for available commands.');
        });

        it('should stop on .quit and .exit', () => {
            expect(repl.evaluate('.QUIT')).toBe('Goodbye!');
            expect(repl.isActive()).toBe(false);
            expect(new REPL(new Database()).evaluate('.exit')).toBe('Goodbye!');
        });
    });

    describe('start', () => {
        it('should read lines from the input stream and write to the output stream', async () => {
            const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
            try {
                const input = new PassThrough();
                const output = new PassThrough();
                const written: string[] = [];
                output.on('data', (chunk: Buffer) => written.push(chunk.toString()));

                const finished = repl.start({ input, output });
                input.end('.tables\n.quit\n');
                await finished;
                await new Promise(resolve => setImmediate(resolve));

                expect(written.join('').replace(/sql> /g, '').split('\n')).toEqual([
                    "QuarryDB 0.1.0 - database 'default'",
                    'Type .help for commands, or enter SQL ending with ;',
                    '(no tables)',
                    'Goodbye!',
                    '',
                ]);
                expect(log).not.toHaveBeenCalled();
                expect(repl.isActive()).toBe(false);
            } finally {
                log.mockRestore();
            }
        });

        it('should finish when the input ends', async () => {
            const input = new PassThrough();
            const finished = repl.start({ input, output: new PassThrough() });
            input.end();
            await finished;

            expect(repl.isActive()).toBe(false);
        });
    });
});

describe('formatTable', () => {
    it('should report an empty result', () => {
        expect(formatTable([], ['id'])).toBe('(empty result set)');
    });

    it('should pad every column to its widest value', () => {
        const rows = [
            { id: intValue(7), label: textValue('x') },
            { id: intValue(1234), label: NULL },
        ];

        expect(formatTable(rows, ['id', 'label'])).toBe(
            [
                '┌──────┬───────┐',
                '│ id   │ label │',
                '├──────┼───────┤',
                '│ 7    │ x     │',
                '│ 1234 │ NULL  │',
                '└──────┴───────┘',
            ].join('\n')
        );
    });
});

describe('formatOutcome', () => {
    it('should print failures', () => {
        expect(formatOutcome({ success: false, error: 'boom', code: 'UNKNOWN' }, 0)).toBe('❌ Error: boom');
    });

    it('should print the message of a statement without columns', () => {
        const base = { success: true as const, columns: [], rows: [], rowCount: 0 };

        expect(formatOutcome({ ...base, message: "Table 't' created" }, 3)).toBe("✓ Table 't' created (3ms)");
        expect(formatOutcome(base, 0)).toBe('✓ Query executed (0ms)');
    });

    it('should print an empty result set with its count', () => {
        expect(formatOutcome({ success: true, columns: ['id'], rows: [], rowCount: 0 }, 1)).toBe(
            '(empty result set)\n✓ 0 row(s) returned (1ms)'
        );
    });
});
