import { describe, it, expect } from 'vitest';
import { Tokenizer, tokenize } from '../parser/Tokenizer';
import { ErrorCode, SqlSyntaxError } from '../errors';
import { catchError } from './helpers';

function pairs(sql: string): Array<[string, string]> {
    return tokenize(sql).map(token => [token.type, token.value]);
}

describe('Tokenizer', () => {
    it('should tokenize a simple query', () => {
        expect(pairs('SELECT name FROM users WHERE age >= 18;')).toEqual([
            ['KEYWORD', 'SELECT'],
            ['IDENTIFIER', 'name'],
            ['KEYWORD', 'FROM'],
            ['IDENTIFIER', 'users'],
            ['KEYWORD', 'WHERE'],
            ['IDENTIFIER', 'age'],
            ['OPERATOR', '>='],
            ['NUMBER', '18'],
            ['PUNCTUATION', ';'],
            ['EOF', ''],
        ]);
    });

    it('should uppercase keywords and keep identifier case', () => {
        expect(pairs('select Name from Users')).toEqual([
            ['KEYWORD', 'SELECT'],
            ['IDENTIFIER', 'Name'],
            ['KEYWORD', 'FROM'],
            ['IDENTIFIER', 'Users'],
            ['EOF', ''],
        ]);
    });

    it('should treat index methods as identifiers', () => {
        expect(pairs('USING hash')).toEqual([
            ['KEYWORD', 'USING'],
            ['IDENTIFIER', 'hash'],
            ['EOF', ''],
        ]);
    });

    it('should record where each token starts', () => {
        const tokens = new Tokenizer('SELECT *\nFROM t').tokenize();

        expect(tokens[1]).toMatchObject({ value: '*', position: 7, line: 1, column: 8 });
        expect(tokens[2]).toMatchObject({ value: 'FROM', position: 9, line: 2, column: 1 });
    });

    describe('strings', () => {
        it('should accept both quote styles', () => {
            expect(pairs(`'single' "double"`)).toEqual([
                ['STRING', 'single'],
                ['STRING', 'double'],
                ['EOF', ''],
            ]);
        });

        it('should keep the character after a backslash', () => {
            expect(tokenize("'it\\'s'")[0].value).toBe("it's");
            expect(tokenize("'a\\nb'")[0].value).toBe('anb');
        });

        it('should report an unterminated string at its opening quote', () => {
            const error = catchError(() => tokenize("SELECT 'abc"));
            expect(error).toBeInstanceOf(SqlSyntaxError);
            expect(error).toMatchObject({
                code: ErrorCode.UNTERMINATED_STRING,
                message: 'Unterminated string starting at line 1, column 8',
            });
        });
    });

    describe('numbers', () => {
        it('should read negative numbers and decimals', () => {
            expect(pairs('-5 3.14')).toEqual([
                ['NUMBER', '-5'],
                ['NUMBER', '3.14'],
                ['EOF', ''],
            ]);
        });

        it('should leave a trailing dot as punctuation', () => {
            expect(pairs('7.')).toEqual([
                ['NUMBER', '7'],
                ['PUNCTUATION', '.'],
                ['EOF', ''],
            ]);
        });

        it('should take at most one decimal point', () => {
            expect(pairs('1.2.3')).toEqual([
                ['NUMBER', '1.2'],
                ['PUNCTUATION', '.'],
                ['NUMBER', '3'],
                ['EOF', ''],
            ]);
        });
    });

    describe('operators', () => {
        it('should read one- and two-character operators', () => {
            expect(tokenize('= <> != < > <= >=').slice(0, -1).map(token => token.value)).toEqual([
                '=',
                '<>',
                '!=',
                '<',
                '>',
                '<=',
                '>=',
            ]);
        });

        it('should reject a lone exclamation mark', () => {
            expect(() => tokenize('a ! b')).toThrow("Unexpected character '!' at line 1, column 3");
        });
    });

    it('should skip line comments', () => {
        expect(pairs('SELECT 1 -- trailing note\n;')).toEqual([
            ['KEYWORD', 'SELECT'],
            ['NUMBER', '1'],
            ['PUNCTUATION', ';'],
            ['EOF', ''],
        ]);
    });

    it('should reject unknown characters with their location', () => {
        const error = catchError(() => tokenize('SELECT\n  @'));
        expect(error).toMatchObject({
            code: ErrorCode.UNEXPECTED_CHARACTER,
            message: "Unexpected character '@' at line 2, column 3",
        });
    });
});
