/**
 * QuarryDB - SQL Tokenizer
 *
 * Converts raw SQL input into a stream of tokens for parsing.
 *
 * Design decisions:
 * - Single pass, one character of lookahead
 * - Strings in single or double quotes; a backslash escapes the next
 *   character, which is kept verbatim
 * - Keywords are uppercased, identifiers keep their case
 * - Numbers are integers or decimals with at most one '.', optionally
 *   negative; the parser tells them apart by the '.'
 * - Errors carry line and column of the offending character
 */

import { ErrorCode, SqlSyntaxError } from '../errors';

export type TokenType = 'KEYWORD' | 'IDENTIFIER' | 'NUMBER' | 'STRING' | 'OPERATOR' | 'PUNCTUATION' | 'EOF';

export interface Token {
    type: TokenType;
    value: string;
    /** Offset of the token's first character */
    position: number;
    line: number;
    column: number;
}

// SQL keywords we recognize
const KEYWORDS = new Set([
    'CREATE', 'TABLE', 'INDEX', 'DROP', 'ON', 'USING',
    'INSERT', 'INTO', 'VALUES', 'SELECT', 'FROM', 'WHERE',
    'UPDATE', 'SET', 'DELETE',
    'JOIN', 'INNER', 'LEFT', 'RIGHT', 'OUTER',
    'ORDER', 'BY', 'ASC', 'DESC', 'LIMIT',
    'AND', 'OR', 'NOT', 'NULL', 'TRUE', 'FALSE',
    'PRIMARY', 'KEY', 'UNIQUE', 'DEFAULT',
    'INT', 'INTEGER', 'FLOAT', 'VARCHAR', 'TEXT',
    'BOOLEAN', 'BOOL', 'DATETIME', 'TIMESTAMP',
]);

// Punctuation
const PUNCTUATION = new Set(['(', ')', ',', ';', '.', '*']);

export class Tokenizer {
    private input: string;
    private position: number;
    private line: number;
    private column: number;
    private tokens: Token[];

    constructor(input: string) {
        this.input = input;
        this.position = 0;
        this.line = 1;
        this.column = 1;
        this.tokens = [];
    }

    /**
     * Tokenize the entire input. The last token is always EOF.
     */
    tokenize(): Token[] {
        this.tokens = [];

        while (this.position < this.input.length) {
            this.skipWhitespace();

            if (this.position >= this.input.length) {
                break;
            }

            const char = this.input[this.position];

            // Comments (skip)
            if (char === '-' && this.peek(1) === '-') {
                this.skipLineComment();
                continue;
            }

            // String literals
            if (char === "'" || char === '"') {
                this.readString(char);
                continue;
            }

            // Numbers (including negative)
            if (this.isDigit(char) || (char === '-' && this.isDigit(this.peek(1)))) {
                this.readNumber();
                continue;
            }

            // Identifiers and keywords
            if (this.isAlpha(char) || char === '_') {
                this.readIdentifier();
                continue;
            }

            if (char === '=' || char === '<' || char === '>' || char === '!') {
                this.readOperator();
                continue;
            }

            if (PUNCTUATION.has(char)) {
                this.pushToken('PUNCTUATION', char, this.mark());
                this.advance();
                continue;
            }

            throw this.unexpected(char);
        }

        this.pushToken('EOF', '', this.mark());
        return this.tokens;
    }

    /**
     * Get a character ahead of the current position without advancing.
     */
    private peek(offset: number = 0): string {
        return this.input[this.position + offset] ?? '';
    }

    /**
     * Advance the position and update line/column tracking.
     */
    private advance(): string {
        const char = this.input[this.position];
        this.position++;

        if (char === '\n') {
            this.line++;
            this.column = 1;
        } else {
            this.column++;
        }

        return char;
    }

    private mark(): Omit<Token, 'type' | 'value'> {
        return { position: this.position, line: this.line, column: this.column };
    }

    private pushToken(type: TokenType, value: string, start: Omit<Token, 'type' | 'value'>): void {
        this.tokens.push({ type, value, ...start });
    }

    private unexpected(char: string): SqlSyntaxError {
        return new SqlSyntaxError(
            `Unexpected character '${char}' at line ${this.line}, column ${this.column}`,
            ErrorCode.UNEXPECTED_CHARACTER,
            { line: this.line, column: this.column }
        );
    }

    /**
     * Skip whitespace characters.
     */
    private skipWhitespace(): void {
        while (this.position < this.input.length && /\s/.test(this.input[this.position])) {
            this.advance();
        }
    }

    /**
     * Skip line comments (-- comment).
     */
    private skipLineComment(): void {
        while (this.position < this.input.length && this.input[this.position] !== '\n') {
            this.advance();
        }
    }

    private isDigit(char: string): boolean {
        return char >= '0' && char <= '9';
    }

    private isAlpha(char: string): boolean {
        return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z');
    }

    private isAlphaNumeric(char: string): boolean {
        return this.isAlpha(char) || this.isDigit(char) || char === '_';
    }

    /**
     * Read a string literal delimited by `quote`.
     */
    private readString(quote: string): void {
        const start = this.mark();

        this.advance(); // consume opening quote

        let value = '';
        while (this.position < this.input.length) {
            const char = this.advance();

            if (char === quote) {
                this.pushToken('STRING', value, start);
                return;
            }

            if (char === '\\') {
                if (this.position >= this.input.length) {
                    break;
                }
                value += this.advance();
            } else {
                value += char;
            }
        }

        throw new SqlSyntaxError(
            `Unterminated string starting at line ${start.line}, column ${start.column}`,
            ErrorCode.UNTERMINATED_STRING,
            { line: start.line, column: start.column }
        );
    }

    /**
     * Read a number literal.
     */
    private readNumber(): void {
        const start = this.mark();
        let value = '';

        // Handle negative sign
        if (this.peek() === '-') {
            value += this.advance();
        }

        let seenDot = false;
        while (this.position < this.input.length) {
            const char = this.peek();
            if (this.isDigit(char)) {
                value += this.advance();
            } else if (char === '.' && !seenDot && this.isDigit(this.peek(1))) {
                seenDot = true;
                value += this.advance();
            } else {
                break;
            }
        }

        this.pushToken('NUMBER', value, start);
    }

    /**
     * Read an identifier or keyword.
     */
    private readIdentifier(): void {
        const start = this.mark();
        let value = '';

        while (this.position < this.input.length && this.isAlphaNumeric(this.peek())) {
            value += this.advance();
        }

        const upperValue = value.toUpperCase();
        if (KEYWORDS.has(upperValue)) {
            this.pushToken('KEYWORD', upperValue, start);
        } else {
            this.pushToken('IDENTIFIER', value, start);
        }
    }

    /**
     * Read a one- or two-character comparison operator.
     */
    private readOperator(): void {
        const start = this.mark();
        const first = this.peek();
        const next = this.peek(1);

        if ((first === '<' && (next === '=' || next === '>')) || ((first === '>' || first === '!') && next === '=')) {
            this.advance();
            this.advance();
            this.pushToken('OPERATOR', first + next, start);
            return;
        }

        // A lone '!' is not an operator
        if (first === '!') {
            throw this.unexpected(first);
        }

        this.advance();
        this.pushToken('OPERATOR', first, start);
    }
}

/**
 * Tokenize a SQL string.
 */
export function tokenize(sql: string): Token[] {
    return new Tokenizer(sql).tokenize();
}
