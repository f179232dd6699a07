/**
 * QuarryDB - SQL Parser
 *
 * Parses tokenized SQL into an Abstract Syntax Tree (AST) representation.
 *
 * Supported grammar:
 *
 * statement := (create_table | create_index | drop_table | insert | select | update | delete) ';'?
 *
 * create_table := CREATE TABLE identifier '(' column_def (',' column_def)* ')'
 * column_def := identifier type ('(' integer ')')? constraint*
 * type := INT | INTEGER | FLOAT | VARCHAR | TEXT | BOOLEAN | BOOL | DATETIME | TIMESTAMP
 * constraint := PRIMARY KEY | UNIQUE | NOT NULL | DEFAULT literal
 *
 * create_index := CREATE INDEX identifier ON identifier '(' identifier ')' (USING (BTREE | HASH))?
 * drop_table := DROP TABLE identifier
 *
 * insert := INSERT INTO identifier ('(' identifier (',' identifier)* ')')? VALUES '(' literal (',' literal)* ')'
 *
 * select := SELECT ('*' | column_ref (',' column_ref)*) FROM identifier clause*
 * clause := join | WHERE condition | ORDER BY column_ref (ASC | DESC)? | LIMIT integer
 * join := (INNER | LEFT OUTER? | RIGHT OUTER?)? JOIN identifier ON column_ref '=' column_ref
 * condition := comparison ((AND | OR) comparison)*
 * comparison := column_ref ('=' | '!=' | '<>' | '<' | '>' | '<=' | '>=') literal
 * column_ref := identifier ('.' identifier)?
 *
 * update := UPDATE identifier SET identifier '=' literal (',' identifier '=' literal)* (WHERE condition)?
 * delete := DELETE FROM identifier (WHERE condition)?
 *
 * literal := STRING | NUMBER | NULL | TRUE | FALSE
 */

import { Token, Tokenizer, TokenType } from './Tokenizer';
import {
    ColumnDefinition,
    ComparisonOperator,
    Condition,
    CreateIndexStatement,
    CreateTableStatement,
    DeleteStatement,
    DropTableStatement,
    IndexKind,
    InsertStatement,
    JoinClause,
    JoinType,
    OrderByClause,
    SelectStatement,
    Statement,
    UpdateStatement,
    Value,
} from '../types';
import { ErrorCode, SqlSyntaxError } from '../errors';
import { DATA_TYPE_NAMES, createColumn } from '../schema/Column';
import { NULL, boolValue, floatValue, intValue, textValue } from '../value/Value';

const COMPARISON_OPERATORS: ReadonlySet<string> = new Set(['=', '!=', '<>', '<', '>', '<=', '>=']);

function isComparisonOperator(value: string): value is ComparisonOperator {
    return COMPARISON_OPERATORS.has(value);
}

export class Parser {
    private tokens: Token[];
    private current: number;

    constructor(tokens: Token[]) {
        this.tokens = tokens;
        this.current = 0;
    }

    /**
     * Parse the tokens as exactly one statement.
     */
    parse(): Statement {
        this.current = 0;
        const statement = this.parseStatement();

        // Consume optional semicolon
        if (this.check('PUNCTUATION', ';')) {
            this.advance();
        }

        if (!this.isAtEnd()) {
            throw this.error('end of input');
        }

        return statement;
    }

    /**
     * Parse a single statement.
     */
    private parseStatement(): Statement {
        if (this.check('KEYWORD', 'CREATE')) {
            this.advance();
            if (this.check('KEYWORD', 'INDEX')) {
                return this.parseCreateIndex();
            }
            return this.parseCreateTable();
        }
        if (this.check('KEYWORD', 'DROP')) {
            return this.parseDropTable();
        }
        if (this.check('KEYWORD', 'INSERT')) {
            return this.parseInsert();
        }
        if (this.check('KEYWORD', 'SELECT')) {
            return this.parseSelect();
        }
        if (this.check('KEYWORD', 'UPDATE')) {
            return this.parseUpdate();
        }
        if (this.check('KEYWORD', 'DELETE')) {
            return this.parseDelete();
        }

        throw this.error('SELECT, INSERT, UPDATE, DELETE, CREATE or DROP');
    }

    // ==========================================================================
    // DDL
    // ==========================================================================

    /**
     * Parse CREATE TABLE statement (CREATE already consumed).
     */
    private parseCreateTable(): CreateTableStatement {
        this.consume('KEYWORD', 'TABLE');

        const tableName = this.consumeIdentifier();

        this.consume('PUNCTUATION', '(');
        const columns: ColumnDefinition[] = [this.parseColumnDefinition()];
        while (this.match('PUNCTUATION', ',')) {
            columns.push(this.parseColumnDefinition());
        }
        this.consume('PUNCTUATION', ')');

        return {
            type: 'CREATE_TABLE',
            tableName,
            columns,
        };
    }

    /**
     * Parse a single column definition with its constraints, in any order.
     */
    private parseColumnDefinition(): ColumnDefinition {
        const name = this.consumeIdentifier();

        const typeToken = this.peek();
        const type = typeToken.type === 'KEYWORD' ? DATA_TYPE_NAMES[typeToken.value] : undefined;
        if (type === undefined) {
            throw this.error('data type');
        }
        this.advance();

        let length: number | undefined;
        if (this.check('PUNCTUATION', '(')) {
            if (type !== 'VARCHAR') {
                throw this.error(`',' or ')' (only VARCHAR takes a length)`);
            }
            this.advance();
            length = this.parseNonNegativeInteger();
            this.consume('PUNCTUATION', ')');
        }

        const column = createColumn(name, type, { length });

        while (true) {
            if (this.match('KEYWORD', 'PRIMARY')) {
                this.consume('KEYWORD', 'KEY');
                column.primaryKey = true;
                column.nullable = false;
            } else if (this.match('KEYWORD', 'UNIQUE')) {
                column.unique = true;
            } else if (this.match('KEYWORD', 'NOT')) {
                this.consume('KEYWORD', 'NULL');
                column.nullable = false;
            } else if (this.match('KEYWORD', 'DEFAULT')) {
                column.defaultValue = this.parseValue();
            } else {
                break;
            }
        }

        return column;
    }

    /**
     * Parse CREATE INDEX statement (CREATE already consumed).
     */
    private parseCreateIndex(): CreateIndexStatement {
        this.consume('KEYWORD', 'INDEX');
        const indexName = this.consumeIdentifier();

        this.consume('KEYWORD', 'ON');
        const tableName = this.consumeIdentifier();

        this.consume('PUNCTUATION', '(');
        const columnName = this.consumeIdentifier();
        this.consume('PUNCTUATION', ')');

        let kind: IndexKind = 'BTREE';
        if (this.match('KEYWORD', 'USING')) {
            const token = this.peek();
            const method = token.type === 'IDENTIFIER' ? token.value.toUpperCase() : '';
            if (method !== 'BTREE' && method !== 'HASH') {
                throw this.error('BTREE or HASH');
            }
            this.advance();
            kind = method === 'HASH' ? 'HASH' : 'BTREE';
        }

        return {
            type: 'CREATE_INDEX',
            indexName,
            tableName,
            columnName,
            kind,
        };
    }

    /**
     * Parse DROP TABLE statement.
     */
    private parseDropTable(): DropTableStatement {
        this.consume('KEYWORD', 'DROP');
        this.consume('KEYWORD', 'TABLE');

        return {
            type: 'DROP_TABLE',
            tableName: this.consumeIdentifier(),
        };
    }

    // ==========================================================================
    // DML
    // ==========================================================================

    /**
     * Parse INSERT statement.
     */
    private parseInsert(): InsertStatement {
        this.consume('KEYWORD', 'INSERT');
        this.consume('KEYWORD', 'INTO');

        const tableName = this.consumeIdentifier();

        let columns: string[] | undefined;
        if (this.match('PUNCTUATION', '(')) {
            columns = this.parseIdentifierList();
            this.consume('PUNCTUATION', ')');
        }

        this.consume('KEYWORD', 'VALUES');

        this.consume('PUNCTUATION', '(');
        const values = this.parseValueList();
        this.consume('PUNCTUATION', ')');

        const statement: InsertStatement = {
            type: 'INSERT',
            tableName,
            values,
        };
        if (columns) {
            statement.columns = columns;
        }
        return statement;
    }

    /**
     * Parse SELECT statement. Clauses after FROM may come in any order.
     */
    private parseSelect(): SelectStatement {
        this.consume('KEYWORD', 'SELECT');

        let columns: string[] | '*';
        if (this.match('PUNCTUATION', '*')) {
            columns = '*';
        } else {
            columns = [this.parseColumnReference()];
            while (this.match('PUNCTUATION', ',')) {
                columns.push(this.parseColumnReference());
            }
        }

        this.consume('KEYWORD', 'FROM');
        const tableName = this.consumeIdentifier();

        const statement: SelectStatement = {
            type: 'SELECT',
            columns,
            tableName,
            joins: [],
        };

        while (true) {
            const joinType = this.parseJoinType();
            if (joinType) {
                statement.joins.push(this.parseJoinClause(joinType));
            } else if (this.check('KEYWORD', 'WHERE')) {
                this.rejectRepeat(statement.where, 'WHERE');
                statement.where = this.parseWhereClause();
            } else if (this.check('KEYWORD', 'ORDER')) {
                this.rejectRepeat(statement.orderBy, 'ORDER BY');
                statement.orderBy = this.parseOrderBy();
            } else if (this.check('KEYWORD', 'LIMIT')) {
                this.rejectRepeat(statement.limit, 'LIMIT');
                this.advance();
                statement.limit = this.parseNonNegativeInteger();
            } else {
                break;
            }
        }

        return statement;
    }

    /**
     * Consume a join prefix and return its type, or undefined when the next
     * tokens do not start a join.
     */
    private parseJoinType(): JoinType | undefined {
        if (this.match('KEYWORD', 'JOIN')) {
            return 'INNER';
        }
        if (this.match('KEYWORD', 'INNER')) {
            this.consume('KEYWORD', 'JOIN');
            return 'INNER';
        }
        for (const side of ['LEFT', 'RIGHT'] as const) {
            if (this.match('KEYWORD', side)) {
                this.match('KEYWORD', 'OUTER');
                this.consume('KEYWORD', 'JOIN');
                return side;
            }
        }
        return undefined;
    }

    /**
     * Parse the rest of a JOIN clause (join keywords already consumed).
     */
    private parseJoinClause(type: JoinType): JoinClause {
        const table = this.consumeIdentifier();

        this.consume('KEYWORD', 'ON');

        const leftColumn = this.parseColumnReference();
        this.consume('OPERATOR', '=');
        const rightColumn = this.parseColumnReference();

        return {
            type,
            table,
            leftColumn,
            rightColumn,
        };
    }

    private parseOrderBy(): OrderByClause {
        this.consume('KEYWORD', 'ORDER');
        this.consume('KEYWORD', 'BY');

        const column = this.parseColumnReference();

        if (this.match('KEYWORD', 'DESC')) {
            return { column, direction: 'DESC' };
        }
        this.match('KEYWORD', 'ASC');
        return { column, direction: 'ASC' };
    }

    /**
     * Parse UPDATE statement.
     */
    private parseUpdate(): UpdateStatement {
        this.consume('KEYWORD', 'UPDATE');

        const tableName = this.consumeIdentifier();

        this.consume('KEYWORD', 'SET');
        const set: Record<string, Value> = {};
        do {
            const column = this.consumeIdentifier();
            this.consume('OPERATOR', '=');
            set[column] = this.parseValue();
        } while (this.match('PUNCTUATION', ','));

        const statement: UpdateStatement = {
            type: 'UPDATE',
            tableName,
            set,
        };
        if (this.check('KEYWORD', 'WHERE')) {
            statement.where = this.parseWhereClause();
        }
        return statement;
    }

    /**
     * Parse DELETE statement.
     */
    private parseDelete(): DeleteStatement {
        this.consume('KEYWORD', 'DELETE');
        this.consume('KEYWORD', 'FROM');

        const statement: DeleteStatement = {
            type: 'DELETE',
            tableName: this.consumeIdentifier(),
        };
        if (this.check('KEYWORD', 'WHERE')) {
            statement.where = this.parseWhereClause();
        }
        return statement;
    }

    // ==========================================================================
    // CONDITIONS
    // ==========================================================================

    /**
     * Parse WHERE clause. AND and OR bind equally and associate to the left.
     */
    private parseWhereClause(): Condition {
        this.consume('KEYWORD', 'WHERE');

        let condition = this.parseComparison();

        while (this.check('KEYWORD', 'AND') || this.check('KEYWORD', 'OR')) {
            const operator = this.advance().value === 'AND' ? 'AND' : 'OR';
            const right = this.parseComparison();
            condition = { type: 'LOGICAL', operator, left: condition, right };
        }

        return condition;
    }

    private parseComparison(): Condition {
        const column = this.parseColumnReference();

        const token = this.peek();
        if (token.type !== 'OPERATOR' || !isComparisonOperator(token.value)) {
            throw this.error('comparison operator');
        }
        this.advance();

        return {
            type: 'COMPARISON',
            column,
            operator: token.value,
            value: this.parseValue(),
        };
    }

    // ==========================================================================
    // HELPER METHODS
    // ==========================================================================

    /**
     * Parse a comma-separated list of identifiers.
     */
    private parseIdentifierList(): string[] {
        const identifiers = [this.consumeIdentifier()];
        while (this.match('PUNCTUATION', ',')) {
            identifiers.push(this.consumeIdentifier());
        }
        return identifiers;
    }

    private parseValueList(): Value[] {
        const values = [this.parseValue()];
        while (this.match('PUNCTUATION', ',')) {
            values.push(this.parseValue());
        }
        return values;
    }

    /**
     * Parse a literal into a Value.
     */
    private parseValue(): Value {
        const token = this.peek();

        if (token.type === 'NUMBER') {
            this.advance();
            return token.value.includes('.') ? floatValue(parseFloat(token.value)) : intValue(parseInt(token.value, 10));
        }

        if (token.type === 'STRING') {
            this.advance();
            return textValue(token.value);
        }

        if (token.type === 'KEYWORD') {
            if (token.value === 'NULL') {
                this.advance();
                return NULL;
            }
            if (token.value === 'TRUE' || token.value === 'FALSE') {
                this.advance();
                return boolValue(token.value === 'TRUE');
            }
        }

        throw this.error('value');
    }

    private parseNonNegativeInteger(): number {
        const token = this.peek();
        if (token.type !== 'NUMBER' || !/^\d+$/.test(token.value)) {
            throw this.error('non-negative integer');
        }
        this.advance();
        return parseInt(token.value, 10);
    }

    /**
     * Parse a column reference (may include table.column format).
     */
    private parseColumnReference(): string {
        const name = this.consumeIdentifier();

        if (this.match('PUNCTUATION', '.')) {
            return `${name}.${this.consumeIdentifier()}`;
        }

        return name;
    }

    private rejectRepeat(existing: unknown, clause: string): void {
        if (existing !== undefined) {
            const token = this.peek();
            throw new SqlSyntaxError(
                `Parse error at line ${token.line}, column ${token.column}: Duplicate ${clause} clause`,
                ErrorCode.SYNTAX_ERROR,
                { line: token.line, column: token.column }
            );
        }
    }

    /**
     * Get the current token.
     */
    private peek(): Token {
        return this.tokens[Math.min(this.current, this.tokens.length - 1)];
    }

    /**
     * Check if we've reached the end of tokens.
     */
    private isAtEnd(): boolean {
        return this.peek().type === 'EOF';
    }

    /**
     * Advance to the next token.
     */
    private advance(): Token {
        const token = this.peek();
        if (!this.isAtEnd()) {
            this.current++;
        }
        return token;
    }

    /**
     * Check if current token matches expected type and value.
     */
    private check(type: TokenType, value?: string): boolean {
        const token = this.peek();
        if (token.type !== type) return false;
        if (value !== undefined && token.value !== value) return false;
        return true;
    }

    /**
     * Consume the current token when it matches.
     */
    private match(type: TokenType, value?: string): boolean {
        if (this.check(type, value)) {
            this.advance();
            return true;
        }
        return false;
    }

    /**
     * Consume expected token or throw error.
     */
    private consume(type: TokenType, value?: string): Token {
        if (this.check(type, value)) {
            return this.advance();
        }
        throw this.error(value ?? type);
    }

    /**
     * Consume an identifier token. Keywords are reserved.
     */
    private consumeIdentifier(): string {
        return this.consume('IDENTIFIER').value;
    }

    /**
     * Create a syntax error naming what was expected and what was found.
     */
    private error(expected: string): SqlSyntaxError {
        const token = this.peek();
        const found = token.type === 'EOF' ? 'end of input' : `'${token.value}'`;
        return new SqlSyntaxError(
            `Parse error at line ${token.line}, column ${token.column}: Expected ${expected}, got ${found}`,
            token.type === 'EOF' ? ErrorCode.UNEXPECTED_END : ErrorCode.SYNTAX_ERROR,
            { line: token.line, column: token.column, expected }
        );
    }
}

/**
 * Tokenize and parse a SQL string into a statement.
 */
export function parseSql(sql: string): Statement {
    return new Parser(new Tokenizer(sql).tokenize()).parse();
}
