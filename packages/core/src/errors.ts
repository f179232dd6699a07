/**
 * QuarryDB - Error Types
 *
 * Error hierarchy:
 * - QuarryError: Base class for all engine errors
 *   - SqlSyntaxError: Tokenizer and parser failures
 *   - SchemaError: Unknown tables/columns, invalid table definitions
 *   - ConstraintError: NOT NULL, PRIMARY KEY/UNIQUE, length and type failures
 *   - ExecutionError: Statement-level failures (value counts, row references)
 *   - StorageError: Snapshot persistence failures
 *
 * Every error carries an ErrorCode so front ends can branch without parsing
 * messages. Front ends that only display errors treat the message as opaque.
 *
 * @example
 * ```typescript
 * try {
 *     executor.execute("INSERT INTO users VALUES (1, 'Ada')");
 * } catch (error) {
 *     if (error instanceof ConstraintError && error.code === ErrorCode.UNIQUE_VIOLATION) {
 *         console.log('duplicate id');
 *     }
 * }
 * ```
 */

export enum ErrorCode {
    UNKNOWN = 'UNKNOWN',

    // Syntax
    SYNTAX_ERROR = 'SYNTAX_ERROR',
    UNEXPECTED_CHARACTER = 'UNEXPECTED_CHARACTER',
    UNEXPECTED_END = 'UNEXPECTED_END',
    UNTERMINATED_STRING = 'UNTERMINATED_STRING',

    // Schema
    TABLE_NOT_FOUND = 'TABLE_NOT_FOUND',
    TABLE_EXISTS = 'TABLE_EXISTS',
    COLUMN_NOT_FOUND = 'COLUMN_NOT_FOUND',
    EMPTY_TABLE = 'EMPTY_TABLE',
    DUPLICATE_COLUMN = 'DUPLICATE_COLUMN',
    MULTIPLE_PRIMARY_KEYS = 'MULTIPLE_PRIMARY_KEYS',

    // Constraints
    NOT_NULL_VIOLATION = 'NOT_NULL_VIOLATION',
    UNIQUE_VIOLATION = 'UNIQUE_VIOLATION',
    LENGTH_EXCEEDED = 'LENGTH_EXCEEDED',
    TYPE_MISMATCH = 'TYPE_MISMATCH',

    // Execution
    COLUMN_COUNT_MISMATCH = 'COLUMN_COUNT_MISMATCH',
    INVALID_ROW_REFERENCE = 'INVALID_ROW_REFERENCE',

    // Storage
    NO_SNAPSHOT_PATH = 'NO_SNAPSHOT_PATH',
    CORRUPTED_SNAPSHOT = 'CORRUPTED_SNAPSHOT',
    IO_ERROR = 'IO_ERROR',
}

/**
 * Base error class for all QuarryDB errors.
 */
export class QuarryError extends Error {
    public readonly code: ErrorCode;
    public readonly details?: Record<string, unknown>;

    constructor(message: string, code: ErrorCode = ErrorCode.UNKNOWN, details?: Record<string, unknown>) {
        super(message);
        this.name = 'QuarryError';
        this.code = code;
        this.details = details;
    }

    /**
     * Structured form for logging.
     */
    toLogContext(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            ...(this.details && { details: this.details }),
        };
    }
}

export class SqlSyntaxError extends QuarryError {
    constructor(message: string, code: ErrorCode = ErrorCode.SYNTAX_ERROR, details?: Record<string, unknown>) {
        super(message, code, details);
        this.name = 'SqlSyntaxError';
    }
}

export class SchemaError extends QuarryError {
    constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
        super(message, code, details);
        this.name = 'SchemaError';
    }

    static tableNotFound(table: string): SchemaError {
        return new SchemaError(`Table '${table}' does not exist`, ErrorCode.TABLE_NOT_FOUND, { table });
    }

    static columnNotFound(column: string, table?: string): SchemaError {
        const where = table ? ` in table '${table}'` : '';
        return new SchemaError(`Unknown column: '${column}'${where}`, ErrorCode.COLUMN_NOT_FOUND, {
            column,
            ...(table && { table }),
        });
    }
}

export class ConstraintError extends QuarryError {
    constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
        super(message, code, details);
        this.name = 'ConstraintError';
    }
}

export class ExecutionError extends QuarryError {
    constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
        super(message, code, details);
        this.name = 'ExecutionError';
    }
}

export class StorageError extends QuarryError {
    constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
        super(message, code, details);
        this.name = 'StorageError';
    }
}

/**
 * Extract a display message from anything thrown.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
