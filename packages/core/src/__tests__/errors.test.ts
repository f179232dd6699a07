import { describe, it, expect } from 'vitest';
import {
    ConstraintError,
    ErrorCode,
    QuarryError,
    SchemaError,
    SqlSyntaxError,
    StorageError,
    errorMessage,
} from '../errors';

describe('errors', () => {
    it('should keep the hierarchy and names', () => {
        const error = new StorageError('disk full', ErrorCode.IO_ERROR);

        expect(error).toBeInstanceOf(QuarryError);
        expect(error).toBeInstanceOf(Error);
        expect(error.name).toBe('StorageError');
        expect(error.code).toBe(ErrorCode.IO_ERROR);
    });

    it('should default syntax errors to SYNTAX_ERROR', () => {
        expect(new SqlSyntaxError('bad').code).toBe(ErrorCode.SYNTAX_ERROR);
        expect(new QuarryError('odd').code).toBe(ErrorCode.UNKNOWN);
    });

    it('should build lookup failures', () => {
        expect(SchemaError.tableNotFound('users')).toMatchObject({
            code: ErrorCode.TABLE_NOT_FOUND,
            message: "Table 'users' does not exist",
            details: { table: 'users' },
        });
        expect(SchemaError.columnNotFound('age').message).toBe("Unknown column: 'age'");
        expect(SchemaError.columnNotFound('age', 'users').details).toEqual({ column: 'age', table: 'users' });
    });

    it('should describe itself for logging', () => {
        expect(new ConstraintError('dup', ErrorCode.UNIQUE_VIOLATION, { column: 'id' }).toLogContext()).toEqual({
            name: 'ConstraintError',
            message: 'dup',
            code: 'UNIQUE_VIOLATION',
            details: { column: 'id' },
        });
        expect(new SqlSyntaxError('bad').toLogContext()).toEqual({
            name: 'SqlSyntaxError',
            message: 'bad',
            code: 'SYNTAX_ERROR',
        });
    });

    it('should extract messages from anything thrown', () => {
        expect(errorMessage(new Error('plain'))).toBe('plain');
        expect(errorMessage('text')).toBe('text');
        expect(errorMessage(42)).toBe('42');
    });
});
