/**
 * QuarryDB - Column Types
 *
 * Conversion and validation of values against a column definition.
 *
 * Conversion rules:
 * - INT: integers as-is, floats truncated, booleans as 0/1, integer text parsed
 * - FLOAT: any number, booleans as 0/1, numeric text parsed
 * - VARCHAR: any value in its text form
 * - BOOLEAN: booleans as-is, text "true"/"1"/"yes"/"t" (any case) is true and
 *   other text false, numbers true when non-zero
 * - DATETIME: timestamps as-is, text in one of the accepted layouts
 */

import { ColumnDefinition, DataType, Value } from '../types';
import { ConstraintError, ErrorCode } from '../errors';
import {
    NULL,
    boolValue,
    floatValue,
    intValue,
    parseTimestamp,
    textValue,
    timestampValue,
    valueToLiteral,
    valueToText,
} from '../value/Value';

/**
 * Type names accepted in CREATE TABLE, mapped to their canonical type.
 */
export const DATA_TYPE_NAMES: Readonly<Record<string, DataType>> = {
    INT: 'INT',
    INTEGER: 'INT',
    FLOAT: 'FLOAT',
    VARCHAR: 'VARCHAR',
    TEXT: 'VARCHAR',
    BOOLEAN: 'BOOLEAN',
    BOOL: 'BOOLEAN',
    DATETIME: 'DATETIME',
    TIMESTAMP: 'DATETIME',
};

const TRUE_WORDS = new Set(['true', '1', 'yes', 't']);

const INTEGER_TEXT = /^[+-]?\d+$/;
const NUMERIC_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Build a column definition, filling unspecified properties.
 */
export function createColumn(
    name: string,
    type: DataType,
    options: Partial<Omit<ColumnDefinition, 'name' | 'type'>> = {}
): ColumnDefinition {
    return {
        name,
        type,
        length: options.length,
        nullable: options.nullable ?? true,
        primaryKey: options.primaryKey ?? false,
        unique: options.unique ?? false,
        defaultValue: options.defaultValue ?? NULL,
    };
}

function typeMismatch(column: ColumnDefinition, reason: string): ConstraintError {
    return new ConstraintError(
        `Type error for column '${column.name}': ${reason}`,
        ErrorCode.TYPE_MISMATCH,
        { column: column.name, type: column.type }
    );
}

function toInt(column: ColumnDefinition, value: Value): Value {
    switch (value.type) {
        case 'int':
            return value;
        case 'float':
            if (!Number.isFinite(value.value)) {
                throw typeMismatch(column, `cannot convert ${value.value} to INT`);
            }
            return intValue(value.value);
        case 'bool':
            return intValue(value.value ? 1 : 0);
        case 'text': {
            const text = value.value.trim();
            if (!INTEGER_TEXT.test(text)) {
                throw typeMismatch(column, `invalid INT literal '${value.value}'`);
            }
            return intValue(parseInt(text, 10));
        }
        case 'timestamp':
        case 'null':
            throw typeMismatch(column, `cannot convert ${value.type} to INT`);
    }
}

function toFloat(column: ColumnDefinition, value: Value): Value {
    switch (value.type) {
        case 'int':
        case 'float':
            return floatValue(value.value);
        case 'bool':
            return floatValue(value.value ? 1 : 0);
        case 'text': {
            const text = value.value.trim();
            if (!NUMERIC_TEXT.test(text)) {
                throw typeMismatch(column, `invalid FLOAT literal '${value.value}'`);
            }
            return floatValue(Number(text));
        }
        case 'timestamp':
        case 'null':
            throw typeMismatch(column, `cannot convert ${value.type} to FLOAT`);
    }
}

function toBoolean(value: Value): Value {
    switch (value.type) {
        case 'bool':
            return value;
        case 'text':
            return boolValue(TRUE_WORDS.has(value.value.toLowerCase()));
        case 'int':
        case 'float':
            return boolValue(value.value !== 0);
        case 'timestamp':
            return boolValue(true);
        case 'null':
            return boolValue(false);
    }
}

function toDatetime(column: ColumnDefinition, value: Value): Value {
    if (value.type === 'timestamp') {
        return value;
    }
    if (value.type === 'text') {
        const epochMs = parseTimestamp(value.value);
        if (epochMs === undefined) {
            throw typeMismatch(column, `cannot parse datetime '${value.value}'`);
        }
        return timestampValue(epochMs);
    }
    throw typeMismatch(column, `invalid datetime value ${valueToText(value)}`);
}

/**
 * Convert a value to the column's type. NULL passes through unchanged.
 * Throws ConstraintError(TYPE_MISMATCH) when conversion is impossible or
 * the number cannot be stored exactly (non-finite, or an INT outside the
 * safe integer range).
 */
export function convertValue(column: ColumnDefinition, value: Value): Value {
    if (value.type === 'null') {
        return NULL;
    }

    const converted = convertToType(column, value);

    if (converted.type === 'float' && !Number.isFinite(converted.value)) {
        throw typeMismatch(column, `${converted.value} is not a finite number`);
    }
    if (converted.type === 'int' && !Number.isSafeInteger(converted.value)) {
        throw typeMismatch(column, 'INT value out of range');
    }

    return converted;
}

function convertToType(column: ColumnDefinition, value: Value): Value {
    switch (column.type) {
        case 'INT':
            return toInt(column, value);
        case 'FLOAT':
            return toFloat(column, value);
        case 'VARCHAR':
            return value.type === 'text' ? value : textValue(valueToText(value));
        case 'BOOLEAN':
            return toBoolean(value);
        case 'DATETIME':
            return toDatetime(column, value);
    }
}

/**
 * Validate a value against the column's type and constraints and return
 * its converted form.
 *
 * Primary key columns never accept NULL, whatever their nullable flag says.
 */
export function validateValue(column: ColumnDefinition, value: Value): Value {
    if (value.type === 'null') {
        if (!column.nullable || column.primaryKey) {
            throw new ConstraintError(
                `Column '${column.name}' cannot be NULL`,
                ErrorCode.NOT_NULL_VIOLATION,
                { column: column.name }
            );
        }
        return NULL;
    }

    const converted = convertValue(column, value);

    if (column.type === 'VARCHAR' && column.length !== undefined && converted.type === 'text') {
        if (converted.value.length > column.length) {
            throw new ConstraintError(
                `Value exceeds maximum length ${column.length} for column '${column.name}'`,
                ErrorCode.LENGTH_EXCEEDED,
                { column: column.name, length: column.length }
            );
        }
    }

    return converted;
}

/**
 * Render a column the way it would be written in CREATE TABLE.
 */
export function describeColumn(column: ColumnDefinition): string {
    let text = `${column.name} ${column.type}`;
    if (column.type === 'VARCHAR' && column.length !== undefined) {
        text += `(${column.length})`;
    }
    if (column.primaryKey) text += ' PRIMARY KEY';
    if (column.unique) text += ' UNIQUE';
    if (!column.nullable) text += ' NOT NULL';
    if (column.defaultValue.type !== 'null') {
        text += ` DEFAULT ${valueToLiteral(column.defaultValue)}`;
    }
    return text;
}
