/**
 * QuarryDB - Values
 *
 * Constructors, comparison and formatting for the tagged Value union.
 * Every switch over Value['type'] is exhaustive, so adding a variant
 * fails to compile until each operation handles it.
 */

import { Value, RowData } from '../types';

export const NULL: Value = { type: 'null' };

export function intValue(value: number): Value {
    return { type: 'int', value: Math.trunc(value) };
}

export function floatValue(value: number): Value {
    return { type: 'float', value };
}

export function textValue(value: string): Value {
    return { type: 'text', value };
}

export function boolValue(value: boolean): Value {
    return { type: 'bool', value };
}

export function timestampValue(epochMs: number): Value {
    return { type: 'timestamp', value: epochMs };
}

/**
 * Ordering rank of each value family. Numbers (including booleans as 0/1)
 * sort before text, text before timestamps.
 */
function rank(value: Value): number {
    switch (value.type) {
        case 'null':
            return 0;
        case 'int':
        case 'float':
        case 'bool':
            return 1;
        case 'text':
            return 2;
        case 'timestamp':
            return 3;
    }
}

function numeric(value: Value): number {
    switch (value.type) {
        case 'int':
        case 'float':
        case 'timestamp':
            return value.value;
        case 'bool':
            return value.value ? 1 : 0;
        case 'null':
        case 'text':
            return NaN;
    }
}

/**
 * Total order over values, used for sorting and B-tree keys.
 */
export function compareValues(a: Value, b: Value): number {
    const rankDiff = rank(a) - rank(b);
    if (rankDiff !== 0) {
        return rankDiff < 0 ? -1 : 1;
    }

    if (a.type === 'text' && b.type === 'text') {
        if (a.value === b.value) return 0;
        return a.value < b.value ? -1 : 1;
    }

    if (a.type === 'null') {
        return 0;
    }

    const diff = numeric(a) - numeric(b);
    if (diff === 0) return 0;
    return diff < 0 ? -1 : 1;
}

/**
 * Whether two values can be ordered against each other with <, >, <=, >=.
 */
export function isComparable(a: Value, b: Value): boolean {
    return a.type !== 'null' && b.type !== 'null' && rank(a) === rank(b);
}

/**
 * Equality used by WHERE and joins. NULL equals NULL here; joins exclude
 * nulls before calling this.
 */
export function valuesEqual(a: Value, b: Value): boolean {
    if (a.type === 'null' || b.type === 'null') {
        return a.type === b.type;
    }
    return rank(a) === rank(b) && compareValues(a, b) === 0;
}

// =============================================================================
// TIMESTAMPS
// =============================================================================

/**
 * Accepted timestamp layouts, tried in order; the first match wins.
 */
const TIMESTAMP_FORMATS: RegExp[] = [
    /^(\d{4})-(\d{1,2})-(\d{1,2}) (\d{1,2}):(\d{1,2}):(\d{1,2})$/,
    /^(\d{4})-(\d{1,2})-(\d{1,2})$/,
    /^(\d{4})-(\d{1,2})-(\d{1,2})T(\d{1,2}):(\d{1,2}):(\d{1,2})$/,
];

/**
 * Parse text into epoch milliseconds (UTC). Returns undefined when no
 * accepted format matches or the date does not exist.
 */
export function parseTimestamp(text: string): number | undefined {
    for (const format of TIMESTAMP_FORMATS) {
        const match = format.exec(text);
        if (!match) {
            continue;
        }

        const [year, month, day, hour = 0, minute = 0, second = 0] = match
            .slice(1)
            .filter((part): part is string => part !== undefined)
            .map(part => parseInt(part, 10));

        const epochMs = Date.UTC(year, month - 1, day, hour, minute, second);
        const date = new Date(epochMs);

        // Date.UTC rolls over out-of-range fields (Feb 30 -> Mar 2)
        if (
            date.getUTCFullYear() !== year ||
            date.getUTCMonth() !== month - 1 ||
            date.getUTCDate() !== day ||
            date.getUTCHours() !== hour ||
            date.getUTCMinutes() !== minute ||
            date.getUTCSeconds() !== second
        ) {
            continue;
        }

        return epochMs;
    }

    return undefined;
}

function pad(n: number, width: number = 2): string {
    return String(n).padStart(width, '0');
}

/**
 * Format epoch milliseconds as "YYYY-MM-DD HH:MM:SS" (UTC).
 */
export function formatTimestamp(epochMs: number): string {
    const date = new Date(epochMs);
    return (
        `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
        `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
    );
}

// =============================================================================
// FORMATTING
// =============================================================================

/**
 * Native JavaScript form of a value, for front ends and JSON output.
 */
export type PlainValue = string | number | boolean | null;

export function toPlain(value: Value): PlainValue {
    switch (value.type) {
        case 'null':
            return null;
        case 'int':
        case 'float':
        case 'text':
        case 'bool':
            return value.value;
        case 'timestamp':
            return formatTimestamp(value.value);
    }
}

export function rowToPlain(row: RowData): Record<string, PlainValue> {
    const plain: Record<string, PlainValue> = {};
    for (const [key, value] of Object.entries(row)) {
        plain[key] = toPlain(value);
    }
    return plain;
}

/**
 * Text form of a value, used for display and VARCHAR coercion.
 */
export function valueToText(value: Value): string {
    switch (value.type) {
        case 'null':
            return 'NULL';
        case 'int':
        case 'text':
            return String(value.value);
        case 'float':
            return Number.isInteger(value.value) ? value.value.toFixed(1) : String(value.value);
        case 'bool':
            return value.value ? 'TRUE' : 'FALSE';
        case 'timestamp':
            return formatTimestamp(value.value);
    }
}

/**
 * SQL literal form, used when describing schemas.
 */
export function valueToLiteral(value: Value): string {
    if (value.type === 'text') {
        return `'${value.value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
    }
    if (value.type === 'timestamp') {
        return `'${formatTimestamp(value.value)}'`;
    }
    return valueToText(value);
}
