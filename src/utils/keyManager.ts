/**
 * Key management utilities for row identity and grouping
 */

import type { GroupKeyValue, RowRecord } from '../types/data';
import { SchemaError } from './errors';

const EMPTY_TAG = 'e:';

/**
 * Check whether a key value counts as empty (null, undefined or '')
 */
export function isEmptyKeyValue(value: unknown): value is null | undefined | '' {
    return value === null || value === undefined || value === '';
}

/**
 * Encode a single value into a type-tagged string so that equal strings mean
 * equal values: 1 and '1' stay apart, Dates compare by timestamp.
 */
export function encodeKeyValue(value: GroupKeyValue): string {
    if (isEmptyKeyValue(value)) return EMPTY_TAG;
    if (value instanceof Date) return `d:${value.getTime()}`;
    if (typeof value === 'number') return `n:${value}`;
    if (typeof value === 'boolean') return `b:${value}`;
    return `s:${value}`;
}

/**
 * Build the identity tuple of a row over the given key columns
 */
export function buildKeyTuple(row: RowRecord, columns: readonly string[]): string {
    return JSON.stringify(columns.map((col) => encodeKeyValue(row[col])));
}

/**
 * Normalize a key value for comparison
 * Handles null, undefined, numbers and strings. Opt-in only: the engines
 * compare raw values.
 */
export function normalizeKey(value: unknown): string {
    if (value === null || value === undefined) return '';
    if (value instanceof Date) return value.toISOString();

    return String(value)
        .replace(/[\r\n\t]/g, ' ')
        .replace(/\s+/g, ' ')
        .trim();
}

/**
 * Find the first column whose header contains one of the keywords
 * (case-insensitive). Columns are scanned left to right.
 */
export function findColumnByKeywords(columns: readonly string[], keywords: readonly string[]): string {
    const needles = keywords.map((k) => k.toLowerCase()).filter((k) => k.length > 0);
    const found = columns.find((col) => {
        const header = col.toLowerCase();
        return needles.some((needle) => header.includes(needle));
    });
    if (found === undefined) {
        throw new SchemaError(keywords.join(' | '));
    }
    return found;
}

/**
 * Resolve a requested column name against a header list.
 * Exact match wins; with `fuzzy`, fall back to keyword matching.
 */
export function resolveColumn(columns: readonly string[], wanted: string, fuzzy: boolean = false): string {
    if (columns.includes(wanted)) return wanted;
    if (!fuzzy) throw new SchemaError(wanted);
    return findColumnByKeywords(columns, [wanted]);
}

/**
 * First free variant of `name` among `columns`: name, name_2, name_3...
 * (same suffix rule as duplicate headers on load)
 */
export function uniqueColumnName(columns: readonly string[], name: string): string {
    if (!columns.includes(name)) return name;
    let n = 2;
    while (columns.includes(`${name}_${n}`)) n++;
    return `${name}_${n}`;
}
