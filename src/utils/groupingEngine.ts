/**
 * Grouping Engine
 *
 * Partitions rows by a shared key in a single ordered pass. Groups come out in
 * order of first appearance of their key; rows keep their input order, so
 * related rows that are far apart in the input end up together.
 */

import type { CellValue, Group, GroupKey, GroupKeyValue, GroupStats, RowRecord } from '../types/data';
import { DerivationError, SchemaError, SheetClerkError } from './errors';
import { encodeKeyValue, isEmptyKeyValue } from './keyManager';

function computeKey(row: RowRecord, index: number, groupKey: GroupKey): GroupKeyValue {
    if (typeof groupKey === 'string') {
        if (!Object.prototype.hasOwnProperty.call(row, groupKey)) {
            throw new SchemaError(groupKey, undefined, index);
        }
        return row[groupKey];
    }

    try {
        return groupKey(row, index);
    } catch (err) {
        throw new DerivationError(index, err);
    }
}

export function groupRows(rows: readonly RowRecord[], groupKey: GroupKey): Group[] {
    const buckets = new Map<string, Group>();

    rows.forEach((row, index) => {
        const value = computeKey(row, index, groupKey);
        const encoded = encodeKeyValue(value);

        const existing = buckets.get(encoded);
        if (existing) {
            existing.rows.push(row);
        } else {
            // Empty keys share one sentinel group instead of being dropped
            const key: CellValue | boolean = isEmptyKeyValue(value) ? null : value;
            buckets.set(encoded, { key, rows: [row] });
        }
    });

    // Map iteration follows insertion order, i.e. key discovery order
    return Array.from(buckets.values());
}

/**
 * Flatten groups back into rows, tagging each with its 1-based group number.
 * Throws when a row already owns `markerColumn`.
 */
export function flattenGroups(groups: readonly Group[], markerColumn: string): RowRecord[] {
    const clash = groups.some((group) =>
        group.rows.some((row) => Object.prototype.hasOwnProperty.call(row, markerColumn))
    );
    if (clash) {
        throw new SheetClerkError('SchemaError', `Column "${markerColumn}" already exists; group numbers would overwrite it`);
    }

    return groups.flatMap((group, idx) =>
        group.rows.map((row) => ({ ...row, [markerColumn]: idx + 1 }))
    );
}

export function getGroupStats(groups: readonly Group[]): GroupStats {
    const sizes = groups.map((g) => g.rows.length);
    return {
        groups: groups.length,
        rows: sizes.reduce((sum, n) => sum + n, 0),
        largestGroup: sizes.length > 0 ? Math.max(...sizes) : 0,
        singletons: sizes.filter((n) => n === 1).length,
    };
}
