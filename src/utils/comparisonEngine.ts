/**
 * Comparison Engine
 *
 * Finds the rows of a candidate dataset that a baseline dataset does not
 * know yet. Identity is the exact tuple of the identity-key cells:
 * 1. Build the set of baseline tuples
 * 2. Walk the candidate in order, keeping rows whose tuple is absent
 */

import type { CellValue, Dataset, DiffStats, RowRecord } from '../types/data';
import { EmptyKeyError, SchemaError } from './errors';
import { buildKeyTuple, encodeKeyValue, isEmptyKeyValue } from './keyManager';

export interface ScopedDiffResult {
    /** First non-empty scope value of the candidate, null if there is none */
    scopeValue: CellValue;
    rows: RowRecord[];
}

function assertColumns(dataset: Dataset, columns: readonly string[], label: string): void {
    const missing = columns.find((col) => !dataset.columns.includes(col));
    if (missing !== undefined) {
        throw new SchemaError(missing, label);
    }
}

/**
 * Main comparison function
 */
export function diffDatasets(
    baseline: Dataset,
    candidate: Dataset,
    identityKey: readonly string[]
): RowRecord[] {
    if (identityKey.length === 0) throw new EmptyKeyError();
    assertColumns(baseline, identityKey, 'baseline');
    assertColumns(candidate, identityKey, 'candidate');

    const known = new Set<string>();
    baseline.rows.forEach((row) => known.add(buildKeyTuple(row, identityKey)));

    // Duplicates in the candidate are kept; only the baseline decides
    return candidate.rows.filter((row) => !known.has(buildKeyTuple(row, identityKey)));
}

/**
 * Restrict a dataset to the rows sharing its first non-empty value in
 * `column` (e.g. the hospital a monthly export belongs to).
 */
export function scopeDataset(
    dataset: Dataset,
    column: string,
    scopeValue?: CellValue
): { scopeValue: CellValue; dataset: Dataset } {
    assertColumns(dataset, [column], 'scoped');

    let value: CellValue = scopeValue ?? null;
    if (scopeValue === undefined) {
        const first = dataset.rows.find((row) => !isEmptyKeyValue(row[column]));
        value = first?.[column] ?? null;
    }
    if (value === null) {
        return { scopeValue: null, dataset: { columns: dataset.columns, rows: [] } };
    }

    const target = encodeKeyValue(value);
    return {
        scopeValue: value,
        dataset: {
            columns: dataset.columns,
            rows: dataset.rows.filter((row) => encodeKeyValue(row[column]) === target),
        },
    };
}

/**
 * Diff limited to the candidate's reference scope; the baseline is scoped to
 * the same value before comparison.
 */
export function diffWithinScope(
    baseline: Dataset,
    candidate: Dataset,
    identityKey: readonly string[],
    scopeColumn: string
): ScopedDiffResult {
    if (identityKey.length === 0) throw new EmptyKeyError();
    assertColumns(baseline, [scopeColumn], 'baseline');

    const scopedCandidate = scopeDataset(candidate, scopeColumn);
    if (scopedCandidate.scopeValue === null) {
        return { scopeValue: null, rows: [] };
    }
    const scopedBaseline = scopeDataset(baseline, scopeColumn, scopedCandidate.scopeValue);

    return {
        scopeValue: scopedCandidate.scopeValue,
        rows: diffDatasets(scopedBaseline.dataset, scopedCandidate.dataset, identityKey),
    };
}

/**
 * Get comparison statistics
 */
export function getDiffStats(baseline: Dataset, candidate: Dataset, newRows: readonly RowRecord[]): DiffStats {
    return {
        baselineRows: baseline.rows.length,
        candidateRows: candidate.rows.length,
        newRows: newRows.length,
        knownRows: candidate.rows.length - newRows.length,
    };
}
