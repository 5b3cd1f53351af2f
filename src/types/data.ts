// =============================================================================
// Tabular data model shared by the engines and the I/O layer
// =============================================================================

/** A normalized spreadsheet cell: text, number, date or empty (null). */
export type CellValue = string | number | Date | null;

export type RowRecord = Readonly<Record<string, CellValue>>;

export interface Dataset {
    /** Column order of the source sheet */
    columns: string[];
    rows: RowRecord[];
}

export interface NamedDataset extends Dataset {
    name: string;
}

/** Value a group key resolves to. `undefined` counts as empty. */
export type GroupKeyValue = CellValue | boolean | undefined;

export type GroupKeyFn = (row: RowRecord, index: number) => GroupKeyValue;

export type GroupKey = string | GroupKeyFn;

export interface Group {
    /** Key shared by every row; empty keys collapse to null */
    key: CellValue | boolean;
    rows: RowRecord[];
}

export interface DiffStats {
    baselineRows: number;
    candidateRows: number;
    newRows: number;
    knownRows: number;
}

export interface GroupStats {
    groups: number;
    rows: number;
    largestGroup: number;
    singletons: number;
}
