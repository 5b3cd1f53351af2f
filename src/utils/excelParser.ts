import ExcelJS from 'exceljs';
import path from 'path';
import type { CellValue, Dataset, NamedDataset, RowRecord } from '../types/data';
import { SchemaError, WorkbookError } from './errors';
import { resolveColumn } from './keyManager';

// =============================================================================
// Interfaces
// =============================================================================

export interface ParsedWorkbook {
    fileName: string;
    sheets: NamedDataset[];
    activeSheet: string;
}

export interface ParseOptions {
    /** 1-based row holding the headers */
    headerRow?: number;
    /** Columns whose text cells should be read as dates */
    dateColumns?: readonly string[];
}

export interface LoadOptions extends ParseOptions {
    /** Sheet name or 0-based index; defaults to the first sheet */
    sheet?: string | number;
}

// =============================================================================
// Cell normalization
// =============================================================================

/**
 * Reduce an exceljs cell value to text, number, date or empty.
 * Rich text and hyperlinks give their text, formulas their cached result.
 */
export function normalizeCellValue(val: ExcelJS.CellValue): CellValue {
    if (val === null || val === undefined) return null;
    if (val instanceof Date) return val;
    if (typeof val === 'string') return val === '' ? null : val;
    if (typeof val === 'number') return val;
    if (typeof val === 'boolean') return String(val);

    if ('richText' in val) return val.richText.map((t) => t.text).join('') || null;
    if ('hyperlink' in val) return val.text || null;
    if ('error' in val) return val.error;
    return normalizeCellValue(val.result ?? null);
}

const DMY = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;
const ISO = /^(\d{4})-(\d{2})-(\d{2})(?: (\d{2}):(\d{2}):(\d{2}))?$/;

function buildUtcDate(y: number, m: number, d: number, hh = 0, mm = 0, ss = 0): Date | null {
    const date = new Date(Date.UTC(y, m - 1, d, hh, mm, ss));
    // Reject rollovers such as 31/02/2024
    if (date.getUTCFullYear() !== y || date.getUTCMonth() !== m - 1 || date.getUTCDate() !== d) {
        return null;
    }
    return date;
}

/**
 * Parse dates typed as text: dd/mm/yyyy, yyyy-mm-dd HH:MM:SS or yyyy-mm-dd.
 * Returns null when the text matches none of them.
 */
export function parseDateText(text: string): Date | null {
    const value = text.trim();

    const dmy = DMY.exec(value);
    if (dmy) return buildUtcDate(Number(dmy[3]), Number(dmy[2]), Number(dmy[1]));

    const iso = ISO.exec(value);
    if (iso) {
        return buildUtcDate(
            Number(iso[1]), Number(iso[2]), Number(iso[3]),
            Number(iso[4] ?? 0), Number(iso[5] ?? 0), Number(iso[6] ?? 0)
        );
    }
    return null;
}

// =============================================================================
// Parser
// =============================================================================

function readSheet(worksheet: ExcelJS.Worksheet, options: ParseOptions): NamedDataset {
    const { headerRow: useHeaderRow = 1, dateColumns = [] } = options;
    const columns: string[] = [];
    const rows: RowRecord[] = [];

    const headerRow = worksheet.getRow(useHeaderRow);
    const maxCol = Math.max(worksheet.columnCount, headerRow.cellCount);

    // [Deduplication] Track seen column names
    const seenHeaders = new Map<string, number>();
    for (let c = 1; c <= maxCol; c++) {
        const raw = normalizeCellValue(headerRow.getCell(c).value);
        let headerText = raw === null ? '' : raw instanceof Date ? raw.toISOString() : String(raw).trim();
        if (!headerText) headerText = `Col ${c}`;

        const count = seenHeaders.get(headerText);
        if (count !== undefined) {
            seenHeaders.set(headerText, count + 1);
            headerText = `${headerText}_${count + 1}`;
        } else {
            seenHeaders.set(headerText, 1);
        }
        columns.push(headerText);
    }

    const dateColumnSet = new Set(dateColumns);

    worksheet.eachRow((row, rowNumber) => {
        if (rowNumber <= useHeaderRow) return; // Skip header and preceding rows

        const record: Record<string, CellValue> = {};
        let hasData = false;

        columns.forEach((colName, idx) => {
            let value = normalizeCellValue(row.getCell(idx + 1).value);
            if (typeof value === 'string' && dateColumnSet.has(colName)) {
                value = parseDateText(value) ?? value;
            }
            record[colName] = value;
            if (value !== null) hasData = true;
        });

        if (hasData) rows.push(record);
    });

    return { name: worksheet.name, columns, rows };
}

export async function parseWorkbook(source: string | Buffer, options: ParseOptions & { fileName?: string } = {}): Promise<ParsedWorkbook> {
    const name = typeof source === 'string' ? path.basename(source) : options.fileName || 'Unknown.xlsx';
    const label = typeof source === 'string' ? source : name;

    const workbook = new ExcelJS.Workbook();
    try {
        if (typeof source === 'string') {
            await workbook.xlsx.readFile(source);
        } else {
            await workbook.xlsx.load(source);
        }
    } catch (e) {
        console.error(`[ExcelParser] Error loading workbook ${label}`, e);
        throw new WorkbookError(label, 'cannot be read as an .xlsx workbook', e);
    }

    const sheets: NamedDataset[] = [];
    workbook.worksheets.forEach((worksheet) => {
        try {
            sheets.push(readSheet(worksheet, options));
        } catch (err) {
            console.error(`[ExcelParser] Error processing sheet: ${worksheet.name}`, err);
        }
    });

    return {
        fileName: name,
        sheets,
        activeSheet: sheets.length > 0 ? sheets[0].name : '',
    };
}

/**
 * Load a single sheet of a workbook as a Dataset
 */
export async function loadDataset(filePath: string, options: LoadOptions = {}): Promise<NamedDataset> {
    const { sheet = 0 } = options;
    const parsed = await parseWorkbook(filePath, options);

    const found = typeof sheet === 'number'
        ? parsed.sheets[sheet]
        : parsed.sheets.find((s) => s.name === sheet);

    if (!found) {
        throw new WorkbookError(filePath, `sheet ${JSON.stringify(sheet)} not found`);
    }
    return found;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Keep only the given columns, in the given order
 */
export function projectColumns(dataset: Dataset, columns: readonly string[]): Dataset {
    const missing = columns.find((col) => !dataset.columns.includes(col));
    if (missing !== undefined) throw new SchemaError(missing);

    return {
        columns: [...columns],
        rows: dataset.rows.map((row) => {
            const projected: Record<string, CellValue> = {};
            columns.forEach((col) => {
                projected[col] = row[col] ?? null;
            });
            return projected;
        }),
    };
}

/**
 * Concatenate datasets in order. Columns are the union in first-seen order;
 * rows missing a column get an empty cell.
 */
export function concatDatasets(datasets: readonly Dataset[]): Dataset {
    const columns: string[] = [];
    datasets.forEach((ds) => ds.columns.forEach((col) => {
        if (!columns.includes(col)) columns.push(col);
    }));

    const rows = datasets.flatMap((ds) => ds.rows.map((row) => {
        if (ds.columns.length === columns.length) return row;
        const filled: Record<string, CellValue> = {};
        columns.forEach((col) => {
            filled[col] = row[col] ?? null;
        });
        return filled;
    }));

    return { columns, rows };
}

/**
 * Rename columns (old -> new) in the header and in every row
 */
export function renameColumns(dataset: Dataset, renames: ReadonlyMap<string, string>): Dataset {
    if (renames.size === 0) return dataset;
    const rename = (col: string) => renames.get(col) ?? col;

    return {
        columns: dataset.columns.map(rename),
        rows: dataset.rows.map((row) => {
            const renamed: Record<string, CellValue> = {};
            Object.entries(row).forEach(([col, value]) => {
                renamed[rename(col)] = value;
            });
            return renamed;
        }),
    };
}

/**
 * Make sure each wanted column exists under its wanted name. With `fuzzy`,
 * a header matched by keyword is renamed to the wanted name.
 */
export function alignColumns(dataset: Dataset, wanted: readonly string[], fuzzy: boolean): Dataset {
    const renames = new Map<string, string>();
    wanted.forEach((name) => {
        const resolved = resolveColumn(dataset.columns, name, fuzzy);
        if (resolved !== name) renames.set(resolved, name);
    });
    return renameColumns(dataset, renames);
}
