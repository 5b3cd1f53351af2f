import ExcelJS from 'exceljs';
import fs from 'fs/promises';
import path from 'path';
import type { CellValue, Dataset, Group } from '../types/data';
import { flattenGroups } from './groupingEngine';
import { uniqueColumnName } from './keyManager';

export type GroupLayout = 'marker' | 'regions';

export interface WriteOptions {
    sheetName?: string;
    /** numFmt applied to date cells */
    dateFormat?: string;
}

export interface WriteGroupsOptions extends WriteOptions {
    layout?: GroupLayout;
    markerColumn?: string;
}

export const DEFAULT_DATE_FORMAT = 'dd/mm/yyyy';

/**
 * Auto-fit column widths based on content
 */
function autoFitColumns(worksheet: ExcelJS.Worksheet) {
    // No column definitions are set, so walk them by index
    for (let c = 1; c <= worksheet.columnCount; c++) {
        const column = worksheet.getColumn(c);

        let maxLength = 10; // Minimum width
        column.values.forEach((cell) => {
            if (cell) {
                const cellLength = cell instanceof Date ? 10 : String(cell).length;
                if (cellLength > maxLength) {
                    maxLength = cellLength;
                }
            }
        });

        column.width = Math.min(maxLength + 2, 50);
    }
}

/**
 * Apply header formatting and filters
 */
function formatHeaders(worksheet: ExcelJS.Worksheet, columnCount: number) {
    const headerRow = worksheet.getRow(1);

    headerRow.font = { bold: true, color: { argb: 'FFFFFFFF' } };
    headerRow.fill = {
        type: 'pattern',
        pattern: 'solid',
        fgColor: { argb: 'FF4472C4' }
    };
    headerRow.alignment = { vertical: 'middle', horizontal: 'center' };

    if (columnCount > 0) {
        worksheet.autoFilter = {
            from: { row: 1, column: 1 },
            to: { row: 1, column: columnCount }
        };
    }
}

/**
 * Sanitize a string for use as an Excel worksheet name
 * (Removes * ? : \ / [ ] and limits to 31 chars)
 */
export function sanitizeSheetName(name: string): string {
    const sanitized = name.replace(/[\\/*?:[\]]/g, '_');
    return sanitized.substring(0, 31) || 'Sheet1';
}

function addDataRow(worksheet: ExcelJS.Worksheet, values: CellValue[], dateFormat: string) {
    const added = worksheet.addRow(values);
    values.forEach((value, idx) => {
        if (value instanceof Date) {
            added.getCell(idx + 1).numFmt = dateFormat;
        }
    });
}

async function saveWorkbook(workbook: ExcelJS.Workbook, filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await workbook.xlsx.writeFile(filePath);
}

function createSheet(columns: readonly string[], options: WriteOptions): { workbook: ExcelJS.Workbook; worksheet: ExcelJS.Worksheet } {
    const workbook = new ExcelJS.Workbook();
    const worksheet = workbook.addWorksheet(sanitizeSheetName(options.sheetName || 'Data'));
    worksheet.addRow([...columns]);
    formatHeaders(worksheet, columns.length);
    return { workbook, worksheet };
}

/**
 * Write a dataset as a single sheet: header row then rows in column order
 */
export async function writeDataset(filePath: string, dataset: Dataset, options: WriteOptions = {}): Promise<void> {
    const dateFormat = options.dateFormat || DEFAULT_DATE_FORMAT;
    const { workbook, worksheet } = createSheet(dataset.columns, options);

    dataset.rows.forEach((row) => {
        addDataRow(worksheet, dataset.columns.map((col) => row[col] ?? null), dateFormat);
    });

    autoFitColumns(worksheet);
    await saveWorkbook(workbook, filePath);
}

/**
 * Write grouped rows.
 * - marker: one table with a trailing group-number column
 * - regions: groups one after another, separated by a blank row
 */
export async function writeGroups(
    filePath: string,
    columns: readonly string[],
    groups: readonly Group[],
    options: WriteGroupsOptions = {}
): Promise<void> {
    const { layout = 'marker', markerColumn = 'Group' } = options;

    if (layout === 'marker') {
        const taken = new Set(columns);
        groups.forEach((group) => group.rows.forEach((row) => Object.keys(row).forEach((col) => taken.add(col))));
        const marker = uniqueColumnName(Array.from(taken), markerColumn);
        if (marker !== markerColumn) {
            console.warn(`[Export] Column "${markerColumn}" already exists, group numbers go to "${marker}"`);
        }
        await writeDataset(filePath, { columns: [...columns, marker], rows: flattenGroups(groups, marker) }, options);
        return;
    }

    const dateFormat = options.dateFormat || DEFAULT_DATE_FORMAT;
    const { workbook, worksheet } = createSheet(columns, options);

    groups.forEach((group, idx) => {
        if (idx > 0) worksheet.addRow([]);
        group.rows.forEach((row) => {
            addDataRow(worksheet, columns.map((col) => row[col] ?? null), dateFormat);
        });
    });

    autoFitColumns(worksheet);
    await saveWorkbook(workbook, filePath);
}
