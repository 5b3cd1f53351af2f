import ExcelJS from 'exceljs';
import type { GroupLayout } from './exportResults';
import { DEFAULT_DATE_FORMAT } from './exportResults';
import { ConfigError, WorkbookError } from './errors';
import { normalizeCellValue } from './excelParser';

// =============================================================================
// Project Config (INI sheet)
// =============================================================================

export interface ClerkConfig {
    identityKey: string[];
    groupKey?: string;
    /** Restrict each candidate to its first non-empty value of this column */
    scopeColumn?: string;
    dateColumns: string[];
    headerRow: number;
    outputPrefix: string;
    dateFormat: string;
    markerColumn: string;
    groupLayout: GroupLayout;
    /** Resolve column names by case-insensitive keyword match */
    matchHeaders: boolean;
}

export const DEFAULT_CONFIG: ClerkConfig = {
    identityKey: [],
    dateColumns: [],
    headerRow: 1,
    outputPrefix: 'new_lines_only',
    dateFormat: DEFAULT_DATE_FORMAT,
    markerColumn: 'Group',
    groupLayout: 'marker',
    matchHeaders: false,
};

export const INI_SHEET_NAME = 'INI';

/**
 * "a, b" or '["a","b"]' -> ['a', 'b']
 */
export function parseList(key: string, value: string): string[] {
    const trimmed = value.trim();
    if (!trimmed) return [];

    if (trimmed.startsWith('[')) {
        let parsed: unknown;
        try {
            parsed = JSON.parse(trimmed);
        } catch {
            throw new ConfigError(key, 'invalid JSON list');
        }
        if (!Array.isArray(parsed) || !parsed.every((v): v is string => typeof v === 'string')) {
            throw new ConfigError(key, 'expected a list of column names');
        }
        return parsed;
    }
    return trimmed.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
}

function parseBoolean(key: string, value: string): boolean {
    const lower = value.trim().toLowerCase();
    if (['true', 'yes', '1'].includes(lower)) return true;
    if (['false', 'no', '0', ''].includes(lower)) return false;
    throw new ConfigError(key, `expected true or false, got "${value}"`);
}

function parsePositiveInt(key: string, value: string): number {
    const n = Number(value.trim());
    if (!Number.isInteger(n) || n < 1) {
        throw new ConfigError(key, `expected a positive integer, got "${value}"`);
    }
    return n;
}

/**
 * Apply one Key/Value pair. Keys are case-insensitive, unknown keys ignored.
 */
export function applyConfigEntry(config: Partial<ClerkConfig>, key: string, valStr: string): Partial<ClerkConfig> {
    const lowerKey = key.trim().toLowerCase();
    const value = valStr.trim();

    if (lowerKey === 'identity_key') config.identityKey = parseList(key, value);
    else if (lowerKey === 'group_key') config.groupKey = value || undefined;
    else if (lowerKey === 'scope_column') config.scopeColumn = value || undefined;
    else if (lowerKey === 'date_columns') config.dateColumns = parseList(key, value);
    else if (lowerKey === 'header_row') config.headerRow = parsePositiveInt(key, value);
    else if (lowerKey === 'output_prefix') config.outputPrefix = value || DEFAULT_CONFIG.outputPrefix;
    else if (lowerKey === 'date_format') config.dateFormat = value || DEFAULT_CONFIG.dateFormat;
    else if (lowerKey === 'marker_column') config.markerColumn = value || DEFAULT_CONFIG.markerColumn;
    else if (lowerKey === 'group_layout') {
        if (value !== 'marker' && value !== 'regions') {
            throw new ConfigError(key, `expected "marker" or "regions", got "${value}"`);
        }
        config.groupLayout = value;
    }
    else if (lowerKey === 'match_headers') config.matchHeaders = parseBoolean(key, value);

    return config;
}

function cellText(cell: ExcelJS.Cell): string {
    const val = normalizeCellValue(cell.value);
    if (val === null) return '';
    return val instanceof Date ? val.toISOString() : String(val);
}

/**
 * Read the INI sheet (Key | Value | Description, header on row 1) of a workbook
 */
export async function loadProjectConfig(filePath: string): Promise<Partial<ClerkConfig>> {
    const workbook = new ExcelJS.Workbook();
    try {
        await workbook.xlsx.readFile(filePath);
    } catch (e) {
        throw new WorkbookError(filePath, 'cannot be read as an .xlsx workbook', e);
    }

    const iniSheet = workbook.getWorksheet(INI_SHEET_NAME);
    if (!iniSheet) {
        throw new WorkbookError(filePath, `no ${INI_SHEET_NAME} sheet`);
    }

    const config: Partial<ClerkConfig> = {};
    iniSheet.eachRow((row, rowNumber) => {
        if (rowNumber === 1) return; // Skip header

        const key = cellText(row.getCell(1));
        if (!key) return;
        applyConfigEntry(config, key, cellText(row.getCell(2)));
    });

    console.log('[Config] INI Config loaded:', Object.keys(config));
    return config;
}

/**
 * Later sources win; undefined values never override
 */
export function mergeConfig(base: ClerkConfig, ...overrides: Partial<ClerkConfig>[]): ClerkConfig {
    const merged: ClerkConfig = { ...base };
    overrides.forEach((override) => {
        Object.entries(override).forEach(([key, value]) => {
            if (value !== undefined) Object.assign(merged, { [key]: value });
        });
    });
    return merged;
}
