import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import ExcelJS from 'exceljs';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { applyConfigEntry, DEFAULT_CONFIG, loadProjectConfig, mergeConfig, parseList } from '../projectConfig';
import { ConfigError, WorkbookError } from '../errors';

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'sheet-clerk-config-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await fs.rm(tmpDir, { recursive: true, force: true });
});

async function writeIni(rows: (string | number)[][]): Promise<string> {
  const workbook = new ExcelJS.Workbook();
  workbook.addWorksheet('Data').addRow(['ignored']);
  const ini = workbook.addWorksheet('INI');
  ini.addRow(['Key', 'Value', 'Description']);
  rows.forEach((row) => ini.addRow(row));

  const filePath = path.join(tmpDir, 'project.xlsx');
  await workbook.xlsx.writeFile(filePath);
  return filePath;
}

describe('parseList', () => {
  it('accepts comma lists and JSON arrays', () => {
    expect(parseList('k', 'Date, Site ,')).toEqual(['Date', 'Site']);
    expect(parseList('k', '["Date","Site, city"]')).toEqual(['Date', 'Site, city']);
    expect(parseList('k', '  ')).toEqual([]);
  });

  it('rejects malformed JSON', () => {
    expect(() => parseList('identity_key', '["Date"')).toThrow(ConfigError);
    expect(() => parseList('identity_key', '[1, 2]')).toThrow('Config "identity_key": expected a list of column names');
  });
});

describe('applyConfigEntry', () => {
  it('matches keys case-insensitively and ignores unknown keys', () => {
    const config = {};
    applyConfigEntry(config, 'Identity_Key', 'id');
    applyConfigEntry(config, 'Something_Else', 'x');

    expect(config).toEqual({ identityKey: ['id'] });
  });

  it('validates typed values', () => {
    expect(() => applyConfigEntry({}, 'header_row', '0')).toThrow(ConfigError);
    expect(() => applyConfigEntry({}, 'group_layout', 'columns')).toThrow(
      'Config "group_layout": expected "marker" or "regions", got "columns"'
    );
    expect(() => applyConfigEntry({}, 'match_headers', 'maybe')).toThrow(ConfigError);
  });
});

describe('loadProjectConfig', () => {
  it('reads settings from the INI sheet', async () => {
    const filePath = await writeIni([
      ['Identity_Key', '["Date","Hôpital"]', 'Columns identifying a row'],
      ['Group_Key', 'case', ''],
      ['Scope_Column', 'Hôpital', ''],
      ['Date_Columns', 'Date, Visit', ''],
      ['Header_Row', 2, ''],
      ['Match_Headers', 'yes', ''],
      ['Group_Layout', 'regions', ''],
      ['Unknown', 'x', ''],
    ]);

    expect(await loadProjectConfig(filePath)).toEqual({
      identityKey: ['Date', 'Hôpital'],
      groupKey: 'case',
      scopeColumn: 'Hôpital',
      dateColumns: ['Date', 'Visit'],
      headerRow: 2,
      matchHeaders: true,
      groupLayout: 'regions',
    });
  });

  it('requires an INI sheet', async () => {
    const workbook = new ExcelJS.Workbook();
    workbook.addWorksheet('Data').addRow(['x']);
    const filePath = path.join(tmpDir, 'plain.xlsx');
    await workbook.xlsx.writeFile(filePath);

    await expect(loadProjectConfig(filePath)).rejects.toThrow(WorkbookError);
  });

  it('surfaces invalid values as ConfigError', async () => {
    const filePath = await writeIni([['Header_Row', 'first', '']]);
    await expect(loadProjectConfig(filePath)).rejects.toMatchObject({ kind: 'ConfigError', key: 'Header_Row' });
  });
});

describe('mergeConfig', () => {
  it('lets later sources win and skips undefined values', () => {
    const merged = mergeConfig(
      DEFAULT_CONFIG,
      { identityKey: ['id'], outputPrefix: 'fresh' },
      { identityKey: undefined, groupKey: 'case', outputPrefix: 'latest' }
    );

    expect(merged).toEqual({
      ...DEFAULT_CONFIG,
      identityKey: ['id'],
      groupKey: 'case',
      outputPrefix: 'latest',
    });
    expect(DEFAULT_CONFIG.identityKey).toEqual([]);
  });
});
