import path from 'path';
import type { Dataset, DiffStats, GroupStats } from '../src/types/data';
import { diffDatasets, diffWithinScope, getDiffStats } from '../src/utils/comparisonEngine';
import { groupRows, getGroupStats } from '../src/utils/groupingEngine';
import { alignColumns, concatDatasets, loadDataset, projectColumns } from '../src/utils/excelParser';
import { writeDataset, writeGroups } from '../src/utils/exportResults';
import { relocateFiles } from '../src/utils/fileRelocator';
import type { RelocationMode, RelocationResult } from '../src/utils/fileRelocator';
import { extractLatestArchives } from '../src/utils/archiveExtractor';
import type { ExtractLatestReport } from '../src/utils/archiveExtractor';
import { ConfigError, describeError, EmptyKeyError } from '../src/utils/errors';
import type { ClerkConfig } from '../src/utils/projectConfig';

// -------------------------------------------------------------------------
// diff
// -------------------------------------------------------------------------

export interface DiffCommandOptions {
    baseline: string;
    candidates: string[];
    outDir: string;
    config: ClerkConfig;
}

export interface DiffReport {
    candidate: string;
    /** Written file, null when there was nothing new or the run failed */
    output: string | null;
    stats?: DiffStats;
    scopeValue?: string;
    error?: string;
}

function keyColumns(config: ClerkConfig): string[] {
    return config.scopeColumn && !config.identityKey.includes(config.scopeColumn)
        ? [...config.identityKey, config.scopeColumn]
        : config.identityKey;
}

export async function runDiff(options: DiffCommandOptions): Promise<DiffReport[]> {
    const { baseline: baselinePath, candidates, outDir, config } = options;
    const loadOptions = { headerRow: config.headerRow, dateColumns: config.dateColumns };

    if (config.identityKey.length === 0) throw new EmptyKeyError();

    let baseline: Dataset = await loadDataset(baselinePath, loadOptions);
    if (config.matchHeaders) baseline = alignColumns(baseline, keyColumns(config), true);
    console.log(`[Diff] Baseline ${baselinePath}: ${baseline.rows.length} rows`);

    const reports: DiffReport[] = [];

    for (const [idx, candidatePath] of candidates.entries()) {
        const output = path.join(outDir, `${config.outputPrefix}${idx + 1}.xlsx`);
        console.log(`[Diff] Processing ${candidatePath}...`);

        try {
            let candidate: Dataset = await loadDataset(candidatePath, loadOptions);
            if (config.matchHeaders) candidate = alignColumns(candidate, keyColumns(config), true);

            let newRows = candidate.rows;
            let scopeValue: string | undefined;

            if (config.scopeColumn) {
                const scoped = diffWithinScope(baseline, candidate, config.identityKey, config.scopeColumn);
                if (scoped.scopeValue === null) {
                    console.warn(`[Diff] No ${config.scopeColumn} value in ${candidatePath}; skipped`);
                    reports.push({ candidate: candidatePath, output: null, stats: getDiffStats(baseline, candidate, []) });
                    continue;
                }
                scopeValue = scoped.scopeValue instanceof Date ? scoped.scopeValue.toISOString() : String(scoped.scopeValue);
                newRows = scoped.rows;
            } else {
                newRows = diffDatasets(baseline, candidate, config.identityKey);
            }

            const stats = getDiffStats(baseline, candidate, newRows);
            if (newRows.length === 0) {
                console.log(`[Diff] No new rows in ${candidatePath}`);
                reports.push({ candidate: candidatePath, output: null, stats, scopeValue });
                continue;
            }

            await writeDataset(output, { columns: candidate.columns, rows: newRows }, {
                sheetName: scopeValue ? `New_${scopeValue}` : 'New rows',
                dateFormat: config.dateFormat,
            });
            console.log(`[Diff] ${newRows.length} new row(s) from ${candidatePath} saved to ${output}`);
            reports.push({ candidate: candidatePath, output, stats, scopeValue });
        } catch (error) {
            console.error(`[Diff] ${candidatePath}: ${describeError(error)}`);
            reports.push({ candidate: candidatePath, output: null, error: describeError(error) });
        }
    }

    return reports;
}

// -------------------------------------------------------------------------
// group
// -------------------------------------------------------------------------

export interface GroupCommandOptions {
    inputs: string[];
    output: string;
    /** Keep only these columns, in this order */
    columns?: string[];
    config: ClerkConfig;
}

export interface GroupReport {
    output: string;
    stats: GroupStats;
}

export async function runGroup(options: GroupCommandOptions): Promise<GroupReport> {
    const { inputs, output, columns, config } = options;
    const groupKey = config.groupKey;
    if (!groupKey) {
        throw new ConfigError('group_key', 'a group key column is required');
    }

    const datasets: Dataset[] = [];
    for (const input of inputs) {
        let dataset: Dataset = await loadDataset(input, { headerRow: config.headerRow, dateColumns: config.dateColumns });
        if (config.matchHeaders) dataset = alignColumns(dataset, [groupKey, ...(columns ?? [])], true);
        if (columns && columns.length > 0) dataset = projectColumns(dataset, columns);
        console.log(`[Group] ${input}: ${dataset.rows.length} rows`);
        datasets.push(dataset);
    }

    const combined = concatDatasets(datasets);
    const groups = groupRows(combined.rows, groupKey);
    const stats = getGroupStats(groups);

    await writeGroups(output, combined.columns, groups, {
        layout: config.groupLayout,
        markerColumn: config.markerColumn,
        dateFormat: config.dateFormat,
        sheetName: 'Grouped',
    });
    console.log(`[Group] ${stats.rows} row(s) in ${stats.groups} group(s) saved to ${output}`);

    return { output, stats };
}

// -------------------------------------------------------------------------
// relocate / extract
// -------------------------------------------------------------------------

export async function runRelocate(options: {
    root: string;
    fileName: string;
    destination: string;
    depth?: number;
    mode?: RelocationMode;
}): Promise<RelocationResult[]> {
    const results = await relocateFiles({
        sourceRoot: options.root,
        fileName: options.fileName,
        destination: options.destination,
        depth: options.depth,
        mode: options.mode,
    });
    const done = results.filter((r) => r.ok).length;
    console.log(`[Relocate] ${done} of ${results.length} file(s) relocated to ${options.destination}`);
    return results;
}

export async function runExtract(options: { workDir: string; outDir: string; prune?: boolean }): Promise<ExtractLatestReport> {
    const report = await extractLatestArchives({
        workDir: options.workDir,
        outDir: options.outDir,
        pruneSuperseded: options.prune,
    });
    const done = report.results.filter((r) => r.ok).length;
    console.log(`[Extract] ${done} of ${report.results.length} latest archive(s) extracted`);
    return report;
}
