#!/usr/bin/env node
import { parseArgs } from 'util';
import { runDiff, runExtract, runGroup, runRelocate } from './commands';
import { describeError } from '../src/utils/errors';
import { DEFAULT_CONFIG, loadProjectConfig, mergeConfig, parseList } from '../src/utils/projectConfig';
import type { ClerkConfig } from '../src/utils/projectConfig';

const USAGE = `Usage: sheet-clerk <command> [options]

Commands:
  diff <candidate.xlsx...> --baseline <file> --key <cols> [--scope <col>] [--out-dir <dir>]
  group <input.xlsx...> --by <col> --out <file> [--columns <cols>] [--layout marker|regions]
  relocate --root <dir> --file <name> --dest <dir> [--depth <n>] [--move]
  extract --work <dir> --out <dir> [--prune]

Common options:
  --config <file.xlsx>   read settings from the workbook's INI sheet
  --header-row <n>       1-based header row (default 1)
  --date-columns <cols>  text cells of these columns are read as dates
  --match-headers        resolve column names by keyword`;

const OPTIONS = {
    config: { type: 'string' },
    baseline: { type: 'string' },
    key: { type: 'string' },
    scope: { type: 'string' },
    'out-dir': { type: 'string' },
    by: { type: 'string' },
    out: { type: 'string' },
    columns: { type: 'string' },
    layout: { type: 'string' },
    'header-row': { type: 'string' },
    'date-columns': { type: 'string' },
    'match-headers': { type: 'boolean' },
    root: { type: 'string' },
    file: { type: 'string' },
    dest: { type: 'string' },
    depth: { type: 'string' },
    move: { type: 'boolean' },
    work: { type: 'string' },
    prune: { type: 'boolean' },
    help: { type: 'boolean', short: 'h' },
} as const;

class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

function required(value: string | undefined, flag: string): string {
    if (!value) throw new UsageError(`--${flag} is required`);
    return value;
}

function toInt(value: string | undefined, flag: string, min: number = 0): number | undefined {
    if (value === undefined) return undefined;
    const n = Number(value);
    if (!Number.isInteger(n) || n < min) throw new UsageError(`--${flag} expects a whole number of at least ${min}`);
    return n;
}

async function run(argv: string[]): Promise<number> {
    const { values, positionals } = parseArgs({ args: argv, options: OPTIONS, allowPositionals: true });
    const [command, ...rest] = positionals;

    if (values.help || !command) {
        console.log(USAGE);
        return values.help ? 0 : 2;
    }

    const layout = values.layout;
    if (layout !== undefined && layout !== 'marker' && layout !== 'regions') {
        throw new UsageError('--layout expects marker or regions');
    }

    const fileConfig = values.config ? await loadProjectConfig(values.config) : {};
    const flagConfig: Partial<ClerkConfig> = {
        identityKey: values.key !== undefined ? parseList('key', values.key) : undefined,
        groupKey: values.by,
        scopeColumn: values.scope,
        dateColumns: values['date-columns'] !== undefined ? parseList('date-columns', values['date-columns']) : undefined,
        headerRow: toInt(values['header-row'], 'header-row', 1),
        groupLayout: layout,
        matchHeaders: values['match-headers'],
    };
    const config = mergeConfig(DEFAULT_CONFIG, fileConfig, flagConfig);

    switch (command) {
        case 'diff': {
            if (rest.length === 0) throw new UsageError('diff needs at least one candidate file');
            const reports = await runDiff({
                baseline: required(values.baseline, 'baseline'),
                candidates: rest,
                outDir: values['out-dir'] ?? '.',
                config,
            });
            return reports.some((r) => r.error) ? 1 : 0;
        }
        case 'group': {
            if (rest.length === 0) throw new UsageError('group needs at least one input file');
            await runGroup({
                inputs: rest,
                output: required(values.out, 'out'),
                columns: values.columns !== undefined ? parseList('columns', values.columns) : undefined,
                config,
            });
            return 0;
        }
        case 'relocate': {
            const results = await runRelocate({
                root: required(values.root, 'root'),
                fileName: required(values.file, 'file'),
                destination: required(values.dest, 'dest'),
                depth: toInt(values.depth, 'depth'),
                mode: values.move ? 'move' : 'copy',
            });
            return results.some((r) => !r.ok) ? 1 : 0;
        }
        case 'extract': {
            const report = await runExtract({
                workDir: required(values.work, 'work'),
                outDir: required(values.out, 'out'),
                prune: values.prune,
            });
            return [...report.results, ...report.pruned].some((r) => !r.ok) ? 1 : 0;
        }
        default:
            throw new UsageError(`unknown command "${command}"`);
    }
}

function isUsageError(error: unknown): error is Error {
    if (error instanceof UsageError) return true;
    return error instanceof Error && 'code' in error && String(error.code).startsWith('ERR_PARSE_ARGS');
}

/**
 * Run one command. Resolves to the exit code: 0 on success, 1 when any file
 * failed, 2 on usage errors.
 */
export async function main(argv: string[]): Promise<number> {
    try {
        return await run(argv);
    } catch (error) {
        if (isUsageError(error)) {
            console.error(`${error.message}\n\n${USAGE}`);
            return 2;
        }
        console.error(`[Main] ${describeError(error)}`);
        return 1;
    }
}

if (require.main === module) {
    main(process.argv.slice(2)).then((code) => {
        process.exitCode = code;
    });
}
