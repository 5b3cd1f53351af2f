/**
 * Archive extraction: keep the most recent dated .zip of every prefix and
 * unpack it into its own folder.
 */

import JSZip from 'jszip';
import fs from 'fs/promises';
import path from 'path';

const ARCHIVE_PATTERN = /^(?<prefix>.+)-(?<date>\d{8})\.zip$/i;

export interface ArchiveName {
    prefix: string;
    /** YYYYMMDD */
    date: string;
}

export interface ArchiveSelection {
    latest: Map<string, { date: string; path: string }>;
    superseded: string[];
    skipped: string[];
}

export interface ArchiveResult {
    archive: string;
    destination: string;
    ok: boolean;
    entries: number;
    error?: string;
}

export interface PruneResult {
    archive: string;
    ok: boolean;
    error?: string;
}

export interface ExtractLatestOptions {
    workDir: string;
    outDir: string;
    /** Delete archives replaced by a newer one of the same prefix */
    pruneSuperseded?: boolean;
}

export interface ExtractLatestReport {
    results: ArchiveResult[];
    superseded: string[];
    /** One entry per superseded archive when pruning, otherwise empty */
    pruned: PruneResult[];
    skipped: string[];
}

export function parseArchiveName(fileName: string): ArchiveName | null {
    const match = ARCHIVE_PATTERN.exec(fileName);
    if (!match?.groups) return null;
    return { prefix: match.groups.prefix, date: match.groups.date };
}

/**
 * Pick the latest archive per prefix. On equal dates the first path wins.
 */
export function selectLatestArchives(paths: readonly string[]): ArchiveSelection {
    const latest = new Map<string, { date: string; path: string }>();
    const skipped: string[] = [];

    paths.forEach((p) => {
        const parsed = parseArchiveName(path.basename(p));
        if (!parsed) {
            skipped.push(p);
            return;
        }
        const prev = latest.get(parsed.prefix);
        if (!prev || Number(parsed.date) > Number(prev.date)) {
            latest.set(parsed.prefix, { date: parsed.date, path: p });
        }
    });

    const kept = new Set(Array.from(latest.values()).map((v) => v.path));
    const superseded = paths.filter((p) => !skipped.includes(p) && !kept.has(p));

    return { latest, superseded, skipped };
}

/**
 * All .zip files below `dir`, sorted
 */
export async function findArchives(dir: string): Promise<string[]> {
    const found: string[] = [];
    const entries = await fs.readdir(dir, { withFileTypes: true });

    for (const entry of entries) {
        const full = path.join(dir, entry.name);
        if (entry.isDirectory()) {
            found.push(...await findArchives(full));
        } else if (entry.isFile() && entry.name.toLowerCase().endsWith('.zip')) {
            found.push(full);
        }
    }
    return found.sort();
}

/**
 * Unpack every entry of a zip into `destination`. Entries resolving outside
 * the destination are rejected.
 */
export async function extractArchive(zipPath: string, destination: string): Promise<ArchiveResult> {
    try {
        const zip = await JSZip.loadAsync(await fs.readFile(zipPath));
        const root = path.resolve(destination);
        await fs.mkdir(root, { recursive: true });

        let entries = 0;
        for (const file of Object.values(zip.files)) {
            const target = path.resolve(root, file.name);
            if (target !== root && !target.startsWith(root + path.sep)) {
                throw new Error(`entry "${file.name}" escapes the destination folder`);
            }

            if (file.dir) {
                await fs.mkdir(target, { recursive: true });
                continue;
            }
            await fs.mkdir(path.dirname(target), { recursive: true });
            await fs.writeFile(target, await file.async('nodebuffer'));
            entries++;
        }

        return { archive: zipPath, destination, ok: true, entries };
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return { archive: zipPath, destination, ok: false, entries: 0, error: message };
    }
}

export async function extractLatestArchives(options: ExtractLatestOptions): Promise<ExtractLatestReport> {
    const { workDir, outDir, pruneSuperseded = false } = options;

    const archives = await findArchives(workDir);
    console.log(`[Extract] Found ${archives.length} zip file(s) under ${workDir}`);

    const { latest, superseded, skipped } = selectLatestArchives(archives);
    skipped.forEach((p) => console.log(`[Extract] Skipping non-matching: ${path.basename(p)}`));

    const pruned: PruneResult[] = [];
    if (pruneSuperseded) {
        for (const p of superseded) {
            try {
                await fs.unlink(p);
                console.log(`[Extract] Removed superseded ${p}`);
                pruned.push({ archive: p, ok: true });
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                console.warn(`[Extract] Could not remove ${p}: ${message}`);
                pruned.push({ archive: p, ok: false, error: message });
            }
        }
    }

    const results: ArchiveResult[] = [];
    for (const [prefix, { date, path: archivePath }] of latest) {
        const destination = path.join(outDir, `${prefix}-${date}`);
        console.log(`[Extract] ${path.basename(archivePath)} -> ${destination}`);

        const result = await extractArchive(archivePath, destination);
        if (!result.ok) {
            console.warn(`[Extract] Skipping invalid zip ${archivePath}: ${result.error}`);
        }
        results.push(result);
    }

    return { results, superseded, pruned, skipped };
}
