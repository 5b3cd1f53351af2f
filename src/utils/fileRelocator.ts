/**
 * File relocation: collect same-named result files from a nested output tree,
 * give each a sequence number and gather them in one folder.
 */

import fs from 'fs/promises';
import path from 'path';

export type RelocationMode = 'copy' | 'move';

export interface RelocationOptions {
    sourceRoot: string;
    /** Exact file name to look for, e.g. "resultats.xlsx" */
    fileName: string;
    destination: string;
    /** Folder levels between sourceRoot and the file (default 2) */
    depth?: number;
    mode?: RelocationMode;
}

export interface RelocationResult {
    source: string;
    /** Numbered path in the destination folder */
    target: string;
    ok: boolean;
    error?: string;
}

/**
 * "report.xlsx" + 3 -> "report(3).xlsx"
 */
export function numberedName(fileName: string, index: number): string {
    const ext = path.extname(fileName);
    return `${path.basename(fileName, ext)}(${index})${ext}`;
}

async function listDirectories(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    return entries
        .filter((e) => e.isDirectory())
        .map((e) => path.join(dir, e.name))
        .sort();
}

async function isFile(filePath: string): Promise<boolean> {
    try {
        return (await fs.stat(filePath)).isFile();
    } catch {
        return false;
    }
}

/**
 * rename, or copy + unlink when source and target sit on different devices
 */
async function moveFile(from: string, to: string): Promise<void> {
    try {
        await fs.rename(from, to);
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'EXDEV') {
            await fs.copyFile(from, to);
            await fs.unlink(from);
            return;
        }
        throw error;
    }
}

/**
 * Files named `fileName` exactly `depth` folders below `root`, in sorted
 * traversal order
 */
export async function findNestedFiles(root: string, fileName: string, depth: number = 2): Promise<string[]> {
    let level = [root];
    for (let i = 0; i < depth; i++) {
        const next: string[] = [];
        for (const dir of level) {
            next.push(...await listDirectories(dir));
        }
        level = next;
    }

    const found: string[] = [];
    for (const dir of level) {
        const candidate = path.join(dir, fileName);
        if (await isFile(candidate)) found.push(candidate);
    }
    return found;
}

/**
 * Rename each found file to its numbered name in place, then copy or move it
 * into the destination. The counter only advances on success.
 */
export async function relocateFiles(options: RelocationOptions): Promise<RelocationResult[]> {
    const { sourceRoot, fileName, destination, depth = 2, mode = 'copy' } = options;

    await fs.mkdir(destination, { recursive: true });
    const files = await findNestedFiles(sourceRoot, fileName, depth);
    console.log(`[Relocate] ${files.length} file(s) named ${fileName} under ${sourceRoot}`);

    const results: RelocationResult[] = [];
    let counter = 1;

    for (const source of files) {
        const name = numberedName(fileName, counter);
        const renamed = path.join(path.dirname(source), name);
        const target = path.join(destination, name);

        try {
            if (await isFile(renamed)) {
                throw new Error(`${renamed} already exists`);
            }
            await fs.rename(source, renamed);
            if (mode === 'move') {
                await moveFile(renamed, target);
            } else {
                await fs.copyFile(renamed, target);
            }
            console.log(`[Relocate] ${source} -> ${target}`);
            results.push({ source, target, ok: true });
            counter++;
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[Relocate] Failed for ${source}: ${message}`);
            results.push({ source, target, ok: false, error: message });
        }
    }

    return results;
}
