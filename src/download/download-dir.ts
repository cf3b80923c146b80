import { readdir, rename, stat } from 'node:fs/promises';
import { join } from 'node:path';

/** Extensions browsers use for files still being written */
export const IN_PROGRESS_EXTENSIONS = ['.crdownload', '.tmp', '.part'];

export interface WaitForDownloadsOptions {
    timeoutMs: number;
    pollIntervalMs?: number;
    /** Injected for tests */
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Names of in-progress download files in `dir`.
 */
export async function listInProgress(dir: string): Promise<string[]> {
    const names = await readdir(dir);
    return names.filter((name) => IN_PROGRESS_EXTENSIONS.some((ext) => name.toLowerCase().endsWith(ext)));
}

/**
 * Poll until no in-progress download files remain or the timeout passes.
 * @returns true when the directory settled in time
 */
export async function waitForDownloads(dir: string, options: WaitForDownloadsOptions): Promise<boolean> {
    const { timeoutMs, pollIntervalMs = 1000, sleep = defaultSleep } = options;
    let waited = 0;

    while ((await listInProgress(dir)).length > 0) {
        if (waited >= timeoutMs) return false;
        await sleep(pollIntervalMs);
        waited += pollIntervalMs;
    }
    return true;
}

/**
 * Most recently modified `.pdf` file in `dir`, or null when there is none.
 */
export async function findLatestPdf(dir: string): Promise<string | null> {
    const names = (await readdir(dir)).filter((name) => name.toLowerCase().endsWith('.pdf'));

    let latest: { path: string; mtimeMs: number } | null = null;
    for (const name of names) {
        const path = join(dir, name);
        const info = await stat(path);
        if (!info.isFile()) continue;
        if (!latest || info.mtimeMs > latest.mtimeMs) {
            latest = { path, mtimeMs: info.mtimeMs };
        }
    }
    return latest?.path ?? null;
}

/**
 * Take the newest PDF in the target's directory as the download result,
 * renaming it to `targetPath` when its name differs.
 */
export async function adoptLatestPdf(targetPath: string, dir: string): Promise<string | null> {
    const latest = await findLatestPdf(dir);
    if (!latest) return null;

    if (latest !== targetPath) {
        await rename(latest, targetPath);
    }
    return targetPath;
}

function defaultSleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
