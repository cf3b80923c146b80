import { mkdirSync, existsSync, readFileSync, readdirSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { createHash } from 'node:crypto';
import { getLogger } from '../utils/logger.js';

interface CacheEntry {
    timestamp: number;
    key: string;
    data: unknown;
}

/**
 * Simple file-system cache for catalog responses.
 * Stores JSON files in a configurable cache directory.
 *
 * Cache key = SHA-256 of the caller's key (a bare DOI for catalog lookups).
 * TTL = 24 hours by default.
 *
 * Entries come back as `unknown`; callers validate the shape they expect.
 */
export class ResponseCache {
    private cacheDir: string;
    private ttlMs: number;
    private enabled: boolean;

    constructor(options: {
        cacheDir?: string;
        ttlHours?: number;
        enabled?: boolean;
    } = {}) {
        this.cacheDir = options.cacheDir ?? '.propextract-cache';
        this.ttlMs = (options.ttlHours ?? 24) * 60 * 60 * 1000;
        this.enabled = options.enabled ?? true;

        if (this.enabled) {
            mkdirSync(this.cacheDir, { recursive: true });
            getLogger().debug({ cacheDir: this.cacheDir }, 'Cache initialized');
        }
    }

    private filePath(key: string): string {
        const hash = createHash('sha256').update(key).digest('hex');
        return join(this.cacheDir, `${hash}.json`);
    }

    /**
     * Get a cached value, or null if not found/expired/unreadable.
     */
    get(key: string): unknown {
        if (!this.enabled) return null;

        const filePath = this.filePath(key);
        if (!existsSync(filePath)) return null;

        try {
            const entry: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
            if (!isCacheEntry(entry)) return null;

            if (Date.now() - entry.timestamp > this.ttlMs) {
                getLogger().debug({ key }, 'Cache expired');
                return null;
            }

            getLogger().debug({ key }, 'Cache hit');
            return entry.data;
        } catch (error) {
            getLogger().debug({ key, error }, 'Unreadable cache entry ignored');
            return null;
        }
    }

    /**
     * Store a value in the cache.
     */
    set(key: string, data: unknown): void {
        if (!this.enabled) return;

        const entry: CacheEntry = { timestamp: Date.now(), key, data };
        try {
            writeFileSync(this.filePath(key), JSON.stringify(entry), 'utf-8');
        } catch (error) {
            getLogger().warn({ error }, 'Failed to write cache entry');
        }
    }

    /**
     * Check if a key is cached and not expired.
     */
    has(key: string): boolean {
        return this.get(key) !== null;
    }

    /**
     * Entry count and total size on disk.
     */
    getStats(): { enabled: boolean; directory: string; entries: number; bytes: number } {
        let entries = 0;
        let bytes = 0;
        if (existsSync(this.cacheDir)) {
            for (const file of readdirSync(this.cacheDir)) {
                if (!file.endsWith('.json')) continue;
                entries++;
                bytes += statSync(join(this.cacheDir, file)).size;
            }
        }

        return {
            enabled: this.enabled,
            directory: this.cacheDir,
            entries,
            bytes,
        };
    }

    /**
     * Remove the cache directory and everything in it.
     */
    clear(): void {
        rmSync(this.cacheDir, { recursive: true, force: true });
        getLogger().debug({ cacheDir: this.cacheDir }, 'Cache cleared');
    }
}

function isCacheEntry(value: unknown): value is CacheEntry {
    return (
        typeof value === 'object' &&
        value !== null &&
        'timestamp' in value &&
        typeof value.timestamp === 'number' &&
        'key' in value &&
        typeof value.key === 'string' &&
        'data' in value
    );
}
