import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { ExtractedData, UnifiedResults } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/**
 * Aggregate per-paper results and compute the summary counts.
 */
export function buildUnifiedResults(data: readonly ExtractedData[], now: Date = new Date()): UnifiedResults {
    const total = data.reduce((sum, entry) => sum + entry.mechanical_properties.length, 0);

    return {
        extraction_date: now,
        papers_processed: data.length,
        total_properties_extracted: total,
        data: [...data],
    };
}

/**
 * Pretty-printed JSON (2-space indent); dates become ISO-8601 strings.
 */
export function serializeResults(results: UnifiedResults): string {
    return JSON.stringify(results, null, 2);
}

/**
 * Write the results document, creating its directory.
 */
export async function saveResults(results: UnifiedResults, outputPath: string): Promise<void> {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, serializeResults(results), 'utf-8');

    getLogger().info(
        {
            outputPath,
            papersProcessed: results.papers_processed,
            totalProperties: results.total_properties_extracted,
        },
        'Results saved'
    );
}
