import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { ExtractorConfig, PaperDescriptor } from '../types/index.js';
import { ConfigError, errorMessage } from '../utils/errors.js';

/**
 * Papers processed when no list is supplied.
 */
export const DEFAULT_PAPERS: readonly PaperDescriptor[] = [
    {
        doi: 'https://doi.org/10.3390/cryst9110586',
        title: 'Effect of ECAP on the Microstructure and Mechanical Properties of a Rolled Mg-2Y-0.6Nd-0.6Zr Magnesium Alloy',
    },
    {
        doi: 'https://doi.org/10.3390/met14111217',
        title: 'Investigation of Mechanical Properties and Microstructural Evolution in Pure Copper with Dual Heterostructures Produced by Surface Mechanical Attrition Treatment',
    },
];

const paperListSchema = z.array(
    z.object({
        doi: z.string().min(1),
        title: z.string().default(''),
    })
);

/**
 * Parse a JSON paper list: `[{ "doi": "...", "title": "..." }, ...]`.
 */
export function parsePaperList(json: string, source = 'paper list'): PaperDescriptor[] {
    let raw: unknown;
    try {
        raw = JSON.parse(json);
    } catch (error) {
        throw new ConfigError(`Invalid JSON in ${source}`, {
            cause: errorMessage(error),
        });
    }

    const parsed = paperListSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(`Invalid paper list in ${source}`, {
            issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
    }
    return parsed.data;
}

/**
 * Read a JSON paper list from disk.
 */
export async function loadPaperList(path: string): Promise<PaperDescriptor[]> {
    return parsePaperList(await readFile(path, 'utf-8'), path);
}

/**
 * Pick the papers for a run: explicit list > list file > DOIs > defaults.
 */
export async function resolvePaperList(config: ExtractorConfig): Promise<PaperDescriptor[]> {
    if (config.papers?.length) return config.papers;
    if (config.papersFile) return loadPaperList(config.papersFile);
    if (config.doi?.length) return config.doi.map((doi) => ({ doi, title: '' }));
    return [...DEFAULT_PAPERS];
}
