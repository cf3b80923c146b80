import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { DownloadConfig, DownloadStrategy } from '../types/index.js';
import type { CrossrefClient } from '../sources/crossref.js';
import { doiToFilename, stripDoiPrefix } from '../sources/utils.js';
import type { HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';
import { BrowserDownloadStrategy } from './browser-strategy.js';
import { DirectLinkStrategy } from './direct-link-strategy.js';

/**
 * Obtains a paper's PDF by trying download strategies in order.
 */
export class PdfRetriever {
    constructor(private readonly strategies: readonly DownloadStrategy[]) {}

    /**
     * Download the PDF for a DOI into `outputDir`.
     * @returns Path of `<outputDir>/<doi with / → _>.pdf`, or null when no strategy succeeded
     */
    async fetchPdf(identifier: string, outputDir: string): Promise<string | null> {
        const logger = getLogger();
        const doi = stripDoiPrefix(identifier);
        const targetPath = join(outputDir, doiToFilename(doi));

        await mkdir(outputDir, { recursive: true });

        for (const strategy of this.strategies) {
            if (!strategy.appliesTo(doi)) {
                logger.debug({ doi, strategy: strategy.name }, 'Strategy not applicable');
                continue;
            }

            logger.debug({ doi, strategy: strategy.name }, 'Trying download strategy');
            const result = await strategy.fetch(doi, targetPath);
            if (result) return result;
        }

        logger.warn({ doi }, 'PDF unavailable from every download strategy');
        return null;
    }
}

/**
 * Default strategy chain: headless browser (unless disabled), then direct link.
 */
export function createPdfRetriever(
    download: DownloadConfig,
    crossref: Pick<CrossrefClient, 'fetchWork'>,
    httpClient?: HttpClient
): PdfRetriever {
    const strategies: DownloadStrategy[] = [];
    if (download.browser) {
        strategies.push(new BrowserDownloadStrategy(download));
    }
    strategies.push(new DirectLinkStrategy({ crossref, httpClient }));
    return new PdfRetriever(strategies);
}
