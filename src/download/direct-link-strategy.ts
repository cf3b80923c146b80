import type { DownloadStrategy } from '../types/index.js';
import type { CrossrefClient } from '../sources/crossref.js';
import { pdfSuffixUrl, stripDoiPrefix } from '../sources/utils.js';
import { getHttpClient, type HttpClient } from '../utils/http-client.js';
import { getLogger } from '../utils/logger.js';

/** DOI prefixes of open-access publishers serving "<landing page>/pdf" (10.3390 = MDPI) */
export const DIRECT_LINK_PREFIXES = ['10.3390/'];

const BROWSER_USER_AGENT = 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36';

export interface DirectLinkStrategyOptions {
    crossref: Pick<CrossrefClient, 'fetchWork'>;
    httpClient?: HttpClient;
    timeoutMs?: number;
}

/**
 * Plain HTTP fallback for open-access publishers: looks up the landing page
 * in Crossref, appends "/pdf" and streams the file to disk.
 */
export class DirectLinkStrategy implements DownloadStrategy {
    readonly name = 'direct-link';
    private readonly crossref: Pick<CrossrefClient, 'fetchWork'>;
    private readonly httpClient: HttpClient;
    private readonly timeoutMs: number;

    constructor(options: DirectLinkStrategyOptions) {
        this.crossref = options.crossref;
        this.httpClient = options.httpClient ?? getHttpClient();
        this.timeoutMs = options.timeoutMs ?? 60000;
    }

    appliesTo(doi: string): boolean {
        const bare = stripDoiPrefix(doi);
        return DIRECT_LINK_PREFIXES.some((prefix) => bare.startsWith(prefix));
    }

    async fetch(doi: string, targetPath: string): Promise<string | null> {
        const logger = getLogger();

        try {
            const work = await this.crossref.fetchWork(doi);
            if (!work.URL) {
                logger.info({ doi }, 'No landing page URL in Crossref record');
                return null;
            }

            const pdfUrl = pdfSuffixUrl(work.URL);
            logger.info({ pdfUrl }, 'Fallback: trying direct PDF download');

            const result = await this.httpClient.download(pdfUrl, targetPath, {
                source: 'publisher',
                timeout: this.timeoutMs,
                headers: { 'User-Agent': BROWSER_USER_AGENT },
            });

            logger.info({ pdfPath: result.path, bytes: result.bytes }, 'PDF downloaded via direct link');
            return result.path;
        } catch (error) {
            logger.warn({ doi, error }, 'Fallback download failed');
            return null;
        }
    }
}
