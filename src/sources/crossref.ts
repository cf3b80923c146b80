import { z } from 'zod';
import type {
    CrossrefConfig,
    CrossrefResponse,
    CrossrefWork,
    PaperInfo,
    PaperMetadata,
    RetryPolicy,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { ResponseCache } from '../cache/response-cache.js';
import { getHttpClient, HttpError, type HttpClient } from '../utils/http-client.js';
import { CatalogError, errorMessage } from '../utils/errors.js';
import { withRetry } from '../utils/retry.js';
import { getLogger } from '../utils/logger.js';
import { datePartsYear, stripDoiPrefix } from './utils.js';

/**
 * Wire schema for a Crossref work. Every field degrades to undefined when it has
 * an unexpected type, so odd records still yield metadata.
 */
const crossrefWorkSchema: z.ZodType<CrossrefWork, z.ZodTypeDef, unknown> = z.object({
    DOI: z.string().optional().catch(undefined),
    URL: z.string().optional().catch(undefined),
    title: z.array(z.string()).optional().catch(undefined),
    author: z
        .array(
            z.object({
                given: z.string().optional().catch(undefined),
                family: z.string().optional().catch(undefined),
                ORCID: z.string().optional().catch(undefined),
                sequence: z.string().optional().catch(undefined),
            })
        )
        .optional()
        .catch(undefined),
    'published-print': z
        .object({
            'date-parts': z.array(z.array(z.number().nullable())).optional().catch(undefined),
        })
        .optional()
        .catch(undefined),
    'container-title': z.array(z.string()).optional().catch(undefined),
    publisher: z.string().optional().catch(undefined),
    abstract: z.string().optional().catch(undefined),
});

const crossrefResponseSchema: z.ZodType<CrossrefResponse, z.ZodTypeDef, unknown> = z.object({
    status: z.string().optional().catch(undefined),
    'message-type': z.string().optional().catch(undefined),
    message: crossrefWorkSchema,
});

export interface CrossrefClientOptions extends Partial<CrossrefConfig> {
    retry?: RetryPolicy;
    cache?: ResponseCache;
    httpClient?: HttpClient;
    /** Injected for tests */
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Crossref catalog client: single-DOI lookup and normalization.
 *
 * @see https://api.crossref.org/swagger-ui/index.html
 */
export class CrossrefClient {
    private readonly httpClient: HttpClient;
    private readonly baseUrl: string;
    private readonly email?: string;
    private readonly retry: RetryPolicy;
    private readonly cache?: ResponseCache;
    private readonly sleep?: (ms: number) => Promise<void>;

    constructor(options: CrossrefClientOptions = {}) {
        this.baseUrl = (options.baseUrl ?? DEFAULT_CONFIG.crossref.baseUrl).replace(/\/+$/, '');
        this.email = options.email;
        this.retry = options.retry ?? DEFAULT_CONFIG.retry;
        this.cache = options.cache;
        this.sleep = options.sleep;
        this.httpClient = options.httpClient ?? getHttpClient({ email: this.email });
    }

    /**
     * Fetch the raw work record for a DOI.
     * Retries transient and rate-limit failures; a 404 fails at once.
     */
    async fetchWork(identifier: string): Promise<CrossrefWork> {
        const doi = stripDoiPrefix(identifier);

        const cached = this.cache?.get(doi);
        if (cached) {
            const parsed = crossrefWorkSchema.safeParse(cached);
            if (parsed.success) return parsed.data;
        }

        const url = `${this.baseUrl}/works/${doi}`;
        const headers: Record<string, string> = { Accept: 'application/json' };
        if (this.email) {
            headers['User-Agent'] = `propextract/1.0.0 (mailto:${this.email})`;
        }

        const work = await withRetry(
            async () => {
                getLogger().debug({ url }, 'Crossref work lookup');
                try {
                    const response = await this.httpClient.get<unknown>(url, { source: 'crossref', headers });
                    const parsed = crossrefResponseSchema.safeParse(response.data);
                    if (!parsed.success) {
                        throw new CatalogError(`Unexpected Crossref response for ${doi}`, 'transient', doi, response.status);
                    }
                    return parsed.data.message;
                } catch (error) {
                    throw toCatalogError(error, doi);
                }
            },
            {
                policy: this.retry,
                isRetryable: (error) => !(error instanceof CatalogError) || error.retryable,
                onRetry: ({ attempt, delayMs, error }) =>
                    getLogger().warn({ doi, attempt, delayMs, error }, 'Crossref lookup failed, retrying'),
                sleep: this.sleep,
            }
        );

        this.cache?.set(doi, work);
        return work;
    }

    /**
     * Read the fields we use out of a work record. Never throws on missing fields.
     */
    extractPaperInfo(work: CrossrefWork): PaperInfo {
        const authors: string[] = [];
        for (const author of work.author ?? []) {
            const name = `${author.given ?? ''} ${author.family ?? ''}`.trim();
            if (name) authors.push(name);
        }

        return {
            doi: work.DOI ?? '',
            title: work.title?.[0] ?? '',
            authors,
            publicationDate: datePartsYear(work['published-print']?.['date-parts']?.[0]),
            journal: work['container-title']?.[0] ?? '',
            publisher: work.publisher ?? '',
            abstract: work.abstract ?? '',
            url: work.URL ?? '',
        };
    }

    /**
     * Build the immutable metadata record attached to extraction results.
     */
    toPaperMetadata(info: PaperInfo): PaperMetadata {
        return Object.freeze({
            doi: info.doi,
            title: info.title,
            authors: Object.freeze([...info.authors]),
            publication_date: info.publicationDate,
            journal: info.journal || null,
        });
    }

    /**
     * Fetch and normalize metadata for one DOI (bare or resolver-prefixed).
     */
    async fetchMetadata(identifier: string): Promise<PaperMetadata> {
        const work = await this.fetchWork(identifier);
        return this.toPaperMetadata(this.extractPaperInfo(work));
    }
}

/**
 * Map HTTP failures onto the catalog error kinds.
 */
function toCatalogError(error: unknown, doi: string): CatalogError {
    if (error instanceof CatalogError) return error;

    if (error instanceof HttpError) {
        if (error.status === 404) {
            return new CatalogError(`DOI not found in Crossref: ${doi}`, 'not_found', doi, 404);
        }
        if (error.status === 429) {
            return new CatalogError(`Crossref rate limit hit for ${doi}`, 'rate_limited', doi, 429);
        }
        return new CatalogError(`Crossref lookup failed for ${doi}: ${error.message}`, 'transient', doi, error.status);
    }

    return new CatalogError(`Crossref lookup failed for ${doi}: ${errorMessage(error)}`, 'transient', doi);
}
