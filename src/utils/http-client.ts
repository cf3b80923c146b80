import { mkdir, open, rm } from 'node:fs/promises';
import { dirname } from 'node:path';
import { getLogger } from './logger.js';

/**
 * Error classification for HTTP responses.
 */
const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

/** Bytes per write when streaming a download to disk */
const DOWNLOAD_CHUNK_SIZE = 8192;

/**
 * Token bucket rate limiter.
 * Allows `tokensPerSecond` requests per second with burst capacity.
 */
class TokenBucket {
    private tokens: number;
    private lastRefill: number;

    constructor(
        private readonly tokensPerSecond: number,
        private readonly maxTokens: number
    ) {
        this.tokens = maxTokens;
        this.lastRefill = Date.now();
    }

    async acquire(): Promise<void> {
        this.refill();

        if (this.tokens >= 1) {
            this.tokens -= 1;
            return;
        }

        // Wait until a token is available
        const waitMs = ((1 - this.tokens) / this.tokensPerSecond) * 1000;
        await sleep(waitMs);
        this.refill();
        this.tokens -= 1;
    }

    private refill(): void {
        const now = Date.now();
        const elapsed = (now - this.lastRefill) / 1000;
        this.tokens = Math.min(this.maxTokens, this.tokens + elapsed * this.tokensPerSecond);
        this.lastRefill = now;
    }
}

/**
 * Per-source rate limit configurations.
 */
const RATE_LIMITS: Record<string, { tokensPerSecond: number; maxBurst: number }> = {
    crossref: { tokensPerSecond: 5, maxBurst: 5 },      // public pool; polite pool allows more
    openai: { tokensPerSecond: 5, maxBurst: 5 },
    publisher: { tokensPerSecond: 1, maxBurst: 1 },     // direct PDF downloads from publisher sites
    default: { tokensPerSecond: 5, maxBurst: 5 },
};
const DEFAULT_RATE_LIMIT = { tokensPerSecond: 5, maxBurst: 5 };

/**
 * HTTP request options.
 */
export interface HttpRequestOptions {
    method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
    headers?: Record<string, string>;
    body?: string | object;
    timeout?: number;
    source?: string;  // For per-source rate limiting
}

/**
 * HTTP response wrapper.
 */
export interface HttpResponse<T = unknown> {
    status: number;
    headers: Record<string, string>;
    data: T;
    ok: boolean;
}

/**
 * Result of streaming a response body to disk.
 */
export interface DownloadResult {
    path: string;
    bytes: number;
    contentType: string | null;
}

/**
 * HTTP error with classification.
 */
export class HttpError extends Error {
    constructor(
        message: string,
        public readonly status: number,
        public readonly retryable: boolean,
        public readonly response?: unknown
    ) {
        super(message);
        this.name = 'HttpError';
    }
}

export interface HttpClientOptions {
    timeout?: number;
    version?: string;
    email?: string;
}

/**
 * Centralized HTTP client with per-source rate limiting and error classification.
 * Each call makes exactly one attempt; callers wrap it with `withRetry()` where
 * a retry policy applies.
 */
export class HttpClient {
    private buckets = new Map<string, TokenBucket>();
    private requestCounts = new Map<string, number>();
    private readonly defaultTimeout: number;
    private readonly userAgent: string;

    constructor(options?: HttpClientOptions) {
        this.defaultTimeout = options?.timeout ?? 30000;
        const version = options?.version ?? '1.0.0';
        this.userAgent = options?.email
            ? `propextract/${version} (mailto:${options.email})`
            : `propextract/${version}`;
    }

    /**
     * Make an HTTP request with rate limiting.
     * Non-2xx responses and network failures throw HttpError.
     */
    async request<T = unknown>(url: string, options: HttpRequestOptions = {}): Promise<HttpResponse<T>> {
        const {
            method = 'GET',
            headers = {},
            body,
            timeout = this.defaultTimeout,
            source = 'default',
        } = options;

        await this.acquire(source);

        const requestHeaders: Record<string, string> = {
            'User-Agent': this.userAgent,
            ...headers,
        };

        let requestBody: string | undefined;
        if (body) {
            if (typeof body === 'object') {
                requestBody = JSON.stringify(body);
                requestHeaders['Content-Type'] = requestHeaders['Content-Type'] ?? 'application/json';
            } else {
                requestBody = body;
            }
        }

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
            const response = await fetch(url, {
                method,
                headers: requestHeaders,
                body: requestBody,
                signal: controller.signal,
            });

            // Parse response
            const contentType = response.headers.get('content-type') ?? '';
            const data: unknown = contentType.includes('application/json')
                ? await response.json()
                : await response.text();

            const responseHeaders: Record<string, string> = {};
            response.headers.forEach((value, key) => {
                responseHeaders[key] = value;
            });

            if (!response.ok) {
                throw new HttpError(
                    `HTTP ${response.status}: ${response.statusText}`,
                    response.status,
                    RETRYABLE_STATUS_CODES.has(response.status),
                    data
                );
            }

            // The caller names the expected payload shape; validation happens at the call site.
            return { status: response.status, headers: responseHeaders, data: data as T, ok: true };
        } catch (error) {
            throw toHttpError(error, url, timeout);
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /**
     * Convenience method for GET requests.
     */
    async get<T = unknown>(url: string, options?: Omit<HttpRequestOptions, 'method'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'GET' });
    }

    /**
     * Convenience method for POST requests.
     */
    async post<T = unknown>(url: string, body: string | object, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse<T>> {
        return this.request<T>(url, { ...options, method: 'POST', body });
    }

    /**
     * Stream a GET response body to `destPath` in fixed-size chunks.
     * The file is only created once a 2xx response has arrived and is
     * removed again when the body fails part-way.
     */
    async download(url: string, destPath: string, options: Omit<HttpRequestOptions, 'method' | 'body'> = {}): Promise<DownloadResult> {
        const { headers = {}, timeout = this.defaultTimeout, source = 'default' } = options;

        await this.acquire(source);

        const controller = new AbortController();
        const timeoutId = setTimeout(() => controller.abort(), timeout);

        try {
            const response = await fetch(url, {
                method: 'GET',
                headers: { 'User-Agent': this.userAgent, ...headers },
                signal: controller.signal,
                redirect: 'follow',
            });

            if (!response.ok) {
                throw new HttpError(
                    `HTTP ${response.status}: ${response.statusText}`,
                    response.status,
                    RETRYABLE_STATUS_CODES.has(response.status)
                );
            }
            if (!response.body) {
                throw new HttpError(`Empty response body: ${url}`, response.status, false);
            }

            await mkdir(dirname(destPath), { recursive: true });
            const file = await open(destPath, 'w');
            let bytes = 0;
            let complete = false;
            try {
                const reader = response.body.getReader();
                for (;;) {
                    const { done, value } = await reader.read();
                    if (done) break;
                    for (let offset = 0; offset < value.length; offset += DOWNLOAD_CHUNK_SIZE) {
                        const chunk = value.subarray(offset, offset + DOWNLOAD_CHUNK_SIZE);
                        await file.write(chunk);
                        bytes += chunk.length;
                    }
                }
                complete = true;
            } finally {
                await file.close();
                if (!complete) {
                    await rm(destPath, { force: true });
                }
            }

            getLogger().debug({ url, destPath, bytes }, 'Download written');
            return { path: destPath, bytes, contentType: response.headers.get('content-type') };
        } catch (error) {
            throw toHttpError(error, url, timeout);
        } finally {
            clearTimeout(timeoutId);
        }
    }

    /**
     * Get request count for a source.
     */
    getRequestCount(source: string): number {
        return this.requestCounts.get(source) ?? 0;
    }

    /**
     * Get all request counts.
     */
    getAllRequestCounts(): Record<string, number> {
        return Object.fromEntries(this.requestCounts.entries());
    }

    /**
     * Reset request counts.
     */
    resetCounts(): void {
        this.requestCounts.clear();
    }

    private async acquire(source: string): Promise<void> {
        await this.getBucket(source).acquire();
        this.requestCounts.set(source, (this.requestCounts.get(source) ?? 0) + 1);
    }

    private getBucket(source: string): TokenBucket {
        let bucket = this.buckets.get(source);
        if (!bucket) {
            const config = RATE_LIMITS[source] ?? DEFAULT_RATE_LIMIT;
            bucket = new TokenBucket(config.tokensPerSecond, config.maxBurst);
            this.buckets.set(source, bucket);
        }
        return bucket;
    }
}

/**
 * Classify a thrown value from fetch into an HttpError.
 */
function toHttpError(error: unknown, url: string, timeout: number): HttpError {
    if (error instanceof HttpError) return error;

    if (error instanceof Error && error.name === 'AbortError') {
        return new HttpError(`Request timeout after ${timeout}ms: ${url}`, 0, true);
    }

    const errorCode = errorCodeOf(error);
    const retryable = errorCode ? RETRYABLE_ERROR_CODES.has(errorCode) : true;
    return new HttpError(
        `Network error: ${error instanceof Error ? error.message : String(error)}`,
        0,
        retryable
    );
}

/**
 * fetch() wraps socket errors; the errno code sits on the error or its cause.
 */
function errorCodeOf(error: unknown): string | undefined {
    if (!(error instanceof Error)) return undefined;
    const candidates: unknown[] = [error, error.cause];
    for (const candidate of candidates) {
        if (candidate && typeof candidate === 'object' && 'code' in candidate && typeof candidate.code === 'string') {
            return candidate.code;
        }
    }
    return undefined;
}

/**
 * Sleep for the specified number of milliseconds.
 */
function sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Singleton HTTP client instance.
 */
let clientInstance: HttpClient | null = null;

/**
 * Get the shared HTTP client instance.
 */
export function getHttpClient(options?: HttpClientOptions): HttpClient {
    if (!clientInstance) {
        clientInstance = new HttpClient(options);
    }
    return clientInstance;
}

/**
 * Create a new HTTP client (for testing or custom configuration).
 */
export function createHttpClient(options?: HttpClientOptions): HttpClient {
    return new HttpClient(options);
}
