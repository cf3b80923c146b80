import type { PaperDescriptor } from './paper.js';

/**
 * Log level options.
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Retry policy for catalog lookups and LLM calls.
 * Delay before attempt n+1 is `multiplier * 2^(n-1)` seconds, clamped to [minDelayMs, maxDelayMs].
 */
export interface RetryPolicy {
    maxAttempts: number;
    multiplier: number;
    minDelayMs: number;
    maxDelayMs: number;
}

/**
 * Crossref catalog configuration.
 */
export interface CrossrefConfig {
    baseUrl: string;
    /** Contact email sent in the User-Agent (Crossref "polite pool") */
    email?: string;
}

/**
 * LLM configuration.
 */
export interface LlmConfig {
    model: string;
    baseUrl: string;
    temperature: number;
    /** Paper text is truncated to this many characters before submission */
    maxInputChars: number;
    timeoutMs: number;
}

/**
 * PDF download configuration.
 */
export interface DownloadConfig {
    /** Try the headless-browser strategy before the direct link */
    browser: boolean;
    headless: boolean;
    /** Chrome/Chromium binary; falls back to the installed Chrome channel */
    executablePath?: string;
    /** Wait per download-button candidate */
    clickTimeoutMs: number;
    /** Maximum wait for in-progress downloads to finish */
    downloadTimeoutMs: number;
}

/**
 * Full configuration merged from CLI flags, env vars, and config file.
 */
export interface ExtractorConfig {
    // Input
    papers?: PaperDescriptor[];
    papersFile?: string;
    doi?: string[];

    // Output
    pdfDir: string;
    outputPath: string;

    // Cache
    cacheDir: string;
    noCache: boolean;

    // Logging
    logLevel: LogLevel;
    jsonLogs: boolean;

    crossref: CrossrefConfig;
    llm: LlmConfig;
    download: DownloadConfig;
    retry: RetryPolicy;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: ExtractorConfig = {
    pdfDir: 'data/pdfs',
    outputPath: 'output/results.json',
    cacheDir: '.propextract-cache',
    noCache: false,
    logLevel: 'info',
    jsonLogs: false,
    crossref: {
        baseUrl: 'https://api.crossref.org',
    },
    llm: {
        model: 'gpt-4.1',
        baseUrl: 'https://api.openai.com/v1',
        temperature: 0.1,
        maxInputChars: 8000,
        timeoutMs: 120000,
    },
    download: {
        browser: true,
        headless: true,
        clickTimeoutMs: 10000,
        downloadTimeoutMs: 30000,
    },
    retry: {
        maxAttempts: 3,
        multiplier: 1,
        minDelayMs: 4000,
        maxDelayMs: 10000,
    },
};
