#!/usr/bin/env node
import 'dotenv/config';
import { basename } from 'node:path';
import { Command } from 'commander';
import { resolveConfig, type ConfigOverrides } from '../utils/config.js';
import { initLogger, getLogger } from '../utils/logger.js';
import { createHttpClient } from '../utils/http-client.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { ResponseCache } from '../cache/response-cache.js';
import { CrossrefClient } from '../sources/crossref.js';
import { OpenAiProvider } from '../llm/openai.js';
import { LlmPropertyExtractor } from '../extract/llm-extractor.js';
import { runPipeline } from '../pipeline/pipeline.js';
import type { ExtractorConfig, LogLevel, PaperMetadata } from '../types/index.js';

const VERSION = '1.0.0';

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

interface CommonOptions {
    logLevel?: string;
    jsonLogs?: boolean;
}

interface RunOptions extends CommonOptions {
    papers?: string;
    doi?: string[];
    pdfDir?: string;
    out?: string;
    model?: string;
    browser: boolean;
    cache: boolean;
}

interface ExtractOptions extends CommonOptions {
    doi?: string;
    title?: string;
    model?: string;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
    if (value === undefined) return undefined;
    const level = LOG_LEVELS.find((candidate) => candidate === value);
    if (!level) {
        throw new ConfigError(`Invalid log level: ${value}. Valid: ${LOG_LEVELS.join(', ')}`);
    }
    return level;
}

/**
 * Resolve config and set up logging for a command.
 */
async function setup(flags: ConfigOverrides, opts: CommonOptions): Promise<ExtractorConfig> {
    const config = await resolveConfig({
        ...flags,
        logLevel: parseLogLevel(opts.logLevel),
        jsonLogs: opts.jsonLogs,
    });
    initLogger({ level: config.logLevel, jsonLogs: config.jsonLogs });
    return config;
}

function fail(message: string, error: unknown): never {
    getLogger().error({ error }, message);
    process.exit(1);
}

function createCrossref(config: ExtractorConfig): CrossrefClient {
    return new CrossrefClient({
        ...config.crossref,
        retry: config.retry,
        cache: new ResponseCache({ cacheDir: config.cacheDir, enabled: !config.noCache }),
        httpClient: createHttpClient({ email: config.crossref.email }),
    });
}

const program = new Command();

program
    .name('propextract')
    .description('Extract mechanical-property measurements from materials-science papers.')
    .version(VERSION);

// ─── RUN command ──────────────────────────────────────────

program
    .command('run')
    .description('Fetch metadata and PDFs for a paper list and extract properties to JSON')
    .option('--papers <file>', 'JSON file with [{ "doi": "...", "title": "..." }]')
    .option('--doi <dois...>', 'DOIs to process instead of the default list')
    .option('--pdf-dir <dir>', 'Directory for downloaded PDFs')
    .option('-o, --out <path>', 'Results file path')
    .option('-m, --model <model>', 'OpenAI model')
    .option('--no-browser', 'Skip the headless-browser download strategy')
    .option('--no-cache', 'Disable Crossref response caching')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (opts: RunOptions) => {
        let config: ExtractorConfig;
        try {
            config = await setup(
                {
                    papersFile: opts.papers,
                    doi: opts.doi,
                    pdfDir: opts.pdfDir,
                    outputPath: opts.out,
                    // Negated flags only override the config file when given.
                    noCache: opts.cache ? undefined : true,
                    llm: { model: opts.model },
                    download: { browser: opts.browser ? undefined : false },
                },
                opts
            );
        } catch (error) {
            console.error(`Invalid configuration: ${errorMessage(error)}`);
            process.exit(1);
        }

        try {
            const results = await runPipeline(config);
            getLogger().info(
                {
                    outputPath: config.outputPath,
                    papersProcessed: results.papers_processed,
                    totalProperties: results.total_properties_extracted,
                },
                'Run complete!'
            );
        } catch (error) {
            fail('Run failed', error);
        }
    });

// ─── METADATA command ─────────────────────────────────────

program
    .command('metadata')
    .description('Print normalized Crossref metadata for one DOI')
    .argument('<doi>', 'DOI, bare or resolver-prefixed')
    .option('--no-cache', 'Disable Crossref response caching')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (doi: string, opts: CommonOptions & { cache: boolean }) => {
        try {
            const config = await setup({ noCache: opts.cache ? undefined : true }, opts);
            const metadata = await createCrossref(config).fetchMetadata(doi);
            console.log(JSON.stringify(metadata, null, 2));
        } catch (error) {
            fail('Metadata lookup failed', error);
        }
    });

// ─── EXTRACT command ──────────────────────────────────────

program
    .command('extract')
    .description('Extract properties from a local PDF and print them as JSON')
    .argument('<pdf>', 'Path to the PDF')
    .option('--doi <doi>', 'Fetch metadata for this DOI first')
    .option('--title <title>', 'Paper title (when no DOI is given)')
    .option('-m, --model <model>', 'OpenAI model')
    .option('--log-level <level>', 'Log level: debug | info | warn | error')
    .option('--json-logs', 'Output JSON logs')
    .action(async (pdf: string, opts: ExtractOptions) => {
        try {
            const config = await setup({ llm: { model: opts.model } }, opts);

            const provider = new OpenAiProvider({
                model: config.llm.model,
                baseUrl: config.llm.baseUrl,
                timeoutMs: config.llm.timeoutMs,
            });
            if (!(await provider.isAvailable())) {
                throw new ConfigError('OpenAI API key is required (set OPENAI_API_KEY)');
            }

            const metadata: PaperMetadata = opts.doi
                ? await createCrossref(config).fetchMetadata(opts.doi)
                : Object.freeze({
                      doi: '',
                      title: opts.title ?? basename(pdf, '.pdf'),
                      authors: [],
                      publication_date: null,
                      journal: null,
                  });

            const extractor = new LlmPropertyExtractor({
                provider,
                temperature: config.llm.temperature,
                maxInputChars: config.llm.maxInputChars,
                retry: config.retry,
            });
            const data = await extractor.extractFromPaper(pdf, metadata);
            console.log(JSON.stringify(data, null, 2));
        } catch (error) {
            fail('Extraction failed', error);
        }
    });

// ─── CACHE command ────────────────────────────────────────

program
    .command('cache')
    .description('Manage the Crossref response cache')
    .argument('<action>', 'Action: clear | stats')
    .action(async (action: string) => {
        const config = await resolveConfig({});
        const cache = new ResponseCache({ cacheDir: config.cacheDir, enabled: false });

        switch (action) {
            case 'clear':
                cache.clear();
                console.log('Cache cleared.');
                break;
            case 'stats': {
                const stats = cache.getStats();
                console.log(`Cache: ${stats.entries} entries, ${(stats.bytes / 1024).toFixed(1)} KB`);
                break;
            }
            default:
                console.error(`Unknown action: ${action}. Valid: clear, stats`);
                process.exit(1);
        }
    });

program.parseAsync().catch((error: unknown) => {
    console.error(error);
    process.exit(1);
});
