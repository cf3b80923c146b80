import type {
    ExtractedData,
    ExtractionContext,
    LlmProvider,
    PaperMetadata,
    PropertyExtractor,
    RetryPolicy,
} from '../types/index.js';
import { DEFAULT_CONFIG } from '../types/index.js';
import { ConfigError, ExtractionError, errorMessage } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';
import { extractPdfText } from './pdf-text.js';
import { SYSTEM_PROMPT, buildUserPrompt, truncateText } from './prompts.js';
import { coerceMeasurements, unwrapRecords } from './records.js';

export interface LlmPropertyExtractorOptions {
    provider: LlmProvider;
    /** Sampling temperature (default 0.1) */
    temperature?: number;
    /** Characters of paper text sent to the model (default 8000) */
    maxInputChars?: number;
    retry?: RetryPolicy;
    /** PDF → text function; defaults to the pdf.js extractor */
    readText?: (pdfPath: string) => Promise<string>;
    /** Injected for tests */
    sleep?: (ms: number) => Promise<void>;
}

/**
 * Extracts mechanical properties by asking an LLM to read the paper's tables.
 */
export class LlmPropertyExtractor implements PropertyExtractor {
    readonly method = 'llm';
    private readonly provider: LlmProvider;
    private readonly temperature: number;
    private readonly maxInputChars: number;
    private readonly retry: RetryPolicy;
    private readonly readText: (pdfPath: string) => Promise<string>;
    private readonly sleep?: (ms: number) => Promise<void>;

    constructor(options: LlmPropertyExtractorOptions) {
        this.provider = options.provider;
        this.temperature = options.temperature ?? DEFAULT_CONFIG.llm.temperature;
        this.maxInputChars = options.maxInputChars ?? DEFAULT_CONFIG.llm.maxInputChars;
        this.retry = options.retry ?? DEFAULT_CONFIG.retry;
        this.readText = options.readText ?? extractPdfText;
        this.sleep = options.sleep;
    }

    async extractText(pdfPath: string): Promise<string> {
        return this.readText(pdfPath);
    }

    /**
     * Send the (truncated) paper text to the model and return the raw records.
     * The whole call is retried on any failure except missing credentials.
     */
    async extractProperties(text: string, paperInfo: ExtractionContext): Promise<unknown[]> {
        const prompt = buildUserPrompt(paperInfo.title ?? '', truncateText(text, this.maxInputChars));

        try {
            const completion = await withRetry(
                () =>
                    this.provider.complete(prompt, {
                        systemPrompt: SYSTEM_PROMPT,
                        temperature: this.temperature,
                        jsonMode: true,
                    }),
                {
                    policy: this.retry,
                    isRetryable: (error) => !(error instanceof ConfigError),
                    onRetry: ({ attempt, delayMs, error }) =>
                        getLogger().warn({ doi: paperInfo.doi, attempt, delayMs, error }, 'LLM extraction failed, retrying'),
                    sleep: this.sleep,
                }
            );

            getLogger().debug(
                { doi: paperInfo.doi, model: completion.model, usage: completion.usage },
                'LLM extraction complete'
            );
            return unwrapRecords(completion.parsed);
        } catch (error) {
            if (error instanceof ConfigError || error instanceof ExtractionError) throw error;
            throw new ExtractionError(`LLM extraction failed: ${errorMessage(error)}`, { doi: paperInfo.doi });
        }
    }

    async extractFromPaper(pdfPath: string, metadata: PaperMetadata): Promise<ExtractedData> {
        const logger = getLogger();

        logger.info({ pdfPath }, 'Extracting text from PDF');
        const text = await this.extractText(pdfPath);
        if (text.trim().length === 0) {
            logger.warn({ pdfPath }, 'PDF has no extractable text layer');
        }

        logger.info({ model: this.provider.model, doi: metadata.doi }, 'Extracting mechanical properties');
        const rawProperties = await this.extractProperties(text, {
            title: metadata.title,
            doi: metadata.doi,
            journal: metadata.journal,
        });

        const properties = coerceMeasurements(rawProperties);
        logger.info(
            { doi: metadata.doi, extracted: properties.length, dropped: rawProperties.length - properties.length },
            'Mechanical properties extracted'
        );

        return {
            paper_metadata: metadata,
            mechanical_properties: properties,
            extraction_timestamp: new Date(),
            extraction_method: this.method,
        };
    }
}
