import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type {
    ExtractedData,
    ExtractorConfig,
    PaperDescriptor,
    PaperMetadata,
    PropertyExtractable,
    UnifiedResults,
} from '../types/index.js';
import { ResponseCache } from '../cache/response-cache.js';
import { CrossrefClient } from '../sources/crossref.js';
import { createPdfRetriever } from '../download/pdf-retriever.js';
import { OpenAiProvider } from '../llm/openai.js';
import { LlmPropertyExtractor } from '../extract/llm-extractor.js';
import { createHttpClient, type HttpClient } from '../utils/http-client.js';
import { ConfigError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { resolvePaperList } from './papers.js';
import { buildUnifiedResults, saveResults } from './results.js';

export interface MetadataSource {
    fetchMetadata(identifier: string): Promise<PaperMetadata>;
}

export interface PdfSource {
    fetchPdf(identifier: string, outputDir: string): Promise<string | null>;
}

/**
 * Collaborators of one pipeline run.
 */
export interface PipelineDeps {
    metadata: MetadataSource;
    retriever: PdfSource;
    extractor: Pick<PropertyExtractable, 'extractFromPaper'>;
    /** Source of per-source request counts for the run summary */
    httpClient?: HttpClient;
}

/**
 * Wire the production collaborators from a resolved config.
 */
export async function createPipelineDeps(config: ExtractorConfig): Promise<PipelineDeps> {
    const httpClient = createHttpClient({ email: config.crossref.email });
    const cache = new ResponseCache({ cacheDir: config.cacheDir, enabled: !config.noCache });

    const crossref = new CrossrefClient({
        ...config.crossref,
        retry: config.retry,
        cache,
        httpClient,
    });

    const provider = new OpenAiProvider({
        model: config.llm.model,
        baseUrl: config.llm.baseUrl,
        timeoutMs: config.llm.timeoutMs,
    });
    provider.setHttpClient(httpClient);
    if (!(await provider.isAvailable())) {
        throw new ConfigError('OpenAI API key is required (set OPENAI_API_KEY)');
    }

    const extractor = new LlmPropertyExtractor({
        provider,
        temperature: config.llm.temperature,
        maxInputChars: config.llm.maxInputChars,
        retry: config.retry,
    });

    return {
        metadata: crossref,
        retriever: createPdfRetriever(config.download, crossref, httpClient),
        extractor,
        httpClient,
    };
}

/**
 * Run metadata → PDF → extraction for each paper in order.
 * A failure at any stage skips that paper; nothing here throws for one paper.
 */
export async function processPapers(
    papers: readonly PaperDescriptor[],
    deps: PipelineDeps,
    pdfDir: string
): Promise<ExtractedData[]> {
    const logger = getLogger();
    const results: ExtractedData[] = [];

    for (const [index, paper] of papers.entries()) {
        const label = paper.title ? paper.title.slice(0, 50) : paper.doi;
        logger.info({ doi: paper.doi, paper: `${index + 1}/${papers.length}` }, `Processing: ${label}`);

        let metadata: PaperMetadata;
        try {
            metadata = await deps.metadata.fetchMetadata(paper.doi);
        } catch (error) {
            logger.error({ doi: paper.doi, error }, 'Metadata lookup failed, skipping paper');
            continue;
        }

        let pdfPath: string | null;
        try {
            pdfPath = await deps.retriever.fetchPdf(paper.doi, pdfDir);
        } catch (error) {
            logger.error({ doi: paper.doi, error }, 'PDF retrieval failed, skipping paper');
            continue;
        }
        if (!pdfPath) {
            logger.warn({ doi: paper.doi }, 'No PDF available, skipping paper');
            continue;
        }

        try {
            const extracted = await deps.extractor.extractFromPaper(pdfPath, metadata);
            results.push(extracted);
            logger.info(
                { doi: paper.doi, properties: extracted.mechanical_properties.length },
                'Paper processed'
            );
        } catch (error) {
            logger.error({ doi: paper.doi, error }, 'Property extraction failed, skipping paper');
        }
    }

    return results;
}

/**
 * Full run: resolve the paper list, process every paper, save the results file.
 */
export async function runPipeline(config: ExtractorConfig, deps?: PipelineDeps): Promise<UnifiedResults> {
    const logger = getLogger();
    const startTime = Date.now();

    await mkdir(config.pdfDir, { recursive: true });
    await mkdir(dirname(config.outputPath), { recursive: true });

    const papers = await resolvePaperList(config);
    const pipelineDeps = deps ?? (await createPipelineDeps(config));

    logger.info({ papers: papers.length, pdfDir: config.pdfDir, model: config.llm.model }, 'Starting extraction run');

    // ──────────────────────────────────────────────────
    // Per-paper processing
    // ──────────────────────────────────────────────────
    const data = await processPapers(papers, pipelineDeps, config.pdfDir);

    // ──────────────────────────────────────────────────
    // Aggregate + persist
    // ──────────────────────────────────────────────────
    const results = buildUnifiedResults(data);
    await saveResults(results, config.outputPath);

    logger.info(
        {
            papersRequested: papers.length,
            papersProcessed: results.papers_processed,
            totalProperties: results.total_properties_extracted,
            requests: pipelineDeps.httpClient?.getAllRequestCounts() ?? {},
            elapsedMs: Date.now() - startTime,
        },
        'Extraction run complete'
    );

    return results;
}
