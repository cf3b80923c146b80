import type { ExtractedData } from './measurement.js';
import type { PaperMetadata } from './paper.js';

/**
 * Paper fields an extractor may use to build its request.
 */
export interface ExtractionContext {
    title?: string;
    doi?: string;
    journal?: string | null;
}

/**
 * Produces the plain text of a local PDF.
 */
export interface TextExtractable {
    extractText(pdfPath: string): Promise<string>;
}

/**
 * Turns paper text into measurement records.
 */
export interface PropertyExtractable {
    /** Tag written to `ExtractedData.extraction_method` */
    readonly method: string;

    /**
     * Extract raw (unvalidated) property records from paper text.
     * An empty array means nothing was found.
     */
    extractProperties(text: string, paperInfo: ExtractionContext): Promise<unknown[]>;

    /**
     * Run text extraction, property extraction and record validation for one paper.
     */
    extractFromPaper(pdfPath: string, metadata: PaperMetadata): Promise<ExtractedData>;
}

/**
 * Extractor interface. Implementations: LLM-based today, rule-based later.
 */
export type PropertyExtractor = TextExtractable & PropertyExtractable;
