import type { PaperMetadata } from './paper.js';

/**
 * A single mechanical-property measurement read from a paper's tables.
 */
export interface MechanicalProperty {
    /** Material or alloy composition */
    material: string;
    /** Processing condition or treatment */
    condition: string | null;
    property_name: string;
    value: number;
    unit: string;
    temperature: number | null;
    temperature_unit: string | null;
    strain_rate: number | null;
    /** Any other parameters reported alongside the value */
    additional_info: Record<string, unknown>;
}

/**
 * Extraction output for one successfully processed paper.
 */
export interface ExtractedData {
    paper_metadata: PaperMetadata;
    mechanical_properties: MechanicalProperty[];
    extraction_timestamp: Date;
    /** Which extractor produced the data, e.g. "llm" */
    extraction_method: string;
}

/**
 * The document written to output/results.json.
 */
export interface UnifiedResults {
    extraction_date: Date;
    /** Number of entries in `data` (failed papers are not counted) */
    papers_processed: number;
    /** Sum of `mechanical_properties.length` across `data` */
    total_properties_extracted: number;
    data: ExtractedData[];
}
