/**
 * Barrel export for all shared types.
 */
export type {
    PaperDescriptor,
    PaperInfo,
    PaperMetadata,
    CrossrefResponse,
    CrossrefWork,
} from './paper.js';
export type { MechanicalProperty, ExtractedData, UnifiedResults } from './measurement.js';
export { DEFAULT_CONFIG } from './config.js';
export type {
    ExtractorConfig,
    LogLevel,
    RetryPolicy,
    CrossrefConfig,
    LlmConfig,
    DownloadConfig,
} from './config.js';
export type {
    ExtractionContext,
    TextExtractable,
    PropertyExtractable,
    PropertyExtractor,
} from './extractor.js';
export type { DownloadStrategy } from './download-strategy.js';
export type {
    LlmProvider,
    LlmCompletionParams,
    LlmCompletionResult,
    LlmProviderOptions,
} from './llm-provider.js';
