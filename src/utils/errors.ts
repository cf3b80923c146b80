/**
 * Error hierarchy. Every error raised on purpose by this package extends
 * PropExtractError so callers can tell them apart from library failures.
 */
export class PropExtractError extends Error {
    constructor(message: string, public readonly details?: Record<string, unknown>) {
        super(message);
        this.name = 'PropExtractError';
    }
}

export type CatalogErrorKind = 'not_found' | 'rate_limited' | 'transient';

/**
 * Catalog (Crossref) lookup failure.
 * `not_found` is final; the other kinds may be retried.
 */
export class CatalogError extends PropExtractError {
    constructor(
        message: string,
        public readonly kind: CatalogErrorKind,
        public readonly doi: string,
        public readonly status?: number
    ) {
        super(message, { doi, status });
        this.name = 'CatalogError';
    }

    get retryable(): boolean {
        return this.kind !== 'not_found';
    }
}

/**
 * The reasoning service could not produce a usable response after all retries.
 */
export class ExtractionError extends PropExtractError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, details);
        this.name = 'ExtractionError';
    }
}

/**
 * Missing credential or invalid configuration value.
 */
export class ConfigError extends PropExtractError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, details);
        this.name = 'ConfigError';
    }
}

/**
 * Render any thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
