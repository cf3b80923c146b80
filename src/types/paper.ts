/**
 * One entry of the input paper list.
 * `doi` may be bare or resolver-prefixed ("https://doi.org/10.3390/...").
 */
export interface PaperDescriptor {
    doi: string;
    title: string;
}

/**
 * Crossref `/works/<doi>` response envelope.
 */
export interface CrossrefResponse {
    status?: string;
    'message-type'?: string;
    message: CrossrefWork;
}

/**
 * Raw Crossref work record (subset of the fields we read).
 *
 * @see https://api.crossref.org/swagger-ui/index.html
 */
export interface CrossrefWork {
    DOI?: string;
    URL?: string;
    title?: string[];
    author?: Array<{
        given?: string;
        family?: string;
        ORCID?: string;
        sequence?: string;
    }>;
    'published-print'?: {
        'date-parts'?: Array<Array<number | null>>;
    };
    'container-title'?: string[];
    publisher?: string;
    abstract?: string;
}

/**
 * Everything read out of a Crossref work record.
 * Missing fields are empty strings / empty arrays, never undefined.
 */
export interface PaperInfo {
    doi: string;
    title: string;
    authors: string[];
    /** Year of the first `published-print` date-parts entry, e.g. "2019"; null when absent */
    publicationDate: string | null;
    journal: string;
    publisher: string;
    abstract: string;
    /** Publisher landing page */
    url: string;
}

/**
 * Bibliographic metadata attached to every extraction result.
 * Field names match the results.json document.
 */
export type PaperMetadata = Readonly<{
    /** Bare DOI (no https://doi.org/ prefix) */
    doi: string;
    title: string;
    /** "<given> <family>", in catalog order */
    authors: readonly string[];
    publication_date: string | null;
    journal: string | null;
}>;
