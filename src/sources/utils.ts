/**
 * Shared identifier utilities.
 */

const DOI_PREFIXES = [
    /^https?:\/\/(?:dx\.)?doi\.org\//i,
    /^doi:\s*/i,
];

/** Resolver base used for browser navigation */
export const DOI_RESOLVER = 'https://doi.org/';

/**
 * Strip resolver prefixes to get just the DOI identifier.
 * "https://doi.org/10.1234/test" → "10.1234/test"
 * "doi:10.1234/test" → "10.1234/test"
 */
export function stripDoiPrefix(doi: string): string {
    let result = doi.trim();
    for (const prefix of DOI_PREFIXES) {
        result = result.replace(prefix, '');
    }
    return result.trim();
}

/**
 * Canonical PDF filename for a DOI.
 * "10.3390/cryst9110586" → "10.3390_cryst9110586.pdf"
 */
export function doiToFilename(doi: string): string {
    return `${stripDoiPrefix(doi).replace(/\//g, '_')}.pdf`;
}

/**
 * Resolver URL for a DOI.
 */
export function doiUrl(doi: string): string {
    return `${DOI_RESOLVER}${stripDoiPrefix(doi)}`;
}

/**
 * Append the publisher's "/pdf" suffix to a landing-page URL.
 * "https://www.mdpi.com/2073-4352/9/11/586/" → "https://www.mdpi.com/2073-4352/9/11/586/pdf"
 */
export function pdfSuffixUrl(landingUrl: string): string {
    return `${landingUrl.replace(/\/+$/, '')}/pdf`;
}

/**
 * Year of a Crossref date-parts entry as a string.
 * [2019, 11, 5] → "2019", [] or [null] → null
 */
export function datePartsYear(parts: ReadonlyArray<number | null> | undefined): string | null {
    const year = parts?.[0];
    return typeof year === 'number' ? String(year) : null;
}
