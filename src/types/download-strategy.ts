/**
 * One way of obtaining a paper's PDF.
 * Strategies are tried in order by the PDF retriever; the first non-null result wins.
 */
export interface DownloadStrategy {
    /** Human-readable strategy name (used in logs) */
    readonly name: string;

    /**
     * Whether this strategy can handle the DOI at all.
     * The retriever skips strategies that return false.
     */
    appliesTo(doi: string): boolean;

    /**
     * Try to place the PDF at `targetPath`.
     * @param doi - Bare DOI
     * @param targetPath - Canonical destination file
     * @returns The written path, or null when this strategy could not get the file
     */
    fetch(doi: string, targetPath: string): Promise<string | null>;
}
