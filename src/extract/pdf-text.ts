import { readFile } from 'node:fs/promises';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { getLogger } from '../utils/logger.js';

/**
 * Join the text items of one page. Items flagged `hasEOL` end a line;
 * marked-content entries (no `str`) are skipped.
 */
export function joinTextItems(items: ReadonlyArray<object>): string {
    let text = '';
    for (const item of items) {
        if (!('str' in item) || typeof item.str !== 'string') continue;
        text += item.str;
        if ('hasEOL' in item && item.hasEOL === true) {
            text += '\n';
        }
    }
    return text;
}

/**
 * Extract the embedded text layer of a PDF, page by page.
 * Every page is followed by a newline. Scanned PDFs without a text layer
 * yield an empty or near-empty string.
 */
export async function extractPdfText(pdfPath: string): Promise<string> {
    const data = new Uint8Array(await readFile(pdfPath));
    const loadingTask = getDocument({ data, isEvalSupported: false, verbosity: 0 });

    try {
        const document = await loadingTask.promise;
        let text = '';
        for (let pageNumber = 1; pageNumber <= document.numPages; pageNumber++) {
            const page = await document.getPage(pageNumber);
            const content = await page.getTextContent();
            text += `${joinTextItems(content.items)}\n`;
            page.cleanup();
        }

        getLogger().debug({ pdfPath, pages: document.numPages, chars: text.length }, 'PDF text extracted');
        return text;
    } finally {
        await loadingTask.destroy();
    }
}
