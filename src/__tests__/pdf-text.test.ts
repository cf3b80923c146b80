import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { extractPdfText, joinTextItems } from '../extract/pdf-text.js';

/**
 * Build a one-page PDF with a Helvetica text line per entry.
 */
function buildPdf(lines: string[]): string {
    const stream = [
        'BT',
        '/F1 12 Tf',
        '72 720 Td',
        '14 TL',
        ...lines.map((line) => `(${line}) Tj T*`),
        'ET',
    ].join('\n');

    const objects = [
        '<< /Type /Catalog /Pages 2 0 R >>',
        '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
        '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Contents 4 0 R /Resources << /Font << /F1 5 0 R >> >> >>',
        `<< /Length ${stream.length} >>\nstream\n${stream}\nendstream`,
        '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
    ];

    let pdf = '%PDF-1.4\n';
    const offsets: number[] = [];
    objects.forEach((body, index) => {
        offsets.push(pdf.length);
        pdf += `${index + 1} 0 obj\n${body}\nendobj\n`;
    });

    const xrefOffset = pdf.length;
    pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
    for (const offset of offsets) {
        pdf += `${String(offset).padStart(10, '0')} 00000 n \n`;
    }
    pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
    return pdf;
}

describe('joinTextItems', () => {
    it('should concatenate items and break lines at hasEOL', () => {
        const items = [
            { str: 'Table 1.', hasEOL: false },
            { str: ' Tensile properties', hasEOL: true },
            { str: 'UTS 245 MPa', hasEOL: true },
        ];

        expect(joinTextItems(items)).toBe('Table 1. Tensile properties\nUTS 245 MPa\n');
    });

    it('should skip marked-content entries', () => {
        const items = [{ type: 'beginMarkedContent' }, { str: 'Hardness', hasEOL: false }, { type: 'endMarkedContent' }];

        expect(joinTextItems(items)).toBe('Hardness');
    });

    it('should return an empty string for a page without text', () => {
        expect(joinTextItems([])).toBe('');
    });
});

describe('extractPdfText', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(join(tmpdir(), 'propextract-pdf-'));
    });

    afterEach(() => {
        rmSync(dir, { recursive: true, force: true });
    });

    it('should read the text layer of a PDF', async () => {
        const path = join(dir, 'table.pdf');
        writeFileSync(path, buildPdf(['Table 2 Mechanical properties', 'UTS 245 MPa']), 'latin1');

        const text = await extractPdfText(path);

        expect(text).toContain('Table 2 Mechanical properties');
        expect(text).toContain('UTS 245 MPa');
        expect(text.endsWith('\n')).toBe(true);
    });

    it('should reject a file that is not a PDF', async () => {
        const path = join(dir, 'page.pdf');
        writeFileSync(path, '<html>Access denied</html>', 'utf-8');

        await expect(extractPdfText(path)).rejects.toThrow();
    });
});
