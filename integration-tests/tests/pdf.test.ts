/**
 * PDF Decoding Tests
 *
 * Runs the pdfjs loader against a one-page statement assembled in memory.
 */

import { PdfjsDocumentLoader } from '../../services/worker-statement-parser/src/lib/pdf';
import type { PageRenderer } from '../../services/worker-statement-parser/src/lib/rasterize';

/** Single-page PDF with one text line per entry, 20pt apart from the top */
function buildPdf(lines: string[]): Uint8Array {
  const content = [
    'BT',
    '/F1 12 Tf',
    '72 720 Td',
    ...lines.map((line, i) => `${i === 0 ? '' : '0 -20 Td '}(${line}) Tj`),
    'ET',
  ].join('\n');

  const objects = [
    '<< /Type /Catalog /Pages 2 0 R >>',
    '<< /Type /Pages /Kids [3 0 R] /Count 1 >>',
    '<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 4 0 R >> >> /Contents 5 0 R >>',
    '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica >>',
    `<< /Length ${content.length} >>\nstream\n${content}\nendstream`,
  ];

  let pdf = '%PDF-1.4\n';
  const offsets: number[] = [];
  objects.forEach((body, i) => {
    offsets.push(pdf.length);
    pdf += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    pdf += `${String(offset).padStart(10, '0')} 00000 n \n`;
  }
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;

  return new Uint8Array(Buffer.from(pdf, 'latin1'));
}

describe('PdfjsDocumentLoader', () => {
  it('should read embedded text top to bottom, one line per row', async () => {
    const render: PageRenderer = async () => Buffer.alloc(0);
    const document = await new PdfjsDocumentLoader(render).open(
      buildPdf(['New Balance 1234.56', 'Minimum Payment Due 50.00'])
    );

    try {
      expect(document.pageCount).toBe(1);
      expect(await document.extractText(1)).toBe('New Balance 1234.56\nMinimum Payment Due 50.00');
    } finally {
      await document.close();
    }
  });

  it('should report a page with no text operators as having no text', async () => {
    const render: PageRenderer = async () => Buffer.alloc(0);
    const document = await new PdfjsDocumentLoader(render).open(buildPdf([]));

    try {
      expect(await document.extractText(1)).toBeNull();
    } finally {
      await document.close();
    }
  });

  it('should hand the original bytes, page and resolution to the renderer', async () => {
    const bytes = buildPdf(['Statement Date 2024-01-01']);
    const calls: Array<{ size: number; page: number; dpi: number }> = [];
    const render: PageRenderer = async (pdfBytes, page, dpi) => {
      calls.push({ size: pdfBytes.byteLength, page, dpi });
      return Buffer.from('png');
    };
    const document = await new PdfjsDocumentLoader(render).open(bytes);

    try {
      expect((await document.renderPage(1, 300)).toString()).toBe('png');
      expect(calls).toEqual([{ size: bytes.byteLength, page: 1, dpi: 300 }]);
    } finally {
      await document.close();
    }
  });

  it('should reject bytes that are not a PDF', async () => {
    const render: PageRenderer = async () => Buffer.alloc(0);

    await expect(
      new PdfjsDocumentLoader(render).open(new Uint8Array(Buffer.from('not a statement')))
    ).rejects.toThrow();
  });
});
