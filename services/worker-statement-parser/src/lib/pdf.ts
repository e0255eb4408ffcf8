/**
 * PDF Decoding
 *
 * Embedded text comes from pdfjs-dist; page images for OCR come from the
 * injected renderer.
 */

import fs from 'fs';
import * as pdfjsLib from 'pdfjs-dist/legacy/build/pdf';
import type { DocumentLoader, StatementDocument } from '@statement-insight/shared';
import type { PageRenderer } from './rasterize';

// Node.js takes the legacy build
pdfjsLib.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/legacy/build/pdf.worker.js');

type PdfDocumentProxy = Awaited<ReturnType<typeof pdfjsLib.getDocument>['promise']>;

/**
 * Group text items by Y position to preserve line structure.
 *
 * Text on the same visual line may have slight Y variations, so positions
 * are rounded before grouping. Lines run top to bottom, items left to right.
 */
async function readPageLines(pdf: PdfDocumentProxy, pageNumber: number): Promise<string> {
  const page = await pdf.getPage(pageNumber);
  const textContent = await page.getTextContent();

  const itemsByY = new Map<number, Array<{ x: number; str: string }>>();

  for (const item of textContent.items) {
    if (!('str' in item) || item.str.trim() === '') continue;

    const y = Math.round(item.transform[5]);
    const x = Math.round(item.transform[4]);

    const line = itemsByY.get(y) ?? [];
    line.push({ x, str: item.str });
    itemsByY.set(y, line);
  }

  const lines: string[] = [];
  for (const y of [...itemsByY.keys()].sort((a, b) => b - a)) {
    const lineItems = (itemsByY.get(y) ?? []).sort((a, b) => a.x - b.x);
    const lineText = lineItems.map((item) => item.str).join(' ').trim();
    if (lineText) {
      lines.push(lineText);
    }
  }

  page.cleanup();
  return lines.join('\n');
}

class PdfjsStatementDocument implements StatementDocument {
  constructor(
    private readonly pdf: PdfDocumentProxy,
    private readonly bytes: Uint8Array,
    private readonly render: PageRenderer
  ) {}

  get pageCount(): number {
    return this.pdf.numPages;
  }

  async extractText(pageNumber: number): Promise<string | null> {
    const text = await readPageLines(this.pdf, pageNumber);
    return text || null;
  }

  async renderPage(pageNumber: number, dpi: number): Promise<Buffer> {
    return this.render(this.bytes, pageNumber, dpi);
  }

  async close(): Promise<void> {
    await this.pdf.destroy();
  }
}

export class PdfjsDocumentLoader implements DocumentLoader {
  constructor(private readonly render: PageRenderer) {}

  async open(source: string | Uint8Array): Promise<StatementDocument> {
    const bytes = typeof source === 'string' ? new Uint8Array(fs.readFileSync(source)) : source;

    // pdfjs may transfer the buffer it is given, keep our own copy for rendering
    const pdf = await pdfjsLib.getDocument({ data: bytes.slice(), verbosity: 0 }).promise;
    return new PdfjsStatementDocument(pdf, bytes, this.render);
  }
}
