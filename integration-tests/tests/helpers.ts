/**
 * Test Helpers
 *
 * In-process stand-ins for the PDF decoder, the OCR engine and the model
 * service.
 */

import type {
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
  DocumentLoader,
  OcrEngine,
  StatementDocument,
} from '@statement-insight/shared';

export const TEST_API_KEY = 'test-secret';

/** A page of fake PDF: embedded text (null for a scanned page) and what OCR would read. */
export interface FakePage {
  embedded: string | null;
  ocrText?: string;
  /** Make embedded extraction throw */
  extractFails?: boolean;
  /** Make rasterization throw */
  renderFails?: boolean;
}

export class FakeDocument implements StatementDocument {
  readonly extractCalls: number[] = [];
  readonly renderCalls: Array<{ page: number; dpi: number }> = [];
  closed = false;

  constructor(private readonly pages: FakePage[]) {}

  get pageCount(): number {
    return this.pages.length;
  }

  async extractText(pageNumber: number): Promise<string | null> {
    this.extractCalls.push(pageNumber);
    const page = this.page(pageNumber);
    if (page.extractFails) {
      throw new Error(`corrupt content stream on page ${pageNumber}`);
    }
    return page.embedded;
  }

  async renderPage(pageNumber: number, dpi: number): Promise<Buffer> {
    this.renderCalls.push({ page: pageNumber, dpi });
    if (this.page(pageNumber).renderFails) {
      throw new Error(`cannot render page ${pageNumber}`);
    }
    return Buffer.from(`png:${pageNumber}`);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  /** OCR text for the image this document renders for a page */
  ocrTextFor(image: Buffer): string | undefined {
    const match = /^png:(\d+)$/.exec(image.toString());
    return match ? this.page(Number(match[1])).ocrText : undefined;
  }

  private page(pageNumber: number): FakePage {
    const page = this.pages[pageNumber - 1];
    if (!page) {
      throw new Error(`no page ${pageNumber}`);
    }
    return page;
  }
}

export class FakeLoader implements DocumentLoader {
  readonly opened: Array<string | Uint8Array> = [];

  constructor(private readonly document: FakeDocument | Error) {}

  async open(source: string | Uint8Array): Promise<StatementDocument> {
    this.opened.push(source);
    if (this.document instanceof Error) {
      throw this.document;
    }
    return this.document;
  }
}

/**
 * Reads back the text the fake document planted for each rendered page.
 * Pages without planted OCR text make recognition fail.
 */
export class FakeOcr implements OcrEngine {
  readonly recognizedPages: number[] = [];
  terminated = false;

  constructor(private readonly document: FakeDocument) {}

  async recognize(image: Buffer): Promise<string> {
    const match = /^png:(\d+)$/.exec(image.toString());
    if (match) {
      this.recognizedPages.push(Number(match[1]));
    }
    const text = this.document.ocrTextFor(image);
    if (text === undefined) {
      throw new Error('recognition failed');
    }
    return text;
  }

  async terminate(): Promise<void> {
    this.terminated = true;
  }
}

export class FakeCompletionClient implements CompletionClient {
  readonly requests: CompletionRequest[] = [];

  constructor(private readonly reply: string | null | Error) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return { content: this.reply, requestId: 'req_test_1', totalTokens: 42 };
  }
}

export function modelJson(fields: Record<string, unknown>): string {
  return JSON.stringify(fields);
}
