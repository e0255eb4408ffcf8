/**
 * Extraction Collaborator Types
 *
 * The core never touches a PDF library, an OCR engine or an HTTP client
 * directly. The worker supplies concrete implementations of these
 * interfaces; tests supply in-process fakes.
 */

/**
 * An opened PDF with enumerable pages. Page numbers are 1-based.
 */
export interface StatementDocument {
  /** Number of pages in the document */
  readonly pageCount: number;

  /**
   * Embedded (selectable) text of a page, or null when the page has none.
   */
  extractText(pageNumber: number): Promise<string | null>;

  /**
   * Rasterize a page to a PNG image at the given resolution.
   */
  renderPage(pageNumber: number, dpi: number): Promise<Buffer>;

  /** Release decoder resources */
  close(): Promise<void>;
}

/**
 * Opens a document from a file path or raw bytes.
 * Rejects when the document cannot be opened or decoded.
 */
export interface DocumentLoader {
  open(source: string | Uint8Array): Promise<StatementDocument>;
}

/**
 * Optical character recognition over a rendered page image.
 */
export interface OcrEngine {
  recognize(image: Buffer): Promise<string>;

  /** Release recognizer resources */
  terminate(): Promise<void>;
}

/**
 * Creates one OCR engine per parse; engines are never shared between parses.
 */
export type OcrEngineFactory = () => Promise<OcrEngine>;

/**
 * A chat-completion request as sent to the model service.
 */
export interface CompletionRequest {
  model: string;
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxTokens: number;
}

/**
 * A chat-completion response as received from the model service.
 */
export interface CompletionResponse {
  /** First choice's content; null when the service returned none */
  content: string | null;
  requestId?: string;
  totalTokens?: number;
}

/**
 * Minimal chat-completion client. One call, one attempt.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}
