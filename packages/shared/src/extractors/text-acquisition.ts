/**
 * Text Acquisition
 *
 * Turns a statement PDF into page-ordered text. Each page uses its embedded
 * text when it is legible, otherwise the page is rasterized and run through
 * OCR. A page that cannot be recognized resolves to an empty string; only a
 * document that cannot be opened at all aborts the parse.
 */

import { config } from '../config';
import { DocumentReadError } from '../errors';
import { logger } from '../logger';
import { ocrPagesCounter } from '../metrics';
import type { Page } from '../types';
import type { DocumentLoader, OcrEngine, StatementDocument } from './types';

export interface TextAcquisitionOptions {
  /** Pages whose trimmed embedded text is shorter than this go to OCR */
  legibilityThreshold?: number;
  /** Rasterization resolution for OCR */
  dpi?: number;
}

export interface AcquiredText {
  pages: Page[];
  /** Page texts joined by newlines, in page order */
  text: string;
}

/**
 * Open a document, turning any decoder failure into a DocumentReadError.
 */
export async function openDocument(
  loader: DocumentLoader,
  source: string | Uint8Array
): Promise<StatementDocument> {
  try {
    return await loader.open(source);
  } catch (error) {
    logger.error('PDF could not be opened', error, {
      source: typeof source === 'string' ? source : `<${source.byteLength} bytes>`,
    });
    throw new DocumentReadError(error);
  }
}

/**
 * Whether embedded text is too short to trust
 */
export function isIllegible(text: string | null | undefined, threshold: number): boolean {
  return !text || text.trim().length < threshold;
}

async function readEmbeddedText(
  document: StatementDocument,
  pageNumber: number
): Promise<string | null> {
  try {
    return await document.extractText(pageNumber);
  } catch (error) {
    logger.warn('Embedded text extraction failed, treating page as image-only', {
      page: pageNumber,
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
}

async function recognizePage(
  document: StatementDocument,
  ocr: OcrEngine,
  pageNumber: number,
  dpi: number
): Promise<{ image?: Buffer; text: string }> {
  let image: Buffer | undefined;
  try {
    image = await document.renderPage(pageNumber, dpi);
    const text = await ocr.recognize(image);
    ocrPagesCounter.inc({ status: 'success' });
    return { image, text };
  } catch (error) {
    ocrPagesCounter.inc({ status: 'error' });
    logger.warn('OCR failed, page left empty', {
      page: pageNumber,
      error: error instanceof Error ? error.message : String(error),
    });
    return { image, text: '' };
  }
}

/**
 * Resolve the text of every page of an opened document.
 */
export async function acquireText(
  document: StatementDocument,
  ocr: OcrEngine,
  options: TextAcquisitionOptions = {}
): Promise<AcquiredText> {
  const threshold = options.legibilityThreshold ?? config.legibilityThreshold;
  const dpi = options.dpi ?? config.ocrDpi;

  logger.info('Acquiring statement text', { totalPages: document.pageCount });

  const pages: Page[] = [];

  for (let pageNumber = 1; pageNumber <= document.pageCount; pageNumber++) {
    const embeddedText = await readEmbeddedText(document, pageNumber);

    if (!isIllegible(embeddedText, threshold)) {
      const text = embeddedText ?? '';
      logger.debug('Page text extracted', { page: pageNumber, chars: text.length });
      pages.push({ index: pageNumber, embeddedText: text, text, source: 'embedded' });
      continue;
    }

    logger.info('Using OCR fallback', {
      page: pageNumber,
      embeddedChars: embeddedText?.trim().length ?? 0,
      dpi,
    });

    const { image, text } = await recognizePage(document, ocr, pageNumber, dpi);
    pages.push({
      index: pageNumber,
      embeddedText: embeddedText ?? undefined,
      image,
      text,
      source: text ? 'ocr' : 'empty',
    });
  }

  const text = pages.map((p) => p.text).join('\n');

  logger.info('Statement text acquisition complete', {
    totalPages: pages.length,
    ocrPages: pages.filter((p) => p.source !== 'embedded').map((p) => p.index),
    totalChars: text.length,
  });

  return { pages, text };
}
