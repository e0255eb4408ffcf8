/**
 * Statement Parser
 *
 * document -> text acquisition -> prompt -> model -> response repair
 *          -> field normalizer -> completeness score -> insights
 *
 * Fatal conditions (unreadable PDF, missing credential, model service
 * failure) are thrown as PipelineError subclasses. Everything else,
 * including malformed model output, comes back as a ParseResult with
 * success=false.
 */

import { ulid } from 'ulid';
import { config } from '../config';
import { enterStage, runWithContextAsync } from '../context';
import { logger } from '../logger';
import { documentsParsedCounter, parseDurationHistogram } from '../metrics';
import type { ParseFailure, ParseResult } from '../types';
import { scoreCompleteness } from './completeness';
import { normalizeFields } from './field-normalizer';
import { generateInsights } from './insights';
import { invokeModel, requireApiKey } from './llm-extraction';
import { buildExtractionPrompt } from './request-builder';
import { repairResponse } from './response-repair';
import { acquireText, openDocument, type AcquiredText } from './text-acquisition';
import type { CompletionClient, DocumentLoader, OcrEngine, OcrEngineFactory } from './types';

export interface StatementParserOptions {
  loader: DocumentLoader;
  createOcrEngine: OcrEngineFactory;
  /** Model service credential, checked before any network call */
  apiKey?: string;
  /** Prebuilt completion client; an openai-backed one is built otherwise */
  client?: CompletionClient;
  model?: string;
  baseUrl?: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
  maxPromptChars?: number;
  legibilityThreshold?: number;
  ocrDpi?: number;
  currencySymbol?: string;
}

export interface ParseRequestContext {
  correlationId?: string;
  documentId?: string;
  sourceFilename?: string;
}

export class StatementParser {
  constructor(private readonly options: StatementParserOptions) {}

  /**
   * Parse one statement from a file path or raw PDF bytes.
   */
  async parse(source: string | Uint8Array, ctx: ParseRequestContext = {}): Promise<ParseResult> {
    return runWithContextAsync(
      {
        correlationId: ctx.correlationId || ulid(),
        documentId: ctx.documentId,
        sourceFilename: ctx.sourceFilename,
      },
      async () => {
        const startTime = Date.now();
        try {
          const result = await this.run(source);
          documentsParsedCounter.inc({ status: result.success ? 'success' : result.error_code });
          return result;
        } catch (error) {
          documentsParsedCounter.inc({ status: 'error' });
          throw error;
        } finally {
          parseDurationHistogram.observe((Date.now() - startTime) / 1000);
        }
      }
    );
  }

  private async run(source: string | Uint8Array): Promise<ParseResult> {
    const { options } = this;

    logger.info('Starting statement parse');

    // Fail on a missing credential before the (slow) OCR work starts
    const apiKey = requireApiKey(options.apiKey);

    // Step 1: Open document and acquire text
    enterStage('acquire_text');
    const acquired = await this.acquire(source);

    if (!acquired.text.trim()) {
      logger.warn('No usable text in statement', { totalPages: acquired.pages.length });
      return this.failure({
        success: false,
        error: 'Could not extract text from PDF',
        error_code: 'no_text',
      });
    }

    logger.debug('Statement text sample', { sample: acquired.text.slice(0, 500) });

    // Step 2: Build prompt
    enterStage('build_prompt');
    const prompt = buildExtractionPrompt(acquired.text, options.maxPromptChars ?? config.maxPromptChars);

    // Step 3: Query model
    enterStage('invoke_model');
    const response = await invokeModel(prompt, {
      apiKey,
      client: options.client,
      model: options.model,
      baseUrl: options.baseUrl,
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      timeoutMs: options.timeoutMs,
    });

    logger.debug('Model raw response', { raw_response: response.rawText });

    // Step 4: Recover the JSON object
    enterStage('repair_response');
    const repaired = repairResponse(response.rawText);
    if (!repaired.ok) {
      return this.failure(
        repaired.code === 'response_decode'
          ? { success: false, error: repaired.error, error_code: repaired.code, raw_response: repaired.raw }
          : { success: false, error: repaired.error, error_code: repaired.code }
      );
    }

    // Step 5: Normalize, score, derive insights
    enterStage('normalize');
    const data = normalizeFields(repaired.record, acquired.text);
    const score = scoreCompleteness(data);
    enterStage('insights');
    const insights = generateInsights(data, { currencySymbol: options.currencySymbol });

    logger.info('Statement parse complete', {
      ...score,
      issuer: data.issuer,
      insight_count: insights.length,
      request_id: response.requestId,
    });

    return {
      success: true,
      data,
      ...score,
      method: `AI-Powered (${response.model})`,
      page_count: acquired.pages.length,
      ocr_pages: acquired.pages.filter((p) => p.source !== 'embedded').map((p) => p.index),
      insights,
    };
  }

  private async acquire(source: string | Uint8Array): Promise<AcquiredText> {
    const document = await openDocument(this.options.loader, source);
    const ocr = this.lazyOcrEngine();
    try {
      return await acquireText(document, ocr, {
        legibilityThreshold: this.options.legibilityThreshold,
        dpi: this.options.ocrDpi,
      });
    } finally {
      try {
        await ocr.terminate();
      } catch (error) {
        logger.warn('OCR engine did not shut down cleanly', {
          error: error instanceof Error ? error.message : String(error),
        });
      } finally {
        await document.close();
      }
    }
  }

  /**
   * OCR engine created on first use, so fully digital statements never
   * start a recognizer. A factory failure surfaces as a failed page.
   */
  private lazyOcrEngine(): OcrEngine {
    const { createOcrEngine } = this.options;
    let engine: OcrEngine | undefined;

    return {
      async recognize(image: Buffer): Promise<string> {
        if (!engine) {
          engine = await createOcrEngine();
        }
        return engine.recognize(image);
      },
      async terminate(): Promise<void> {
        if (engine) {
          await engine.terminate();
        }
      },
    };
  }

  private failure(result: ParseFailure): ParseFailure {
    logger.warn('Statement parse failed', { error: result.error, error_code: result.error_code });
    return result;
  }
}
