/**
 * Statement Parser Worker
 *
 * Parses each uploaded statement PDF: text acquisition with OCR fallback,
 * model extraction, repair, normalization, scoring and insights. The parse
 * result is the job's return value; storing it is the caller's concern.
 */

import { Job } from 'bullmq';
import {
  logger,
  config,
  createWorker,
  serveMetrics,
  validateParseResult,
  toErrorEnvelope,
  PipelineError,
  StatementParser,
  QUEUE_NAMES,
  parseStatementLogFields,
  type ParseStatementJob,
  type ParseStatementJobResult,
} from '@statement-insight/shared';
import { PdfjsDocumentLoader } from './lib/pdf';
import { TesseractOcrEngine } from './lib/ocr';
import { renderPageToPng } from './lib/rasterize';

if (!config.llmApiKey) {
  logger.warn('LLM_API_KEY not configured; every parse will fail with a configuration error');
}

const parser = new StatementParser({
  loader: new PdfjsDocumentLoader(renderPageToPng),
  createOcrEngine: () => TesseractOcrEngine.create(config.ocrLanguage),
  apiKey: config.llmApiKey,
  model: config.llmModel,
  baseUrl: config.llmBaseUrl,
  temperature: config.llmTemperature,
  maxTokens: config.llmMaxTokens,
  timeoutMs: config.llmRequestTimeoutMs,
  maxPromptChars: config.maxPromptChars,
  legibilityThreshold: config.legibilityThreshold,
  ocrDpi: config.ocrDpi,
  currencySymbol: config.currencySymbol,
});

/**
 * Process parse_statement job
 */
async function processParseStatement(
  job: Job<ParseStatementJob, ParseStatementJobResult>
): Promise<ParseStatementJobResult> {
  const { correlation_id, document_id, file_path, source_filename } = job.data;

  logger.info('Processing parse_statement', {
    jobId: job.id,
    ...parseStatementLogFields(job.data),
    attempt: job.attemptsMade + 1,
  });

  try {
    const result = await parser.parse(file_path, {
      correlationId: correlation_id,
      documentId: document_id,
      sourceFilename: source_filename,
    });

    const validation = validateParseResult(result);
    if (!validation.valid) {
      logger.warn('Parse result does not match contract', {
        document_id,
        errors: validation.errors,
      });
    }

    return result;
  } catch (error) {
    // Fatal pipeline errors become a user-facing envelope; anything else fails the job
    if (error instanceof PipelineError) {
      logger.error('Statement parse aborted', error, { document_id, code: error.code });
      return toErrorEnvelope(error, correlation_id);
    }
    throw error;
  }
}

// Create and start the worker
const worker = createWorker<ParseStatementJob, ParseStatementJobResult>(
  QUEUE_NAMES.PARSE_STATEMENT,
  processParseStatement
);
const metricsServer = serveMetrics(config.metricsPort);

logger.info('Statement parser worker started', {
  model: config.llmModel,
  base_url: config.llmBaseUrl,
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  metricsServer.close();
  process.exit(0);
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((err: unknown) => logger.error('Shutdown failed', err));
});
process.on('SIGINT', () => {
  shutdown('SIGINT').catch((err: unknown) => logger.error('Shutdown failed', err));
});
