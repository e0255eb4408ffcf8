/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContextAsync,
  enterStage,
  type ParseContext,
  type PipelineStage,
} from './context';

// Logger
export { logger, isLevelEnabled, type LogContext, type LogLevel } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Errors
export {
  PipelineError,
  DocumentReadError,
  ConfigurationError,
  UpstreamServiceError,
  describeError,
  toErrorEnvelope,
} from './errors';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ParseStatementJob,
  type ParseStatementJobResult,
  getRedisConnection,
  createWorker,
  parseStatementLogFields,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  documentsParsedCounter,
  parseDurationHistogram,
  ocrPagesCounter,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export { validateParseResult, type ValidationResult } from './schemas';

// Templates
export { CREDIT_CARD_STATEMENT_TEMPLATE, type ExtractionTemplate } from './templates';

// Extraction pipeline
export * from './extractors';
