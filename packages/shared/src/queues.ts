/**
 * BullMQ Queue Definitions
 *
 * Queue name, job payload, and the worker factory.
 * Producers must enqueue with attempts: 1; the model call is never retried.
 */

import { Worker, Job, ConnectionOptions } from 'bullmq';
import { config } from './config';
import { logger, type LogContext } from './logger';
import type { ErrorEnvelope, ParseResult } from './types';

// ============================================================================
// Queue Names
// ============================================================================

export const QUEUE_NAMES = {
  PARSE_STATEMENT: 'parse_statement',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

// ============================================================================
// Job Payloads
// ============================================================================

/**
 * parse_statement - Enqueued by the upload layer once the PDF is on disk
 */
export interface ParseStatementJob {
  event_type: 'statement.uploaded';
  correlation_id: string;
  document_id: string;
  file_path: string;
  source_filename: string;
  uploaded_at: string;
}

/**
 * Log fields for a parse_statement job; queue_delay_ms is null when
 * uploaded_at is not a valid timestamp
 */
export function parseStatementLogFields(data: ParseStatementJob, now: number = Date.now()): LogContext {
  const uploadedAt = Date.parse(data.uploaded_at);
  return {
    event_type: data.event_type,
    document_id: data.document_id,
    source_filename: data.source_filename,
    uploaded_at: data.uploaded_at,
    queue_delay_ms: Number.isNaN(uploadedAt) ? null : now - uploadedAt,
  };
}

/**
 * Job return value: the parse result, or the envelope of a fatal error
 */
export type ParseStatementJobResult = ParseResult | ErrorEnvelope;

// ============================================================================
// Redis Connection
// ============================================================================

export function getRedisConnection(): ConnectionOptions {
  const redisUrl = config.redisUrl;

  if (redisUrl && redisUrl.startsWith('redis://')) {
    try {
      const url = new URL(redisUrl);
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        maxRetriesPerRequest: null, // Required for BullMQ
      };
    } catch {
      logger.warn('Invalid REDIS_URL, using REDIS_HOST/REDIS_PORT', { redisUrl });
    }
  }

  return {
    host: config.redisHost,
    port: config.redisPort,
    maxRetriesPerRequest: null,
  };
}

// ============================================================================
// Worker Factory
// ============================================================================

export interface WorkerOptions {
  concurrency?: number;
}

export function createWorker<TData, TResult>(
  queueName: QueueName,
  processor: (job: Job<TData, TResult>) => Promise<TResult>,
  options: WorkerOptions = {}
): Worker<TData, TResult> {
  const concurrency = options.concurrency || config.workerConcurrency;
  const worker = new Worker<TData, TResult>(queueName, processor, {
    connection: getRedisConnection(),
    concurrency,
  });

  worker.on('completed', (job) => {
    logger.info('Job completed', {
      queue: queueName,
      jobId: job.id,
    });
  });

  worker.on('failed', (job, err) => {
    logger.error('Job failed', err, {
      queue: queueName,
      jobId: job?.id,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Worker error', err, { queue: queueName });
  });

  logger.info('Worker started', {
    queue: queueName,
    concurrency,
  });

  return worker;
}
