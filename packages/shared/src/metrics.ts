/**
 * Prometheus Metrics
 *
 * Metrics for parse throughput, OCR fallback usage and model latency.
 */

import http from 'node:http';
import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const documentsParsedCounter = new promClient.Counter({
  name: 'statement_insight_documents_parsed_total',
  help: 'Total number of statements run through the parse pipeline',
  labelNames: ['status'],
  registers: [register],
});

export const parseDurationHistogram = new promClient.Histogram({
  name: 'statement_insight_parse_duration_seconds',
  help: 'Duration of a full parse, text acquisition through insights',
  buckets: [1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

export const ocrPagesCounter = new promClient.Counter({
  name: 'statement_insight_ocr_pages_total',
  help: 'Pages routed through optical character recognition',
  labelNames: ['status'],
  registers: [register],
});

// ============================================================================
// LLM Metrics
// ============================================================================

export const llmRequestsCounter = new promClient.Counter({
  name: 'statement_insight_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'statement_insight_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 * Default process metrics are only collected once a server is running.
 */
export function serveMetrics(port: number): http.Server {
  try {
    promClient.collectDefaultMetrics({ register });
  } catch (err) {
    logger.warn('Default Prometheus metrics collection skipped', {
      error: err instanceof Error ? err.message : String(err),
    });
  }

  const server = http.createServer((req, res) => {
    if (req.url === '/metrics' && req.method === 'GET') {
      getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', getMetricsContentType());
          res.end(body);
        })
        .catch((err: unknown) => {
          logger.error('Metrics scrape failed', err);
          res.statusCode = 500;
          res.end();
        });
    } else {
      res.statusCode = 404;
      res.end();
    }
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
