/**
 * Pipeline error classes
 *
 * Only fatal conditions are thrown. Malformed model output is reported
 * through a failed ParseResult instead (see extractors/response-repair).
 */

import type { ErrorEnvelope, FatalErrorCode } from './types';

/**
 * Base class for fatal pipeline errors
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public code: FatalErrorCode,
    public cause?: unknown
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/**
 * Thrown when the document cannot be opened or decoded at all
 */
export class DocumentReadError extends PipelineError {
  constructor(cause: unknown) {
    super(`Error reading PDF: ${describeError(cause)}`, 'document_read', cause);
    this.name = 'DocumentReadError';
  }
}

/**
 * Thrown before any network attempt when the model service credential is missing
 */
export class ConfigurationError extends PipelineError {
  constructor(message: string) {
    super(message, 'configuration');
    this.name = 'ConfigurationError';
  }
}

/**
 * Wraps any transport or service failure of the model call. Not retried.
 */
export class UpstreamServiceError extends PipelineError {
  constructor(
    cause: unknown,
    public model?: string
  ) {
    super(`Model service error: ${describeError(cause)}`, 'upstream_service', cause);
    this.name = 'UpstreamServiceError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Translate a fatal error into the envelope returned to callers
 */
export function toErrorEnvelope(error: PipelineError, correlationId: string): ErrorEnvelope {
  return {
    error: {
      code: error.code,
      message: error.message,
      correlation_id: correlationId,
    },
  };
}
