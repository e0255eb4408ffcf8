/**
 * AsyncLocalStorage Context Management
 *
 * Carries the correlation id, document identity and current pipeline stage
 * through one parse, so every log line of that parse can be stitched back
 * together.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { ulid } from 'ulid';

export type PipelineStage =
  | 'acquire_text'
  | 'build_prompt'
  | 'invoke_model'
  | 'repair_response'
  | 'normalize'
  | 'insights';

export interface ParseContext {
  correlationId: string;
  documentId?: string;
  sourceFilename?: string;
  stage?: PipelineStage;
}

const parseStorage = new AsyncLocalStorage<ParseContext>();

export function getContext(): ParseContext | undefined {
  return parseStorage.getStore();
}

/**
 * Correlation id of the running parse; a fresh ulid outside of one
 */
export function getCorrelationId(): string {
  return getContext()?.correlationId || ulid();
}

/**
 * Record which stage the running parse has reached. No-op outside a parse.
 */
export function enterStage(stage: PipelineStage): void {
  const context = getContext();
  if (context) {
    context.stage = stage;
  }
}

export async function runWithContextAsync<T>(
  context: ParseContext,
  fn: () => Promise<T>
): Promise<T> {
  // Own copy: stages are written onto the stored object
  return parseStorage.run({ ...context }, fn);
}
