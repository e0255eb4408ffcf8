/**
 * Structured Logging
 *
 * One JSON object per line. Lines written inside a parse carry its
 * correlation id, document id, source filename and pipeline stage.
 *
 * LOG_LEVEL sets the lowest level written (debug | info | warn | error);
 * without it, debug lines are dropped only in production.
 */

import { getContext, getCorrelationId } from './context';

export interface LogContext {
  [key: string]: unknown;
}

const LEVEL_RANK = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 } as const;

export type LogLevel = keyof typeof LEVEL_RANK;

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

function minimumLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL || '').toUpperCase();
  if (isLogLevel(configured)) {
    return configured;
  }
  return process.env.NODE_ENV === 'production' ? 'INFO' : 'DEBUG';
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minimumLevel()];
}

function formatLog(level: LogLevel, message: string, context?: LogContext): string {
  const parse = getContext();

  return JSON.stringify({
    timestamp: new Date().toISOString(),
    level,
    correlationId: getCorrelationId(),
    documentId: parse?.documentId,
    sourceFilename: parse?.sourceFilename,
    stage: parse?.stage,
    message,
    ...context,
  });
}

function describeCause(error: unknown): unknown {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  return String(error);
}

export const logger = {
  debug: (message: string, context?: LogContext) => {
    if (isLevelEnabled('DEBUG')) console.debug(formatLog('DEBUG', message, context));
  },

  info: (message: string, context?: LogContext) => {
    if (isLevelEnabled('INFO')) console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (isLevelEnabled('WARN')) console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: unknown, context?: LogContext) => {
    if (isLevelEnabled('ERROR')) {
      console.error(formatLog('ERROR', message, { ...context, error: describeCause(error) }));
    }
  },
};
