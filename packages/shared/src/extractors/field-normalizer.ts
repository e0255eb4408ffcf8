/**
 * Field Normalizer
 *
 * Coerces the repaired model record into the six-key ExtractedFields shape,
 * fills in a missing issuer from the statement text, and strips currency
 * formatting from the amount fields.
 */

import { logger } from '../logger';
import { AMOUNT_FIELDS, FIELD_KEYS, NOT_FOUND, type ExtractedFields } from '../types';
import { inferIssuer } from './issuer-rules';

const CURRENCY_NOISE = /[$₹€£¥,]/g;

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

function toFieldValue(value: unknown): string {
  if (value === null || value === undefined) return NOT_FOUND;
  if (typeof value === 'string') return value.trim() ? value : NOT_FOUND;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}

/**
 * Strip currency symbols and thousands separators. The result may still be
 * non-numeric ("N/A", "see page 2"); callers must use parseAmount before
 * doing arithmetic.
 */
export function cleanAmount(value: string): string {
  return value.replace(CURRENCY_NOISE, '').trim();
}

/**
 * Strict decimal parse of an amount field; null for anything non-numeric.
 */
export function parseAmount(value: string | undefined): number | null {
  if (value === undefined || value === NOT_FOUND) return null;
  const cleaned = cleanAmount(value);
  if (!DECIMAL.test(cleaned)) return null;
  const amount = Number(cleaned);
  return Number.isFinite(amount) ? amount : null;
}

export function normalizeFields(
  record: Record<string, unknown>,
  documentText: string
): ExtractedFields {
  const fields: ExtractedFields = {
    issuer: toFieldValue(record.issuer),
    card_last4: toFieldValue(record.card_last4),
    statement_date: toFieldValue(record.statement_date),
    due_date: toFieldValue(record.due_date),
    total_balance: toFieldValue(record.total_balance),
    minimum_payment: toFieldValue(record.minimum_payment),
  };

  if (fields.issuer === NOT_FOUND) {
    fields.issuer = inferIssuer(documentText);
    logger.info('Issuer inferred from statement text', { issuer: fields.issuer });
  }

  for (const key of AMOUNT_FIELDS) {
    if (fields[key] !== NOT_FOUND) {
      fields[key] = cleanAmount(fields[key]);
    }
  }

  const ignored = Object.keys(record).filter((key) => !FIELD_KEYS.some((k) => k === key));
  if (ignored.length > 0) {
    logger.debug('Ignoring unexpected keys in model response', { keys: ignored });
  }

  return fields;
}
