/**
 * Response Repair
 *
 * Models often wrap the requested JSON in prose ("Sure, here is the
 * JSON: ..."). The payload is taken to span from the first `{` to the last
 * `}` of the response. Failures are returned, never thrown.
 */

import { logger } from '../logger';

export type RepairResult =
  | { ok: true; record: Record<string, unknown> }
  | { ok: false; code: 'response_format'; error: string }
  | { ok: false; code: 'response_decode'; error: string; raw: string };

export const NO_JSON_OBJECT_MESSAGE = 'No JSON object found in AI response';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function repairResponse(raw: string): RepairResult {
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');

  if (start === -1 || end === -1) {
    logger.warn('Model response contains no JSON object', { response_chars: raw.length });
    return { ok: false, code: 'response_format', error: NO_JSON_OBJECT_MESSAGE };
  }

  // A `}` before the first `{` leaves an empty candidate, which fails to decode below
  const candidate = raw.slice(start, end + 1);

  let parsed: unknown;
  try {
    parsed = JSON.parse(candidate);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    logger.warn('Model response JSON could not be decoded', { detail });
    return { ok: false, code: 'response_decode', error: `AI returned invalid JSON: ${detail}`, raw };
  }

  if (!isPlainObject(parsed)) {
    return {
      ok: false,
      code: 'response_decode',
      error: 'AI returned invalid JSON: expected an object',
      raw,
    };
  }

  return { ok: true, record: parsed };
}
