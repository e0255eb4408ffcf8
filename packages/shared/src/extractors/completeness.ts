import { NOT_FOUND, REQUIRED_FIELDS, type ExtractedFields } from '../types';

export interface CompletenessScore {
  extracted_count: number;
  total_required: number;
  /** Percentage, one decimal place */
  success_rate: number;
}

/**
 * Share of the five required fields (issuer excluded) that were extracted.
 */
export function scoreCompleteness(fields: ExtractedFields): CompletenessScore {
  const extracted = REQUIRED_FIELDS.filter((key) => {
    const value = fields[key];
    return value.trim() !== '' && value !== NOT_FOUND;
  }).length;
  const total = REQUIRED_FIELDS.length;

  return {
    extracted_count: extracted,
    total_required: total,
    success_rate: Math.round((extracted / total) * 1000) / 10,
  };
}
