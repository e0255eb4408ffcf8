/**
 * Shared TypeScript Types
 *
 * Types for the credit-card statement parsing pipeline, matching the JSON
 * schema in docs/contracts/
 */

// ============================================================================
// Extracted Fields
// ============================================================================

/** Literal value the model uses for a field it could not locate. */
export const NOT_FOUND = 'Not found';

export const FIELD_KEYS = [
  'issuer',
  'card_last4',
  'statement_date',
  'due_date',
  'total_balance',
  'minimum_payment',
] as const;

export type FieldKey = (typeof FIELD_KEYS)[number];

/** Every key is always present; a value is either extracted text or NOT_FOUND. */
export type ExtractedFields = Record<FieldKey, string>;

/** Fields counted towards the success rate. Issuer is excluded. */
export const REQUIRED_FIELDS = [
  'card_last4',
  'statement_date',
  'due_date',
  'total_balance',
  'minimum_payment',
] as const satisfies readonly FieldKey[];

export type RequiredField = (typeof REQUIRED_FIELDS)[number];

export const AMOUNT_FIELDS = ['total_balance', 'minimum_payment'] as const satisfies readonly FieldKey[];

// ============================================================================
// Pages
// ============================================================================

export type PageTextSource = 'embedded' | 'ocr' | 'empty';

export interface Page {
  /** 1-based page ordinal */
  index: number;
  embeddedText?: string;
  /** Rendered PNG, present only for pages routed through OCR */
  image?: Buffer;
  /** Resolved text, never undefined */
  text: string;
  source: PageTextSource;
}

// ============================================================================
// Insights
// ============================================================================

export type InsightType = 'warning' | 'critical' | 'info';
export type InsightPriority = 'high' | 'critical' | 'medium';

export interface Insight {
  type: InsightType;
  title: string;
  message: string;
  priority: InsightPriority;
}

// ============================================================================
// Parse Result
// ============================================================================

export type ParseFailureCode = 'no_text' | 'response_format' | 'response_decode';

export type FatalErrorCode = 'document_read' | 'configuration' | 'upstream_service';

export interface ParseSuccess {
  success: true;
  data: ExtractedFields;
  extracted_count: number;
  total_required: number;
  success_rate: number;
  method: string;
  page_count: number;
  ocr_pages: number[];
  insights: Insight[];
}

export interface ParseFailure {
  success: false;
  error: string;
  error_code: ParseFailureCode;
  raw_response?: string;
}

export type ParseResult = ParseSuccess | ParseFailure;

// ============================================================================
// Errors
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: FatalErrorCode;
    message: string;
    correlation_id: string;
  };
}
