/**
 * Statement Extraction Pipeline
 */

// Collaborator types
export type {
  StatementDocument,
  DocumentLoader,
  OcrEngine,
  OcrEngineFactory,
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
} from './types';

// Text acquisition
export {
  acquireText,
  openDocument,
  isIllegible,
  type AcquiredText,
  type TextAcquisitionOptions,
} from './text-acquisition';

// Request building & model invocation
export { buildExtractionPrompt, type ExtractionPrompt } from './request-builder';
export {
  invokeModel,
  requireApiKey,
  OpenAiCompletionClient,
  type CompletionClientOptions,
  type ModelInvocationOptions,
  type ModelResponse,
} from './llm-extraction';

// Response repair & normalization
export { repairResponse, NO_JSON_OBJECT_MESSAGE, type RepairResult } from './response-repair';
export { ISSUER_RULES, UNKNOWN_ISSUER, inferIssuer, type IssuerRule } from './issuer-rules';
export { normalizeFields, cleanAmount, parseAmount } from './field-normalizer';

// Scoring & insights
export { scoreCompleteness, type CompletenessScore } from './completeness';
export {
  generateInsights,
  formatAmount,
  ANNUAL_INTEREST_RATE,
  HIGH_BALANCE_THRESHOLD,
  LONG_PAYOFF_MONTHS,
  RECOMMENDED_PAYOFF_MONTHS,
  type InsightOptions,
} from './insights';

// Pipeline
export {
  StatementParser,
  type StatementParserOptions,
  type ParseRequestContext,
} from './statement-parser';
