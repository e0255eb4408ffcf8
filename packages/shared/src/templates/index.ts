/**
 * Extraction Templates
 */

export type { ExtractionTemplate } from './types';
export { CREDIT_CARD_STATEMENT_TEMPLATE } from './credit-card-statement.template';
