/**
 * Credit Card Statement Extraction Template
 *
 * Document semantics:
 * - One statement per document, one card per statement
 * - Issuer name usually appears in the header or remittance slip
 * - Card number is masked; only the last 4 digits are meaningful
 * - Amounts may carry currency symbols and thousands separators
 */

import type { ExtractionTemplate } from './types';

export const CREDIT_CARD_STATEMENT_TEMPLATE: ExtractionTemplate = {
  description: 'Credit card statement - extracts issuer, card suffix, dates, balance and minimum payment',
  version: '1.0.0',

  systemPrompt: `You are an expert financial document parser.`,

  userPromptTemplate: `Extract the following fields from this credit card statement:

1. issuer (bank name)
2. card_last4 (last 4 digits of card number)
3. statement_date (billing cycle or statement period)
4. due_date (payment due date)
5. total_balance (total amount due or outstanding balance)
6. minimum_payment (minimum payment amount)

Return ONLY a valid JSON object with these exact keys. No extra text.
If a field is missing, use "{{not_found}}" as its value.

Statement text:
{{statement_text}}`,
};
