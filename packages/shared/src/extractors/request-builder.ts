/**
 * Extraction Request Builder
 *
 * Only the first maxPromptChars characters of the statement reach the
 * model; fields printed after that bound are never seen.
 */

import { config } from '../config';
import { CREDIT_CARD_STATEMENT_TEMPLATE, type ExtractionTemplate } from '../templates';
import { NOT_FOUND } from '../types';

export interface ExtractionPrompt {
  systemPrompt: string;
  userPrompt: string;
  templateVersion: string;
  /** Length of the full statement text before truncation */
  textLength: number;
  truncated: boolean;
}

export function buildExtractionPrompt(
  text: string,
  maxChars: number = config.maxPromptChars,
  template: ExtractionTemplate = CREDIT_CARD_STATEMENT_TEMPLATE
): ExtractionPrompt {
  const statementText = text.slice(0, maxChars);

  // Function replacers so `$` sequences in statement text are kept literally
  const userPrompt = template.userPromptTemplate
    .replace('{{not_found}}', () => NOT_FOUND)
    .replace('{{statement_text}}', () => statementText);

  return {
    systemPrompt: template.systemPrompt,
    userPrompt,
    templateVersion: template.version,
    textLength: text.length,
    truncated: text.length > maxChars,
  };
}
