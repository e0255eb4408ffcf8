/**
 * Extraction Template Types
 */

/**
 * Extraction template for a statement family.
 */
export interface ExtractionTemplate {
  /** System prompt describing the extractor's role */
  systemPrompt: string;

  /**
   * User prompt template with placeholders:
   * - {{not_found}}: The sentinel for fields the model cannot locate
   * - {{statement_text}}: The (truncated) statement text
   */
  userPromptTemplate: string;

  /** Human-readable description of what this template extracts */
  description: string;

  /** Bumped whenever the wording changes, logged with each request */
  version: string;
}
