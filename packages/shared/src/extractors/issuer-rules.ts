/**
 * Issuer Inference Rules
 *
 * Ordered (issuer, keywords) pairs tested against the lower-cased statement
 * text when the model could not name the issuer. First match wins, so the
 * order decides statements that mention several banks: "chase" beats "citi".
 */

export interface IssuerRule {
  issuer: string;
  /** Lower-case substrings, any one of which identifies the issuer */
  keywords: readonly string[];
}

export const ISSUER_RULES: readonly IssuerRule[] = [
  { issuer: 'HSBC', keywords: ['hsbc'] },
  { issuer: 'Chase', keywords: ['chase'] },
  { issuer: 'American Express', keywords: ['amex', 'american express'] },
  { issuer: 'Citi', keywords: ['citi'] },
  { issuer: 'Discover', keywords: ['discover'] },
  { issuer: 'Capital One', keywords: ['capital one'] },
];

export const UNKNOWN_ISSUER = 'Unknown';

export function inferIssuer(text: string, rules: readonly IssuerRule[] = ISSUER_RULES): string {
  const haystack = text.toLowerCase();
  const match = rules.find((rule) => rule.keywords.some((keyword) => haystack.includes(keyword)));
  return match ? match.issuer : UNKNOWN_ISSUER;
}
