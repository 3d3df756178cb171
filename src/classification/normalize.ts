/**
 * Lowercases text and collapses every run of characters outside [a-z0-9]
 * into a single space. Keyword checks are substring checks against this form.
 *
 * Pure and idempotent. Leading/trailing spaces are kept.
 */
export function normalizeText(text: string): string {
  return text.toLowerCase().replace(/[^a-z0-9]+/g, ' ');
}
