/**
 * Lowercase, replace punctuation with spaces (hyphens inside words survive),
 * collapse whitespace. Query text and gazetteer names go through the same
 * function so they compare word for word.
 */
export function normalizeQueryText(text: string): string {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s-]+/gu, ' ')
    .split(/\s+/)
    .map((token) => token.replace(/^-+|-+$/g, ''))
    .filter((token) => token.length > 0)
    .join(' ');
}
