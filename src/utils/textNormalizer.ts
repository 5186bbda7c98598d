/**
 * Collapse every run of whitespace (newlines included) into a single space
 * and trim both ends.
 */
export function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * First maxChars characters of text, counted by code point so a surrogate
 * pair is never split.
 */
export function truncateChars(text: string, maxChars: number): string {
  const chars = Array.from(text);
  return chars.length <= maxChars ? text : chars.slice(0, maxChars).join('');
}
