/**
 * Keyword context windows
 *
 * Finds every case-insensitive literal occurrence of a keyword in a section's
 * text and returns the surrounding snippet for each, in document order.
 * The list is never capped here; callers decide how many to keep.
 */

export const CONTEXT_RADIUS = 200;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function codePointWidth(codePoint: number | undefined): number {
  return codePoint !== undefined && codePoint > 0xffff ? 2 : 1;
}

/**
 * Index reached by stepping count characters (code points) back from index
 */
function stepBack(text: string, index: number, count: number): number {
  let i = index;
  for (let n = 0; n < count && i > 0; n++) {
    i -= i >= 2 ? codePointWidth(text.codePointAt(i - 2)) : 1;
  }
  return i;
}

/**
 * Index reached by stepping count characters (code points) forward from index
 */
function stepForward(text: string, index: number, count: number): number {
  let i = index;
  for (let n = 0; n < count && i < text.length; n++) {
    i += codePointWidth(text.codePointAt(i));
  }
  return i;
}

/**
 * @param radius Characters (code points) kept on each side of the match, clamped to the text
 */
export function findContextsInSection(
  text: string,
  keyword: string,
  radius: number = CONTEXT_RADIUS
): string[] {
  if (!keyword) {
    return [];
  }

  const pattern = new RegExp(escapeRegExp(keyword), 'gi');
  const snippets: string[] = [];

  for (const match of text.matchAll(pattern)) {
    const matchStart = match.index ?? 0;
    const start = stepBack(text, matchStart, radius);
    const end = stepForward(text, matchStart + match[0].length, radius);
    snippets.push(text.slice(start, end).replace(/\n/g, ' ').trim());
  }

  return snippets;
}
