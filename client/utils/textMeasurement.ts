/**
 * Text measurement for character-cell layout
 *
 * Lengths are counted in Unicode code points: one code point is one cell. Combining
 * sequences and wide glyphs are not special-cased.
 */

/** Number of cells a string occupies */
export function charLength(text: string): number {
  return Array.from(text).length;
}

/** Removes the last code point (not the last grapheme) */
export function dropLastChar(text: string): string {
  const chars = Array.from(text);
  chars.pop();
  return chars.join('');
}

/**
 * Splits a paragraph after every space, keeping the space on the word before it:
 * "ab  c" → ["ab ", " ", "c"].
 */
function splitInclusive(paragraph: string): string[] {
  const tokens: string[] = [];
  let current = '';
  for (const ch of paragraph) {
    current += ch;
    if (ch === ' ') {
      tokens.push(current);
      current = '';
    }
  }
  if (current) {
    tokens.push(current);
  }
  return tokens;
}

/**
 * Greedy word wrap. This is the SINGLE SOURCE OF TRUTH for wrapping, shared by the
 * renderer and the insert caret.
 *
 * - every `\n` paragraph yields at least one line, so blank paragraphs stay blank lines
 * - a trailing space counts toward the line it ends
 * - tokens wider than `maxWidth` are cut into `maxWidth` chunks, no hyphen
 * - `maxWidth` of 0 yields no lines at all
 */
export function wrapText(text: string, maxWidth: number): string[] {
  if (maxWidth <= 0) return [];

  const lines: string[] = [];
  for (const paragraph of text.split('\n')) {
    const paragraphLines: string[] = [];
    let currentLine = '';

    for (const token of splitInclusive(paragraph)) {
      const tooLong = charLength(currentLine) + charLength(token) > maxWidth;
      if (tooLong && currentLine) {
        paragraphLines.push(currentLine);
        currentLine = '';
      }

      let rest = token;
      while (charLength(rest) > maxWidth) {
        const chars = Array.from(rest);
        paragraphLines.push(chars.slice(0, maxWidth).join(''));
        rest = chars.slice(maxWidth).join('');
      }
      currentLine += rest;
    }

    if (currentLine) {
      paragraphLines.push(currentLine);
    }
    lines.push(...(paragraphLines.length > 0 ? paragraphLines : ['']));
  }

  return lines;
}

/**
 * Unwrapped extent of a text block: longest line and line count.
 * Used to auto-fit borderless text nodes.
 */
export function measureTextBlock(text: string): { width: number; height: number } {
  const lines = text.split('\n');
  return {
    width: Math.max(0, ...lines.map(charLength)),
    height: lines.length,
  };
}
