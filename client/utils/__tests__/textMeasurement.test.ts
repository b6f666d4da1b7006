/**
 * Word wrapping and text measurement
 *
 * wrapText runs on every keystroke and every frame, so it has to be pure and its line
 * shape has to be exact: the renderer and the insert caret both lay text out from it.
 */

import { describe, test, expect } from '@jest/globals';
import { charLength, dropLastChar, measureTextBlock, wrapText } from '../textMeasurement';

describe('wrapText', () => {
  test('packs words greedily, keeping the trailing space on the line', () => {
    expect(wrapText('ab cd ef', 6)).toEqual(['ab cd ', 'ef']);
  });

  test('hard-splits words longer than the width', () => {
    expect(wrapText('abcdefgh', 3)).toEqual(['abc', 'def', 'gh']);
  });

  test('an overlong word flushes the line before it', () => {
    expect(wrapText('ab abcdefg', 4)).toEqual(['ab ', 'abcd', 'efg']);
  });

  test('keeps blank paragraphs as blank lines', () => {
    expect(wrapText('a\n\nb', 5)).toEqual(['a', '', 'b']);
  });

  test('empty text is one empty line', () => {
    expect(wrapText('', 4)).toEqual(['']);
  });

  test('zero width yields no lines', () => {
    expect(wrapText('anything', 0)).toEqual([]);
  });

  test('no line is wider than the width', () => {
    const samples = ['the quick brown fox', 'a  b   c', 'x'.repeat(23), 'one\ntwo three four\n\nfive'];
    for (const text of samples) {
      for (const width of [1, 2, 3, 5, 8]) {
        for (const line of wrapText(text, width)) {
          expect(charLength(line)).toBeLessThanOrEqual(width);
        }
      }
    }
  });

  test('paragraph count is preserved', () => {
    const text = 'first paragraph here\nsecond\n\nfourth one';
    const lines = wrapText(text, 100);
    expect(lines).toHaveLength(4);
  });

  test('same input, same output', () => {
    expect(wrapText('repeat me please', 7)).toEqual(wrapText('repeat me please', 7));
  });
});

describe('measureTextBlock', () => {
  test('longest line and line count', () => {
    expect(measureTextBlock('ab\ncde')).toEqual({ width: 3, height: 2 });
  });

  test('empty text is one empty line', () => {
    expect(measureTextBlock('')).toEqual({ width: 0, height: 1 });
  });
});

describe('code point helpers', () => {
  test('charLength counts code points', () => {
    expect(charLength('a😀b')).toBe(3);
  });

  test('dropLastChar removes one code point', () => {
    expect(dropLastChar('a😀')).toBe('a');
    expect(dropLastChar('')).toBe('');
  });
});
