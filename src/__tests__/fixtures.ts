/**
 * Deterministic text backend for layout tests.
 * Body fonts: CJK ideographs and full-width punctuation are `size` wide,
 * everything else `size / 2`. The emoji family: `size` per code point,
 * variation selectors 0. Ink height is always 0.75 x size.
 */

import { isCjkIdeograph, isCjkPunctuation } from '../classify.js';
import { createTextMeasurer } from '../metrics.js';
import type { TextBackend, TextMeasurer } from '../metrics.js';
import type { CardFonts, FontHandle, FontPair, FontSpec } from '../types.js';

export const EMOJI_FAMILY = 'Test Emoji';

export const fixedBackend: TextBackend = {
  measureText(text: string, font: FontSpec) {
    let width = 0;
    for (const char of text) {
      const cp = char.codePointAt(0) ?? 0;
      if (font.family === EMOJI_FAMILY) {
        width += cp >= 0xfe00 && cp <= 0xfe0f ? 0 : font.size;
      } else {
        width += isCjkIdeograph(char) || isCjkPunctuation(char) ? font.size : font.size / 2;
      }
    }
    return { width, height: font.size * 0.75 };
  },
};

export const body: FontHandle = {
  family: 'Test Sans',
  path: '/fonts/test-sans.ttf',
  size: 24,
  weight: 'normal',
  nativeSize: null,
};

export const bold: FontHandle = {
  ...body,
  family: 'Test Sans Bold',
  path: '/fonts/test-sans-bold.ttf',
  weight: 'bold',
};

/** Bitmap-only emoji font, like NotoColorEmoji */
export const bitmapEmoji: FontHandle = {
  family: EMOJI_FAMILY,
  path: '/fonts/test-emoji.ttf',
  size: 24,
  weight: 'normal',
  nativeSize: 109,
};

export const scalableEmoji: FontHandle = { ...bitmapEmoji, nativeSize: null };

export const cardFonts: CardFonts = { body, bold, pictographic: bitmapEmoji };

export function measurerFor(pictographic: FontHandle | null = bitmapEmoji, size = 24): TextMeasurer {
  const fonts: FontPair = { body: { ...body, size }, pictographic };
  return createTextMeasurer(fixedBackend, fonts);
}
