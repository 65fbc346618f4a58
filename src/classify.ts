import type { CodepointClass } from './types.js';

/**
 * Inclusive codepoint ranges drawn with the pictographic (emoji) font.
 * Variation selectors are included so `U+FE0F` stays in the run of the
 * emoji it modifies.
 */
const PICTOGRAPHIC_RANGES: ReadonlyArray<readonly [number, number]> = [
  [0x1f600, 0x1f64f], // Emoticons
  [0x1f300, 0x1f5ff], // Misc Symbols and Pictographs
  [0x1f680, 0x1f6ff], // Transport and Map
  [0x1f700, 0x1f77f], // Alchemical Symbols
  [0x1f780, 0x1f7ff], // Geometric Shapes Extended
  [0x1f800, 0x1f8ff], // Supplemental Arrows-C
  [0x1f900, 0x1f9ff], // Supplemental Symbols and Pictographs
  [0x1fa00, 0x1fa6f], // Chess Symbols (Extended-A)
  [0x1fa70, 0x1faff], // Symbols and Pictographs Extended-A
  [0x2600, 0x26ff], // Misc Symbols
  [0x2700, 0x27bf], // Dingbats
  [0xfe00, 0xfe0f], // Variation Selectors
  [0x1f1e6, 0x1f1ff], // Regional Indicators
  // Emoji-presentation members of Misc Symbols and Arrows (⬅⬆⬇ ⬛⬜ ⭐ ⭕)
  [0x2b05, 0x2b07],
  [0x2b1b, 0x2b1c],
  [0x2b50, 0x2b50],
  [0x2b55, 0x2b55],
];

/** Full-width punctuation a line may end after */
export const CJK_PUNCTUATION = '，。！？；：、';

export function isPictographic(codePoint: number): boolean {
  for (const [lo, hi] of PICTOGRAPHIC_RANGES) {
    if (codePoint >= lo && codePoint <= hi) return true;
  }
  return false;
}

/** Classify one character (a single code point; extra code units are ignored). */
export function classify(char: string): CodepointClass {
  const cp = char.codePointAt(0);
  if (cp === undefined) return 'normal';
  return isPictographic(cp) ? 'pictographic' : 'normal';
}

/** CJK Unified Ideographs U+4E00..U+9FA5 */
export function isCjkIdeograph(char: string): boolean {
  return char >= '一' && char <= '龥';
}

export function isCjkPunctuation(char: string): boolean {
  return char.length === 1 && CJK_PUNCTUATION.includes(char);
}
