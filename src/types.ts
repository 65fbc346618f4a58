/** Codepoint class used to pick the font a character is set in */
export type CodepointClass = 'normal' | 'pictographic';

/** A maximal substring of one codepoint class */
export interface Run {
  class: CodepointClass;
  text: string;
}

export type FontWeight = 'normal' | 'bold';

/** What a text backend needs to set a string: family, pixel size and weight */
export interface FontSpec {
  family: string;
  size: number;
  weight: FontWeight;
}

/**
 * A font registered with the canvas backend.
 * `nativeSize` is set for bitmap-only fonts that rasterize at one size
 * (NotoColorEmoji: 109). Null means the font scales to any requested size.
 */
export interface FontHandle extends FontSpec {
  path: string;
  nativeSize: number | null;
}

/** Body font plus optional pictographic font for one text style */
export interface FontPair {
  body: FontHandle;
  pictographic: FontHandle | null;
}

/** Fonts one card is drawn with */
export interface CardFonts {
  body: FontHandle;
  /** Bold face; the body family at weight bold when no separate file exists */
  bold: FontHandle;
  pictographic: FontHandle | null;
}

/** Ink extent reported by a text backend */
export interface TextExtent {
  /** Advance width in px */
  width: number;
  /** Ink height (ascent + descent of the actual glyphs) in px */
  height: number;
}

/** One rectangular text region handed to the line breaker */
export interface LayoutBox {
  originX: number;
  originY: number;
  maxWidth: number;
  maxLines: number;
}

export type IconKind = 'contributors' | 'issues' | 'fork' | 'star';

export interface StatEntry {
  value: number;
  label: string;
  iconKind: IconKind;
}

/** Decoded RGBA avatar pixels (4 bytes per pixel, row-major) */
export interface AvatarBitmap {
  width: number;
  height: number;
  data: Uint8Array;
}

/** Full render input. Stats are drawn in the order given. */
export interface CardModel {
  ownerName: string;
  repoName: string;
  description: string | null;
  avatarBitmap: AvatarBitmap | null;
  stats: StatEntry[];
}

/** Flattened card: opaque RGB, 3 bytes per pixel */
export interface RenderedCard {
  width: number;
  height: number;
  channels: 3;
  pixels: Buffer;
}

/** A font file candidate, probed in order */
export interface FontCandidate {
  path: string;
  /** Fixed rasterization size for bitmap-only fonts */
  nativeSize?: number;
}

/** Runtime configuration read from the environment */
export interface CardConfig {
  bodyFontPath: string | null;
  boldFontPath: string | null;
  emojiFontPath: string | null;
  emojiNativeSize: number | null;
  outputDir: string;
  githubToken: string | null;
}
