import { segment } from './segment.js';
import type { FontHandle, FontPair, FontSpec, Run, TextExtent } from './types.js';

/** Emoji are drawn 20% larger than the body text they sit in. */
const PICTOGRAPHIC_SIZE_RATIO = 1.2;
/** Trailing gap removed after each pictographic run, as a fraction of body size. */
const COMPACTION_RATIO = 0.3;

/**
 * Measures text for one font. The canvas implementation lives in
 * renderer.ts; tests supply a fixed-advance stand-in.
 */
export interface TextBackend {
  measureText(text: string, font: FontSpec): TextExtent;
}

export function pictographicTargetSize(body: FontSpec): number {
  return Math.round(body.size * PICTOGRAPHIC_SIZE_RATIO);
}

/**
 * Size the pictographic font is actually rasterized at. Bitmap-only fonts
 * have one fixed size; scalable ones are set at the body size.
 */
export function pictographicNativeSize(body: FontSpec, pictographic: FontHandle): number {
  return pictographic.nativeSize ?? body.size;
}

/** targetSize / nativeSize */
export function pictographicScale(body: FontSpec, pictographic: FontHandle): number {
  const native = pictographicNativeSize(body, pictographic);
  return native > 0 ? pictographicTargetSize(body) / native : 1;
}

export function compaction(body: FontSpec): number {
  return Math.round(body.size * COMPACTION_RATIO);
}

/** Font spec the pictographic font is measured and drawn with. */
export function pictographicSpec(body: FontSpec, pictographic: FontHandle): FontSpec {
  return {
    family: pictographic.family,
    size: pictographicNativeSize(body, pictographic),
    weight: 'normal',
  };
}

/**
 * Measured width of one run. Pictographic runs are measured at the
 * emoji font's native size and scaled to the target size; with no
 * pictographic font they take no space.
 */
export function widthOf(run: Run, fonts: FontPair, backend: TextBackend): number {
  if (run.class === 'normal') {
    return backend.measureText(run.text, fonts.body).width;
  }
  if (!fonts.pictographic) return 0;
  const native = pictographicNativeSize(fonts.body, fonts.pictographic);
  const measured = backend.measureText(run.text, pictographicSpec(fonts.body, fonts.pictographic)).width;
  return native > 0 ? (measured * pictographicTargetSize(fonts.body)) / native : measured;
}

/** Cursor movement for one run: the measured width less the compaction for pictographic runs. */
export function advanceOf(run: Run, fonts: FontPair, backend: TextBackend): number {
  const width = widthOf(run, fonts, backend);
  if (run.class === 'normal' || !fonts.pictographic) return width;
  return width - compaction(fonts.body);
}

export interface TextMeasurer {
  readonly fonts: FontPair;
  readonly backend: TextBackend;
  /** Width used for every fit test. */
  measure(text: string): number;
  /** Width the cursor moves when the text is drawn. */
  advance(text: string): number;
  /** Ink extent of body-font text (no run splitting). */
  extent(text: string): TextExtent;
}

/**
 * Bind a backend to a font pair. Every call re-segments and re-measures
 * its argument; nothing is cached between calls.
 */
export function createTextMeasurer(backend: TextBackend, fonts: FontPair): TextMeasurer {
  return {
    fonts,
    backend,
    measure(text: string): number {
      let total = 0;
      for (const run of segment(text)) total += widthOf(run, fonts, backend);
      return total;
    },
    advance(text: string): number {
      let total = 0;
      for (const run of segment(text)) total += advanceOf(run, fonts, backend);
      return total;
    },
    extent(text: string): TextExtent {
      return backend.measureText(text, fonts.body);
    },
  };
}

/** Same fonts at a different size/weight (pictographic font unchanged). */
export function withBodyStyle(fonts: FontPair, size: number, weight: FontSpec['weight']): FontPair {
  return { body: { ...fonts.body, size, weight }, pictographic: fonts.pictographic };
}
