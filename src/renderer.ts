import { createCanvas } from '@napi-rs/canvas';
import type { SKRSContext2D } from '@napi-rs/canvas';
import sharp from 'sharp';
import { isUsableBitmap } from './avatar.js';
import { FontUnavailableError } from './errors.js';
import { drawIcon } from './icons.js';
import { AVATAR_PLACEHOLDER, CARD_HEIGHT, CARD_WIDTH, layoutCard } from './layout.js';
import type { CardLayout, Rect, TextPiece } from './layout.js';
import {
  advanceOf,
  createTextMeasurer,
  pictographicScale,
  pictographicSpec,
} from './metrics.js';
import type { TextBackend, TextMeasurer } from './metrics.js';
import { segment } from './segment.js';
import type { AvatarBitmap, CardFonts, CardModel, FontHandle, FontSpec, RenderedCard } from './types.js';

/** Emoji sit slightly below the text origin to share its baseline. */
const EMOJI_DROP_RATIO = 0.05;
/** Padding around the offscreen emoji buffer so glyph overhang is not clipped */
const EMOJI_PAD = 10;

export function fontString(font: FontSpec): string {
  return `${font.weight} ${font.size}px "${font.family}"`;
}

/** TextBackend measuring with the canvas's own font engine. */
export function createCanvasBackend(ctx: SKRSContext2D): TextBackend {
  return {
    measureText(text: string, font: FontSpec) {
      ctx.font = fontString(font);
      const m = ctx.measureText(text);
      return { width: m.width, height: m.actualBoundingBoxAscent + m.actualBoundingBoxDescent };
    },
  };
}

/**
 * Draw a pictographic run into its own buffer at the emoji font's native
 * size, then scale it onto the card with its top-left at (x, y).
 */
function drawPictographicRun(
  ctx: SKRSContext2D,
  text: string,
  x: number,
  y: number,
  measurer: TextMeasurer,
  pictographic: FontHandle,
  color: string,
): void {
  const spec = pictographicSpec(measurer.fonts.body, pictographic);
  const nativeWidth = measurer.backend.measureText(text, spec).width;
  if (nativeWidth <= 0) return;

  const buffer = createCanvas(
    Math.ceil(nativeWidth) + EMOJI_PAD * 2,
    Math.ceil(spec.size * 1.25) + EMOJI_PAD * 2,
  );
  const bctx = buffer.getContext('2d');
  bctx.font = fontString(spec);
  bctx.textBaseline = 'top';
  bctx.fillStyle = color;
  bctx.fillText(text, EMOJI_PAD, EMOJI_PAD);

  const scale = pictographicScale(measurer.fonts.body, pictographic);
  ctx.drawImage(
    buffer,
    x - EMOJI_PAD * scale,
    y - EMOJI_PAD * scale,
    buffer.width * scale,
    buffer.height * scale,
  );
}

/**
 * Draw mixed text run by run, moving the cursor by each run's advance.
 * Returns the final cursor x.
 */
export function drawMixedText(
  ctx: SKRSContext2D,
  measurer: TextMeasurer,
  text: string,
  x: number,
  y: number,
  color: string,
): number {
  const { fonts, backend } = measurer;
  const emojiDrop = Math.trunc(fonts.body.size * EMOJI_DROP_RATIO);
  let cursor = x;

  for (const run of segment(text)) {
    if (run.class === 'normal') {
      ctx.font = fontString(fonts.body);
      ctx.textBaseline = 'top';
      ctx.fillStyle = color;
      ctx.fillText(run.text, cursor, y);
    } else if (fonts.pictographic) {
      drawPictographicRun(ctx, run.text, cursor, y + emojiDrop, measurer, fonts.pictographic, color);
    }
    cursor += advanceOf(run, fonts, backend);
  }
  return cursor;
}

export function paintText(ctx: SKRSContext2D, backend: TextBackend, piece: TextPiece): void {
  const measurer = createTextMeasurer(backend, piece.fonts);
  for (const [dx, dy] of piece.offsets) {
    drawMixedText(ctx, measurer, piece.text, piece.x + dx, piece.y + dy, piece.color);
  }
}

/** Avatar clipped to a circle inscribed in `rect`. */
function paintAvatar(ctx: SKRSContext2D, bitmap: AvatarBitmap, rect: Rect): void {
  const source = createCanvas(bitmap.width, bitmap.height);
  const sctx = source.getContext('2d');
  const image = sctx.createImageData(bitmap.width, bitmap.height);
  image.data.set(bitmap.data);
  sctx.putImageData(image, 0, 0);

  ctx.save();
  ctx.beginPath();
  ctx.arc(rect.x + rect.width / 2, rect.y + rect.height / 2, rect.width / 2, 0, Math.PI * 2);
  ctx.clip();
  ctx.drawImage(source, rect.x, rect.y, rect.width, rect.height);
  ctx.restore();
}

function paintPlaceholder(ctx: SKRSContext2D, rect: Rect): void {
  ctx.fillStyle = AVATAR_PLACEHOLDER;
  ctx.beginPath();
  ctx.ellipse(
    rect.x + rect.width / 2,
    rect.y + rect.height / 2,
    rect.width / 2,
    rect.height / 2,
    0,
    0,
    Math.PI * 2,
  );
  ctx.fill();
}

export function paintCard(
  ctx: SKRSContext2D,
  layout: CardLayout,
  avatar: AvatarBitmap | null,
  backend: TextBackend,
): void {
  ctx.fillStyle = layout.background;
  ctx.fillRect(0, 0, layout.width, layout.height);

  if (avatar && isUsableBitmap(avatar)) {
    paintAvatar(ctx, avatar, layout.avatar);
  } else {
    if (avatar) {
      console.warn(`  [avatar] unusable bitmap ${avatar.width}x${avatar.height}, drawing placeholder`);
    }
    paintPlaceholder(ctx, layout.avatar);
  }

  for (const piece of layout.title) paintText(ctx, backend, piece);

  for (const piece of layout.description?.lines ?? []) paintText(ctx, backend, piece);

  for (const stat of layout.stats) {
    drawIcon(ctx, stat.iconKind, stat.iconX, stat.iconY, stat.iconSize, stat.iconColor);
    paintText(ctx, backend, stat.number);
    paintText(ctx, backend, stat.label);
  }

  for (const segmentRect of layout.colorBar) {
    ctx.fillStyle = segmentRect.color;
    ctx.fillRect(segmentRect.x, segmentRect.y, segmentRect.width, segmentRect.height);
  }
}

/** "#f6f8fa" -> [246, 248, 250] */
export function parseHexColor(hex: string): [number, number, number] {
  const m = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
  if (!m) throw new Error(`invalid hex colour: ${hex}`);
  return [parseInt(m[1] ?? '0', 16), parseInt(m[2] ?? '0', 16), parseInt(m[3] ?? '0', 16)];
}

/**
 * Composite straight-alpha RGBA over an opaque background and drop the
 * alpha channel.
 */
export function flattenToRgb(rgba: Uint8Array | Uint8ClampedArray, background: string): Buffer {
  const [br, bg, bb] = parseHexColor(background);
  const pixelCount = Math.floor(rgba.length / 4);
  const out = Buffer.allocUnsafe(pixelCount * 3);
  for (let i = 0; i < pixelCount; i++) {
    const src = i * 4;
    const dst = i * 3;
    const a = rgba[src + 3]!;
    const inv = 255 - a;
    out[dst] = Math.round((rgba[src]! * a + br * inv) / 255);
    out[dst + 1] = Math.round((rgba[src + 1]! * a + bg * inv) / 255);
    out[dst + 2] = Math.round((rgba[src + 2]! * a + bb * inv) / 255);
  }
  return out;
}

/**
 * Render one card. Synchronous: measures, wraps and paints on a fresh
 * canvas, then flattens to RGB.
 * Throws FontUnavailableError when `body` is null.
 */
export function renderCard(
  model: CardModel,
  body: FontHandle | null,
  pictographic: FontHandle | null,
  bold: FontHandle | null = null,
): RenderedCard {
  if (!body) throw new FontUnavailableError();
  const fonts: CardFonts = {
    body,
    bold: bold ?? { ...body, weight: 'bold' },
    pictographic,
  };

  const canvas = createCanvas(CARD_WIDTH, CARD_HEIGHT);
  const ctx = canvas.getContext('2d');
  const backend = createCanvasBackend(ctx);
  const layout = layoutCard(model, fonts, backend);
  paintCard(ctx, layout, model.avatarBitmap, backend);

  const { data } = ctx.getImageData(0, 0, layout.width, layout.height);
  return {
    width: layout.width,
    height: layout.height,
    channels: 3,
    pixels: flattenToRgb(data, layout.background),
  };
}

/** Encode a rendered card as a lossless PNG. */
export async function encodePng(card: RenderedCard): Promise<Buffer> {
  return sharp(card.pixels, {
    raw: { width: card.width, height: card.height, channels: card.channels },
  })
    .png()
    .toBuffer();
}
