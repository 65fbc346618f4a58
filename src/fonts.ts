import fs from 'node:fs';
import path from 'node:path';
import { GlobalFonts } from '@napi-rs/canvas';
import { FontUnavailableError } from './errors.js';
import type { CardConfig, CardFonts, FontCandidate, FontHandle, FontWeight } from './types.js';

/** Body font candidates (CJK-capable), macOS, then Windows, then Linux */
export const BODY_FONT_CANDIDATES: FontCandidate[] = [
  { path: '/System/Library/Fonts/PingFang.ttc' },
  { path: '/System/Library/Fonts/STHeiti Medium.ttc' },
  { path: '/System/Library/Fonts/Hiragino Sans GB.ttc' },
  { path: 'C:/Windows/Fonts/msyh.ttc' },
  { path: 'C:/Windows/Fonts/simhei.ttf' },
  { path: 'C:/Windows/Fonts/simsun.ttc' },
  { path: '/usr/share/fonts/truetype/droid/DroidSansFallbackFull.ttf' },
  { path: '/usr/share/fonts/truetype/wqy/wqy-microhei.ttc' },
  { path: '/usr/share/fonts/opentype/noto/NotoSansCJK-Regular.ttc' },
  { path: '/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf' },
];

/** Bold faces where the platform ships them as separate files */
export const BOLD_FONT_CANDIDATES: FontCandidate[] = [
  { path: 'C:/Windows/Fonts/msyhbd.ttc' },
  { path: '/usr/share/fonts/opentype/noto/NotoSansCJK-Bold.ttc' },
  { path: '/usr/share/fonts/truetype/dejavu/DejaVuSans-Bold.ttf' },
];

/** Pictographic font candidates. NotoColorEmoji is bitmap-only at 109px. */
export const EMOJI_FONT_CANDIDATES: FontCandidate[] = [
  { path: '/System/Library/Fonts/Apple Color Emoji.ttc' },
  { path: 'C:/Windows/Fonts/seguiemj.ttf' },
  { path: 'C:/Windows/Fonts/segoeui.ttf' },
  { path: '/usr/share/fonts/truetype/noto/NotoColorEmoji.ttf', nativeSize: 109 },
  { path: '/usr/share/fonts/noto/NotoColorEmoji.ttf', nativeSize: 109 },
  { path: '/usr/share/fonts/truetype/color-emoji/NotoColorEmoji.ttf', nativeSize: 109 },
  { path: '/usr/share/fonts/truetype/ancient-scripts/Symbola_hint.ttf' },
  { path: '/usr/share/fonts/truetype/dejavu/DejaVuSans.ttf' },
];

/**
 * Family alias a font file is registered under.
 * "NotoSansCJK-Regular.ttc" -> "NotoSansCJK-Regular"
 */
export function familyFromPath(fontPath: string): string {
  return path.basename(fontPath).replace(/\.(ttf|otf|ttc)$/i, '');
}

/**
 * Return a handle for the first candidate that exists and registers with
 * the canvas backend, or null if none does.
 */
export function resolveFont(
  candidates: FontCandidate[],
  size: number,
  weight: FontWeight = 'normal',
): FontHandle | null {
  for (const candidate of candidates) {
    if (!fs.existsSync(candidate.path)) continue;

    const family = familyFromPath(candidate.path);
    let registered: unknown;
    try {
      registered = GlobalFonts.registerFromPath(candidate.path, family);
    } catch (err) {
      console.warn(`  [font] FAILED to register ${family}: ${err}`);
      continue;
    }
    if (!registered) {
      console.warn(`  [font] FAILED to register ${family} (${candidate.path})`);
      continue;
    }

    console.log(`  [font] registered: ${family} (${candidate.path})`);
    return {
      family,
      path: candidate.path,
      size,
      weight,
      nativeSize: candidate.nativeSize ?? null,
    };
  }
  return null;
}

function withOverride(override: string | null, candidates: FontCandidate[], nativeSize?: number): FontCandidate[] {
  if (!override) return candidates;
  return [nativeSize ? { path: override, nativeSize } : { path: override }, ...candidates];
}

/**
 * Resolve the fonts a card needs. Throws FontUnavailableError when no body
 * font exists; a missing bold face falls back to the body family, and a
 * missing pictographic font is returned as null.
 */
export function loadCardFonts(config: Pick<CardConfig, 'bodyFontPath' | 'boldFontPath' | 'emojiFontPath' | 'emojiNativeSize'>): CardFonts {
  const bodyCandidates = withOverride(config.bodyFontPath, BODY_FONT_CANDIDATES);
  const body = resolveFont(bodyCandidates, 24, 'normal');
  if (!body) {
    throw new FontUnavailableError(bodyCandidates.map(c => c.path));
  }

  const bold = resolveFont(withOverride(config.boldFontPath, BOLD_FONT_CANDIDATES), 24, 'bold')
    ?? { ...body, weight: 'bold' as const };

  const pictographic = resolveFont(
    withOverride(config.emojiFontPath, EMOJI_FONT_CANDIDATES, config.emojiNativeSize ?? undefined),
    24,
  );
  if (!pictographic) {
    console.warn('  [font] no emoji font found, pictographic runs will be left blank');
  }

  return { body, bold, pictographic };
}
