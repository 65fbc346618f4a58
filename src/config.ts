import type { CardConfig } from './types.js';

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function positiveInt(name: string, value: string | undefined): number | null {
  const raw = nonEmpty(value);
  if (raw === null) return null;
  const n = Number(raw);
  if (!Number.isInteger(n) || n <= 0) {
    console.warn(`  [config] ignoring ${name}=${raw}: expected a positive integer`);
    return null;
  }
  return n;
}

/**
 * Read card settings from an environment record (process.env after
 * dotenv has run). Unset or blank values fall back to defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CardConfig {
  return {
    bodyFontPath: nonEmpty(env.CARD_BODY_FONT),
    boldFontPath: nonEmpty(env.CARD_BOLD_FONT),
    emojiFontPath: nonEmpty(env.CARD_EMOJI_FONT),
    emojiNativeSize: positiveInt('CARD_EMOJI_NATIVE_SIZE', env.CARD_EMOJI_NATIVE_SIZE),
    outputDir: nonEmpty(env.CARD_OUTPUT_DIR) ?? 'images',
    githubToken: nonEmpty(env.GITHUB_TOKEN),
  };
}
