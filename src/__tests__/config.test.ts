import { afterEach, describe, expect, test, vi } from 'vitest';
import { loadConfig } from '../config.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('loadConfig', () => {
  test('defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual({
      bodyFontPath: null,
      boldFontPath: null,
      emojiFontPath: null,
      emojiNativeSize: null,
      outputDir: 'images',
      githubToken: null,
    });
  });

  test('reads and trims every variable', () => {
    expect(
      loadConfig({
        CARD_BODY_FONT: ' /fonts/body.ttf ',
        CARD_BOLD_FONT: '/fonts/bold.ttf',
        CARD_EMOJI_FONT: '/fonts/emoji.ttf',
        CARD_EMOJI_NATIVE_SIZE: '109',
        CARD_OUTPUT_DIR: 'out/cards',
        GITHUB_TOKEN: 'test-secret',
      }),
    ).toEqual({
      bodyFontPath: '/fonts/body.ttf',
      boldFontPath: '/fonts/bold.ttf',
      emojiFontPath: '/fonts/emoji.ttf',
      emojiNativeSize: 109,
      outputDir: 'out/cards',
      githubToken: 'test-secret',
    });
  });

  test('blank values count as unset', () => {
    const config = loadConfig({ CARD_OUTPUT_DIR: '   ', GITHUB_TOKEN: '' });
    expect(config.outputDir).toBe('images');
    expect(config.githubToken).toBeNull();
  });

  test('ignores a native size that is not a positive integer', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(loadConfig({ CARD_EMOJI_NATIVE_SIZE: 'big' }).emojiNativeSize).toBeNull();
    expect(loadConfig({ CARD_EMOJI_NATIVE_SIZE: '-4' }).emojiNativeSize).toBeNull();
    expect(loadConfig({ CARD_EMOJI_NATIVE_SIZE: '12.5' }).emojiNativeSize).toBeNull();
    expect(warn).toHaveBeenCalledTimes(3);
    expect(warn).toHaveBeenCalledWith('  [config] ignoring CARD_EMOJI_NATIVE_SIZE=big: expected a positive integer');
  });
});
