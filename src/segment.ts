import { classify } from './classify.js';
import type { CodepointClass, Run } from './types.js';

/**
 * Split text into alternating normal/pictographic runs, left to right.
 * Iterates by code point so surrogate pairs are never split.
 */
export function* segment(text: string): Generator<Run, void, undefined> {
  let current: CodepointClass | null = null;
  let buf = '';

  for (const char of text) {
    const cls = classify(char);
    if (cls !== current && buf) {
      yield { class: current ?? cls, text: buf };
      buf = '';
    }
    current = cls;
    buf += char;
  }

  if (buf && current) {
    yield { class: current, text: buf };
  }
}

/** Split a string into code points. */
export function toChars(text: string): string[] {
  return Array.from(text);
}
