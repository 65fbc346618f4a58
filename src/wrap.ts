import { isCjkIdeograph, isCjkPunctuation } from './classify.js';
import { InvalidLayoutError } from './errors.js';
import type { TextMeasurer } from './metrics.js';
import { toChars } from './segment.js';
import type { LayoutBox } from './types.js';

export const ELLIPSIS = '...';

/** Lines emitted so far plus the text still to place. */
export interface WrapState {
  remaining: string;
  lines: string[];
}

/**
 * Index (in code points) at which `line` should end when the next
 * character does not fit. Priority: a space in the second half of the
 * line, then after the last CJK punctuation mark, then after the last CJK
 * ideograph, else the whole line (hard cut).
 */
export function findBreakPoint(line: string): number {
  const chars = toChars(line);
  const lastSpace = chars.lastIndexOf(' ');
  if (lastSpace > chars.length * 0.5) return lastSpace;

  for (let i = chars.length - 1; i >= 0; i--) {
    if (isCjkPunctuation(chars[i] ?? '')) return i + 1;
  }
  for (let i = chars.length - 1; i >= 0; i--) {
    if (isCjkIdeograph(chars[i] ?? '')) return i + 1;
  }
  return chars.length;
}

/**
 * Drop characters from the end of `chars` until `chars + "..."` fits.
 * Returns the bare ellipsis when nothing does.
 */
function shrinkWithEllipsis(chars: string[], maxWidth: number, measurer: TextMeasurer): string {
  for (let end = chars.length; end > 0; end--) {
    const candidate = chars.slice(0, end).join('') + ELLIPSIS;
    if (measurer.measure(candidate) <= maxWidth) return candidate;
  }
  return ELLIPSIS;
}

export function truncateWithEllipsis(text: string, maxWidth: number, measurer: TextMeasurer): string {
  if (measurer.measure(text) <= maxWidth) return text;
  return shrinkWithEllipsis(toChars(text), maxWidth, measurer);
}

function assertValidBox(box: Pick<LayoutBox, 'maxWidth' | 'maxLines'>): void {
  if (!Number.isFinite(box.maxWidth) || box.maxWidth <= 0) {
    throw new InvalidLayoutError(`maxWidth must be a positive number, got ${box.maxWidth}`);
  }
  if (!Number.isInteger(box.maxLines) || box.maxLines < 0) {
    throw new InvalidLayoutError(`maxLines must be a non-negative integer, got ${box.maxLines}`);
  }
}

/**
 * One wrapping step: place the next line from `state.remaining`.
 * The caller stops when `remaining` is empty or `maxLines` is reached.
 */
export function nextLine(
  state: WrapState,
  box: Pick<LayoutBox, 'maxWidth' | 'maxLines'>,
  measurer: TextMeasurer,
): WrapState {
  const chars = toChars(state.remaining);
  const isLastLine = state.lines.length === box.maxLines - 1;

  let line = '';
  let consumed = 0;

  for (const [i, char] of chars.entries()) {
    const candidate = line + char;
    // Last line with more text after this char: leave room for "..."
    const reserveEllipsis = isLastLine && i < chars.length - 1;
    const width = measurer.measure(reserveEllipsis ? candidate + ELLIPSIS : candidate);

    if (width <= box.maxWidth) {
      line = candidate;
      consumed = i + 1;
      continue;
    }

    if (line) {
      const breakAt = findBreakPoint(line);
      if (breakAt > 0) {
        line = toChars(line).slice(0, breakAt).join('');
        consumed = breakAt;
      }
    }
    break;
  }

  // Nothing fits: emit the first character on its own so wrapping always advances
  if (consumed === 0 && chars.length > 0) {
    line = chars[0] ?? '';
    consumed = 1;
  }

  if (isLastLine && consumed < chars.length) {
    line = shrinkWithEllipsis(toChars(line), box.maxWidth, measurer);
  }

  return {
    remaining: chars.slice(consumed).join('').replace(/^\s+/, ''),
    lines: [...state.lines, line],
  };
}

/**
 * Greedy wrap into at most `box.maxLines` lines. Only the last line can
 * end in an ellipsis, and only when text was left over.
 */
export function wrap(text: string, box: LayoutBox, measurer: TextMeasurer): string[] {
  assertValidBox(box);
  if (!text || box.maxLines === 0) return [];

  let state: WrapState = { remaining: text, lines: [] };
  while (state.remaining && state.lines.length < box.maxLines) {
    state = nextLine(state, box, measurer);
  }
  return state.lines;
}
