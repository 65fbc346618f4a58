import { describe, expect, test } from 'vitest';
import { InvalidLayoutError } from '../errors.js';
import { findBreakPoint, nextLine, truncateWithEllipsis, wrap } from '../wrap.js';
import type { LayoutBox } from '../types.js';
import { measurerFor } from './fixtures.js';

// Latin 12px, CJK 24px, ⭐ 29px, "..." 36px
const m = measurerFor();

function box(maxWidth: number, maxLines: number): LayoutBox {
  return { originX: 0, originY: 0, maxWidth, maxLines };
}

describe('findBreakPoint', () => {
  test('prefers a space in the second half', () => {
    expect(findBreakPoint('hello world foo')).toBe(11);
  });

  test('ignores a space in the first half', () => {
    expect(findBreakPoint('ab cdefghij')).toBe(11);
  });

  test('breaks after CJK punctuation', () => {
    expect(findBreakPoint('你好，世界abc')).toBe(3);
  });

  test('breaks after the last CJK ideograph', () => {
    expect(findBreakPoint('中文abc')).toBe(2);
  });

  test('falls back to a hard cut', () => {
    expect(findBreakPoint('abc')).toBe(3);
  });
});

describe('wrap', () => {
  test('empty text gives no lines', () => {
    expect(wrap('', box(100, 3), m)).toEqual([]);
  });

  test('maxLines 0 gives no lines', () => {
    expect(wrap('abc', box(100, 0), m)).toEqual([]);
  });

  test('rejects unusable boxes', () => {
    expect(() => wrap('abc', box(0, 3), m)).toThrow(InvalidLayoutError);
    expect(() => wrap('abc', box(Number.NaN, 3), m)).toThrow(InvalidLayoutError);
    expect(() => wrap('abc', box(100, -1), m)).toThrow(InvalidLayoutError);
    expect(() => wrap('abc', box(100, 1.5), m)).toThrow(InvalidLayoutError);
  });

  test('reports InvalidLayout as its kind', () => {
    let caught: unknown = null;
    try {
      wrap('abc', box(-5, 1), m);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidLayoutError);
    expect(caught).toMatchObject({ name: 'InvalidLayoutError', kind: 'InvalidLayout' });
  });

  test('breaks at the last space and strips the next line', () => {
    expect(wrap('aaaa bbbb cccc', box(120, 3), m)).toEqual(['aaaa bbbb', 'cccc']);
  });

  test('last line gets an ellipsis when text is left over', () => {
    expect(wrap('aaaa bbbb cccc dddd', box(120, 2), m)).toEqual(['aaaa bbbb', 'cccc...']);
  });

  test('last line that fits keeps no ellipsis', () => {
    expect(wrap('abcdefgh', box(120, 1), m)).toEqual(['abcdefgh']);
  });

  test('CJK text breaks between ideographs', () => {
    expect(wrap('小部件生成器工具', box(100, 2), m)).toEqual(['小部件生', '成器...']);
  });

  test('space in the first half is not used as a break', () => {
    expect(wrap('ab cdefghijkl', box(120, 2), m)).toEqual(['ab cdefghi', 'jkl']);
  });

  test('leading whitespace of the next line is dropped', () => {
    expect(wrap('aaaaaaaaaa   bbb', box(120, 2), m)).toEqual(['aaaaaaaaaa', 'bbb']);
  });

  test('fit is tested with the scaled emoji width', () => {
    expect(wrap('ab⭐cd', box(60, 2), m)).toEqual(['ab⭐', 'cd']);
  });

  test('long CJK run on a single line is cut with an ellipsis', () => {
    const lines = wrap('测'.repeat(40), box(800, 1), m);
    expect(lines).toEqual(['测'.repeat(31) + '...']);
    expect(m.measure(lines[0] ?? '')).toBe(780);
  });

  test('a character wider than the box still gets its own line', () => {
    expect(wrap('中文', box(10, 2), m)).toEqual(['中', '文']);
  });

  test('an over-wide character on the last line collapses to the ellipsis', () => {
    expect(wrap('中文', box(10, 1), m)).toEqual(['...']);
  });

  test('lines stay within the box and the line count', () => {
    const samples = [
      'The quick brown fox jumps over the lazy dog again and again',
      '这是一个用于测试的描述，包含中文标点。还有更多的文字内容',
      'mixed 中文 and ⭐ emoji 🚀 with English words in between them',
      'supercalifragilisticexpialidocious-without-any-spaces-at-all',
    ];
    for (const text of samples) {
      for (const [w, n] of [[200, 2], [300, 3], [150, 4]] as const) {
        const lines = wrap(text, box(w, n), m);
        expect(lines.length).toBeLessThanOrEqual(n);
        for (const line of lines) expect(m.measure(line)).toBeLessThanOrEqual(w);
      }
    }
  });

  test('only the last line can carry an ellipsis', () => {
    const lines = wrap('one two three four five six seven eight nine ten', box(100, 3), m);
    expect(lines).toHaveLength(3);
    for (const line of lines.slice(0, -1)) expect(line.endsWith('...')).toBe(false);
    expect(lines[2]?.endsWith('...')).toBe(true);
  });

  test('same input gives the same output', () => {
    const text = 'A ⭐ tool for 小部件 generation that does many things';
    expect(wrap(text, box(300, 3), m)).toEqual(wrap(text, box(300, 3), m));
  });
});

describe('nextLine', () => {
  test('advances one line at a time', () => {
    const first = nextLine({ remaining: 'aaaa bbbb cccc', lines: [] }, box(120, 3), m);
    expect(first).toEqual({ remaining: 'cccc', lines: ['aaaa bbbb'] });
    const second = nextLine(first, box(120, 3), m);
    expect(second).toEqual({ remaining: '', lines: ['aaaa bbbb', 'cccc'] });
  });

  test('does not modify the incoming state', () => {
    const state = { remaining: 'aaaa bbbb cccc', lines: [] as string[] };
    nextLine(state, box(120, 3), m);
    expect(state).toEqual({ remaining: 'aaaa bbbb cccc', lines: [] });
  });
});

describe('truncateWithEllipsis', () => {
  test('returns text that already fits unchanged', () => {
    expect(truncateWithEllipsis('abc', 100, m)).toBe('abc');
    expect(truncateWithEllipsis('', 100, m)).toBe('');
  });

  test('shrinks until text plus ellipsis fits', () => {
    expect(truncateWithEllipsis('abcdefghij', 100, m)).toBe('abcde...');
  });

  test('counts emoji at their scaled width', () => {
    expect(truncateWithEllipsis('a⭐⭐⭐', 60, m)).toBe('a...');
  });

  test('returns the bare ellipsis when nothing else fits', () => {
    expect(truncateWithEllipsis('abcdefghij', 20, m)).toBe('...');
  });

  test('is a fixed point for text that fits', () => {
    const once = truncateWithEllipsis('abcdefghij', 100, m);
    expect(truncateWithEllipsis(once, 100, m)).toBe(once);
  });
});
