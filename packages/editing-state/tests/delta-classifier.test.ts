/**
 * Tests for replace classification
 *
 * Covers each guard of the classifier (equality, deletion, insertion,
 * replacement) and checks that applying a delta reproduces the edited text.
 */

import { describe, it, expect } from 'vitest';
import { applyDelta, classifyReplace } from '../src/api/delta-classifier.js';
import type { ReplaceOperation } from '../src/types/index.js';

function op(
  start: number,
  end: number,
  insertedText: string,
  insertedStart: number = 0,
  insertedEnd: number = insertedText.length
): ReplaceOperation {
  return { start, end, insertedText, insertedStart, insertedEnd };
}

// ============================================================================
// Equality
// ============================================================================

describe('Equality', () => {
  it('should classify replacing a range with itself as EQUALITY', () => {
    expect(classifyReplace('hello', op(0, 5, 'hello'))).toEqual({
      kind: 'EQUALITY',
      deltaText: '',
      deltaStart: -1,
      deltaEnd: -1,
    });
  });

  it('should compare only the used sub-span of the inserted text', () => {
    const result = classifyReplace('abc', op(1, 2, 'xbz', 1, 2));
    expect(result.kind).toBe('EQUALITY');
    expect(result.deltaStart).toBe(-1);
    expect(result.deltaEnd).toBe(-1);
  });

  it('should classify an empty-to-empty replace as EQUALITY', () => {
    expect(classifyReplace('abc', op(1, 1, '')).kind).toBe('EQUALITY');
  });
});

// ============================================================================
// Deletion
// ============================================================================

describe('Deletion', () => {
  it('should report the trimmed suffix of a shortened word', () => {
    expect(classifyReplace('hello', op(0, 5, 'he', 0, 2))).toEqual({
      kind: 'DELETION',
      deltaText: 'llo',
      deltaStart: 5,
      deltaEnd: 5,
    });
  });

  it('should classify a backspace as DELETION', () => {
    expect(classifyReplace('abc', op(2, 3, ''))).toEqual({
      kind: 'DELETION',
      deltaText: 'c',
      deltaStart: 3,
      deltaEnd: 3,
    });
  });

  it('should treat a shorter text that keeps only the end as REPLACEMENT', () => {
    expect(classifyReplace('hello', op(0, 5, 'ello'))).toEqual({
      kind: 'REPLACEMENT',
      deltaText: 'ello',
      deltaStart: 0,
      deltaEnd: 5,
    });
  });
});

// ============================================================================
// Insertion
// ============================================================================

describe('Insertion', () => {
  it('should report the appended part of a composing word', () => {
    expect(classifyReplace('hel', op(0, 3, 'hello', 0, 5))).toEqual({
      kind: 'INSERTION',
      deltaText: 'lo',
      deltaStart: 3,
      deltaEnd: 3,
    });
  });

  it('should classify an insertion into an empty range as INSERTION', () => {
    expect(classifyReplace('ac', op(1, 1, 'b'))).toEqual({
      kind: 'INSERTION',
      deltaText: 'b',
      deltaStart: 1,
      deltaEnd: 1,
    });
  });

  it('should read the appended part from the used sub-span', () => {
    expect(classifyReplace('he', op(0, 2, 'xxhelloyy', 2, 7))).toEqual({
      kind: 'INSERTION',
      deltaText: 'llo',
      deltaStart: 2,
      deltaEnd: 2,
    });
  });
});

// ============================================================================
// Replacement
// ============================================================================

describe('Replacement', () => {
  it('should classify a same-length correction as REPLACEMENT', () => {
    expect(classifyReplace('cat', op(0, 3, 'bat', 0, 3))).toEqual({
      kind: 'REPLACEMENT',
      deltaText: 'bat',
      deltaStart: 0,
      deltaEnd: 3,
    });
  });

  it('should classify a longer autocorrection as REPLACEMENT', () => {
    expect(classifyReplace('teh', op(0, 3, 'the '))).toEqual({
      kind: 'REPLACEMENT',
      deltaText: 'the ',
      deltaStart: 0,
      deltaEnd: 3,
    });
  });

  it('should classify a shorter, different text as REPLACEMENT', () => {
    expect(classifyReplace('hello', op(0, 5, 'hx'))).toEqual({
      kind: 'REPLACEMENT',
      deltaText: 'hx',
      deltaStart: 0,
      deltaEnd: 5,
    });
  });

  it('should span the whole old text when the entire buffer is replaced', () => {
    const result = classifyReplace('abc', op(0, 3, 'xyz'));
    expect(result.kind).toBe('REPLACEMENT');
    expect(result.deltaStart).toBe(0);
    expect(result.deltaEnd).toBe(3);
  });

  it('should not throw for offsets beyond the text', () => {
    expect(() => classifyReplace('ab', op(5, 9, 'x'))).not.toThrow();
  });
});

// ============================================================================
// Applying deltas
// ============================================================================

describe('applyDelta', () => {
  const cases: Array<[string, ReplaceOperation, string]> = [
    ['hello', op(0, 5, 'hello'), 'hello'],
    ['hello world', op(0, 5, 'he'), 'he world'],
    ['hel world', op(0, 3, 'hello'), 'hello world'],
    ['the cat sat', op(4, 7, 'bat'), 'the bat sat'],
    ['abc', op(1, 1, 'xyz', 1, 2), 'aybc'],
  ];

  for (const [oldText, replace, expected] of cases) {
    it(`should rebuild "${expected}" from "${oldText}"`, () => {
      expect(applyDelta(oldText, classifyReplace(oldText, replace))).toBe(expected);
    });
  }
});
