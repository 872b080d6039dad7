import { NO_OFFSET } from '../types/index.js';
import type { DeltaClassification, ReplaceOperation } from '../types/index.js';

// ========================================================================
// GUARDS
// ========================================================================

/** The inserted slice is identical to the removed one */
function isUnchanged(removed: string, inserted: string): boolean {
  return removed === inserted;
}

/**
 * The edit only trims the end of the removed slice: what is inserted is a
 * strict prefix of what was removed (backspace, or an IME shortening its
 * composing text)
 */
function isSuffixTrim(removed: string, inserted: string): boolean {
  return inserted.length < removed.length && removed.startsWith(inserted);
}

/**
 * The edit only adds text after the removed slice: what was removed is a
 * strict prefix of what is inserted (typing, or an IME extending its
 * composing text)
 */
function isAppend(removed: string, inserted: string): boolean {
  return removed.length < inserted.length && inserted.startsWith(removed);
}

// ========================================================================
// CLASSIFICATION
// ========================================================================

/**
 * Classify "remove `oldText[start:end]`, insert
 * `insertedText[insertedStart:insertedEnd]` at `start`" as a single delta.
 *
 * Guards are tried in order: equality, deletion, insertion, and anything
 * else is a replacement. Correcting one character mid-word is a
 * replacement; appending to a word is an insertion; backspacing is a
 * deletion.
 */
export function classifyReplace(oldText: string, op: ReplaceOperation): DeltaClassification {
  const { start, end, insertedText, insertedStart, insertedEnd } = op;
  const removed = oldText.slice(start, end);
  const inserted = insertedText.slice(insertedStart, insertedEnd);

  if (isUnchanged(removed, inserted)) {
    return { kind: 'EQUALITY', deltaText: '', deltaStart: NO_OFFSET, deltaEnd: NO_OFFSET };
  }

  if (isSuffixTrim(removed, inserted)) {
    return {
      kind: 'DELETION',
      deltaText: oldText.slice(start + inserted.length, end),
      deltaStart: end,
      deltaEnd: end,
    };
  }

  if (isAppend(removed, inserted)) {
    return {
      kind: 'INSERTION',
      deltaText: insertedText.slice(insertedStart + removed.length, insertedEnd),
      deltaStart: end,
      deltaEnd: end,
    };
  }

  return { kind: 'REPLACEMENT', deltaText: inserted, deltaStart: start, deltaEnd: end };
}

/**
 * Apply a classified delta to the text it was computed against
 *
 * - DELETION removes `deltaText.length` code units ending at `deltaEnd`
 * - INSERTION inserts `deltaText` at `deltaEnd`
 * - REPLACEMENT replaces `[deltaStart, deltaEnd)` with `deltaText`
 */
export function applyDelta(oldText: string, delta: DeltaClassification): string {
  switch (delta.kind) {
    case 'EQUALITY':
      return oldText;
    case 'DELETION':
      return oldText.slice(0, delta.deltaEnd - delta.deltaText.length) + oldText.slice(delta.deltaEnd);
    case 'INSERTION':
      return oldText.slice(0, delta.deltaEnd) + delta.deltaText + oldText.slice(delta.deltaEnd);
    case 'REPLACEMENT':
      return oldText.slice(0, delta.deltaStart) + delta.deltaText + oldText.slice(delta.deltaEnd);
  }
}

/**
 * Human-readable form of a replace, for traces
 */
export function describeReplace(op: ReplaceOperation): string {
  return `replace(${op.start}, ${op.end}, ${JSON.stringify(op.insertedText)}, ${op.insertedStart}, ${op.insertedEnd})`;
}
