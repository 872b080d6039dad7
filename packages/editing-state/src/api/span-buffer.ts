import { ChangeSet, Text } from '@codemirror/state';

import { NO_OFFSET } from '../types/index.js';
import type { Range } from '../types/index.js';

// Lines keep any '\r', so offsets stay UTF-16 code unit offsets of the
// input string.
function toText(value: string): Text {
  return Text.of(value.split('\n'));
}

/**
 * Text buffer with a selection and a composing region that move with edits
 *
 * The document is a CodeMirror `Text` and each replace is applied as a
 * `ChangeSet`, whose `mapPos` carries the spans across the edit:
 * - the selection bounds follow inserted text (an insertion at the caret
 *   moves the caret after it)
 * - the composing region is exclusive at both ends, and is removed once it
 *   becomes empty
 */
export class SpanBuffer {
  private doc: Text;
  private selection: Range | null = null;
  private composing: Range | null = null;

  constructor(text: string = '') {
    this.doc = toText(text);
  }

  // ========================================================================
  // QUERIES
  // ========================================================================

  get length(): number {
    return this.doc.length;
  }

  charAt(index: number): string {
    if (index < 0 || index >= this.doc.length) {
      return '';
    }
    return this.doc.sliceString(index, index + 1);
  }

  subSequence(start: number, end: number): string {
    return this.doc.sliceString(start, end);
  }

  toString(): string {
    return this.doc.toString();
  }

  get selectionStart(): number {
    return this.selection?.start ?? NO_OFFSET;
  }

  get selectionEnd(): number {
    return this.selection?.end ?? NO_OFFSET;
  }

  get composingStart(): number {
    return this.composing?.start ?? NO_OFFSET;
  }

  get composingEnd(): number {
    return this.composing?.end ?? NO_OFFSET;
  }

  // ========================================================================
  // MUTATIONS
  // ========================================================================

  /**
   * Replace `[start, end)` with `inserted`; callers validate the range
   */
  replace(start: number, end: number, inserted: string): void {
    const changes = ChangeSet.of({ from: start, to: end, insert: toText(inserted) }, this.doc.length);
    this.doc = changes.apply(this.doc);

    if (this.selection) {
      this.selection = {
        start: changes.mapPos(this.selection.start, 1),
        end: changes.mapPos(this.selection.end, 1),
      };
    }

    if (this.composing) {
      const composingStart = changes.mapPos(this.composing.start, 1);
      const composingEnd = changes.mapPos(this.composing.end, -1);
      this.composing =
        composingStart < composingEnd ? { start: composingStart, end: composingEnd } : null;
    }
  }

  setSelection(start: number, end: number): void {
    this.selection = { start, end };
  }

  removeSelection(): void {
    this.selection = null;
  }

  /**
   * Set the composing region; an invalid or empty range removes it
   */
  setComposingRegion(start: number, end: number): void {
    if (start < 0 || start >= end) {
      this.composing = null;
      return;
    }
    this.composing = { start, end };
  }

  clearComposingRegion(): void {
    this.composing = null;
  }
}
