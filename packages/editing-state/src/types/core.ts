/**
 * Offset used for an unset selection or composing bound
 */
export const NO_OFFSET = -1;

/**
 * Range in the buffer (UTF-16 code unit offsets, 0-indexed)
 *
 * Both bounds are {@link NO_OFFSET} when the range is unset.
 */
export interface Range {
  /** Start offset */
  start: number;
  /** End offset */
  end: number;
}

/**
 * Editing state as sent by the owning framework
 *
 * Selection is present when `selectionStart >= 0`; the composing region is
 * present when `composingStart >= 0` and `composingStart < composingEnd`.
 */
export interface TextEditState {
  /** Full text of the field */
  text: string;

  /** Selection start (or caret position) */
  selectionStart?: number;

  /** Selection end */
  selectionEnd?: number;

  /** Start of the IME composing region */
  composingStart?: number;

  /** End of the IME composing region */
  composingEnd?: number;
}

/**
 * Snapshot of the editing state (text, selection and composing region)
 */
export interface EditingStateSnapshot {
  text: string;
  selectionStart: number;
  selectionEnd: number;
  composingStart: number;
  composingEnd: number;
}

/**
 * A single replace request: remove `[start, end)` and insert
 * `insertedText.slice(insertedStart, insertedEnd)` at `start`
 */
export interface ReplaceOperation {
  /** Start of the removed range */
  start: number;
  /** End of the removed range */
  end: number;
  /** Buffer holding the inserted text */
  insertedText: string;
  /** Start of the used sub-span of `insertedText` */
  insertedStart: number;
  /** End of the used sub-span of `insertedText` */
  insertedEnd: number;
}

export function hasSelection(state: TextEditState): boolean {
  return state.selectionStart !== undefined && state.selectionStart >= 0;
}

export function hasComposingRegion(state: TextEditState): boolean {
  const { composingStart, composingEnd } = state;
  return (
    composingStart !== undefined &&
    composingEnd !== undefined &&
    composingStart >= 0 &&
    composingStart < composingEnd
  );
}
