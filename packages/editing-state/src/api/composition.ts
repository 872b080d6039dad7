import type { Range, TextEditState } from '../types/index.js';
import type { EditingBuffer } from './editing-buffer.js';

/** Event fired when a composition starts */
export const COMPOSITION_START = 'compositionstart';

/** Event fired when the composing text changes */
export const COMPOSITION_UPDATE = 'compositionupdate';

/** Event fired when a composition ends */
export const COMPOSITION_END = 'compositionend';

function readEventData(event: Event): string | null {
  if ('data' in event && typeof event.data === 'string') {
    return event.data;
  }
  return null;
}

/**
 * Tracks the text an input surface is currently composing
 *
 * The composing region is derived from the caret: the composing text is
 * assumed to end at the selection base.
 */
export class CompositionTracker {
  /**
   * The text currently being composed; null when composing just started,
   * ended, or no composition is in progress
   */
  composingText: string | null = null;

  private readonly startListener = (): void => this.onCompositionStart();
  private readonly updateListener = (event: Event): void => {
    const data = readEventData(event);
    if (data !== null) {
      this.onCompositionUpdate(data);
    }
  };
  private readonly endListener = (): void => this.onCompositionEnd();

  onCompositionStart(): void {
    this.composingText = null;
  }

  onCompositionUpdate(currentComposingText: string): void {
    this.composingText = currentComposingText;
  }

  onCompositionEnd(): void {
    this.composingText = null;
  }

  addCompositionEventHandlers(target: EventTarget): void {
    target.addEventListener(COMPOSITION_START, this.startListener);
    target.addEventListener(COMPOSITION_UPDATE, this.updateListener);
    target.addEventListener(COMPOSITION_END, this.endListener);
  }

  removeCompositionEventHandlers(target: EventTarget): void {
    target.removeEventListener(COMPOSITION_START, this.startListener);
    target.removeEventListener(COMPOSITION_UPDATE, this.updateListener);
    target.removeEventListener(COMPOSITION_END, this.endListener);
  }

  /**
   * `[base - composingText.length, base)`, or null when there is no caret,
   * no composition, or the composing text is longer than the text before
   * the caret
   */
  composingSubrange(state: TextEditState): Range | null {
    const base = state.selectionStart;
    if (base === undefined || base < 0 || this.composingText === null) {
      return null;
    }

    const composingBase = base - this.composingText.length;
    if (composingBase < 0) {
      return null;
    }
    return { start: composingBase, end: base };
  }

  /**
   * Copy of `state` with its composing region set from the current
   * composition, or `state` itself when there is none
   */
  determineCompositionState(state: TextEditState): TextEditState {
    const range = this.composingSubrange(state);
    if (range === null) {
      return state;
    }
    return { ...state, composingStart: range.start, composingEnd: range.end };
  }

  /**
   * Push the derived composing region into a buffer, as a batch edit so
   * that watchers hear about it
   */
  syncTo(buffer: EditingBuffer): void {
    const range = this.composingSubrange(buffer.getState());
    buffer.beginBatchEdit();
    try {
      if (range === null) {
        buffer.setComposingRegion(-1, -1);
      } else {
        buffer.setComposingRegion(range.start, range.end);
      }
    } finally {
      buffer.endBatchEdit();
    }
  }
}
