import {
  EditingStateError,
  NO_OFFSET,
  formatEditingError,
  hasSelection,
} from '../types/index.js';
import type {
  BatchEditable,
  EditingErrorDetails,
  EditingStateSnapshot,
  EditingStateWatcher,
  ReplaceOperation,
  TextEditState,
  Unsubscribe,
} from '../types/index.js';
import { createConfig, resolveLogger, validateConfig, validateEditState } from '../config.js';
import type { PartialEditingStateConfig } from '../config.js';
import { isLevelEnabled } from '../logger.js';
import type { Logger } from '../logger.js';
import { classifyReplace, describeReplace } from './delta-classifier.js';
import { SpanBuffer } from './span-buffer.js';
import { TextEditingDelta } from './text-editing-delta.js';
import { WatcherRegistry } from './watchers.js';

/**
 * The editing state (text, selection, composing region) of one text field
 *
 * Every text mutation goes through {@link EditingBuffer.replace}, which
 * classifies the edit into a {@link TextEditingDelta} and notifies watchers.
 * During a batch edit notifications are held until the outermost batch ends.
 *
 * Selection and composing changes alone do not notify; wrap them in a batch
 * edit to get a notification.
 *
 * @example
 * ```typescript
 * const buffer = new EditingBuffer({ initialState: { text: 'hel', selectionStart: 3, selectionEnd: 3 } });
 * buffer.addWatcher(({ textChanged }) => {
 *   if (textChanged) send(serializeDeltaBatch(buffer.extractDeltas()));
 * });
 * buffer.replace(0, 3, 'hello'); // INSERTION of "lo" at 3
 * ```
 */
export class EditingBuffer implements BatchEditable {
  private readonly buffer = new SpanBuffer();
  private readonly watchers: WatcherRegistry;
  private readonly logger: Logger;
  private readonly traceReplaces: boolean;

  private batchEditNestDepth = 0;
  private batchBaseline: EditingStateSnapshot | null = null;
  private stringCache: string | null = null;
  private pendingDeltas: TextEditingDelta[] = [];

  constructor(config: PartialEditingStateConfig = {}) {
    const resolved = createConfig(config);
    validateConfig(resolved);

    this.logger = resolveLogger(resolved);
    this.traceReplaces = isLevelEnabled(resolved.logLevel, 'debug');
    this.watchers = new WatcherRegistry(this.logger);

    if (resolved.initialState) {
      this.setEditingState(resolved.initialState);
    }
  }

  // ========================================================================
  // QUERIES
  // ========================================================================

  get length(): number {
    return this.buffer.length;
  }

  /**
   * @throws EditingStateError with `invalid_range` details outside `[0, length)`
   */
  charAt(index: number): string {
    this.checkRange('charAt', index, index + 1, this.buffer.length);
    return this.buffer.charAt(index);
  }

  subSequence(start: number, end: number): string {
    this.checkRange('subSequence', start, end, this.buffer.length);
    return this.buffer.subSequence(start, end);
  }

  get selectionStart(): number {
    return this.buffer.selectionStart;
  }

  get selectionEnd(): number {
    return this.buffer.selectionEnd;
  }

  get composingStart(): number {
    return this.buffer.composingStart;
  }

  get composingEnd(): number {
    return this.buffer.composingEnd;
  }

  get batchDepth(): number {
    return this.batchEditNestDepth;
  }

  getState(): EditingStateSnapshot {
    return {
      text: this.toString(),
      selectionStart: this.selectionStart,
      selectionEnd: this.selectionEnd,
      composingStart: this.composingStart,
      composingEnd: this.composingEnd,
    };
  }

  toString(): string {
    if (this.stringCache === null) {
      this.stringCache = this.buffer.toString();
    }
    return this.stringCache;
  }

  // ========================================================================
  // TEXT MUTATIONS
  // ========================================================================

  /**
   * Replace `[start, end)` with `text.slice(textStart, textEnd)`
   *
   * @returns The classified delta, also kept until {@link extractDeltas}
   * @throws EditingStateError with `invalid_range` details for bad offsets
   */
  replace(
    start: number,
    end: number,
    text: string,
    textStart: number = 0,
    textEnd: number = text.length
  ): TextEditingDelta {
    this.checkRange('replace', start, end, this.buffer.length);
    this.checkRange('replace (inserted text)', textStart, textEnd, text.length);
    this.checkNotNotifying('replace');

    const op: ReplaceOperation = {
      start,
      end,
      insertedText: text,
      insertedStart: textStart,
      insertedEnd: textEnd,
    };
    const oldText = this.toString();
    const classification = classifyReplace(oldText, op);
    if (this.traceReplaces) {
      this.logger.debug(`${describeReplace(op)} classified as ${classification.kind}`);
    }

    const textChanged = contentDiffers(oldText, op);
    const selectionStart = this.selectionStart;
    const selectionEnd = this.selectionEnd;
    const composingStart = this.composingStart;
    const composingEnd = this.composingEnd;

    this.buffer.replace(start, end, text.slice(textStart, textEnd));
    if (textChanged) {
      this.stringCache = null;
    }

    const delta = new TextEditingDelta(oldText, classification, {
      selection: { start: this.selectionStart, end: this.selectionEnd },
      composing: { start: this.composingStart, end: this.composingEnd },
    });
    this.pendingDeltas.push(delta);

    if (this.batchEditNestDepth === 0) {
      this.watchers.notify({
        textChanged,
        selectionChanged:
          this.selectionStart !== selectionStart || this.selectionEnd !== selectionEnd,
        composingRegionChanged:
          this.composingStart !== composingStart || this.composingEnd !== composingEnd,
      });
    }

    return delta;
  }

  insert(where: number, text: string, textStart?: number, textEnd?: number): TextEditingDelta {
    return this.replace(where, where, text, textStart, textEnd);
  }

  delete(start: number, end: number): TextEditingDelta {
    return this.replace(start, end, '');
  }

  append(text: string, textStart?: number, textEnd?: number): TextEditingDelta {
    const length = this.buffer.length;
    return this.replace(length, length, text, textStart, textEnd);
  }

  // ========================================================================
  // SPAN MUTATIONS (no notification outside a batch edit)
  // ========================================================================

  setSelection(start: number, end: number = start): void {
    this.checkRange('setSelection', start, end, this.buffer.length);
    this.checkNotNotifying('setSelection');
    this.buffer.setSelection(start, end);
  }

  removeSelection(): void {
    this.checkNotNotifying('removeSelection');
    this.buffer.removeSelection();
  }

  /**
   * Set the composing region; `start < 0` or `start >= end` removes it
   */
  setComposingRegion(start: number, end: number): void {
    this.checkNotNotifying('setComposingRegion');
    if (start < 0 || start >= end) {
      this.buffer.clearComposingRegion();
      return;
    }
    this.checkRange('setComposingRegion', start, end, this.buffer.length);
    this.buffer.setComposingRegion(start, end);
  }

  /**
   * Overwrite the whole state with one sent by the framework
   *
   * Runs as a batch edit. The framework already knows about this change, so
   * pending deltas are dropped.
   */
  setEditingState(state: TextEditState): void {
    validateEditState(state);
    this.logger.debug('setEditingState updating from framework');

    this.beginBatchEdit();
    try {
      this.replace(0, this.buffer.length, state.text);

      if (hasSelection(state)) {
        const selectionStart = state.selectionStart ?? 0;
        this.setSelection(selectionStart, state.selectionEnd ?? selectionStart);
      } else {
        this.removeSelection();
      }
      this.setComposingRegion(state.composingStart ?? NO_OFFSET, state.composingEnd ?? NO_OFFSET);
    } finally {
      this.pendingDeltas = [];
      this.endBatchEdit();
    }
  }

  // ========================================================================
  // BATCH EDITS
  // ========================================================================

  beginBatchEdit(): void {
    this.batchEditNestDepth++;
    this.checkNotNotifying('beginBatchEdit');

    if (this.batchEditNestDepth === 1) {
      this.batchBaseline = this.watchers.listenerCount > 0 ? this.getState() : null;
    }
  }

  endBatchEdit(): void {
    if (this.batchEditNestDepth === 0) {
      this.reportUsageError({ type: 'unbalanced_batch' });
      return;
    }
    this.checkNotNotifying('endBatchEdit');

    if (this.batchEditNestDepth === 1) {
      this.watchers.notifyPending();

      const baseline = this.batchBaseline;
      if (baseline !== null && this.watchers.listenerCount > 0) {
        this.logger.debug(
          `batch edit finished with ${this.watchers.listenerCount} watcher(s)`
        );
        this.watchers.notify({
          textChanged: this.toString() !== baseline.text,
          selectionChanged:
            this.selectionStart !== baseline.selectionStart ||
            this.selectionEnd !== baseline.selectionEnd,
          composingRegionChanged:
            this.composingStart !== baseline.composingStart ||
            this.composingEnd !== baseline.composingEnd,
        });
      }

      this.batchBaseline = null;
      this.watchers.flushPending();
    }

    this.batchEditNestDepth--;
  }

  // ========================================================================
  // WATCHERS
  // ========================================================================

  addWatcher(watcher: EditingStateWatcher): Unsubscribe {
    if (this.watchers.isNotifying) {
      this.reportUsageError({ type: 'reentrant_listener', operation: 'add' });
    }

    if (this.batchEditNestDepth > 0) {
      this.logger.warn('a watcher was added while a batch edit was in progress');
      this.watchers.add(watcher, true);
    } else {
      this.watchers.add(watcher, false);
    }

    return () => this.removeWatcher(watcher);
  }

  removeWatcher(watcher: EditingStateWatcher): void {
    if (this.watchers.isNotifying) {
      this.reportUsageError({ type: 'reentrant_listener', operation: 'remove' });
    }
    this.watchers.remove(watcher);
  }

  // ========================================================================
  // DELTAS
  // ========================================================================

  /**
   * Deltas recorded since the last extraction, oldest first; clears them
   */
  extractDeltas(): TextEditingDelta[] {
    const deltas = this.pendingDeltas;
    this.pendingDeltas = [];
    return deltas;
  }

  clearDeltas(): void {
    this.pendingDeltas = [];
  }

  // ========================================================================
  // INTERNALS
  // ========================================================================

  private checkRange(operation: string, start: number, end: number, length: number): void {
    if (
      !Number.isInteger(start) ||
      !Number.isInteger(end) ||
      start < 0 ||
      start > end ||
      end > length
    ) {
      throw EditingStateError.from({ type: 'invalid_range', operation, start, end, length });
    }
  }

  private checkNotNotifying(operation: string): void {
    if (this.watchers.isNotifying) {
      this.reportUsageError({ type: 'reentrant_mutation', operation });
    }
  }

  private reportUsageError(details: EditingErrorDetails): void {
    this.logger.error(formatEditingError(details));
  }
}

/**
 * Whether a replace really changes the text: lengths differ, or a code unit
 * in the replaced range differs
 */
function contentDiffers(oldText: string, op: ReplaceOperation): boolean {
  const removedLength = op.end - op.start;
  if (removedLength !== op.insertedEnd - op.insertedStart) {
    return true;
  }
  for (let i = 0; i < removedLength; i++) {
    if (oldText.charCodeAt(op.start + i) !== op.insertedText.charCodeAt(op.insertedStart + i)) {
      return true;
    }
  }
  return false;
}
