import type { Range } from './core.js';

/**
 * Semantic kind of an edit
 */
export type DeltaKind = 'EQUALITY' | 'DELETION' | 'INSERTION' | 'REPLACEMENT';

export const DELTA_KINDS: readonly DeltaKind[] = [
  'EQUALITY',
  'DELETION',
  'INSERTION',
  'REPLACEMENT',
];

/**
 * Result of classifying one replace operation
 *
 * Offsets are in the coordinate space of the text before the edit.
 */
export interface DeltaClassification {
  kind: DeltaKind;
  /** Inserted or removed text (empty for EQUALITY) */
  deltaText: string;
  /** Start of the affected range, -1 for EQUALITY */
  deltaStart: number;
  /** End of the affected range, -1 for EQUALITY */
  deltaEnd: number;
}

/**
 * Selection and composing region after the edit
 */
export interface ResultingRanges {
  selection: Range;
  composing: Range;
}

/**
 * Wire format of a delta sent to the host framework
 */
export interface TextEditingDeltaPayload {
  oldText: string;
  deltaText: string;
  delta: DeltaKind;
  deltaStart: number;
  deltaEnd: number;
  selectionBase: number;
  selectionExtent: number;
  composingBase: number;
  composingExtent: number;
}

/**
 * A list of deltas sent to the host in one message
 */
export interface TextEditingDeltaBatchPayload {
  deltas: TextEditingDeltaPayload[];
}

/**
 * Outcome of serializing a delta
 *
 * A failed serialization carries no payload, never a partial one.
 */
export type SerializationResult<T> =
  | { success: true; payload: T }
  | { success: false; error: string };
