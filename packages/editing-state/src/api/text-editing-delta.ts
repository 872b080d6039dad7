import { DELTA_KINDS, NO_OFFSET, formatEditingError } from '../types/index.js';
import type {
  DeltaClassification,
  DeltaKind,
  Range,
  ReplaceOperation,
  ResultingRanges,
  SerializationResult,
  TextEditingDeltaBatchPayload,
  TextEditingDeltaPayload,
} from '../types/index.js';
import { applyDelta, classifyReplace } from './delta-classifier.js';

const UNSET: Readonly<Range> = Object.freeze({ start: NO_OFFSET, end: NO_OFFSET });

const OFFSET_FIELDS = [
  'deltaStart',
  'deltaEnd',
  'selectionBase',
  'selectionExtent',
  'composingBase',
  'composingExtent',
] as const;

function isDeltaKind(value: string): value is DeltaKind {
  return DELTA_KINDS.some((kind) => kind === value);
}

/**
 * Immutable description of one edit, as reported to the host framework
 */
export class TextEditingDelta implements DeltaClassification {
  readonly kind: DeltaKind;
  /** Full text before the edit */
  readonly oldText: string;
  readonly deltaText: string;
  readonly deltaStart: number;
  readonly deltaEnd: number;
  /** Selection after the edit */
  readonly selection: Readonly<Range>;
  /** Composing region after the edit */
  readonly composing: Readonly<Range>;

  constructor(
    oldText: string,
    classification: DeltaClassification,
    resulting: ResultingRanges = { selection: UNSET, composing: UNSET }
  ) {
    this.kind = classification.kind;
    this.oldText = oldText;
    this.deltaText = classification.deltaText;
    this.deltaStart = classification.deltaStart;
    this.deltaEnd = classification.deltaEnd;
    this.selection = Object.freeze({ ...resulting.selection });
    this.composing = Object.freeze({ ...resulting.composing });
    Object.freeze(this);
  }

  /**
   * Classify a replace against `oldText` and build the delta
   */
  static fromReplace(
    oldText: string,
    op: ReplaceOperation,
    resulting?: ResultingRanges
  ): TextEditingDelta {
    return new TextEditingDelta(oldText, classifyReplace(oldText, op), resulting);
  }

  /**
   * Text after the edit
   */
  apply(): string {
    return applyDelta(this.oldText, this);
  }

  toJSON(): TextEditingDeltaPayload {
    return {
      oldText: this.oldText,
      deltaText: this.deltaText,
      delta: this.kind,
      deltaStart: this.deltaStart,
      deltaEnd: this.deltaEnd,
      selectionBase: this.selection.start,
      selectionExtent: this.selection.end,
      composingBase: this.composing.start,
      composingExtent: this.composing.end,
    };
  }

  /**
   * Build the wire payload, refusing anything the host cannot read
   */
  serialize(): SerializationResult<TextEditingDeltaPayload> {
    const payload = this.toJSON();

    if (!isDeltaKind(payload.delta)) {
      return {
        success: false,
        error: formatEditingError({ type: 'serialization', field: 'delta', value: payload.delta }),
      };
    }

    for (const field of OFFSET_FIELDS) {
      const value = payload[field];
      if (!Number.isInteger(value) || value < NO_OFFSET) {
        return {
          success: false,
          error: formatEditingError({ type: 'serialization', field, value }),
        };
      }
    }

    return { success: true, payload };
  }
}

/**
 * Serialize deltas as one `{ deltas: [...] }` message; the first failing
 * delta fails the whole batch
 */
export function serializeDeltaBatch(
  deltas: readonly TextEditingDelta[]
): SerializationResult<TextEditingDeltaBatchPayload> {
  const payloads: TextEditingDeltaPayload[] = [];
  for (const delta of deltas) {
    const result = delta.serialize();
    if (!result.success) {
      return result;
    }
    payloads.push(result.payload);
  }
  return { success: true, payload: { deltas: payloads } };
}
