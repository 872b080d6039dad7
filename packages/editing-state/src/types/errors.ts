/**
 * Structured error details for the editing state.
 *
 * Usage errors (`unbalanced_batch`, `reentrant_mutation`,
 * `reentrant_listener`) are only ever logged. `invalid_range` and
 * `validation` are thrown inside an {@link EditingStateError}.
 */
export type EditingErrorDetails =
  | InvalidRangeError
  | UnbalancedBatchError
  | ReentrantMutationError
  | ReentrantListenerError
  | SerializationError
  | ValidationError;

/**
 * Offsets outside the buffer, or start after end.
 */
export interface InvalidRangeError {
  type: 'invalid_range';
  operation: string;
  start: number;
  end: number;
  length: number;
}

/**
 * endBatchEdit called without a matching beginBatchEdit.
 */
export interface UnbalancedBatchError {
  type: 'unbalanced_batch';
}

/**
 * Editing state changed from inside a watcher callback.
 */
export interface ReentrantMutationError {
  type: 'reentrant_mutation';
  operation: string;
}

/**
 * Watcher added or removed from inside a watcher callback.
 */
export interface ReentrantListenerError {
  type: 'reentrant_listener';
  operation: 'add' | 'remove';
}

/**
 * A delta field that cannot be put on the wire.
 */
export interface SerializationError {
  type: 'serialization';
  field: string;
  value: unknown;
}

/**
 * Invalid configuration or framework state.
 */
export interface ValidationError {
  type: 'validation';
  message: string;
}

/**
 * Error thrown by the editing state with structured error details.
 *
 * @example
 * ```typescript
 * try {
 *   buffer.replace(10, 12, 'x');
 * } catch (error) {
 *   if (error instanceof EditingStateError && error.details.type === 'invalid_range') {
 *     console.error(`Buffer has only ${error.details.length} code units`);
 *   }
 * }
 * ```
 */
export class EditingStateError extends Error {
  constructor(
    message: string,
    public readonly details: EditingErrorDetails
  ) {
    super(message);
    this.name = 'EditingStateError';
  }

  static from(details: EditingErrorDetails): EditingStateError {
    return new EditingStateError(formatEditingError(details), details);
  }
}

/**
 * Format error details into a log or exception message.
 */
export function formatEditingError(error: EditingErrorDetails): string {
  switch (error.type) {
    case 'invalid_range':
      return `${error.operation}: range [${error.start}, ${error.end}) is invalid for length ${error.length}`;

    case 'unbalanced_batch':
      return 'endBatchEdit called without a matching beginBatchEdit';

    case 'reentrant_mutation':
      return `${error.operation}: editing state should not be changed in a watcher callback`;

    case 'reentrant_listener':
      return `${error.operation === 'add' ? 'adding' : 'removing'} a watcher in a watcher callback`;

    case 'serialization':
      return `Cannot serialize delta field '${error.field}': ${String(error.value)}`;

    case 'validation':
      return `Validation error: ${error.message}`;

    default: {
      const _exhaustive: never = error;
      return `Unknown error: ${JSON.stringify(_exhaustive)}`;
    }
  }
}
