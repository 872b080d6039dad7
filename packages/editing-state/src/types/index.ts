/**
 * Type definitions for the editing state
 * @packageDocumentation
 */

// Core types
export type {
  Range,
  TextEditState,
  EditingStateSnapshot,
  ReplaceOperation,
} from './core.js';
export { NO_OFFSET, hasSelection, hasComposingRegion } from './core.js';

// Delta types
export type {
  DeltaKind,
  DeltaClassification,
  ResultingRanges,
  TextEditingDeltaPayload,
  TextEditingDeltaBatchPayload,
  SerializationResult,
} from './delta.js';
export { DELTA_KINDS } from './delta.js';

// Watcher types
export type {
  EditingStateChange,
  EditingStateWatcher,
  Unsubscribe,
  BatchEditable,
} from './watcher.js';

// Errors
export type {
  EditingErrorDetails,
  InvalidRangeError,
  UnbalancedBatchError,
  ReentrantMutationError,
  ReentrantListenerError,
  SerializationError,
  ValidationError,
} from './errors.js';
export { EditingStateError, formatEditingError } from './errors.js';
