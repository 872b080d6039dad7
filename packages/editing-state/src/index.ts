/**
 * Editing state for IME text input: tracks the text, selection and composing
 * region of a field and classifies every edit into a text editing delta
 * @packageDocumentation
 */

// Editing buffer and composition tracking
export { EditingBuffer, CompositionTracker } from './api/index.js';
export { COMPOSITION_START, COMPOSITION_UPDATE, COMPOSITION_END } from './api/index.js';

// Delta classification
export {
  TextEditingDelta,
  serializeDeltaBatch,
  classifyReplace,
  applyDelta,
} from './api/index.js';

// Buffer primitive
export { SpanBuffer } from './api/index.js';

// Core types
export type {
  Range,
  TextEditState,
  EditingStateSnapshot,
  ReplaceOperation,
} from './types/index.js';
export { NO_OFFSET, hasSelection, hasComposingRegion } from './types/index.js';

// Delta types
export type {
  DeltaKind,
  DeltaClassification,
  ResultingRanges,
  TextEditingDeltaPayload,
  TextEditingDeltaBatchPayload,
  SerializationResult,
} from './types/index.js';
export { DELTA_KINDS } from './types/index.js';

// Watcher types
export type {
  EditingStateChange,
  EditingStateWatcher,
  Unsubscribe,
  BatchEditable,
} from './types/index.js';

// Errors
export type { EditingErrorDetails } from './types/index.js';
export { EditingStateError, formatEditingError } from './types/index.js';

// Config and logging
export { createConfig, validateConfig, validateEditState } from './config.js';
export type { EditingStateConfig, PartialEditingStateConfig } from './config.js';
export { consoleLogger, silentLogger, createLogger, isLevelEnabled } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
