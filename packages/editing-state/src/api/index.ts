/**
 * API implementations
 * @packageDocumentation
 */

export { SpanBuffer } from './span-buffer.js';
export { classifyReplace, applyDelta, describeReplace } from './delta-classifier.js';
export { TextEditingDelta, serializeDeltaBatch } from './text-editing-delta.js';
export { WatcherRegistry } from './watchers.js';
export { EditingBuffer } from './editing-buffer.js';
export {
  CompositionTracker,
  COMPOSITION_START,
  COMPOSITION_UPDATE,
  COMPOSITION_END,
} from './composition.js';
