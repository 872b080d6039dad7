/**
 * Config helpers for creating an editing buffer
 *
 * Hosts usually pass only the pieces they care about (an initial state, a
 * logger); everything else falls back to the defaults below.
 */

import { EditingStateError } from './types/errors.js';
import { hasComposingRegion, hasSelection } from './types/core.js';
import type { TextEditState } from './types/core.js';
import { consoleLogger, createLogger } from './logger.js';
import type { Logger, LogLevel } from './logger.js';

/**
 * Complete editing buffer configuration
 */
export interface EditingStateConfig {
  /** State loaded before any watcher is registered */
  initialState: TextEditState | null;

  /** Sink for usage errors and traces */
  logger: Logger;

  /** Minimum level forwarded to `logger` */
  logLevel: LogLevel;
}

/**
 * Partial configuration; all fields are optional
 */
export interface PartialEditingStateConfig {
  /** State loaded before any watcher is registered */
  initialState?: TextEditState | null;

  /** Sink for usage errors and traces (default: console) */
  logger?: Logger;

  /** Minimum level forwarded to `logger` (default: 'warn') */
  logLevel?: LogLevel;
}

/**
 * Create a complete config from a partial one
 *
 * @example
 * ```typescript
 * const config = createConfig({
 *   initialState: { text: 'hello', selectionStart: 5, selectionEnd: 5 },
 *   logLevel: 'debug',
 * });
 * ```
 */
export function createConfig(partial: PartialEditingStateConfig = {}): EditingStateConfig {
  return {
    initialState: partial.initialState ?? null,
    logger: partial.logger ?? consoleLogger,
    logLevel: partial.logLevel ?? 'warn',
  };
}

/**
 * Logger with the config's level applied
 */
export function resolveLogger(config: EditingStateConfig): Logger {
  return createLogger(config.logger, config.logLevel);
}

const OFFSET_FIELDS = ['selectionStart', 'selectionEnd', 'composingStart', 'composingEnd'] as const;

/**
 * Check a framework state against its own text
 *
 * @throws EditingStateError with `validation` details
 */
export function validateEditState(state: TextEditState): void {
  const length = state.text.length;

  for (const field of OFFSET_FIELDS) {
    const value = state[field];
    if (value !== undefined && !Number.isInteger(value)) {
      throw EditingStateError.from({
        type: 'validation',
        message: `${field} must be an integer, got ${value}`,
      });
    }
  }

  if (hasSelection(state)) {
    const start = state.selectionStart ?? 0;
    const end = state.selectionEnd ?? start;
    if (end < start || end > length) {
      throw EditingStateError.from({
        type: 'validation',
        message: `selection [${start}, ${end}) does not fit text of length ${length}`,
      });
    }
  }

  if (hasComposingRegion(state)) {
    const end = state.composingEnd ?? 0;
    if (end > length) {
      throw EditingStateError.from({
        type: 'validation',
        message: `composing region [${state.composingStart}, ${end}) does not fit text of length ${length}`,
      });
    }
  }
}

/**
 * Validate a complete config
 *
 * @throws EditingStateError if the initial state is inconsistent
 */
export function validateConfig(config: EditingStateConfig): void {
  if (config.initialState) {
    validateEditState(config.initialState);
  }
}
