/**
 * Flags passed to watchers when the editing state changes
 */
export interface EditingStateChange {
  textChanged: boolean;
  selectionChanged: boolean;
  composingRegionChanged: boolean;
}

/**
 * Called after the editing state changes (or once, forcibly, when a batch
 * edit ends for watchers added during that batch)
 *
 * Changing the editing state or the watcher list from inside a watcher is
 * reported as a usage error; ordering after such a call is undefined.
 */
export type EditingStateWatcher = (change: EditingStateChange) => void;

/**
 * Unsubscribe function returned by {@link BatchEditable.addWatcher}
 */
export type Unsubscribe = () => void;

/**
 * Batch editing and change notification capabilities of a buffer
 */
export interface BatchEditable {
  /**
   * Start a batch edit. Notifications are held until the outermost batch
   * ends. Batch edits nest.
   */
  beginBatchEdit(): void;

  /**
   * End the current batch edit, flushing notifications if it is the
   * outermost one
   */
  endBatchEdit(): void;

  /**
   * Register a watcher
   * @returns Unsubscribe function
   */
  addWatcher(watcher: EditingStateWatcher): Unsubscribe;

  /** Unregister a watcher */
  removeWatcher(watcher: EditingStateWatcher): void;
}
