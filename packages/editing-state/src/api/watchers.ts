import type { EditingStateChange, EditingStateWatcher } from '../types/index.js';
import type { Logger } from '../logger.js';

const FORCED_CHANGE: EditingStateChange = {
  textChanged: true,
  selectionChanged: true,
  composingRegionChanged: true,
};

/**
 * Watcher list with deferred registration
 *
 * Watchers added during a batch edit wait in a pending list: they are
 * notified once, forcibly, when the batch ends and only then join the
 * active list. Notification always iterates over a copy of the active list.
 */
export class WatcherRegistry {
  private active: EditingStateWatcher[] = [];
  private pending: EditingStateWatcher[] = [];
  private notificationDepth = 0;

  constructor(private readonly logger: Logger) {}

  /** Whether a watcher callback is currently running */
  get isNotifying(): boolean {
    return this.notificationDepth > 0;
  }

  /** Number of active (non-pending) watchers */
  get listenerCount(): number {
    return this.active.length;
  }

  add(watcher: EditingStateWatcher, deferred: boolean): void {
    if (deferred) {
      this.pending.push(watcher);
    } else {
      this.active.push(watcher);
    }
  }

  remove(watcher: EditingStateWatcher): void {
    removeFirst(this.active, watcher);
    removeFirst(this.pending, watcher);
  }

  /**
   * Notify active watchers if any flag is set
   */
  notify(change: EditingStateChange): void {
    if (!change.textChanged && !change.selectionChanged && !change.composingRegionChanged) {
      return;
    }
    for (const watcher of [...this.active]) {
      this.deliver(watcher, change);
    }
  }

  /**
   * Notify pending watchers with every flag set
   */
  notifyPending(): void {
    for (const watcher of [...this.pending]) {
      this.deliver(watcher, FORCED_CHANGE);
    }
  }

  /**
   * Move pending watchers to the active list
   */
  flushPending(): void {
    this.active.push(...this.pending);
    this.pending = [];
  }

  private deliver(watcher: EditingStateWatcher, change: EditingStateChange): void {
    this.notificationDepth++;
    try {
      watcher({ ...change });
    } catch (error) {
      this.logger.error('Error in editing state watcher:', error);
    } finally {
      this.notificationDepth--;
    }
  }
}

function removeFirst(list: EditingStateWatcher[], watcher: EditingStateWatcher): void {
  const index = list.indexOf(watcher);
  if (index !== -1) {
    list.splice(index, 1);
  }
}
