import type { Logger } from '../types.js';

export const DEFAULT_PROGRESS_CAPACITY = 256;

export interface ProgressChannelOptions<T> {
  /** Queued events beyond this count push out the oldest droppable one. */
  capacity?: number;
  isDroppable?: (event: T) => boolean;
  logger?: Logger;
}

/**
 * Hands events to a listener on a later tick, in push order, without ever blocking the producer.
 * Non-droppable events are always delivered; droppable ones may be coalesced away under back-pressure.
 */
export class ProgressChannel<T> {
  private queue: T[] = [];
  private scheduled = false;
  private idleWaiters: (() => void)[] = [];
  private readonly capacity: number;
  private readonly isDroppable: (event: T) => boolean;
  private readonly logger: Logger;
  dropped = 0;

  constructor(private readonly listener: (event: T) => void, options: ProgressChannelOptions<T> = {}) {
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_PROGRESS_CAPACITY);
    this.isDroppable = options.isDroppable ?? (() => false);
    this.logger = options.logger ?? console;
  }

  get pending(): number {
    return this.queue.length;
  }

  push(event: T): boolean {
    if (this.queue.length >= this.capacity) {
      const oldest = this.queue.findIndex(this.isDroppable);
      if (oldest !== -1) {
        this.queue.splice(oldest, 1);
        this.dropped++;
      } else if (this.isDroppable(event)) {
        this.dropped++;
        return false;
      }
    }
    this.queue.push(event);
    this.schedule();
    return true;
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    setImmediate(() => this.deliver());
  }

  private deliver(): void {
    this.scheduled = false;
    const batch = this.queue;
    this.queue = [];

    for (const event of batch) {
      try {
        this.listener(event);
      } catch (error) {
        this.logger.error('[ProgressChannel] Listener threw:', error);
      }
    }

    if (this.queue.length > 0) {
      this.schedule();
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  /** Resolves once everything pushed so far has been delivered. */
  drain(): Promise<void> {
    if (this.queue.length === 0 && !this.scheduled) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }
}
