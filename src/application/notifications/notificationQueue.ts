import type { NotificationRequest } from '@/domain/notifications/types';
import { createLogger, type Logger } from '@/shared/logging/logger';

/**
 * Wakes a consumer blocked on an empty queue during shutdown. Never handed
 * to the worker as real work.
 */
export const QUEUE_SHUTDOWN: unique symbol = Symbol('notification-queue-shutdown');

export type QueueEntry = NotificationRequest | typeof QUEUE_SHUTDOWN;

type Taker = (entry: QueueEntry) => void;

/**
 * Unbounded FIFO between notification producers and the single worker.
 *
 * Every entry handed out by `dequeue` (the shutdown marker included) must be
 * acknowledged with exactly one `markProcessed`; `drain` resolves once the
 * count of unacknowledged entries reaches zero.
 */
export class NotificationQueue {
  private readonly items: QueueEntry[] = [];
  private readonly takers: Taker[] = [];
  private drainWaiters: Array<() => void> = [];
  private unfinished = 0;
  private closed = false;

  constructor(private readonly log: Logger = createLogger('Notify', 'Queue')) {}

  public get size(): number {
    return this.items.length;
  }

  /** Entries enqueued but not yet acknowledged. */
  public get pending(): number {
    return this.unfinished;
  }

  public get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Never blocks. Returns false (and drops the request) once the queue is closed.
   */
  public enqueue(request: NotificationRequest): boolean {
    if (this.closed) {
      this.log.warn('notification dropped, queue closed', { target: request.target });
      return false;
    }
    this.push(Object.freeze({ target: request.target, text: request.text }));
    this.log.debug('notification queued', { target: request.target, size: this.items.length });
    return true;
  }

  /**
   * Queues the shutdown marker. Allowed after `close()`.
   */
  public pushShutdown(): void {
    this.push(QUEUE_SHUTDOWN);
  }

  /** Refuses further requests; entries already queued stay. */
  public close(): void {
    this.closed = true;
  }

  /**
   * Resolves with the oldest entry, or null when nothing arrived within `timeoutMs`.
   */
  public dequeue(timeoutMs: number): Promise<QueueEntry | null> {
    const next = this.items.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    return new Promise<QueueEntry | null>((resolve) => {
      const taker: Taker = (entry) => {
        clearTimeout(timer);
        resolve(entry);
      };
      const timer = setTimeout(() => {
        const index = this.takers.indexOf(taker);
        if (index >= 0) {
          this.takers.splice(index, 1);
        }
        resolve(null);
      }, Math.max(0, timeoutMs));
      this.takers.push(taker);
    });
  }

  public markProcessed(): void {
    if (this.unfinished <= 0) {
      throw new Error('markProcessed called more times than entries were queued');
    }
    this.unfinished -= 1;
    if (this.unfinished === 0) {
      const waiters = this.drainWaiters;
      this.drainWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }

  /**
   * Resolves when every queued entry, including ones added after the call,
   * has been acknowledged.
   */
  public drain(): Promise<void> {
    if (this.unfinished === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  /**
   * Removes and acknowledges everything still queued. Returns the real
   * requests that were discarded, oldest first.
   */
  public discardPending(): NotificationRequest[] {
    const discarded: NotificationRequest[] = [];
    while (this.items.length > 0) {
      const entry = this.items.shift();
      if (entry === undefined) {
        break;
      }
      if (entry !== QUEUE_SHUTDOWN) {
        discarded.push(entry);
      }
      this.markProcessed();
    }
    return discarded;
  }

  private push(entry: QueueEntry): void {
    this.unfinished += 1;
    const taker = this.takers.shift();
    if (taker) {
      taker(entry);
      return;
    }
    this.items.push(entry);
  }
}
