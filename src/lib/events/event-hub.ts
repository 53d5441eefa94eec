import { v4 as uuidv4 } from 'uuid';
import type { HubEvent, SubscriptionFilter } from '../types';
import { isTerminal } from '../types';
import { createLogger, type Logger } from '../logger';

const DEFAULT_BUFFER_SIZE = 256;
const DEFAULT_GRACE_MS = 30 * 1000;

export interface EventHubOptions {
  /** Undelivered events kept per subscriber before the oldest is dropped */
  bufferSize?: number;
  /** Delay between a task's terminal update and closing the subscriptions bound to it */
  graceMs?: number;
  logger?: Logger;
}

const DONE: IteratorReturnResult<void> = Object.freeze({ value: undefined, done: true as const });

/**
 * One observer's view of the hub. Consumed with `for await`, or `next()` directly.
 */
export class Subscription implements AsyncIterable<HubEvent>, AsyncIterator<HubEvent, void, void> {
  readonly id = uuidv4();
  private readonly buffer: HubEvent[] = [];
  private readonly waiters: Array<(result: IteratorResult<HubEvent, void>) => void> = [];
  private closeTimer: ReturnType<typeof setTimeout> | null = null;
  private closed = false;
  private droppedCount = 0;

  constructor(
    readonly filter: SubscriptionFilter,
    private readonly maxBuffer: number,
    private readonly onClose: (subscription: Subscription) => void
  ) {}

  get isClosed(): boolean {
    return this.closed;
  }

  /** Events lost to buffer overflow */
  get dropped(): number {
    return this.droppedCount;
  }

  /** Events buffered and not yet consumed */
  get pending(): number {
    return this.buffer.length;
  }

  matches(event: HubEvent): boolean {
    return this.filter === 'all' || this.filter === event.taskId;
  }

  /**
   * Hand over a copy of the event, so no two observers share an object
   */
  deliver(event: HubEvent): void {
    if (this.closed) return;

    const copy = structuredClone(event);
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter({ value: copy, done: false });
      return;
    }

    this.buffer.push(copy);
    if (this.buffer.length > this.maxBuffer) {
      this.buffer.shift();
      this.droppedCount++;
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<HubEvent, void, void> {
    return this;
  }

  next(): Promise<IteratorResult<HubEvent, void>> {
    const event = this.buffer.shift();
    if (event) {
      return Promise.resolve({ value: event, done: false });
    }
    if (this.closed) {
      return Promise.resolve(DONE);
    }
    // Overlapping calls are answered in call order
    return new Promise(resolve => {
      this.waiters.push(resolve);
    });
  }

  return(): Promise<IteratorResult<HubEvent, void>> {
    this.close();
    this.buffer.length = 0;
    return Promise.resolve(DONE);
  }

  /**
   * Stop receiving events. Already buffered events can still be drained.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    if (this.closeTimer) {
      clearTimeout(this.closeTimer);
      this.closeTimer = null;
    }
    this.onClose(this);

    for (const waiter of this.waiters.splice(0)) {
      waiter(DONE);
    }
  }

  scheduleClose(delayMs: number): void {
    if (this.closed || this.closeTimer) return;

    if (delayMs <= 0) {
      this.close();
      return;
    }

    this.closeTimer = setTimeout(() => this.close(), delayMs);
    this.closeTimer.unref();
  }
}

/**
 * Process-wide fan-out of task updates and found records.
 * Publishing never waits on a subscriber and nothing is kept for late subscribers.
 */
export class EventHub {
  private readonly subscriptions = new Set<Subscription>();
  private readonly bufferSize: number;
  private readonly graceMs: number;
  private readonly logger: Logger;
  private closed = false;

  constructor(options: EventHubOptions = {}) {
    this.bufferSize = Math.max(1, options.bufferSize ?? DEFAULT_BUFFER_SIZE);
    this.graceMs = Math.max(0, options.graceMs ?? DEFAULT_GRACE_MS);
    this.logger = options.logger ?? createLogger('event-hub');
  }

  subscribe(filter: SubscriptionFilter = 'all'): Subscription {
    const subscription = new Subscription(filter, this.bufferSize, closed => {
      this.subscriptions.delete(closed);
      this.logger.debug({ subscriptionId: closed.id, dropped: closed.dropped }, 'Subscription closed');
    });

    if (this.closed) {
      subscription.close();
      return subscription;
    }

    this.subscriptions.add(subscription);
    this.logger.debug({ subscriptionId: subscription.id, filter }, 'Subscription opened');
    return subscription;
  }

  unsubscribe(subscription: Subscription): void {
    subscription.close();
  }

  /**
   * Deliver an event to every matching subscriber. Returns the number of deliveries.
   */
  publish(event: HubEvent): number {
    if (this.closed) return 0;

    // Snapshot: a consumer may unsubscribe while we iterate
    const targets = Array.from(this.subscriptions).filter(subscription => subscription.matches(event));
    for (const subscription of targets) {
      const droppedBefore = subscription.dropped;
      subscription.deliver(event);
      if (subscription.dropped > droppedBefore) {
        this.logger.warn({ subscriptionId: subscription.id, dropped: subscription.dropped }, 'Slow subscriber, oldest event dropped');
      }
    }

    if (event.type === 'task_update' && isTerminal(event.status)) {
      for (const subscription of targets) {
        if (subscription.filter === event.taskId) {
          subscription.scheduleClose(this.graceMs);
        }
      }
    }

    return targets.length;
  }

  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const subscription of Array.from(this.subscriptions)) {
      subscription.close();
    }
  }
}
