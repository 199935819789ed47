/**
 * Broadcast hub: fans observer events out to listeners.
 *
 * `publish` only stamps and enqueues, so the registry and dispatcher never
 * wait on an observer. The queue drains on a later turn of the event loop;
 * a listener that throws or rejects is logged and does not affect the
 * others. When observers fall far behind, the oldest queued events are
 * dropped.
 */

import type { Logger } from "pino";
import type { ObserverEvent, ObserverEventInput } from "@edge-fleet/shared";

export type ObserverListener = (event: ObserverEvent) => void | Promise<void>;

/** What producers of observer events depend on */
export interface EventPublisher {
  publish(event: ObserverEventInput): void;
}

export interface BroadcastHubOptions {
  logger: Logger;
  /** Maximum queued events before the oldest are dropped (default 10000) */
  maxQueueSize?: number;
  clock?: () => Date;
}

export class BroadcastHub implements EventPublisher {
  private readonly logger: Logger;
  private readonly maxQueueSize: number;
  private readonly clock: () => Date;

  private queue: ObserverEvent[] = [];
  private listeners = new Set<ObserverListener>();
  private drainScheduled = false;
  private idleWaiters: Array<() => void> = [];
  private dropped = 0;

  constructor(options: BroadcastHubOptions) {
    this.logger = options.logger.child({ component: "broadcast-hub" });
    this.maxQueueSize = options.maxQueueSize ?? 10_000;
    this.clock = options.clock ?? (() => new Date());
  }

  publish(input: ObserverEventInput): void {
    const event: ObserverEvent = { ...input, timestamp: this.clock().toISOString() };
    this.queue.push(event);

    if (this.queue.length > this.maxQueueSize) {
      this.queue.shift();
      this.dropped++;
      if (this.dropped === 1 || this.dropped % 1000 === 0) {
        this.logger.warn({ dropped: this.dropped }, "Observer queue full, dropping oldest events");
      }
    }

    this.scheduleDrain();
  }

  /** Register a listener; returns the function that removes it */
  subscribe(listener: ObserverListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  get pending(): number {
    return this.queue.length;
  }

  /** Resolves once every event published so far has been delivered */
  idle(): Promise<void> {
    if (this.queue.length === 0 && !this.drainScheduled) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) return;
    this.drainScheduled = true;
    setImmediate(() => this.drain());
  }

  private drain(): void {
    this.drainScheduled = false;
    const batch = this.queue;
    this.queue = [];

    for (const event of batch) {
      for (const listener of this.listeners) {
        this.deliver(listener, event);
      }
    }

    if (this.queue.length > 0) {
      // Listeners published more events while we were delivering
      this.scheduleDrain();
      return;
    }

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private deliver(listener: ObserverListener, event: ObserverEvent): void {
    try {
      const result = listener(event);
      if (result instanceof Promise) {
        result.catch((err: unknown) => {
          this.logger.error({ err, type: event.type }, "Observer listener rejected");
        });
      }
    } catch (err) {
      this.logger.error({ err, type: event.type }, "Observer listener threw");
    }
  }
}
