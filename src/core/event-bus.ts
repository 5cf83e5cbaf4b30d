/**
 * Tickframe Event Bus
 *
 * In-memory publish/subscribe for ad hoc inter-plugin notifications,
 * orthogonal to the Data Bus. Plugins `post` into a per-tick queue; the
 * runtime `drain`s it once per tick after every update has run and hands
 * each event to every active plugin. Host code can observe traffic through
 * `subscribe`, and the runtime announces lifecycle changes with `emit`.
 *
 * Properties:
 * - Ordered: events carry monotonic sequence numbers
 * - Deferred: posted events are never delivered mid-update
 * - Bounded: history keeps only the newest N delivered/emitted events
 */

import type { Logger, PluginName, RuntimeEvent } from "../plugins/api.js";
import { createLogger } from "./logger.js";

// ─── Types ──────────────────────────────────────────────────────────

/** Callback for host-side subscriptions */
export type EventHandler<T = unknown> = (event: RuntimeEvent<T>) => void;

/** Subscription handle — call to unsubscribe */
export type Unsubscribe = () => void;

/** Wildcard topic that receives every event */
export const WILDCARD = "*";

export const DEFAULT_HISTORY_LIMIT = 1000;

export interface EventBusOptions {
  /** Maximum retained history entries */
  historyLimit?: number;
  /** Supplies the current tick number */
  clock?: () => number;
  log?: Logger;
}

export interface EventBus {
  /** Queue an event for delivery at the end of the current tick's updates */
  post<T>(topic: string, source: PluginName, data: T): number;

  /** Remove and return every queued event, notifying subscribers */
  drain(): readonly RuntimeEvent[];

  /** Notify subscribers immediately (runtime lifecycle announcements) */
  emit<T>(topic: string, source: PluginName, data: T): number;

  /**
   * Observe events matching a topic pattern.
   * "*" matches everything, "gps.*" matches "gps.fix", "gps.fix.lost", …
   */
  subscribe<T = unknown>(topic: string, handler: EventHandler<T>): Unsubscribe;

  /** Events queued but not yet delivered */
  pending(): readonly RuntimeEvent[];

  /** Drop queued events without delivering them; returns how many were dropped */
  discard(): number;

  /** Delivered and emitted events, oldest first */
  history(): readonly RuntimeEvent[];

  /** Drop queue, history and subscriptions; reset the sequence counter */
  reset(): void;
}

// ─── Implementation ─────────────────────────────────────────────────

interface Subscription {
  readonly topic: string;
  readonly handler: EventHandler<unknown>;
}

export class TickEventBus implements EventBus {
  private sequence = 0;
  private queue: RuntimeEvent[] = [];
  private readonly log: RuntimeEvent[] = [];
  private readonly subscriptions: Subscription[] = [];
  private readonly historyLimit: number;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(options: EventBusOptions = {}) {
    this.historyLimit = Math.max(0, options.historyLimit ?? DEFAULT_HISTORY_LIMIT);
    this.clock = options.clock ?? (() => 0);
    this.logger = options.log ?? createLogger("event-bus");
  }

  post<T>(topic: string, source: PluginName, data: T): number {
    const event = this.envelope(topic, source, data);
    this.queue.push(event);
    return event.sequence;
  }

  drain(): readonly RuntimeEvent[] {
    const batch = this.queue;
    this.queue = [];
    for (const event of batch) {
      this.record(event);
      this.dispatch(event);
    }
    return batch;
  }

  emit<T>(topic: string, source: PluginName, data: T): number {
    const event = this.envelope(topic, source, data);
    this.record(event);
    this.dispatch(event);
    return event.sequence;
  }

  subscribe<T = unknown>(topic: string, handler: EventHandler<T>): Unsubscribe {
    const sub: Subscription = { topic, handler: handler as EventHandler<unknown> };
    this.subscriptions.push(sub);

    return () => {
      const idx = this.subscriptions.indexOf(sub);
      if (idx !== -1) this.subscriptions.splice(idx, 1);
    };
  }

  pending(): readonly RuntimeEvent[] {
    return [...this.queue];
  }

  discard(): number {
    const dropped = this.queue.length;
    this.queue = [];
    return dropped;
  }

  history(): readonly RuntimeEvent[] {
    return [...this.log];
  }

  reset(): void {
    this.sequence = 0;
    this.queue = [];
    this.log.length = 0;
    this.subscriptions.length = 0;
  }

  // ── Internal ────────────────────────────────────────────────────

  private envelope<T>(topic: string, source: PluginName, data: T): RuntimeEvent {
    return {
      topic,
      source,
      tick: this.clock(),
      sequence: ++this.sequence,
      timestamp: new Date().toISOString(),
      data,
    };
  }

  private record(event: RuntimeEvent): void {
    if (this.historyLimit === 0) return;
    this.log.push(event);
    if (this.log.length > this.historyLimit) {
      this.log.splice(0, this.log.length - this.historyLimit);
    }
  }

  private dispatch(event: RuntimeEvent): void {
    // Copy: a handler may unsubscribe while we iterate
    for (const sub of [...this.subscriptions]) {
      if (!matches(sub.topic, event.topic)) continue;
      try {
        sub.handler(event);
      } catch (err) {
        this.logger.error(`Subscriber threw for topic "${event.topic}"`, {
          error: String(err),
        });
      }
    }
  }
}

/**
 * Topic matching:
 * - "*" matches everything
 * - "gps.*" matches "gps.fix", "gps.fix.lost", etc.
 * - "gps.fix" matches exactly "gps.fix"
 */
export function matches(pattern: string, topic: string): boolean {
  if (pattern === WILDCARD) return true;
  if (pattern === topic) return true;
  if (pattern.endsWith(".*")) {
    const prefix = pattern.slice(0, -2);
    return topic.startsWith(prefix + ".");
  }
  return false;
}
