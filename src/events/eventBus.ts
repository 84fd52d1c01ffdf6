import type { LogEvent, MonitorEvent, MonitorState } from '../schema/index.js';
import { isLogEvent } from '../schema/index.js';
import { LIMITS } from '../config/defaults.js';
import { Subscription } from './subscription.js';
import { INITIAL_MONITOR_STATE, reduceMonitorState } from './monitorState.js';

export interface EventBusOptions {
  /** How many log lines to keep for late joiners. */
  historySize?: number | undefined;
  /** Per-subscriber queue bound. */
  queueSize?: number | undefined;
}

/**
 * In-process fan-out for run events. Publishing is synchronous and O(n) in
 * subscribers; each subscriber drains its own bounded queue at its own pace.
 * The bus is the only writer of the aggregate state and the log history;
 * readers get frozen snapshots.
 */
export class EventBus {
  private readonly historySize: number;
  private readonly queueSize: number;
  private readonly subscribers = new Map<number, Subscription>();
  private history: readonly LogEvent[] = Object.freeze([]);
  private state: MonitorState = INITIAL_MONITOR_STATE;
  private nextId = 1;

  constructor(options: EventBusOptions = {}) {
    this.historySize = options.historySize ?? LIMITS.LOG_HISTORY;
    this.queueSize = options.queueSize ?? LIMITS.SUBSCRIBER_QUEUE;
  }

  get subscriberCount(): number {
    return this.subscribers.size;
  }

  publish(event: MonitorEvent): void {
    this.state = Object.freeze(reduceMonitorState(this.state, event));

    if (isLogEvent(event)) {
      const next = [...this.history, event];
      this.history = Object.freeze(
        next.length > this.historySize ? next.slice(next.length - this.historySize) : next,
      );
    }

    for (const sub of this.subscribers.values()) {
      sub.push(event);
    }
  }

  subscribe(): Subscription {
    const sub = new Subscription(this.nextId++, this.queueSize, (closed) => {
      this.subscribers.delete(closed.id);
    });
    this.subscribers.set(sub.id, sub);
    return sub;
  }

  unsubscribe(sub: Subscription): void {
    // close() calls back into the map removal.
    sub.close();
    this.subscribers.delete(sub.id);
  }

  /** Most recent log lines, oldest first. */
  replay(): readonly LogEvent[] {
    return this.history;
  }

  snapshot(): MonitorState {
    return this.state;
  }
}
