import type { LogEvent, MonitorEvent, MonitorState } from '../schema/index.js';
import type { EventBus } from '../events/eventBus.js';
import { errorMessage } from '../core/errors.js';

// ── Wire format ──────────────────────────────────────────────

export interface StateUpdateMessage {
  type: 'state_update';
  timestamp: string;
  data: MonitorState & { logs: readonly LogEvent[] };
}

export type ObserverMessage = StateUpdateMessage | MonitorEvent;

/** One live observer, whatever the transport. `send` rejects once broken. */
export interface ObserverConnection {
  send(payload: string): Promise<void>;
}

export interface AttachedObserver {
  /** Resolves when delivery stops (detached or connection broken). */
  readonly done: Promise<void>;
  detach(): void;
  readonly dropped: number;
}

export function stateUpdate(bus: EventBus, now: Date = new Date()): StateUpdateMessage {
  return {
    type: 'state_update',
    timestamp: now.toISOString(),
    data: { ...bus.snapshot(), logs: bus.replay() },
  };
}

/**
 * Attach an observer: push the aggregate state and recent log history, then
 * stream every subsequent event. A failing send detaches only this
 * observer.
 */
export function attachObserver(
  bus: EventBus,
  connection: ObserverConnection,
  onError?: (err: unknown) => void,
): AttachedObserver {
  // Subscribe before sending the snapshot so nothing published in between
  // is missed.
  const subscription = bus.subscribe();
  const initial = stateUpdate(bus);

  const pump = async (): Promise<void> => {
    try {
      await connection.send(JSON.stringify(initial));
      for await (const event of subscription) {
        await connection.send(JSON.stringify(event));
      }
    } catch (err) {
      onError?.(err);
    } finally {
      bus.unsubscribe(subscription);
    }
  };

  return {
    done: pump(),
    detach: () => {
      bus.unsubscribe(subscription);
    },
    get dropped() {
      return subscription.dropped;
    },
  };
}

export function describeDeliveryError(err: unknown): string {
  return `Observer delivery failed: ${errorMessage(err)}`;
}
