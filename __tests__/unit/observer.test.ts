import { describe, it, expect } from 'vitest';

import { EventBus } from '../../src/events/eventBus.js';
import { attachObserver, stateUpdate } from '../../src/monitor/observer.js';
import type { ObserverConnection } from '../../src/monitor/observer.js';
import type { LogEvent } from '../../src/schema/index.js';
import { FIXED_TIME } from '../helpers/fakeRunner.js';

function logEvent(message: string): LogEvent {
  return { type: 'log', runId: 'run-1', timestamp: FIXED_TIME, data: { level: 'info', message } };
}

class RecordingConnection implements ObserverConnection {
  readonly sent: unknown[] = [];
  private readonly failAfter: number;

  constructor(failAfter = Number.POSITIVE_INFINITY) {
    this.failAfter = failAfter;
  }

  send(payload: string): Promise<void> {
    if (this.sent.length >= this.failAfter) return Promise.reject(new Error('socket closed'));
    this.sent.push(JSON.parse(payload));
    return Promise.resolve();
  }
}

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe('stateUpdate', () => {
  it('combines the aggregate state with the replay history', () => {
    const bus = new EventBus();
    bus.publish(logEvent('earlier'));

    const message = stateUpdate(bus, new Date(FIXED_TIME));

    expect(message.type).toBe('state_update');
    expect(message.timestamp).toBe(FIXED_TIME);
    expect(message.data.status).toBe('idle');
    expect(message.data.logs).toEqual([logEvent('earlier')]);
  });
});

describe('attachObserver', () => {
  it('sends the current state first, then live events', async () => {
    const bus = new EventBus();
    bus.publish(logEvent('before'));
    const connection = new RecordingConnection();

    const observer = attachObserver(bus, connection);
    bus.publish(logEvent('after'));
    await tick();
    observer.detach();
    await observer.done;

    expect(connection.sent).toHaveLength(2);
    expect(connection.sent[0]).toMatchObject({ type: 'state_update', data: { logs: [logEvent('before')] } });
    expect(connection.sent[1]).toEqual(logEvent('after'));
    expect(bus.subscriberCount).toBe(0);
  });

  it('drops a broken observer without affecting others', async () => {
    const bus = new EventBus();
    const healthy = new RecordingConnection();
    const broken = new RecordingConnection(1);
    const errors: unknown[] = [];

    const good = attachObserver(bus, healthy);
    const bad = attachObserver(bus, broken, (err) => errors.push(err));

    bus.publish(logEvent('one'));
    await bad.done;
    bus.publish(logEvent('two'));
    await tick();

    expect(errors).toHaveLength(1);
    expect(bus.subscriberCount).toBe(1);
    expect(healthy.sent.slice(1)).toEqual([logEvent('one'), logEvent('two')]);

    good.detach();
    await good.done;
  });
});
