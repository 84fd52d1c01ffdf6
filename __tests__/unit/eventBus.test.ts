import { describe, it, expect } from 'vitest';

import { EventBus } from '../../src/events/eventBus.js';
import type { LogEvent, MonitorEvent } from '../../src/schema/index.js';
import { FIXED_TIME } from '../helpers/fakeRunner.js';

function logEvent(message: string, runId = 'run-1'): LogEvent {
  return { type: 'log', runId, timestamp: FIXED_TIME, data: { level: 'info', message } };
}

function messages(events: readonly MonitorEvent[]): string[] {
  return events.map((e) => (e.type === 'log' ? e.data.message : e.type));
}

describe('EventBus fan-out', () => {
  it('delivers every event to every subscriber in publish order', () => {
    const bus = new EventBus();
    const a = bus.subscribe();
    const b = bus.subscribe();

    bus.publish(logEvent('one'));
    bus.publish(logEvent('two'));

    expect(messages(a.drain())).toEqual(['one', 'two']);
    expect(messages(b.drain())).toEqual(['one', 'two']);
  });

  it('keeps delivering to the others after one unsubscribes mid-run', () => {
    const bus = new EventBus();
    const a = bus.subscribe();
    const b = bus.subscribe();

    bus.publish(logEvent('one'));
    bus.unsubscribe(a);
    bus.publish(logEvent('two'));

    expect(a.closed).toBe(true);
    expect(a.drain()).toEqual([]);
    expect(messages(b.drain())).toEqual(['one', 'two']);
    expect(bus.subscriberCount).toBe(1);
  });

  it('accepts publishes with no subscribers', () => {
    const bus = new EventBus();
    bus.publish(logEvent('alone'));
    expect(bus.subscriberCount).toBe(0);
    expect(messages(bus.replay())).toEqual(['alone']);
  });

  it('hands waiting async iterators the next event', async () => {
    const bus = new EventBus();
    const sub = bus.subscribe();
    const pending = sub.next();

    bus.publish(logEvent('wake'));

    const result = await pending;
    expect(result.done).toBe(false);
    expect(result.value).toEqual(logEvent('wake'));
  });

  it('ends iteration when the subscription closes', async () => {
    const bus = new EventBus();
    const sub = bus.subscribe();
    const received: string[] = [];

    const consumer = (async () => {
      for await (const event of sub) received.push(event.type);
    })();

    bus.publish(logEvent('x'));
    await new Promise((resolve) => setTimeout(resolve, 0));
    bus.unsubscribe(sub);
    await consumer;

    expect(received).toEqual(['log']);
    expect(bus.subscriberCount).toBe(0);
  });
});

describe('EventBus bounded queues', () => {
  it('drops the oldest unread event on overflow and counts it', () => {
    const bus = new EventBus({ queueSize: 3 });
    const slow = bus.subscribe();
    const fast = bus.subscribe();

    for (const m of ['1', '2', '3', '4', '5']) {
      bus.publish(logEvent(m));
      fast.drain();
    }

    expect(messages(slow.drain())).toEqual(['3', '4', '5']);
    expect(slow.dropped).toBe(2);
    expect(fast.dropped).toBe(0);
  });
});

describe('EventBus replay history', () => {
  it('keeps exactly the last 100 log lines, oldest first', () => {
    const bus = new EventBus();
    for (let i = 1; i <= 150; i++) bus.publish(logEvent(`line ${String(i)}`));

    const history = bus.replay();
    expect(history).toHaveLength(100);
    expect(history[0]?.data.message).toBe('line 51');
    expect(history[99]?.data.message).toBe('line 150');
  });

  it('retains only log events', () => {
    const bus = new EventBus();
    bus.publish({
      type: 'step_started',
      runId: 'run-1',
      timestamp: FIXED_TIME,
      data: { index: 0, total: 1, description: 'x' },
    });
    expect(bus.replay()).toEqual([]);
  });

  it('hands out snapshots that later publishes do not change', () => {
    const bus = new EventBus({ historySize: 2 });
    bus.publish(logEvent('a'));
    const before = bus.replay();
    bus.publish(logEvent('b'));
    bus.publish(logEvent('c'));

    expect(messages(before)).toEqual(['a']);
    expect(messages(bus.replay())).toEqual(['b', 'c']);
    expect(Object.isFrozen(before)).toBe(true);
  });
});

describe('EventBus state snapshot', () => {
  it('folds events into a frozen aggregate', () => {
    const bus = new EventBus();
    const initial = bus.snapshot();
    bus.publish({
      type: 'plan_set',
      runId: 'run-1',
      timestamp: FIXED_TIME,
      data: { totalSteps: 1, steps: [{ index: 0, description: 'x', critical: true }] },
    });

    expect(initial.status).toBe('idle');
    expect(bus.snapshot().status).toBe('planning');
    expect(bus.snapshot().totalSteps).toBe(1);
    expect(Object.isFrozen(bus.snapshot())).toBe(true);
  });
});
