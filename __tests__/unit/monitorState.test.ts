import { describe, it, expect } from 'vitest';

import { INITIAL_MONITOR_STATE, reduceMonitorState } from '../../src/events/monitorState.js';
import type { MonitorEvent, MonitorState } from '../../src/schema/index.js';

const T0 = '2026-01-01T00:00:00.000Z';
const T1 = '2026-01-01T00:01:00.000Z';

function fold(events: MonitorEvent[]): MonitorState {
  return events.reduce(reduceMonitorState, INITIAL_MONITOR_STATE);
}

const planSet: MonitorEvent = {
  type: 'plan_set',
  runId: 'run-1',
  timestamp: T0,
  data: {
    task: 'demo',
    totalSteps: 2,
    steps: [
      { index: 0, description: 'first', critical: true },
      { index: 1, description: 'second', critical: false },
    ],
  },
};

describe('reduceMonitorState', () => {
  it('resets to the new plan on plan_set', () => {
    const state = fold([planSet]);
    expect(state).toEqual({
      runId: 'run-1',
      task: 'demo',
      status: 'planning',
      plan: [
        { description: 'first', critical: true },
        { description: 'second', critical: false },
      ],
      currentStep: 0,
      totalSteps: 2,
      completedSteps: 0,
      outcomes: [null, null],
      successRate: null,
      startTime: T0,
      endTime: null,
    });
  });

  it('tracks a run through to completion', () => {
    const state = fold([
      planSet,
      { type: 'step_started', runId: 'run-1', timestamp: T0, data: { index: 0, total: 2, description: 'first' } },
      { type: 'step_completed', runId: 'run-1', timestamp: T0, data: { index: 0, outcome: 'success', exitCode: 0, durationMs: 5 } },
      { type: 'step_started', runId: 'run-1', timestamp: T0, data: { index: 1, total: 2, description: 'second' } },
      { type: 'step_completed', runId: 'run-1', timestamp: T0, data: { index: 1, outcome: 'timeout', exitCode: null, durationMs: 5 } },
      { type: 'run_completed', runId: 'run-1', timestamp: T1, data: { state: 'completed', totalSteps: 2, completedSteps: 1, successRate: '50.0%' } },
    ]);

    expect(state.status).toBe('completed');
    expect(state.currentStep).toBe(2);
    expect(state.outcomes).toEqual(['success', 'timeout']);
    expect(state.completedSteps).toBe(1);
    expect(state.successRate).toBe('50.0%');
    expect(state.endTime).toBe(T1);
  });

  it('ignores step events from another run', () => {
    const before = fold([planSet]);
    const after = reduceMonitorState(before, {
      type: 'step_started',
      runId: 'run-2',
      timestamp: T0,
      data: { index: 0, total: 2, description: 'other' },
    });
    expect(after).toBe(before);
  });

  it('leaves the aggregate alone for log lines', () => {
    const before = fold([planSet]);
    const after = reduceMonitorState(before, {
      type: 'log',
      runId: 'run-1',
      timestamp: T0,
      data: { level: 'info', message: 'hello' },
    });
    expect(after).toBe(before);
  });

  it('does not mutate the previous state', () => {
    const before = fold([planSet]);
    reduceMonitorState(before, {
      type: 'step_completed',
      runId: 'run-1',
      timestamp: T0,
      data: { index: 0, outcome: 'success', exitCode: 0, durationMs: 1 },
    });
    expect(before.outcomes).toEqual([null, null]);
    expect(before.completedSteps).toBe(0);
  });
});
