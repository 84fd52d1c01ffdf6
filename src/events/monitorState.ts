import type { MonitorEvent, MonitorState } from '../schema/index.js';

export const INITIAL_MONITOR_STATE: MonitorState = Object.freeze<MonitorState>({
  runId: null,
  task: null,
  status: 'idle',
  plan: [],
  currentStep: 0,
  totalSteps: 0,
  completedSteps: 0,
  outcomes: [],
  successRate: null,
  startTime: null,
  endTime: null,
});

/**
 * Fold one event into the dashboard's aggregate view. Pure; returns a new
 * object. Log lines do not change the aggregate (they live in the bus's
 * replay buffer).
 */
export function reduceMonitorState(state: MonitorState, event: MonitorEvent): MonitorState {
  switch (event.type) {
    case 'plan_set':
      return {
        runId: event.runId,
        task: event.data.task ?? null,
        status: 'planning',
        plan: event.data.steps.map((s) => ({ description: s.description, critical: s.critical })),
        currentStep: 0,
        totalSteps: event.data.totalSteps,
        completedSteps: 0,
        outcomes: event.data.steps.map(() => null),
        successRate: null,
        startTime: event.timestamp,
        endTime: null,
      };

    case 'step_started':
      if (event.runId !== state.runId) return state;
      return { ...state, status: 'running', currentStep: event.data.index + 1 };

    case 'step_completed': {
      if (event.runId !== state.runId) return state;
      const outcomes = [...state.outcomes];
      outcomes[event.data.index] = event.data.outcome;
      return {
        ...state,
        outcomes,
        completedSteps:
          state.completedSteps + (event.data.outcome === 'success' ? 1 : 0),
      };
    }

    case 'run_completed':
      if (event.runId !== state.runId) return state;
      return {
        ...state,
        status: event.data.state,
        completedSteps: event.data.completedSteps,
        successRate: event.data.successRate,
        endTime: event.timestamp,
      };

    case 'log':
      return state;
  }
}
