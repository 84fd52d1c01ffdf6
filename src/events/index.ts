export { EventBus } from './eventBus.js';
export type { EventBusOptions } from './eventBus.js';
export { Subscription } from './subscription.js';
export { INITIAL_MONITOR_STATE, reduceMonitorState } from './monitorState.js';
