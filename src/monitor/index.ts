export { attachObserver, stateUpdate } from './observer.js';
export type { ObserverConnection, ObserverMessage, StateUpdateMessage, AttachedObserver } from './observer.js';
export { startMonitorServer, handleHttp, wsConnection } from './server.js';
export type { MonitorServer, MonitorServerOptions } from './server.js';
