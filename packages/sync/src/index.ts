export { cleanAddress, type Address } from './address/clean-address.js';
export {
  HttpAddressForwarder,
  buildGotoUrl,
  type IAddressForwarder,
  type HttpAddressForwarderOptions,
} from './forwarder/address-forwarder.js';
export { RetryScheduler, type RetrySchedulerOptions } from './retry-scheduler/index.js';
export {
  ConnectionFailureReporter,
  formatConnectionFailureMessage,
} from './failure-reporter.js';
export {
  RegisterResolver,
  readRegister,
  type RegisterResolverOptions,
} from './register-resolver.js';
export {
  SyncState,
  type PendingAddress,
  type SyncStateSnapshot,
} from './session/sync-state.js';
export { terminateSession, suspendSync, resumeSync } from './session/session-lifecycle.js';
export {
  SyncEngine,
  type SyncEngineHooks,
  type SyncEngineOptions,
} from './sync-engine.js';
export {
  SyncController,
  SYNC_OUTCOME_WARNINGS,
  type SyncControllerOptions,
  type SyncStatus,
} from './sync-controller.js';
export {
  DapSessionHost,
  bindDapSession,
  type DapClientLike,
  type DapEventName,
  type DapSessionHostOptions,
  type DapSyncBinding,
} from './dap/dap-session-host.js';
export {
  DapProxy,
  type DapMessageSink,
  type DapProxyOptions,
  type DapRequestInterceptor,
  type InterceptedResult,
} from './dap/dap-proxy.js';
export { DapMessageReader, encodeDapMessage } from './dap/dap-message-reader.js';
export type {
  DebugSessionHost,
  FrameInfo,
  NotificationLevel,
  NotifyFn,
  SyncEvents,
  SyncNotification,
  SyncOutcome,
} from './types/index.js';
