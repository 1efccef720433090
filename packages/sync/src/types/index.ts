export type { DebugSessionHost, FrameInfo } from './debug-host.js';
export type {
  NotificationLevel,
  NotifyFn,
  SyncEvents,
  SyncNotification,
  SyncOutcome,
} from './events.js';
