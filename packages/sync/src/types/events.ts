import type { Address } from '../address/clean-address.js';

export type NotificationLevel = 'info' | 'warn' | 'error';

/**
 * A user-facing message. Hosts display these; everything else goes to the
 * event log only.
 */
export interface SyncNotification {
  level: NotificationLevel;
  message: string;
  sessionId?: string;
}

export type NotifyFn = (level: NotificationLevel, message: string) => void;

/**
 * Events published on the SyncController bus.
 */
export interface SyncEvents {
  notification: SyncNotification;
  registerDetected: { sessionId: string; register: string };
  forwarded: { sessionId: string; address: Address };
  forwardFailed: { sessionId: string; address: Address };
}

/**
 * Result of an explicit "sync the current frame" request.
 */
export type SyncOutcome = 'attempted' | 'no-session' | 'no-frame' | 'no-address';
