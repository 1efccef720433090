import type { RetryScheduler } from '../retry-scheduler/index.js';
import type { SyncState } from './sync-state.js';

/**
 * Returns the session state to empty: no pending address, no armed timer,
 * no detected register, no failure episode. Bumps the epoch so completions
 * still in flight are discarded.
 */
export function terminateSession(state: SyncState, scheduler: RetryScheduler): void {
  scheduler.cancel();
  state.failureEpisodeActive = false;
  state.detectedRegister = undefined;
  state.epoch += 1;
}

/**
 * Synchronization toggled off: drops the retry and the pending address.
 * The detected register belongs to the session and the failure episode
 * to the connection, so both survive.
 */
export function suspendSync(state: SyncState, scheduler: RetryScheduler): void {
  scheduler.cancel();
  state.enabled = false;
}

/**
 * Synchronization toggled on.
 */
export function resumeSync(state: SyncState): void {
  state.enabled = true;
}
