import { logError, logEvent } from '@disasm-sync/core';
import type { IAddressForwarder } from '../forwarder/address-forwarder.js';
import type { PendingAddress, SyncState } from '../session/sync-state.js';

export interface RetrySchedulerOptions {
  state: SyncState;
  forwarder: IAddressForwarder;
  /** Read when arming, so a replaced configuration applies to the next timer */
  getIntervalMs: () => number;
  /** Called after a retry delivered `attempt` */
  onDelivered: (attempt: PendingAddress) => void;
}

/**
 * Re-sends the latest pending address on a fixed interval.
 *
 * Owns at most one single-shot timer per session. Each firing forwards
 * whatever address is pending *at that moment*, so a newer address that
 * replaced the pending one while the timer ran is the one that gets sent.
 * There is no backoff and no attempt limit: the loop ends on delivery,
 * {@link cancel}, disable, or session reset.
 * @example
 * ```typescript
 * const scheduler = new RetryScheduler({
 *   state,
 *   forwarder,
 *   getIntervalMs: () => 3000,
 *   onDelivered: () => reporter.clear(),
 * });
 *
 * scheduler.schedule({ address: '0x401020', intent: state.nextIntent() });
 * ```
 * @public
 */
export class RetryScheduler {
  public constructor(private readonly options: RetrySchedulerOptions) {}

  public get hasPendingRetry(): boolean {
    return this.options.state.pendingRetryHandle !== undefined;
  }

  /**
   * Replaces the pending address and (re)arms the timer.
   *
   * Any timer already armed is cleared first.
   */
  public schedule(pending: PendingAddress): void {
    const { state } = this.options;
    this.clearTimer();

    state.pending = pending;
    const epoch = state.epoch;
    const delay = this.options.getIntervalMs();

    state.pendingRetryHandle = setTimeout(() => {
      state.pendingRetryHandle = undefined;
      this.fire(epoch).catch((error: unknown) => {
        logError('retry-scheduler:fire', error);
      });
    }, delay);

    logEvent('debug', 'retry-scheduler:armed', {
      address: pending.address,
      intent: pending.intent,
      delay,
    });
  }

  /**
   * Clears the timer and forgets the pending address.
   */
  public cancel(): void {
    this.clearTimer();
    this.options.state.pending = undefined;
  }

  private clearTimer(): void {
    const { state } = this.options;
    if (state.pendingRetryHandle) {
      clearTimeout(state.pendingRetryHandle);
      state.pendingRetryHandle = undefined;
    }
  }

  private async fire(epoch: number): Promise<void> {
    const { state, forwarder } = this.options;
    if (state.epoch !== epoch || !state.enabled || !state.pending) {
      return;
    }

    const attempt = state.pending;
    const delivered = await forwarder.forward(attempt.address);

    // Session was reset while the request was in flight
    if (state.epoch !== epoch) {
      return;
    }

    if (delivered) {
      if (state.pending && state.pending.intent <= attempt.intent) {
        this.cancel();
      }
      logEvent('info', 'retry-scheduler:delivered', { address: attempt.address });
      this.options.onDelivered(attempt);
      return;
    }

    if (state.pending && state.enabled) {
      this.schedule(state.pending);
    }
  }
}
