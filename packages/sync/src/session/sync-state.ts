import type { Address } from '../address/clean-address.js';

/**
 * An address waiting for delivery, tagged with the intent it belongs to.
 */
export interface PendingAddress {
  address: Address;
  /** Larger is newer; see {@link SyncState.nextIntent} */
  intent: number;
}

/**
 * Mutable per-session synchronization state, owned by exactly one SyncEngine.
 *
 * Invariant: `pendingRetryHandle` is only set while `pending` is set.
 * `epoch` changes on every session reset; completions that captured an older
 * epoch are discarded.
 */
export class SyncState {
  public enabled: boolean;
  public detectedRegister?: string;
  public failureEpisodeActive = false;
  public pending?: PendingAddress;
  public pendingRetryHandle?: NodeJS.Timeout;
  public epoch = 0;
  private latestIntentValue = 0;

  public constructor(enabled: boolean) {
    this.enabled = enabled;
  }

  public get pendingAddress(): Address | undefined {
    return this.pending?.address;
  }

  /** Intent number of the most recent address the engine decided to send */
  public get latestIntent(): number {
    return this.latestIntentValue;
  }

  public nextIntent(): number {
    this.latestIntentValue += 1;
    return this.latestIntentValue;
  }

  public snapshot(): SyncStateSnapshot {
    return {
      enabled: this.enabled,
      detectedRegister: this.detectedRegister,
      failureEpisodeActive: this.failureEpisodeActive,
      pendingAddress: this.pending?.address,
      retryArmed: this.pendingRetryHandle !== undefined,
    };
  }
}

export interface SyncStateSnapshot {
  enabled: boolean;
  detectedRegister?: string;
  failureEpisodeActive: boolean;
  pendingAddress?: Address;
  retryArmed: boolean;
}
