import { logError, logEvent } from '@disasm-sync/core';
import type { SyncConfig } from '@disasm-sync/schemas';
import type { Address } from './address/clean-address.js';
import type { IAddressForwarder } from './forwarder/address-forwarder.js';
import { ConnectionFailureReporter } from './failure-reporter.js';
import { RegisterResolver } from './register-resolver.js';
import { RetryScheduler } from './retry-scheduler/index.js';
import { SyncState, type SyncStateSnapshot } from './session/sync-state.js';
import { resumeSync, suspendSync, terminateSession } from './session/session-lifecycle.js';
import type {
  DebugSessionHost,
  FrameInfo,
  NotifyFn,
  SyncOutcome,
} from './types/index.js';

/**
 * Callbacks the engine reports through. The controller fans them out to
 * its event bus.
 */
export interface SyncEngineHooks {
  notify: NotifyFn;
  onRegisterDetected?: (register: string) => void;
  onForwarded?: (address: Address) => void;
  onForwardFailed?: (address: Address) => void;
}

export interface SyncEngineOptions {
  host: DebugSessionHost;
  forwarder: IAddressForwarder;
  getConfig: () => SyncConfig;
  enabled: boolean;
  hooks: SyncEngineHooks;
  /** Companion viewer script, named in the connection warning */
  scriptPath?: string;
}

/**
 * Keeps one debugging session's location mirrored in the viewer.
 *
 * On a stop or frame-selection event the engine picks the address source:
 * the innermost frame reads the program counter live through the
 * RegisterResolver, outer frames use the instruction pointer reference the
 * host already knows. The address is forwarded once; on failure the
 * ConnectionFailureReporter warns (once per episode) and the RetryScheduler
 * keeps re-sending the newest address until the viewer accepts it.
 *
 * Every public method returns a promise that settles when the triggered
 * attempt has completed. None of them rejects.
 * @public
 */
export class SyncEngine {
  public readonly state: SyncState;
  private readonly resolver: RegisterResolver;
  private readonly scheduler: RetryScheduler;
  private readonly reporter: ConnectionFailureReporter;

  public constructor(private readonly options: SyncEngineOptions) {
    this.state = new SyncState(options.enabled);

    this.resolver = new RegisterResolver({
      onDetected: (register) => {
        options.hooks.notify('info', `Detected PC register: ${register}`);
        options.hooks.onRegisterDetected?.(register);
      },
    });

    this.reporter = new ConnectionFailureReporter(
      this.state,
      options.hooks.notify,
      () => ({ config: options.getConfig(), scriptPath: options.scriptPath }),
    );

    this.scheduler = new RetryScheduler({
      state: this.state,
      forwarder: options.forwarder,
      getIntervalMs: () => options.getConfig().retryIntervalMs,
      onDelivered: (attempt) => {
        this.reporter.clear();
        options.hooks.onForwarded?.(attempt.address);
      },
    });
  }

  public get sessionId(): string {
    return this.options.host.id;
  }

  public get hasPendingRetry(): boolean {
    return this.scheduler.hasPendingRetry;
  }

  /**
   * The debuggee stopped; sync the host's current frame.
   */
  public handleStopped(): Promise<void> {
    if (!this.state.enabled) {
      return Promise.resolve();
    }
    return this.guard('stopped', async () => {
      await this.syncFrame(this.options.host.getCurrentFrame());
    });
  }

  /**
   * The user selected another frame (up/down the call stack).
   */
  public handleFrameChanged(frame: FrameInfo): Promise<void> {
    if (!this.state.enabled) {
      return Promise.resolve();
    }
    return this.guard('frame-changed', async () => {
      await this.syncFrame(frame);
    });
  }

  /**
   * Explicit sync of the current frame. Runs even while automatic
   * synchronization is off.
   */
  public async syncCurrentFrame(): Promise<SyncOutcome> {
    const frame = this.options.host.getCurrentFrame();
    if (!frame) {
      return 'no-frame';
    }
    if (frame.index !== 0 && !frame.instructionPointerReference) {
      return 'no-address';
    }
    await this.guard('manual', async () => {
      await this.syncFrame(frame);
    });
    return 'attempted';
  }

  /**
   * Forwards `address`, escalating to the failure reporter and the retry
   * loop when the viewer does not accept it.
   */
  public syncAddress(address: Address): Promise<void> {
    return this.guard('address', () => this.deliver(address));
  }

  public setEnabled(enabled: boolean): void {
    if (enabled === this.state.enabled) {
      return;
    }
    if (enabled) {
      resumeSync(this.state);
    } else {
      suspendSync(this.state, this.scheduler);
    }
    logEvent('info', 'engine:enabled-changed', { sessionId: this.sessionId, enabled });
  }

  /**
   * The viewer endpoint may have changed: forget the failure episode and
   * any pending retry.
   */
  public resetConnectionState(): void {
    this.scheduler.cancel();
    this.reporter.clear();
  }

  /**
   * The debugging session ended.
   */
  public terminate(): void {
    terminateSession(this.state, this.scheduler);
    logEvent('info', 'engine:terminated', { sessionId: this.sessionId });
  }

  public snapshot(): SyncStateSnapshot {
    return this.state.snapshot();
  }

  private async syncFrame(frame: FrameInfo | undefined): Promise<void> {
    if (!frame) {
      return;
    }

    // Only the innermost frame's registers are live
    if (frame.index === 0) {
      const value = await this.resolver.resolveProgramCounter(
        this.options.host,
        frame.id,
        this.state,
        this.options.getConfig().pcRegisterNames,
      );
      if (value === undefined) {
        logEvent('debug', 'engine:pc-unresolved', { sessionId: this.sessionId });
        return;
      }
      await this.deliver(value);
      return;
    }

    if (frame.instructionPointerReference) {
      await this.deliver(frame.instructionPointerReference);
    }
  }

  private async deliver(address: Address): Promise<void> {
    const { state } = this;
    const epoch = state.epoch;
    const intent = state.nextIntent();

    const delivered = await this.options.forwarder.forward(address);
    if (state.epoch !== epoch) {
      return;
    }

    if (delivered) {
      this.reporter.clear();
      if (state.pending && state.pending.intent <= intent) {
        this.scheduler.cancel();
      }
      this.options.hooks.onForwarded?.(address);
      return;
    }

    // A newer address is already on its way and owns the retry
    if (intent < state.latestIntent) {
      return;
    }

    this.options.hooks.onForwardFailed?.(address);
    this.reporter.reportFailure();
    if (state.enabled) {
      this.scheduler.schedule({ address, intent });
    }
  }

  private async guard(trigger: string, task: () => Promise<void>): Promise<void> {
    try {
      await task();
    } catch (error) {
      logError(`engine:${trigger}`, error, { sessionId: this.sessionId });
    }
  }
}
