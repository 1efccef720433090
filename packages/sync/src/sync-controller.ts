import Emittery from 'emittery';
import {
  MissingHostIntegrationError,
  defaultLogger,
  logEvent,
  type ILogger,
} from '@disasm-sync/core';
import {
  resolveSyncConfig,
  type SyncConfig,
  type SyncConfigInput,
} from '@disasm-sync/schemas';
import {
  HttpAddressForwarder,
  type IAddressForwarder,
} from './forwarder/address-forwarder.js';
import { SyncEngine } from './sync-engine.js';
import type { SyncStateSnapshot } from './session/sync-state.js';
import type {
  DebugSessionHost,
  FrameInfo,
  NotificationLevel,
  SyncEvents,
  SyncOutcome,
} from './types/index.js';

export interface SyncControllerOptions {
  /** Overrides merged over the defaults */
  config?: SyncConfigInput;
  /** Defaults to an HTTP forwarder reading the controller's configuration */
  forwarder?: IAddressForwarder;
  logger?: ILogger;
  /** Companion viewer script, reported by {@link SyncController.scriptPath} */
  scriptPath?: string;
}

/**
 * Warning shown for each manual-sync outcome that sent nothing.
 */
export const SYNC_OUTCOME_WARNINGS: Record<Exclude<SyncOutcome, 'attempted'>, string> = {
  'no-session': 'No active debug session',
  'no-frame': 'No current frame',
  'no-address': 'Cannot determine frame address',
};

export interface SyncStatus {
  enabled: boolean;
  activeSessionId?: string;
  config: SyncConfig;
  sessions: Array<{ sessionId: string } & SyncStateSnapshot>;
}

/**
 * Process-wide entry point for address synchronization.
 *
 * Owns the configuration, the global enabled flag and one SyncEngine per
 * attached debugging session. Host integrations route their events here by
 * session id; commands (toggle, manual sync, script path) are methods.
 * @example
 * ```typescript
 * const controller = new SyncController({ config: { autoEnable: true } });
 * controller.events.on('notification', ({ level, message }) => show(level, message));
 *
 * controller.attach(host);
 * await controller.handleStopped(host.id);
 * ```
 * @public
 */
export class SyncController {
  public readonly events = new Emittery<SyncEvents>();
  private config: SyncConfig;
  private enabled: boolean;
  private readonly engines = new Map<string, SyncEngine>();
  private activeSessionId?: string;
  private readonly forwarder: IAddressForwarder;
  private readonly logger: ILogger;

  public constructor(private readonly options: SyncControllerOptions = {}) {
    this.config = resolveSyncConfig(options.config);
    this.enabled = this.config.autoEnable;
    this.logger = options.logger ?? defaultLogger;
    this.forwarder =
      options.forwarder ??
      new HttpAddressForwarder({ getConfig: () => this.config, logger: this.logger });
  }

  public get isEnabled(): boolean {
    return this.enabled;
  }

  public getConfig(): SyncConfig {
    return this.config;
  }

  public getEngine(sessionId: string): SyncEngine | undefined {
    return this.engines.get(sessionId);
  }

  /**
   * Starts tracking a debugging session and makes it the active one.
   * Re-attaching an id already tracked replaces its engine with a fresh one.
   * @throws \{MissingHostIntegrationError\} When no host is given
   */
  public attach(host: DebugSessionHost | undefined): SyncEngine {
    if (!host) {
      throw new MissingHostIntegrationError('Debug session host');
    }

    const existing = this.engines.get(host.id);
    if (existing) {
      existing.terminate();
    }

    const sessionId = host.id;
    const engine = new SyncEngine({
      host,
      forwarder: this.forwarder,
      getConfig: () => this.config,
      enabled: this.enabled,
      scriptPath: this.options.scriptPath,
      hooks: {
        notify: (level, message) => this.notify(level, message, sessionId),
        onRegisterDetected: (register) => {
          void this.events.emit('registerDetected', { sessionId, register });
        },
        onForwarded: (address) => {
          void this.events.emit('forwarded', { sessionId, address });
        },
        onForwardFailed: (address) => {
          void this.events.emit('forwardFailed', { sessionId, address });
        },
      },
    });

    this.engines.set(sessionId, engine);
    this.activeSessionId = sessionId;
    logEvent('info', 'controller:attached', { sessionId, enabled: this.enabled });
    return engine;
  }

  /**
   * The session terminated: resets and forgets its engine.
   */
  public detach(sessionId: string): void {
    const engine = this.engines.get(sessionId);
    if (!engine) {
      return;
    }
    engine.terminate();
    this.engines.delete(sessionId);

    if (this.activeSessionId === sessionId) {
      this.activeSessionId = [...this.engines.keys()].pop();
    }
    logEvent('info', 'controller:detached', { sessionId });
  }

  public handleStopped(sessionId: string): Promise<void> {
    const engine = this.engines.get(sessionId);
    if (!engine) {
      return Promise.resolve();
    }
    this.activeSessionId = sessionId;
    return engine.handleStopped();
  }

  public handleFrameChanged(sessionId: string, frame: FrameInfo): Promise<void> {
    const engine = this.engines.get(sessionId);
    if (!engine) {
      return Promise.resolve();
    }
    this.activeSessionId = sessionId;
    return engine.handleFrameChanged(frame);
  }

  /**
   * Flips synchronization on or off for every session. Turning it on syncs
   * the active session's current frame right away.
   * @returns the new enabled state
   */
  public async toggle(): Promise<boolean> {
    this.enabled = !this.enabled;
    for (const engine of this.engines.values()) {
      engine.setEnabled(this.enabled);
    }
    logEvent('info', 'controller:toggled', { enabled: this.enabled });

    if (this.enabled && this.activeSessionId !== undefined) {
      await this.syncCurrentFrame();
    }
    return this.enabled;
  }

  /**
   * Manually syncs the active session's selected frame, warning the user
   * when there is nothing to sync.
   */
  public async syncCurrentFrame(): Promise<SyncOutcome> {
    const engine =
      this.activeSessionId !== undefined
        ? this.engines.get(this.activeSessionId)
        : undefined;
    if (!engine) {
      this.notify('warn', SYNC_OUTCOME_WARNINGS['no-session']);
      return 'no-session';
    }

    const outcome = await engine.syncCurrentFrame();
    if (outcome !== 'attempted') {
      this.notify('warn', SYNC_OUTCOME_WARNINGS[outcome], engine.sessionId);
    }
    return outcome;
  }

  /**
   * Replaces the configuration wholesale (overrides merged over defaults).
   * Connection-failure and retry state of every session is reset because
   * the viewer endpoint may have changed; the enabled flag is kept.
   * @throws \{ZodError\} When the new configuration is invalid
   */
  public setConfig(overrides: SyncConfigInput = {}): SyncConfig {
    this.config = resolveSyncConfig(overrides);
    for (const engine of this.engines.values()) {
      engine.resetConnectionState();
    }
    logEvent('info', 'controller:config-replaced', {
      viewerHost: this.config.viewerHost,
      viewerPort: this.config.viewerPort,
    });
    return this.config;
  }

  public scriptPath(): string | undefined {
    return this.options.scriptPath;
  }

  public status(): SyncStatus {
    return {
      enabled: this.enabled,
      activeSessionId: this.activeSessionId,
      config: this.config,
      sessions: [...this.engines.values()].map((engine) => ({
        sessionId: engine.sessionId,
        ...engine.snapshot(),
      })),
    };
  }

  /**
   * Detaches every session and drops all listeners.
   */
  public dispose(): void {
    for (const sessionId of [...this.engines.keys()]) {
      this.detach(sessionId);
    }
    this.events.clearListeners();
  }

  private notify(level: NotificationLevel, message: string, sessionId?: string): void {
    const context = sessionId ? { sessionId } : undefined;
    if (level === 'info') {
      this.logger.info(message, context);
    } else if (level === 'warn') {
      this.logger.warn(message, context);
    } else {
      this.logger.error(message, undefined, context);
    }
    void this.events.emit('notification', { level, message, sessionId });
  }
}
