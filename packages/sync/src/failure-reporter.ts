import type { SyncConfig } from '@disasm-sync/schemas';
import type { NotifyFn } from './types/index.js';
import type { SyncState } from './session/sync-state.js';

/**
 * Builds the warning shown when the viewer cannot be reached.
 */
export function formatConnectionFailureMessage(
  config: Pick<SyncConfig, 'viewerHost' | 'viewerPort' | 'retryIntervalMs'>,
  scriptPath?: string,
): string {
  const endpoint = `${config.viewerHost}:${config.viewerPort}`;
  const startStep = scriptPath
    ? `1. Run the companion viewer script: ${scriptPath}`
    : '1. Start the companion viewer script (disasm-sync serve)';

  return [
    `Failed to connect to viewer at ${endpoint}`,
    '',
    'To start the viewer endpoint:',
    startStep,
    `2. Make sure it listens on ${endpoint}`,
    '',
    `Retrying silently every ${config.retryIntervalMs / 1000}s...`,
  ].join('\n');
}

/**
 * Warns once per failure episode.
 *
 * The episode flag lives on the session's SyncState; the first failure flips
 * it and notifies, later failures stay silent until {@link clear}.
 */
export class ConnectionFailureReporter {
  public constructor(
    private readonly state: SyncState,
    private readonly notify: NotifyFn,
    private readonly describe: () => {
      config: Pick<SyncConfig, 'viewerHost' | 'viewerPort' | 'retryIntervalMs'>;
      scriptPath?: string;
    },
  ) {}

  /**
   * @returns true when this call opened a new episode and notified
   */
  public reportFailure(): boolean {
    if (this.state.failureEpisodeActive) {
      return false;
    }
    this.state.failureEpisodeActive = true;
    const { config, scriptPath } = this.describe();
    this.notify('warn', formatConnectionFailureMessage(config, scriptPath));
    return true;
  }

  public clear(): void {
    this.state.failureEpisodeActive = false;
  }
}
