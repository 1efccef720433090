import chalk from 'chalk';
import {
  BaseCommand,
  createErrorResponse,
  createTextResponse,
  type CallToolResult,
  type ICommandOptions,
  type Tool,
} from '@disasm-sync/commands-core';
import {
  HttpAddressForwarder,
  SYNC_OUTCOME_WARNINGS,
  cleanAddress,
  type IAddressForwarder,
  type SyncController,
} from '@disasm-sync/sync';
import { parseCLIArgs } from './util/index.js';

export interface ViewerSyncCommandOptions {
  /** Forwarder for one-shot `goto`; defaults to HTTP against the controller's configuration */
  forwarder?: IAddressForwarder;
}

const SCRIPT_PATH_MISSING = 'Viewer script path is not configured';

function toggleMessage(enabled: boolean): string {
  return `Viewer sync ${enabled ? 'enabled' : 'disabled'}`;
}

/**
 * Commands around a {@link SyncController}.
 *
 * Available tools:
 * - viewer_sync_toggle: turn automatic synchronization on or off
 * - viewer_sync_current_frame: sync the selected frame now
 * - viewer_sync_script_path: path of the companion viewer script
 * - viewer_sync_status: configuration and per-session state
 *
 * The tools act on live sessions, so they are served by the long-lived
 * `disasm-sync dap` proxy as custom DAP requests. The one-shot CLI only
 * offers `goto <address>` (a single forward without retries) and
 * `script-path`.
 * @example CLI usage
 * ```typescript
 * const cmd = new ViewerSyncCommand(controller);
 * await cmd.executeViaCLI(['goto', '0x401020']);
 * ```
 * @public
 */
export class ViewerSyncCommand extends BaseCommand {
  public readonly name = 'viewer-sync';
  public readonly description = 'Mirror the debugger location in an external disassembly viewer';
  private readonly forwarder: IAddressForwarder;

  public constructor(
    private readonly controller: SyncController,
    options: ViewerSyncCommandOptions = {},
  ) {
    super();
    this.forwarder =
      options.forwarder ??
      new HttpAddressForwarder({ getConfig: () => controller.getConfig() });
  }

  public getMCPDefinitions(): Tool[] {
    return [
      {
        name: 'viewer_sync_toggle',
        description: 'Turn automatic address synchronization with the viewer on or off',
        inputSchema: { type: 'object', properties: {} },
      },
      {
        name: 'viewer_sync_current_frame',
        description: 'Send the address of the currently selected stack frame to the viewer',
        inputSchema: { type: 'object', properties: {} },
      },
      {
        name: 'viewer_sync_script_path',
        description: 'Absolute path of the companion viewer script',
        inputSchema: { type: 'object', properties: {} },
      },
      {
        name: 'viewer_sync_status',
        description: 'Current configuration and per-session synchronization state',
        inputSchema: { type: 'object', properties: {} },
      },
    ];
  }

  /**
   * @throws Never throws - errors are returned with the isError flag
   */
  public async executeToolViaMCP(
    toolName: string,
    _args: Record<string, unknown>,
  ): Promise<CallToolResult> {
    try {
      switch (toolName) {
        case 'viewer_sync_toggle': {
          const enabled = await this.controller.toggle();
          return createTextResponse(toggleMessage(enabled));
        }

        case 'viewer_sync_current_frame': {
          const outcome = await this.controller.syncCurrentFrame();
          if (outcome !== 'attempted') {
            return createErrorResponse(SYNC_OUTCOME_WARNINGS[outcome]);
          }
          return createTextResponse(
            'Current frame sent to the viewer',
            'Delivery is retried in the background while the viewer is unreachable.',
          );
        }

        case 'viewer_sync_script_path': {
          const scriptPath = this.controller.scriptPath();
          return scriptPath
            ? createTextResponse(scriptPath)
            : createErrorResponse(SCRIPT_PATH_MISSING);
        }

        case 'viewer_sync_status':
          return createTextResponse(JSON.stringify(this.controller.status(), null, 2));

        default:
          return createErrorResponse(`Error: Unknown tool: ${toolName}`);
      }
    } catch (error) {
      return createErrorResponse(
        `Unexpected error: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  /**
   * Supported commands:
   * - viewer-sync goto \<address\>
   * - viewer-sync script-path
   *
   * Failures set `process.exitCode` to 1.
   */
  public async executeViaCLI(args: string[]): Promise<void> {
    const options = this.parseCommonOptions(args);
    const parsed = parseCLIArgs(args);

    switch (parsed.subcommand) {
      case 'goto':
        await this.gotoViaCLI(parsed.address, options);
        return;

      case 'script-path': {
        const scriptPath = this.controller.scriptPath();
        if (!scriptPath) {
          this.fail(SCRIPT_PATH_MISSING, options);
          return;
        }
        console.info(scriptPath);
        return;
      }

      default:
        this.logError(
          [
            `${chalk.bold('Usage:')} viewer-sync <goto|script-path> ...`,
            '  viewer-sync goto <address> [--format json]',
            '  viewer-sync script-path',
          ].join('\n'),
          options,
        );
        process.exitCode = 1;
    }
  }

  private async gotoViaCLI(address: string | undefined, options: ICommandOptions): Promise<void> {
    if (!address) {
      this.fail('Usage: viewer-sync goto <address>', options);
      return;
    }

    const canonical = cleanAddress(address);
    const { viewerHost, viewerPort } = this.controller.getConfig();
    const delivered = await this.forwarder.forward(canonical);

    if (options.format === 'json') {
      console.info(JSON.stringify({ address: canonical, delivered }));
    } else if (delivered) {
      this.log(chalk.green(`Forwarded ${canonical} to ${viewerHost}:${viewerPort}`), options);
    } else {
      this.logError(
        chalk.red(`Failed to forward ${canonical} to viewer at ${viewerHost}:${viewerPort}`),
        options,
      );
    }

    if (!delivered) {
      process.exitCode = 1;
    }
  }

  private fail(message: string, options: ICommandOptions): void {
    this.logError(chalk.red(message), options);
    process.exitCode = 1;
  }
}
