import { resolve } from 'path';
import { Command } from 'commander';
import { createPinoLogger, logError, rootLogger } from '@disasm-sync/core';
import { resolveSyncConfig } from '@disasm-sync/schemas';
import {
  LoggingNavigator,
  getViewerScriptPath,
  startViewerServer,
} from '@disasm-sync/viewer-server';
import { resolveMergedSyncConfig } from './config-loader.js';
import { createCliContext } from './context.js';
import { runDapProxy } from './dap/run-dap-proxy.js';

const DEFAULT_CONFIG_PATH = '.disasm-sync.json';

interface GlobalOptions {
  config: string;
}

interface ServeOptions {
  host?: string;
  port?: string;
}

function readGlobalOptions(command: Command): GlobalOptions {
  const { config } = command.optsWithGlobals();
  return { config: typeof config === 'string' ? config : DEFAULT_CONFIG_PATH };
}

/**
 * Runs `args` through the named registered command.
 */
async function runRegisteredCommand(
  configPath: string,
  commandName: string,
  args: string[],
): Promise<void> {
  const { registry } = createCliContext(configPath);
  const command = registry.getCommand(commandName);
  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.error(`Available commands: ${registry.getAllCommandNames().join(', ')}`);
    process.exitCode = 1;
    return;
  }
  await command.executeViaCLI(args);
}

/**
 * Builds the disasm-sync command line.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('disasm-sync')
    .description('Keep an external disassembly viewer in step with a debugging session')
    .option('-c, --config <path>', 'project configuration file', DEFAULT_CONFIG_PATH)
    .showHelpAfterError();

  program.enablePositionalOptions(true);

  program
    .command('goto <address>')
    .description('Send one address to the viewer (no retries); exits 1 when not delivered')
    .option('--format <format>', 'output format (text, json)')
    .action(async (address: string, options: { format?: string }, command: Command) => {
      const { config } = readGlobalOptions(command);
      const format = options.format ? ['--format', options.format] : [];
      await runRegisteredCommand(config, 'viewer-sync', ['goto', address, ...format]);
    });

  program
    .command('serve')
    .description('Run the companion viewer endpoint with a logging navigator')
    .option('--host <host>', 'bind address (defaults to viewerHost)')
    .option('--port <port>', 'port (defaults to viewerPort)')
    .action(async (options: ServeOptions, command: Command) => {
      const { config } = resolveMergedSyncConfig(
        resolve(process.cwd(), readGlobalOptions(command).config),
      );
      const endpoint = resolveSyncConfig({
        ...config,
        viewerHost: options.host ?? config.viewerHost,
        viewerPort: options.port ? Number(options.port) : config.viewerPort,
      });

      rootLogger.level = process.env.DISASM_SYNC_LOG_LEVEL ?? 'info';
      const logger = createPinoLogger('viewer');

      const server = await startViewerServer({
        host: endpoint.viewerHost,
        port: endpoint.viewerPort,
        navigator: new LoggingNavigator(logger),
        logger,
      });

      const shutdown = () => {
        server.close();
      };
      process.once('SIGINT', shutdown);
      process.once('SIGTERM', shutdown);
    });

  program
    .command('dap <adapter> [adapterArgs...]')
    .description(
      'Run a debug adapter behind a DAP proxy on stdio that syncs the viewer and serves the viewer_sync_* tools as custom requests',
    )
    .allowUnknownOption(true)
    .passThroughOptions()
    .action(async (adapter: string, adapterArgs: string[] = [], _options: unknown, command: Command) => {
      await runDapProxy(readGlobalOptions(command).config, adapter, adapterArgs);
    });

  program
    .command('script-path')
    .description('Print the absolute path of the companion viewer script')
    .action(() => {
      console.info(getViewerScriptPath());
    });

  program
    .command('config')
    .description('Print the merged configuration and the files it came from')
    .action((_options: unknown, command: Command) => {
      try {
        const { config, sources } = createCliContext(readGlobalOptions(command).config);
        console.info(JSON.stringify({ config, sources }, null, 2));
      } catch (error) {
        console.error('Failed to load configuration:', error);
        logError('config-load', error);
        process.exitCode = 1;
      }
    });

  program
    .command('run <commandName> [commandArgs...]')
    .description('Run a registered command, e.g. `run viewer-sync script-path`')
    .allowUnknownOption(true)
    .passThroughOptions()
    .action(async (commandName: string, commandArgs: string[] = [], _options: unknown, command: Command) => {
      await runRegisteredCommand(readGlobalOptions(command).config, commandName, commandArgs);
    });

  return program;
}
