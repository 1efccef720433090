import { resolve } from 'path';
import { CommandRegistry } from '@disasm-sync/commands-core';
import { ViewerSyncCommand } from '@disasm-sync/command-viewer-sync';
import { createScopedLogger, type ILogger } from '@disasm-sync/core';
import type { SyncConfigZod } from '@disasm-sync/schemas';
import { SyncController } from '@disasm-sync/sync';
import { getViewerScriptPath } from '@disasm-sync/viewer-server';
import { resolveMergedSyncConfig } from './config-loader.js';

export interface CliContext {
  config: SyncConfigZod;
  sources: string[];
  controller: SyncController;
  registry: CommandRegistry;
}

export interface CliContextOptions {
  /** Sync controller logger; defaults to the console */
  logger?: ILogger;
}

/**
 * Loads the merged configuration and wires the commands the CLI exposes.
 * @param configPath - Project configuration file, relative to the working directory
 */
export function createCliContext(
  configPath: string,
  options: CliContextOptions = {},
): CliContext {
  const { config, sources } = resolveMergedSyncConfig(resolve(process.cwd(), configPath));

  const controller = new SyncController({
    config,
    logger: options.logger ?? createScopedLogger('sync'),
    scriptPath: getViewerScriptPath(),
  });

  const registry = new CommandRegistry();
  registry.register(new ViewerSyncCommand(controller));

  return { config, sources, controller, registry };
}
