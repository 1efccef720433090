import { spawn, type ChildProcess } from 'child_process';
import {
  createPinoLogger,
  createStderrRootLogger,
  logError,
  logEvent,
} from '@disasm-sync/core';
import { createCliContext } from '../context.js';
import { connectDapProxy } from './connect-dap-proxy.js';

/**
 * Spawns the debug adapter with piped stdin/stdout; its stderr is ours.
 * @throws \{Error\} When the adapter cannot be started
 */
async function spawnAdapter(command: string, args: string[]): Promise<ChildProcess> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'inherit'] });
    child.once('error', reject);
    child.once('spawn', () => {
      child.off('error', reject);
      resolve(child);
    });
  });
}

/**
 * Runs `disasm-sync dap`: the editor speaks DAP on our stdio, the adapter
 * on its own, and the session is synced to the viewer in between.
 *
 * stdout carries the protocol, so logs go to stderr.
 * @returns once the adapter exits or the editor closes the stream
 */
export async function runDapProxy(
  configPath: string,
  command: string,
  args: string[],
): Promise<void> {
  const logger = createPinoLogger(
    'sync',
    createStderrRootLogger(process.env.DISASM_SYNC_LOG_LEVEL ?? 'info'),
  );
  const { controller, registry } = createCliContext(configPath, { logger });

  let child: ChildProcess;
  try {
    child = await spawnAdapter(command, args);
  } catch (error) {
    logger.error(`Failed to start debug adapter ${command}`, error);
    logError('dap:spawn', error, { command, args });
    controller.dispose();
    process.exitCode = 1;
    return;
  }

  const { stdin, stdout } = child;
  if (!stdin || !stdout) {
    logger.error(`Debug adapter ${command} has no stdio pipes`);
    child.kill('SIGTERM');
    controller.dispose();
    process.exitCode = 1;
    return;
  }

  child.on('error', (error) => {
    logError('dap:adapter', error, { command });
  });
  // EPIPE once the adapter has gone away
  stdin.on('error', (error) => {
    logError('dap:adapter-stdin', error, { command });
  });
  const exited = new Promise<number | null>((resolve) => {
    child.once('exit', (code) => {
      logEvent('info', 'dap:adapter-exited', { command, code });
      resolve(code);
    });
  });

  const connection = connectDapProxy(
    {
      clientInput: process.stdin,
      clientOutput: process.stdout,
      adapterInput: stdin,
      adapterOutput: stdout,
    },
    controller,
    registry,
  );

  await connection.closed;
  if (child.exitCode === null) {
    child.kill('SIGTERM');
  }
  const code = await exited;
  controller.dispose();
  process.stdin.pause();
  if (code !== null && code !== 0) {
    process.exitCode = code;
  }
}
