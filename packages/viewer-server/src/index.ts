/**
 * Companion viewer endpoint.
 *
 * Receives addresses from the sync engine (`POST /goto {"address": "0x…"}`)
 * and hands them to a {@link Navigator}.
 * @public
 * @see file:./serve.ts - Standalone entry point
 */

import { serve, type ServerType } from '@hono/node-server';
import { createServer } from 'http';
import { defaultLogger, type ILogger } from '@disasm-sync/core';
import { createViewerApp } from './app.js';
import type { Navigator } from './navigator.js';

export { createViewerApp, type ViewerAppOptions } from './app.js';
export { LoggingNavigator, type Navigator } from './navigator.js';
export { parseViewerAddress, formatViewerAddress } from './address.js';
export { getViewerScriptPath } from './script-path.js';

export interface ViewerServerOptions {
  host: string;
  port: number;
  navigator: Navigator;
  logger?: ILogger;
}

/**
 * Starts the viewer endpoint.
 * @returns the listening Node.js server
 * @throws When the port cannot be bound
 * @example
 * ```typescript
 * const server = await startViewerServer({
 *   host: '127.0.0.1',
 *   port: 18888,
 *   navigator: { goto: (address) => viewer.jump(address) },
 * });
 * ```
 * @public
 */
export async function startViewerServer(options: ViewerServerOptions): Promise<ServerType> {
  const { host, port, navigator, logger = defaultLogger } = options;
  const app = createViewerApp({ navigator, logger });

  return new Promise<ServerType>((resolve, reject) => {
    const server = serve(
      {
        fetch: app.fetch,
        port,
        hostname: host,
        createServer,
      },
      (info) => {
        logger.info(`Viewer endpoint listening on http://${host}:${info.port}`);
        resolve(server);
      },
    );

    server.on('error', (error) => {
      logger.error('Viewer endpoint failed to start', error);
      reject(error);
    });
  });
}
