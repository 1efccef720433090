/**
 * Standalone companion script: serves `/goto` with a logging navigator.
 *
 * Endpoint from DISASM_SYNC_VIEWER_HOST / DISASM_SYNC_VIEWER_PORT, falling
 * back to the sync defaults.
 */

import { createScopedLogger, logError } from '@disasm-sync/core';
import { resolveSyncConfig } from '@disasm-sync/schemas';
import { startViewerServer } from './index.js';
import { LoggingNavigator } from './navigator.js';

const logger = createScopedLogger('viewer');
const portEnv = process.env.DISASM_SYNC_VIEWER_PORT;
const config = resolveSyncConfig({
  viewerHost: process.env.DISASM_SYNC_VIEWER_HOST,
  viewerPort: portEnv ? Number(portEnv) : undefined,
});

startViewerServer({
  host: config.viewerHost,
  port: config.viewerPort,
  navigator: new LoggingNavigator(logger),
  logger,
})
  .then((server) => {
    process.on('SIGINT', () => {
      server.close();
      process.exit(0);
    });
    process.on('SIGTERM', () => {
      server.close((err) => {
        if (err) {
          logger.error('Viewer endpoint failed to close', err);
          process.exit(1);
        }
        process.exit(0);
      });
    });
  })
  .catch((error: unknown) => {
    logError('viewer:start', error);
    process.exit(1);
  });
