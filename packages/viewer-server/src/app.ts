import { Hono } from 'hono';
import { logger as requestLogger } from 'hono/logger';
import { logError, type ILogger } from '@disasm-sync/core';
import { gotoRoute } from './api/goto.js';
import type { Navigator } from './navigator.js';

type Variables = {
  navigator: Navigator;
  logger: ILogger;
};

export interface ViewerAppOptions {
  navigator: Navigator;
  logger: ILogger;
}

/**
 * Creates the Hono application behind the viewer endpoint.
 *
 * Only `POST /goto` is routed; everything else is a 404. Failures inside a
 * handler, malformed JSON included, become `500 {"error": message}`.
 */
export function createViewerApp({ navigator, logger }: ViewerAppOptions) {
  const app = new Hono<{ Variables: Variables }>();

  app.use('*', requestLogger((message) => logger.debug(message)));

  app.use('*', async (c, next) => {
    c.set('navigator', navigator);
    c.set('logger', logger);
    await next();
  });

  app.route('/goto', gotoRoute);

  app.notFound((c) => c.json({ error: 'not found' }, 404));

  app.onError((error, c) => {
    logError('viewer:request', error, { path: c.req.path });
    logger.error('Viewer request failed', error);
    return c.json({ error: error.message }, 500);
  });

  return app;
}
