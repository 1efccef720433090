import { Hono } from 'hono';
import { z } from 'zod';
import { logEvent, type ILogger } from '@disasm-sync/core';
import { formatViewerAddress, parseViewerAddress } from '../address.js';
import type { Navigator } from '../navigator.js';

const GotoRequestSchema = z.object({
  address: z.string().optional(),
});

type Variables = {
  navigator: Navigator;
  logger: ILogger;
};

export const gotoRoute = new Hono<{ Variables: Variables }>();

gotoRoute.post('/', async (c) => {
  // Malformed JSON throws here and is answered by the app's error handler
  const body: unknown = await c.req.json();
  const parsed = GotoRequestSchema.safeParse(body);

  const raw = parsed.success ? parsed.data.address : undefined;
  if (!raw) {
    return c.json({ error: 'no address provided' }, 400);
  }

  // The request itself was delivered; an unusable address is only logged
  const address = parseViewerAddress(raw);
  if (address === undefined) {
    c.get('logger').warn(`Invalid address: ${raw}`);
    logEvent('warn', 'viewer:invalid-address', { address: raw });
    return c.json({ status: 'ok' });
  }

  await c.get('navigator').goto(address);
  logEvent('debug', 'viewer:goto', { address: formatViewerAddress(address) });

  return c.json({ status: 'ok' });
});
