import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import type { ILogger } from '@disasm-sync/core';
import { createViewerApp } from '../../app.js';
import type { Navigator } from '../../navigator.js';

const jsonHeaders = {
  'Content-Type': 'application/json',
};

describe('POST /goto', () => {
  let goto: ReturnType<typeof vi.fn<Navigator['goto']>>;
  let app: ReturnType<typeof createViewerApp>;
  let logger: ILogger & { warn: Mock<ILogger['warn']> };

  beforeEach(() => {
    goto = vi.fn<Navigator['goto']>();
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn<ILogger['warn']>(),
      error: vi.fn(),
    };
    app = createViewerApp({ navigator: { goto }, logger });
  });

  it('navigates to a 0x-prefixed address', async () => {
    const response = await app.request('/goto', {
      method: 'POST',
      headers: jsonHeaders,
      body: JSON.stringify({ address: '0x401020' }),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok' });
    expect(goto).toHaveBeenCalledWith(0x401020n);
  });

  it('accepts an address without prefix', async () => {
    const response = await app.request('/goto', {
      method: 'POST',
      headers: jsonHeaders,
      body: JSON.stringify({ address: '7FFF0001' }),
    });

    expect(response.status).toBe(200);
    expect(goto).toHaveBeenCalledWith(0x7fff0001n);
  });

  it('rejects a missing address', async () => {
    const response = await app.request('/goto', {
      method: 'POST',
      headers: jsonHeaders,
      body: JSON.stringify({}),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'no address provided' });
    expect(goto).not.toHaveBeenCalled();
  });

  it('rejects an empty address', async () => {
    const response = await app.request('/goto', {
      method: 'POST',
      headers: jsonHeaders,
      body: JSON.stringify({ address: '' }),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'no address provided' });
  });

  it('acknowledges an address that is not hexadecimal without navigating', async () => {
    const response = await app.request('/goto', {
      method: 'POST',
      headers: jsonHeaders,
      body: JSON.stringify({ address: '(void (*)()) 0x401136 <main+4>' }),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'ok' });
    expect(goto).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith('Invalid address: (void (*)()) 0x401136 <main+4>');
  });

  it('answers malformed JSON with a 500', async () => {
    const response = await app.request('/goto', {
      method: 'POST',
      headers: jsonHeaders,
      body: '{"address":',
    });

    expect(response.status).toBe(500);
    const body = await response.json();
    expect(typeof body.error).toBe('string');
  });

  it('reports navigator failures as a 500', async () => {
    goto.mockRejectedValue(new Error('viewer window closed'));

    const response = await app.request('/goto', {
      method: 'POST',
      headers: jsonHeaders,
      body: JSON.stringify({ address: '0x1000' }),
    });

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({ error: 'viewer window closed' });
  });

  it('does not route other paths', async () => {
    const response = await app.request('/jump', {
      method: 'POST',
      headers: jsonHeaders,
      body: JSON.stringify({ address: '0x1000' }),
    });

    expect(response.status).toBe(404);
  });

  it('does not answer GET on /goto', async () => {
    const response = await app.request('/goto');

    expect(response.status).toBe(404);
  });
});
