import {
  ViewerTransportError,
  logEvent,
  type ILogger,
  NoOpLogger,
} from '@disasm-sync/core';
import type { SyncConfig } from '@disasm-sync/schemas';
import { cleanAddress, type Address } from '../address/clean-address.js';

/**
 * Performs single forward attempts to the external viewer.
 * @public
 */
export interface IAddressForwarder {
  /**
   * Sends `address` once. Resolves `true` when the viewer accepted it and
   * `false` on any transport failure; never rejects.
   */
  forward(address: Address): Promise<boolean>;
}

export interface HttpAddressForwarderOptions {
  /** Read on every attempt so a replaced configuration applies immediately */
  getConfig: () => Pick<SyncConfig, 'viewerHost' | 'viewerPort'>;
  logger?: ILogger;
}

/**
 * Builds the viewer's navigation endpoint, bracketing IPv6 literals.
 */
export function buildGotoUrl(host: string, port: number): string {
  const hostPart = host.includes(':') && !host.startsWith('[') ? `[${host}]` : host;
  return `http://${hostPart}:${port}/goto`;
}

/**
 * Releases the connection; only the status matters.
 */
async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    logEvent('debug', 'forwarder:discard-body-failed', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Forwards addresses with `POST /goto {"address": "0x…"}`.
 *
 * Retries are the caller's business: one call, one request.
 * @public
 */
export class HttpAddressForwarder implements IAddressForwarder {
  private readonly logger: ILogger;

  public constructor(private readonly options: HttpAddressForwarderOptions) {
    this.logger = options.logger ?? new NoOpLogger();
  }

  public async forward(address: Address): Promise<boolean> {
    const canonical = cleanAddress(address);
    const { viewerHost, viewerPort } = this.options.getConfig();
    const url = buildGotoUrl(viewerHost, viewerPort);

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ address: canonical }),
      });
      await discardBody(response);

      if (!response.ok) {
        const error = ViewerTransportError.fromHttpStatus(
          response.status,
          response.statusText,
        );
        logEvent('debug', 'forwarder:rejected', {
          address: canonical,
          url,
          error: error.toJSON(),
        });
        this.logger.debug('Viewer rejected address', {
          address: canonical,
          code: error.code,
        });
        return false;
      }

      logEvent('debug', 'forwarder:delivered', { address: canonical, url });
      return true;
    } catch (error) {
      const transportError = ViewerTransportError.fromNetworkError(
        error,
        viewerHost,
        viewerPort,
      );
      logEvent('debug', 'forwarder:unreachable', {
        address: canonical,
        url,
        error: transportError.toJSON(),
      });
      this.logger.debug('Viewer unreachable', {
        address: canonical,
        code: transportError.code,
      });
      return false;
    }
  }
}
