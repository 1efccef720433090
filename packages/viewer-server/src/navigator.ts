import type { ILogger } from '@disasm-sync/core';
import { formatViewerAddress } from './address.js';

/**
 * Moves the viewer's cursor. Implemented by whatever tool embeds the
 * endpoint (a disassembler plugin, an editor extension, a test double).
 * @public
 */
export interface Navigator {
  goto(address: bigint): void | Promise<void>;
}

/**
 * Navigator that only records and logs the requested location.
 * Used by `disasm-sync serve` and the standalone companion script.
 * @public
 */
export class LoggingNavigator implements Navigator {
  public current?: bigint;

  public constructor(private readonly logger: ILogger) {}

  public goto(address: bigint): void {
    this.current = address;
    this.logger.info(`Navigating to ${formatViewerAddress(address)}`);
  }
}
