/**
 * Debug Adapter Protocol wire framing: a `Content-Length` header block,
 * a blank line, then exactly that many bytes of UTF-8 JSON.
 * @internal
 */

import type { DebugProtocol } from '@vscode/debugprotocol';
import { logEvent } from '@disasm-sync/core';
import { isProtocolMessage } from './protocol-guards.js';

const HEADER_DELIMITER = Buffer.from('\r\n\r\n', 'ascii');
const CONTENT_LENGTH = /Content-Length:\s*(\d+)/i;

/**
 * Serializes one message with its header.
 */
export function encodeDapMessage(message: DebugProtocol.ProtocolMessage): Buffer {
  const json = Buffer.from(JSON.stringify(message), 'utf8');
  const header = Buffer.from(`Content-Length: ${json.length}\r\n\r\n`, 'ascii');
  return Buffer.concat([header, json]);
}

/**
 * Incremental decoder for one direction of a DAP stream.
 *
 * Chunks may split headers and bodies anywhere, multi-byte characters
 * included. Malformed frames are logged and skipped.
 */
export class DapMessageReader {
  private buffer = Buffer.alloc(0);
  private contentLength = -1;

  public constructor(private readonly logPrefix: string) {}

  /**
   * @returns every message completed by `chunk`, in stream order
   */
  public push(chunk: Buffer): DebugProtocol.ProtocolMessage[] {
    this.buffer = Buffer.concat([this.buffer, chunk]);
    const messages: DebugProtocol.ProtocolMessage[] = [];

    for (;;) {
      if (this.contentLength < 0) {
        const headerEnd = this.buffer.indexOf(HEADER_DELIMITER);
        if (headerEnd < 0) {
          break;
        }
        const header = this.buffer.subarray(0, headerEnd).toString('ascii');
        this.buffer = this.buffer.subarray(headerEnd + HEADER_DELIMITER.length);

        const length = CONTENT_LENGTH.exec(header)?.[1];
        if (length === undefined) {
          logEvent('warn', `${this.logPrefix}:malformed-header`, { header });
          continue;
        }
        this.contentLength = Number(length);
      }

      if (this.buffer.length < this.contentLength) {
        break;
      }

      const data = this.buffer.subarray(0, this.contentLength).toString('utf8');
      this.buffer = this.buffer.subarray(this.contentLength);
      this.contentLength = -1;

      const message = this.parse(data);
      if (message) {
        messages.push(message);
      }
    }

    return messages;
  }

  private parse(data: string): DebugProtocol.ProtocolMessage | undefined {
    let parsed: unknown;
    try {
      parsed = JSON.parse(data);
    } catch (error) {
      logEvent('error', `${this.logPrefix}:parse-error`, {
        error: error instanceof Error ? error.message : String(error),
        data,
      });
      return undefined;
    }

    if (!isProtocolMessage(parsed)) {
      logEvent('warn', `${this.logPrefix}:not-a-message`, { data });
      return undefined;
    }
    return parsed;
  }
}
