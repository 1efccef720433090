import type { Readable, Writable } from 'stream';
import type { DebugProtocol } from '@vscode/debugprotocol';
import type { CommandRegistry } from '@disasm-sync/commands-core';
import { logEvent } from '@disasm-sync/core';
import {
  DapMessageReader,
  DapProxy,
  bindDapSession,
  encodeDapMessage,
  type SyncController,
  type SyncNotification,
} from '@disasm-sync/sync';
import { createToolRequestInterceptor } from './tool-requests.js';

/**
 * Both stdio pairs of a proxied session. Inputs are read, outputs written.
 */
export interface DapProxyStreams {
  /** Editor to proxy, usually process.stdin */
  clientInput: Readable;
  /** Proxy to editor, usually process.stdout */
  clientOutput: Writable;
  /** Proxy to adapter: the adapter's stdin */
  adapterInput: Writable;
  /** Adapter to proxy: the adapter's stdout */
  adapterOutput: Readable;
}

export interface DapProxyConnection {
  proxy: DapProxy;
  /** Resolves once either side ends its stream */
  closed: Promise<void>;
  dispose(): void;
}

function outputCategory({ level }: SyncNotification): DebugProtocol.OutputEvent['body']['category'] {
  return level === 'info' ? 'console' : 'important';
}

/**
 * Puts a {@link DapProxy} between an editor and a debug adapter and binds
 * the session to `controller`.
 *
 * Stops and frames the editor selects are synced to the viewer; controller
 * notifications reach the editor's debug console as `output` events;
 * registered tools answer custom requests named after them.
 */
export function connectDapProxy(
  streams: DapProxyStreams,
  controller: SyncController,
  registry: CommandRegistry,
  options: { sessionId?: string } = {},
): DapProxyConnection {
  const proxy = new DapProxy({
    toClient: (message) => {
      streams.clientOutput.write(encodeDapMessage(message));
    },
    toAdapter: (message) => {
      streams.adapterInput.write(encodeDapMessage(message));
    },
    interceptRequest: createToolRequestInterceptor(registry),
  });

  const binding = bindDapSession(proxy, controller, options);
  proxy.onFrameSelected = (index) => {
    void binding.selectFrame(index);
  };

  const unsubscribe = controller.events.on('notification', (notification) => {
    proxy.sendEventToClient('output', {
      category: outputCategory(notification),
      output: `${notification.message}\n`,
    });
  });

  const clientReader = new DapMessageReader('dap-client');
  const adapterReader = new DapMessageReader('dap-adapter');
  const onClientData = (chunk: Buffer): void => {
    for (const message of clientReader.push(chunk)) {
      proxy.handleClientMessage(message);
    }
  };
  const onAdapterData = (chunk: Buffer): void => {
    for (const message of adapterReader.push(chunk)) {
      proxy.handleAdapterMessage(message);
    }
  };
  streams.clientInput.on('data', onClientData);
  streams.adapterOutput.on('data', onAdapterData);

  let disposed = false;
  let resolveClosed: () => void = () => {};
  const closed = new Promise<void>((resolve) => {
    resolveClosed = resolve;
  });

  const dispose = (): void => {
    if (disposed) {
      return;
    }
    disposed = true;
    streams.clientInput.off('data', onClientData);
    streams.adapterOutput.off('data', onAdapterData);
    streams.clientInput.off('end', onClientEnd);
    streams.adapterOutput.off('end', onAdapterEnd);
    unsubscribe();
    proxy.close();
    binding.dispose();
    resolveClosed();
  };

  const onClientEnd = (): void => {
    logEvent('info', 'dap:client-ended', { sessionId: binding.host.id });
    dispose();
  };
  const onAdapterEnd = (): void => {
    logEvent('info', 'dap:adapter-ended', { sessionId: binding.host.id });
    dispose();
  };
  streams.clientInput.once('end', onClientEnd);
  streams.adapterOutput.once('end', onAdapterEnd);

  return { proxy, closed, dispose };
}
