import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { DebugProtocol } from '@vscode/debugprotocol';
import { SyncController } from '../sync-controller.js';
import { DapProxy, type DapRequestInterceptor } from './dap-proxy.js';
import { bindDapSession } from './dap-session-host.js';
import { isRequest, isResponse, readNumber } from './protocol-guards.js';
import { FakeForwarder, createRecordingLogger } from '../__tests__/test-utils.js';

function request(seq: number, command: string, args?: unknown): DebugProtocol.Request {
  return { seq, type: 'request', command, arguments: args };
}

function response(
  seq: number,
  requestSeq: number,
  command: string,
  body?: unknown,
): DebugProtocol.Response {
  return { seq, type: 'response', request_seq: requestSeq, command, success: true, body };
}

function event(seq: number, name: string, body?: unknown): DebugProtocol.Event {
  return { seq, type: 'event', event: name, body };
}

const frames: DebugProtocol.StackFrame[] = [
  { id: 100, name: 'compute', line: 12, column: 1, instructionPointerReference: '0x7fff0001' },
  { id: 101, name: 'main', line: 40, column: 1, instructionPointerReference: '0x401020' },
  { id: 102, name: '_start', line: 0, column: 0 },
];

describe('DapProxy', () => {
  let toClient: DebugProtocol.ProtocolMessage[];
  let toAdapter: DebugProtocol.ProtocolMessage[];

  function createProxy(interceptRequest?: DapRequestInterceptor): DapProxy {
    return new DapProxy({
      toClient: (message) => {
        toClient.push(message);
      },
      toAdapter: (message) => {
        toAdapter.push(message);
      },
      interceptRequest,
    });
  }

  beforeEach(() => {
    toClient = [];
    toAdapter = [];
  });

  describe('sequence numbers', () => {
    it('renumbers client requests and maps responses back', async () => {
      const proxy = createProxy();
      const own = proxy.sendRequest('evaluate', { expression: '$pc' });

      proxy.handleClientMessage(request(1, 'threads'));
      proxy.handleAdapterMessage(response(10, 2, 'threads', { threads: [] }));
      proxy.handleAdapterMessage(response(11, 1, 'evaluate', { result: '0x1' }));

      expect(toAdapter).toEqual([
        request(1, 'evaluate', { expression: '$pc' }),
        request(2, 'threads'),
      ]);
      expect(toClient).toEqual([response(1, 1, 'threads', { threads: [] })]);
      await expect(own).resolves.toEqual(response(11, 1, 'evaluate', { result: '0x1' }));
    });

    it('numbers events it adds between relayed ones', () => {
      const proxy = createProxy();

      proxy.handleAdapterMessage(event(7, 'initialized'));
      proxy.sendEventToClient('output', { category: 'console', output: 'synced\n' });
      proxy.handleAdapterMessage(event(8, 'thread', { reason: 'started', threadId: 1 }));

      expect(toClient.map(({ seq }) => seq)).toEqual([1, 2, 3]);
      expect(toClient[1]).toEqual(
        event(2, 'output', { category: 'console', output: 'synced\n' }),
      );
    });

    it('routes answers to reverse requests back to the adapter', () => {
      const proxy = createProxy();
      proxy.handleAdapterMessage(event(3, 'initialized'));

      proxy.handleAdapterMessage(request(20, 'runInTerminal', { args: ['./a.out'] }));
      proxy.handleClientMessage(response(5, 2, 'runInTerminal', { processId: 4242 }));

      expect(toClient[1]).toEqual(request(2, 'runInTerminal', { args: ['./a.out'] }));
      expect(toAdapter).toEqual([response(1, 20, 'runInTerminal', { processId: 4242 })]);
    });
  });

  describe('events', () => {
    it('relays stops before notifying listeners', () => {
      const proxy = createProxy();
      const seen: number[] = [];
      proxy.on('stopped', () => {
        seen.push(toClient.length);
      });

      proxy.handleAdapterMessage(event(7, 'stopped', { reason: 'breakpoint', threadId: 1 }));

      expect(seen).toEqual([1]);
      expect(toClient).toEqual([event(1, 'stopped', { reason: 'breakpoint', threadId: 1 })]);
    });

    it('keeps relaying when a listener throws', () => {
      const proxy = createProxy();
      const listener = vi.fn();
      proxy.on('exited', () => {
        throw new Error('listener failed');
      });
      proxy.on('exited', listener);

      proxy.handleAdapterMessage(event(7, 'exited', { exitCode: 0 }));
      proxy.handleAdapterMessage(event(8, 'terminated'));

      expect(listener).toHaveBeenCalledWith(event(7, 'exited', { exitCode: 0 }));
      expect(toClient).toHaveLength(2);
    });

    it('stops notifying removed listeners', () => {
      const proxy = createProxy();
      const listener = vi.fn();
      proxy.on('stopped', listener);
      proxy.off('stopped', listener);

      proxy.handleAdapterMessage(event(7, 'stopped', { threadId: 1 }));

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('intercepted requests', () => {
    const interceptor: DapRequestInterceptor = (message) => {
      if (message.command === 'viewer_sync_status') {
        return Promise.resolve({ success: true, body: { sessions: [] } });
      }
      if (message.command === 'viewer_sync_toggle') {
        return Promise.reject(new Error('No debug session'));
      }
      return undefined;
    };

    it('answers claimed requests without involving the adapter', async () => {
      const proxy = createProxy(interceptor);

      proxy.handleClientMessage(request(3, 'viewer_sync_status'));

      await vi.waitFor(() => {
        expect(toClient).toHaveLength(1);
      });
      expect(toClient[0]).toEqual(response(1, 3, 'viewer_sync_status', { sessions: [] }));
      expect(toAdapter).toEqual([]);
    });

    it('answers a failed interception with an error response', async () => {
      const proxy = createProxy(interceptor);

      proxy.handleClientMessage(request(4, 'viewer_sync_toggle'));

      await vi.waitFor(() => {
        expect(toClient).toHaveLength(1);
      });
      expect(toClient[0]).toMatchObject({
        type: 'response',
        request_seq: 4,
        command: 'viewer_sync_toggle',
        success: false,
        message: 'No debug session',
      });
    });

    it('forwards requests the interceptor passes on', () => {
      const proxy = createProxy(interceptor);

      proxy.handleClientMessage(request(5, 'threads'));

      expect(toAdapter).toEqual([request(1, 'threads')]);
    });
  });

  describe('frame selection', () => {
    let proxy: DapProxy;
    let selected: number[];

    beforeEach(() => {
      proxy = createProxy();
      selected = [];
      proxy.onFrameSelected = (index) => {
        selected.push(index);
      };
      proxy.handleClientMessage(request(1, 'stackTrace', { threadId: 1, startFrame: 0, levels: 20 }));
      proxy.handleAdapterMessage(response(30, 1, 'stackTrace', { stackFrames: frames }));
    });

    it('reports the frame the editor asks scopes for', () => {
      proxy.handleClientMessage(request(2, 'scopes', { frameId: 101 }));
      proxy.handleClientMessage(request(3, 'scopes', { frameId: 101 }));
      proxy.handleClientMessage(request(4, 'scopes', { frameId: 100 }));

      expect(selected).toEqual([1, 0]);
      expect(toAdapter.filter(isRequest).map(({ command }) => command)).toEqual([
        'stackTrace',
        'scopes',
        'scopes',
        'scopes',
      ]);
    });

    it('offsets frames of a paged stack trace', () => {
      proxy.handleClientMessage(request(2, 'stackTrace', { threadId: 1, startFrame: 2, levels: 1 }));
      proxy.handleAdapterMessage(response(31, 2, 'stackTrace', { stackFrames: [{ ...frames[2], id: 205 }] }));

      proxy.handleClientMessage(request(3, 'scopes', { frameId: 205 }));

      expect(selected).toEqual([2]);
    });

    it('forgets frames once the debuggee runs again', () => {
      proxy.handleAdapterMessage(event(40, 'continued', { threadId: 1 }));

      proxy.handleClientMessage(request(2, 'scopes', { frameId: 101 }));

      expect(selected).toEqual([]);
    });
  });

  describe('close', () => {
    it('fails pending and later requests of its own', async () => {
      const proxy = createProxy();
      const pending = proxy.sendRequest('stackTrace', { threadId: 1 });

      proxy.close();

      await expect(pending).rejects.toThrow('Debug adapter connection closed');
      await expect(proxy.sendRequest('threads')).rejects.toThrow('Debug adapter connection closed');
    });

    it('drops traffic after closing', () => {
      const proxy = createProxy();
      proxy.close();

      proxy.handleAdapterMessage(event(7, 'stopped', { threadId: 1 }));
      proxy.handleClientMessage(request(1, 'threads'));
      proxy.sendEventToClient('output', { output: 'late\n' });

      expect(toClient).toEqual([]);
      expect(toAdapter).toEqual([]);
    });
  });

  describe('with a sync controller', () => {
    it('syncs stops and frames the editor selects', async () => {
      let adapterSeq = 100;
      const forwarder = new FakeForwarder();
      const controller = new SyncController({
        config: { autoEnable: true },
        forwarder,
        logger: createRecordingLogger(),
      });

      const answer = (message: DebugProtocol.Request): DebugProtocol.Response => {
        const base = response(++adapterSeq, message.seq, message.command);
        if (message.command === 'stackTrace') {
          const start = readNumber(message.arguments, 'startFrame') ?? 0;
          const levels = readNumber(message.arguments, 'levels') ?? frames.length;
          return { ...base, body: { stackFrames: frames.slice(start, start + levels) } };
        }
        if (message.command === 'evaluate') {
          const args: unknown = message.arguments;
          const expression =
            typeof args === 'object' && args !== null ? Reflect.get(args, 'expression') : undefined;
          return expression === '$rip'
            ? { ...base, body: { result: '0x7fff0001', variablesReference: 0 } }
            : { ...base, success: false, message: 'not available' };
        }
        return { ...base, body: { scopes: [] } };
      };

      const proxy: DapProxy = new DapProxy({
        toClient: (message) => {
          toClient.push(message);
        },
        toAdapter: (message) => {
          toAdapter.push(message);
          if (isRequest(message)) {
            queueMicrotask(() => proxy.handleAdapterMessage(answer(message)));
          }
        },
      });
      const binding = bindDapSession(proxy, controller, { sessionId: 'dap-1' });
      proxy.onFrameSelected = (index) => {
        void binding.selectFrame(index);
      };

      proxy.handleAdapterMessage(event(1, 'stopped', { reason: 'breakpoint', threadId: 1 }));
      await vi.waitFor(() => {
        expect(forwarder.calls).toEqual(['0x7fff0001']);
      });

      proxy.handleClientMessage(request(1, 'stackTrace', { threadId: 1, startFrame: 0, levels: 20 }));
      await vi.waitFor(() => {
        expect(toClient.filter(isResponse)).toHaveLength(1);
      });
      proxy.handleClientMessage(request(2, 'scopes', { frameId: 101 }));

      await vi.waitFor(() => {
        expect(forwarder.calls).toEqual(['0x7fff0001', '0x401020']);
      });
      await vi.waitFor(() => {
        expect(toClient.filter(isResponse).map(({ request_seq }) => request_seq)).toEqual([1, 2]);
      });
      expect(controller.getEngine('dap-1')?.state.detectedRegister).toBe('rip');
      controller.dispose();
    });
  });
});
