import { EventEmitter } from 'events';
import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { DebugProtocol } from '@vscode/debugprotocol';
import { SyncController } from '../sync-controller.js';
import { bindDapSession, DapSessionHost, type DapClientLike } from './dap-session-host.js';
import { FakeForwarder, createRecordingLogger } from '../__tests__/test-utils.js';

type DapEventName = 'stopped' | 'terminated' | 'exited';

function readNumber(args: unknown, key: string): number | undefined {
  if (typeof args === 'object' && args !== null && key in args) {
    const value: unknown = Reflect.get(args, key);
    return typeof value === 'number' ? value : undefined;
  }
  return undefined;
}

function readString(args: unknown, key: string): string | undefined {
  if (typeof args === 'object' && args !== null && key in args) {
    const value: unknown = Reflect.get(args, key);
    return typeof value === 'string' ? value : undefined;
  }
  return undefined;
}

/**
 * In-process debug adapter: a fixed call stack and register file.
 */
class FakeDapClient implements DapClientLike {
  private readonly emitter = new EventEmitter();
  private seq = 0;

  public stackFrames: DebugProtocol.StackFrame[] = [
    { id: 100, name: 'compute', line: 12, column: 1, instructionPointerReference: '0x7fff0001' },
    { id: 101, name: 'main', line: 40, column: 1, instructionPointerReference: '0x401020' },
    { id: 102, name: '_start', line: 0, column: 0 },
  ];
  public registers: Record<string, string> = { rip: '0x7fff0001' };

  public readonly sendRequest = vi.fn(
    async (command: string, args?: unknown): Promise<DebugProtocol.Response> => {
      const base = { seq: ++this.seq, type: 'response', request_seq: this.seq, command };

      if (command === 'stackTrace') {
        const start = readNumber(args, 'startFrame') ?? 0;
        return {
          ...base,
          success: true,
          body: {
            stackFrames: this.stackFrames.slice(start, start + 1),
            totalFrames: this.stackFrames.length,
          },
        };
      }

      if (command === 'evaluate') {
        const expression = readString(args, 'expression') ?? '';
        const value = this.registers[expression.slice(1)];
        if (value === undefined) {
          return { ...base, success: false, message: `${expression} is not available` };
        }
        return { ...base, success: true, body: { result: value, variablesReference: 0 } };
      }

      return { ...base, success: false, message: `unsupported ${command}` };
    },
  );

  public on(event: DapEventName, listener: (event: DebugProtocol.Event) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  public off(event: DapEventName, listener: (event: DebugProtocol.Event) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  public fire(event: DapEventName, body?: Record<string, unknown>): void {
    const payload: DebugProtocol.Event = { seq: ++this.seq, type: 'event', event, body };
    this.emitter.emit(event, payload);
  }
}

describe('DapSessionHost', () => {
  let client: FakeDapClient;
  let host: DapSessionHost;

  beforeEach(() => {
    client = new FakeDapClient();
    host = new DapSessionHost(client, { sessionId: 'dap-1' });
  });

  it('evaluates registers in the watch context', async () => {
    await expect(host.evaluate('$rip', 100)).resolves.toBe('0x7fff0001');

    expect(client.sendRequest).toHaveBeenCalledWith('evaluate', {
      expression: '$rip',
      frameId: 100,
      context: 'watch',
    });
  });

  it('rejects when the adapter reports a failure', async () => {
    await expect(host.evaluate('$pc', 100)).rejects.toThrow('$pc is not available');
  });

  it('selects the innermost frame of the stopped thread', async () => {
    await expect(host.handleStopped({ seq: 1, type: 'event', event: 'stopped', body: { threadId: 7 } }))
      .resolves.toEqual({ index: 0, id: 100, instructionPointerReference: '0x7fff0001' });

    expect(client.sendRequest).toHaveBeenCalledWith('stackTrace', {
      threadId: 7,
      startFrame: 0,
      levels: 1,
    });
  });

  it('has no frame before the first stop', async () => {
    expect(host.getCurrentFrame()).toBeUndefined();
    await expect(host.selectFrame(1)).resolves.toBeUndefined();
    expect(client.sendRequest).not.toHaveBeenCalled();
  });

  it('keeps the selection when the requested frame does not exist', async () => {
    await host.handleStopped({ seq: 1, type: 'event', event: 'stopped', body: { threadId: 7 } });

    await expect(host.selectFrame(9)).resolves.toBeUndefined();
    expect(host.getCurrentFrame()?.id).toBe(100);
  });
});

describe('bindDapSession', () => {
  let client: FakeDapClient;
  let forwarder: FakeForwarder;
  let controller: SyncController;

  beforeEach(() => {
    client = new FakeDapClient();
    forwarder = new FakeForwarder();
    controller = new SyncController({
      config: { autoEnable: true },
      forwarder,
      logger: createRecordingLogger(),
    });
  });

  it('syncs the innermost frame when the debuggee stops', async () => {
    const binding = bindDapSession(client, controller, { sessionId: 'dap-1' });

    client.fire('stopped', { reason: 'breakpoint', threadId: 7 });

    await vi.waitFor(() => {
      expect(forwarder.calls).toEqual(['0x7fff0001']);
    });
    expect(controller.getEngine('dap-1')?.state.detectedRegister).toBe('rip');
    expect(binding.host.getCurrentFrame()?.index).toBe(0);
  });

  it('syncs an outer frame from its instruction pointer reference', async () => {
    const binding = bindDapSession(client, controller, { sessionId: 'dap-1' });
    client.fire('stopped', { reason: 'step', threadId: 7 });
    await vi.waitFor(() => {
      expect(forwarder.calls).toHaveLength(1);
    });

    await binding.selectFrame(1);

    expect(forwarder.calls).toEqual(['0x7fff0001', '0x401020']);
  });

  it('detaches the session when the debuggee exits', () => {
    const binding = bindDapSession(client, controller, { sessionId: 'dap-1' });

    client.fire('exited', { exitCode: 0 });

    expect(controller.getEngine('dap-1')).toBeUndefined();
    expect(binding.host.getCurrentFrame()).toBeUndefined();
  });

  it('stops listening once disposed', () => {
    const binding = bindDapSession(client, controller, { sessionId: 'dap-1' });

    binding.dispose();
    client.fire('stopped', { reason: 'breakpoint', threadId: 7 });

    expect(client.sendRequest).not.toHaveBeenCalled();
    expect(controller.status().sessions).toEqual([]);
  });
});
