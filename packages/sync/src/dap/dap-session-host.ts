import { randomUUID } from 'crypto';
import type { DebugProtocol } from '@vscode/debugprotocol';
import { logError, logEvent } from '@disasm-sync/core';
import type { DebugSessionHost, FrameInfo } from '../types/index.js';
import type { SyncController } from '../sync-controller.js';
import { hasResult, hasStackFrames, readNumber } from './protocol-guards.js';

export type DapEventName = 'stopped' | 'terminated' | 'exited';

/**
 * The slice of a Debug Adapter Protocol client the bridge relies on.
 *
 * `sendRequest` resolves with the raw response, successful or not; events
 * are delivered with their DAP payload.
 * @public
 */
export interface DapClientLike {
  sendRequest(command: string, args?: unknown): Promise<DebugProtocol.Response>;
  on(event: DapEventName, listener: (event: DebugProtocol.Event) => void): unknown;
  off?(event: DapEventName, listener: (event: DebugProtocol.Event) => void): unknown;
}

export interface DapSessionHostOptions {
  /** Defaults to a random UUID */
  sessionId?: string;
}

/**
 * DebugSessionHost over a DAP client.
 *
 * Tracks the stopped thread and the selected frame. Register reads go
 * through `evaluate` with the `watch` context.
 * @public
 */
export class DapSessionHost implements DebugSessionHost {
  public readonly id: string;
  private threadId?: number;
  private currentFrame?: FrameInfo;

  public constructor(
    private readonly client: DapClientLike,
    options: DapSessionHostOptions = {},
  ) {
    this.id = options.sessionId ?? randomUUID();
  }

  public getCurrentFrame(): FrameInfo | undefined {
    return this.currentFrame;
  }

  public async evaluate(expression: string, frameId: number): Promise<string> {
    const args: DebugProtocol.EvaluateArguments = {
      expression,
      frameId,
      context: 'watch',
    };
    const response = await this.client.sendRequest('evaluate', args);
    if (!response.success) {
      throw new Error(response.message ?? `evaluate ${expression} failed`);
    }
    if (!hasResult(response.body)) {
      throw new Error(`evaluate ${expression} returned no result`);
    }
    return response.body.result;
  }

  /**
   * Records the stopped thread and selects its innermost frame.
   */
  public async handleStopped(event: DebugProtocol.Event): Promise<FrameInfo | undefined> {
    const threadId = readNumber(event.body, 'threadId');
    if (threadId !== undefined) {
      this.threadId = threadId;
    }
    this.currentFrame = await this.fetchFrame(0);
    return this.currentFrame;
  }

  /**
   * Selects the frame at `index` on the stopped thread's call stack.
   * @returns the selected frame, or undefined when the stack has no such frame
   */
  public async selectFrame(index: number): Promise<FrameInfo | undefined> {
    const frame = await this.fetchFrame(index);
    if (frame) {
      this.currentFrame = frame;
    }
    return frame;
  }

  public clear(): void {
    this.threadId = undefined;
    this.currentFrame = undefined;
  }

  private async fetchFrame(index: number): Promise<FrameInfo | undefined> {
    if (this.threadId === undefined) {
      return undefined;
    }
    const args: DebugProtocol.StackTraceArguments = {
      threadId: this.threadId,
      startFrame: index,
      levels: 1,
    };
    const response = await this.client.sendRequest('stackTrace', args);
    if (!response.success || !hasStackFrames(response.body)) {
      return undefined;
    }
    const [frame] = response.body.stackFrames;
    if (!frame) {
      return undefined;
    }
    return {
      index,
      id: frame.id,
      instructionPointerReference: frame.instructionPointerReference,
    };
  }
}

/**
 * A DAP session wired into a SyncController.
 */
export interface DapSyncBinding {
  host: DapSessionHost;
  /** Moves the selection up or down the call stack and syncs it */
  selectFrame(index: number): Promise<void>;
  /** Unsubscribes from the client and detaches the session */
  dispose(): void;
}

/**
 * Attaches a DAP client to `controller`: stops sync the innermost frame,
 * `terminated`/`exited` detach the session.
 * @public
 */
export function bindDapSession(
  client: DapClientLike,
  controller: SyncController,
  options: DapSessionHostOptions = {},
): DapSyncBinding {
  const host = new DapSessionHost(client, options);
  controller.attach(host);

  const onStopped = (event: DebugProtocol.Event): void => {
    host
      .handleStopped(event)
      .then(() => controller.handleStopped(host.id))
      .catch((error: unknown) => {
        logError('dap:stopped', error, { sessionId: host.id });
      });
  };

  const onEnded = (event: DebugProtocol.Event): void => {
    logEvent('info', 'dap:session-ended', { sessionId: host.id, event: event.event });
    host.clear();
    controller.detach(host.id);
  };

  client.on('stopped', onStopped);
  client.on('terminated', onEnded);
  client.on('exited', onEnded);

  return {
    host,
    selectFrame: async (index: number) => {
      try {
        const frame = await host.selectFrame(index);
        if (frame) {
          await controller.handleFrameChanged(host.id, frame);
        }
      } catch (error) {
        logError('dap:select-frame', error, { sessionId: host.id, index });
      }
    },
    dispose: () => {
      client.off?.('stopped', onStopped);
      client.off?.('terminated', onEnded);
      client.off?.('exited', onEnded);
      host.clear();
      controller.detach(host.id);
    },
  };
}
