import type { DebugProtocol } from '@vscode/debugprotocol';
import { logError, logEvent } from '@disasm-sync/core';
import type { DapClientLike, DapEventName } from './dap-session-host.js';
import {
  hasStackFrames,
  isEvent,
  isRequest,
  isResponse,
  readNumber,
} from './protocol-guards.js';

export type DapMessageSink = (message: DebugProtocol.ProtocolMessage) => void;

/**
 * Outcome of a client request the proxy answered itself.
 */
export interface InterceptedResult {
  success: boolean;
  message?: string;
  body?: unknown;
}

/**
 * Claims a client request by returning a promise of its result; returning
 * undefined passes the request on to the adapter.
 */
export type DapRequestInterceptor = (
  request: DebugProtocol.Request,
) => Promise<InterceptedResult> | undefined;

export interface DapProxyOptions {
  toClient: DapMessageSink;
  toAdapter: DapMessageSink;
  interceptRequest?: DapRequestInterceptor;
}

interface ForwardedRequest {
  clientSeq: number;
  request: DebugProtocol.Request;
}

interface OwnRequest {
  resolve: (response: DebugProtocol.Response) => void;
  reject: (error: Error) => void;
}

type EventListener = (event: DebugProtocol.Event) => void;

function isDapEventName(name: string): name is DapEventName {
  return name === 'stopped' || name === 'terminated' || name === 'exited';
}

/**
 * Sits between an editor (the client) and a debug adapter.
 *
 * Traffic passes through unchanged apart from sequence numbers: the proxy
 * numbers every message it sends on each side, so its own requests
 * ({@link sendRequest}) and events ({@link sendEventToClient}) never collide
 * with the editor's. Responses to its own requests are kept from the
 * editor.
 *
 * DAP has no frame-selection event; editors request `scopes` for the frame
 * the user selects. The proxy matches that frame id against the stack
 * traces it has relayed and reports the frame index through
 * {@link onFrameSelected}.
 * @public
 */
export class DapProxy implements DapClientLike {
  /** Called when the editor selects a frame other than the current one */
  public onFrameSelected?: (index: number) => void;

  private adapterSeq = 0;
  private clientSeq = 0;
  private closed = false;
  private readonly forwarded = new Map<number, ForwardedRequest>();
  private readonly own = new Map<number, OwnRequest>();
  private readonly reverse = new Map<number, number>();
  private readonly frameIndexById = new Map<number, number>();
  private selectedIndex = 0;
  private readonly listeners = new Map<DapEventName, Set<EventListener>>();

  public constructor(private readonly options: DapProxyOptions) {}

  public on(event: DapEventName, listener: EventListener): void {
    const listeners = this.listeners.get(event) ?? new Set<EventListener>();
    listeners.add(listener);
    this.listeners.set(event, listeners);
  }

  public off(event: DapEventName, listener: EventListener): void {
    this.listeners.get(event)?.delete(listener);
  }

  /**
   * Sends a request of the proxy's own to the adapter.
   * @returns the adapter's response, successful or not
   * @throws \{Error\} When the adapter connection is closed first
   */
  public sendRequest(command: string, args?: unknown): Promise<DebugProtocol.Response> {
    if (this.closed) {
      return Promise.reject(new Error('Debug adapter connection closed'));
    }

    const request: DebugProtocol.Request = {
      seq: ++this.adapterSeq,
      type: 'request',
      command,
      arguments: args,
    };
    return new Promise<DebugProtocol.Response>((resolve, reject) => {
      this.own.set(request.seq, { resolve, reject });
      this.options.toAdapter(request);
    });
  }

  public sendEventToClient(event: string, body?: unknown): void {
    if (this.closed) {
      return;
    }
    const message: DebugProtocol.Event = { seq: ++this.clientSeq, type: 'event', event, body };
    this.options.toClient(message);
  }

  public handleClientMessage(message: DebugProtocol.ProtocolMessage): void {
    if (this.closed) {
      return;
    }

    if (isRequest(message)) {
      this.handleClientRequest(message);
      return;
    }

    if (isResponse(message)) {
      // Answer to a reverse request such as runInTerminal
      const adapterSeq = this.reverse.get(message.request_seq);
      this.reverse.delete(message.request_seq);
      const response: DebugProtocol.Response = {
        ...message,
        seq: ++this.adapterSeq,
        request_seq: adapterSeq ?? message.request_seq,
      };
      this.options.toAdapter(response);
      return;
    }

    this.options.toAdapter({ ...message, seq: ++this.adapterSeq });
  }

  public handleAdapterMessage(message: DebugProtocol.ProtocolMessage): void {
    if (this.closed) {
      return;
    }

    if (isResponse(message)) {
      this.handleAdapterResponse(message);
      return;
    }

    if (isRequest(message)) {
      const seq = ++this.clientSeq;
      this.reverse.set(seq, message.seq);
      this.options.toClient({ ...message, seq });
      return;
    }

    this.options.toClient({ ...message, seq: ++this.clientSeq });

    if (isEvent(message)) {
      this.handleAdapterEvent(message);
    }
  }

  /**
   * The adapter went away: pending requests of the proxy fail, later
   * messages are dropped.
   */
  public close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const pending of this.own.values()) {
      pending.reject(new Error('Debug adapter connection closed'));
    }
    this.own.clear();
    this.forwarded.clear();
    this.reverse.clear();
    logEvent('info', 'dap-proxy:closed');
  }

  private handleClientRequest(request: DebugProtocol.Request): void {
    const interception = this.options.interceptRequest?.(request);
    if (interception) {
      void interception.then(
        (result) => this.answerClient(request, result),
        (error: unknown) => {
          logError('dap-proxy:intercept', error, { command: request.command });
          this.answerClient(request, {
            success: false,
            message: error instanceof Error ? error.message : String(error),
          });
        },
      );
      return;
    }

    if (request.command === 'scopes') {
      this.trackFrameSelection(readNumber(request.arguments, 'frameId'));
    }

    const seq = ++this.adapterSeq;
    this.forwarded.set(seq, { clientSeq: request.seq, request });
    this.options.toAdapter({ ...request, seq });
  }

  private handleAdapterResponse(response: DebugProtocol.Response): void {
    const own = this.own.get(response.request_seq);
    if (own) {
      this.own.delete(response.request_seq);
      own.resolve(response);
      return;
    }

    const forwarded = this.forwarded.get(response.request_seq);
    if (!forwarded) {
      logEvent('warn', 'dap-proxy:unmatched-response', {
        command: response.command,
        requestSeq: response.request_seq,
      });
      return;
    }
    this.forwarded.delete(response.request_seq);

    if (response.command === 'stackTrace' && response.success) {
      this.recordFrames(forwarded.request, response.body);
    }

    const relayed: DebugProtocol.Response = {
      ...response,
      seq: ++this.clientSeq,
      request_seq: forwarded.clientSeq,
    };
    this.options.toClient(relayed);
  }

  private handleAdapterEvent(event: DebugProtocol.Event): void {
    if (event.event === 'stopped' || event.event === 'continued') {
      this.frameIndexById.clear();
      this.selectedIndex = 0;
    }

    const name = event.event;
    if (!isDapEventName(name)) {
      return;
    }

    for (const listener of this.listeners.get(name) ?? []) {
      try {
        listener(event);
      } catch (error) {
        logError('dap-proxy:listener', error, { event: event.event });
      }
    }
  }

  private answerClient(request: DebugProtocol.Request, result: InterceptedResult): void {
    if (this.closed) {
      return;
    }
    const response: DebugProtocol.Response = {
      seq: ++this.clientSeq,
      type: 'response',
      request_seq: request.seq,
      command: request.command,
      success: result.success,
      message: result.message,
      body: result.body,
    };
    this.options.toClient(response);
  }

  private recordFrames(request: DebugProtocol.Request, body: unknown): void {
    if (!hasStackFrames(body)) {
      return;
    }
    const startFrame = readNumber(request.arguments, 'startFrame') ?? 0;
    body.stackFrames.forEach((frame, offset) => {
      this.frameIndexById.set(frame.id, startFrame + offset);
    });
  }

  private trackFrameSelection(frameId: number | undefined): void {
    if (frameId === undefined) {
      return;
    }
    const index = this.frameIndexById.get(frameId);
    if (index === undefined || index === this.selectedIndex) {
      return;
    }
    this.selectedIndex = index;
    logEvent('debug', 'dap-proxy:frame-selected', { frameId, index });
    this.onFrameSelected?.(index);
  }
}
