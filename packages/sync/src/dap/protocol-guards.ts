import type { DebugProtocol } from '@vscode/debugprotocol';

/**
 * Narrowing helpers for Debug Adapter Protocol payloads, which arrive as
 * untyped JSON.
 * @internal
 */

function isObject(value: unknown): value is object {
  return typeof value === 'object' && value !== null;
}

export function isProtocolMessage(value: unknown): value is DebugProtocol.ProtocolMessage {
  return (
    isObject(value) &&
    'seq' in value &&
    typeof value.seq === 'number' &&
    'type' in value &&
    typeof value.type === 'string'
  );
}

export function isRequest(
  message: DebugProtocol.ProtocolMessage,
): message is DebugProtocol.Request {
  return message.type === 'request' && 'command' in message && typeof message.command === 'string';
}

export function isResponse(
  message: DebugProtocol.ProtocolMessage,
): message is DebugProtocol.Response {
  return (
    message.type === 'response' &&
    'request_seq' in message &&
    typeof message.request_seq === 'number' &&
    'command' in message &&
    typeof message.command === 'string'
  );
}

export function isEvent(message: DebugProtocol.ProtocolMessage): message is DebugProtocol.Event {
  return message.type === 'event' && 'event' in message && typeof message.event === 'string';
}

/**
 * Reads a numeric field of a request's arguments or a message body.
 */
export function readNumber(value: unknown, key: string): number | undefined {
  if (!isObject(value) || !(key in value)) {
    return undefined;
  }
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'number' ? field : undefined;
}

export function hasStackFrames(
  body: unknown,
): body is Pick<DebugProtocol.StackTraceResponse['body'], 'stackFrames'> {
  return isObject(body) && 'stackFrames' in body && Array.isArray(body.stackFrames);
}

export function hasResult(
  body: unknown,
): body is Pick<DebugProtocol.EvaluateResponse['body'], 'result'> {
  return isObject(body) && 'result' in body && typeof body.result === 'string';
}
