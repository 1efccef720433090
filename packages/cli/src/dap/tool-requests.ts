import type { CallToolResult, CommandRegistry } from '@disasm-sync/commands-core';
import type { DapRequestInterceptor, InterceptedResult } from '@disasm-sync/sync';

function toArguments(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }
  return Object.fromEntries(Object.entries(value));
}

function toInterceptedResult(result: CallToolResult): InterceptedResult {
  const body = { content: result.content };
  if (!result.isError) {
    return { success: true, body };
  }
  const message = result.content
    .flatMap((item) => (item.type === 'text' ? [item.text] : []))
    .join('\n');
  return { success: false, message, body };
}

/**
 * Serves registered tools as custom DAP requests: a request whose command
 * names a tool (e.g. `viewer_sync_toggle`) runs it with the request's
 * arguments.
 */
export function createToolRequestInterceptor(registry: CommandRegistry): DapRequestInterceptor {
  return (request) => {
    const command = registry.findCommandForTool(request.command);
    if (!command) {
      return undefined;
    }
    return command
      .executeToolViaMCP(request.command, toArguments(request.arguments))
      .then(toInterceptedResult);
  };
}
