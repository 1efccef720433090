/**
 * Response helpers for MCP tool calls.
 */
import type { CallToolResult } from '../interfaces.js';

export function createErrorResponse(message: string): CallToolResult {
  return {
    content: [
      {
        type: 'text',
        text: message,
      },
    ],
    isError: true,
  };
}

/**
 * One or two text blocks; the second carries hints for the caller.
 */
export function createTextResponse(text: string, additionalText?: string): CallToolResult {
  const content: Array<{ type: 'text'; text: string }> = [
    {
      type: 'text',
      text,
    },
  ];

  if (additionalText) {
    content.push({
      type: 'text',
      text: additionalText,
    });
  }

  return { content };
}
