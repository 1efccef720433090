/**
 * Command contract for disasm-sync tools.
 *
 * A command implements {@link ICommand} once and is reachable both as MCP
 * tools (for editor or assistant integrations) and as a CLI subcommand.
 * @public
 * @see file:./interfaces.ts - Core interface definitions
 * @see file:./base-command.ts - Base command implementation
 */

export type {
  ICommand,
  ICommandOptions,
  OutputFormat,
  Tool,
  CallToolResult,
} from './interfaces.js';
export { BaseCommand } from './base-command.js';
export { CommandRegistry } from './registry.js';
export { createErrorResponse, createTextResponse } from './util/responses.js';
