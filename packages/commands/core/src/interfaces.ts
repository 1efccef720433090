import type { Tool, CallToolResult } from '@modelcontextprotocol/sdk/types.js';

export type { Tool, CallToolResult };

export type OutputFormat = 'json' | 'text' | 'console';

/**
 * Options every command understands, from MCP arguments or CLI flags.
 * @public
 */
export interface ICommandOptions {
  verbose?: boolean;
  format?: OutputFormat;
}

/**
 * A command reachable both as MCP tools and as a CLI subcommand.
 * @public
 */
export interface ICommand {
  /** CLI name, e.g. `viewer-sync` */
  readonly name: string;
  readonly description: string;

  /**
   * Runs one of the tools from {@link ICommand.getMCPDefinitions}.
   * Failures are returned with `isError`, never thrown.
   */
  executeToolViaMCP(toolName: string, args: Record<string, unknown>): Promise<CallToolResult>;

  /**
   * Runs the command from parsed CLI arguments (without the command name).
   * Reports failure through `process.exitCode`.
   */
  executeViaCLI(args: string[]): Promise<void>;

  getMCPDefinitions(): Tool[];
}
