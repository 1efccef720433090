/**
 * Command registry shared by the CLI and MCP hosts.
 * @example
 * ```typescript
 * const registry = new CommandRegistry();
 * registry.register(new ViewerSyncCommand(controller));
 * await registry.getCommand('viewer-sync')?.executeViaCLI(['status']);
 * ```
 * @public
 */

import type { ICommand, Tool } from './interfaces.js';

export class CommandRegistry {
  private commands = new Map<string, ICommand>();

  /**
   * Registers a command; an existing command of the same name is replaced.
   */
  public register(command: ICommand): void {
    this.commands.set(command.name, command);
  }

  public getCommand(name: string): ICommand | undefined {
    return this.commands.get(name);
  }

  public getAllCommandNames(): string[] {
    return Array.from(this.commands.keys());
  }

  /**
   * Tool definitions of every registered command, flattened.
   */
  public getAllMCPDefinitions(): Tool[] {
    return Array.from(this.commands.values()).flatMap((command) =>
      command.getMCPDefinitions(),
    );
  }

  /**
   * Finds the command exposing the MCP tool `toolName`.
   */
  public findCommandForTool(toolName: string): ICommand | undefined {
    return Array.from(this.commands.values()).find((command) =>
      command.getMCPDefinitions().some((tool) => tool.name === toolName),
    );
  }

  public size(): number {
    return this.commands.size;
  }
}
