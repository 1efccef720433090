/**
 * Base abstract class for disasm-sync commands.
 *
 * Provides option parsing and logging helpers that work in both the MCP and
 * the CLI execution context.
 * @example
 * ```typescript
 * export class MyCommand extends BaseCommand {
 *   readonly name = 'my-command';
 *   readonly description = 'My command description';
 *
 *   async executeViaCLI(args: string[]) {
 *     const options = this.parseCommonOptions(args);
 *     this.log('Processing...', options);
 *   }
 *   // executeToolViaMCP, getMCPDefinitions
 * }
 * ```
 * @see file:./interfaces.ts - ICommand interface definition
 * @public
 */

import type {
  CallToolResult,
  ICommand,
  ICommandOptions,
  OutputFormat,
  Tool,
} from './interfaces.js';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'text', 'console'];

function isOutputFormat(value: unknown): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

/**
 * Abstract base class that provides common functionality for all commands.
 * @public
 */
export abstract class BaseCommand implements ICommand {
  public abstract readonly name: string;
  public abstract readonly description: string;

  public abstract executeToolViaMCP(
    toolName: string,
    args: Record<string, unknown>,
  ): Promise<CallToolResult>;
  public abstract executeViaCLI(args: string[]): Promise<void>;
  public abstract getMCPDefinitions(): Tool[];

  /**
   * Extracts `verbose` and `format` from MCP arguments (object) or CLI
   * arguments (`--verbose`/`-v`, `--format <type>`).
   * @example
   * ```typescript
   * this.parseCommonOptions(['--verbose', '--format', 'json']);
   * // Returns: \{ verbose: true, format: 'json' \}
   * ```
   */
  protected parseCommonOptions(args: Record<string, unknown> | string[]): ICommandOptions {
    const options: ICommandOptions = {};

    if (Array.isArray(args)) {
      options.verbose = args.includes('--verbose') || args.includes('-v');

      const formatIndex = args.findIndex((arg) => arg === '--format');
      if (formatIndex !== -1 && formatIndex < args.length - 1) {
        const format = args[formatIndex + 1];
        if (isOutputFormat(format)) {
          options.format = format;
        }
      }
    } else {
      options.verbose = Boolean(args.verbose);
      if (isOutputFormat(args.format)) {
        options.format = args.format;
      }
    }

    return options;
  }

  /**
   * Writes to stdout unless the output format is 'json', where anything
   * but the payload would corrupt the output.
   */
  protected log(message: string, options: ICommandOptions = {}): void {
    if (options.format === 'json') {
      return;
    }
    console.info(message);
  }

  /**
   * Writes to stderr unless the output format is 'json'.
   */
  protected logError(message: string, options: ICommandOptions = {}): void {
    if (options.format === 'json') {
      return;
    }
    console.error(message);
  }
}
