/**
 * CLI argument parsing for the viewer-sync command.
 * @internal
 */

const VALUE_FLAGS = new Set(['--format']);

/**
 * Drops option flags (and the values of flags that take one), leaving the
 * positional arguments.
 */
function positionals(args: string[]): string[] {
  const result: string[] = [];
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) {
      continue;
    }
    if (VALUE_FLAGS.has(arg)) {
      i++;
      continue;
    }
    if (arg.startsWith('-')) {
      continue;
    }
    result.push(arg);
  }
  return result;
}

/**
 * @example
 * ```typescript
 * parseCLIArgs(['goto', '0x401020', '--format', 'json']);
 * // \{ subcommand: 'goto', address: '0x401020' \}
 * ```
 */
export function parseCLIArgs(args: string[]): {
  subcommand: string | undefined;
  address?: string;
} {
  const [subcommand, ...rest] = positionals(args);

  if (subcommand === 'goto') {
    return { subcommand, address: rest[0] };
  }

  return { subcommand };
}
