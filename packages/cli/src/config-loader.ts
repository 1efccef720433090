import { homedir } from 'os';
import { join, resolve } from 'path';
import { readFileSync, existsSync } from 'fs';
import { deepmergeCustom } from 'deepmerge-ts';
import { SyncConfigSchema, type SyncConfigZod } from '@disasm-sync/schemas';

const CONFIG_FILE_NAME = '.disasm-sync.json';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads and parses a JSON file if it exists.
 * @throws \{SyntaxError\} When the file contains invalid JSON
 * @internal
 */
function readJsonIfExists(path: string): unknown {
  if (!existsSync(path)) return undefined;
  const txt = readFileSync(path, 'utf-8');
  return JSON.parse(txt);
}

/**
 * Returns the user-level configuration directory: DISASM_SYNC_HOME when
 * set, otherwise ~/.disasm-sync
 * @public
 */
export function getUserDir(): string {
  const override = process.env.DISASM_SYNC_HOME;
  if (override && override.trim()) return override;
  return join(homedir(), '.disasm-sync');
}

export function getUserBasePath(): string {
  return join(getUserDir(), CONFIG_FILE_NAME);
}

export function getDefaultProjectConfigPath(cwd = process.cwd()): string {
  return resolve(cwd, CONFIG_FILE_NAME);
}

/**
 * Loads and merges configuration from the user base and project files.
 *
 * Merge precedence (last wins): built-in defaults, user base config
 * (~/.disasm-sync/.disasm-sync.json), project config (.disasm-sync.json or
 * the explicit path). Arrays are replaced, not concatenated.
 * @throws \{ZodError\} When the merged configuration fails schema validation
 * @throws \{SyntaxError\} When either file is not valid JSON
 * @example
 * ```typescript
 * const { config, sources } = resolveMergedSyncConfig();
 * console.log(`Loaded from: ${sources.join(', ')}`);
 * ```
 * @public
 */
export function resolveMergedSyncConfig(projectConfigPath?: string): {
  config: SyncConfigZod;
  sources: string[];
  paths: { userBasePath: string; projectConfigPath: string };
} {
  const userBasePath = getUserBasePath();
  const projectPath = projectConfigPath ?? getDefaultProjectConfigPath();

  const userBase = readJsonIfExists(userBasePath);
  const project = readJsonIfExists(projectPath);

  const merge = deepmergeCustom<Record<string, unknown>>({
    mergeArrays: (values) => values[values.length - 1],
  });

  const merged = merge(
    isRecord(userBase) ? userBase : {},
    isRecord(project) ? project : {},
  );

  const validated = SyncConfigSchema.parse(merged);

  const sources: string[] = [];
  if (userBase !== undefined) sources.push(userBasePath);
  if (project !== undefined) sources.push(projectPath);

  return {
    config: validated,
    sources,
    paths: { userBasePath, projectConfigPath: projectPath },
  };
}
