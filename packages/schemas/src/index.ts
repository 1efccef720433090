import { SyncConfigSchema } from './config/index.js';
import type { SyncConfigInputZod, SyncConfigZod } from './config/index.js';

export * from './config/index.js';

/**
 * Validated, immutable synchronization settings.
 */
export interface SyncConfig {
  readonly viewerHost: SyncConfigZod['viewerHost'];
  readonly viewerPort: SyncConfigZod['viewerPort'];
  readonly pcRegisterNames: readonly string[];
  readonly retryIntervalMs: SyncConfigZod['retryIntervalMs'];
  readonly autoEnable: SyncConfigZod['autoEnable'];
}

export type SyncConfigInput = SyncConfigInputZod;

/**
 * Merges `overrides` over the defaults and validates the result.
 *
 * Arrays replace the default wholesale. The returned record is frozen: a
 * configuration change is always a replacement.
 * @throws \{ZodError\} When a field fails validation
 */
export function resolveSyncConfig(overrides: SyncConfigInput = {}): SyncConfig {
  const parsed = SyncConfigSchema.parse(overrides);
  return Object.freeze({
    ...parsed,
    pcRegisterNames: Object.freeze([...parsed.pcRegisterNames]),
  });
}

export const DEFAULT_SYNC_CONFIG: SyncConfig = resolveSyncConfig();
