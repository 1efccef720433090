export { SyncConfigSchema } from './SyncConfigSchema.js';
export type { SyncConfigZod, SyncConfigInputZod } from './SyncConfigSchema.js';
