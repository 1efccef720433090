import { z } from 'zod';

export const SyncConfigSchema = z.object({
  viewerHost: z.string().min(1).default('127.0.0.1'),
  viewerPort: z.number().int().min(1).max(65535).default(18888),
  // Tried concurrently; the first register that answers wins
  pcRegisterNames: z
    .array(z.string().min(1))
    .min(1)
    .default(['pc', 'rip', 'eip', 'r15']),
  retryIntervalMs: z.number().int().positive().default(3000),
  autoEnable: z.boolean().default(false),
});

export type SyncConfigZod = z.infer<typeof SyncConfigSchema>;
export type SyncConfigInputZod = z.input<typeof SyncConfigSchema>;
