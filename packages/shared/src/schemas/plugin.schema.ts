import { z } from 'zod';

export const pluginManifestSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
  description: z.string().optional(),
  factory: z.string().min(1).optional(),
});

export const installOptionsSchema = z.object({
  force: z.boolean().default(false),
  dryRun: z.boolean().default(false),
  verbose: z.boolean().default(false),
  timeoutMs: z.number().int().positive().optional(),
});

export type InstallOptionsInput = z.input<typeof installOptionsSchema>;
