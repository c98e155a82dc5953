import { z } from 'zod';

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const loggingConfigSchema = z.object({
  level: logLevelSchema.default('info'),
});

export const managerOptionsSchema = z.object({
  pluginsDir: z.string().min(1).optional(),
  scanPluginsDir: z.boolean().default(false),
  discoverOnInitialize: z.boolean().default(true),
  defaultTimeoutMs: z.number().int().positive().optional(),
  logging: loggingConfigSchema.default({}),
});

export type ManagerOptionsInput = z.input<typeof managerOptionsSchema>;
