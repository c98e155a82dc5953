import { z } from 'zod';
import type { JsonValue } from '../types/config.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.null(),
    z.boolean(),
    z.number(),
    z.string(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

/** Same rule ConfigStore.validate() applies before a save. */
const nonBlank = (label: string) =>
  z.string().refine(value => value.trim() !== '', { message: `${label} cannot be empty` });

export const pluginConfigFileSchema = z.object({
  name: nonBlank('plugin name'),
  version: z.string().default(''),
  enabled: z.boolean().default(true),
  config: jsonValueSchema.default({}),
});

export const projectInfoFileSchema = z.object({
  name: nonBlank('project name'),
  version: z.string().default('0.0.0'),
  root_path: nonBlank('project root').default('.'),
  description: z.string().optional(),
});

/** On-disk project file; unknown top-level fields pass through. */
export const projectConfigFileSchema = z
  .object({
    project: projectInfoFileSchema,
    plugins: z.array(pluginConfigFileSchema).default([]),
  })
  .passthrough()
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    file.plugins.forEach((plugin, index) => {
      if (seen.has(plugin.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['plugins', index, 'name'],
          message: `Duplicate plugin name: ${plugin.name}`,
        });
      }
      seen.add(plugin.name);
    });
  });

export type ProjectConfigFile = z.infer<typeof projectConfigFileSchema>;
