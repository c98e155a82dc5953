export {
  jsonValueSchema,
  pluginConfigFileSchema,
  projectInfoFileSchema,
  projectConfigFileSchema,
} from './config.schema.js';
export type { ProjectConfigFile } from './config.schema.js';
export { pluginManifestSchema, installOptionsSchema } from './plugin.schema.js';
export type { InstallOptionsInput } from './plugin.schema.js';
export { logLevelSchema, loggingConfigSchema, managerOptionsSchema } from './options.schema.js';
export type { ManagerOptionsInput } from './options.schema.js';
