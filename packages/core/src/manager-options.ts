import {
  type ManagerOptions,
  type ManagerOptionsInput,
  ConfigError,
  DEFAULT_MANAGER_OPTIONS,
  managerOptionsSchema,
} from '@plm/shared';

type Env = Record<string, string | undefined>;
type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isPlainObject(value) && isPlainObject(current) ? deepMerge(current, value) : value;
  }
  return result;
}

function loadEnvVars(env: Env): PlainObject {
  const config: PlainObject = {};

  if (env.PLM_LOG_LEVEL) {
    config.logging = { level: env.PLM_LOG_LEVEL };
  }

  if (env.PLM_PLUGINS_DIR) {
    config.pluginsDir = env.PLM_PLUGINS_DIR;
    config.scanPluginsDir = true;
  }

  if (env.PLM_OPERATION_TIMEOUT_MS) {
    config.defaultTimeoutMs = Number(env.PLM_OPERATION_TIMEOUT_MS);
  }

  return config;
}

/** Defaults, then caller options, then PLM_* environment variables. */
export function resolveManagerOptions(input: ManagerOptionsInput = {}, env: Env = process.env): ManagerOptions {
  let merged = deepMerge({ ...DEFAULT_MANAGER_OPTIONS }, { ...input });
  merged = deepMerge(merged, loadEnvVars(env));

  const result = managerOptionsSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(
      'malformed',
      `Invalid manager options: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      result.error,
    );
  }
  return result.data;
}
