import { readFile, writeFile, rename, rm, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import PQueue from 'p-queue';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import {
  type JsonValue,
  type PluginConfig,
  type ProjectConfig,
  type ProjectConfigFile,
  ConfigError,
  NotFoundError,
  defaultProjectConfig,
  jsonValueSchema,
  projectConfigFileSchema,
  reasonOf,
} from '@plm/shared';
import { enqueue } from './lock-pool.js';
import type { Logger } from './logger.js';

const KNOWN_TOP_LEVEL_KEYS = new Set(['project', 'plugins']);

function isYamlPath(path: string): boolean {
  return path.endsWith('.yaml') || path.endsWith('.yml');
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Holds the project configuration in memory. Mutations stay in memory until
 * save() is called; load and save on one store are serialized.
 */
export class ConfigStore {
  private config: ProjectConfig;
  private io = new PQueue({ concurrency: 1 });
  private tempCounter = 0;

  constructor(
    private logger: Logger,
    config?: ProjectConfig,
  ) {
    this.config = config
      ? ConfigStore.parse(ConfigStore.toFile(config), 'in-memory config')
      : defaultProjectConfig('default', '.');
  }

  /** Snapshot of the current configuration. */
  get current(): ProjectConfig {
    return structuredClone(this.config);
  }

  async loadFromFile(path: string): Promise<ProjectConfig> {
    return this.exclusive(async () => {
      let content: string;
      try {
        content = await readFile(path, 'utf-8');
      } catch (err) {
        if (isErrnoException(err) && err.code === 'ENOENT') {
          throw new ConfigError('not_found', `config file not found: ${path}`, err);
        }
        throw new ConfigError('io', `failed to read ${path}: ${reasonOf(err)}`, err);
      }

      let raw: unknown;
      try {
        raw = isYamlPath(path) ? parseYaml(content) : JSON.parse(content);
      } catch (err) {
        throw new ConfigError('malformed', `failed to parse ${path}: ${reasonOf(err)}`, err);
      }

      this.config = ConfigStore.parse(raw, path);
      this.logger.info({ path, plugins: this.config.plugins.length }, 'Project config loaded');
      return this.current;
    });
  }

  /** Adopts an in-memory configuration after checking its shape. */
  load(config: ProjectConfig): ProjectConfig {
    this.config = ConfigStore.parse(ConfigStore.toFile(config), 'in-memory config');
    return this.current;
  }

  /** Writes to a temporary file beside `path`, then renames it into place. */
  async save(path: string): Promise<void> {
    await this.exclusive(async () => {
      this.validate();
      const file = ConfigStore.toFile(this.config);
      const content = isYamlPath(path) ? stringifyYaml(file) : `${JSON.stringify(file, null, 2)}\n`;
      const tempPath = `${path}.${process.pid}.${++this.tempCounter}.tmp`;

      try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(tempPath, content, 'utf-8');
        await rename(tempPath, path);
      } catch (err) {
        await rm(tempPath, { force: true });
        throw new ConfigError('io', `failed to write ${path}: ${reasonOf(err)}`, err);
      }
      this.logger.info({ path }, 'Project config saved');
    });
  }

  /** Adds a plugin config, replacing one with the same name in place. */
  addPluginConfig(config: PluginConfig): void {
    const copy = structuredClone(config);
    const index = this.config.plugins.findIndex(p => p.name === config.name);
    if (index >= 0) {
      this.config.plugins[index] = copy;
    } else {
      this.config.plugins.push(copy);
    }
  }

  removePluginConfig(name: string): PluginConfig | undefined {
    const index = this.config.plugins.findIndex(p => p.name === name);
    if (index < 0) return undefined;
    const [removed] = this.config.plugins.splice(index, 1);
    return removed;
  }

  getPluginConfig(name: string): PluginConfig | undefined {
    const config = this.config.plugins.find(p => p.name === name);
    return config ? structuredClone(config) : undefined;
  }

  listPluginConfigs(): PluginConfig[] {
    return structuredClone(this.config.plugins);
  }

  enablePlugin(name: string): void {
    this.requirePlugin(name).enabled = true;
  }

  disablePlugin(name: string): void {
    this.requirePlugin(name).enabled = false;
  }

  /** Sets one key of the plugin's opaque config; a non-object config is replaced. */
  updatePluginSetting(name: string, key: string, value: JsonValue): void {
    const plugin = this.requirePlugin(name);
    const current = plugin.config;
    const settings: { [key: string]: JsonValue } =
      current !== null && typeof current === 'object' && !Array.isArray(current) ? current : {};
    settings[key] = structuredClone(value);
    plugin.config = settings;
  }

  /** Checks the invariants a loaded file already satisfies, for configs built in code. */
  validate(): void {
    const problems: string[] = [];
    if (this.config.project.name.trim() === '') problems.push('project name cannot be empty');
    if (this.config.project.rootPath.trim() === '') problems.push('project root cannot be empty');

    const seen = new Set<string>();
    for (const plugin of this.config.plugins) {
      if (plugin.name.trim() === '') problems.push('plugin name cannot be empty');
      if (seen.has(plugin.name)) problems.push(`duplicate plugin name: ${plugin.name}`);
      seen.add(plugin.name);
    }

    if (problems.length > 0) {
      throw new ConfigError('malformed', problems.join(', '));
    }
  }

  private requirePlugin(name: string): PluginConfig {
    const plugin = this.config.plugins.find(p => p.name === name);
    if (!plugin) {
      throw new NotFoundError(name);
    }
    return plugin;
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    return enqueue(this.io, task);
  }

  private static parse(raw: unknown, source: string): ProjectConfig {
    const result = projectConfigFileSchema.safeParse(raw);
    if (!result.success) {
      throw new ConfigError(
        'malformed',
        `invalid project config in ${source}: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
        result.error,
      );
    }
    return ConfigStore.fromFile(result.data, source);
  }

  private static fromFile(file: ProjectConfigFile, source: string): ProjectConfig {
    const config: ProjectConfig = {
      project: {
        name: file.project.name,
        version: file.project.version,
        rootPath: file.project.root_path,
      },
      plugins: file.plugins.map(p => ({
        name: p.name,
        version: p.version,
        enabled: p.enabled,
        config: p.config,
      })),
    };
    if (file.project.description !== undefined) {
      config.project.description = file.project.description;
    }

    const extras: Record<string, JsonValue> = {};
    for (const [key, value] of Object.entries(file)) {
      if (KNOWN_TOP_LEVEL_KEYS.has(key)) continue;
      const parsed = jsonValueSchema.safeParse(value);
      if (!parsed.success) {
        throw new ConfigError('malformed', `unsupported value for "${key}" in ${source}`, parsed.error);
      }
      extras[key] = parsed.data;
    }
    if (Object.keys(extras).length > 0) {
      config.extras = extras;
    }
    return config;
  }

  private static toFile(config: ProjectConfig): Record<string, JsonValue> {
    const project: Record<string, JsonValue> = {
      name: config.project.name,
      version: config.project.version,
      root_path: config.project.rootPath,
    };
    if (config.project.description !== undefined) {
      project.description = config.project.description;
    }

    return {
      ...structuredClone(config.extras ?? {}),
      project,
      plugins: config.plugins.map(p => ({
        name: p.name,
        version: p.version,
        enabled: p.enabled,
        config: structuredClone(p.config),
      })),
    };
  }
}
