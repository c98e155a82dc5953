export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface PluginConfig {
  name: string;
  version: string;
  enabled: boolean;
  /** Opaque to the core; only the owning plugin interprets it */
  config: JsonValue;
}

export interface ProjectInfo {
  name: string;
  version: string;
  rootPath: string;
  description?: string;
}

export interface ProjectConfig {
  project: ProjectInfo;
  plugins: PluginConfig[];
  /** Unknown top-level fields of the file, written back on save */
  extras?: Record<string, JsonValue>;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LoggingConfig {
  level: LogLevel;
}

export interface ManagerOptions {
  pluginsDir?: string;
  scanPluginsDir: boolean;
  discoverOnInitialize: boolean;
  defaultTimeoutMs?: number;
  logging: LoggingConfig;
}
