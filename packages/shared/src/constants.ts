import type { InstallOptions } from './types/plugin.js';
import type { ManagerOptions, ProjectConfig } from './types/config.js';

export const MANIFEST_FILE = 'plugin.json';

export const DEFAULT_PROJECT_VERSION = '1.0.0';

export const DEFAULT_INSTALL_OPTIONS: InstallOptions = {
  force: false,
  dryRun: false,
  verbose: false,
};

export const DEFAULT_MANAGER_OPTIONS: ManagerOptions = {
  scanPluginsDir: false,
  discoverOnInitialize: true,
  logging: {
    level: 'info',
  },
};

export function defaultProjectConfig(name: string, rootPath: string): ProjectConfig {
  return {
    project: {
      name,
      version: DEFAULT_PROJECT_VERSION,
      rootPath,
    },
    plugins: [],
  };
}
