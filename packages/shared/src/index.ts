export * from './types/plugin.js';
export type {
  JsonValue,
  PluginConfig,
  ProjectInfo,
  ProjectConfig,
  LogLevel,
  LoggingConfig,
  ManagerOptions,
} from './types/config.js';
export type { ValidationFailure, ValidationSummary, DiscoveryReport } from './types/validation.js';
export type { TraceStepType, TraceStep, OperationTraceRecord, OperationResult } from './types/trace.js';
export * from './schemas/index.js';
export * from './utils/index.js';
export {
  MANIFEST_FILE,
  DEFAULT_PROJECT_VERSION,
  DEFAULT_INSTALL_OPTIONS,
  DEFAULT_MANAGER_OPTIONS,
  defaultProjectConfig,
} from './constants.js';
