export { generateId } from './id.js';
export { monotonicNow, isoNow, elapsedSince } from './clock.js';
export { isValidVersion, isValidPinnedVersion } from './version.js';
export { withTimeout } from './timeout.js';
export {
  PlmError,
  PluginError,
  NotFoundError,
  AlreadyRegisteredError,
  InvalidStateError,
  HookFailedError,
  InitializationFailedError,
  InstallFailedError,
  UninstallFailedError,
  ShutdownFailedError,
  ConfigError,
  ValidationFailedError,
  OperationTimeoutError,
  AggregatePluginError,
  reasonOf,
  toError,
} from './errors.js';
export type { PlmErrorCode, HookName, ConfigErrorKind } from './errors.js';
