import type { LifecycleOperation, LifecycleState } from '../types/plugin.js';
import type { ValidationFailure } from '../types/validation.js';

export type PlmErrorCode =
  | 'NOT_FOUND'
  | 'ALREADY_REGISTERED'
  | 'INVALID_STATE'
  | 'INITIALIZATION_FAILED'
  | 'INSTALL_FAILED'
  | 'UNINSTALL_FAILED'
  | 'SHUTDOWN_FAILED'
  | 'CONFIG_ERROR'
  | 'VALIDATION_FAILED'
  | 'OPERATION_TIMEOUT'
  | 'PLUGIN_ERROR'
  | 'AGGREGATE';

export class PlmError extends Error {
  constructor(
    message: string,
    public readonly code: PlmErrorCode,
  ) {
    super(message);
    this.name = 'PlmError';
  }
}

/** Thrown by plugin implementations from their own hooks. */
export class PluginError extends PlmError {
  constructor(public readonly reason: string) {
    super(reason, 'PLUGIN_ERROR');
    this.name = 'PluginError';
  }
}

export class NotFoundError extends PlmError {
  constructor(public readonly pluginName: string) {
    super(`Plugin not found: ${pluginName}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class AlreadyRegisteredError extends PlmError {
  constructor(public readonly pluginName: string) {
    super(`Plugin already registered: ${pluginName}`, 'ALREADY_REGISTERED');
    this.name = 'AlreadyRegisteredError';
  }
}

export class InvalidStateError extends PlmError {
  constructor(
    public readonly pluginName: string,
    public readonly state: LifecycleState,
    public readonly operation: LifecycleOperation,
    detail?: string,
  ) {
    super(
      `Cannot ${operation} plugin ${pluginName} in state ${state}${detail ? `: ${detail}` : ''}`,
      'INVALID_STATE',
    );
    this.name = 'InvalidStateError';
  }
}

export type HookName = 'initialize' | 'install' | 'uninstall' | 'shutdown';

const HOOK_ERROR_CODES: Record<HookName, PlmErrorCode> = {
  initialize: 'INITIALIZATION_FAILED',
  install: 'INSTALL_FAILED',
  uninstall: 'UNINSTALL_FAILED',
  shutdown: 'SHUTDOWN_FAILED',
};

/** A plugin hook reported failure; the entry's state did not advance. */
export abstract class HookFailedError extends PlmError {
  constructor(
    public readonly pluginName: string,
    public readonly hook: HookName,
    public readonly reason: string,
    public readonly cause?: unknown,
  ) {
    super(`Plugin ${pluginName} ${hook} failed: ${reason}`, HOOK_ERROR_CODES[hook]);
  }
}

export class InitializationFailedError extends HookFailedError {
  constructor(pluginName: string, reason: string, cause?: unknown) {
    super(pluginName, 'initialize', reason, cause);
    this.name = 'InitializationFailedError';
  }
}

export class InstallFailedError extends HookFailedError {
  constructor(pluginName: string, reason: string, cause?: unknown) {
    super(pluginName, 'install', reason, cause);
    this.name = 'InstallFailedError';
  }
}

export class UninstallFailedError extends HookFailedError {
  constructor(pluginName: string, reason: string, cause?: unknown) {
    super(pluginName, 'uninstall', reason, cause);
    this.name = 'UninstallFailedError';
  }
}

export class ShutdownFailedError extends HookFailedError {
  constructor(pluginName: string, reason: string, cause?: unknown) {
    super(pluginName, 'shutdown', reason, cause);
    this.name = 'ShutdownFailedError';
  }
}

export type ConfigErrorKind = 'not_found' | 'malformed' | 'io';

export class ConfigError extends PlmError {
  constructor(
    public readonly kind: ConfigErrorKind,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

export class ValidationFailedError extends PlmError {
  constructor(public readonly failures: ValidationFailure[]) {
    super(
      `Plugin validation failed: ${failures.map(f => `${f.name}: ${f.reason}`).join('; ')}`,
      'VALIDATION_FAILED',
    );
    this.name = 'ValidationFailedError';
  }
}

export class OperationTimeoutError extends PlmError {
  constructor(
    public readonly pluginName: string,
    public readonly operation: LifecycleOperation,
    public readonly timeoutMs: number,
  ) {
    super(`Plugin ${pluginName} ${operation} timed out after ${timeoutMs}ms`, 'OPERATION_TIMEOUT');
    this.name = 'OperationTimeoutError';
  }
}

export class AggregatePluginError extends PlmError {
  constructor(
    message: string,
    public readonly errors: Error[],
  ) {
    super(`${message}: ${errors.map(e => e.message).join('; ')}`, 'AGGREGATE');
    this.name = 'AggregatePluginError';
  }
}

/** Failure reason for anything a plugin hook may throw. */
export function reasonOf(err: unknown): string {
  if (err instanceof PluginError) return err.reason;
  if (err instanceof Error) return err.message;
  return String(err);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
