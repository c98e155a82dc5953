import {
  type InstallOptions,
  type InstallOptionsInput,
  type OperationResult,
  type PluginConfig,
  ConfigError,
  NotFoundError,
  OperationTimeoutError,
  installOptionsSchema,
  reasonOf,
  withTimeout,
} from '@plm/shared';
import type { PluginLockPool } from './lock-pool.js';
import type { Logger } from './logger.js';
import { OperationTrace } from './operation-trace.js';
import type { HookObserver, PluginRegistry } from './plugin-registry.js';

type Operation = 'install' | 'uninstall';

export interface InstallOrchestratorOptions {
  registry: PluginRegistry;
  locks: PluginLockPool;
  logger: Logger;
  configLookup?: (name: string) => PluginConfig | undefined;
  defaultTimeoutMs?: number;
}

export function normalizeInstallOptions(input: InstallOptionsInput = {}): InstallOptions {
  const result = installOptionsSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      'malformed',
      `Invalid install options: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      result.error,
    );
  }
  return result.data;
}

/**
 * Runs install and uninstall under the plugin's lock. The lock is held from
 * reading the state until the new state is written, and released on every
 * exit path.
 */
export class InstallOrchestrator {
  private registry: PluginRegistry;
  private locks: PluginLockPool;
  private logger: Logger;
  private configLookup: (name: string) => PluginConfig | undefined;
  private defaultTimeoutMs?: number;

  constructor(options: InstallOrchestratorOptions) {
    this.registry = options.registry;
    this.locks = options.locks;
    this.logger = options.logger;
    this.configLookup = options.configLookup ?? (() => undefined);
    this.defaultTimeoutMs = options.defaultTimeoutMs;
  }

  installPlugin(name: string, version?: string, options?: InstallOptionsInput): Promise<OperationResult> {
    return this.run('install', name, version, options);
  }

  uninstallPlugin(name: string, version?: string, options?: InstallOptionsInput): Promise<OperationResult> {
    return this.run('uninstall', name, version, options);
  }

  /** Explicit version, else the configured one, else the plugin's own. */
  resolveVersion(name: string, requested?: string): string {
    if (requested !== undefined) return requested;

    const configured = this.configLookup(name)?.version;
    if (configured) return configured;

    const capability = this.registry.getCapability(name);
    if (!capability) {
      throw new NotFoundError(name);
    }
    return capability.metadata().version;
  }

  private async run(
    operation: Operation,
    name: string,
    version: string | undefined,
    input: InstallOptionsInput | undefined,
  ): Promise<OperationResult> {
    const options = normalizeInstallOptions(input);
    const trace = options.verbose ? new OperationTrace(operation, name) : undefined;
    trace?.step('lock_wait', { ahead: this.locks.pending(name) });

    const task = this.locks.run(name, () => this.runLocked(operation, name, version, options, trace));

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    if (timeoutMs === undefined) {
      return task;
    }

    try {
      return await withTimeout(task, timeoutMs, () => new OperationTimeoutError(name, operation, timeoutMs));
    } catch (err) {
      if (err instanceof OperationTimeoutError) {
        this.logger.warn({ plugin: name, operation, timeoutMs }, 'Caller timed out; operation continues in background');
        task.then(
          result => this.logger.info({ plugin: name, operation, to: result.to }, 'Background operation finished'),
          (bgErr: unknown) => this.logger.warn({ plugin: name, operation, reason: reasonOf(bgErr) }, 'Background operation failed'),
        );
      }
      throw err;
    }
  }

  private async runLocked(
    operation: Operation,
    name: string,
    requested: string | undefined,
    options: InstallOptions,
    trace: OperationTrace | undefined,
  ): Promise<OperationResult> {
    trace?.step('lock_acquired');
    try {
      const version = this.resolveVersion(name, requested);
      trace?.step('version_resolved', { version, requested: requested ?? null });
      if (options.dryRun) {
        trace?.step('dry_run', { force: options.force });
      }

      const observer: HookObserver | undefined = trace && {
        beforeHook: () => trace.step('hook_invoked', { version }),
        afterHook: () => trace.step('hook_completed'),
      };
      const result = operation === 'install'
        ? await this.registry.install(name, version, options, observer)
        : await this.registry.uninstall(name, version, options, observer);

      trace?.step('result', { from: result.from, to: result.to, changed: result.changed, descriptor: result.descriptor ?? null });
      const outcome: OperationResult = { ...result, operation, version };
      if (trace) {
        trace.step('lock_released');
        outcome.trace = trace.finish();
        this.logger.info({ trace: outcome.trace }, `Plugin ${operation} trace`);
      }
      return outcome;
    } catch (err) {
      if (trace) {
        trace.step('result', { error: reasonOf(err) });
        trace.step('lock_released');
        this.logger.info({ trace: trace.finish() }, `Plugin ${operation} trace`);
      }
      throw err;
    }
  }
}
