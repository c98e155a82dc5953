import {
  type InstallOptions,
  type LifecycleOperation,
  type LifecycleState,
  type PluginCapability,
  type PluginConfig,
  type PluginInfo,
  type PluginMetadata,
  type TransitionListener,
  type TransitionResult,
  AggregatePluginError,
  AlreadyRegisteredError,
  InitializationFailedError,
  InstallFailedError,
  InvalidStateError,
  NotFoundError,
  PlmError,
  ShutdownFailedError,
  UninstallFailedError,
  isValidVersion,
  isoNow,
  reasonOf,
  toError,
} from '@plm/shared';
import { canTransition, isTerminal } from './lifecycle.js';
import type { Logger } from './logger.js';

interface PluginEntry {
  name: string;
  capability: PluginCapability;
  state: LifecycleState;
  /** Lifecycle operation currently awaiting a plugin hook */
  inFlight?: LifecycleOperation;
  registeredAt: string;
  updatedAt: string;
  lastError?: string;
}

/** Wraps an operation on one plugin, e.g. to run it under that plugin's lock. */
export type OperationGuard = <T>(name: string, operation: () => Promise<T>) => Promise<T>;

export interface HookObserver {
  beforeHook?(): void;
  afterHook?(): void;
}

export interface PluginRegistryOptions {
  logger: Logger;
  configLookup?: (name: string) => PluginConfig | undefined;
}

const passThrough: OperationGuard = (_name, operation) => operation();

/**
 * Plugin registry: owns name → entry and enforces the lifecycle.
 *
 * Structural changes are synchronous, so they are atomic on the event loop.
 * Hooks are awaited with the entry marked in flight; a second operation on the
 * same entry while one is in flight is rejected with InvalidStateError. Callers
 * that want queueing instead run operations through an OperationGuard.
 */
export class PluginRegistry {
  private entries = new Map<string, PluginEntry>();
  private listeners = new Set<TransitionListener>();
  private logger: Logger;
  private configLookup: (name: string) => PluginConfig | undefined;

  constructor(options: PluginRegistryOptions) {
    this.logger = options.logger;
    this.configLookup = options.configLookup ?? (() => undefined);
  }

  onTransition(listener: TransitionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  register(name: string, capability: PluginCapability): TransitionResult {
    if (name.trim() === '') {
      throw new InvalidStateError(name, 'unregistered', 'register', 'plugin name must not be empty');
    }
    const existing = this.entries.get(name);
    if (existing && !isTerminal(existing.state)) {
      throw new AlreadyRegisteredError(name);
    }

    const now = isoNow();
    const entry: PluginEntry = {
      name,
      capability,
      state: 'unregistered',
      registeredAt: now,
      updatedAt: now,
    };
    this.entries.set(name, entry);
    this.transition(entry, 'registered');
    this.logger.info({ plugin: name }, 'Plugin registered');
    return { name, from: 'unregistered', to: 'registered', changed: true };
  }

  async initializeOne(name: string, observer?: HookObserver): Promise<TransitionResult> {
    const entry = this.require(name);
    this.expectState(entry, 'initialize', ['registered']);

    await this.runHook(
      entry,
      'initialize',
      observer,
      () => entry.capability.initialize(),
      (reason, err) => new InitializationFailedError(name, reason, err),
    );

    this.transition(entry, 'initialized');
    return { name, from: 'registered', to: 'initialized', changed: true };
  }

  async install(
    name: string,
    version: string,
    options: InstallOptions,
    observer?: HookObserver,
  ): Promise<TransitionResult> {
    const entry = this.require(name);
    this.expectState(entry, 'install', options.force ? ['initialized', 'installed'] : ['initialized']);
    if (!isValidVersion(version)) {
      throw new InstallFailedError(name, `invalid version "${version}"`);
    }

    const from = entry.state;
    if (options.dryRun) {
      return { name, from, to: from, changed: false, descriptor: `dry-run:${name}@${version}` };
    }

    const descriptor = await this.runHook(
      entry,
      'install',
      observer,
      () => entry.capability.install(version, options),
      (reason, err) => new InstallFailedError(name, reason, err),
    );

    if (from !== 'installed') {
      this.transition(entry, 'installed');
    }
    this.logger.info({ plugin: name, version, descriptor }, 'Plugin installed');
    return { name, from, to: 'installed', changed: from !== 'installed', descriptor };
  }

  async uninstall(
    name: string,
    version: string,
    options: InstallOptions,
    observer?: HookObserver,
  ): Promise<TransitionResult> {
    const entry = this.require(name);
    this.expectState(entry, 'uninstall', options.force ? ['installed', 'initialized'] : ['installed']);
    if (!isValidVersion(version)) {
      throw new UninstallFailedError(name, `invalid version "${version}"`);
    }

    const from = entry.state;
    if (options.dryRun) {
      return { name, from, to: from, changed: false, descriptor: `dry-run:${name}@${version}` };
    }

    await this.runHook(
      entry,
      'uninstall',
      observer,
      () => entry.capability.uninstall(version),
      (reason, err) => new UninstallFailedError(name, reason, err),
    );

    if (from !== 'initialized') {
      this.transition(entry, 'initialized');
    }
    this.logger.info({ plugin: name, version }, 'Plugin uninstalled');
    return { name, from, to: 'initialized', changed: from !== 'initialized' };
  }

  /**
   * initialized | installed → shutting_down → shutdown. A plugin that was never
   * initialized goes straight to shutdown without its hook being called.
   */
  async shutdownOne(name: string, observer?: HookObserver): Promise<TransitionResult> {
    const entry = this.require(name);
    this.expectState(entry, 'shutdown', ['registered', 'initialized', 'installed']);

    const from = entry.state;
    if (from === 'registered') {
      this.transition(entry, 'shutdown');
      return { name, from, to: 'shutdown', changed: true };
    }

    this.transition(entry, 'shutting_down');
    try {
      await this.runHook(
        entry,
        'shutdown',
        observer,
        () => entry.capability.shutdown(),
        (reason, err) => new ShutdownFailedError(name, reason, err),
      );
    } catch (err) {
      this.transition(entry, from);
      throw err;
    }

    this.transition(entry, 'shutdown');
    this.logger.info({ plugin: name }, 'Plugin shut down');
    return { name, from, to: 'shutdown', changed: true };
  }

  /** Shuts the plugin down if it is running, then drops it from the registry. */
  async unregister(name: string, observer?: HookObserver): Promise<TransitionResult> {
    const entry = this.require(name);
    const from = entry.state;
    if (from === 'initialized' || from === 'installed') {
      await this.shutdownOne(name, observer);
    } else {
      this.expectState(entry, 'unregister', ['registered', 'shutdown']);
    }

    this.transition(entry, 'unregistered');
    // The name may have been re-registered while the shutdown hook ran.
    if (this.entries.get(name) === entry) {
      this.entries.delete(name);
    }
    this.logger.info({ plugin: name }, 'Plugin unregistered');
    return { name, from, to: 'unregistered', changed: true };
  }

  /**
   * Shuts down every non-terminal entry. All shutdowns are attempted; failures
   * are reported together afterwards.
   */
  async shutdownAll(guard: OperationGuard = passThrough): Promise<TransitionResult[]> {
    const names = Array.from(this.entries.values())
      .filter(entry => !isTerminal(entry.state))
      .map(entry => entry.name);

    const settled = await Promise.allSettled(
      names.map(name => guard(name, () => this.shutdownIfActive(name))),
    );

    const results: TransitionResult[] = [];
    const errors: Error[] = [];
    for (const outcome of settled) {
      if (outcome.status === 'fulfilled') {
        results.push(outcome.value);
      } else {
        errors.push(toError(outcome.reason));
      }
    }

    if (errors.length > 0) {
      this.logger.error({ failed: errors.length, total: names.length }, 'Plugin shutdown incomplete');
      throw new AggregatePluginError(`${errors.length} of ${names.length} plugins failed to shut down`, errors);
    }
    return results;
  }

  has(name: string): boolean {
    const entry = this.entries.get(name);
    return entry !== undefined && !isTerminal(entry.state);
  }

  getState(name: string): LifecycleState {
    return this.entries.get(name)?.state ?? 'unregistered';
  }

  getCapability(name: string): PluginCapability | undefined {
    return this.entries.get(name)?.capability;
  }

  get(name: string): PluginInfo | undefined {
    const entry = this.entries.get(name);
    return entry ? this.toInfo(entry) : undefined;
  }

  /** Active entries plus shut-down ones kept for auditing, in registration order. */
  list(): PluginInfo[] {
    return Array.from(this.entries.values()).map(entry => this.toInfo(entry));
  }

  listNames(): string[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }

  private async shutdownIfActive(name: string): Promise<TransitionResult> {
    const state = this.getState(name);
    if (isTerminal(state)) {
      return { name, from: state, to: state, changed: false };
    }
    return this.shutdownOne(name);
  }

  private require(name: string): PluginEntry {
    const entry = this.entries.get(name);
    if (!entry) {
      throw new NotFoundError(name);
    }
    return entry;
  }

  private expectState(entry: PluginEntry, operation: LifecycleOperation, allowed: LifecycleState[]): void {
    if (entry.inFlight) {
      throw new InvalidStateError(entry.name, entry.state, operation, `${entry.inFlight} already in progress`);
    }
    if (!allowed.includes(entry.state)) {
      throw new InvalidStateError(entry.name, entry.state, operation);
    }
  }

  private async runHook<T>(
    entry: PluginEntry,
    operation: LifecycleOperation,
    observer: HookObserver | undefined,
    hook: () => Promise<T>,
    wrapError: (reason: string, cause: unknown) => Error,
  ): Promise<T> {
    entry.inFlight = operation;
    observer?.beforeHook?.();
    try {
      const value = await hook();
      entry.lastError = undefined;
      return value;
    } catch (err) {
      const reason = reasonOf(err);
      entry.lastError = reason;
      this.logger.warn({ plugin: entry.name, operation, reason }, 'Plugin hook failed');
      throw wrapError(reason, err);
    } finally {
      entry.inFlight = undefined;
      observer?.afterHook?.();
    }
  }

  private transition(entry: PluginEntry, to: LifecycleState): void {
    const from = entry.state;
    if (!canTransition(from, to)) {
      throw new PlmError(`Illegal transition for ${entry.name}: ${from} → ${to}`, 'INVALID_STATE');
    }
    entry.state = to;
    entry.updatedAt = isoNow();

    const event = { name: entry.name, from, to, at: entry.updatedAt };
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.logger.error({ plugin: entry.name, err }, 'Transition listener threw');
      }
    }
  }

  private toInfo(entry: PluginEntry): PluginInfo {
    const info: PluginInfo = {
      name: entry.name,
      state: entry.state,
      registeredAt: entry.registeredAt,
      updatedAt: entry.updatedAt,
    };
    const metadata = this.readMetadata(entry);
    if (metadata) info.metadata = metadata;
    const config = this.configLookup(entry.name);
    if (config) info.config = config;
    if (entry.lastError !== undefined) info.lastError = entry.lastError;
    return info;
  }

  private readMetadata(entry: PluginEntry): PluginMetadata | undefined {
    try {
      return entry.capability.metadata();
    } catch (err) {
      this.logger.debug({ plugin: entry.name, reason: reasonOf(err) }, 'Plugin metadata unavailable');
      return undefined;
    }
  }
}
