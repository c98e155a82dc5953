import {
  type DiscoveryReport,
  type InstallOptionsInput,
  type JsonValue,
  type LifecycleState,
  type ManagerOptions,
  type ManagerOptionsInput,
  type OperationResult,
  type PluginCapability,
  type PluginConfig,
  type PluginFactory,
  type PluginInfo,
  type ProjectConfig,
  type TransitionListener,
  type TransitionResult,
  type ValidationSummary,
  AggregatePluginError,
  toError,
} from '@plm/shared';
import { ConfigStore } from './config-store.js';
import { DiscoveryService } from './discovery.js';
import { InstallOrchestrator } from './install-orchestrator.js';
import { PluginLockPool } from './lock-pool.js';
import { type Logger, componentLogger, createLogger } from './logger.js';
import { resolveManagerOptions } from './manager-options.js';
import { PluginRegistry } from './plugin-registry.js';
import { PluginValidator } from './validator.js';

export interface PluginManagerInit {
  options?: ManagerOptionsInput;
  config?: ProjectConfig;
  logger?: Logger;
  /** Environment read for PLM_* overrides; defaults to process.env */
  env?: Record<string, string | undefined>;
}

/**
 * Entry point for hosts: owns the registry, config store, discovery,
 * validation and install orchestration for one project.
 *
 * Every lifecycle operation on a plugin runs under that plugin's lock, so a
 * second call for the same plugin waits for the first to finish.
 */
export class PluginManager {
  readonly options: ManagerOptions;
  private logger: Logger;
  private configs: ConfigStore;
  private registry: PluginRegistry;
  private locks = new PluginLockPool();
  private factories = new Map<string, PluginFactory>();
  private discovery: DiscoveryService;
  private validator: PluginValidator;
  private orchestrator: InstallOrchestrator;

  constructor(init: PluginManagerInit = {}) {
    this.options = resolveManagerOptions(init.options, init.env);
    this.logger = init.logger ?? createLogger(this.options.logging.level);

    this.configs = new ConfigStore(componentLogger(this.logger, 'config'), init.config);
    const configLookup = (name: string) => this.configs.getPluginConfig(name);

    this.registry = new PluginRegistry({
      logger: componentLogger(this.logger, 'registry'),
      configLookup,
    });
    this.discovery = new DiscoveryService({
      registry: this.registry,
      factories: this.factories,
      listConfigs: () => this.configs.listPluginConfigs(),
      logger: componentLogger(this.logger, 'discovery'),
      pluginsDir: this.options.pluginsDir,
      scan: this.options.scanPluginsDir,
    });
    this.validator = new PluginValidator(this.registry, configLookup, componentLogger(this.logger, 'validator'));
    this.orchestrator = new InstallOrchestrator({
      registry: this.registry,
      locks: this.locks,
      logger: componentLogger(this.logger, 'orchestrator'),
      configLookup,
      defaultTimeoutMs: this.options.defaultTimeoutMs,
    });
  }

  static fromProjectConfig(config: ProjectConfig, init: Omit<PluginManagerInit, 'config'> = {}): PluginManager {
    return new PluginManager({ ...init, config });
  }

  // --- Lifecycle ---

  /**
   * Discovers plugins (unless disabled by options), then initializes every
   * registered plugin. All initializations are attempted before failures are
   * reported together.
   */
  async initialize(): Promise<TransitionResult[]> {
    if (this.options.discoverOnInitialize) {
      await this.discovery.discover();
    }

    const names = this.registry.list()
      .filter(info => info.state === 'registered')
      .map(info => info.name);

    const settled = await Promise.allSettled(
      names.map(name => this.locks.run(name, () => this.initializeIfRegistered(name))),
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
      this.logger.error({ failed: errors.length, total: names.length }, 'Plugin initialization incomplete');
      throw new AggregatePluginError(`${errors.length} of ${names.length} plugins failed to initialize`, errors);
    }
    this.logger.info({ initialized: results.filter(r => r.changed).length }, 'Plugin manager initialized');
    return results;
  }

  async shutdown(): Promise<TransitionResult[]> {
    const results = await this.registry.shutdownAll((name, operation) => this.locks.run(name, operation));
    this.logger.info({ plugins: results.length }, 'Plugin manager shut down');
    return results;
  }

  async discoverPlugins(): Promise<number> {
    const report = await this.discovery.discover();
    return report.registered.length;
  }

  /** Report of the most recent discovery run, if any. */
  get lastDiscovery(): DiscoveryReport | undefined {
    return this.discovery.last;
  }

  validateAllPlugins(): ValidationSummary {
    return this.validator.validateAll();
  }

  listPlugins(): PluginInfo[] {
    return this.registry.list();
  }

  getPluginState(name: string): LifecycleState {
    return this.registry.getState(name);
  }

  onTransition(listener: TransitionListener): () => void {
    return this.registry.onTransition(listener);
  }

  // --- Per-plugin operations ---

  registerPlugin(name: string, capability: PluginCapability): TransitionResult {
    return this.registry.register(name, capability);
  }

  /** Makes a factory available to discovery under `key`. */
  registerFactory(key: string, factory: PluginFactory): void {
    this.factories.set(key, factory);
  }

  initializePlugin(name: string): Promise<TransitionResult> {
    return this.locks.run(name, () => this.registry.initializeOne(name));
  }

  installPlugin(name: string, version?: string, options?: InstallOptionsInput): Promise<OperationResult> {
    return this.orchestrator.installPlugin(name, version, options);
  }

  uninstallPlugin(name: string, version?: string, options?: InstallOptionsInput): Promise<OperationResult> {
    return this.orchestrator.uninstallPlugin(name, version, options);
  }

  shutdownPlugin(name: string): Promise<TransitionResult> {
    return this.locks.run(name, () => this.registry.shutdownOne(name));
  }

  unregisterPlugin(name: string): Promise<TransitionResult> {
    return this.locks.run(name, () => this.registry.unregister(name));
  }

  // --- Configuration ---

  getPluginConfig(name: string): PluginConfig | undefined {
    return this.configs.getPluginConfig(name);
  }

  addPluginConfig(config: PluginConfig): void {
    this.configs.addPluginConfig(config);
  }

  removePluginConfig(name: string): PluginConfig | undefined {
    return this.configs.removePluginConfig(name);
  }

  enablePlugin(name: string): void {
    this.configs.enablePlugin(name);
  }

  disablePlugin(name: string): void {
    this.configs.disablePlugin(name);
  }

  updatePluginSetting(name: string, key: string, value: JsonValue): void {
    this.configs.updatePluginSetting(name, key, value);
  }

  getConfig(): ProjectConfig {
    return this.configs.current;
  }

  loadConfig(config: ProjectConfig): ProjectConfig {
    return this.configs.load(config);
  }

  loadConfigFromFile(path: string): Promise<ProjectConfig> {
    return this.configs.loadFromFile(path);
  }

  saveConfig(path: string): Promise<void> {
    return this.configs.save(path);
  }

  private async initializeIfRegistered(name: string): Promise<TransitionResult> {
    const state = this.registry.getState(name);
    if (state !== 'registered') {
      return { name, from: state, to: state, changed: false };
    }
    return this.registry.initializeOne(name);
  }
}
