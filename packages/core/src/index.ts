export { PluginManager } from './plugin-manager.js';
export type { PluginManagerInit } from './plugin-manager.js';
export { PluginRegistry } from './plugin-registry.js';
export type { PluginRegistryOptions, OperationGuard, HookObserver } from './plugin-registry.js';
export { LIFECYCLE_TRANSITIONS, canTransition, isTerminal, isLifecycleState } from './lifecycle.js';
export { ConfigStore } from './config-store.js';
export { DiscoveryService } from './discovery.js';
export type { DiscoveryOptions } from './discovery.js';
export { PluginValidator, isAllValid, totalPlugins } from './validator.js';
export { InstallOrchestrator, normalizeInstallOptions } from './install-orchestrator.js';
export type { InstallOrchestratorOptions } from './install-orchestrator.js';
export { PluginLockPool } from './lock-pool.js';
export { OperationTrace } from './operation-trace.js';
export { resolveManagerOptions } from './manager-options.js';
export { createLogger, componentLogger } from './logger.js';
export type { Logger } from './logger.js';
