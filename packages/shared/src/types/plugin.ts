import type { PluginConfig } from './config.js';

export interface PluginMetadata {
  name: string;
  version: string;
  description: string;
  author: string;
  homepage?: string;
  repository?: string;
  tags?: string[];
}

export interface InstallOptions {
  /** Reinstall over an installed plugin, or uninstall one that is not installed */
  force: boolean;
  /** Validate and report without calling the plugin hook or changing state */
  dryRun: boolean;
  /** Return a step-by-step trace with the result */
  verbose: boolean;
  /** Caller-side deadline; the operation itself keeps running past it */
  timeoutMs?: number;
}

/**
 * Contract every plugin implementation satisfies. Hooks signal failure by
 * rejecting; the reason is carried into the matching lifecycle error.
 */
export interface PluginCapability {
  metadata(): PluginMetadata;
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
  install(version: string, options: InstallOptions): Promise<string>;
  uninstall(version: string): Promise<void>;
}

/** plugin.json found in a scanned plugin directory */
export interface PluginManifest {
  name: string;
  version: string;
  description?: string;
  /** Factory key to build the plugin with; defaults to the plugin name */
  factory?: string;
}

export type PluginFactory = (
  config: PluginConfig | undefined,
  manifest: PluginManifest | undefined,
) => PluginCapability | Promise<PluginCapability>;

export const LIFECYCLE_STATES = [
  'unregistered',
  'registered',
  'initialized',
  'installed',
  'shutting_down',
  'shutdown',
] as const;

export type LifecycleState = (typeof LIFECYCLE_STATES)[number];

export type LifecycleOperation =
  | 'register'
  | 'initialize'
  | 'install'
  | 'uninstall'
  | 'shutdown'
  | 'unregister';

export interface TransitionResult {
  name: string;
  from: LifecycleState;
  to: LifecycleState;
  /** False when the call was accepted but left the state where it was */
  changed: boolean;
  descriptor?: string;
}

export interface TransitionEvent {
  name: string;
  from: LifecycleState;
  to: LifecycleState;
  at: string;
}

export type TransitionListener = (event: TransitionEvent) => void;

export interface PluginInfo {
  name: string;
  state: LifecycleState;
  metadata?: PluginMetadata;
  config?: PluginConfig;
  registeredAt: string;
  updatedAt: string;
  lastError?: string;
}
