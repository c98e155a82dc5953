import { describe, it, expect, beforeEach } from 'vitest';
import {
  ConfigError,
  InvalidStateError,
  NotFoundError,
  OperationTimeoutError,
  type PluginConfig,
} from '@plm/shared';
import { InstallOrchestrator, normalizeInstallOptions } from '../src/install-orchestrator.js';
import { PluginLockPool } from '../src/lock-pool.js';
import { PluginRegistry } from '../src/plugin-registry.js';
import { deferred, fakePlugin, flush, silentLogger } from './helpers.js';

describe('InstallOrchestrator', () => {
  let registry: PluginRegistry;
  let locks: PluginLockPool;
  let configs: Map<string, PluginConfig>;
  let orchestrator: InstallOrchestrator;

  beforeEach(() => {
    registry = new PluginRegistry({ logger: silentLogger() });
    locks = new PluginLockPool();
    configs = new Map();
    orchestrator = new InstallOrchestrator({
      registry,
      locks,
      logger: silentLogger(),
      configLookup: name => configs.get(name),
    });
  });

  async function ready(name: string, version = '1.0.0') {
    const plugin = fakePlugin(name, version);
    registry.register(name, plugin);
    await registry.initializeOne(name);
    return plugin;
  }

  it('installs and uninstalls with an explicit version', async () => {
    const plugin = await ready('alpha');

    const installed = await orchestrator.installPlugin('alpha', '1.2.0');
    expect(installed).toEqual({
      name: 'alpha',
      from: 'initialized',
      to: 'installed',
      changed: true,
      descriptor: 'alpha@1.2.0',
      operation: 'install',
      version: '1.2.0',
    });

    const removed = await orchestrator.uninstallPlugin('alpha', '1.2.0');
    expect(removed).toMatchObject({ from: 'installed', to: 'initialized', changed: true, version: '1.2.0' });
    expect(plugin.uninstall).toHaveBeenCalledWith('1.2.0');
  });

  describe('version resolution', () => {
    it('uses the plugin metadata version when nothing is configured', async () => {
      const plugin = await ready('alpha', '3.1.4');
      const result = await orchestrator.installPlugin('alpha');
      expect(result.version).toBe('3.1.4');
      expect(plugin.install).toHaveBeenCalledWith('3.1.4', { force: false, dryRun: false, verbose: false });
    });

    it('prefers the configured version over metadata', async () => {
      await ready('alpha', '3.1.4');
      configs.set('alpha', { name: 'alpha', version: '2.0.0', enabled: true, config: {} });
      expect(orchestrator.resolveVersion('alpha')).toBe('2.0.0');
    });

    it('falls back to metadata when the configured version is empty', async () => {
      await ready('alpha', '3.1.4');
      configs.set('alpha', { name: 'alpha', version: '', enabled: true, config: {} });
      expect(orchestrator.resolveVersion('alpha')).toBe('3.1.4');
    });

    it('throws NotFoundError for an unknown plugin', async () => {
      await expect(orchestrator.installPlugin('ghost')).rejects.toThrow(NotFoundError);
      await locks.drain();
      expect(locks.isLocked('ghost')).toBe(false);
    });
  });

  it('serializes concurrent installs of the same plugin', async () => {
    const plugin = await ready('alpha');
    const gate = deferred<string>();
    let running = 0;
    let maxRunning = 0;
    plugin.install.mockImplementation(async (v: string) => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      await gate.promise;
      running--;
      return `alpha@${v}`;
    });

    const first = orchestrator.installPlugin('alpha', '1.0.0');
    const second = orchestrator.installPlugin('alpha', '1.0.0', { force: true });
    await flush();
    expect(plugin.install).toHaveBeenCalledTimes(1);

    gate.resolve('ok');
    const [a, b] = await Promise.all([first, second]);
    expect(maxRunning).toBe(1);
    expect(plugin.install).toHaveBeenCalledTimes(2);
    expect(a).toMatchObject({ from: 'initialized', to: 'installed', changed: true });
    expect(b).toMatchObject({ from: 'installed', to: 'installed', changed: false });
  });

  it('rejects the queued second install when it is not forced', async () => {
    await ready('alpha');
    const first = orchestrator.installPlugin('alpha', '1.0.0');
    const second = orchestrator.installPlugin('alpha', '1.0.0');

    await expect(first).resolves.toMatchObject({ to: 'installed' });
    await expect(second).rejects.toThrow(InvalidStateError);
  });

  it('runs different plugins in parallel', async () => {
    const alpha = await ready('alpha');
    await ready('beta');
    const gate = deferred<string>();
    alpha.install.mockImplementationOnce(() => gate.promise);

    const slow = orchestrator.installPlugin('alpha', '1.0.0');
    const fast = await orchestrator.installPlugin('beta', '1.0.0');

    expect(fast.to).toBe('installed');
    expect(registry.getState('alpha')).toBe('initialized');
    gate.resolve('alpha-descriptor');
    await expect(slow).resolves.toMatchObject({ descriptor: 'alpha-descriptor' });
  });

  it('releases the lock after a failed install', async () => {
    const plugin = await ready('alpha');
    plugin.install.mockRejectedValueOnce(new Error('mirror unreachable'));

    await expect(orchestrator.installPlugin('alpha', '1.0.0')).rejects.toThrow(
      'Plugin alpha install failed: mirror unreachable',
    );
    await expect(orchestrator.installPlugin('alpha', '1.0.0')).resolves.toMatchObject({ to: 'installed' });
  });

  it('returns a dry-run descriptor without calling the hook', async () => {
    const plugin = await ready('alpha');
    const result = await orchestrator.installPlugin('alpha', '1.0.0', { dryRun: true });

    expect(result.descriptor).toBe('dry-run:alpha@1.0.0');
    expect(result.changed).toBe(false);
    expect(plugin.install).not.toHaveBeenCalled();
    expect(registry.getState('alpha')).toBe('initialized');
  });

  describe('verbose mode', () => {
    it('attaches a trace of the steps taken', async () => {
      await ready('alpha');
      const result = await orchestrator.installPlugin('alpha', undefined, { verbose: true });

      expect(result.trace?.operation).toBe('install');
      expect(result.trace?.pluginName).toBe('alpha');
      expect(result.trace?.steps.map(s => s.type)).toEqual([
        'lock_wait',
        'lock_acquired',
        'version_resolved',
        'hook_invoked',
        'hook_completed',
        'result',
        'lock_released',
      ]);
      expect(result.trace?.steps[2]?.data).toEqual({ version: '1.0.0', requested: null });
    });

    it('records dry runs without a hook step', async () => {
      await ready('alpha');
      const result = await orchestrator.installPlugin('alpha', '1.0.0', { verbose: true, dryRun: true });
      expect(result.trace?.steps.map(s => s.type)).toEqual([
        'lock_wait',
        'lock_acquired',
        'version_resolved',
        'dry_run',
        'result',
        'lock_released',
      ]);
    });

    it('does not change the outcome', async () => {
      await ready('alpha');
      await ready('beta');
      const quiet = await orchestrator.installPlugin('alpha', '1.0.0');
      const { trace, ...loud } = await orchestrator.installPlugin('beta', '1.0.0', { verbose: true });

      expect(trace).toBeDefined();
      expect(loud).toEqual({ ...quiet, name: 'beta', descriptor: 'beta@1.0.0' });
      expect(quiet.trace).toBeUndefined();
    });
  });

  describe('timeouts', () => {
    it('rejects the caller but lets the operation finish under the lock', async () => {
      const plugin = await ready('alpha');
      const gate = deferred<string>();
      plugin.install.mockImplementationOnce(() => gate.promise);

      await expect(orchestrator.installPlugin('alpha', '1.0.0', { timeoutMs: 20 })).rejects.toThrow(
        OperationTimeoutError,
      );
      expect(registry.getState('alpha')).toBe('initialized');
      expect(locks.isLocked('alpha')).toBe(true);

      gate.resolve('late');
      await locks.drain();
      expect(registry.getState('alpha')).toBe('installed');
      expect(locks.isLocked('alpha')).toBe(false);
    });

    it('uses the default timeout when none is given', async () => {
      const timed = new InstallOrchestrator({ registry, locks, logger: silentLogger(), defaultTimeoutMs: 20 });
      const plugin = await ready('alpha');
      const gate = deferred<string>();
      plugin.install.mockImplementationOnce(() => gate.promise);

      await expect(timed.installPlugin('alpha', '1.0.0')).rejects.toThrow(
        'Plugin alpha install timed out after 20ms',
      );
      gate.resolve('late');
      await locks.drain();
    });
  });

  it('rejects malformed options', () => {
    expect(() => normalizeInstallOptions({ timeoutMs: -5 })).toThrow(ConfigError);
    expect(normalizeInstallOptions()).toEqual({ force: false, dryRun: false, verbose: false });
  });
});
