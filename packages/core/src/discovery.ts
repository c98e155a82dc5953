import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import PQueue from 'p-queue';
import {
  type DiscoveryReport,
  type PluginConfig,
  type PluginFactory,
  type PluginManifest,
  MANIFEST_FILE,
  pluginManifestSchema,
  reasonOf,
} from '@plm/shared';
import { enqueue } from './lock-pool.js';
import type { Logger } from './logger.js';
import type { PluginRegistry } from './plugin-registry.js';

export interface DiscoveryOptions {
  registry: PluginRegistry;
  factories: ReadonlyMap<string, PluginFactory>;
  listConfigs: () => PluginConfig[];
  logger: Logger;
  pluginsDir?: string;
  scan: boolean;
}

interface Candidate {
  name: string;
  config?: PluginConfig;
  manifest?: PluginManifest;
}

interface ScanResult {
  manifests: PluginManifest[];
  failures: DiscoveryReport['failures'];
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Turns configured and scanned plugins into registry entries. Discovery only
 * adds: it never unregisters, and one bad candidate never stops the others.
 * Concurrent discover() calls run one after another.
 */
export class DiscoveryService {
  private lastReport?: DiscoveryReport;
  private runs = new PQueue({ concurrency: 1 });

  constructor(private options: DiscoveryOptions) {}

  get last(): DiscoveryReport | undefined {
    return this.lastReport;
  }

  discover(): Promise<DiscoveryReport> {
    return enqueue(this.runs, () => this.run());
  }

  private async run(): Promise<DiscoveryReport> {
    const { registry, logger } = this.options;
    const report: DiscoveryReport = { registered: [], skipped: [], alreadyRegistered: [], failures: [] };

    const scanned = this.options.scan && this.options.pluginsDir
      ? await this.scan(this.options.pluginsDir)
      : { manifests: [], failures: [] };
    report.failures.push(...scanned.failures);

    for (const candidate of this.candidates(scanned.manifests, report)) {
      const { name, config, manifest } = candidate;
      if (config && !config.enabled) {
        report.skipped.push(name);
        continue;
      }
      if (registry.has(name)) {
        report.alreadyRegistered.push(name);
        continue;
      }

      const factoryKey = manifest?.factory ?? name;
      const factory = this.options.factories.get(factoryKey);
      if (!factory) {
        report.failures.push({ name, reason: `no factory registered for "${factoryKey}"` });
        continue;
      }

      try {
        const capability = await factory(config, manifest);
        // Registered by hand while the factory ran.
        if (registry.has(name)) {
          report.alreadyRegistered.push(name);
          continue;
        }
        registry.register(name, capability);
        report.registered.push(name);
      } catch (err) {
        report.failures.push({ name, reason: reasonOf(err) });
      }
    }

    for (const failure of report.failures) {
      logger.warn({ plugin: failure.name, reason: failure.reason }, 'Plugin discovery failed');
    }
    logger.info(
      {
        registered: report.registered.length,
        skipped: report.skipped.length,
        alreadyRegistered: report.alreadyRegistered.length,
        failed: report.failures.length,
      },
      'Plugin discovery complete',
    );

    this.lastReport = report;
    return report;
  }

  /** Config entries in file order, then manifests that have no config entry. */
  private candidates(manifests: PluginManifest[], report: DiscoveryReport): Candidate[] {
    const byName = new Map<string, Candidate>();
    for (const config of this.options.listConfigs()) {
      byName.set(config.name, { name: config.name, config });
    }

    for (const manifest of manifests) {
      const existing = byName.get(manifest.name);
      if (!existing) {
        byName.set(manifest.name, { name: manifest.name, manifest });
        continue;
      }
      const pinned = existing.config?.version;
      if (pinned && pinned !== manifest.version) {
        report.failures.push({
          name: manifest.name,
          reason: `configured version ${pinned} does not match manifest version ${manifest.version}`,
        });
        byName.delete(manifest.name);
        continue;
      }
      existing.manifest = manifest;
    }

    return Array.from(byName.values());
  }

  private async scan(dir: string): Promise<ScanResult> {
    const result: ScanResult = { manifests: [], failures: [] };

    let entries: string[];
    try {
      const dirents = await readdir(dir, { withFileTypes: true });
      entries = dirents.filter(d => d.isDirectory()).map(d => d.name).sort();
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') {
        this.options.logger.debug({ dir }, 'Plugins directory not found, nothing to scan');
        return result;
      }
      throw err;
    }

    for (const entry of entries) {
      const manifestPath = join(dir, entry, MANIFEST_FILE);
      let content: string;
      try {
        content = await readFile(manifestPath, 'utf-8');
      } catch (err) {
        if (isErrnoException(err) && err.code === 'ENOENT') continue;
        result.failures.push({ name: entry, reason: `cannot read ${manifestPath}: ${reasonOf(err)}` });
        continue;
      }

      let raw: unknown;
      try {
        raw = JSON.parse(content);
      } catch (err) {
        result.failures.push({ name: entry, reason: `malformed manifest ${manifestPath}: ${reasonOf(err)}` });
        continue;
      }

      const parsed = pluginManifestSchema.safeParse(raw);
      if (!parsed.success) {
        result.failures.push({
          name: entry,
          reason: `invalid manifest ${manifestPath}: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
        });
        continue;
      }
      result.manifests.push(parsed.data);
    }

    return result;
  }
}
