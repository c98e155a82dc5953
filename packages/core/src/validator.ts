import {
  type PluginConfig,
  type ValidationFailure,
  type ValidationSummary,
  ValidationFailedError,
  isValidPinnedVersion,
  isValidVersion,
  reasonOf,
} from '@plm/shared';
import { isLifecycleState } from './lifecycle.js';
import type { Logger } from './logger.js';
import type { PluginRegistry } from './plugin-registry.js';

export function isAllValid(summary: ValidationSummary): boolean {
  return summary.invalidPlugins === 0;
}

export function totalPlugins(summary: ValidationSummary): number {
  return summary.validPlugins + summary.invalidPlugins;
}

/** Read-only consistency check of the registry against plugin metadata and config. */
export class PluginValidator {
  constructor(
    private registry: PluginRegistry,
    private configLookup: (name: string) => PluginConfig | undefined,
    private logger: Logger,
  ) {}

  validateAll(): ValidationSummary {
    const summary: ValidationSummary = { validPlugins: 0, invalidPlugins: 0, failures: [] };

    for (const name of this.registry.listNames()) {
      const problems = this.check(name);
      if (problems.length === 0) {
        summary.validPlugins++;
      } else {
        summary.invalidPlugins++;
        summary.failures.push(...problems);
      }
    }

    this.logger.debug(
      { valid: summary.validPlugins, invalid: summary.invalidPlugins },
      'Plugin validation complete',
    );
    return summary;
  }

  assertAllValid(): ValidationSummary {
    const summary = this.validateAll();
    if (!isAllValid(summary)) {
      throw new ValidationFailedError(summary.failures);
    }
    return summary;
  }

  private check(name: string): ValidationFailure[] {
    const failures: ValidationFailure[] = [];
    const fail = (reason: string) => failures.push({ name, reason });

    const state: unknown = this.registry.getState(name);
    if (!isLifecycleState(state)) {
      fail(`undefined lifecycle state "${String(state)}"`);
    }

    const capability = this.registry.getCapability(name);
    if (capability) {
      try {
        const metadata = capability.metadata();
        if (metadata.name !== name) {
          fail(`metadata name "${metadata.name}" does not match registered name`);
        }
        if (!isValidVersion(metadata.version)) {
          fail(`metadata version "${metadata.version}" is not a valid semantic version`);
        }
      } catch (err) {
        fail(`metadata unavailable: ${reasonOf(err)}`);
      }
    }

    const config = this.configLookup(name);
    if (config) {
      if (config.name !== name) {
        fail(`config name "${config.name}" does not match registered name`);
      }
      if (!isValidPinnedVersion(config.version)) {
        fail(`config version "${config.version}" is not a valid semantic version`);
      }
    }

    return failures;
  }
}
