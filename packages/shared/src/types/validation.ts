export interface ValidationFailure {
  name: string;
  reason: string;
}

export interface ValidationSummary {
  validPlugins: number;
  invalidPlugins: number;
  failures: ValidationFailure[];
}

export interface DiscoveryReport {
  registered: string[];
  skipped: string[];
  alreadyRegistered: string[];
  failures: ValidationFailure[];
}
