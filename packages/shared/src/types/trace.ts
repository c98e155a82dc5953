import type { TransitionResult } from './plugin.js';

export type TraceStepType =
  | 'lock_wait'
  | 'lock_acquired'
  | 'version_resolved'
  | 'dry_run'
  | 'hook_invoked'
  | 'hook_completed'
  | 'result'
  | 'lock_released';

export interface TraceStep {
  type: TraceStepType;
  /** Milliseconds since the operation was requested */
  offsetMs: number;
  data: Record<string, unknown>;
}

export interface OperationTraceRecord {
  id: string;
  operation: 'install' | 'uninstall';
  pluginName: string;
  startedAt: string;
  totalDurationMs: number;
  steps: TraceStep[];
}

export interface OperationResult extends TransitionResult {
  operation: 'install' | 'uninstall';
  version: string;
  trace?: OperationTraceRecord;
}
