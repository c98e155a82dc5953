import {
  type OperationTraceRecord,
  type TraceStep,
  type TraceStepType,
  elapsedSince,
  generateId,
  isoNow,
  monotonicNow,
} from '@plm/shared';

/** Step-by-step record of one install or uninstall, returned in verbose mode. */
export class OperationTrace {
  readonly id = generateId('op');
  private readonly startedAt = isoNow();
  private readonly startTime = monotonicNow();
  private readonly steps: TraceStep[] = [];

  constructor(
    readonly operation: 'install' | 'uninstall',
    readonly pluginName: string,
  ) {}

  step(type: TraceStepType, data: Record<string, unknown> = {}): void {
    this.steps.push({ type, offsetMs: elapsedSince(this.startTime), data });
  }

  stepTypes(): TraceStepType[] {
    return this.steps.map(s => s.type);
  }

  finish(): OperationTraceRecord {
    return {
      id: this.id,
      operation: this.operation,
      pluginName: this.pluginName,
      startedAt: this.startedAt,
      totalDurationMs: elapsedSince(this.startTime),
      steps: this.steps.map(s => ({ ...s, data: { ...s.data } })),
    };
  }
}
