import { describe, it, expect } from 'vitest';
import { OperationTrace } from '../src/operation-trace.js';

describe('OperationTrace', () => {
  it('records steps in order with non-decreasing offsets', () => {
    const trace = new OperationTrace('uninstall', 'alpha');
    trace.step('lock_acquired');
    trace.step('version_resolved', { version: '1.0.0' });
    trace.step('result', { changed: true });

    const record = trace.finish();
    expect(record.id).toMatch(/^op_/);
    expect(record.operation).toBe('uninstall');
    expect(record.pluginName).toBe('alpha');
    expect(trace.stepTypes()).toEqual(['lock_acquired', 'version_resolved', 'result']);
    expect(record.steps[1]?.data).toEqual({ version: '1.0.0' });

    const offsets = record.steps.map(s => s.offsetMs);
    expect(offsets).toEqual([...offsets].sort((a, b) => a - b));
    expect(record.totalDurationMs).toBeGreaterThanOrEqual(offsets[offsets.length - 1] ?? 0);
  });

  it('returns an independent copy from finish()', () => {
    const trace = new OperationTrace('install', 'alpha');
    trace.step('dry_run', { force: false });
    const record = trace.finish();
    trace.step('result');

    expect(record.steps).toHaveLength(1);
  });
});
