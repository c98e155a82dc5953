import { performance } from 'node:perf_hooks';

export function monotonicNow(): number {
  return performance.now();
}

export function isoNow(): string {
  return new Date().toISOString();
}

export function elapsedSince(start: number): number {
  return Math.round((monotonicNow() - start) * 1000) / 1000;
}
