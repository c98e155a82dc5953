import { vi } from 'vitest';
import { pino } from 'pino';
import type { InstallOptions, PluginCapability, PluginMetadata } from '@plm/shared';
import type { Logger } from '../src/logger.js';

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

export interface Deferred<T = void> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(err: unknown): void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Settles pending promise callbacks and p-queue scheduling. */
export async function flush(rounds = 5): Promise<void> {
  for (let i = 0; i < rounds; i++) {
    await new Promise<void>(resolve => setImmediate(resolve));
  }
}

export function fakePlugin(name: string, version = '1.0.0', overrides: Partial<PluginMetadata> = {}) {
  const metadata: PluginMetadata = {
    name,
    version,
    description: `${name} test plugin`,
    author: 'test',
    ...overrides,
  };
  return {
    metadata: vi.fn((): PluginMetadata => metadata),
    initialize: vi.fn(async (): Promise<void> => {}),
    shutdown: vi.fn(async (): Promise<void> => {}),
    install: vi.fn(async (v: string, _options: InstallOptions): Promise<string> => `${name}@${v}`),
    uninstall: vi.fn(async (_v: string): Promise<void> => {}),
  } satisfies PluginCapability;
}

export type FakePlugin = ReturnType<typeof fakePlugin>;
