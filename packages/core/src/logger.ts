import { pino, type Logger } from 'pino';
import type { LogLevel } from '@plm/shared';

export type { Logger };

export function createLogger(level: LogLevel = 'info'): Logger {
  return pino({
    name: 'plm',
    level,
    base: { pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function componentLogger(root: Logger, component: string): Logger {
  return root.child({ component });
}
