import { destination, pino, stdTimeFunctions } from 'pino';
import type { Logger } from 'pino';

import type { LogLevel } from '@app/config.js';

export type { Logger };

export function createLogger(level: LogLevel): Logger {
  return pino({
    name: 'invoice-management-mcp',
    level,
    base: { pid: process.pid },
    timestamp: stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
  }, destination({ fd: 2, sync: true }));
}
