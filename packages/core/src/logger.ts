// packages/core/src/logger.ts
import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

const level = process.env.LOG_LEVEL?.trim() || 'info';

export const logger: Logger = pino({ name: 'graphflow', level });

export function childLogger(module: string): Logger {
  return logger.child({ module });
}
