import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export function createLogger(module: string, level?: string): Logger {
  return pino({ level: level ?? process.env.LOG_LEVEL ?? 'info' }).child({ module });
}
