import { pino, type Logger } from 'pino';
import type { LogLevel } from '../config/http-client-config.js';

export type { Logger };

export function createLogger(level: LogLevel = 'silent'): Logger {
  return pino({ name: 'restgate', level });
}
