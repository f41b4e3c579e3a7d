/**
 * Structured logging
 */

import { pino, type Logger } from 'pino';

const root = pino({
  level: process.env.LOG_LEVEL || 'info',
  base: null,
  timestamp: pino.stdTimeFunctions.isoTime,
});

export function createLogger(name: string): Logger {
  return root.child({ module: name });
}
