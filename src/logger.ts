import { pino, type Logger } from 'pino';

export const logger: Logger = pino({
  name: 'room-review-poster',
  level: process.env.LOG_LEVEL ?? 'info',
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: ['password', 'config.password'],
});

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
