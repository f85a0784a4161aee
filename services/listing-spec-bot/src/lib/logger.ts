import pino from 'pino';
import { config } from '../config.js';

export type Logger = pino.Logger;

export const logger = pino({
  level: config.logging.level,
  transport: config.nodeEnv === 'development' ? {
    target: 'pino-pretty',
    options: { colorize: true },
  } : undefined,
});

export function createLogger(context: Record<string, string>): Logger {
  return logger.child(context);
}
