/**
 * Logger
 * 
 * Pino-based structured logger for all packages.
 * Writes to stderr so the interactive progress line on stdout stays intact.
 */

import pino from 'pino';

/** Environment assumed when NODE_ENV is unset; settings use the same default */
export const DEFAULT_NODE_ENV = 'production';

export function nodeEnvFrom(env: NodeJS.ProcessEnv = process.env): string {
  const value = env['NODE_ENV'];
  return value && value.trim() !== '' ? value : DEFAULT_NODE_ENV;
}

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = nodeEnvFrom();

export const logger = pino(
  {
    level: LOG_LEVEL,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      service: 'encodeq',
      env: NODE_ENV,
    },
    transport: NODE_ENV === 'development' ? {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname,service,env',
        destination: 2,
      },
    } : undefined,
  },
  NODE_ENV === 'development' ? undefined : pino.destination(2)
);

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
