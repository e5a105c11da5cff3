import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const isTest = process.env.NODE_ENV === 'test';
  const logLevel = process.env.LOG_LEVEL || (isTest ? 'silent' : 'info');

  return pino({
    level: logLevel,
    base: {
      service: 'layout-assembler',
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(process.env.LOG_PRETTY === 'true' && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    }),
  });
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(context: Record<string, unknown>, parent: Logger = logger): Logger {
  return parent.child(context);
}
