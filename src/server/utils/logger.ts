import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Create logger instance based on environment
 *
 * Logs go to stderr; stdout carries the CLI's own output (form lists,
 * summaries).
 */
function createLogger(): Logger {
  const nodeEnv = process.env.NODE_ENV || 'production';
  const isDevelopment = nodeEnv === 'development';
  const defaultLevel = nodeEnv === 'test' ? 'silent' : isDevelopment ? 'debug' : 'warn';
  const logLevel = process.env.LOG_LEVEL || defaultLevel;

  const options: pino.LoggerOptions = {
    level: logLevel,
    base: {
      env: nodeEnv,
      service: 'kmz-survey-export',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (isDevelopment && logLevel !== 'silent') {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,env,service',
          destination: 2,
        },
      },
    });
  }

  return pino(
    {
      ...options,
      formatters: {
        level: (label) => {
          return { level: label };
        },
      },
    },
    pino.destination(2)
  );
}

/**
 * Main logger instance
 */
export const logger = createLogger();

/**
 * Create a child logger with additional context
 */
export function createChildLogger(additionalContext: Record<string, unknown>): Logger {
  return logger.child(additionalContext);
}
