import winston from 'winston';

// One JSON line per event; components attach their name through componentLogger
const logger = winston.createLogger({
  level: process.env.FANPULSE_LOG_LEVEL || 'info',
  silent: process.env.NODE_ENV === 'test',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  defaultMeta: { service: 'fanpulse-pipeline' },
  transports: [new winston.transports.Console()]
});

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/**
 * Child logger tagged with the component name
 */
export function componentLogger(component: string): winston.Logger {
  return logger.child({ component });
}

export default logger;
