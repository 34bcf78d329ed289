import winston from 'winston';
import * as Sentry from '@sentry/node';

const SERVICE = 'instance-sync';

function renderValue(value: unknown): string {
  if (typeof value === 'string' && value !== '' && !/[\s"=]/.test(value)) {
    return value;
  }
  return JSON.stringify(value) ?? String(value);
}

/**
 * One console line per record: `<time> <level> <message> key=value ...`,
 * with a stack trace, if any, on the lines below
 */
export function formatConsoleLine(info: winston.Logform.TransformableInfo): string {
  const { timestamp, level, message, stack, ...meta } = info;

  const fields = Object.entries(meta)
    .filter(([key, value]) => key !== 'service' && value !== undefined)
    .map(([key, value]) => `${key}=${renderValue(value)}`);

  const line = [String(timestamp), level, String(message), ...fields].join(' ');
  return typeof stack === 'string' ? `${line}\n${stack}` : line;
}

const transports: winston.transport[] = [
  // stderr keeps stdout free for whatever the caller pipes
  new winston.transports.Console({
    stderrLevels: Object.keys(winston.config.npm.levels),
    format: winston.format.combine(
      winston.format.timestamp({ format: 'HH:mm:ss' }),
      winston.format.colorize(),
      winston.format.printf(formatConsoleLine),
    ),
  }),
];

// JSON lines for post-mortems of long installs; opt-in
if (process.env.LOG_FILE && process.env.NODE_ENV !== 'test') {
  transports.push(
    new winston.transports.File({
      filename: process.env.LOG_FILE,
      format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    }),
  );
}

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'error' : 'info'),
  format: winston.format.errors({ stack: true }),
  defaultMeta: { service: SERVICE },
  transports,
});

export function logOperation(operation: string, details?: Record<string, unknown>): void {
  logger.info(operation, details);
}

/**
 * Log with stack trace; reported to Sentry when the CLI initialized it
 */
export function logError(error: Error, context?: Record<string, unknown>): void {
  logger.error(error.message, { stack: error.stack, ...context });
  Sentry.captureException(error, { extra: context });
}
