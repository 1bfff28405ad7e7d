/**
 * Winston logger.
 *
 * JSON lines in production, colorized single lines locally, silent under Jest.
 * Call sites use a tag the same way the handlers do: `logger.child('[intake/web]')`.
 *
 *   log.info('Report saved', { recordId: 12 });
 *   log.error('Insert failed', err, { family: 'outage_report' });
 */

import winston from 'winston';

const level = process.env.LOG_LEVEL || 'info';
const nodeEnv = process.env.NODE_ENV || 'development';

const productionFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

const devFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ level, message, timestamp, tag, ...meta }) => {
    const prefix = typeof tag === 'string' ? `${tag} ` : '';
    const metaStr = Object.keys(meta).length > 0 ? ' ' + JSON.stringify(meta) : '';
    return `${timestamp} ${level}: ${prefix}${message}${metaStr}`;
  }),
);

const base = winston.createLogger({
  level,
  format: nodeEnv === 'production' ? productionFormat : devFormat,
  silent: nodeEnv === 'test',
  transports: [new winston.transports.Console()],
});

export type LogContext = Record<string, unknown>;

function errorFields(err: unknown): LogContext {
  if (err instanceof Error) {
    return { error: err.message, errorName: err.name, stack: err.stack };
  }
  return { error: String(err) };
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, err?: unknown, context?: LogContext): void;
}

function wrap(target: winston.Logger): Logger {
  return {
    debug: (message, context) => target.debug(message, context ?? {}),
    info: (message, context) => target.info(message, context ?? {}),
    warn: (message, context) => target.warn(message, context ?? {}),
    error: (message, err, context) =>
      target.error(message, { ...(err === undefined ? {} : errorFields(err)), ...(context ?? {}) }),
  };
}

export const logger = {
  ...wrap(base),
  child(tag: string): Logger {
    return wrap(base.child({ tag }));
  },
};
