import winston from 'winston';
import { config } from '../config/env';

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.colorize(),
  winston.format.printf((info) => {
    const { timestamp, level, message, stack, ...meta } = info;
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${metaStr}${stack ? `\n${String(stack)}` : ''}`;
  }),
);

const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

const transports: winston.transport[] = [new winston.transports.Console({ format: consoleFormat })];

if (config.env === 'production') {
  transports.push(
    new winston.transports.File({ filename: 'logs/error.log', level: 'error', format: fileFormat }),
    new winston.transports.File({ filename: 'logs/combined.log', format: fileFormat }),
  );
}

export const logger = winston.createLogger({
  level: config.logLevel,
  transports,
  silent: config.env === 'test',
  exitOnError: false,
});

/** Error → loggable string, for `{ error }` metadata. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
