import winston from 'winston';
import type { LogFormat } from './config.js';

const { combine, timestamp, json, printf, colorize } = winston.format;

const logLevel = process.env.LOG_LEVEL || 'info';
const logFormat: LogFormat = process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json';

export const CONSOLE_FORMATS: Record<LogFormat, winston.Logform.Format> = {
  json: combine(timestamp(), json()),
  pretty: combine(
    colorize(),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    printf(({ level, message, timestamp, ...meta }) => {
      const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
      return `${timestamp} [${level}]: ${message}${metaStr}`;
    })
  ),
};

export const consoleTransport = new winston.transports.Console({
  format: CONSOLE_FORMATS[logFormat],
  // Keep stdout free for CLI output
  stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
});

export const logger = winston.createLogger({
  level: logLevel,
  format: combine(timestamp(), json()),
  defaultMeta: { service: 'provisioning-import' },
  silent: process.env.LOG_SILENT === 'true',
  transports: [consoleTransport],
});

// Add file transport in production
if (process.env.NODE_ENV === 'production') {
  logger.add(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error'
    })
  );
  logger.add(
    new winston.transports.File({
      filename: 'logs/combined.log'
    })
  );
}

/**
 * Apply the loaded logging settings over the environment defaults
 */
export function configureLogger(settings: { level: string; format: LogFormat }): void {
  logger.level = settings.level;
  consoleTransport.format = CONSOLE_FORMATS[settings.format];
}

export function createChildLogger(context: Record<string, unknown>) {
  return logger.child(context);
}
