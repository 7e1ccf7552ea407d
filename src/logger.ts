import winston from 'winston';
import { Config, DEFAULT_CONFIG, parseConfig } from './config.js';

export type LogMeta = Record<string, unknown>;

/**
 * Format for structured JSON logging.
 */
const jsonFormat = winston.format.combine(
  winston.format.timestamp({
    format: () => new Date().toISOString(),
  }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

/**
 * Format for human-readable console output.
 */
const prettyFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss',
  }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, module, ...meta }) => {
    const moduleStr = typeof module === 'string' ? ` [${module}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}${moduleStr}: ${String(message)}${metaStr}`;
  }),
);

/**
 * Creates a console logger writing every level to stderr.
 */
export const createLogger = (logging: Config['logging']): winston.Logger =>
  winston.createLogger({
    level: logging.level === 'silent' ? 'error' : logging.level,
    silent: logging.level === 'silent',
    format: logging.format === 'json' ? jsonFormat : prettyFormat,
    transports: [
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      }),
    ],
  });

const envConfig = parseConfig(process.env);

/**
 * Library logger configured from the environment. Invalid variables fall
 * back to {@link DEFAULT_CONFIG} with a warning listing them.
 */
export const logger = createLogger(envConfig.unwrap(config => config, () => DEFAULT_CONFIG).logging);

if (envConfig.isErr) {
  logger.warn('invalid logging configuration, using defaults', { issues: envConfig.error.issues });
}

/**
 * Child logger tagging every entry with `module`.
 */
export const moduleLogger = (module: string): winston.Logger => logger.child({ module });
