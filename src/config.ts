import { Result } from '@badrap/result';
import { z } from 'zod';

/**
 * Log level schema. `silent` turns logging off.
 */
export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

/**
 * Log format schema.
 */
export const LogFormatSchema = z.enum(['json', 'pretty']);
export type LogFormat = z.infer<typeof LogFormatSchema>;

/**
 * Environment variables read by the library, with defaults.
 */
export const EnvSchema = z.object({
  CHESS_LOG_LEVEL: LogLevelSchema.default('warn'),
  CHESS_LOG_FORMAT: LogFormatSchema.default('pretty'),
});

export interface Config {
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
}

export const DEFAULT_CONFIG: Config = {
  logging: { level: 'warn', format: 'pretty' },
};

export interface ConfigIssue {
  path: string;
  message: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: ConfigIssue[]) {
    super(`ERR_CONFIG ${issues.map(issue => `${issue.path || 'root'}: ${issue.message}`).join('; ')}`);
  }
}

/**
 * Validates environment variables into a {@link Config}.
 */
export const parseConfig = (env: Record<string, string | undefined>): Result<Config, ConfigError> => {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    return Result.err(
      new ConfigError(result.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }))),
    );
  }
  return Result.ok({
    logging: {
      level: result.data.CHESS_LOG_LEVEL,
      format: result.data.CHESS_LOG_FORMAT,
    },
  });
};

/**
 * Like {@link parseConfig}, but throws on invalid variables.
 */
export const loadConfig = (env: Record<string, string | undefined> = process.env): Config => parseConfig(env).unwrap();
