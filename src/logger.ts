import pino, { type Logger, type LevelWithSilent } from 'pino';
import { z } from 'zod';
import type { Settings } from './config/settings.js';

const LogLevelSchema = z
  .string()
  .transform((value) => value.toLowerCase())
  .pipe(z.enum(['debug', 'info', 'warn', 'error', 'none']))
  .catch('info');

export type LogLevel = z.infer<typeof LogLevelSchema>;

export interface LoggingOptions {
  level: LogLevel;
  json: boolean;
  /** Per-request logging from the adapter server itself. */
  logServer: boolean;
}

export function resolveLoggingOptions(settings: Settings): LoggingOptions {
  return {
    level: LogLevelSchema.parse(settings.getString('log_level')),
    json: settings.getBool('log_json'),
    logServer: !settings.isSet('log_grpc') || settings.getBool('log_grpc'),
  };
}

export function toPinoLevel(level: LogLevel): LevelWithSilent {
  return level === 'none' ? 'silent' : level;
}

export function createLogger(options: LoggingOptions, env: NodeJS.ProcessEnv = process.env): Logger {
  const production = env.NODE_ENV === 'production';
  const usePrettyLogs = !options.json && !production;

  const logger = pino({
    level: toPinoLevel(options.level),
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: () => `,"time":"${new Date().toISOString()}"`,
    transport: usePrettyLogs ? { target: 'pino-pretty' } : undefined,
  });

  if (!options.json && production) {
    logger.warn('Pretty logging is not available in production, using JSON format instead');
  }

  return logger;
}
