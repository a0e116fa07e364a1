/**
 * Logging
 *
 * One winston root logger; modules take a scoped child via `createLogger`.
 * The level comes from `LOG_LEVEL` (`silent` turns output off) and can be
 * changed later with `setLogLevel`.
 */

import winston from 'winston';
import { DEFAULT_RENDER_CONFIG, resolveLogLevel, type LogLevel } from '../config/renderConfig';
import { ConfigError } from '../errors';

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, scope, ...meta }) => {
    const prefix = typeof scope === 'string' ? `[${scope}] ` : '';
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${prefix}${String(message)}${metaStr}`;
  }),
);

export const rootLogger = winston.createLogger({
  level: DEFAULT_RENDER_CONFIG.logLevel,
  transports: [new winston.transports.Console({ format: consoleFormat })],
});

export function setLogLevel(level: LogLevel): void {
  rootLogger.silent = level === 'silent';
  rootLogger.level = level === 'silent' ? 'error' : level;
}

export function createLogger(scope: string): winston.Logger {
  return rootLogger.child({ scope });
}

// An invalid LOG_LEVEL must not break importing the package
try {
  setLogLevel(resolveLogLevel(process.env));
} catch (error) {
  if (!(error instanceof ConfigError)) throw error;
  setLogLevel(DEFAULT_RENDER_CONFIG.logLevel);
  rootLogger.warn(`${error.message}; using "${DEFAULT_RENDER_CONFIG.logLevel}"`);
}
