/** Shared winston logger; its level comes from TOON_LOG_LEVEL. */

import winston from 'winston';
import { ConfigManager, LOG_LEVELS } from './config.js';

let logger: winston.Logger | null = null;

function createLogger(): winston.Logger {
  return winston.createLogger({
    level: ConfigManager.cfg.logLevel,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      winston.format.printf(({ level, message, timestamp, ...meta }) => {
        const prefix = `[${String(timestamp)}] [toon] [${level.toUpperCase()}]`;
        const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${prefix} ${String(message)}${extra}`;
      })
    ),
    // stdout belongs to the host program
    transports: [new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] })],
  });
}

function getLogger(): winston.Logger {
  if (!logger) {
    logger = createLogger();
  }
  return logger;
}

type Meta = Record<string, string | number | boolean>;

export const log = {
  error: (message: string, meta: Meta = {}) => getLogger().error(message, meta),
  warn: (message: string, meta: Meta = {}) => getLogger().warn(message, meta),
  info: (message: string, meta: Meta = {}) => getLogger().info(message, meta),
  debug: (message: string, meta: Meta = {}) => getLogger().debug(message, meta),
  isDebugEnabled: (): boolean => getLogger().isDebugEnabled(),
};

/** Drops the cached logger; the next call rebuilds it from the current config. */
export function resetLogger(): void {
  logger?.close();
  logger = null;
}
