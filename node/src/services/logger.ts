// src/services/logger.ts — structured logging for the engine
import { Logger } from 'tslog';

export const LOG_LEVELS: Record<string, number> = {
  silly: 0,
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  fatal: 6,
};

function levelOf(name: string | undefined): number {
  return LOG_LEVELS[(name ?? 'info').toLowerCase()] ?? 3;
}

export const logger = new Logger({
  name: 'people-search-engine',
  minLevel: levelOf(process.env.LOG_LEVEL),
  prettyLogTemplate: '{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}} {{logLevelName}} ',
  type: 'pretty',
});

/** Apply a level after startup, e.g. once `.env` has been loaded into the config. */
export function setLogLevel(name: string): void {
  logger.settings.minLevel = levelOf(name);
}
