import type { Logger, LogLevel } from './types.js';

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Create default console logger
 *
 * Errors and warnings go to stderr, so stdout only carries the tool's own output.
 */
export function createConsoleLogger(level: LogLevel = 'warn'): Logger {
  const currentLevel = LEVELS.indexOf(level);

  return {
    error: (msg: string, meta?: unknown) => {
      if (currentLevel >= 0) console.error(`[POT ERROR] ${msg}`, meta || '');
    },
    warn: (msg: string, meta?: unknown) => {
      if (currentLevel >= 1) console.warn(`[POT WARN] ${msg}`, meta || '');
    },
    info: (msg: string, meta?: unknown) => {
      if (currentLevel >= 2) console.error(`[POT INFO] ${msg}`, meta || '');
    },
    debug: (msg: string, meta?: unknown) => {
      if (currentLevel >= 3) console.error(`[POT DEBUG] ${msg}`, meta || '');
    },
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
};
