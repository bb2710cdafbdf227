import type { LogLevel } from './types.js';

/**
 * Logger used by every component of the server
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  /** `false` silences the logger, a level sets the minimum level */
  level?: boolean | LogLevel;
  /** Prefix printed before the level */
  prefix?: string;
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Create a console logger filtered by level
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', prefix = 'docroom' } = options;

  const log = (messageLevel: LogLevel, message: string, args: unknown[]): void => {
    if (!level) return;

    const configLevel = typeof level === 'string' ? level : 'info';
    if (LEVELS.indexOf(messageLevel) < LEVELS.indexOf(configLevel)) return;

    const tag = `[${prefix}] [${messageLevel.toUpperCase()}]`;
    console[messageLevel === 'debug' ? 'log' : messageLevel](tag, message, ...args);
  };

  return {
    debug: (message, ...args) => log('debug', message, args),
    info: (message, ...args) => log('info', message, args),
    warn: (message, ...args) => log('warn', message, args),
    error: (message, ...args) => log('error', message, args),
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = createLogger({ level: false });
