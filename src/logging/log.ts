/**
 * Tagged console logging gated by `runtime.logLevel`.
 *
 *   const log = createLogger('Terrain');
 *   log.info('Generated chunk');   // → [Terrain] Generated chunk
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let activeLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[activeLevel];
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;

  return {
    debug(message, ...details) {
      if (isLevelEnabled('debug')) console.log(`${prefix} ${message}`, ...details);
    },
    info(message, ...details) {
      if (isLevelEnabled('info')) console.log(`${prefix} ${message}`, ...details);
    },
    warn(message, ...details) {
      if (isLevelEnabled('warn')) console.warn(`${prefix} ${message}`, ...details);
    },
    error(message, ...details) {
      if (isLevelEnabled('error')) console.error(`${prefix} ${message}`, ...details);
    },
  };
}
