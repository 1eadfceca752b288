import { isLogLevelEnabled } from '@/lib/config';

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console logger with a subsystem tag, filtered by NAVDATA_LOG_LEVEL.
 */
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(message, ...details) {
      if (isLogLevelEnabled('debug')) console.debug(prefix, message, ...details);
    },
    info(message, ...details) {
      if (isLogLevelEnabled('info')) console.info(prefix, message, ...details);
    },
    warn(message, ...details) {
      if (isLogLevelEnabled('warn')) console.warn(prefix, message, ...details);
    },
    error(message, ...details) {
      if (isLogLevelEnabled('error')) console.error(prefix, message, ...details);
    }
  };
}
