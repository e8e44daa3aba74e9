import log from 'electron-log/node';
import { LOG_LEVELS } from '../../shared/constants';

class Logger {
  constructor() {
    log.transports.file.level = LOG_LEVELS.INFO;
    log.transports.console.level = LOG_LEVELS.DEBUG;
  }

  error(message: string, ...args: unknown[]): void {
    log.error(message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    log.warn(message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    log.info(message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    log.debug(message, ...args);
  }
}

export const logger = new Logger();
