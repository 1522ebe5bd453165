/**
 * Process-wide logger backed by electron-log's Node entry.
 *
 * Console shows info and above; the file transport keeps a 1 MB rotating
 * holdtalk.log once configureFileLog() has been called with the data dir.
 */

import { join } from 'path';
import log from 'electron-log/node';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(...params: unknown[]): void;
  info(...params: unknown[]): void;
  warn(...params: unknown[]): void;
  error(...params: unknown[]): void;
}

const MAX_LOG_FILE_BYTES = 1_048_576;

log.transports.console.level = process.env.HOLDTALK_DEBUG ? 'debug' : 'info';
log.transports.console.format = '{h}:{i}:{s} [{level}] {text}';
// File logging stays off until the data directory is known
log.transports.file.level = false;

/**
 * Point the file transport at `<dataDir>/holdtalk.log`.
 */
export function configureFileLog(dataDir: string, level: LogLevel = 'debug'): string {
  const filePath = join(dataDir, 'holdtalk.log');
  log.transports.file.resolvePathFn = () => filePath;
  log.transports.file.maxSize = MAX_LOG_FILE_BYTES;
  log.transports.file.level = level;
  return filePath;
}

export function setConsoleLevel(level: LogLevel | false): void {
  log.transports.console.level = level;
}

/**
 * Logger whose lines carry a `[Component]` prefix.
 */
export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    debug: (...params) => log.debug(prefix, ...params),
    info: (...params) => log.info(prefix, ...params),
    warn: (...params) => log.warn(prefix, ...params),
    error: (...params) => log.error(prefix, ...params),
  };
}
