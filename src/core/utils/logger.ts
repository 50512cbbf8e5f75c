import pino from 'pino';

const env = process.env.NODE_ENV ?? '';

// Set log level via env LOG_LEVEL (default: info)
const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: env === 'production' || env === 'test' ? undefined : {
    target: 'pino-pretty',
    options: { colorize: true, ignore: 'pid,hostname' }
  }
});

export interface LogMeta {
  source?: string;
  file?: string;
  url?: string;
  week?: number;
  year?: number;
  date?: string;
  count?: number;
  duration?: number;
  error?: string;
  [key: string]: unknown;
}

export class Logger {
  static info(message: string, meta?: LogMeta): void {
    logger.info(meta || {}, message);
  }
  static warn(message: string, meta?: LogMeta): void {
    logger.warn(meta || {}, message);
  }
  static error(message: string, error?: Error, meta?: LogMeta): void {
    const errorMeta = {
      ...meta,
      error: error?.message,
    };
    logger.error(errorMeta, message);
  }
  static debug(message: string, meta?: LogMeta): void {
    logger.debug(meta || {}, message);
  }
  // Convenience methods for common logging patterns
  static snapshotSaved(kind: 'menu' | 'price', key: string, inserted: boolean, file: string): void {
    this.info(`${inserted ? 'Saved' : 'Updated'} ${kind} history (${key})`, { kind, key, file });
  }
  static historyEvicted(kind: 'menu' | 'price', count: number, file: string): void {
    this.info(`Evicted ${count} ${kind} entr${count === 1 ? 'y' : 'ies'} outside retention`, {
      kind,
      count,
      file,
    });
  }
  static malformedStorage(file: string, reason: string): void {
    this.warn(`History file is malformed, starting from an empty log: ${reason}`, {
      file,
      kind: 'malformed-storage',
    });
  }
  static emptyExtraction(what: 'menu' | 'prices', source: string): void {
    this.warn(
      `No ${what === 'menu' ? 'menu items' : 'prices'} found on the page, its structure may have changed`,
      { source, kind: 'empty-extraction' },
    );
  }
}
