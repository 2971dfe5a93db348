import winston from 'winston';
import Transport from 'winston-transport';
import type { LogEntry } from '@shelfarr/shared-types';
import { LogStore } from './log-store';
import { config } from '../config/services.config';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ level, message, timestamp, stack }) => {
    if (stack) {
      return `${timestamp} [${level.toUpperCase()}]: ${message}\n${stack}`;
    }
    return `${timestamp} [${level.toUpperCase()}]: ${message}`;
  })
);

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

function toLevel(level: string): LogEntry['level'] {
  switch (level) {
    case 'error':
    case 'warn':
    case 'debug':
      return level;
    default:
      return 'info';
  }
}

class MemoryTransport extends Transport {
  readonly store: LogStore;

  constructor(capacity: number, options?: Transport.TransportStreamOptions) {
    super(options);
    this.store = new LogStore(capacity);
  }

  log(info: winston.Logform.TransformableInfo, callback: () => void): void {
    setImmediate(() => this.emit('logged', info));
    this.store.add({
      time: typeof info.timestamp === 'string' ? info.timestamp : new Date().toISOString(),
      level: toLevel(info.level),
      message: typeof info.message === 'string' ? info.message : safeStringify(info.message),
      exception: typeof info.stack === 'string' ? info.stack : undefined,
    });
    callback();
  }
}

const memory = new MemoryTransport(config.logStoreMax);

/** Recent entries kept for `GET /logs`. */
export const logStore = memory.store;

export const logger = winston.createLogger({
  level: config.nodeEnv === 'production' ? 'info' : 'debug',
  format: logFormat,
  transports: [
    memory,
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), logFormat),
      silent: config.nodeEnv === 'test',
    }),
  ],
});
