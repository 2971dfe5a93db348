import type { LogEntry } from '@shelfarr/shared-types';

export interface LogQuery {
  level?: LogEntry['level'];
  page?: number;
  pageSize?: number;
}

const DEFAULT_CAPACITY = 1000;

/** Ring of recent log entries served by `GET /logs`, newest first. */
export class LogStore {
  private entries: LogEntry[] = [];
  readonly capacity: number;

  constructor(capacity: number = DEFAULT_CAPACITY) {
    this.capacity = Number.isInteger(capacity) && capacity > 0 ? capacity : DEFAULT_CAPACITY;
  }

  get size(): number {
    return this.entries.length;
  }

  add(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  query({ level, page = 1, pageSize = 50 }: LogQuery = {}): LogEntry[] {
    const matching = level ? this.entries.filter((entry) => entry.level === level) : this.entries;
    const start = (page - 1) * pageSize;
    return [...matching].reverse().slice(start, start + pageSize);
  }

  clear(): void {
    this.entries = [];
  }
}
