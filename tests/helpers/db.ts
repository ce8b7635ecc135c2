import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export function tmpDb(prefix: string = 'memtier-test'): string {
  return path.join(os.tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}.db`);
}

export function cleanDb(dbPath: string): void {
  for (const suffix of ['', '-journal', '-wal', '-shm']) {
    try { fs.unlinkSync(dbPath + suffix); } catch { /* ignore */ }
  }
}

export function must<T>(value: T | null | undefined): T {
  if (value === null || value === undefined) throw new Error('expected a value');
  return value;
}

/**
 * Settable clock for the store; starts at `start` and only moves when told.
 */
export class TestClock {
  private current: Date;

  constructor(start: string | Date = '2024-06-15T12:00:00.000Z') {
    this.current = new Date(start);
  }

  readonly now = (): Date => new Date(this.current.getTime());

  set(date: string | Date): void {
    this.current = new Date(date);
  }

  advance(ms: number): void {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export const HOUR = 60 * 60 * 1000;
export const DAY = 24 * HOUR;
