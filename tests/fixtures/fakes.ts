/**
 * Test fakes and mocks
 */

import { err, ok } from 'neverthrow';
import pinoLib, { type Logger } from 'pino';

import type { CacheError, CachePort, CacheSetOptions, CacheStats } from '@/infra/cache/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Cache Port
// ─────────────────────────────────────────────────────────────────────────────

type CacheOperation = 'get' | 'set' | 'delete';

interface FakeCachePortOptions {
  /** Error returned by the operations listed in `failOn` */
  failWithError?: CacheError;
  /** Operations that fail. Default: all of them, when `failWithError` is set */
  failOn?: readonly CacheOperation[];
}

export interface FakeCachePort<T> extends CachePort<T> {
  /** Every set call, in order */
  readonly setCalls: { key: string; value: T; options: CacheSetOptions | undefined }[];
  /** Every delete call, in order */
  readonly deleteCalls: string[];
  /** Raw stored values, ignoring TTLs */
  readonly entries: Map<string, T>;
}

/**
 * Creates a fake CachePort that keeps values forever and records calls.
 */
export const makeFakeCachePort = <T = unknown>(
  options: FakeCachePortOptions = {}
): FakeCachePort<T> => {
  const { failWithError, failOn = ['get', 'set', 'delete'] } = options;
  const entries = new Map<string, T>();
  const setCalls: FakeCachePort<T>['setCalls'] = [];
  const deleteCalls: string[] = [];
  let hits = 0;
  let misses = 0;

  const failure = (operation: CacheOperation): CacheError | undefined =>
    failWithError !== undefined && failOn.includes(operation) ? failWithError : undefined;

  return {
    entries,
    setCalls,
    deleteCalls,
    get: (key: string) => {
      const error = failure('get');
      if (error !== undefined) return Promise.resolve(err(error));
      const value = entries.get(key);
      if (value === undefined) {
        misses++;
        return Promise.resolve(ok(undefined));
      }
      hits++;
      return Promise.resolve(ok(value));
    },
    set: (key: string, value: T, setOptions?: CacheSetOptions) => {
      setCalls.push({ key, value, options: setOptions });
      const error = failure('set');
      if (error !== undefined) return Promise.resolve(err(error));
      entries.set(key, value);
      return Promise.resolve(ok(undefined));
    },
    delete: (key: string) => {
      deleteCalls.push(key);
      const error = failure('delete');
      if (error !== undefined) return Promise.resolve(err(error));
      return Promise.resolve(ok(entries.delete(key)));
    },
    stats: (): Promise<CacheStats> => Promise.resolve({ hits, misses, size: entries.size }),
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Logger
// ─────────────────────────────────────────────────────────────────────────────

export type LogRecord = Record<string, unknown>;

export const LogLevel = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
} as const;

/**
 * Creates a real pino logger that writes parsed JSON records into memory.
 */
export const makeCapturingLogger = (): { logger: Logger; records: LogRecord[] } => {
  const records: LogRecord[] = [];
  const logger = pinoLib(
    { level: 'trace' },
    {
      write(line: string) {
        records.push(JSON.parse(line));
      },
    }
  );
  return { logger, records };
};

/**
 * Records logged at exactly the given level.
 */
export const recordsAt = (records: LogRecord[], level: number): LogRecord[] =>
  records.filter((record) => record['level'] === level);
