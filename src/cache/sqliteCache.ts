import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { CacheOpenError, CacheStoreError } from '../errors.js';
import { epochSecondsNow } from '../utils/time.js';
import type { Logger } from '../utils/logger.js';
import type { CacheEntry, CacheStore, Compute } from './cache.js';

export const DB_NAME = 'cache.db';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS curse_queries (
    url TEXT PRIMARY KEY,
    result TEXT NOT NULL,
    downloaded INTEGER NOT NULL
  )
`;

interface QueryRow {
  url: string;
  result: string;
  downloaded: number;
}

export interface SqliteCacheOptions {
  /** Directory holding `cache.db`; ignored when `filePath` is given. */
  cacheDir?: string;
  /** Full database path, or `:memory:`. */
  filePath?: string;
  /** Epoch seconds. */
  clock?: () => number;
  logger?: Logger;
}

export class SqliteCache implements CacheStore {
  readonly filePath: string;
  private readonly db: Database.Database;
  private readonly clock: () => number;
  private readonly logger: Logger | undefined;
  private readonly selectFresh: Database.Statement<[string, number], Pick<QueryRow, 'result'>>;
  private readonly selectAny: Database.Statement<[string], QueryRow>;
  private readonly upsert: Database.Statement<[string, string, number]>;
  private readonly inFlight = new Map<string, Promise<string>>();

  constructor(options: SqliteCacheOptions = {}) {
    this.filePath = resolveFilePath(options);
    this.clock = options.clock ?? epochSecondsNow;
    this.logger = options.logger;

    try {
      this.db = new Database(this.filePath, { fileMustExist: false });
    } catch (error) {
      throw new CacheOpenError(this.filePath, { cause: error });
    }

    try {
      this.db.pragma('journal_mode = WAL');
      this.db.exec(SCHEMA);
      this.selectFresh = this.db.prepare<[string, number], Pick<QueryRow, 'result'>>(
        'SELECT result FROM curse_queries WHERE url = ? AND downloaded > ?',
      );
      this.selectAny = this.db.prepare<[string], QueryRow>(
        'SELECT url, result, downloaded FROM curse_queries WHERE url = ?',
      );
      this.upsert = this.db.prepare<[string, string, number]>(
        'INSERT OR REPLACE INTO curse_queries (url, result, downloaded) VALUES (?, ?, ?)',
      );
    } catch (error) {
      this.db.close();
      throw new CacheOpenError(this.filePath, { cause: error });
    }

    this.logger?.(`Using cache database ${this.filePath}`);
  }

  async getOrPut(key: string, ttlSeconds: number, compute: Compute): Promise<string> {
    const cutoff = this.clock() - ttlSeconds;
    const cached = this.run(key, 'Searching cache', () => this.selectFresh.get(key, cutoff));
    if (cached) {
      this.logger?.(`hit ${key}`);
      return cached.result;
    }

    // Concurrent misses for one key share a single compute.
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    this.logger?.(`miss ${key}`);
    const task = this.computeAndStore(key, compute);
    this.inFlight.set(key, task);
    try {
      return await task;
    } finally {
      this.inFlight.delete(key);
    }
  }

  entry(key: string): CacheEntry | undefined {
    const row = this.run(key, 'Reading cache entry', () => this.selectAny.get(key));
    if (!row) {
      return undefined;
    }
    return { key: row.url, payload: row.result, fetchedAt: row.downloaded };
  }

  close(): void {
    this.db.close();
  }

  private async computeAndStore(key: string, compute: Compute): Promise<string> {
    const result = await compute();
    const fetchedAt = this.clock();
    this.run(key, 'Updating cache', () => this.upsert.run(key, result, fetchedAt));
    return result;
  }

  private run<T>(key: string, action: string, statement: () => T): T {
    try {
      return statement();
    } catch (error) {
      throw new CacheStoreError(action, key, { cause: error });
    }
  }
}

function resolveFilePath(options: SqliteCacheOptions): string {
  if (options.filePath) {
    return options.filePath;
  }
  if (!options.cacheDir) {
    throw new Error('SqliteCache needs either filePath or cacheDir.');
  }

  try {
    fs.mkdirSync(options.cacheDir, { recursive: true });
  } catch (error) {
    throw new CacheOpenError(options.cacheDir, { cause: error });
  }
  return path.join(options.cacheDir, DB_NAME);
}
