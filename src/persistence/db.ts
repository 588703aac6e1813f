import fs from 'fs-extra';
import path from 'node:path';
import Database from 'better-sqlite3';
import { logger } from '../utils/logger.js';
import { DatabaseError } from '../utils/errorhandler.js';

class PerformanceMonitor {
  private writeCount = 0;
  private startTime = Date.now();
  private readonly interval: NodeJS.Timeout;

  constructor(intervalMs = 30_000) {
    this.interval = setInterval(() => this.logStats(), intervalMs);
    this.interval.unref();
  }

  recordWrite() {
    this.writeCount++;
  }

  stop() {
    clearInterval(this.interval);
  }

  private logStats() {
    if (this.writeCount === 0) return;
    const elapsed = Math.max((Date.now() - this.startTime) / 1000, 1);
    const writesPerSecond = this.writeCount / elapsed;
    logger.debug(`Database: ${writesPerSecond.toFixed(1)} writes/sec`);
    this.writeCount = 0;
    this.startTime = Date.now();
  }
}

export type SqlParam = string | number | bigint | null | Buffer;

export interface PreparedQuery<Row> {
  get(...params: SqlParam[]): Row | undefined;
  all(...params: SqlParam[]): Row[];
  run(...params: SqlParam[]): Database.RunResult;
}

export class DatabaseManager {
  private readonly db: Database.Database;
  private readonly monitor: PerformanceMonitor;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.ensureDirSync(path.dirname(dbPath));
    }
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('synchronous = NORMAL');
    this.db.pragma('foreign_keys = ON');
    this.db.pragma('busy_timeout = 5000');

    this.monitor = new PerformanceMonitor();
  }

  prepare<Row = unknown>(query: string): PreparedQuery<Row> {
    const stmt = this.db.prepare<SqlParam[], Row>(query);
    return {
      get: (...params) => stmt.get(...params),
      all: (...params) => stmt.all(...params),
      run: (...params) => {
        const result = stmt.run(...params);
        this.monitor.recordWrite();
        return result;
      },
    };
  }

  exec(sql: string) {
    this.db.exec(sql);
  }

  /**
   * Runs `fn` inside `BEGIN IMMEDIATE`, so the write lock is taken before the first read.
   * A throw rolls everything back. `fn` must be synchronous.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  close() {
    this.monitor.stop();
    if (this.db.open) this.db.close();
  }
}

function loadSchema(): string {
  const candidates = [
    // Source tree (tsx, vitest)
    new URL('./schema.sql', import.meta.url),
    // Compiled into dist/src/persistence
    new URL('../../../src/persistence/schema.sql', import.meta.url),
    path.resolve(process.cwd(), 'src', 'persistence', 'schema.sql'),
  ];

  for (const candidate of candidates) {
    try {
      return fs.readFileSync(candidate, 'utf-8');
    } catch (err) {
      const code = err instanceof Error && 'code' in err ? err.code : undefined;
      if (code !== 'ENOENT') {
        logger.warn('Error reading schema candidate', { candidate: String(candidate), code });
      }
    }
  }

  throw new DatabaseError('schema.sql not found', 'loadSchema');
}

let schemaCache: string | undefined;

export function openDatabase(dbPath: string): DatabaseManager {
  schemaCache ??= loadSchema();
  const db = new DatabaseManager(dbPath);
  db.exec(schemaCache);
  logger.debug('Database opened', { dbPath });
  return db;
}
