import { mkdirSync, readFileSync } from 'node:fs';
import path from 'node:path';

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';

import { RoundRelayError, StorageError } from '../core/errors';
import { createLogger } from '../core/log';

export const MEMORY_DATABASE = ':memory:';
export const DATABASE_FILE_NAME = 'roundrelay.sqlite';
export const SCHEMA_VERSION = 1;

const SCHEMA_SQL = new URL('./schema.sql', import.meta.url);

const log = createLogger('storage/database');

export type Db = BetterSQLite3Database;

function openSqlite(filename: string): Database.Database {
  try {
    if (filename !== MEMORY_DATABASE) {
      mkdirSync(path.dirname(filename), { recursive: true });
    }
    const sqlite = new Database(filename);
    if (filename !== MEMORY_DATABASE) {
      sqlite.pragma('journal_mode = WAL');
    }
    sqlite.pragma('foreign_keys = ON');
    sqlite.exec(readFileSync(SCHEMA_SQL, 'utf8'));
    sqlite.pragma(`user_version = ${SCHEMA_VERSION}`);
    return sqlite;
  } catch (error) {
    throw new StorageError(`failed to open database ${filename}`, { cause: error });
  }
}

/**
 * SQLite store behind drizzle. The driver is synchronous, so a `write`
 * runs as one transaction that nothing else can interleave with, and a
 * reader always sees the last committed state. SQLite failures surface as
 * StorageError; domain errors thrown by a callback pass through and roll
 * the transaction back.
 */
export class LocalDatabase {
  readonly filename: string;
  private readonly sqlite: Database.Database;
  private readonly orm: Db;

  constructor(filename: string = MEMORY_DATABASE) {
    this.filename = filename;
    this.sqlite = openSqlite(filename);
    this.orm = drizzle(this.sqlite);
  }

  static inDirectory(dataDir: string | null): LocalDatabase {
    return new LocalDatabase(dataDir ? path.join(dataDir, DATABASE_FILE_NAME) : MEMORY_DATABASE);
  }

  async read<T>(select: (db: Db) => T): Promise<T> {
    return this.run('read', () => select(this.orm));
  }

  async write<T>(mutate: (db: Db) => T): Promise<T> {
    return this.run('write', () => this.sqlite.transaction(() => mutate(this.orm))());
  }

  close(): void {
    if (this.sqlite.open) {
      this.sqlite.close();
      log.info('database closed', { filename: this.filename });
    }
  }

  private run<T>(what: 'read' | 'write', operation: () => T): T {
    if (!this.sqlite.open) {
      throw new StorageError(`database ${what} after close`);
    }
    try {
      return operation();
    } catch (error) {
      if (error instanceof RoundRelayError || !(error instanceof Database.SqliteError)) {
        throw error;
      }
      throw new StorageError(`database ${what} failed: ${error.message}`, { cause: error });
    }
  }
}
