// src/adapters/sqlite-adapter.ts
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { Knex } from 'knex';
import type BetterSqlite3 from 'better-sqlite3';
import { BaseAdapter } from './base-adapter.js';
import type { DatabaseConfig } from '../config/types.js';
import { debugLog } from '../utils/debug-logger.js';

export const DEFAULT_SQLITE_PATH = '.ocistore/oci.db';

/**
 * SQLite adapter (better-sqlite3 driver).
 *
 * Pragmas are applied in the pool's afterCreate hook so every connection the
 * pool opens enforces foreign keys; cascade deletes and the FK checks made
 * while copying rows depend on it.
 *
 * @extends BaseAdapter
 */
export class SQLiteAdapter extends BaseAdapter {
  readonly databaseName = 'sqlite' as const;
  readonly supportsTransactionalDDL = true;

  constructor(config: DatabaseConfig) {
    super(config);
  }

  getDialect(): string {
    return 'better-sqlite3';
  }

  get filename(): string {
    return this.config.path || DEFAULT_SQLITE_PATH;
  }

  protected buildConnection(): Knex.StaticConnectionConfig {
    return { filename: this.filename };
  }

  /**
   * One connection only: SQLite serialises writers anyway, and an in-memory
   * database lives and dies with its connection.
   */
  protected buildPoolConfig(): Knex.PoolConfig {
    const inMemory = this.filename === ':memory:';
    return {
      min: 1,
      max: 1,
      afterCreate: (
        conn: BetterSqlite3.Database,
        done: (err: Error | null, conn: BetterSqlite3.Database) => void
      ) => {
        try {
          if (!inMemory) {
            conn.pragma('journal_mode = WAL');
          }
          conn.pragma('foreign_keys = ON');
          conn.pragma('synchronous = NORMAL');
          conn.pragma('busy_timeout = 5000');
          done(null, conn);
        } catch (error) {
          done(error instanceof Error ? error : new Error(String(error)), conn);
        }
      },
    };
  }

  /**
   * Creates the database file's directory before the first connection.
   */
  async connect(): Promise<Knex> {
    if (this.filename !== ':memory:') {
      mkdirSync(dirname(this.filename), { recursive: true });
    }
    return super.connect();
  }

  /**
   * Verifies the pragmas took effect.
   */
  async initialize(): Promise<void> {
    const result: unknown = await this.getKnex().raw('PRAGMA foreign_keys');
    const enabled = Array.isArray(result) && result.some(
      (row: unknown) => typeof row === 'object' && row !== null && 'foreign_keys' in row && row.foreign_keys === 1
    );
    if (!enabled) {
      throw new Error(`Foreign key enforcement could not be enabled on ${this.filename}`);
    }
  }

  /**
   * Checkpoints the WAL and closes the connection.
   */
  async disconnect(): Promise<void> {
    if (this.knexInstance && this.filename !== ':memory:') {
      try {
        await this.knexInstance.raw('PRAGMA wal_checkpoint(TRUNCATE)');
        await this.knexInstance.raw('PRAGMA optimize');
      } catch (error) {
        debugLog('WARN', 'SQLite checkpoint before close failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    await super.disconnect();
  }
}
