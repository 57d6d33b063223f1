/**
 * @fileoverview MySQL/MariaDB adapter (mysql2 driver).
 *
 * MySQL commits implicitly around every DDL statement. A table rebuild on
 * MySQL therefore is not atomic; the rebuild steps detect a leftover shadow
 * table or a half-finished cutover and resume from there on the next run.
 */

import type { Knex } from 'knex';
import { BaseAdapter } from './base-adapter.js';
import type { DatabaseConfig } from '../config/types.js';
import { extractRows } from '../utils/universal-knex.js';

export class MySQLAdapter extends BaseAdapter {
  readonly databaseName = 'mysql' as const;
  readonly supportsTransactionalDDL = false;

  constructor(config: DatabaseConfig) {
    super(config);
  }

  getDialect(): string {
    return 'mysql2';
  }

  protected buildConnection(): Knex.StaticConnectionConfig {
    const connection = this.config.connection;
    if (!connection?.database) {
      throw new Error('MySQL adapter requires database name in configuration');
    }

    return {
      host: connection.host,
      port: connection.port,
      database: connection.database,
      user: this.config.auth?.user,
      password: this.config.auth?.password,
      charset: 'utf8mb4',
      timezone: 'Z',
      ...(this.config.auth?.ssl ? { ssl: { rejectUnauthorized: true } } : {}),
    };
  }

  /**
   * Confirms the configured database is the one the session is using.
   */
  async initialize(): Promise<void> {
    const dbName = this.config.connection?.database;

    try {
      const [row] = extractRows(await this.getKnex().raw('SELECT DATABASE() AS db'));
      if (!row || row.db !== dbName) {
        throw new Error(
          `Database '${dbName}' does not exist or cannot be accessed. ` +
          `Please create it manually: CREATE DATABASE ${dbName} CHARACTER SET utf8mb4 COLLATE utf8mb4_unicode_ci;`
        );
      }
    } catch (error) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ER_BAD_DB_ERROR') {
        throw new Error(
          `Database '${dbName}' does not exist. Please create it manually before connecting.`,
          { cause: error }
        );
      }
      throw error;
    }
  }
}
