/**
 * @fileoverview PostgreSQL adapter (pg driver).
 */

import type { Knex } from 'knex';
import { BaseAdapter } from './base-adapter.js';
import type { DatabaseConfig } from '../config/types.js';
import { extractRows } from '../utils/universal-knex.js';

export class PostgreSQLAdapter extends BaseAdapter {
  readonly databaseName = 'postgresql' as const;
  readonly supportsTransactionalDDL = true;

  constructor(config: DatabaseConfig) {
    super(config);
  }

  getDialect(): string {
    return 'pg';
  }

  protected buildConnection(): Knex.StaticConnectionConfig {
    const connection = this.config.connection;
    if (!connection?.database) {
      throw new Error('PostgreSQL adapter requires database name in configuration');
    }

    return {
      host: connection.host,
      port: connection.port,
      database: connection.database,
      user: this.config.auth?.user,
      password: this.config.auth?.password,
      ...(this.config.auth?.ssl ? { ssl: { rejectUnauthorized: true } } : {}),
    };
  }

  /**
   * Confirms the configured database is reachable.
   */
  async initialize(): Promise<void> {
    const dbName = this.config.connection?.database;

    try {
      const [row] = extractRows(await this.getKnex().raw('SELECT current_database() AS db'));
      if (!row || row.db !== dbName) {
        throw new Error(
          `Database '${dbName}' does not exist or cannot be accessed. ` +
          `Please create it manually: CREATE DATABASE ${dbName} ENCODING 'UTF8';`
        );
      }
    } catch (error) {
      // 3D000: invalid_catalog_name
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === '3D000') {
        throw new Error(
          `Database '${dbName}' does not exist. Please create it manually before connecting.`,
          { cause: error }
        );
      }
      throw error;
    }

    await this.getKnex().raw("SET timezone = 'UTC'");
  }
}
