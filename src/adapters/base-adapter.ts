/**
 * @fileoverview Base adapter for database connections.
 *
 * Owns the Knex instance lifecycle for every engine:
 * 1. Constructor: store the resolved DatabaseConfig
 * 2. connect(): build the Knex config, create the instance, run initialize()
 * 3. getKnex(): access the instance
 * 4. disconnect(): destroy the pool
 *
 * Concrete adapters supply the dialect, the connection block, optional
 * pool hooks and engine-specific initialization.
 *
 * @module adapters/base-adapter
 */

import knexLib from 'knex';
import type { Knex } from 'knex';
import type { DatabaseAdapter } from './types.js';
import type { DatabaseConfig } from '../config/types.js';
import { debugLog } from '../utils/debug-logger.js';

const { knex } = knexLib;

/**
 * Abstract base class for database adapters.
 *
 * @example
 * const adapter = new SQLiteAdapter({ type: 'sqlite', path: '.ocistore/oci.db' });
 * try {
 *   const knex = await adapter.connect();
 *   const images = await knex('images').select('*');
 * } finally {
 *   await adapter.disconnect();
 * }
 */
export abstract class BaseAdapter implements DatabaseAdapter {
  protected readonly config: DatabaseConfig;

  /** Null until connect() succeeds */
  protected knexInstance: Knex | null = null;

  constructor(config: DatabaseConfig) {
    this.config = config;
  }

  // ============================================================================
  // Abstract Members - Must be implemented by subclasses
  // ============================================================================

  /**
   * Engine-specific setup after the pool exists (session checks, pragmas).
   */
  abstract initialize(): Promise<void>;

  /**
   * Knex client identifier: 'better-sqlite3', 'mysql2' or 'pg'.
   */
  abstract getDialect(): string;

  /**
   * The `connection` block of the Knex config.
   */
  protected abstract buildConnection(): Knex.StaticConnectionConfig;

  abstract readonly databaseName: 'sqlite' | 'postgresql' | 'mysql';
  abstract readonly supportsTransactionalDDL: boolean;

  /**
   * Pool settings; engines without special needs keep Knex defaults.
   */
  protected buildPoolConfig(): Knex.PoolConfig | undefined {
    return undefined;
  }

  // ============================================================================
  // Connection Management
  // ============================================================================

  /**
   * Full Knex configuration for this adapter
   */
  buildKnexConfig(): Knex.Config {
    const pool = this.buildPoolConfig();
    return {
      client: this.getDialect(),
      connection: this.buildConnection(),
      useNullAsDefault: true,
      ...(pool ? { pool } : {}),
    };
  }

  /**
   * Establishes the connection. Idempotent: a second call returns the
   * existing instance.
   */
  async connect(): Promise<Knex> {
    if (this.knexInstance) {
      return this.knexInstance;
    }

    this.knexInstance = knex(this.buildKnexConfig());

    try {
      await this.initialize();
    } catch (error) {
      await this.disconnect();
      throw error;
    }

    debugLog('INFO', `Connected to ${this.databaseName} (${this.getDialect()})`);
    return this.knexInstance;
  }

  /**
   * Closes the database connection.
   */
  async disconnect(): Promise<void> {
    if (this.knexInstance) {
      const instance = this.knexInstance;
      this.knexInstance = null;
      await instance.destroy();
    }
  }

  /**
   * @throws {Error} If called before connect()
   */
  getKnex(): Knex {
    if (!this.knexInstance) {
      throw new Error('Database not connected. Call connect() first.');
    }
    return this.knexInstance;
  }

  // ============================================================================
  // Transactions
  // ============================================================================

  async transaction<T>(callback: (trx: Knex.Transaction) => Promise<T>): Promise<T> {
    return this.getKnex().transaction(callback);
  }
}
