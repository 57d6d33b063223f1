// src/adapters/types.ts
import type { Knex } from 'knex';

/**
 * Database adapter interface for cross-RDBMS compatibility
 * Abstracts connection setup and engine capabilities
 */
export interface DatabaseAdapter {
  // ============================================================================
  // Connection Management
  // ============================================================================
  connect(): Promise<Knex>;
  disconnect(): Promise<void>;
  getKnex(): Knex;

  // ============================================================================
  // Feature Detection
  // ============================================================================
  readonly databaseName: 'sqlite' | 'postgresql' | 'mysql';

  /**
   * Whether schema changes roll back with the enclosing transaction.
   * MySQL commits implicitly on every DDL statement, so a failed migration
   * there can leave earlier steps applied.
   */
  readonly supportsTransactionalDDL: boolean;

  // ============================================================================
  // Transaction Helpers
  // ============================================================================
  transaction<T>(callback: (trx: Knex.Transaction) => Promise<T>): Promise<T>;
}
