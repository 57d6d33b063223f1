// src/adapters/index.ts
// Export types from separate file to avoid circular dependencies
export type { DatabaseAdapter } from './types.js';
export type { DatabaseConfig, AuthConfig, ConnectionConfig } from '../config/types.js';

export { BaseAdapter } from './base-adapter.js';

import { SQLiteAdapter } from './sqlite-adapter.js';
import { PostgreSQLAdapter } from './postgresql-adapter.js';
import { MySQLAdapter } from './mysql-adapter.js';
import type { BaseAdapter } from './base-adapter.js';
import type { DatabaseConfig } from '../config/types.js';

export { SQLiteAdapter, PostgreSQLAdapter, MySQLAdapter };

/**
 * Factory function to create database adapter.
 *
 * @param config - Resolved database configuration
 * @returns Database adapter instance (not yet connected)
 */
export function createDatabaseAdapter(config: DatabaseConfig): BaseAdapter {
  switch (config.type) {
    case 'sqlite':
      return new SQLiteAdapter(config);
    case 'postgres':
      return new PostgreSQLAdapter(config);
    case 'mysql':
      return new MySQLAdapter(config);
  }
}
