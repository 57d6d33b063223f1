// knexfile.ts
import type { Knex } from 'knex';
import { StaticMigrationSource } from './database/migrations/index.js';

export const DEFAULT_MIGRATIONS_TABLE = 'knex_migrations';

/**
 * Migrator settings passed to every migrate.* call.
 *
 * Migrations are compiled into the package and listed in code, so the
 * migrator never scans a directory.
 */
export function migrationConfig(tableName: string = DEFAULT_MIGRATIONS_TABLE): Knex.MigratorConfig {
  return {
    tableName,
    migrationSource: new StaticMigrationSource(),
  };
}
