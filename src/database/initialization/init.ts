/**
 * Database initialization module
 */

import type { DatabaseAdapter } from '../../adapters/index.js';
import { createDatabaseAdapter } from '../../adapters/index.js';
import type { DatabaseConfig } from '../../config/types.js';
import { debugLog } from '../../utils/debug-logger.js';
import { handleMigrationError } from '../../utils/error-handler.js';
import { DEFAULT_MIGRATIONS_TABLE, migrationConfig } from '../../knexfile.js';

// Global adapter instance
let adapterInstance: DatabaseAdapter | null = null;
let migrationsTable = DEFAULT_MIGRATIONS_TABLE;

export interface MigrationRunResult {
  batch: number;
  migrations: string[];
}

export interface AppliedMigration {
  name: string;
  batch: number;
  migratedAt: string;
}

export interface MigrationStatus {
  applied: AppliedMigration[];
  pending: string[];
}

function toStrings(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const entries: unknown[] = value;
  return entries.filter((entry): entry is string => typeof entry === 'string');
}

/**
 * knex migrate.latest()/rollback() resolve to [batchNo, log]
 */
function toRunResult(result: unknown): MigrationRunResult {
  if (!Array.isArray(result)) {
    return { batch: 0, migrations: [] };
  }
  const [batch, log]: unknown[] = result;
  return {
    batch: typeof batch === 'number' ? batch : 0,
    migrations: toStrings(log),
  };
}

/**
 * Names out of a migrate.list() half: completed entries are { name },
 * pending entries are whatever the migration source yields.
 */
function migrationNames(entries: unknown): string[] {
  if (!Array.isArray(entries)) {
    return [];
  }
  const list: unknown[] = entries;
  return list.flatMap(entry => {
    if (typeof entry === 'string') {
      return [entry];
    }
    if (typeof entry === 'object' && entry !== null && 'name' in entry && typeof entry.name === 'string') {
      return [entry.name];
    }
    return [];
  });
}

function toIsoTimestamp(value: unknown): string {
  if (value instanceof Date) {
    return value.toISOString();
  }
  if (typeof value === 'number') {
    return new Date(value).toISOString();
  }
  return String(value ?? '');
}

/**
 * Connect with the adapter for `config` and, unless disabled, apply
 * pending migrations.
 */
export async function initializeDatabase(
  config: DatabaseConfig,
  options: { migrate?: boolean } = {}
): Promise<DatabaseAdapter> {
  if (adapterInstance) {
    return adapterInstance;
  }

  const adapter = createDatabaseAdapter(config);
  await adapter.connect();

  migrationsTable = config.migrationsTable || DEFAULT_MIGRATIONS_TABLE;
  adapterInstance = adapter;

  if (!adapter.supportsTransactionalDDL) {
    debugLog(
      'WARN',
      `${adapter.databaseName} commits DDL implicitly; an interrupted migration is resumed on the next run instead of rolled back`
    );
  }

  if (options.migrate !== false) {
    try {
      await migrateToLatest();
    } catch (error) {
      adapterInstance = null;
      await adapter.disconnect();
      throw error;
    }
  }

  debugLog('INFO', `Database initialized (${adapter.databaseName})`);
  return adapter;
}

/**
 * Get current database adapter instance
 */
export function getAdapterInstance(): DatabaseAdapter | null {
  return adapterInstance;
}

/**
 * Forget the current instance (after it has been disconnected)
 */
export function resetAdapterInstance(): void {
  adapterInstance = null;
  migrationsTable = DEFAULT_MIGRATIONS_TABLE;
}

function requireAdapter(): DatabaseAdapter {
  if (!adapterInstance) {
    throw new Error('Database not initialized. Call initializeDatabase() first.');
  }
  return adapterInstance;
}

/**
 * Apply every pending migration as one batch, in one transaction.
 */
export async function migrateToLatest(): Promise<MigrationRunResult> {
  const knex = requireAdapter().getKnex();

  try {
    const result = toRunResult(await knex.migrate.latest(migrationConfig(migrationsTable)));
    debugLog('INFO', `Migrations applied: batch ${result.batch}`, { migrations: result.migrations });
    return result;
  } catch (error) {
    throw handleMigrationError('Migration', error);
  }
}

/**
 * Revert the most recent batch.
 */
export async function rollbackLastBatch(): Promise<MigrationRunResult> {
  const knex = requireAdapter().getKnex();

  try {
    const result = toRunResult(await knex.migrate.rollback(migrationConfig(migrationsTable)));
    debugLog('INFO', `Rolled back batch ${result.batch}`, { migrations: result.migrations });
    return result;
  } catch (error) {
    throw handleMigrationError('Rollback', error);
  }
}

export async function getMigrationStatus(): Promise<MigrationStatus> {
  const knex = requireAdapter().getKnex();

  const listing: unknown = await knex.migrate.list(migrationConfig(migrationsTable));
  const [completed, pending]: unknown[] = Array.isArray(listing) ? listing : [];
  const completedNames = new Set(migrationNames(completed));

  const rows: unknown[] = await knex(migrationsTable)
    .select('name', 'batch', 'migration_time')
    .orderBy('id');

  const applied: AppliedMigration[] = [];
  for (const row of rows) {
    if (typeof row !== 'object' || row === null || !('name' in row) || typeof row.name !== 'string') {
      continue;
    }
    if (!completedNames.has(row.name)) {
      continue;
    }
    applied.push({
      name: row.name,
      batch: 'batch' in row ? Number(row.batch) : 0,
      migratedAt: 'migration_time' in row ? toIsoTimestamp(row.migration_time) : '',
    });
  }

  return { applied, pending: migrationNames(pending) };
}
