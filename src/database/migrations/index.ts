import type { Knex } from 'knex';
import * as createOciTables from './20250128000000_create_oci_tables.js';
import * as pullFromAnyRegistryChanges from './20251117071723_pull_from_any_registry_changes.js';

export interface Migration {
  name: string;
  up(knex: Knex): Promise<void>;
  down(knex: Knex): Promise<void>;
}

/** Applied in this order; names are what the migrations table records. */
export const MIGRATIONS: readonly Migration[] = [
  { name: '20250128000000_create_oci_tables', up: createOciTables.up, down: createOciTables.down },
  {
    name: '20251117071723_pull_from_any_registry_changes',
    up: pullFromAnyRegistryChanges.up,
    down: pullFromAnyRegistryChanges.down,
  },
];

/**
 * Feeds knex's migrator from an in-code list instead of a directory scan.
 */
export class StaticMigrationSource implements Knex.MigrationSource<Migration> {
  constructor(private readonly migrations: readonly Migration[] = MIGRATIONS) {}

  getMigrations(): Promise<Migration[]> {
    return Promise.resolve([...this.migrations]);
  }

  getMigrationName(migration: Migration): string {
    return migration.name;
  }

  getMigration(migration: Migration): Promise<Knex.Migration> {
    return Promise.resolve({ up: migration.up, down: migration.down });
  }
}
