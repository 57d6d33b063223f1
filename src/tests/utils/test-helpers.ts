/**
 * Shared Test Utilities
 *
 * Every suite runs against its own in-memory SQLite database opened through
 * the real adapter, so foreign keys are enforced exactly as in production.
 */

import type { Knex } from 'knex';
import { SQLiteAdapter } from '../../adapters/sqlite-adapter.js';
import { migrationConfig } from '../../knexfile.js';
import { UniversalKnex, extractRows } from '../../utils/universal-knex.js';

// ============================================================================
// Database Connection Helpers
// ============================================================================

export interface TestDb {
  adapter: SQLiteAdapter;
  knex: Knex;
}

/**
 * Open a fresh in-memory database
 */
export async function connectDb(): Promise<TestDb> {
  const adapter = new SQLiteAdapter({ type: 'sqlite', path: ':memory:' });
  const knex = await adapter.connect();
  return { adapter, knex };
}

export async function disconnectDb(db: TestDb | undefined): Promise<void> {
  if (db) {
    await db.adapter.disconnect();
  }
}

// ============================================================================
// Migration Helpers
// ============================================================================

export const BASELINE_MIGRATION = '20250128000000_create_oci_tables';
export const PULL_FROM_ANY_REGISTRY_MIGRATION = '20251117071723_pull_from_any_registry_changes';

/**
 * Apply only the baseline schema (manifests still has index_id)
 */
export async function migrateBaseline(knex: Knex): Promise<void> {
  await knex.migrate.up(migrationConfig());
}

export async function recordedMigrations(knex: Knex): Promise<string[]> {
  const rows = await knex('knex_migrations').select('name').orderBy('id');
  return rows.map(row => String(row.name));
}

// ============================================================================
// Seed Data
// ============================================================================

export const MANIFEST_MEDIA_TYPE = 'application/vnd.oci.image.manifest.v1+json';
export const DOCKER_MANIFEST_MEDIA_TYPE = 'application/vnd.docker.distribution.manifest.v2+json';
export const INDEX_MEDIA_TYPE = 'application/vnd.oci.image.index.v1+json';

export const RETAINED_MANIFEST_COLUMNS = [
  'id',
  'image_id',
  'schema_version',
  'media_type',
  'annotations_json',
  'created_at',
  'modified_at',
] as const;

/**
 * Two images, one image index, three manifests (two tied to the index)
 */
export async function seedLegacyData(knex: Knex): Promise<void> {
  await knex('images').insert([
    { id: 7, reference: 'docker.io/library/alpine:3.20', size_bytes: 3623807 },
    { id: 8, reference: 'ghcr.io/example/tool:1.0', size_bytes: 1024 },
  ]);

  await knex('indexes').insert({
    id: 99,
    image_id: 7,
    schema_version: 2,
    media_type: INDEX_MEDIA_TYPE,
    platform_os: 'linux',
    platform_arch: 'arm64',
  });

  await knex('manifests').insert([
    {
      id: 1,
      image_id: 7,
      index_id: 99,
      schema_version: 2,
      media_type: MANIFEST_MEDIA_TYPE,
      annotations_json: null,
      created_at: '2025-01-02 03:04:05',
      modified_at: '2025-01-02 03:04:05',
    },
    {
      id: 2,
      image_id: 8,
      index_id: null,
      schema_version: 2,
      media_type: DOCKER_MANIFEST_MEDIA_TYPE,
      annotations_json: '{"org.opencontainers.image.title":"tool"}',
      created_at: '2025-02-03 04:05:06',
      modified_at: '2025-02-04 05:06:07',
    },
    {
      id: 5,
      image_id: 7,
      index_id: 99,
      schema_version: 1,
      media_type: MANIFEST_MEDIA_TYPE,
      annotations_json: '{}',
      created_at: '2025-03-01 00:00:00',
      modified_at: '2025-03-02 00:00:00',
    },
  ]);
}

export async function selectManifests(knex: Knex): Promise<Record<string, unknown>[]> {
  return knex('manifests').select([...RETAINED_MANIFEST_COLUMNS]).orderBy('id');
}

// ============================================================================
// Schema Inspection
// ============================================================================

export async function getColumns(knex: Knex, table: string): Promise<string[]> {
  return new UniversalKnex(knex).listColumns(table);
}

export async function getIndexes(knex: Knex, table: string): Promise<string[]> {
  return new UniversalKnex(knex).listIndexes(table);
}

/**
 * Detail lines of EXPLAIN QUERY PLAN for a statement
 */
export async function queryPlan(knex: Knex, sql: string, bindings: readonly Knex.Value[] = []): Promise<string[]> {
  const result: unknown = await knex.raw(`EXPLAIN QUERY PLAN ${sql}`, bindings);
  return extractRows(result).map(row => String(row.detail));
}
