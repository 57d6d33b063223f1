/**
 * Pulling from any registry: manifests no longer hang off an image index.
 *
 * Drops manifests.index_id and retires the `indexes` table. SQLite cannot
 * drop a column that carries a foreign key, so manifests is rebuilt through
 * a shadow table. The `indexes` drop depends on the cutover: while
 * manifests.index_id exists, dropping `indexes` would violate its FK.
 */

import type { Knex } from 'knex';
import { UniversalKnex } from '../../utils/universal-knex.js';
import { planTableRebuild } from '../schema/table-rebuild.js';
import { retireTableStep } from '../schema/table-retirement.js';
import { runSteps } from '../schema/step-plan.js';
import type { MigrationStep, StepOutcome } from '../schema/step-plan.js';
import type { TableRebuildSpec } from '../schema/table-spec.js';
import { createIndexesTable } from './20250128000000_create_oci_tables.js';

const MANIFEST_COLUMNS = [
  { name: 'id', type: 'increments' },
  { name: 'image_id', type: 'integer', notNull: true, unsigned: true },
  { name: 'schema_version', type: 'integer', notNull: true },
  { name: 'media_type', type: 'text', notNull: true },
  { name: 'annotations_json', type: 'text' },
  { name: 'created_at', type: 'datetime', defaultNow: true },
  { name: 'modified_at', type: 'datetime', defaultNow: true },
] as const;

export const MANIFESTS_TABLE: TableRebuildSpec = {
  name: 'manifests',
  columns: MANIFEST_COLUMNS,
  foreignKeys: [
    { column: 'image_id', references: { table: 'images', column: 'id' }, onDelete: 'CASCADE' },
  ],
  indexes: [
    { name: 'idx_manifests_image_id', columns: ['image_id'] },
  ],
};

/** manifests as it was before this migration */
const LEGACY_MANIFESTS_TABLE: TableRebuildSpec = {
  name: 'manifests',
  columns: [
    MANIFEST_COLUMNS[0],
    { name: 'index_id', type: 'integer', unsigned: true },
    ...MANIFEST_COLUMNS.slice(1),
  ],
  foreignKeys: [
    { column: 'index_id', references: { table: 'indexes', column: 'id' } },
    ...(MANIFESTS_TABLE.foreignKeys ?? []),
  ],
  indexes: MANIFESTS_TABLE.indexes,
};

export function pullFromAnyRegistrySteps(): MigrationStep[] {
  return [
    ...planTableRebuild(MANIFESTS_TABLE),
    retireTableStep({
      table: 'indexes',
      dependsOn: ['manifests:cutover'],
      referencedBy: [{ table: 'manifests', column: 'index_id' }],
    }),
  ];
}

function report(outcomes: readonly StepOutcome[]): void {
  for (const outcome of outcomes) {
    const mark = outcome.status === 'applied' ? '✓' : '-';
    console.log(`  ${mark} ${outcome.id}${outcome.detail ? `: ${outcome.detail}` : ''}`);
  }
}

export async function up(knex: Knex): Promise<void> {
  const outcomes = await runSteps(knex, pullFromAnyRegistrySteps());
  report(outcomes);
  console.log('✅ manifests detached from image indexes, indexes table retired');
}

/**
 * Restores the previous shape. index_id comes back empty and `indexes` has
 * no rows: the data dropped on the way up is gone.
 */
export async function down(knex: Knex): Promise<void> {
  const restoreIndexes: MigrationStep = {
    id: 'indexes:restore',
    description: 'Recreate the indexes table',
    run: async trx => {
      const db = new UniversalKnex(trx);
      const created = await createIndexesTable(db);
      await db.createIndexSafe('indexes', ['image_id'], 'idx_indexes_image_id');
      return created
        ? { status: 'applied', detail: 'created indexes' }
        : { status: 'skipped', detail: 'indexes already exists' };
    },
  };

  const rebuild = planTableRebuild(LEGACY_MANIFESTS_TABLE).map(step =>
    step.dependsOn ? step : { ...step, dependsOn: [restoreIndexes.id] }
  );

  report(await runSteps(knex, [restoreIndexes, ...rebuild]));
  console.log('✓ manifests.index_id and indexes table restored');
}
