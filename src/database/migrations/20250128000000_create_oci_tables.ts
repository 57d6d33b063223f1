import type { Knex } from 'knex';
import { UniversalKnex } from '../../utils/universal-knex.js';

/**
 * Baseline OCI store schema
 *
 * images    one row per pulled image reference
 * indexes   image index (manifest list) metadata, one per multi-platform image
 * manifests image manifests, optionally tied to the index they came from
 * layers    content-addressed layer blobs
 */

/**
 * `indexes` as the baseline defines it. Also used to restore the table when
 * a later migration that retired it is rolled back.
 */
export async function createIndexesTable(db: UniversalKnex): Promise<boolean> {
  return db.createTableSafe('indexes', (table, helpers) => {
    table.increments('id');
    table.integer('image_id').unsigned().notNullable();
    table.integer('schema_version').notNullable();
    table.text('media_type').notNullable();
    helpers.stringColumn('platform_os', 64);
    helpers.stringColumn('platform_arch', 64);
    helpers.stringColumn('platform_variant', 64);
    table.text('annotations_json');
    helpers.datetimeColumn('created_at');
    helpers.datetimeColumn('modified_at');
    table.foreign('image_id').references('id').inTable('images').onDelete('CASCADE');
  });
}

export async function up(knex: Knex): Promise<void> {
  const db = new UniversalKnex(knex);

  await db.createTableSafe('images', (table, helpers) => {
    table.increments('id');
    helpers.stringColumn('reference', 512, true).notNullable().unique();
    table.bigInteger('size_bytes').notNullable();
    table.datetime('last_used_at');
    helpers.datetimeColumn('created_at');
    helpers.datetimeColumn('modified_at');
  });

  await createIndexesTable(db);
  await db.createIndexSafe('indexes', ['image_id'], 'idx_indexes_image_id');

  await db.createTableSafe('manifests', (table, helpers) => {
    table.increments('id');
    table.integer('index_id').unsigned();
    table.integer('image_id').unsigned().notNullable();
    table.integer('schema_version').notNullable();
    table.text('media_type').notNullable();
    table.text('annotations_json');
    helpers.datetimeColumn('created_at');
    helpers.datetimeColumn('modified_at');
    table.foreign('index_id').references('id').inTable('indexes');
    table.foreign('image_id').references('id').inTable('images').onDelete('CASCADE');
  });
  await db.createIndexSafe('manifests', ['image_id'], 'idx_manifests_image_id');

  await db.createTableSafe('layers', (table, helpers) => {
    table.increments('id');
    helpers.stringColumn('digest', 255, true).notNullable().unique();
    helpers.stringColumn('diff_id', 255);
    table.text('media_type').notNullable();
    table.bigInteger('size_bytes').notNullable();
    helpers.datetimeColumn('created_at');
    helpers.datetimeColumn('modified_at');
  });

  console.log('✓ OCI store tables created');
}

export async function down(knex: Knex): Promise<void> {
  const db = new UniversalKnex(knex);

  // Children first
  await db.dropTableSafe('layers');
  await db.dropTableSafe('manifests');
  await db.dropTableSafe('indexes');
  await db.dropTableSafe('images');
}
