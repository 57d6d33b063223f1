/**
 * Manifest operations module
 */

import type { Knex } from 'knex';
import type { DatabaseAdapter } from '../../adapters/index.js';
import type { Annotations, Manifest, ManifestRow, NewManifest } from '../../types.js';
import { insertedId } from './images.js';

function parseAnnotations(json: string | null): Annotations | null {
  if (json === null) {
    return null;
  }

  const parsed: unknown = JSON.parse(json);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('annotations_json must hold a JSON object');
  }

  const annotations: Annotations = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value !== 'string') {
      throw new Error(`Annotation "${key}" must be a string`);
    }
    annotations[key] = value;
  }
  return annotations;
}

function toManifest(row: ManifestRow): Manifest {
  return {
    id: row.id,
    imageId: row.image_id,
    schemaVersion: row.schema_version,
    mediaType: row.media_type,
    annotations: parseAnnotations(row.annotations_json),
    createdAt: String(row.created_at),
    modifiedAt: String(row.modified_at),
  };
}

/**
 * Insert a manifest for an existing image
 *
 * @throws If imageId does not reference an image (foreign key)
 */
export async function insertManifest(
  adapter: DatabaseAdapter,
  manifest: NewManifest,
  trx?: Knex.Transaction
): Promise<number> {
  const knex = trx || adapter.getKnex();

  const result: unknown = await knex('manifests')
    .insert({
      image_id: manifest.imageId,
      schema_version: manifest.schemaVersion,
      media_type: manifest.mediaType,
      annotations_json: manifest.annotations ? JSON.stringify(manifest.annotations) : null,
    })
    .returning('id');
  return insertedId(result);
}

export async function getManifest(
  adapter: DatabaseAdapter,
  manifestId: number,
  trx?: Knex.Transaction
): Promise<Manifest | null> {
  const knex = trx || adapter.getKnex();
  const row = await knex<ManifestRow>('manifests').where({ id: manifestId }).first();
  return row ? toManifest(row) : null;
}

/**
 * Manifests of an image, oldest first (served by idx_manifests_image_id)
 */
export async function listManifestsForImage(
  adapter: DatabaseAdapter,
  imageId: number,
  trx?: Knex.Transaction
): Promise<Manifest[]> {
  const knex = trx || adapter.getKnex();
  const rows = await knex<ManifestRow>('manifests')
    .where({ image_id: imageId })
    .orderBy('id');
  return rows.map(toManifest);
}
