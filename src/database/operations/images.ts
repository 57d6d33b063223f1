/**
 * Image operations module
 */

import type { Knex } from 'knex';
import type { DatabaseAdapter } from '../../adapters/index.js';
import type { Image, ImageRow, NewImage } from '../../types.js';
import { normalizeImageReference } from '../../utils/image-reference.js';

/**
 * Id out of an insert result: SQLite/PostgreSQL with RETURNING give
 * [{ id }], MySQL gives [insertId].
 */
export function insertedId(result: unknown): number {
  const [first]: unknown[] = Array.isArray(result) ? result : [];
  if (typeof first === 'number') {
    return first;
  }
  if (typeof first === 'object' && first !== null && 'id' in first) {
    return Number(first.id);
  }
  throw new Error('Insert did not return an id');
}

function toImage(row: ImageRow): Image {
  return {
    id: row.id,
    reference: row.reference,
    sizeBytes: Number(row.size_bytes),
    lastUsedAt: row.last_used_at,
  };
}

/**
 * Insert an image, or return the existing row's id for the same reference
 */
export async function insertImage(
  adapter: DatabaseAdapter,
  image: NewImage,
  trx?: Knex.Transaction
): Promise<number> {
  const knex = trx || adapter.getKnex();
  const reference = normalizeImageReference(image.reference);

  const existing = await knex<ImageRow>('images').where({ reference }).first('id');
  if (existing) {
    return existing.id;
  }

  const result: unknown = await knex('images')
    .insert({ reference, size_bytes: image.sizeBytes })
    .returning('id');
  return insertedId(result);
}

export async function getImageByReference(
  adapter: DatabaseAdapter,
  reference: string,
  trx?: Knex.Transaction
): Promise<Image | null> {
  const knex = trx || adapter.getKnex();
  const row = await knex<ImageRow>('images')
    .where({ reference: normalizeImageReference(reference) })
    .first();
  return row ? toImage(row) : null;
}

/**
 * Delete an image; its manifests go with it (ON DELETE CASCADE)
 *
 * @returns false when no image had that id
 */
export async function deleteImage(
  adapter: DatabaseAdapter,
  imageId: number,
  trx?: Knex.Transaction
): Promise<boolean> {
  const knex = trx || adapter.getKnex();
  const deleted = await knex('images').where({ id: imageId }).del();
  return deleted > 0;
}
