/**
 * Database module - Re-exports all database operations
 *
 * This is the main entry point for database operations.
 * Import from this file instead of individual modules.
 */

import type { Knex } from 'knex';
import { getAdapter } from './config/adapter-factory.js';

// Types
export type { DatabaseAdapter } from '../adapters/index.js';
export type {
  MigrationRunResult,
  AppliedMigration,
  MigrationStatus,
} from './initialization/init.js';

// Initialization
export {
  initializeDatabase,
  getAdapterInstance,
  migrateToLatest,
  rollbackLastBatch,
  getMigrationStatus,
} from './initialization/init.js';

export { closeDatabase } from './initialization/cleanup.js';

// Adapter factory
export { getAdapter } from './config/adapter-factory.js';

// Image operations
export {
  insertImage,
  getImageByReference,
  deleteImage,
} from './operations/images.js';

// Manifest operations
export {
  insertManifest,
  getManifest,
  listManifestsForImage,
} from './operations/manifests.js';

/**
 * Execute a function within a database transaction
 */
export async function transaction<T>(
  callback: (trx: Knex.Transaction) => Promise<T>
): Promise<T> {
  return getAdapter().transaction(callback);
}
