/**
 * ocistore-migrate - schema migrations for the OCI image store
 *
 * Library entry point. The CLI lives in cli.ts.
 */

// Database lifecycle and migrations
export {
  initializeDatabase,
  closeDatabase,
  migrateToLatest,
  getMigrationStatus,
  rollbackLastBatch,
  getAdapter,
  transaction,
  insertImage,
  getImageByReference,
  deleteImage,
  insertManifest,
  getManifest,
  listManifestsForImage,
} from './database/index.js';
export type {
  DatabaseAdapter,
  MigrationRunResult,
  AppliedMigration,
  MigrationStatus,
} from './database/index.js';

// Adapters
export {
  createDatabaseAdapter,
  BaseAdapter,
  SQLiteAdapter,
  MySQLAdapter,
  PostgreSQLAdapter,
} from './adapters/index.js';

// Migration building blocks
export { orderSteps, runSteps } from './database/schema/step-plan.js';
export type { MigrationStep, StepOutcome, StepResult, StepStatus } from './database/schema/step-plan.js';
export { planTableRebuild, rebuildTable } from './database/schema/table-rebuild.js';
export { retireTableStep } from './database/schema/table-retirement.js';
export type { TableRetirement, ColumnReference } from './database/schema/table-retirement.js';
export {
  validateTableSpec,
  applyTableSpec,
  columnNames,
  shadowTableName,
} from './database/schema/table-spec.js';
export type {
  ColumnSpec,
  ColumnType,
  ForeignKeySpec,
  IndexSpec,
  TableSpec,
  TableRebuildSpec,
} from './database/schema/table-spec.js';
export { MIGRATIONS, StaticMigrationSource } from './database/migrations/index.js';
export type { Migration } from './database/migrations/index.js';
export { migrationConfig } from './knexfile.js';
export { UniversalKnex } from './utils/universal-knex.js';

// Configuration
export {
  DEFAULT_CONFIG_PATH,
  parseConfig,
  loadConfigFile,
  resolveDatabaseConfig,
  resolveDebugSettings,
  validateConfig,
} from './config/loader.js';
export type { ConfigOverrides } from './config/loader.js';
export { DEFAULT_CONFIG } from './config/types.js';
export type { OciStoreConfig, DatabaseConfig, DatabaseType } from './config/types.js';

// Image references
export {
  parseImageReference,
  formatImageReference,
  normalizeImageReference,
} from './utils/image-reference.js';

export type * from './types.js';
