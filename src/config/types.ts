/**
 * Configuration file type definitions
 * Defines the structure of .ocistore/config.toml
 */

/**
 * Supported database engines.
 *
 * SQLite is the default and only needs a file path. MySQL and PostgreSQL
 * take host/port/name plus credentials.
 */
export type DatabaseType = 'sqlite' | 'mysql' | 'postgres';

/**
 * Log levels accepted in config and on the command line (case-insensitive).
 */
export type LogLevel = 'FATAL' | 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

/**
 * Database connection parameters for server-based engines.
 *
 * @example
 * const connection: ConnectionConfig = {
 *   host: 'localhost',
 *   port: 5432,
 *   database: 'ocistore'
 * };
 */
export interface ConnectionConfig {
  /** Database server hostname or IP address. */
  host: string;

  /**
   * Database server port.
   * - PostgreSQL: 5432 (default)
   * - MySQL: 3306 (default)
   */
  port: number;

  /** Database name to connect to. */
  database: string;
}

/**
 * Credentials for server-based engines.
 */
export interface AuthConfig {
  user?: string;
  password?: string;
  /** Enable TLS for the connection (certificate checks stay on). */
  ssl?: boolean;
}

/**
 * Resolved database configuration handed to the adapters.
 *
 * @example
 * // SQLite (default)
 * const config: DatabaseConfig = { type: 'sqlite', path: '.ocistore/oci.db' };
 *
 * @example
 * // PostgreSQL
 * const config: DatabaseConfig = {
 *   type: 'postgres',
 *   connection: { host: 'localhost', port: 5432, database: 'ocistore' },
 *   auth: { user: 'ocistore', password: 'test-password' }
 * };
 */
export interface DatabaseConfig {
  type: DatabaseType;

  /** SQLite database file. `:memory:` opens a private in-memory database. */
  path?: string;

  /** Connection for MySQL/PostgreSQL. Not used for SQLite. */
  connection?: ConnectionConfig;

  /** Credentials for MySQL/PostgreSQL. Not used for SQLite. */
  auth?: AuthConfig;

  /** Name of the table knex records applied migrations in. */
  migrationsTable?: string;
}

/**
 * [database] section of config.toml
 */
export interface DatabaseSection {
  type?: DatabaseType;
  path?: string;
  host?: string;
  port?: number;
  name?: string;
  user?: string;
  password?: string;
  ssl?: boolean;
}

/**
 * [migrations] section of config.toml
 */
export interface MigrationsSection {
  /** Migration log table (default: knex_migrations) */
  table_name?: string;
}

/**
 * [debug] section of config.toml
 */
export interface DebugSection {
  /** Debug log file path; logging is off when unset */
  log_path?: string;
  /** Log level: error, warn, info, debug */
  log_level?: string;
}

/**
 * Complete configuration structure
 */
export interface OciStoreConfig {
  database: DatabaseSection;
  migrations: MigrationsSection;
  debug: DebugSection;
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: OciStoreConfig = {
  database: {
    type: 'sqlite',
    path: '.ocistore/oci.db',
  },
  migrations: {
    table_name: 'knex_migrations',
  },
  debug: {
    log_level: 'info',
  },
};
