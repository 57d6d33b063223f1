/**
 * Configuration file loader
 * Reads .ocistore/config.toml and merges with defaults
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { parse as parseTOML } from 'smol-toml';
import type {
  OciStoreConfig,
  DatabaseConfig,
  DatabaseType,
  LogLevel,
} from './types.js';
import { DEFAULT_CONFIG } from './types.js';

/**
 * Default config file path (relative to the working directory)
 */
export const DEFAULT_CONFIG_PATH = '.ocistore/config.toml';

/**
 * Values given on the command line; they win over env and file
 */
export interface ConfigOverrides {
  dbPath?: string;
  debugLogPath?: string;
  logLevel?: string;
}

const DATABASE_TYPES: readonly DatabaseType[] = ['sqlite', 'mysql', 'postgres'];
const LOG_LEVELS: readonly LogLevel[] = ['FATAL', 'ERROR', 'WARN', 'INFO', 'DEBUG'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDatabaseType(value: unknown): value is DatabaseType {
  return typeof value === 'string' && DATABASE_TYPES.some(t => t === value);
}

function readString(section: Record<string, unknown>, key: string): string | undefined {
  const value = section[key];
  return typeof value === 'string' ? value : undefined;
}

function readNumber(section: Record<string, unknown>, key: string): number | undefined {
  const value = section[key];
  return typeof value === 'number' ? value : undefined;
}

function readBoolean(section: Record<string, unknown>, key: string): boolean | undefined {
  const value = section[key];
  return typeof value === 'boolean' ? value : undefined;
}

function readSection(table: Record<string, unknown>, key: string): Record<string, unknown> {
  const section = table[key];
  return isRecord(section) ? section : {};
}

/**
 * Parse config.toml content into the typed config structure.
 * Unknown keys are ignored; keys with the wrong TOML type are ignored too
 * and surface later through validateConfig() where it matters.
 */
export function parseConfig(content: string): OciStoreConfig {
  const parsed: Record<string, unknown> = parseTOML(content);

  const database = readSection(parsed, 'database');
  const migrations = readSection(parsed, 'migrations');
  const debug = readSection(parsed, 'debug');

  const rawType = database['type'];
  if (rawType !== undefined && !isDatabaseType(rawType)) {
    throw new Error(
      `database.type must be one of ${DATABASE_TYPES.join(', ')} (got ${JSON.stringify(rawType)})`
    );
  }

  return {
    database: {
      type: isDatabaseType(rawType) ? rawType : DEFAULT_CONFIG.database.type,
      path: readString(database, 'path') ?? DEFAULT_CONFIG.database.path,
      host: readString(database, 'host'),
      port: readNumber(database, 'port'),
      name: readString(database, 'name'),
      user: readString(database, 'user'),
      password: readString(database, 'password'),
      ssl: readBoolean(database, 'ssl'),
    },
    migrations: {
      table_name: readString(migrations, 'table_name') ?? DEFAULT_CONFIG.migrations.table_name,
    },
    debug: {
      log_path: readString(debug, 'log_path'),
      log_level: readString(debug, 'log_level') ?? DEFAULT_CONFIG.debug.log_level,
    },
  };
}

/**
 * Load configuration from TOML file
 *
 * Priority: File config → Defaults
 *
 * A missing file yields the defaults. A file that exists but cannot be
 * parsed is an error: migrating whatever database the defaults point at
 * would be worse than stopping.
 *
 * @param configPath - Path to config file (optional, defaults to .ocistore/config.toml)
 */
export function loadConfigFile(configPath?: string): OciStoreConfig {
  const finalPath = configPath || DEFAULT_CONFIG_PATH;
  const absolutePath = resolve(process.cwd(), finalPath);

  if (!existsSync(absolutePath)) {
    return DEFAULT_CONFIG;
  }

  try {
    return parseConfig(readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to load config file ${finalPath}: ${message}`, { cause: error });
  }
}

/**
 * Build the adapter-facing DatabaseConfig
 *
 * Priority: CLI override > OCISTORE_DB_PATH > config file > defaults
 */
export function resolveDatabaseConfig(
  config: OciStoreConfig,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): DatabaseConfig {
  const section = config.database;
  const type = section.type ?? 'sqlite';
  const migrationsTable = config.migrations.table_name;

  if (type === 'sqlite') {
    const path = overrides.dbPath || env.OCISTORE_DB_PATH || section.path || DEFAULT_CONFIG.database.path;
    return { type, path, migrationsTable };
  }

  return {
    type,
    connection: {
      host: section.host ?? 'localhost',
      port: section.port ?? (type === 'mysql' ? 3306 : 5432),
      database: section.name ?? '',
    },
    auth: {
      user: section.user,
      password: section.password,
      ssl: section.ssl,
    },
    migrationsTable,
  };
}

/**
 * Resolve the debug log path and level
 *
 * Priority: CLI override > OCISTORE_DEBUG / OCISTORE_LOG_LEVEL > config file
 */
export function resolveDebugSettings(
  config: OciStoreConfig,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): { logPath?: string; logLevel: string } {
  return {
    logPath: overrides.debugLogPath || env.OCISTORE_DEBUG || config.debug.log_path,
    logLevel: overrides.logLevel || env.OCISTORE_LOG_LEVEL || config.debug.log_level || 'info',
  };
}

/**
 * Validate configuration values
 *
 * @returns Validation result with errors if any
 */
export function validateConfig(config: OciStoreConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];
  const db = config.database;

  if (db.type === 'sqlite' || db.type === undefined) {
    if (db.path !== undefined && db.path.trim() === '') {
      errors.push('database.path must not be empty');
    }
  } else {
    if (!db.name) {
      errors.push(`database.name is required for ${db.type}`);
    }
    if (db.port !== undefined && (!Number.isInteger(db.port) || db.port < 1 || db.port > 65535)) {
      errors.push('database.port must be an integer between 1 and 65535');
    }
  }

  const tableName = config.migrations.table_name;
  if (tableName !== undefined && !/^[A-Za-z_][A-Za-z0-9_]*$/.test(tableName)) {
    errors.push('migrations.table_name must be a plain SQL identifier');
  }

  const level = config.debug.log_level;
  if (level !== undefined && !LOG_LEVELS.some(l => l === level.toUpperCase())) {
    errors.push(`debug.log_level must be one of ${LOG_LEVELS.map(l => l.toLowerCase()).join(', ')}`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
