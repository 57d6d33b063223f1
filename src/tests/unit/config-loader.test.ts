import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  parseConfig,
  loadConfigFile,
  resolveDatabaseConfig,
  resolveDebugSettings,
  validateConfig,
} from '../../config/loader.js';
import { DEFAULT_CONFIG, type OciStoreConfig } from '../../config/types.js';

const FULL_CONFIG = `
[database]
type = "postgres"
host = "db.internal"
port = 5433
name = "ocistore"
user = "oci"
password = "test-password"
ssl = true

[migrations]
table_name = "schema_migrations"

[debug]
log_path = "logs/debug.log"
log_level = "debug"
`;

describe('parseConfig', () => {
  it('should read every section', () => {
    assert.deepStrictEqual(parseConfig(FULL_CONFIG), {
      database: {
        type: 'postgres',
        path: '.ocistore/oci.db',
        host: 'db.internal',
        port: 5433,
        name: 'ocistore',
        user: 'oci',
        password: 'test-password',
        ssl: true,
      },
      migrations: { table_name: 'schema_migrations' },
      debug: { log_path: 'logs/debug.log', log_level: 'debug' },
    });
  });

  it('should fall back to defaults for missing keys', () => {
    const config = parseConfig('');
    assert.strictEqual(config.database.type, 'sqlite');
    assert.strictEqual(config.database.path, '.ocistore/oci.db');
    assert.strictEqual(config.migrations.table_name, 'knex_migrations');
    assert.strictEqual(config.debug.log_level, 'info');
    assert.strictEqual(config.debug.log_path, undefined);
  });

  it('should ignore values of the wrong TOML type', () => {
    const config = parseConfig('[database]\nport = "5432"\npath = 12\n');
    assert.strictEqual(config.database.port, undefined);
    assert.strictEqual(config.database.path, '.ocistore/oci.db');
  });

  it('should reject an unknown database type', () => {
    assert.throws(
      () => parseConfig('[database]\ntype = "oracle"\n'),
      { message: 'database.type must be one of sqlite, mysql, postgres (got "oracle")' }
    );
  });
});

describe('loadConfigFile', () => {
  let dir: string;

  before(() => {
    dir = mkdtempSync(join(tmpdir(), 'ocistore-config-'));
  });

  after(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should return the defaults when the file does not exist', () => {
    assert.deepStrictEqual(loadConfigFile(join(dir, 'missing.toml')), DEFAULT_CONFIG);
  });

  it('should parse an existing file', () => {
    const file = join(dir, 'config.toml');
    writeFileSync(file, '[database]\npath = "data/images.db"\n');

    assert.strictEqual(loadConfigFile(file).database.path, 'data/images.db');
  });

  it('should fail on a malformed file instead of using defaults', () => {
    const file = join(dir, 'broken.toml');
    writeFileSync(file, '[database\npath = \n');

    assert.throws(() => loadConfigFile(file), (error: unknown) => {
      assert.ok(error instanceof Error);
      assert.ok(error.message.startsWith(`Failed to load config file ${file}: `));
      assert.ok(error.cause instanceof Error);
      return true;
    });
  });
});

describe('resolveDatabaseConfig', () => {
  const sqliteConfig: OciStoreConfig = {
    ...DEFAULT_CONFIG,
    database: { type: 'sqlite', path: 'from-file.db' },
  };

  it('should prefer the CLI path over env and file', () => {
    const resolved = resolveDatabaseConfig(sqliteConfig, { dbPath: 'cli.db' }, { OCISTORE_DB_PATH: 'env.db' });
    assert.deepStrictEqual(resolved, { type: 'sqlite', path: 'cli.db', migrationsTable: 'knex_migrations' });
  });

  it('should prefer the env path over the file', () => {
    const resolved = resolveDatabaseConfig(sqliteConfig, {}, { OCISTORE_DB_PATH: 'env.db' });
    assert.strictEqual(resolved.path, 'env.db');
  });

  it('should use the file path when nothing overrides it', () => {
    assert.strictEqual(resolveDatabaseConfig(sqliteConfig, {}, {}).path, 'from-file.db');
  });

  it('should build connection and auth for server databases', () => {
    const resolved = resolveDatabaseConfig(parseConfig(FULL_CONFIG), {}, {});
    assert.deepStrictEqual(resolved, {
      type: 'postgres',
      connection: { host: 'db.internal', port: 5433, database: 'ocistore' },
      auth: { user: 'oci', password: 'test-password', ssl: true },
      migrationsTable: 'schema_migrations',
    });
  });

  it('should default the port per engine', () => {
    const mysql = resolveDatabaseConfig(parseConfig('[database]\ntype = "mysql"\nname = "oci"\n'), {}, {});
    const postgres = resolveDatabaseConfig(parseConfig('[database]\ntype = "postgres"\nname = "oci"\n'), {}, {});
    assert.strictEqual(mysql.connection?.port, 3306);
    assert.strictEqual(postgres.connection?.port, 5432);
    assert.strictEqual(mysql.connection?.host, 'localhost');
  });
});

describe('resolveDebugSettings', () => {
  it('should layer CLI over env over file', () => {
    const config = parseConfig(FULL_CONFIG);

    assert.deepStrictEqual(resolveDebugSettings(config, {}, {}), {
      logPath: 'logs/debug.log',
      logLevel: 'debug',
    });
    assert.deepStrictEqual(
      resolveDebugSettings(config, {}, { OCISTORE_DEBUG: 'env.log', OCISTORE_LOG_LEVEL: 'warn' }),
      { logPath: 'env.log', logLevel: 'warn' }
    );
    assert.deepStrictEqual(
      resolveDebugSettings(config, { debugLogPath: 'cli.log', logLevel: 'error' }, { OCISTORE_DEBUG: 'env.log' }),
      { logPath: 'cli.log', logLevel: 'error' }
    );
  });

  it('should leave logging off by default', () => {
    assert.deepStrictEqual(resolveDebugSettings(DEFAULT_CONFIG, {}, {}), { logPath: undefined, logLevel: 'info' });
  });
});

describe('validateConfig', () => {
  it('should accept the defaults', () => {
    assert.deepStrictEqual(validateConfig(DEFAULT_CONFIG), { valid: true, errors: [] });
  });

  it('should report every invalid value', () => {
    const config: OciStoreConfig = {
      database: { type: 'mysql', port: 70000 },
      migrations: { table_name: 'bad-name; drop' },
      debug: { log_level: 'verbose' },
    };

    assert.deepStrictEqual(validateConfig(config), {
      valid: false,
      errors: [
        'database.name is required for mysql',
        'database.port must be an integer between 1 and 65535',
        'migrations.table_name must be a plain SQL identifier',
        'debug.log_level must be one of fatal, error, warn, info, debug',
      ],
    });
  });

  it('should reject an empty SQLite path', () => {
    const config: OciStoreConfig = { ...DEFAULT_CONFIG, database: { type: 'sqlite', path: '  ' } };
    assert.deepStrictEqual(validateConfig(config).errors, ['database.path must not be empty']);
  });

  it('should accept log levels in any case', () => {
    const config: OciStoreConfig = { ...DEFAULT_CONFIG, debug: { log_level: 'WARN' } };
    assert.strictEqual(validateConfig(config).valid, true);
  });
});
