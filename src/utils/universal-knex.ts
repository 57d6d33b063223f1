/**
 * Universal Knex Wrapper
 *
 * Cross-database helpers for the schema migrations: dialect detection,
 * idempotent DDL (IF [NOT] EXISTS semantics on every engine), and the
 * catalog lookups the table-rebuild steps need.
 *
 * Supports: SQLite, MySQL/MariaDB, PostgreSQL
 *
 * @example
 * ```typescript
 * import { UniversalKnex } from '../../utils/universal-knex.js';
 *
 * export async function up(knex: Knex): Promise<void> {
 *   const db = new UniversalKnex(knex);
 *
 *   await db.createTableSafe('layers', (table, helpers) => {
 *     table.increments('id');
 *     helpers.stringColumn('digest', 255, true).notNullable().unique();
 *     helpers.datetimeColumn('created_at');
 *   });
 *
 *   await db.createIndexSafe('layers', ['digest']);
 * }
 * ```
 */

import type { Knex } from 'knex';
import { SchemaInspector } from 'knex-schema-inspector';
import { debugLog } from './debug-logger.js';
import { isDuplicateObjectError, isMissingTableError } from './error-handler.js';

export type Dialect = 'sqlite' | 'mysql' | 'postgresql';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Normalise the result of knex.raw() into a list of rows
 *
 * SQLite (better-sqlite3): rows array
 * MySQL (mysql2): [rows, fields]
 * PostgreSQL (pg): { rows }
 */
export function extractRows(result: unknown): Record<string, unknown>[] {
  let rows: unknown[] = [];

  if (Array.isArray(result)) {
    const first: unknown = result[0];
    rows = Array.isArray(first) ? first : result;
  } else if (isRecord(result) && Array.isArray(result.rows)) {
    rows = result.rows;
  }

  return rows.filter(isRecord);
}

export class UniversalKnex {
  private readonly knex: Knex;
  private readonly client: string;

  constructor(knex: Knex) {
    this.knex = knex;
    const client: unknown = knex.client.config.client;
    this.client = typeof client === 'string' ? client : '';
  }

  // ============================================================================
  // Database Detection
  // ============================================================================

  get isSQLite(): boolean {
    return this.client === 'sqlite3' || this.client === 'better-sqlite3';
  }

  get isMySQL(): boolean {
    return this.client === 'mysql2' || this.client === 'mysql';
  }

  get isPostgreSQL(): boolean {
    return this.client === 'pg' || this.client === 'postgres' || this.client === 'postgresql';
  }

  get dialect(): Dialect {
    if (this.isMySQL) return 'mysql';
    if (this.isPostgreSQL) return 'postgresql';
    return 'sqlite';
  }

  // ============================================================================
  // Column Helpers
  // ============================================================================

  /**
   * Adds a DATETIME column defaulting to the current time
   *
   * SQLite/MySQL: DATETIME DEFAULT CURRENT_TIMESTAMP
   * PostgreSQL: TIMESTAMPTZ DEFAULT CURRENT_TIMESTAMP
   */
  datetimeColumn(
    table: Knex.CreateTableBuilder | Knex.AlterTableBuilder,
    columnName: string,
    nullable: boolean = true
  ): Knex.ColumnBuilder {
    const col = table.datetime(columnName).defaultTo(this.knex.fn.now());
    if (!nullable) {
      col.notNullable();
    }
    return col;
  }

  /**
   * Creates a VARCHAR column with database-aware length limit
   *
   * MySQL UTF8MB4 index key limit: 3072 bytes (768 chars × 4 bytes)
   *
   * @param indexed - Whether this column will be indexed (affects MySQL length limit)
   */
  stringColumn(
    table: Knex.CreateTableBuilder | Knex.AlterTableBuilder,
    columnName: string,
    maxLength: number = 255,
    indexed: boolean = false
  ): Knex.ColumnBuilder {
    const effectiveLength = this.isMySQL && indexed
      ? Math.min(maxLength, 768)
      : maxLength;

    return table.string(columnName, effectiveLength);
  }

  // ============================================================================
  // Index Management
  // ============================================================================

  /**
   * Creates an index with IF NOT EXISTS semantics
   *
   * SQLite/PostgreSQL: CREATE INDEX IF NOT EXISTS
   * MySQL: Try/catch with duplicate index detection
   *
   * @param indexName - Name of the index (auto-generated if not provided)
   * @returns true when the index was created, false when it already existed
   */
  async createIndexSafe(
    tableName: string,
    columns: readonly string[],
    indexName?: string,
    options: { unique?: boolean } = {}
  ): Promise<boolean> {
    if (columns.length === 0) {
      throw new Error(`Cannot create an index on ${tableName} without columns`);
    }

    const name = indexName || `idx_${tableName}_${columns.join('_')}`;

    if (this.isSQLite || this.isPostgreSQL) {
      const existed = await this.hasIndex(tableName, name);
      const uniqueClause = options.unique ? 'UNIQUE ' : '';
      const columnsList = columns.map(() => '??').join(', ');

      await this.knex.raw(
        `CREATE ${uniqueClause}INDEX IF NOT EXISTS ?? ON ?? (${columnsList})`,
        [name, tableName, ...columns]
      );
      return !existed;
    }

    try {
      await this.knex.schema.alterTable(tableName, (table) => {
        if (options.unique) {
          table.unique([...columns], { indexName: name });
        } else {
          table.index([...columns], name);
        }
      });
      return true;
    } catch (error) {
      if (!isDuplicateObjectError(error)) {
        throw error;
      }
      debugLog('DEBUG', `Index ${name} already exists, skipping`);
      return false;
    }
  }

  /**
   * Get all named secondary indexes of a table (primary keys and
   * engine-generated autoindexes excluded)
   */
  async listIndexes(tableName: string): Promise<string[]> {
    let result: unknown;
    let key: string;

    if (this.isSQLite) {
      result = await this.knex.raw(`
        SELECT name FROM sqlite_master
        WHERE type='index'
        AND tbl_name=?
        AND sql IS NOT NULL
        ORDER BY name
      `, [tableName]);
      key = 'name';
    } else if (this.isMySQL) {
      result = await this.knex.raw(`SHOW INDEXES FROM ?? WHERE Key_name != 'PRIMARY'`, [tableName]);
      key = 'Key_name';
    } else {
      result = await this.knex.raw(`
        SELECT indexname
        FROM pg_indexes
        WHERE schemaname = current_schema()
          AND tablename = ?
          AND indexname NOT LIKE '%_pkey'
        ORDER BY indexname
      `, [tableName]);
      key = 'indexname';
    }

    const names = new Set<string>();
    for (const row of extractRows(result)) {
      const value = row[key];
      if (typeof value === 'string') {
        names.add(value);
      }
    }
    return Array.from(names).sort();
  }

  async hasIndex(tableName: string, indexName: string): Promise<boolean> {
    const indexes = await this.listIndexes(tableName);
    return indexes.includes(indexName);
  }

  // ============================================================================
  // Table Management
  // ============================================================================

  /**
   * Creates a table with idempotency check
   *
   * @returns true when the table was created
   */
  async createTableSafe(
    tableName: string,
    callback: (
      table: Knex.CreateTableBuilder,
      helpers: TableHelpers
    ) => void
  ): Promise<boolean> {
    const hasTable = await this.knex.schema.hasTable(tableName);

    if (hasTable) {
      debugLog('DEBUG', `Table ${tableName} already exists, skipping`);
      return false;
    }

    await this.knex.schema.createTable(tableName, (table) => {
      callback(table, new TableHelpers(this, table));
    });
    return true;
  }

  /**
   * Drops a table with DROP TABLE IF EXISTS semantics
   *
   * @returns true when a table was dropped, false when it was already absent
   */
  async dropTableSafe(tableName: string): Promise<boolean> {
    try {
      const exists = await this.knex.schema.hasTable(tableName);
      if (!exists) {
        return false;
      }
      await this.knex.schema.dropTable(tableName);
      return true;
    } catch (error) {
      if (isMissingTableError(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Foreign keys of other tables that target `tableName`, sorted by table and column
   */
  async listReferencingColumns(tableName: string): Promise<Array<{ table: string; column: string }>> {
    const foreignKeys = await SchemaInspector(this.knex).foreignKeys();
    return foreignKeys
      .filter(fk => fk.foreign_key_table === tableName && fk.table !== tableName)
      .map(fk => ({ table: fk.table, column: fk.column }))
      .sort((a, b) => a.table.localeCompare(b.table) || a.column.localeCompare(b.column));
  }

  /**
   * Constraint names of the foreign keys declared on `tableName`
   *
   * SQLite reports none: its FK constraints are unnamed in the catalog.
   */
  async listForeignKeyNames(tableName: string): Promise<string[]> {
    const foreignKeys = await SchemaInspector(this.knex).foreignKeys(tableName);
    return foreignKeys
      .map(fk => fk.constraint_name)
      .filter((name): name is string => typeof name === 'string' && name !== '')
      .sort();
  }

  /**
   * Column names of a table, in the engine's reported order
   */
  async listColumns(tableName: string): Promise<string[]> {
    const info = await this.knex(tableName).columnInfo();
    return Object.keys(info);
  }

  async countRows(tableName: string): Promise<number> {
    const result: unknown = await this.knex(tableName).count({ count: '*' });
    const [row] = extractRows(result);
    return Number(row?.count ?? 0);
  }

  /**
   * Re-aligns an auto-increment sequence with the rows present
   *
   * Needed on PostgreSQL after rows are inserted with explicit ids into a
   * serial column; SQLite and MySQL advance their counters on their own.
   */
  async syncAutoIncrement(tableName: string, columnName: string = 'id'): Promise<void> {
    if (!this.isPostgreSQL) {
      return;
    }

    await this.knex.raw(
      `SELECT setval(pg_get_serial_sequence(?, ?), COALESCE((SELECT MAX(??) FROM ??), 0) + 1, false)`,
      [tableName, columnName, columnName, tableName]
    );
  }
}

/**
 * Table builder helpers
 *
 * Provides convenient methods for common column patterns
 */
export class TableHelpers {
  constructor(
    private readonly db: UniversalKnex,
    private readonly table: Knex.CreateTableBuilder | Knex.AlterTableBuilder
  ) {}

  /**
   * Creates a VARCHAR column with database-aware length
   */
  stringColumn(
    columnName: string,
    maxLength: number = 255,
    indexed: boolean = false
  ): Knex.ColumnBuilder {
    return this.db.stringColumn(this.table, columnName, maxLength, indexed);
  }

  /**
   * Creates a DATETIME column defaulting to the current time
   */
  datetimeColumn(columnName: string, nullable: boolean = true): Knex.ColumnBuilder {
    return this.db.datetimeColumn(this.table, columnName, nullable);
  }
}
