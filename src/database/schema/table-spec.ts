/**
 * Declarative table definitions
 *
 * A TableSpec is the single description of a table's target shape. The
 * rebuild steps derive everything from it: the shadow table DDL, the copy
 * projection, and the indexes recreated after cutover.
 */

import type { Knex } from 'knex';
import type { UniversalKnex } from '../../utils/universal-knex.js';

export type ColumnType =
  | 'increments'
  | 'integer'
  | 'bigInteger'
  | 'text'
  | 'string'
  | 'datetime'
  | 'boolean';

export interface ColumnSpec {
  name: string;
  type: ColumnType;
  notNull?: boolean;
  /** Default to the current time (datetime columns) */
  defaultNow?: boolean;
  defaultTo?: string | number | boolean;
  /** VARCHAR length for 'string' columns */
  length?: number;
  unique?: boolean;
  /** Integer columns referencing an `increments` key (MySQL makes those unsigned) */
  unsigned?: boolean;
}

export type ForeignKeyAction = 'CASCADE' | 'SET NULL' | 'RESTRICT' | 'NO ACTION';

export interface ForeignKeySpec {
  column: string;
  references: { table: string; column: string };
  onDelete?: ForeignKeyAction;
}

export interface IndexSpec {
  name: string;
  columns: readonly string[];
  unique?: boolean;
}

export interface TableSpec {
  name: string;
  columns: readonly ColumnSpec[];
  foreignKeys?: readonly ForeignKeySpec[];
  indexes?: readonly IndexSpec[];
}

export interface TableRebuildSpec extends TableSpec {
  /** Defaults to `<name>_new` */
  shadowName?: string;
}

export interface ApplyTableSpecOptions {
  /** Table the builder creates, when it is not `spec.name` (a shadow table) */
  tableName?: string;
  /** Foreign key names already in use, e.g. on the table being replaced */
  takenKeyNames?: ReadonlySet<string>;
}

const INTEGER_TYPES: readonly ColumnType[] = ['increments', 'integer', 'bigInteger'];

export function shadowTableName(spec: TableRebuildSpec): string {
  return spec.shadowName ?? `${spec.name}_new`;
}

export function columnNames(spec: TableSpec): string[] {
  return spec.columns.map(column => column.name);
}

/**
 * Columns a copy must supply: not null, no default, not auto-generated.
 */
export function requiredColumns(spec: TableSpec): string[] {
  return spec.columns
    .filter(column =>
      column.notNull === true &&
      column.type !== 'increments' &&
      column.defaultTo === undefined &&
      column.defaultNow !== true
    )
    .map(column => column.name);
}

/**
 * Rejects specs the rebuild cannot honour.
 *
 * @throws {Error} Listing every problem found
 */
export function validateTableSpec(spec: TableSpec): void {
  const problems: string[] = [];

  if (spec.name.trim() === '') {
    problems.push('table name is empty');
  }
  if (spec.columns.length === 0) {
    problems.push('no columns declared');
  }

  const known = new Set<string>();
  for (const column of spec.columns) {
    if (known.has(column.name)) {
      problems.push(`duplicate column "${column.name}"`);
    }
    known.add(column.name);
    if (column.unsigned && !INTEGER_TYPES.includes(column.type)) {
      problems.push(`column "${column.name}" cannot be unsigned`);
    }
  }

  for (const fk of spec.foreignKeys ?? []) {
    if (!known.has(fk.column)) {
      problems.push(`foreign key column "${fk.column}" is not declared`);
    }
  }

  const indexNames = new Set<string>();
  for (const index of spec.indexes ?? []) {
    if (indexNames.has(index.name)) {
      problems.push(`duplicate index "${index.name}"`);
    }
    indexNames.add(index.name);

    if (index.columns.length === 0) {
      problems.push(`index "${index.name}" has no columns`);
    }
    for (const column of index.columns) {
      if (!known.has(column)) {
        problems.push(`index "${index.name}" references undeclared column "${column}"`);
      }
    }
  }

  if (problems.length > 0) {
    throw new Error(`Invalid table spec for ${spec.name || '<unnamed>'}: ${problems.join('; ')}`);
  }
}

function addColumn(
  db: UniversalKnex,
  table: Knex.CreateTableBuilder,
  column: ColumnSpec
): Knex.ColumnBuilder {
  switch (column.type) {
    case 'increments':
      return table.increments(column.name);
    case 'integer': {
      const builder = table.integer(column.name);
      return column.unsigned ? builder.unsigned() : builder;
    }
    case 'bigInteger': {
      const builder = table.bigInteger(column.name);
      return column.unsigned ? builder.unsigned() : builder;
    }
    case 'text':
      return table.text(column.name);
    case 'string':
      return db.stringColumn(table, column.name, column.length ?? 255, column.unique === true);
    case 'datetime':
      return column.defaultNow
        ? db.datetimeColumn(table, column.name)
        : table.datetime(column.name);
    case 'boolean':
      return table.boolean(column.name);
  }
}

/**
 * Constraint name for a foreign key: `<table>_<column>_foreign` after the
 * canonical table, or after the table being created when the canonical name
 * is taken. MySQL keeps FK names schema-wide and a rename does not rename
 * them, so successive rebuilds alternate between the two.
 */
export function foreignKeyName(
  spec: TableSpec,
  fk: ForeignKeySpec,
  options: ApplyTableSpecOptions = {}
): string {
  const taken = options.takenKeyNames ?? new Set<string>();
  const canonical = `${spec.name}_${fk.column}_foreign`;
  if (!taken.has(canonical)) {
    return canonical;
  }

  const fallback = `${options.tableName ?? spec.name}_${fk.column}_foreign`;
  if (taken.has(fallback)) {
    throw new Error(`No free foreign key name for ${spec.name}.${fk.column}: ${canonical} and ${fallback} are taken`);
  }
  return fallback;
}

/**
 * Adds the spec's columns and foreign keys to a table builder.
 *
 * Indexes are left out: index names are schema-wide on SQLite and
 * PostgreSQL, so they are created against the canonical table after cutover.
 */
export function applyTableSpec(
  db: UniversalKnex,
  table: Knex.CreateTableBuilder,
  spec: TableSpec,
  options: ApplyTableSpecOptions = {}
): void {
  for (const column of spec.columns) {
    const builder = addColumn(db, table, column);
    if (column.notNull && column.type !== 'increments') {
      builder.notNullable();
    }
    if (column.defaultTo !== undefined) {
      builder.defaultTo(column.defaultTo);
    }
    if (column.unique) {
      builder.unique();
    }
  }

  for (const fk of spec.foreignKeys ?? []) {
    const reference = table
      .foreign(fk.column, foreignKeyName(spec, fk, options))
      .references(fk.references.column)
      .inTable(fk.references.table);
    if (fk.onDelete) {
      reference.onDelete(fk.onDelete);
    }
  }
}
