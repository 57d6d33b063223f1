/**
 * Table rebuild through a shadow table
 *
 * Changes a table's shape on engines without a usable ALTER for it (SQLite
 * cannot drop a column that carries a foreign key):
 *
 *   1. create-shadow     create `<table>_new` from the TableSpec
 *   2. copy-rows         INSERT INTO shadow (cols) SELECT cols FROM table
 *   3. cutover           drop the table, rename the shadow to its name
 *   4. recreate-indexes  create the declared indexes on the canonical table
 *
 * Each step inspects the catalog first, so the plan can be re-run after it
 * completed, and resumed after an interruption on engines whose DDL is not
 * transactional.
 */

import type { Knex } from 'knex';
import { UniversalKnex } from '../../utils/universal-knex.js';
import { debugLogQuery } from '../../utils/debug-logger.js';
import { runSteps } from './step-plan.js';
import type { MigrationStep, StepOutcome, StepResult } from './step-plan.js';
import {
  applyTableSpec,
  columnNames,
  requiredColumns,
  shadowTableName,
  validateTableSpec,
} from './table-spec.js';
import type { TableRebuildSpec } from './table-spec.js';

interface TablePresence {
  source: boolean;
  shadow: boolean;
}

async function tablePresence(knex: Knex, spec: TableRebuildSpec): Promise<TablePresence> {
  const source = await knex.schema.hasTable(spec.name);
  const shadow = await knex.schema.hasTable(shadowTableName(spec));
  return { source, shadow };
}

function hasExactColumns(actual: readonly string[], spec: TableRebuildSpec): boolean {
  const expected = columnNames(spec);
  return actual.length === expected.length && expected.every(name => actual.includes(name));
}

async function createShadow(knex: Knex, spec: TableRebuildSpec): Promise<StepResult> {
  const db = new UniversalKnex(knex);
  const shadow = shadowTableName(spec);
  const presence = await tablePresence(knex, spec);

  if (presence.shadow) {
    return { status: 'skipped', detail: `${shadow} already exists` };
  }
  if (!presence.source) {
    throw new Error(`Cannot rebuild ${spec.name}: neither ${spec.name} nor ${shadow} exists`);
  }
  if (hasExactColumns(await db.listColumns(spec.name), spec)) {
    return { status: 'skipped', detail: `${spec.name} already has the target columns` };
  }

  const takenKeyNames = new Set(await db.listForeignKeyNames(spec.name));
  await knex.schema.createTable(shadow, table =>
    applyTableSpec(db, table, spec, { tableName: shadow, takenKeyNames })
  );
  return { status: 'applied', detail: `created ${shadow}` };
}

async function copyRows(knex: Knex, spec: TableRebuildSpec): Promise<StepResult> {
  const db = new UniversalKnex(knex);
  const shadow = shadowTableName(spec);
  const presence = await tablePresence(knex, spec);

  if (!presence.source || !presence.shadow) {
    return { status: 'skipped', detail: 'nothing to copy' };
  }

  const sourceColumns = new Set(await db.listColumns(spec.name));
  const missing = requiredColumns(spec).filter(name => !sourceColumns.has(name));
  if (missing.length > 0) {
    throw new Error(
      `Cannot copy ${spec.name} into ${shadow}: source lacks required column(s) ${missing.join(', ')}`
    );
  }

  // The source is authoritative; rows here come from an interrupted run
  const stale = await db.countRows(shadow);
  if (stale > 0) {
    await knex(shadow).del();
  }

  const projection = columnNames(spec).filter(name => sourceColumns.has(name));
  const placeholders = projection.map(() => '??').join(', ');
  const sql = `INSERT INTO ?? (${placeholders}) SELECT ${placeholders} FROM ??`;
  const bindings = [shadow, ...projection, ...projection, spec.name];
  debugLogQuery(`${spec.name}:copy-rows`, sql, bindings);
  await knex.raw(sql, bindings);

  const expected = await db.countRows(spec.name);
  const copied = await db.countRows(shadow);
  if (copied !== expected) {
    throw new Error(`Row count mismatch copying ${spec.name}: expected ${expected}, copied ${copied}`);
  }

  for (const column of spec.columns) {
    if (column.type === 'increments') {
      await db.syncAutoIncrement(shadow, column.name);
    }
  }

  const cleared = stale > 0 ? `, cleared ${stale} stale row(s)` : '';
  return { status: 'applied', detail: `copied ${copied} row(s)${cleared}` };
}

async function cutover(knex: Knex, spec: TableRebuildSpec): Promise<StepResult> {
  const shadow = shadowTableName(spec);
  const presence = await tablePresence(knex, spec);

  if (presence.source && presence.shadow) {
    await knex.schema.dropTable(spec.name);
    await knex.schema.renameTable(shadow, spec.name);
    return { status: 'applied', detail: `replaced ${spec.name} with ${shadow}` };
  }
  if (presence.shadow) {
    await knex.schema.renameTable(shadow, spec.name);
    return { status: 'applied', detail: `resumed: renamed ${shadow} to ${spec.name}` };
  }
  if (presence.source) {
    return { status: 'skipped', detail: `no ${shadow} to cut over` };
  }
  throw new Error(`Cannot cut over ${spec.name}: neither ${spec.name} nor ${shadow} exists`);
}

async function recreateIndexes(knex: Knex, spec: TableRebuildSpec): Promise<StepResult> {
  const indexes = spec.indexes ?? [];
  if (indexes.length === 0) {
    return { status: 'skipped', detail: 'no indexes declared' };
  }

  const db = new UniversalKnex(knex);
  const created: string[] = [];
  for (const index of indexes) {
    if (await db.createIndexSafe(spec.name, index.columns, index.name, { unique: index.unique })) {
      created.push(index.name);
    }
  }

  return created.length > 0
    ? { status: 'applied', detail: `created ${created.join(', ')}` }
    : { status: 'skipped', detail: 'indexes already present' };
}

/**
 * The four rebuild steps for one table, chained by dependsOn.
 * Step ids are `<table>:<step>`, so other steps can depend on them.
 *
 * @throws {Error} If the spec is invalid
 */
export function planTableRebuild(spec: TableRebuildSpec): MigrationStep[] {
  validateTableSpec(spec);

  const id = (step: string): string => `${spec.name}:${step}`;
  const shadow = shadowTableName(spec);

  return [
    {
      id: id('create-shadow'),
      description: `Create ${shadow} with the target shape of ${spec.name}`,
      run: knex => createShadow(knex, spec),
    },
    {
      id: id('copy-rows'),
      description: `Copy rows of ${spec.name} into ${shadow}`,
      dependsOn: [id('create-shadow')],
      run: knex => copyRows(knex, spec),
    },
    {
      id: id('cutover'),
      description: `Replace ${spec.name} with ${shadow}`,
      dependsOn: [id('copy-rows')],
      run: knex => cutover(knex, spec),
    },
    {
      id: id('recreate-indexes'),
      description: `Recreate indexes on ${spec.name}`,
      dependsOn: [id('cutover')],
      run: knex => recreateIndexes(knex, spec),
    },
  ];
}

export async function rebuildTable(knex: Knex, spec: TableRebuildSpec): Promise<StepOutcome[]> {
  return runSteps(knex, planTableRebuild(spec));
}
