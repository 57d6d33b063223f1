import type { MigrationStep } from './step-plan.js';
import { UniversalKnex } from '../../utils/universal-knex.js';

export interface ColumnReference {
  table: string;
  column: string;
}

export interface TableRetirement {
  table: string;
  /** Defaults to `<table>:retire` */
  id?: string;
  dependsOn?: readonly string[];
  /**
   * Columns that pointed at the table without a foreign key the catalog
   * would show; all must be gone before it is dropped
   */
  referencedBy?: readonly ColumnReference[];
}

function refusal(table: string, ref: ColumnReference): Error {
  return new Error(`Cannot retire ${table}: ${ref.table}.${ref.column} still references it`);
}

/**
 * Step that drops a deprecated table once nothing references it: neither a
 * declared column nor a foreign key found in the catalog.
 */
export function retireTableStep(retirement: TableRetirement): MigrationStep {
  const referencedBy = retirement.referencedBy ?? [];

  return {
    id: retirement.id ?? `${retirement.table}:retire`,
    description: `Drop deprecated table ${retirement.table}`,
    dependsOn: retirement.dependsOn,
    run: async knex => {
      for (const ref of referencedBy) {
        if (await knex.schema.hasTable(ref.table) && await knex.schema.hasColumn(ref.table, ref.column)) {
          throw refusal(retirement.table, ref);
        }
      }

      const db = new UniversalKnex(knex);
      if (await knex.schema.hasTable(retirement.table)) {
        const [ref] = await db.listReferencingColumns(retirement.table);
        if (ref) {
          throw refusal(retirement.table, ref);
        }
      }

      const dropped = await db.dropTableSafe(retirement.table);
      return dropped
        ? { status: 'applied', detail: `dropped ${retirement.table}` }
        : { status: 'skipped', detail: `${retirement.table} already absent` };
    },
  };
}
