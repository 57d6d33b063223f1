/**
 * Dependency-ordered migration steps
 *
 * A migration is a list of steps, each naming the steps it must follow.
 * The plan is ordered before anything runs, then executed inside a single
 * transaction so a failing step leaves no trace.
 */

import type { Knex } from 'knex';
import { debugLogMigrationStep, debugLogTransaction } from '../../utils/debug-logger.js';
import { handleMigrationError } from '../../utils/error-handler.js';

export type StepStatus = 'applied' | 'skipped';

export interface StepResult {
  status: StepStatus;
  detail?: string;
}

export interface StepOutcome extends StepResult {
  id: string;
}

export interface MigrationStep {
  id: string;
  description: string;
  dependsOn?: readonly string[];
  run(knex: Knex): Promise<StepResult>;
}

/**
 * Topological order of the steps. Among steps that are ready at the same
 * time, declaration order wins.
 *
 * @throws {Error} On duplicate ids, unknown dependencies, or cycles
 */
export function orderSteps(steps: readonly MigrationStep[]): MigrationStep[] {
  const ids = new Set<string>();
  for (const step of steps) {
    if (ids.has(step.id)) {
      throw new Error(`Duplicate migration step id: ${step.id}`);
    }
    ids.add(step.id);
  }

  for (const step of steps) {
    for (const dependency of step.dependsOn ?? []) {
      if (!ids.has(dependency)) {
        throw new Error(`Migration step ${step.id} depends on unknown step ${dependency}`);
      }
    }
  }

  const done = new Set<string>();
  const ordered: MigrationStep[] = [];
  let remaining = [...steps];

  while (remaining.length > 0) {
    const next = remaining.find(step => (step.dependsOn ?? []).every(dep => done.has(dep)));
    if (!next) {
      const stuck = remaining.map(step => step.id).join(', ');
      throw new Error(`Migration steps form a dependency cycle: ${stuck}`);
    }
    ordered.push(next);
    done.add(next.id);
    remaining = remaining.filter(step => step !== next);
  }

  return ordered;
}

async function executeInOrder(knex: Knex, ordered: readonly MigrationStep[]): Promise<StepOutcome[]> {
  const outcomes: StepOutcome[] = [];

  for (const step of ordered) {
    let result: StepResult;
    try {
      result = await step.run(knex);
    } catch (error) {
      debugLogMigrationStep(step.id, 'failed', step.description);
      throw handleMigrationError(`Step ${step.id}`, error);
    }

    debugLogMigrationStep(step.id, result.status, result.detail);
    outcomes.push({ id: step.id, ...result });
  }

  return outcomes;
}

/**
 * Orders and runs the steps.
 *
 * Runs on `knex` directly when it is already a transaction (as inside a
 * knex migration); otherwise opens one.
 */
export async function runSteps(knex: Knex, steps: readonly MigrationStep[]): Promise<StepOutcome[]> {
  const ordered = orderSteps(steps);

  if (knex.isTransaction) {
    return executeInOrder(knex, ordered);
  }

  debugLogTransaction('START', 'runSteps');
  try {
    const outcomes = await knex.transaction(trx => executeInOrder(trx, ordered));
    debugLogTransaction('COMMIT', 'runSteps');
    return outcomes;
  } catch (error) {
    debugLogTransaction('ROLLBACK', 'runSteps');
    throw error;
  }
}
