import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import type { Knex } from 'knex';
import { orderSteps, runSteps, type MigrationStep } from '../../database/schema/step-plan.js';
import { connectDb, disconnectDb, type TestDb } from '../utils/test-helpers.js';

function step(id: string, dependsOn?: string[]): MigrationStep {
  return {
    id,
    description: `step ${id}`,
    dependsOn,
    run: async () => ({ status: 'applied' }),
  };
}

describe('orderSteps', () => {
  it('should keep declaration order when nothing depends on anything', () => {
    const ordered = orderSteps([step('b'), step('a'), step('c')]);
    assert.deepStrictEqual(ordered.map(s => s.id), ['b', 'a', 'c']);
  });

  it('should place every step after its dependencies', () => {
    const ordered = orderSteps([step('c', ['b']), step('a'), step('b', ['a'])]);
    assert.deepStrictEqual(ordered.map(s => s.id), ['a', 'b', 'c']);
  });

  it('should break ties between ready steps by declaration order', () => {
    const ordered = orderSteps([
      step('root'),
      step('second', ['root']),
      step('first', ['root']),
    ]);
    assert.deepStrictEqual(ordered.map(s => s.id), ['root', 'second', 'first']);
  });

  it('should reject duplicate ids', () => {
    assert.throws(() => orderSteps([step('a'), step('a')]), /Duplicate migration step id: a/);
  });

  it('should reject unknown dependencies', () => {
    assert.throws(
      () => orderSteps([step('a'), step('b', ['zzz'])]),
      /Migration step b depends on unknown step zzz/
    );
  });

  it('should reject cycles and name the steps involved', () => {
    assert.throws(
      () => orderSteps([step('start'), step('a', ['b']), step('b', ['a'])]),
      /Migration steps form a dependency cycle: a, b/
    );
  });
});

describe('runSteps', () => {
  let db: TestDb;

  before(async () => {
    db = await connectDb();
    await db.knex.schema.createTable('events', table => {
      table.increments('id');
      table.text('name').notNullable();
    });
  });

  after(async () => {
    await disconnectDb(db);
  });

  function insertEvent(id: string): MigrationStep {
    return {
      id,
      description: `record ${id}`,
      run: async knex => {
        await knex('events').insert({ name: id });
        return { status: 'applied', detail: `inserted ${id}` };
      },
    };
  }

  it('should run in dependency order and return one outcome per step', async () => {
    const outcomes = await runSteps(db.knex, [
      { ...insertEvent('second'), dependsOn: ['first'] },
      insertEvent('first'),
    ]);

    assert.deepStrictEqual(outcomes, [
      { id: 'first', status: 'applied', detail: 'inserted first' },
      { id: 'second', status: 'applied', detail: 'inserted second' },
    ]);
    const names = await db.knex('events').select('name').orderBy('id');
    assert.deepStrictEqual(names, [{ name: 'first' }, { name: 'second' }]);

    await db.knex('events').del();
  });

  it('should roll back earlier steps when a later one fails', async () => {
    const failing: MigrationStep = {
      id: 'explode',
      description: 'always fails',
      dependsOn: ['first'],
      run: async () => {
        throw new Error('boom');
      },
    };

    await assert.rejects(
      runSteps(db.knex, [insertEvent('first'), failing]),
      (error: unknown) => {
        assert.ok(error instanceof Error);
        assert.strictEqual(error.message, 'Step explode failed: boom');
        assert.ok(error.cause instanceof Error);
        assert.strictEqual(error.cause.message, 'boom');
        return true;
      }
    );

    const [row] = await db.knex('events').count({ count: '*' });
    assert.strictEqual(Number(row?.count), 0);
  });

  it('should run inside the caller transaction instead of opening its own', async () => {
    let received: Knex | undefined;
    const checkStep: MigrationStep = {
      id: 'check',
      description: 'capture the connection',
      run: async knex => {
        received = knex;
        return { status: 'skipped' };
      },
    };

    await db.knex.transaction(async trx => {
      await runSteps(trx, [checkStep]);
      assert.strictEqual(received, trx);
    });
  });

  it('should reject a bad plan before running any step', async () => {
    await assert.rejects(
      runSteps(db.knex, [insertEvent('a'), { ...insertEvent('b'), dependsOn: ['missing'] }]),
      /Migration step b depends on unknown step missing/
    );

    const [row] = await db.knex('events').count({ count: '*' });
    assert.strictEqual(Number(row?.count), 0);
  });
});
