import { after, before, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { isPipelineError, type ErrorKind } from '../../errors.js';
import { validate } from '../../policy/validate.js';
import { CUSTOMERS_SCHEMA } from '../../schema/descriptor.js';
import { SqliteExecutor } from '../sqlite.js';
import { createFixtureDb, type FixtureDb } from './fixture-db.js';

function statement(sql: string) {
  return validate({ sql, kind: 'select' }, CUSTOMERS_SCHEMA);
}

function kindIs(kind: ErrorKind) {
  return (err: unknown) => isPipelineError(err) && err.kind === kind;
}

describe('SqliteExecutor.execute', () => {
  let fixture: FixtureDb;

  before(() => {
    fixture = createFixtureDb();
  });

  after(() => {
    fixture.cleanup();
  });

  it('returns ordered columns and array rows', async () => {
    const executor = new SqliteExecutor({ path: fixture.path });
    const rs = await executor.execute(
      statement("SELECT name, location FROM customers WHERE location = 'Mumbai' ORDER BY customer_id"),
    );
    assert.deepEqual(rs.columns, ['name', 'location']);
    assert.deepEqual(rs.rows, [
      ['Jane Smith', 'Mumbai'],
      ['Bob Brown', 'Mumbai'],
      ['Diana Evans', 'Mumbai'],
    ]);
  });

  it('returns column names and no rows when nothing matches', async () => {
    const executor = new SqliteExecutor({ path: fixture.path });
    const rs = await executor.execute(statement("SELECT * FROM customers WHERE location = 'Antarctica'"));
    assert.deepEqual(rs.columns, ['customer_id', 'name', 'gender', 'location']);
    assert.deepEqual(rs.rows, []);
  });

  it('returns integers as numbers', async () => {
    const executor = new SqliteExecutor({ path: fixture.path });
    const rs = await executor.execute(statement('SELECT COUNT(*) AS n FROM customers'));
    assert.deepEqual(rs.columns, ['n']);
    assert.deepEqual(rs.rows, [[7]]);
  });

  it('allows exactly maxRows rows', async () => {
    const executor = new SqliteExecutor({ path: fixture.path, maxRows: 7 });
    const rs = await executor.execute(statement('SELECT customer_id FROM customers'));
    assert.equal(rs.rows.length, 7);
  });

  it('fails with ResourceLimitExceeded past maxRows', async () => {
    const executor = new SqliteExecutor({ path: fixture.path, maxRows: 3 });
    await assert.rejects(
      executor.execute(statement('SELECT customer_id FROM customers')),
      kindIs('ResourceLimitExceeded'),
    );
  });

  it('fails with ResourceLimitExceeded when the time budget runs out', async () => {
    let tick = 0;
    const executor = new SqliteExecutor({
      path: fixture.path,
      timeoutMs: 15,
      now: () => (tick++) * 10,
    });
    await assert.rejects(
      executor.execute(statement('SELECT name FROM customers')),
      kindIs('ResourceLimitExceeded'),
    );
  });

  it('fails with ResourceLimitExceeded when a query that matches nothing runs too long', async () => {
    let clock = 0;
    const executor = new SqliteExecutor({
      path: fixture.path,
      timeoutMs: 100,
      now: () => (clock += 1000),
    });
    await assert.rejects(
      executor.execute(statement("SELECT name FROM customers WHERE location = 'Antarctica'")),
      kindIs('ResourceLimitExceeded'),
    );
  });

  it('fails with Cancelled when the signal is already aborted', async () => {
    const executor = new SqliteExecutor({ path: fixture.path });
    const controller = new AbortController();
    controller.abort();
    await assert.rejects(
      executor.execute(statement('SELECT name FROM customers'), controller.signal),
      kindIs('Cancelled'),
    );
  });

  it('maps engine failures to ExecutionError and keeps the engine message in details', async () => {
    const executor = new SqliteExecutor({ path: fixture.path });
    await assert.rejects(executor.execute(statement('SELECT SUBSTR(name) FROM customers')), (err: unknown) => {
      assert.ok(isPipelineError(err));
      assert.equal(err.kind, 'ExecutionError');
      assert.equal(err.message, 'The database could not run the statement.');
      assert.match(String(err.details?.engineMessage), /substr/i);
      return true;
    });
  });

  it('fails with ExecutionError when the database file is missing', async () => {
    const executor = new SqliteExecutor({ path: `${fixture.path}.missing` });
    await assert.rejects(executor.execute(statement('SELECT name FROM customers')), kindIs('ExecutionError'));
  });
});

describe('SqliteExecutor.health', () => {
  it('counts rows per descriptor table', async () => {
    const fixture = createFixtureDb();
    try {
      const status = await new SqliteExecutor({ path: fixture.path }).health(CUSTOMERS_SCHEMA);
      assert.equal(status.ok, true);
      assert.equal(status.schemaLoaded, true);
      assert.deepEqual(status.tables, { customers: 7 });
      assert.equal(status.error, undefined);
    } finally {
      fixture.cleanup();
    }
  });

  it('reports an unreachable database without throwing', async () => {
    const fixture = createFixtureDb();
    fixture.cleanup();
    const status = await new SqliteExecutor({ path: fixture.path }).health(CUSTOMERS_SCHEMA);
    assert.equal(status.ok, false);
    assert.deepEqual(status.tables, {});
    assert.equal(typeof status.error, 'string');
  });
});
