import type { QueryResultRow } from 'pg';
import { describe, expect, it } from 'vitest';
import { waitForDatabase, type DatabaseClient } from '../src/db/client.js';

function codedError(code: string): Error {
  return Object.assign(new Error(`database error ${code}`), { code });
}

class StartingDatabase implements DatabaseClient {
  calls = 0;

  constructor(private readonly failures: Error[]) {}

  async query<T extends QueryResultRow = QueryResultRow>(): Promise<{ rows: T[] }> {
    this.calls += 1;
    const failure = this.failures.shift();
    if (failure) throw failure;
    return { rows: [] };
  }

  async close(): Promise<void> {}
}

describe('waitForDatabase', () => {
  it('retries while the database is starting up', async () => {
    const db = new StartingDatabase([codedError('57P03'), codedError('ECONNREFUSED')]);
    await waitForDatabase(db, { intervalMs: 0 });
    expect(db.calls).toBe(3);
  });

  it('rethrows other errors without retrying', async () => {
    const db = new StartingDatabase([codedError('28P01')]);
    await expect(waitForDatabase(db, { intervalMs: 0 })).rejects.toThrow('database error 28P01');
    expect(db.calls).toBe(1);
  });

  it('gives up after the last attempt', async () => {
    const db = new StartingDatabase([codedError('ETIMEDOUT'), codedError('ETIMEDOUT'), codedError('ETIMEDOUT')]);
    await expect(waitForDatabase(db, { attempts: 2, intervalMs: 0 })).rejects.toThrow('database error ETIMEDOUT');
    expect(db.calls).toBe(2);
  });
});
