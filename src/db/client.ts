import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';
import { Pool, type QueryResultRow } from 'pg';
import type { Logger } from 'pino';
import { silentLogger } from '../logger.js';

const CURRENT_MIGRATION = '001_chat_messages';
const MIGRATION_FILE = '001_initial.sql';

export interface DatabaseClient {
  query<T extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<{ rows: T[] }>;
  close(): Promise<void>;
}

export interface PgDatabaseOptions {
  connectionString: string;
  migrationsDir?: string;
}

export class PgDatabaseClient implements DatabaseClient {
  private readonly pool: Pool;
  private readonly migrationsDir: string;

  constructor(options: PgDatabaseOptions) {
    this.pool = new Pool({ connectionString: options.connectionString });
    this.migrationsDir = options.migrationsDir ?? resolve(process.cwd(), 'src/db/migrations');
  }

  async query<T extends QueryResultRow = QueryResultRow>(sql: string, params: unknown[] = []): Promise<{ rows: T[] }> {
    const result = await this.pool.query<T>(sql, params);
    return { rows: result.rows };
  }

  /** Applies the bootstrap schema once; later runs see the recorded id and return. */
  async migrate(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        id TEXT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);

    const applied = await this.pool.query<{ id: string }>('SELECT id FROM schema_migrations WHERE id = $1', [CURRENT_MIGRATION]);
    if (applied.rows.length > 0) return;

    const sql = await readFile(resolve(this.migrationsDir, MIGRATION_FILE), 'utf-8');

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (id) VALUES ($1)', [CURRENT_MIGRATION]);
      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export interface ReadinessOptions {
  attempts?: number;
  intervalMs?: number;
  logger?: Logger;
}

// "cannot connect now" while Postgres is still starting, plus socket-level refusals.
const STARTUP_ERROR_CODES = new Set(['57P03', 'ECONNREFUSED', 'ETIMEDOUT']);

function isStartupError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && STARTUP_ERROR_CODES.has(String(error.code));
}

/**
 * Polls with `SELECT 1` until the database answers. Errors other than
 * startup ones are rethrown at once; the last startup error is rethrown when
 * attempts run out.
 */
export async function waitForDatabase(db: DatabaseClient, options: ReadinessOptions = {}): Promise<void> {
  const attempts = options.attempts ?? 30;
  const intervalMs = options.intervalMs ?? 1000;
  const logger = options.logger ?? silentLogger;

  for (let attempt = 1; ; attempt += 1) {
    try {
      await db.query('SELECT 1');
      return;
    } catch (error) {
      if (attempt >= attempts || !isStartupError(error)) throw error;
      logger.warn({ attempt, attempts, intervalMs, err: error }, 'database not ready');
      await delay(intervalMs);
    }
  }
}

export function createDatabaseClient(databaseUrl: string): PgDatabaseClient {
  return new PgDatabaseClient({ connectionString: databaseUrl });
}
