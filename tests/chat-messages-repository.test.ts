import type { QueryResultRow } from 'pg';
import { describe, expect, it } from 'vitest';
import type { DatabaseClient } from '../src/db/client.js';
import { ChatMessagesRepository } from '../src/db/repositories/chat-messages.js';

class RecordingDatabase implements DatabaseClient {
  readonly queries: Array<{ sql: string; params: unknown[] }> = [];

  constructor(private readonly rows: QueryResultRow[] = []) {}

  async query<T extends QueryResultRow = QueryResultRow>(sql: string, params: unknown[] = []): Promise<{ rows: T[] }> {
    this.queries.push({ sql, params });
    return { rows: this.rows.filter((row): row is T => typeof row === 'object') };
  }

  async close(): Promise<void> {}
}

describe('ChatMessagesRepository', () => {
  it('inserts one row per message with JSON metadata', async () => {
    const db = new RecordingDatabase();
    const repository = new ChatMessagesRepository(db);

    await repository.append([
      { sessionId: 's-1', role: 'user', content: 'hello' },
      { sessionId: 's-1', role: 'assistant', content: 'hi', metadata: { source: 'model' } }
    ]);

    expect(db.queries.map((query) => query.params)).toEqual([
      ['s-1', 'user', 'hello', '{}'],
      ['s-1', 'assistant', 'hi', '{"source":"model"}']
    ]);
  });

  it('maps stored rows, including timestamps pg returns as dates', async () => {
    const db = new RecordingDatabase([
      {
        id: 'm-1',
        session_id: 's-1',
        role: 'assistant',
        content: 'hi',
        metadata: null,
        created_at: '2026-01-01T00:00:00.000Z'
      },
      {
        id: 'm-2',
        session_id: 's-1',
        role: 'user',
        content: 'thanks',
        metadata: { source: 'model' },
        created_at: new Date(Date.UTC(2026, 0, 1, 0, 5))
      }
    ]);
    const repository = new ChatMessagesRepository(db);

    await expect(repository.listBySession('s-1')).resolves.toEqual([
      { id: 'm-1', sessionId: 's-1', role: 'assistant', content: 'hi', metadata: {}, createdAt: '2026-01-01T00:00:00.000Z' },
      {
        id: 'm-2',
        sessionId: 's-1',
        role: 'user',
        content: 'thanks',
        metadata: { source: 'model' },
        createdAt: '2026-01-01T00:05:00.000Z'
      }
    ]);
    expect(db.queries[0].params).toEqual(['s-1', 100]);
  });

  it('counts deleted rows', async () => {
    const db = new RecordingDatabase([{ id: 'm-1' }, { id: 'm-2' }]);
    await expect(new ChatMessagesRepository(db).deleteBySession('s-1')).resolves.toBe(2);
    expect(db.queries[0].sql).toBe('DELETE FROM chat_messages WHERE session_id = $1 RETURNING id');
  });
});
