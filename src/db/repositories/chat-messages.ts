import type { DatabaseClient } from '../client.js';

export interface ChatMessageRecord {
  sessionId: string;
  role: 'user' | 'assistant';
  content: string;
  metadata?: Record<string, unknown>;
}

export interface StoredChatMessage extends Required<ChatMessageRecord> {
  id: string;
  createdAt: string;
}

/** Where finished chat turns are handed off; implemented by the pg repository. */
export interface ChatMessageSink {
  append(messages: ChatMessageRecord[]): Promise<void>;
}

interface Row {
  id: string;
  session_id: string;
  role: 'user' | 'assistant';
  content: string;
  metadata: Record<string, unknown> | null;
  created_at: Date | string;
}

const map = (row: Row): StoredChatMessage => ({
  id: row.id,
  sessionId: row.session_id,
  role: row.role,
  content: row.content,
  metadata: row.metadata ?? {},
  createdAt: new Date(row.created_at).toISOString()
});

export class ChatMessagesRepository implements ChatMessageSink {
  constructor(private readonly db: DatabaseClient) {}

  async append(messages: ChatMessageRecord[]): Promise<void> {
    for (const message of messages) {
      await this.db.query(
        `INSERT INTO chat_messages (session_id, role, content, metadata)
         VALUES ($1, $2, $3, $4::jsonb)`,
        [message.sessionId, message.role, message.content, JSON.stringify(message.metadata ?? {})]
      );
    }
  }

  async listBySession(sessionId: string, limit = 100): Promise<StoredChatMessage[]> {
    const rows = await this.db.query<Row>(
      `SELECT id, session_id, role, content, metadata, created_at
       FROM chat_messages WHERE session_id = $1
       ORDER BY created_at ASC, id ASC
       LIMIT $2`,
      [sessionId, limit]
    );
    return rows.rows.map(map);
  }

  async deleteBySession(sessionId: string): Promise<number> {
    const rows = await this.db.query<{ id: string }>('DELETE FROM chat_messages WHERE session_id = $1 RETURNING id', [sessionId]);
    return rows.rows.length;
  }
}
