import { randomUUID } from 'node:crypto';
import { ConversationContext } from './context.js';

export const MAX_HISTORY_MESSAGES = 100;

export interface HistoryMessage {
  role: 'user' | 'assistant';
  content: string;
  createdAt: number;
}

export interface ChatSession {
  id: string;
  context: ConversationContext;
  /** False until a request (or the defaults on first use) sets the enabled servers. */
  toolServersChosen: boolean;
  history: HistoryMessage[];
  createdAt: number;
  lastSeenAt: number;
}

export class SessionStore {
  private readonly sessions = new Map<string, ChatSession>();
  private readonly queues = new Map<string, Promise<void>>();

  create(id: string = randomUUID()): ChatSession {
    const now = Date.now();
    const session: ChatSession = {
      id,
      context: new ConversationContext(),
      toolServersChosen: false,
      history: [],
      createdAt: now,
      lastSeenAt: now
    };
    this.sessions.set(id, session);
    return session;
  }

  get(id: string): ChatSession | null {
    const session = this.sessions.get(id);
    if (!session) return null;
    session.lastSeenAt = Date.now();
    return session;
  }

  getOrCreate(id: string | undefined): ChatSession {
    return (id ? this.get(id) : null) ?? this.create(id);
  }

  /** Clears context and history but keeps the session id. */
  reset(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;
    session.context.reset();
    session.history = [];
    return true;
  }

  delete(id: string): boolean {
    const session = this.sessions.get(id);
    if (!session) return false;
    session.context.reset();
    return this.sessions.delete(id);
  }

  appendMessage(session: ChatSession, role: HistoryMessage['role'], content: string): HistoryMessage {
    const message: HistoryMessage = { role, content, createdAt: Date.now() };
    session.history.push(message);
    if (session.history.length > MAX_HISTORY_MESSAGES) {
      session.history.splice(0, session.history.length - MAX_HISTORY_MESSAGES);
    }
    return message;
  }

  /**
   * Runs `task` after every earlier task for the same session id has
   * settled. Tasks for different sessions do not wait on each other.
   */
  runExclusive<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(sessionId, tail);
    void tail.then(() => {
      if (this.queues.get(sessionId) === tail) this.queues.delete(sessionId);
    });
    return run;
  }

  get size(): number {
    return this.sessions.size;
  }
}
