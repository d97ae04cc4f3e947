import type { Logger } from 'pino';
import { silentLogger } from '../logger.js';
import type { ToolServerDefinition } from '../tools/definitions.js';
import type { ConnectionFactory, ToolServerConnection } from './connection.js';

/**
 * Connections started during one router resolution or loop run. Each server
 * gets at most one live connection; `closeAll()` stops every connection the
 * arena ever handed out.
 */
export class ToolServerArena {
  private readonly connections = new Map<string, ToolServerConnection>();
  private readonly starting = new Map<string, Promise<ToolServerConnection>>();
  private readonly started: ToolServerConnection[] = [];
  private readonly logger: Logger;

  constructor(
    private readonly factory: ConnectionFactory,
    logger: Logger = silentLogger
  ) {
    this.logger = logger.child({ component: 'ToolServerArena' });
  }

  acquire(server: ToolServerDefinition): Promise<ToolServerConnection> {
    const existing = this.connections.get(server.id);
    if (existing && existing.state === 'ready') return Promise.resolve(existing);

    const pending = this.starting.get(server.id);
    if (pending) return pending;

    const start = this.open(server, existing).finally(() => {
      this.starting.delete(server.id);
    });
    this.starting.set(server.id, start);
    return start;
  }

  /** Stops the connection for `serverId` so the next acquire starts a fresh process. */
  async discard(serverId: string): Promise<void> {
    const connection = this.connections.get(serverId);
    if (!connection) return;
    this.connections.delete(serverId);
    await connection.stop();
  }

  async closeAll(): Promise<void> {
    const connections = this.started.splice(0);
    this.connections.clear();
    const results = await Promise.allSettled(connections.map((connection) => connection.stop()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.warn({ serverId: connections[index]?.serverId, err: result.reason }, 'failed to stop tool server');
      }
    });
  }

  private async open(server: ToolServerDefinition, stale: ToolServerConnection | undefined): Promise<ToolServerConnection> {
    if (stale) {
      this.connections.delete(server.id);
      await stale.stop();
    }

    const connection = this.factory(server);
    this.started.push(connection);
    this.connections.set(server.id, connection);
    try {
      await connection.start();
    } catch (error) {
      this.connections.delete(server.id);
      await connection.stop();
      throw error;
    }
    this.logger.debug({ serverId: server.id }, 'tool server connection opened');
    return connection;
  }
}
