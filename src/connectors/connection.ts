import type { ToolCallResult } from '../mcp/protocol.js';
import type { ToolServerDefinition } from '../tools/definitions.js';

export type ClientState = 'uninitialized' | 'initializing' | 'ready' | 'stopped' | 'failed';

export interface HandshakeResult {
  protocolVersion: string;
  serverInfo: { name: string; version?: string };
}

/**
 * One started tool server as seen by the router and the orchestration loop.
 */
export interface ToolServerConnection {
  readonly serverId: string;
  readonly state: ClientState;
  start(): Promise<HandshakeResult>;
  callTool(name: string, args: Record<string, unknown>): Promise<ToolCallResult>;
  stop(): Promise<void>;
}

export type ConnectionFactory = (server: ToolServerDefinition) => ToolServerConnection;
