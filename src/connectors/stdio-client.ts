import type { Logger } from 'pino';
import { silentLogger } from '../logger.js';
import {
  ClientStateError,
  HandshakeError,
  ProtocolError,
  ReadTimeoutError,
  isTransportFailure
} from '../mcp/error-mapper.js';
import {
  isRecord,
  parseResponseLine,
  toToolCallResult,
  type JsonRpcNotification,
  type JsonRpcRequest,
  type JsonRpcResponse,
  type ToolCallResult,
  type ToolDefinition
} from '../mcp/protocol.js';
import type { ToolServerDefinition } from '../tools/definitions.js';
import type { ClientState, ConnectionFactory, HandshakeResult, ToolServerConnection } from './connection.js';
import { ProcessTransport } from './process-transport.js';
import {
  CLIENT_INFO,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_STOP_GRACE_MS,
  SUPPORTED_PROTOCOL_VERSIONS
} from './protocol-constants.js';

export interface StdioToolClientConfig {
  serverId: string;
  command: readonly string[];
  cwd?: string;
  env?: Readonly<Record<string, string>>;
  protocolVersions?: readonly string[];
  requestTimeoutMs?: number;
  stopGraceMs?: number;
  logger?: Logger;
}

const MAX_LOGGED_LINE_CHARS = 300;

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * JSON-RPC client for one tool server subprocess. Requests are matched to
 * responses by id only; anything else the server prints is skipped.
 */
export class StdioToolClient implements ToolServerConnection {
  readonly serverId: string;

  private readonly config: StdioToolClientConfig;
  private readonly logger: Logger;
  private transport: ProcessTransport | null = null;
  private currentState: ClientState = 'uninitialized';
  private nextRequestId = 1;
  private generation = 0;
  private negotiatedVersion: string | null = null;
  private lastStartupError: string | null = null;
  private queue: Promise<void> = Promise.resolve();

  constructor(config: StdioToolClientConfig) {
    this.serverId = config.serverId;
    this.config = config;
    this.logger = (config.logger ?? silentLogger).child({ component: 'StdioToolClient', serverId: config.serverId });
  }

  get state(): ClientState {
    return this.currentState;
  }

  get initialized(): boolean {
    return this.currentState === 'ready';
  }

  get protocolVersion(): string | null {
    return this.negotiatedVersion;
  }

  get startupError(): string | null {
    return this.lastStartupError;
  }

  get pid(): number | undefined {
    return this.transport?.pid;
  }

  isAlive(): boolean {
    return this.transport?.isAlive() ?? false;
  }

  private get requestTimeoutMs(): number {
    return this.config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async start(): Promise<HandshakeResult> {
    if (this.currentState === 'initializing' || this.currentState === 'ready') {
      throw new ClientStateError(`Tool server ${this.serverId} is already ${this.currentState}`);
    }
    if (this.currentState === 'failed') {
      throw new ClientStateError(
        `Tool server ${this.serverId} failed (${this.lastStartupError ?? 'unknown error'}); stop() it before starting again`
      );
    }

    const generation = this.generation;
    const transport = new ProcessTransport(this.logger);
    this.transport = transport;
    this.currentState = 'initializing';
    this.lastStartupError = null;
    this.nextRequestId = 1;

    try {
      await transport.start({ command: this.config.command, cwd: this.config.cwd, env: this.config.env });
    } catch (error) {
      if (generation !== this.generation) throw this.stoppedDuringStart([], error);
      this.transport = null;
      this.currentState = 'failed';
      this.lastStartupError = describe(error);
      throw error;
    }

    const attempted: string[] = [];
    for (const version of this.config.protocolVersions ?? SUPPORTED_PROTOCOL_VERSIONS) {
      if (generation !== this.generation) throw this.stoppedDuringStart(attempted);
      attempted.push(version);

      let response: JsonRpcResponse;
      try {
        response = await this.request(transport, 'initialize', {
          protocolVersion: version,
          capabilities: {},
          clientInfo: CLIENT_INFO
        });
      } catch (error) {
        if (generation !== this.generation) throw this.stoppedDuringStart(attempted, error);
        const message = `Tool server ${this.serverId} failed during initialize: ${describe(error)}`;
        await this.fail(transport, message);
        throw new HandshakeError(message, attempted, { cause: error });
      }

      if ('error' in response) {
        this.logger.debug({ version, error: response.error }, 'protocol version rejected');
        continue;
      }

      const result = isRecord(response.result) ? response.result : {};
      const protocolVersion = typeof result.protocolVersion === 'string' ? result.protocolVersion : version;
      const serverInfo =
        isRecord(result.serverInfo) && typeof result.serverInfo.name === 'string'
          ? {
              name: result.serverInfo.name,
              ...(typeof result.serverInfo.version === 'string' ? { version: result.serverInfo.version } : {})
            }
          : { name: this.serverId };

      try {
        const initialized: JsonRpcNotification = { jsonrpc: '2.0', method: 'notifications/initialized' };
        await transport.writeLine(JSON.stringify(initialized));
      } catch (error) {
        if (generation !== this.generation) throw this.stoppedDuringStart(attempted, error);
        const message = `Tool server ${this.serverId} closed before initialization completed: ${describe(error)}`;
        await this.fail(transport, message);
        throw new HandshakeError(message, attempted, { cause: error });
      }

      if (generation !== this.generation) throw this.stoppedDuringStart(attempted);
      this.negotiatedVersion = protocolVersion;
      this.currentState = 'ready';
      this.logger.info({ protocolVersion, serverInfo }, 'tool server ready');
      return { protocolVersion, serverInfo };
    }

    const message = `Tool server ${this.serverId} accepted no protocol version (tried ${attempted.join(', ')})`;
    await this.fail(transport, message);
    throw new HandshakeError(message, attempted);
  }

  callTool(name: string, args: Record<string, unknown>): Promise<ToolCallResult> {
    return this.exclusive(async () => {
      const transport = this.requireReady();
      const response = await this.guardedRequest(transport, 'tools/call', { name, arguments: args });
      if ('error' in response) {
        throw new ProtocolError(response.error);
      }
      return toToolCallResult(response.result);
    });
  }

  listTools(): Promise<ToolDefinition[]> {
    return this.exclusive(async () => {
      const transport = this.requireReady();
      const response = await this.guardedRequest(transport, 'tools/list', {});
      if ('error' in response) {
        throw new ProtocolError(response.error);
      }
      const tools = isRecord(response.result) && Array.isArray(response.result.tools) ? response.result.tools : [];
      return tools.filter(isRecord).flatMap((tool): ToolDefinition[] =>
        typeof tool.name === 'string'
          ? [
              {
                name: tool.name,
                ...(typeof tool.description === 'string' ? { description: tool.description } : {}),
                inputSchema: isRecord(tool.inputSchema) ? tool.inputSchema : { type: 'object' }
              }
            ]
          : []
      );
    });
  }

  async stop(): Promise<void> {
    this.generation += 1;
    const transport = this.transport;
    this.transport = null;
    this.nextRequestId = 1;
    this.negotiatedVersion = null;
    this.currentState = 'stopped';
    if (transport) {
      await transport.terminate(this.config.stopGraceMs ?? DEFAULT_STOP_GRACE_MS);
    }
  }

  private requireReady(): ProcessTransport {
    if (this.currentState !== 'ready' || !this.transport) {
      throw new ClientStateError(`Tool server ${this.serverId} is not ready (state: ${this.currentState})`);
    }
    return this.transport;
  }

  private async guardedRequest(transport: ProcessTransport, method: string, params: unknown): Promise<JsonRpcResponse> {
    try {
      return await this.request(transport, method, params);
    } catch (error) {
      if (isTransportFailure(error) && this.transport === transport) {
        this.logger.warn({ method, err: error }, 'tool server transport failed');
        await this.fail(transport, describe(error));
      }
      throw error;
    }
  }

  /**
   * Writes one request and reads until the response with the same id shows
   * up. All reads share one deadline so a chatty server cannot stall the
   * caller past `requestTimeoutMs`.
   */
  private async request(transport: ProcessTransport, method: string, params: unknown): Promise<JsonRpcResponse> {
    const id = this.nextRequestId++;
    const timeoutMs = this.requestTimeoutMs;
    const deadline = Date.now() + timeoutMs;

    const message: JsonRpcRequest = { jsonrpc: '2.0', id, method, params };
    await transport.writeLine(JSON.stringify(message));

    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) throw new ReadTimeoutError(timeoutMs);

      let line: string;
      try {
        line = await transport.readLine(remaining);
      } catch (error) {
        if (error instanceof ReadTimeoutError) throw new ReadTimeoutError(timeoutMs);
        throw error;
      }

      const response = parseResponseLine(line);
      if (response && response.id === id) return response;
      this.logger.trace({ id, line: line.slice(0, MAX_LOGGED_LINE_CHARS) }, 'skipping unmatched line');
    }
  }

  private async fail(transport: ProcessTransport, message: string): Promise<void> {
    this.currentState = 'failed';
    this.lastStartupError = message;
    await transport.terminate(0);
  }

  private stoppedDuringStart(attempted: string[], cause?: unknown): HandshakeError {
    return new HandshakeError(`Tool server ${this.serverId} was stopped during initialization`, attempted, { cause });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

export interface StdioConnectionOptions {
  requestTimeoutMs?: number;
  stopGraceMs?: number;
  logger?: Logger;
}

export function createStdioConnectionFactory(options: StdioConnectionOptions = {}): ConnectionFactory {
  return (server: ToolServerDefinition) =>
    new StdioToolClient({
      serverId: server.id,
      command: server.command,
      cwd: server.workingDirectoryHint || undefined,
      env: server.env,
      requestTimeoutMs: options.requestTimeoutMs,
      stopGraceMs: options.stopGraceMs,
      logger: options.logger
    });
}
