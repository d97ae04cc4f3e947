import type { ToolDefinition } from '../mcp/protocol.js';
import { PERMISSIVE_INPUT_SCHEMA, TOOL_CATALOG } from './catalog.js';
import type { ToolServerDefinition } from './definitions.js';

export interface ResolvedTool {
  toolName: string;
  server: ToolServerDefinition;
  descriptor: ToolDefinition;
}

export interface ModelTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface ToolRegistryOptions {
  defaultEnabledServerIds?: readonly string[];
}

/**
 * Maps model-visible tool names to the server that serves them. When two
 * servers list the same tool, the first one registered wins.
 */
export class ToolRegistry {
  private readonly servers = new Map<string, ToolServerDefinition>();
  private readonly tools = new Map<string, ResolvedTool>();
  private readonly defaultEnabled: readonly string[];

  constructor(servers: readonly ToolServerDefinition[], options: ToolRegistryOptions = {}) {
    const catalog = new Map(TOOL_CATALOG.map((descriptor) => [descriptor.name, descriptor]));
    for (const server of servers) {
      this.servers.set(server.id, server);
      for (const toolName of server.toolNames) {
        if (this.tools.has(toolName)) continue;
        const descriptor = catalog.get(toolName) ?? {
          name: toolName,
          description: `${toolName} (served by ${server.displayName})`,
          inputSchema: PERMISSIVE_INPUT_SCHEMA
        };
        this.tools.set(toolName, { toolName, server, descriptor });
      }
    }
    this.defaultEnabled = options.defaultEnabledServerIds ?? [];
  }

  resolve(toolName: string): ResolvedTool | null {
    return this.tools.get(toolName) ?? null;
  }

  server(id: string): ToolServerDefinition | null {
    return this.servers.get(id) ?? null;
  }

  listServers(): ToolServerDefinition[] {
    return [...this.servers.values()];
  }

  isEnabledByDefault(id: string): boolean {
    return this.resolveEnabledServerIds(undefined).includes(id);
  }

  modelTools(enabledServerIds: readonly string[]): ModelTool[] {
    const enabled = new Set(enabledServerIds);
    return [...this.tools.values()]
      .filter((tool) => enabled.has(tool.server.id))
      .map((tool): ModelTool => ({
        type: 'function',
        function: {
          name: tool.toolName,
          description: tool.descriptor.description ?? tool.toolName,
          parameters: tool.descriptor.inputSchema
        }
      }));
  }

  /**
   * Known ids only, without duplicates, in request order. `undefined` means
   * "use the defaults": the configured list, or else every server marked
   * enabled by default.
   */
  resolveEnabledServerIds(requested: readonly string[] | undefined): string[] {
    const ids =
      requested ??
      (this.defaultEnabled.length > 0
        ? this.defaultEnabled
        : this.listServers()
            .filter((server) => server.defaultEnabled)
            .map((server) => server.id));
    return [...new Set(ids.map((id) => id.trim()).filter((id) => this.servers.has(id)))];
  }
}
