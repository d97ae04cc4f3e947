import type { Logger } from 'pino';
import { ToolServerArena } from '../connectors/arena.js';
import type { ConnectionFactory } from '../connectors/connection.js';
import type { ChatMessage, LanguageModel, ModelToolCall, WireToolCall } from '../llm/types.js';
import { silentLogger } from '../logger.js';
import {
  ErrorCode,
  ToolSubstrateError,
  isTransportFailure,
  type ToolFailurePayload
} from '../mcp/error-mapper.js';
import { normalizeArguments, wireArguments } from '../tools/arguments.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { ConversationContext } from './context.js';
import type { ToolCallRecord } from './intent-router.js';

export const DEFAULT_MAX_ROUNDS = 4;

export const ROUND_LIMIT_MESSAGE =
  'I reached the tool-calling limit for this request before finishing. Please try again, or ask a narrower question.';

export interface OrchestrationLoopOptions {
  model: LanguageModel;
  registry: ToolRegistry;
  connectionFactory: ConnectionFactory;
  maxRounds?: number;
  now?: () => number;
  logger?: Logger;
}

export interface LoopOutcome {
  response: string;
  toolsCalled: ToolCallRecord[];
  rounds: number;
  terminatedBy: 'answer' | 'round_limit';
  messages: ChatMessage[];
}

interface ToolExecution {
  content: string;
  record: ToolCallRecord;
}

function toWireToolCall(call: ModelToolCall): WireToolCall {
  return {
    id: call.id,
    type: 'function',
    function: {
      name: call.name,
      arguments: typeof call.arguments === 'string' ? call.arguments : JSON.stringify(call.arguments ?? {})
    }
  };
}

/**
 * Model/tool mediation for one request. Every tool server started during a
 * run is stopped before `run` settles, however it ends.
 */
export class OrchestrationLoop {
  private readonly model: LanguageModel;
  private readonly registry: ToolRegistry;
  private readonly factory: ConnectionFactory;
  private readonly maxRounds: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: OrchestrationLoopOptions) {
    this.model = options.model;
    this.registry = options.registry;
    this.factory = options.connectionFactory;
    this.maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    this.now = options.now ?? Date.now;
    this.logger = (options.logger ?? silentLogger).child({ component: 'OrchestrationLoop' });
  }

  async run(initialMessages: readonly ChatMessage[], context: ConversationContext): Promise<LoopOutcome> {
    const messages = [...initialMessages];
    const toolsCalled: ToolCallRecord[] = [];
    const tools = this.registry.modelTools(context.enabledToolServerIds);
    const arena = new ToolServerArena(this.factory, this.logger);

    try {
      for (let round = 1; round <= this.maxRounds; round += 1) {
        const reply = await this.model.complete({ messages, tools });
        if (reply.toolCalls.length === 0) {
          return { response: reply.content ?? '', toolsCalled, rounds: round, terminatedBy: 'answer', messages };
        }

        messages.push({ role: 'assistant', content: reply.content, tool_calls: reply.toolCalls.map(toWireToolCall) });
        for (const call of reply.toolCalls) {
          const execution = await this.execute(arena, call, context);
          messages.push({ role: 'tool', tool_call_id: call.id, content: execution.content });
          toolsCalled.push(execution.record);
        }
        this.logger.debug({ round, toolCalls: reply.toolCalls.length }, 'tool round completed');
      }

      this.logger.warn({ maxRounds: this.maxRounds }, 'tool-calling round limit reached');
      return { response: ROUND_LIMIT_MESSAGE, toolsCalled, rounds: this.maxRounds, terminatedBy: 'round_limit', messages };
    } finally {
      await arena.closeAll();
    }
  }

  private async execute(arena: ToolServerArena, call: ModelToolCall, context: ConversationContext): Promise<ToolExecution> {
    const resolved = this.registry.resolve(call.name);
    if (!resolved || !context.enabledToolServerIds.includes(resolved.server.id)) {
      return this.failure(call, resolved?.server.id ?? '', {}, {
        success: false,
        error: `Unknown or disabled tool: ${call.name}`,
        code: ErrorCode.UnknownTool
      });
    }

    const serverId = resolved.server.id;
    const normalized = normalizeArguments(call.name, call.arguments);
    if (normalized.kind === 'invalid') {
      return this.failure(call, serverId, {}, {
        success: false,
        error: `Invalid arguments for ${call.name}: ${normalized.reason}`,
        code: ErrorCode.InvalidArguments
      });
    }

    const input = wireArguments(normalized);
    // Start failures are not tool results; they propagate to the caller.
    const connection = await arena.acquire(resolved.server);

    try {
      const result = await connection.callTool(call.name, input);
      const payload = result.structuredPayload;
      if (!result.isError && payload?.success !== false) {
        context.recordToolResult(call.name, payload ?? {}, this.now());
      }
      return { content: result.rawText, record: { serverId, toolName: call.name, input, output: result.displaySummary } };
    } catch (error) {
      if (!(error instanceof ToolSubstrateError)) throw error;
      if (isTransportFailure(error)) {
        await arena.discard(serverId);
      }
      return this.failure(call, serverId, input, error.toFailurePayload());
    }
  }

  private failure(call: ModelToolCall, serverId: string, input: Record<string, unknown>, payload: ToolFailurePayload): ToolExecution {
    this.logger.warn({ serverId, toolName: call.name, code: payload.code, error: payload.error }, 'tool call failed');
    return {
      content: JSON.stringify(payload),
      record: { serverId, toolName: call.name, input, output: `error: ${payload.error}` }
    };
  }
}
