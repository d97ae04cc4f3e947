import type { Logger } from 'pino';
import { ToolServerArena } from '../connectors/arena.js';
import type { ConnectionFactory } from '../connectors/connection.js';
import { silentLogger } from '../logger.js';
import { ToolSubstrateError } from '../mcp/error-mapper.js';
import type { ToolCallResult } from '../mcp/protocol.js';
import { wireArguments, type BuiltinToolCall } from '../tools/arguments.js';
import { coerceNumber } from '../tools/coerce.js';
import type { ToolServerDefinition } from '../tools/definitions.js';
import type { ToolRegistry } from '../tools/registry.js';
import { DEFAULT_FOLLOW_UP_WINDOW_MS, type ConversationContext, type Intent } from './context.js';
import { DETECTORS, type Detector, type RoutePlan } from './detectors.js';
import {
  formatBalance,
  formatCharitableEntries,
  formatCharitableSummary,
  formatLedgerEntries,
  formatPlainNumber
} from './formatters.js';

export interface ToolCallRecord {
  serverId: string;
  toolName: string;
  input: Record<string, unknown>;
  output: string;
}

export interface RouterResolution {
  intent: Intent;
  response: string;
  toolsCalled: ToolCallRecord[];
}

export interface DeterministicRouterOptions {
  registry: ToolRegistry;
  connectionFactory: ConnectionFactory;
  followUpWindowMs?: number;
  detectors?: readonly Detector[];
  now?: () => number;
  logger?: Logger;
}

interface PlannedCall {
  call: BuiltinToolCall;
  server: ToolServerDefinition;
}

interface CallOutcome {
  call: BuiltinToolCall;
  payload: Record<string, unknown> | null;
  record: ToolCallRecord;
  error: string | null;
}

const PURPOSE_BY_INTENT: Record<Intent, string> = {
  balance_query: 'look up your HSA balance',
  balance_details: 'list your unreimbursed expenses',
  charitable_summary: 'summarize your donations',
  charitable_details: 'list your donations',
  dual_summary: 'summarize your HSA balance and donations',
  arithmetic: 'add numbers'
};

/**
 * Resolves messages that match a known shape with a fixed set of tool
 * calls, without asking the model. Returns `null` when nothing matches.
 */
export class DeterministicRouter {
  private readonly registry: ToolRegistry;
  private readonly factory: ConnectionFactory;
  private readonly followUpWindowMs: number;
  private readonly detectors: readonly Detector[];
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: DeterministicRouterOptions) {
    this.registry = options.registry;
    this.factory = options.connectionFactory;
    this.followUpWindowMs = options.followUpWindowMs ?? DEFAULT_FOLLOW_UP_WINDOW_MS;
    this.detectors = options.detectors ?? DETECTORS;
    this.now = options.now ?? Date.now;
    this.logger = (options.logger ?? silentLogger).child({ component: 'DeterministicRouter' });
  }

  detect(message: string, context: ConversationContext): RoutePlan | null {
    const env = {
      now: this.now(),
      followUpWindowMs: this.followUpWindowMs,
      enabledServerIds: context.enabledToolServerIds
    };
    for (const detector of this.detectors) {
      const plan = detector.match(message, context, env);
      if (plan) return plan;
    }
    return null;
  }

  async tryResolve(message: string, context: ConversationContext): Promise<RouterResolution | null> {
    const plan = this.detect(message, context);
    if (!plan) return null;
    this.logger.debug({ intent: plan.intent }, 'deterministic route matched');

    const planned: PlannedCall[] = [];
    for (const call of plan.calls) {
      const resolved = this.registry.resolve(call.kind);
      if (!resolved || !context.enabledToolServerIds.includes(resolved.server.id)) {
        return { intent: plan.intent, response: this.disabledExplanation(plan.intent, resolved?.server), toolsCalled: [] };
      }
      planned.push({ call, server: resolved.server });
    }

    const arena = new ToolServerArena(this.factory, this.logger);
    let outcomes: CallOutcome[];
    try {
      outcomes = await Promise.all(planned.map((item) => this.execute(arena, item)));
    } finally {
      await arena.closeAll();
    }

    const toolsCalled = outcomes.map((outcome) => outcome.record);
    const failed = outcomes.find((outcome) => outcome.error !== null);
    if (failed) {
      return {
        intent: plan.intent,
        response: `I tried to ${PURPOSE_BY_INTENT[plan.intent]}, but the ${failed.call.kind} tool failed: ${failed.error}`,
        toolsCalled
      };
    }

    const payloads = outcomes.map((outcome) => outcome.payload ?? {});
    return { intent: plan.intent, response: this.respond(plan, payloads, context), toolsCalled };
  }

  private async execute(arena: ToolServerArena, { call, server }: PlannedCall): Promise<CallOutcome> {
    const input = wireArguments(call);
    const base = { serverId: server.id, toolName: call.kind, input };
    try {
      const connection = await arena.acquire(server);
      const result = await connection.callTool(call.kind, input);
      const error = failureOf(result);
      if (error) {
        this.logger.warn({ serverId: server.id, toolName: call.kind, error }, 'tool reported failure');
        return { call, payload: null, record: { ...base, output: `error: ${error}` }, error };
      }
      return { call, payload: result.structuredPayload ?? {}, record: { ...base, output: result.displaySummary }, error: null };
    } catch (error) {
      if (!(error instanceof ToolSubstrateError)) throw error;
      this.logger.warn({ serverId: server.id, toolName: call.kind, err: error }, 'tool call failed');
      return { call, payload: null, record: { ...base, output: `error: ${error.message}` }, error: error.message };
    }
  }

  /** Formats the answer and records the results; only reached when every call succeeded. */
  private respond(plan: RoutePlan, payloads: Record<string, unknown>[], context: ConversationContext): string {
    const now = this.now();
    const [first = {}, second = {}] = payloads;

    switch (plan.intent) {
      case 'balance_query':
        context.record('balance_query', first, now);
        return formatBalance(first);
      case 'balance_details':
        context.record('balance_details', first, now);
        return formatLedgerEntries(first);
      case 'charitable_summary':
        context.record('charitable_summary', withRequestedYear(first, plan.calls[0]), now);
        return formatCharitableSummary(first);
      case 'charitable_details':
        context.record('charitable_details', first, now);
        return formatCharitableEntries(first);
      case 'dual_summary': {
        const charitable = withRequestedYear(second, plan.calls[1]);
        context.record('balance_query', first, now);
        context.record('charitable_summary', charitable, now);
        context.record('dual_summary', { balance: first, charitable }, now);
        return `${formatBalance(first)}\n\n${formatCharitableSummary(second)}`;
      }
      case 'arithmetic': {
        context.record('arithmetic', first, now);
        return this.formatAddition(plan.calls[0], first);
      }
    }
  }

  private formatAddition(call: BuiltinToolCall | undefined, payload: Record<string, unknown>): string {
    if (!call || call.kind !== 'add_numbers') return 'The addition tool returned no result.';
    const { a, b } = call.args;
    const sum = coerceNumber(payload.sum) ?? a + b;
    return `Using your addition tool: ${formatPlainNumber(a)} + ${formatPlainNumber(b)} = ${formatPlainNumber(sum)}`;
  }

  private disabledExplanation(intent: Intent, server: ToolServerDefinition | undefined): string {
    if (!server) return `I can't ${PURPOSE_BY_INTENT[intent]} because no tool server provides that tool.`;
    return `I can't ${PURPOSE_BY_INTENT[intent]} because the ${server.displayName} tool server is turned off for this chat. Enable it and ask again.`;
  }
}

function failureOf(result: ToolCallResult): string | null {
  if (result.isError) return result.displaySummary || 'the tool reported an error';
  const payload = result.structuredPayload;
  if (payload?.success === false) {
    return typeof payload.error === 'string' && payload.error ? payload.error : 'the tool reported an error';
  }
  return null;
}

// Summary payloads do not always echo the year that was asked for; follow-ups need it.
function withRequestedYear(payload: Record<string, unknown>, call: BuiltinToolCall | undefined): Record<string, unknown> {
  if (payload.tax_year !== undefined && payload.tax_year !== null) return payload;
  if (!call || call.kind !== 'get_charitable_summary' || !call.args.tax_year) return payload;
  return { ...payload, tax_year: call.args.tax_year };
}
