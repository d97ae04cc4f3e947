export type Intent =
  | 'balance_query'
  | 'balance_details'
  | 'charitable_summary'
  | 'charitable_details'
  | 'dual_summary'
  | 'arithmetic';

export interface IntentResult {
  timestamp: number;
  payload: Record<string, unknown>;
}

export const DEFAULT_FOLLOW_UP_WINDOW_MS = 30 * 60 * 1000;

/** Intent recorded when the model itself calls one of these tools. */
export const INTENT_BY_TOOL: Readonly<Record<string, Intent>> = {
  get_unreimbursed_balance: 'balance_query',
  read_ledger_entries: 'balance_details',
  get_charitable_summary: 'charitable_summary',
  read_charitable_ledger_entries: 'charitable_details',
  add_numbers: 'arithmetic'
};

/**
 * Per-session state read by follow-up detectors. Only successful tool
 * results are recorded.
 */
export class ConversationContext {
  lastIntent: Intent | null = null;
  readonly lastResultByIntent = new Map<Intent, IntentResult>();
  enabledToolServerIds: string[];

  constructor(enabledToolServerIds: readonly string[] = []) {
    this.enabledToolServerIds = [...enabledToolServerIds];
  }

  record(intent: Intent, payload: Record<string, unknown>, now: number = Date.now()): void {
    this.lastIntent = intent;
    this.lastResultByIntent.set(intent, { timestamp: now, payload });
  }

  /** Entry for `intent` if it is at most `windowMs` old. */
  recent(intent: Intent, now: number = Date.now(), windowMs: number = DEFAULT_FOLLOW_UP_WINDOW_MS): IntentResult | null {
    const entry = this.lastResultByIntent.get(intent);
    if (!entry) return null;
    const age = now - entry.timestamp;
    return age >= 0 && age <= windowMs ? entry : null;
  }

  recordToolResult(toolName: string, payload: Record<string, unknown>, now: number = Date.now()): Intent | null {
    const intent = INTENT_BY_TOOL[toolName];
    if (!intent) return null;
    this.record(intent, payload, now);
    return intent;
  }

  reset(): void {
    this.lastIntent = null;
    this.lastResultByIntent.clear();
  }
}
