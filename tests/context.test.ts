import { describe, expect, it } from 'vitest';
import { ConversationContext, DEFAULT_FOLLOW_UP_WINDOW_MS } from '../src/chat/context.js';

const MINUTE = 60 * 1000;
const T0 = Date.UTC(2026, 0, 15, 12, 0, 0);

describe('ConversationContext', () => {
  it('keeps results inside the follow-up window', () => {
    const context = new ConversationContext(['hsa_ledger']);
    context.record('balance_query', { total_unreimbursed: 10 }, T0);

    expect(context.lastIntent).toBe('balance_query');
    expect(context.recent('balance_query', T0 + 29 * MINUTE)?.payload).toEqual({ total_unreimbursed: 10 });
    expect(context.recent('balance_query', T0 + DEFAULT_FOLLOW_UP_WINDOW_MS)).not.toBeNull();
    expect(context.recent('balance_query', T0 + 31 * MINUTE)).toBeNull();
    expect(context.recent('charitable_summary', T0)).toBeNull();
  });

  it('ignores entries stamped in the future', () => {
    const context = new ConversationContext();
    context.record('arithmetic', { sum: 4 }, T0);
    expect(context.recent('arithmetic', T0 - 1)).toBeNull();
  });

  it('maps tool results to intents', () => {
    const context = new ConversationContext();
    expect(context.recordToolResult('read_ledger_entries', { entries: [] }, T0)).toBe('balance_details');
    expect(context.lastIntent).toBe('balance_details');
    expect(context.recordToolResult('update_expense_status', { success: true }, T0)).toBeNull();
    expect(context.lastIntent).toBe('balance_details');
  });

  it('clears intents on reset but keeps the enabled servers', () => {
    const context = new ConversationContext(['test_addition']);
    context.record('arithmetic', { sum: 4 }, T0);
    context.reset();
    expect(context.lastIntent).toBeNull();
    expect(context.lastResultByIntent.size).toBe(0);
    expect(context.enabledToolServerIds).toEqual(['test_addition']);
  });
});
