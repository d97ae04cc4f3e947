import type { BuiltinToolCall } from '../tools/arguments.js';
import { coerceText } from '../tools/coerce.js';
import type { ConversationContext, Intent } from './context.js';

export interface DetectorEnv {
  now: number;
  followUpWindowMs: number;
  enabledServerIds: readonly string[];
}

/** The fixed tool calls that resolve one detected intent. */
export interface RoutePlan {
  intent: Intent;
  calls: BuiltinToolCall[];
}

export interface Detector {
  intent: Intent;
  match(message: string, context: ConversationContext, env: DetectorEnv): RoutePlan | null;
}

const DETAILS_REQUEST =
  /^(?:please |ok |okay )?(?:(?:can you |could you )?show(?: me)?(?: the)? details|more details|details|details please|list them|break it down)(?: please)?$/;
const HSA_DOMAIN = /\b(?:hsa|balance|unreimbursed|reimburse(?:d|ment|ments)?|medical expenses?)\b/i;
const CHARITABLE_DOMAIN = /\b(?:charit(?:y|ies|able)|donat(?:e|ed|ion|ions)|giving|tithes?)\b/i;
const BALANCE_QUERY =
  /\b(?:balance|unreimbursed|waiting\b.{0,20}\breimburs\w*|hsa\b.{0,20}\b(?:money|amount|total)|how much\b.{0,30}\b(?:reimburs\w*|owed|hsa))\b/i;
const SUMMARY_WORD = /\b(?:summary|summari[sz]e|totals?|how much|overview|breakdown)\b/i;
const HOW_TO = /\b(?:how (?:do|does|can|should|to)|why|explain|what is an? )/i;
const ACTION = /\b(?:upload|import|append|mark|update|delete|remove|record|log)\b/i;
const YEAR = /\b(20\d{2})\b/;
const PLUS_OPERANDS = /(-?\d+(?:\.\d+)?)\s*\+\s*(-?\d+(?:\.\d+)?)/;
const ADD_OPERANDS = /\badd\s+(-?\d+(?:\.\d+)?)\s+(?:and|to)\s+(-?\d+(?:\.\d+)?)\b/i;
const EXPLICIT_ADDITION = /addition tool|tool server|add_numbers/i;

export function normalizeMessage(message: string): string {
  return message
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function isDetailsRequest(message: string): boolean {
  return DETAILS_REQUEST.test(normalizeMessage(message));
}

export function extractYear(message: string): string | undefined {
  return YEAR.exec(message)?.[1];
}

export function extractAdditionOperands(message: string): [number, number] | null {
  const match = PLUS_OPERANDS.exec(message) ?? ADD_OPERANDS.exec(message);
  if (!match?.[1] || !match[2]) return null;
  return [Number(match[1]), Number(match[2])];
}

function isQuestionAboutData(message: string): boolean {
  return !HOW_TO.test(message) && !ACTION.test(message);
}

function followUp(parent: Intent, context: ConversationContext, env: DetectorEnv) {
  if (context.lastIntent !== parent) return null;
  return context.recent(parent, env.now, env.followUpWindowMs);
}

export const charitableDetailsDetector: Detector = {
  intent: 'charitable_details',
  match(message, context, env) {
    if (!isDetailsRequest(message)) return null;
    const parent = followUp('charitable_summary', context, env);
    if (!parent) return null;
    const taxYear = coerceText(parent.payload.tax_year);
    return {
      intent: 'charitable_details',
      calls: [{ kind: 'read_charitable_ledger_entries', args: taxYear ? { tax_year: taxYear } : {} }]
    };
  }
};

export const balanceDetailsDetector: Detector = {
  intent: 'balance_details',
  match(message, context, env) {
    if (!isDetailsRequest(message) || !followUp('balance_query', context, env)) return null;
    return {
      intent: 'balance_details',
      calls: [{ kind: 'read_ledger_entries', args: { status_filter: 'unreimbursed' } }]
    };
  }
};

export const dualSummaryDetector: Detector = {
  intent: 'dual_summary',
  match(message) {
    if (!HSA_DOMAIN.test(message) || !CHARITABLE_DOMAIN.test(message) || !isQuestionAboutData(message)) return null;
    const taxYear = extractYear(message);
    return {
      intent: 'dual_summary',
      calls: [
        { kind: 'get_unreimbursed_balance', args: {} },
        { kind: 'get_charitable_summary', args: taxYear ? { tax_year: taxYear } : {} }
      ]
    };
  }
};

export const balanceQueryDetector: Detector = {
  intent: 'balance_query',
  match(message) {
    if (!BALANCE_QUERY.test(message) || CHARITABLE_DOMAIN.test(message) || !isQuestionAboutData(message)) return null;
    return { intent: 'balance_query', calls: [{ kind: 'get_unreimbursed_balance', args: {} }] };
  }
};

export const charitableSummaryDetector: Detector = {
  intent: 'charitable_summary',
  match(message) {
    if (!CHARITABLE_DOMAIN.test(message) || !SUMMARY_WORD.test(message) || !isQuestionAboutData(message)) return null;
    const taxYear = extractYear(message);
    return {
      intent: 'charitable_summary',
      calls: [{ kind: 'get_charitable_summary', args: taxYear ? { tax_year: taxYear } : {} }]
    };
  }
};

export const arithmeticDetector: Detector = {
  intent: 'arithmetic',
  match(message, _context, env) {
    if (!env.enabledServerIds.includes('test_addition') && !EXPLICIT_ADDITION.test(message)) return null;
    const operands = extractAdditionOperands(message);
    if (!operands) return null;
    const [a, b] = operands;
    return { intent: 'arithmetic', calls: [{ kind: 'add_numbers', args: { a, b } }] };
  }
};

/** Priority order: follow-ups first, and "both" before either single domain. */
export const DETECTORS: readonly Detector[] = [
  charitableDetailsDetector,
  balanceDetailsDetector,
  dualSummaryDetector,
  balanceQueryDetector,
  charitableSummaryDetector,
  arithmeticDetector
];
