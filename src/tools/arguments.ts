import { z } from 'zod';
import {
  coerceArgumentObject,
  coerceArray,
  coerceBoolean,
  coerceEnum,
  coerceInteger,
  coerceNumber,
  coerceObject,
  coerceText
} from './coerce.js';

export const REIMBURSEMENT_STATUSES = ['reimbursed', 'unreimbursed', 'not_hsa_eligible'] as const;
export const FILTER_OPERATORS = [
  'equals',
  'not_equals',
  'contains',
  'starts_with',
  'ends_with',
  'in',
  'gt',
  'gte',
  'lt',
  'lte'
] as const;

export type ReimbursementStatus = (typeof REIMBURSEMENT_STATUSES)[number];
export type FilterOperator = (typeof FILTER_OPERATORS)[number];

const optionalInteger = z.preprocess(coerceInteger, z.number().int().optional()).catch(undefined);
const optionalPositiveInteger = z.preprocess(coerceInteger, z.number().int().positive().optional()).catch(undefined);
const optionalText = z.preprocess(coerceText, z.string().optional());
const optionalBoolean = z.preprocess(coerceBoolean, z.boolean().optional());
const optionalStatus = z.preprocess(coerceEnum(REIMBURSEMENT_STATUSES), z.enum(REIMBURSEMENT_STATUSES).optional());

const columnFilterSchema = z.object({
  column: z.preprocess(coerceText, z.string()),
  operator: z.preprocess(coerceEnum(FILTER_OPERATORS), z.enum(FILTER_OPERATORS).default('equals')),
  value: z.unknown().refine((value) => value !== undefined && value !== null, 'value is required'),
  case_sensitive: optionalBoolean
});

export type ColumnFilter = z.infer<typeof columnFilterSchema>;

// Invalid filters are dropped one by one; an empty list is omitted.
function coerceColumnFilters(value: unknown): ColumnFilter[] | undefined {
  const items = coerceArray(value) ?? (coerceObject(value) ? [value] : undefined);
  if (!items) return undefined;
  const filters = items.flatMap((item) => {
    const result = columnFilterSchema.safeParse(coerceObject(item));
    return result.success ? [result.data] : [];
  });
  return filters.length > 0 ? filters : undefined;
}

const optionalColumnFilters = z.preprocess(coerceColumnFilters, z.array(columnFilterSchema).optional());

function toolCall<K extends string, S extends z.ZodRawShape>(kind: K, shape: S) {
  return z.object({ kind: z.literal(kind), args: z.object(shape) });
}

const builtinToolCallSchema = z.discriminatedUnion('kind', [
  toolCall('get_unreimbursed_balance', {}),
  toolCall('read_ledger_entries', {
    year: optionalInteger,
    status_filter: optionalStatus,
    limit: optionalPositiveInteger,
    column_filters: optionalColumnFilters
  }),
  toolCall('update_expense_status', {
    expense_id: z.preprocess(coerceText, z.string({ required_error: 'is required' })),
    new_status: z.preprocess(
      coerceEnum(REIMBURSEMENT_STATUSES),
      z.enum(REIMBURSEMENT_STATUSES, { required_error: `must be one of ${REIMBURSEMENT_STATUSES.join(', ')}` })
    ),
    reimbursement_date: optionalText
  }),
  toolCall('check_for_duplicates', {
    expense_json: z.preprocess(coerceObject, z.record(z.unknown(), { required_error: 'must be an object' })),
    fuzzy_days: z.preprocess(coerceInteger, z.number().int().nonnegative().optional()).catch(undefined)
  }),
  toolCall('get_charitable_summary', {
    tax_year: optionalText,
    column_filters: optionalColumnFilters
  }),
  toolCall('read_charitable_ledger_entries', {
    tax_year: optionalText,
    organization: optionalText,
    tax_deductible: optionalBoolean,
    limit: optionalPositiveInteger,
    column_filters: optionalColumnFilters
  }),
  toolCall('add_numbers', {
    a: z.preprocess(coerceNumber, z.number({ required_error: 'must be a number' })),
    b: z.preprocess(coerceNumber, z.number({ required_error: 'must be a number' }))
  })
]);

export type BuiltinToolCall = z.infer<typeof builtinToolCallSchema>;
export type BuiltinToolName = BuiltinToolCall['kind'];

export interface PassthroughToolCall {
  kind: 'passthrough';
  toolName: string;
  args: Record<string, unknown>;
}

export interface InvalidToolCall {
  kind: 'invalid';
  toolName: string;
  reason: string;
}

export type NormalizedToolCall = BuiltinToolCall | PassthroughToolCall | InvalidToolCall;

const BUILTIN_TOOL_NAMES: ReadonlySet<string> = new Set(builtinToolCallSchema.options.map((option) => option.shape.kind.value));

export function isBuiltinToolName(name: string): name is BuiltinToolName {
  return BUILTIN_TOOL_NAMES.has(name);
}

/**
 * Turns whatever the model sent into one typed variant. Never throws:
 * unknown fields are dropped, uninterpretable optional fields are omitted,
 * and a required field that cannot be coerced yields `invalid`.
 */
export function normalizeArguments(toolName: string, raw: unknown): NormalizedToolCall {
  const args = coerceArgumentObject(raw);
  if (!isBuiltinToolName(toolName)) {
    return { kind: 'passthrough', toolName, args: withoutEmpty(args) };
  }

  const result = builtinToolCallSchema.safeParse({ kind: toolName, args });
  if (result.success) return result.data;

  const reason = result.error.issues
    .map((issue) => {
      const field = issue.path.slice(1).join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    })
    .join('; ');
  return { kind: 'invalid', toolName, reason };
}

export function toolNameOf(call: NormalizedToolCall): string {
  return call.kind === 'passthrough' || call.kind === 'invalid' ? call.toolName : call.kind;
}

/**
 * The `arguments` object sent in `tools/call`. Omitted fields are left out
 * rather than sent as null.
 */
export function wireArguments(call: BuiltinToolCall | PassthroughToolCall): Record<string, unknown> {
  return Object.fromEntries(Object.entries(call.args).filter(([, value]) => value !== undefined));
}

function withoutEmpty(args: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(args).filter(([, value]) => value !== null && value !== undefined && !(typeof value === 'string' && !value.trim()))
  );
}
