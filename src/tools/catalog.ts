import type { ToolDefinition } from '../mcp/protocol.js';
import { FILTER_OPERATORS, REIMBURSEMENT_STATUSES } from './arguments.js';

const columnFilters = {
  type: 'array',
  description: 'Optional column predicates applied to ledger rows.',
  items: {
    type: 'object',
    properties: {
      column: { type: 'string' },
      operator: { type: 'string', enum: [...FILTER_OPERATORS], default: 'equals' },
      value: {},
      case_sensitive: { type: 'boolean', default: false }
    },
    required: ['column', 'value']
  }
};

const reimbursementStatus = { type: 'string', enum: [...REIMBURSEMENT_STATUSES] };

/** Model-facing descriptors of the tools served by the built-in servers. */
export const TOOL_CATALOG: readonly ToolDefinition[] = [
  {
    name: 'get_unreimbursed_balance',
    description: 'Get total of all unreimbursed HSA expenses and how many there are.',
    inputSchema: { type: 'object', properties: {}, additionalProperties: false }
  },
  {
    name: 'read_ledger_entries',
    description: 'Read HSA ledger entries with optional filtering by year, status and column predicates.',
    inputSchema: {
      type: 'object',
      properties: {
        year: { type: 'integer' },
        status_filter: reimbursementStatus,
        limit: { type: 'integer', minimum: 1, default: 1000 },
        column_filters: columnFilters
      },
      additionalProperties: false
    }
  },
  {
    name: 'update_expense_status',
    description: 'Change the reimbursement status of one HSA expense.',
    inputSchema: {
      type: 'object',
      properties: {
        expense_id: { type: 'string' },
        new_status: reimbursementStatus,
        reimbursement_date: { type: 'string', description: 'YYYY-MM-DD' }
      },
      required: ['expense_id', 'new_status'],
      additionalProperties: false
    }
  },
  {
    name: 'check_for_duplicates',
    description: 'Check whether an expense is already in the HSA ledger.',
    inputSchema: {
      type: 'object',
      properties: {
        expense_json: { type: 'object' },
        fuzzy_days: { type: 'integer', minimum: 0, default: 3 }
      },
      required: ['expense_json'],
      additionalProperties: false
    }
  },
  {
    name: 'get_charitable_summary',
    description: 'Get a summary of charitable donations by tax year with optional column predicates.',
    inputSchema: {
      type: 'object',
      properties: {
        tax_year: { type: 'string', description: 'Four-digit year' },
        column_filters: columnFilters
      },
      additionalProperties: false
    }
  },
  {
    name: 'read_charitable_ledger_entries',
    description: 'Read charitable ledger entries with optional tax year, organization, tax-deductible and column filters.',
    inputSchema: {
      type: 'object',
      properties: {
        tax_year: { type: 'string' },
        organization: { type: 'string' },
        tax_deductible: { type: 'boolean' },
        limit: { type: 'integer', minimum: 1, default: 1000 },
        column_filters: columnFilters
      },
      additionalProperties: false
    }
  },
  {
    name: 'add_numbers',
    description: 'Add two numbers.',
    inputSchema: {
      type: 'object',
      properties: { a: { type: 'number' }, b: { type: 'number' } },
      required: ['a', 'b'],
      additionalProperties: false
    }
  }
];

export const PERMISSIVE_INPUT_SCHEMA: Record<string, unknown> = { type: 'object', additionalProperties: true };
