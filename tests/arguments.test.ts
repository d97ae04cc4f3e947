import { describe, expect, it } from 'vitest';
import { normalizeArguments, toolNameOf, wireArguments } from '../src/tools/arguments.js';
import { coerceBoolean, coerceNumber } from '../src/tools/coerce.js';

describe('normalizeArguments', () => {
  it('coerces strings, lower-cases enums and drops unknown fields', () => {
    const call = normalizeArguments('read_ledger_entries', {
      year: '2024',
      status_filter: 'Unreimbursed',
      limit: '50',
      bogus: 1,
      column_filters: '[{"column":"provider","operator":"CONTAINS","value":"clinic"}]'
    });

    expect(call).toEqual({
      kind: 'read_ledger_entries',
      args: {
        year: 2024,
        status_filter: 'unreimbursed',
        limit: 50,
        column_filters: [{ column: 'provider', operator: 'contains', value: 'clinic' }]
      }
    });
  });

  it('drops filters that cannot be read and defaults the operator', () => {
    const call = normalizeArguments('get_charitable_summary', {
      column_filters: [{ operator: 'gt' }, { column: 'amount', value: 100 }]
    });
    expect(call).toEqual({
      kind: 'get_charitable_summary',
      args: { column_filters: [{ column: 'amount', operator: 'equals', value: 100 }] }
    });
  });

  it('accepts the argument object as JSON text and tolerates junk', () => {
    expect(normalizeArguments('get_unreimbursed_balance', '{"x":1}')).toEqual({ kind: 'get_unreimbursed_balance', args: {} });
    expect(normalizeArguments('get_unreimbursed_balance', 42)).toEqual({ kind: 'get_unreimbursed_balance', args: {} });
    expect(normalizeArguments('get_unreimbursed_balance', 'not json')).toEqual({ kind: 'get_unreimbursed_balance', args: {} });
  });

  it('parses numeric operands', () => {
    expect(normalizeArguments('add_numbers', { a: '2', b: ' 3.5 ' })).toEqual({ kind: 'add_numbers', args: { a: 2, b: 3.5 } });
    expect(normalizeArguments('add_numbers', { a: '$1,250', b: -4 })).toEqual({ kind: 'add_numbers', args: { a: 1250, b: -4 } });
  });

  it('marks a call invalid when a required field cannot be read', () => {
    expect(normalizeArguments('add_numbers', { a: 'two', b: 2 })).toEqual({
      kind: 'invalid',
      toolName: 'add_numbers',
      reason: 'a: must be a number'
    });
    expect(normalizeArguments('update_expense_status', { expense_id: '  ', new_status: 'paid' })).toEqual({
      kind: 'invalid',
      toolName: 'update_expense_status',
      reason: 'expense_id: is required; new_status: must be one of reimbursed, unreimbursed, not_hsa_eligible'
    });
  });

  it('omits optional fields it cannot interpret', () => {
    const call = normalizeArguments('read_charitable_ledger_entries', {
      tax_year: 2024,
      tax_deductible: 'yes',
      organization: '',
      limit: -5
    });
    expect(call.kind).toBe('read_charitable_ledger_entries');
    expect(call.kind !== 'invalid' && wireArguments(call)).toEqual({ tax_year: '2024', tax_deductible: true });
  });

  it('parses an embedded expense object', () => {
    expect(normalizeArguments('check_for_duplicates', { expense_json: '{"amount":10}', fuzzy_days: '2' })).toEqual({
      kind: 'check_for_duplicates',
      args: { expense_json: { amount: 10 }, fuzzy_days: 2 }
    });
    expect(normalizeArguments('check_for_duplicates', {})).toEqual({
      kind: 'invalid',
      toolName: 'check_for_duplicates',
      reason: 'expense_json: must be an object'
    });
  });

  it('passes custom tool arguments through without empty values', () => {
    const call = normalizeArguments('custom_lookup', { q: 'rent', empty: '  ', missing: null, count: 0 });
    expect(call).toEqual({ kind: 'passthrough', toolName: 'custom_lookup', args: { q: 'rent', count: 0 } });
    expect(toolNameOf(call)).toBe('custom_lookup');
  });
});

describe('wireArguments', () => {
  it('leaves out omitted fields', () => {
    const call = normalizeArguments('read_ledger_entries', { year: 'last year' });
    expect(call.kind).toBe('read_ledger_entries');
    if (call.kind === 'invalid') return;
    expect(Object.keys(wireArguments(call))).toEqual([]);
  });
});

describe('coercions', () => {
  it('reads boolean words', () => {
    expect(coerceBoolean('Y')).toBe(true);
    expect(coerceBoolean('off')).toBe(false);
    expect(coerceBoolean(1)).toBe(true);
    expect(coerceBoolean('maybe')).toBeUndefined();
  });

  it('reads numbers with exponents and rejects words', () => {
    expect(coerceNumber('1e3')).toBe(1000);
    expect(coerceNumber('.5')).toBe(0.5);
    expect(coerceNumber('12abc')).toBeUndefined();
    expect(coerceNumber(Number.NaN)).toBeUndefined();
  });
});
