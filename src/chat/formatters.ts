import { isRecord } from '../mcp/protocol.js';
import { coerceNumber, coerceText } from '../tools/coerce.js';

const usd = new Intl.NumberFormat('en-US', { style: 'currency', currency: 'USD' });

const MAX_LISTED_ENTRIES = 10;
const MAX_LISTED_ORGANIZATIONS = 5;

export function formatUsd(amount: number): string {
  return usd.format(amount);
}

/** Whole numbers print without decimals: 4, not 4.0. */
export function formatPlainNumber(value: number): string {
  return Number.isInteger(value) ? value.toFixed(0) : String(value);
}

export function pluralize(count: number, singular: string, plural = `${singular}s`): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

function amountOf(value: unknown): number {
  return coerceNumber(value) ?? 0;
}

function entriesOf(payload: Record<string, unknown>): Record<string, unknown>[] {
  return Array.isArray(payload.entries) ? payload.entries.filter(isRecord) : [];
}

function listLines(lines: string[], total: number): string {
  const more = total - lines.length;
  return more > 0 ? `${lines.join('\n')}\n...and ${more} more.` : lines.join('\n');
}

export function formatBalance(payload: Record<string, unknown>): string {
  const total = amountOf(payload.total_unreimbursed);
  const count = Math.trunc(amountOf(payload.count));
  return `You have ${formatUsd(total)} in unreimbursed HSA expenses (${pluralize(count, 'expense')}).`;
}

export function formatLedgerEntries(payload: Record<string, unknown>): string {
  const entries = entriesOf(payload);
  if (entries.length === 0) return 'You have no unreimbursed HSA expenses on file.';

  const summary = isRecord(payload.summary) ? payload.summary : {};
  const total =
    coerceNumber(summary.total_unreimbursed) ?? entries.reduce((sum, entry) => sum + amountOf(entry.amount), 0);
  const lines = entries.slice(0, MAX_LISTED_ENTRIES).map((entry) => {
    const date = coerceText(entry.service_date) ?? coerceText(entry.paid_date) ?? 'undated';
    const provider = coerceText(entry.provider) ?? 'Unknown provider';
    return `- ${date} ${provider}: ${formatUsd(amountOf(entry.amount))}`;
  });
  return `Here are your unreimbursed expenses (${pluralize(entries.length, 'entry', 'entries')}, ${formatUsd(total)} total):\n${listLines(lines, entries.length)}`;
}

export function formatCharitableSummary(payload: Record<string, unknown>): string {
  const year = coerceText(payload.tax_year);
  const total = amountOf(payload.total);
  const deductible = amountOf(payload.tax_deductible_total);
  const heading = `Your charitable donations${year ? ` for ${year}` : ''} total ${formatUsd(total)} (${formatUsd(deductible)} tax-deductible).`;

  const byOrganization = isRecord(payload.by_organization) ? payload.by_organization : {};
  const organizations = Object.entries(byOrganization)
    .map(([name, totals]) => ({ name, total: isRecord(totals) ? amountOf(totals.total) : 0 }))
    .sort((left, right) => right.total - left.total)
    .slice(0, MAX_LISTED_ORGANIZATIONS);
  if (organizations.length === 0) return heading;
  return `${heading}\n${organizations.map((org) => `- ${org.name}: ${formatUsd(org.total)}`).join('\n')}`;
}

export function formatCharitableEntries(payload: Record<string, unknown>): string {
  const entries = entriesOf(payload);
  const year = coerceText(payload.tax_year);
  if (entries.length === 0) return `No charitable donations are recorded${year ? ` for ${year}` : ''}.`;

  const lines = entries.slice(0, MAX_LISTED_ENTRIES).map((entry) => {
    const date = coerceText(entry.donation_date) ?? 'undated';
    const organization = coerceText(entry.organization_name) ?? 'Unknown organization';
    return `- ${date} ${organization}: ${formatUsd(amountOf(entry.amount))}`;
  });
  return `Here are your donations${year ? ` for ${year}` : ''}:\n${listLines(lines, entries.length)}`;
}
