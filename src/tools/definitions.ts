import { join } from 'node:path';
import { z } from 'zod';
import type { AppConfig } from '../config/schema.js';
import { silentLogger, type Logger } from '../logger.js';

export interface SettingsField {
  key: string;
  label: string;
  type: 'string' | 'number' | 'boolean';
  required: boolean;
  default?: string | number | boolean;
}

export type ToolServerSource = 'builtin' | 'custom';

/**
 * Static description of one tool server: how to launch it and which tools
 * it serves. Loaded once at startup and never mutated.
 */
export interface ToolServerDefinition {
  id: string;
  displayName: string;
  description: string;
  command: readonly string[];
  workingDirectoryHint: string;
  defaultEnabled: boolean;
  toolNames: readonly string[];
  settingsSchema?: readonly SettingsField[];
  env?: Readonly<Record<string, string>>;
  source: ToolServerSource;
}

export function builtinToolServers(root: string): ToolServerDefinition[] {
  return [
    {
      id: 'hsa_ledger',
      displayName: 'HSA Ledger',
      description: 'Spreadsheet-backed ledger of HSA expenses and reimbursements.',
      command: ['python', '-m', 'hsa_ledger.server'],
      workingDirectoryHint: join(root, 'hsa-ledger'),
      defaultEnabled: true,
      toolNames: ['get_unreimbursed_balance', 'read_ledger_entries', 'update_expense_status', 'check_for_duplicates'],
      settingsSchema: [
        { key: 'spreadsheet_id', label: 'Spreadsheet ID', type: 'string', required: true },
        { key: 'worksheet_name', label: 'Worksheet Name', type: 'string', required: true, default: 'HSA_Ledger' },
        { key: 'root_folder_id', label: 'Root Folder ID', type: 'string', required: true },
        { key: 'reimbursed_folder_id', label: 'Reimbursed Folder ID', type: 'string', required: true },
        { key: 'unreimbursed_folder_id', label: 'Unreimbursed Folder ID', type: 'string', required: true },
        { key: 'not_eligible_folder_id', label: 'Not Eligible Folder ID', type: 'string', required: false }
      ],
      source: 'builtin'
    },
    {
      id: 'charitable_ledger',
      displayName: 'Charitable Ledger',
      description: 'Donation ledger with per-organization and per-year totals.',
      command: ['python', '-m', 'charitable_ledger.server'],
      workingDirectoryHint: join(root, 'charitable-ledger'),
      defaultEnabled: true,
      toolNames: ['get_charitable_summary', 'read_charitable_ledger_entries'],
      settingsSchema: [
        { key: 'spreadsheet_id', label: 'Spreadsheet ID', type: 'string', required: true },
        { key: 'worksheet_name', label: 'Worksheet Name', type: 'string', required: true, default: 'Charitable_Ledger' }
      ],
      source: 'builtin'
    },
    {
      id: 'test_addition',
      displayName: 'Test Addition',
      description: 'Minimal tool server exposing add_numbers(a, b).',
      command: ['python', '-m', 'addition_server.server'],
      workingDirectoryHint: join(root, 'addition-server'),
      defaultEnabled: false,
      toolNames: ['add_numbers'],
      source: 'builtin'
    }
  ];
}

const settingsFieldSchema = z.object({
  key: z.string().min(1),
  label: z.string().min(1),
  type: z.enum(['string', 'number', 'boolean']).default('string'),
  required: z.boolean().default(false),
  default: z.union([z.string(), z.number(), z.boolean()]).optional()
});

const customServerSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().optional(),
  description: z.string().optional(),
  command: z.array(z.string()).transform((parts) => parts.filter((part) => part.trim())).pipe(z.array(z.string()).min(1)),
  server_path: z.string().default(''),
  default_enabled: z.boolean().default(false),
  tools: z.array(z.string()).default([]),
  settings_schema: z.array(settingsFieldSchema).optional().catch(undefined),
  env: z.record(z.string()).optional()
});

/**
 * Reads custom server entries from a JSON array. Malformed JSON yields no
 * servers; malformed entries are skipped individually.
 */
export function parseCustomToolServers(raw: string, logger: Logger = silentLogger): ToolServerDefinition[] {
  if (!raw.trim()) return [];

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    logger.warn({ err: error }, 'TOOL_CUSTOM_SERVERS_JSON is not valid JSON; ignoring');
    return [];
  }
  if (!Array.isArray(parsed)) {
    logger.warn('TOOL_CUSTOM_SERVERS_JSON must be a JSON array; ignoring');
    return [];
  }

  const servers: ToolServerDefinition[] = [];
  parsed.forEach((entry, index) => {
    const result = customServerSchema.safeParse(entry);
    if (!result.success) {
      logger.warn({ index, issues: result.error.issues }, 'skipping invalid custom tool server');
      return;
    }
    const item = result.data;
    servers.push({
      id: item.id,
      displayName: item.name?.trim() || item.id,
      description: item.description?.trim() || 'Custom tool server',
      command: item.command,
      workingDirectoryHint: item.server_path,
      defaultEnabled: item.default_enabled,
      toolNames: item.tools.map((tool) => tool.trim()).filter(Boolean),
      ...(item.settings_schema ? { settingsSchema: item.settings_schema } : {}),
      ...(item.env ? { env: item.env } : {}),
      source: 'custom'
    });
  });
  return servers;
}

/**
 * Built-in servers followed by custom ones; a custom id replaces the
 * built-in entry with the same id.
 */
export function loadToolServerDefinitions(
  config: Pick<AppConfig, 'TOOL_SERVERS_ROOT' | 'TOOL_CUSTOM_SERVERS_JSON'>,
  logger: Logger = silentLogger
): ToolServerDefinition[] {
  const byId = new Map<string, ToolServerDefinition>();
  for (const server of builtinToolServers(config.TOOL_SERVERS_ROOT)) {
    byId.set(server.id, server);
  }
  for (const server of parseCustomToolServers(config.TOOL_CUSTOM_SERVERS_JSON, logger)) {
    byId.set(server.id, server);
  }
  return [...byId.values()];
}
