export interface JsonRpcRequest<T = unknown> {
  jsonrpc: '2.0';
  id: number;
  method: string;
  params?: T;
}

export interface JsonRpcNotification<T = unknown> {
  jsonrpc: '2.0';
  method: string;
  params?: T;
}

export interface JsonRpcSuccess<T = unknown> {
  jsonrpc: '2.0';
  id: number;
  result: T;
}

export interface JsonRpcErrorResponse {
  jsonrpc: '2.0';
  id: number;
  /** The server's `error` member exactly as received; servers do not always send `{code, message}`. */
  error: unknown;
}

export type JsonRpcResponse<T = unknown> = JsonRpcSuccess<T> | JsonRpcErrorResponse;

export interface ToolDefinition {
  name: string;
  title?: string;
  description?: string;
  inputSchema: Record<string, unknown>;
}

/**
 * What a caller gets back from one `tools/call`.
 */
export interface ToolCallResult {
  rawText: string;
  structuredPayload?: Record<string, unknown>;
  displaySummary: string;
  isError: boolean;
}

const DISPLAY_SUMMARY_MAX_CHARS = 200;

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parses one stdout line into a response envelope. Anything that is not a
 * JSON object carrying a numeric id yields `null`: log output, notifications
 * and server-initiated messages are not responses.
 */
export function parseResponseLine(line: string): JsonRpcResponse | null {
  let message: unknown;
  try {
    message = JSON.parse(line);
  } catch {
    return null;
  }

  if (!isRecord(message) || typeof message.id !== 'number') return null;
  if ('error' in message) {
    return { jsonrpc: '2.0', id: message.id, error: message.error };
  }
  if ('result' in message) {
    return { jsonrpc: '2.0', id: message.id, result: message.result };
  }
  return null;
}

export function extractToolResultText(result: unknown): string {
  if (!isRecord(result) || !Array.isArray(result.content) || result.content.length === 0) return '{}';
  const texts = result.content
    .filter(isRecord)
    .map((part) => part.text)
    .filter((text) => text !== undefined && text !== null)
    .map((text) => (typeof text === 'string' ? text : String(text)));
  return texts.length > 0 ? texts.join('\n') : '{}';
}

function parseJsonObject(text: string): Record<string, unknown> | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    if (isRecord(parsed)) return parsed;
    if (typeof parsed === 'string') return parseJsonObject(parsed);
    return undefined;
  } catch {
    return undefined;
  }
}

export function extractToolResultPayload(result: unknown): Record<string, unknown> | undefined {
  if (!isRecord(result)) return undefined;
  const structured = result.structuredContent;
  if (isRecord(structured)) return structured;
  if (typeof structured === 'string') {
    const parsed = parseJsonObject(structured);
    if (parsed) return parsed;
  }
  return parseJsonObject(extractToolResultText(result));
}

export function summarizeToolText(text: string): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  if (flat.length <= DISPLAY_SUMMARY_MAX_CHARS) return flat;
  return `${flat.slice(0, DISPLAY_SUMMARY_MAX_CHARS - 3)}...`;
}

export function toToolCallResult(result: unknown): ToolCallResult {
  const rawText = extractToolResultText(result);
  const structuredPayload = extractToolResultPayload(result);
  return {
    rawText,
    ...(structuredPayload ? { structuredPayload } : {}),
    displaySummary: summarizeToolText(rawText),
    isError: isRecord(result) && result.isError === true
  };
}
