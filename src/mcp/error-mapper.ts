// Error codes for the tool substrate. Standard JSON-RPC codes are kept for
// errors a tool server reports; the -3205x range is local to this client.
export enum ErrorCode {
  ParseError = -32700,
  InvalidRequest = -32600,
  MethodNotFound = -32601,
  InvalidParams = -32602,
  InternalError = -32603,

  SpawnFailed = -32050,
  PathResolution = -32051,
  WriteFailed = -32052,
  ReadFailed = -32053,
  Timeout = -32054,
  UnexpectedExit = -32055,
  HandshakeFailed = -32056,
  InvalidState = -32057,
  UnknownTool = -32058,
  InvalidArguments = -32059
}

export interface ToolFailurePayload {
  success: false;
  error: string;
  code: number;
  data?: unknown;
}

/**
 * Base class for every failure raised by the transport and protocol layers.
 */
export class ToolSubstrateError extends Error {
  readonly code: number;
  readonly data?: Record<string, unknown>;

  constructor(code: number, message: string, data?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ToolSubstrateError';
    this.code = code;
    this.data = data;
  }

  toFailurePayload(): ToolFailurePayload {
    return {
      success: false,
      error: this.message,
      code: this.code,
      ...(this.data ? { data: this.data } : {})
    };
  }
}

export class SpawnError extends ToolSubstrateError {
  constructor(message: string, data?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(ErrorCode.SpawnFailed, message, data, options);
    this.name = 'SpawnError';
  }
}

export class PathResolutionError extends SpawnError {
  constructor(path: string, options?: { cause?: unknown }) {
    super(`Working directory does not exist: ${path}`, { path }, options);
    this.name = 'PathResolutionError';
  }
}

export class WriteError extends ToolSubstrateError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(ErrorCode.WriteFailed, message, undefined, options);
    this.name = 'WriteError';
  }
}

export class ReadError extends ToolSubstrateError {
  constructor(message: string) {
    super(ErrorCode.ReadFailed, message);
    this.name = 'ReadError';
  }
}

export class ReadTimeoutError extends ToolSubstrateError {
  constructor(timeoutMs: number) {
    super(ErrorCode.Timeout, `Tool server did not respond within ${timeoutMs}ms`, { timeoutMs });
    this.name = 'ReadTimeoutError';
  }
}

export class UnexpectedExitError extends ToolSubstrateError {
  readonly exitCode: number | null;
  readonly signal: string | null;
  readonly stderr: string;

  constructor(exitCode: number | null, signal: string | null, stderr: string) {
    const status = signal ? `signal ${signal}` : exitCode === null ? 'stdout closed' : `code ${exitCode}`;
    const detail = stderr.trim();
    super(
      ErrorCode.UnexpectedExit,
      detail ? `Tool server exited unexpectedly (${status}): ${detail}` : `Tool server exited unexpectedly (${status})`,
      { exitCode, signal }
    );
    this.name = 'UnexpectedExitError';
    this.exitCode = exitCode;
    this.signal = signal;
    this.stderr = stderr;
  }
}

export class HandshakeError extends ToolSubstrateError {
  readonly attemptedVersions: string[];

  constructor(message: string, attemptedVersions: string[], options?: { cause?: unknown }) {
    super(ErrorCode.HandshakeFailed, message, { attemptedVersions }, options);
    this.name = 'HandshakeError';
    this.attemptedVersions = attemptedVersions;
  }
}

/**
 * A JSON-RPC error returned by the tool server for one request. `payload` is
 * the server's error object exactly as received.
 */
export class ProtocolError extends ToolSubstrateError {
  readonly payload: unknown;

  constructor(payload: unknown) {
    super(readErrorCode(payload), readErrorMessage(payload), undefined);
    this.name = 'ProtocolError';
    this.payload = payload;
  }

  override toFailurePayload(): ToolFailurePayload {
    return { success: false, error: this.message, code: this.code, data: this.payload };
  }
}

export class ClientStateError extends ToolSubstrateError {
  constructor(message: string) {
    super(ErrorCode.InvalidState, message);
    this.name = 'ClientStateError';
  }
}

function readErrorCode(payload: unknown): number {
  if (payload && typeof payload === 'object' && 'code' in payload && typeof payload.code === 'number') {
    return payload.code;
  }
  return ErrorCode.InternalError;
}

function readErrorMessage(payload: unknown): string {
  if (payload && typeof payload === 'object' && 'message' in payload && typeof payload.message === 'string') {
    return payload.message;
  }
  if (typeof payload === 'string' && payload) return payload;
  return 'Tool server returned an error';
}

/**
 * Start-time failures: no tool call is possible at all, so the caller gets
 * them instead of a synthetic tool result.
 */
export function isHardStartFailure(error: unknown): error is SpawnError | HandshakeError {
  return error instanceof SpawnError || error instanceof HandshakeError;
}

/**
 * Failures after which the process can no longer be trusted.
 */
export function isTransportFailure(error: unknown): boolean {
  return (
    error instanceof UnexpectedExitError ||
    error instanceof ReadTimeoutError ||
    error instanceof WriteError ||
    error instanceof ReadError ||
    error instanceof ClientStateError
  );
}

export function toToolFailurePayload(error: unknown): ToolFailurePayload {
  if (error instanceof ToolSubstrateError) {
    return error.toFailurePayload();
  }

  const message = error instanceof Error ? error.message : String(error);
  const lower = message.toLowerCase();

  if (lower.includes('timed out') || lower.includes('abort')) {
    return { success: false, error: message, code: ErrorCode.Timeout };
  }
  if (lower.includes('method not found')) {
    return { success: false, error: message, code: ErrorCode.MethodNotFound };
  }

  return { success: false, error: message || 'Tool call failed', code: ErrorCode.InternalError };
}
