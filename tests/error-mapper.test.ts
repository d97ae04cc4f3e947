import { describe, expect, it } from 'vitest';
import {
  ClientStateError,
  ErrorCode,
  HandshakeError,
  PathResolutionError,
  ProtocolError,
  ReadTimeoutError,
  SpawnError,
  UnexpectedExitError,
  WriteError,
  isHardStartFailure,
  isTransportFailure,
  toToolFailurePayload
} from '../src/mcp/error-mapper.js';

describe('UnexpectedExitError', () => {
  it('includes the exit code and the stderr tail', () => {
    const error = new UnexpectedExitError(3, null, 'ledger backend unavailable\n');
    expect(error.message).toBe('Tool server exited unexpectedly (code 3): ledger backend unavailable');
    expect(error.code).toBe(ErrorCode.UnexpectedExit);
  });

  it('prefers the signal over the exit code', () => {
    expect(new UnexpectedExitError(null, 'SIGKILL', '').message).toBe('Tool server exited unexpectedly (signal SIGKILL)');
  });

  it('reports a closed stdout when no status is known', () => {
    expect(new UnexpectedExitError(null, null, '  ').message).toBe('Tool server exited unexpectedly (stdout closed)');
  });
});

describe('ProtocolError', () => {
  it('keeps the server payload verbatim', () => {
    const payload = { code: -32602, message: 'Invalid params', data: { field: 'expense_id' } };
    const error = new ProtocolError(payload);
    expect(error.code).toBe(-32602);
    expect(error.message).toBe('Invalid params');
    expect(error.toFailurePayload()).toEqual({ success: false, error: 'Invalid params', code: -32602, data: payload });
  });

  it('falls back to an internal error for malformed payloads', () => {
    const error = new ProtocolError(42);
    expect(error.code).toBe(ErrorCode.InternalError);
    expect(error.message).toBe('Tool server returned an error');
  });
});

describe('classification', () => {
  it('treats spawn and handshake failures as hard start failures', () => {
    expect(isHardStartFailure(new SpawnError('nope'))).toBe(true);
    expect(isHardStartFailure(new PathResolutionError('/missing'))).toBe(true);
    expect(isHardStartFailure(new HandshakeError('no version', ['2025-11-25']))).toBe(true);
    expect(isHardStartFailure(new ReadTimeoutError(100))).toBe(false);
  });

  it('treats exits, timeouts and pipe errors as transport failures', () => {
    expect(isTransportFailure(new UnexpectedExitError(1, null, ''))).toBe(true);
    expect(isTransportFailure(new ReadTimeoutError(100))).toBe(true);
    expect(isTransportFailure(new WriteError('closed'))).toBe(true);
    expect(isTransportFailure(new ClientStateError('not ready'))).toBe(true);
    expect(isTransportFailure(new ProtocolError({ code: -32602, message: 'bad' }))).toBe(false);
  });
});

describe('toToolFailurePayload', () => {
  it('uses the structured payload of substrate errors', () => {
    expect(toToolFailurePayload(new ReadTimeoutError(250))).toEqual({
      success: false,
      error: 'Tool server did not respond within 250ms',
      code: ErrorCode.Timeout,
      data: { timeoutMs: 250 }
    });
  });

  it('records the path of a missing working directory', () => {
    expect(toToolFailurePayload(new PathResolutionError('/srv/missing'))).toEqual({
      success: false,
      error: 'Working directory does not exist: /srv/missing',
      code: ErrorCode.SpawnFailed,
      data: { path: '/srv/missing' }
    });
  });

  it('maps plain timeout errors', () => {
    expect(toToolFailurePayload(new Error('Request timed out')).code).toBe(ErrorCode.Timeout);
  });

  it('maps method mismatches', () => {
    expect(toToolFailurePayload(new Error('Method not found')).code).toBe(ErrorCode.MethodNotFound);
  });

  it('defaults to an internal error', () => {
    expect(toToolFailurePayload('boom')).toEqual({ success: false, error: 'boom', code: ErrorCode.InternalError });
  });
});
