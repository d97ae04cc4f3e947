import { afterEach, describe, expect, it } from 'vitest';
import { SUPPORTED_PROTOCOL_VERSIONS } from '../src/connectors/protocol-constants.js';
import { StdioToolClient, type StdioToolClientConfig } from '../src/connectors/stdio-client.js';
import {
  ClientStateError,
  HandshakeError,
  ProtocolError,
  ReadTimeoutError,
  SpawnError,
  UnexpectedExitError
} from '../src/mcp/error-mapper.js';
import { fakeServerCommand } from './helpers/fakes.js';

describe('StdioToolClient', () => {
  const clients: StdioToolClient[] = [];

  function createClient(env: Record<string, string> = {}, overrides: Partial<StdioToolClientConfig> = {}) {
    const client = new StdioToolClient({
      serverId: 'fake',
      command: fakeServerCommand(),
      env,
      requestTimeoutMs: 5000,
      stopGraceMs: 500,
      ...overrides
    });
    clients.push(client);
    return client;
  }

  afterEach(async () => {
    await Promise.all(clients.splice(0).map((client) => client.stop()));
  });

  describe('handshake', () => {
    it('negotiates the newest version the server accepts', async () => {
      const client = createClient();
      await expect(client.start()).resolves.toEqual({
        protocolVersion: '2025-11-25',
        serverInfo: { name: 'fake-tool-server', version: '1.0.0' }
      });
      expect(client.state).toBe('ready');
      expect(client.initialized).toBe(true);
    });

    it('falls back through older versions', async () => {
      const client = createClient({ FAKE_ACCEPT_VERSIONS: '2025-03-26' });
      const result = await client.start();
      expect(result.protocolVersion).toBe('2025-03-26');
      expect(client.protocolVersion).toBe('2025-03-26');
    });

    it('fails when every version is rejected and refuses later calls', async () => {
      const client = createClient({ FAKE_ACCEPT_VERSIONS: 'none' });

      const error = await client.start().catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(HandshakeError);
      expect(error).toHaveProperty('attemptedVersions', [...SUPPORTED_PROTOCOL_VERSIONS]);
      expect(client.state).toBe('failed');
      expect(client.isAlive()).toBe(false);
      expect(client.startupError).toBe(
        `Tool server fake accepted no protocol version (tried ${SUPPORTED_PROTOCOL_VERSIONS.join(', ')})`
      );

      await expect(client.callTool('add_numbers', { a: 1, b: 2 })).rejects.toBeInstanceOf(ClientStateError);
      await expect(client.start()).rejects.toBeInstanceOf(ClientStateError);
    });

    it('reports a command that cannot be spawned', async () => {
      const client = createClient({}, { command: ['definitely-not-a-command-xyz'] });
      await expect(client.start()).rejects.toBeInstanceOf(SpawnError);
      expect(client.state).toBe('failed');
    });

    it('fails the handshake when the server dies during initialize', async () => {
      const client = createClient({ FAKE_MODE: 'exit-on-initialize' });
      const error = await client.start().catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(HandshakeError);
      expect(error).toHaveProperty(
        'message',
        'Tool server fake failed during initialize: Tool server exited unexpectedly (code 2): boot failure: missing credentials'
      );
      expect(client.state).toBe('failed');
    });

    it('refuses a second start while ready', async () => {
      const client = createClient();
      await client.start();
      await expect(client.start()).rejects.toBeInstanceOf(ClientStateError);
    });
  });

  describe('tool calls', () => {
    it('rejects calls before start', async () => {
      await expect(createClient().callTool('add_numbers', {})).rejects.toBeInstanceOf(ClientStateError);
    });

    it('matches responses by id past stray output', async () => {
      const client = createClient({ FAKE_MODE: 'stray' });
      await client.start();

      for (const a of [1, 5, 10]) {
        const result = await client.callTool('add_numbers', { a, b: 2 });
        expect(result.structuredPayload).toEqual({ success: true, a, b: 2, sum: a + 2 });
      }
    });

    it('serializes concurrent calls on one client', async () => {
      const client = createClient({ FAKE_MODE: 'stray' });
      await client.start();

      const [first, second] = await Promise.all([
        client.callTool('add_numbers', { a: 1, b: 1 }),
        client.callTool('add_numbers', { a: 2, b: 3 })
      ]);
      expect(first.structuredPayload).toMatchObject({ sum: 2 });
      expect(second.structuredPayload).toMatchObject({ sum: 5 });
    });

    it('parses JSON text results and leaves plain text alone', async () => {
      const client = createClient();
      await client.start();

      const balance = await client.callTool('get_unreimbursed_balance', {});
      expect(balance.structuredPayload).toEqual({ total_unreimbursed: 42.5, count: 3 });

      const plain = await client.callTool('plain_text', {});
      expect(plain).toEqual({ rawText: 'just words', displaySummary: 'just words', isError: false });
    });

    it('returns tool-level errors as results', async () => {
      const client = createClient();
      await client.start();

      const result = await client.callTool('flaky_result', {});
      expect(result.isError).toBe(true);
      expect(result.rawText).toBe('Sheet not found');
      expect(client.state).toBe('ready');
    });

    it('raises JSON-RPC errors with the payload verbatim', async () => {
      const client = createClient();
      await client.start();

      const error = await client.callTool('reject_call', {}).catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toHaveProperty('payload', { code: -32602, message: 'Invalid params', data: { field: 'expense_id' } });

      // The connection stays usable after a protocol error.
      const result = await client.callTool('add_numbers', { a: 2, b: 2 });
      expect(result.structuredPayload).toMatchObject({ sum: 4 });
    });

    it('lists the server tools', async () => {
      const client = createClient();
      await client.start();
      const names = (await client.listTools()).map((tool) => tool.name);
      expect(names).toEqual(['add_numbers', 'get_unreimbursed_balance', 'echo', 'flaky_result', 'plain_text']);
    });

    it('fails with the stderr tail when the server exits mid-call', async () => {
      const client = createClient({ FAKE_MODE: 'exit-on-call' });
      await client.start();

      const error = await client.callTool('add_numbers', { a: 1, b: 1 }).catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(UnexpectedExitError);
      expect(error).toMatchObject({ exitCode: 3, stderr: 'ledger backend unavailable\n' });
      expect(client.state).toBe('failed');
    });

    it('times out a server that never answers', async () => {
      const client = createClient({ FAKE_MODE: 'silent-on-call' }, { requestTimeoutMs: 200 });
      await client.start();

      const error = await client.callTool('add_numbers', { a: 1, b: 1 }).catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(ReadTimeoutError);
      expect(client.state).toBe('failed');
      expect(client.isAlive()).toBe(false);
    });

    it('times out a server that keeps printing non-responses', async () => {
      const client = createClient({ FAKE_MODE: 'chatter' }, { requestTimeoutMs: 300 });
      await client.start();

      const startedAt = Date.now();
      const error = await client.callTool('add_numbers', { a: 1, b: 1 }).catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(ReadTimeoutError);
      expect(error).toHaveProperty('message', 'Tool server did not respond within 300ms');
      expect(Date.now() - startedAt).toBeLessThan(3000);
    });
  });

  describe('stop', () => {
    it('is idempotent and allows a fresh start', async () => {
      const client = createClient();
      await client.start();
      const firstPid = client.pid;

      await client.stop();
      await client.stop();
      expect(client.state).toBe('stopped');
      expect(client.isAlive()).toBe(false);
      expect(client.protocolVersion).toBeNull();

      await client.start();
      expect(client.state).toBe('ready');
      expect(client.pid).not.toBe(firstPid);
      const result = await client.callTool('add_numbers', { a: 3, b: 4 });
      expect(result.structuredPayload).toMatchObject({ sum: 7 });
    });

    it('is safe before start', async () => {
      const client = createClient();
      await client.stop();
      expect(client.state).toBe('stopped');
      await expect(client.start()).resolves.toMatchObject({ protocolVersion: '2025-11-25' });
    });

    it('aborts a start that is still in progress', async () => {
      const client = createClient();
      const starting = client.start();
      await client.stop();

      await expect(starting).rejects.toBeInstanceOf(HandshakeError);
      expect(client.state).toBe('stopped');

      await client.start();
      expect(client.state).toBe('ready');
    });

    it('kills a server that ignores SIGTERM', async () => {
      const client = createClient({ FAKE_IGNORE_SIGTERM: '1' }, { stopGraceMs: 100 });
      await client.start();
      expect(client.pid).toBeDefined();
      const pid = client.pid ?? Number.NaN;

      await client.stop();
      expect(() => process.kill(pid, 0)).toThrow();
    });
  });
});
