import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CallJournal, REDACTED } from '../src/db/journal.js';
import {
  AuthError,
  ConnectionError,
  GatewayCallError,
  SchemaValidationError,
  ToolNotFoundError,
} from '../src/mcp-client/errors.js';
import { GatewayCoordinator } from '../src/mcp-client/GatewayCoordinator.js';
import type { GatewayConfig, McpClientEvent } from '../src/mcp-client/types.js';
import { FakeGateway, delay, testConfig, textResult } from './helpers/fake-gateway.js';

describe('GatewayCoordinator', () => {
  let gateway: FakeGateway;
  let coordinators: GatewayCoordinator[];

  function createCoordinator(overrides: Partial<GatewayConfig> = {}, journal?: CallJournal): GatewayCoordinator {
    const coordinator = new GatewayCoordinator(testConfig(overrides), { fetch: gateway.fetch, journal });
    coordinators.push(coordinator);
    return coordinator;
  }

  function record(coordinator: GatewayCoordinator): McpClientEvent[] {
    const events: McpClientEvent[] = [];
    coordinator.addEventListener(event => events.push(event));
    return events;
  }

  function toolNames(coordinator: GatewayCoordinator): string[] {
    return coordinator.getCatalog().entries.map(entry => entry.descriptor.name);
  }

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    coordinators = [];
    gateway = new FakeGateway();
    gateway.tools = [
      { name: 'ping', description: 'Replies pong', inputSchema: { type: 'object', properties: {} } },
      { name: 'admin_reset', description: 'Wipes everything', inputSchema: { type: 'object', properties: {} } },
      {
        name: 'get_forecast',
        description: 'Weather forecast',
        inputSchema: {
          type: 'object',
          properties: {
            location: { type: 'string' },
            days: { type: 'integer' },
            units: { type: 'string', default: 'metric' },
          },
          required: ['location'],
        },
      },
    ];
    gateway.handlers.set('ping', () => textResult('pong'));
    gateway.handlers.set('get_forecast', args => textResult(`forecast for ${String(args.location)}`));
  });

  afterEach(async () => {
    for (const coordinator of coordinators) {
      await coordinator.teardown();
    }
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('setup', () => {
    it('connects and publishes a fresh, frozen catalog', async () => {
      const coordinator = createCoordinator();
      const events = record(coordinator);

      await coordinator.setup();

      expect(coordinator.state).toBe('ready');
      expect(coordinator.session?.id).toBe('session-1');
      expect(toolNames(coordinator)).toEqual(['ping', 'admin_reset', 'get_forecast']);

      const catalog = coordinator.getCatalog();
      expect(catalog.status).toBe('fresh');
      expect(catalog.fetchedAt).toBeInstanceOf(Date);
      expect(Object.isFrozen(catalog)).toBe(true);
      expect(Object.isFrozen(catalog.entries)).toBe(true);
      expect(catalog.byName.get('ping')?.descriptor.description).toBe('Replies pong');

      expect(events).toEqual([
        { type: 'stateChanged', from: 'idle', to: 'connecting' },
        { type: 'stateChanged', from: 'connecting', to: 'ready' },
        { type: 'catalogUpdated', tools: ['ping', 'admin_reset', 'get_forecast'] },
      ]);
    });

    it('tears the session down and returns to idle when the first listing fails', async () => {
      const coordinator = createCoordinator();
      gateway.failOnce('tools/list', 500);

      await expect(coordinator.setup()).rejects.toThrow('Gateway returned HTTP 500');

      expect(coordinator.state).toBe('idle');
      expect(coordinator.session).toBeNull();
      expect(coordinator.getCatalog().entries).toHaveLength(0);
      expect(gateway.deletes).toHaveLength(1);
      expect(gateway.deletes[0].headers.get('mcp-session-id')).toBe('session-1');

      await coordinator.setup();
      expect(coordinator.state).toBe('ready');
    });

    it('surfaces rejected credentials', async () => {
      gateway.authToken = 'test-secret';
      const coordinator = createCoordinator();

      await expect(coordinator.setup()).rejects.toBeInstanceOf(AuthError);
      expect(coordinator.state).toBe('idle');
    });

    it('sends the configured bearer token', async () => {
      gateway.authToken = 'test-secret';
      const coordinator = createCoordinator({ authToken: 'test-secret' });

      await coordinator.setup();

      expect(gateway.requests[0].headers.get('authorization')).toBe('Bearer test-secret');
    });

    it('does nothing when already set up', async () => {
      const coordinator = createCoordinator();
      await coordinator.setup();

      await coordinator.setup();

      expect(gateway.count('initialize')).toBe(1);
    });

    it('keeps working when an event handler throws', async () => {
      const coordinator = createCoordinator();
      coordinator.addEventListener(() => {
        throw new Error('boom');
      });

      await coordinator.setup();

      expect(coordinator.state).toBe('ready');
    });
  });

  describe('catalog filtering', () => {
    it('publishes only allowed tools and never forwards the rest', async () => {
      gateway.tools = gateway.tools.filter(tool => tool.name !== 'get_forecast');
      const coordinator = createCoordinator({ allowedTools: ['ping'] });
      await coordinator.setup();

      expect(toolNames(coordinator)).toEqual(['ping']);
      await expect(coordinator.callTool('admin_reset')).rejects.toBeInstanceOf(ToolNotFoundError);
      expect(gateway.count('tools/call')).toBe(0);
    });

    it('lets the block-list win over the allow-list', async () => {
      const coordinator = createCoordinator({ allowedTools: ['ping', 'admin_reset'], blockedTools: ['admin_reset'] });
      await coordinator.setup();

      expect(toolNames(coordinator)).toEqual(['ping']);
    });

    it('treats an explicit empty allow-list as publishing nothing', async () => {
      const coordinator = createCoordinator({ allowedTools: [] });
      await coordinator.setup();

      expect(coordinator.state).toBe('ready');
      expect(toolNames(coordinator)).toEqual([]);
    });
  });

  describe('refresh', () => {
    it('keeps the previous catalog as stale when a refresh fails, then recovers', async () => {
      const coordinator = createCoordinator();
      await coordinator.setup();
      const before = coordinator.getCatalog();
      const events = record(coordinator);

      gateway.failOnce('tools/list', 500);
      await expect(coordinator.refresh()).rejects.toBeInstanceOf(ConnectionError);

      expect(coordinator.state).toBe('degraded');
      expect(coordinator.getCatalog().status).toBe('stale');
      expect(toolNames(coordinator)).toEqual(['ping', 'admin_reset', 'get_forecast']);
      expect(before.status).toBe('fresh');
      expect(events[1]).toMatchObject({ type: 'refreshFailed', consecutiveFailures: 1, retryInMs: 1000 });
      expect(coordinator.diagnostics()).toMatchObject({ consecutiveFailures: 1, lastError: 'Gateway returned HTTP 500' });

      gateway.tools.push({ name: 'echo', description: 'Echoes input' });
      await coordinator.refresh();

      expect(coordinator.state).toBe('ready');
      expect(coordinator.getCatalog().status).toBe('fresh');
      expect(toolNames(coordinator)).toEqual(['ping', 'admin_reset', 'get_forecast', 'echo']);
      expect(coordinator.getCatalog()).not.toBe(before);
      expect(before.entries.map(entry => entry.descriptor.name)).toEqual(['ping', 'admin_reset', 'get_forecast']);
      expect(coordinator.diagnostics()).toMatchObject({ consecutiveFailures: 0, lastError: null });
    });

    it('serves the previous catalog to readers while a listing is in flight', async () => {
      const coordinator = createCoordinator();
      await coordinator.setup();
      const before = coordinator.getCatalog();
      gateway.tools.push({ name: 'echo', description: 'Echoes input' });
      gateway.delays.set('tools/list', 200);

      const refreshed = coordinator.refresh();
      await vi.waitFor(() => expect(gateway.count('tools/list')).toBe(2));
      const during = coordinator.getCatalog();

      expect(during).toBe(before);
      expect(during.status).toBe('fresh');
      expect(toolNames(coordinator)).toEqual(['ping', 'admin_reset', 'get_forecast']);

      const after = await refreshed;
      expect(after).toBe(coordinator.getCatalog());
      expect(toolNames(coordinator)).toEqual(['ping', 'admin_reset', 'get_forecast', 'echo']);
      expect(during.entries.map(entry => entry.descriptor.name)).toEqual(['ping', 'admin_reset', 'get_forecast']);
    });

    it('degrades when a listing outlasts the refresh timeout', async () => {
      const coordinator = createCoordinator({ refreshTimeoutMs: 50 });
      await coordinator.setup();
      gateway.delays.set('tools/list', 500);

      await expect(coordinator.refresh()).rejects.toMatchObject({
        name: 'RequestTimeoutError',
        message: "Request 'tools/list' timed out after 50ms",
      });

      expect(coordinator.state).toBe('degraded');
      expect(coordinator.getCatalog().status).toBe('stale');
      expect(toolNames(coordinator)).toEqual(['ping', 'admin_reset', 'get_forecast']);
    });

    it('backs off with non-decreasing delays up to the ceiling', async () => {
      const coordinator = createCoordinator();
      await coordinator.setup();
      const events = record(coordinator);

      for (let i = 0; i < 5; i++) {
        gateway.failOnce('tools/list', 503);
        await expect(coordinator.refresh()).rejects.toBeInstanceOf(ConnectionError);
      }

      const delays = events.flatMap(event => (event.type === 'refreshFailed' ? [event.retryInMs] : []));
      expect(delays).toEqual([1000, 2000, 4000, 8000, 8000]);
    });

    it('gives up after the configured number of failures', async () => {
      const coordinator = createCoordinator({ maxRefreshFailures: 2 });
      await coordinator.setup();
      const events = record(coordinator);

      gateway.failOnce('tools/list', 500);
      gateway.failOnce('tools/list', 500);
      await expect(coordinator.refresh()).rejects.toBeInstanceOf(ConnectionError);
      expect(coordinator.state).toBe('degraded');
      await expect(coordinator.refresh()).rejects.toBeInstanceOf(ConnectionError);

      expect(coordinator.state).toBe('failed');
      expect(events.at(-1)).toMatchObject({ type: 'refreshFailed', consecutiveFailures: 2, retryInMs: null });
      expect(toolNames(coordinator)).toEqual(['ping', 'admin_reset', 'get_forecast']);

      await coordinator.refresh();
      expect(coordinator.state).toBe('ready');
    });

    it('shares one listing between concurrent callers', async () => {
      const coordinator = createCoordinator();
      await coordinator.setup();

      const [first, second] = await Promise.all([coordinator.refresh(), coordinator.refresh()]);

      expect(first).toBe(second);
      expect(gateway.count('tools/list')).toBe(2);
    });

    it('refreshes on the interval and retries failures with backoff', async () => {
      vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] });
      const coordinator = createCoordinator();
      await coordinator.setup();

      gateway.tools.push({ name: 'echo', description: 'Echoes input' });
      await vi.advanceTimersByTimeAsync(60_000);
      await vi.waitFor(() => expect(toolNames(coordinator)).toContain('echo'));

      gateway.failOnce('tools/list', 500);
      await vi.advanceTimersByTimeAsync(60_000);
      await vi.waitFor(() => expect(coordinator.state).toBe('degraded'));

      await vi.advanceTimersByTimeAsync(1000);
      await vi.waitFor(() => expect(coordinator.state).toBe('ready'));
      expect(gateway.count('tools/list')).toBe(4);
    });
  });

  describe('callTool', () => {
    it('runs a published tool end to end', async () => {
      const coordinator = createCoordinator();
      await coordinator.setup();

      const result = await coordinator.callTool('ping');

      expect(result.text).toBe('pong');
      expect(result.isError).toBe(false);
    });

    it('rejects invalid arguments without touching the network', async () => {
      const coordinator = createCoordinator();
      await coordinator.setup();
      const sentBefore = gateway.requests.length;

      const error = await coordinator.callTool('get_forecast', { days: 1 }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(SchemaValidationError);
      expect(error).toMatchObject({ violations: [{ path: 'location', message: 'Required' }] });
      expect(gateway.requests.length).toBe(sentBefore);
    });

    it('forwards validated arguments with defaults filled in', async () => {
      const coordinator = createCoordinator();
      await coordinator.setup();

      const result = await coordinator.callTool('get_forecast', { location: 'Brooklin, ME' });

      expect(result.text).toBe('forecast for Brooklin, ME');
      const call = gateway.requests.find(request => request.rpcMethod === 'tools/call');
      expect(call?.params).toEqual({ name: 'get_forecast', arguments: { location: 'Brooklin, ME', units: 'metric' } });
    });

    it('reconnects once and retries when the session expired', async () => {
      const coordinator = createCoordinator();
      await coordinator.setup();
      gateway.expireSessions();

      const result = await coordinator.callTool('ping');

      expect(result.text).toBe('pong');
      expect(gateway.count('initialize')).toBe(2);
      expect(gateway.count('tools/call')).toBe(2);
      expect(coordinator.session?.id).toBe('session-2');
    });

    it('shares one reconnection between calls that all hit an expired session', async () => {
      const coordinator = createCoordinator();
      await coordinator.setup();
      gateway.expireSessions();

      const results = await Promise.all([
        coordinator.callTool('ping'),
        coordinator.callTool('ping'),
        coordinator.callTool('ping'),
      ]);

      expect(results.map(result => result.text)).toEqual(['pong', 'pong', 'pong']);
      expect(gateway.count('initialize')).toBe(2);
    });

    it('classifies an unreachable gateway', async () => {
      const coordinator = createCoordinator();
      await coordinator.setup();
      gateway.networkError = new Error('ECONNREFUSED');

      const error = await coordinator.callTool('ping').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(GatewayCallError);
      expect(error).toMatchObject({
        kind: 'unreachable',
        toolName: 'ping',
        message: 'Failed to reach gateway at http://gateway.test/mcp: ECONNREFUSED',
      });
      expect(error instanceof GatewayCallError && error.cause).toBeInstanceOf(ConnectionError);
    });

    it('classifies rejected credentials', async () => {
      const coordinator = createCoordinator();
      await coordinator.setup();
      gateway.authToken = 'test-secret';

      await expect(coordinator.callTool('ping')).rejects.toMatchObject({ kind: 'auth_failed' });
    });

    it('classifies a tool that runs past the execution timeout', async () => {
      gateway.tools.push({ name: 'slow' });
      gateway.handlers.set('slow', async (_args, signal) => {
        await delay(1000, signal);
        return textResult('late');
      });
      const coordinator = createCoordinator({ executionTimeoutMs: 50 });
      await coordinator.setup();

      await expect(coordinator.callTool('slow')).rejects.toMatchObject({
        kind: 'timeout',
        message: "Tool 'slow' timed out after 50ms",
      });
    });

    it('classifies a tool that reports failure', async () => {
      gateway.tools.push({ name: 'fails' });
      gateway.handlers.set('fails', () => ({ content: [{ type: 'text', text: 'disk full' }], isError: true }));
      const coordinator = createCoordinator();
      await coordinator.setup();

      await expect(coordinator.callTool('fails')).rejects.toMatchObject({
        kind: 'remote_error',
        message: "Tool 'fails' reported an error: disk full",
      });
    });

    it('classifies a JSON-RPC error from the gateway as a remote error', async () => {
      const coordinator = createCoordinator();
      await coordinator.setup();

      await expect(coordinator.callTool('admin_reset')).rejects.toMatchObject({
        kind: 'remote_error',
        message: "Tool 'admin_reset' failed with JSON-RPC error -32602: Unknown tool: admin_reset",
      });
    });

    it('classifies a cancelled call', async () => {
      const coordinator = createCoordinator();
      await coordinator.setup();
      const controller = new AbortController();
      controller.abort();

      await expect(coordinator.callTool('ping', {}, { signal: controller.signal })).rejects.toMatchObject({
        kind: 'cancelled',
      });
    });

    it('emits toolExecuted for successes and failures', async () => {
      const coordinator = createCoordinator();
      await coordinator.setup();
      const events = record(coordinator);

      await coordinator.callTool('ping');
      await coordinator.callTool('missing').catch(() => undefined);

      expect(events).toEqual([
        { type: 'toolExecuted', toolName: 'ping', success: true, durationMs: expect.any(Number), errorKind: undefined },
        {
          type: 'toolExecuted',
          toolName: 'missing',
          success: false,
          durationMs: expect.any(Number),
          errorKind: 'tool_not_found',
        },
      ]);
    });
  });

  describe('teardown', () => {
    it('is idempotent and leaves the coordinator closed', async () => {
      const coordinator = createCoordinator();
      await coordinator.setup();

      await coordinator.teardown();
      await coordinator.teardown();

      expect(coordinator.state).toBe('closed');
      expect(gateway.deletes).toHaveLength(1);
      expect(coordinator.getCatalog().entries).toHaveLength(0);
      await expect(coordinator.callTool('ping')).rejects.toMatchObject({ kind: 'unreachable' });
      await expect(coordinator.refresh()).rejects.toBeInstanceOf(ConnectionError);
      await expect(coordinator.setup()).rejects.toBeInstanceOf(ConnectionError);
    });
  });

  describe('journal and diagnostics', () => {
    it('journals calls into an injected journal and leaves it open', async () => {
      const journal = new CallJournal(':memory:');
      const coordinator = createCoordinator({}, journal);
      await coordinator.setup();

      await coordinator.callTool('ping');
      await coordinator.callTool('get_forecast', { days: 1 }).catch(() => undefined);

      expect(journal.recent().map(entry => [entry.toolName, entry.success, entry.errorKind])).toEqual([
        ['get_forecast', false, 'invalid_arguments'],
        ['ping', true, null],
      ]);
      expect(coordinator.diagnostics(1).recentCalls.map(entry => entry.toolName)).toEqual(['get_forecast']);

      await coordinator.teardown();
      expect(journal.isOpen).toBe(true);
      journal.close();
    });

    it('opens and closes its own journal when given a path', async () => {
      const coordinator = createCoordinator({ journalPath: ':memory:' });
      await coordinator.setup();
      await coordinator.callTool('ping');

      expect(coordinator.diagnostics().recentCalls).toHaveLength(1);

      await coordinator.teardown();
      expect(coordinator.diagnostics().recentCalls).toEqual([]);
    });

    it('reports session and catalog without the credential', async () => {
      gateway.authToken = 'test-secret';
      const coordinator = createCoordinator({ authToken: 'test-secret' });
      await coordinator.setup();

      const diagnostics = coordinator.diagnostics();

      expect(diagnostics).toMatchObject({
        state: 'ready',
        session: { id: 'session-1', serverName: 'fake-gateway', serverVersion: '0.1.0' },
        pendingRequests: 0,
        catalog: { tools: ['ping', 'admin_reset', 'get_forecast'], status: 'fresh' },
        consecutiveFailures: 0,
        lastError: null,
      });
      expect(diagnostics.config.authToken).toBe(REDACTED);
      expect(JSON.stringify(diagnostics)).not.toContain('test-secret');
    });
  });
});
