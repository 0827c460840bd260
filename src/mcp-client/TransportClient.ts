/**
 * Transport Client
 *
 * Speaks MCP over Streamable HTTP to a single gateway: the initialize
 * handshake, JSON-RPC request/reply correlation, event-stream reassembly and
 * session termination. Every request is an independent POST with its own id
 * and abort controller, so concurrent calls never interfere.
 */

import {
  InitializeResultSchema,
  LATEST_PROTOCOL_VERSION,
  SUPPORTED_PROTOCOL_VERSIONS,
} from '@modelcontextprotocol/sdk/types.js';
import {
  AuthError,
  ConnectionError,
  McpClientError,
  ProtocolError,
  RemoteToolError,
  RequestCancelledError,
  RequestTimeoutError,
  RpcError,
  SessionExpiredError,
  ToolExecutionError,
  ToolTimeoutError,
} from './errors.js';
import { readEventStream } from './streaming.js';
import { ToolSchemaTranslator } from './ToolSchemaTranslator.js';
import type {
  CallOptions,
  ClientIdentity,
  NormalizedToolResult,
  Session,
  ToolDescriptor,
  TransportState,
} from './types.js';
import {
  buildNotification,
  buildRequest,
  CallToolResultSchema,
  isReplyTo,
  ListToolsResultSchema,
  normalizeToolResult,
  parseJsonPayload,
  parseResult,
  safeStringify,
  toJsonRpcMessage,
  type JsonRpcMessage,
  type JsonRpcNotification,
  type JsonRpcReply,
  type JsonRpcRequest,
  type WireTool,
} from './wire.js';

const SESSION_HEADER = 'mcp-session-id';
const PROTOCOL_VERSION_HEADER = 'mcp-protocol-version';
const MAX_LIST_PAGES = 50;

export const DEFAULT_CLIENT_INFO: ClientIdentity = {
  name: 'mcp-gateway-client',
  version: '1.0.0',
};

export interface TransportOptions {
  url: string;
  authToken?: string;
  /** Handshake ceiling, also the default for plain requests (ms) */
  connectTimeoutMs: number;
  /** tools/call ceiling (ms) */
  executionTimeoutMs: number;
  clientInfo?: ClientIdentity;
  /** Version offered in the handshake (default: latest supported) */
  protocolVersion?: string;
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof fetch;
}

interface PendingRequest {
  /** Wire id; restarts with every session, so not unique across reconnects */
  id: number;
  method: string;
  controller: AbortController;
  startedAt: number;
}

/**
 * One Streamable HTTP connection to an MCP gateway
 */
export class TransportClient {
  private transportState: TransportState = 'disconnected';
  private currentSession: Session | null = null;
  private lastActivityAt: Date | null = null;
  private nextId = 0;
  private generation = 0;
  private connecting: Promise<Session> | null = null;
  private terminatedSessionId: string | null = null;
  private readonly pending = new Set<PendingRequest>();
  private readonly notices = new Set<AbortController>();
  private readonly url: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: TransportOptions) {
    this.url = options.url.replace(/\/+$/, '');
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get state(): TransportState {
    return this.transportState;
  }

  get session(): Session | null {
    return this.currentSession;
  }

  get lastActivity(): Date | null {
    return this.lastActivityAt;
  }

  /** Requests awaiting a reply */
  get pendingCount(): number {
    return this.pending.size;
  }

  isConnected(): boolean {
    return this.transportState === 'connected' && this.currentSession !== null;
  }

  /**
   * Perform the initialize handshake. Concurrent callers share one attempt.
   */
  async connect(): Promise<Session> {
    if (this.isConnected() && this.currentSession) {
      return this.currentSession;
    }
    if (!this.connecting) {
      this.connecting = this.handshake().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async handshake(): Promise<Session> {
    const generation = ++this.generation;
    this.transportState = 'connecting';
    this.currentSession = null;
    this.nextId = 0;

    const clientInfo = this.options.clientInfo ?? DEFAULT_CLIENT_INFO;
    let issuedSessionId: string | undefined;

    console.error(`[TransportClient] Connecting to ${this.url}...`);

    try {
      const reply = await this.exchange(
        'initialize',
        {
          protocolVersion: this.options.protocolVersion ?? LATEST_PROTOCOL_VERSION,
          capabilities: {},
          clientInfo: { ...clientInfo },
        },
        this.options.connectTimeoutMs
      );
      issuedSessionId = reply.sessionId;
      this.assertGeneration(generation);

      const init = InitializeResultSchema.safeParse(reply.result);
      if (!init.success) {
        throw new ProtocolError('Incomplete handshake response', safeStringify(reply.result));
      }
      if (!SUPPORTED_PROTOCOL_VERSIONS.includes(init.data.protocolVersion)) {
        throw new ProtocolError(`Gateway negotiated unsupported protocol version '${init.data.protocolVersion}'`);
      }
      if (!issuedSessionId) {
        throw new ProtocolError('Handshake response did not include a session id');
      }

      const session: Session = Object.freeze({
        id: issuedSessionId,
        protocolVersion: init.data.protocolVersion,
        serverInfo: { name: init.data.serverInfo.name, version: init.data.serverInfo.version },
        capabilities: init.data.capabilities,
        instructions: init.data.instructions,
        connectedAt: new Date(),
      });

      // the initialized notice must already carry the session headers
      this.currentSession = session;
      await this.notify('notifications/initialized', undefined, this.options.connectTimeoutMs);
      this.assertGeneration(generation);

      this.transportState = 'connected';
      this.lastActivityAt = new Date();
      console.error(
        `[TransportClient] Connected to ${session.serverInfo.name} ${session.serverInfo.version} ` +
          `(protocol ${session.protocolVersion})`
      );
      return session;
    } catch (err) {
      if (generation === this.generation) {
        this.currentSession = null;
        this.transportState = 'disconnected';
      }
      if (issuedSessionId) {
        await this.terminate(issuedSessionId);
      }
      const failure = classifyHandshakeFailure(err);
      console.error(`[TransportClient] Failed to connect to ${this.url}:`, failure.message);
      throw failure;
    }
  }

  private assertGeneration(generation: number): void {
    if (generation !== this.generation) {
      throw new ConnectionError('Connection attempt aborted by disconnect');
    }
  }

  /**
   * Send a request on the live session and return its result
   */
  async sendRequest(method: string, params?: Record<string, unknown>, options: CallOptions = {}): Promise<unknown> {
    if (!this.isConnected()) {
      throw new ConnectionError(`Not connected to gateway (cannot send '${method}')`);
    }
    const { result } = await this.exchange(
      method,
      params,
      options.timeoutMs ?? this.options.connectTimeoutMs,
      options.signal
    );
    return result;
  }

  /**
   * List the gateway's tools, following pagination cursors
   */
  async listTools(options: CallOptions = {}): Promise<ToolDescriptor[]> {
    const tools: ToolDescriptor[] = [];
    const seen = new Set<string>();
    let cursor: string | undefined;

    for (let page = 0; page < MAX_LIST_PAGES; page++) {
      const raw = await this.sendRequest('tools/list', cursor ? { cursor } : {}, options);
      const result = parseResult(ListToolsResultSchema, raw, 'tools/list');

      for (const tool of result.tools) {
        if (seen.has(tool.name)) {
          console.warn(`[TransportClient] Duplicate tool name '${tool.name}' ignored`);
          continue;
        }
        seen.add(tool.name);
        tools.push(toDescriptor(tool));
      }

      cursor = result.nextCursor;
      if (!cursor) {
        return tools;
      }
    }

    throw new ProtocolError(`tools/list did not complete within ${MAX_LIST_PAGES} pages`);
  }

  /**
   * Execute a tool; the execution timeout is independent of the connection timeout
   */
  async callTool(name: string, args: Record<string, unknown>, options: CallOptions = {}): Promise<NormalizedToolResult> {
    const timeoutMs = options.timeoutMs ?? this.options.executionTimeoutMs;
    let raw: unknown;
    try {
      raw = await this.sendRequest('tools/call', { name, arguments: args }, { timeoutMs, signal: options.signal });
    } catch (err) {
      if (err instanceof RequestTimeoutError) {
        throw new ToolTimeoutError(name, timeoutMs);
      }
      if (err instanceof RpcError) {
        throw new ToolExecutionError(name, err.rpcCode, err.remoteMessage, err.data);
      }
      throw err;
    }

    const result = normalizeToolResult(parseResult(CallToolResultSchema, raw, 'tools/call'));
    if (result.isError) {
      throw new RemoteToolError(name, result.text);
    }
    return result;
  }

  async ping(options: CallOptions = {}): Promise<void> {
    await this.sendRequest('ping', {}, options);
  }

  /**
   * Abort pending work, send one best-effort session termination and forget
   * the session. Safe to call repeatedly and before connect() succeeded.
   */
  async disconnect(): Promise<void> {
    this.generation++;
    for (const request of this.pending.values()) {
      request.controller.abort(new ConnectionError('Transport closed'));
    }
    for (const controller of this.notices) {
      controller.abort();
    }

    const session = this.currentSession;
    this.currentSession = null;
    this.transportState = 'disconnected';

    if (this.connecting) {
      // the connect() caller receives the failure; we only wait for it to settle
      await this.connecting.then(
        () => undefined,
        () => undefined
      );
    }

    if (session) {
      console.error(`[TransportClient] Disconnecting session ${session.id}...`);
      await this.terminate(session.id);
    }
  }

  // ==========================================================================
  // WIRE
  // ==========================================================================

  private buildHeaders(sessionId = this.currentSession?.id): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json, text/event-stream',
    };
    if (this.options.authToken) {
      headers.Authorization = `Bearer ${this.options.authToken}`;
    }
    if (sessionId) {
      headers[SESSION_HEADER] = sessionId;
    }
    if (this.currentSession) {
      headers[PROTOCOL_VERSION_HEADER] = this.currentSession.protocolVersion;
    }
    return headers;
  }

  private async exchange(
    method: string,
    params: Record<string, unknown> | undefined,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<{ result: unknown; sessionId?: string }> {
    if (signal?.aborted) {
      throw new RequestCancelledError(method, signal.reason);
    }

    const id = ++this.nextId;
    const controller = new AbortController();
    const entry: PendingRequest = { id, method, controller, startedAt: Date.now() };
    this.pending.add(entry);

    const timeout = AbortSignal.timeout(timeoutMs);
    const combined = AbortSignal.any(signal ? [controller.signal, timeout, signal] : [controller.signal, timeout]);

    try {
      const response = await this.post(buildRequest(id, method, params), combined);
      const sessionId = response.headers.get(SESSION_HEADER) ?? undefined;
      const reply = await this.readReply(response, id, method);
      this.lastActivityAt = new Date();

      if (reply.kind === 'error') {
        throw new RpcError(reply.error.code, reply.error.message, reply.error.data);
      }
      return { result: reply.result, sessionId };
    } catch (err) {
      if (controller.signal.aborted) {
        throw new ConnectionError(`Transport closed while awaiting '${method}'`, undefined, { cause: err });
      }
      if (signal?.aborted) {
        this.sendCancellation(id, method);
        throw new RequestCancelledError(method, signal.reason);
      }
      if (timeout.aborted) {
        this.sendCancellation(id, method);
        throw new RequestTimeoutError(method, timeoutMs);
      }
      throw err;
    } finally {
      this.pending.delete(entry);
    }
  }

  private async post(message: JsonRpcRequest | JsonRpcNotification, signal: AbortSignal): Promise<Response> {
    const sessionId = this.currentSession?.id;
    let response: Response;
    try {
      response = await this.fetchImpl(this.url, {
        method: 'POST',
        headers: this.buildHeaders(sessionId),
        body: JSON.stringify(message),
        signal,
      });
    } catch (err) {
      throw new ConnectionError(`Failed to reach gateway at ${this.url}: ${errorMessage(err)}`, undefined, {
        cause: err,
      });
    }

    if (!response.ok) {
      await this.rejectStatus(response, sessionId);
    }
    return response;
  }

  private async rejectStatus(response: Response, sessionId: string | undefined): Promise<never> {
    const status = response.status;
    const detail = await response.text().catch((err: unknown) => `<unreadable body: ${errorMessage(err)}>`);

    if (status === 401 || status === 403) {
      throw new AuthError(status);
    }
    if (status === 404 && sessionId) {
      // a reconnect may already have replaced the session this request carried
      if (this.currentSession?.id === sessionId) {
        this.currentSession = null;
        this.transportState = 'disconnected';
      }
      throw new SessionExpiredError(sessionId);
    }
    if (status >= 500 || status === 404 || status === 408 || status === 429) {
      throw new ConnectionError(`Gateway returned HTTP ${status}`, status);
    }
    throw new ProtocolError(`Gateway returned HTTP ${status}`, detail);
  }

  private async readReply(response: Response, id: number, method: string): Promise<JsonRpcReply> {
    const contentType = response.headers.get('content-type') ?? '';

    if (contentType.includes('text/event-stream')) {
      if (!response.body) {
        throw new ProtocolError(`Event stream reply to '${method}' had no body`);
      }
      for await (const value of readEventStream(response.body)) {
        const message = toJsonRpcMessage(value);
        if (!message) {
          throw new ProtocolError('Event stream carried a non JSON-RPC payload', safeStringify(value));
        }
        if ((message.kind === 'error' && message.id === null) || isReplyTo(message, id)) {
          return message;
        }
        this.skipUnsolicited(message, method);
      }
      throw new ProtocolError(`Event stream ended without a reply to '${method}' (id ${id})`);
    }

    const text = await response.text();
    if (text.trim() === '') {
      throw new ProtocolError(`Empty reply to '${method}'`);
    }
    const value = parseJsonPayload(text, `reply to '${method}'`);
    for (const item of Array.isArray(value) ? value : [value]) {
      const message = toJsonRpcMessage(item);
      if (!message) {
        throw new ProtocolError(`Reply to '${method}' is not a JSON-RPC message`, text);
      }
      if ((message.kind === 'error' && message.id === null) || isReplyTo(message, id)) {
        return message;
      }
      this.skipUnsolicited(message, method);
    }
    throw new ProtocolError(`Reply did not answer request ${id} ('${method}')`, text);
  }

  private skipUnsolicited(message: JsonRpcMessage, awaiting: string): void {
    const label =
      message.kind === 'notification' || message.kind === 'request'
        ? `${message.kind} '${message.method}'`
        : `${message.kind} for id ${String(message.id)}`;
    console.error(`[TransportClient] Skipping ${label} while awaiting '${awaiting}'`);
  }

  private async notify(method: string, params: Record<string, unknown> | undefined, timeoutMs: number): Promise<void> {
    const controller = new AbortController();
    const timeout = AbortSignal.timeout(timeoutMs);
    this.notices.add(controller);
    try {
      const response = await this.post(buildNotification(method, params), AbortSignal.any([controller.signal, timeout]));
      await response.body?.cancel();
    } catch (err) {
      if (timeout.aborted && !controller.signal.aborted) {
        throw new RequestTimeoutError(method, timeoutMs);
      }
      throw err;
    } finally {
      this.notices.delete(controller);
    }
  }

  private sendCancellation(requestId: number, method: string): void {
    if (!this.isConnected()) {
      return;
    }
    this.notify('notifications/cancelled', { requestId, reason: `${method} abandoned by client` }, this.options.connectTimeoutMs).catch(
      (err: unknown) => {
        console.error(`[TransportClient] Cancellation notice for request ${requestId} failed:`, errorMessage(err));
      }
    );
  }

  private async terminate(sessionId: string): Promise<void> {
    if (this.terminatedSessionId === sessionId) {
      return;
    }
    this.terminatedSessionId = sessionId;

    try {
      const response = await this.fetchImpl(this.url, {
        method: 'DELETE',
        headers: this.buildHeaders(sessionId),
        signal: AbortSignal.timeout(this.options.connectTimeoutMs),
      });
      await response.body?.cancel();
      // 405: the gateway does not support explicit termination
      if (!response.ok && response.status !== 405) {
        console.error(`[TransportClient] Session termination returned HTTP ${response.status}`);
      }
    } catch (err) {
      console.error(`[TransportClient] Session termination notice failed:`, errorMessage(err));
    }
  }
}

function toDescriptor(tool: WireTool): ToolDescriptor {
  const schema = ToolSchemaTranslator.normalizeJsonSchema(tool.inputSchema ?? {});
  if (schema.type === undefined && schema.anyOf === undefined && schema.oneOf === undefined) {
    schema.type = 'object';
  }
  if (schema.type === 'object' && schema.properties === undefined) {
    schema.properties = {};
  }
  return {
    name: tool.name,
    description: tool.description ?? '',
    inputSchema: schema,
  };
}

function classifyHandshakeFailure(err: unknown): McpClientError {
  if (err instanceof AuthError || err instanceof ConnectionError || err instanceof ProtocolError) {
    return err;
  }
  if (err instanceof RequestTimeoutError) {
    return new ConnectionError(`Handshake timed out after ${err.timeoutMs}ms`, undefined, { cause: err });
  }
  if (err instanceof RpcError) {
    return new ProtocolError(`Gateway rejected the handshake (${err.rpcCode}: ${err.remoteMessage})`, undefined, {
      cause: err,
    });
  }
  if (err instanceof McpClientError) {
    return new ConnectionError(err.message, undefined, { cause: err });
  }
  return new ConnectionError(`Handshake failed: ${errorMessage(err)}`, undefined, { cause: err });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
