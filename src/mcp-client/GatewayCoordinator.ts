/**
 * Gateway Coordinator
 *
 * Owns one TransportClient and drives its lifecycle: handshake, initial
 * catalog fetch, periodic refresh with backoff, serialized reconnection and
 * allow/block-list filtering. Every failure leaving callTool() is one of
 * ToolNotFoundError, SchemaValidationError or GatewayCallError.
 *
 * States: idle -> connecting -> ready <-> degraded (-> failed), closed after teardown().
 */

import { CallJournal, REDACTED } from '../db/journal.js';
import { BackoffPolicy } from './backoff.js';
import {
  ConnectionError,
  GatewayCallError,
  SessionExpiredError,
  ToolNotFoundError,
  classifyFailure,
  toolFailureKind,
} from './errors.js';
import { ToolSchemaTranslator } from './ToolSchemaTranslator.js';
import { TransportClient, errorMessage } from './TransportClient.js';
import type {
  CatalogEntry,
  ClientIdentity,
  CoordinatorState,
  GatewayConfig,
  GatewayDiagnostics,
  McpClientEvent,
  McpClientEventHandler,
  NormalizedToolResult,
  Session,
  ToolCatalog,
  ToolDescriptor,
} from './types.js';

export interface CoordinatorOptions {
  clientInfo?: ClientIdentity;
  /** Injected for tests; defaults to the global fetch */
  fetch?: typeof fetch;
  /** Journal owned by the caller; otherwise one is opened at config.journalPath */
  journal?: CallJournal;
}

export interface ToolCallOptions {
  signal?: AbortSignal;
}

const EMPTY_CATALOG: ToolCatalog = Object.freeze({
  entries: Object.freeze([]),
  byName: new Map<string, CatalogEntry>(),
  fetchedAt: null,
  status: 'stale',
});

/**
 * Lifecycle owner for a single gateway
 */
export class GatewayCoordinator {
  private coordinatorState: CoordinatorState = 'idle';
  private catalog: ToolCatalog = EMPTY_CATALOG;
  private readonly transport: TransportClient;
  private readonly backoff: BackoffPolicy;
  private readonly journal: CallJournal | undefined;
  private readonly ownsJournal: boolean;
  private readonly allowed: ReadonlySet<string> | null;
  private readonly blocked: ReadonlySet<string>;
  private eventHandlers: Set<McpClientEventHandler> = new Set();
  private reconnecting: Promise<Session> | null = null;
  private refreshing: Promise<ToolCatalog> | null = null;
  private refreshTimer: ReturnType<typeof setTimeout> | null = null;
  private loopActive = false;
  private consecutiveFailures = 0;
  private lastRefreshError: Error | null = null;

  constructor(
    private readonly config: GatewayConfig,
    options: CoordinatorOptions = {}
  ) {
    this.transport = new TransportClient({
      url: config.url,
      authToken: config.authToken,
      connectTimeoutMs: config.connectTimeoutMs,
      executionTimeoutMs: config.executionTimeoutMs,
      clientInfo: options.clientInfo,
      fetch: options.fetch,
    });
    this.backoff = new BackoffPolicy({
      initialDelayMs: config.backoffInitialMs,
      maxDelayMs: config.backoffMaxMs,
    });
    this.allowed = config.allowedTools ? new Set(config.allowedTools) : null;
    this.blocked = new Set(config.blockedTools);

    if (options.journal) {
      this.journal = options.journal;
      this.ownsJournal = false;
    } else {
      this.journal = config.journalPath ? new CallJournal(config.journalPath) : undefined;
      this.ownsJournal = this.journal !== undefined;
    }
  }

  get state(): CoordinatorState {
    return this.coordinatorState;
  }

  get session(): Session | null {
    return this.transport.session;
  }

  /**
   * Current published catalog. Replaced wholesale on refresh, so a reference
   * obtained here never changes underneath the caller.
   */
  getCatalog(): ToolCatalog {
    return this.catalog;
  }

  // ==========================================================================
  // LIFECYCLE
  // ==========================================================================

  /**
   * Connect and fetch the initial catalog. On failure the transport is torn
   * down before the error is rethrown and the coordinator returns to idle.
   */
  async setup(): Promise<void> {
    if (this.coordinatorState === 'closed') {
      throw new ConnectionError('Gateway coordinator has been torn down');
    }
    if (this.coordinatorState !== 'idle') {
      console.error(`[GatewayCoordinator] Already set up (state: ${this.coordinatorState})`);
      return;
    }

    console.error(`[GatewayCoordinator] Setting up gateway ${this.config.url}...`);
    this.setState('connecting');

    try {
      await this.ensureConnected();
      const catalog = await this.refresh();
      this.assertOpen();
      this.loopActive = true;
      this.schedule(this.config.refreshIntervalMs);
      console.error(`[GatewayCoordinator] Ready with ${catalog.entries.length} tools`);
    } catch (err) {
      console.error('[GatewayCoordinator] Setup failed:', errorMessage(err));
      await this.transport.disconnect();
      if (this.state !== 'closed') {
        this.catalog = EMPTY_CATALOG;
        this.setState('idle');
      }
      throw err;
    }
  }

  /**
   * Stop the refresh loop and release the session. Idempotent.
   */
  async teardown(): Promise<void> {
    if (this.coordinatorState === 'closed') {
      return;
    }

    console.error('[GatewayCoordinator] Tearing down...');
    this.loopActive = false;
    this.clearTimer();
    this.setState('closed');
    this.catalog = EMPTY_CATALOG;

    await this.transport.disconnect();

    if (this.ownsJournal) {
      this.journal?.close();
    }
    console.error('[GatewayCoordinator] Teardown complete');
  }

  /**
   * Connect if there is no live session. Concurrent callers share one attempt.
   */
  ensureConnected(): Promise<Session> {
    if (this.coordinatorState === 'closed') {
      return Promise.reject(new ConnectionError('Gateway coordinator has been torn down'));
    }
    const session = this.transport.session;
    if (session && this.transport.isConnected()) {
      return Promise.resolve(session);
    }
    if (!this.reconnecting) {
      this.reconnecting = this.transport.connect().finally(() => {
        this.reconnecting = null;
      });
    }
    return this.reconnecting;
  }

  // ==========================================================================
  // CATALOG REFRESH
  // ==========================================================================

  /**
   * Re-list the gateway's tools. Concurrent callers share the in-flight attempt.
   * On failure the previous catalog is kept and marked stale.
   */
  refresh(): Promise<ToolCatalog> {
    if (this.coordinatorState === 'closed') {
      return Promise.reject(new ConnectionError('Gateway coordinator has been torn down'));
    }
    if (!this.refreshing) {
      this.refreshing = this.performRefresh().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async performRefresh(): Promise<ToolCatalog> {
    try {
      await this.ensureConnected();
      const tools = await this.transport.listTools({ timeoutMs: this.config.refreshTimeoutMs });
      this.assertOpen();

      const catalog = this.buildCatalog(tools);
      this.catalog = catalog;
      this.consecutiveFailures = 0;
      this.lastRefreshError = null;
      this.backoff.reset();
      this.setState('ready');
      this.emit({ type: 'catalogUpdated', tools: catalog.entries.map(entry => entry.descriptor.name) });
      this.schedule(this.config.refreshIntervalMs);
      return catalog;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      // setup() handles its own failures
      if (!this.loopActive || this.coordinatorState === 'closed') {
        throw error;
      }
      this.recordRefreshFailure(error);
      throw error;
    }
  }

  private recordRefreshFailure(error: Error): void {
    this.consecutiveFailures++;
    this.lastRefreshError = error;
    if (this.catalog.status === 'fresh') {
      this.catalog = Object.freeze({ ...this.catalog, status: 'stale' });
    }

    const limit = this.config.maxRefreshFailures;
    const exhausted = limit > 0 && this.consecutiveFailures >= limit;
    const retryInMs = exhausted ? null : this.backoff.next();

    this.setState(exhausted ? 'failed' : 'degraded');
    console.error(
      `[GatewayCoordinator] Refresh failed (${this.consecutiveFailures} in a row): ${error.message}` +
        (retryInMs === null ? '; giving up' : `; retrying in ${retryInMs}ms`)
    );
    this.emit({ type: 'refreshFailed', error, consecutiveFailures: this.consecutiveFailures, retryInMs });

    if (retryInMs === null) {
      this.clearTimer();
    } else {
      this.schedule(retryInMs);
    }
  }

  private buildCatalog(tools: readonly ToolDescriptor[]): ToolCatalog {
    const entries: CatalogEntry[] = [];
    const byName = new Map<string, CatalogEntry>();

    for (const descriptor of tools) {
      if (!this.isPublishable(descriptor.name)) {
        continue;
      }
      const entry: CatalogEntry = Object.freeze({
        descriptor: Object.freeze(descriptor),
        validator: ToolSchemaTranslator.toValidator(descriptor.inputSchema),
      });
      entries.push(entry);
      byName.set(descriptor.name, entry);
    }

    const hidden = tools.length - entries.length;
    if (hidden > 0) {
      console.error(`[GatewayCoordinator] ${hidden} tool(s) hidden by allow/block lists`);
    }

    return Object.freeze({
      entries: Object.freeze(entries),
      byName,
      fetchedAt: new Date(),
      status: 'fresh',
    });
  }

  private isPublishable(name: string): boolean {
    if (this.blocked.has(name)) return false;
    return this.allowed === null || this.allowed.has(name);
  }

  private schedule(delayMs: number): void {
    this.clearTimer();
    if (!this.loopActive) {
      return;
    }
    this.refreshTimer = setTimeout(() => {
      this.refreshTimer = null;
      this.refresh().catch((err: unknown) => {
        console.error('[GatewayCoordinator] Scheduled refresh failed:', errorMessage(err));
      });
    }, delayMs);
  }

  private clearTimer(): void {
    if (this.refreshTimer) {
      clearTimeout(this.refreshTimer);
      this.refreshTimer = null;
    }
  }

  // ==========================================================================
  // TOOL CALLS
  // ==========================================================================

  /**
   * Validate and execute a published tool
   */
  async callTool(
    name: string,
    args: Record<string, unknown> = {},
    options: ToolCallOptions = {}
  ): Promise<NormalizedToolResult> {
    const startTime = Date.now();
    try {
      const result = await this.dispatch(name, args, options.signal);
      this.afterCall(name, args, startTime);
      return result;
    } catch (err) {
      this.afterCall(name, args, startTime, err);
      throw err;
    }
  }

  private async dispatch(
    name: string,
    args: Record<string, unknown>,
    signal: AbortSignal | undefined
  ): Promise<NormalizedToolResult> {
    if (this.coordinatorState === 'closed') {
      throw new GatewayCallError('unreachable', name, 'Gateway coordinator has been torn down');
    }

    const entry = this.catalog.byName.get(name);
    if (!entry) {
      throw new ToolNotFoundError(name);
    }

    const validated = ToolSchemaTranslator.check(entry.validator, args);
    const callArgs = isRecord(validated) ? validated : args;

    try {
      return await this.callWithSessionRetry(name, callArgs, signal);
    } catch (err) {
      throw new GatewayCallError(classifyFailure(err), name, errorMessage(err), { cause: err });
    }
  }

  private async callWithSessionRetry(
    name: string,
    args: Record<string, unknown>,
    signal: AbortSignal | undefined
  ): Promise<NormalizedToolResult> {
    const options = { timeoutMs: this.config.executionTimeoutMs, signal };
    await this.ensureConnected();
    try {
      return await this.transport.callTool(name, args, options);
    } catch (err) {
      if (!(err instanceof SessionExpiredError)) {
        throw err;
      }
      // the gateway never saw the call
      console.error(`[GatewayCoordinator] Session expired during '${name}', reconnecting`);
      await this.ensureConnected();
      return this.transport.callTool(name, args, options);
    }
  }

  private afterCall(name: string, args: Record<string, unknown>, startTime: number, err?: unknown): void {
    const durationMs = Date.now() - startTime;
    const errorKind = err === undefined ? undefined : toolFailureKind(err);

    if (this.journal?.isOpen) {
      try {
        this.journal.record({
          toolName: name,
          args,
          success: err === undefined,
          errorKind,
          error: err === undefined ? undefined : errorMessage(err),
          durationMs,
        });
      } catch (journalErr) {
        console.error('[GatewayCoordinator] Failed to journal tool call:', journalErr);
      }
    }

    this.emit({ type: 'toolExecuted', toolName: name, success: err === undefined, durationMs, errorKind });
  }

  // ==========================================================================
  // DIAGNOSTICS & EVENTS
  // ==========================================================================

  /**
   * Snapshot for support output; the credential is never included
   */
  diagnostics(recentCalls = 10): GatewayDiagnostics {
    const session = this.transport.session;
    const lastActivity = this.transport.lastActivity;
    return {
      state: this.coordinatorState,
      session: session
        ? {
            id: session.id,
            protocolVersion: session.protocolVersion,
            serverName: session.serverInfo.name,
            serverVersion: session.serverInfo.version,
            connectedAt: session.connectedAt.toISOString(),
          }
        : null,
      lastActivity: lastActivity ? lastActivity.toISOString() : null,
      pendingRequests: this.transport.pendingCount,
      catalog: {
        tools: this.catalog.entries.map(entry => entry.descriptor.name),
        status: this.catalog.status,
        fetchedAt: this.catalog.fetchedAt ? this.catalog.fetchedAt.toISOString() : null,
      },
      consecutiveFailures: this.consecutiveFailures,
      lastError: this.lastRefreshError ? this.lastRefreshError.message : null,
      recentCalls: this.journal?.isOpen ? this.journal.recent(recentCalls) : [],
      config: redactConfig(this.config),
    };
  }

  addEventListener(handler: McpClientEventHandler): void {
    this.eventHandlers.add(handler);
  }

  removeEventListener(handler: McpClientEventHandler): void {
    this.eventHandlers.delete(handler);
  }

  private emit(event: McpClientEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (err) {
        console.error(`[GatewayCoordinator] Event handler error:`, err);
      }
    }
  }

  private setState(next: CoordinatorState): void {
    const previous = this.coordinatorState;
    if (previous === next) {
      return;
    }
    this.coordinatorState = next;
    console.error(`[GatewayCoordinator] ${previous} -> ${next}`);
    this.emit({ type: 'stateChanged', from: previous, to: next });
  }

  private assertOpen(): void {
    if (this.coordinatorState === 'closed') {
      throw new ConnectionError('Gateway coordinator was torn down mid-operation');
    }
  }
}

export function redactConfig(config: GatewayConfig): GatewayConfig {
  return config.authToken === undefined ? { ...config } : { ...config, authToken: REDACTED };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export default GatewayCoordinator;
