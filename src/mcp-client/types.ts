/**
 * MCP Client Types
 *
 * Type definitions shared by the transport, the coordinator and the tool
 * gateway that publishes a remote gateway's tools to an LLM tool framework.
 */

import type { ZodTypeAny } from 'zod';
import type { ToolFailureKind } from './errors.js';

// ============================================================================
// GATEWAY CONFIGURATION
// ============================================================================

/**
 * Settings for one Streamable HTTP gateway connection
 */
export interface GatewayConfig {
  /** Gateway endpoint receiving JSON-RPC POSTs */
  url: string;

  /** Optional bearer credential sent on every request */
  authToken?: string;

  /** Tools permitted to be published; undefined means no allow-list */
  allowedTools?: readonly string[];

  /** Tools never published, even when allowed */
  blockedTools: readonly string[];

  /** Handshake and default request ceiling (ms) */
  connectTimeoutMs: number;

  /** tools/call ceiling (ms) */
  executionTimeoutMs: number;

  /** tools/list ceiling (ms) */
  refreshTimeoutMs: number;

  /** Delay between successful catalog refreshes (ms) */
  refreshIntervalMs: number;

  /** First retry delay after a failed refresh (ms) */
  backoffInitialMs: number;

  /** Ceiling for retry delays (ms) */
  backoffMaxMs: number;

  /** Consecutive refresh failures before giving up; 0 retries forever */
  maxRefreshFailures: number;

  /** SQLite file for the call journal; journal disabled when absent */
  journalPath?: string;
}

/**
 * Client identity announced during the handshake
 */
export interface ClientIdentity {
  name: string;
  version: string;
}

// ============================================================================
// TOOL DEFINITIONS
// ============================================================================

/**
 * JSON Schema subset used by tool input schemas
 */
export interface JsonSchema {
  type?: string | string[];
  properties?: Record<string, JsonSchema>;
  required?: string[];
  items?: JsonSchema;
  additionalProperties?: boolean | JsonSchema;
  enum?: unknown[];
  const?: unknown;
  anyOf?: JsonSchema[];
  oneOf?: JsonSchema[];
  allOf?: JsonSchema[];
  description?: string;
  default?: unknown;
  nullable?: boolean;
  [key: string]: unknown;
}

/**
 * Tool as listed by the gateway
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: JsonSchema;
}

/**
 * Catalog entry: a published descriptor with its compiled argument validator
 */
export interface CatalogEntry {
  readonly descriptor: ToolDescriptor;
  readonly validator: ZodTypeAny;
}

export type CatalogStatus = 'fresh' | 'stale';

/**
 * Immutable snapshot of the published tools. Replaced wholesale, never edited.
 */
export interface ToolCatalog {
  readonly entries: readonly CatalogEntry[];
  readonly byName: ReadonlyMap<string, CatalogEntry>;
  readonly fetchedAt: Date | null;
  readonly status: CatalogStatus;
}

// ============================================================================
// OPENAI-COMPATIBLE TOOL FORMAT
// ============================================================================

export interface OpenAIFunction {
  name: string;
  description?: string;
  parameters: JsonSchema;
}

export interface OpenAITool {
  type: 'function';
  function: OpenAIFunction;
}

// ============================================================================
// ANTHROPIC-COMPATIBLE TOOL FORMAT
// ============================================================================

export interface AnthropicTool {
  name: string;
  description?: string;
  input_schema: JsonSchema;
}

// ============================================================================
// TOOL EXECUTION
// ============================================================================

/**
 * Content block of a tools/call result
 */
export type ContentBlock =
  | { type: 'text'; text: string }
  | { type: string; [key: string]: unknown };

/**
 * tools/call result flattened to a single text-bearing value
 */
export interface NormalizedToolResult {
  text: string;
  content: ContentBlock[];
  structured?: unknown;
  isError: boolean;
}

export interface CallOptions {
  /** Overrides the configured ceiling for this call (ms) */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Outcome handed to the host tool framework
 */
export interface ToolExecutionResult {
  /** Whether the execution was successful */
  success: boolean;

  /** Normalised text content (if successful) */
  content?: string;

  /** Structured content, when the tool returned some */
  structured?: unknown;

  /** Error message (if failed) */
  error?: string;

  /** Classified failure kind (if failed) */
  errorKind?: ToolFailureKind;

  /** Execution time in milliseconds */
  executionTime: number;

  /** Tool that was executed */
  toolName: string;
}

// ============================================================================
// CONNECTION STATE
// ============================================================================

export type TransportState = 'disconnected' | 'connecting' | 'connected';

export type CoordinatorState = 'idle' | 'connecting' | 'ready' | 'degraded' | 'failed' | 'closed';

/**
 * Live session negotiated with the gateway
 */
export interface Session {
  readonly id: string;
  readonly protocolVersion: string;
  readonly serverInfo: { name: string; version: string };
  readonly capabilities: Record<string, unknown>;
  readonly instructions?: string;
  readonly connectedAt: Date;
}

// ============================================================================
// EVENT TYPES
// ============================================================================

export type McpClientEvent =
  | { type: 'stateChanged'; from: CoordinatorState; to: CoordinatorState }
  | { type: 'catalogUpdated'; tools: string[] }
  | { type: 'refreshFailed'; error: Error; consecutiveFailures: number; retryInMs: number | null }
  | { type: 'toolExecuted'; toolName: string; success: boolean; durationMs: number; errorKind?: ToolFailureKind };

export type McpClientEventHandler = (event: McpClientEvent) => void;

// ============================================================================
// DIAGNOSTICS
// ============================================================================

/**
 * One recorded tool call
 */
export interface JournalEntry {
  id: number;
  timestamp: string;
  toolName: string;
  /** Arguments JSON with secret-looking values redacted */
  args: string;
  success: boolean;
  errorKind: ToolFailureKind | null;
  error: string | null;
  durationMs: number;
}

export interface GatewayDiagnostics {
  state: CoordinatorState;
  session: {
    id: string;
    protocolVersion: string;
    serverName: string;
    serverVersion: string;
    connectedAt: string;
  } | null;
  lastActivity: string | null;
  pendingRequests: number;
  catalog: {
    tools: string[];
    status: CatalogStatus;
    fetchedAt: string | null;
  };
  consecutiveFailures: number;
  lastError: string | null;
  recentCalls: JournalEntry[];
  /** Credential replaced with a redaction marker */
  config: GatewayConfig;
}
