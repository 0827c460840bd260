/**
 * MCP Client Errors
 *
 * Error taxonomy for the gateway client. Transport-level failures are
 * reclassified into GatewayCallError at the coordinator boundary, so callers
 * outside the core only ever see the kinds listed in CallFailureKind.
 */

export type McpErrorCode =
  | 'connection'
  | 'auth'
  | 'protocol'
  | 'rpc'
  | 'timeout'
  | 'cancelled'
  | 'tool_execution'
  | 'remote_tool'
  | 'tool_not_found'
  | 'schema_validation'
  | 'gateway_call'
  | 'config';

/**
 * Base class for every error raised by the client
 */
export abstract class McpClientError extends Error {
  abstract readonly code: McpErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ============================================================================
// TRANSPORT
// ============================================================================

export class ConnectionError extends McpClientError {
  readonly code = 'connection' as const;

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * The gateway no longer recognises our session id (HTTP 404 on a session request)
 */
export class SessionExpiredError extends ConnectionError {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} expired on the gateway`, 404);
  }
}

export class AuthError extends McpClientError {
  readonly code = 'auth' as const;

  constructor(readonly status: number, message = `Gateway rejected credentials (HTTP ${status})`) {
    super(message);
  }
}

export class ProtocolError extends McpClientError {
  readonly code = 'protocol' as const;

  constructor(
    message: string,
    /** Raw payload that could not be understood, truncated for logging */
    readonly fragment?: string,
    options?: { cause?: unknown }
  ) {
    super(fragment === undefined ? message : `${message}: ${truncate(fragment)}`, options);
  }
}

/**
 * JSON-RPC error object returned by the gateway
 */
export class RpcError extends McpClientError {
  readonly code: McpErrorCode = 'rpc';

  constructor(
    readonly rpcCode: number,
    readonly remoteMessage: string,
    readonly data?: unknown
  ) {
    super(`JSON-RPC error ${rpcCode}: ${remoteMessage}`);
  }
}

export class RequestTimeoutError extends McpClientError {
  readonly code = 'timeout' as const;

  constructor(
    readonly method: string,
    readonly timeoutMs: number,
    message = `Request '${method}' timed out after ${timeoutMs}ms`
  ) {
    super(message);
  }
}

export class RequestCancelledError extends McpClientError {
  readonly code = 'cancelled' as const;

  constructor(readonly method: string, reason?: unknown) {
    super(`Request '${method}' was cancelled`, { cause: reason });
  }
}

// ============================================================================
// TOOLS
// ============================================================================

export class ToolTimeoutError extends RequestTimeoutError {
  constructor(readonly toolName: string, timeoutMs: number) {
    super('tools/call', timeoutMs, `Tool '${toolName}' timed out after ${timeoutMs}ms`);
  }
}

/**
 * The gateway answered tools/call with a JSON-RPC error
 */
export class ToolExecutionError extends RpcError {
  override readonly code = 'tool_execution' as const;

  constructor(readonly toolName: string, rpcCode: number, remoteMessage: string, data?: unknown) {
    super(rpcCode, remoteMessage, data);
    this.message = `Tool '${toolName}' failed with JSON-RPC error ${rpcCode}: ${remoteMessage}`;
  }
}

/**
 * The tool ran and reported failure itself (result.isError)
 */
export class RemoteToolError extends McpClientError {
  readonly code = 'remote_tool' as const;

  constructor(readonly toolName: string, readonly remoteMessage: string) {
    super(`Tool '${toolName}' reported an error: ${remoteMessage}`);
  }
}

export class ToolNotFoundError extends McpClientError {
  readonly code = 'tool_not_found' as const;

  constructor(readonly toolName: string) {
    super(`Tool '${toolName}' is not available`);
  }
}

export interface SchemaViolation {
  /** Dotted path to the offending value, '' for the root */
  path: string;
  message: string;
}

export class SchemaValidationError extends McpClientError {
  readonly code = 'schema_validation' as const;

  constructor(readonly violations: readonly SchemaViolation[]) {
    super(`Invalid arguments: ${violations.map(formatViolation).join('; ')}`);
  }
}

export function formatViolation(violation: SchemaViolation): string {
  return violation.path ? `${violation.path}: ${violation.message}` : violation.message;
}

// ============================================================================
// COORDINATOR BOUNDARY
// ============================================================================

export type CallFailureKind = 'unreachable' | 'auth_failed' | 'timeout' | 'remote_error' | 'cancelled';

export class GatewayCallError extends McpClientError {
  readonly code = 'gateway_call' as const;

  constructor(
    readonly kind: CallFailureKind,
    readonly toolName: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Map any failure coming out of the transport onto a coordinator-level kind
 */
export function classifyFailure(err: unknown): CallFailureKind {
  if (err instanceof AuthError) return 'auth_failed';
  if (err instanceof ConnectionError) return 'unreachable';
  if (err instanceof RequestTimeoutError) return 'timeout';
  if (err instanceof RequestCancelledError) return 'cancelled';
  return 'remote_error';
}

export type ToolFailureKind = CallFailureKind | 'tool_not_found' | 'invalid_arguments';

/**
 * Failure kind reported to the host for an error thrown by GatewayCoordinator.callTool
 */
export function toolFailureKind(err: unknown): ToolFailureKind {
  if (err instanceof ToolNotFoundError) return 'tool_not_found';
  if (err instanceof SchemaValidationError) return 'invalid_arguments';
  if (err instanceof GatewayCallError) return err.kind;
  return classifyFailure(err);
}

export class ConfigError extends McpClientError {
  readonly code = 'config' as const;

  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

function truncate(text: string, max = 200): string {
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
