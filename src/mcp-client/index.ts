/**
 * MCP Gateway Client
 *
 * Connects to a Streamable HTTP MCP gateway, keeps its tool catalog fresh and
 * exposes validated tool calls to LLM tool frameworks.
 */

// Core classes
export { TransportClient, DEFAULT_CLIENT_INFO } from './TransportClient.js';
export type { TransportOptions } from './TransportClient.js';
export { GatewayCoordinator, redactConfig } from './GatewayCoordinator.js';
export type { CoordinatorOptions, ToolCallOptions } from './GatewayCoordinator.js';
export { ToolGateway, API_PROMPT } from './ToolGateway.js';
export type { PublishedTool } from './ToolGateway.js';
export { ToolSchemaTranslator } from './ToolSchemaTranslator.js';
export { BackoffPolicy } from './backoff.js';
export type { BackoffOptions } from './backoff.js';
export { readEventStream } from './streaming.js';

// Errors
export {
  McpClientError,
  ConnectionError,
  SessionExpiredError,
  AuthError,
  ProtocolError,
  RpcError,
  RequestTimeoutError,
  RequestCancelledError,
  ToolTimeoutError,
  ToolExecutionError,
  RemoteToolError,
  ToolNotFoundError,
  SchemaValidationError,
  GatewayCallError,
  ConfigError,
  classifyFailure,
  toolFailureKind,
} from './errors.js';
export type { CallFailureKind, McpErrorCode, SchemaViolation, ToolFailureKind } from './errors.js';

// Types
export type {
  // Configuration
  GatewayConfig,
  ClientIdentity,
  JsonSchema,

  // Tools
  ToolDescriptor,
  CatalogEntry,
  CatalogStatus,
  ToolCatalog,

  // LLM formats
  OpenAITool,
  OpenAIFunction,
  AnthropicTool,

  // Execution
  ContentBlock,
  NormalizedToolResult,
  CallOptions,
  ToolExecutionResult,

  // Connection
  TransportState,
  CoordinatorState,
  Session,

  // Events & diagnostics
  McpClientEvent,
  McpClientEventHandler,
  JournalEntry,
  GatewayDiagnostics,
} from './types.js';
