/**
 * JSON-RPC wire codec
 *
 * Envelope builders, reply classification and the lenient result schemas for
 * tools/list and tools/call. Anything that does not parse becomes a
 * ProtocolError carrying the offending text.
 */

import { z } from 'zod';
import { ProtocolError } from './errors.js';
import type { ContentBlock, NormalizedToolResult } from './types.js';

export type JsonRpcId = string | number;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id: number;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export type JsonRpcMessage =
  | { kind: 'result'; id: JsonRpcId; result: unknown }
  | { kind: 'error'; id: JsonRpcId | null; error: JsonRpcErrorObject }
  | { kind: 'request'; id: JsonRpcId; method: string; params?: unknown }
  | { kind: 'notification'; method: string; params?: unknown };

export function buildRequest(id: number, method: string, params?: Record<string, unknown>): JsonRpcRequest {
  return params === undefined ? { jsonrpc: '2.0', id, method } : { jsonrpc: '2.0', id, method, params };
}

export function buildNotification(method: string, params?: Record<string, unknown>): JsonRpcNotification {
  return params === undefined ? { jsonrpc: '2.0', method } : { jsonrpc: '2.0', method, params };
}

const JsonRpcIdSchema = z.union([z.string(), z.number()]);

const EnvelopeSchema = z
  .object({
    jsonrpc: z.literal('2.0'),
    id: JsonRpcIdSchema.nullable().optional(),
    method: z.string().optional(),
    params: z.unknown().optional(),
    result: z.unknown().optional(),
    error: z
      .object({
        code: z.number().int(),
        message: z.string(),
        data: z.unknown().optional(),
      })
      .optional(),
  })
  .passthrough();

/**
 * Parse text as JSON, classifying failures as ProtocolError
 */
export function parseJsonPayload(text: string, source: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch (err) {
    throw new ProtocolError(`Malformed JSON in ${source}`, text, { cause: err });
  }
}

/**
 * Classify a decoded value as a JSON-RPC message, or null when it is not one
 */
export function toJsonRpcMessage(value: unknown): JsonRpcMessage | null {
  const parsed = EnvelopeSchema.safeParse(value);
  if (!parsed.success) {
    return null;
  }
  const envelope = parsed.data;

  if (envelope.error !== undefined && envelope.id !== undefined) {
    return { kind: 'error', id: envelope.id, error: envelope.error };
  }
  if (envelope.id !== undefined && envelope.id !== null && hasKey(value, 'result')) {
    return { kind: 'result', id: envelope.id, result: envelope.result };
  }
  if (envelope.method !== undefined) {
    return envelope.id === undefined || envelope.id === null
      ? { kind: 'notification', method: envelope.method, params: envelope.params }
      : { kind: 'request', id: envelope.id, method: envelope.method, params: envelope.params };
  }
  return null;
}

function hasKey(value: unknown, key: string): boolean {
  return typeof value === 'object' && value !== null && key in value;
}

/**
 * True when the message answers the request with the given id
 */
export type JsonRpcReply = Extract<JsonRpcMessage, { kind: 'result' | 'error' }>;

export function isReplyTo(message: JsonRpcMessage, id: number): message is JsonRpcReply {
  return (message.kind === 'result' || message.kind === 'error') && message.id === id;
}

// ============================================================================
// RESULT SCHEMAS
// ============================================================================

const WireToolSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().nullish(),
    inputSchema: z.unknown().optional(),
  })
  .passthrough();

export const ListToolsResultSchema = z
  .object({
    tools: z.array(WireToolSchema),
    nextCursor: z.string().optional(),
  })
  .passthrough();

export type WireTool = z.infer<typeof WireToolSchema>;

const ContentBlockSchema = z.object({ type: z.string() }).passthrough();

export const CallToolResultSchema = z
  .object({
    content: z.array(ContentBlockSchema).default([]),
    structuredContent: z.unknown().optional(),
    isError: z.boolean().optional(),
  })
  .passthrough();

export type WireCallToolResult = z.infer<typeof CallToolResultSchema>;

/**
 * Parse a result payload against a schema, or fail with the payload as fragment
 */
export function parseResult<T extends z.ZodTypeAny>(schema: T, value: unknown, method: string): z.infer<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ProtocolError(`Unexpected result shape for '${method}'`, safeStringify(value), {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

function isTextBlock(block: ContentBlock): block is { type: 'text'; text: string } {
  return block.type === 'text' && typeof block.text === 'string';
}

/**
 * Flatten a tools/call result into one text value
 */
export function normalizeToolResult(result: WireCallToolResult): NormalizedToolResult {
  const content: ContentBlock[] = result.content;
  const texts = content.filter(isTextBlock).map(block => block.text);

  let text: string;
  if (texts.length > 0) {
    text = texts.join('\n');
  } else if (result.structuredContent !== undefined) {
    text = safeStringify(result.structuredContent);
  } else if (content.length > 0) {
    text = safeStringify(content);
  } else {
    text = '';
  }

  const normalized: NormalizedToolResult = { text, content, isError: result.isError === true };
  if (result.structuredContent !== undefined) {
    normalized.structured = result.structuredContent;
  }
  return normalized;
}

export function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
