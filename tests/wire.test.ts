import { describe, expect, it } from 'vitest';
import { ProtocolError } from '../src/mcp-client/errors.js';
import {
  buildNotification,
  buildRequest,
  CallToolResultSchema,
  isReplyTo,
  normalizeToolResult,
  parseJsonPayload,
  parseResult,
  toJsonRpcMessage,
} from '../src/mcp-client/wire.js';

describe('envelopes', () => {
  it('builds requests and notifications', () => {
    expect(buildRequest(3, 'tools/list', {})).toEqual({ jsonrpc: '2.0', id: 3, method: 'tools/list', params: {} });
    expect(buildRequest(4, 'ping')).toEqual({ jsonrpc: '2.0', id: 4, method: 'ping' });
    expect(buildNotification('notifications/initialized')).toEqual({
      jsonrpc: '2.0',
      method: 'notifications/initialized',
    });
  });
});

describe('toJsonRpcMessage', () => {
  it('classifies results, including null results', () => {
    expect(toJsonRpcMessage({ jsonrpc: '2.0', id: 1, result: { ok: true } })).toEqual({
      kind: 'result',
      id: 1,
      result: { ok: true },
    });
    expect(toJsonRpcMessage({ jsonrpc: '2.0', id: 2, result: null })).toEqual({ kind: 'result', id: 2, result: null });
  });

  it('classifies errors, including those without an id', () => {
    expect(toJsonRpcMessage({ jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error' } })).toEqual({
      kind: 'error',
      id: null,
      error: { code: -32700, message: 'Parse error' },
    });
  });

  it('classifies server notifications and requests', () => {
    expect(toJsonRpcMessage({ jsonrpc: '2.0', method: 'notifications/progress', params: { progress: 1 } })).toEqual({
      kind: 'notification',
      method: 'notifications/progress',
      params: { progress: 1 },
    });
    expect(toJsonRpcMessage({ jsonrpc: '2.0', id: 'srv-1', method: 'roots/list' })).toEqual({
      kind: 'request',
      id: 'srv-1',
      method: 'roots/list',
      params: undefined,
    });
  });

  it('returns null for anything that is not JSON-RPC 2.0', () => {
    expect(toJsonRpcMessage({ id: 1, result: {} })).toBeNull();
    expect(toJsonRpcMessage({ jsonrpc: '2.0', id: 1 })).toBeNull();
    expect(toJsonRpcMessage('hello')).toBeNull();
    expect(toJsonRpcMessage([1, 2])).toBeNull();
  });
});

describe('isReplyTo', () => {
  it('matches results and errors by id only', () => {
    expect(isReplyTo({ kind: 'result', id: 5, result: {} }, 5)).toBe(true);
    expect(isReplyTo({ kind: 'result', id: 6, result: {} }, 5)).toBe(false);
    expect(isReplyTo({ kind: 'error', id: 5, error: { code: 1, message: 'x' } }, 5)).toBe(true);
    expect(isReplyTo({ kind: 'notification', method: 'notifications/message' }, 5)).toBe(false);
  });
});

describe('parseJsonPayload', () => {
  it('wraps parse failures in ProtocolError with the fragment', () => {
    expect(() => parseJsonPayload('{"a":', 'test body')).toThrow(ProtocolError);
    expect(() => parseJsonPayload('{"a":', 'test body')).toThrow('Malformed JSON in test body: {"a":');
  });
});

describe('parseResult', () => {
  it('rejects shapes the schema does not accept', () => {
    expect(() => parseResult(CallToolResultSchema, { content: 'nope' }, 'tools/call')).toThrow(
      `Unexpected result shape for 'tools/call': {"content":"nope"}`
    );
  });

  it('defaults missing content to an empty list', () => {
    expect(parseResult(CallToolResultSchema, {}, 'tools/call')).toEqual({ content: [] });
  });
});

describe('normalizeToolResult', () => {
  it('joins text blocks with newlines', () => {
    const result = normalizeToolResult({
      content: [
        { type: 'text', text: 'first' },
        { type: 'image', data: 'AAAA', mimeType: 'image/png' },
        { type: 'text', text: 'second' },
      ],
    });

    expect(result.text).toBe('first\nsecond');
    expect(result.isError).toBe(false);
    expect(result.content).toHaveLength(3);
  });

  it('falls back to structured content, then to the raw blocks', () => {
    expect(normalizeToolResult({ content: [], structuredContent: { temp: 21 } })).toEqual({
      text: '{"temp":21}',
      content: [],
      structured: { temp: 21 },
      isError: false,
    });
    expect(normalizeToolResult({ content: [{ type: 'resource_link', uri: 'file:///a' }] }).text).toBe(
      '[{"type":"resource_link","uri":"file:///a"}]'
    );
    expect(normalizeToolResult({ content: [] }).text).toBe('');
  });

  it('carries the error flag', () => {
    expect(normalizeToolResult({ content: [{ type: 'text', text: 'boom' }], isError: true })).toMatchObject({
      text: 'boom',
      isError: true,
    });
  });
});
