/**
 * stdio bridge
 *
 * Re-publishes the gateway's filtered catalog as a local MCP server, so a
 * stdio-only MCP host can reach the remote gateway through this process.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from '@modelcontextprotocol/sdk/types.js';
import type { ClientIdentity, ToolExecutionResult } from './mcp-client/types.js';
import type { ToolGateway } from './mcp-client/ToolGateway.js';

export const BRIDGE_INFO: ClientIdentity = {
  name: 'mcp-gateway-client',
  version: '1.0.0',
};

/**
 * Published tools in the shape a tools/list result carries
 */
export function listBridgeTools(gateway: ToolGateway): Tool[] {
  return gateway.listTools().map(tool => {
    const { type: _type, properties, required, ...rest } = tool.parameters;
    return {
      name: tool.name,
      description: tool.description,
      inputSchema: {
        ...rest,
        type: 'object',
        properties: properties ?? {},
        ...(required ? { required } : {}),
      },
    };
  });
}

export function toCallToolResult(result: ToolExecutionResult): CallToolResult {
  if (result.success) {
    return { content: [{ type: 'text', text: result.content ?? '' }] };
  }
  return {
    content: [{ type: 'text', text: `Error (${result.errorKind ?? 'remote_error'}): ${result.error ?? 'unknown failure'}` }],
    isError: true,
  };
}

/**
 * Forward one tools/call to the gateway
 */
export async function callBridgeTool(
  gateway: ToolGateway,
  name: string,
  args: Record<string, unknown> | undefined,
  signal?: AbortSignal
): Promise<CallToolResult> {
  const result = await gateway.invoke(name, args ?? {}, { signal });
  return toCallToolResult(result);
}

export function createBridgeServer(gateway: ToolGateway, info: ClientIdentity = BRIDGE_INFO): Server {
  const server = new Server(
    { name: info.name, version: info.version },
    {
      capabilities: {
        tools: {},
      },
      instructions: gateway.apiPrompt,
    }
  );

  // Handler to list tools
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: listBridgeTools(gateway),
  }));

  // Handler to execute tools
  server.setRequestHandler(CallToolRequestSchema, async (request, extra) =>
    callBridgeTool(gateway, request.params.name, request.params.arguments, extra.signal)
  );

  return server;
}
