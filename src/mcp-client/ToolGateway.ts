/**
 * Tool Gateway
 *
 * Seam between the coordinator and a host tool framework. Publishes the
 * current catalog as (name, description, parameters, call) entries and routes
 * every invocation through one dispatcher. No protocol or validation logic
 * lives here.
 */

import type {
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
  ChatCompletionToolMessageParam,
} from 'openai/resources/chat/completions';
import { toolFailureKind } from './errors.js';
import type { GatewayCoordinator, ToolCallOptions } from './GatewayCoordinator.js';
import { ToolSchemaTranslator } from './ToolSchemaTranslator.js';
import { errorMessage } from './TransportClient.js';
import type { AnthropicTool, JsonSchema, ToolDescriptor, ToolExecutionResult } from './types.js';

export const API_PROMPT =
  'You have access to external tools provided by an MCP server. ' +
  "Use these tools when the user's request matches their purpose. " +
  'Tool results should be incorporated into your natural language response.';

/**
 * A tool as handed to the host framework
 */
export interface PublishedTool {
  name: string;
  description: string;
  parameters: JsonSchema;
  call: (args: Record<string, unknown>, options?: ToolCallOptions) => Promise<ToolExecutionResult>;
}

export class ToolGateway {
  constructor(private readonly coordinator: GatewayCoordinator) {}

  /** Instructions for a conversation agent using these tools */
  get apiPrompt(): string {
    return API_PROMPT;
  }

  /**
   * Snapshot of the published tools
   */
  listTools(): PublishedTool[] {
    return this.descriptors().map(descriptor => ({
      name: descriptor.name,
      description: descriptor.description,
      parameters: descriptor.inputSchema,
      call: (args, options) => this.invoke(descriptor.name, args, options),
    }));
  }

  /**
   * Dispatch a call by tool name. Never throws: failures come back classified.
   */
  async invoke(
    name: string,
    args: Record<string, unknown> = {},
    options: ToolCallOptions = {}
  ): Promise<ToolExecutionResult> {
    const startTime = Date.now();
    try {
      const result = await this.coordinator.callTool(name, args, options);
      const execution: ToolExecutionResult = {
        success: true,
        content: result.text,
        executionTime: Date.now() - startTime,
        toolName: name,
      };
      if (result.structured !== undefined) {
        execution.structured = result.structured;
      }
      return execution;
    } catch (err) {
      const errorKind = toolFailureKind(err);
      console.error(`[ToolGateway] Tool '${name}' failed (${errorKind}):`, errorMessage(err));
      return {
        success: false,
        error: errorMessage(err),
        errorKind,
        executionTime: Date.now() - startTime,
        toolName: name,
      };
    }
  }

  /**
   * Get all tools in OpenAI format
   */
  toOpenAITools(): ChatCompletionTool[] {
    return ToolSchemaTranslator.toOpenAITools(this.descriptors());
  }

  /**
   * Get all tools in Anthropic format
   */
  toAnthropicTools(): AnthropicTool[] {
    return ToolSchemaTranslator.toAnthropicTools(this.descriptors());
  }

  /**
   * Run the tool calls of one assistant message and build the tool messages
   * answering them, in the same order
   */
  async executeOpenAIToolCalls(
    toolCalls: readonly ChatCompletionMessageToolCall[],
    options: ToolCallOptions = {}
  ): Promise<ChatCompletionToolMessageParam[]> {
    return Promise.all(
      toolCalls.map(async (toolCall): Promise<ChatCompletionToolMessageParam> => {
        const name = this.resolveToolName(toolCall.function.name);
        const args = parseToolArguments(toolCall.function.arguments);

        let content: string;
        if (args === null) {
          content = `Error executing MCP tool: arguments for '${toolCall.function.name}' are not a JSON object`;
        } else {
          const result = await this.invoke(name, args, options);
          content = result.success ? (result.content ?? '') : `Error executing MCP tool: ${result.error}`;
        }
        return { role: 'tool', tool_call_id: toolCall.id, content };
      })
    );
  }

  /**
   * Map an LLM-facing (sanitized) name back to the catalog name
   */
  resolveToolName(name: string): string {
    const descriptors = this.descriptors();
    if (descriptors.some(descriptor => descriptor.name === name)) {
      return name;
    }
    const match = descriptors.find(descriptor => ToolSchemaTranslator.sanitizeToolName(descriptor.name) === name);
    return match ? match.name : name;
  }

  /**
   * Get a summary of all available tools (for debugging/logging)
   */
  getToolsSummary(): string {
    const descriptors = this.descriptors();
    if (descriptors.length === 0) {
      return 'No tools available';
    }
    const lines = [`Available tools (${descriptors.length} total):`];
    for (const descriptor of descriptors) {
      lines.push(`  - ${descriptor.name}: ${descriptor.description || 'No description'}`);
    }
    return lines.join('\n');
  }

  private descriptors(): ToolDescriptor[] {
    return this.coordinator.getCatalog().entries.map(entry => entry.descriptor);
  }
}

function parseToolArguments(raw: string): Record<string, unknown> | null {
  if (raw.trim() === '') {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
    ? Object.fromEntries(Object.entries(parsed))
    : null;
}

export default ToolGateway;
