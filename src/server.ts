/**
 * MCP server wiring: tool list and call dispatch
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema, type Tool } from '@modelcontextprotocol/sdk/types.js';
import {
  executeGenerateComponent,
  executeValidateComponent,
  formatGenerateComponentResponse,
  formatGetDesignTokensResponse,
  formatValidateComponentResponse,
  generateComponentTool,
  getDesignTokensTool,
  parseGenerateComponentArgs,
  parseValidateComponentArgs,
  textResponse,
  validateComponentTool,
  type ToolContext,
  type ToolResponse,
} from './edge/tools/index.js';

export const SERVER_NAME = 'component-architect';
export const SERVER_VERSION = '1.0.0';

export const tools: Tool[] = [generateComponentTool, validateComponentTool, getDesignTokensTool];

/**
 * Dispatch one tool call; thrown errors become isError responses
 */
export async function handleToolCall(
  name: string,
  args: unknown,
  context: ToolContext,
  signal?: AbortSignal
): Promise<ToolResponse> {
  try {
    switch (name) {
      case generateComponentTool.name: {
        const parsed = parseGenerateComponentArgs(args);
        console.error(`\n🎯 [GENERATE] ${parsed.componentName ?? parsed.description.slice(0, 60)}`);
        const result = await executeGenerateComponent(parsed, context, signal);
        return formatGenerateComponentResponse(result);
      }

      case validateComponentTool.name: {
        const result = executeValidateComponent(parseValidateComponentArgs(args), context);
        return formatValidateComponentResponse(result);
      }

      case getDesignTokensTool.name:
        return formatGetDesignTokensResponse(context);

      default:
        return textResponse(
          `Unknown tool: ${name}\n\nAvailable tools:\n${tools.map((tool) => `- ${tool.name}`).join('\n')}`,
          true
        );
    }
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    console.error('Tool error:', errorMessage);
    return textResponse(`Error: ${errorMessage}`, true);
  }
}

export function createServer(context: ToolContext): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const { name, arguments: args } = request.params;
    return handleToolCall(name, args, context, extra.signal);
  });

  return server;
}
