import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { formatError } from './utils/errors.js';
import { testConnectionTool } from './tools/connection.js';
import { disableHadrTool, enableHadrTool, getHadrStatusTool } from './tools/hadr.js';
import { removeAgentJobTool } from './tools/agent.js';
import { textResponse, type AdminContext, type AdminTool, type ToolCallExtra, type ToolResponse } from './tools/types.js';

export const SERVER_NAME = 'sqlserver-guarded-admin-mcp';
export const SERVER_VERSION = '1.0.0';

// All available tools
export const tools: AdminTool[] = [
  // Connection tools
  testConnectionTool,

  // HADR tools
  getHadrStatusTool,
  disableHadrTool,
  enableHadrTool,

  // SQL Server Agent tools
  removeAgentJobTool,
];

const ObjectJsonSchema = z.object({
  properties: z.record(z.unknown()).default({}),
  required: z.array(z.string()).optional(),
});

/**
 * JSON Schema advertised for a tool's input
 */
export function toolInputJsonSchema(tool: AdminTool) {
  const { properties, required } = ObjectJsonSchema.parse(
    zodToJsonSchema(tool.inputSchema, { $refStrategy: 'none' })
  );

  return {
    type: 'object' as const,
    properties,
    ...(required && required.length > 0 ? { required } : {}),
  };
}

/**
 * Run a tool by name, applying the read-only guard
 */
export async function handleToolCall(
  context: AdminContext,
  name: string,
  args: unknown,
  extra: ToolCallExtra = {}
): Promise<ToolResponse> {
  const tool = tools.find((t) => t.name === name);

  if (!tool) {
    return textResponse(`Unknown tool: ${name}`, true);
  }

  // Check if operation is allowed in current mode
  if (context.config.mode === 'read' && tool.writes) {
    return textResponse(
      `❌ Operation denied: '${tool.name}' is a write operation and the server is configured in READ-ONLY mode. Set SQL_MODE=readwrite to enable write operations.`,
      true
    );
  }

  try {
    return await tool.call(context, args ?? {}, extra);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`);
      return textResponse(`Invalid input: ${issues.join('; ')}`, true);
    }
    context.diagnostics.error({ tool: name, error: String(error) }, 'Tool execution error');
    return textResponse(`Tool execution error: ${formatError(error)}`, true);
  }
}

/**
 * Create the MCP server with every tool registered
 */
export function createServer(context: AdminContext): Server {
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
    return {
      tools: tools.map((tool) => ({
        name: tool.name,
        description: tool.description,
        inputSchema: toolInputJsonSchema(tool),
        annotations: tool.annotations,
      })),
    };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
    const response = await handleToolCall(context, request.params.name, request.params.arguments, {
      signal: extra.signal,
    });
    return { ...response };
  });

  return server;
}
