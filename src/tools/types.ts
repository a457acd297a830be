import { z } from 'zod';
import type { Config } from '../config.js';
import type { DiagnosticsSink, ManagementClient, ServiceController } from '../workflow/types.js';

/**
 * Collaborators every tool handler receives
 */
export interface AdminContext {
  config: Config;
  client: ManagementClient;
  services: ServiceController;
  diagnostics: DiagnosticsSink;
}

export interface ToolResponse {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export interface ToolAnnotations {
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
}

/**
 * Per-request values the MCP transport hands to a tool
 */
export interface ToolCallExtra {
  /** Aborted when the client cancels the request */
  signal?: AbortSignal;
}

export interface ToolDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: S;
  annotations: ToolAnnotations;
  /** Refused when the server runs in read-only mode */
  writes: boolean;
  handler: (context: AdminContext, args: z.infer<S>, extra: ToolCallExtra) => Promise<ToolResponse>;
}

export interface AdminTool {
  name: string;
  description: string;
  inputSchema: z.ZodTypeAny;
  annotations: ToolAnnotations;
  writes: boolean;
  /** Validate raw arguments and run the handler */
  call: (context: AdminContext, rawArgs: unknown, extra?: ToolCallExtra) => Promise<ToolResponse>;
}

export function defineTool<S extends z.ZodTypeAny>(definition: ToolDefinition<S>): AdminTool {
  return {
    name: definition.name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    annotations: definition.annotations,
    writes: definition.writes,
    call: (context, rawArgs, extra = {}) => definition.handler(context, definition.inputSchema.parse(rawArgs), extra),
  };
}

export function textResponse(text: string, isError = false): ToolResponse {
  return {
    content: [
      {
        type: 'text',
        text,
      },
    ],
    ...(isError ? { isError: true } : {}),
  };
}

/**
 * Instance list shared by every tool
 */
export const SqlInstanceSchema = z
  .array(z.string().min(1))
  .min(1, 'At least one SQL instance is required')
  .describe('SQL Server instances: host, host\\INSTANCE, optionally followed by ,port');

/**
 * SQL login used instead of the configured authentication
 */
export const CredentialSchema = z
  .object({
    username: z.string().min(1),
    password: z.string(),
  })
  .optional()
  .describe('SQL login to use for this call instead of the configured authentication');
