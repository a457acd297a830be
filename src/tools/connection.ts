import { z } from 'zod';
import { formatError } from '../utils/errors.js';
import { closeSession, openSession } from '../workflow/session.js';
import { parseTarget } from '../workflow/target.js';
import { CredentialSchema, defineTool, textResponse } from './types.js';

/**
 * Test SQL Server connection
 */
export const testConnectionTool = defineTool({
  name: 'sqlserver_test_connection',
  description: 'Test connectivity to a SQL Server instance and verify authentication',
  inputSchema: z.object({
    sqlInstance: z.string().min(1).describe('SQL Server instance: host, host\\INSTANCE, optionally followed by ,port'),
    credential: CredentialSchema,
  }),
  annotations: {
    readOnlyHint: true,
  },
  writes: false,
  handler: async (context, args) => {
    try {
      const target = parseTarget(args.sqlInstance);
      const session = await openSession(
        context.client,
        target,
        args.credential,
        context.config.operationTimeout,
        context.diagnostics
      );
      await closeSession(context.client, session, context.diagnostics);

      return textResponse(
        `✓ Connection successful!\n\n` +
          `Server name: ${session.fullyQualifiedName}\n\n` +
          `Server version:\n${session.version ?? 'unknown'}\n\n` +
          `Authentication verified.`
      );
    } catch (error) {
      return textResponse(`✗ Connection failed:\n${formatError(error)}`, true);
    }
  },
});
