import { z } from 'zod';
import { formatError, toErrorRecord } from '../utils/errors.js';
import { formatMutationNotes, formatMutationResults, formatResultsAsTable } from '../utils/formatters.js';
import { withTimeout } from '../utils/timeout.js';
import { autoApprove, denyAll } from '../workflow/approval.js';
import { runGuardedBatch } from '../workflow/guarded-mutation.js';
import { hadrTogglePolicy } from '../workflow/policies/hadr.js';
import { closeSession, openSession } from '../workflow/session.js';
import { parseTarget, targetName } from '../workflow/target.js';
import type { Credential, MutationResult, Session, Target } from '../workflow/types.js';
import {
  type AdminContext,
  CredentialSchema,
  SqlInstanceSchema,
  type ToolCallExtra,
  type ToolResponse,
  defineTool,
  textResponse,
} from './types.js';

const HadrToggleInputSchema = z.object({
  sqlInstance: SqlInstanceSchema,
  force: z.boolean().optional().describe('Restart the SQL Server Agent and engine services so the change takes effect (default: false)'),
  confirm: z.boolean().optional().describe('Set to false to only report the planned change without applying it (default: true)'),
  alreadyAtDesired: z.enum(['apply', 'skip']).optional().describe('When HADR already has the desired value: apply the change anyway or skip it (default: server setting)'),
  credential: CredentialSchema,
});

type HadrToggleInput = z.infer<typeof HadrToggleInputSchema>;

async function toggleHadr(
  context: AdminContext,
  args: HadrToggleInput,
  extra: ToolCallExtra,
  enabled: boolean
): Promise<ToolResponse> {
  try {
    const targets = args.sqlInstance.map(parseTarget);
    const policy = hadrTogglePolicy({
      enabled,
      alreadyAtDesired: args.alreadyAtDesired ?? context.config.hadrIdempotency,
    });

    const options = { force: args.force ?? false, credential: args.credential, signal: extra.signal };
    const results = await runGuardedBatch(targets, policy, options, {
      client: context.client,
      services: context.services,
      approval: args.confirm === false ? denyAll : autoApprove,
      diagnostics: context.diagnostics,
      timeoutMs: context.config.operationTimeout,
    });

    return textResponse(renderHadrResults(`${enabled ? 'Enable' : 'Disable'} HADR`, results), hasErrors(results));
  } catch (error) {
    return textResponse(formatError(error), true);
  }
}

function renderHadrResults(title: string, results: MutationResult<boolean>[]): string {
  let response = `${title} (${results.length} instance(s)):\n\n`;
  response += formatMutationResults(results, (enabled) => String(enabled));

  const notes = formatMutationNotes(results);
  if (notes) {
    response += `\n\nNotes:\n${notes}`;
  }
  return response;
}

function hasErrors<V>(results: MutationResult<V>[]): boolean {
  return results.some((result) => result.errors.length > 0);
}

/**
 * Disable HADR on SQL Server instances
 */
export const disableHadrTool = defineTool({
  name: 'sqlserver_disable_hadr',
  description: 'Disable the HADR (Always On availability groups) setting of SQL Server instances. The change takes effect after the engine restarts; pass force to restart the SQL Server Agent and engine services.',
  inputSchema: HadrToggleInputSchema,
  annotations: {
    destructiveHint: true,
  },
  writes: true,
  handler: (context, args, extra) => toggleHadr(context, args, extra, false),
});

/**
 * Enable HADR on SQL Server instances
 */
export const enableHadrTool = defineTool({
  name: 'sqlserver_enable_hadr',
  description: 'Enable the HADR (Always On availability groups) setting of SQL Server instances. The change takes effect after the engine restarts; pass force to restart the SQL Server Agent and engine services.',
  inputSchema: HadrToggleInputSchema,
  annotations: {},
  writes: true,
  handler: (context, args, extra) => toggleHadr(context, args, extra, true),
});

type HadrStatusRow = {
  sql_instance: string;
  hadr_enabled?: boolean;
  error: string;
};

async function readHadrStatus(
  context: AdminContext,
  target: Target,
  credential: Credential | undefined
): Promise<HadrStatusRow> {
  const timeoutMs = context.config.operationTimeout;
  const failed = (error: unknown): HadrStatusRow => {
    const record = toErrorRecord('read', 'read', error);
    context.diagnostics.error({ target: targetName(target), ...record }, 'HADR status read failed');
    return { sql_instance: targetName(target), hadr_enabled: undefined, error: record.message };
  };

  let session: Session;
  try {
    session = await openSession(context.client, target, credential, timeoutMs, context.diagnostics);
  } catch (error) {
    return failed(error);
  }

  try {
    const enabled = await withTimeout(`read HADR on ${targetName(target)}`, timeoutMs, () =>
      context.client.readHadrEnabled(session)
    );
    return { sql_instance: session.fullyQualifiedName, hadr_enabled: enabled, error: '' };
  } catch (error) {
    return failed(error);
  } finally {
    await closeSession(context.client, session, context.diagnostics);
  }
}

/**
 * Read the HADR setting of SQL Server instances
 */
export const getHadrStatusTool = defineTool({
  name: 'sqlserver_get_hadr_status',
  description: 'Get the configured HADR (Always On availability groups) setting of SQL Server instances',
  inputSchema: z.object({
    sqlInstance: SqlInstanceSchema,
    credential: CredentialSchema,
  }),
  annotations: {
    readOnlyHint: true,
  },
  writes: false,
  handler: async (context, args) => {
    try {
      const targets = args.sqlInstance.map(parseTarget);
      const rows: HadrStatusRow[] = [];

      for (const target of targets) {
        rows.push(await readHadrStatus(context, target, args.credential));
      }

      return textResponse(
        `HADR Status (${rows.length} instance(s)):\n\n` + formatResultsAsTable(rows),
        rows.some((row) => row.error)
      );
    } catch (error) {
      return textResponse(formatError(error), true);
    }
  },
});
