import { z } from 'zod';
import { formatError } from '../utils/errors.js';
import { formatMutationNotes, formatMutationResults } from '../utils/formatters.js';
import { autoApprove, denyAll } from '../workflow/approval.js';
import { runGuardedMutation } from '../workflow/guarded-mutation.js';
import { agentJobRemovalPolicy } from '../workflow/policies/agent-job.js';
import { parseTarget } from '../workflow/target.js';
import type { AgentJobHandle, MutationResult } from '../workflow/types.js';
import { CredentialSchema, SqlInstanceSchema, defineTool, textResponse } from './types.js';

/**
 * Remove SQL Server Agent jobs
 */
export const removeAgentJobTool = defineTool({
  name: 'sqlserver_remove_agent_job',
  description: 'Remove SQL Server Agent jobs. WARNING: by default this also purges the job history and deletes schedules no other job uses.',
  inputSchema: z.object({
    sqlInstance: SqlInstanceSchema,
    jobName: z.array(z.string().min(1)).min(1, 'At least one job name is required').describe('Names of the jobs to remove'),
    keepHistory: z.boolean().optional().describe('Keep the job history in msdb (default: false)'),
    keepUnusedSchedule: z.boolean().optional().describe('Keep schedules that no other job uses (default: false)'),
    confirm: z.boolean().optional().describe('Set to false to only report the planned removal without applying it (default: true)'),
    credential: CredentialSchema,
  }),
  annotations: {
    destructiveHint: true,
  },
  writes: true,
  handler: async (context, args, extra) => {
    try {
      const targets = args.sqlInstance.map(parseTarget);
      const deps = {
        client: context.client,
        services: context.services,
        approval: args.confirm === false ? denyAll : autoApprove,
        diagnostics: context.diagnostics,
        timeoutMs: context.config.operationTimeout,
      };
      const options = { credential: args.credential, signal: extra.signal };

      const results: MutationResult<AgentJobHandle | null>[] = [];
      for (const target of targets) {
        for (const jobName of args.jobName) {
          const policy = agentJobRemovalPolicy({
            jobName,
            keepHistory: args.keepHistory,
            keepUnusedSchedule: args.keepUnusedSchedule,
          });
          results.push(await runGuardedMutation(target, policy, options, deps));
        }
      }

      let response = `Remove Agent Job (${results.length} job(s) across ${targets.length} instance(s)):\n\n`;
      response += formatMutationResults(results, (job) => (job === null ? 'absent' : job.name));

      const notes = formatMutationNotes(results);
      if (notes) {
        response += `\n\nNotes:\n${notes}`;
      }

      return textResponse(response, results.some((result) => result.errors.length > 0));
    } catch (error) {
      return textResponse(formatError(error), true);
    }
  },
});
