import type { AgentJobHandle, ChangeSpec, MutationPolicy } from '../types.js';

export interface AgentJobRemovalOptions {
  jobName: string;
  /** Keep the job's rows in msdb.dbo.sysjobhistory */
  keepHistory?: boolean;
  /** Keep schedules no other job uses */
  keepUnusedSchedule?: boolean;
}

/**
 * Remove a SQL Agent job, purging its history first unless asked to keep it
 */
export function agentJobRemovalPolicy({
  jobName,
  keepHistory = false,
  keepUnusedSchedule = false,
}: AgentJobRemovalOptions): MutationPolicy<AgentJobHandle | null> {
  return {
    name: 'remove-agent-job',
    read: (reader, session) => reader.findAgentJob(session, jobName),
    plan: (job, fullyQualifiedName) => {
      if (job === null) {
        return { action: 'not-found', reason: `Job '${jobName}' not found on ${fullyQualifiedName}` };
      }

      const changes: ChangeSpec[] = [];
      if (!keepHistory) {
        changes.push({ kind: 'purge-job-history', job });
      }
      changes.push({ kind: 'delete-job', job, keepHistory, keepUnusedSchedule });

      return {
        action: 'apply',
        changes,
        description: `Removing the job ${job.name} from ${fullyQualifiedName}`,
      };
    },
    cascadeServices: () => [],
  };
}
