import { z } from 'zod';
import type { ConnectionManager, SqlRow, SqlSession } from '../connection.js';
import { MutationError, ReadError } from '../utils/errors.js';
import { quotePs, type PowerShellRunner } from '../utils/powershell.js';
import { engineServiceName } from '../workflow/service-names.js';
import type { AgentJobHandle, ChangeSpec, Credential, ManagementClient, Target } from '../workflow/types.js';

const AgentJobRowSchema = z.object({
  job_id: z.string(),
  name: z.string(),
});

/**
 * PowerShell that loads the SQL WMI provider and binds $service to the engine service
 */
function wmiServicePreamble(host: string, instanceName: string): string[] {
  const serviceName = engineServiceName(instanceName);
  return [
    "$ErrorActionPreference = 'Stop'",
    "[void][System.Reflection.Assembly]::LoadWithPartialName('Microsoft.SqlServer.SqlWmiManagement')",
    `$computer = New-Object Microsoft.SqlServer.Management.Smo.Wmi.ManagedComputer ${quotePs(host)}`,
    `$service = $computer.Services | Where-Object { $_.Name -eq ${quotePs(serviceName)} }`,
    `if ($null -eq $service) { throw ${quotePs(`Service ${serviceName} not found on ${host}`)} }`,
  ];
}

/**
 * Script printing True or False for the configured HADR flag
 */
export function hadrReadScript(host: string, instanceName: string): string {
  return [...wmiServicePreamble(host, instanceName), '$service.IsHadrEnabled'].join('; ');
}

/**
 * Script changing the configured HADR flag. Takes effect after a service restart.
 */
export function hadrChangeScript(host: string, instanceName: string, enabled: boolean): string {
  return [
    ...wmiServicePreamble(host, instanceName),
    `$service.ChangeHadrServiceSetting(${enabled ? 1 : 0})`,
  ].join('; ');
}

/**
 * Management surface of a SQL Server instance.
 *
 * Jobs live in msdb and are managed over T-SQL. The HADR flag is a property of
 * the engine's Windows service, so it goes through the SQL Server WMI provider.
 */
export class SqlManagementClient implements ManagementClient<SqlSession> {
  private connections: ConnectionManager;
  private powershell: PowerShellRunner;
  private timeoutMs: number;

  constructor(connections: ConnectionManager, powershell: PowerShellRunner, timeoutMs: number) {
    this.connections = connections;
    this.powershell = powershell;
    this.timeoutMs = timeoutMs;
  }

  connect(target: Target, credential?: Credential): Promise<SqlSession> {
    return this.connections.open(target, credential);
  }

  async disconnect(session: SqlSession): Promise<void> {
    await session.executor.close();
  }

  async readHadrEnabled(session: SqlSession): Promise<boolean> {
    const { host, instanceName } = session.target;
    let output: string;
    try {
      output = await this.powershell(hadrReadScript(host, instanceName), this.timeoutMs);
    } catch (error) {
      throw new ReadError(`Failed to read the HADR setting of ${session.fullyQualifiedName}: ${errorText(error)}`, {
        cause: error,
      });
    }

    switch (output.toLowerCase()) {
      case 'true':
        return true;
      case 'false':
        return false;
      default:
        throw new ReadError(`Unexpected HADR setting '${output}' reported for ${session.fullyQualifiedName}`);
    }
  }

  async findAgentJob(session: SqlSession, jobName: string): Promise<AgentJobHandle | null> {
    let rows: SqlRow[];
    try {
      rows = await session.executor.query(
        `SELECT CONVERT(NVARCHAR(36), job_id) AS job_id, name
         FROM msdb.dbo.sysjobs
         WHERE name = @jobName`,
        { jobName }
      );
    } catch (error) {
      throw new ReadError(`Failed to look up job '${jobName}' on ${session.fullyQualifiedName}: ${errorText(error)}`, {
        cause: error,
      });
    }

    if (rows.length === 0) {
      return null;
    }

    const row = AgentJobRowSchema.parse(rows[0]);
    return { jobId: row.job_id, name: row.name };
  }

  async applyChange(session: SqlSession, change: ChangeSpec): Promise<void> {
    try {
      switch (change.kind) {
        case 'set-hadr': {
          const { host, instanceName } = session.target;
          await this.powershell(hadrChangeScript(host, instanceName, change.enabled), this.timeoutMs);
          return;
        }
        case 'purge-job-history':
          await session.executor.query('EXEC msdb.dbo.sp_purge_jobhistory @job_id = @jobId', {
            jobId: change.job.jobId,
          });
          return;
        case 'delete-job':
          await session.executor.query(
            `EXEC msdb.dbo.sp_delete_job
               @job_id = @jobId,
               @delete_history = @deleteHistory,
               @delete_unused_schedule = @deleteUnusedSchedule`,
            {
              jobId: change.job.jobId,
              deleteHistory: change.keepHistory ? 0 : 1,
              deleteUnusedSchedule: change.keepUnusedSchedule ? 0 : 1,
            }
          );
          return;
      }
    } catch (error) {
      throw new MutationError(errorText(error), { cause: error });
    }
  }
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
