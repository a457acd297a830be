import { CascadeError } from '../utils/errors.js';
import { quotePs, type PowerShellRunner } from '../utils/powershell.js';
import type { DiagnosticsSink, ServiceController } from '../workflow/types.js';

type ServiceAction = 'Stop' | 'Start';

const EXPECTED_STATUS: Record<ServiceAction, string> = {
  Stop: 'Stopped',
  Start: 'Running',
};

/**
 * Script that stops or starts one service on a remote host and prints its final status
 */
export function serviceControlScript(
  host: string,
  serviceName: string,
  action: ServiceAction,
  timeoutSeconds: number
): string {
  const verb = action === 'Stop' ? 'Stop-Service -InputObject $svc -Force' : 'Start-Service -InputObject $svc';
  return [
    "$ErrorActionPreference = 'Stop'",
    `$svc = Get-Service -ComputerName ${quotePs(host)} -Name ${quotePs(serviceName)}`,
    `${verb} -WarningAction SilentlyContinue`,
    `$svc.WaitForStatus('${EXPECTED_STATUS[action]}', [TimeSpan]::FromSeconds(${timeoutSeconds}))`,
    '$svc.Refresh()',
    '$svc.Status.ToString()',
  ].join('; ');
}

/**
 * Stops and starts SQL Server services with Windows PowerShell
 */
export class WindowsServiceController implements ServiceController {
  private powershell: PowerShellRunner;
  private timeoutMs: number;
  private logger: DiagnosticsSink;

  constructor(powershell: PowerShellRunner, timeoutMs: number, logger: DiagnosticsSink) {
    this.powershell = powershell;
    this.timeoutMs = timeoutMs;
    this.logger = logger;
  }

  stopServices(host: string, instanceName: string, names: readonly string[]): Promise<void> {
    return this.run(host, instanceName, names, 'Stop');
  }

  startServices(host: string, instanceName: string, names: readonly string[]): Promise<void> {
    return this.run(host, instanceName, names, 'Start');
  }

  private async run(host: string, instanceName: string, names: readonly string[], action: ServiceAction): Promise<void> {
    const timeoutSeconds = Math.max(1, Math.floor(this.timeoutMs / 1000));

    for (const serviceName of names) {
      this.logger.info({ host, instanceName, service: serviceName }, `${action === 'Stop' ? 'Stopping' : 'Starting'} ${serviceName}`);

      let status: string;
      try {
        status = await this.powershell(serviceControlScript(host, serviceName, action, timeoutSeconds), this.timeoutMs);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new CascadeError(`${action} of ${serviceName} on ${host} failed: ${message}`, { cause: error });
      }

      if (status !== EXPECTED_STATUS[action]) {
        throw new CascadeError(`${serviceName} on ${host} is ${status || 'in an unknown state'} after ${action.toLowerCase()}`);
      }
    }
  }
}
