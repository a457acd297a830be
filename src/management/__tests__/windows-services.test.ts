import { describe, expect, it, vi } from 'vitest';
import { CascadeError } from '../../utils/errors.js';
import { createSink } from '../../workflow/__tests__/fakes.js';
import { WindowsServiceController, serviceControlScript } from '../windows-services.js';

describe('serviceControlScript', () => {
  it('should stop a remote service and wait for it', () => {
    expect(serviceControlScript('sql01', 'SQLAgent$DEV1', 'Stop', 60)).toBe(
      "$ErrorActionPreference = 'Stop'; " +
        "$svc = Get-Service -ComputerName 'sql01' -Name 'SQLAgent$DEV1'; " +
        'Stop-Service -InputObject $svc -Force -WarningAction SilentlyContinue; ' +
        "$svc.WaitForStatus('Stopped', [TimeSpan]::FromSeconds(60)); " +
        '$svc.Refresh(); ' +
        '$svc.Status.ToString()'
    );
  });

  it('should start a service and wait for Running', () => {
    const script = serviceControlScript('sql01', 'MSSQLSERVER', 'Start', 30);

    expect(script).toContain('Start-Service -InputObject $svc -WarningAction SilentlyContinue');
    expect(script).toContain("$svc.WaitForStatus('Running', [TimeSpan]::FromSeconds(30))");
  });
});

describe('WindowsServiceController', () => {
  it('should act on the services one at a time, in order', async () => {
    const scripts: string[] = [];
    const powershell = vi.fn(async (script: string) => {
      scripts.push(script);
      return script.includes('Stop-Service') ? 'Stopped' : 'Running';
    });
    const controller = new WindowsServiceController(powershell, 60_000, createSink());

    await controller.stopServices('sql01', 'DEV1', ['SQLAgent$DEV1', 'MSSQL$DEV1']);
    await controller.startServices('sql01', 'DEV1', ['SQLAgent$DEV1', 'MSSQL$DEV1']);

    expect(scripts).toEqual([
      serviceControlScript('sql01', 'SQLAgent$DEV1', 'Stop', 60),
      serviceControlScript('sql01', 'MSSQL$DEV1', 'Stop', 60),
      serviceControlScript('sql01', 'SQLAgent$DEV1', 'Start', 60),
      serviceControlScript('sql01', 'MSSQL$DEV1', 'Start', 60),
    ]);
  });

  it('should fail when a service does not reach the expected status', async () => {
    const powershell = vi.fn(async () => 'StartPending');
    const controller = new WindowsServiceController(powershell, 60_000, createSink());

    const failure = controller.startServices('sql01', 'DEV1', ['SQLAgent$DEV1', 'MSSQL$DEV1']);

    await expect(failure).rejects.toBeInstanceOf(CascadeError);
    await expect(failure).rejects.toThrow('SQLAgent$DEV1 on sql01 is StartPending after start');
    expect(powershell).toHaveBeenCalledTimes(1);
  });

  it('should wrap PowerShell failures', async () => {
    const powershell = vi.fn(async () => {
      throw new Error('Cannot find any service with service name');
    });
    const controller = new WindowsServiceController(powershell, 60_000, createSink());

    await expect(controller.stopServices('sql01', 'MSSQLSERVER', ['SQLSERVERAGENT'])).rejects.toThrow(
      'Stop of SQLSERVERAGENT on sql01 failed: Cannot find any service with service name'
    );
  });
});
