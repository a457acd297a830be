import { execFile } from 'child_process';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

/**
 * Runs a Windows PowerShell script and resolves with its trimmed stdout
 */
export type PowerShellRunner = (script: string, timeoutMs?: number) => Promise<string>;

export const runPowerShell: PowerShellRunner = async (script, timeoutMs) => {
  const { stdout } = await execFileAsync(
    'powershell',
    ['-NoProfile', '-NonInteractive', '-Command', script],
    { timeout: timeoutMs, windowsHide: true }
  );
  return stdout.trim();
};

/**
 * Quote a value as a single-quoted PowerShell literal
 */
export function quotePs(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}
