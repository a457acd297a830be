export const DEFAULT_INSTANCE = 'MSSQLSERVER';

/**
 * Whether the instance name addresses the default (unnamed) instance
 */
export function isDefaultInstance(instanceName?: string): boolean {
  return !instanceName || instanceName.toUpperCase() === DEFAULT_INSTANCE;
}

/**
 * Windows service name of the database engine
 */
export function engineServiceName(instanceName?: string): string {
  return isDefaultInstance(instanceName) ? DEFAULT_INSTANCE : `MSSQL$${instanceName}`;
}

/**
 * Windows service name of SQL Server Agent
 */
export function agentServiceName(instanceName?: string): string {
  return isDefaultInstance(instanceName) ? 'SQLSERVERAGENT' : `SQLAgent$${instanceName}`;
}

/**
 * Services restarted after an engine-level change, in stop and start order
 */
export function engineCascadeServices(instanceName?: string): string[] {
  return [agentServiceName(instanceName), engineServiceName(instanceName)];
}
