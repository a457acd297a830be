import { engineCascadeServices } from '../service-names.js';
import type { IdempotencyPolicy, MutationPolicy } from '../types.js';

export interface HadrToggleOptions {
  enabled: boolean;
  /** What to do when the flag already has the desired value */
  alreadyAtDesired: IdempotencyPolicy;
}

export const HADR_RESTART_WARNING =
  'A restart of the SQL Server service is required for the HADR change to take effect. Restart it manually or rerun with force.';

/**
 * Toggle the HADR flag of an instance's database engine service
 */
export function hadrTogglePolicy({ enabled, alreadyAtDesired }: HadrToggleOptions): MutationPolicy<boolean> {
  return {
    name: enabled ? 'enable-hadr' : 'disable-hadr',
    read: (reader, session) => reader.readHadrEnabled(session),
    plan: (prior, fullyQualifiedName) => {
      if (prior === enabled && alreadyAtDesired === 'skip') {
        return {
          action: 'skip',
          reason: `HADR is already ${enabled ? 'enabled' : 'disabled'} on ${fullyQualifiedName}`,
        };
      }
      return {
        action: 'apply',
        changes: [{ kind: 'set-hadr', enabled }],
        description: `Changing HADR setting from ${prior} to ${enabled} on ${fullyQualifiedName}`,
      };
    },
    cascadeServices: (target) => engineCascadeServices(target.instanceName),
    restartWarning: HADR_RESTART_WARNING,
  };
}
