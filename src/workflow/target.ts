import { z } from 'zod';
import { ValidationError } from '../utils/errors.js';
import { DEFAULT_INSTANCE, isDefaultInstance } from './service-names.js';
import type { Target } from './types.js';

const InstanceStringSchema = z
  .string()
  .trim()
  .min(1, 'Instance name must not be empty')
  .regex(/^[^\\,\s]+(\\[^\\,\s]+)?(,\d{1,5})?$/, 'Expected host, host\\INSTANCE, or either followed by ,port');

/**
 * Parse "host", "host\INSTANCE" or either with ",port" into a target
 */
export function parseTarget(value: string): Target {
  const parsed = InstanceStringSchema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(`Invalid SQL instance '${value}': ${parsed.error.issues[0].message}`);
  }

  const [address, portText] = parsed.data.split(',');
  const [host, instance] = address.split('\\');

  const target: Target = {
    host,
    instanceName: isDefaultInstance(instance) ? DEFAULT_INSTANCE : instance,
  };

  if (portText === undefined) {
    return target;
  }

  const port = parseInt(portText, 10);
  if (port < 1 || port > 65535) {
    throw new ValidationError(`Invalid SQL instance '${value}': port ${port} is out of range`);
  }
  return { ...target, port };
}

/**
 * Display name of a target, without the default instance name
 */
export function targetName(target: Target): string {
  return isDefaultInstance(target.instanceName) ? target.host : `${target.host}\\${target.instanceName}`;
}
