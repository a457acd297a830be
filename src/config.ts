import { z } from 'zod';
import sql from 'mssql';
import { isDefaultInstance } from './workflow/service-names.js';
import type { Credential, Target } from './workflow/types.js';

/**
 * Authentication type for SQL Server connection
 */
export const AuthTypeSchema = z.enum(['sql', 'windows']);
export type AuthType = z.infer<typeof AuthTypeSchema>;

/**
 * Connection mode for SQL Server
 */
export const ConnectionModeSchema = z.enum(['read', 'readwrite']).default('readwrite');
export type ConnectionMode = z.infer<typeof ConnectionModeSchema>;

/**
 * Behaviour of a HADR toggle when the flag already has the desired value
 */
export const IdempotencySchema = z.enum(['apply', 'skip']).default('apply');

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info');

/**
 * Configuration schema for the guarded admin MCP server
 */
export const ConfigSchema = z.object({
  authType: AuthTypeSchema,
  database: z.string().min(1, 'Database name is required'),
  port: z.number().int().positive().default(1433),

  // Connection Mode
  mode: ConnectionModeSchema,

  // Windows Authentication (NTLM)
  domain: z.string().optional(),

  // SQL and Windows Authentication
  username: z.string().optional(),
  password: z.string().optional(),

  // Connection Settings
  connectionTimeout: z.number().int().positive().default(30000),
  requestTimeout: z.number().int().positive().default(30000),

  // Security Settings
  encrypt: z.boolean().default(true),
  trustServerCertificate: z.boolean().default(false),

  // Workflow Settings
  operationTimeout: z.number().int().positive().default(60000),
  hadrIdempotency: IdempotencySchema,
  logLevel: LogLevelSchema,
}).refine(
  (data) => {
    if (data.authType === 'sql') {
      return data.username !== undefined && data.password !== undefined;
    }
    return true;
  },
  {
    message: 'SQL authentication requires username and password',
    path: ['username'],
  }
).refine(
  (data) => {
    if (data.authType === 'windows') {
      return data.domain !== undefined && data.username !== undefined && data.password !== undefined;
    }
    return true;
  },
  {
    message: 'Windows authentication requires domain, username and password',
    path: ['domain'],
  }
);

export type Config = z.infer<typeof ConfigSchema>;

function parseIntEnv(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const config = {
    authType: env.SQL_AUTH_TYPE || 'windows',
    database: env.SQL_DATABASE || 'master',
    port: parseIntEnv(env.SQL_PORT),

    mode: env.SQL_MODE || 'readwrite',

    domain: env.SQL_DOMAIN,

    username: env.SQL_USERNAME,
    password: env.SQL_PASSWORD,

    connectionTimeout: parseIntEnv(env.SQL_CONNECTION_TIMEOUT),
    requestTimeout: parseIntEnv(env.SQL_REQUEST_TIMEOUT),

    encrypt: env.SQL_ENCRYPT !== 'false',
    trustServerCertificate: env.SQL_TRUST_SERVER_CERTIFICATE === 'true',

    operationTimeout: parseIntEnv(env.SQL_OPERATION_TIMEOUT),
    hadrIdempotency: env.HADR_IDEMPOTENCY || undefined,
    logLevel: env.LOG_LEVEL || undefined,
  };

  return ConfigSchema.parse(config);
}

/**
 * Convert configuration to an mssql connection config for one target.
 * A credential, when given, switches the connection to SQL authentication.
 * Windows authentication is a domain login over NTLM.
 */
export function toMssqlConfig(config: Config, target: Target, credential?: Credential): sql.config {
  const baseConfig: sql.config = {
    server: target.host,
    database: config.database,
    port: target.port ?? config.port,
    // One short-lived connection per target
    pool: {
      min: 0,
      max: 1,
    },
    options: {
      encrypt: config.encrypt,
      trustServerCertificate: config.trustServerCertificate,
      enableArithAbort: true,
      connectTimeout: config.connectionTimeout,
      requestTimeout: config.requestTimeout,
    },
  };

  // A named instance without an explicit port is resolved through SQL Browser
  if (target.port === undefined && !isDefaultInstance(target.instanceName)) {
    delete baseConfig.port;
    baseConfig.options = { ...baseConfig.options, instanceName: target.instanceName };
  }

  if (credential) {
    return {
      ...baseConfig,
      user: credential.username,
      password: credential.password,
    };
  }

  if (config.authType === 'sql') {
    return {
      ...baseConfig,
      user: config.username,
      password: config.password,
    };
  }

  // Setting a domain makes the tedious driver log in with NTLM
  return {
    ...baseConfig,
    domain: config.domain,
    user: config.username,
    password: config.password,
  };
}
