import sql from 'mssql';
import { z } from 'zod';
import { type Config, toMssqlConfig } from './config.js';
import { ConnectionError, formatError, isAuthenticationError } from './utils/errors.js';
import { targetName } from './workflow/target.js';
import type { Credential, DiagnosticsSink, Session, Target } from './workflow/types.js';

export type SqlRow = Record<string, unknown>;

/**
 * Parameterized T-SQL against one open connection
 */
export interface SqlExecutor {
  query(text: string, params?: Record<string, unknown>): Promise<SqlRow[]>;
  close(): Promise<void>;
}

export interface SqlSession extends Session {
  readonly executor: SqlExecutor;
}

const IdentityRowSchema = z.object({
  server_name: z.string().nullable(),
  version: z.string(),
});

/**
 * Wrap a connected pool as an executor
 */
function poolExecutor(pool: sql.ConnectionPool): SqlExecutor {
  return {
    async query(text, params) {
      const request = pool.request();

      // Add parameters if provided
      if (params) {
        for (const [key, value] of Object.entries(params)) {
          request.input(key, value);
        }
      }

      const result = await request.query(text);
      return result.recordset ?? [];
    },
    close: () => pool.close(),
  };
}

/**
 * Opens one SQL Server connection per target
 */
export class ConnectionManager {
  private config: Config;
  private logger: DiagnosticsSink;

  constructor(config: Config, logger: DiagnosticsSink) {
    this.config = config;
    this.logger = logger;
  }

  /**
   * Connect to a target and read the name it reports for itself
   */
  async open(target: Target, credential?: Credential): Promise<SqlSession> {
    const pool = new sql.ConnectionPool(toMssqlConfig(this.config, target, credential));

    pool.on('error', (err: unknown) => {
      this.logger.error({ target: targetName(target), error: String(err) }, 'SQL Server connection error');
    });

    try {
      await pool.connect();
    } catch (error) {
      const reason = isAuthenticationError(error) ? 'authentication failed' : 'connection failed';
      throw new ConnectionError(`Cannot connect to ${targetName(target)} (${reason}): ${formatError(error)}`, {
        cause: error,
      });
    }

    const executor = poolExecutor(pool);
    try {
      const rows = await executor.query(
        "SELECT CAST(SERVERPROPERTY('ServerName') AS NVARCHAR(256)) AS server_name, @@VERSION AS version"
      );
      const identity = IdentityRowSchema.parse(rows[0]);

      return {
        target,
        fullyQualifiedName: identity.server_name ?? targetName(target),
        version: identity.version,
        executor,
      };
    } catch (error) {
      await pool.close();
      throw new ConnectionError(`Connected to ${targetName(target)} but could not identify the server: ${formatError(error)}`, {
        cause: error,
      });
    }
  }
}
