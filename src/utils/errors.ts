/**
 * Category of a failure in the guarded change workflow
 */
export type ErrorCategory = 'connection' | 'read' | 'mutation' | 'cascade' | 'validation';

/**
 * Workflow step a failure happened in
 */
export type WorkflowStep = 'connect' | 'read' | 'approve' | 'apply' | 'cascade' | 'verify' | 'input';

/**
 * Serializable error attached to a mutation result
 */
export interface ErrorRecord {
  category: ErrorCategory;
  step: WorkflowStep;
  message: string;
}

/**
 * Base class for every administrative failure
 */
export abstract class AdminError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Cannot establish a session to the target
 */
export class ConnectionError extends AdminError {
  readonly category = 'connection' as const;
}

/**
 * State query failed after a successful connection
 */
export class ReadError extends AdminError {
  readonly category = 'read' as const;
}

/**
 * The side-effecting change failed
 */
export class MutationError extends AdminError {
  readonly category = 'mutation' as const;
}

/**
 * Dependent service restart failed
 */
export class CascadeError extends AdminError {
  readonly category = 'cascade' as const;
}

/**
 * Malformed or insufficient input, raised before any network call
 */
export class ValidationError extends AdminError {
  readonly category = 'validation' as const;
}

/**
 * A collaborator call did not finish within the operation timeout
 */
export class TimeoutError extends Error {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Build the error record for a failure in the given step
 */
export function toErrorRecord(
  category: ErrorCategory,
  step: WorkflowStep,
  error: unknown
): ErrorRecord {
  return {
    category,
    step,
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Format error messages with actionable guidance
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    return `Invalid input: ${error.message}`;
  }

  if (error instanceof Error) {
    const message = error.message;

    if (message.includes('Login failed')) {
      return `Authentication failed. Check your credentials and ensure:\n` +
        `- For Windows Auth: The service account has SQL Server access\n` +
        `- For Entra ID: The managed identity or service principal is configured\n` +
        `- The login has sysadmin rights, which HADR and msdb job changes need\n\n` +
        `Original error: ${message}`;
    }

    if (message.includes('Cannot open database')) {
      return `Database access denied. Ensure:\n` +
        `- The database name is correct\n` +
        `- Your account has access to this database\n` +
        `- The database exists and is online\n\n` +
        `Original error: ${message}`;
    }

    if (message.includes('timeout') || message.includes('timed out')) {
      return `Operation timeout. Try:\n` +
        `- Checking that the instance and its host are reachable\n` +
        `- Increasing SQL_OPERATION_TIMEOUT\n` +
        `- Checking for blocking sessions in msdb\n\n` +
        `Original error: ${message}`;
    }

    if (message.includes('Syntax error')) {
      return `SQL syntax error. Review:\n` +
        `- SQL statement syntax for SQL Server T-SQL\n` +
        `- Proper use of parameters (use @paramName syntax)\n\n` +
        `Original error: ${message}`;
    }

    return `SQL Server error: ${message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Check if error is a connection error
 */
export function isConnectionError(error: unknown): boolean {
  if (error instanceof ConnectionError || error instanceof TimeoutError) {
    return true;
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('connection') ||
      message.includes('econnrefused') ||
      message.includes('etimedout') ||
      message.includes('enotfound')
    );
  }
  return false;
}

/**
 * Check if error is an authentication error
 */
export function isAuthenticationError(error: unknown): boolean {
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('login failed') ||
      message.includes('authentication') ||
      message.includes('access denied')
    );
  }
  return false;
}
