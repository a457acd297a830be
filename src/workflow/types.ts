import type { ErrorRecord } from '../utils/errors.js';

/**
 * One addressable managed instance. Immutable for the duration of an invocation.
 */
export interface Target {
  readonly host: string;
  /** Logical instance name; MSSQLSERVER for the default instance */
  readonly instanceName: string;
  readonly port?: number;
}

/**
 * Opaque credential passed through to the connection provider
 */
export interface Credential {
  readonly username: string;
  readonly password: string;
}

/**
 * Handle to a SQL Agent job, resolved once and reused for every change
 */
export interface AgentJobHandle {
  jobId: string;
  name: string;
}

/**
 * Single side-effecting change against a session
 */
export type ChangeSpec =
  | { kind: 'set-hadr'; enabled: boolean }
  | { kind: 'purge-job-history'; job: AgentJobHandle }
  | { kind: 'delete-job'; job: AgentJobHandle; keepHistory: boolean; keepUnusedSchedule: boolean };

/**
 * Live handle to one target's management surface
 */
export interface Session {
  readonly target: Target;
  /** Name the server reports for itself, e.g. SQL01\DEV1 */
  readonly fullyQualifiedName: string;
  readonly version?: string;
}

export interface ConnectionProvider<S extends Session = Session> {
  connect(target: Target, credential?: Credential): Promise<S>;
  disconnect(session: S): Promise<void>;
}

/**
 * Typed state queries. A missing object reads as null; a failed query rejects.
 */
export interface StateReader<S extends Session = Session> {
  readHadrEnabled(session: S): Promise<boolean>;
  findAgentJob(session: S, jobName: string): Promise<AgentJobHandle | null>;
}

export interface ChangeApplier<S extends Session = Session> {
  applyChange(session: S, change: ChangeSpec): Promise<void>;
}

/**
 * Connection provider, state reader and change applier for one management surface
 */
export interface ManagementClient<S extends Session = Session>
  extends ConnectionProvider<S>, StateReader<S>, ChangeApplier<S> {}

export interface ServiceController {
  stopServices(host: string, instanceName: string, names: readonly string[]): Promise<void>;
  startServices(host: string, instanceName: string, names: readonly string[]): Promise<void>;
}

export interface ApprovalGate {
  confirm(description: string): Promise<boolean>;
}

/**
 * Structured log emission. A pino logger satisfies this.
 */
export interface DiagnosticsSink {
  debug(obj: object, msg: string): void;
  info(obj: object, msg: string): void;
  warn(obj: object, msg: string): void;
  error(obj: object, msg: string): void;
}

/**
 * Whether a change is attempted when the target already has the desired state
 */
export type IdempotencyPolicy = 'apply' | 'skip';

/**
 * Outcome of planning a change from the prior state
 */
export type ChangePlan =
  | { action: 'apply'; changes: ChangeSpec[]; description: string }
  | { action: 'skip'; reason: string }
  | { action: 'not-found'; reason: string };

/**
 * One mutation type: what it reads, how it plans, what it cascades
 */
export interface MutationPolicy<V> {
  readonly name: string;
  read<S extends Session>(reader: StateReader<S>, session: S): Promise<V>;
  plan(prior: V, fullyQualifiedName: string): ChangePlan;
  /** Services to stop and start when forced, in order */
  cascadeServices(target: Target): readonly string[];
  /** Warning emitted when the change needs a restart that was not forced */
  restartWarning?: string;
}

export interface MutationOptions {
  /** Restart dependent services after the change */
  force?: boolean;
  signal?: AbortSignal;
  credential?: Credential;
}

export interface WorkflowDeps<S extends Session = Session> {
  client: ManagementClient<S>;
  services: ServiceController;
  approval: ApprovalGate;
  diagnostics: DiagnosticsSink;
  /** Per-call timeout in milliseconds */
  timeoutMs: number;
}

export type MutationStatus =
  | 'verified'
  | 'unverified'
  | 'rejected'
  | 'skipped'
  | 'not-found'
  | 'cancelled'
  | 'connection-failed'
  | 'read-failed'
  | 'mutation-failed'
  | 'cascade-failed';

export type WorkflowState =
  | 'Disconnected'
  | 'Connected'
  | 'StateRead'
  | 'Approved'
  | 'Rejected'
  | 'Mutated'
  | 'MutationFailed'
  | 'CascadeApplied'
  | 'CascadeFailed'
  | 'CascadeSkipped'
  | 'Verified'
  | 'Reported';

export interface MutationResult<V> {
  host: string;
  instanceName: string;
  fullyQualifiedName: string;
  priorValue?: V;
  newValue?: V;
  applied: boolean;
  cascadeApplied: boolean;
  status: MutationStatus;
  /** Transition presented to the approval gate */
  plannedChange?: string;
  note?: string;
  errors: ErrorRecord[];
  /** States visited, in order */
  trace: WorkflowState[];
}
