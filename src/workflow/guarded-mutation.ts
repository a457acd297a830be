import {
  ValidationError,
  isConnectionError,
  toErrorRecord,
  type ErrorCategory,
  type WorkflowStep,
} from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import { closeSession, openSession } from './session.js';
import { targetName } from './target.js';
import type {
  MutationOptions,
  MutationPolicy,
  MutationResult,
  MutationStatus,
  Session,
  Target,
  WorkflowDeps,
} from './types.js';

/**
 * Apply one guarded change to one target.
 *
 * Connects, reads the current state, asks the approval gate, applies the
 * policy's changes, optionally restarts dependent services and re-reads the
 * state. Every failure after the call starts is recorded on the returned
 * result instead of being thrown, so a caller working through several targets
 * keeps going. Once the changes have been attempted the state is always read
 * again: `newValue` reports what the server says, not what was requested.
 */
export async function runGuardedMutation<V, S extends Session>(
  target: Target,
  policy: MutationPolicy<V>,
  options: MutationOptions,
  deps: WorkflowDeps<S>
): Promise<MutationResult<V>> {
  const { client, diagnostics } = deps;
  const context = { operation: policy.name, target: targetName(target) };

  const result: MutationResult<V> = {
    host: target.host,
    instanceName: target.instanceName,
    fullyQualifiedName: targetName(target),
    applied: false,
    cascadeApplied: false,
    status: 'verified',
    errors: [],
    trace: ['Disconnected'],
  };

  const call = <T>(operation: string, run: () => Promise<T>): Promise<T> =>
    withTimeout(`${operation} on ${context.target}`, deps.timeoutMs, run);

  const fail = (category: ErrorCategory, step: WorkflowStep, error: unknown): void => {
    const record = toErrorRecord(category, step, error);
    result.errors.push(record);
    diagnostics.error({ ...context, ...record }, `${policy.name} failed during ${step}`);
  };

  const finish = (status: MutationStatus): MutationResult<V> => {
    result.status = status;
    result.trace.push('Reported');
    diagnostics.debug({ ...context, status, trace: result.trace }, 'Reported result');
    return result;
  };

  const cancelled = (): boolean => options.signal?.aborted === true;

  let session: S;
  try {
    session = await openSession(client, target, options.credential, deps.timeoutMs, diagnostics);
  } catch (error) {
    fail('connection', 'connect', error);
    return finish('connection-failed');
  }
  result.trace.push('Connected');
  result.fullyQualifiedName = session.fullyQualifiedName;

  try {
    let prior: V;
    try {
      prior = await call('read state', () => policy.read(client, session));
    } catch (error) {
      fail(isConnectionError(error) ? 'connection' : 'read', 'read', error);
      return finish('read-failed');
    }
    result.priorValue = prior;
    result.trace.push('StateRead');

    const plan = policy.plan(prior, session.fullyQualifiedName);
    if (plan.action !== 'apply') {
      result.newValue = prior;
      result.note = plan.reason;
      diagnostics.info(context, plan.reason);
      return finish(plan.action === 'skip' ? 'skipped' : 'not-found');
    }
    result.plannedChange = plan.description;

    if (cancelled()) {
      result.newValue = prior;
      return finish('cancelled');
    }

    let approved: boolean;
    try {
      approved = await deps.approval.confirm(plan.description);
    } catch (error) {
      diagnostics.warn({ ...context, error: String(error) }, 'Approval gate failed, treating as declined');
      approved = false;
    }
    if (!approved) {
      result.trace.push('Rejected');
      result.newValue = prior;
      diagnostics.info(context, `Declined: ${plan.description}`);
      return finish('rejected');
    }
    result.trace.push('Approved');

    if (cancelled()) {
      result.newValue = prior;
      return finish('cancelled');
    }

    let mutationFailed = false;
    for (const change of plan.changes) {
      try {
        await call(change.kind, () => client.applyChange(session, change));
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        fail('mutation', 'apply', `${change.kind} failed: ${message}`);
        mutationFailed = true;
        break;
      }
    }

    let cascadeFailed = false;
    let stoppedEarly = false;
    if (mutationFailed) {
      result.trace.push('MutationFailed', 'CascadeSkipped');
    } else {
      result.applied = true;
      result.trace.push('Mutated');
      diagnostics.info(context, `Applied: ${plan.description}`);

      const services = policy.cascadeServices(target);
      if (options.force && services.length > 0) {
        if (cancelled()) {
          stoppedEarly = true;
          result.trace.push('CascadeSkipped');
        } else {
          try {
            await call('stop services', () => deps.services.stopServices(target.host, target.instanceName, services));
            await call('start services', () => deps.services.startServices(target.host, target.instanceName, services));
            result.cascadeApplied = true;
            result.trace.push('CascadeApplied');
          } catch (error) {
            fail('cascade', 'cascade', error);
            cascadeFailed = true;
            result.trace.push('CascadeFailed');
          }
        }
      } else {
        result.trace.push('CascadeSkipped');
        if (policy.restartWarning) {
          result.note = policy.restartWarning;
          diagnostics.warn(context, policy.restartWarning);
        }
      }
    }

    let verified = true;
    try {
      result.newValue = await call('verify state', () => policy.read(client, session));
      result.trace.push('Verified');
    } catch (error) {
      fail('read', 'verify', error);
      verified = false;
    }

    if (stoppedEarly) {
      return finish('cancelled');
    }
    if (mutationFailed) {
      return finish('mutation-failed');
    }
    if (cascadeFailed) {
      return finish('cascade-failed');
    }
    return finish(verified ? 'verified' : 'unverified');
  } finally {
    await closeSession(client, session, diagnostics);
  }
}

/**
 * Apply the same guarded change to each target in turn.
 * One result per target, in input order; no failure stops the batch.
 */
export async function runGuardedBatch<V, S extends Session>(
  targets: readonly Target[],
  policy: MutationPolicy<V>,
  options: MutationOptions,
  deps: WorkflowDeps<S>
): Promise<MutationResult<V>[]> {
  if (targets.length === 0) {
    throw new ValidationError('At least one SQL instance is required');
  }

  const results: MutationResult<V>[] = [];
  for (const target of targets) {
    results.push(await runGuardedMutation(target, policy, options, deps));
  }
  return results;
}
