import { withTimeout } from '../utils/timeout.js';
import { targetName } from './target.js';
import type { ConnectionProvider, Credential, DiagnosticsSink, Session, Target } from './types.js';

/**
 * Close a session, logging instead of throwing when the close fails
 */
export async function closeSession<S extends Session>(
  client: ConnectionProvider<S>,
  session: S,
  diagnostics: DiagnosticsSink
): Promise<void> {
  try {
    await client.disconnect(session);
  } catch (error) {
    diagnostics.warn({ target: targetName(session.target), error: String(error) }, 'Failed to close session');
  }
}

/**
 * Connect within the operation timeout. A session that arrives after the
 * timeout is closed as soon as it does.
 */
export function openSession<S extends Session>(
  client: ConnectionProvider<S>,
  target: Target,
  credential: Credential | undefined,
  timeoutMs: number,
  diagnostics: DiagnosticsSink
): Promise<S> {
  return withTimeout(
    `connect on ${targetName(target)}`,
    timeoutMs,
    () => client.connect(target, credential),
    (late) => closeSession(client, late, diagnostics)
  );
}
