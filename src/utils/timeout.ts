import { TimeoutError } from './errors.js';

/**
 * Race a collaborator call against the operation timeout.
 *
 * The call itself cannot be stopped. When it loses the race and later
 * resolves, `release` receives the late value, so a connection opened after
 * the caller gave up can still be closed. `release` must not reject.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  run: () => Promise<T>,
  release?: (late: T) => Promise<void>
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let timedOut = false;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      reject(new TimeoutError(operation, timeoutMs));
    }, timeoutMs);
  });

  let pending: Promise<T> | undefined;
  try {
    pending = run();
    return await Promise.race([pending, timeout]);
  } finally {
    clearTimeout(timer);
    if (timedOut && release && pending) {
      // A late rejection was already reported as the timeout
      void pending.then(release, () => undefined);
    }
  }
}
