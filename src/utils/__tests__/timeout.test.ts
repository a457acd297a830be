import { describe, expect, it } from 'vitest';
import { TimeoutError } from '../errors.js';
import { withTimeout } from '../timeout.js';

describe('withTimeout', () => {
  it('should resolve with the result of a fast call', async () => {
    await expect(withTimeout('read', 1_000, async () => 42)).resolves.toBe(42);
  });

  it('should reject a slow call with a timeout error', async () => {
    const slow = () => new Promise<number>((resolve) => setTimeout(() => resolve(1), 200));

    const failure = withTimeout('read state on sql01', 10, slow);

    await expect(failure).rejects.toBeInstanceOf(TimeoutError);
    await expect(failure).rejects.toThrow('read state on sql01 timed out after 10ms');
  });

  it('should pass through the call rejection', async () => {
    await expect(
      withTimeout('apply', 1_000, async () => {
        throw new Error('Access is denied');
      })
    ).rejects.toThrow('Access is denied');
  });

  it('should hand a value that arrives after the timeout to release', async () => {
    const released: string[] = [];
    const late = () => new Promise<string>((resolve) => setTimeout(() => resolve('session-1'), 30));

    await expect(
      withTimeout('connect on sql01', 10, late, async (value) => {
        released.push(value);
      })
    ).rejects.toBeInstanceOf(TimeoutError);
    expect(released).toEqual([]);

    await new Promise((resolve) => setTimeout(resolve, 60));
    expect(released).toEqual(['session-1']);
  });

  it('should not release a value that arrives in time', async () => {
    const released: number[] = [];

    await expect(
      withTimeout('connect on sql01', 1_000, async () => 7, async (value) => {
        released.push(value);
      })
    ).resolves.toBe(7);
    expect(released).toEqual([]);
  });
});
