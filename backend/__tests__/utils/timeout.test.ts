/**
 * Timeout helper tests
 */
import { describe, it, expect } from '@jest/globals';
import { withTimeout } from '../../utils/timeout';
import { TimeoutError } from '../../utils/errors';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function aborted(signal: AbortSignal): Promise<void> {
  return new Promise(resolve => signal.addEventListener('abort', () => resolve(), { once: true }));
}

describe('withTimeout', () => {
  it('should resolve with the operation result when it finishes in time', async () => {
    await expect(withTimeout(1000, 'quick', async () => 'done')).resolves.toBe('done');
  });

  it('should pass operation errors through unchanged', async () => {
    await expect(withTimeout(1000, 'failing', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
  });

  it('should reject with TimeoutError and abort the signal', async () => {
    let seen: AbortSignal | undefined;
    const error = await withTimeout(10, 'Slow work', async signal => {
      seen = signal;
      await aborted(signal);
      await delay(50);
      return 'late';
    }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TimeoutError);
    expect(error).toMatchObject({ message: 'Slow work timed out', code: 'TIMEOUT' });
    expect(seen?.aborted).toBe(true);
  });

  it('should not wait for the operation by default', async () => {
    const events: string[] = [];
    await withTimeout(10, 'Slow work', async signal => {
      await aborted(signal);
      await delay(50);
      events.push('operation settled');
    }).catch(() => events.push('rejected'));

    expect(events).toEqual(['rejected']);
    await delay(80);
    expect(events).toEqual(['rejected', 'operation settled']);
  });

  it('should hold the rejection until the operation settles when asked', async () => {
    const events: string[] = [];
    await withTimeout(10, 'Slow work', async signal => {
      await aborted(signal);
      await delay(50);
      events.push('operation settled');
      throw new TimeoutError('Slow work');
    }, { awaitSettled: true }).catch(() => events.push('rejected'));

    expect(events).toEqual(['operation settled', 'rejected']);
  });
});
