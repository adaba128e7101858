import { describe, it, expect } from 'vitest';
import { TimeoutError, withTimeout } from '../withTimeout';

describe('withTimeout', () => {
  it('resolves when promise completes before timeout', async () => {
    const result = await withTimeout(Promise.resolve('done'), 1000, 'Timed out');
    expect(result).toBe('done');
  });

  it('rejects with TimeoutError when promise exceeds timeout', async () => {
    const slowPromise = new Promise<string>((resolve) => setTimeout(() => resolve('late'), 500));

    const attempt = withTimeout(slowPromise, 20, 'Test timed out');
    await expect(attempt).rejects.toThrow('Test timed out');
    await expect(attempt).rejects.toBeInstanceOf(TimeoutError);
  });

  it('preserves rejection from original promise', async () => {
    const failingPromise = Promise.reject(new Error('Original error'));

    await expect(withTimeout(failingPromise, 1000, 'Timed out')).rejects.toThrow('Original error');
  });
});
