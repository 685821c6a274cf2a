import { describe, expect, it, vi } from 'vitest';
import { AppError } from '../../../src/shared/errors/app-error';
import { retry } from '../../../src/shared/async/resilience';

describe('retry', () => {
  it('retries and eventually succeeds', async () => {
    let attempts = 0;
    const result = await retry(
      async () => {
        attempts += 1;
        if (attempts < 3) throw new Error('flaky');
        return 'done';
      },
      { retries: 3, baseDelayMs: 1, operationName: 'flaky op' },
    );

    expect(result).toBe('done');
    expect(attempts).toBe(3);
  });

  it('surfaces AppError with cause after exhausting attempts', async () => {
    const failure = new Error('always fails');

    await expect(
      retry(async () => Promise.reject(failure), { retries: 1, baseDelayMs: 1, operationName: 'always fails op' }),
    ).rejects.toMatchObject({
      code: 'EXTERNAL_CALL_FAILED',
      message: 'always fails op failed after 2 attempts',
      cause: failure,
    } satisfies Partial<AppError>);
  });

  it('rethrows immediately when shouldRetry declines', async () => {
    const fatal = new Error('bad request');
    const operation = vi.fn(async () => Promise.reject(fatal));

    await expect(
      retry(operation, { retries: 3, baseDelayMs: 1, operationName: 'no retry', shouldRetry: () => false }),
    ).rejects.toBe(fatal);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('reports each retry with exponential delay', async () => {
    const onRetry = vi.fn();
    await expect(
      retry(async () => Promise.reject(new Error('down')), {
        retries: 2,
        baseDelayMs: 1,
        operationName: 'backoff op',
        onRetry,
      }),
    ).rejects.toThrow('backoff op failed after 3 attempts');

    expect(onRetry.mock.calls.map((call) => [call[1], call[2]])).toEqual([
      [1, 1],
      [2, 2],
    ]);
  });

  it('validates retries and baseDelayMs', async () => {
    await expect(
      retry(async () => 'ok', { retries: -1, baseDelayMs: 1, operationName: 'bad retries' }),
    ).rejects.toThrow('retries must be a non-negative integer');

    await expect(
      retry(async () => 'ok', { retries: 0, baseDelayMs: 0, operationName: 'bad delay' }),
    ).rejects.toThrow('baseDelayMs must be a positive integer');
  });
});
