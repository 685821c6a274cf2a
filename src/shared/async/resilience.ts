import { AppError } from '../errors/app-error';

function assertPositiveInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${field} must be a positive integer`);
  }
}

export interface RetryOptions {
  retries: number;
  baseDelayMs: number;
  operationName: string;
  /** Return false to rethrow the error immediately instead of retrying. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
}

export async function retry<T>(operation: () => Promise<T>, opts: RetryOptions): Promise<T> {
  if (!Number.isInteger(opts.retries) || opts.retries < 0) {
    throw new RangeError('retries must be a non-negative integer');
  }
  assertPositiveInteger(opts.baseDelayMs, 'baseDelayMs');

  let lastError: unknown;
  for (let attempt = 0; attempt <= opts.retries; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;
      if (opts.shouldRetry && !opts.shouldRetry(error, attempt)) throw error;
      if (attempt === opts.retries) break;
      const delayMs = opts.baseDelayMs * 2 ** attempt;
      opts.onRetry?.(error, attempt + 1, delayMs);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  throw new AppError(
    'EXTERNAL_CALL_FAILED',
    `${opts.operationName} failed after ${opts.retries + 1} attempts`,
    lastError,
  );
}
