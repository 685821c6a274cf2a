export type ConcurrencyLimiter = <T>(fn: () => Promise<T>) => Promise<T>;

function assertValidConcurrency(concurrency: number) {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError('concurrency must be a positive integer');
  }
}

/**
 * Create a limiter that keeps at most `concurrency` tasks in flight.
 *
 * Queued tasks start in submission order as slots free up. A rejected task
 * releases its slot like a resolved one; the rejection is returned to its caller.
 */
export function limitConcurrency(concurrency: number): ConcurrencyLimiter {
  assertValidConcurrency(concurrency);

  let active = 0;
  const queue: Array<() => void> = [];

  const release = () => {
    active -= 1;
    const next = queue.shift();
    if (next) next();
  };

  return <T>(fn: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      const start = () => {
        active += 1;
        let pending: Promise<T>;
        try {
          pending = fn();
        } catch (error) {
          pending = Promise.reject(error);
        }
        void pending.then(resolve, reject).finally(release);
      };

      if (active < concurrency) {
        start();
      } else {
        queue.push(start);
      }
    });
}
