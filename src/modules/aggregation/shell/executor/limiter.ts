/**
 * Bounded concurrency for executor tasks.
 */

export type Limiter = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * Creates a limiter running at most `concurrency` tasks at once; queued tasks start
 * in submission order as running ones settle.
 */
export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`Concurrency must be a positive integer, got: ${String(concurrency)}`);
  }

  let active = 0;
  const queue: (() => void)[] = [];

  const release = (): void => {
    active -= 1;
    const next = queue.shift();
    if (next !== undefined) {
      next();
    }
  };

  return <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      const run = (): void => {
        active += 1;
        void task().then(resolve, reject).finally(release);
      };

      if (active < concurrency) {
        run();
      } else {
        queue.push(run);
      }
    });
};
