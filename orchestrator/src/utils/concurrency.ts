export type Limiter = <T>(fn: () => Promise<T>) => Promise<T>;

/**
 * Create a limiter that runs at most `concurrency` tasks at once.
 *
 * Tasks start in submission order as slots free up. A task that throws
 * releases its slot like one that resolves.
 */
export function limitConcurrency(concurrency: number): Limiter {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError('concurrency must be a positive integer');
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = (): void => {
    if (active >= concurrency) return;
    const run = queue.shift();
    if (!run) return;
    active += 1;
    run();
  };

  return <T>(fn: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(() => {
        let task: Promise<T>;
        try {
          task = fn();
        } catch (error) {
          task = Promise.reject(error);
        }
        void task.then(resolve, reject).finally(() => {
          active -= 1;
          next();
        });
      });
      next();
    });
}
