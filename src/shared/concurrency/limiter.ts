export type Limiter = {
  <T>(task: () => Promise<T>): Promise<T>;
  activeCount(): number;
  pendingCount(): number;
};

/**
 * Runs at most `concurrency` tasks at a time; extra tasks wait in FIFO order.
 *   const limit = createLimiter(4);
 *   await limit(() => record.safeRun(runCount));
 */
export const createLimiter = (concurrency: number): Limiter => {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error("concurrency must be an integer >= 1");
  }

  let active = 0;
  const queue: Array<() => void> = [];

  const next = () => {
    if (active >= concurrency) return;
    const fn = queue.shift();
    if (!fn) return;
    active += 1;
    fn();
  };

  const limit = <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      queue.push(() => {
        Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            active -= 1;
            next();
          });
      });
      next();
    });

  return Object.assign(limit, {
    activeCount: () => active,
    pendingCount: () => queue.length
  });
};
