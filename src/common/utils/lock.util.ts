export type Lock = <T>(task: () => Promise<T>) => Promise<T>;

/**
 * In-process mutex: tasks run one after another in call order.
 * A failing task releases the lock for the next one.
 */
export const createLock = (): Lock => {
  let tail: Promise<void> = Promise.resolve();

  return <T>(task: () => Promise<T>): Promise<T> => {
    const run = tail.then(task);
    tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  };
};
