/**
 * Runs tasks one at a time in call order. A rejected task does not block the ones behind it.
 */
export const createSerialQueue = () => {
  let tail: Promise<unknown> = Promise.resolve();

  return <T>(task: () => Promise<T>): Promise<T> => {
    const run = tail.catch(() => undefined).then(task);
    tail = run;
    return run;
  };
};

export type SerialQueue = ReturnType<typeof createSerialQueue>;
