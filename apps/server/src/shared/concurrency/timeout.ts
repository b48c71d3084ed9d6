/**
 * Races `task` against a timer. The task receives an AbortSignal that fires
 * on timeout so cooperative work can stop early.
 */
export const withTimeout = async <T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> => {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = onTimeout();
      reject(error);
      controller.abort(error);
    }, Math.max(0, timeoutMs));
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
};

/**
 * Resolves true once `task` settles, or false when `timeoutMs` elapses or
 * `signal` aborts first. Never rejects.
 */
export const settlesWithin = (
  task: Promise<unknown>,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<boolean> => {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }

  return new Promise<boolean>((resolve) => {
    let timer: NodeJS.Timeout | undefined;
    const finish = (settled: boolean) => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
      resolve(settled);
    };
    const onAbort = () => finish(false);

    timer = setTimeout(() => finish(false), Math.max(0, timeoutMs));
    signal?.addEventListener("abort", onAbort, { once: true });
    task.then(
      () => finish(true),
      () => finish(true),
    );
  });
};
