/**
 * Fixed pool of `concurrency` runners draining a shared cursor. Results keep the
 * input order; the returned promise settles once every item is done.
 */
export const runWithConcurrency = async <T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  let index = 0;
  const runnerCount = Math.max(0, Math.min(Math.max(1, concurrency), items.length));
  const runners = Array.from({ length: runnerCount }, async () => {
    while (index < items.length) {
      const current = index++;
      results[current] = await worker(items[current], current);
    }
  });
  await Promise.all(runners);
  return results;
};

export class DeadlineExceededError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Deadline of ${timeoutMs}ms exceeded`);
    this.name = 'DeadlineExceededError';
  }
}

const abortErrorOf = (signal: AbortSignal, timeoutMs: number): Error => {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new DeadlineExceededError(timeoutMs);
};

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs` or when `parent`
 * aborts. On expiry the returned promise rejects with DeadlineExceededError
 * (or with the parent's abort reason) without waiting for the task to notice.
 */
export const withDeadline = async <T>(
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> => {
  if (parent?.aborted) {
    throw abortErrorOf(parent, timeoutMs);
  }

  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);
  parent?.addEventListener('abort', onParentAbort, { once: true });

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => reject(abortErrorOf(controller.signal, timeoutMs)),
      { once: true },
    );
    timer = setTimeout(() => controller.abort(new DeadlineExceededError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
    controller.abort();
  }
};
