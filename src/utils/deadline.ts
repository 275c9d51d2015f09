/**
 * Caller-side deadlines for remote work.
 *
 * @module utils/deadline
 */

export class DeadlineExceededError extends Error {
  constructor(readonly deadlineMs: number) {
    super(`Deadline exceeded after ${deadlineMs}ms`);
    this.name = 'DeadlineExceededError';
  }
}

/**
 * Run `task` with a hard deadline.
 *
 * On expiry the returned promise rejects with DeadlineExceededError and the
 * task's signal is aborted; whatever the task settles with afterwards is dropped.
 */
export async function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  deadlineMs: number,
  parent?: AbortSignal,
): Promise<T> {
  const controller = new AbortController();
  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const running = task(controller.signal);
  // late settlement after expiry is discarded
  running.catch(() => undefined);

  try {
    return await Promise.race([
      running,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
          controller.abort();
          reject(new DeadlineExceededError(deadlineMs));
        }, deadlineMs);
      }),
    ]);
  } finally {
    if (timer !== undefined) {
      clearTimeout(timer);
    }
    parent?.removeEventListener('abort', onParentAbort);
  }
}
