import { StepCancelledError, StepTimeoutError } from '../errors.js';

/**
 * Resolves after `ms`, or early once `signal` aborts. Returns whether
 * the full delay elapsed.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted === true) {
      resolve(false);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Runs one step attempt against its deadline.
 *
 * The task gets a per-attempt signal that aborts on timeout or when
 * `parent` aborts. The returned promise settles with whichever comes
 * first: the task's own result, a `StepTimeoutError`, or a
 * `StepCancelledError`. A task that ignores its signal keeps running in
 * the background; its late result is dropped.
 */
export function runWithDeadline<T>(
  stepId: string,
  timeoutMs: number,
  parent: AbortSignal,
  task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const attempt = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    const settle = (finish: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent.removeEventListener('abort', onCancel);
      finish();
    };

    const timer = setTimeout(() => {
      const err = new StepTimeoutError(stepId, timeoutMs);
      attempt.abort(err);
      settle(() => reject(err));
    }, timeoutMs);

    const onCancel = (): void => {
      const err = new StepCancelledError(stepId);
      attempt.abort(err);
      settle(() => reject(err));
    };

    if (parent.aborted) {
      onCancel();
      return;
    }
    parent.addEventListener('abort', onCancel, { once: true });

    Promise.resolve()
      .then(() => task(attempt.signal))
      .then(
        (value) => settle(() => resolve(value)),
        (err: unknown) => settle(() => reject(err)),
      );
  });
}
