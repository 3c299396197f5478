export type DeadlineResult<T> =
  | { timedOut: false; value: T }
  | { timedOut: true };

/**
 * Run `fn` with an abort signal that fires after `timeoutMs` or when
 * `parentSignal` aborts. Resolves `{ timedOut: true }` as soon as the
 * deadline passes, without waiting for `fn` to notice the abort.
 * Errors thrown by `fn` before the deadline propagate.
 */
export function runWithDeadline<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parentSignal?: AbortSignal,
): Promise<DeadlineResult<T>> {
  const controller = new AbortController();

  return new Promise<DeadlineResult<T>>((resolve, reject) => {
    let settled = false;

    const onParentAbort = (): void => controller.abort(parentSignal?.reason);

    const finish = (): void => {
      settled = true;
      clearTimeout(timer);
      parentSignal?.removeEventListener('abort', onParentAbort);
    };

    const timer = setTimeout(() => {
      if (settled) return;
      finish();
      controller.abort(new Error('timeout'));
      resolve({ timedOut: true });
    }, timeoutMs);

    if (parentSignal) {
      if (parentSignal.aborted) {
        controller.abort(parentSignal.reason);
      } else {
        parentSignal.addEventListener('abort', onParentAbort, { once: true });
      }
    }

    let work: Promise<T>;
    try {
      work = fn(controller.signal);
    } catch (err) {
      finish();
      reject(err);
      return;
    }

    work.then(
      value => {
        if (settled) return;
        finish();
        resolve({ timedOut: false, value });
      },
      (err: unknown) => {
        // After the deadline the caller already has its answer; late failures are moot.
        if (settled) return;
        finish();
        reject(err);
      },
    );
  });
}

/**
 * Wait `ms` milliseconds. Resolves `false` early if `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise<boolean>(resolve => {
    if (signal?.aborted) {
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
 * Wait for every promise to settle, giving up after `graceMs`.
 * Resolves `true` when all settled in time. A grace of zero or less does
 * not wait at all.
 */
export async function settleWithin(promises: Iterable<Promise<unknown>>, graceMs: number): Promise<boolean> {
  const pending = Array.from(promises);
  if (pending.length === 0) return true;
  if (graceMs <= 0) return false;

  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<false>(resolve => {
    timer = setTimeout(() => resolve(false), graceMs);
    timer.unref();
  });

  const allSettled = Promise.allSettled(pending).then(() => true as const);
  const result = await Promise.race([allSettled, expired]);
  clearTimeout(timer);
  return result;
}
