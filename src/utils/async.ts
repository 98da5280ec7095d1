/**
 * @fileoverview Promise helpers for fan-out work and abortable waits.
 */

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Once `signal` aborts, no further items are started; calls already running
 * are left to finish on their own.
 *
 * @returns Results in item order; slots for items never started stay undefined
 */
export async function asyncPool<TItem, TResult>(
  concurrency: number,
  items: readonly TItem[],
  worker: (item: TItem, index: number) => Promise<TResult>,
  signal?: AbortSignal,
): Promise<Array<TResult | undefined>> {
  const limit = Math.max(1, Math.trunc(concurrency));
  const results: Array<TResult | undefined> = new Array(items.length).fill(undefined);
  let nextIndex = 0;

  const runners = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (true) {
      if (signal?.aborted) return;
      const current = nextIndex;
      nextIndex += 1;
      if (current >= items.length) return;
      const item = items[current];
      if (item === undefined) return;
      results[current] = await worker(item, current);
    }
  });

  await Promise.all(runners);
  return results;
}

/**
 * Resolves when `work` settles or `signal` aborts, whichever comes first.
 * Rejections from `work` propagate; an abort resolves without a value.
 */
export function untilSettledOrAborted(work: Promise<unknown>, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve, reject) => {
    const onAbort = () => resolve();
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      () => {
        signal.removeEventListener("abort", onAbort);
        resolve();
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sleeps for `ms`, returning early when `signal` aborts.
 */
export function sleepWithSignal(ms: number, signal?: AbortSignal): Promise<void> {
  if (!signal) return sleep(ms);
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

function abortReason(signal?: AbortSignal): Error {
  const reason: unknown = signal?.reason;
  return reason instanceof Error ? reason : new Error("Aborted");
}

/**
 * Waits for `ms`, rejecting with the abort reason if `signal` aborts first.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(abortReason(signal));
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * A signal that aborts when the parent aborts or `timeoutMs` elapses.
 * Call `dispose` once the guarded work is done to release the timer.
 */
export interface Deadline {
  readonly signal: AbortSignal;
  dispose(): void;
}

export function createDeadline(parent?: AbortSignal, timeoutMs?: number): Deadline {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);

  if (parent?.aborted) controller.abort(parent.reason);
  else parent?.addEventListener("abort", onParentAbort, { once: true });

  const timer =
    timeoutMs !== undefined && timeoutMs > 0
      ? setTimeout(() => controller.abort(new Error(`Deadline of ${timeoutMs}ms exceeded`)), timeoutMs)
      : undefined;

  return {
    signal: controller.signal,
    dispose() {
      if (timer !== undefined) clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

/** Outcome of one fanned-out call. */
export type Settled<T> = { readonly ok: true; readonly value: T } | { readonly ok: false; readonly error: unknown };

export interface FanOutOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  /** Maximum calls in flight, defaults to one per item */
  concurrency?: number;
}

/**
 * Calls `worker` for every item concurrently and waits until all settle or
 * the deadline fires. Each call writes only to its own slot; the returned
 * array is a copy taken at the join, so results arriving later are dropped.
 *
 * @returns One slot per item, undefined where the call had not settled
 */
export async function fanOut<TItem, TResult>(
  items: readonly TItem[],
  worker: (item: TItem, signal: AbortSignal) => Promise<TResult>,
  options: FanOutOptions = {},
): Promise<Array<Settled<TResult> | undefined>> {
  const slots: Array<Settled<TResult> | undefined> = new Array(items.length).fill(undefined);
  if (!items.length) return slots;

  const deadline = createDeadline(options.signal, options.timeoutMs);
  try {
    const work = asyncPool(
      options.concurrency ?? items.length,
      items,
      async (item, index) => {
        try {
          slots[index] = { ok: true, value: await worker(item, deadline.signal) };
        } catch (error) {
          slots[index] = { ok: false, error };
        }
      },
      deadline.signal,
    );
    await untilSettledOrAborted(work, deadline.signal);
  } finally {
    deadline.dispose();
  }
  return [...slots];
}
