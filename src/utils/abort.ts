export class CancelledError extends Error {
  constructor(message = "Operation was cancelled") {
    super(message);
    this.name = "AbortError";
  }
}

/** Longest delay a Node timer honours; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export function clampTimerDelay(ms: number): number {
  if (!Number.isFinite(ms)) {
    return ms > 0 ? MAX_TIMER_DELAY_MS : 0;
  }

  return Math.min(Math.max(ms, 0), MAX_TIMER_DELAY_MS);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, clampTimerDelay(ms));
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Settles with the promise, or rejects as soon as the signal aborts. The
 * abandoned promise keeps running; its outcome is ignored.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError());
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );

    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
