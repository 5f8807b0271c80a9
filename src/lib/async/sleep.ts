import { RequestAbortedError } from "@/adapters/errors";

export const throwIfAborted = (signal: AbortSignal | undefined): void => {
  if (signal?.aborted) {
    throw new RequestAbortedError("Request aborted", signal.reason);
  }
};

/**
 * Resolves after `ms`, or rejects with {@link RequestAbortedError} as soon as
 * `signal` aborts. The timer is cleared either way.
 */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new RequestAbortedError("Request aborted", signal.reason));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeoutId);
      reject(new RequestAbortedError("Request aborted", signal?.reason));
    };

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
