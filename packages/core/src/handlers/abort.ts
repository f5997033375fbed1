import { RequestCancelledError } from "../errors/runtime-errors";

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new RequestCancelledError(signal.reason);
}

/** Settles with `pending`, or rejects with RequestCancelledError as soon as `signal` aborts. */
export function abortable<T>(pending: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return pending;
  if (signal.aborted) return Promise.reject(new RequestCancelledError(signal.reason));

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new RequestCancelledError(signal.reason));
    signal.addEventListener("abort", onAbort, { once: true });
    pending.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
