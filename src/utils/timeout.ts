import { TimeoutError } from "../errors.js";

/**
 * Race `work` against a timer and an optional abort signal. Both losing
 * conditions reject with {@link TimeoutError}; the timer is always cleared.
 */
export function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  signal?: AbortSignal,
  label = "Operation",
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      cleanup();
      reject(new TimeoutError(`${label} aborted: session timed out`));
    };
    const timer = setTimeout(() => {
      cleanup();
      reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);

    function cleanup(): void {
      clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }

    work.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
    if (signal?.aborted) onAbort();
    else signal?.addEventListener("abort", onAbort, { once: true });
  });
}
