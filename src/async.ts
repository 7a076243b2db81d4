import { AbortedError, TimeoutError, type WatermarkError } from "./errors";
import type { DeadlineOptions } from "./types";

/**
 * Runs `work` under a timeout and the caller's abort signal. `work` receives a
 * signal that fires with a TimeoutError or AbortedError as its reason, and is
 * expected to stop at its next `checkpoint`.
 */
export async function withDeadline<T>(
  operation: string,
  work: (signal: AbortSignal) => Promise<T>,
  { timeoutMs, signal }: DeadlineOptions = {},
): Promise<T> {
  if (signal?.aborted) throw new AbortedError(operation);

  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const guards = new Promise<never>((_, reject) => {
    const fail = (err: WatermarkError) => {
      controller.abort(err);
      reject(err);
    };
    if (timeoutMs !== undefined && Number.isFinite(timeoutMs) && timeoutMs > 0) {
      timeoutId = setTimeout(() => fail(new TimeoutError(operation, timeoutMs)), timeoutMs);
      timeoutId.unref?.();
    }
    if (signal) {
      onAbort = () => fail(new AbortedError(operation));
      signal.addEventListener("abort", onAbort, { once: true });
    }
  });

  try {
    return await Promise.race([work(controller.signal), guards]);
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
    if (signal && onAbort) signal.removeEventListener("abort", onAbort);
  }
}

/**
 * Stops if `signal` has fired, otherwise yields to the event loop so timers
 * and abort listeners get to run. A no-op without a signal.
 */
export async function checkpoint(signal?: AbortSignal): Promise<void> {
  if (!signal) return;
  signal.throwIfAborted();
  await new Promise<void>((resolve) => setImmediate(resolve));
  signal.throwIfAborted();
}
