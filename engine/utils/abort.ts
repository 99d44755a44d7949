import { logDebug } from "./logger.js";

/**
 * Settle with `work`, or reject with the signal's reason as soon as it aborts.
 * Work that loses the race keeps running; its eventual rejection is logged.
 */
export function raceWithAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    abandon(work);
    return Promise.reject(abortReason(signal));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      abandon(work);
      reject(abortReason(signal));
    };
    signal.addEventListener("abort", onAbort, { once: true });

    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Abort `controller` after `ms` with `reason`. Returns a function that cancels
 * the timer.
 */
export function abortAfter(controller: AbortController, ms: number, reason: () => Error): () => void {
  const timer = setTimeout(() => controller.abort(reason()), ms);
  return () => clearTimeout(timer);
}

/**
 * Abort `child` whenever `parent` aborts. Returns a function that unlinks them.
 */
export function linkAbort(parent: AbortSignal, child: AbortController): () => void {
  if (parent.aborted) {
    child.abort(parent.reason);
    return () => undefined;
  }
  const onAbort = (): void => child.abort(parent.reason);
  parent.addEventListener("abort", onAbort, { once: true });
  return () => parent.removeEventListener("abort", onAbort);
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new Error(String(reason ?? "Aborted"));
}

function abandon(work: Promise<unknown>): void {
  work.catch((error: unknown) => {
    logDebug("Abandoned operation settled with an error", { error: String(error) });
  });
}
