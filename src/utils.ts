import { setTimeout as delay } from 'node:timers/promises';

/**
 * Sleep function used by the background loops.
 * Must reject (or resolve early) once the signal is aborted.
 */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

/**
 * Default abortable sleep backed by timers/promises.
 */
export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Sleep through a loop's wait, returning early and quietly on abort.
 * A sleep that fails for any other reason is reported through onError.
 */
export async function pause(
  sleepFn: Sleep,
  ms: number,
  signal: AbortSignal,
  onError: (err: unknown) => void
): Promise<void> {
  try {
    await sleepFn(ms, signal);
  } catch (err) {
    if (!signal.aborted) {
      onError(err);
    }
  }
}

/**
 * Extract a printable message from anything thrown.
 *
 * @param err - The caught value
 * @returns err.message for Error instances, String(err) otherwise
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Race a promise against a deadline and an optional abort signal.
 * The timer is always cleared, whichever side settles first.
 *
 * @param promise - The operation to guard
 * @param ms - Deadline in milliseconds
 * @param label - Used in the timeout error message
 * @param signal - Aborting rejects immediately
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string,
  signal?: AbortSignal
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new Error(`${label} aborted`));
      return;
    }

    const onAbort = (): void => {
      cleanup();
      reject(new Error(`${label} aborted`));
    };

    const timer = setTimeout(() => {
      cleanup();
      reject(new Error(`${label} timed out after ${ms}ms`));
    }, ms);

    const cleanup = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };

    signal?.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      }
    );
  });
}

/**
 * Deduplicate a list of strings, keeping first-seen order.
 */
export function uniqueStrings(values: Iterable<string>): string[] {
  return Array.from(new Set(values));
}
