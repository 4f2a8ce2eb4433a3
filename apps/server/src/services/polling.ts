import { BatchCancelledError, PollTimeoutError } from "../errors.js";

export interface PollPolicy {
  intervalMs: number;
  maxPolls: number;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new BatchCancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new BatchCancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Calls `fetchState` until `isDone` accepts its value, sleeping `intervalMs` between calls.
 * Throws PollTimeoutError after `maxPolls` attempts and BatchCancelledError once `signal` aborts.
 */
export async function pollUntil<T>(
  what: string,
  fetchState: () => Promise<T>,
  isDone: (value: T) => boolean,
  policy: PollPolicy,
  signal?: AbortSignal
): Promise<T> {
  for (let attempt = 1; attempt <= policy.maxPolls; attempt += 1) {
    if (signal?.aborted) throw new BatchCancelledError();
    const value = await fetchState();
    if (isDone(value)) return value;
    if (attempt < policy.maxPolls) {
      await sleep(policy.intervalMs, signal);
    }
  }
  throw new PollTimeoutError(what, policy.maxPolls);
}
