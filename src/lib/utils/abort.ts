/**
 * Cancellable waits built on AbortSignal
 */

import { CancelledError } from "../../utils/errors.js";

function cancelledFrom(signal: AbortSignal): CancelledError {
  return new CancelledError("operation cancelled", { cause: signal.reason });
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw cancelledFrom(signal);
  }
}

/** Longest delay a single timer honours; Node fires longer ones after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Resolve after `ms`, or reject with CancelledError once `signal` aborts.
 * Delays beyond one timer's range are waited out in consecutive chunks.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelledFrom(signal));
      return;
    }

    let timer: NodeJS.Timeout | undefined;
    const onAbort = () => {
      clearTimeout(timer);
      if (signal) reject(cancelledFrom(signal));
    };
    const arm = (remaining: number) => {
      const chunk = Math.min(remaining, MAX_TIMER_DELAY_MS);
      timer = setTimeout(() => {
        if (remaining > chunk) {
          arm(remaining - chunk);
          return;
        }
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, chunk);
    };

    signal?.addEventListener("abort", onAbort, { once: true });
    arm(ms);
  });
}

/**
 * Block until `signal` aborts. Never resolves.
 */
export function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (signal.aborted) {
      reject(cancelledFrom(signal));
      return;
    }
    signal.addEventListener("abort", () => reject(cancelledFrom(signal)), {
      once: true,
    });
  });
}
