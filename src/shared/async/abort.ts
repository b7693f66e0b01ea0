// src/shared/async/abort.ts

/**
 * Small helpers for cancellation plumbing.
 */

import { setTimeout as sleep } from 'timers/promises';

export interface AbortScope {
  signal: AbortSignal;
  /**
   * Clear the timer and detach from the parent signal. Call once the guarded work settles.
   */
  dispose(): void;
}

/**
 * Create a signal that aborts when the parent aborts or when `timeoutMs` elapses,
 * whichever comes first. A timeout of 0 (or less) means "no timeout".
 */
export function createAbortScope(parent: AbortSignal | undefined, timeoutMs: number): AbortScope {
  const controller = new AbortController();

  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  const timer =
    timeoutMs > 0
      ? setTimeout(() => controller.abort(new Error(`Timed out after ${timeoutMs}ms`)), timeoutMs)
      : undefined;
  timer?.unref();

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

/**
 * Wait `ms` milliseconds. Resolves `true` when the full delay elapsed and
 * `false` when the signal aborted first; never rejects.
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  if (ms <= 0) return true;

  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (signal?.aborted) return false;
    throw err;
  }
}
