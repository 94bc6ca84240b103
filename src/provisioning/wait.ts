/**
 * Condition Waiter
 *
 * Polls a remote condition at a fixed interval until it holds, the deadline
 * passes, or the caller aborts. Timers only; the event loop stays free.
 */

import {
  ResourceNotFoundError,
  WaitAbortedError,
  WaitTimeoutError,
} from '../cluster/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('provisioning:wait');

/**
 * Options for a single wait.
 */
export interface WaitOptions {
  /** Delay between predicate evaluations */
  intervalMs: number;
  /** Total time budget, measured from the first evaluation */
  timeoutMs: number;
  /** What is being waited for, used in errors and logs */
  description: string;
  /** Cancels the wait with WaitAbortedError */
  signal?: AbortSignal;
}

/**
 * Outcome of a successful wait.
 */
export interface WaitResult {
  attempts: number;
  elapsedMs: number;
}

/**
 * Resolve after `ms`, or reject early once `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Wait until `predicate` resolves to true.
 *
 * A ResourceNotFoundError from the predicate counts as "not yet"; any other
 * error ends the wait immediately and propagates unchanged.
 */
export async function waitUntil(
  predicate: () => Promise<boolean>,
  options: WaitOptions
): Promise<WaitResult> {
  const { intervalMs, timeoutMs, description, signal } = options;
  const start = Date.now();
  let attempts = 0;

  for (;;) {
    if (signal?.aborted) {
      throw new WaitAbortedError(description);
    }

    attempts++;
    let satisfied = false;
    try {
      satisfied = await predicate();
    } catch (error) {
      if (!(error instanceof ResourceNotFoundError)) {
        throw error;
      }
      log.debug({ description, attempts }, 'Resource not visible yet');
    }

    const elapsedMs = Date.now() - start;

    if (satisfied) {
      log.debug({ description, attempts, elapsedMs }, 'Condition met');
      return { attempts, elapsedMs };
    }

    const remainingMs = timeoutMs - elapsedMs;
    if (remainingMs <= 0) {
      log.warn({ description, attempts, timeoutMs }, 'Wait timed out');
      throw new WaitTimeoutError(description, timeoutMs);
    }

    try {
      await sleep(Math.min(intervalMs, remainingMs), signal);
    } catch {
      throw new WaitAbortedError(description);
    }
  }
}
