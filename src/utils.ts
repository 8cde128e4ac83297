/**
 * Async helpers.
 */

import { BudLinkError, TimeoutError } from './exceptions';

/**
 * Wait for `ms` milliseconds. Resolves early when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timeoutId);
      resolve();
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run an operation with a deadline.
 *
 * The operation receives a signal that aborts when the deadline passes or
 * `parentSignal` aborts.
 *
 * @throws {TimeoutError} When the deadline passes first
 * @throws {BudLinkError} When `parentSignal` is already aborted
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  message: string,
  parentSignal?: AbortSignal
): Promise<T> {
  if (parentSignal?.aborted) {
    throw new BudLinkError('Operation aborted');
  }

  const controller = new AbortController();
  const onAbort = (): void => controller.abort();
  parentSignal?.addEventListener('abort', onAbort, { once: true });

  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new TimeoutError(message));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation(controller.signal), deadline]);
  } finally {
    clearTimeout(timeoutId);
    parentSignal?.removeEventListener('abort', onAbort);
  }
}
