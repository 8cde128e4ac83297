/**
 * Timer control for tests.
 */

import { vi } from 'vitest';

/**
 * Fake timers and Date; setImmediate stays real so {@link flush} works.
 */
export function useFakeClock(): void {
  vi.useFakeTimers({
    toFake: ['setTimeout', 'clearTimeout', 'setInterval', 'clearInterval', 'Date'],
  });
}

/**
 * Let every pending promise callback run.
 */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Keep yielding to the event loop until `condition` holds, so real I/O can
 * complete while timers stay frozen.
 *
 * @throws {Error} After `timeoutMs` of wall time
 */
export async function flushUntil(
  condition: () => boolean,
  timeoutMs: number = 2_000
): Promise<void> {
  const deadline = performance.now() + timeoutMs;
  while (!condition()) {
    if (performance.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await flush();
  }
}
