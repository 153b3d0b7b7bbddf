import { setTimeout as sleep } from 'node:timers/promises';

/**
 * Re-runs `check` until it stops throwing, or rethrows its last error once
 * `timeoutMs` has passed.
 */
export async function eventually(check: () => void, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    try {
      check();
      return;
    } catch (error) {
      if (Date.now() >= deadline) {
        throw error;
      }
    }
    await sleep(5);
  }
}
