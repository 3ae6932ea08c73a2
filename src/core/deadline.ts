import { setTimeout as sleep } from 'node:timers/promises';

export type Raced<T> = { done: true; value: T } | { done: false };

/**
 * Race `work` against a timer. The timer is cancelled as soon as either
 * side settles, so nothing is left pending.
 */
export async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<Raced<T>> {
  const controller = new AbortController();
  try {
    return await Promise.race([
      work.then((value): Raced<T> => ({ done: true, value })),
      sleep(timeoutMs, { done: false } as const, { signal: controller.signal }),
    ]);
  } finally {
    controller.abort();
  }
}
