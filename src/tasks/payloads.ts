/**
 * Payload executors: the synthetic work behind each task kind.
 * io waits on a timer, cpu spins a bounded arithmetic loop, mixed does
 * half of each (compute first, then wait).
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { PayloadOutput, Task, TaskKind } from './types.js';

export const IO_MS_PER_INTENSITY = 10;
export const CPU_ITERATIONS_PER_INTENSITY = 20_000;

const MODULUS = 1_000_000_007;

export type PayloadExecutor = (intensity: number) => Promise<PayloadOutput>;

export async function ioPayload(intensity: number): Promise<PayloadOutput> {
  const waitedMs = Math.round(intensity * IO_MS_PER_INTENSITY);
  await sleep(waitedMs);
  return { iterations: 0, checksum: 0, waitedMs };
}

export async function cpuPayload(intensity: number): Promise<PayloadOutput> {
  const iterations = Math.round(intensity * CPU_ITERATIONS_PER_INTENSITY);
  return { iterations, checksum: spin(iterations), waitedMs: 0 };
}

export async function mixedPayload(intensity: number): Promise<PayloadOutput> {
  const compute = await cpuPayload(intensity / 2);
  const wait = await ioPayload(intensity / 2);
  return { iterations: compute.iterations, checksum: compute.checksum, waitedMs: wait.waitedMs };
}

export const PAYLOADS: Record<TaskKind, PayloadExecutor> = {
  io: ioPayload,
  cpu: cpuPayload,
  mixed: mixedPayload,
};

export function runPayload(task: Task): Promise<PayloadOutput> {
  return PAYLOADS[task.kind](task.intensity);
}

/**
 * Synchronous arithmetic loop; holds the event loop for its whole run.
 */
export function spin(iterations: number): number {
  let acc = 0;
  for (let i = 0; i < iterations; i++) {
    acc = (acc * 31 + ((i * i) ^ (i >>> 3))) % MODULUS;
  }
  return acc;
}
