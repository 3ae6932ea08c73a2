/**
 * Workload generation: reproducible batches of synthetic tasks.
 */

import { ConfigError } from '../core/errors.js';
import { TaskMixSchema, type TaskMix } from '../core/types.js';
import { createRNG, randomSeed, type RNG } from './random.js';
import { createTask } from './task.js';
import { INTENSITY, TASK_KINDS, type Task, type TaskKind } from './types.js';

export interface Workload {
  seed: number;
  mix: TaskMix;
  tasks: Task[];
}

/**
 * Generate `count` tasks with ids 1..count. The same seed and mix always
 * yield the same sequence.
 */
export function generateWorkload(count: number, mix: Partial<TaskMix> = {}, seed?: number): Workload {
  if (!Number.isSafeInteger(count) || count < 0) {
    throw new ConfigError(`Task count must be a non-negative integer, got ${count}`);
  }

  const parsed = TaskMixSchema.safeParse(mix);
  if (!parsed.success) {
    throw new ConfigError(`Invalid task mix: ${parsed.error.issues.map(i => i.message).join('; ')}`, parsed.error);
  }

  const effectiveSeed = seed ?? randomSeed();
  const rng = createRNG(effectiveSeed);
  const tasks: Task[] = [];

  for (let id = 1; id <= count; id++) {
    const kind = pickKind(parsed.data, rng);
    tasks.push(createTask(id, kind, pickIntensity(rng)));
  }

  return { seed: effectiveSeed, mix: parsed.data, tasks };
}

export function generate(count: number, mix?: Partial<TaskMix>, seed?: number): Task[] {
  return generateWorkload(count, mix, seed).tasks;
}

/**
 * Build a batch of identical tasks, e.g. ten low-intensity cpu tasks.
 */
export function uniformWorkload(count: number, kind: TaskKind, intensity: number = INTENSITY.low): Task[] {
  const tasks: Task[] = [];
  for (let id = 1; id <= count; id++) {
    tasks.push(createTask(id, kind, intensity));
  }
  return tasks;
}

/**
 * Parse "io,cpu,mixed" weights such as "1,2,0".
 */
export function parseMix(weights: string): TaskMix {
  const fields = weights.split(',').map(part => part.trim());
  const parts = fields.map(Number);
  if (
    fields.length !== TASK_KINDS.length ||
    fields.some(field => field === '') ||
    parts.some(p => !Number.isFinite(p))
  ) {
    throw new ConfigError(`Task mix must be three comma-separated numbers (io,cpu,mixed), got "${weights}"`);
  }
  const [io, cpu, mixed] = parts;
  const parsed = TaskMixSchema.safeParse({ io, cpu, mixed });
  if (!parsed.success) {
    throw new ConfigError(`Invalid task mix "${weights}"`, parsed.error);
  }
  return parsed.data;
}

function pickKind(mix: TaskMix, rng: RNG): TaskKind {
  const total = mix.io + mix.cpu + mix.mixed;
  let roll = rng() * total;
  for (const kind of TASK_KINDS) {
    roll -= mix[kind];
    if (roll < 0) return kind;
  }
  // Rounding can leave roll at exactly 0; fall back to the last weighted kind
  return [...TASK_KINDS].reverse().find(kind => mix[kind] > 0) ?? 'cpu';
}

function pickIntensity(rng: RNG): number {
  const span = INTENSITY.high - INTENSITY.low;
  return Math.round((INTENSITY.low + rng() * span) * 100) / 100;
}
