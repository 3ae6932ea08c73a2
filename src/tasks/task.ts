import { ConfigError } from '../core/errors.js';
import { TASK_KINDS, type Task, type TaskFault, type TaskKind } from './types.js';

export function createTask(id: number, kind: TaskKind, intensity: number, fault?: TaskFault): Task {
  if (!Number.isSafeInteger(id)) {
    throw new ConfigError(`Task id must be an integer, got ${id}`);
  }
  if (!TASK_KINDS.includes(kind)) {
    throw new ConfigError(`Unknown task kind "${kind}" for task ${id}`);
  }
  if (!Number.isFinite(intensity) || intensity <= 0) {
    throw new ConfigError(`Task ${id} intensity must be a positive number, got ${intensity}`);
  }

  const task: Task = fault ? { id, kind, intensity, fault } : { id, kind, intensity };
  return Object.freeze(task);
}

/**
 * Returns the first id that appears more than once, or null.
 */
export function findDuplicateId(tasks: readonly Task[]): number | null {
  const seen = new Set<number>();
  for (const task of tasks) {
    if (seen.has(task.id)) return task.id;
    seen.add(task.id);
  }
  return null;
}

export function describeTask(task: Task): string {
  const fault = task.fault ? `, fault=${task.fault}` : '';
  return `Task(${task.id}, ${task.kind}, intensity=${task.intensity}${fault})`;
}
