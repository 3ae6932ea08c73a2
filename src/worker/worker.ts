/**
 * Worker boundary: runs one task and always produces a TaskResult.
 * Shared by the in-process worker and the thread/process entry points.
 */

import { performance } from 'node:perf_hooks';
import { TaskExecutionError, WorkerCrashError, toError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { runPayload } from '../tasks/payloads.js';
import type { FailureReason, Task, TaskFailure, TaskResult } from '../tasks/types.js';

export interface ExecutionContext {
  workerId: number;
  logger: Logger;
  /** Ends the hosting execution context abruptly (the 'crash' fault). */
  crash(task: Task): void;
}

/**
 * Epoch milliseconds with sub-millisecond precision, comparable across
 * threads and processes.
 */
export function now(): number {
  return performance.timeOrigin + performance.now();
}

export async function executeTask(task: Task, context: ExecutionContext): Promise<TaskResult> {
  const { workerId, logger } = context;
  const startedAt = now();
  logger.debug({ taskId: task.id, kind: task.kind, intensity: task.intensity }, 'Starting task');

  try {
    if (task.fault === 'crash') {
      context.crash(task);
    }
    if (task.fault === 'error') {
      throw new TaskExecutionError(`Injected failure in task ${task.id}`, task.id);
    }

    const output = await runPayload(task);
    const finishedAt = now();
    logger.debug({ taskId: task.id, ms: +(finishedAt - startedAt).toFixed(3) }, 'Completed task');

    return { taskId: task.id, status: 'success', workerId, startedAt, finishedAt, output };
  } catch (error) {
    const err = toError(error);
    const reason: FailureReason = err instanceof WorkerCrashError ? 'worker_crash' : 'exception';
    logger.warn({ taskId: task.id, reason, err: err.message }, 'Task failed');
    return failureResult(task.id, workerId, reason, err.message, startedAt, now());
  }
}

export function failureResult(
  taskId: number,
  workerId: number | null,
  reason: FailureReason,
  message: string,
  startedAt: number,
  finishedAt: number = startedAt,
): TaskFailure {
  return {
    taskId,
    status: 'failure',
    workerId,
    startedAt,
    finishedAt,
    error: { reason, message },
  };
}
