/**
 * Result Aggregator: folds per-task results and monitor samples into a
 * RunSummary. Pure: the same inputs always produce the same summary, and
 * result arrival order does not matter.
 */

import type { Strategy } from '../core/types.js';
import type { ResourceSample } from '../monitor/performance-monitor.js';
import type { FailureReason, Task, TaskKind, TaskResult } from '../tasks/types.js';

export interface RunMeta {
  runId: string;
  model: Strategy;
  workerCount: number;
  tasks: readonly Task[];
  truncated: boolean;
}

export interface RunSummary {
  runId: string;
  model: Strategy;
  workerCount: number;
  taskCount: number;
  elapsedSeconds: number;
  /** Tasks per second of wall-clock time */
  throughput: number;
  samples: ResourceSample[];
  cpuSamples: number[];
  memorySamples: number[];
  successCount: number;
  failureCount: number;
  failuresByReason: Record<FailureReason, number>;
  truncated: boolean;
  /** Tasks that had no result when the deadline hit */
  unresolvedTaskIds: number[];
  avgTaskSeconds: number;
  avgTaskSecondsByKind: Partial<Record<TaskKind, number>>;
  peakMemoryMb: number;
  /** Sorted by task id */
  results: TaskResult[];
}

export function aggregate(
  results: readonly TaskResult[],
  samples: readonly ResourceSample[],
  elapsedSeconds: number,
  meta: RunMeta,
): RunSummary {
  const taskCount = meta.tasks.length;
  const sorted = [...results].sort((a, b) => a.taskId - b.taskId);

  let successCount = 0;
  let failureCount = 0;
  const failuresByReason: Record<FailureReason, number> = { exception: 0, timeout: 0, worker_crash: 0 };
  const unresolvedTaskIds: number[] = [];

  for (const result of sorted) {
    if (result.status === 'success') {
      successCount++;
    } else {
      failureCount++;
      failuresByReason[result.error.reason]++;
      if (result.error.reason === 'timeout') unresolvedTaskIds.push(result.taskId);
    }
  }

  const throughput = taskCount > 0 && elapsedSeconds > 0 ? taskCount / elapsedSeconds : 0;

  return {
    runId: meta.runId,
    model: meta.model,
    workerCount: meta.workerCount,
    taskCount,
    elapsedSeconds,
    throughput,
    samples: [...samples],
    cpuSamples: samples.map(s => s.cpuPercent),
    memorySamples: samples.map(s => s.rssMb),
    successCount,
    failureCount,
    failuresByReason,
    truncated: meta.truncated,
    unresolvedTaskIds,
    avgTaskSeconds: mean(sorted.map(durationSeconds)),
    avgTaskSecondsByKind: averageByKind(sorted, meta.tasks),
    peakMemoryMb: samples.reduce((peak, s) => Math.max(peak, s.rssMb), 0),
    results: sorted,
  };
}

function durationSeconds(result: TaskResult): number {
  return Math.max(0, result.finishedAt - result.startedAt) / 1000;
}

function averageByKind(results: readonly TaskResult[], tasks: readonly Task[]): Partial<Record<TaskKind, number>> {
  const kindById = new Map(tasks.map(task => [task.id, task.kind]));
  const buckets = new Map<TaskKind, number[]>();

  for (const result of results) {
    const kind = kindById.get(result.taskId);
    if (!kind) continue;
    const bucket = buckets.get(kind) ?? [];
    bucket.push(durationSeconds(result));
    buckets.set(kind, bucket);
  }

  const averages: Partial<Record<TaskKind, number>> = {};
  for (const [kind, durations] of buckets) {
    averages[kind] = mean(durations);
  }
  return averages;
}

function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
