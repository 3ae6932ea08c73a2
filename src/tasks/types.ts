export type TaskKind = 'io' | 'cpu' | 'mixed';

export const TASK_KINDS: readonly TaskKind[] = ['io', 'cpu', 'mixed'];

/**
 * Fault injection tag.
 * - 'error': the payload throws
 * - 'crash': the hosting execution context dies abruptly
 */
export type TaskFault = 'error' | 'crash';

export interface Task {
  readonly id: number;
  readonly kind: TaskKind;
  /** Scales the simulated wait and compute load */
  readonly intensity: number;
  readonly fault?: TaskFault;
}

export type IntensityLevel = 'low' | 'medium' | 'high';

export const INTENSITY: Record<IntensityLevel, number> = {
  low: 1,
  medium: 4,
  high: 10,
};

export interface PayloadOutput {
  iterations: number;
  checksum: number;
  waitedMs: number;
}

export type FailureReason = 'exception' | 'timeout' | 'worker_crash';

export interface TaskError {
  reason: FailureReason;
  message: string;
}

interface TaskResultBase {
  taskId: number;
  /** null only when the task never reached a worker */
  workerId: number | null;
  /** Epoch milliseconds, sub-millisecond precision */
  startedAt: number;
  finishedAt: number;
}

export interface TaskSuccess extends TaskResultBase {
  status: 'success';
  output: PayloadOutput;
}

export interface TaskFailure extends TaskResultBase {
  status: 'failure';
  error: TaskError;
}

export type TaskResult = TaskSuccess | TaskFailure;
