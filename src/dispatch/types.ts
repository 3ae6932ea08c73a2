import type { Logger, LogLevel } from '../core/logger.js';
import type { BlockingQueue } from '../core/queue.js';
import type { Strategy } from '../core/types.js';
import type { RunSummary } from '../aggregator/aggregate.js';
import type { Task, TaskResult } from '../tasks/types.js';

export interface Master {
  readonly runId: string;
  readonly strategy: Strategy;
  readonly workerCount: number;
  /** Dispatch every task and resolve once all are accounted for or the deadline hits. */
  run(): Promise<RunSummary>;
  /** Release every worker resource. Idempotent; run() calls it on every exit path. */
  shutdown(): Promise<void>;
}

export interface MasterOptions {
  /** Overall run deadline; unresolved tasks are reported as timeouts */
  timeoutMs?: number;
  sampleIntervalMs?: number;
  logger?: Logger;
  /** Level used when no logger is given, and passed on to remote workers */
  logLevel?: LogLevel;
  /** Override the thread or process entry script */
  workerScript?: string | URL;
  /** How long a remote worker gets to exit after `stop` before it is killed */
  stopGraceMs?: number;
}

/**
 * Execution substrate behind a Master. Each strategy owns its workers;
 * the Master owns the queues.
 */
export interface WorkerBackend {
  readonly strategy: Strategy;
  readonly workerCount: number;
  /**
   * Launch workers that pop from `tasks` until it is closed and drained,
   * pushing one result per task into `results`. Resolves when every
   * worker has exited; rejects on an unrecoverable channel failure.
   */
  start(tasks: BlockingQueue<Task>, results: BlockingQueue<TaskResult>): Promise<void>;
  /**
   * Terminate every execution context. In-flight tasks resolve as
   * timeout failures. Idempotent.
   */
  stop(): Promise<void>;
}
