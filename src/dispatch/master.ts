/**
 * Master: owns the task and result queues for one run, drives the selected
 * backend to completion and folds everything into a RunSummary.
 *
 * The dispatch shape is identical for every strategy: enqueue all tasks,
 * close the task queue, let workers drain it, pop results until every
 * submitted task is accounted for.
 */

import { performance } from 'node:perf_hooks';
import { nanoid } from 'nanoid';
import { aggregate, type RunMeta, type RunSummary } from '../aggregator/aggregate.js';
import { withTimeout } from '../core/deadline.js';
import { ConfigError, TimeoutExceededError, toError } from '../core/errors.js';
import { createLogger, type Logger, type LogLevel } from '../core/logger.js';
import { BlockingQueue, QUEUE_CLOSED } from '../core/queue.js';
import { LogLevelSchema, STRATEGIES, type Strategy } from '../core/types.js';
import { PerformanceMonitor, type ResourceSample } from '../monitor/performance-monitor.js';
import { findDuplicateId } from '../tasks/task.js';
import type { Task, TaskResult } from '../tasks/types.js';
import { failureResult, now } from '../worker/worker.js';
import { CHANNEL_FACTORIES } from './channels.js';
import { InProcessBackend } from './in-process.js';
import { WorkerPool } from './pool.js';
import type { Master, MasterOptions, WorkerBackend } from './types.js';

type MasterState = 'configured' | 'running' | 'finished';

/**
 * Validate a run and build the Master for the chosen strategy.
 */
export function configure(
  strategy: Strategy,
  workerCount: number,
  tasks: readonly Task[],
  options: MasterOptions = {},
): Master {
  if (!STRATEGIES.includes(strategy)) {
    throw new ConfigError(`Unknown strategy "${strategy}", expected one of ${STRATEGIES.join(', ')}`);
  }
  if (!Number.isInteger(workerCount) || workerCount < 1) {
    throw new ConfigError(`Worker count must be an integer >= 1, got ${workerCount}`);
  }
  const duplicate = findDuplicateId(tasks);
  if (duplicate !== null) {
    throw new ConfigError(`Task id ${duplicate} is submitted more than once`);
  }
  if (options.timeoutMs !== undefined && !(options.timeoutMs > 0)) {
    throw new ConfigError(`Run timeout must be positive, got ${options.timeoutMs}`);
  }
  if (options.sampleIntervalMs !== undefined && !(options.sampleIntervalMs > 0)) {
    throw new ConfigError(`Sample interval must be positive, got ${options.sampleIntervalMs}`);
  }

  return new DispatchMaster(strategy, workerCount, [...tasks], options);
}

class DispatchMaster implements Master {
  readonly runId = nanoid(10);
  readonly strategy: Strategy;
  readonly workerCount: number;

  private readonly tasks: readonly Task[];
  private readonly taskIds: ReadonlySet<number>;
  private readonly options: MasterOptions;
  private readonly logger: Logger;
  private state: MasterState = 'configured';
  private backend: WorkerBackend | null = null;
  private stopping: Promise<void> | null = null;

  constructor(strategy: Strategy, workerCount: number, tasks: readonly Task[], options: MasterOptions) {
    this.strategy = strategy;
    this.tasks = tasks;
    this.taskIds = new Set(tasks.map(task => task.id));
    this.options = options;

    const base = options.logger ?? createLogger({ name: 'master', level: options.logLevel ?? 'info' });
    this.logger = base.child({ runId: this.runId, model: strategy });

    if (strategy === 'single' && workerCount !== 1) {
      this.logger.warn({ requested: workerCount }, 'Sequential strategy always uses one worker');
    }
    this.workerCount = strategy === 'single' ? 1 : workerCount;
  }

  async run(): Promise<RunSummary> {
    if (this.state !== 'configured') {
      throw new ConfigError(`Master ${this.runId} has already run`);
    }
    this.state = 'running';

    const taskCount = this.tasks.length;
    if (taskCount === 0) {
      this.logger.info('No tasks submitted');
      this.state = 'finished';
      return aggregate([], [], 0, this.meta(false));
    }

    const taskQueue = new BlockingQueue<Task>();
    const resultQueue = new BlockingQueue<TaskResult>();
    const collected = new Map<number, TaskResult>();
    const monitor = new PerformanceMonitor({
      intervalMs: this.options.sampleIntervalMs,
      logger: this.logger,
    });

    for (const task of this.tasks) {
      taskQueue.push(task);
    }
    // End of input: each worker exits once the queue is drained
    taskQueue.close();

    this.logger.info({ tasks: taskCount, workers: this.workerCount }, 'Dispatching tasks');

    let truncated = false;
    let elapsedSeconds = 0;
    let samples: ResourceSample[] = [];

    monitor.start();
    const startedAt = performance.now();
    try {
      const backend = this.createBackend();
      this.backend = backend;

      const finished = backend.start(taskQueue, resultQueue).then(
        () => null,
        (error: unknown) => toError(error),
      ).finally(() => resultQueue.close());

      const drained = this.drain(resultQueue, collected);
      if (this.options.timeoutMs === undefined) {
        await drained;
      } else {
        const outcome = await withTimeout(drained, this.options.timeoutMs);
        truncated = !outcome.done;
      }
      // Measured up to result collection; worker shutdown is not part of the run
      elapsedSeconds = (performance.now() - startedAt) / 1000;

      if (truncated) {
        this.logger.warn(
          { resolved: collected.size, tasks: taskCount },
          new TimeoutExceededError(this.options.timeoutMs ?? 0).message,
        );
        // Stop issuing tasks, then collect whatever the workers already produced
        taskQueue.drain();
        await this.shutdown();
        for (const result of resultQueue.drain()) {
          this.accept(collected, result);
        }
      }

      const failure = await finished;
      if (failure) {
        throw failure;
      }
    } finally {
      samples = monitor.stop();
      await this.shutdown();
      this.state = 'finished';
    }

    this.resolveMissing(collected, truncated);

    const summary = aggregate([...collected.values()], samples, elapsedSeconds, this.meta(truncated));
    this.logger.info(
      {
        elapsedSeconds: +summary.elapsedSeconds.toFixed(3),
        throughput: +summary.throughput.toFixed(3),
        success: summary.successCount,
        failure: summary.failureCount,
        truncated: summary.truncated,
        peakMemoryMb: summary.peakMemoryMb,
      },
      'Run complete',
    );
    return summary;
  }

  async shutdown(): Promise<void> {
    if (!this.backend) return;
    if (!this.stopping) {
      this.stopping = this.backend.stop();
    }
    await this.stopping;
  }

  private createBackend(): WorkerBackend {
    if (this.strategy === 'single') {
      return new InProcessBackend(this.logger);
    }

    return new WorkerPool({
      strategy: this.strategy,
      workerCount: this.workerCount,
      spawn: CHANNEL_FACTORIES[this.strategy === 'threaded' ? 'thread' : 'process'],
      logger: this.logger,
      logLevel: this.remoteLogLevel(),
      script: this.options.workerScript,
      stopGraceMs: this.options.stopGraceMs,
    });
  }

  private async drain(results: BlockingQueue<TaskResult>, collected: Map<number, TaskResult>): Promise<void> {
    while (collected.size < this.tasks.length) {
      const result = await results.pop();
      if (result === QUEUE_CLOSED) return;
      this.accept(collected, result);
    }
  }

  private accept(collected: Map<number, TaskResult>, result: TaskResult): void {
    if (!this.taskIds.has(result.taskId)) {
      this.logger.warn({ taskId: result.taskId }, 'Ignoring result for unknown task');
      return;
    }
    if (collected.has(result.taskId)) {
      this.logger.warn({ taskId: result.taskId }, 'Ignoring duplicate result');
      return;
    }
    collected.set(result.taskId, result);
  }

  /**
   * Every submitted task gets exactly one result: tasks never dispatched
   * before the deadline become timeouts, anything else lost is a crash.
   */
  private resolveMissing(collected: Map<number, TaskResult>, truncated: boolean): void {
    const at = now();
    for (const task of this.tasks) {
      if (collected.has(task.id)) continue;
      collected.set(task.id, truncated
        ? failureResult(task.id, null, 'timeout', 'Run deadline reached before the task was dispatched', at)
        : failureResult(task.id, null, 'worker_crash', 'No result was received for the task', at));
    }
  }

  private remoteLogLevel(): LogLevel {
    if (this.options.logLevel) return this.options.logLevel;
    const parsed = LogLevelSchema.safeParse(this.logger.level);
    return parsed.success ? parsed.data : 'info';
  }

  private meta(truncated: boolean): RunMeta {
    return {
      runId: this.runId,
      model: this.strategy,
      workerCount: this.workerCount,
      tasks: this.tasks,
      truncated,
    };
  }
}
