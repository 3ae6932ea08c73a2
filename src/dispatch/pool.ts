/**
 * Worker pool backend: thread-pool and process-pool strategies.
 *
 * Every worker slot runs the same loop on the master: pop a task from the
 * shared queue (or exit when it is closed), hand it to its remote execution
 * context, push the result. A slot whose context crashed is respawned under
 * the same worker id and keeps pulling tasks.
 */

import type { Logger, LogLevel } from '../core/logger.js';
import { QUEUE_CLOSED, type BlockingQueue } from '../core/queue.js';
import type { Strategy } from '../core/types.js';
import type { Task, TaskResult } from '../tasks/types.js';
import type { ChannelFactory } from './channels.js';
import { RemoteWorker } from './remote-worker.js';
import type { WorkerBackend } from './types.js';

export interface PoolOptions {
  strategy: Exclude<Strategy, 'single'>;
  workerCount: number;
  spawn: ChannelFactory;
  logger: Logger;
  logLevel: LogLevel;
  script?: string | URL;
  stopGraceMs?: number;
}

export interface PoolStats {
  totalWorkers: number;
  liveWorkers: number;
  respawns: number;
}

export class WorkerPool implements WorkerBackend {
  readonly strategy: Exclude<Strategy, 'single'>;
  readonly workerCount: number;

  private readonly options: PoolOptions;
  private readonly logger: Logger;
  private readonly stopGraceMs: number;
  private workers = new Map<number, RemoteWorker>();
  private finished: Promise<void> | null = null;
  private stopping = false;
  private respawns = 0;

  constructor(options: PoolOptions) {
    this.options = options;
    this.strategy = options.strategy;
    this.workerCount = options.workerCount;
    this.logger = options.logger;
    this.stopGraceMs = options.stopGraceMs ?? 2000;
  }

  start(tasks: BlockingQueue<Task>, results: BlockingQueue<TaskResult>): Promise<void> {
    if (!this.finished) {
      this.logger.info({ workers: this.workerCount, strategy: this.strategy }, 'Starting workers');
      const loops: Promise<void>[] = [];
      for (let workerId = 1; workerId <= this.workerCount; workerId++) {
        loops.push(this.runSlot(workerId, tasks, results));
      }
      this.finished = Promise.all(loops).then(() => {
        this.logger.info('All workers stopped');
      });
    }
    return this.finished;
  }

  async stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = true;
      this.logger.info({ live: this.workers.size }, 'Terminating workers');
      await Promise.all([...this.workers.values()].map(worker => worker.terminate()));
    }
    if (this.finished) {
      await this.finished.catch((error: unknown) => {
        this.logger.debug({ err: String(error) }, 'Worker loop ended with an error during stop');
      });
    }
  }

  getStats(): PoolStats {
    return {
      totalWorkers: this.workerCount,
      liveWorkers: [...this.workers.values()].filter(w => w.isAlive).length,
      respawns: this.respawns,
    };
  }

  private async runSlot(workerId: number, tasks: BlockingQueue<Task>, results: BlockingQueue<TaskResult>): Promise<void> {
    let worker = this.spawn(workerId);
    try {
      while (!this.stopping) {
        const task = await tasks.pop();
        if (task === QUEUE_CLOSED) break;

        const result = await worker.execute(task);
        const failure = worker.channelFailure;
        if (failure) throw failure;
        results.push(result);

        if (!worker.isAlive && !this.stopping) {
          this.respawns++;
          this.logger.warn({ workerId }, 'Respawning crashed worker');
          worker = this.spawn(workerId);
        }
      }
    } finally {
      await worker.stop(this.stopping ? 0 : this.stopGraceMs);
      this.workers.delete(workerId);
    }
  }

  private spawn(workerId: number): RemoteWorker {
    const channel = this.options.spawn({
      workerId,
      logLevel: this.options.logLevel,
      script: this.options.script,
    });
    const worker = new RemoteWorker(workerId, channel, this.logger.child({ workerId }));
    this.workers.set(workerId, worker);
    return worker;
  }
}
