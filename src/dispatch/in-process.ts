/**
 * Sequential strategy: one worker on the master's own event loop.
 */

import { setImmediate as yieldToEventLoop } from 'node:timers/promises';
import { WorkerCrashError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { QUEUE_CLOSED, type BlockingQueue } from '../core/queue.js';
import type { Task, TaskResult } from '../tasks/types.js';
import { executeTask, failureResult, now, type ExecutionContext } from '../worker/worker.js';
import type { WorkerBackend } from './types.js';

const WORKER_ID = 1;

export class InProcessBackend implements WorkerBackend {
  readonly strategy = 'single' as const;
  readonly workerCount = 1;

  private stopping = false;
  private finished: Promise<void> | null = null;
  private signalStop: () => void = () => {};
  private readonly stopped: Promise<void>;
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ workerId: WORKER_ID });
    this.stopped = new Promise<void>((resolve) => {
      this.signalStop = resolve;
    });
  }

  start(tasks: BlockingQueue<Task>, results: BlockingQueue<TaskResult>): Promise<void> {
    if (!this.finished) {
      this.finished = this.loop(tasks, results);
    }
    return this.finished;
  }

  async stop(): Promise<void> {
    this.stopping = true;
    this.signalStop();
    await this.finished;
  }

  private async loop(tasks: BlockingQueue<Task>, results: BlockingQueue<TaskResult>): Promise<void> {
    const context: ExecutionContext = {
      workerId: WORKER_ID,
      logger: this.logger,
      crash: (task) => {
        throw new WorkerCrashError(`Task ${task.id} crashed the in-process worker`, WORKER_ID);
      },
    };

    this.logger.debug('In-process worker started');
    while (!this.stopping) {
      const task = await tasks.pop();
      if (task === QUEUE_CLOSED) break;

      const startedAt = now();
      // An abandoned payload keeps running in the background but its result is ignored
      const result = await Promise.race([
        executeTask(task, context),
        this.stopped.then(() =>
          failureResult(task.id, WORKER_ID, 'timeout', 'Run deadline reached while the task was executing', startedAt, now()),
        ),
      ]);
      results.push(result);

      // Let timers (monitor, deadline) fire between back-to-back cpu tasks
      await yieldToEventLoop();
    }
    this.logger.debug('In-process worker stopped');
  }
}
