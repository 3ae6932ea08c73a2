/**
 * RemoteWorker: master-side handle for one thread or child process.
 *
 * Executes one task at a time over its channel. If the execution context
 * exits while a task is in flight, that task resolves as a `worker_crash`
 * failure (or `timeout` when the master is terminating it), so the master
 * never waits on a dead worker.
 */

import { withTimeout } from '../core/deadline.js';
import { ChannelError, toError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import type { Task, TaskResult } from '../tasks/types.js';
import { parseWorkerMessage, type WorkerMessage } from '../worker/protocol.js';
import { failureResult, now } from '../worker/worker.js';
import type { WorkerChannel } from './channels.js';

interface InFlight {
  task: Task;
  startedAt: number;
  resolve: (result: TaskResult) => void;
}

export interface ExitInfo {
  code: number | null;
  signal: string | null;
}

export class RemoteWorker {
  readonly workerId: number;
  private readonly channel: WorkerChannel;
  private readonly logger: Logger;
  private readonly ready: Promise<void>;
  private readonly exited: Promise<ExitInfo>;
  private markReady: () => void = () => {};
  private inFlight: InFlight | null = null;
  private booted = false;
  private alive = true;
  private terminating = false;
  private failure: ChannelError | null = null;

  constructor(workerId: number, channel: WorkerChannel, logger: Logger) {
    this.workerId = workerId;
    this.channel = channel;
    this.logger = logger;

    this.ready = new Promise<void>((resolve) => {
      this.markReady = resolve;
    });
    this.exited = new Promise<ExitInfo>((resolve) => {
      channel.onExit((code, signal) => {
        this.handleExit(code, signal);
        resolve({ code, signal });
      });
    });

    channel.onMessage((raw) => this.handleMessage(raw));
    channel.onError((error) => {
      this.logger.error({ err: error.message }, 'Worker channel error');
    });
  }

  get isAlive(): boolean {
    return this.alive;
  }

  /** Unrecoverable protocol failure seen on this channel, if any */
  get channelFailure(): ChannelError | null {
    return this.failure;
  }

  async execute(task: Task): Promise<TaskResult> {
    await this.ready;

    const startedAt = now();
    if (!this.alive) {
      return failureResult(task.id, this.workerId, this.deathReason(), `Worker ${this.workerId} exited before accepting task ${task.id}`, startedAt);
    }

    return new Promise<TaskResult>((resolve) => {
      this.inFlight = { task, startedAt, resolve };
      try {
        this.channel.send({ type: 'execute', task: { ...task } });
      } catch (error) {
        this.inFlight = null;
        resolve(failureResult(task.id, this.workerId, this.deathReason(), `Failed to send task: ${toError(error).message}`, startedAt, now()));
      }
    });
  }

  /**
   * Ask the worker to exit, killing it if it has not gone within `graceMs`.
   */
  async stop(graceMs: number): Promise<ExitInfo> {
    if (this.alive && graceMs > 0) {
      try {
        this.channel.send({ type: 'stop' });
      } catch (error) {
        this.logger.debug({ err: toError(error).message }, 'Stop message not delivered');
      }
      const outcome = await withTimeout(this.exited, graceMs);
      if (outcome.done) return outcome.value;
      this.logger.warn({ graceMs }, 'Worker did not exit in time, killing');
    }
    return this.terminate();
  }

  /**
   * Kill the execution context. An in-flight task resolves as a timeout.
   */
  async terminate(): Promise<ExitInfo> {
    this.terminating = true;
    if (this.alive) {
      await this.channel.kill();
    }
    return this.exited;
  }

  private handleMessage(raw: unknown): void {
    let message: WorkerMessage;
    try {
      message = parseWorkerMessage(raw);
    } catch (error) {
      this.fail(error instanceof ChannelError ? error : new ChannelError(toError(error).message));
      return;
    }

    switch (message.type) {
      case 'ready':
        this.logger.debug({ pid: message.pid, channel: this.channel.kind }, 'Worker ready');
        this.booted = true;
        this.markReady();
        break;

      case 'result': {
        const pending = this.inFlight;
        if (!pending || pending.task.id !== message.result.taskId) {
          this.fail(new ChannelError(`Worker ${this.workerId} returned an unexpected result for task ${message.result.taskId}`));
          return;
        }
        this.inFlight = null;
        pending.resolve(message.result);
        break;
      }
    }
  }

  private handleExit(code: number | null, signal: string | null): void {
    this.alive = false;
    this.markReady();

    // A context that never booted will not boot on respawn either
    if (!this.booted && !this.terminating && !this.failure) {
      const detail = signal ? `signal ${signal}` : `code ${code}`;
      this.failure = new ChannelError(`Worker ${this.workerId} exited with ${detail} before it was ready`);
      this.logger.error({ code, signal }, 'Worker exited during startup');
    }

    const pending = this.inFlight;
    if (pending) {
      this.inFlight = null;
      const reason = this.deathReason();
      const detail = signal ? `signal ${signal}` : `code ${code}`;
      if (reason === 'worker_crash') {
        this.logger.error({ taskId: pending.task.id, code, signal }, 'Worker crashed mid-task');
      }
      pending.resolve(failureResult(
        pending.task.id,
        this.workerId,
        reason,
        reason === 'timeout'
          ? `Worker ${this.workerId} terminated at the run deadline`
          : `Worker ${this.workerId} exited with ${detail} while running task ${pending.task.id}`,
        pending.startedAt,
        now(),
      ));
    } else {
      this.logger.debug({ code, signal }, 'Worker exited');
    }
  }

  private fail(error: ChannelError): void {
    this.logger.error({ err: error.message }, 'Protocol violation, terminating worker');
    if (!this.failure) this.failure = error;
    this.terminate().catch((err: unknown) => {
      this.logger.error({ err: toError(err).message }, 'Failed to terminate worker');
    });
  }

  private deathReason(): 'timeout' | 'worker_crash' {
    return this.terminating ? 'timeout' : 'worker_crash';
  }
}
