/**
 * In-process stand-in for a thread or child process worker.
 * Speaks the master/worker protocol over an EventEmitter.
 */

import { EventEmitter } from 'node:events';
import type { ChannelFactory, ChannelKind, WorkerChannel } from '../../src/dispatch/channels.js';
import type { TaskResult } from '../../src/tasks/types.js';
import type { MasterMessage } from '../../src/worker/protocol.js';
import { failureResult } from '../../src/worker/worker.js';

/**
 * - normal: answer every execute, honouring the task's fault
 * - hang: accept tasks but never answer
 * - garbage: answer with a malformed result
 * - stillborn: exit with code 1 before announcing ready
 */
export type FakeMode = 'normal' | 'hang' | 'garbage' | 'stillborn';

export class FakeChannel implements WorkerChannel {
  readonly kind: ChannelKind = 'thread';
  readonly sent: MasterMessage[] = [];
  private readonly events = new EventEmitter();
  private alive = true;

  constructor(readonly workerId: number, private readonly mode: FakeMode = 'normal') {
    setImmediate(() => {
      if (mode === 'stillborn') {
        this.exit(1, null);
      } else {
        this.emitMessage({ type: 'ready', workerId, pid: 1000 + workerId });
      }
    });
  }

  get isAlive(): boolean {
    return this.alive;
  }

  send(message: MasterMessage): void {
    if (!this.alive) {
      throw new Error('Channel closed');
    }
    this.sent.push(message);

    if (message.type === 'stop') {
      setImmediate(() => this.exit(0, null));
      return;
    }

    const { task } = message;
    setImmediate(() => {
      if (this.mode === 'hang') return;
      if (this.mode === 'garbage') {
        this.emitMessage({ type: 'result', result: { taskId: 'not-a-number' } });
        return;
      }
      if (task.fault === 'crash') {
        this.exit(70, null);
        return;
      }

      const result: TaskResult = task.fault === 'error'
        ? failureResult(task.id, this.workerId, 'exception', `Injected failure in task ${task.id}`, 1000, 1001)
        : {
            taskId: task.id,
            status: 'success',
            workerId: this.workerId,
            startedAt: 1000,
            finishedAt: 1001,
            output: { iterations: 0, checksum: 0, waitedMs: 0 },
          };
      this.emitMessage({ type: 'result', result });
    });
  }

  onMessage(listener: (raw: unknown) => void): void {
    this.events.on('message', listener);
  }

  onExit(listener: (code: number | null, signal: string | null) => void): void {
    this.events.on('exit', listener);
  }

  onError(listener: (error: Error) => void): void {
    this.events.on('error', listener);
  }

  async kill(): Promise<void> {
    this.exit(null, 'SIGTERM');
  }

  /** Die abruptly, as a segfaulting child would */
  crash(): void {
    this.exit(null, 'SIGSEGV');
  }

  private emitMessage(message: unknown): void {
    if (this.alive) this.events.emit('message', message);
  }

  private exit(code: number | null, signal: string | null): void {
    if (!this.alive) return;
    this.alive = false;
    this.events.emit('exit', code, signal);
  }
}

/**
 * Channel factory that records every spawned FakeChannel.
 */
export function fakeSpawner(mode: FakeMode = 'normal'): { spawn: ChannelFactory; channels: FakeChannel[] } {
  const channels: FakeChannel[] = [];
  const spawn: ChannelFactory = (options) => {
    const channel = new FakeChannel(options.workerId, mode);
    channels.push(channel);
    return channel;
  };
  return { spawn, channels };
}
