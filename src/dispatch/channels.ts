/**
 * Worker channels: spawn a thread or a child process running the remote
 * worker entry point and expose both behind one small interface.
 *
 * Threads exchange messages by structured clone over their parent port;
 * child processes serialize to JSON over the IPC channel.
 */

import { fork } from 'node:child_process';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { Worker } from 'node:worker_threads';
import type { LogLevel } from '../core/logger.js';
import { BOOT_ENV, type MasterMessage, type WorkerBoot } from '../worker/protocol.js';

export type ChannelKind = 'thread' | 'process';

export interface WorkerChannel {
  readonly kind: ChannelKind;
  send(message: MasterMessage): void;
  onMessage(listener: (raw: unknown) => void): void;
  onExit(listener: (code: number | null, signal: string | null) => void): void;
  onError(listener: (error: Error) => void): void;
  kill(): Promise<void>;
}

export interface SpawnOptions {
  workerId: number;
  logLevel: LogLevel;
  script?: string | URL;
}

export type ChannelFactory = (options: SpawnOptions) => WorkerChannel;

const RUNNING_FROM_SOURCE = import.meta.url.endsWith('.ts');

export function defaultWorkerScript(kind: ChannelKind): URL {
  const ext = RUNNING_FROM_SOURCE ? '.ts' : '.js';
  return new URL(`../worker/${kind}-entry${ext}`, import.meta.url);
}

/** Plain-JS thread entry that imports a TypeScript entry through tsx */
export const THREAD_BOOTSTRAP = new URL('../worker/thread-bootstrap.mjs', import.meta.url);

function isTypeScript(script: string | URL): boolean {
  return String(script).endsWith('.ts');
}

/**
 * Child processes load TypeScript entry points through tsx.
 */
function loaderArgs(script: string | URL): string[] {
  return isTypeScript(script) ? ['--import', 'tsx'] : [];
}

function toPath(script: string | URL): string {
  return script instanceof URL ? fileURLToPath(script) : script;
}

function toURL(script: string | URL): URL {
  return script instanceof URL ? script : pathToFileURL(script);
}

export function spawnThread(options: SpawnOptions): WorkerChannel {
  const script = options.script ?? defaultWorkerScript('thread');
  const fromSource = isTypeScript(script);
  const boot: WorkerBoot = {
    workerId: options.workerId,
    logLevel: options.logLevel,
    entry: fromSource ? toURL(script).href : undefined,
  };
  const worker = new Worker(fromSource ? THREAD_BOOTSTRAP : script, { workerData: boot });

  return {
    kind: 'thread',
    send: (message) => worker.postMessage(message),
    onMessage: (listener) => {
      worker.on('message', listener);
    },
    onExit: (listener) => {
      worker.on('exit', (code: number) => listener(code, null));
    },
    onError: (listener) => {
      worker.on('error', listener);
    },
    kill: async () => {
      await worker.terminate();
    },
  };
}

export function spawnProcess(options: SpawnOptions): WorkerChannel {
  const script = options.script ?? defaultWorkerScript('process');
  const child = fork(toPath(script), [], {
    stdio: ['ignore', 'inherit', 'inherit', 'ipc'],
    serialization: 'json',
    execArgv: loaderArgs(script),
    env: {
      ...process.env,
      [BOOT_ENV.workerId]: String(options.workerId),
      [BOOT_ENV.logLevel]: options.logLevel,
    },
  });

  return {
    kind: 'process',
    send: (message) => {
      child.send(message);
    },
    onMessage: (listener) => {
      child.on('message', listener);
    },
    onExit: (listener) => {
      child.on('exit', listener);
    },
    onError: (listener) => {
      child.on('error', listener);
    },
    kill: async () => {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill('SIGTERM');
      }
    },
  };
}

export const CHANNEL_FACTORIES: Record<ChannelKind, ChannelFactory> = {
  thread: spawnThread,
  process: spawnProcess,
};
