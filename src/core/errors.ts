export class DispatchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly stage?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'DispatchError';
  }
}

export class ConfigError extends DispatchError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', 'config', cause);
    this.name = 'ConfigError';
  }
}

export class TaskExecutionError extends DispatchError {
  constructor(message: string, public readonly taskId: number, cause?: Error) {
    super(message, 'TASK_EXECUTION_ERROR', 'execute', cause);
    this.name = 'TaskExecutionError';
  }
}

export class WorkerCrashError extends DispatchError {
  constructor(
    message: string,
    public readonly workerId: number,
    public readonly exitCode: number | null = null,
  ) {
    super(message, 'WORKER_CRASH', 'execute');
    this.name = 'WorkerCrashError';
  }
}

export class TimeoutExceededError extends DispatchError {
  constructor(public readonly timeoutMs: number) {
    super(`Run deadline of ${timeoutMs}ms exceeded`, 'TIMEOUT_EXCEEDED', 'dispatch');
    this.name = 'TimeoutExceededError';
  }
}

export class ChannelError extends DispatchError {
  constructor(message: string, cause?: Error) {
    super(message, 'CHANNEL_ERROR', 'dispatch', cause);
    this.name = 'ChannelError';
  }
}

export class MonitorStateError extends DispatchError {
  constructor(message: string) {
    super(message, 'MONITOR_STATE_ERROR', 'monitor');
    this.name = 'MonitorStateError';
  }
}

/**
 * Normalize anything thrown into an Error instance.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
