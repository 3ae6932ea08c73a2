import { describe, it, expect } from 'vitest';
import {
  ChannelError,
  ConfigError,
  DispatchError,
  TimeoutExceededError,
  WorkerCrashError,
  toError,
} from '../../../src/core/errors.js';

describe('errors', () => {
  it('should carry a code and stage on every subclass', () => {
    const error = new ConfigError('bad workers');

    expect(error).toBeInstanceOf(DispatchError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe('CONFIG_ERROR');
    expect(error.stage).toBe('config');
    expect(error.name).toBe('ConfigError');
  });

  it('should describe the exceeded deadline', () => {
    const error = new TimeoutExceededError(250);

    expect(error.message).toBe('Run deadline of 250ms exceeded');
    expect(error.timeoutMs).toBe(250);
    expect(error.code).toBe('TIMEOUT_EXCEEDED');
  });

  it('should keep the worker id and exit code of a crash', () => {
    const error = new WorkerCrashError('gone', 3, 70);

    expect(error.workerId).toBe(3);
    expect(error.exitCode).toBe(70);
  });

  it('should keep the cause of a channel error', () => {
    const cause = new Error('parse');
    expect(new ChannelError('bad message', cause).cause).toBe(cause);
  });

  it('should normalize thrown values', () => {
    const error = new Error('x');
    expect(toError(error)).toBe(error);
    expect(toError('plain').message).toBe('plain');
    expect(toError(42).message).toBe('42');
  });
});
