import { describe, it, expect, vi } from 'vitest';
import { WorkerCrashError } from '../../../src/core/errors.js';
import { createSilentLogger } from '../../../src/core/logger.js';
import { createTask } from '../../../src/tasks/task.js';
import { executeTask, failureResult, type ExecutionContext } from '../../../src/worker/worker.js';

function context(overrides: Partial<ExecutionContext> = {}): ExecutionContext {
  return {
    workerId: 3,
    logger: createSilentLogger(),
    crash: vi.fn(),
    ...overrides,
  };
}

describe('executeTask', () => {
  it('should return a success result with the payload output', async () => {
    const result = await executeTask(createTask(1, 'cpu', 0.1), context());

    expect(result.status).toBe('success');
    expect(result.taskId).toBe(1);
    expect(result.workerId).toBe(3);
    expect(result.finishedAt).toBeGreaterThanOrEqual(result.startedAt);
    if (result.status === 'success') {
      expect(result.output.iterations).toBe(2000);
    }
  });

  it('should turn an injected error into an exception failure', async () => {
    const result = await executeTask(createTask(5, 'cpu', 0.1, 'error'), context());

    expect(result).toMatchObject({
      taskId: 5,
      status: 'failure',
      workerId: 3,
      error: { reason: 'exception', message: 'Injected failure in task 5' },
    });
  });

  it('should hand a crash fault to the hosting context', async () => {
    const task = createTask(2, 'io', 0.1, 'crash');
    const crash = vi.fn();

    await executeTask(task, context({ crash }));

    expect(crash).toHaveBeenCalledWith(task);
  });

  it('should report a worker_crash when the context throws a crash error', async () => {
    const result = await executeTask(createTask(2, 'io', 0.1, 'crash'), context({
      crash: () => {
        throw new WorkerCrashError('in-process crash', 3);
      },
    }));

    expect(result.status).toBe('failure');
    if (result.status === 'failure') {
      expect(result.error).toEqual({ reason: 'worker_crash', message: 'in-process crash' });
    }
  });
});

describe('failureResult', () => {
  it('should default finishedAt to startedAt', () => {
    expect(failureResult(4, null, 'timeout', 'late', 1000)).toEqual({
      taskId: 4,
      status: 'failure',
      workerId: null,
      startedAt: 1000,
      finishedAt: 1000,
      error: { reason: 'timeout', message: 'late' },
    });
  });
});
