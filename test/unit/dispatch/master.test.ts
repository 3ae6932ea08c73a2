import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../../src/core/errors.js';
import { createSilentLogger } from '../../../src/core/logger.js';
import type { Strategy } from '../../../src/core/types.js';
import { configure } from '../../../src/dispatch/master.js';
import { createTask } from '../../../src/tasks/task.js';
import { uniformWorkload } from '../../../src/tasks/workload.js';

const logger = createSilentLogger();

describe('configure', () => {
  const tasks = uniformWorkload(2, 'cpu');

  it('should reject an unknown strategy', () => {
    const strategy: Strategy = JSON.parse('"gpu"');
    expect(() => configure(strategy, 1, tasks, { logger }))
      .toThrow('Unknown strategy "gpu", expected one of single, threaded, multiprocess');
  });

  it('should reject a worker count below one or fractional', () => {
    expect(() => configure('threaded', 0, tasks, { logger })).toThrow(ConfigError);
    expect(() => configure('threaded', 1.5, tasks, { logger })).toThrow('Worker count must be an integer >= 1, got 1.5');
  });

  it('should reject duplicate task ids', () => {
    const duplicated = [createTask(1, 'io', 1), createTask(1, 'cpu', 1)];
    expect(() => configure('single', 1, duplicated, { logger })).toThrow('Task id 1 is submitted more than once');
  });

  it('should reject a non-positive timeout or sample interval', () => {
    expect(() => configure('single', 1, tasks, { logger, timeoutMs: 0 })).toThrow('Run timeout must be positive, got 0');
    expect(() => configure('single', 1, tasks, { logger, sampleIntervalMs: -5 })).toThrow(ConfigError);
  });

  it('should pin the sequential strategy to one worker', () => {
    const master = configure('single', 4, tasks, { logger });
    expect(master.workerCount).toBe(1);
    expect(master.strategy).toBe('single');
    expect(master.runId).toHaveLength(10);
  });
});

describe('DispatchMaster (sequential)', () => {
  it('should run every task and report one result each', async () => {
    const summary = await configure('single', 1, uniformWorkload(5, 'cpu', 0.1), { logger }).run();

    expect(summary.model).toBe('single');
    expect(summary.workerCount).toBe(1);
    expect(summary.taskCount).toBe(5);
    expect(summary.successCount).toBe(5);
    expect(summary.failureCount).toBe(0);
    expect(summary.results.map(r => r.taskId)).toEqual([1, 2, 3, 4, 5]);
    expect(summary.results.every(r => r.workerId === 1)).toBe(true);
    expect(summary.elapsedSeconds).toBeGreaterThan(0);
    expect(summary.throughput).toBeCloseTo(5 / summary.elapsedSeconds, 10);
    expect(summary.samples.length).toBeGreaterThanOrEqual(2);
    expect(summary.truncated).toBe(false);
  });

  it('should execute tasks in submission order', async () => {
    const summary = await configure('single', 1, uniformWorkload(4, 'io', 0.2), { logger }).run();

    for (let i = 1; i < summary.results.length; i++) {
      expect(summary.results[i].startedAt).toBeGreaterThanOrEqual(summary.results[i - 1].finishedAt);
    }
  });

  it('should return an empty summary for no tasks', async () => {
    const summary = await configure('threaded', 2, [], { logger }).run();

    expect(summary.taskCount).toBe(0);
    expect(summary.results).toEqual([]);
    expect(summary.samples).toEqual([]);
    expect(summary.elapsedSeconds).toBe(0);
    expect(summary.throughput).toBe(0);
  });

  it('should return an empty summary for no tasks under the sequential strategy', async () => {
    const summary = await configure('single', 1, [], { logger }).run();

    expect(summary.taskCount).toBe(0);
    expect(summary.elapsedSeconds).toBe(0);
    expect(summary.truncated).toBe(false);
  });

  it('should refuse to run twice', async () => {
    const master = configure('single', 1, uniformWorkload(1, 'cpu', 0.1), { logger });
    await master.run();

    await expect(master.run()).rejects.toThrow(ConfigError);
  });

  it('should isolate an injected error to its task', async () => {
    const tasks = [createTask(1, 'cpu', 0.1), createTask(2, 'cpu', 0.1, 'error'), createTask(3, 'io', 0.1)];
    const summary = await configure('single', 1, tasks, { logger }).run();

    expect(summary.successCount).toBe(2);
    expect(summary.failuresByReason).toEqual({ exception: 1, timeout: 0, worker_crash: 0 });
    expect(summary.results[1]).toMatchObject({
      taskId: 2,
      status: 'failure',
      error: { reason: 'exception', message: 'Injected failure in task 2' },
    });
  });

  it('should survive an in-process crash and keep going', async () => {
    const tasks = [createTask(1, 'cpu', 0.1, 'crash'), createTask(2, 'cpu', 0.1)];
    const summary = await configure('single', 1, tasks, { logger }).run();

    expect(summary.results[0]).toMatchObject({
      status: 'failure',
      error: { reason: 'worker_crash', message: 'Task 1 crashed the in-process worker' },
    });
    expect(summary.results[1].status).toBe('success');
  });

  it('should truncate at the deadline and account for every task', async () => {
    const tasks = uniformWorkload(5, 'io', 10);
    const summary = await configure('single', 1, tasks, { logger, timeoutMs: 150 }).run();

    expect(summary.truncated).toBe(true);
    expect(summary.results).toHaveLength(5);
    expect(summary.results[0].status).toBe('success');
    expect(summary.results[4]).toMatchObject({
      status: 'failure',
      workerId: null,
      error: { reason: 'timeout', message: 'Run deadline reached before the task was dispatched' },
    });
    expect(summary.unresolvedTaskIds).toContain(5);
    expect(summary.successCount + summary.failuresByReason.timeout).toBe(5);
    expect(summary.elapsedSeconds).toBeLessThan(0.5);
  });

  it('should let shutdown be called repeatedly', async () => {
    const master = configure('single', 1, uniformWorkload(2, 'cpu', 0.1), { logger });
    await master.run();

    await expect(master.shutdown()).resolves.toBeUndefined();
    await expect(master.shutdown()).resolves.toBeUndefined();
  });
});
