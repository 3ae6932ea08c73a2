/**
 * Benchmark Runner: sweeps every strategy over a grid of task counts and
 * worker counts and collects one entry per run.
 *
 * The sequential strategy runs once per task count; threaded and
 * multiprocess run once per worker count.
 */

import { availableParallelism } from 'os';
import { ConfigError } from '../core/errors.js';
import { createSilentLogger, type Logger } from '../core/logger.js';
import type { Strategy } from '../core/types.js';
import type { RunSummary } from '../aggregator/aggregate.js';
import { configure } from '../dispatch/master.js';
import { randomSeed } from '../tasks/random.js';
import { generate } from '../tasks/workload.js';
import type { BenchmarkConfig, BenchmarkEntry, BenchmarkReport, MasterFactory } from './types.js';

/**
 * 1, half the cores, the cores, twice the cores; deduplicated and sorted.
 */
export function defaultWorkerCounts(cpuCount: number = availableParallelism()): number[] {
  const counts = [1, Math.max(1, Math.floor(cpuCount / 2)), cpuCount, cpuCount * 2];
  return [...new Set(counts)].sort((a, b) => a - b);
}

export class BenchmarkRunner {
  private config: BenchmarkConfig;
  private factory: MasterFactory;
  private logger: Logger;

  constructor(config: BenchmarkConfig, factory: MasterFactory = configure) {
    if (config.taskCounts.length === 0) {
      throw new ConfigError('Benchmark needs at least one task count');
    }
    this.config = config;
    this.factory = factory;
    this.logger = config.logger ?? createSilentLogger();
  }

  get workerCounts(): number[] {
    return this.config.workerCounts ?? defaultWorkerCounts();
  }

  /** Number of runs the sweep will perform */
  get runCount(): number {
    return this.config.taskCounts.length * (1 + 2 * this.workerCounts.length);
  }

  async run(): Promise<BenchmarkReport> {
    const seed = this.config.seed ?? randomSeed();
    const workerCounts = this.workerCounts;
    const entries: BenchmarkEntry[] = [];

    for (const taskCount of this.config.taskCounts) {
      const tasks = generate(taskCount, this.config.mix, seed);
      this.logger.info({ taskCount, seed }, 'Running benchmarks');

      entries.push(await this.runOne('single', 1, tasks));
      for (const workerCount of workerCounts) {
        entries.push(await this.runOne('threaded', workerCount, tasks));
        entries.push(await this.runOne('multiprocess', workerCount, tasks));
      }
    }

    return {
      timestamp: new Date().toISOString(),
      seed,
      cpuCount: availableParallelism(),
      taskCounts: [...this.config.taskCounts],
      workerCounts,
      entries,
    };
  }

  private async runOne(model: Strategy, workerCount: number, tasks: ReturnType<typeof generate>): Promise<BenchmarkEntry> {
    this.logger.info({ model, workerCount, taskCount: tasks.length }, 'Running benchmark');
    const master = this.factory(model, workerCount, tasks, {
      logger: this.logger,
      timeoutMs: this.config.timeoutMs,
      sampleIntervalMs: this.config.sampleIntervalMs,
    });
    const summary = await master.run();
    return toEntry(summary);
  }
}

export function toEntry(summary: RunSummary): BenchmarkEntry {
  return {
    model: summary.model,
    workerCount: summary.workerCount,
    taskCount: summary.taskCount,
    elapsedSeconds: summary.elapsedSeconds,
    throughput: summary.throughput,
    avgTaskSeconds: summary.avgTaskSeconds,
    peakMemoryMb: summary.peakMemoryMb,
    successCount: summary.successCount,
    failureCount: summary.failureCount,
    truncated: summary.truncated,
  };
}
