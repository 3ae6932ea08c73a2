/**
 * Benchmark Types: definitions for the strategy comparison sweep.
 * Used by BenchmarkRunner, BenchmarkReporter, and the CLI command.
 */

import type { Logger } from '../core/logger.js';
import type { Strategy, TaskMix } from '../core/types.js';
import type { MasterOptions, Master } from '../dispatch/types.js';
import type { Task } from '../tasks/types.js';

export interface BenchmarkConfig {
  /** Batch sizes to run; each gets its own generated workload */
  taskCounts: number[];
  /** Worker counts for the threaded and multiprocess strategies */
  workerCounts?: number[];
  mix?: Partial<TaskMix>;
  /** Shared by every run so all strategies see the same tasks */
  seed?: number;
  timeoutMs?: number;
  sampleIntervalMs?: number;
  logger?: Logger;
}

export interface BenchmarkEntry {
  model: Strategy;
  workerCount: number;
  taskCount: number;
  elapsedSeconds: number;
  throughput: number;
  avgTaskSeconds: number;
  peakMemoryMb: number;
  successCount: number;
  failureCount: number;
  truncated: boolean;
}

export interface BenchmarkReport {
  timestamp: string;
  seed: number;
  cpuCount: number;
  taskCounts: number[];
  workerCounts: number[];
  entries: BenchmarkEntry[];
}

export type MasterFactory = (
  strategy: Strategy,
  workerCount: number,
  tasks: readonly Task[],
  options: MasterOptions,
) => Master;
