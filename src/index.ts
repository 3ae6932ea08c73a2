/**
 * dispatch-bench: master/worker task dispatch under three concurrency
 * strategies, with resource monitoring and result aggregation.
 *
 * @example
 * ```typescript
 * import { configure, generate } from 'dispatch-bench';
 *
 * const master = configure('threaded', 4, generate(50, { io: 1, cpu: 2, mixed: 0 }, 42));
 * const summary = await master.run();
 * console.log(summary.throughput);
 * ```
 */

// Core
export { ConfigManager, PROJECT_CONFIG_FILE } from './core/config.js';
export { createLogger, createSilentLogger, type Logger, type LogLevel, type LoggerOptions } from './core/logger.js';
export {
  DispatchError,
  ConfigError,
  TaskExecutionError,
  WorkerCrashError,
  TimeoutExceededError,
  ChannelError,
  MonitorStateError,
} from './core/errors.js';
export { BlockingQueue, QUEUE_CLOSED, type QueueClosed } from './core/queue.js';
export {
  STRATEGIES,
  BenchConfigSchema,
  TaskMixSchema,
  type Strategy,
  type TaskMix,
  type BenchConfig,
} from './core/types.js';

// Tasks
export { createTask, describeTask } from './tasks/task.js';
export { generateWorkload, generate, uniformWorkload, parseMix, type Workload } from './tasks/workload.js';
export { runPayload, IO_MS_PER_INTENSITY, CPU_ITERATIONS_PER_INTENSITY } from './tasks/payloads.js';
export {
  INTENSITY,
  TASK_KINDS,
  type Task,
  type TaskKind,
  type TaskFault,
  type TaskResult,
  type TaskSuccess,
  type TaskFailure,
  type TaskError,
  type FailureReason,
  type PayloadOutput,
} from './tasks/types.js';

// Dispatch
export { configure } from './dispatch/master.js';
export type { Master, MasterOptions } from './dispatch/types.js';

// Monitor & aggregation
export { PerformanceMonitor, type ResourceSample, type MonitorOptions } from './monitor/performance-monitor.js';
export { aggregate, type RunSummary, type RunMeta } from './aggregator/aggregate.js';

// Benchmark
export { BenchmarkRunner, defaultWorkerCounts } from './benchmark/runner.js';
export { BenchmarkReporter, MODEL_LABELS } from './benchmark/reporter.js';
export type { BenchmarkConfig, BenchmarkEntry, BenchmarkReport } from './benchmark/types.js';

export { VERSION, NAME } from './version.js';
