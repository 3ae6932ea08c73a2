/**
 * `dispatch-bench benchmark`: compare all strategies across task counts
 * and worker counts.
 */

import { Command } from 'commander';
import { writeFileSync } from 'fs';
import { resolve } from 'path';
import { BenchmarkReporter } from '../../benchmark/reporter.js';
import { BenchmarkRunner } from '../../benchmark/runner.js';
import { ConfigManager } from '../../core/config.js';
import { createLogger } from '../../core/logger.js';
import { parseMix } from '../../tasks/workload.js';
import { toInt, toIntList } from '../parse.js';

export function createBenchmarkCommand(): Command {
  const cmd = new Command('benchmark');

  cmd
    .description('Compare single, threaded and multiprocess strategies')
    .option('-t, --tasks <counts>', 'Comma-separated task counts (default 10,50,100)', toIntList)
    .option('-w, --workers <counts>', 'Comma-separated worker counts (default 1, cores/2, cores, cores*2)', toIntList)
    .option('--mix <weights>', 'Task kind weights as io,cpu,mixed')
    .option('--seed <seed>', 'Seed shared by every run', toInt)
    .option('--timeout <ms>', 'Per-run deadline in milliseconds', toInt)
    .option('-d, --dir <directory>', 'Project directory holding .dispatch-bench.yaml', '.')
    .option('--output <path>', 'Write JSON report to file')
    .option('--json', 'Output report as JSON to stdout')
    .option('-v, --verbose', 'Pretty debug logging')
    .action(async (options: BenchmarkOptions) => {
      await executeBenchmark(options);
    });

  return cmd;
}

interface BenchmarkOptions {
  tasks?: number[];
  workers?: number[];
  mix?: string;
  seed?: number;
  timeout?: number;
  dir: string;
  output?: string;
  json?: boolean;
  verbose?: boolean;
}

async function executeBenchmark(options: BenchmarkOptions): Promise<void> {
  const config = new ConfigManager(resolve(options.dir)).load({
    seed: options.seed,
    timeoutMs: options.timeout,
    taskMix: options.mix ? parseMix(options.mix) : undefined,
  });

  const logger = createLogger({
    level: options.verbose ? 'debug' : config.logLevel,
    pretty: options.verbose,
    destination: 2,
  });

  const runner = new BenchmarkRunner({
    taskCounts: options.tasks ?? config.benchmark.taskCounts,
    workerCounts: options.workers ?? config.benchmark.workerCounts,
    mix: config.taskMix,
    seed: config.seed,
    timeoutMs: config.timeoutMs,
    sampleIntervalMs: config.sampleIntervalMs,
    logger,
  });

  logger.info({ runs: runner.runCount, workerCounts: runner.workerCounts }, 'Starting benchmark sweep');
  const report = await runner.run();

  const reporter = new BenchmarkReporter();
  if (options.json) {
    console.log(reporter.formatJSON(report));
  } else {
    console.log(reporter.formatTable(report));
  }

  if (options.output) {
    writeFileSync(options.output, reporter.formatJSON(report), 'utf-8');
    if (!options.json) console.log(`  Report saved to: ${options.output}\n`);
  }
}
