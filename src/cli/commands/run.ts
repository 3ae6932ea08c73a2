/**
 * `dispatch-bench run`: dispatch one generated batch under one strategy.
 */

import { Command } from 'commander';
import { writeFileSync } from 'fs';
import { resolve } from 'path';
import { BenchmarkReporter } from '../../benchmark/reporter.js';
import { ConfigManager } from '../../core/config.js';
import { createLogger } from '../../core/logger.js';
import type { BenchConfig, Strategy } from '../../core/types.js';
import { configure } from '../../dispatch/master.js';
import { generateWorkload, parseMix } from '../../tasks/workload.js';
import { toInt } from '../parse.js';

export function createRunCommand(): Command {
  const cmd = new Command('run');

  cmd
    .description('Run one batch of synthetic tasks under a single strategy')
    .option('-m, --model <model>', 'Strategy: single, threaded or multiprocess')
    .option('-w, --workers <count>', 'Number of workers (ignored by single)', toInt)
    .option('-t, --tasks <count>', 'Number of tasks to generate', toInt)
    .option('--mix <weights>', 'Task kind weights as io,cpu,mixed (e.g. 1,2,0)')
    .option('--seed <seed>', 'Seed for reproducible workloads', toInt)
    .option('--timeout <ms>', 'Overall run deadline in milliseconds', toInt)
    .option('-d, --dir <directory>', 'Project directory holding .dispatch-bench.yaml', '.')
    .option('--output <path>', 'Write the JSON summary to a file')
    .option('--json', 'Print the summary as JSON')
    .option('-v, --verbose', 'Pretty debug logging')
    .action(async (options: RunOptions) => {
      await executeRun(options);
    });

  return cmd;
}

interface RunOptions {
  model?: Strategy;
  workers?: number;
  tasks?: number;
  mix?: string;
  seed?: number;
  timeout?: number;
  dir: string;
  output?: string;
  json?: boolean;
  verbose?: boolean;
}

async function executeRun(options: RunOptions): Promise<void> {
  const overrides: Partial<BenchConfig> = {
    model: options.model,
    workers: options.workers,
    tasks: options.tasks,
    seed: options.seed,
    timeoutMs: options.timeout,
    taskMix: options.mix ? parseMix(options.mix) : undefined,
  };
  const config = new ConfigManager(resolve(options.dir)).load(overrides);

  const logger = createLogger({
    level: options.verbose ? 'debug' : config.logLevel,
    pretty: options.verbose,
    destination: 2,
  });

  const workload = generateWorkload(config.tasks, config.taskMix, config.seed);
  logger.info({ seed: workload.seed, tasks: workload.tasks.length }, 'Generated workload');

  const master = configure(config.model, config.workers, workload.tasks, {
    logger,
    timeoutMs: config.timeoutMs,
    sampleIntervalMs: config.sampleIntervalMs,
  });
  const summary = await master.run();

  const reporter = new BenchmarkReporter();
  if (options.json) {
    console.log(reporter.formatJSON(summary));
  } else {
    console.log();
    console.log(reporter.formatRun(summary));
    console.log();
  }

  if (options.output) {
    writeFileSync(options.output, reporter.formatJSON(summary), 'utf-8');
    if (!options.json) console.log(`  Summary saved to: ${options.output}\n`);
  }

  process.exitCode = summary.failureCount > 0 ? 1 : 0;
}
