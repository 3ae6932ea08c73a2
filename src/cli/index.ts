/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { DispatchError } from '../core/errors.js';
import { VERSION, NAME } from '../version.js';
import { createRunCommand } from './commands/run.js';
import { createBenchmarkCommand } from './commands/benchmark.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Master/worker task dispatch with single, threaded and multiprocess strategies');

  program.addCommand(createRunCommand());
  program.addCommand(createBenchmarkCommand());

  return program;
}

export async function main(argv: string[] = process.argv): Promise<void> {
  const cli = createCLI();

  try {
    await cli.parseAsync(argv);
  } catch (error) {
    if (error instanceof Error) {
      const code = error instanceof DispatchError ? ` [${error.code}]` : '';
      console.error(`\n${error.message}${code}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exitCode = 1;
  }
}
