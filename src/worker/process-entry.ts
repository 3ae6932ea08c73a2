/**
 * Process Worker: Child Process Entry Point
 * Announces itself over IPC, then executes one task per `execute` message
 * and replies with a `result`. When run as a child process (process.send
 * exists), auto-starts the worker loop.
 */

import { createLogger } from '../core/logger.js';
import { toError } from '../core/errors.js';
import { executeTask } from './worker.js';
import { BOOT_ENV, CRASH_EXIT_CODE, parseBoot, parseMasterMessage, type MasterMessage, type WorkerMessage } from './protocol.js';

async function main(): Promise<void> {
  const send = process.send?.bind(process);
  if (!send) {
    console.error('Process worker must be run as a child process');
    process.exit(1);
  }

  const boot = parseBoot({
    workerId: process.env[BOOT_ENV.workerId],
    logLevel: process.env[BOOT_ENV.logLevel],
  });
  const logger = createLogger({ name: `process-worker-${boot.workerId}`, level: boot.logLevel, destination: 2 });

  const reply = (message: WorkerMessage): void => {
    send(message);
  };

  process.on('message', (raw: unknown) => {
    let message: MasterMessage;
    try {
      message = parseMasterMessage(raw);
    } catch (error) {
      logger.error({ err: toError(error).message }, 'Malformed message from master, exiting');
      process.exit(1);
    }

    switch (message.type) {
      case 'execute':
        executeTask(message.task, {
          workerId: boot.workerId,
          logger,
          crash: () => process.exit(CRASH_EXIT_CODE),
        })
          .then(result => reply({ type: 'result', result }))
          .catch((error: unknown) => {
            logger.fatal({ err: toError(error).message }, 'Worker loop failed');
            process.exit(1);
          });
        break;

      case 'stop':
        logger.debug('Received shutdown signal');
        process.exit(0);
        break;
    }
  });

  logger.debug({ pid: process.pid }, 'Process worker started');
  reply({ type: 'ready', workerId: boot.workerId, pid: process.pid });
}

if (process.send) {
  main().catch(err => {
    console.error('Process worker fatal error:', err);
    process.exit(1);
  });
}

export { main as startProcessWorker };
