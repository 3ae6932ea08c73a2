/**
 * Thread Worker: worker_threads entry point.
 * Same protocol as the process worker, carried over the parent port with
 * structured clone instead of JSON IPC.
 */

import { isMainThread, parentPort, workerData, type MessagePort } from 'node:worker_threads';
import { createLogger } from '../core/logger.js';
import { toError } from '../core/errors.js';
import { executeTask } from './worker.js';
import { CRASH_EXIT_CODE, parseBoot, parseMasterMessage, type MasterMessage, type WorkerMessage } from './protocol.js';

function main(port: MessagePort): void {
  const boot = parseBoot(workerData);
  const logger = createLogger({ name: `thread-worker-${boot.workerId}`, level: boot.logLevel, destination: 2 });

  const reply = (message: WorkerMessage): void => {
    port.postMessage(message);
  };

  port.on('message', (raw: unknown) => {
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
          // process.exit inside a worker thread ends only this thread
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
        port.close();
        break;
    }
  });

  logger.debug({ threadWorker: boot.workerId }, 'Thread worker started');
  reply({ type: 'ready', workerId: boot.workerId, pid: process.pid });
}

if (!isMainThread && parentPort) {
  main(parentPort);
}

export { main as startThreadWorker };
