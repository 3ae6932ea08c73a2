/**
 * Process worker that boots normally, then answers every task with a result
 * the master cannot parse.
 */

const send = process.send?.bind(process);

if (send) {
  process.on('message', () => {
    send({ type: 'result', result: { taskId: 'not-a-number' } });
  });

  send({ type: 'ready', workerId: 1, pid: process.pid });
}
