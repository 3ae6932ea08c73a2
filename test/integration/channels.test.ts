/**
 * Real worker channels booting the TypeScript worker entries from source.
 */

import { describe, it, expect } from 'vitest';
import { spawnProcess, spawnThread, type WorkerChannel } from '../../src/dispatch/channels.js';

function nextMessage(channel: WorkerChannel): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let settled = false;
    channel.onMessage((raw) => {
      if (settled) return;
      settled = true;
      resolve(raw);
    });
    channel.onError(reject);
    channel.onExit((code, signal) => {
      if (settled) return;
      settled = true;
      reject(new Error(`Worker exited with ${signal ?? code} before replying`));
    });
  });
}

describe.each([
  ['thread', spawnThread],
  ['process', spawnProcess],
] as const)('%s channel', (kind, spawn) => {
  it('should boot the worker entry and execute a task', async () => {
    const channel = spawn({ workerId: 3, logLevel: 'silent' });
    expect(channel.kind).toBe(kind);

    const ready = await nextMessage(channel);
    expect(ready).toMatchObject({ type: 'ready', workerId: 3 });

    const reply = nextMessage(channel);
    channel.send({ type: 'execute', task: { id: 9, kind: 'cpu', intensity: 0.1 } });
    expect(await reply).toMatchObject({
      type: 'result',
      result: { taskId: 9, status: 'success', workerId: 3, output: { iterations: 2000 } },
    });

    await channel.kill();
  });
});
