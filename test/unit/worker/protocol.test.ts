import { describe, it, expect } from 'vitest';
import { ChannelError } from '../../../src/core/errors.js';
import type { TaskResult } from '../../../src/tasks/types.js';
import { parseBoot, parseMasterMessage, parseWorkerMessage } from '../../../src/worker/protocol.js';

describe('protocol', () => {
  it('should accept a ready message', () => {
    expect(parseWorkerMessage({ type: 'ready', workerId: 2, pid: 1234 }))
      .toEqual({ type: 'ready', workerId: 2, pid: 1234 });
  });

  it('should restore a result that went through JSON', () => {
    const result: TaskResult = {
      taskId: 9,
      status: 'success',
      workerId: 1,
      startedAt: 1700000000000.25,
      finishedAt: 1700000000010.5,
      output: { iterations: 2000, checksum: 123, waitedMs: 0 },
    };

    const wire: unknown = JSON.parse(JSON.stringify({ type: 'result', result }));
    expect(parseWorkerMessage(wire)).toEqual({ type: 'result', result });
  });

  it('should reject a malformed worker message', () => {
    expect(() => parseWorkerMessage({ type: 'result', result: { taskId: 'x' } })).toThrow(ChannelError);
    expect(() => parseWorkerMessage(null)).toThrow(/^Malformed worker message/);
  });

  it('should accept execute and stop from the master', () => {
    expect(parseMasterMessage({ type: 'stop' })).toEqual({ type: 'stop' });
    expect(parseMasterMessage({ type: 'execute', task: { id: 1, kind: 'io', intensity: 1, fault: 'crash' } }))
      .toEqual({ type: 'execute', task: { id: 1, kind: 'io', intensity: 1, fault: 'crash' } });
  });

  it('should reject an execute message with an unknown task kind', () => {
    expect(() => parseMasterMessage({ type: 'execute', task: { id: 1, kind: 'gpu', intensity: 1 } }))
      .toThrow(/^Malformed master message/);
  });

  it('should coerce boot parameters from env strings', () => {
    expect(parseBoot({ workerId: '3', logLevel: undefined })).toEqual({ workerId: 3, logLevel: 'info' });
    expect(parseBoot({ workerId: 2, logLevel: 'debug' })).toEqual({ workerId: 2, logLevel: 'debug' });
  });

  it('should reject a missing worker id', () => {
    expect(() => parseBoot({ workerId: '0' })).toThrow(ChannelError);
    expect(() => parseBoot({})).toThrow(/^Invalid worker boot parameters/);
  });
});
