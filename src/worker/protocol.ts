/**
 * Wire protocol between the master and remote (thread/process) workers.
 *
 * worker -> master: ready, result
 * master -> worker: execute, stop
 *
 * Everything arriving over a channel is validated here before use; a
 * malformed message is a ChannelError.
 */

import { z } from 'zod';
import { ChannelError } from '../core/errors.js';
import { LogLevelSchema } from '../core/types.js';

export const TaskSchema = z.object({
  id: z.number().int(),
  kind: z.enum(['io', 'cpu', 'mixed']),
  intensity: z.number().positive(),
  fault: z.enum(['error', 'crash']).optional(),
});

const ResultBase = {
  taskId: z.number().int(),
  workerId: z.number().int().nullable(),
  startedAt: z.number(),
  finishedAt: z.number(),
};

export const TaskResultSchema = z.discriminatedUnion('status', [
  z.object({
    ...ResultBase,
    status: z.literal('success'),
    output: z.object({
      iterations: z.number(),
      checksum: z.number(),
      waitedMs: z.number(),
    }),
  }),
  z.object({
    ...ResultBase,
    status: z.literal('failure'),
    error: z.object({
      reason: z.enum(['exception', 'timeout', 'worker_crash']),
      message: z.string(),
    }),
  }),
]);

export const MasterMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('execute'), task: TaskSchema }),
  z.object({ type: z.literal('stop') }),
]);

export const WorkerMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('ready'), workerId: z.number().int(), pid: z.number().int() }),
  z.object({ type: z.literal('result'), result: TaskResultSchema }),
]);

export type MasterMessage = z.infer<typeof MasterMessageSchema>;
export type WorkerMessage = z.infer<typeof WorkerMessageSchema>;

/** Boot parameters handed to a remote worker at spawn time */
export const WorkerBootSchema = z.object({
  workerId: z.coerce.number().int().min(1),
  logLevel: LogLevelSchema.default('info'),
  /** TypeScript entry a thread bootstrap imports through tsx */
  entry: z.string().optional(),
});

export type WorkerBoot = z.infer<typeof WorkerBootSchema>;

export const BOOT_ENV = {
  workerId: 'DISPATCH_WORKER_ID',
  logLevel: 'DISPATCH_WORKER_LOG_LEVEL',
} as const;

/** Exit code a remote worker uses for an injected crash */
export const CRASH_EXIT_CODE = 70;

export function parseWorkerMessage(raw: unknown): WorkerMessage {
  const parsed = WorkerMessageSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ChannelError(`Malformed worker message: ${parsed.error.message}`, parsed.error);
  }
  return parsed.data;
}

export function parseMasterMessage(raw: unknown): MasterMessage {
  const parsed = MasterMessageSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ChannelError(`Malformed master message: ${parsed.error.message}`, parsed.error);
  }
  return parsed.data;
}

export function parseBoot(raw: unknown): WorkerBoot {
  const parsed = WorkerBootSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ChannelError(`Invalid worker boot parameters: ${parsed.error.message}`, parsed.error);
  }
  return parsed.data;
}
