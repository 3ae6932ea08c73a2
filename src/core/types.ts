import { z } from 'zod';

// ===== Strategies =====

export const STRATEGIES = ['single', 'threaded', 'multiprocess'] as const;

export type Strategy = (typeof STRATEGIES)[number];

export const StrategySchema = z.enum(STRATEGIES);

// ===== Configuration =====

export const TaskMixSchema = z.object({
  io: z.number().min(0).default(1),
  cpu: z.number().min(0).default(1),
  mixed: z.number().min(0).default(1),
}).refine(mix => mix.io + mix.cpu + mix.mixed > 0, {
  message: 'At least one task kind must have a positive weight',
});

export type TaskMix = z.infer<typeof TaskMixSchema>;

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

export const BenchConfigSchema = z.object({
  model: StrategySchema.default('threaded'),
  workers: z.number().int().min(1),
  tasks: z.number().int().min(0).default(50),
  taskMix: TaskMixSchema.default({}),
  seed: z.number().int().optional(),
  timeoutMs: z.number().positive().optional(),
  sampleIntervalMs: z.number().int().min(10).default(100),
  logLevel: LogLevelSchema.default('info'),
  benchmark: z.object({
    taskCounts: z.array(z.number().int().min(0)).min(1).default([10, 50, 100]),
    workerCounts: z.array(z.number().int().min(1)).min(1).optional(),
  }).default({}),
});

export type BenchConfig = z.infer<typeof BenchConfigSchema>;
