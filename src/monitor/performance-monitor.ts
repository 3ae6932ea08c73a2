/**
 * PerformanceMonitor: samples wall clock, CPU and memory of the master
 * process on its own timer while a run executes.
 *
 * One sample is taken at start() (elapsed 0, cpu 0), one per interval, and
 * one at stop(), so a stopped monitor always returns at least two samples in
 * time order.
 */

import { performance } from 'node:perf_hooks';
import { MonitorStateError } from '../core/errors.js';
import type { Logger } from '../core/logger.js';

export interface ResourceSample {
  /** Seconds since start() */
  elapsedSeconds: number;
  /** Process CPU time (user + system) over wall time since the previous sample */
  cpuPercent: number;
  rssMb: number;
  heapUsedMb: number;
}

export interface MonitorOptions {
  intervalMs?: number;
  logger?: Logger;
}

type MonitorState = 'idle' | 'running' | 'stopped';

const BYTES_PER_MB = 1024 * 1024;

export class PerformanceMonitor {
  private readonly intervalMs: number;
  private readonly logger?: Logger;
  private state: MonitorState = 'idle';
  private timer: ReturnType<typeof setInterval> | null = null;
  private samples: ResourceSample[] = [];
  private startedAt = 0;
  private lastWall = 0;
  private lastCpu: NodeJS.CpuUsage = { user: 0, system: 0 };

  constructor(options: MonitorOptions = {}) {
    this.intervalMs = options.intervalMs ?? 100;
    this.logger = options.logger;
  }

  start(): void {
    if (this.state === 'running') {
      throw new MonitorStateError('Monitor is already running');
    }

    this.state = 'running';
    this.startedAt = performance.now();
    this.lastWall = this.startedAt;
    this.lastCpu = process.cpuUsage();
    this.samples = [this.snapshot(0, 0)];

    this.timer = setInterval(() => this.record(), this.intervalMs);
    // Allow process to exit even if interval is running
    this.timer.unref();

    this.logger?.debug({ intervalMs: this.intervalMs }, 'Performance monitor started');
  }

  stop(): ResourceSample[] {
    if (this.state !== 'running') {
      throw new MonitorStateError('Monitor is not running');
    }

    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.record();
    this.state = 'stopped';

    const last = this.samples[this.samples.length - 1];
    this.logger?.debug(
      { samples: this.samples.length, elapsedSeconds: last.elapsedSeconds },
      'Performance monitor stopped',
    );
    return [...this.samples];
  }

  get isRunning(): boolean {
    return this.state === 'running';
  }

  /** Samples collected so far, without stopping */
  peek(): ResourceSample[] {
    return [...this.samples];
  }

  private record(): void {
    const wall = performance.now();
    const cpu = process.cpuUsage();

    const wallMicros = (wall - this.lastWall) * 1000;
    const cpuMicros = (cpu.user - this.lastCpu.user) + (cpu.system - this.lastCpu.system);
    const cpuPercent = wallMicros > 0 ? (cpuMicros / wallMicros) * 100 : 0;

    this.samples.push(this.snapshot((wall - this.startedAt) / 1000, cpuPercent));
    this.lastWall = wall;
    this.lastCpu = cpu;
  }

  private snapshot(elapsedSeconds: number, cpuPercent: number): ResourceSample {
    const memory = process.memoryUsage();
    return {
      elapsedSeconds,
      cpuPercent: round(cpuPercent),
      rssMb: round(memory.rss / BYTES_PER_MB),
      heapUsedMb: round(memory.heapUsed / BYTES_PER_MB),
    };
  }
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}
