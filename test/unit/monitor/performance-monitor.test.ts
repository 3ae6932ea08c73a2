import { describe, it, expect } from 'vitest';
import { setTimeout as sleep } from 'node:timers/promises';
import { MonitorStateError } from '../../../src/core/errors.js';
import { PerformanceMonitor } from '../../../src/monitor/performance-monitor.js';

describe('PerformanceMonitor', () => {
  it('should sample at start and at stop', () => {
    const monitor = new PerformanceMonitor({ intervalMs: 1000 });
    monitor.start();
    const samples = monitor.stop();

    expect(samples.length).toBeGreaterThanOrEqual(2);
    expect(samples[0]).toMatchObject({ elapsedSeconds: 0, cpuPercent: 0 });
    expect(samples[0].rssMb).toBeGreaterThan(0);
    expect(samples[0].heapUsedMb).toBeGreaterThan(0);
  });

  it('should sample on its interval in time order', async () => {
    const monitor = new PerformanceMonitor({ intervalMs: 10 });
    monitor.start();
    await sleep(80);
    const samples = monitor.stop();

    expect(samples.length).toBeGreaterThanOrEqual(3);
    for (let i = 1; i < samples.length; i++) {
      expect(samples[i].elapsedSeconds).toBeGreaterThanOrEqual(samples[i - 1].elapsedSeconds);
    }
    expect(samples[samples.length - 1].elapsedSeconds).toBeGreaterThanOrEqual(0.07);
  });

  it('should keep the start sample at zero across restarts', () => {
    const monitor = new PerformanceMonitor({ intervalMs: 1000 });
    for (let run = 0; run < 5; run++) {
      monitor.start();
      const [first] = monitor.stop();
      expect(first.elapsedSeconds).toBe(0);
      expect(first.cpuPercent).toBe(0);
    }
  });

  it('should expose samples without stopping', () => {
    const monitor = new PerformanceMonitor();
    monitor.start();

    expect(monitor.isRunning).toBe(true);
    expect(monitor.peek()).toHaveLength(1);

    monitor.stop();
    expect(monitor.isRunning).toBe(false);
  });

  it('should refuse to stop when not running', () => {
    expect(() => new PerformanceMonitor().stop()).toThrow(MonitorStateError);
  });

  it('should refuse a second start', () => {
    const monitor = new PerformanceMonitor();
    monitor.start();

    expect(() => monitor.start()).toThrow('Monitor is already running');
    monitor.stop();
  });

  it('should start fresh after a stop', () => {
    const monitor = new PerformanceMonitor({ intervalMs: 1000 });
    monitor.start();
    monitor.stop();
    monitor.start();

    expect(monitor.peek()).toHaveLength(1);
    monitor.stop();
  });
});
