/**
 * Benchmark Reporter: formats run summaries and benchmark sweeps for the
 * terminal and for JSON export.
 */

import type { Strategy } from '../core/types.js';
import type { RunSummary } from '../aggregator/aggregate.js';
import type { BenchmarkEntry, BenchmarkReport } from './types.js';

export const MODEL_LABELS: Record<Strategy, string> = {
  single: 'Single Process',
  threaded: 'Multi-threading',
  multiprocess: 'Multi-processing',
};

export class BenchmarkReporter {
  /** Format a sweep as one ASCII table per task count */
  formatTable(report: BenchmarkReport): string {
    const lines: string[] = [];
    const sep = '─'.repeat(70);

    lines.push('');
    lines.push('  Benchmark Summary');
    lines.push(`  Seed: ${report.seed}  |  CPUs: ${report.cpuCount}  |  ${report.timestamp}`);

    for (const taskCount of report.taskCounts) {
      lines.push('');
      lines.push(`  Task Count: ${taskCount}`);
      lines.push(`  ${sep}`);
      lines.push(
        `  ${'Model'.padEnd(20)} ${'Workers'.padEnd(10)} ${'Time (s)'.padEnd(12)} ${'Tasks/s'.padEnd(12)} ${'Memory (MB)'.padEnd(12)}`,
      );
      lines.push(`  ${sep}`);
      for (const entry of report.entries.filter(e => e.taskCount === taskCount)) {
        lines.push(`  ${this.formatEntry(entry)}`);
      }
    }

    lines.push('');
    return lines.join('\n');
  }

  /** One table row */
  formatEntry(entry: BenchmarkEntry): string {
    const flag = entry.truncated ? ' (truncated)' : '';
    return [
      MODEL_LABELS[entry.model].padEnd(20),
      String(entry.workerCount).padEnd(10),
      entry.elapsedSeconds.toFixed(2).padEnd(12),
      entry.throughput.toFixed(2).padEnd(12),
      entry.peakMemoryMb.toFixed(2).padEnd(12),
    ].join(' ').trimEnd() + flag;
  }

  /** Human-readable summary of a single run */
  formatRun(summary: RunSummary): string {
    const lines = [
      `  Model:        ${MODEL_LABELS[summary.model]} (${summary.model})`,
      `  Workers:      ${summary.workerCount}`,
      `  Tasks:        ${summary.taskCount} (${summary.successCount} ok, ${summary.failureCount} failed)`,
      `  Total time:   ${summary.elapsedSeconds.toFixed(3)}s`,
      `  Throughput:   ${summary.throughput.toFixed(3)} tasks/s`,
      `  Avg task:     ${summary.avgTaskSeconds.toFixed(3)}s`,
      `  Peak memory:  ${summary.peakMemoryMb.toFixed(2)} MB`,
    ];
    if (summary.truncated) {
      lines.push(`  Truncated:    ${summary.unresolvedTaskIds.length} task(s) hit the deadline`);
    }
    return lines.join('\n');
  }

  formatJSON(value: BenchmarkReport | RunSummary): string {
    return JSON.stringify(value, null, 2);
  }
}
