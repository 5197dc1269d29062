import type { WaitEvent, WaitObserver } from '../types/index.js';

export interface WaitStats {
  description: string;
  satisfied: number;
  timedOut: number;
  failed: number;
  cancelled: number;
  attempts: number;
  totalElapsedMs: number;
  maxElapsedMs: number;
}

export interface WaitMetrics {
  waits: number;
  satisfied: number;
  timedOut: number;
  failed: number;
  cancelled: number;
  totalAttempts: number;
  successRate: number;
  byDescription: WaitStats[];
}

/**
 * Aggregates finished waits by description. Attempt events are ignored;
 * each terminal event already carries the attempt count.
 */
export class WaitMetricsCollector implements WaitObserver {
  private stats = new Map<string, WaitStats>();

  record(event: WaitEvent): void {
    if (event.type === 'wait_attempt') return;

    const stats = this.statsFor(event.description);
    stats.attempts += event.attempts;
    stats.totalElapsedMs += event.elapsedMs;
    stats.maxElapsedMs = Math.max(stats.maxElapsedMs, event.elapsedMs);

    switch (event.type) {
      case 'wait_satisfied':
        stats.satisfied++;
        break;
      case 'wait_timeout':
        stats.timedOut++;
        break;
      case 'wait_failed':
        stats.failed++;
        break;
      case 'wait_cancelled':
        stats.cancelled++;
        break;
    }
  }

  finalize(): WaitMetrics {
    const byDescription = [...this.stats.values()].map((s) => ({ ...s }));
    const sum = (pick: (s: WaitStats) => number) => byDescription.reduce((total, s) => total + pick(s), 0);
    const satisfied = sum((s) => s.satisfied);
    const timedOut = sum((s) => s.timedOut);
    const failed = sum((s) => s.failed);
    const cancelled = sum((s) => s.cancelled);
    const waits = satisfied + timedOut + failed + cancelled;

    return {
      waits,
      satisfied,
      timedOut,
      failed,
      cancelled,
      totalAttempts: sum((s) => s.attempts),
      successRate: waits > 0 ? satisfied / waits : 0,
      byDescription,
    };
  }

  reset(): void {
    this.stats.clear();
  }

  private statsFor(description: string): WaitStats {
    let stats = this.stats.get(description);
    if (!stats) {
      stats = {
        description,
        satisfied: 0,
        timedOut: 0,
        failed: 0,
        cancelled: 0,
        attempts: 0,
        totalElapsedMs: 0,
        maxElapsedMs: 0,
      };
      this.stats.set(description, stats);
    }
    return stats;
  }
}
