/**
 * Stats Collector for the bridge
 *
 * Tracks per-dispatch metrics with a rolling 1-hour window.
 * No external dependencies.
 *
 * @packageDocumentation
 */

import type { ErrorCategory } from './errors.js';

export interface DispatchRecord {
  timestamp: number;
  latencyMs: number;
  /** Upstream model that served the call. */
  model: string;
  /** Ordinal of the credential used. */
  credentialIndex: number;
  streamed: boolean;
  success: boolean;
  /** Set when the call failed. */
  errorCategory?: ErrorCategory;
  /** The caller went away before completion. */
  cancelled?: boolean;
}

export interface StatsSnapshot {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  cancelledRequests: number;
  streamedRequests: number;
  avgLatencyMs: number;
  p50LatencyMs: number;
  p95LatencyMs: number;
  p99LatencyMs: number;
  byModel: Record<string, number>;
  byCredential: Record<string, number>;
  errorsByCategory: Partial<Record<ErrorCategory, number>>;
  windowStartedAt: number;
}

const ROLLING_WINDOW_MS = 60 * 60 * 1000; // 1 hour

export class StatsCollector {
  private records: DispatchRecord[] = [];
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  /** Record a completed dispatch. */
  recordDispatch(record: DispatchRecord): void {
    this.records.push(record);
    this.prune();
  }

  getStats(): StatsSnapshot {
    this.prune();
    const recs = this.records;
    const successful = recs.filter(r => r.success);
    const cancelled = recs.filter(r => r.cancelled);
    const failed = recs.filter(r => !r.success && !r.cancelled);

    const latencies = successful.map(r => r.latencyMs).sort((a, b) => a - b);

    const byModel: Record<string, number> = {};
    const byCredential: Record<string, number> = {};
    const errorsByCategory: Partial<Record<ErrorCategory, number>> = {};
    for (const r of recs) {
      byModel[r.model] = (byModel[r.model] ?? 0) + 1;
      const key = String(r.credentialIndex);
      byCredential[key] = (byCredential[key] ?? 0) + 1;
      if (r.errorCategory) {
        errorsByCategory[r.errorCategory] = (errorsByCategory[r.errorCategory] ?? 0) + 1;
      }
    }

    return {
      totalRequests: recs.length,
      successfulRequests: successful.length,
      failedRequests: failed.length,
      cancelledRequests: cancelled.length,
      streamedRequests: recs.filter(r => r.streamed).length,
      avgLatencyMs: latencies.length ? Math.round(latencies.reduce((a, b) => a + b, 0) / latencies.length) : 0,
      p50LatencyMs: percentile(latencies, 0.5),
      p95LatencyMs: percentile(latencies, 0.95),
      p99LatencyMs: percentile(latencies, 0.99),
      byModel,
      byCredential,
      errorsByCategory,
      windowStartedAt: this.now() - ROLLING_WINDOW_MS,
    };
  }

  private prune(): void {
    const cutoff = this.now() - ROLLING_WINDOW_MS;
    this.records = this.records.filter(r => r.timestamp >= cutoff);
  }
}

function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const idx = Math.ceil(p * sorted.length) - 1;
  return sorted[Math.max(0, idx)] ?? 0;
}
