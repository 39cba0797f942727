// src/services/engine-metrics.ts
// Counters behind the observability snapshot: cache hits/misses, tool invocations, errors by kind.
// Per-query summaries are logged and optionally pushed to a callback.
import type { EngineErrorKind } from '@/stability/errors';
import { logger } from './logger';

export interface ObservabilitySnapshot {
  hits: number;
  misses: number;
  /** 0 when nothing was looked up yet. */
  hitRate: number;
  invocationsByTool: Record<string, number>;
  errorsByKind: Partial<Record<EngineErrorKind, number>>;
}

export interface QueryMetrics {
  subQueryCount: number;
  totalMatches: number;
  profilesReturned: number;
  parseFailed: number;
  stoppedEarly: boolean;
  deadlineExpired: boolean;
  durationMs: number;
}

export type MetricsCallback = (metrics: QueryMetrics) => void;

export class EngineMetrics {
  private hits = 0;
  private misses = 0;
  private readonly invocations = new Map<string, number>();
  private readonly errors = new Map<EngineErrorKind, number>();
  private callback: MetricsCallback | null = null;

  recordHit(): void {
    this.hits++;
  }

  recordMiss(): void {
    this.misses++;
  }

  recordInvocation(toolName: string): void {
    this.invocations.set(toolName, (this.invocations.get(toolName) ?? 0) + 1);
  }

  recordError(kind: EngineErrorKind, count = 1): void {
    if (count <= 0) return;
    this.errors.set(kind, (this.errors.get(kind) ?? 0) + count);
  }

  invocationCount(toolName: string): number {
    return this.invocations.get(toolName) ?? 0;
  }

  /** Set a callback to receive a summary of each completed query (e.g. push to observability). */
  setCallback(cb: MetricsCallback | null): void {
    this.callback = cb;
  }

  recordQuery(metrics: QueryMetrics): void {
    logger.info('engine:query_metrics', metrics);
    if (!this.callback) return;
    try {
      this.callback(metrics);
    } catch (err) {
      logger.warn('engine:metrics_callback_failed', { err: err instanceof Error ? err.message : String(err) });
    }
  }

  snapshot(): ObservabilitySnapshot {
    const total = this.hits + this.misses;
    const errorsByKind: Partial<Record<EngineErrorKind, number>> = {};
    for (const [kind, count] of this.errors) errorsByKind[kind] = count;
    return {
      hits: this.hits,
      misses: this.misses,
      hitRate: total > 0 ? this.hits / total : 0,
      invocationsByTool: Object.fromEntries(this.invocations),
      errorsByKind,
    };
  }

  reset(): void {
    this.hits = 0;
    this.misses = 0;
    this.invocations.clear();
    this.errors.clear();
  }
}
