import { systemClock, type Clock } from '@shared/core';
import type { MetricPoint, TimeRange } from '@domain/post-market-monitoring';
import { TimeSeriesBuffer, type AppendOutcome } from './time-series-buffer';

export interface MetricSeriesStoreOptions {
  readonly retentionMs: number;
  readonly maxPointsPerSeries?: number;
  readonly clock?: Clock;
}

export interface MetricAppendResult {
  readonly point: MetricPoint;
  readonly outcome: AppendOutcome;
}

export class MetricSeriesStore {
  private readonly series = new Map<string, TimeSeriesBuffer<MetricPoint>>();
  private readonly clock: Clock;

  constructor(private readonly options: MetricSeriesStoreOptions) {
    this.clock = options.clock ?? systemClock;
  }

  append(metricName: string, value: number, timestamp: string): MetricAppendResult {
    const point: MetricPoint = Object.freeze({ metric_name: metricName, value, timestamp });
    return { point, outcome: this.seriesFor(metricName).append(point) };
  }

  window(metricName: string, durationMs: number): readonly MetricPoint[] {
    return this.series.get(metricName)?.window(durationMs) ?? [];
  }

  range(metricName: string, range: TimeRange): readonly MetricPoint[] {
    return this.series.get(metricName)?.range(range.from, range.to) ?? [];
  }

  recent(metricName: string, count: number): readonly MetricPoint[] {
    return this.series.get(metricName)?.recent(count) ?? [];
  }

  /** The last `count` points stamped no earlier than `durationMs` before now. */
  recentWithin(metricName: string, count: number, durationMs: number): readonly MetricPoint[] {
    return this.series.get(metricName)?.recentSince(this.clock() - durationMs, count) ?? [];
  }

  all(metricName: string): readonly MetricPoint[] {
    return this.series.get(metricName)?.all() ?? [];
  }

  latest(metricName: string): MetricPoint | undefined {
    return this.series.get(metricName)?.latest();
  }

  size(metricName: string): number {
    return this.series.get(metricName)?.size ?? 0;
  }

  metricNames(): string[] {
    return [...this.series.keys()].sort();
  }

  /** Every tracked metric's points within `durationMs` of now. */
  windows(durationMs: number): Record<string, readonly MetricPoint[]> {
    const result: Record<string, readonly MetricPoint[]> = {};
    for (const name of this.metricNames()) {
      result[name] = this.window(name, durationMs);
    }
    return result;
  }

  private seriesFor(metricName: string): TimeSeriesBuffer<MetricPoint> {
    const existing = this.series.get(metricName);
    if (existing) return existing;
    const created = new TimeSeriesBuffer<MetricPoint>({
      retentionMs: this.options.retentionMs,
      maxPoints: this.options.maxPointsPerSeries,
      clock: this.clock,
    });
    this.series.set(metricName, created);
    return created;
  }
}
