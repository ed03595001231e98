import {
  analyzeTrend,
  summarizeMetrics,
  type MetricSummary,
  type TrendReport,
} from '@domain/post-market-monitoring';
import { HOUR_MS } from '@shared/core';
import type { MonitoringContext } from './context';

export const DEFAULT_TREND_HOURS = 24;

export interface CurrentMetric {
  readonly value: number;
  readonly timestamp: string;
}

export const currentMetrics = (context: MonitoringContext): Record<string, CurrentMetric> => {
  const current: Record<string, CurrentMetric> = {};
  for (const name of context.metrics.metricNames()) {
    const latest = context.metrics.latest(name);
    if (latest) current[name] = { value: latest.value, timestamp: latest.timestamp };
  }
  return current;
};

export const metricSummaries = (context: MonitoringContext, hours = DEFAULT_TREND_HOURS): Record<string, MetricSummary> => {
  const now = context.clock();
  return summarizeMetrics(context.metrics.windows(hours * HOUR_MS), { from: now - hours * HOUR_MS, to: now });
};

/** Undefined for a metric that has never been recorded. */
export const metricTrend = (
  context: MonitoringContext,
  metricName: string,
  hours = DEFAULT_TREND_HOURS,
): TrendReport | undefined => {
  if (context.metrics.size(metricName) === 0) return undefined;
  return analyzeTrend(metricName, context.metrics.window(metricName, hours * HOUR_MS));
};

export const analyzeAll = (context: MonitoringContext, hours = DEFAULT_TREND_HOURS): TrendReport[] =>
  context.metrics.metricNames().map((name) => analyzeTrend(name, context.metrics.window(name, hours * HOUR_MS)));
