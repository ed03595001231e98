import { DAY_MS, HOUR_MS, toIso } from '@shared/core';
import { computeHealthScore } from './health';
import type {
  Alert,
  ComplianceStatus,
  Feedback,
  HealthStatus,
  MetricPoint,
  Signal,
  TrendDirection,
  TrendReport,
} from './models';
import { mean, round } from './statistics';

export interface DashboardOverview {
  readonly timestamp: string;
  readonly health_score: number;
  readonly health_status: HealthStatus;
  readonly active_signals: number;
  readonly active_alerts: number;
  readonly open_complaints: number;
  readonly feedback_today: number;
  readonly metrics_tracked: number;
  readonly trends_summary: Readonly<Record<string, { readonly direction: TrendDirection | 'insufficient_data'; readonly current: number | null }>>;
  readonly compliance_status: ComplianceStatus['overall_status'];
  readonly last_report: string | null;
}

export interface OverviewInput {
  readonly now: number;
  readonly activeSignals: readonly Signal[];
  readonly activeAlerts: readonly Alert[];
  readonly openComplaints: number;
  readonly feedbackToday: number;
  readonly trends: readonly TrendReport[];
  readonly compliance: ComplianceStatus['overall_status'];
  readonly lastReportId?: string;
}

export const buildOverview = (input: OverviewInput): DashboardOverview => {
  const health = computeHealthScore(input.activeSignals, input.activeAlerts);
  const trendsSummary: Record<string, { direction: TrendDirection | 'insufficient_data'; current: number | null }> = {};
  for (const trend of input.trends) {
    trendsSummary[trend.metric_name] = trend.status === 'ok'
      ? { direction: trend.trend_direction, current: trend.current_value }
      : { direction: 'insufficient_data', current: null };
  }

  return {
    timestamp: toIso(input.now),
    health_score: health.score,
    health_status: health.status,
    active_signals: input.activeSignals.length,
    active_alerts: input.activeAlerts.length,
    open_complaints: input.openComplaints,
    feedback_today: input.feedbackToday,
    metrics_tracked: input.trends.length,
    trends_summary: trendsSummary,
    compliance_status: input.compliance,
    last_report: input.lastReportId ?? null,
  };
};

export interface MetricKpi {
  readonly current: number;
  readonly mean_24h: number;
  readonly samples_24h: number;
}

export interface DashboardKpis {
  readonly timestamp: string;
  readonly interactions: { readonly last_24h: number; readonly last_7d: number; readonly avg_per_day: number };
  readonly feedback: { readonly count_7d: number; readonly avg_rating: number; readonly satisfaction_rate: number };
  readonly metrics: Readonly<Record<string, MetricKpi>>;
  readonly alerts: { readonly active: number; readonly last_24h: number };
  readonly signals: { readonly active: number; readonly detected_7d: number };
}

export interface KpiInput {
  readonly now: number;
  readonly interactions: readonly { readonly timestamp: string }[];
  readonly feedback: readonly Pick<Feedback, 'timestamp' | 'rating'>[];
  /** Per-metric points covering at least the last 24 hours. */
  readonly metricWindows: Readonly<Record<string, readonly MetricPoint[]>>;
  readonly alerts: readonly Pick<Alert, 'timestamp'>[];
  readonly activeAlerts: number;
  readonly signals: readonly Pick<Signal, 'timestamp'>[];
  readonly activeSignals: number;
}

/** Ratings at or above this count as satisfied. */
export const SATISFIED_RATING = 4;

const since = <T extends { readonly timestamp: string }>(items: readonly T[], from: number): T[] =>
  items.filter((item) => Date.parse(item.timestamp) >= from);

export const buildKpis = (input: KpiInput): DashboardKpis => {
  const dayAgo = input.now - 24 * HOUR_MS;
  const weekAgo = input.now - 7 * DAY_MS;

  const interactions7d = since(input.interactions, weekAgo);
  const feedback7d = since(input.feedback, weekAgo);
  const satisfied = feedback7d.filter((entry) => entry.rating >= SATISFIED_RATING).length;

  const metrics: Record<string, MetricKpi> = {};
  for (const [name, points] of Object.entries(input.metricWindows)) {
    const recent = since(points, dayAgo);
    if (recent.length === 0) continue;
    metrics[name] = {
      current: recent[recent.length - 1].value,
      mean_24h: round(mean(recent.map((point) => point.value)), 4),
      samples_24h: recent.length,
    };
  }

  return {
    timestamp: toIso(input.now),
    interactions: {
      last_24h: since(input.interactions, dayAgo).length,
      last_7d: interactions7d.length,
      avg_per_day: round(interactions7d.length / 7, 2),
    },
    feedback: {
      count_7d: feedback7d.length,
      avg_rating: round(mean(feedback7d.map((entry) => entry.rating)), 2),
      satisfaction_rate: feedback7d.length === 0 ? 0 : round(satisfied / feedback7d.length, 4),
    },
    metrics,
    alerts: {
      active: input.activeAlerts,
      last_24h: since(input.alerts, dayAgo).length,
    },
    signals: {
      active: input.activeSignals,
      detected_7d: since(input.signals, weekAgo).length,
    },
  };
};
