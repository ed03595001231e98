import {
  buildKpis,
  buildOverview,
  complianceStatus,
  type DashboardKpis,
  type DashboardOverview,
} from '@domain/post-market-monitoring';
import { DAY_MS, HOUR_MS } from '@shared/core';
import type { MonitoringContext } from './context';
import { analyzeAll } from './metrics';

const startOfUtcDay = (at: number): number => at - (at % DAY_MS);

export const dashboardOverview = async (context: MonitoringContext): Promise<DashboardOverview> => {
  const now = context.clock();
  const [signals, alerts, openComplaints, lastReport] = await Promise.all([
    context.signals.active(),
    context.alerts.active(),
    context.complaints.openCount(),
    context.reports.latest(),
  ]);

  return buildOverview({
    now,
    activeSignals: signals,
    activeAlerts: alerts,
    openComplaints,
    feedbackToday: context.logs.feedback.range(startOfUtcDay(now), now).length,
    trends: analyzeAll(context),
    compliance: complianceStatus(now).overall_status,
    lastReportId: lastReport?.report_id,
  });
};

export const dashboardKpis = async (context: MonitoringContext): Promise<DashboardKpis> => {
  const now = context.clock();
  const week = 7 * DAY_MS;
  const [alerts, activeAlerts, signals, activeSignals] = await Promise.all([
    context.alerts.since(now - week),
    context.alerts.active(),
    context.signals.all(),
    context.signals.active(),
  ]);

  return buildKpis({
    now,
    interactions: context.logs.interactions.window(week),
    feedback: context.logs.feedback.window(week),
    metricWindows: context.metrics.windows(24 * HOUR_MS),
    alerts,
    activeAlerts: activeAlerts.length,
    signals,
    activeSignals: activeSignals.length,
  });
};
