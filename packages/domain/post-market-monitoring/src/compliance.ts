import { DAY_MS, toIso } from '@shared/core';
import type {
  Alert,
  ComplianceStatus,
  IncidentsSummary,
  MetricPoint,
  MetricSummary,
  RegulatoryReport,
  ReportId,
  ReportType,
  RequirementStatus,
  Severity,
  TimeRange,
} from './models';
import { inRange } from './models';
import { mean, round, sampleStdDev } from './statistics';

export const complianceRequirements: Readonly<Record<string, string>> = {
  article_72_1: 'Post-market monitoring system established',
  article_72_2: 'Data collection and analysis procedures defined',
  article_72_3: 'Serious incident reporting mechanism in place',
  article_72_4: 'Corrective action procedures established',
  article_72_5: 'Documentation maintained and updated',
};

export const AUDIT_INTERVAL_DAYS = 90;

/** Threshold tuning is recommended above this many alerts in a period. */
export const ALERT_FATIGUE_LIMIT = 10;

export const complianceStatus = (now: number): ComplianceStatus => {
  const verifiedAt = toIso(now);
  const requirements: Record<string, RequirementStatus> = {};
  for (const [key, requirement] of Object.entries(complianceRequirements)) {
    requirements[key] = { requirement, status: 'compliant', last_verified: verifiedAt };
  }
  const allCompliant = Object.values(requirements).every((entry) => entry.status === 'compliant');
  return {
    overall_status: allCompliant ? 'compliant' : 'non_compliant',
    requirements,
    next_audit_due: toIso(now + AUDIT_INTERVAL_DAYS * DAY_MS),
  };
};

export const summarizeMetric = (values: readonly number[]): MetricSummary => ({
  count: values.length,
  avg: round(mean(values), 4),
  min: round(values.reduce((low, value) => Math.min(low, value), Infinity), 4),
  max: round(values.reduce((high, value) => Math.max(high, value), -Infinity), 4),
  std: round(sampleStdDev(values), 4),
});

/** Metrics with no points in the range are left out. */
export const summarizeMetrics = (
  series: Readonly<Record<string, readonly MetricPoint[]>>,
  range: TimeRange,
): Record<string, MetricSummary> => {
  const summary: Record<string, MetricSummary> = {};
  for (const [name, points] of Object.entries(series)) {
    const values = points.filter((point) => inRange(Date.parse(point.timestamp), range)).map((point) => point.value);
    if (values.length > 0) summary[name] = summarizeMetric(values);
  }
  return summary;
};

export const summarizeIncidents = (alerts: readonly Alert[], range: TimeRange): IncidentsSummary => {
  const inPeriod = alerts.filter((alert) => inRange(Date.parse(alert.timestamp), range));
  const bySeverity: Partial<Record<Severity, number>> = {};
  const byType: Record<string, number> = {};
  for (const alert of inPeriod) {
    bySeverity[alert.severity] = (bySeverity[alert.severity] ?? 0) + 1;
    byType[alert.alert_type] = (byType[alert.alert_type] ?? 0) + 1;
  }
  return {
    total_alerts: inPeriod.length,
    by_severity: bySeverity,
    by_type: byType,
    critical_count: bySeverity.critical ?? 0,
    high_count: bySeverity.high ?? 0,
  };
};

export const executiveSummary = (metricsTracked: number, incidents: IncidentsSummary): string =>
  [
    'This report summarizes post-market monitoring activities',
    'in accordance with EU AI Act Article 72 requirements.',
    '',
    `Metrics tracked: ${metricsTracked}`,
    `Total alerts: ${incidents.total_alerts}`,
    `Critical incidents: ${incidents.critical_count}`,
  ].join('\n');

export const recommendationsFor = (incidents: IncidentsSummary): string[] => {
  const recommendations: string[] = [];
  if (incidents.critical_count > 0) {
    recommendations.push('Review and address root causes of critical incidents');
  }
  if (incidents.total_alerts > ALERT_FATIGUE_LIMIT) {
    recommendations.push('Consider adjusting alert thresholds to reduce alert fatigue');
  }
  recommendations.push('Continue regular monitoring and documentation updates');
  return recommendations;
};

const monthNames = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

export const reportTitle = (at: number): string => {
  const date = new Date(at);
  return `EU AI Act Article 72 Compliance Report - ${monthNames[date.getUTCMonth()]} ${date.getUTCFullYear()}`;
};

export interface ReportSources {
  readonly id: ReportId;
  readonly reportType: ReportType;
  readonly periodDays: number;
  readonly now: number;
  readonly series: Readonly<Record<string, readonly MetricPoint[]>>;
  readonly alerts: readonly Alert[];
}

/** Assembles a draft report covering the `periodDays` ending at `now`. */
export const buildRegulatoryReport = (sources: ReportSources): RegulatoryReport => {
  const range: TimeRange = { from: sources.now - sources.periodDays * DAY_MS, to: sources.now };
  const metricsSummary = summarizeMetrics(sources.series, range);
  const incidents = summarizeIncidents(sources.alerts, range);

  return {
    report_id: sources.id,
    created_at: toIso(sources.now),
    report_type: sources.reportType,
    period_start: toIso(range.from),
    period_end: toIso(range.to),
    status: 'draft',
    title: reportTitle(sources.now),
    summary: executiveSummary(Object.keys(metricsSummary).length, incidents),
    metrics_summary: metricsSummary,
    incidents_summary: incidents,
    compliance_status: complianceStatus(sources.now),
    recommendations: recommendationsFor(incidents),
  };
};
