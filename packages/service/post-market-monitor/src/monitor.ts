import type { MonitoringContext } from './context';
import { complaintAnalytics, createComplaint, getComplaint, listComplaints, updateComplaint, type ComplaintListQuery } from './complaints';
import { dashboardKpis, dashboardOverview } from './dashboard';
import { runDetectionPass } from './detection';
import { capturePerformance, logInteraction, recordMetric, submitFeedback, type IngestOptions } from './ingestion';
import { flushNotifications } from './notifications';
import { analyzeAll, currentMetrics, metricSummaries, metricTrend } from './metrics';
import { performanceHistory, realtimePerformance, slaStatus } from './performance';
import { complianceStatus, generateReport, getReport, listReports, type ReportListQuery } from './regulatory';
import { DetectionScheduler } from './scheduler';
import {
  acknowledgeSignal,
  activeAlerts,
  activeSignals,
  getSignal,
  markFalsePositive,
  resolveAlert,
  resolveSignal,
  signalHistory,
} from './signals';

/** The operations an API layer exposes, bound to one context. */
export class PostMarketMonitor {
  readonly scheduler: DetectionScheduler;

  constructor(readonly context: MonitoringContext) {
    this.scheduler = new DetectionScheduler(context);
  }

  logInteraction(input: unknown, options?: IngestOptions) { return logInteraction(this.context, input, options); }
  submitFeedback(input: unknown, options?: IngestOptions) { return submitFeedback(this.context, input, options); }
  capturePerformance(input: unknown) { return capturePerformance(this.context, input); }
  recordMetric(input: unknown, options?: IngestOptions) { return recordMetric(this.context, input, options); }
  detect(metricNames?: readonly string[]) { return runDetectionPass(this.context, metricNames); }
  flushNotifications() { return flushNotifications(this.context); }

  currentMetrics() { return currentMetrics(this.context); }
  metricSummaries(hours?: number) { return metricSummaries(this.context, hours); }
  trend(metricName: string, hours?: number) { return metricTrend(this.context, metricName, hours); }
  trends(hours?: number) { return analyzeAll(this.context, hours); }

  activeAlerts() { return activeAlerts(this.context); }
  resolveAlert(id: string) { return resolveAlert(this.context, id); }
  activeSignals() { return activeSignals(this.context); }
  signalHistory(query?: unknown) { return signalHistory(this.context, query); }
  signal(id: string) { return getSignal(this.context, id); }
  acknowledgeSignal(id: string, input: unknown) { return acknowledgeSignal(this.context, id, input); }
  resolveSignal(id: string) { return resolveSignal(this.context, id); }
  markFalsePositive(id: string) { return markFalsePositive(this.context, id); }

  overview() { return dashboardOverview(this.context); }
  kpis() { return dashboardKpis(this.context); }

  createComplaint(input: unknown) { return createComplaint(this.context, input); }
  updateComplaint(id: string, input: unknown, actor?: string) { return updateComplaint(this.context, id, input, actor); }
  complaint(id: string) { return getComplaint(this.context, id); }
  complaints(query?: ComplaintListQuery) { return listComplaints(this.context, query); }
  complaintAnalytics(days?: number) { return complaintAnalytics(this.context, days); }

  realtimePerformance() { return realtimePerformance(this.context); }
  performanceHistory(hours?: number) { return performanceHistory(this.context, hours); }
  slaStatus(hours?: number) { return slaStatus(this.context, hours); }

  complianceStatus() { return complianceStatus(this.context); }
  generateReport(input?: unknown) { return generateReport(this.context, input); }
  report(id: string) { return getReport(this.context, id); }
  reports(query?: ReportListQuery) { return listReports(this.context, query); }
}
