import type { CursorWindow } from '@data/repositories';
import {
  buildRegulatoryReport,
  complianceStatus as currentCompliance,
  reportStatuses,
  reportTypes,
  validateReportRequest,
  withReportId,
  type ComplianceStatus,
  type RegulatoryReport,
  type ReportStatus,
  type ReportType,
} from '@domain/post-market-monitoring';
import { DAY_MS } from '@shared/core';
import { NotFoundError, type ValidationError } from '@shared/errors';
import { fail, ok, type Result } from '@shared/result';
import type { MonitoringContext } from './context';

export const complianceStatus = (context: MonitoringContext): ComplianceStatus => currentCompliance(context.clock());

/** Summarises the requested period into a stored draft report. */
export const generateReport = async (
  context: MonitoringContext,
  input: unknown = {},
): Promise<Result<RegulatoryReport, ValidationError>> => {
  const parsed = validateReportRequest.parse(input);
  if (!parsed.ok) return parsed;

  const { report_type: reportType, period_days: periodDays } = parsed.value;
  const report = buildRegulatoryReport({
    id: context.ids.report(),
    reportType,
    periodDays,
    now: context.clock(),
    series: context.metrics.windows(periodDays * DAY_MS),
    alerts: await context.alerts.all(),
  });
  await context.reports.save(report);
  context.logger.child('regulatory').info('regulatory report generated', {
    reportId: report.report_id,
    reportType,
    periodDays,
    totalAlerts: report.incidents_summary.total_alerts,
  });
  return ok(report);
};

export const getReport = async (context: MonitoringContext, id: string): Promise<Result<RegulatoryReport, NotFoundError>> => {
  const report = await context.reports.findById(withReportId(id));
  return report ? ok(report) : fail(new NotFoundError('report', id));
};

export interface ReportListQuery {
  readonly reportType?: string;
  readonly status?: string;
  readonly limit?: number;
  readonly cursor?: string;
}

const isReportType = (value: string | undefined): value is ReportType => reportTypes.some((type) => type === value);

const isReportStatus = (value: string | undefined): value is ReportStatus =>
  reportStatuses.some((status) => status === value);

/** Unrecognised type or status filters match nothing. */
export const listReports = async (
  context: MonitoringContext,
  query: ReportListQuery = {},
): Promise<CursorWindow<RegulatoryReport>> => {
  if ((query.reportType !== undefined && !isReportType(query.reportType)) || (query.status !== undefined && !isReportStatus(query.status))) {
    return { items: [] };
  }
  return context.reports.list({
    filter: {
      reportType: isReportType(query.reportType) ? query.reportType : undefined,
      status: isReportStatus(query.status) ? query.status : undefined,
    },
    limit: query.limit,
    cursor: query.cursor,
  });
};
