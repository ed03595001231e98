import { InMemoryRepository, listByCursor, readAllMatching, type CursorWindow, type Query } from '@data/repositories';
import {
  isActiveAlert,
  isOpenStatus,
  resolveAlert,
  type Alert,
  type AlertId,
  type Complaint,
  type ComplaintId,
  type ComplaintPriority,
  type ComplaintStatus,
  type RegulatoryReport,
  type ReportId,
  type ReportStatus,
  type ReportType,
  type Signal,
  type SignalId,
  type SignalStatus,
} from '@domain/post-market-monitoring';

const newestFirst = <T extends { readonly timestamp: string }>(left: T, right: T): number =>
  Date.parse(right.timestamp) - Date.parse(left.timestamp);

const after = (at: string, from: number | undefined): boolean => from === undefined || Date.parse(at) >= from;

export interface SignalFilter {
  readonly status?: SignalStatus;
  readonly since?: number;
  readonly metricName?: string;
}

export class SignalRepository extends InMemoryRepository<SignalId, Signal> {
  constructor() {
    super((signal) => signal.signal_id);
  }

  async saveMany(signals: readonly Signal[]): Promise<void> {
    for (const signal of signals) {
      await this.save(signal);
    }
  }

  /** Newest first. */
  async query(query: Query<SignalFilter> = {}): Promise<CursorWindow<Signal>> {
    const filter = query.filter ?? {};
    return listByCursor(await this.all(), {
      filter: (signal) =>
        (filter.status === undefined || signal.status === filter.status) &&
        (filter.metricName === undefined || signal.metric_name === filter.metricName) &&
        after(signal.timestamp, filter.since),
      sortBy: newestFirst,
      limit: query.limit,
      cursor: query.cursor,
    });
  }

  async active(): Promise<Signal[]> {
    const signals = await readAllMatching(this, (signal) => signal.status === 'active');
    return signals.sort(newestFirst);
  }
}

export class AlertRepository extends InMemoryRepository<AlertId, Alert> {
  constructor() {
    super((alert) => alert.alert_id);
  }

  async active(): Promise<Alert[]> {
    const alerts = await readAllMatching(this, isActiveAlert);
    return alerts.sort(newestFirst);
  }

  async since(from: number): Promise<Alert[]> {
    return readAllMatching(this, (alert) => after(alert.timestamp, from));
  }

  /** Resolves every active alert on `metricName`; returns the ones it closed. */
  async clearForMetric(metricName: string, at: number): Promise<Alert[]> {
    const open = await readAllMatching(this, (alert) => alert.metric_name === metricName && isActiveAlert(alert));
    const cleared: Alert[] = [];
    for (const alert of open) {
      const next = await this.update(alert.alert_id, (current) => resolveAlert(current, at));
      if (next) cleared.push(next);
    }
    return cleared;
  }
}

export interface ComplaintFilter {
  readonly status?: ComplaintStatus;
  readonly priority?: ComplaintPriority;
  readonly from?: number;
  readonly to?: number;
}

export class ComplaintRepository extends InMemoryRepository<ComplaintId, Complaint> {
  constructor() {
    super((complaint) => complaint.complaint_id);
  }

  /** Newest first. */
  async list(query: Query<ComplaintFilter> = {}): Promise<CursorWindow<Complaint>> {
    const filter = query.filter ?? {};
    return listByCursor(await this.all(), {
      filter: (complaint) => {
        const created = Date.parse(complaint.created_at);
        return (
          (filter.status === undefined || complaint.status === filter.status) &&
          (filter.priority === undefined || complaint.priority === filter.priority) &&
          (filter.from === undefined || created >= filter.from) &&
          (filter.to === undefined || created <= filter.to)
        );
      },
      sortBy: (left, right) => Date.parse(right.created_at) - Date.parse(left.created_at),
      limit: query.limit,
      cursor: query.cursor,
    });
  }

  async openCount(): Promise<number> {
    const open = await readAllMatching(this, (complaint) => isOpenStatus(complaint.status));
    return open.length;
  }
}

export interface ReportFilter {
  readonly reportType?: ReportType;
  readonly status?: ReportStatus;
}

export class ReportRepository extends InMemoryRepository<ReportId, RegulatoryReport> {
  constructor() {
    super((report) => report.report_id);
  }

  /** Newest first; reports created in the same millisecond keep id order. */
  async list(query: Query<ReportFilter> = {}): Promise<CursorWindow<RegulatoryReport>> {
    const filter = query.filter ?? {};
    return listByCursor(await this.all(), {
      filter: (report) =>
        (filter.reportType === undefined || report.report_type === filter.reportType) &&
        (filter.status === undefined || report.status === filter.status),
      sortBy: (left, right) =>
        Date.parse(right.created_at) - Date.parse(left.created_at) || right.report_id.localeCompare(left.report_id),
      limit: query.limit,
      cursor: query.cursor,
    });
  }

  async latest(): Promise<RegulatoryReport | undefined> {
    const page = await this.list({ limit: 1 });
    return page.items[0];
  }
}
