import type { Brand } from '@shared/core';

export const severities = ['low', 'medium', 'high', 'critical'] as const;
export const signalTypes = ['anomaly', 'trend_change', 'pattern_detected', 'threshold_breach', 'drift_detected'] as const;
export const signalStatuses = ['active', 'acknowledged', 'resolved', 'false_positive'] as const;
export const complaintStatuses = ['open', 'in_progress', 'under_review', 'resolved', 'closed'] as const;
export const complaintPriorities = ['critical', 'high', 'medium', 'low'] as const;
export const bandDirections = ['higher-is-better', 'lower-is-better'] as const;
export const trendDirections = ['increasing', 'stable', 'decreasing'] as const;
export const healthStatuses = ['healthy', 'warning', 'degraded', 'critical'] as const;
export const reportTypes = ['periodic', 'incident', 'compliance', 'audit'] as const;
export const reportStatuses = ['draft', 'pending_review', 'approved', 'submitted'] as const;

export type Severity = (typeof severities)[number];
export type SignalType = (typeof signalTypes)[number];
export type SignalStatus = (typeof signalStatuses)[number];
export type ComplaintStatus = (typeof complaintStatuses)[number];
export type ComplaintPriority = (typeof complaintPriorities)[number];
export type BandDirection = (typeof bandDirections)[number];
export type TrendDirection = (typeof trendDirections)[number];
export type HealthStatus = (typeof healthStatuses)[number];
export type ReportType = (typeof reportTypes)[number];
export type ReportStatus = (typeof reportStatuses)[number];

export type SignalId = Brand<string, 'SignalId'>;
export type AlertId = Brand<string, 'AlertId'>;
export type ComplaintId = Brand<string, 'ComplaintId'>;
export type FeedbackId = Brand<string, 'FeedbackId'>;
export type ReportId = Brand<string, 'ReportId'>;
export type InteractionId = Brand<string, 'InteractionId'>;

export type Scalar = string | number | boolean | null;
export type OpenMap = Record<string, Scalar>;

export const knownMetrics = [
  'response_accuracy',
  'hallucination_rate',
  'privacy_incidents',
  'user_satisfaction',
  'prompt_injection_attempts',
  'citation_accuracy',
  'response_time',
] as const;

export type KnownMetric = (typeof knownMetrics)[number];

export interface MetricPoint {
  readonly metric_name: string;
  readonly value: number;
  readonly timestamp: string;
}

export interface MetricBand {
  readonly target: number;
  readonly alert_threshold: number;
  readonly critical_threshold: number;
  readonly direction: BandDirection;
}

export type MetricBands = Readonly<Record<string, MetricBand>>;

export interface Alert {
  readonly alert_id: AlertId;
  readonly timestamp: string;
  readonly severity: Severity;
  readonly alert_type: string;
  readonly metric_name: string;
  readonly current_value: number;
  readonly threshold: number;
  readonly details: OpenMap;
  readonly resolved_at?: string;
}

export interface Signal {
  readonly signal_id: SignalId;
  readonly timestamp: string;
  readonly type: SignalType;
  readonly severity: Severity;
  readonly metric_name: string;
  readonly detected_value: number;
  readonly expected_value: number;
  readonly deviation_pct: number;
  readonly confidence: number;
  readonly description: string;
  readonly status: SignalStatus;
  readonly acknowledged_by?: string;
  readonly acknowledged_at?: string;
  readonly resolved_at?: string;
  readonly context: OpenMap;
}

export interface Forecast {
  readonly next_value: number;
  readonly next_3: number;
  readonly confidence: number;
}

export interface TrendAnalysis {
  readonly metric_name: string;
  readonly status: 'ok';
  readonly current_value: number;
  readonly mean: number;
  readonly std: number;
  readonly min: number;
  readonly max: number;
  readonly trend_direction: TrendDirection;
  readonly trend_strength: number;
  readonly data_points: number;
  readonly forecast: Forecast;
}

export interface InsufficientTrend {
  readonly metric_name: string;
  readonly status: 'insufficient_data';
  readonly data_points: number;
}

export type TrendReport = TrendAnalysis | InsufficientTrend;

export interface ComplaintUpdateEntry {
  readonly timestamp: string;
  readonly actor?: string;
  readonly changes: Readonly<Record<string, { readonly from: Scalar; readonly to: Scalar }>>;
}

export interface Complaint {
  readonly complaint_id: ComplaintId;
  readonly created_at: string;
  readonly user_id?: string;
  readonly category: string;
  readonly subject: string;
  readonly description: string;
  readonly priority: ComplaintPriority;
  readonly status: ComplaintStatus;
  readonly assigned_to?: string;
  readonly related_interaction_id?: string;
  readonly resolution?: string;
  readonly resolved_at?: string;
  readonly tags: readonly string[];
  readonly updates: readonly ComplaintUpdateEntry[];
}

export interface PerformanceSnapshot {
  readonly timestamp: string;
  readonly response_time_avg: number;
  readonly response_time_p95: number;
  readonly throughput: number;
  readonly error_rate: number;
  readonly availability: number;
  readonly active_users: number;
  readonly system: Readonly<Record<string, number>>;
}

export interface Interaction {
  readonly interaction_id: InteractionId;
  readonly timestamp: string;
  readonly user_id?: string;
  readonly prompt: string;
  readonly response: string;
  readonly response_time: number;
  readonly model_version: string;
  readonly metadata: OpenMap;
  readonly demographics?: OpenMap;
}

export interface Feedback {
  readonly feedback_id: FeedbackId;
  readonly interaction_id: string;
  readonly user_id?: string;
  readonly timestamp: string;
  readonly rating: number;
  readonly comment?: string;
  readonly issues: readonly string[];
}

export interface HealthScore {
  readonly score: number;
  readonly status: HealthStatus;
}

export interface MetricSummary {
  readonly count: number;
  readonly avg: number;
  readonly min: number;
  readonly max: number;
  readonly std: number;
}

export interface IncidentsSummary {
  readonly total_alerts: number;
  readonly by_severity: Readonly<Partial<Record<Severity, number>>>;
  readonly by_type: Readonly<Record<string, number>>;
  readonly critical_count: number;
  readonly high_count: number;
}

export interface RequirementStatus {
  readonly requirement: string;
  readonly status: 'compliant' | 'non_compliant';
  readonly last_verified: string;
}

export interface ComplianceStatus {
  readonly overall_status: 'compliant' | 'non_compliant';
  readonly requirements: Readonly<Record<string, RequirementStatus>>;
  readonly next_audit_due: string;
}

export interface RegulatoryReport {
  readonly report_id: ReportId;
  readonly created_at: string;
  readonly report_type: ReportType;
  readonly period_start: string;
  readonly period_end: string;
  readonly status: ReportStatus;
  readonly title: string;
  readonly summary: string;
  readonly metrics_summary: Readonly<Record<string, MetricSummary>>;
  readonly incidents_summary: IncidentsSummary;
  readonly compliance_status: ComplianceStatus;
  readonly recommendations: readonly string[];
}

export interface TimeRange {
  readonly from: number;
  readonly to: number;
}

export const isResolvedStatus = (status: ComplaintStatus): boolean => status === 'resolved' || status === 'closed';

export const isOpenStatus = (status: ComplaintStatus): boolean =>
  status === 'open' || status === 'in_progress' || status === 'under_review';

export const inRange = (at: number, range: TimeRange): boolean => at >= range.from && at <= range.to;
