import { withAlertId, withSignalId } from '../src/identifiers';
import type { Alert, MetricPoint, Severity, Signal } from '../src/models';

export const T0 = Date.parse('2026-03-01T00:00:00.000Z');
export const MINUTE = 60_000;

export const series = (metricName: string, values: readonly number[], start = T0, stepMs = MINUTE): MetricPoint[] =>
  values.map((value, index) => ({
    metric_name: metricName,
    value,
    timestamp: new Date(start + index * stepMs).toISOString(),
  }));

export const makeSignal = (overrides: Partial<Signal> = {}): Signal => ({
  signal_id: withSignalId('SIG-000001'),
  timestamp: new Date(T0).toISOString(),
  type: 'anomaly',
  severity: 'medium',
  metric_name: 'response_accuracy',
  detected_value: 0.8,
  expected_value: 0.93,
  deviation_pct: -14,
  confidence: 0.7,
  description: 'fixture',
  status: 'active',
  context: {},
  ...overrides,
});

export const makeAlert = (severity: Severity, overrides: Partial<Alert> = {}): Alert => ({
  alert_id: withAlertId('ALT-000001'),
  timestamp: new Date(T0).toISOString(),
  severity,
  alert_type: 'threshold_response_accuracy',
  metric_name: 'response_accuracy',
  current_value: 0.8,
  threshold: 0.85,
  details: {},
  ...overrides,
});
