import type { MetricBand, MetricBands } from './models';

export const defaultMetricBands: MetricBands = {
  response_accuracy: { target: 0.95, alert_threshold: 0.9, critical_threshold: 0.85, direction: 'higher-is-better' },
  hallucination_rate: { target: 0.02, alert_threshold: 0.05, critical_threshold: 0.1, direction: 'lower-is-better' },
  privacy_incidents: { target: 0, alert_threshold: 0, critical_threshold: 2, direction: 'lower-is-better' },
  user_satisfaction: { target: 4, alert_threshold: 3.5, critical_threshold: 3, direction: 'higher-is-better' },
  prompt_injection_attempts: { target: 0, alert_threshold: 5, critical_threshold: 10, direction: 'lower-is-better' },
  citation_accuracy: { target: 0.95, alert_threshold: 0.9, critical_threshold: 0.8, direction: 'higher-is-better' },
  response_time: { target: 1, alert_threshold: 2, critical_threshold: 5, direction: 'lower-is-better' },
};

export const mergeMetricBands = (base: MetricBands, overrides: MetricBands): MetricBands => ({ ...base, ...overrides });

export const bandFor = (bands: MetricBands, metricName: string): MetricBand | undefined =>
  Object.prototype.hasOwnProperty.call(bands, metricName) ? bands[metricName] : undefined;
