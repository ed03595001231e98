import type { IdFactory } from './identifiers';
import type { Alert, AlertId, BandDirection, MetricBand, MetricPoint, Severity } from './models';

type Breach = (value: number, threshold: number) => boolean;

const breaches: Readonly<Record<BandDirection, Breach>> = {
  'lower-is-better': (value, threshold) => value > threshold,
  'higher-is-better': (value, threshold) => value < threshold,
};

interface SeverityRow {
  readonly severity: Severity;
  readonly threshold: (band: MetricBand) => number;
}

/** Checked top to bottom; the first breached row wins. */
const severityTable: readonly SeverityRow[] = [
  { severity: 'critical', threshold: (band) => band.critical_threshold },
  { severity: 'high', threshold: (band) => band.alert_threshold },
];

export interface ThresholdBreach {
  readonly severity: Severity;
  readonly threshold: number;
}

export const classifyBreach = (value: number, band: MetricBand): ThresholdBreach | undefined => {
  const breached = breaches[band.direction];
  for (const row of severityTable) {
    const threshold = row.threshold(band);
    if (breached(value, threshold)) {
      return { severity: row.severity, threshold };
    }
  }
  return undefined;
};

export const alertTypeFor = (metricName: string): string => `threshold_${metricName}`;

/**
 * At most one alert per call. Repeated breaches of the same metric produce one
 * alert each; deduplication is left to the caller.
 */
export const evaluateThreshold = (
  point: MetricPoint,
  band: MetricBand,
  nextId: IdFactory<AlertId>,
): Alert | undefined => {
  const breach = classifyBreach(point.value, band);
  if (!breach) return undefined;

  return {
    alert_id: nextId(),
    timestamp: point.timestamp,
    severity: breach.severity,
    alert_type: alertTypeFor(point.metric_name),
    metric_name: point.metric_name,
    current_value: point.value,
    threshold: breach.threshold,
    details: {
      target: band.target,
      direction: band.direction,
    },
  };
};
