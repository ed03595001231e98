import type { PerformanceSnapshot } from './models';
import { mean, round } from './statistics';

export type SlaDimension = 'response_time_avg' | 'response_time_p95' | 'availability' | 'error_rate' | 'throughput';

type Comparator = 'below' | 'at_most' | 'at_least';

export interface SlaTarget {
  readonly dimension: SlaDimension;
  readonly target: number;
  readonly comparator: Comparator;
  readonly unit: string;
}

export const slaTargets: readonly SlaTarget[] = [
  { dimension: 'response_time_avg', target: 200, comparator: 'below', unit: 'ms' },
  { dimension: 'response_time_p95', target: 500, comparator: 'below', unit: 'ms' },
  { dimension: 'availability', target: 99.9, comparator: 'at_least', unit: '%' },
  { dimension: 'error_rate', target: 1.0, comparator: 'at_most', unit: '%' },
  { dimension: 'throughput', target: 100, comparator: 'at_least', unit: 'req/s' },
];

const satisfies: Readonly<Record<Comparator, (actual: number, target: number) => boolean>> = {
  below: (actual, target) => actual < target,
  at_most: (actual, target) => actual <= target,
  at_least: (actual, target) => actual >= target,
};

export const meetsTarget = (target: SlaTarget, actual: number): boolean => satisfies[target.comparator](actual, target.target);

export interface SlaMetric {
  readonly value: number;
  readonly target: number;
  readonly unit: string;
  readonly compliant: boolean;
}

export interface SlaBreach {
  readonly dimension: SlaDimension;
  readonly actual: number;
  readonly target: number;
}

export type SlaStatus =
  | {
      readonly status: 'compliant' | 'breach';
      readonly period_hours: number;
      readonly samples: number;
      readonly metrics: Readonly<Partial<Record<SlaDimension, SlaMetric>>>;
      readonly breaches: readonly SlaBreach[];
    }
  | { readonly status: 'no_data'; readonly period_hours: number; readonly samples: 0 };

/** Compares the period mean of each dimension against its fixed target. */
export const evaluateSla = (
  snapshots: readonly PerformanceSnapshot[],
  periodHours: number,
  targets: readonly SlaTarget[] = slaTargets,
): SlaStatus => {
  if (snapshots.length === 0) {
    return { status: 'no_data', period_hours: periodHours, samples: 0 };
  }

  const metrics: Partial<Record<SlaDimension, SlaMetric>> = {};
  const breaches: SlaBreach[] = [];
  for (const target of targets) {
    const actual = mean(snapshots.map((snapshot) => snapshot[target.dimension]));
    const compliant = meetsTarget(target, actual);
    metrics[target.dimension] = { value: round(actual, 3), target: target.target, unit: target.unit, compliant };
    if (!compliant) {
      breaches.push({ dimension: target.dimension, actual: round(actual, 3), target: target.target });
    }
  }

  return {
    status: breaches.length === 0 ? 'compliant' : 'breach',
    period_hours: periodHours,
    samples: snapshots.length,
    metrics,
    breaches,
  };
};

export interface RealtimeDimension {
  readonly value: number;
  readonly sla_status: 'ok' | 'breach';
}

export interface RealtimePerformance {
  readonly timestamp: string;
  readonly dimensions: Readonly<Partial<Record<SlaDimension, RealtimeDimension>>>;
  readonly active_users: number;
  readonly system: Readonly<Record<string, number>>;
}

export const describeSnapshot = (
  snapshot: PerformanceSnapshot,
  targets: readonly SlaTarget[] = slaTargets,
): RealtimePerformance => {
  const dimensions: Partial<Record<SlaDimension, RealtimeDimension>> = {};
  for (const target of targets) {
    const value = snapshot[target.dimension];
    dimensions[target.dimension] = { value, sla_status: meetsTarget(target, value) ? 'ok' : 'breach' };
  }
  return {
    timestamp: snapshot.timestamp,
    dimensions,
    active_users: snapshot.active_users,
    system: snapshot.system,
  };
};
