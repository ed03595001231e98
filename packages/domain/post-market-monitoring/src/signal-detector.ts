import type { Clock } from '@shared/core';
import { systemClock, toIso } from '@shared/core';
import type { IdFactory } from './identifiers';
import type { MetricPoint, OpenMap, Severity, Signal, SignalId, SignalType } from './models';
import { clamp01, halfSplit, mean, sampleStdDev } from './statistics';

export interface DetectionThresholds {
  /** z-score above which the latest point is anomalous. */
  readonly anomalyZ: number;
  /** z-score above which an anomaly is reported as high severity. */
  readonly highSeverityZ: number;
  /** Fractional half-over-half change that counts as a trend change. */
  readonly trendChange: number;
  /** Minimum number of points in a strictly declining run. */
  readonly declineRun: number;
}

export const defaultDetectionThresholds: DetectionThresholds = {
  anomalyZ: 2,
  highSeverityZ: 3,
  trendChange: 0.15,
  declineRun: 4,
};

export interface DetectionWindow {
  readonly metricName: string;
  readonly points: readonly MetricPoint[];
  readonly values: readonly number[];
  readonly thresholds: DetectionThresholds;
}

export interface SignalCandidate {
  readonly type: SignalType;
  readonly severity: Severity;
  readonly detected_value: number;
  readonly expected_value: number;
  readonly deviation_pct: number;
  readonly confidence: number;
  readonly description: string;
  readonly context: OpenMap;
}

export interface SignalRule {
  readonly type: SignalType;
  detect(window: DetectionWindow): SignalCandidate | undefined;
}

const fixed = (value: number): string => value.toFixed(4);

const percentOf = (value: number, base: number): number => (base === 0 ? 0 : ((value - base) / base) * 100);

export const anomalyRule: SignalRule = {
  type: 'anomaly',
  detect: ({ metricName, values, thresholds }) => {
    if (values.length < 3) return undefined;

    const latest = values[values.length - 1];
    const history = values.slice(0, -1);
    const expected = mean(history);
    const sigma = sampleStdDev(history);
    if (sigma === 0) return undefined;

    const z = Math.abs(latest - expected) / sigma;
    if (z <= thresholds.anomalyZ) return undefined;

    return {
      type: 'anomaly',
      severity: z > thresholds.highSeverityZ ? 'high' : 'medium',
      detected_value: latest,
      expected_value: expected,
      deviation_pct: percentOf(latest, expected),
      confidence: Math.min(1, z / 4),
      description: `Anomaly detected: ${metricName} = ${fixed(latest)} (expected ~${fixed(expected)}, z-score: ${z.toFixed(2)})`,
      context: { z_score: z, std: sigma, window_size: values.length },
    };
  },
};

export const trendChangeRule: SignalRule = {
  type: 'trend_change',
  detect: ({ metricName, values, thresholds }) => {
    const split = halfSplit(values);
    if (!split || split.change === undefined) return undefined;
    if (Math.abs(split.change) <= thresholds.trendChange) return undefined;

    const direction = split.change > 0 ? 'increasing' : 'decreasing';
    const percent = split.change * 100;
    return {
      type: 'trend_change',
      severity: 'medium',
      detected_value: split.laterMean,
      expected_value: split.earlierMean,
      deviation_pct: percent,
      confidence: Math.min(1, Math.abs(split.change) / 0.5),
      description: `Trend change detected: ${metricName} is ${direction} (${percent >= 0 ? '+' : ''}${percent.toFixed(1)}% change)`,
      context: { direction, window_size: values.length },
    };
  },
};

interface DeclineRun {
  readonly start: number;
  readonly length: number;
}

/** The last maximal run of strictly decreasing points that is at least `minLength` long. */
export const findDeclineRun = (values: readonly number[], minLength: number): DeclineRun | undefined => {
  let found: DeclineRun | undefined;
  let start = 0;
  for (let index = 1; index <= values.length; index += 1) {
    const continues = index < values.length && values[index] < values[index - 1];
    if (continues) continue;
    const length = index - start;
    if (length >= minLength) {
      found = { start, length };
    }
    start = index;
  }
  return found;
};

export const patternRule: SignalRule = {
  type: 'pattern_detected',
  detect: ({ metricName, values, thresholds }) => {
    if (values.length < thresholds.declineRun) return undefined;
    const run = findDeclineRun(values, thresholds.declineRun);
    if (!run) return undefined;

    const first = values[run.start];
    const last = values[run.start + run.length - 1];
    return {
      type: 'pattern_detected',
      severity: 'medium',
      detected_value: last,
      expected_value: first,
      deviation_pct: percentOf(last, first),
      confidence: clamp01(run.length / 8),
      description: `Pattern detected: ${metricName} showing consecutive decline (${run.length - 1} drops over ${run.length} readings)`,
      context: { pattern: 'consecutive_decline', run_length: run.length, run_start_index: run.start },
    };
  },
};

/** No algorithm is defined for threshold breaches yet; alerts cover that case. */
export const thresholdBreachRule: SignalRule = {
  type: 'threshold_breach',
  detect: () => undefined,
};

/** No algorithm is defined for distribution drift yet. */
export const driftRule: SignalRule = {
  type: 'drift_detected',
  detect: () => undefined,
};

export const defaultSignalRules: readonly SignalRule[] = [
  anomalyRule,
  trendChangeRule,
  patternRule,
  thresholdBreachRule,
  driftRule,
];

export interface SignalDetectorOptions {
  readonly nextId: IdFactory<SignalId>;
  readonly rules?: readonly SignalRule[];
  readonly thresholds?: Partial<DetectionThresholds>;
  readonly clock?: Clock;
}

export class SignalDetector {
  private readonly rules: readonly SignalRule[];
  private readonly thresholds: DetectionThresholds;
  private readonly nextId: IdFactory<SignalId>;
  private readonly clock: Clock;

  constructor(options: SignalDetectorOptions) {
    this.rules = options.rules ?? defaultSignalRules;
    this.thresholds = { ...defaultDetectionThresholds, ...options.thresholds };
    this.nextId = options.nextId;
    this.clock = options.clock ?? systemClock;
  }

  /** Every rule runs independently; none suppresses another. */
  detect(metricName: string, points: readonly MetricPoint[]): Signal[] {
    const window: DetectionWindow = {
      metricName,
      points,
      values: points.map((point) => point.value),
      thresholds: this.thresholds,
    };
    const timestamp = toIso(this.clock());

    const signals: Signal[] = [];
    for (const rule of this.rules) {
      const candidate = rule.detect(window);
      if (!candidate) continue;
      signals.push({
        ...candidate,
        signal_id: this.nextId(),
        timestamp,
        metric_name: metricName,
        status: 'active',
      });
    }
    return signals;
  }

  ruleTypes(): readonly SignalType[] {
    return this.rules.map((rule) => rule.type);
  }
}
