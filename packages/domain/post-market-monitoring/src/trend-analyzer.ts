import type { Forecast, MetricPoint, TrendAnalysis, TrendDirection, TrendReport } from './models';
import { clamp01, fitLinear, halfSplit, mean, predict, sampleStdDev } from './statistics';

/** Half-over-half change at or below this fraction reads as stable. */
export const STABLE_BAND = 0.15;

const EPSILON = 1e-9;

export interface TrendClassification {
  readonly direction: TrendDirection;
  readonly strength: number;
}

export const classifyTrend = (values: readonly number[], stableBand = STABLE_BAND): TrendClassification => {
  const split = halfSplit(values);
  if (!split || split.change === undefined) {
    return { direction: 'stable', strength: 0 };
  }
  const magnitude = Math.abs(split.change);
  const strength = Math.min(1, magnitude);
  if (magnitude <= stableBand) {
    return { direction: 'stable', strength };
  }
  return { direction: split.change > 0 ? 'increasing' : 'decreasing', strength };
};

/**
 * Confidence grows with the number of points and shrinks as the residuals
 * around the fitted line grow relative to the series level.
 */
export const forecastConfidence = (dataPoints: number, residualVariance: number, level: number): number => {
  if (dataPoints < 2) return 0;
  const sizeFactor = 1 - 1 / dataPoints;
  const noise = residualVariance / (level * level + EPSILON);
  return clamp01(sizeFactor / (1 + noise));
};

export const forecast = (values: readonly number[]): Forecast => {
  const fit = fitLinear(values);
  const lastIndex = values.length - 1;
  return {
    next_value: predict(fit, lastIndex + 1),
    next_3: predict(fit, lastIndex + 3),
    confidence: forecastConfidence(values.length, fit.residualVariance, mean(values)),
  };
};

export const analyzeTrend = (metricName: string, points: readonly MetricPoint[]): TrendReport => {
  if (points.length < 2) {
    return { metric_name: metricName, status: 'insufficient_data', data_points: points.length };
  }

  const values = points.map((point) => point.value);
  const trend = classifyTrend(values);
  const analysis: TrendAnalysis = {
    metric_name: metricName,
    status: 'ok',
    current_value: values[values.length - 1],
    mean: mean(values),
    std: sampleStdDev(values),
    min: values.reduce((low, value) => Math.min(low, value), Infinity),
    max: values.reduce((high, value) => Math.max(high, value), -Infinity),
    trend_direction: trend.direction,
    trend_strength: trend.strength,
    data_points: values.length,
    forecast: forecast(values),
  };
  return analysis;
};

export const isTrendAnalysis = (report: TrendReport): report is TrendAnalysis => report.status === 'ok';
