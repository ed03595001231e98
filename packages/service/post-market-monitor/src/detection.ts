import type { Signal } from '@domain/post-market-monitoring';
import { HOUR_MS, toIso } from '@shared/core';
import type { MonitoringContext } from './context';
import { dispatchSignal } from './notifications';

export interface DetectionPass {
  readonly startedAt: string;
  readonly metricsScanned: number;
  readonly signals: readonly Signal[];
}

/**
 * Runs every detection rule over the metric's most recent `detectionWindow`
 * points, skipping any stamped more than `detectionLookbackHours` before now.
 */
export const detectMetric = async (context: MonitoringContext, metricName: string): Promise<Signal[]> => {
  const { detectionWindow, detectionLookbackHours } = context.config;
  const points = context.metrics.recentWithin(metricName, detectionWindow, detectionLookbackHours * HOUR_MS);
  const signals = context.detector.detect(metricName, points);
  await context.signals.saveMany(signals);
  for (const signal of signals) {
    dispatchSignal(context, signal);
  }
  return signals;
};

export const runDetectionPass = async (
  context: MonitoringContext,
  metricNames: readonly string[] = context.metrics.metricNames(),
): Promise<DetectionPass> => {
  const startedAt = toIso(context.clock());
  const signals: Signal[] = [];
  for (const metricName of metricNames) {
    signals.push(...(await detectMetric(context, metricName)));
  }
  context.logger.child('detection').info(`detection pass found ${signals.length} signal(s)`, {
    metricsScanned: metricNames.length,
    signals: signals.length,
  });
  return { startedAt, metricsScanned: metricNames.length, signals };
};
