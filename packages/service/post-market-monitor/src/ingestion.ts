import {
  bandFor,
  evaluateThreshold,
  feedbackMetrics,
  interactionMetrics,
  validateFeedback,
  validateInteraction,
  validateMetricPoint,
  validatePerformanceSnapshot,
  withInteractionId,
  type Alert,
  type Feedback,
  type Interaction,
  type MetricPoint,
  type PerformanceSnapshot,
  type Signal,
} from '@domain/post-market-monitoring';
import { toIso } from '@shared/core';
import type { ValidationError } from '@shared/errors';
import { ok, type Result } from '@shared/result';
import type { MonitoringContext } from './context';
import { detectMetric } from './detection';
import { dispatchAlert } from './notifications';

export interface IngestOptions {
  /** Runs a detection pass over every touched metric before returning. */
  readonly detect?: boolean;
}

export interface IngestionOutcome<TRecord> {
  readonly record: TRecord;
  readonly metrics: readonly MetricPoint[];
  readonly alerts: readonly Alert[];
  /** Active alerts closed because a newer point no longer breaches. */
  readonly cleared: readonly Alert[];
  /** Points dropped for being older than the retention horizon. */
  readonly expired: readonly MetricPoint[];
  readonly signals: readonly Signal[];
}

interface PointsOutcome {
  readonly metrics: MetricPoint[];
  readonly alerts: Alert[];
  readonly cleared: Alert[];
  readonly expired: MetricPoint[];
  readonly signals: Signal[];
}

/**
 * Appends each point, raises an alert for a breached band and clears the
 * metric's active alerts when the new tail point is back within its band.
 */
export const ingestPoints = async (
  context: MonitoringContext,
  points: readonly MetricPoint[],
  options: IngestOptions = {},
): Promise<PointsOutcome> => {
  const logger = context.logger.child('ingestion');
  const outcome: PointsOutcome = { metrics: [], alerts: [], cleared: [], expired: [], signals: [] };

  for (const candidate of points) {
    const appended = context.metrics.append(candidate.metric_name, candidate.value, candidate.timestamp);
    if (appended.outcome === 'expired') {
      logger.debug('point older than retention dropped', { metricName: candidate.metric_name, timestamp: candidate.timestamp });
      outcome.expired.push(appended.point);
      continue;
    }
    outcome.metrics.push(appended.point);

    const band = bandFor(context.bands, appended.point.metric_name);
    if (!band) continue;

    const alert = evaluateThreshold(appended.point, band, context.ids.alert);
    if (alert) {
      await context.alerts.save(alert);
      outcome.alerts.push(alert);
      logger.warn(`threshold breached: ${alert.metric_name} = ${alert.current_value}`, {
        alertId: alert.alert_id,
        metricName: alert.metric_name,
        severity: alert.severity,
        threshold: alert.threshold,
      });
      dispatchAlert(context, alert);
    } else if (appended.outcome === 'appended') {
      const cleared = await context.alerts.clearForMetric(appended.point.metric_name, context.clock());
      outcome.cleared.push(...cleared);
    }
  }

  if (options.detect) {
    const touched = [...new Set(outcome.metrics.map((point) => point.metric_name))];
    for (const metricName of touched) {
      outcome.signals.push(...(await detectMetric(context, metricName)));
    }
  }

  return outcome;
};

const stamped = (context: MonitoringContext, timestamp: string | undefined): string => timestamp ?? toIso(context.clock());

export const recordMetric = async (
  context: MonitoringContext,
  input: unknown,
  options: IngestOptions = {},
): Promise<Result<IngestionOutcome<MetricPoint>, ValidationError>> => {
  const parsed = validateMetricPoint.parse(input);
  if (!parsed.ok) return parsed;

  const point: MetricPoint = {
    metric_name: parsed.value.metric_name,
    value: parsed.value.value,
    timestamp: stamped(context, parsed.value.timestamp),
  };
  const outcome = await ingestPoints(context, [point], options);
  return ok({ record: outcome.metrics[0] ?? point, ...outcome });
};

export const logInteraction = async (
  context: MonitoringContext,
  input: unknown,
  options: IngestOptions = {},
): Promise<Result<IngestionOutcome<Interaction>, ValidationError>> => {
  const parsed = validateInteraction.parse(input);
  if (!parsed.ok) return parsed;

  const { timestamp, interaction_id, ...rest } = parsed.value;
  const interaction: Interaction = Object.freeze({
    ...rest,
    interaction_id: withInteractionId(interaction_id),
    timestamp: stamped(context, timestamp),
  });
  context.logs.interactions.append(interaction);

  const outcome = await ingestPoints(context, interactionMetrics(interaction), options);
  return ok({ record: interaction, ...outcome });
};

export const submitFeedback = async (
  context: MonitoringContext,
  input: unknown,
  options: IngestOptions = {},
): Promise<Result<IngestionOutcome<Feedback>, ValidationError>> => {
  const parsed = validateFeedback.parse(input);
  if (!parsed.ok) return parsed;

  const { timestamp, ...rest } = parsed.value;
  const feedback: Feedback = Object.freeze({
    ...rest,
    feedback_id: context.ids.feedback(),
    timestamp: stamped(context, timestamp),
  });
  context.logs.feedback.append(feedback);

  const outcome = await ingestPoints(context, feedbackMetrics(feedback), options);
  return ok({ record: feedback, ...outcome });
};

export const capturePerformance = async (
  context: MonitoringContext,
  input: unknown,
): Promise<Result<PerformanceSnapshot, ValidationError>> => {
  const parsed = validatePerformanceSnapshot.parse(input);
  if (!parsed.ok) return parsed;

  const snapshot: PerformanceSnapshot = Object.freeze({
    ...parsed.value,
    timestamp: stamped(context, parsed.value.timestamp),
  });
  const stored = context.logs.snapshots.append(snapshot);
  if (stored === 'expired') {
    context.logger.child('ingestion').debug('performance snapshot older than retention dropped', { timestamp: snapshot.timestamp });
  }
  return ok(snapshot);
};
