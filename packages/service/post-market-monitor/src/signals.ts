import type { CursorWindow } from '@data/repositories';
import {
  acknowledgeSignal as acknowledge,
  closeSignal,
  resolveAlert as closeAlert,
  validateAcknowledge,
  validateSignalHistoryQuery,
  withAlertId,
  withSignalId,
  type Alert,
  type Signal,
} from '@domain/post-market-monitoring';
import { HOUR_MS } from '@shared/core';
import { NotFoundError, type AppError, type ValidationError } from '@shared/errors';
import { fail, ok, type Result } from '@shared/result';
import type { MonitoringContext } from './context';

export const activeSignals = (context: MonitoringContext): Promise<Signal[]> => context.signals.active();

export const activeAlerts = (context: MonitoringContext): Promise<Alert[]> => context.alerts.active();

/** Filters by status, age in hours and metric; newest first. */
export const signalHistory = async (
  context: MonitoringContext,
  input: unknown = {},
): Promise<Result<CursorWindow<Signal>, ValidationError>> => {
  const parsed = validateSignalHistoryQuery.parse(input);
  if (!parsed.ok) return parsed;

  const query = parsed.value;
  return ok(
    await context.signals.query({
      filter: {
        status: query.status,
        metricName: query.metric_name,
        since: query.hours === undefined ? undefined : context.clock() - query.hours * HOUR_MS,
      },
      limit: query.limit,
    }),
  );
};

export const getSignal = async (context: MonitoringContext, id: string): Promise<Result<Signal, NotFoundError>> => {
  const signal = await context.signals.findById(withSignalId(id));
  return signal ? ok(signal) : fail(new NotFoundError('signal', id));
};

export const acknowledgeSignal = async (
  context: MonitoringContext,
  id: string,
  input: unknown,
): Promise<Result<Signal, AppError>> => {
  const parsed = validateAcknowledge.parse(input);
  if (!parsed.ok) return parsed;

  const at = context.clock();
  const outcome = await context.signals.updateWith(withSignalId(id), (current) =>
    acknowledge(current, parsed.value.acknowledged_by, at),
  );
  if (!outcome) return fail(new NotFoundError('signal', id));
  if (outcome.ok) {
    context.logger.child('signals').info('signal acknowledged', { signalId: id, actor: parsed.value.acknowledged_by });
  }
  return outcome;
};

const closeWith = async (
  context: MonitoringContext,
  id: string,
  status: 'resolved' | 'false_positive',
): Promise<Result<Signal, NotFoundError>> => {
  const at = context.clock();
  const updated = await context.signals.update(withSignalId(id), (current) => closeSignal(current, status, at));
  if (!updated) return fail(new NotFoundError('signal', id));
  context.logger.child('signals').info(`signal marked ${status}`, { signalId: id });
  return ok(updated);
};

export const resolveSignal = (context: MonitoringContext, id: string): Promise<Result<Signal, NotFoundError>> =>
  closeWith(context, id, 'resolved');

export const markFalsePositive = (context: MonitoringContext, id: string): Promise<Result<Signal, NotFoundError>> =>
  closeWith(context, id, 'false_positive');

export const resolveAlert = async (context: MonitoringContext, id: string): Promise<Result<Alert, NotFoundError>> => {
  const at = context.clock();
  const updated = await context.alerts.update(withAlertId(id), (current) => closeAlert(current, at));
  if (!updated) return fail(new NotFoundError('alert', id));
  context.logger.child('alerts').info('alert resolved', { alertId: id });
  return ok(updated);
};
