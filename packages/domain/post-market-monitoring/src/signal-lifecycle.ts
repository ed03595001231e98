import { toIso } from '@shared/core';
import { ConflictError } from '@shared/errors';
import { fail, ok, type Result } from '@shared/result';
import type { Alert, Signal, SignalStatus } from './models';

const closedStatuses: readonly SignalStatus[] = ['resolved', 'false_positive'];

export const isClosedSignal = (signal: Pick<Signal, 'status'>): boolean => closedStatuses.includes(signal.status);

export const acknowledgeSignal = (signal: Signal, actor: string, at: number): Result<Signal, ConflictError> => {
  if (isClosedSignal(signal)) {
    return fail(
      new ConflictError(`signal ${signal.signal_id} is ${signal.status} and cannot be acknowledged`, {
        signal_id: signal.signal_id,
        status: signal.status,
      }),
    );
  }
  return ok({ ...signal, status: 'acknowledged', acknowledged_by: actor, acknowledged_at: toIso(at) });
};

/** Resolving twice keeps the first resolution time. */
export const closeSignal = (signal: Signal, status: 'resolved' | 'false_positive', at: number): Signal => ({
  ...signal,
  status,
  resolved_at: signal.resolved_at ?? toIso(at),
});

export const resolveAlert = (alert: Alert, at: number): Alert =>
  alert.resolved_at ? alert : { ...alert, resolved_at: toIso(at) };

export const isActiveAlert = (alert: Pick<Alert, 'resolved_at'>): boolean => alert.resolved_at === undefined;
