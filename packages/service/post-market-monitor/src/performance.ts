import {
  describeSnapshot,
  evaluateSla,
  type PerformanceSnapshot,
  type RealtimePerformance,
  type SlaStatus,
} from '@domain/post-market-monitoring';
import { HOUR_MS } from '@shared/core';
import type { MonitoringContext } from './context';

export const DEFAULT_SLA_HOURS = 24;

export const realtimePerformance = (context: MonitoringContext): RealtimePerformance | undefined => {
  const latest = context.logs.snapshots.latest();
  return latest ? describeSnapshot(latest) : undefined;
};

export const performanceHistory = (context: MonitoringContext, hours = DEFAULT_SLA_HOURS): readonly PerformanceSnapshot[] =>
  context.logs.snapshots.window(hours * HOUR_MS);

export const slaStatus = (context: MonitoringContext, hours = DEFAULT_SLA_HOURS): SlaStatus =>
  evaluateSla(performanceHistory(context, hours), hours);
