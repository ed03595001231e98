import type { Alert, HealthScore, HealthStatus, Severity, Signal } from './models';
import { clamp } from './statistics';

export const signalDeductions: Readonly<Record<Severity, number>> = {
  critical: 15,
  high: 10,
  medium: 5,
  low: 5,
};

export const alertDeductions: Readonly<Record<Severity, number>> = {
  critical: 20,
  high: 10,
  medium: 0,
  low: 0,
};

/**
 * Policy constant. Ordered from the highest floor down; a score maps to the
 * first row whose floor it reaches.
 */
export const healthBreakpoints: readonly { readonly floor: number; readonly status: HealthStatus }[] = [
  { floor: 90, status: 'healthy' },
  { floor: 70, status: 'warning' },
  { floor: 50, status: 'degraded' },
  { floor: 0, status: 'critical' },
];

export const healthStatusFor = (score: number): HealthStatus => {
  for (const row of healthBreakpoints) {
    if (score >= row.floor) return row.status;
  }
  return 'critical';
};

export const computeHealthScore = (
  activeSignals: readonly Pick<Signal, 'severity'>[],
  activeAlerts: readonly Pick<Alert, 'severity'>[],
): HealthScore => {
  const signalPenalty = activeSignals.reduce((acc, signal) => acc + signalDeductions[signal.severity], 0);
  const alertPenalty = activeAlerts.reduce((acc, alert) => acc + alertDeductions[alert.severity], 0);
  const score = clamp(100 - signalPenalty - alertPenalty, 0, 100);
  return { score, status: healthStatusFor(score) };
};
