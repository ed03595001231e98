import { describe, expect, it } from 'vitest';
import { loadMonitoringConfig, readMonitoringConfig } from '../src';

describe('readMonitoringConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const result = readMonitoringConfig({});
    expect(result).toEqual({
      ok: true,
      value: {
        environment: 'development',
        logLevel: 'info',
        retentionHours: 168,
        detectionWindow: 50,
        detectionIntervalMs: 60_000,
        detectionLookbackHours: 24,
        metricBandsFile: undefined,
        notifier: { region: undefined, alertTopicArn: undefined, signalTopicArn: undefined },
      },
    });
  });

  it('coerces numbers and trims optional strings', () => {
    const result = readMonitoringConfig({
      NODE_ENV: 'production',
      LOG_LEVEL: 'warn',
      PMM_RETENTION_HOURS: '24',
      PMM_DETECTION_WINDOW: '20',
      PMM_DETECTION_LOOKBACK_HOURS: '6',
      AWS_REGION: ' eu-west-1 ',
      PMM_ALERT_TOPIC_ARN: '   ',
      PMM_METRIC_BANDS_FILE: 'bands.json',
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.environment).toBe('production');
    expect(result.value.logLevel).toBe('warn');
    expect(result.value.retentionHours).toBe(24);
    expect(result.value.detectionWindow).toBe(20);
    expect(result.value.detectionLookbackHours).toBe(6);
    expect(result.value.metricBandsFile).toBe('bands.json');
    expect(result.value.notifier).toEqual({ region: 'eu-west-1', alertTopicArn: undefined, signalTopicArn: undefined });
  });

  it('rejects values outside their range', () => {
    const result = readMonitoringConfig({ LOG_LEVEL: 'verbose', PMM_DETECTION_WINDOW: '2' });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('validation_failed');
    expect(result.error.issues.map((issue) => issue.path)).toEqual(['LOG_LEVEL', 'PMM_DETECTION_WINDOW']);
  });
});

describe('loadMonitoringConfig', () => {
  it('throws the validation error', () => {
    expect(() => loadMonitoringConfig({ PMM_RETENTION_HOURS: '-1' })).toThrow(/invalid environment: PMM_RETENTION_HOURS/);
  });
});
