import { z } from 'zod';
import { createValidator } from '@shared/validation';
import { mapResult, type Result } from '@shared/result';
import type { ValidationError } from '@shared/errors';

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const schema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  PMM_RETENTION_HOURS: z.coerce.number().positive().max(24 * 366).default(168),
  PMM_DETECTION_WINDOW: z.coerce.number().int().min(3).max(5000).default(50),
  PMM_DETECTION_INTERVAL_MS: z.coerce.number().int().min(1000).default(60_000),
  PMM_DETECTION_LOOKBACK_HOURS: z.coerce.number().positive().max(24 * 366).default(24),
  PMM_METRIC_BANDS_FILE: optionalString,
  AWS_REGION: optionalString,
  PMM_ALERT_TOPIC_ARN: optionalString,
  PMM_SIGNAL_TOPIC_ARN: optionalString,
});

export type ServiceEnv = z.output<typeof schema>;

export interface MonitoringConfig {
  readonly environment: ServiceEnv['NODE_ENV'];
  readonly logLevel: ServiceEnv['LOG_LEVEL'];
  readonly retentionHours: number;
  readonly detectionWindow: number;
  readonly detectionIntervalMs: number;
  /** Points stamped earlier than this before now are left out of detection. */
  readonly detectionLookbackHours: number;
  readonly metricBandsFile?: string;
  readonly notifier: {
    readonly region?: string;
    readonly alertTopicArn?: string;
    readonly signalTopicArn?: string;
  };
}

export const parseEnv = createValidator(schema, 'environment');

export const toMonitoringConfig = (env: ServiceEnv): MonitoringConfig => ({
  environment: env.NODE_ENV,
  logLevel: env.LOG_LEVEL,
  retentionHours: env.PMM_RETENTION_HOURS,
  detectionWindow: env.PMM_DETECTION_WINDOW,
  detectionIntervalMs: env.PMM_DETECTION_INTERVAL_MS,
  detectionLookbackHours: env.PMM_DETECTION_LOOKBACK_HOURS,
  metricBandsFile: env.PMM_METRIC_BANDS_FILE,
  notifier: {
    region: env.AWS_REGION,
    alertTopicArn: env.PMM_ALERT_TOPIC_ARN,
    signalTopicArn: env.PMM_SIGNAL_TOPIC_ARN,
  },
});

export const readMonitoringConfig = (
  source: Record<string, string | undefined> = process.env,
): Result<MonitoringConfig, ValidationError> => {
  return mapResult(parseEnv.parse(source), toMonitoringConfig);
};

export const loadMonitoringConfig = (source: Record<string, string | undefined> = process.env): MonitoringConfig => {
  const result = readMonitoringConfig(source);
  if (!result.ok) throw result.error;
  return result.value;
};

export const defaultMonitoringConfig = (): MonitoringConfig => loadMonitoringConfig({});
