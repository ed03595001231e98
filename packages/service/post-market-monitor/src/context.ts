import { readFile } from 'node:fs/promises';
import { SNSClient } from '@aws-sdk/client-sns';
import {
  AlertRepository,
  ComplaintRepository,
  MetricSeriesStore,
  ReportRepository,
  SignalRepository,
  createRecordLogs,
  type RecordLogs,
} from '@data/monitoring-store';
import {
  SignalDetector,
  createIdFactories,
  defaultMetricBands,
  mergeMetricBands,
  validateMetricBands,
  type DetectionThresholds,
  type IdFactories,
  type MetricBands,
  type SignalRule,
} from '@domain/post-market-monitoring';
import {
  NullMonitoringNotifier,
  SnsMonitoringNotifier,
  type MonitoringNotifier,
} from '@infrastructure/monitoring-notifier';
import { defaultMonitoringConfig, type MonitoringConfig } from '@platform/config';
import { Logger, PinoSink } from '@platform/logging';
import { HOUR_MS, systemClock, type Clock } from '@shared/core';
import { AppError, toAppError } from '@shared/errors';
import { fail, mapResult, ok, type Result } from '@shared/result';
import { NotificationDeliveries } from './notifications';

/** Owns every piece of mutable monitoring state; services receive it explicitly. */
export interface MonitoringContext {
  readonly config: MonitoringConfig;
  readonly clock: Clock;
  readonly ids: IdFactories;
  readonly bands: MetricBands;
  readonly metrics: MetricSeriesStore;
  readonly logs: RecordLogs;
  readonly signals: SignalRepository;
  readonly alerts: AlertRepository;
  readonly complaints: ComplaintRepository;
  readonly reports: ReportRepository;
  readonly detector: SignalDetector;
  readonly notifier: MonitoringNotifier;
  readonly deliveries: NotificationDeliveries;
  readonly logger: Logger;
}

export interface MonitoringContextOptions {
  readonly config?: MonitoringConfig;
  readonly clock?: Clock;
  /** Merged over the default bands. */
  readonly bands?: MetricBands;
  readonly notifier?: MonitoringNotifier;
  readonly logger?: Logger;
  readonly rules?: readonly SignalRule[];
  readonly thresholds?: Partial<DetectionThresholds>;
  readonly maxPointsPerSeries?: number;
}

export const createNotifier = (config: MonitoringConfig['notifier']): MonitoringNotifier => {
  if (!config.alertTopicArn && !config.signalTopicArn) {
    return new NullMonitoringNotifier();
  }
  return new SnsMonitoringNotifier(new SNSClient({ region: config.region }), {
    alertTopicArn: config.alertTopicArn,
    signalTopicArn: config.signalTopicArn,
  });
};

export const createLogger = (config: MonitoringConfig): Logger =>
  new Logger(undefined, [new PinoSink({ level: config.logLevel })]);

export const createMonitoringContext = (options: MonitoringContextOptions = {}): MonitoringContext => {
  const config = options.config ?? defaultMonitoringConfig();
  const clock = options.clock ?? systemClock;
  const ids = createIdFactories();
  const retentionMs = config.retentionHours * HOUR_MS;

  return {
    config,
    clock,
    ids,
    bands: mergeMetricBands(defaultMetricBands, options.bands ?? {}),
    metrics: new MetricSeriesStore({ retentionMs, maxPointsPerSeries: options.maxPointsPerSeries, clock }),
    logs: createRecordLogs({ retentionMs, clock }),
    signals: new SignalRepository(),
    alerts: new AlertRepository(),
    complaints: new ComplaintRepository(),
    reports: new ReportRepository(),
    detector: new SignalDetector({ nextId: ids.signal, rules: options.rules, thresholds: options.thresholds, clock }),
    notifier: options.notifier ?? createNotifier(config.notifier),
    deliveries: new NotificationDeliveries(),
    logger: options.logger ?? createLogger(config),
  };
};

export const parseMetricBands = (text: string): Result<MetricBands, AppError> => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return fail(new AppError('configuration_invalid', `metric bands are not valid JSON: ${toAppError(error).message}`));
  }
  return mapResult(validateMetricBands.parse(raw), (bands) => mergeMetricBands(defaultMetricBands, bands));
};

/** Reads a bands file and merges it over the defaults. */
export const loadMetricBands = async (file: string): Promise<Result<MetricBands, AppError>> => {
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (error) {
    return fail(new AppError('configuration_invalid', `cannot read metric bands from ${file}`, {
      cause: toAppError(error).message,
    }));
  }
  return parseMetricBands(text);
};

/** Builds a context from configuration, loading the bands file when one is configured. */
export const bootstrapMonitoringContext = async (
  config: MonitoringConfig,
  options: Omit<MonitoringContextOptions, 'config' | 'bands'> = {},
): Promise<Result<MonitoringContext, AppError>> => {
  if (!config.metricBandsFile) {
    return ok(createMonitoringContext({ ...options, config }));
  }
  const bands = await loadMetricBands(config.metricBandsFile);
  return mapResult(bands, (loaded) => createMonitoringContext({ ...options, config, bands: loaded }));
};
