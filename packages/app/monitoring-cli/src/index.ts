#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import { analyzeTrend, evaluateSla, round } from '@domain/post-market-monitoring';
import { readMonitoringConfig } from '@platform/config';
import { Logger, PinoSink } from '@platform/logging';
import {
  bootstrapMonitoringContext,
  capturePerformance,
  flushNotifications,
  recordMetric,
  runDetectionPass,
  type MonitoringContext,
} from '@service/post-market-monitor';
import { HOUR_MS, systemClock, type Clock } from '@shared/core';
import { AppError, toAppError } from '@shared/errors';
import { fail, ok, type Result } from '@shared/result';
import { createValidator } from '@shared/validation';

export interface CliIo {
  readonly write: (text: string) => void;
  readonly env?: Record<string, string | undefined>;
  readonly cwd?: string;
  readonly logger?: Logger;
}

const defaultIo: CliIo = {
  write: (text) => {
    process.stdout.write(`${text}\n`);
  },
};

const usage = 'usage: monitoring-cli <detect|trends|sla> <file.json>';

const recordsFile = createValidator(z.array(z.unknown()), 'records file');

const readRecords = async (path: string): Promise<Result<unknown[], AppError>> => {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    return fail(new AppError('validation_failed', `cannot read ${path}`, { cause: toAppError(error).message }));
  }
  try {
    return recordsFile.parse(JSON.parse(text));
  } catch (error) {
    return fail(new AppError('validation_failed', `${path} is not valid JSON`, { cause: toAppError(error).message }));
  }
};

const stampedRecord = z.object({ timestamp: z.string().datetime({ offset: true }) });

/** Pins "now" to the newest timestamp in the file so lookbacks cover the replayed records. */
const replayClock = (records: readonly unknown[]): Clock => {
  const newest = records.reduce<number>((latest, record) => {
    const stamped = stampedRecord.safeParse(record);
    return stamped.success ? Math.max(latest, Date.parse(stamped.data.timestamp)) : latest;
  }, Number.NEGATIVE_INFINITY);
  return Number.isFinite(newest) ? () => newest : systemClock;
};

const ingestEach = async (
  records: readonly unknown[],
  ingest: (record: unknown) => Promise<Result<unknown, AppError>>,
): Promise<Result<number, AppError>> => {
  for (const [index, record] of records.entries()) {
    const outcome = await ingest(record);
    if (!outcome.ok) {
      return fail(new AppError('validation_failed', `record ${index}: ${outcome.error.message}`, outcome.error.details));
    }
  }
  return ok(records.length);
};

type Command = (context: MonitoringContext, records: readonly unknown[]) => Promise<Result<unknown, AppError>>;

const commands: Readonly<Record<string, Command>> = {
  detect: async (context, records) => {
    const ingested = await ingestEach(records, (record) => recordMetric(context, record));
    if (!ingested.ok) return ingested;
    const pass = await runDetectionPass(context);
    return ok(pass.signals);
  },
  trends: async (context, records) => {
    const ingested = await ingestEach(records, (record) => recordMetric(context, record));
    if (!ingested.ok) return ingested;
    return ok(context.metrics.metricNames().map((name) => analyzeTrend(name, context.metrics.all(name))));
  },
  sla: async (context, records) => {
    const ingested = await ingestEach(records, (record) => capturePerformance(context, record));
    if (!ingested.ok) return ingested;
    const snapshots = context.logs.snapshots.all();
    const first = snapshots[0];
    const last = snapshots[snapshots.length - 1];
    const periodHours = first && last ? round((Date.parse(last.timestamp) - Date.parse(first.timestamp)) / HOUR_MS, 2) : 0;
    return ok(evaluateSla(snapshots, periodHours));
  },
};

export const bootstrap = async (argv: string[], io: CliIo = defaultIo): Promise<number> => {
  const env = io.env ?? process.env;
  const configured = readMonitoringConfig(env);
  const logger = io.logger ?? new Logger(undefined, [
    new PinoSink({ level: configured.ok ? configured.value.logLevel : 'info', destination: process.stderr }),
  ]);
  const cli = logger.child('cli');

  if (!configured.ok) {
    cli.error('invalid configuration', configured.error);
    return 1;
  }

  const args = argv.slice(2).filter((arg) => arg !== '--run-cli');
  const [name, file] = args;
  const command = name !== undefined && Object.hasOwn(commands, name) ? commands[name] : undefined;
  if (!command || !file) {
    cli.error(usage);
    return 1;
  }

  const path = resolve(io.cwd ?? process.cwd(), file);
  const records = await readRecords(path);
  if (!records.ok) {
    cli.error('cannot load input', records.error);
    return 1;
  }

  const context = await bootstrapMonitoringContext(configured.value, { logger, clock: replayClock(records.value) });
  if (!context.ok) {
    cli.error('cannot build monitoring context', context.error);
    return 1;
  }

  const output = await command(context.value, records.value);
  await flushNotifications(context.value);
  if (!output.ok) {
    cli.error(`${name} failed`, output.error);
    return 1;
  }

  io.write(JSON.stringify(output.value, null, 2));
  return 0;
};

if (typeof process !== 'undefined' && process.argv.includes('--run-cli')) {
  bootstrap(process.argv)
    .then((code) => {
      process.exitCode = code;
    })
    .catch(() => process.exit(1));
}
