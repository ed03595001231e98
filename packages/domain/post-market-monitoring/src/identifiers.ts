import { withBrand, type Brand } from '@shared/core';
import type { AlertId, ComplaintId, FeedbackId, InteractionId, ReportId, SignalId } from './models';

export type IdFactory<TId> = () => TId;

/**
 * Issues `PREFIX-000001`, `PREFIX-000002`, ... in call order. Zero padding keeps
 * lexical and numeric order identical up to a million ids per prefix.
 */
export const createSequence = <TTag extends string>(prefix: string, tag: TTag, start = 0): IdFactory<Brand<string, TTag>> => {
  let current = start;
  return () => {
    current += 1;
    return withBrand(`${prefix}-${String(current).padStart(6, '0')}`, tag);
  };
};

export const sequenceNumber = (id: string): number => {
  const raw = id.slice(id.lastIndexOf('-') + 1);
  const parsed = Number(raw);
  return Number.isInteger(parsed) ? parsed : -1;
};

export interface IdFactories {
  readonly signal: IdFactory<SignalId>;
  readonly alert: IdFactory<AlertId>;
  readonly complaint: IdFactory<ComplaintId>;
  readonly feedback: IdFactory<FeedbackId>;
  readonly report: IdFactory<ReportId>;
}

export const createIdFactories = (): IdFactories => ({
  signal: createSequence('SIG', 'SignalId'),
  alert: createSequence('ALT', 'AlertId'),
  complaint: createSequence('CMP', 'ComplaintId'),
  feedback: createSequence('FB', 'FeedbackId'),
  report: createSequence('REG', 'ReportId'),
});

export const withSignalId = (value: string): SignalId => withBrand(value, 'SignalId');
export const withAlertId = (value: string): AlertId => withBrand(value, 'AlertId');
export const withComplaintId = (value: string): ComplaintId => withBrand(value, 'ComplaintId');
export const withReportId = (value: string): ReportId => withBrand(value, 'ReportId');
export const withInteractionId = (value: string): InteractionId => withBrand(value, 'InteractionId');
