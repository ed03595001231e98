import type { Feedback, Interaction, PerformanceSnapshot } from '@domain/post-market-monitoring';
import { TimeSeriesBuffer, type TimeSeriesBufferOptions } from './time-series-buffer';

export type SnapshotLog = TimeSeriesBuffer<PerformanceSnapshot>;
export type InteractionLog = TimeSeriesBuffer<Interaction>;
export type FeedbackLog = TimeSeriesBuffer<Feedback>;

export interface RecordLogs {
  readonly snapshots: SnapshotLog;
  readonly interactions: InteractionLog;
  readonly feedback: FeedbackLog;
}

export const createRecordLogs = (options: TimeSeriesBufferOptions): RecordLogs => ({
  snapshots: new TimeSeriesBuffer<PerformanceSnapshot>(options),
  interactions: new TimeSeriesBuffer<Interaction>(options),
  feedback: new TimeSeriesBuffer<Feedback>(options),
});
