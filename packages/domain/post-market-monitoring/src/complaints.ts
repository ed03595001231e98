import { HOUR_MS, toIso } from '@shared/core';
import {
  inRange,
  isOpenStatus,
  isResolvedStatus,
  type Complaint,
  type ComplaintId,
  type ComplaintPriority,
  type ComplaintStatus,
  type ComplaintUpdateEntry,
  type Scalar,
  type TimeRange,
} from './models';
import type { ComplaintInput, ComplaintUpdate } from './schemas';
import { mean } from './statistics';

export const openComplaint = (input: ComplaintInput, id: ComplaintId, now: number): Complaint => ({
  complaint_id: id,
  created_at: toIso(now),
  user_id: input.user_id,
  category: input.category,
  subject: input.subject,
  description: input.description,
  priority: input.priority,
  status: 'open',
  related_interaction_id: input.related_interaction_id,
  tags: [...input.tags],
  updates: [],
});

type TrackedField = 'status' | 'priority' | 'assigned_to' | 'resolution' | 'resolved_at';

const trackedFields: readonly TrackedField[] = ['status', 'priority', 'assigned_to', 'resolution', 'resolved_at'];

const nextStatusFor = (current: Complaint, update: ComplaintUpdate): ComplaintStatus => {
  if (update.status) return update.status;
  if (update.resolution && !isResolvedStatus(current.status)) return 'resolved';
  return current.status;
};

/**
 * Returns the updated complaint with one audit entry appended. `resolved_at` is
 * set on entering resolved/closed (kept if already set) and cleared on leaving.
 */
export const applyComplaintUpdate = (
  current: Complaint,
  update: ComplaintUpdate,
  at: number,
  actor?: string,
): Complaint => {
  const status = nextStatusFor(current, update);
  const priority: ComplaintPriority = update.priority ?? current.priority;
  const resolvedAt = isResolvedStatus(status) ? current.resolved_at ?? toIso(at) : undefined;

  const next: Complaint = {
    ...current,
    status,
    priority,
    assigned_to: update.assigned_to ?? current.assigned_to,
    resolution: update.resolution ?? current.resolution,
    resolved_at: resolvedAt,
  };

  const changes: Record<string, { from: Scalar; to: Scalar }> = {};
  for (const field of trackedFields) {
    const from = current[field] ?? null;
    const to = next[field] ?? null;
    if (from !== to) changes[field] = { from, to };
  }

  const entry: ComplaintUpdateEntry = actor ? { timestamp: toIso(at), actor, changes } : { timestamp: toIso(at), changes };
  return { ...next, updates: [...current.updates, entry] };
};

export interface ResolutionStats {
  readonly resolved_count: number;
  readonly avg_resolution_hours: number | null;
  readonly min_resolution_hours: number | null;
  readonly max_resolution_hours: number | null;
}

export interface ComplaintAnalytics {
  readonly total: number;
  readonly by_status: Readonly<Partial<Record<ComplaintStatus, number>>>;
  readonly by_priority: Readonly<Partial<Record<ComplaintPriority, number>>>;
  readonly by_category: Readonly<Record<string, number>>;
  readonly resolution_stats: ResolutionStats;
  readonly open_count: number;
}

export const resolutionHours = (complaint: Pick<Complaint, 'created_at' | 'resolved_at'>): number | undefined => {
  if (!complaint.resolved_at) return undefined;
  return (Date.parse(complaint.resolved_at) - Date.parse(complaint.created_at)) / HOUR_MS;
};

const countBy = <TKey extends string>(items: readonly Complaint[], key: (complaint: Complaint) => TKey): Partial<Record<TKey, number>> => {
  const counts: Partial<Record<TKey, number>> = {};
  for (const item of items) {
    const bucket = key(item);
    counts[bucket] = (counts[bucket] ?? 0) + 1;
  }
  return counts;
};

/**
 * Counts cover complaints created within `range`. Resolution statistics cover
 * every complaint resolved within `range`, whenever it was created.
 */
export const summarizeComplaints = (complaints: readonly Complaint[], range: TimeRange): ComplaintAnalytics => {
  const created = complaints.filter((complaint) => inRange(Date.parse(complaint.created_at), range));
  const hours = complaints
    .filter((complaint) => complaint.resolved_at !== undefined && inRange(Date.parse(complaint.resolved_at), range))
    .map(resolutionHours)
    .filter((value): value is number => value !== undefined);

  const byCategory: Record<string, number> = {};
  for (const complaint of created) {
    byCategory[complaint.category] = (byCategory[complaint.category] ?? 0) + 1;
  }

  return {
    total: created.length,
    by_status: countBy(created, (complaint) => complaint.status),
    by_priority: countBy(created, (complaint) => complaint.priority),
    by_category: byCategory,
    resolution_stats: {
      resolved_count: hours.length,
      avg_resolution_hours: hours.length === 0 ? null : mean(hours),
      min_resolution_hours: hours.length === 0 ? null : hours.reduce((low, value) => Math.min(low, value), Infinity),
      max_resolution_hours: hours.length === 0 ? null : hours.reduce((high, value) => Math.max(high, value), -Infinity),
    },
    open_count: created.filter((complaint) => isOpenStatus(complaint.status)).length,
  };
};
