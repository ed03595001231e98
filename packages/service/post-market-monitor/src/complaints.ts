import type { CursorWindow } from '@data/repositories';
import {
  applyComplaintUpdate,
  complaintPriorities,
  complaintStatuses,
  openComplaint,
  summarizeComplaints,
  validateComplaint,
  validateComplaintUpdate,
  withComplaintId,
  type Complaint,
  type ComplaintAnalytics,
  type ComplaintPriority,
  type ComplaintStatus,
} from '@domain/post-market-monitoring';
import { DAY_MS } from '@shared/core';
import { NotFoundError, type AppError, type ValidationError } from '@shared/errors';
import { fail, ok, type Result } from '@shared/result';
import type { MonitoringContext } from './context';

export const createComplaint = async (
  context: MonitoringContext,
  input: unknown,
): Promise<Result<Complaint, ValidationError>> => {
  const parsed = validateComplaint.parse(input);
  if (!parsed.ok) return parsed;

  const complaint = openComplaint(parsed.value, context.ids.complaint(), context.clock());
  await context.complaints.save(complaint);
  context.logger.child('complaints').info('complaint created', {
    complaintId: complaint.complaint_id,
    priority: complaint.priority,
    category: complaint.category,
  });
  return ok(complaint);
};

export const updateComplaint = async (
  context: MonitoringContext,
  id: string,
  input: unknown,
  actor?: string,
): Promise<Result<Complaint, AppError>> => {
  const parsed = validateComplaintUpdate.parse(input);
  if (!parsed.ok) return parsed;

  const at = context.clock();
  const updated = await context.complaints.update(withComplaintId(id), (current) =>
    applyComplaintUpdate(current, parsed.value, at, actor),
  );
  if (!updated) return fail(new NotFoundError('complaint', id));
  context.logger.child('complaints').info('complaint updated', { complaintId: id, status: updated.status });
  return ok(updated);
};

export const getComplaint = async (context: MonitoringContext, id: string): Promise<Result<Complaint, NotFoundError>> => {
  const complaint = await context.complaints.findById(withComplaintId(id));
  return complaint ? ok(complaint) : fail(new NotFoundError('complaint', id));
};

export interface ComplaintListQuery {
  readonly status?: string;
  readonly priority?: string;
  readonly days?: number;
  readonly limit?: number;
  readonly cursor?: string;
}

const isStatus = (value: string | undefined): value is ComplaintStatus =>
  complaintStatuses.some((status) => status === value);

const isPriority = (value: string | undefined): value is ComplaintPriority =>
  complaintPriorities.some((priority) => priority === value);

/** Unrecognised status or priority filters match nothing. */
export const listComplaints = async (
  context: MonitoringContext,
  query: ComplaintListQuery = {},
): Promise<CursorWindow<Complaint>> => {
  if ((query.status !== undefined && !isStatus(query.status)) || (query.priority !== undefined && !isPriority(query.priority))) {
    return { items: [] };
  }
  return context.complaints.list({
    filter: {
      status: isStatus(query.status) ? query.status : undefined,
      priority: isPriority(query.priority) ? query.priority : undefined,
      from: query.days === undefined ? undefined : context.clock() - query.days * DAY_MS,
    },
    limit: query.limit,
    cursor: query.cursor,
  });
};

export const DEFAULT_ANALYTICS_DAYS = 30;

export const complaintAnalytics = async (
  context: MonitoringContext,
  days = DEFAULT_ANALYTICS_DAYS,
): Promise<ComplaintAnalytics> => {
  const now = context.clock();
  return summarizeComplaints(await context.complaints.all(), { from: now - days * DAY_MS, to: now });
};
