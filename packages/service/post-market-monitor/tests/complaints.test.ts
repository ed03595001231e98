import { describe, expect, it } from 'vitest';
import {
  complaintAnalytics,
  createComplaint,
  getComplaint,
  listComplaints,
  updateComplaint,
} from '../src/complaints';
import { MINUTE, T0, createHarness } from './harness';

const HOUR = 60 * MINUTE;

const complaintInput = (subject: string, priority = 'medium') => ({
  category: 'accuracy',
  subject,
  description: 'The answer cited a policy that does not exist.',
  priority,
});

describe('complaints', () => {
  it('opens a complaint with a sequential id', async () => {
    const { context, sink } = createHarness();

    const result = await createComplaint(context, complaintInput('Wrong policy', 'high'));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toMatchObject({
      complaint_id: 'CMP-000001',
      status: 'open',
      priority: 'high',
      created_at: new Date(T0).toISOString(),
      tags: [],
      updates: [],
    });
    expect(sink.atLevel('info')[0]?.context).toEqual({ complaintId: 'CMP-000001', priority: 'high', category: 'accuracy' });
  });

  it('records changes made by an update', async () => {
    const { context, setNow } = createHarness();
    await createComplaint(context, complaintInput('Wrong policy'));
    setNow(T0 + 2 * HOUR);

    const result = await updateComplaint(context, 'CMP-000001', { status: 'resolved', resolution: 'Corrected the source.' }, 'agent-7');

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.status).toBe('resolved');
    expect(result.value.resolved_at).toBe(new Date(T0 + 2 * HOUR).toISOString());
    expect(result.value.updates).toHaveLength(1);
    expect(result.value.updates[0]?.actor).toBe('agent-7');
  });

  it('rejects an empty update and an unknown complaint', async () => {
    const { context } = createHarness();
    await createComplaint(context, complaintInput('Wrong policy'));

    const empty = await updateComplaint(context, 'CMP-000001', {});
    const missing = await updateComplaint(context, 'CMP-000404', { status: 'closed' });
    const lookup = await getComplaint(context, 'CMP-000404');

    expect(!empty.ok && empty.error.code).toBe('validation_failed');
    expect(!missing.ok && missing.error.code).toBe('not_found');
    expect(!lookup.ok && lookup.error.message).toBe('complaint CMP-000404 not found');
  });

  it('lists by status and priority, treating unknown filters as matching nothing', async () => {
    const { context, setNow } = createHarness();
    await createComplaint(context, complaintInput('First', 'low'));
    setNow(T0 + HOUR);
    await createComplaint(context, complaintInput('Second', 'critical'));
    setNow(T0 + 2 * HOUR);
    await updateComplaint(context, 'CMP-000001', { status: 'closed' });

    const open = await listComplaints(context, { status: 'open' });
    const critical = await listComplaints(context, { priority: 'critical' });
    const all = await listComplaints(context);
    const unknown = await listComplaints(context, { status: 'archived' });

    expect(open.items.map((complaint) => complaint.complaint_id)).toEqual(['CMP-000002']);
    expect(critical.items.map((complaint) => complaint.complaint_id)).toEqual(['CMP-000002']);
    expect(all.items.map((complaint) => complaint.complaint_id)).toEqual(['CMP-000002', 'CMP-000001']);
    expect(unknown).toEqual({ items: [] });
  });

  it('summarises complaints over the analytics window', async () => {
    const { context, setNow } = createHarness();
    await createComplaint(context, complaintInput('First', 'high'));
    await createComplaint(context, complaintInput('Second', 'low'));
    setNow(T0 + 4 * HOUR);
    await updateComplaint(context, 'CMP-000001', { status: 'resolved' });

    const analytics = await complaintAnalytics(context);

    expect(analytics.total).toBe(2);
    expect(analytics.by_priority).toEqual({ high: 1, low: 1 });
    expect(analytics.by_status).toEqual({ resolved: 1, open: 1 });
    expect(analytics.open_count).toBe(1);
    expect(analytics.resolution_stats).toEqual({
      resolved_count: 1,
      avg_resolution_hours: 4,
      min_resolution_hours: 4,
      max_resolution_hours: 4,
    });
  });
});
