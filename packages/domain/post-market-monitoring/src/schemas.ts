import { z } from 'zod';
import { createValidator } from '@shared/validation';
import {
  bandDirections,
  complaintPriorities,
  complaintStatuses,
  reportTypes,
  signalStatuses,
} from './models';

const scalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
export const openMapSchema = z.record(scalarSchema);

const timestampSchema = z.string().datetime({ offset: true });
const nonBlank = z.string().trim().min(1);

export const metricBandSchema = z
  .object({
    target: z.number().finite(),
    alert_threshold: z.number().finite(),
    critical_threshold: z.number().finite(),
    direction: z.enum(bandDirections),
  })
  .superRefine((band, context) => {
    const ordered = band.direction === 'lower-is-better'
      ? band.critical_threshold >= band.alert_threshold
      : band.critical_threshold <= band.alert_threshold;
    if (!ordered) {
      context.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['critical_threshold'],
        message: `critical threshold must lie beyond the alert threshold for ${band.direction}`,
      });
    }
  });

export const metricBandsSchema = z.record(metricBandSchema);

export const metricPointInputSchema = z.object({
  metric_name: nonBlank,
  value: z.number().finite(),
  timestamp: timestampSchema.optional(),
});

export const interactionInputSchema = z.object({
  interaction_id: nonBlank,
  user_id: z.string().optional(),
  prompt: z.string(),
  response: z.string(),
  response_time: z.number().finite().nonnegative(),
  model_version: z.string().default('default'),
  metadata: openMapSchema.default({}),
  demographics: openMapSchema.optional(),
  timestamp: timestampSchema.optional(),
});

export const feedbackInputSchema = z.object({
  interaction_id: nonBlank,
  user_id: z.string().optional(),
  rating: z.number().int().min(1).max(5),
  comment: z.string().optional(),
  issues: z.array(z.string()).default([]),
  timestamp: timestampSchema.optional(),
});

export const performanceSnapshotInputSchema = z.object({
  timestamp: timestampSchema.optional(),
  response_time_avg: z.number().finite().nonnegative(),
  response_time_p95: z.number().finite().nonnegative(),
  throughput: z.number().finite().nonnegative(),
  error_rate: z.number().finite().min(0).max(100),
  availability: z.number().finite().min(0).max(100),
  active_users: z.number().int().nonnegative(),
  system: z.record(z.number().finite()).default({}),
});

export const complaintInputSchema = z.object({
  user_id: z.string().optional(),
  category: nonBlank,
  subject: nonBlank,
  description: z.string(),
  priority: z.enum(complaintPriorities).default('medium'),
  related_interaction_id: z.string().optional(),
  tags: z.array(z.string()).default([]),
});

export const complaintUpdateSchema = z
  .object({
    status: z.enum(complaintStatuses).optional(),
    priority: z.enum(complaintPriorities).optional(),
    assigned_to: nonBlank.optional(),
    resolution: nonBlank.optional(),
  })
  .refine((update) => Object.values(update).some((value) => value !== undefined), {
    message: 'at least one field must change',
  });

export const acknowledgeInputSchema = z.object({
  acknowledged_by: nonBlank,
});

export const signalHistoryQuerySchema = z.object({
  status: z.enum(signalStatuses).optional(),
  hours: z.number().positive().optional(),
  metric_name: z.string().optional(),
  limit: z.number().int().positive().optional(),
});

export const reportRequestSchema = z.object({
  report_type: z.enum(reportTypes).default('periodic'),
  period_days: z.number().int().positive().max(366).default(30),
});

export type MetricPointInput = z.output<typeof metricPointInputSchema>;
export type InteractionInput = z.output<typeof interactionInputSchema>;
export type FeedbackInput = z.output<typeof feedbackInputSchema>;
export type PerformanceSnapshotInput = z.output<typeof performanceSnapshotInputSchema>;
export type ComplaintInput = z.output<typeof complaintInputSchema>;
export type ComplaintUpdate = z.output<typeof complaintUpdateSchema>;
export type AcknowledgeInput = z.output<typeof acknowledgeInputSchema>;
export type SignalHistoryQuery = z.output<typeof signalHistoryQuerySchema>;
export type ReportRequest = z.output<typeof reportRequestSchema>;

export const validateMetricPoint = createValidator(metricPointInputSchema, 'metric point');
export const validateInteraction = createValidator(interactionInputSchema, 'interaction');
export const validateFeedback = createValidator(feedbackInputSchema, 'feedback');
export const validatePerformanceSnapshot = createValidator(performanceSnapshotInputSchema, 'performance snapshot');
export const validateComplaint = createValidator(complaintInputSchema, 'complaint');
export const validateComplaintUpdate = createValidator(complaintUpdateSchema, 'complaint update');
export const validateAcknowledge = createValidator(acknowledgeInputSchema, 'acknowledgement');
export const validateSignalHistoryQuery = createValidator(signalHistoryQuerySchema, 'signal history query');
export const validateReportRequest = createValidator(reportRequestSchema, 'report request');
export const validateMetricBands = createValidator(metricBandsSchema, 'metric bands');
