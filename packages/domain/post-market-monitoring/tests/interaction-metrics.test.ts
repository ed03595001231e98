import { describe, expect, it } from 'vitest';
import { createSequence, withInteractionId } from '../src/identifiers';
import { feedbackMetrics, interactionMetrics } from '../src/interaction-metrics';
import type { Feedback, Interaction } from '../src/models';

const interaction: Interaction = {
  interaction_id: withInteractionId('int-1'),
  timestamp: '2026-03-01T09:00:00.000Z',
  prompt: 'What does article 72 require?',
  response: 'A post-market monitoring system.',
  response_time: 1.4,
  model_version: 'v2',
  metadata: { response_accuracy: 0.92, hallucination_rate: 'n/a', citation_accuracy: 0.8, unrelated: 3 },
};

describe('interactionMetrics', () => {
  it('records response time and numeric known metadata', () => {
    expect(interactionMetrics(interaction)).toEqual([
      { metric_name: 'response_time', value: 1.4, timestamp: '2026-03-01T09:00:00.000Z' },
      { metric_name: 'response_accuracy', value: 0.92, timestamp: '2026-03-01T09:00:00.000Z' },
      { metric_name: 'citation_accuracy', value: 0.8, timestamp: '2026-03-01T09:00:00.000Z' },
    ]);
  });
});

describe('feedbackMetrics', () => {
  it('records the rating as user satisfaction', () => {
    const feedback: Feedback = {
      feedback_id: createSequence('FB', 'FeedbackId')(),
      interaction_id: 'int-1',
      timestamp: '2026-03-01T09:05:00.000Z',
      rating: 2,
      issues: ['slow'],
    };
    expect(feedbackMetrics(feedback)).toEqual([
      { metric_name: 'user_satisfaction', value: 2, timestamp: '2026-03-01T09:05:00.000Z' },
    ]);
  });
});
