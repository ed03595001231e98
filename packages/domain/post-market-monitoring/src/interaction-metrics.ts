import type { Feedback, Interaction, KnownMetric, MetricPoint } from './models';

/** Metadata keys promoted to metric points when their value is numeric. */
export const metadataMetrics: readonly KnownMetric[] = [
  'response_accuracy',
  'hallucination_rate',
  'privacy_incidents',
  'prompt_injection_attempts',
  'citation_accuracy',
];

export const interactionMetrics = (interaction: Interaction): MetricPoint[] => {
  const points: MetricPoint[] = [
    { metric_name: 'response_time', value: interaction.response_time, timestamp: interaction.timestamp },
  ];
  for (const name of metadataMetrics) {
    const value = interaction.metadata[name];
    if (typeof value === 'number' && Number.isFinite(value)) {
      points.push({ metric_name: name, value, timestamp: interaction.timestamp });
    }
  }
  return points;
};

export const feedbackMetrics = (feedback: Feedback): MetricPoint[] => [
  { metric_name: 'user_satisfaction', value: feedback.rating, timestamp: feedback.timestamp },
];
