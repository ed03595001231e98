import { PublishCommand } from '@aws-sdk/client-sns';
import { describe, expect, it, vi } from 'vitest';
import { withAlertId, withSignalId, type Alert, type Signal } from '@domain/post-market-monitoring';
import { NullMonitoringNotifier } from '../src/null-notifier';
import { SnsMonitoringNotifier } from '../src/sns-notifier';

const alert: Alert = {
  alert_id: withAlertId('ALT-000001'),
  timestamp: '2026-03-01T10:00:00.000Z',
  severity: 'critical',
  alert_type: 'threshold_hallucination_rate',
  metric_name: 'hallucination_rate',
  current_value: 0.14,
  threshold: 0.1,
  details: { target: 0.02, direction: 'lower-is-better' },
};

const signal: Signal = {
  signal_id: withSignalId('SIG-000001'),
  timestamp: '2026-03-01T10:00:00.000Z',
  type: 'trend_change',
  severity: 'medium',
  metric_name: 'response_time',
  detected_value: 1.8,
  expected_value: 1.2,
  deviation_pct: 50,
  confidence: 1,
  description: 'Trend change detected: response_time is increasing (+50.0% change)',
  status: 'active',
  context: {},
};

const fixedNow = () => new Date('2026-03-01T10:00:05.000Z');

describe('SnsMonitoringNotifier', () => {
  it('publishes alerts to the alert topic with an origin attribute', async () => {
    const send = vi.fn().mockResolvedValue({ MessageId: 'm-1' });
    const notifier = new SnsMonitoringNotifier({ send }, { alertTopicArn: 'arn:aws:sns:eu-west-1:000000000000:alerts' }, fixedNow);

    const result = await notifier.publishAlert(alert);

    expect(result).toEqual({ ok: true, value: undefined });
    expect(send).toHaveBeenCalledTimes(1);
    const command = send.mock.calls[0][0];
    expect(command).toBeInstanceOf(PublishCommand);
    expect(command.input.TopicArn).toBe('arn:aws:sns:eu-west-1:000000000000:alerts');
    expect(command.input.MessageAttributes).toEqual({ origin: { DataType: 'String', StringValue: 'post-market-monitor' } });
    expect(JSON.parse(command.input.Message)).toEqual({
      kind: 'alert',
      ...alert,
      publishedAt: '2026-03-01T10:00:05.000Z',
    });
  });

  it('fails without a topic and never calls SNS', async () => {
    const send = vi.fn();
    const notifier = new SnsMonitoringNotifier({ send }, { alertTopicArn: 'arn:aws:sns:eu-west-1:000000000000:alerts' });

    const result = await notifier.publishSignal(signal);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('signal-topic-empty');
    expect(send).not.toHaveBeenCalled();
  });

  it('turns a rejected publish into a failed result', async () => {
    const send = vi.fn().mockRejectedValue(new Error('throttled'));
    const notifier = new SnsMonitoringNotifier({ send }, { signalTopicArn: 'arn:aws:sns:eu-west-1:000000000000:signals' });

    const result = await notifier.publishSignal(signal);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toBe('throttled');
  });
});

describe('NullMonitoringNotifier', () => {
  it('accepts everything', async () => {
    const notifier = new NullMonitoringNotifier();
    expect(await notifier.publishAlert(alert)).toEqual({ ok: true, value: undefined });
    expect(await notifier.publishSignal(signal)).toEqual({ ok: true, value: undefined });
  });
});
