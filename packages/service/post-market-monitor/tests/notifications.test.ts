import { describe, expect, it } from 'vitest';
import type { Alert } from '@domain/post-market-monitoring';
import type { MonitoringNotifier } from '@infrastructure/monitoring-notifier';
import { InMemorySink, Logger, asNamespace } from '@platform/logging';
import { ok } from '@shared/result';
import { createMonitoringContext } from '../src/context';
import { recordMetric } from '../src/ingestion';
import { NotificationDeliveries, flushNotifications } from '../src/notifications';
import { T0, iso } from './harness';

describe('NotificationDeliveries', () => {
  it('forgets a delivery once it settles and flushes the rest', async () => {
    const deliveries = new NotificationDeliveries();
    let release = (): void => {};
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });

    deliveries.track(held);
    deliveries.track(Promise.resolve());
    expect(deliveries.pending).toBe(2);

    const flushed = deliveries.flush();
    release();
    await flushed;

    expect(deliveries.pending).toBe(0);
  });
});

describe('notification dispatch', () => {
  it('logs a publisher that throws instead of rejecting ingestion', async () => {
    const sink = new InMemorySink();
    const published: Alert[] = [];
    const notifier: MonitoringNotifier = {
      publishAlert: async (alert) => {
        published.push(alert);
        throw new Error('socket hang up');
      },
      publishSignal: async () => ok(undefined),
    };
    const context = createMonitoringContext({
      clock: () => T0,
      logger: new Logger(asNamespace('test'), [sink]),
      notifier,
    });

    const result = await recordMetric(context, { metric_name: 'response_time', value: 6, timestamp: iso(T0) });
    await flushNotifications(context);

    expect(result.ok).toBe(true);
    expect(published.map((alert) => alert.alert_id)).toEqual(['ALT-000001']);
    const [logged] = sink.atLevel('error');
    expect(logged?.message).toBe('alert notification failed');
    expect(logged?.error?.message).toBe('socket hang up');
    expect(context.deliveries.pending).toBe(0);
  });
});
