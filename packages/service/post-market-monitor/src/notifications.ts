import type { Alert, Signal } from '@domain/post-market-monitoring';
import type { LogContext, Logger } from '@platform/logging';
import { toAppError } from '@shared/errors';
import type { Result } from '@shared/result';
import type { MonitoringContext } from './context';

/**
 * Notifications in flight. Ingestion and detection hand a delivery off and
 * move on; `flush` waits for whatever is still pending.
 */
export class NotificationDeliveries {
  readonly #pending = new Set<Promise<void>>();

  track(delivery: Promise<void>): void {
    this.#pending.add(delivery);
    void delivery.finally(() => this.#pending.delete(delivery));
  }

  get pending(): number {
    return this.#pending.size;
  }

  async flush(): Promise<void> {
    while (this.#pending.size > 0) {
      await Promise.all(this.#pending);
    }
  }
}

const deliver = async (
  logger: Logger,
  send: () => Promise<Result<void, Error>>,
  failure: string,
  fields: LogContext,
): Promise<void> => {
  try {
    const sent = await send();
    if (!sent.ok) logger.error(failure, sent.error, fields);
  } catch (error) {
    logger.error(failure, toAppError(error), fields);
  }
};

export const dispatchAlert = (context: MonitoringContext, alert: Alert): void => {
  context.deliveries.track(
    deliver(context.logger, () => context.notifier.publishAlert(alert), 'alert notification failed', {
      alertId: alert.alert_id,
      metricName: alert.metric_name,
    }),
  );
};

export const dispatchSignal = (context: MonitoringContext, signal: Signal): void => {
  context.deliveries.track(
    deliver(context.logger, () => context.notifier.publishSignal(signal), 'signal notification failed', {
      signalId: signal.signal_id,
      metricName: signal.metric_name,
    }),
  );
};

/** Waits for every notification handed off so far. */
export const flushNotifications = (context: MonitoringContext): Promise<void> => context.deliveries.flush();
