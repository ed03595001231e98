import type { Alert, Signal } from '@domain/post-market-monitoring';
import type { Result } from '@shared/result';

export interface MonitoringNotifier {
  publishAlert(alert: Alert): Promise<Result<void, Error>>;
  publishSignal(signal: Signal): Promise<Result<void, Error>>;
}
