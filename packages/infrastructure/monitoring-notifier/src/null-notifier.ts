import type { Alert, Signal } from '@domain/post-market-monitoring';
import { ok, type Result } from '@shared/result';
import type { MonitoringNotifier } from './types';

/** Used when no topics are configured. */
export class NullMonitoringNotifier implements MonitoringNotifier {
  async publishAlert(_alert: Alert): Promise<Result<void, Error>> {
    return ok(undefined);
  }

  async publishSignal(_signal: Signal): Promise<Result<void, Error>> {
    return ok(undefined);
  }
}
