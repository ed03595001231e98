import { toAppError } from '@shared/errors';
import type { MonitoringContext } from './context';
import { runDetectionPass, type DetectionPass } from './detection';

export interface DetectionSchedulerState {
  readonly running: boolean;
  readonly passInFlight: boolean;
  readonly completedPasses: number;
  readonly failedPasses: number;
}

/** Runs a detection pass every interval; a tick that finds a pass still running is skipped. */
export class DetectionScheduler {
  #timer: ReturnType<typeof setInterval> | null = null;
  #inFlight: Promise<void> | null = null;
  #completed = 0;
  #failed = 0;

  constructor(
    private readonly context: MonitoringContext,
    private readonly intervalMs: number = context.config.detectionIntervalMs,
    private readonly onPass?: (pass: DetectionPass) => void,
  ) {}

  get state(): DetectionSchedulerState {
    return {
      running: this.#timer !== null,
      passInFlight: this.#inFlight !== null,
      completedPasses: this.#completed,
      failedPasses: this.#failed,
    };
  }

  start(): void {
    if (this.#timer) return;
    this.#timer = setInterval(() => {
      void this.pulse();
    }, this.intervalMs);
  }

  /** Stops the schedule and waits for a pass that is already running. */
  async stop(): Promise<void> {
    if (this.#timer) {
      clearInterval(this.#timer);
      this.#timer = null;
    }
    if (this.#inFlight) await this.#inFlight;
  }

  async pulse(): Promise<void> {
    if (this.#inFlight) return;
    this.#inFlight = this.runOnce();
    try {
      await this.#inFlight;
    } finally {
      this.#inFlight = null;
    }
  }

  private async runOnce(): Promise<void> {
    try {
      const pass = await runDetectionPass(this.context);
      this.#completed += 1;
      this.onPass?.(pass);
    } catch (error) {
      this.#failed += 1;
      this.context.logger.child('scheduler').error('detection pass failed', toAppError(error));
    }
  }
}
