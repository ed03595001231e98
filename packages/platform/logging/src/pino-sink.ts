import pino, { type Logger as PinoLogger } from 'pino';
import type { LogEvent, LogLevel, LoggerSink } from './logger';

export interface PinoSinkOptions {
  readonly level?: LogLevel;
  readonly destination?: pino.DestinationStream;
}

export class PinoSink implements LoggerSink {
  private readonly pino: PinoLogger;

  constructor(options: PinoSinkOptions = {}) {
    const base = { level: options.level ?? 'info' };
    this.pino = options.destination ? pino(base, options.destination) : pino(base);
  }

  emit(event: LogEvent): void {
    const fields: Record<string, unknown> = { namespace: event.namespace, ...event.context };
    if (event.error) {
      fields.err = event.error;
    }
    this.pino[event.level](fields, event.message);
  }
}
