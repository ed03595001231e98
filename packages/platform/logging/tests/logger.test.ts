import { describe, expect, it } from 'vitest';
import { InMemorySink, Logger, PinoSink, asNamespace } from '../src';

describe('Logger', () => {
  it('prefixes child namespaces and shares sinks', () => {
    const sink = new InMemorySink();
    const logger = new Logger(asNamespace('monitor'), [sink]);

    logger.child('ingestion').warn('threshold breached', { metricName: 'response_time' });
    logger.info('started');

    expect(sink.read().map((event) => [event.level, event.namespace, event.message])).toEqual([
      ['warn', 'monitor.ingestion', 'threshold breached'],
      ['info', 'monitor', 'started'],
    ]);
    expect(sink.atLevel('warn')[0]?.context).toEqual({ metricName: 'response_time' });
  });

  it('attaches errors to error events', () => {
    const sink = new InMemorySink();
    const logger = new Logger(undefined, [sink]);
    const failure = new Error('sns down');

    logger.error('notification failed', failure, { alertId: 'ALT-000001' });

    const [event] = sink.atLevel('error');
    expect(event?.error).toBe(failure);
    expect(event?.namespace).toBe('post-market-monitoring');
  });

  it('fans out to sinks added later', () => {
    const first = new InMemorySink();
    const second = new InMemorySink();
    const logger = new Logger(undefined, [first]).withSink(second);

    logger.debug('tick');

    expect(first.read()).toHaveLength(1);
    expect(second.read()).toHaveLength(1);
    first.clear();
    expect(first.read()).toEqual([]);
  });
});

describe('PinoSink', () => {
  it('writes one JSON line per event at or above its level', () => {
    const lines: string[] = [];
    const sink = new PinoSink({ level: 'info', destination: { write: (line: string) => { lines.push(line); } } });
    const logger = new Logger(asNamespace('monitor'), [sink]);

    logger.debug('hidden');
    logger.warn('threshold breached', { metricName: 'error_rate' });
    logger.error('publish failed', new Error('throttled'));

    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? '{}')).toMatchObject({
      level: 40,
      namespace: 'monitor',
      metricName: 'error_rate',
      msg: 'threshold breached',
    });
    expect(JSON.parse(lines[1] ?? '{}')).toMatchObject({ level: 50, msg: 'publish failed', err: { message: 'throttled' } });
  });
});
