import { describe, expect, it } from 'vitest';
import { HOUR_MS } from '@shared/core';
import { TimeSeriesBuffer } from '../src/time-series-buffer';

const T0 = Date.parse('2026-03-01T00:00:00.000Z');

interface Reading {
  readonly timestamp: string;
  readonly label: string;
}

const at = (offsetHours: number, label = `h${offsetHours}`): Reading => ({
  timestamp: new Date(T0 + offsetHours * HOUR_MS).toISOString(),
  label,
});

const atMinute = (minute: number, label: string): Reading => ({
  timestamp: new Date(T0 + minute * 60_000).toISOString(),
  label,
});

const labels = (items: readonly Reading[]) => items.map((item) => item.label);

describe('TimeSeriesBuffer', () => {
  it('keeps late arrivals in chronological order', () => {
    const buffer = new TimeSeriesBuffer<Reading>({ retentionMs: 24 * HOUR_MS, clock: () => T0 + 10 * HOUR_MS });
    expect(buffer.append(at(1))).toBe('appended');
    expect(buffer.append(at(3))).toBe('appended');
    expect(buffer.append(at(2))).toBe('inserted');
    expect(labels(buffer.all())).toEqual(['h1', 'h2', 'h3']);
  });

  it('keeps arrival order for equal timestamps', () => {
    const buffer = new TimeSeriesBuffer<Reading>({ retentionMs: 24 * HOUR_MS });
    buffer.append(at(1, 'first'));
    buffer.append(at(2, 'later'));
    buffer.append(at(1, 'second'));
    expect(labels(buffer.all())).toEqual(['first', 'second', 'later']);
  });

  it('evicts points that fall behind the newest by more than the retention', () => {
    const buffer = new TimeSeriesBuffer<Reading>({ retentionMs: 5 * HOUR_MS, clock: () => T0 + 9 * HOUR_MS });
    for (let hour = 0; hour < 10; hour += 1) buffer.append(at(hour));

    expect(buffer.size).toBe(6);
    expect(labels(buffer.window(5 * HOUR_MS))).toEqual(['h4', 'h5', 'h6', 'h7', 'h8', 'h9']);
  });

  it('drops a point already past the horizon', () => {
    const buffer = new TimeSeriesBuffer<Reading>({ retentionMs: 5 * HOUR_MS });
    buffer.append(at(10));
    expect(buffer.append(at(4))).toBe('expired');
    expect(buffer.append(at(5))).toBe('inserted');
    expect(labels(buffer.all())).toEqual(['h5', 'h10']);
  });

  it('caps the number of retained points', () => {
    const buffer = new TimeSeriesBuffer<Reading>({ retentionMs: 24 * HOUR_MS, maxPoints: 3 });
    for (let hour = 0; hour < 5; hour += 1) buffer.append(at(hour));
    expect(labels(buffer.all())).toEqual(['h2', 'h3', 'h4']);
  });

  it('limits windows to the requested duration and to now', () => {
    const buffer = new TimeSeriesBuffer<Reading>({ retentionMs: 24 * HOUR_MS, clock: () => T0 + 5 * HOUR_MS });
    for (const hour of [1, 2, 3, 4, 5, 6]) buffer.append(at(hour));
    expect(labels(buffer.window(2 * HOUR_MS))).toEqual(['h3', 'h4', 'h5']);
    expect(labels(buffer.recent(2))).toEqual(['h5', 'h6']);
    expect(buffer.latest()?.label).toBe('h6');
  });

  it('keeps the backing array bounded under a steady stream of evicting appends', () => {
    const buffer = new TimeSeriesBuffer<Reading>({ retentionMs: 24 * HOUR_MS, maxPoints: 4 });
    let largest = 0;
    for (let minute = 0; minute < 1000; minute += 1) {
      buffer.append(atMinute(minute, `m${minute}`));
      largest = Math.max(largest, buffer.allocated);
    }

    expect(largest).toBeLessThanOrEqual(8);
    expect(buffer.size).toBe(4);
    expect(labels(buffer.all())).toEqual(['m996', 'm997', 'm998', 'm999']);

    expect(buffer.append(atMinute(997.5, 'late'))).toBe('inserted');
    expect(labels(buffer.all())).toEqual(['m997', 'late', 'm998', 'm999']);
    expect(labels(buffer.range(T0 + 997 * 60_000, T0 + 998 * 60_000))).toEqual(['m997', 'late', 'm998']);
    expect(buffer.latest()?.label).toBe('m999');
  });

  it('takes the most recent points stamped after a cut-off', () => {
    const buffer = new TimeSeriesBuffer<Reading>({ retentionMs: 24 * HOUR_MS });
    for (const hour of [1, 2, 3, 4, 5, 6]) buffer.append(at(hour));
    expect(labels(buffer.recentSince(T0 + 3 * HOUR_MS, 2))).toEqual(['h5', 'h6']);
    expect(labels(buffer.recentSince(T0 + 5.5 * HOUR_MS, 3))).toEqual(['h6']);
    expect(buffer.recentSince(T0 + 10 * HOUR_MS, 2)).toEqual([]);
  });

  it('hands out frozen copies', () => {
    const buffer = new TimeSeriesBuffer<Reading>({ retentionMs: HOUR_MS });
    buffer.append(at(0));
    const snapshot = buffer.all();
    buffer.append(at(0.5));
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(snapshot).toHaveLength(1);
  });

  it('loses nothing when callers interleave', async () => {
    const buffer = new TimeSeriesBuffer<Reading>({ retentionMs: 24 * HOUR_MS });
    const hours = [7, 2, 9, 0, 4, 1, 8, 3, 6, 5];
    await Promise.all(
      hours.map(async (hour, index) => {
        await new Promise<void>((resolve) => {
          setTimeout(() => resolve(), (index * 7) % 5);
        });
        buffer.append(at(hour));
      }),
    );
    expect(labels(buffer.all())).toEqual(['h0', 'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'h7', 'h8', 'h9']);
  });
});
