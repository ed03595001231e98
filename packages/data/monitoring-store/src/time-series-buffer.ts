import { systemClock, type Clock } from '@shared/core';

export interface Timed {
  readonly timestamp: string;
}

/**
 * `appended` went to the tail, `inserted` landed before later entries, and
 * `expired` was already past the retention horizon and was not stored.
 */
export type AppendOutcome = 'appended' | 'inserted' | 'expired';

export interface TimeSeriesBufferOptions {
  readonly retentionMs: number;
  /** Oldest entries are evicted beyond this count. */
  readonly maxPoints?: number;
  readonly clock?: Clock;
}

interface Entry<T> {
  readonly at: number;
  readonly item: T;
}

/**
 * Chronologically ordered, bounded buffer. Every mutation runs to completion
 * without yielding, so concurrent callers on the event loop never observe or
 * produce a half-applied append.
 *
 * Eviction only advances `head`; the evicted prefix is spliced away once it
 * outgrows the live entries, so a steady stream of tail appends stays
 * amortised constant time.
 */
export class TimeSeriesBuffer<T extends Timed> {
  private readonly entries: Entry<T>[] = [];
  private head = 0;
  private readonly clock: Clock;

  constructor(private readonly options: TimeSeriesBufferOptions) {
    this.clock = options.clock ?? systemClock;
  }

  append(item: T): AppendOutcome {
    const at = Date.parse(item.timestamp);
    const last = this.size === 0 ? undefined : this.entries[this.entries.length - 1];
    const newest = last === undefined ? at : Math.max(at, last.at);
    const horizon = newest - this.options.retentionMs;
    if (at < horizon) return 'expired';

    const position = this.upperBound(at);
    const outcome: AppendOutcome = position === this.entries.length ? 'appended' : 'inserted';
    if (outcome === 'appended') {
      this.entries.push({ at, item });
    } else {
      this.entries.splice(position, 0, { at, item });
    }
    this.evict(horizon);
    return outcome;
  }

  /** Entries within `[now - durationMs, now]`, also bounded by retention. */
  window(durationMs: number): readonly T[] {
    const now = this.clock();
    const from = Math.max(now - durationMs, now - this.options.retentionMs);
    return this.range(from, now);
  }

  range(from: number, to: number): readonly T[] {
    const selected: T[] = [];
    for (let index = this.lowerBound(from); index < this.entries.length && this.entries[index].at <= to; index += 1) {
      selected.push(this.entries[index].item);
    }
    return Object.freeze(selected);
  }

  /** The last `count` retained entries. */
  recent(count: number): readonly T[] {
    return this.slice(Math.max(this.head, this.entries.length - count));
  }

  /** The last `count` entries stamped at or after `from`, later ones included. */
  recentSince(from: number, count: number): readonly T[] {
    return this.slice(Math.max(this.lowerBound(from), this.entries.length - count));
  }

  all(): readonly T[] {
    return this.slice(this.head);
  }

  latest(): T | undefined {
    return this.size === 0 ? undefined : this.entries[this.entries.length - 1].item;
  }

  get size(): number {
    return this.entries.length - this.head;
  }

  /** Slots held by the backing array, evicted ones not yet compacted included. */
  get allocated(): number {
    return this.entries.length;
  }

  private slice(from: number): readonly T[] {
    return Object.freeze(this.entries.slice(from).map((entry) => entry.item));
  }

  private evict(horizon: number): void {
    const expired = this.lowerBound(horizon);
    const overflow = this.options.maxPoints === undefined ? 0 : this.entries.length - expired - this.options.maxPoints;
    this.head = expired + Math.max(0, overflow);
    if (this.head * 2 > this.entries.length) {
      this.entries.splice(0, this.head);
      this.head = 0;
    }
  }

  /** First live index whose time is at or after `at`. */
  private lowerBound(at: number): number {
    let low = this.head;
    let high = this.entries.length;
    while (low < high) {
      const middle = (low + high) >>> 1;
      if (this.entries[middle].at < at) low = middle + 1;
      else high = middle;
    }
    return low;
  }

  /** First live index whose time is after `at`; equal timestamps keep arrival order. */
  private upperBound(at: number): number {
    let low = this.head;
    let high = this.entries.length;
    while (low < high) {
      const middle = (low + high) >>> 1;
      if (this.entries[middle].at <= at) low = middle + 1;
      else high = middle;
    }
    return low;
  }
}
