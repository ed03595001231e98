import { describe, expect, it } from 'vitest';
import { createIdFactories, createSequence, sequenceNumber } from '../src/identifiers';

describe('identifiers', () => {
  it('issues zero padded ids in call order', () => {
    const next = createSequence('SIG', 'SignalId');
    expect(next()).toBe('SIG-000001');
    expect(next()).toBe('SIG-000002');
  });

  it('keeps one sequence per record kind', () => {
    const ids = createIdFactories();
    expect(ids.alert()).toBe('ALT-000001');
    expect(ids.complaint()).toBe('CMP-000001');
    expect(ids.feedback()).toBe('FB-000001');
    expect(ids.report()).toBe('REG-000001');
    expect(ids.alert()).toBe('ALT-000002');
  });

  it('reads the sequence number back', () => {
    expect(sequenceNumber('CMP-000042')).toBe(42);
    expect(sequenceNumber('CMP-x')).toBe(-1);
  });
});
