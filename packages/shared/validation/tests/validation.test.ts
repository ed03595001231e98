import { z } from 'zod';
import { describe, expect, it } from 'vitest';
import { createValidator } from '../src';

const validator = createValidator(z.object({ name: z.string(), count: z.number().int() }), 'widget');

describe('createValidator', () => {
  it('returns the parsed value', () => {
    expect(validator.parse({ name: 'a', count: 2 })).toEqual({ ok: true, value: { name: 'a', count: 2 } });
  });

  it('collects every issue with its path', () => {
    const result = validator.parse({ name: 4, count: 1.5 });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues.map((issue) => issue.path)).toEqual(['name', 'count']);
    expect(result.error.message.startsWith('invalid widget: name: ')).toBe(true);
  });

  it('labels root-level issues', () => {
    const result = validator.parse('nope');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.issues[0]?.path).toBe('(root)');
  });
});
