/**
 * Batch Run Context Tests
 */

import { describe, it, expect } from '@jest/globals';
import { BatchRunContext, hashSeed, mulberry32 } from '../../core/pipeline/BatchRunContext.js';

describe('BatchRunContext', () => {
  it('should hash with 32-bit FNV-1a', () => {
    expect(hashSeed('')).toBe(0x811c9dc5);
    expect(hashSeed('a')).toBe(0xe40c292c);
  });

  it('should produce a repeatable stream in [0, 1)', () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    const values = Array.from({ length: 50 }, () => a());

    expect(values).toEqual(Array.from({ length: 50 }, () => b()));
    expect(values.every((v) => v >= 0 && v < 1)).toBe(true);
  });

  it('should give each candidate its own stream', () => {
    const context = new BatchRunContext({ seed: 'seed' });

    expect(context.randomFor('x')()).toBe(new BatchRunContext({ seed: 'seed' }).randomFor('x')());
    expect(context.randomFor('x')()).not.toBe(context.randomFor('y')());
  });

  it('should start counters at zero and generate a run id', () => {
    const context = new BatchRunContext({ seed: 'seed' });
    context.increment('surveysSent');
    context.increment('surveysSent', 2);

    expect(context.counters.surveysSent).toBe(3);
    expect(context.counters.nonResponders).toBe(0);
    expect(context.runId).toMatch(/^[0-9a-f-]{36}$/);
  });
});
