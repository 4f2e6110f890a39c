import { describe, it, expect } from 'vitest';
import { computePacing, type PacingOptions } from '../../src/core/pacing.js';

const base: PacingOptions = {
  speed: 1,
  timeUnitMs: 1000,
  fastSpeedThreshold: 10,
  yieldInterval: 10,
};

describe('computePacing', () => {
  it('should sleep in proportion to the simulated delta', () => {
    expect(computePacing(2, 1, { ...base, speed: 4 })).toEqual({ kind: 'sleep', ms: 500 });
    expect(computePacing(0.5, 1, base)).toEqual({ kind: 'sleep', ms: 500 });
  });

  it('should round the sleep to whole milliseconds', () => {
    expect(computePacing(1, 1, { ...base, speed: 3 })).toEqual({ kind: 'sleep', ms: 333 });
  });

  it('should not sleep when the delay is under a millisecond', () => {
    expect(computePacing(0, 1, base)).toEqual({ kind: 'continue' });
    expect(computePacing(0.0005, 1, base)).toEqual({ kind: 'continue' });
  });

  it('should only yield at or above the fast threshold', () => {
    const fast = { ...base, speed: 10 };

    expect(computePacing(100, 9, fast)).toEqual({ kind: 'continue' });
    expect(computePacing(100, 10, fast)).toEqual({ kind: 'yield' });
  });

  it('should yield after zero-delta events at normal speed', () => {
    expect(computePacing(0, 10, base)).toEqual({ kind: 'yield' });
  });

  it('should never sleep at infinite speed', () => {
    expect(computePacing(1e9, 1, { ...base, speed: Infinity })).toEqual({ kind: 'continue' });
  });
});
