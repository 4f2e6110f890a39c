import { describe, it, expect } from 'vitest';
import type { RandomSource } from '../../src/random/Random.js';
import { Random } from '../../src/random/Random.js';
import {
  MAX_BINOMIAL_TRIALS,
  MAX_ERLANG_SHAPE,
  binomial,
  erlang,
  exponential,
  normal,
  sampleDistribution,
  triangular,
  uniform,
} from '../../src/random/sampler.js';

/**
 * Returns the given values in order, then repeats the last one.
 */
class ScriptedRandom implements RandomSource {
  draws = 0;

  constructor(private readonly values: number[]) {}

  next(): number {
    const value = this.values[Math.min(this.draws, this.values.length - 1)] ?? 0;
    this.draws++;
    return value;
  }
}

describe('sampleDistribution', () => {
  describe('constant', () => {
    it('should return param1 without drawing', () => {
      const random = new ScriptedRandom([0.5]);
      expect(sampleDistribution(random, 'constant', 7)).toBe(7);
      expect(random.draws).toBe(0);
    });
  });

  describe('uniform', () => {
    it('should scale the draw into [min, max)', () => {
      expect(sampleDistribution(new ScriptedRandom([0.25]), 'uniform', 2, 6)).toBe(3);
    });

    it('should order reversed bounds', () => {
      expect(uniform(new ScriptedRandom([0.5]), 10, 3)).toBe(6.5);
    });
  });

  describe('exponential', () => {
    it('should use the inverse transform', () => {
      const value = exponential(new ScriptedRandom([0.5]), 2);
      expect(value).toBeCloseTo(2 * Math.LN2, 12);
    });

    it('should return 0 for a non-positive mean without drawing', () => {
      const random = new ScriptedRandom([0.5]);
      expect(sampleDistribution(random, 'exponential', 0)).toBe(0);
      expect(sampleDistribution(random, 'exponential', -3)).toBe(0);
      expect(random.draws).toBe(0);
    });

    it('should average close to the mean', () => {
      const rng = new Random(42);
      let sum = 0;
      const n = 20000;
      for (let i = 0; i < n; i++) {
        sum += sampleDistribution(rng, 'exponential', 4);
      }
      expect(sum / n).toBeGreaterThan(3.8);
      expect(sum / n).toBeLessThan(4.2);
    });
  });

  describe('normal', () => {
    it('should apply the Box-Muller transform', () => {
      // u1 = u2 = 0.25: z = sqrt(-2 ln 0.25) * sin(pi / 2)
      const value = normal(new ScriptedRandom([0.75, 0.75]), 10, 2);
      expect(value).toBeCloseTo(10 + 2 * Math.sqrt(-2 * Math.log(0.25)), 12);
    });

    it('should read a negative standard deviation as 0 and still draw twice', () => {
      const random = new ScriptedRandom([0.3, 0.6]);
      expect(sampleDistribution(random, 'normal', 8, -1)).toBe(8);
      expect(random.draws).toBe(2);
    });
  });

  describe('triangular', () => {
    it('should sample the upper leg at or above the mode fraction', () => {
      expect(triangular(new ScriptedRandom([0.5]), 0, 5, 10)).toBe(5);
    });

    it('should sample the lower leg below the mode fraction', () => {
      expect(triangular(new ScriptedRandom([0.1]), 0, 5, 10)).toBeCloseTo(Math.sqrt(5), 12);
    });

    it('should clamp the mode into the bounds', () => {
      expect(sampleDistribution(new ScriptedRandom([0.25]), 'triangular', 0, 20, 10)).toBe(5);
    });

    it('should return the bound when min equals max', () => {
      expect(triangular(new ScriptedRandom([0.9]), 4, 1, 4)).toBe(4);
    });
  });

  describe('erlang', () => {
    it('should sum k exponential draws of mean / k', () => {
      const random = new ScriptedRandom([0.5]);
      expect(erlang(random, 6, 3)).toBeCloseTo(6 * Math.LN2, 12);
      expect(random.draws).toBe(3);
    });

    it('should floor k to at least 1', () => {
      const random = new ScriptedRandom([0.5]);
      expect(sampleDistribution(random, 'erlang', 2, 0)).toBeCloseTo(2 * Math.LN2, 12);
      expect(random.draws).toBe(1);

      const fractional = new ScriptedRandom([0.5]);
      erlang(fractional, 2, 2.9);
      expect(fractional.draws).toBe(2);
    });

    it('should cap k at MAX_ERLANG_SHAPE', () => {
      const random = new ScriptedRandom([0.5]);
      expect(sampleDistribution(random, 'erlang', 6, 1e12)).toBeCloseTo(6 * Math.LN2, 9);
      expect(random.draws).toBe(MAX_ERLANG_SHAPE);
    });
  });

  describe('poisson', () => {
    it('should return the inter-event time for rate lambda', () => {
      const value = sampleDistribution(new ScriptedRandom([0.5]), 'poisson', 4);
      expect(value).toBeCloseTo(Math.LN2 / 4, 12);
    });

    it('should return 0 for a non-positive rate', () => {
      expect(sampleDistribution(new ScriptedRandom([0.5]), 'poisson', 0)).toBe(0);
    });
  });

  describe('binomial', () => {
    it('should count draws below p', () => {
      const random = new ScriptedRandom([0.1, 0.6, 0.3, 0.9]);
      expect(sampleDistribution(random, 'binomial', 0.5, 4)).toBe(2);
      expect(random.draws).toBe(4);
    });

    it('should clamp p into [0, 1]', () => {
      expect(binomial(new ScriptedRandom([0.99]), 2, 5)).toBe(5);
      expect(binomial(new ScriptedRandom([0]), -1, 5)).toBe(0);
    });

    it('should floor n at 0', () => {
      const random = new ScriptedRandom([0.1]);
      expect(binomial(random, 0.5, -3)).toBe(0);
      expect(random.draws).toBe(0);
    });

    it('should cap n at MAX_BINOMIAL_TRIALS', () => {
      const random = new ScriptedRandom([0.1]);
      expect(sampleDistribution(random, 'binomial', 0.5, 1e12)).toBe(MAX_BINOMIAL_TRIALS);
      expect(random.draws).toBe(MAX_BINOMIAL_TRIALS);
    });
  });

  describe('non-finite parameters', () => {
    it('should read NaN and Infinity as 0', () => {
      const random = new ScriptedRandom([0.5]);
      expect(sampleDistribution(random, 'constant', Number.NaN)).toBe(0);
      expect(sampleDistribution(random, 'constant', Infinity)).toBe(0);
      expect(sampleDistribution(random, 'uniform', Number.NaN, 4)).toBe(2);
    });
  });
});
