import type { DistributionKind } from '../model/types.js';
import type { RandomSource } from './Random.js';

/**
 * Random variate sampling for generator intervals.
 *
 * Parameters are read positionally, as a generator node stores them:
 *
 * | distribution | param1      | param2   | param3 |
 * |--------------|-------------|----------|--------|
 * | constant     | value       |          |        |
 * | uniform      | min         | max      |        |
 * | exponential  | mean        |          |        |
 * | normal       | mean        | stdDev   |        |
 * | triangular   | min         | mode     | max    |
 * | erlang       | mean        | k        |        |
 * | poisson      | lambda      |          |        |
 * | binomial     | probability | n trials |        |
 *
 * Invalid parameters never throw; they are clamped:
 * - non-finite parameters read as 0
 * - uniform and triangular bounds are ordered, and the mode is clamped into them
 * - a negative standard deviation reads as 0
 * - a non-positive mean or rate yields 0
 * - k is floored to a whole number in [1, MAX_ERLANG_SHAPE]
 * - the binomial probability is clamped to [0, 1] and n floored into
 *   [0, MAX_BINOMIAL_TRIALS]
 *
 * @example
 * ```typescript
 * const rng = new Random(42);
 * sampleDistribution(rng, 'exponential', 5);   // mean 5
 * sampleDistribution(rng, 'triangular', 2, 4, 9);
 * sampleDistribution(rng, 'uniform', 10, 3);   // same as uniform(3, 10)
 * ```
 */
/** Largest Erlang shape sampled; larger k is clamped to it */
export const MAX_ERLANG_SHAPE = 1000;

/** Largest number of binomial trials sampled; larger n is clamped to it */
export const MAX_BINOMIAL_TRIALS = 10_000;

export function sampleDistribution(
  random: RandomSource,
  distribution: DistributionKind,
  param1: number,
  param2: number = 0,
  param3: number = 0
): number {
  const p1 = finiteOrZero(param1);
  const p2 = finiteOrZero(param2);
  const p3 = finiteOrZero(param3);

  switch (distribution) {
    case 'constant':
      return p1;
    case 'uniform':
      return uniform(random, p1, p2);
    case 'exponential':
      return exponential(random, p1);
    case 'normal':
      return normal(random, p1, p2);
    case 'triangular':
      return triangular(random, p1, p2, p3);
    case 'erlang':
      return erlang(random, p1, p2);
    case 'poisson':
      // Inter-event time of a Poisson process with rate lambda
      return p1 > 0 ? exponential(random, 1 / p1) : 0;
    case 'binomial':
      return binomial(random, p1, p2);
  }
}

function finiteOrZero(value: number): number {
  return Number.isFinite(value) ? value : 0;
}

export function uniform(random: RandomSource, min: number, max: number): number {
  const low = Math.min(min, max);
  const high = Math.max(min, max);
  return low + random.next() * (high - low);
}

/**
 * Inverse transform: -mean * ln(1 - U). U is in [0, 1), so the log
 * argument is never 0.
 */
export function exponential(random: RandomSource, mean: number): number {
  if (mean <= 0) {
    return 0;
  }
  return -mean * Math.log(1 - random.next());
}

/**
 * Box-Muller transform. Always consumes two draws, even when the standard
 * deviation is 0, so the rest of the run does not shift.
 */
export function normal(random: RandomSource, mean: number, stdDev: number): number {
  const u1 = 1 - random.next();
  const u2 = 1 - random.next();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.sin(2 * Math.PI * u2);
  return mean + z * Math.max(0, stdDev);
}

export function triangular(
  random: RandomSource,
  min: number,
  mode: number,
  max: number
): number {
  const low = Math.min(min, max);
  const high = Math.max(min, max);
  const u = random.next();
  if (high === low) {
    return low;
  }

  const peak = Math.min(high, Math.max(low, mode));
  const fc = (peak - low) / (high - low);

  if (u < fc) {
    return low + Math.sqrt(u * (high - low) * (peak - low));
  }
  return high - Math.sqrt((1 - u) * (high - low) * (high - peak));
}

/**
 * Sum of k exponential draws with mean mean/k.
 */
export function erlang(random: RandomSource, mean: number, k: number): number {
  const shape = Math.min(MAX_ERLANG_SHAPE, Math.max(1, Math.floor(k)));
  let sum = 0;
  for (let i = 0; i < shape; i++) {
    sum += exponential(random, mean / shape);
  }
  return sum;
}

export function binomial(random: RandomSource, p: number, n: number): number {
  const probability = Math.min(1, Math.max(0, p));
  const trials = Math.min(MAX_BINOMIAL_TRIALS, Math.max(0, Math.floor(n)));
  let successes = 0;
  for (let i = 0; i < trials; i++) {
    if (random.next() < probability) {
      successes++;
    }
  }
  return successes;
}
