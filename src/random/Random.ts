import { ValidationError } from '../utils/validation.js';

/**
 * Source of uniform random numbers in [0, 1).
 * The engine draws every random value of a run from one source so a seeded
 * source reproduces the whole run.
 */
export interface RandomSource {
  next(): number;
}

/**
 * Seedable random number generator for flow simulation.
 * Uses a Linear Congruential Generator (LCG) for reproducible random sequences.
 *
 * @example
 * ```typescript
 * const rng = new Random(12345); // Seeded for reproducibility
 *
 * const u = rng.next(); // Uniform [0, 1)
 * rng.setSeed(12345);    // Restart the same sequence
 * ```
 */
export class Random implements RandomSource {
  private seed: number;
  private readonly a = 1664525; // LCG multiplier
  private readonly c = 1013904223; // LCG increment
  private readonly m = 2 ** 32; // LCG modulus
  private readonly maxSafeSeed = 2 ** 32 - 1; // Maximum safe seed value

  /**
   * Create a new random number generator.
   *
   * @param seed - Initial seed (default: current timestamp)
   */
  constructor(seed?: number) {
    // Use modulo to ensure timestamp fits within safe range
    const initialSeed = seed ?? (Date.now() % this.maxSafeSeed);
    this.validateSeed(initialSeed);
    this.seed = initialSeed;
  }

  /**
   * Get the current seed value (the LCG state).
   */
  getSeed(): number {
    return this.seed;
  }

  /**
   * Set a new seed value, restarting the sequence.
   */
  setSeed(seed: number): void {
    this.validateSeed(seed);
    this.seed = seed;
  }

  private validateSeed(seed: number): void {
    if (!Number.isFinite(seed)) {
      throw new ValidationError(
        `Seed must be a finite number (got ${seed}). Use a valid integer seed for reproducible random sequences.`,
        { seed }
      );
    }

    if (!Number.isInteger(seed)) {
      throw new ValidationError(
        `Seed must be an integer (got ${seed}). Non-integer seeds may produce inconsistent results.`,
        { seed }
      );
    }

    if (seed < 0) {
      throw new ValidationError(
        `Seed must be non-negative (got ${seed}). Use a positive integer seed.`,
        { seed }
      );
    }

    if (seed > this.maxSafeSeed) {
      throw new ValidationError(
        `Seed exceeds maximum safe value of ${this.maxSafeSeed} (got ${seed}).`,
        { seed }
      );
    }
  }

  /**
   * Generate the next random value in [0, 1).
   * This is the core PRNG every distribution builds upon.
   */
  next(): number {
    this.seed = (this.a * this.seed + this.c) % this.m;
    return this.seed / this.m;
  }
}
