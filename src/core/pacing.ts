/**
 * Real-time pacing of a running simulation.
 */
export interface PacingOptions {
  /** Simulated time units per real time unit (1 = real time) */
  speed: number;
  /** Wall-clock milliseconds one simulated time unit lasts at speed 1 */
  timeUnitMs: number;
  /** At this speed and above, pacing only yields to the host */
  fastSpeedThreshold: number;
  /** Events between host yields when pacing does not sleep */
  yieldInterval: number;
}

/**
 * What the run loop should do after an event.
 */
export type PacingDecision =
  | { kind: 'sleep'; ms: number }
  | { kind: 'yield' }
  | { kind: 'continue' };

/**
 * Decide how long to wait after an event that moved the clock by
 * `simulatedDelta`.
 *
 * Below the fast threshold the wait is proportional:
 * `simulatedDelta * timeUnitMs / speed` milliseconds. At high speeds, or
 * when the proportional wait rounds to nothing, the loop yields to the host
 * every `yieldInterval` events so pause and stop requests are still seen.
 *
 * @param eventsSinceWait - Events executed since the loop last awaited
 *
 * @example
 * ```typescript
 * computePacing(2, 1, { speed: 4, timeUnitMs: 1000, fastSpeedThreshold: 10, yieldInterval: 10 });
 * // { kind: 'sleep', ms: 500 }
 * ```
 */
export function computePacing(
  simulatedDelta: number,
  eventsSinceWait: number,
  options: PacingOptions
): PacingDecision {
  if (options.speed < options.fastSpeedThreshold) {
    const ms = (simulatedDelta * options.timeUnitMs) / options.speed;
    if (ms >= 1) {
      return { kind: 'sleep', ms: Math.round(ms) };
    }
  }

  return eventsSinceWait >= options.yieldInterval
    ? { kind: 'yield' }
    : { kind: 'continue' };
}
