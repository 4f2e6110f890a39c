import type { DashboardStatType } from '../model/types.js';

/**
 * Plain-object view of a counter's statistics, safe to hand to observers.
 */
export interface CounterSnapshot {
  totalCount: number;
  countByType: Record<string, number>;
  arrivalTimes: number[];
  interArrivalTimes: number[];
  /** Time of the latest arrival, or null before the first one */
  lastArrivalTime: number | null;
  throughput: number;
  averageInterArrival: number;
  minInterArrival: number;
  maxInterArrival: number;
  stdDevInterArrival: number;
}

/**
 * Arrival statistics for one Counter node.
 *
 * Recording an arrival is O(1) amortized: throughput uses a sliding window
 * whose start index only moves forward, because arrival times are appended
 * in non-decreasing order. Inter-arrival aggregates are computed on demand.
 *
 * @example
 * ```typescript
 * const stats = new CounterStatistics(60);
 * stats.recordArrival('Order', 0);
 * stats.recordArrival('Order', 5);
 * stats.interArrivalTimes;   // [5]
 * stats.averageInterArrival; // 5
 * ```
 */
export class CounterStatistics {
  private total = 0;
  private readonly byType = new Map<string, number>();
  private readonly arrivals: number[] = [];
  private readonly interArrivals: number[] = [];
  private lastArrival: number | null = null;
  private windowStart = 0;
  private currentThroughput = 0;

  /**
   * @param throughputWindow - Trailing window for throughput; 0 or less disables it
   */
  constructor(readonly throughputWindow: number) {}

  /**
   * Record one arrival of an entity of the given type at time `now`.
   */
  recordArrival(entityType: string, now: number): void {
    this.total++;
    this.byType.set(entityType, (this.byType.get(entityType) ?? 0) + 1);

    if (this.lastArrival !== null) {
      this.interArrivals.push(now - this.lastArrival);
    }
    this.arrivals.push(now);
    this.lastArrival = now;

    this.currentThroughput = this.computeThroughput(now);
  }

  private computeThroughput(now: number): number {
    const window = this.throughputWindow;
    if (!(window > 0)) {
      return 0;
    }

    const cutoff = now - window;
    while (this.windowStart < this.arrivals.length) {
      const time = this.arrivals[this.windowStart];
      if (time === undefined || time >= cutoff) {
        break;
      }
      this.windowStart++;
    }

    return (this.arrivals.length - this.windowStart) / window;
  }

  get totalCount(): number {
    return this.total;
  }

  get countByType(): Record<string, number> {
    return Object.fromEntries(this.byType);
  }

  /** Arrival times in chronological order */
  get arrivalTimes(): readonly number[] {
    return this.arrivals;
  }

  get interArrivalTimes(): readonly number[] {
    return this.interArrivals;
  }

  get lastArrivalTime(): number | null {
    return this.lastArrival;
  }

  /** Arrivals per time unit over the trailing window, as of the latest arrival */
  get throughput(): number {
    return this.currentThroughput;
  }

  get averageInterArrival(): number {
    if (this.interArrivals.length === 0) {
      return 0;
    }
    let sum = 0;
    for (const value of this.interArrivals) {
      sum += value;
    }
    return sum / this.interArrivals.length;
  }

  get minInterArrival(): number {
    return this.interArrivals.length > 0
      ? this.interArrivals.reduce((min, value) => Math.min(min, value), Infinity)
      : 0;
  }

  get maxInterArrival(): number {
    return this.interArrivals.length > 0
      ? this.interArrivals.reduce((max, value) => Math.max(max, value), -Infinity)
      : 0;
  }

  /**
   * Sample standard deviation (n - 1 denominator); 0 with fewer than two values.
   */
  get stdDevInterArrival(): number {
    const n = this.interArrivals.length;
    if (n < 2) {
      return 0;
    }
    const mean = this.averageInterArrival;
    let sumSquares = 0;
    for (const value of this.interArrivals) {
      sumSquares += (value - mean) * (value - mean);
    }
    return Math.sqrt(sumSquares / (n - 1));
  }

  /**
   * Read one of the values a dashboard can display.
   */
  getStat(statType: DashboardStatType): number {
    switch (statType) {
      case 'count':
        return this.total;
      case 'rate':
        return this.currentThroughput;
      case 'average':
        return this.averageInterArrival;
      case 'min':
        return this.minInterArrival;
      case 'max':
        return this.maxInterArrival;
      case 'stdDev':
        return this.stdDevInterArrival;
    }
  }

  /**
   * Copy the current state into a plain object.
   */
  toJSON(): CounterSnapshot {
    return {
      totalCount: this.total,
      countByType: this.countByType,
      arrivalTimes: [...this.arrivals],
      interArrivalTimes: [...this.interArrivals],
      lastArrivalTime: this.lastArrival,
      throughput: this.currentThroughput,
      averageInterArrival: this.averageInterArrival,
      minInterArrival: this.minInterArrival,
      maxInterArrival: this.maxInterArrival,
      stdDevInterArrival: this.stdDevInterArrival,
    };
  }

  /**
   * Clear all recorded arrivals.
   */
  reset(): void {
    this.total = 0;
    this.byType.clear();
    this.arrivals.length = 0;
    this.interArrivals.length = 0;
    this.lastArrival = null;
    this.windowStart = 0;
    this.currentThroughput = 0;
  }
}
