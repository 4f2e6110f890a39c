import type { DashboardConfig, NodeId } from '../model/types.js';
import { CounterStatistics, type CounterSnapshot } from './CounterStatistics.js';

/**
 * A dashboard entry with its current value.
 * `value` is null when the entry names no counter or an unknown one.
 */
export interface DashboardReading {
  label: string;
  statType: DashboardConfig['stats'][number]['statType'];
  sourceCounterId: NodeId | null;
  value: number | null;
}

/**
 * Per-counter statistics for one simulation.
 *
 * @example
 * ```typescript
 * const collector = new StatisticsCollector();
 * collector.register('checkout', 60);
 * collector.recordArrival('checkout', 'Order', sim.now);
 *
 * collector.get('checkout')?.totalCount; // 1
 * const csv = collector.toCSV(sim.now);
 * ```
 */
export class StatisticsCollector {
  private readonly counters = new Map<NodeId, CounterStatistics>();

  /**
   * Create (or replace) the statistics for a counter node.
   */
  register(nodeId: NodeId, throughputWindow: number): CounterStatistics {
    const stats = new CounterStatistics(throughputWindow);
    this.counters.set(nodeId, stats);
    return stats;
  }

  /**
   * Record an arrival at a counter, registering it with the default
   * window if it was never registered.
   */
  recordArrival(nodeId: NodeId, entityType: string, now: number): CounterStatistics {
    const stats = this.counters.get(nodeId) ?? this.register(nodeId, 60);
    stats.recordArrival(entityType, now);
    return stats;
  }

  get(nodeId: NodeId): CounterStatistics | undefined {
    return this.counters.get(nodeId);
  }

  has(nodeId: NodeId): boolean {
    return this.counters.has(nodeId);
  }

  get size(): number {
    return this.counters.size;
  }

  /**
   * Snapshot every counter, keyed by node id.
   */
  snapshots(): Record<NodeId, CounterSnapshot> {
    const result: Record<NodeId, CounterSnapshot> = {};
    for (const [nodeId, stats] of this.counters) {
      result[nodeId] = stats.toJSON();
    }
    return result;
  }

  /**
   * Resolve the values of a dashboard's entries.
   */
  readDashboard(config: DashboardConfig): DashboardReading[] {
    return config.stats.map((stat) => {
      const source = stat.sourceCounterId;
      const stats = source === undefined ? undefined : this.counters.get(source);
      return {
        label: stat.label,
        statType: stat.statType,
        sourceCounterId: source ?? null,
        value: stats ? stats.getStat(stat.statType) : null,
      };
    });
  }

  /**
   * Export counter statistics to CSV format: a summary section followed by
   * one arrival series per counter.
   *
   * @param simulationTime - Clock value written in the header
   */
  toCSV(simulationTime: number): string {
    const lines: string[] = [];

    lines.push('# Counter Statistics');
    lines.push(`Simulation Time,${simulationTime}`);
    lines.push('');

    if (this.counters.size > 0) {
      lines.push('# Summary');
      lines.push(
        'Counter,Total,Throughput,AvgInterArrival,MinInterArrival,MaxInterArrival,StdDevInterArrival'
      );
      for (const [nodeId, stats] of this.counters) {
        lines.push(
          `${csvField(nodeId)},${stats.totalCount},${stats.throughput},${stats.averageInterArrival},${stats.minInterArrival},${stats.maxInterArrival},${stats.stdDevInterArrival}`
        );
      }
      lines.push('');

      for (const [nodeId, stats] of this.counters) {
        lines.push(`# Arrivals: ${csvField(nodeId)}`);
        lines.push('Time');
        for (const time of stats.arrivalTimes) {
          lines.push(`${time}`);
        }
        lines.push('');
      }
    }

    return lines.join('\n');
  }

  /**
   * Clear recorded arrivals while keeping every registered counter.
   */
  reset(): void {
    for (const stats of this.counters.values()) {
      stats.reset();
    }
  }

  /**
   * Forget every counter.
   */
  clear(): void {
    this.counters.clear();
  }
}

/**
 * Quote a field holding a comma, quote or line break; inner quotes are doubled.
 */
function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}
