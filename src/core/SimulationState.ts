import type { NodeId } from '../model/types.js';
import type { Topology } from '../model/Topology.js';
import { StatisticsCollector } from '../statistics/StatisticsCollector.js';
import { EventQueue } from './EventQueue.js';

/**
 * All mutable state of one simulation run.
 * Owned by a single Simulation; the generator and router receive it
 * explicitly instead of reaching for shared globals.
 */
export class SimulationState {
  readonly queue = new EventQueue();
  readonly statistics = new StatisticsCollector();
  /** Entities emitted so far, per generator */
  readonly emitted = new Map<NodeId, number>();
  /** Chance nodes already reported as falling back to broadcast */
  readonly reportedMismatches = new Set<NodeId>();

  clock = 0;
  /** Generator ticks have been queued for this run */
  primed = false;
  /** Deliveries made while executing the current event, across all branches */
  routeHops = 0;
  /** The current event has reported its exhausted hop budget */
  routeBudgetReported = false;
  private nextEntityId = 1;

  /**
   * Allocate the next entity id. Ids start at 1 and only grow.
   */
  allocateEntityId(): number {
    return this.nextEntityId++;
  }

  /**
   * Advance the clock. Earlier times are ignored, so the clock never
   * moves backwards.
   */
  advanceTo(time: number): void {
    if (time > this.clock) {
      this.clock = time;
    }
  }

  /**
   * Reset the per-event route budget before executing an event.
   */
  beginEvent(): void {
    this.routeHops = 0;
    this.routeBudgetReported = false;
  }

  emittedBy(generatorId: NodeId): number {
    return this.emitted.get(generatorId) ?? 0;
  }

  /**
   * Clear everything from a previous run and prepare counters and ledgers
   * for the given topology.
   */
  initialize(topology: Topology): void {
    this.queue.clear();
    this.statistics.clear();
    this.emitted.clear();
    this.reportedMismatches.clear();
    this.clock = 0;
    this.primed = false;
    this.nextEntityId = 1;
    this.beginEvent();

    for (const [nodeId, config] of topology.counters()) {
      this.statistics.register(nodeId, config.throughputWindow);
    }
    for (const [nodeId] of topology.generators()) {
      this.emitted.set(nodeId, 0);
    }
  }
}
