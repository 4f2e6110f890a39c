import type { Simulation } from '../core/Simulation.js';
import type { SimulationNotification } from '../model/types.js';
import { validateCount } from '../utils/validation.js';

/**
 * One formatted line of the event log.
 */
export interface EventLogEntry {
  simulationTime: number;
  eventType: SimulationNotification['eventType'];
  nodeId: string;
  /** `[time] message` with the time rounded to two decimals */
  text: string;
}

/**
 * Keeps the most recent simulation notifications as readable lines, oldest
 * first. Older entries are dropped once `capacity` is reached.
 *
 * @example
 * ```typescript
 * const log = new EventLog(50);
 * log.attach(sim);
 * sim.run(20);
 * console.log(log.lines().join('\n'));
 * // [0.00] Generated Customer #1
 * // [0.00] Counter: 1 total
 * ```
 */
export class EventLog {
  private readonly entries: EventLogEntry[] = [];
  private readonly handler = (event: SimulationNotification): void => this.record(event);
  private attached: Simulation | undefined;

  constructor(readonly capacity: number = 100) {
    validateCount(capacity, 'capacity', 1);
  }

  /**
   * Subscribe to a simulation's notifications. A log follows one simulation
   * at a time; attaching again detaches from the previous one.
   */
  attach(simulation: Simulation): void {
    this.detach();
    simulation.on('simulation', this.handler);
    this.attached = simulation;
  }

  detach(): void {
    this.attached?.off('simulation', this.handler);
    this.attached = undefined;
  }

  record(event: SimulationNotification): void {
    this.entries.push({
      simulationTime: event.simulationTime,
      eventType: event.eventType,
      nodeId: event.nodeId,
      text: `[${event.simulationTime.toFixed(2)}] ${event.message}`,
    });
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  getEntries(): readonly EventLogEntry[] {
    return this.entries;
  }

  lines(): string[] {
    return this.entries.map((entry) => entry.text);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
