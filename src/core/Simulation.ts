import type { ScheduledEvent } from './EventQueue.js';
import { SimulationState } from './SimulationState.js';
import { RunControl } from './RunControl.js';
import { computePacing, type PacingOptions } from './pacing.js';
import { Topology } from '../model/Topology.js';
import type {
  Entity,
  NodeId,
  SimulationDiagnostic,
  SimulationEventType,
  SimulationNotification,
  SimulationTopology,
} from '../model/types.js';
import { Random, type RandomSource } from '../random/Random.js';
import type { CounterSnapshot } from '../statistics/CounterStatistics.js';
import type { DashboardReading } from '../statistics/StatisticsCollector.js';
import { EntityGenerator } from '../engine/EntityGenerator.js';
import { EntityRouter } from '../engine/EntityRouter.js';
import type { EngineContext } from '../engine/context.js';
import {
  validateCount,
  validatePositive,
  validateTime,
} from '../utils/validation.js';

/**
 * Configuration options for the simulation.
 */
export interface SimulationOptions {
  /** Seed for the built-in random source (default: timestamp) */
  randomSeed?: number;
  /** Replaces the built-in random source; it is not re-seeded by reset() */
  random?: RandomSource;
  /** Playback speed multiplier (default: 1) */
  speed?: number;
  /** Wall-clock milliseconds per simulated time unit at speed 1 (default: 1000) */
  timeUnitMs?: number;
  /** Speed from which playback only yields instead of sleeping (default: 10) */
  fastSpeedThreshold?: number;
  /** Events between host yields when playback does not sleep (default: 10) */
  yieldInterval?: number;
  /** Deliveries allowed within one event, across all entities and branches (default: 1000) */
  maxRouteDepth?: number;
  /** Enable logging for debugging (default: false) */
  enableLogging?: boolean;
}

type ResolvedOptions = Required<Omit<SimulationOptions, 'random'>>;

/**
 * Result returned when a run ends.
 */
export interface SimulationResult {
  /** Clock value when the run ended */
  endTime: number;
  /** Number of events consumed during this run */
  eventsProcessed: number;
  /** The run was stopped before its queue drained */
  cancelled: boolean;
  /** Counter statistics at the end of the run, keyed by node id */
  statistics: Record<NodeId, CounterSnapshot>;
}

export type SimulationStatus = 'idle' | 'running' | 'paused' | 'stopped' | 'completed';

/**
 * Notifications published by a simulation and their payloads.
 */
export interface SimulationEvents {
  /** Entity created, consumed, or counted */
  simulation: SimulationNotification;
  /** Clock value after every consumed event */
  time: number;
  started: undefined;
  paused: undefined;
  resumed: undefined;
  stopped: SimulationResult;
  diagnostic: SimulationDiagnostic;
  error: unknown;
}

type Handler<K extends keyof SimulationEvents> = (payload: SimulationEvents[K]) => void;

type HandlerRegistry = { [K in keyof SimulationEvents]: Set<Handler<K>> };

/**
 * Event trace entry for detailed logging
 */
export interface EventTrace {
  sequence: number;
  time: number;
  kind: ScheduledEvent['command']['kind'];
  targetNodeId: NodeId;
  /** Position of the event in execution order, starting at 1 */
  executedAt: number;
}

interface ActiveRun {
  readonly control: RunControl;
  readonly startEvents: number;
  readonly until: number | undefined;
  readonly done: Promise<SimulationResult>;
  /** Result captured when the run was discarded by initialize() */
  result?: SimulationResult;
}

/**
 * Discrete-event simulation of entities flowing through a node graph.
 *
 * The simulation keeps a virtual clock that jumps from event to event.
 * Generator nodes queue their own ticks; each tick creates entities that are
 * routed through the graph synchronously. Runs can be driven three ways:
 * `start()` plays back in (scaled) real time and can be paused, resumed and
 * stopped; `run()` executes synchronously without pacing; `step()` executes
 * a single event.
 *
 * @example
 * ```typescript
 * const sim = new Simulation({ randomSeed: 42, speed: 100 });
 * sim.initialize({
 *   nodes: ['arrivals', 'tally', 'exit'],
 *   edges: [
 *     { from: 'arrivals', to: 'tally' },
 *     { from: 'tally', to: 'exit' },
 *   ],
 *   resolveRole: (id) =>
 *     id === 'arrivals' ? { role: 'generator', config: { distribution: 'constant', param1: 5 } }
 *     : id === 'tally' ? { role: 'counter' }
 *     : { role: 'sink' },
 * });
 *
 * sim.on('simulation', (event) => console.log(event.message));
 * const result = await sim.start(100);
 * console.log(sim.getCounterStats('tally')?.totalCount); // 21
 * ```
 */
export class Simulation {
  private readonly options: ResolvedOptions;
  private readonly ownRandom: Random | undefined;
  private readonly random: RandomSource;
  private readonly handlers: HandlerRegistry;
  private readonly eventTrace: EventTrace[] = [];
  private readonly state = new SimulationState();
  private topology = Topology.empty();
  private source: SimulationTopology | undefined;
  private generator: EntityGenerator;
  private eventsProcessed = 0;
  private currentStatus: SimulationStatus = 'idle';
  private activeRun: ActiveRun | undefined;
  private syncRunning = false;
  private enableTracing = false;

  /**
   * Create a new simulation instance.
   *
   * @example
   * ```typescript
   * const sim = new Simulation({
   *   randomSeed: 12345,
   *   speed: 10,
   *   enableLogging: false
   * });
   * ```
   */
  constructor(options: SimulationOptions = {}) {
    this.options = {
      randomSeed: options.randomSeed ?? Date.now() % (2 ** 32 - 1),
      speed: options.speed ?? 1,
      timeUnitMs: options.timeUnitMs ?? 1000,
      fastSpeedThreshold: options.fastSpeedThreshold ?? 10,
      yieldInterval: options.yieldInterval ?? 10,
      maxRouteDepth: options.maxRouteDepth ?? 1000,
      enableLogging: options.enableLogging ?? false,
    };

    validatePositive(this.options.speed, 'speed');
    validateTime(this.options.timeUnitMs, 'timeUnitMs');
    validateCount(this.options.yieldInterval, 'yieldInterval', 1);
    validateCount(this.options.maxRouteDepth, 'maxRouteDepth', 1);

    if (options.random) {
      this.ownRandom = undefined;
      this.random = options.random;
    } else {
      this.ownRandom = new Random(this.options.randomSeed);
      this.random = this.ownRandom;
    }

    this.handlers = {
      simulation: new Set(),
      time: new Set(),
      started: new Set(),
      paused: new Set(),
      resumed: new Set(),
      stopped: new Set(),
      diagnostic: new Set(),
      error: new Set(),
    };

    this.generator = this.createGenerator();
    this.log('Simulation created', { options: this.options });
  }

  /**
   * Load a graph and clear all state from previous runs: queue, clock,
   * counters, statistics and generator ledgers. A run in progress is
   * cancelled. Calling it twice with the same graph leaves the same state.
   *
   * @throws {ValidationError} If a node id is duplicated or a role config is invalid
   */
  initialize(topology: SimulationTopology): void {
    const resolved = Topology.from(topology);
    this.discardActiveRun();

    this.source = topology;
    this.topology = resolved;
    this.state.initialize(resolved);
    this.ownRandom?.setSeed(this.options.randomSeed);
    this.generator = this.createGenerator();
    this.eventsProcessed = 0;
    this.currentStatus = 'idle';

    this.log('Simulation initialized', {
      nodes: resolved.size,
      generators: resolved.generators().length,
      counters: resolved.counters().length,
    });
  }

  /**
   * Get the current simulation time.
   * This is the virtual clock, not real-world time.
   */
  get now(): number {
    return this.state.clock;
  }

  get status(): SimulationStatus {
    return this.currentStatus;
  }

  get isRunning(): boolean {
    return this.activeRun !== undefined || this.syncRunning;
  }

  get isPaused(): boolean {
    return this.activeRun?.control.paused ?? false;
  }

  get speed(): number {
    return this.options.speed;
  }

  /**
   * Change the playback speed. Takes effect at the next pacing decision.
   *
   * @throws {ValidationError} If speed is not positive
   */
  setSpeed(speed: number): void {
    validatePositive(speed, 'speed', 'Use pause() to halt playback');
    this.options.speed = speed;
    this.log('Speed changed', { speed });
  }

  /**
   * Start real-time playback, or resume it when paused.
   * The returned promise settles when the queue drains, `until` is
   * reached, or the run is stopped.
   *
   * @param until - Stop once the next event would be later than this time
   *
   * @example
   * ```typescript
   * const result = await sim.start();
   * console.log(`Ended at ${result.endTime}, processed ${result.eventsProcessed} events`);
   * ```
   */
  start(until?: number): Promise<SimulationResult> {
    if (until !== undefined) {
      validateTime(until, 'until');
    }

    const current = this.activeRun;
    if (current) {
      if (current.control.cancelled) {
        // The stopped run still has to reach its suspension point.
        return current.done.then(() => this.start(until));
      }
      this.resume();
      return current.done;
    }

    if (this.syncRunning) {
      return Promise.reject(new Error('Simulation is already running'));
    }

    this.prepareRun();
    const control = new RunControl();
    const run: ActiveRun = {
      control,
      startEvents: this.eventsProcessed,
      until,
      done: Promise.resolve().then(() => this.runLoop(run)),
    };
    this.activeRun = run;
    this.currentStatus = 'running';

    this.log('Simulation started', { until, startTime: this.state.clock });
    this.emit('started', undefined);

    return run.done;
  }

  /**
   * Freeze playback. Queued events are kept and the clock stops.
   */
  pause(): void {
    const run = this.activeRun;
    if (run && run.control.pause()) {
      this.currentStatus = 'paused';
      this.log('Simulation paused');
      this.emit('paused', undefined);
    }
  }

  /**
   * Continue a paused playback exactly where it stopped.
   */
  resume(): void {
    const run = this.activeRun;
    if (run && run.control.resume()) {
      this.currentStatus = 'running';
      this.log('Simulation resumed');
      this.emit('resumed', undefined);
    }
  }

  /**
   * Cancel playback. The event being executed, if any, finishes; the run
   * ends at its next suspension point and its promise resolves with
   * `cancelled: true`. A later start() begins a fresh run.
   */
  stop(): void {
    const run = this.activeRun;
    if (run && !run.control.cancelled) {
      run.control.cancel();
      this.currentStatus = 'stopped';
      this.log('Simulation stopped');
    }
  }

  /**
   * Stop any run and return to the freshly initialized state.
   * Event handlers are preserved across resets.
   */
  reset(): void {
    this.log('Resetting simulation');
    if (this.source) {
      this.initialize(this.source);
    } else {
      this.discardActiveRun();
      this.currentStatus = 'idle';
    }
  }

  /**
   * Execute a single event (step forward to next event).
   *
   * @returns true if an event was executed, false if queue is empty
   * @throws {Error} If playback started with start() is in progress
   */
  step(): boolean {
    if (this.activeRun) {
      throw new Error('Cannot step while playback is in progress');
    }
    if (this.syncRunning) {
      throw new Error('Simulation is already running');
    }
    this.prepareRun(false);

    if (this.state.queue.isEmpty) {
      this.log('Step called but no events in queue');
      this.currentStatus = 'completed';
      return false;
    }

    this.executeNext();
    return true;
  }

  /**
   * Run synchronously, without pacing, until the queue drains or the next
   * event would be later than `until`.
   *
   * @throws {Error} If a run is already in progress
   *
   * @example
   * ```typescript
   * sim.run(100); // Stops at time 100
   * ```
   */
  run(until?: number): SimulationResult {
    if (this.isRunning) {
      throw new Error('Simulation is already running');
    }
    if (until !== undefined) {
      validateTime(until, 'until');
    }

    this.prepareRun();
    this.syncRunning = true;
    this.currentStatus = 'running';
    const startEvents = this.eventsProcessed;
    this.log('Simulation run started', { until, startTime: this.state.clock });
    this.emit('started', undefined);

    let failed = true;
    try {
      for (;;) {
        const next = this.state.queue.peek();
        if (!next) {
          break;
        }
        if (until !== undefined && next.time > until) {
          break;
        }
        this.executeNext();
      }

      if (until !== undefined) {
        this.state.advanceTo(until);
      }
      failed = false;
    } finally {
      this.syncRunning = false;
      this.currentStatus = this.outcome(false, failed);
    }

    const result = this.buildResult(startEvents, false);
    this.log('Simulation run completed', result);
    this.emit('stopped', result);
    return result;
  }

  /**
   * Register an event handler.
   *
   * @example
   * ```typescript
   * sim.on('simulation', (event) => {
   *   console.log(`[${event.simulationTime.toFixed(2)}] ${event.message}`);
   * });
   *
   * sim.on('stopped', (result) => {
   *   console.log(`Run ended at time ${result.endTime}`);
   * });
   * ```
   */
  on<K extends keyof SimulationEvents>(event: K, handler: Handler<K>): void {
    this.handlers[event].add(handler);
  }

  /**
   * Unregister an event handler (must be same reference as registered).
   */
  off<K extends keyof SimulationEvents>(event: K, handler: Handler<K>): void {
    this.handlers[event].delete(handler);
  }

  /**
   * Statistics of one counter node, or undefined if it is not a counter.
   */
  getCounterStats(nodeId: NodeId): CounterSnapshot | undefined {
    return this.state.statistics.get(nodeId)?.toJSON();
  }

  getAllCounterStats(): Record<NodeId, CounterSnapshot> {
    return this.state.statistics.snapshots();
  }

  /**
   * Current values of a dashboard node's entries, or undefined if the node
   * is not a dashboard.
   */
  getDashboard(nodeId: NodeId): DashboardReading[] | undefined {
    const role = this.topology.role(nodeId);
    if (role?.role !== 'dashboard') {
      return undefined;
    }
    return this.state.statistics.readDashboard(role.config);
  }

  /**
   * Export counter statistics as CSV.
   */
  exportStatistics(): string {
    return this.state.statistics.toCSV(this.state.clock);
  }

  /**
   * Events still queued, in the order they will run.
   */
  pendingEvents(): ScheduledEvent[] {
    return this.state.queue.toArray();
  }

  /**
   * Enable event tracing.
   * When enabled, every executed event is recorded; see getEventTrace().
   */
  enableEventTrace(): void {
    this.enableTracing = true;
  }

  disableEventTrace(): void {
    this.enableTracing = false;
  }

  getEventTrace(): readonly EventTrace[] {
    return this.eventTrace;
  }

  clearEventTrace(): void {
    this.eventTrace.length = 0;
  }

  private createGenerator(): EntityGenerator {
    const context: EngineContext = {
      topology: this.topology,
      state: this.state,
      random: this.random,
      maxRouteDepth: this.options.maxRouteDepth,
      notify: (eventType, nodeId, entity, message) =>
        this.publish(eventType, nodeId, entity, message),
      diagnose: (nodeId, code, message) => this.diagnose(nodeId, code, message),
    };
    return new EntityGenerator(context, new EntityRouter(context));
  }

  /**
   * Queue the generators' first ticks if that has not happened yet.
   * With `restartFinished`, a completed or stopped run is re-initialized first.
   */
  private prepareRun(restartFinished: boolean = true): void {
    if (
      restartFinished &&
      this.source &&
      (this.currentStatus === 'completed' || this.currentStatus === 'stopped')
    ) {
      this.initialize(this.source);
    }
    if (!this.state.primed) {
      this.generator.prime();
      this.state.primed = true;
    }
  }

  private discardActiveRun(): void {
    const run = this.activeRun;
    if (!run) {
      return;
    }
    run.result ??= this.buildResult(run.startEvents, true);
    run.control.cancel();
    this.activeRun = undefined;
  }

  private async runLoop(run: ActiveRun): Promise<SimulationResult> {
    const { control } = run;
    const queue = this.state.queue;
    let lastSimTime = this.state.clock;
    let eventsSinceWait = 0;
    let failed = true;

    try {
      while (!control.cancelled && !queue.isEmpty) {
        if (control.paused) {
          await control.waitForResume();
          lastSimTime = this.state.clock;
          continue;
        }

        const next = queue.peek();
        if (run.until !== undefined && next && next.time > run.until) {
          break;
        }

        this.executeNext();
        eventsSinceWait++;

        const decision = computePacing(
          this.state.clock - lastSimTime,
          eventsSinceWait,
          this.pacing
        );
        lastSimTime = this.state.clock;

        if (decision.kind === 'sleep') {
          await control.sleep(decision.ms);
          eventsSinceWait = 0;
        } else if (decision.kind === 'yield') {
          await control.yield();
          eventsSinceWait = 0;
        }
      }

      if (!control.cancelled && run.until !== undefined) {
        this.state.advanceTo(run.until);
      }
      failed = false;
    } finally {
      if (this.activeRun === run) {
        this.activeRun = undefined;
        this.currentStatus = this.outcome(control.cancelled, failed);
      }
    }

    const result = run.result ?? this.buildResult(run.startEvents, control.cancelled);
    this.log('Simulation run completed', result);
    this.emit('stopped', result);
    return result;
  }

  private get pacing(): PacingOptions {
    return {
      speed: this.options.speed,
      timeUnitMs: this.options.timeUnitMs,
      fastSpeedThreshold: this.options.fastSpeedThreshold,
      yieldInterval: this.options.yieldInterval,
    };
  }

  private outcome(cancelled: boolean, failed: boolean): SimulationStatus {
    if (cancelled || failed) {
      return 'stopped';
    }
    return this.state.queue.isEmpty ? 'completed' : 'idle';
  }

  /**
   * Pop the next event, advance the clock to it, and execute its command.
   */
  private executeNext(): void {
    const event = this.state.queue.pop();
    if (!event) {
      return;
    }

    this.state.advanceTo(event.time);
    this.state.beginEvent();
    this.eventsProcessed++;

    this.log('Executing event', {
      sequence: event.sequence,
      time: event.time,
      command: event.command,
    });

    if (this.enableTracing) {
      this.eventTrace.push({
        sequence: event.sequence,
        time: event.time,
        kind: event.command.kind,
        targetNodeId: event.command.targetNodeId,
        executedAt: this.eventsProcessed,
      });
    }

    try {
      switch (event.command.kind) {
        case 'generate':
          this.generator.generate(event.command.targetNodeId, event.command.payload.tick);
          break;
      }
      this.emit('time', this.state.clock);
    } catch (error) {
      this.emit('error', error);
      throw error;
    }
  }

  private publish(
    eventType: SimulationEventType,
    nodeId: NodeId,
    entity: Entity,
    message: string
  ): void {
    if (this.handlers.simulation.size === 0) {
      return;
    }
    this.emit('simulation', {
      simulationTime: this.state.clock,
      eventType,
      nodeId,
      entity: { ...entity, attributes: { ...entity.attributes } },
      message,
    });
  }

  private diagnose(
    nodeId: NodeId,
    code: SimulationDiagnostic['code'],
    message: string
  ): void {
    if (this.options.enableLogging) {
      console.warn(`[Simulation @ ${this.state.clock}] ${message}`);
    }
    this.emit('diagnostic', {
      simulationTime: this.state.clock,
      nodeId,
      code,
      message,
    });
  }

  private buildResult(startEvents: number, cancelled: boolean): SimulationResult {
    return {
      endTime: this.state.clock,
      eventsProcessed: this.eventsProcessed - startEvents,
      cancelled,
      statistics: this.state.statistics.snapshots(),
    };
  }

  /**
   * Emit an event to all registered handlers.
   */
  private emit<K extends keyof SimulationEvents>(
    event: K,
    payload: SimulationEvents[K]
  ): void {
    const handlers: Set<Handler<K>> = this.handlers[event];
    for (const handler of handlers) {
      handler(payload);
    }
  }

  /**
   * Log a message if logging is enabled.
   */
  private log(message: string, data?: unknown): void {
    if (this.options.enableLogging) {
      console.log(`[Simulation @ ${this.state.clock}] ${message}`, data ?? '');
    }
  }
}
