/**
 * Identifier of a node in the simulated graph.
 */
export type NodeId = string;

/**
 * A directed connection between two nodes. Declaration order matters:
 * Chance branches map onto a node's outgoing edges by position.
 */
export interface SimulationEdge {
  from: NodeId;
  to: NodeId;
}

/**
 * Statistical distribution used to sample generator intervals.
 */
export type DistributionKind =
  | 'constant'
  | 'uniform'
  | 'exponential'
  | 'normal'
  | 'triangular'
  | 'erlang'
  | 'poisson' // inter-event time of a Poisson process, not a count
  | 'binomial';

/**
 * How a generator's sampled value is read.
 * - `interval`: the sample is the time until the next tick
 * - `ratePerUnit`: the sample is a rate; the interval is its reciprocal
 */
export type TimingMode = 'interval' | 'ratePerUnit';

/**
 * When a generator stops producing entities.
 */
export type TerminationCondition = 'none' | 'time' | 'count' | 'countOrTime';

export interface GeneratorConfig {
  name: string;
  entityType: string;
  /** Display colour carried on every generated entity */
  color: string;
  batchSize: number;
  startTime: number;
  stopTime: number;
  maxEntities: number;
  distribution: DistributionKind;
  param1: number;
  param2: number;
  param3: number;
  timingMode: TimingMode;
  termination: TerminationCondition;
}

export interface CounterConfig {
  name: string;
  /** Trailing time window for throughput */
  throughputWindow: number;
}

export interface ChanceBranch {
  label: string;
  probability: number;
}

export interface ChanceConfig {
  name: string;
  branches: ChanceBranch[];
}

export interface SinkConfig {
  name: string;
}

export interface ClockConfig {
  name: string;
  interval: number;
}

export type DashboardStatType = 'count' | 'rate' | 'average' | 'min' | 'max' | 'stdDev';

export interface DashboardStat {
  label: string;
  statType: DashboardStatType;
  /** Counter node the value is read from */
  sourceCounterId?: NodeId;
}

export interface DashboardConfig {
  name: string;
  title: string;
  stats: DashboardStat[];
}

/**
 * Role of a node together with its configuration.
 */
export type NodeRoleConfig =
  | { role: 'generator'; config: GeneratorConfig }
  | { role: 'counter'; config: CounterConfig }
  | { role: 'chance'; config: ChanceConfig }
  | { role: 'sink'; config: SinkConfig }
  | { role: 'clock'; config: ClockConfig }
  | { role: 'dashboard'; config: DashboardConfig }
  | { role: 'generic' };

export type SimulationRole = NodeRoleConfig['role'];

/**
 * Role configuration as supplied by callers: every config field is optional
 * and is completed with defaults when the topology is built.
 */
export type NodeRoleInput =
  | { role: 'generator'; config?: Partial<GeneratorConfig> }
  | { role: 'counter'; config?: Partial<CounterConfig> }
  | { role: 'chance'; config?: Partial<ChanceConfig> }
  | { role: 'sink'; config?: Partial<SinkConfig> }
  | { role: 'clock'; config?: Partial<ClockConfig> }
  | { role: 'dashboard'; config?: Partial<DashboardConfig> }
  | { role: 'generic' };

/**
 * Maps a node to its role. Returning undefined makes the node a generic
 * pass-through.
 */
export type RoleResolver = (nodeId: NodeId) => NodeRoleInput | undefined;

/**
 * The graph handed to the engine. Read-only for the duration of a run.
 */
export interface SimulationTopology {
  nodes: readonly NodeId[];
  edges: readonly SimulationEdge[];
  resolveRole: RoleResolver;
}

/**
 * A discrete unit flowing through the graph.
 */
export interface Entity {
  id: number;
  entityType: string;
  colorHint: string;
  createdAt: number;
  sourceNodeId: NodeId;
  currentNodeId: NodeId;
  attributes: Record<string, unknown>;
}

export type SimulationEventType = 'EntityCreated' | 'EntityConsumed' | 'CounterUpdated';

/**
 * Per-event notification published to observers.
 */
export interface SimulationNotification {
  simulationTime: number;
  eventType: SimulationEventType;
  nodeId: NodeId;
  /** Copy of the entity at the time of the event */
  entity: Readonly<Entity>;
  message: string;
}

/**
 * Non-fatal configuration problem noticed during a run.
 */
export interface SimulationDiagnostic {
  simulationTime: number;
  nodeId: NodeId;
  code: 'chance-branch-mismatch' | 'route-depth-exceeded';
  message: string;
}
