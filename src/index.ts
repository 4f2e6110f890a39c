// Core simulation engine
export { Simulation } from './core/Simulation.js';
export type {
  SimulationOptions,
  SimulationResult,
  SimulationStatus,
  SimulationEvents,
  EventTrace,
} from './core/Simulation.js';
export { EventQueue } from './core/EventQueue.js';
export type { ScheduledEvent, SimulationCommand } from './core/EventQueue.js';
export { SimulationState } from './core/SimulationState.js';
export { RunControl } from './core/RunControl.js';
export { computePacing } from './core/pacing.js';
export type { PacingOptions, PacingDecision } from './core/pacing.js';

// Entity flow
export { EntityGenerator, MIN_INTERVAL } from './engine/EntityGenerator.js';
export { EntityRouter } from './engine/EntityRouter.js';
export type { EngineContext } from './engine/context.js';

// Graph and node roles
export { Topology } from './model/Topology.js';
export {
  DISTRIBUTIONS,
  TIMING_MODES,
  TERMINATION_CONDITIONS,
  DASHBOARD_STAT_TYPES,
  SIMULATION_TYPE_KEY,
  SIMULATION_CONFIG_KEY,
  getDefaultGeneratorConfig,
  resolveGeneratorConfig,
  resolveCounterConfig,
  resolveChanceConfig,
  resolveSinkConfig,
  resolveClockConfig,
  resolveDashboardConfig,
  resolveRoleConfig,
  createNodeDataLookup,
} from './model/config.js';
export type { NodeDataRecord } from './model/config.js';
export type {
  NodeId,
  SimulationEdge,
  DistributionKind,
  TimingMode,
  TerminationCondition,
  GeneratorConfig,
  CounterConfig,
  ChanceBranch,
  ChanceConfig,
  SinkConfig,
  ClockConfig,
  DashboardStatType,
  DashboardStat,
  DashboardConfig,
  NodeRoleConfig,
  NodeRoleInput,
  SimulationRole,
  RoleResolver,
  SimulationTopology,
  Entity,
  SimulationEventType,
  SimulationNotification,
  SimulationDiagnostic,
} from './model/types.js';

// Random number generation
export { Random } from './random/Random.js';
export type { RandomSource } from './random/Random.js';
export {
  MAX_BINOMIAL_TRIALS,
  MAX_ERLANG_SHAPE,
  sampleDistribution,
  uniform,
  exponential,
  normal,
  triangular,
  erlang,
  binomial,
} from './random/sampler.js';

// Statistics collection
export { CounterStatistics } from './statistics/CounterStatistics.js';
export type { CounterSnapshot } from './statistics/CounterStatistics.js';
export { StatisticsCollector } from './statistics/StatisticsCollector.js';
export type { DashboardReading } from './statistics/StatisticsCollector.js';

// Observers
export { EventLog } from './observers/EventLog.js';
export type { EventLogEntry } from './observers/EventLog.js';

// Validation
export {
  ValidationError,
  validateNonNegative,
  validatePositive,
  validateFinite,
  validateInteger,
  validateCount,
  validateTime,
} from './utils/validation.js';
