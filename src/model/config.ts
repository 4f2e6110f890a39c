import {
  ValidationError,
  validateCount,
  validateFinite,
  validateTime,
} from '../utils/validation.js';
import type {
  ChanceBranch,
  ChanceConfig,
  ClockConfig,
  CounterConfig,
  DashboardConfig,
  DashboardStat,
  DashboardStatType,
  DistributionKind,
  GeneratorConfig,
  NodeId,
  NodeRoleConfig,
  NodeRoleInput,
  RoleResolver,
  SinkConfig,
  TerminationCondition,
  TimingMode,
} from './types.js';

export const DISTRIBUTIONS: readonly DistributionKind[] = [
  'constant',
  'uniform',
  'exponential',
  'normal',
  'triangular',
  'erlang',
  'poisson',
  'binomial',
];

export const TIMING_MODES: readonly TimingMode[] = ['interval', 'ratePerUnit'];

export const TERMINATION_CONDITIONS: readonly TerminationCondition[] = [
  'none',
  'time',
  'count',
  'countOrTime',
];

export const DASHBOARD_STAT_TYPES: readonly DashboardStatType[] = [
  'count',
  'rate',
  'average',
  'min',
  'max',
  'stdDev',
];

/**
 * Get default generator configuration
 */
export function getDefaultGeneratorConfig(): GeneratorConfig {
  return {
    name: 'Generator',
    entityType: 'Entity',
    color: '#4CAF50',
    batchSize: 1,
    startTime: 0,
    stopTime: 1000,
    maxEntities: 100,
    distribution: 'exponential',
    param1: 1,
    param2: 0,
    param3: 0,
    timingMode: 'interval',
    termination: 'none',
  };
}

function includes<T extends string>(allowed: readonly T[], value: string): value is T {
  return allowed.some((candidate) => candidate === value);
}

function validateChoice<T extends string>(
  value: string,
  allowed: readonly T[],
  paramName: string
): void {
  if (!includes(allowed, value)) {
    throw new ValidationError(
      `Invalid ${paramName}: ${value}. Must be one of: ${allowed.join(', ')}`,
      { [paramName]: value, allowed }
    );
  }
}

/**
 * Complete a partial generator configuration with defaults and validate it.
 * Distribution parameters are not checked here: the sampler clamps them.
 */
export function resolveGeneratorConfig(
  input: Partial<GeneratorConfig> = {}
): GeneratorConfig {
  const defaults = getDefaultGeneratorConfig();
  const config: GeneratorConfig = {
    name: input.name ?? defaults.name,
    entityType: input.entityType ?? defaults.entityType,
    color: input.color ?? defaults.color,
    batchSize: input.batchSize ?? defaults.batchSize,
    startTime: input.startTime ?? defaults.startTime,
    stopTime: input.stopTime ?? defaults.stopTime,
    maxEntities: input.maxEntities ?? defaults.maxEntities,
    distribution: input.distribution ?? defaults.distribution,
    param1: input.param1 ?? defaults.param1,
    param2: input.param2 ?? defaults.param2,
    param3: input.param3 ?? defaults.param3,
    timingMode: input.timingMode ?? defaults.timingMode,
    termination: input.termination ?? defaults.termination,
  };

  validateChoice(config.distribution, DISTRIBUTIONS, 'distribution');
  validateChoice(config.timingMode, TIMING_MODES, 'timingMode');
  validateChoice(config.termination, TERMINATION_CONDITIONS, 'termination');
  validateCount(config.batchSize, 'batchSize', 1);
  validateCount(config.maxEntities, 'maxEntities', 0);
  validateTime(config.startTime, 'startTime');
  validateTime(config.stopTime, 'stopTime', true);

  return config;
}

export function resolveCounterConfig(input: Partial<CounterConfig> = {}): CounterConfig {
  const config: CounterConfig = {
    name: input.name ?? 'Counter',
    throughputWindow: input.throughputWindow ?? 60,
  };
  validateFinite(config.throughputWindow, 'throughputWindow');
  return config;
}

export function resolveChanceConfig(input: Partial<ChanceConfig> = {}): ChanceConfig {
  const branches: ChanceBranch[] = (
    input.branches ?? [
      { label: 'Yes', probability: 0.5 },
      { label: 'No', probability: 0.5 },
    ]
  ).map((branch) => ({ ...branch }));

  for (const branch of branches) {
    validateFinite(branch.probability, 'probability', `Branch '${branch.label}'`);
  }

  return { name: input.name ?? 'Chance', branches };
}

export function resolveSinkConfig(input: Partial<SinkConfig> = {}): SinkConfig {
  return { name: input.name ?? 'Sink' };
}

export function resolveClockConfig(input: Partial<ClockConfig> = {}): ClockConfig {
  return { name: input.name ?? 'Clock', interval: input.interval ?? 1 };
}

export function resolveDashboardConfig(
  input: Partial<DashboardConfig> = {}
): DashboardConfig {
  const stats: DashboardStat[] = (
    input.stats ?? [
      { label: 'Total Count', statType: 'count' },
      { label: 'Rate', statType: 'rate' },
    ]
  ).map((stat) => {
    validateChoice(stat.statType, DASHBOARD_STAT_TYPES, 'statType');
    return { ...stat };
  });

  return {
    name: input.name ?? 'Dashboard',
    title: input.title ?? 'Simulation Dashboard',
    stats,
  };
}

/**
 * Turn caller-supplied role input into a complete, validated role config.
 */
export function resolveRoleConfig(input: NodeRoleInput | undefined): NodeRoleConfig {
  if (!input) {
    return { role: 'generic' };
  }

  switch (input.role) {
    case 'generator':
      return { role: 'generator', config: resolveGeneratorConfig(input.config) };
    case 'counter':
      return { role: 'counter', config: resolveCounterConfig(input.config) };
    case 'chance':
      return { role: 'chance', config: resolveChanceConfig(input.config) };
    case 'sink':
      return { role: 'sink', config: resolveSinkConfig(input.config) };
    case 'clock':
      return { role: 'clock', config: resolveClockConfig(input.config) };
    case 'dashboard':
      return { role: 'dashboard', config: resolveDashboardConfig(input.config) };
    case 'generic':
      return { role: 'generic' };
  }
}

// Node data decoding

/** Key under which a node's data map stores its role name */
export const SIMULATION_TYPE_KEY = 'simulationType';
/** Key under which a node's data map stores its JSON-encoded role config */
export const SIMULATION_CONFIG_KEY = 'simulationConfig';

/**
 * A node as stored by a diagram editor: an id plus a string data map.
 */
export interface NodeDataRecord {
  id: NodeId;
  data: Readonly<Record<string, string>>;
}

/**
 * How an editor enum is read: the values it may be written as, by name and
 * by ordinal. A code or name mapped to `undefined` has no counterpart here.
 */
interface EnumEncoding<T extends string> {
  allowed: readonly T[];
  codes: ReadonlyArray<T | undefined>;
  aliases?: ReadonlyMap<string, T>;
}

const DISTRIBUTION_ENCODING: EnumEncoding<DistributionKind> = {
  allowed: DISTRIBUTIONS,
  // Exponential, Deterministic, Normal, Uniform, Erlang, Triangular,
  // LogNormal, Weibull, Gamma, Constant, Poisson, Binomial
  codes: [
    'exponential',
    'constant',
    'normal',
    'uniform',
    'erlang',
    'triangular',
    undefined,
    undefined,
    undefined,
    'constant',
    'poisson',
    'binomial',
  ],
  aliases: new Map<string, DistributionKind>([['deterministic', 'constant']]),
};

const TIMING_MODE_ENCODING: EnumEncoding<TimingMode> = {
  allowed: TIMING_MODES,
  codes: ['interval', 'ratePerUnit'],
  aliases: new Map<string, TimingMode>([
    ['interarrival', 'interval'],
    ['entitiesperunit', 'ratePerUnit'],
  ]),
};

const TERMINATION_ENCODING: EnumEncoding<TerminationCondition> = {
  allowed: TERMINATION_CONDITIONS,
  codes: ['none', 'count', 'time', 'countOrTime'],
  aliases: new Map<string, TerminationCondition>([['infinite', 'none']]),
};

const DASHBOARD_STAT_ENCODING: EnumEncoding<DashboardStatType> = {
  allowed: DASHBOARD_STAT_TYPES,
  // Histogram (6) has no single reading and is dropped
  codes: ['count', 'rate', 'average', 'min', 'max', 'stdDev', undefined],
};

type JsonObject = { [key: string]: unknown };

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a field under its camelCase key or, failing that, its PascalCase key.
 */
function field(source: JsonObject, key: string): unknown {
  return source[key] ?? source[key.charAt(0).toUpperCase() + key.slice(1)];
}

function readString(source: JsonObject, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = field(source, key);
    if (typeof value === 'string') {
      return value;
    }
  }
  return undefined;
}

function readNumber(source: JsonObject, key: string): number | undefined {
  const value = field(source, key);
  return typeof value === 'number' ? value : undefined;
}

/** Node ids may be stored as numbers */
function readNodeId(source: JsonObject, key: string): NodeId | undefined {
  const value = field(source, key);
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return typeof value === 'string' ? value : undefined;
}

function readEnum<T extends string>(
  source: JsonObject,
  key: string,
  encoding: EnumEncoding<T>
): T | undefined {
  const value = field(source, key);
  if (typeof value === 'number') {
    return Number.isInteger(value) ? encoding.codes[value] : undefined;
  }
  if (typeof value !== 'string') {
    return undefined;
  }
  const name = value.toLowerCase();
  return (
    encoding.aliases?.get(name) ??
    encoding.allowed.find((candidate) => candidate.toLowerCase() === name)
  );
}

function readArray(source: JsonObject, key: string): JsonObject[] | undefined {
  const value = field(source, key);
  return Array.isArray(value) ? value.filter(isJsonObject) : undefined;
}

function decodeRole(type: string, raw: JsonObject): NodeRoleInput | undefined {
  const name = readString(raw, 'name');
  switch (type.toLowerCase()) {
    case 'generator':
      return {
        role: 'generator',
        config: {
          name,
          entityType: readString(raw, 'entityType'),
          color: readString(raw, 'color', 'entityColor'),
          batchSize: readNumber(raw, 'batchSize'),
          startTime: readNumber(raw, 'startTime'),
          stopTime: readNumber(raw, 'stopTime'),
          maxEntities: readNumber(raw, 'maxEntities'),
          distribution: readEnum(raw, 'distribution', DISTRIBUTION_ENCODING),
          param1: readNumber(raw, 'param1'),
          param2: readNumber(raw, 'param2'),
          param3: readNumber(raw, 'param3'),
          timingMode: readEnum(raw, 'timingMode', TIMING_MODE_ENCODING),
          termination: readEnum(raw, 'termination', TERMINATION_ENCODING),
        },
      };
    case 'counter':
      return {
        role: 'counter',
        config: { name, throughputWindow: readNumber(raw, 'throughputWindow') },
      };
    case 'chance': {
      const branches = readArray(raw, 'branches')?.map((branch) => ({
        label: readString(branch, 'label') ?? '',
        probability: readNumber(branch, 'probability') ?? 0,
      }));
      return { role: 'chance', config: { name, branches } };
    }
    case 'sink':
      return { role: 'sink', config: { name } };
    case 'clock':
      return {
        role: 'clock',
        config: { name, interval: readNumber(raw, 'interval') },
      };
    case 'dashboard': {
      const stats = readArray(raw, 'stats')?.flatMap((stat) => {
        const statType = readEnum(stat, 'statType', DASHBOARD_STAT_ENCODING);
        return statType
          ? [
              {
                label: readString(stat, 'label') ?? statType,
                statType,
                sourceCounterId: readNodeId(stat, 'sourceCounterId'),
              },
            ]
          : [];
      });
      return {
        role: 'dashboard',
        config: { name, title: readString(raw, 'title'), stats },
      };
    }
    case 'generic':
      return { role: 'generic' };
    default:
      return undefined;
  }
}

/**
 * Build a role resolver over editor node data.
 *
 * Config fields are read under camelCase or PascalCase keys. Enum fields
 * take either a name, matched case-insensitively (`Infinite`,
 * `InterArrival`, `EntitiesPerUnit` and `Deterministic` included), or the
 * editor's ordinal code. A node whose type is unknown or whose config is not
 * valid JSON resolves to undefined and is treated as a generic pass-through.
 * Dashboard entries with an unknown stat type, or a histogram, are dropped.
 *
 * @example
 * ```typescript
 * const resolveRole = createNodeDataLookup([
 *   { id: 'arrivals', data: { simulationType: 'Generator', simulationConfig: '{"Param1":5,"Termination":1}' } },
 *   { id: 'exit', data: { simulationType: 'Sink' } },
 * ]);
 * resolveRole('exit')?.role; // 'sink'
 * ```
 */
export function createNodeDataLookup(records: Iterable<NodeDataRecord>): RoleResolver {
  const roles = new Map<NodeId, NodeRoleInput>();

  for (const record of records) {
    const type = record.data[SIMULATION_TYPE_KEY];
    if (type === undefined) {
      continue;
    }

    const json = record.data[SIMULATION_CONFIG_KEY];
    let raw: unknown = {};
    if (json !== undefined) {
      try {
        raw = JSON.parse(json);
      } catch {
        // unreadable config: left unresolved, so treated as generic
        continue;
      }
    }
    if (!isJsonObject(raw)) {
      continue;
    }

    const role = decodeRole(type, raw);
    if (role) {
      roles.set(record.id, role);
    }
  }

  return (nodeId) => roles.get(nodeId);
}
