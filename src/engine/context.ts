import type { SimulationState } from '../core/SimulationState.js';
import type { Topology } from '../model/Topology.js';
import type {
  Entity,
  NodeId,
  SimulationDiagnostic,
  SimulationEventType,
} from '../model/types.js';
import type { RandomSource } from '../random/Random.js';

/**
 * What the generator and router see of the running simulation.
 */
export interface EngineContext {
  readonly topology: Topology;
  readonly state: SimulationState;
  readonly random: RandomSource;
  /** Deliveries allowed within one event before further routing is absorbed */
  readonly maxRouteDepth: number;
  notify(
    eventType: SimulationEventType,
    nodeId: NodeId,
    entity: Entity,
    message: string
  ): void;
  diagnose(nodeId: NodeId, code: SimulationDiagnostic['code'], message: string): void;
}
