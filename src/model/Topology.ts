import { ValidationError } from '../utils/validation.js';
import { resolveRoleConfig } from './config.js';
import type {
  CounterConfig,
  GeneratorConfig,
  NodeId,
  NodeRoleConfig,
  SimulationTopology,
} from './types.js';

/**
 * Resolved, read-only view of the simulated graph.
 * Roles are looked up once when the topology is built; outgoing edges keep
 * their declaration order.
 *
 * @example
 * ```typescript
 * const topology = Topology.from({
 *   nodes: ['arrivals', 'exit'],
 *   edges: [{ from: 'arrivals', to: 'exit' }],
 *   resolveRole: (id) => (id === 'exit' ? { role: 'sink' } : { role: 'generator' }),
 * });
 * topology.outgoing('arrivals'); // ['exit']
 * ```
 */
export class Topology {
  private readonly roles: Map<NodeId, NodeRoleConfig>;
  private readonly adjacency: Map<NodeId, NodeId[]>;

  private constructor(
    roles: Map<NodeId, NodeRoleConfig>,
    adjacency: Map<NodeId, NodeId[]>
  ) {
    this.roles = roles;
    this.adjacency = adjacency;
  }

  /**
   * Build a topology from the graph provider's nodes, edges and role lookup.
   * Edges that start at an unknown node are dropped; edges that end at one
   * are kept and ignored when an entity is sent along them.
   *
   * @throws {ValidationError} If a node id appears twice or a role config is invalid
   */
  static from(source: SimulationTopology): Topology {
    const roles = new Map<NodeId, NodeRoleConfig>();
    for (const nodeId of source.nodes) {
      if (roles.has(nodeId)) {
        throw new ValidationError(`Duplicate node id '${nodeId}'`, { nodeId });
      }
      roles.set(nodeId, resolveRoleConfig(source.resolveRole(nodeId)));
    }

    const adjacency = new Map<NodeId, NodeId[]>();
    for (const edge of source.edges) {
      if (!roles.has(edge.from)) {
        continue;
      }
      const targets = adjacency.get(edge.from);
      if (targets) {
        targets.push(edge.to);
      } else {
        adjacency.set(edge.from, [edge.to]);
      }
    }

    return new Topology(roles, adjacency);
  }

  /**
   * An empty graph, used before the first initialize().
   */
  static empty(): Topology {
    return new Topology(new Map(), new Map());
  }

  /** Node ids in declaration order */
  get nodeIds(): NodeId[] {
    return [...this.roles.keys()];
  }

  get size(): number {
    return this.roles.size;
  }

  has(nodeId: NodeId): boolean {
    return this.roles.has(nodeId);
  }

  role(nodeId: NodeId): NodeRoleConfig | undefined {
    return this.roles.get(nodeId);
  }

  outgoing(nodeId: NodeId): readonly NodeId[] {
    return this.adjacency.get(nodeId) ?? [];
  }

  generators(): Array<[NodeId, GeneratorConfig]> {
    const result: Array<[NodeId, GeneratorConfig]> = [];
    for (const [nodeId, role] of this.roles) {
      if (role.role === 'generator') {
        result.push([nodeId, role.config]);
      }
    }
    return result;
  }

  counters(): Array<[NodeId, CounterConfig]> {
    const result: Array<[NodeId, CounterConfig]> = [];
    for (const [nodeId, role] of this.roles) {
      if (role.role === 'counter') {
        result.push([nodeId, role.config]);
      }
    }
    return result;
  }
}
