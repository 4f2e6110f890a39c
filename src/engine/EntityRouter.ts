import type { ChanceBranch, Entity, NodeId } from '../model/types.js';
import type { EngineContext } from './context.js';

/**
 * Moves entities along outgoing edges and applies each node's role on
 * arrival.
 *
 * Routing from a node:
 * - no outgoing edges: the entity is absorbed
 * - Chance node with one branch per outgoing edge: one edge is drawn
 * - anything else: the entity is broadcast to every outgoing edge; with
 *   several edges the first receives the entity itself and each other edge
 *   a clone with a fresh id
 *
 * Arrival at a node:
 * - Sink: consumed, `EntityConsumed` published
 * - Counter: arrival recorded, `CounterUpdated` published, routing continues
 * - any other role: routing continues
 *
 * Each delivery spends one hop of the current event's `maxRouteDepth`
 * budget; once it is spent, entities still in flight are absorbed.
 */
export class EntityRouter {
  constructor(private readonly context: EngineContext) {}

  /**
   * Route an entity leaving `fromNodeId`.
   */
  route(entity: Entity, fromNodeId: NodeId): void {
    const { topology } = this.context;
    const targets = topology.outgoing(fromNodeId);
    if (targets.length === 0 || this.budgetExhausted(entity, fromNodeId)) {
      return;
    }

    const role = topology.role(fromNodeId);
    if (role?.role === 'chance') {
      const { branches } = role.config;
      if (branches.length === targets.length) {
        const target = this.pickBranch(branches, targets);
        if (target !== undefined) {
          this.deliver(entity, fromNodeId, target);
        }
        return;
      }
      this.reportMismatch(fromNodeId, branches.length, targets.length);
    }

    this.broadcast(entity, fromNodeId, targets);
  }

  /**
   * Deliver an entity to a node and apply the node's role.
   * Unknown nodes are ignored.
   */
  sendToNode(entity: Entity, toNodeId: NodeId): void {
    const { topology, state } = this.context;
    const role = topology.role(toNodeId);
    if (!role) {
      return;
    }

    entity.currentNodeId = toNodeId;

    switch (role.role) {
      case 'sink':
        this.context.notify(
          'EntityConsumed',
          toNodeId,
          entity,
          `${entity.entityType} #${entity.id} consumed at ${role.config.name}`
        );
        return;

      case 'counter': {
        const stats = state.statistics.recordArrival(
          toNodeId,
          entity.entityType,
          state.clock
        );
        this.context.notify(
          'CounterUpdated',
          toNodeId,
          entity,
          `Counter: ${stats.totalCount} total`
        );
        this.route(entity, toNodeId);
        return;
      }

      default:
        this.route(entity, toNodeId);
    }
  }

  /**
   * Walk cumulative probabilities in declared order and return the target of
   * the first branch whose sum reaches the draw; the last target when
   * rounding leaves the draw uncovered.
   */
  private pickBranch(
    branches: readonly ChanceBranch[],
    targets: readonly NodeId[]
  ): NodeId | undefined {
    const roll = this.context.random.next();
    let cumulative = 0;

    for (let index = 0; index < branches.length; index++) {
      cumulative += branches[index]?.probability ?? 0;
      if (roll <= cumulative) {
        return targets[index];
      }
    }

    return targets[targets.length - 1];
  }

  private broadcast(entity: Entity, fromNodeId: NodeId, targets: readonly NodeId[]): void {
    // Clones are taken before any delivery so each copies the entity as it
    // left the node, not as downstream nodes left it.
    const deliveries = targets.map((target, index) => ({
      target,
      entity: index === 0 ? entity : this.clone(entity),
    }));

    for (const delivery of deliveries) {
      this.deliver(delivery.entity, fromNodeId, delivery.target);
    }
  }

  /**
   * Spend one hop of the event's budget moving an entity along an edge.
   */
  private deliver(entity: Entity, fromNodeId: NodeId, toNodeId: NodeId): void {
    if (this.budgetExhausted(entity, fromNodeId)) {
      return;
    }
    this.context.state.routeHops++;
    this.sendToNode(entity, toNodeId);
  }

  /**
   * Whether the current event has used up its deliveries. The first entity
   * absorbed in an event is reported.
   */
  private budgetExhausted(entity: Entity, nodeId: NodeId): boolean {
    const { state, maxRouteDepth } = this.context;
    if (state.routeHops < maxRouteDepth) {
      return false;
    }
    if (!state.routeBudgetReported) {
      state.routeBudgetReported = true;
      this.context.diagnose(
        nodeId,
        'route-depth-exceeded',
        `${entity.entityType} #${entity.id} absorbed after ${state.routeHops} hops at ${nodeId}`
      );
    }
    return true;
  }

  private clone(entity: Entity): Entity {
    return {
      ...entity,
      id: this.context.state.allocateEntityId(),
      attributes: { ...entity.attributes },
    };
  }

  private reportMismatch(nodeId: NodeId, branches: number, edges: number): void {
    const { reportedMismatches } = this.context.state;
    if (reportedMismatches.has(nodeId)) {
      return;
    }
    reportedMismatches.add(nodeId);
    this.context.diagnose(
      nodeId,
      'chance-branch-mismatch',
      `Chance node ${nodeId} has ${branches} branches but ${edges} outgoing edges; broadcasting instead`
    );
  }
}
