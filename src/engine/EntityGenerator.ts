import type { Entity, GeneratorConfig, NodeId } from '../model/types.js';
import { sampleDistribution } from '../random/sampler.js';
import type { EngineContext } from './context.js';
import type { EntityRouter } from './EntityRouter.js';

/** Smallest gap between two ticks of the same generator */
export const MIN_INTERVAL = 0.001;

function stopsOnTime(config: GeneratorConfig): boolean {
  return config.termination === 'time' || config.termination === 'countOrTime';
}

function stopsOnCount(config: GeneratorConfig): boolean {
  return config.termination === 'count' || config.termination === 'countOrTime';
}

/**
 * Self-rescheduling entity producer for Generator nodes.
 * Each tick emits a batch of entities, routes them immediately, and queues
 * the generator's next tick unless a termination rule has been reached.
 */
export class EntityGenerator {
  constructor(
    private readonly context: EngineContext,
    private readonly router: EntityRouter
  ) {}

  /**
   * Queue the first tick of every generator at its start time, in node
   * declaration order.
   */
  prime(): void {
    const { topology, state } = this.context;
    for (const [nodeId, config] of topology.generators()) {
      state.queue.push(config.startTime, {
        kind: 'generate',
        targetNodeId: nodeId,
        payload: { tick: 0 },
      });
    }
  }

  /**
   * Run one tick of a generator at the current clock.
   */
  generate(generatorId: NodeId, tick: number): void {
    const { topology, state } = this.context;
    const role = topology.role(generatorId);
    if (role?.role !== 'generator') {
      return;
    }

    const config = role.config;
    const now = state.clock;

    if (stopsOnTime(config) && now >= config.stopTime) {
      return;
    }
    if (stopsOnCount(config) && state.emittedBy(generatorId) >= config.maxEntities) {
      return;
    }

    for (let i = 0; i < config.batchSize; i++) {
      const entity = this.createEntity(generatorId, config, now);
      state.emitted.set(generatorId, state.emittedBy(generatorId) + 1);

      this.context.notify(
        'EntityCreated',
        generatorId,
        entity,
        `Generated ${entity.entityType} #${entity.id}`
      );
      this.router.route(entity, generatorId);

      if (stopsOnCount(config) && state.emittedBy(generatorId) >= config.maxEntities) {
        return;
      }
    }

    const nextTime = now + this.nextInterval(config);
    if (stopsOnTime(config) && nextTime > config.stopTime) {
      return;
    }

    state.queue.push(nextTime, {
      kind: 'generate',
      targetNodeId: generatorId,
      payload: { tick: tick + 1 },
    });
  }

  /**
   * Sample the gap until the next tick. In rate mode a positive sample is
   * inverted; the result is floored at MIN_INTERVAL.
   */
  private nextInterval(config: GeneratorConfig): number {
    let interval = sampleDistribution(
      this.context.random,
      config.distribution,
      config.param1,
      config.param2,
      config.param3
    );
    if (config.timingMode === 'ratePerUnit' && interval > 0) {
      interval = 1 / interval;
    }
    return Number.isNaN(interval) ? MIN_INTERVAL : Math.max(MIN_INTERVAL, interval);
  }

  private createEntity(generatorId: NodeId, config: GeneratorConfig, now: number): Entity {
    return {
      id: this.context.state.allocateEntityId(),
      entityType: config.entityType,
      colorHint: config.color,
      createdAt: now,
      sourceNodeId: generatorId,
      currentNodeId: generatorId,
      attributes: {},
    };
  }
}
