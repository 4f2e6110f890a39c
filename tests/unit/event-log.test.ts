import { describe, it, expect } from 'vitest';
import { Simulation } from '../../src/core/Simulation.js';
import type { SimulationTopology } from '../../src/model/types.js';
import { EventLog } from '../../src/observers/EventLog.js';
import { ValidationError } from '../../src/utils/validation.js';

const pipeline: SimulationTopology = {
  nodes: ['source', 'tally', 'exit'],
  edges: [
    { from: 'source', to: 'tally' },
    { from: 'tally', to: 'exit' },
  ],
  resolveRole: (id) => {
    switch (id) {
      case 'source':
        return {
          role: 'generator',
          config: { distribution: 'constant', param1: 5, termination: 'count', maxEntities: 3 },
        };
      case 'tally':
        return { role: 'counter' };
      default:
        return { role: 'sink' };
    }
  },
};

describe('EventLog', () => {
  it('should format notifications with two-decimal times', () => {
    const sim = new Simulation({ randomSeed: 1 });
    sim.initialize(pipeline);
    const log = new EventLog();
    log.attach(sim);

    sim.run();

    expect(log.size).toBe(9);
    expect(log.lines().slice(0, 4)).toEqual([
      '[0.00] Generated Entity #1',
      '[0.00] Counter: 1 total',
      '[0.00] Entity #1 consumed at Sink',
      '[5.00] Generated Entity #2',
    ]);
    expect(log.getEntries()[1]).toEqual({
      simulationTime: 0,
      eventType: 'CounterUpdated',
      nodeId: 'tally',
      text: '[0.00] Counter: 1 total',
    });
  });

  it('should keep only the most recent entries', () => {
    const sim = new Simulation({ randomSeed: 1 });
    sim.initialize(pipeline);
    const log = new EventLog(4);
    log.attach(sim);

    sim.run();

    expect(log.lines()).toEqual([
      '[5.00] Entity #2 consumed at Sink',
      '[10.00] Generated Entity #3',
      '[10.00] Counter: 3 total',
      '[10.00] Entity #3 consumed at Sink',
    ]);
  });

  it('should stop recording once detached', () => {
    const sim = new Simulation({ randomSeed: 1 });
    sim.initialize(pipeline);
    const log = new EventLog();
    log.attach(sim);
    sim.step();
    log.detach();
    sim.step();

    expect(log.size).toBe(3);
  });

  it('should follow only the simulation it was attached to last', () => {
    const first = new Simulation({ randomSeed: 1 });
    const second = new Simulation({ randomSeed: 1 });
    first.initialize(pipeline);
    second.initialize(pipeline);
    const log = new EventLog();

    log.attach(first);
    log.attach(second);
    first.run();

    expect(log.size).toBe(0);

    second.step();
    expect(log.size).toBe(3);
  });

  it('should clear its entries', () => {
    const log = new EventLog();
    log.record({
      simulationTime: 1.234,
      eventType: 'EntityCreated',
      nodeId: 'source',
      entity: {
        id: 1,
        entityType: 'Entity',
        colorHint: '#4CAF50',
        createdAt: 1.234,
        sourceNodeId: 'source',
        currentNodeId: 'source',
        attributes: {},
      },
      message: 'Generated Entity #1',
    });

    expect(log.lines()).toEqual(['[1.23] Generated Entity #1']);
    log.clear();
    expect(log.size).toBe(0);
  });

  it('should reject a capacity below one', () => {
    expect(() => new EventLog(0)).toThrow(ValidationError);
  });
});
