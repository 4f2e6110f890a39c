import { describe, it, expect } from 'vitest';
import {
  createNodeDataLookup,
  getDefaultGeneratorConfig,
  resolveChanceConfig,
  resolveCounterConfig,
  resolveDashboardConfig,
  resolveGeneratorConfig,
  resolveRoleConfig,
  resolveSinkConfig,
  type NodeDataRecord,
} from '../../src/model/config.js';
import { ValidationError } from '../../src/utils/validation.js';

describe('role configuration', () => {
  describe('defaults', () => {
    it('should provide the generator defaults', () => {
      expect(getDefaultGeneratorConfig()).toEqual({
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
      });
    });

    it('should complete partial generator input', () => {
      const config = resolveGeneratorConfig({ distribution: 'constant', param1: 5 });

      expect(config.distribution).toBe('constant');
      expect(config.param1).toBe(5);
      expect(config.batchSize).toBe(1);
      expect(config.termination).toBe('none');
    });

    it('should default counters, chance and sinks', () => {
      expect(resolveCounterConfig()).toEqual({ name: 'Counter', throughputWindow: 60 });
      expect(resolveChanceConfig()).toEqual({
        name: 'Chance',
        branches: [
          { label: 'Yes', probability: 0.5 },
          { label: 'No', probability: 0.5 },
        ],
      });
      expect(resolveSinkConfig()).toEqual({ name: 'Sink' });
    });

    it('should resolve undefined input to a generic node', () => {
      expect(resolveRoleConfig(undefined)).toEqual({ role: 'generic' });
    });
  });

  describe('validation', () => {
    it('should reject a zero batch size', () => {
      expect(() => resolveGeneratorConfig({ batchSize: 0 })).toThrow(ValidationError);
      expect(() => resolveGeneratorConfig({ batchSize: 0 })).toThrow(
        'batchSize must be at least 1 (got 0)'
      );
    });

    it('should reject a fractional entity ceiling', () => {
      expect(() => resolveGeneratorConfig({ maxEntities: 2.5 })).toThrow(
        'maxEntities must be an integer (got 2.5)'
      );
    });

    it('should reject a negative start time', () => {
      expect(() => resolveGeneratorConfig({ startTime: -1 })).toThrow(
        'startTime must be non-negative (got -1)'
      );
    });

    it('should accept an infinite stop time', () => {
      expect(resolveGeneratorConfig({ stopTime: Infinity }).stopTime).toBe(Infinity);
    });

    it('should reject a non-finite branch probability', () => {
      expect(() =>
        resolveChanceConfig({ branches: [{ label: 'Left', probability: Number.NaN }] })
      ).toThrow("probability must be a finite number (got NaN). Branch 'Left'");
    });

    it('should not mutate the caller branches', () => {
      const branches = [{ label: 'A', probability: 1 }];
      const config = resolveChanceConfig({ branches });

      expect(config.branches).toEqual(branches);
      expect(config.branches[0]).not.toBe(branches[0]);
    });

    it('should provide default dashboard entries', () => {
      expect(resolveDashboardConfig().stats).toEqual([
        { label: 'Total Count', statType: 'count' },
        { label: 'Rate', statType: 'rate' },
      ]);
    });
  });
});

describe('createNodeDataLookup', () => {
  const records: NodeDataRecord[] = [
    {
      id: 'arrivals',
      data: {
        simulationType: 'Generator',
        simulationConfig: JSON.stringify({
          name: 'Arrivals',
          distribution: 'constant',
          param1: 5,
          termination: 'count',
          maxEntities: 3,
          batchSize: 'two',
        }),
      },
    },
    { id: 'tally', data: { simulationType: 'counter', simulationConfig: '{"throughputWindow":30}' } },
    {
      id: 'split',
      data: {
        simulationType: 'CHANCE',
        simulationConfig: JSON.stringify({
          branches: [{ label: 'Left', probability: 0.2 }, { label: 'Right' }, 'bogus'],
        }),
      },
    },
    {
      id: 'board',
      data: {
        simulationType: 'Dashboard',
        simulationConfig: JSON.stringify({
          title: 'Line',
          stats: [
            { label: 'Total', statType: 'count', sourceCounterId: 'tally' },
            { label: 'Bad', statType: 'median' },
            { statType: 'max' },
          ],
        }),
      },
    },
    { id: 'exit', data: { simulationType: 'Sink' } },
    { id: 'broken', data: { simulationType: 'Counter', simulationConfig: '{not json' } },
    { id: 'array', data: { simulationType: 'Counter', simulationConfig: '[1, 2]' } },
    { id: 'mystery', data: { simulationType: 'Teleporter' } },
    { id: 'plain', data: { label: 'Just a box' } },
  ];
  const resolveRole = createNodeDataLookup(records);

  it('should decode generator fields and ignore mistyped ones', () => {
    const role = resolveRoleConfig(resolveRole('arrivals'));

    expect(role.role).toBe('generator');
    if (role.role === 'generator') {
      expect(role.config.name).toBe('Arrivals');
      expect(role.config.distribution).toBe('constant');
      expect(role.config.param1).toBe(5);
      expect(role.config.termination).toBe('count');
      expect(role.config.maxEntities).toBe(3);
      expect(role.config.batchSize).toBe(1);
    }
  });

  it('should match role names case-insensitively', () => {
    expect(resolveRoleConfig(resolveRole('tally'))).toEqual({
      role: 'counter',
      config: { name: 'Counter', throughputWindow: 30 },
    });
    expect(resolveRole('split')?.role).toBe('chance');
  });

  it('should decode chance branches with missing fields as 0 and skip non-objects', () => {
    expect(resolveRoleConfig(resolveRole('split'))).toEqual({
      role: 'chance',
      config: {
        name: 'Chance',
        branches: [
          { label: 'Left', probability: 0.2 },
          { label: 'Right', probability: 0 },
        ],
      },
    });
  });

  it('should decode dashboard entries and drop unknown stat types', () => {
    const role = resolveRoleConfig(resolveRole('board'));

    expect(role).toEqual({
      role: 'dashboard',
      config: {
        name: 'Dashboard',
        title: 'Line',
        stats: [
          { label: 'Total', statType: 'count', sourceCounterId: 'tally' },
          { label: 'max', statType: 'max', sourceCounterId: undefined },
        ],
      },
    });
  });

  it('should decode a role without config', () => {
    expect(resolveRoleConfig(resolveRole('exit'))).toEqual({
      role: 'sink',
      config: { name: 'Sink' },
    });
  });

  it('should leave undecodable nodes unresolved', () => {
    expect(resolveRole('broken')).toBeUndefined();
    expect(resolveRole('array')).toBeUndefined();
    expect(resolveRole('mystery')).toBeUndefined();
    expect(resolveRole('plain')).toBeUndefined();
    expect(resolveRole('unknown-id')).toBeUndefined();
    expect(resolveRoleConfig(resolveRole('broken'))).toEqual({ role: 'generic' });
  });

  describe('editor-serialized configs', () => {
    const editorRecords: NodeDataRecord[] = [
      {
        id: 'orders',
        data: {
          simulationType: 'Generator',
          simulationConfig: JSON.stringify({
            NodeType: 0,
            Name: 'Orders',
            TimingMode: 1,
            Distribution: 9,
            Param1: 5,
            Param2: 0,
            Param3: 0,
            Termination: 1,
            MaxEntities: 3,
            StartTime: 2,
            StopTime: 1000,
            BatchSize: 2,
            EntityType: 'Order',
            EntityColor: '#ff0000',
          }),
        },
      },
      {
        id: 'named',
        data: {
          simulationType: 'Generator',
          simulationConfig: JSON.stringify({
            Distribution: 'Deterministic',
            TimingMode: 'InterArrival',
            Termination: 'Infinite',
          }),
        },
      },
      {
        id: 'lognormal',
        data: {
          simulationType: 'Generator',
          simulationConfig: '{"Distribution":6,"Termination":3}',
        },
      },
      {
        id: 'split',
        data: {
          simulationType: 'Chance',
          simulationConfig: JSON.stringify({
            Name: 'Split',
            Branches: [
              { Label: 'Yes', Probability: 0.7 },
              { Label: 'No', Probability: 0.3 },
            ],
          }),
        },
      },
      {
        id: 'tally',
        data: {
          simulationType: 'Counter',
          simulationConfig: '{"Name":"Tally","ThroughputWindow":30,"DashboardNodeId":null}',
        },
      },
      {
        id: 'board',
        data: {
          simulationType: 'Dashboard',
          simulationConfig: JSON.stringify({
            Name: 'Board',
            Title: 'Line',
            Stats: [
              { Label: 'Total', StatType: 0, SourceCounterId: 4, Format: 'N0' },
              { Label: 'Spread', StatType: 6 },
              { Label: 'Dev', StatType: 'StdDev' },
              { Label: 'Shape', StatType: 'Histogram' },
            ],
          }),
        },
      },
    ];
    const resolveEditorRole = createNodeDataLookup(editorRecords);

    it('should decode PascalCase keys and ordinal enum codes', () => {
      expect(resolveRoleConfig(resolveEditorRole('orders'))).toEqual({
        role: 'generator',
        config: {
          name: 'Orders',
          entityType: 'Order',
          color: '#ff0000',
          batchSize: 2,
          startTime: 2,
          stopTime: 1000,
          maxEntities: 3,
          distribution: 'constant',
          param1: 5,
          param2: 0,
          param3: 0,
          timingMode: 'ratePerUnit',
          termination: 'count',
        },
      });
    });

    it('should decode the editor enum names', () => {
      const role = resolveRoleConfig(resolveEditorRole('named'));

      expect(role.role).toBe('generator');
      if (role.role === 'generator') {
        expect(role.config.distribution).toBe('constant');
        expect(role.config.timingMode).toBe('interval');
        expect(role.config.termination).toBe('none');
      }
    });

    it('should fall back to the default for distributions without a sampler', () => {
      const role = resolveRoleConfig(resolveEditorRole('lognormal'));

      expect(role.role).toBe('generator');
      if (role.role === 'generator') {
        expect(role.config.distribution).toBe('exponential');
        expect(role.config.termination).toBe('countOrTime');
      }
    });

    it('should decode branches and counter fields', () => {
      expect(resolveRoleConfig(resolveEditorRole('split'))).toEqual({
        role: 'chance',
        config: {
          name: 'Split',
          branches: [
            { label: 'Yes', probability: 0.7 },
            { label: 'No', probability: 0.3 },
          ],
        },
      });
      expect(resolveRoleConfig(resolveEditorRole('tally'))).toEqual({
        role: 'counter',
        config: { name: 'Tally', throughputWindow: 30 },
      });
    });

    it('should read numeric counter ids and drop histogram entries', () => {
      expect(resolveRoleConfig(resolveEditorRole('board'))).toEqual({
        role: 'dashboard',
        config: {
          name: 'Board',
          title: 'Line',
          stats: [
            { label: 'Total', statType: 'count', sourceCounterId: '4' },
            { label: 'Dev', statType: 'stdDev', sourceCounterId: undefined },
          ],
        },
      });
    });
  });
});
