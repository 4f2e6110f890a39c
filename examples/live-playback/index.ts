/**
 * Live Playback Example
 *
 * Plays a small parcel-sorting graph back in scaled real time. Node roles
 * come from editor-style node data (`simulationType` + JSON
 * `simulationConfig`), the run is paused and resumed halfway, and the most
 * recent notifications are printed from an event log.
 */

import {
  EventLog,
  Simulation,
  createNodeDataLookup,
  type NodeDataRecord,
} from '../../src/index.js';

const nodeData: NodeDataRecord[] = [
  {
    id: 'dock',
    data: {
      simulationType: 'Generator',
      simulationConfig: JSON.stringify({
        entityType: 'Parcel',
        distribution: 'uniform',
        param1: 1,
        param2: 3,
        batchSize: 2,
        termination: 'count',
        maxEntities: 40,
      }),
    },
  },
  { id: 'scanner', data: { simulationType: 'Counter' } },
  {
    id: 'sorter',
    data: {
      simulationType: 'Chance',
      simulationConfig: JSON.stringify({
        branches: [
          { label: 'Local', probability: 0.6 },
          { label: 'Regional', probability: 0.4 },
        ],
      }),
    },
  },
  { id: 'local', data: { simulationType: 'Sink' } },
  { id: 'regional', data: { simulationType: 'Sink' } },
  {
    id: 'board',
    data: {
      simulationType: 'Dashboard',
      simulationConfig: JSON.stringify({
        title: 'Scanner',
        stats: [
          { label: 'Parcels', statType: 'count', sourceCounterId: 'scanner' },
          { label: 'Mean gap', statType: 'average', sourceCounterId: 'scanner' },
        ],
      }),
    },
  },
];

async function runSimulation() {
  const sim = new Simulation({ randomSeed: 7, speed: 8, timeUnitMs: 50 });
  sim.initialize({
    nodes: nodeData.map((node) => node.id),
    edges: [
      { from: 'dock', to: 'scanner' },
      { from: 'scanner', to: 'sorter' },
      { from: 'sorter', to: 'local' },
      { from: 'sorter', to: 'regional' },
    ],
    resolveRole: createNodeDataLookup(nodeData),
  });

  const log = new EventLog(10);
  log.attach(sim);

  let pausedOnce = false;
  sim.on('time', (time) => {
    if (time >= 20 && !pausedOnce) {
      pausedOnce = true;
      sim.pause();
      console.log(`Paused at ${sim.now.toFixed(2)}`);
      setTimeout(() => sim.resume(), 200);
    }
  });
  sim.on('resumed', () => console.log('Resumed'));

  const result = await sim.start();
  console.log(`Run ended at ${result.endTime.toFixed(2)} after ${result.eventsProcessed} events`);
  console.log('\nLast notifications:');
  console.log(log.lines().join('\n'));

  console.log('\nDashboard:');
  for (const reading of sim.getDashboard('board') ?? []) {
    console.log(`  ${reading.label}: ${reading.value?.toFixed(2) ?? 'n/a'}`);
  }

  return result;
}

runSimulation().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});

export { runSimulation };
