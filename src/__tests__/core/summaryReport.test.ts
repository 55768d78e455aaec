import { formatSummary, formatUsd } from '../../core/simulation/summaryReport';
import { SimulationSummary } from '../../core/simulation/forkSimulation';
import { ReunionAnalysis } from '../../core/reorg/reorgOracle';
import { ForkId } from '../../types/types';

describe('summaryReport', () => {
  const summary: SimulationSummary = {
    simTime: 600,
    ticks: 600,
    heights: { [ForkId.V27]: 150, [ForkId.V26]: 120 },
    blocksMined: { [ForkId.V27]: 50, [ForkId.V26]: 20 },
    hashratePcts: { [ForkId.V27]: 70, [ForkId.V26]: 30 },
    economicPcts: { [ForkId.V27]: 50, [ForkId.V26]: 50 },
    prices: { [ForkId.V27]: 62400, [ForkId.V26]: 57600 },
    fees: { [ForkId.V27]: 0.5, [ForkId.V26]: 1.25 },
    difficulty: { [ForkId.V27]: 1, [ForkId.V26]: 1 },
    chainwork: { [ForkId.V27]: 50, [ForkId.V26]: 20 },
    winningFork: ForkId.V27,
    forkSustained: true,
    reorgEvents: 1,
  };

  const reunion: ReunionAnalysis = {
    winningFork: ForkId.V27,
    losingForks: [{ forkId: ForkId.V26, depth: 20, nodes: ['n2'], reorgMass: 20, additionalOrphans: 3 }],
    nodesOnLosingForks: ['n2'],
    reunionReorgMass: 20,
    additionalOrphans: 3,
    chainwork: { [ForkId.V27]: 50, [ForkId.V26]: 20 },
  };

  it('should round USD amounts with thousands separators', () => {
    expect(formatUsd(1234567.6)).toBe('$1,234,568');
    expect(formatUsd(0)).toBe('$0');
  });

  it('should print one line per fork', () => {
    const lines = formatSummary(summary, reunion).split('\n');

    expect(lines).toContain(
      'v27: height=150 blocks=50 difficulty=1.0000 chainwork=50.00 hashrate=70.0% economic=50.0% price=$62,400 fee=0.50 sats/vB'
    );
    expect(lines).toContain(
      'v26: height=120 blocks=20 difficulty=1.0000 chainwork=20.00 hashrate=30.0% economic=50.0% price=$57,600 fee=1.25 sats/vB'
    );
  });

  it('should report status, winner and reunion', () => {
    const lines = formatSummary(summary, reunion).split('\n');

    expect(lines[3]).toBe('Simulated time: 600s (600 ticks)');
    expect(lines[4]).toBe('Fork status: SUSTAINED');
    expect(lines).toContain('Winning fork (chainwork): v27');
    expect(lines).toContain('Reorg events: 1');
    expect(lines).toContain('Reunion: v26 -> v27 depth=20 nodes=1 reorgMass=20 orphans=3');
  });

  it('should mark a missing winner', () => {
    const lines = formatSummary({ ...summary, winningFork: '', forkSustained: false }, reunion).split('\n');

    expect(lines).toContain('Winning fork (chainwork): none');
    expect(lines[4]).toBe('Fork status: natural split');
  });
});
