import { ReorgOracle } from '../../core/reorg/reorgOracle';
import { ForkId } from '../../types/types';

describe('ReorgOracle', () => {
  const originalConsole = { ...console };

  beforeAll(() => {
    console.log = jest.fn();
    console.error = jest.fn();
    console.warn = jest.fn();
    console.info = jest.fn();
  });

  afterAll(() => {
    console.log = originalConsole.log;
    console.error = originalConsole.error;
    console.warn = originalConsole.warn;
    console.info = originalConsole.info;
  });

  // Ancestor at 100; v27 reaches 105 and v26 reaches 103
  const createOracle = () => {
    const oracle = new ReorgOracle(100, 'lca-hash', 30, 4);
    oracle.initializeFork(ForkId.V27, 100);
    oracle.initializeFork(ForkId.V26, 100);
    return oracle;
  };

  describe('fork switches', () => {
    it('should orphan every block the node mined on the abandoned fork', () => {
      // Given: pool-a mined 101-103 on v26
      const oracle = createOracle();
      oracle.registerNode('pool-a', ForkId.V26);
      oracle.recordBlockMined('pool-a', ForkId.V26, 101);
      oracle.recordBlockMined('pool-a', ForkId.V26, 102);
      oracle.recordBlockMined('pool-a', ForkId.V26, 103);
      oracle.updateForkHeights({ [ForkId.V27]: 105, [ForkId.V26]: 103 });

      // When: pool-a moves to v27
      const event = oracle.recordForkSwitch('pool-a', ForkId.V26, ForkId.V27, 500);

      // Then: Depth is v26's length past the ancestor and all three blocks are lost
      expect(event.depth).toBe(3);
      expect(event.lcaHash).toBe('lca-hash');
      expect(event.blocksInvalidated).toEqual([101, 102, 103]);
      expect(oracle.getNodeMetrics('pool-a')?.forkId).toBe(ForkId.V27);
      expect(oracle.getOrphanRate('pool-a')).toBe(1);
      expect(oracle.getNodeExposure('pool-a')).toBe(3);
      expect(oracle.getReorgCount('pool-a')).toBe(1);
    });

    it('should forget orphaned blocks after the switch', () => {
      const oracle = createOracle();
      oracle.recordBlockMined('pool-a', ForkId.V26, 101);
      oracle.updateForkHeights({ [ForkId.V27]: 101, [ForkId.V26]: 101 });

      oracle.recordForkSwitch('pool-a', ForkId.V26, ForkId.V27, 100);
      const back = oracle.recordForkSwitch('pool-a', ForkId.V27, ForkId.V26, 200);
      const again = oracle.recordForkSwitch('pool-a', ForkId.V26, ForkId.V27, 300);

      expect(back.blocksInvalidated).toEqual([]);
      expect(again.blocksInvalidated).toEqual([]);
      expect(oracle.getNodeMetrics('pool-a')?.blocksOrphaned).toBe(1);
    });

    it('should register unknown miners on the fork they mined', () => {
      const oracle = createOracle();

      oracle.recordBlockMined('solo', ForkId.V26, 101);

      expect(oracle.getNodeMetrics('solo')?.forkId).toBe(ForkId.V26);
      expect(oracle.getNodeMetrics('solo')?.blocksMinedPerFork).toEqual({ [ForkId.V27]: 0, [ForkId.V26]: 1 });
    });

    it('should never report a negative depth', () => {
      const oracle = createOracle();
      oracle.updateForkHeights({ [ForkId.V27]: 100, [ForkId.V26]: 90 });

      expect(oracle.recordForkSwitch('pool-a', ForkId.V26, ForkId.V27, 10).depth).toBe(0);
    });
  });

  describe('incidents', () => {
    it('should cluster switches toward the same fork within the propagation window', () => {
      // Given: Three nodes leave v26 at 500s, 520s and 600s
      const oracle = createOracle();
      oracle.updateForkHeights({ [ForkId.V27]: 105, [ForkId.V26]: 103 });

      oracle.recordForkSwitch('pool-a', ForkId.V26, ForkId.V27, 500);
      oracle.recordForkSwitch('pool-b', ForkId.V26, ForkId.V27, 520);
      oracle.recordForkSwitch('pool-c', ForkId.V26, ForkId.V27, 600);

      // Then: The first two share an incident, the third is 80s late
      const incidents = oracle.getForkIncidents();
      expect(incidents.map(incident => incident.incidentId)).toEqual(['incident-1', 'incident-2']);
      expect(incidents[0].events).toHaveLength(2);
      expect(incidents[0].lastObserved).toBe(520);
      expect(oracle.getIncidentPenetration(incidents[0])).toBe(0.5);
    });

    it('should open a new incident for switches in the other direction', () => {
      const oracle = createOracle();

      oracle.recordForkSwitch('pool-a', ForkId.V26, ForkId.V27, 500);
      oracle.recordForkSwitch('pool-b', ForkId.V27, ForkId.V26, 505);

      expect(oracle.getForkIncidents()).toHaveLength(2);
    });

    it('should derive mass, volatility and stress from the events', () => {
      // Given: Two depth-3 reorgs in one incident over 4 nodes
      const oracle = createOracle();
      oracle.updateForkHeights({ [ForkId.V27]: 105, [ForkId.V26]: 103 });
      oracle.recordForkSwitch('pool-a', ForkId.V26, ForkId.V27, 500);
      oracle.recordForkSwitch('pool-b', ForkId.V26, ForkId.V27, 520);

      // Then: mass 6, normalized 1.5, stress 0.5 * 1.5
      expect(oracle.getTotalReorgMass()).toBe(6);
      expect(oracle.getNormalizedReorgMass()).toBe(1.5);
      expect(oracle.getForkVolatilityIndex(600)).toBe(0.01);
      expect(oracle.getForkVolatilityIndex(0)).toBe(0);
      expect(oracle.getConsensusStressScore()).toBe(0.75);
    });
  });

  describe('reunion analysis', () => {
    // x mined 2 blocks on v27; y mined 1 on v26; z sits on v26 without blocks
    const populated = () => {
      const oracle = createOracle();
      oracle.registerNode('x', ForkId.V27);
      oracle.registerNode('y', ForkId.V26);
      oracle.registerNode('z', ForkId.V26);
      oracle.recordBlockMined('x', ForkId.V27, 101);
      oracle.recordBlockMined('x', ForkId.V27, 102);
      oracle.recordBlockMined('y', ForkId.V26, 101);
      oracle.updateForkHeights({ [ForkId.V27]: 105, [ForkId.V26]: 103 });
      return oracle;
    };

    it('should reorg every node on the lighter fork', () => {
      const reunion = populated().calculateReunionReorg({ [ForkId.V27]: 5, [ForkId.V26]: 3 });

      expect(reunion.winningFork).toBe(ForkId.V27);
      expect(reunion.losingForks).toEqual([
        { forkId: ForkId.V26, depth: 3, nodes: ['y', 'z'], reorgMass: 6, additionalOrphans: 1 },
      ]);
      expect(reunion.nodesOnLosingForks).toEqual(['y', 'z']);
      expect(reunion.reunionReorgMass).toBe(6);
    });

    it('should pick the heavier chainwork even when it is shorter', () => {
      const reunion = populated().calculateReunionReorg({ [ForkId.V27]: 5, [ForkId.V26]: 8 });

      expect(reunion.winningFork).toBe(ForkId.V26);
      expect(reunion.losingForks[0]).toEqual({
        forkId: ForkId.V27, depth: 5, nodes: ['x'], reorgMass: 5, additionalOrphans: 2,
      });
    });

    it('should give a chainwork tie to the first fork', () => {
      const reunion = populated().calculateReunionReorg({ [ForkId.V27]: 4, [ForkId.V26]: 4 });
      expect(reunion.winningFork).toBe(ForkId.V27);
    });
  });

  describe('summaries', () => {
    it('should summarize the network', () => {
      const oracle = createOracle();
      oracle.recordBlockMined('pool-a', ForkId.V26, 101);
      oracle.updateForkHeights({ [ForkId.V27]: 102, [ForkId.V26]: 101 });
      oracle.recordForkSwitch('pool-a', ForkId.V26, ForkId.V27, 50);

      const summary = oracle.getNetworkSummary();

      expect(summary.finalHeights).toEqual({ [ForkId.V27]: 102, [ForkId.V26]: 101 });
      expect(summary.totalNodesTracked).toBe(1);
      expect(summary.totalBlocksMined).toBe(1);
      expect(summary.totalBlocksOrphaned).toBe(1);
      expect(summary.totalReorgEvents).toBe(1);
      expect(summary.totalForkIncidents).toBe(1);
    });

    it('should report a missing node', () => {
      expect(createOracle().getNodeSummary('ghost')).toEqual({ nodeId: 'ghost', error: 'Node not found' });
    });

    it('should export events with orphan counts', () => {
      const oracle = createOracle();
      oracle.recordBlockMined('pool-a', ForkId.V26, 101);
      oracle.updateForkHeights({ [ForkId.V27]: 102, [ForkId.V26]: 101 });
      oracle.recordForkSwitch('pool-a', ForkId.V26, ForkId.V27, 50);

      const exported = oracle.exportToJson();

      expect(exported.reorgEvents[0].blocksOrphaned).toBe(1);
      expect(exported.forkIncidents[0].reorgMass).toBe(1);
      expect(exported.config.totalNodes).toBe(4);
    });
  });
});
