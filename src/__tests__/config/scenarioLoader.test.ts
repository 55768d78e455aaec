import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import {
  CONFIG_DIR,
  assignFromDistribution,
  buildNetworkMetadata,
  buildPools,
  definedEntries,
  inferInitialFork,
  listScenarios,
  loadActivityProfiles,
  loadEconomicNodes,
  loadPools,
  loadPriceOracleConfig,
  loadSimulationConfig,
  parseWithSchema,
  resolveActivityProfile,
} from '../../config/scenarioLoader';
import { ActivityProfilesSchema, DistributionBucket } from '../../config/schemas';
import { ActivityType, ForkId, NEUTRAL, NodeType } from '../../types/types';

const poolsPath = path.join(CONFIG_DIR, 'mining_pools.yaml');
const economicPath = path.join(CONFIG_DIR, 'economic_nodes.yaml');
const networkPath = path.join(CONFIG_DIR, 'networks', 'sample_network.yaml');

describe('scenarioLoader', () => {
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

  describe('mining pools', () => {
    it('should load a pool scenario from YAML', () => {
      // Given: The bundled pool rosters
      // When: Load the realistic scenario
      const pools = loadPools(poolsPath, 'realistic_current');

      // Then: Eight pools covering the whole network
      expect(pools).toHaveLength(8);
      expect(pools.reduce((sum, pool) => sum + pool.hashratePct, 0)).toBe(100);
      expect(pools[0]).toEqual({
        poolId: 'foundry',
        hashratePct: 28,
        forkPreference: NEUTRAL,
        ideologyStrength: 0,
        profitabilityThreshold: 0.03,
        maxLossUsd: null,
        maxLossPct: 0.10,
        currentFork: ForkId.V27,
      });
      expect(pools[3].forkPreference).toBe(ForkId.V26);
      expect(pools[3].maxLossUsd).toBe(2000000);
      expect(pools[3].currentFork).toBe(ForkId.V26);
    });

    it('should list the scenarios in a file', () => {
      expect(listScenarios(poolsPath)).toEqual(['realistic_current', 'ideological_split']);
    });

    it('should accept fork preferences in any case', () => {
      const pools = buildPools({
        s: { pools: [{ pool_id: 'x', hashrate_pct: 10, fork_preference: 'V27', ideology_strength: 0.5, profitability_threshold: 0.1 }] },
      }, 's', 'test');

      expect(pools[0].forkPreference).toBe(ForkId.V27);
    });

    it('should reject values outside their range with the offending path', () => {
      expect(() => buildPools({
        s: { pools: [{ pool_id: 'x', hashrate_pct: 150, ideology_strength: 0.5, profitability_threshold: 0.1 }] },
      }, 's', 'test')).toThrow('Invalid test: s.pools.0.hashrate_pct');
    });

    it('should reject an unknown fork preference', () => {
      expect(() => buildPools({
        s: { pools: [{ pool_id: 'x', hashrate_pct: 10, fork_preference: 'v99', ideology_strength: 0.5, profitability_threshold: 0.1 }] },
      }, 's', 'test')).toThrow('Invalid test: s.pools.0.fork_preference');
    });

    it('should name a missing scenario', () => {
      expect(() => buildPools({}, 'nope', 'test')).toThrow("Scenario 'nope' not found in test");
    });
  });

  describe('activity profiles', () => {
    const profiles = loadActivityProfiles();

    it('should require a default role', () => {
      expect(() => parseWithSchema(ActivityProfilesSchema, {
        exchange: { activity_type: 'transactional', transaction_velocity: 0.8 },
      }, 'profiles')).toThrow('activity profiles must define a "default" role');
    });

    it('should blend the role velocity with high volume turnover', () => {
      // Given: An exchange turning over 15% of custody a day
      const resolved = resolveActivityProfile('exchange', {}, { custody_btc: 200000, daily_volume_btc: 30000 }, profiles);

      // Then: 0.8 * 0.7 + 0.95 * 0.3
      expect(resolved.activityType).toBe(ActivityType.TRANSACTIONAL);
      expect(resolved.transactionVelocity).toBeCloseTo(0.845, 9);
    });

    it('should blend with the low turnover floor', () => {
      // Given: A custodian moving 0.1% a day, inferred velocity floors at 0.02
      const resolved = resolveActivityProfile('custody', {}, { custody_btc: 300000, daily_volume_btc: 300 }, profiles);

      expect(resolved.activityType).toBe(ActivityType.CUSTODIAL);
      expect(resolved.transactionVelocity).toBeCloseTo(0.076, 9);
    });

    it('should use the role profile as is without volume', () => {
      expect(resolveActivityProfile('treasury', {}, {}, profiles)).toEqual({
        activityType: ActivityType.CUSTODIAL,
        transactionVelocity: 0.05,
      });
    });

    it('should fall back to the default role and honour explicit values', () => {
      expect(resolveActivityProfile('unknown', {}, {}, profiles)).toEqual({
        activityType: ActivityType.MIXED,
        transactionVelocity: 0.5,
      });
      expect(resolveActivityProfile('exchange', { activity_type: ActivityType.CUSTODIAL, transaction_velocity: 0.2 }, {}, profiles))
        .toEqual({ activityType: ActivityType.CUSTODIAL, transactionVelocity: 0.2 });
    });
  });

  describe('node assignment', () => {
    const pattern: DistributionBucket[] = [
      { pct: 40, fork_preference: ForkId.V27, ideology_strength: 0.7 },
      { pct: 40, fork_preference: ForkId.V26, ideology_strength: 0.7 },
      { pct: 20, fork_preference: NEUTRAL, ideology_strength: 0 },
    ];

    it('should place nodes into buckets by position', () => {
      expect(assignFromDistribution(pattern, 0, 5)).toEqual({ fork_preference: ForkId.V27, ideology_strength: 0.7 });
      expect(assignFromDistribution(pattern, 2, 5)).toEqual({ fork_preference: ForkId.V26, ideology_strength: 0.7 });
      expect(assignFromDistribution(pattern, 4, 5)).toEqual({ fork_preference: NEUTRAL, ideology_strength: 0 });
    });

    it('should assign nothing without a pattern', () => {
      expect(assignFromDistribution(undefined, 0, 5)).toBeNull();
      expect(assignFromDistribution([], 0, 5)).toBeNull();
    });

    it('should infer the initial fork from the image tag', () => {
      expect(inferInitialFork('node-0003', '27.0')).toBe(ForkId.V27);
      expect(inferInitialFork('node-0003', '26.0')).toBe(ForkId.V26);
      expect(inferInitialFork('node-0003', '25.1')).toBe(ForkId.V26);
    });

    it('should infer the initial fork from the node index without a tag', () => {
      expect(inferInitialFork('node-0003', undefined)).toBe(ForkId.V27);
      expect(inferInitialFork('node-0012', undefined)).toBe(ForkId.V26);
      expect(inferInitialFork('observer', undefined)).toBe(ForkId.V27);
    });

    it('should copy the image tag into node metadata', () => {
      const metadata = buildNetworkMetadata({
        nodes: [
          { name: 'node-0001', image: { tag: 26 }, metadata: { custody_btc: 5 } },
          { name: 'node-0002' },
        ],
      });

      expect(metadata.get('node-0001')).toEqual({ custody_btc: 5, image_tag: '26' });
      expect(metadata.get('node-0002')).toEqual({});
    });

    it('should drop undefined entries', () => {
      expect(definedEntries<{ a: number; b: string }>({ a: 1, b: undefined })).toEqual({ a: 1 });
    });
  });

  describe('economic nodes', () => {
    it('should build economic and user nodes from the network, skipping pools', () => {
      // Given: The sample network with three pool nodes
      const nodes = loadEconomicNodes(networkPath, economicPath, 'realistic_current');

      // Then: Economic nodes first, then users
      expect(nodes.map(node => node.nodeId)).toEqual([
        'node-0002', 'node-0003', 'node-0004', 'node-0011', 'node-0012',
        'node-0005', 'node-0006', 'node-0013', 'node-0014',
      ]);
      expect(nodes.filter(node => node.nodeType === NodeType.ECONOMIC)).toHaveLength(5);
    });

    it('should apply role overrides to economic nodes', () => {
      const nodes = loadEconomicNodes(networkPath, economicPath, 'realistic_current');
      const processor = nodes.find(node => node.nodeId === 'node-0003');
      const custodian = nodes.find(node => node.nodeId === 'node-0004');

      expect(processor).toMatchObject({
        nodeType: NodeType.ECONOMIC,
        role: 'payment_processor',
        ideologyStrength: 0.1,
        switchingThreshold: 0.03,
        switchingCooldown: 3600,
        inertia: 0.25,
        maxLossPct: 0.05,
        consensusWeight: 30,
        initialFork: ForkId.V27,
      });
      expect(processor?.transactionVelocity).toBeCloseTo(0.95, 9);
      expect(custodian).toMatchObject({ role: 'custody', ideologyStrength: 0.2, inertia: 0.3, activityType: ActivityType.CUSTODIAL });
      expect(custodian?.transactionVelocity).toBeCloseTo(0.076, 9);
    });

    it('should give user nodes the user defaults', () => {
      const nodes = loadEconomicNodes(networkPath, economicPath, 'realistic_current');
      const soloMiner = nodes.find(node => node.nodeId === 'node-0013');

      expect(soloMiner).toEqual({
        nodeId: 'node-0013',
        nodeType: NodeType.USER,
        activityType: ActivityType.MIXED,
        transactionVelocity: 0.3,
        forkPreference: NEUTRAL,
        ideologyStrength: 0.3,
        switchingThreshold: 0.08,
        custodyBtc: 25,
        dailyVolumeBtc: 0,
        consensusWeight: 0,
        hashratePct: 0.3,
        switchingCooldown: 3600,
        maxLossPct: 0.15,
        inertia: 0.05,
        role: null,
        initialFork: ForkId.V26,
      });
    });

    it('should split users into camps by distribution pattern', () => {
      const nodes = loadEconomicNodes(networkPath, economicPath, 'polarized_users');
      const users = nodes.filter(node => node.nodeType === NodeType.USER);

      expect(users.map(node => node.forkPreference)).toEqual([ForkId.V27, ForkId.V27, ForkId.V26, ForkId.V26]);
      expect(users[0].ideologyStrength).toBe(0.7);
      expect(users[0].maxLossPct).toBe(0.2);
      expect(nodes[0].ideologyStrength).toBe(0);
      expect(nodes[0].maxLossPct).toBe(0.05);
    });

    it('should name a missing economic scenario', () => {
      expect(() => loadEconomicNodes(networkPath, economicPath, 'nope'))
        .toThrow("Economic scenario 'nope' not found in config");
    });
  });

  describe('simulation file', () => {
    let tmpDir: string;

    beforeEach(() => {
      tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fork-sim-'));
    });

    afterEach(() => {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it('should load the bundled simulation with its rosters', () => {
      const loaded = loadSimulationConfig(path.join(CONFIG_DIR, 'simulation.yaml'));

      expect(loaded.durationSeconds).toBe(21600);
      expect(loaded.pools).toHaveLength(8);
      expect(loaded.economicNodes).toHaveLength(9);
      expect(loaded.config.seed).toBe('fork-sim');
      expect(loaded.config.difficulty).toEqual({
        targetBlockInterval: 10,
        retargetInterval: 144,
        maxAdjustmentFactor: 4,
        minDifficulty: 0.0625,
        enableEda: false,
      });
      expect(loaded.config.pool?.assumedForkHashratePct).toBe(50);
      expect(loaded.config.portfolios).toEqual([{ actorId: 'treasury-observer', initialHoldingsBtc: 1000 }]);
      expect(loaded.config.manipulation).toEqual({
        actorId: 'manipulator',
        forkId: ForkId.V26,
        initialHoldingsBtc: 10000,
        btcPerUpdate: 0.5,
        startTime: 3600,
        endTime: 10800,
      });
      expect(loaded.config.staticHashratePct).toBeUndefined();
    });

    it('should read a static hashrate split without rosters', () => {
      // Given: A minimal file with a 60/40 split
      const filePath = path.join(tmpDir, 'static.yaml');
      fs.writeFileSync(filePath, [
        'simulation:',
        '  duration: 3600',
        '  static_hashrate_pct: { v27: 60, v26: 40 }',
      ].join('\n'));

      // When: Load it
      const loaded = loadSimulationConfig(filePath);

      // Then: No rosters, the split and defaults elsewhere
      expect(loaded.pools).toEqual([]);
      expect(loaded.economicNodes).toEqual([]);
      expect(loaded.config.staticHashratePct).toEqual({ [ForkId.V27]: 60, [ForkId.V26]: 40 });
      expect(loaded.config.manipulation).toBeNull();
      expect(loaded.config.difficulty).toEqual({});
      expect(loaded.config.price?.basePrice).toBe(60000);
    });

    it('should reject a static split that misses a fork', () => {
      const filePath = path.join(tmpDir, 'partial.yaml');
      fs.writeFileSync(filePath, 'simulation:\n  duration: 3600\n  static_hashrate_pct: { v27: 60 }\n');

      expect(() => loadSimulationConfig(filePath)).toThrow('missing fork v26');
    });

    it('should require a duration', () => {
      const filePath = path.join(tmpDir, 'empty.yaml');
      fs.writeFileSync(filePath, 'simulation:\n  tick_interval: 1\n');

      expect(() => loadSimulationConfig(filePath)).toThrow('simulation.duration');
    });
  });

  describe('price config', () => {
    it('should keep defaults for absent keys', () => {
      const config = loadPriceOracleConfig({ base_price: 50000, coefficients: { chain_weight: 0.4, economic_weight: 0.4 } });

      expect(config).toEqual({
        basePrice: 50000,
        maxDivergence: 0.2,
        minForkDepth: 6,
        coefficients: { chainWeight: 0.4, economicWeight: 0.4, hashrateWeight: 0.2 },
      });
    });

    it('should reject a non-positive base price', () => {
      expect(() => loadPriceOracleConfig({ base_price: -1 })).toThrow('Invalid price config: base_price');
    });
  });
});
