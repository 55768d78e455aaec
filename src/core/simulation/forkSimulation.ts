/**
 * Fork Simulation
 *
 * Drives the oracles and strategies through simulated time. Every tick runs the
 * stages of TICK_PIPELINE in order:
 *
 * 1. AGENT_EVALUATION - pools and economic nodes re-decide, reading last tick's prices and fees
 * 2. AGGREGATION      - per-fork hashrate (pools + solo miners), economic and transactional shares
 * 3. BLOCK_SAMPLING   - blocks due on each fork from its difficulty and hashrate
 * 4. CHAIN_UPDATE     - blocks go to the host and the oracles, then EDA and fork-switch reorgs
 * 5. MARKET_REFRESH   - prices, then fees, manipulation and portfolio snapshots
 *
 * Nothing reads a wall clock: simulation time is tick count * tickInterval.
 */

import {
  FORK_IDS,
  ForkId,
  ForkMap,
  EconomicNodeProfile,
  PoolProfile,
  ReorgEvent,
  RetargetEvent,
  forkMap,
} from '../../types/types';
import { SimulatorConfig } from '../../config/config';
import { RandomSource, SeededRandom, weightedChoice } from '../../utils/rng';
import { DifficultyOracle, DifficultyOracleConfig } from '../difficulty/difficultyOracle';
import { PriceOracle, PriceOracleConfig } from '../market/priceOracle';
import { FeeOracle, FeeOracleConfig, SustainabilityResult } from '../market/feeOracle';
import { MiningPoolStrategy, MiningPoolStrategyConfig } from '../strategy/miningPoolStrategy';
import { EconomicNodeStrategy } from '../strategy/economicNodeStrategy';
import { ReorgOracle, ReunionAnalysis } from '../reorg/reorgOracle';
import { BlockProductionHost } from '../../network/blockProductionHost';
import { InMemoryChainHost } from '../../network/inMemoryChainHost';

export enum TickStage {
  AGENT_EVALUATION = 'agent_evaluation',
  AGGREGATION = 'aggregation',
  BLOCK_SAMPLING = 'block_sampling',
  CHAIN_UPDATE = 'chain_update',
  MARKET_REFRESH = 'market_refresh',
}

export const TICK_PIPELINE: readonly TickStage[] = [
  TickStage.AGENT_EVALUATION,
  TickStage.AGGREGATION,
  TickStage.BLOCK_SAMPLING,
  TickStage.CHAIN_UPDATE,
  TickStage.MARKET_REFRESH,
];

/**
 * Artificial fee spending by one actor on one fork during a time window
 */
export interface ManipulationSchedule {
  actorId: string;
  forkId: ForkId;
  initialHoldingsBtc: number;  // Per fork, valued at base price
  btcPerUpdate: number;        // Spent at every price refresh inside the window
  startTime: number;
  endTime: number;
}

export interface PortfolioActor {
  actorId: string;
  initialHoldingsBtc: number;
}

export interface ForkSimulationConfig {
  startHeight: number;
  tickInterval: number;
  economicUpdateInterval: number;
  hashrateUpdateInterval: number;
  priceUpdateInterval: number;
  useChainworkWeight: boolean;          // Price chain weight from chainwork instead of height
  staticHashratePct: ForkMap<number>;   // Pool hashrate per fork when no pools are supplied
  propagationWindow: number;
  seed: string;
  difficulty: Partial<DifficultyOracleConfig>;
  price: Partial<PriceOracleConfig>;
  fee: Partial<FeeOracleConfig>;
  pool: Partial<MiningPoolStrategyConfig>;
  portfolios: PortfolioActor[];
  manipulation: ManipulationSchedule | null;
}

export function defaultSimulationConfig(): ForkSimulationConfig {
  return {
    startHeight: SimulatorConfig.START_HEIGHT,
    tickInterval: SimulatorConfig.TICK_INTERVAL,
    economicUpdateInterval: SimulatorConfig.ECONOMIC_UPDATE_INTERVAL,
    hashrateUpdateInterval: SimulatorConfig.HASHRATE_UPDATE_INTERVAL,
    priceUpdateInterval: SimulatorConfig.PRICE_UPDATE_INTERVAL,
    useChainworkWeight: true,
    staticHashratePct: forkMap(() => 100 / FORK_IDS.length),
    propagationWindow: SimulatorConfig.PROPAGATION_WINDOW,
    seed: SimulatorConfig.RANDOM_SEED,
    difficulty: {},
    price: {},
    fee: {},
    pool: {},
    portfolios: [],
    manipulation: null,
  };
}

/**
 * Working state of one tick, handed to the stage observer after each stage
 */
export interface TickState {
  tick: number;
  simTime: number;
  hashratePcts: ForkMap<number>;
  economicPcts: ForkMap<number>;
  transactionalPcts: ForkMap<number>;
  soloHashratePcts: ForkMap<number>;
  blocksDue: ForkMap<number>;
  blocksProduced: ForkMap<number>;
  retargets: RetargetEvent[];
  reorgs: ReorgEvent[];
  marketRefreshed: boolean;
}

export type StageObserver = (stage: TickStage, state: Readonly<TickState>) => void;

export interface ForkSimulationOptions {
  pools?: PoolProfile[];
  economicNodes?: EconomicNodeProfile[];
  config?: Partial<ForkSimulationConfig>;
  host?: BlockProductionHost;
  rng?: RandomSource;
  onStage?: StageObserver;
}

export interface SimulationSummary {
  simTime: number;
  ticks: number;
  heights: ForkMap<number>;
  blocksMined: ForkMap<number>;
  hashratePcts: ForkMap<number>;
  economicPcts: ForkMap<number>;
  prices: ForkMap<number>;
  fees: ForkMap<number>;
  difficulty: ForkMap<number>;
  chainwork: ForkMap<number>;
  winningFork: ForkId | '';
  forkSustained: boolean;
  reorgEvents: number;
}

export type SustainabilityRecord = SustainabilityResult & { simTime: number };

export class ForkSimulation {
  private readonly config: ForkSimulationConfig;
  private readonly host: BlockProductionHost;
  private readonly rng: RandomSource;
  private readonly onStage: StageObserver | null;

  private difficultyOracle: DifficultyOracle;
  private priceOracle: PriceOracle;
  private feeOracle: FeeOracle;
  private reorgOracle: ReorgOracle;
  private poolStrategy: MiningPoolStrategy | null;
  private economicStrategy: EconomicNodeStrategy | null;

  private tickCount: number;
  private simTime: number;
  private lastEconomicUpdate: number;
  private lastHashrateUpdate: number;
  private lastPriceUpdate: number;

  private blocksMined: ForkMap<number>;
  private blocksSinceRefresh: ForkMap<number>;
  private hashratePcts: ForkMap<number>;
  private economicPcts: ForkMap<number>;
  private transactionalPcts: ForkMap<number>;
  private trackedEconomicForks: Map<string, ForkId>;
  private sustainabilityHistory: SustainabilityRecord[];

  constructor(options: ForkSimulationOptions = {}) {
    const defaults = defaultSimulationConfig();
    this.config = { ...defaults, ...options.config };

    if (this.config.tickInterval <= 0) {
      throw new Error(`tickInterval must be positive (got ${this.config.tickInterval})`);
    }

    this.host = options.host ?? new InMemoryChainHost(this.config.startHeight);
    this.rng = options.rng ?? new SeededRandom(this.config.seed);
    this.onStage = options.onStage ?? null;

    this.difficultyOracle = new DifficultyOracle(this.config.difficulty);
    this.priceOracle = new PriceOracle(this.config.price);
    this.feeOracle = new FeeOracle(this.config.fee);

    const pools = options.pools ?? [];
    const economicNodes = options.economicNodes ?? [];
    this.poolStrategy = pools.length > 0 ? new MiningPoolStrategy(pools, this.config.pool) : null;
    this.economicStrategy = economicNodes.length > 0 ? new EconomicNodeStrategy(economicNodes) : null;

    this.reorgOracle = new ReorgOracle(
      this.config.startHeight,
      this.host.getLcaHash(),
      this.config.propagationWindow,
      pools.length + economicNodes.length
    );

    for (const forkId of FORK_IDS) {
      this.difficultyOracle.initializeFork(forkId, this.config.startHeight);
      this.reorgOracle.initializeFork(forkId, this.config.startHeight);
    }

    if (this.poolStrategy) {
      this.poolStrategy.seedInitialAllocation();
      for (const poolId of this.poolStrategy.getPoolIds()) {
        this.reorgOracle.registerNode(poolId, this.poolStrategy.getTrackedFork(poolId));
      }
    }

    this.trackedEconomicForks = new Map();
    if (this.economicStrategy) {
      for (const nodeId of this.economicStrategy.getNodeIds()) {
        const fork = this.economicStrategy.getCurrentAllocation(nodeId) ?? this.economicStrategy.getNode(nodeId).initialFork;
        this.trackedEconomicForks.set(nodeId, fork);
        this.reorgOracle.registerNode(nodeId, fork);
      }
    }

    for (const actor of this.config.portfolios) {
      this.feeOracle.initializeActor(actor.actorId, actor.initialHoldingsBtc, this.priceOracle.getBasePrice());
    }
    const manipulation = this.config.manipulation;
    if (manipulation && !this.feeOracle.getActor(manipulation.actorId)) {
      this.feeOracle.initializeActor(manipulation.actorId, manipulation.initialHoldingsBtc, this.priceOracle.getBasePrice());
    }

    this.tickCount = 0;
    this.simTime = 0;
    this.lastEconomicUpdate = 0;
    this.lastHashrateUpdate = 0;
    this.lastPriceUpdate = 0;

    this.blocksMined = forkMap(() => 0);
    this.blocksSinceRefresh = forkMap(() => 0);
    this.sustainabilityHistory = [];

    this.economicPcts = this.economicStrategy
      ? this.economicStrategy.getEconomicAllocation()
      : forkMap(() => 100 / FORK_IDS.length);
    this.transactionalPcts = this.economicStrategy
      ? this.economicStrategy.getFeeGenerationWeight()
      : { ...this.economicPcts };
    this.hashratePcts = this.aggregateHashrate(this.soloHashrate());
  }

  getConfig(): Readonly<ForkSimulationConfig> {
    return this.config;
  }

  getSimTime(): number {
    return this.simTime;
  }

  getTickCount(): number {
    return this.tickCount;
  }

  getHost(): BlockProductionHost {
    return this.host;
  }

  getDifficultyOracle(): DifficultyOracle {
    return this.difficultyOracle;
  }

  getPriceOracle(): PriceOracle {
    return this.priceOracle;
  }

  getFeeOracle(): FeeOracle {
    return this.feeOracle;
  }

  getReorgOracle(): ReorgOracle {
    return this.reorgOracle;
  }

  getPoolStrategy(): MiningPoolStrategy | null {
    return this.poolStrategy;
  }

  getEconomicStrategy(): EconomicNodeStrategy | null {
    return this.economicStrategy;
  }

  getBlocksMined(): ForkMap<number> {
    return { ...this.blocksMined };
  }

  getHashratePcts(): ForkMap<number> {
    return { ...this.hashratePcts };
  }

  getSustainabilityHistory(): readonly SustainabilityRecord[] {
    return this.sustainabilityHistory;
  }

  private soloHashrate(): ForkMap<number> {
    return this.economicStrategy
      ? this.economicStrategy.getMiningAllocation().hashrate
      : forkMap(() => 0);
  }

  /**
   * Pool hashrate (static split when there are no pools) plus solo hashrate, per fork
   */
  private aggregateHashrate(solo: ForkMap<number>): ForkMap<number> {
    const poolHashrate = this.poolStrategy
      ? this.poolStrategy.getHashrateAllocation()
      : this.config.staticHashratePct;
    return forkMap(forkId => poolHashrate[forkId] + solo[forkId]);
  }

  /**
   * Runs ticks until `durationSeconds` of simulation time have elapsed
   */
  run(durationSeconds: number): SimulationSummary {
    const totalTicks = Math.floor(durationSeconds / this.config.tickInterval);

    if (SimulatorConfig.DEBUG_SIMULATION) {
      console.log(`[Simulation] Running ${totalTicks} ticks of ${this.config.tickInterval}s from t=${this.simTime}s`);
    }

    for (let i = 0; i < totalTicks; i++) {
      this.tick();
    }
    return this.getSummary();
  }

  /**
   * Advances one tick through every stage of the pipeline
   */
  tick(): TickState {
    this.tickCount += 1;
    this.simTime = this.tickCount * this.config.tickInterval;

    const state: TickState = {
      tick: this.tickCount,
      simTime: this.simTime,
      hashratePcts: { ...this.hashratePcts },
      economicPcts: { ...this.economicPcts },
      transactionalPcts: { ...this.transactionalPcts },
      soloHashratePcts: forkMap(() => 0),
      blocksDue: forkMap(() => 0),
      blocksProduced: forkMap(() => 0),
      retargets: [],
      reorgs: [],
      marketRefreshed: false,
    };

    for (const stage of TICK_PIPELINE) {
      this.runStage(stage, state);
      if (this.onStage) {
        this.onStage(stage, state);
      }
    }

    return state;
  }

  private runStage(stage: TickStage, state: TickState): void {
    switch (stage) {
      case TickStage.AGENT_EVALUATION:
        this.evaluateAgents(state);
        break;
      case TickStage.AGGREGATION:
        this.aggregate(state);
        break;
      case TickStage.BLOCK_SAMPLING:
        this.sampleBlocks(state);
        break;
      case TickStage.CHAIN_UPDATE:
        this.updateChains(state);
        break;
      case TickStage.MARKET_REFRESH:
        this.refreshMarket(state);
        break;
    }
  }

  private evaluateAgents(state: TickState): void {
    if (this.economicStrategy && state.simTime - this.lastEconomicUpdate >= this.config.economicUpdateInterval) {
      this.economicStrategy.calculateEconomicAllocation(state.simTime, this.priceOracle);
      this.lastEconomicUpdate = state.simTime;
    }

    if (this.poolStrategy && state.simTime - this.lastHashrateUpdate >= this.config.hashrateUpdateInterval) {
      this.poolStrategy.calculateHashrateAllocation(
        state.simTime, this.priceOracle, this.feeOracle, this.difficultyOracle
      );
      this.lastHashrateUpdate = state.simTime;
    }
  }

  private aggregate(state: TickState): void {
    const solo = this.soloHashrate();
    state.soloHashratePcts = solo;
    state.hashratePcts = this.aggregateHashrate(solo);

    if (this.economicStrategy) {
      state.economicPcts = this.economicStrategy.getEconomicAllocation();
      state.transactionalPcts = this.economicStrategy.getFeeGenerationWeight();
    }

    this.hashratePcts = { ...state.hashratePcts };
    this.economicPcts = { ...state.economicPcts };
    this.transactionalPcts = { ...state.transactionalPcts };
  }

  private sampleBlocks(state: TickState): void {
    for (const forkId of FORK_IDS) {
      state.blocksDue[forkId] = this.difficultyOracle.getBlocksToMine(
        forkId, state.hashratePcts[forkId], this.config.tickInterval, this.rng
      );
    }
  }

  /**
   * Picks who mined a block on a fork, weighted by the hashrate of the pools and
   * solo miners currently allocated to it. Null when nobody tracked is on the fork.
   */
  selectMiner(forkId: ForkId): string | null {
    const candidates: Array<{ id: string; weight: number }> = [];

    if (this.poolStrategy) {
      for (const pool of this.poolStrategy.getPools()) {
        if (this.poolStrategy.getCurrentAllocation(pool.poolId) === forkId) {
          candidates.push({ id: pool.poolId, weight: pool.hashratePct });
        }
      }
    }
    if (this.economicStrategy) {
      for (const miner of this.economicStrategy.getSoloMiners()) {
        if (miner.forkId === forkId) {
          candidates.push({ id: miner.nodeId, weight: miner.hashratePct });
        }
      }
    }

    return weightedChoice(candidates, candidate => candidate.weight, this.rng)?.id ?? null;
  }

  private updateChains(state: TickState): void {
    for (const forkId of FORK_IDS) {
      for (let i = 0; i < state.blocksDue[forkId]; i++) {
        const minerId = this.selectMiner(forkId);
        const height = this.host.produceBlock(forkId, minerId ?? `${forkId}-miner`, state.simTime);

        if (minerId) {
          this.reorgOracle.recordBlockMined(minerId, forkId, height);
        }

        const retarget = this.difficultyOracle.recordBlock(forkId, state.simTime, height);
        if (retarget) {
          state.retargets.push(retarget);
        }

        this.blocksMined[forkId] += 1;
        this.blocksSinceRefresh[forkId] += 1;
        state.blocksProduced[forkId] += 1;

        if (SimulatorConfig.DEBUG_SIMULATION) {
          console.log(`[Simulation] t=${state.simTime}s ${forkId} block ${height} by ${minerId ?? 'unattributed'}`);
        }
      }
    }

    this.reorgOracle.updateForkHeights(forkMap(forkId => this.host.getHeight(forkId)));

    for (const forkId of FORK_IDS) {
      const eda = this.difficultyOracle.checkEmergencyAdjustment(forkId, state.simTime);
      if (eda) {
        state.retargets.push(eda);
      }
    }

    this.detectForkSwitches(state);
  }

  /**
   * Records a reorg for every pool or node whose fork differs from the one tracked last tick
   */
  private detectForkSwitches(state: TickState): void {
    if (this.poolStrategy) {
      for (const poolId of this.poolStrategy.getPoolIds()) {
        const oldFork = this.poolStrategy.getTrackedFork(poolId);
        const newFork = this.poolStrategy.getCurrentAllocation(poolId) ?? oldFork;
        if (oldFork !== newFork) {
          state.reorgs.push(this.reorgOracle.recordForkSwitch(poolId, oldFork, newFork, state.simTime));
          this.poolStrategy.setTrackedFork(poolId, newFork);
        }
      }
    }

    if (this.economicStrategy) {
      for (const [nodeId, oldFork] of this.trackedEconomicForks) {
        const newFork = this.economicStrategy.getCurrentAllocation(nodeId) ?? oldFork;
        if (oldFork !== newFork) {
          state.reorgs.push(this.reorgOracle.recordForkSwitch(nodeId, oldFork, newFork, state.simTime));
          this.trackedEconomicForks.set(nodeId, newFork);
        }
      }
    }
  }

  private refreshMarket(state: TickState): void {
    if (state.simTime - this.lastPriceUpdate < this.config.priceUpdateInterval) {
      return;
    }

    const heights = forkMap(forkId => this.host.getHeight(forkId));
    this.priceOracle.updatePricesFromState({
      heights,
      economicPcts: state.economicPcts,
      hashratePcts: state.hashratePcts,
      commonAncestorHeight: this.config.startHeight,
      simTime: state.simTime,
      chainWeightOverrides: this.config.useChainworkWeight
        ? forkMap(forkId => this.difficultyOracle.getChainWeight(forkId))
        : undefined,
    });

    this.applyManipulationSchedule(state.simTime);

    this.feeOracle.updateFeesFromState({
      blocksPerHour: forkMap(forkId => this.difficultyOracle.getBlocksPerHour(forkId, state.hashratePcts[forkId])),
      economicPcts: state.economicPcts,
      transactionalPcts: state.transactionalPcts,
      simTime: state.simTime,
    });

    for (const actor of this.config.portfolios) {
      this.feeOracle.recordPortfolioSnapshot(actor.actorId, this.priceOracle, state.simTime);
    }
    const manipulation = this.config.manipulation;
    if (manipulation && !this.config.portfolios.some(actor => actor.actorId === manipulation.actorId)) {
      this.feeOracle.recordPortfolioSnapshot(manipulation.actorId, this.priceOracle, state.simTime, { manipulator: true });
    }

    this.blocksSinceRefresh = forkMap(() => 0);
    this.lastPriceUpdate = state.simTime;
    state.marketRefreshed = true;

    if (SimulatorConfig.DEBUG_SIMULATION) {
      const prices = FORK_IDS.map(forkId => `${forkId}=$${this.priceOracle.getPrice(forkId).toFixed(0)}`).join(' ');
      const hashrate = FORK_IDS.map(forkId => `${forkId}=${state.hashratePcts[forkId].toFixed(1)}%`).join(' ');
      console.log(`[Simulation] t=${state.simTime}s prices ${prices} | hashrate ${hashrate}`);
    }
  }

  /**
   * Spends the scheduled amount inside the window and clears the premium outside it
   */
  private applyManipulationSchedule(simTime: number): void {
    const schedule = this.config.manipulation;
    if (!schedule) {
      return;
    }

    const inWindow = simTime >= schedule.startTime && simTime <= schedule.endTime;
    if (inWindow) {
      this.feeOracle.applyManipulation(
        schedule.forkId,
        schedule.btcPerUpdate,
        this.blocksSinceRefresh[schedule.forkId],
        schedule.actorId
      );
    } else if (this.feeOracle.isManipulationActive(schedule.forkId)) {
      this.feeOracle.applyManipulation(schedule.forkId, 0, 0, schedule.actorId);
    }

    if (simTime >= schedule.startTime) {
      this.sustainabilityHistory.push({
        simTime,
        ...this.feeOracle.calculateManipulationSustainability(schedule.forkId, this.priceOracle, schedule.actorId),
      });
    }
  }

  /**
   * Reorg projection of reconnecting the forks now, by chainwork
   */
  analyzeReunion(): ReunionAnalysis {
    return this.reorgOracle.calculateReunionReorg(
      forkMap(forkId => this.difficultyOracle.getCumulativeChainwork(forkId))
    );
  }

  getSummary(): SimulationSummary {
    const [winningFork] = this.difficultyOracle.getWinningFork();
    return {
      simTime: this.simTime,
      ticks: this.tickCount,
      heights: forkMap(forkId => this.host.getHeight(forkId)),
      blocksMined: { ...this.blocksMined },
      hashratePcts: { ...this.hashratePcts },
      economicPcts: { ...this.economicPcts },
      prices: this.priceOracle.getPrices(),
      fees: forkMap(forkId => this.feeOracle.getFee(forkId)),
      difficulty: forkMap(forkId => this.difficultyOracle.getCurrentDifficulty(forkId)),
      chainwork: forkMap(forkId => this.difficultyOracle.getCumulativeChainwork(forkId)),
      winningFork,
      forkSustained: this.priceOracle.isForkSustained(),
      reorgEvents: this.reorgOracle.getReorgEvents().length,
    };
  }

  /**
   * Combined report of every component plus the reunion analysis
   */
  exportToJson() {
    return {
      config: {
        startHeight: this.config.startHeight,
        tickInterval: this.config.tickInterval,
        economicUpdateInterval: this.config.economicUpdateInterval,
        hashrateUpdateInterval: this.config.hashrateUpdateInterval,
        priceUpdateInterval: this.config.priceUpdateInterval,
        useChainworkWeight: this.config.useChainworkWeight,
        staticHashratePct: this.poolStrategy ? null : { ...this.config.staticHashratePct },
        seed: this.config.seed,
      },
      summary: this.getSummary(),
      difficulty: this.difficultyOracle.exportToJson(),
      price: this.priceOracle.exportToJson(),
      fee: {
        ...this.feeOracle.exportToJson(),
        mempool: forkMap(forkId => this.feeOracle.estimateMempoolSize(
          forkId,
          this.difficultyOracle.getBlocksPerHour(forkId, this.hashratePcts[forkId]),
          this.transactionalPcts[forkId]
        )),
        sustainability: this.sustainabilityHistory.map(record => ({ ...record })),
      },
      pools: this.poolStrategy ? this.poolStrategy.exportToJson() : null,
      economic: this.economicStrategy ? this.economicStrategy.exportToJson() : null,
      reorg: this.reorgOracle.exportToJson(),
      reunion: this.analyzeReunion(),
    };
  }
}
