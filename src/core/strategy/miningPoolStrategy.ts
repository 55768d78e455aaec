/**
 * Mining Pool Strategy
 *
 * Each pool independently decides which fork to mine from:
 * 1. Profitability (expected USD profit per hour on each fork)
 * 2. Fork preference (ideology)
 * 3. Loss tolerance (percentage of revenue and an optional absolute USD cap)
 *
 * A pool re-evaluates at most once per `decisionInterval` seconds of simulation time.
 */

import {
  FORK_IDS,
  ForkId,
  ForkMap,
  MiningDecision,
  NEUTRAL,
  PoolProfile,
  forkMap,
} from '../../types/types';
import { SimulatorConfig } from '../../config/config';
import { DifficultyOracle } from '../difficulty/difficultyOracle';
import { FeeOracle } from '../market/feeOracle';
import { PriceOracle } from '../market/priceOracle';

export interface MiningPoolStrategyConfig {
  decisionInterval: number;          // Seconds between evaluations of one pool
  blockSubsidyBtc: number;
  miningCostUsd: number;             // Cost to mine one block
  /**
   * Hashrate share assumed on every fork when comparing profits.
   * A fixed split keeps a pool's estimate independent of the live allocation, which
   * otherwise feeds back on itself; null uses the live allocation instead.
   */
  assumedForkHashratePct: number | null;
}

export function defaultPoolStrategyConfig(): MiningPoolStrategyConfig {
  return {
    decisionInterval: SimulatorConfig.POOL_DECISION_INTERVAL,
    blockSubsidyBtc: SimulatorConfig.BLOCK_SUBSIDY_BTC,
    miningCostUsd: SimulatorConfig.MINING_COST_USD,
    assumedForkHashratePct: SimulatorConfig.ASSUMED_FORK_HASHRATE_PCT,
  };
}

export interface PoolCosts {
  cumulativeOpportunityCostUsd: number;
  forcedSwitchCount: number;
  ideologyOverrideCount: number;
}

export class MiningPoolStrategy {
  private readonly config: MiningPoolStrategyConfig;
  private pools: Map<string, PoolProfile>;
  private currentAllocation: Map<string, ForkId | null>;
  private lastDecisionTime: Map<string, number>;
  private poolCosts: Map<string, PoolCosts>;
  private decisionHistory: MiningDecision[];

  constructor(pools: PoolProfile[], config: Partial<MiningPoolStrategyConfig> = {}) {
    this.config = { ...defaultPoolStrategyConfig(), ...config };

    const totalHashrate = pools.reduce((sum, pool) => sum + pool.hashratePct, 0);
    if (totalHashrate > 100 + 1e-9) {
      throw new Error(`Pool hashrate sums to ${totalHashrate.toFixed(2)}%, must not exceed 100%`);
    }

    this.pools = new Map();
    this.currentAllocation = new Map();
    this.lastDecisionTime = new Map();
    this.poolCosts = new Map();
    this.decisionHistory = [];

    for (const pool of pools) {
      if (this.pools.has(pool.poolId)) {
        throw new Error(`Duplicate pool id ${pool.poolId}`);
      }
      this.pools.set(pool.poolId, { ...pool });
      this.currentAllocation.set(pool.poolId, null);
      this.lastDecisionTime.set(pool.poolId, 0);
      this.poolCosts.set(pool.poolId, {
        cumulativeOpportunityCostUsd: 0,
        forcedSwitchCount: 0,
        ideologyOverrideCount: 0,
      });
    }
  }

  getConfig(): Readonly<MiningPoolStrategyConfig> {
    return this.config;
  }

  getPoolIds(): string[] {
    return Array.from(this.pools.keys());
  }

  getPool(poolId: string): Readonly<PoolProfile> {
    const pool = this.pools.get(poolId);
    if (!pool) {
      throw new Error(`Unknown pool ${poolId}`);
    }
    return pool;
  }

  getPools(): Readonly<PoolProfile>[] {
    return Array.from(this.pools.values());
  }

  getCurrentAllocation(poolId: string): ForkId | null {
    return this.currentAllocation.get(poolId) ?? null;
  }

  getPoolCosts(poolId: string): Readonly<PoolCosts> | null {
    const costs = this.poolCosts.get(poolId);
    return costs ? { ...costs } : null;
  }

  getDecisionHistory(): readonly MiningDecision[] {
    return this.decisionHistory;
  }

  /**
   * Starting allocation before any evaluation
   * Pools with a preference start on it; neutral pools alternate across forks.
   */
  seedInitialAllocation(): void {
    let neutralIndex = 0;
    for (const pool of this.pools.values()) {
      let fork: ForkId;
      if (pool.forkPreference === NEUTRAL) {
        fork = FORK_IDS[neutralIndex % FORK_IDS.length];
        neutralIndex++;
      } else {
        fork = pool.forkPreference;
      }
      this.currentAllocation.set(pool.poolId, fork);
      pool.currentFork = fork;
    }
  }

  /**
   * Fork a pool mined as of the last reorg check
   */
  getTrackedFork(poolId: string): ForkId {
    return this.getPool(poolId).currentFork;
  }

  /**
   * Records the fork the pool is now mining, after the simulation has logged any reorg
   */
  setTrackedFork(poolId: string, forkId: ForkId): void {
    const pool = this.pools.get(poolId);
    if (pool) {
      pool.currentFork = forkId;
    }
  }

  /**
   * Sum of hashrate of the pools currently allocated to a fork
   */
  private liveForkHashrate(forkId: ForkId): number {
    let total = 0;
    for (const pool of this.pools.values()) {
      if (this.currentAllocation.get(pool.poolId) === forkId) {
        total += pool.hashratePct;
      }
    }
    return total;
  }

  /**
   * Expected USD profit per hour for a pool mining a fork
   *
   * With a difficulty oracle, the pool's share of the fork's block rate is used;
   * `assumedForkHashrate` sets the fork's total hashrate (live allocation when null).
   * Without one, the pool gets its share of 6 blocks per hour.
   */
  calculatePoolProfitability(
    pool: Readonly<PoolProfile>,
    forkId: ForkId,
    priceOracle: PriceOracle,
    feeOracle: FeeOracle,
    difficultyOracle?: DifficultyOracle,
    assumedForkHashrate: number | null = this.config.assumedForkHashratePct
  ): number {
    const priceUsd = priceOracle.getPrice(forkId);
    const feeBtc = feeOracle.getFeeRevenuePerBlock(forkId);
    const revenuePerBlockUsd = (this.config.blockSubsidyBtc + feeBtc) * priceUsd;

    let blocksPerHour: number;
    if (difficultyOracle) {
      const forkHashrate = Math.max(assumedForkHashrate ?? this.liveForkHashrate(forkId), 0.1);
      const forkBlocksPerHour = difficultyOracle.getBlocksPerHour(forkId, forkHashrate);
      blocksPerHour = forkBlocksPerHour * (pool.hashratePct / Math.max(forkHashrate, pool.hashratePct));
    } else {
      blocksPerHour = SimulatorConfig.NORMAL_BLOCKS_PER_HOUR * (pool.hashratePct / 100);
    }

    return blocksPerHour * (revenuePerBlockUsd - this.config.miningCostUsd);
  }

  /**
   * Pool decides which fork to mine
   * Returns the chosen fork and the decision record, or null while cooling down
   */
  makeDecision(
    poolId: string,
    currentTime: number,
    priceOracle: PriceOracle,
    feeOracle: FeeOracle,
    forceDecision: boolean = false,
    difficultyOracle?: DifficultyOracle
  ): [ForkId, MiningDecision | null] {
    const pool = this.getPool(poolId);
    const costs = this.requireCosts(poolId);

    if (!forceDecision) {
      const sinceLast = currentTime - (this.lastDecisionTime.get(poolId) ?? 0);
      if (sinceLast < this.config.decisionInterval) {
        let current = this.currentAllocation.get(poolId) ?? null;
        if (current === null) {
          current = pool.forkPreference === NEUTRAL ? FORK_IDS[0] : pool.forkPreference;
          this.currentAllocation.set(poolId, current);
        }
        return [current, null];
      }
    }

    const profitability = forkMap(forkId =>
      this.calculatePoolProfitability(pool, forkId, priceOracle, feeOracle, difficultyOracle)
    );

    // Ties go to the later-registered fork
    let rationalChoice = FORK_IDS[0];
    for (const forkId of FORK_IDS) {
      if (profitability[forkId] >= profitability[rationalChoice]) {
        rationalChoice = forkId;
      }
    }
    const rationalProfit = profitability[rationalChoice];

    let chosenFork = rationalChoice;
    let ideologyOverride = false;
    let reason = 'Rational profit maximization';

    // A pool without ideology follows profit outright
    if (pool.forkPreference !== NEUTRAL && pool.ideologyStrength > 0) {
      const preferred = pool.forkPreference;

      if (preferred !== rationalChoice) {
        const opportunityCost = rationalProfit - profitability[preferred];
        const lossPct = rationalProfit > 0 ? opportunityCost / rationalProfit : 0;
        const maxAcceptableLossPct = pool.ideologyStrength * (pool.maxLossPct ?? 1.0);

        let canAffordIdeology = true;

        if (pool.maxLossUsd !== null &&
            costs.cumulativeOpportunityCostUsd + opportunityCost > pool.maxLossUsd) {
          canAffordIdeology = false;
          reason = `Forced switch: exceeded max loss $${pool.maxLossUsd.toFixed(0)}`;
          costs.forcedSwitchCount += 1;
        }

        if (canAffordIdeology && lossPct > maxAcceptableLossPct) {
          canAffordIdeology = false;
          reason = `Forced switch: loss ${(lossPct * 100).toFixed(1)}% exceeds tolerance ${(maxAcceptableLossPct * 100).toFixed(1)}%`;
          costs.forcedSwitchCount += 1;
        }

        if (canAffordIdeology) {
          chosenFork = preferred;
          ideologyOverride = true;
          reason = `Ideology: supporting ${preferred} (loss ${(lossPct * 100).toFixed(1)}% <= tolerance ${(maxAcceptableLossPct * 100).toFixed(1)}%)`;
          costs.ideologyOverrideCount += 1;
        }
      } else {
        reason = 'Ideology and profit aligned';
      }
    }

    const bestProfit = Math.max(...FORK_IDS.map(forkId => profitability[forkId]));
    const opportunityCostUsd = Math.max(0, bestProfit - profitability[chosenFork]);
    costs.cumulativeOpportunityCostUsd += opportunityCostUsd;

    const decision: MiningDecision = {
      timestamp: currentTime,
      poolId,
      chosenFork,
      profitabilityUsd: profitability,
      rationalChoice,
      ideologyOverride,
      opportunityCostUsd,
      cumulativeCostUsd: costs.cumulativeOpportunityCostUsd,
      reason,
    };

    this.decisionHistory.push(decision);
    this.currentAllocation.set(poolId, chosenFork);
    this.lastDecisionTime.set(poolId, currentTime);

    if (SimulatorConfig.DEBUG_STRATEGY) {
      console.log(`[Pools] ${poolId} -> ${chosenFork}: ${reason}`);
    }

    return [chosenFork, decision];
  }

  private requireCosts(poolId: string): PoolCosts {
    const costs = this.poolCosts.get(poolId);
    if (!costs) {
      throw new Error(`Unknown pool ${poolId}`);
    }
    return costs;
  }

  /**
   * Lets every pool decide and sums pool hashrate per chosen fork
   */
  calculateHashrateAllocation(
    currentTime: number,
    priceOracle: PriceOracle,
    feeOracle: FeeOracle,
    difficultyOracle?: DifficultyOracle
  ): ForkMap<number> {
    const allocation = forkMap(() => 0);
    for (const pool of this.pools.values()) {
      const [chosenFork] = this.makeDecision(
        pool.poolId, currentTime, priceOracle, feeOracle, false, difficultyOracle
      );
      allocation[chosenFork] += pool.hashratePct;
    }
    return allocation;
  }

  /**
   * Hashrate per fork from the current allocation, without re-evaluating
   */
  getHashrateAllocation(): ForkMap<number> {
    return forkMap(forkId => this.liveForkHashrate(forkId));
  }

  getPoolSummary(poolId: string) {
    const pool = this.getPool(poolId);
    const costs = this.requireCosts(poolId);
    const recentDecisions = this.decisionHistory
      .slice(-10)
      .filter(decision => decision.poolId === poolId);

    return {
      poolId,
      hashratePct: pool.hashratePct,
      forkPreference: pool.forkPreference,
      ideologyStrength: pool.ideologyStrength,
      currentAllocation: this.getCurrentAllocation(poolId),
      cumulativeOpportunityCostUsd: costs.cumulativeOpportunityCostUsd,
      ideologyOverrideCount: costs.ideologyOverrideCount,
      forcedSwitchCount: costs.forcedSwitchCount,
      recentDecisions,
    };
  }

  exportToJson() {
    const pools: Record<string, { profile: PoolProfile; costs: PoolCosts; currentAllocation: ForkId | null }> = {};
    for (const pool of this.pools.values()) {
      pools[pool.poolId] = {
        profile: { ...pool },
        costs: { ...this.requireCosts(pool.poolId) },
        currentAllocation: this.getCurrentAllocation(pool.poolId),
      };
    }

    return {
      config: { ...this.config },
      pools,
      hashrateAllocation: this.getHashrateAllocation(),
      decisionHistory: this.decisionHistory.map(decision => ({ ...decision })),
    };
  }
}
