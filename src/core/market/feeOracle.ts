/**
 * Fee Oracle
 *
 * Tracks the fee market of each fork with dual-token portfolio accounting.
 *
 * Fee model:
 *   totalFee = organicFee + manipulationPremium
 *
 * Portfolio model:
 * - Every actor holds the same BTC amount on each fork at the split
 * - Manipulation spending reduces holdings on the manipulated fork only
 * - Sustainability is judged on the value of holdings across ALL forks
 */

import {
  FORK_IDS,
  FeePoint,
  ForkId,
  ForkMap,
  Metadata,
  PortfolioSnapshot,
  forkMap,
} from '../../types/types';
import { SimulatorConfig } from '../../config/config';
import { DifficultyOracle } from '../difficulty/difficultyOracle';

/**
 * Read access to prices, satisfied by PriceOracle
 */
export interface PriceSource {
  getPrice(forkId: ForkId): number;
}

export interface FeeOracleConfig {
  baseFeeRate: number;
  sustainabilityTracking: boolean;
}

export function defaultFeeConfig(): FeeOracleConfig {
  return {
    baseFeeRate: SimulatorConfig.BASE_FEE_RATE,
    sustainabilityTracking: true,
  };
}

/**
 * Fee market state owned by the oracle for one fork
 */
interface FeeForkState {
  fee: number;                  // Total sats/vB
  organicFee: number;
  manipulationPremium: number;
  manipulationActive: boolean;
  manipulationCostBtc: number;  // Cumulative BTC spent on artificial fees
  manipulationCostUsd: number;  // Cost valued at the fork's latest price
}

export interface ActorPortfolio {
  actorId: string;
  holdingsBtc: ForkMap<number>;
  initialPriceUsd: number;
  initialValueUsd: number;      // Holdings on every fork at the split price
  cumulativeCostsUsd: number;
  cumulativeEarningsUsd: number;
}

export interface MinerProfitability {
  chainId: ForkId;
  rewardBtc: number;
  feeBtc: number;
  totalBtc: number;
  priceUsd: number;
  revenueUsd: number;
  costUsd: number;
  profitUsd: number;
  profitMarginPct: number;
  profitable: boolean;
}

export type SustainabilityRecommendation = 'CONTINUE' | 'WARNING' | 'ABORT';

export interface SustainabilityVerdict {
  sustainable: boolean;
  chainId: ForkId;
  currentPortfolioValueUsd: number;
  initialPortfolioValueUsd: number;
  cumulativeCostsUsd: number;
  netPositionUsd: number;           // current - initial - costs
  portfolioAppreciationUsd: number; // current - initial
  sustainabilityRatio: number;      // appreciation / costs
  recommendation: SustainabilityRecommendation;
  recommendationText: string;
  holdings: {
    btc: ForkMap<number>;
    valueUsd: ForkMap<number>;
  };
}

export interface SustainabilityError {
  sustainable: false;
  error: 'Actor not initialized';
}

export type SustainabilityResult = SustainabilityVerdict | SustainabilityError;

export interface MempoolEstimate {
  chainId: ForkId;
  throughputMbPerHour: number;
  txVolumeMbPerHour: number;
  congestionRatio: number;          // > 1 means the backlog is growing
  estimatedMempoolMb: number;
  estimatedConfirmBlocks: number;
  feeRateSatsVb: number;
}

export interface FeeUpdateInput {
  blocksPerHour: ForkMap<number>;
  economicPcts: ForkMap<number>;        // 0-100
  transactionalPcts?: ForkMap<number>;  // 0-100, fee-generating share; preferred over economicPcts
  hashratePcts?: ForkMap<number>;       // 0-100, only read with difficultyOracle
  difficultyOracle?: DifficultyOracle;  // Overrides blocksPerHour when present
  simTime: number;
  metadata?: Metadata;
}

const RECOMMENDATION_TEXT: Record<SustainabilityRecommendation, string> = {
  CONTINUE: 'CONTINUE - Manipulation is maintaining portfolio value',
  WARNING: 'WARNING - Approaching unsustainability',
  ABORT: 'ABORT - Manipulation is destroying portfolio value',
};

export class FeeOracle {
  private readonly config: FeeOracleConfig;
  private forks: Map<ForkId, FeeForkState>;
  private actors: Map<string, ActorPortfolio>;
  private feeHistory: FeePoint[];
  private portfolioHistory: PortfolioSnapshot[];

  constructor(config: Partial<FeeOracleConfig> = {}) {
    this.config = { ...defaultFeeConfig(), ...config };
    if (this.config.baseFeeRate <= 0) {
      throw new Error(`baseFeeRate must be positive (got ${this.config.baseFeeRate})`);
    }

    this.forks = new Map();
    this.actors = new Map();
    this.feeHistory = [];
    this.portfolioHistory = [];

    for (const forkId of FORK_IDS) {
      this.forks.set(forkId, {
        fee: this.config.baseFeeRate,
        organicFee: this.config.baseFeeRate,
        manipulationPremium: 0,
        manipulationActive: false,
        manipulationCostBtc: 0,
        manipulationCostUsd: 0,
      });
      this.feeHistory.push({
        timestamp: 0,
        chainId: forkId,
        organicFee: this.config.baseFeeRate,
        manipulationPremium: 0,
        totalFee: this.config.baseFeeRate,
        metadata: { initial: true },
      });
    }
  }

  getConfig(): Readonly<FeeOracleConfig> {
    return this.config;
  }

  private getForkState(forkId: ForkId): FeeForkState {
    const state = this.forks.get(forkId);
    if (!state) {
      throw new Error(`Fee state missing for fork ${forkId}`);
    }
    return state;
  }

  /**
   * Registers an actor holding the same BTC amount on every fork
   */
  initializeActor(actorId: string, initialHoldingsBtc: number, initialPriceUsd: number = SimulatorConfig.BASE_PRICE_USD): void {
    this.actors.set(actorId, {
      actorId,
      holdingsBtc: forkMap(() => initialHoldingsBtc),
      initialPriceUsd,
      initialValueUsd: FORK_IDS.length * initialHoldingsBtc * initialPriceUsd,
      cumulativeCostsUsd: 0,
      cumulativeEarningsUsd: 0,
    });
  }

  getActor(actorId: string): Readonly<ActorPortfolio> | null {
    const actor = this.actors.get(actorId);
    return actor ? { ...actor, holdingsBtc: { ...actor.holdingsBtc } } : null;
  }

  /**
   * Organic fee rate in sats/vB
   *
   * Slower blocks raise fees (6 blocks/hour is normal) and more fee-generating activity
   * raises fees (50% is normal). When `transactionalActivityPct` is supplied it replaces
   * the total economic share, so custodial holdings support price without adding fees.
   */
  calculateOrganicFee(
    forkId: ForkId,
    blocksPerHour: number,
    economicActivityPct: number,
    mempoolPressure: number = 1.0,
    transactionalActivityPct?: number
  ): number {
    const blockFactor = SimulatorConfig.NORMAL_BLOCKS_PER_HOUR / Math.max(blocksPerHour, 0.1);
    const feeActivity = transactionalActivityPct ?? economicActivityPct;
    const activityFactor = feeActivity / 50.0;

    const organicFee = this.config.baseFeeRate * blockFactor * activityFactor * mempoolPressure;

    if (SimulatorConfig.DEBUG_FEE) {
      console.log(`[Fee ${forkId}] organic=${organicFee.toFixed(3)} (bph=${blocksPerHour.toFixed(2)}, activity=${feeActivity.toFixed(1)}%)`);
    }
    return organicFee;
  }

  /**
   * Spends BTC on artificial high-fee transactions on one fork
   * The premium spreads the spend over `blocksMinedThisPeriod` full blocks.
   * A non-positive spend or block count switches manipulation off.
   */
  applyManipulation(
    forkId: ForkId,
    artificialFeeSpendingBtc: number,
    blocksMinedThisPeriod: number,
    actorId: string = 'manipulator'
  ): void {
    const state = this.getForkState(forkId);

    if (artificialFeeSpendingBtc <= 0 || blocksMinedThisPeriod <= 0) {
      state.manipulationActive = false;
      state.manipulationPremium = 0;
      return;
    }

    const totalVbytes = blocksMinedThisPeriod * SimulatorConfig.VBYTES_PER_BLOCK;
    const satsSpent = artificialFeeSpendingBtc * SimulatorConfig.SATS_PER_BTC;

    state.manipulationPremium = satsSpent / totalVbytes;
    state.manipulationActive = true;
    state.manipulationCostBtc += artificialFeeSpendingBtc;

    const actor = this.actors.get(actorId);
    if (actor) {
      actor.holdingsBtc[forkId] -= artificialFeeSpendingBtc;
    }

    if (SimulatorConfig.DEBUG_FEE) {
      console.log(`[Fee ${forkId}] ${actorId} spent ${artificialFeeSpendingBtc} BTC -> premium ${state.manipulationPremium.toFixed(3)} sats/vB`);
    }
  }

  isManipulationActive(forkId: ForkId): boolean {
    return this.forks.get(forkId)?.manipulationActive ?? false;
  }

  getManipulationPremium(forkId: ForkId): number {
    return this.forks.get(forkId)?.manipulationPremium ?? 0;
  }

  /**
   * Revenue and profit of mining one block on a fork
   */
  calculateMinerProfitability(
    forkId: ForkId,
    blockSubsidyBtc: number,
    priceUsd: number,
    hashrateCostUsd: number = SimulatorConfig.MINING_COST_USD
  ): MinerProfitability {
    const feeBtc = this.getFeeRevenuePerBlock(forkId);
    const totalBtc = blockSubsidyBtc + feeBtc;
    const revenueUsd = totalBtc * priceUsd;
    const profitUsd = revenueUsd - hashrateCostUsd;

    return {
      chainId: forkId,
      rewardBtc: blockSubsidyBtc,
      feeBtc,
      totalBtc,
      priceUsd,
      revenueUsd,
      costUsd: hashrateCostUsd,
      profitUsd,
      profitMarginPct: hashrateCostUsd > 0 ? (profitUsd / hashrateCostUsd) * 100 : 0,
      profitable: profitUsd > 0,
    };
  }

  /**
   * Judges whether manipulation on `forkId` pays for itself
   *
   * Sustainable only if portfolio appreciation across every fork strictly exceeds
   * the cumulative cost of manipulation (ratio > 1.0).
   */
  calculateManipulationSustainability(
    forkId: ForkId,
    priceOracle: PriceSource,
    actorId: string = 'manipulator'
  ): SustainabilityResult {
    const actor = this.actors.get(actorId);
    if (!actor) {
      return { sustainable: false, error: 'Actor not initialized' };
    }

    const state = this.getForkState(forkId);
    const prices = forkMap(fork => priceOracle.getPrice(fork));

    state.manipulationCostUsd = state.manipulationCostBtc * prices[forkId];
    actor.cumulativeCostsUsd = state.manipulationCostUsd;

    const values = forkMap(fork => actor.holdingsBtc[fork] * prices[fork]);
    const currentTotal = FORK_IDS.reduce((sum, fork) => sum + values[fork], 0);

    const initialValue = actor.initialValueUsd;
    const costs = actor.cumulativeCostsUsd;
    const appreciation = currentTotal - initialValue;

    let ratio: number;
    if (costs > 0) {
      ratio = appreciation / costs;
    } else {
      ratio = appreciation > 0 ? Infinity : 1.0;
    }

    const sustainable = ratio > 1.0;
    let recommendation: SustainabilityRecommendation;
    if (sustainable) {
      recommendation = 'CONTINUE';
    } else if (ratio > 0.5) {
      recommendation = 'WARNING';
    } else {
      recommendation = 'ABORT';
    }

    return {
      sustainable,
      chainId: forkId,
      currentPortfolioValueUsd: currentTotal,
      initialPortfolioValueUsd: initialValue,
      cumulativeCostsUsd: costs,
      netPositionUsd: currentTotal - initialValue - costs,
      portfolioAppreciationUsd: appreciation,
      sustainabilityRatio: ratio,
      recommendation,
      recommendationText: RECOMMENDATION_TEXT[recommendation],
      holdings: {
        btc: { ...actor.holdingsBtc },
        valueUsd: values,
      },
    };
  }

  /**
   * Appends a portfolio valuation of an actor; unknown actors are ignored
   */
  recordPortfolioSnapshot(
    actorId: string,
    priceOracle: PriceSource,
    simTime: number,
    metadata: Metadata = {}
  ): PortfolioSnapshot | null {
    if (!this.config.sustainabilityTracking) {
      return null;
    }
    const actor = this.actors.get(actorId);
    if (!actor) {
      return null;
    }

    const prices = forkMap(fork => priceOracle.getPrice(fork));
    const values = forkMap(fork => actor.holdingsBtc[fork] * prices[fork]);
    const totalValue = FORK_IDS.reduce((sum, fork) => sum + values[fork], 0);

    const snapshot: PortfolioSnapshot = {
      timestamp: simTime,
      actorId,
      holdingsBtc: { ...actor.holdingsBtc },
      priceUsd: prices,
      valueUsd: values,
      totalValueUsd: totalValue,
      cumulativeCostsUsd: actor.cumulativeCostsUsd,
      netProfitUsd: totalValue - actor.initialValueUsd - actor.cumulativeCostsUsd,
      metadata: { ...metadata },
    };
    this.portfolioHistory.push(snapshot);
    return snapshot;
  }

  /**
   * Recomputes every fork's fee from the current network state and records it
   * With a difficulty oracle, blocks per hour follow from difficulty and hashrate
   * (50% per fork when no hashrate is given).
   */
  updateFeesFromState(input: FeeUpdateInput): ForkMap<number> {
    const { difficultyOracle } = input;
    const blocksPerHour = difficultyOracle
      ? forkMap(forkId => difficultyOracle.getBlocksPerHour(forkId, input.hashratePcts?.[forkId] ?? 50.0))
      : input.blocksPerHour;

    return forkMap(forkId => {
      const state = this.getForkState(forkId);
      const organic = this.calculateOrganicFee(
        forkId,
        blocksPerHour[forkId],
        input.economicPcts[forkId],
        1.0,
        input.transactionalPcts?.[forkId]
      );

      state.organicFee = organic;
      state.fee = organic + state.manipulationPremium;

      this.feeHistory.push({
        timestamp: input.simTime,
        chainId: forkId,
        organicFee: organic,
        manipulationPremium: state.manipulationPremium,
        totalFee: state.fee,
        metadata: { ...input.metadata },
      });

      return state.fee;
    });
  }

  /**
   * Current total fee rate in sats/vB, base rate if unknown
   */
  getFee(forkId: ForkId): number {
    return this.forks.get(forkId)?.fee ?? this.config.baseFeeRate;
  }

  getOrganicFee(forkId: ForkId): number {
    return this.forks.get(forkId)?.organicFee ?? this.config.baseFeeRate;
  }

  /**
   * Rough mempool backlog estimate for a fork
   * Throughput is ~1 MB per block; transaction volume scales with activity around 50%.
   */
  estimateMempoolSize(
    forkId: ForkId,
    blocksPerHour: number,
    economicActivityPct: number,
    baseTxVolumeMbPerHour: number = 6.0
  ): MempoolEstimate {
    const throughputMb = blocksPerHour * 1.0;
    const txVolumeMb = baseTxVolumeMbPerHour * (economicActivityPct / 50.0);
    const congestionRatio = txVolumeMb / Math.max(throughputMb, 0.1);

    const currentFee = this.getFee(forkId);
    const feePressure = currentFee / this.config.baseFeeRate;
    const estimatedMempoolMb = Math.max(0, (feePressure - 1) * 10);

    const estimatedConfirmBlocks = congestionRatio <= 1
      ? 1
      : Math.trunc(1 + (congestionRatio - 1) * 2);

    return {
      chainId: forkId,
      throughputMbPerHour: throughputMb,
      txVolumeMbPerHour: txVolumeMb,
      congestionRatio,
      estimatedMempoolMb,
      estimatedConfirmBlocks,
      feeRateSatsVb: currentFee,
    };
  }

  /**
   * Fee revenue of one full block in BTC
   */
  getFeeRevenuePerBlock(forkId: ForkId): number {
    return (this.getFee(forkId) * SimulatorConfig.VBYTES_PER_BLOCK) / SimulatorConfig.SATS_PER_BTC;
  }

  getFeeHistory(forkId?: ForkId): FeePoint[] {
    return this.feeHistory.filter(point => forkId === undefined || point.chainId === forkId);
  }

  getPortfolioHistory(actorId?: string): PortfolioSnapshot[] {
    return this.portfolioHistory.filter(snapshot => actorId === undefined || snapshot.actorId === actorId);
  }

  exportToJson() {
    const currentFees: Record<string, { total: number; organic: number; manipulation: number }> = {};
    const manipulationStatus: Record<string, { active: boolean; costBtc: number; costUsd: number }> = {};
    for (const [forkId, state] of this.forks) {
      currentFees[forkId] = {
        total: state.fee,
        organic: state.organicFee,
        manipulation: state.manipulationPremium,
      };
      manipulationStatus[forkId] = {
        active: state.manipulationActive,
        costBtc: state.manipulationCostBtc,
        costUsd: state.manipulationCostUsd,
      };
    }

    const actors: Record<string, ActorPortfolio> = {};
    for (const [actorId, actor] of this.actors) {
      actors[actorId] = { ...actor, holdingsBtc: { ...actor.holdingsBtc } };
    }

    return {
      config: { ...this.config },
      currentFees,
      manipulationStatus,
      actors,
      feeHistory: this.feeHistory.map(point => ({ ...point })),
      portfolioHistory: this.portfolioHistory.map(snapshot => ({ ...snapshot })),
    };
  }
}
