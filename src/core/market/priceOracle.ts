/**
 * Price Oracle
 *
 * Models the token price of each fork from its fundamentals:
 * chain weight (chainwork share), economic weight and hashrate weight.
 *
 * Natural chain splits are common and resolve quickly, so prices stay at the base price
 * until the split is "sustained": the combined depth of all forks past the common
 * ancestor reaches `minForkDepth`. The sustained flag is a one-way latch.
 */

import { FORK_IDS, ForkId, ForkMap, Metadata, PricePoint, forkMap } from '../../types/types';
import { SimulatorConfig } from '../../config/config';

export interface PriceCoefficients {
  chainWeight: number;
  economicWeight: number;
  hashrateWeight: number;
}

export interface PriceOracleConfig {
  basePrice: number;
  maxDivergence: number;
  minForkDepth: number;
  coefficients: PriceCoefficients;
}

export function defaultPriceConfig(): PriceOracleConfig {
  return {
    basePrice: SimulatorConfig.BASE_PRICE_USD,
    maxDivergence: SimulatorConfig.MAX_PRICE_DIVERGENCE,
    minForkDepth: SimulatorConfig.MIN_FORK_DEPTH,
    coefficients: {
      chainWeight: SimulatorConfig.CHAIN_WEIGHT_COEF,
      economicWeight: SimulatorConfig.ECONOMIC_WEIGHT_COEF,
      hashrateWeight: SimulatorConfig.HASHRATE_WEIGHT_COEF,
    },
  };
}

/**
 * Current fork state as seen by the simulation at one refresh
 */
export interface PriceUpdateInput {
  heights: ForkMap<number>;
  economicPcts: ForkMap<number>;        // 0-100
  hashratePcts: ForkMap<number>;        // 0-100
  commonAncestorHeight: number;
  simTime: number;
  chainWeightOverrides?: ForkMap<number>; // 0-1, e.g. chainwork share from the difficulty oracle
  metadata?: Metadata;
}

export interface PriceTimeline {
  timestamps: number[];
  prices: ForkMap<number[]>;
}

// Per-fork factor is mapped into [0.8, 1.2] before weighting
const FACTOR_FLOOR = 0.8;
const FACTOR_SPAN = 0.4;

export class PriceOracle {
  private readonly config: PriceOracleConfig;
  private prices: Map<ForkId, number>;
  private history: PricePoint[];

  private forkSustained: boolean;
  private forkSustainedAt: number | null;
  private forkStartHeight: number | null;

  constructor(config: Partial<PriceOracleConfig> = {}) {
    const defaults = defaultPriceConfig();
    this.config = {
      ...defaults,
      ...config,
      coefficients: { ...defaults.coefficients, ...config.coefficients },
    };

    const { chainWeight, economicWeight, hashrateWeight } = this.config.coefficients;
    const coefficientSum = chainWeight + economicWeight + hashrateWeight;
    if (Math.abs(coefficientSum - 1.0) > 0.01) {
      throw new Error(`Price coefficients must sum to 1.0 (got ${coefficientSum.toFixed(4)})`);
    }
    if (this.config.basePrice <= 0) {
      throw new Error(`basePrice must be positive (got ${this.config.basePrice})`);
    }
    if (this.config.maxDivergence < 0) {
      throw new Error(`maxDivergence must not be negative (got ${this.config.maxDivergence})`);
    }

    this.prices = new Map();
    this.history = [];
    this.forkSustained = false;
    this.forkSustainedAt = null;
    this.forkStartHeight = null;

    for (const forkId of FORK_IDS) {
      this.prices.set(forkId, this.config.basePrice);
      this.history.push({
        timestamp: 0,
        chainId: forkId,
        price: this.config.basePrice,
        metadata: { initial: true },
      });
    }
  }

  getConfig(): Readonly<PriceOracleConfig> {
    return this.config;
  }

  getBasePrice(): number {
    return this.config.basePrice;
  }

  /**
   * Current price of a fork, base price if unknown
   */
  getPrice(forkId: ForkId): number {
    return this.prices.get(forkId) ?? this.config.basePrice;
  }

  getPrices(): ForkMap<number> {
    return forkMap(forkId => this.getPrice(forkId));
  }

  /**
   * Primary fork price divided by secondary fork price
   * 1.0 if the secondary price is not positive
   */
  getPriceRatio(): number {
    const [primary, secondary] = FORK_IDS;
    const secondaryPrice = this.getPrice(secondary);
    return secondaryPrice > 0 ? this.getPrice(primary) / secondaryPrice : 1.0;
  }

  isForkSustained(): boolean {
    return this.forkSustained;
  }

  getForkSustainedAt(): number | null {
    return this.forkSustainedAt;
  }

  getForkStartHeight(): number | null {
    return this.forkStartHeight;
  }

  /**
   * Combined depth of every fork past the common ancestor
   */
  static forkDepth(heights: ForkMap<number>, commonAncestorHeight: number): number {
    const total = FORK_IDS.reduce((sum, forkId) => sum + heights[forkId], 0);
    return total - FORK_IDS.length * commonAncestorHeight;
  }

  /**
   * Latches the sustained flag once the split is deep enough
   * Returns true only on the call that closes the latch
   */
  checkForkSustained(heights: ForkMap<number>, commonAncestorHeight: number, simTime: number): boolean {
    const depth = PriceOracle.forkDepth(heights, commonAncestorHeight);

    if (this.forkStartHeight === null) {
      this.forkStartHeight = commonAncestorHeight;
    }

    if (!this.forkSustained && depth >= this.config.minForkDepth) {
      this.forkSustained = true;
      this.forkSustainedAt = simTime;
      if (SimulatorConfig.DEBUG_PRICE) {
        console.log(`[Price] Fork became SUSTAINED at depth=${depth} (min=${this.config.minForkDepth})`);
      }
      return true;
    }

    if (SimulatorConfig.DEBUG_PRICE && !this.forkSustained) {
      console.log(`[Price] Fork not yet sustained: depth=${depth} < min=${this.config.minForkDepth}`);
    }
    return false;
  }

  /**
   * Sets one fork's price from its weights (each 0-1) and records it
   * While the split is not sustained the price stays at base
   */
  updatePrice(
    forkId: ForkId,
    chainWeight: number,
    economicWeight: number,
    hashrateWeight: number,
    simTime: number,
    metadata: Metadata = {}
  ): number {
    const { basePrice, maxDivergence, coefficients } = this.config;
    let newPrice = basePrice;

    if (this.forkSustained) {
      const chainFactor = FACTOR_FLOOR + chainWeight * FACTOR_SPAN;
      const economicFactor = FACTOR_FLOOR + economicWeight * FACTOR_SPAN;
      const hashrateFactor = FACTOR_FLOOR + hashrateWeight * FACTOR_SPAN;

      const combined =
        chainFactor * coefficients.chainWeight +
        economicFactor * coefficients.economicWeight +
        hashrateFactor * coefficients.hashrateWeight;

      const minPrice = basePrice * (1 - maxDivergence);
      const maxPrice = basePrice * (1 + maxDivergence);
      newPrice = Math.max(minPrice, Math.min(maxPrice, basePrice * combined));

      if (SimulatorConfig.DEBUG_PRICE) {
        console.log(`[Price ${forkId}] chain=${chainWeight.toFixed(3)} econ=${economicWeight.toFixed(3)} hash=${hashrateWeight.toFixed(3)} -> combined=${combined.toFixed(4)} price=$${newPrice.toFixed(0)}`);
      }
    }

    this.prices.set(forkId, newPrice);
    this.history.push({
      timestamp: simTime,
      chainId: forkId,
      price: newPrice,
      metadata: { ...metadata },
    });

    return newPrice;
  }

  /**
   * Refreshes every fork price from the current network state
   *
   * Chain weight uses the supplied overrides when present, otherwise each fork's share
   * of total height. Economic and hashrate percentages are converted to 0-1.
   */
  updatePricesFromState(input: PriceUpdateInput): ForkMap<number> {
    const justSustained = this.checkForkSustained(input.heights, input.commonAncestorHeight, input.simTime);

    let metadata: Metadata = { ...input.metadata };
    if (justSustained) {
      metadata = {
        ...metadata,
        forkSustained: true,
        forkDepth: PriceOracle.forkDepth(input.heights, input.commonAncestorHeight),
      };
    }

    let chainWeights: ForkMap<number>;
    if (input.chainWeightOverrides) {
      chainWeights = input.chainWeightOverrides;
    } else {
      const totalHeight = FORK_IDS.reduce((sum, forkId) => sum + input.heights[forkId], 0);
      chainWeights = forkMap(forkId =>
        totalHeight > 0 ? input.heights[forkId] / totalHeight : 0.5
      );
    }

    return forkMap(forkId =>
      this.updatePrice(
        forkId,
        chainWeights[forkId],
        input.economicPcts[forkId] / 100,
        input.hashratePcts[forkId] / 100,
        input.simTime,
        metadata
      )
    );
  }

  /**
   * Price history, optionally filtered by fork and an inclusive time window
   */
  getPriceHistory(forkId?: ForkId, startTime?: number, endTime?: number): PricePoint[] {
    return this.history.filter(point =>
      (forkId === undefined || point.chainId === forkId) &&
      (startTime === undefined || point.timestamp >= startTime) &&
      (endTime === undefined || point.timestamp <= endTime)
    );
  }

  /**
   * Merged timeline of every observed timestamp, carrying each fork's last known price
   */
  getPriceTimeline(): PriceTimeline {
    const perFork = forkMap(forkId => this.getPriceHistory(forkId));
    const timestamps = Array.from(
      new Set(FORK_IDS.flatMap(forkId => perFork[forkId].map(point => point.timestamp)))
    ).sort((a, b) => a - b);

    const prices = forkMap<number[]>(() => []);
    for (const forkId of FORK_IDS) {
      const history = perFork[forkId];
      let index = 0;
      for (const t of timestamps) {
        while (index < history.length - 1 && history[index + 1].timestamp <= t) {
          index++;
        }
        prices[forkId].push(index < history.length ? history[index].price : this.config.basePrice);
      }
    }

    return { timestamps, prices };
  }

  exportToJson() {
    return {
      config: {
        basePrice: this.config.basePrice,
        maxDivergence: this.config.maxDivergence,
        minForkDepth: this.config.minForkDepth,
        coefficients: { ...this.config.coefficients },
      },
      forkSustained: this.forkSustained,
      forkSustainedAt: this.forkSustainedAt,
      currentPrices: this.getPrices(),
      timeline: this.getPriceTimeline(),
      history: this.history.map(point => ({ ...point })),
    };
  }
}
