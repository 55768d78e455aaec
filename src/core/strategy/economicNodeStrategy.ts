/**
 * Economic Node Strategy
 *
 * Exchanges, payment processors, custodians and user nodes pick the fork whose
 * economy they participate in. The signal is token price rather than mining profit:
 * 1. Rational choice: the higher-priced fork
 * 2. Ideology: stay with the preferred fork while its price disadvantage is tolerable
 * 3. Inertia: only move when the advantage beats switching threshold + inertia
 *
 * The aggregated weight feeds the price oracle (economic weight), the fee oracle
 * (transactional weight) and block production (solo-miner hashrate).
 */

import {
  EconomicDecision,
  EconomicNodeProfile,
  FORK_IDS,
  ForkId,
  ForkMap,
  NEUTRAL,
  NodeType,
  SoloMiner,
  forkMap,
  toPercentages,
} from '../../types/types';
import { SimulatorConfig } from '../../config/config';
import { PriceSource } from '../market/feeOracle';

export interface NodeStats {
  switches: number;
  ideologyOverrides: number;
  inertiaHolds: number;
}

export interface TransactionalWeight {
  transactional: ForkMap<number>; // Fee-generating share per fork (0-100)
  custodial: ForkMap<number>;     // Price-support-only share per fork (0-100)
}

export interface MiningAllocation {
  hashrate: ForkMap<number>;      // Solo hashrate per fork (0-100 of network)
  miners: SoloMiner[];
}

export class EconomicNodeStrategy {
  private nodes: Map<string, EconomicNodeProfile>;
  private currentAllocation: Map<string, ForkId | null>;
  private lastDecisionTime: Map<string, number>;
  private nodeStats: Map<string, NodeStats>;
  private decisionHistory: EconomicDecision[];

  constructor(nodes: EconomicNodeProfile[]) {
    this.nodes = new Map();
    this.currentAllocation = new Map();
    this.lastDecisionTime = new Map();
    this.nodeStats = new Map();
    this.decisionHistory = [];

    for (const node of nodes) {
      if (node.consensusWeight < 0) {
        throw new Error(`Node ${node.nodeId} has negative consensus weight ${node.consensusWeight}`);
      }
      if (node.hashratePct < 0) {
        throw new Error(`Node ${node.nodeId} has negative hashrate ${node.hashratePct}`);
      }
      if (this.nodes.has(node.nodeId)) {
        throw new Error(`Duplicate economic node id ${node.nodeId}`);
      }
      this.nodes.set(node.nodeId, { ...node });
      this.currentAllocation.set(node.nodeId, node.initialFork);
      this.lastDecisionTime.set(node.nodeId, 0);
      this.nodeStats.set(node.nodeId, { switches: 0, ideologyOverrides: 0, inertiaHolds: 0 });
    }
  }

  getNodeIds(): string[] {
    return Array.from(this.nodes.keys());
  }

  getNode(nodeId: string): Readonly<EconomicNodeProfile> {
    const node = this.nodes.get(nodeId);
    if (!node) {
      throw new Error(`Unknown economic node ${nodeId}`);
    }
    return node;
  }

  getCurrentAllocation(nodeId: string): ForkId | null {
    return this.currentAllocation.get(nodeId) ?? null;
  }

  getNodeStats(nodeId: string): Readonly<NodeStats> | null {
    const stats = this.nodeStats.get(nodeId);
    return stats ? { ...stats } : null;
  }

  getDecisionHistory(): readonly EconomicDecision[] {
    return this.decisionHistory;
  }

  /**
   * Consensus weight, falling back to custody when no consensus weight is set
   */
  static nodeWeight(node: Readonly<EconomicNodeProfile>): number {
    return node.consensusWeight > 0 ? node.consensusWeight : node.custodyBtc;
  }

  private requireStats(nodeId: string): NodeStats {
    const stats = this.nodeStats.get(nodeId);
    if (!stats) {
      throw new Error(`Unknown economic node ${nodeId}`);
    }
    return stats;
  }

  /**
   * Node decides which fork to participate in
   * Returns the chosen fork and the decision record, or null while cooling down
   */
  makeDecision(
    nodeId: string,
    currentTime: number,
    priceOracle: PriceSource,
    forceDecision: boolean = false
  ): [ForkId, EconomicDecision | null] {
    const node = this.getNode(nodeId);
    const stats = this.requireStats(nodeId);

    if (!forceDecision) {
      const sinceLast = currentTime - (this.lastDecisionTime.get(nodeId) ?? 0);
      if (sinceLast < node.switchingCooldown) {
        let current = this.currentAllocation.get(nodeId) ?? null;
        if (current === null) {
          current = node.initialFork;
          this.currentAllocation.set(nodeId, current);
        }
        return [current, null];
      }
    }

    const prices = forkMap(forkId => priceOracle.getPrice(forkId));
    const [primary, secondary] = FORK_IDS;
    const priceRatio = prices[secondary] > 0 ? prices[primary] / prices[secondary] : 1.0;

    // Ties keep the first-registered fork
    let rationalChoice = FORK_IDS[0];
    for (const forkId of FORK_IDS) {
      if (prices[forkId] > prices[rationalChoice]) {
        rationalChoice = forkId;
      }
    }
    const runnerUpPrice = Math.max(
      ...FORK_IDS.filter(forkId => forkId !== rationalChoice).map(forkId => prices[forkId])
    );
    const priceAdvantage = runnerUpPrice > 0
      ? (prices[rationalChoice] - runnerUpPrice) / runnerUpPrice
      : 0.0;

    let chosenFork = rationalChoice;
    let ideologyOverride = false;
    let inertiaHeld = false;
    let reason = 'Rational: following higher-priced fork';

    if (node.forkPreference !== NEUTRAL) {
      const preferred = node.forkPreference;

      if (preferred !== rationalChoice) {
        const maxAcceptableLoss = node.ideologyStrength * node.maxLossPct;

        if (priceAdvantage <= maxAcceptableLoss) {
          chosenFork = preferred;
          ideologyOverride = true;
          stats.ideologyOverrides += 1;
          reason = `Ideology: supporting ${preferred} despite ${(priceAdvantage * 100).toFixed(1)}% lower price (tolerance: ${(maxAcceptableLoss * 100).toFixed(1)}%)`;
        } else {
          reason = `Forced rational: ${(priceAdvantage * 100).toFixed(1)}% advantage exceeds ideology tolerance ${(maxAcceptableLoss * 100).toFixed(1)}%`;
        }
      } else {
        reason = 'Ideology and price aligned';
      }
    }

    const current = this.currentAllocation.get(nodeId) ?? null;
    if (current !== null && chosenFork !== current) {
      const effectiveThreshold = node.switchingThreshold + node.inertia;
      if (priceAdvantage < effectiveThreshold) {
        chosenFork = current;
        inertiaHeld = true;
        stats.inertiaHolds += 1;
        reason = `Inertia: staying on ${current} (advantage ${(priceAdvantage * 100).toFixed(1)}% < threshold ${(effectiveThreshold * 100).toFixed(1)}%)`;
      }
    }

    if (current !== null && chosenFork !== current) {
      stats.switches += 1;
    }

    const decision: EconomicDecision = {
      timestamp: currentTime,
      nodeId,
      nodeType: node.nodeType,
      chosenFork,
      priceUsd: prices,
      priceRatio,
      rationalChoice,
      ideologyOverride,
      inertiaHeld,
      economicWeight: EconomicNodeStrategy.nodeWeight(node),
      reason,
    };

    this.decisionHistory.push(decision);
    this.currentAllocation.set(nodeId, chosenFork);
    this.lastDecisionTime.set(nodeId, currentTime);

    if (SimulatorConfig.DEBUG_STRATEGY) {
      console.log(`[Economic] ${nodeId} -> ${chosenFork}: ${reason}`);
    }

    return [chosenFork, decision];
  }

  /**
   * Lets every node decide and returns each fork's share of economic weight (0-100)
   * Splits evenly when no node carries weight.
   */
  calculateEconomicAllocation(currentTime: number, priceOracle: PriceSource): ForkMap<number> {
    const weights = forkMap(() => 0);
    for (const node of this.nodes.values()) {
      const [chosenFork] = this.makeDecision(node.nodeId, currentTime, priceOracle);
      weights[chosenFork] += EconomicNodeStrategy.nodeWeight(node);
    }
    return toPercentages(weights);
  }

  /**
   * Economic weight per fork from the current allocation, without re-evaluating
   */
  getEconomicAllocation(): ForkMap<number> {
    const weights = forkMap(() => 0);
    for (const node of this.nodes.values()) {
      const fork = this.currentAllocation.get(node.nodeId) ?? node.initialFork;
      weights[fork] += EconomicNodeStrategy.nodeWeight(node);
    }
    return toPercentages(weights);
  }

  /**
   * Weight and node count per node type and fork
   */
  getAllocationBreakdown() {
    const breakdown: Record<NodeType, { weight: ForkMap<number>; nodes: ForkMap<string[]> }> = {
      [NodeType.ECONOMIC]: { weight: forkMap(() => 0), nodes: forkMap<string[]>(() => []) },
      [NodeType.USER]: { weight: forkMap(() => 0), nodes: forkMap<string[]>(() => []) },
    };

    for (const node of this.nodes.values()) {
      const fork = this.currentAllocation.get(node.nodeId) ?? node.initialFork;
      breakdown[node.nodeType].weight[fork] += EconomicNodeStrategy.nodeWeight(node);
      breakdown[node.nodeType].nodes[fork].push(node.nodeId);
    }
    return breakdown;
  }

  /**
   * Splits economic weight into fee-generating and custodial buckets by velocity
   *
   * A node's weight contributes `weight * velocity` to the transactional bucket of its
   * fork and the rest to the custodial bucket. Each bucket is returned as percentages.
   */
  calculateTransactionalWeight(): TransactionalWeight {
    const transactional = forkMap(() => 0);
    const custodial = forkMap(() => 0);

    for (const node of this.nodes.values()) {
      const fork = this.currentAllocation.get(node.nodeId) ?? node.initialFork;
      const weight = EconomicNodeStrategy.nodeWeight(node);
      transactional[fork] += weight * node.transactionVelocity;
      custodial[fork] += weight * (1 - node.transactionVelocity);
    }

    return {
      transactional: toPercentages(transactional),
      custodial: toPercentages(custodial),
    };
  }

  /**
   * Fee-generating activity per fork (0-100), the input to organic fee calculation
   */
  getFeeGenerationWeight(): ForkMap<number> {
    return this.calculateTransactionalWeight().transactional;
  }

  /**
   * Solo-miner hashrate per fork by the nodes' current allocation
   */
  getMiningAllocation(): MiningAllocation {
    const hashrate = forkMap(() => 0);
    const miners = this.getSoloMiners();
    for (const miner of miners) {
      hashrate[miner.forkId] += miner.hashratePct;
    }
    return { hashrate, miners };
  }

  getSoloMiners(): SoloMiner[] {
    const miners: SoloMiner[] = [];
    for (const node of this.nodes.values()) {
      if (node.hashratePct > 0) {
        miners.push({
          nodeId: node.nodeId,
          forkId: this.currentAllocation.get(node.nodeId) ?? node.initialFork,
          hashratePct: node.hashratePct,
        });
      }
    }
    return miners;
  }

  getTotalSoloHashrate(): number {
    let total = 0;
    for (const node of this.nodes.values()) {
      if (node.hashratePct > 0) {
        total += node.hashratePct;
      }
    }
    return total;
  }

  exportToJson() {
    const nodes: Record<string, { profile: EconomicNodeProfile; currentAllocation: ForkId | null; stats: NodeStats }> = {};
    for (const node of this.nodes.values()) {
      nodes[node.nodeId] = {
        profile: { ...node },
        currentAllocation: this.getCurrentAllocation(node.nodeId),
        stats: { ...this.requireStats(node.nodeId) },
      };
    }

    const mining = this.getMiningAllocation();
    const { transactional, custodial } = this.calculateTransactionalWeight();

    return {
      nodes,
      economicAllocation: this.getEconomicAllocation(),
      soloMining: {
        totalHashratePct: this.getTotalSoloHashrate(),
        hashratePct: mining.hashrate,
        miners: mining.miners,
      },
      transactionalWeight: {
        transactionalPct: transactional,
        custodialPct: custodial,
      },
      decisionHistory: this.decisionHistory.map(decision => ({ ...decision })),
    };
  }
}
