/**
 * Core type definitions for the fork economics simulator
 */

// ============================================================================
// Fork Identity
// ============================================================================

/**
 * Competing chain partitions after the split.
 * Extend the enum and FORK_IDS together to simulate more than two forks.
 */
export enum ForkId {
  V27 = 'v27',
  V26 = 'v26',
}

/**
 * Registration order of forks. The first entry is the primary fork:
 * it wins chainwork ties and is the numerator of the price ratio.
 */
export const FORK_IDS: readonly ForkId[] = [ForkId.V27, ForkId.V26];

/**
 * Total mapping keyed by fork id
 */
export type ForkMap<T> = Record<ForkId, T>;

export const NEUTRAL = 'neutral' as const;

/**
 * Either a concrete fork or no preference at all
 */
export type ForkPreference = ForkId | typeof NEUTRAL;

/**
 * Builds a ForkMap by evaluating `init` for every registered fork
 */
export function forkMap<T>(init: (forkId: ForkId) => T): ForkMap<T> {
  const map: Partial<ForkMap<T>> = {};
  for (const forkId of FORK_IDS) {
    map[forkId] = init(forkId);
  }
  if (!coversAllForks(map)) {
    throw new Error('FORK_IDS does not list every ForkId member');
  }
  return map;
}

function coversAllForks<T>(map: Partial<ForkMap<T>>): map is ForkMap<T> {
  return Object.values(ForkId).every(forkId => forkId in map);
}

/**
 * Narrows an arbitrary string to a registered fork id
 */
export function isForkId(value: string): value is ForkId {
  return FORK_IDS.some(forkId => forkId === value);
}

/**
 * Turns a ForkMap into per-fork percentages of its total.
 * Splits evenly when the total is not positive.
 */
export function toPercentages(weights: ForkMap<number>): ForkMap<number> {
  const total = FORK_IDS.reduce((sum, forkId) => sum + weights[forkId], 0);
  if (total <= 0) {
    return forkMap(() => 100 / FORK_IDS.length);
  }
  return forkMap(forkId => (weights[forkId] / total) * 100);
}

/**
 * Plain JSON-compatible value used by every export surface
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type Metadata = Record<string, JsonValue>;

// ============================================================================
// Observation Types
// ============================================================================

/**
 * Immutable price observation
 */
export interface PricePoint {
  readonly timestamp: number;   // Simulation time of the observation
  readonly chainId: ForkId;
  readonly price: number;       // USD
  readonly metadata: Metadata;
}

/**
 * Immutable fee observation
 */
export interface FeePoint {
  readonly timestamp: number;
  readonly chainId: ForkId;
  readonly organicFee: number;          // sats/vB from natural demand
  readonly manipulationPremium: number; // sats/vB from artificial spending
  readonly totalFee: number;            // organic + premium
  readonly metadata: Metadata;
}

/**
 * Portfolio valuation of one actor across every fork
 */
export interface PortfolioSnapshot {
  readonly timestamp: number;
  readonly actorId: string;
  readonly holdingsBtc: ForkMap<number>;
  readonly priceUsd: ForkMap<number>;
  readonly valueUsd: ForkMap<number>;
  readonly totalValueUsd: number;
  readonly cumulativeCostsUsd: number;
  readonly netProfitUsd: number;        // total - initial - costs
  readonly metadata: Metadata;
}

// ============================================================================
// Difficulty Types
// ============================================================================

/**
 * Difficulty and chainwork state owned by the difficulty oracle for one fork
 */
export interface DifficultyState {
  forkId: ForkId;
  currentDifficulty: number;     // Relative to the pre-fork difficulty of 1.0
  blocksSinceRetarget: number;
  cumulativeChainwork: number;   // Sum of difficulty of every recorded block
  lastBlockSimTime: number;
  lastEdaSimTime: number | null;  // Last emergency cut, restarts the stall clock
  lastRetargetSimTime: number;
  expectedBlockInterval: number; // Seconds, at the last sampled hashrate
  initialHeight: number;         // Height at the fork point
  blocksMined: number;           // Blocks recorded since the fork
}

/**
 * Periodic retarget or emergency difficulty adjustment
 */
export interface RetargetEvent {
  readonly forkId: ForkId;
  readonly simTime: number;
  readonly height: number;
  readonly oldDifficulty: number;
  readonly newDifficulty: number;
  readonly actualTime: number;       // Seconds the window actually took
  readonly targetTime: number;       // Seconds the window should have taken
  readonly adjustmentFactor: number;
  readonly isEda: boolean;
}

// ============================================================================
// Agent Types
// ============================================================================

export interface PoolProfile {
  poolId: string;
  hashratePct: number;              // Share of network hashrate (0-100)
  forkPreference: ForkPreference;
  ideologyStrength: number;         // 0 = purely rational, 1 = ideology at any cost
  profitabilityThreshold: number;   // Minimum advantage worth switching for
  maxLossUsd: number | null;        // Absolute opportunity-cost cap
  maxLossPct: number | null;        // Fraction of revenue the pool will sacrifice
  currentFork: ForkId;              // Fork the pool last mined, for reorg detection
}

export interface MiningDecision {
  readonly timestamp: number;
  readonly poolId: string;
  readonly chosenFork: ForkId;
  readonly profitabilityUsd: ForkMap<number>; // Expected profit per hour on each fork
  readonly rationalChoice: ForkId;
  readonly ideologyOverride: boolean;
  readonly opportunityCostUsd: number;
  readonly cumulativeCostUsd: number;
  readonly reason: string;
}

export enum NodeType {
  ECONOMIC = 'economic',
  USER = 'user',
}

export enum ActivityType {
  TRANSACTIONAL = 'transactional', // Exchanges, processors, merchants
  CUSTODIAL = 'custodial',         // Custody, treasuries, long-term holders
  MIXED = 'mixed',
}

export interface EconomicNodeProfile {
  nodeId: string;
  nodeType: NodeType;
  activityType: ActivityType;
  transactionVelocity: number;  // Fee-generating share of the node's weight (0-1)
  forkPreference: ForkPreference;
  ideologyStrength: number;
  switchingThreshold: number;   // Price advantage needed before moving
  custodyBtc: number;
  dailyVolumeBtc: number;
  consensusWeight: number;      // 0 falls back to custodyBtc
  hashratePct: number;          // > 0 marks a solo miner
  switchingCooldown: number;    // Seconds between evaluations
  maxLossPct: number;
  inertia: number;              // Extra advantage required on top of the threshold
  role: string | null;
  initialFork: ForkId;
}

export interface EconomicDecision {
  readonly timestamp: number;
  readonly nodeId: string;
  readonly nodeType: NodeType;
  readonly chosenFork: ForkId;
  readonly priceUsd: ForkMap<number>;
  readonly priceRatio: number;
  readonly rationalChoice: ForkId;
  readonly ideologyOverride: boolean;
  readonly inertiaHeld: boolean;
  readonly economicWeight: number;
  readonly reason: string;
}

/**
 * Solo miner entry reported by the economic strategy
 */
export interface SoloMiner {
  nodeId: string;
  forkId: ForkId;
  hashratePct: number;
}

// ============================================================================
// Reorg Types
// ============================================================================

export interface ReorgEvent {
  readonly timestamp: number;
  readonly nodeId: string;
  readonly lcaHeight: number;
  readonly lcaHash: string;
  readonly depth: number;                     // Blocks the node walks back
  readonly forkOld: ForkId;
  readonly forkNew: ForkId;
  readonly blocksInvalidated: readonly number[]; // Heights the node mined and lost
}

export interface NodeMetrics {
  nodeId: string;
  forkId: ForkId;                          // Fork the node is currently on
  blocksMined: number;
  blocksMinedPerFork: ForkMap<number>;
  blocksOrphaned: number;
  totalExposure: number;                   // Sum of reorg depths experienced
  reorgCount: number;
}
