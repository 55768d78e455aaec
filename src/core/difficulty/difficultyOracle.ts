/**
 * Difficulty Oracle
 *
 * Tracks difficulty and cumulative chainwork for every fork after the split.
 * Block production is probabilistic: each tick, the expected number of blocks on a
 * fork follows from its hashrate share and current difficulty.
 *
 * - Chainwork (sum of per-block difficulty) is the fork weight, not block count
 * - Difficulty retargets every `retargetInterval` blocks, clamped by `maxAdjustmentFactor`
 * - Optional emergency difficulty adjustment (EDA) cuts difficulty on a stalled fork
 */

import { DifficultyState, ForkId, RetargetEvent } from '../../types/types';
import { SimulatorConfig } from '../../config/config';
import { RandomSource } from '../../utils/rng';

export interface DifficultyOracleConfig {
  targetBlockInterval: number;
  retargetInterval: number;
  preForkDifficulty: number;
  maxAdjustmentFactor: number;
  minDifficulty: number;
  enableEda: boolean;
  edaThreshold: number;
  edaReduction: number;
}

export function defaultDifficultyConfig(): DifficultyOracleConfig {
  return {
    targetBlockInterval: SimulatorConfig.TARGET_BLOCK_INTERVAL,
    retargetInterval: SimulatorConfig.RETARGET_INTERVAL,
    preForkDifficulty: SimulatorConfig.PRE_FORK_DIFFICULTY,
    maxAdjustmentFactor: SimulatorConfig.MAX_ADJUSTMENT_FACTOR,
    minDifficulty: SimulatorConfig.MIN_DIFFICULTY,
    enableEda: SimulatorConfig.ENABLE_EDA,
    edaThreshold: SimulatorConfig.EDA_THRESHOLD,
    edaReduction: SimulatorConfig.EDA_REDUCTION,
  };
}

// Hashrate share floor, keeps the expected interval finite for an abandoned fork
const MIN_HASHRATE_FRACTION = 0.001;

export class DifficultyOracle {
  private readonly config: DifficultyOracleConfig;
  private forks: Map<ForkId, DifficultyState>;
  private adjustmentHistory: RetargetEvent[];

  constructor(config: Partial<DifficultyOracleConfig> = {}) {
    this.config = { ...defaultDifficultyConfig(), ...config };
    this.forks = new Map();
    this.adjustmentHistory = [];

    if (this.config.targetBlockInterval <= 0) {
      throw new Error(`targetBlockInterval must be positive (got ${this.config.targetBlockInterval})`);
    }
    if (this.config.retargetInterval < 1) {
      throw new Error(`retargetInterval must be at least 1 block (got ${this.config.retargetInterval})`);
    }
    if (this.config.maxAdjustmentFactor < 1) {
      throw new Error(`maxAdjustmentFactor must be >= 1 (got ${this.config.maxAdjustmentFactor})`);
    }
  }

  getConfig(): Readonly<DifficultyOracleConfig> {
    return this.config;
  }

  /**
   * Starts tracking a fork from the split height with the pre-fork difficulty
   */
  initializeFork(forkId: ForkId, initialHeight: number): void {
    this.forks.set(forkId, {
      forkId,
      currentDifficulty: this.config.preForkDifficulty,
      blocksSinceRetarget: 0,
      cumulativeChainwork: 0,
      lastBlockSimTime: 0,
      lastEdaSimTime: null,
      lastRetargetSimTime: 0,
      expectedBlockInterval: this.config.targetBlockInterval * this.config.preForkDifficulty,
      initialHeight,
      blocksMined: 0,
    });
  }

  /**
   * Read-only copy of a fork's state, or null for an unknown fork
   */
  getState(forkId: ForkId): Readonly<DifficultyState> | null {
    const state = this.forks.get(forkId);
    return state ? { ...state } : null;
  }

  getForkIds(): ForkId[] {
    return Array.from(this.forks.keys());
  }

  /**
   * Expected seconds between blocks on a fork at the given hashrate share
   */
  private expectedInterval(state: DifficultyState, hashratePct: number): number {
    const fraction = Math.max(hashratePct / 100, MIN_HASHRATE_FRACTION);
    return this.config.targetBlockInterval * state.currentDifficulty / fraction;
  }

  /**
   * Number of blocks a fork produces during one tick
   *
   * expected = tickInterval / expectedInterval
   * - expected < 1: one block with probability `expected`
   * - expected >= 1: floor(expected) blocks, plus one with probability of the remainder
   */
  getBlocksToMine(forkId: ForkId, hashratePct: number, tickInterval: number, rng: RandomSource): number {
    const state = this.forks.get(forkId);
    if (!state) {
      return 0;
    }

    const expectedInterval = this.expectedInterval(state, hashratePct);
    state.expectedBlockInterval = expectedInterval;

    const expectedBlocks = expectedInterval > 0 ? tickInterval / expectedInterval : 1.0;

    if (expectedBlocks < 1.0) {
      return rng.next() < expectedBlocks ? 1 : 0;
    }

    const guaranteed = Math.floor(expectedBlocks);
    const remainder = expectedBlocks - guaranteed;
    return guaranteed + (rng.next() < remainder ? 1 : 0);
  }

  /**
   * True if at least one block should be produced on the fork this tick
   */
  shouldMineBlock(forkId: ForkId, hashratePct: number, tickInterval: number, rng: RandomSource): boolean {
    return this.getBlocksToMine(forkId, hashratePct, tickInterval, rng) > 0;
  }

  /**
   * Records a produced block: adds chainwork and retargets when the window closes
   * Returns the retarget event if difficulty changed, null otherwise
   */
  recordBlock(forkId: ForkId, simTime: number, height: number): RetargetEvent | null {
    const state = this.forks.get(forkId);
    if (!state) {
      console.warn(`[Difficulty] recordBlock on unknown fork ${forkId}`);
      return null;
    }

    state.cumulativeChainwork += state.currentDifficulty;
    state.blocksSinceRetarget += 1;
    state.blocksMined += 1;
    state.lastBlockSimTime = simTime;

    if (state.blocksSinceRetarget >= this.config.retargetInterval) {
      return this.retarget(state, simTime, height);
    }

    return null;
  }

  /**
   * Periodic retarget over the last `retargetInterval` blocks
   */
  private retarget(state: DifficultyState, simTime: number, height: number): RetargetEvent {
    let actualTime = simTime - state.lastRetargetSimTime;
    if (actualTime <= 0) {
      actualTime = 0.01;
    }
    const targetTime = this.config.retargetInterval * this.config.targetBlockInterval;

    const maxFactor = this.config.maxAdjustmentFactor;
    const adjustmentFactor = Math.min(Math.max(targetTime / actualTime, 1 / maxFactor), maxFactor);

    const oldDifficulty = state.currentDifficulty;
    const newDifficulty = Math.max(oldDifficulty * adjustmentFactor, this.config.minDifficulty);

    state.currentDifficulty = newDifficulty;
    state.blocksSinceRetarget = 0;
    state.lastRetargetSimTime = simTime;

    const event: RetargetEvent = {
      forkId: state.forkId,
      simTime,
      height,
      oldDifficulty,
      newDifficulty,
      actualTime,
      targetTime,
      adjustmentFactor,
      isEda: false,
    };
    this.adjustmentHistory.push(event);

    if (SimulatorConfig.DEBUG_DIFFICULTY) {
      console.log(`[Difficulty ${state.forkId}] Retarget at height ${height}: ${oldDifficulty.toFixed(6)} -> ${newDifficulty.toFixed(6)} (factor=${adjustmentFactor.toFixed(3)})`);
    }

    return event;
  }

  /**
   * Emergency difficulty adjustment
   * Fires when no block has been recorded on the fork for `edaThreshold` target intervals,
   * independently of the periodic retarget. Called once per tick by the simulation.
   */
  checkEmergencyAdjustment(forkId: ForkId, simTime: number): RetargetEvent | null {
    const state = this.forks.get(forkId);
    if (!state || !this.config.enableEda) {
      return null;
    }

    const stallStart = Math.max(state.lastBlockSimTime, state.lastEdaSimTime ?? 0);
    const sinceLastBlock = simTime - stallStart;
    if (sinceLastBlock < this.config.edaThreshold * this.config.targetBlockInterval) {
      return null;
    }

    const oldDifficulty = state.currentDifficulty;
    const newDifficulty = Math.max(oldDifficulty * (1 - this.config.edaReduction), this.config.minDifficulty);
    if (newDifficulty >= oldDifficulty) {
      return null;
    }

    state.currentDifficulty = newDifficulty;
    // The next cut needs another full threshold
    state.lastEdaSimTime = simTime;

    const event: RetargetEvent = {
      forkId,
      simTime,
      height: state.initialHeight + state.blocksMined,
      oldDifficulty,
      newDifficulty,
      actualTime: sinceLastBlock,
      targetTime: this.config.targetBlockInterval,
      adjustmentFactor: 1 - this.config.edaReduction,
      isEda: true,
    };
    this.adjustmentHistory.push(event);

    if (SimulatorConfig.DEBUG_DIFFICULTY) {
      console.log(`[Difficulty ${forkId}] EDA after ${sinceLastBlock.toFixed(0)}s without a block: ${oldDifficulty.toFixed(6)} -> ${newDifficulty.toFixed(6)}`);
    }

    return event;
  }

  /**
   * Expected blocks per hour on a fork at the given hashrate share
   * Falls back to the normal rate of 6 for an unknown fork
   */
  getBlocksPerHour(forkId: ForkId, hashratePct: number): number {
    const state = this.forks.get(forkId);
    if (!state) {
      return SimulatorConfig.NORMAL_BLOCKS_PER_HOUR;
    }
    const expectedInterval = this.expectedInterval(state, hashratePct);
    return expectedInterval > 0 ? 3600 / expectedInterval : 0;
  }

  getCumulativeChainwork(forkId: ForkId): number {
    return this.forks.get(forkId)?.cumulativeChainwork ?? 0;
  }

  getCurrentDifficulty(forkId: ForkId): number {
    return this.forks.get(forkId)?.currentDifficulty ?? 0;
  }

  private getTotalChainwork(): number {
    let total = 0;
    for (const state of this.forks.values()) {
      total += state.cumulativeChainwork;
    }
    return total;
  }

  /**
   * Fork's share of total chainwork (0-1)
   * 0.5 before any block is recorded, 0 for an unknown fork
   */
  getChainWeight(forkId: ForkId): number {
    const total = this.getTotalChainwork();
    if (total <= 0) {
      return 0.5;
    }
    const state = this.forks.get(forkId);
    if (!state) {
      return 0;
    }
    return state.cumulativeChainwork / total;
  }

  /**
   * Heaviest fork by cumulative chainwork
   * Returns [winnerId, winnerChainwork, loserChainwork]; ties keep the first registered fork.
   * The loser is the runner-up, or the winner itself when only one fork exists.
   */
  getWinningFork(): [ForkId | '', number, number] {
    // Map iteration follows insertion, i.e. registration order
    const states = Array.from(this.forks.values());

    if (states.length === 0) {
      return ['', 0, 0];
    }

    // Array.prototype.sort is stable, so equal chainwork keeps registration order
    const ranked = [...states].sort((a, b) => b.cumulativeChainwork - a.cumulativeChainwork);
    const winner = ranked[0];
    const loser = ranked.length > 1 ? ranked[1] : winner;
    return [winner.forkId, winner.cumulativeChainwork, loser.cumulativeChainwork];
  }

  getAdjustmentHistory(): readonly RetargetEvent[] {
    return this.adjustmentHistory;
  }

  /**
   * Serializable snapshot: config, per-fork state, winner and adjustment history
   */
  exportToJson() {
    const [winner, winnerWork, loserWork] = this.getWinningFork();
    const forks: Record<string, DifficultyState & { chainWeight: number }> = {};
    for (const [forkId, state] of this.forks) {
      forks[forkId] = { ...state, chainWeight: this.getChainWeight(forkId) };
    }

    return {
      config: { ...this.config },
      forks,
      winningFork: {
        forkId: winner,
        winnerChainwork: winnerWork,
        loserChainwork: loserWork,
      },
      adjustmentHistory: this.adjustmentHistory.map(event => ({ ...event })),
    };
  }
}
