/**
 * Configuration system for the fork economics simulator
 * Contains default parameters that components fall back to when a value is not injected
 */

export let SimulatorConfig = {
  // Difficulty parameters
  TARGET_BLOCK_INTERVAL: 10,      // Seconds between blocks at full hashrate and difficulty 1.0
  RETARGET_INTERVAL: 144,         // Blocks between difficulty retargets
  PRE_FORK_DIFFICULTY: 1.0,       // Difficulty both forks inherit at the split
  MAX_ADJUSTMENT_FACTOR: 4.0,     // Retarget clamp (1/4x to 4x)
  MIN_DIFFICULTY: 0.0625,         // Difficulty floor
  ENABLE_EDA: false,              // Emergency difficulty adjustment
  EDA_THRESHOLD: 6.0,             // Target intervals without a block before EDA fires
  EDA_REDUCTION: 0.20,            // Fraction of difficulty removed by EDA

  // Price parameters
  BASE_PRICE_USD: 60000,          // Pre-fork token price
  MAX_PRICE_DIVERGENCE: 0.20,     // Max +/- fraction away from base price
  MIN_FORK_DEPTH: 6,              // Combined depth before a split counts as sustained
  CHAIN_WEIGHT_COEF: 0.3,         // Price coefficients, must sum to 1.0
  ECONOMIC_WEIGHT_COEF: 0.5,
  HASHRATE_WEIGHT_COEF: 0.2,

  // Fee parameters
  BASE_FEE_RATE: 1.0,             // sats/vB at normal block rate and 50% activity
  VBYTES_PER_BLOCK: 1_000_000,    // Full block size
  SATS_PER_BTC: 100_000_000,
  NORMAL_BLOCKS_PER_HOUR: 6.0,    // Block rate at which the fee block factor is 1.0

  // Mining economics
  BLOCK_SUBSIDY_BTC: 3.125,       // Coinbase subsidy per block
  MINING_COST_USD: 100000,        // Cost to mine one block
  POOL_DECISION_INTERVAL: 600,    // Seconds between pool re-evaluations
  ASSUMED_FORK_HASHRATE_PCT: 50,  // Hashrate assumed on each fork when pools compare profits

  // Reorg tracking
  LCA_HASH: 'genesis',            // Label for the fork point when no chain host supplies one
  PROPAGATION_WINDOW: 30,         // Seconds within which reorgs cluster into one incident

  // Simulation loop
  TICK_INTERVAL: 1.0,             // Simulated seconds per tick
  ECONOMIC_UPDATE_INTERVAL: 300,  // Seconds between economic node passes
  HASHRATE_UPDATE_INTERVAL: 600,  // Seconds between pool passes
  PRICE_UPDATE_INTERVAL: 60,      // Seconds between price and fee refreshes
  START_HEIGHT: 100,              // Height of the common ancestor
  RANDOM_SEED: 'fork-sim',        // Seed of the default random source

  // Debug logging toggles
  DEBUG_DIFFICULTY: false,        // Enable/disable retarget and EDA logs
  DEBUG_PRICE: false,             // Enable/disable price oracle logs
  DEBUG_FEE: false,               // Enable/disable fee oracle logs
  DEBUG_STRATEGY: false,          // Enable/disable pool and economic decision logs
  DEBUG_REORG: false,             // Enable/disable reorg oracle logs
  DEBUG_SIMULATION: false,        // Enable/disable per-tick simulation logs
};
