/**
 * Loads scenario rosters and simulation settings from the files under config/
 *
 * YAML is parsed with js-yaml and every document is validated with zod before it is
 * mapped onto the runtime profiles. Any validation failure throws with the offending paths.
 */

import fs from 'node:fs';
import path from 'node:path';

import yaml from 'js-yaml';
import { z } from 'zod';

import {
  ActivityType,
  EconomicNodeProfile,
  FORK_IDS,
  ForkId,
  ForkMap,
  ForkPreference,
  NEUTRAL,
  NodeType,
  PoolProfile,
  forkMap,
} from '../types/types';
import { PriceOracleConfig, defaultPriceConfig } from '../core/market/priceOracle';
import { DifficultyOracleConfig } from '../core/difficulty/difficultyOracle';
import { FeeOracleConfig } from '../core/market/feeOracle';
import { MiningPoolStrategyConfig } from '../core/strategy/miningPoolStrategy';
import { ForkSimulationConfig } from '../core/simulation/forkSimulation';
import { SimulatorConfig } from './config';
import {
  ActivityProfiles,
  ActivityProfilesSchema,
  DistributionBucket,
  EconomicConfigFile,
  EconomicConfigSchema,
  EconomicDefaults,
  NetworkSchema,
  NodeMetadata,
  PoolConfigSchema,
  PriceBlockSchema,
  SimulationFileSchema,
} from './schemas';

export const CONFIG_DIR = path.resolve(__dirname, '../../config');
export const DEFAULT_ACTIVITY_PROFILES_PATH = path.join(CONFIG_DIR, 'activity_profiles.json');

const ECONOMIC_NODE_TYPES = new Set(['economic', 'major_exchange', 'exchange', 'payment_processor']);

// Fallbacks when neither the scenario defaults nor a role override set a field
const ECONOMIC_FALLBACKS = {
  ideologyStrength: 0.1,
  switchingThreshold: 0.03,
  switchingCooldown: 1800,
  maxLossPct: 0.05,
  inertia: 0.15,
};

const USER_FALLBACKS = {
  ideologyStrength: 0.3,
  switchingThreshold: 0.08,
  switchingCooldown: 3600,
  maxLossPct: 0.15,
  inertia: 0.05,
  transactionVelocity: 0.3,
};

/**
 * Validates `data` against `schema`, throwing one message that lists every issue
 */
export function parseWithSchema<S extends z.ZodTypeAny>(schema: S, data: unknown, source: string): z.infer<S> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

function readDocument(filePath: string): unknown {
  const raw = fs.readFileSync(filePath, 'utf-8');
  const extension = path.extname(filePath).toLowerCase();
  if (extension === '.json') {
    const parsed: unknown = JSON.parse(raw);
    return parsed;
  }
  return yaml.load(raw);
}

function toForkMap(record: Record<string, number>, source: string): ForkMap<number> {
  for (const forkId of FORK_IDS) {
    if (!(forkId in record)) {
      throw new Error(`Invalid ${source}: missing fork ${forkId}`);
    }
  }
  return forkMap(forkId => record[forkId]);
}

// ============================================================================
// Mining pools
// ============================================================================

/**
 * Builds pool profiles from a parsed mining pool document
 */
export function buildPools(document: unknown, scenarioName: string, source: string = 'mining pool config'): PoolProfile[] {
  const config = parseWithSchema(PoolConfigSchema, document, source);
  const scenario = config[scenarioName];
  if (!scenario) {
    throw new Error(`Scenario '${scenarioName}' not found in ${source}`);
  }

  return scenario.pools.map(entry => ({
    poolId: entry.pool_id,
    hashratePct: entry.hashrate_pct,
    forkPreference: entry.fork_preference,
    ideologyStrength: entry.ideology_strength,
    profitabilityThreshold: entry.profitability_threshold,
    maxLossUsd: entry.max_loss_usd,
    maxLossPct: entry.max_loss_pct,
    currentFork: entry.fork_preference === NEUTRAL ? FORK_IDS[0] : entry.fork_preference,
  }));
}

export function loadPools(configPath: string, scenarioName: string): PoolProfile[] {
  return buildPools(readDocument(configPath), scenarioName, configPath);
}

export function listScenarios(configPath: string): string[] {
  const document = readDocument(configPath);
  if (document === null || typeof document !== 'object') {
    return [];
  }
  return Object.keys(document);
}

// ============================================================================
// Activity profiles
// ============================================================================

export function loadActivityProfiles(filePath: string = DEFAULT_ACTIVITY_PROFILES_PATH): ActivityProfiles {
  return parseWithSchema(ActivityProfilesSchema, readDocument(filePath), filePath);
}

/**
 * Activity type and transaction velocity of an economic node
 *
 * Explicit values from the scenario win; otherwise the role's profile applies. When the
 * node reports daily volume, the velocity is blended 70/30 with one inferred from its
 * volume-to-custody turnover.
 */
export function resolveActivityProfile(
  role: string,
  defaults: EconomicDefaults,
  metadata: NodeMetadata,
  profiles: ActivityProfiles
): { activityType: ActivityType; transactionVelocity: number } {
  const profile = profiles[role.toLowerCase()] ?? profiles['default'];
  const activityType = defaults.activity_type ?? profile.activity_type;
  let velocity = defaults.transaction_velocity ?? profile.transaction_velocity;

  const dailyVolume = metadata.daily_volume_btc ?? 0;
  const custody = metadata.custody_btc ?? 1;
  if (custody > 0 && dailyVolume > 0) {
    const turnover = dailyVolume / custody;
    const inferred = turnover > 0.05
      ? Math.min(0.95, turnover * 10)
      : Math.max(0.02, turnover * 20);
    velocity = velocity * 0.7 + inferred * 0.3;
  }

  return { activityType, transactionVelocity: velocity };
}

// ============================================================================
// Economic nodes
// ============================================================================

/**
 * Node name -> metadata from a network document
 * The image tag on the node entry is copied into the metadata when missing there.
 */
export function buildNetworkMetadata(document: unknown, source: string = 'network config'): Map<string, NodeMetadata> {
  const network = parseWithSchema(NetworkSchema, document, source);
  const metadata = new Map<string, NodeMetadata>();
  for (const node of network.nodes) {
    const tag = node.metadata.image_tag ?? node.image?.tag;
    metadata.set(node.name, tag !== undefined ? { ...node.metadata, image_tag: tag } : node.metadata);
  }
  return metadata;
}

export function loadNetworkMetadata(networkPath: string): Map<string, NodeMetadata> {
  return buildNetworkMetadata(readDocument(networkPath), networkPath);
}

/**
 * Parameters a node takes from the distribution bucket its position falls into
 * Position is index/total as a percentage against the cumulative bucket shares;
 * positions past the last boundary take the last bucket.
 */
export function assignFromDistribution(
  pattern: readonly DistributionBucket[] | undefined,
  index: number,
  total: number
): EconomicDefaults | null {
  if (!pattern || pattern.length === 0 || total === 0) {
    return null;
  }

  const position = (index / total) * 100;
  let cumulative = 0;
  let bucket = pattern[pattern.length - 1];
  for (const candidate of pattern) {
    cumulative += candidate.pct;
    if (position < cumulative) {
      bucket = candidate;
      break;
    }
  }

  const { pct: _pct, ...assigned } = bucket;
  return assigned;
}

/**
 * Initial fork from the node's image tag, or from its index when it has none
 * Nodes numbered below 10 start on the primary fork.
 */
export function inferInitialFork(nodeName: string, imageTag: string | undefined): ForkId {
  if (imageTag) {
    const tagged = FORK_IDS.find(forkId => imageTag.includes(forkId.replace(/^v/, '')));
    return tagged ?? FORK_IDS[FORK_IDS.length - 1];
  }

  const parts = nodeName.split('-');
  const parsed = parts.length > 1 ? Number.parseInt(parts[1], 10) : 0;
  const index = Number.isNaN(parsed) ? 0 : parsed;
  return index < 10 ? FORK_IDS[0] : FORK_IDS[1];
}

/**
 * Copy of `values` without the keys whose value is undefined, so it can be spread over defaults
 */
export function definedEntries<T>(values: { [K in keyof T]?: T[K] | undefined }): Partial<T> {
  const result: Partial<T> = {};
  for (const key in values) {
    const value = values[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Builds economic and user node profiles from network metadata and a scenario
 *
 * Pool nodes are skipped. Economic nodes (exchanges, payment processors) take the
 * scenario's economic defaults, their role override and their distribution bucket;
 * every other node is a user node.
 */
export function buildEconomicNodes(
  nodeMetadata: ReadonlyMap<string, NodeMetadata>,
  config: EconomicConfigFile,
  scenarioName: string,
  activityProfiles: ActivityProfiles
): EconomicNodeProfile[] {
  const scenario = config[scenarioName];
  if (!scenario) {
    throw new Error(`Economic scenario '${scenarioName}' not found in config`);
  }

  const economicNodes: Array<[string, NodeMetadata]> = [];
  const userNodes: Array<[string, NodeMetadata]> = [];

  for (const [name, metadata] of nodeMetadata) {
    const nodeType = metadata.node_type ?? metadata.role ?? '';
    if (nodeType === 'mining_pool' || (metadata.entity_id ?? '').startsWith('pool-')) {
      continue;
    }
    if (ECONOMIC_NODE_TYPES.has(nodeType)) {
      economicNodes.push([name, metadata]);
    } else {
      userNodes.push([name, metadata]);
    }
  }

  const profiles: EconomicNodeProfile[] = [];

  economicNodes.forEach(([name, metadata], index) => {
    const role = metadata.role ?? 'exchange';
    let defaults: EconomicDefaults = { ...scenario.economic_defaults };
    const override = scenario.overrides[role];
    if (override) {
      defaults = { ...defaults, ...definedEntries<EconomicDefaults>(override) };
    }
    const assigned = assignFromDistribution(scenario.distribution_pattern?.economic, index, economicNodes.length);
    if (assigned) {
      defaults = { ...defaults, ...definedEntries<EconomicDefaults>(assigned) };
    }

    const { activityType, transactionVelocity } = resolveActivityProfile(role, defaults, metadata, activityProfiles);
    profiles.push(buildProfile(name, metadata, defaults, {
      nodeType: NodeType.ECONOMIC,
      activityType,
      transactionVelocity,
      role,
      fallbacks: ECONOMIC_FALLBACKS,
    }));
  });

  userNodes.forEach(([name, metadata], index) => {
    let defaults: EconomicDefaults = { ...scenario.user_defaults };
    const assigned = assignFromDistribution(scenario.distribution_pattern?.user, index, userNodes.length);
    if (assigned) {
      defaults = { ...defaults, ...definedEntries<EconomicDefaults>(assigned) };
    }

    profiles.push(buildProfile(name, metadata, defaults, {
      nodeType: NodeType.USER,
      activityType: defaults.activity_type ?? ActivityType.MIXED,
      transactionVelocity: defaults.transaction_velocity ?? USER_FALLBACKS.transactionVelocity,
      role: null,
      fallbacks: USER_FALLBACKS,
    }));
  });

  return profiles;
}

function buildProfile(
  name: string,
  metadata: NodeMetadata,
  defaults: EconomicDefaults,
  kind: {
    nodeType: NodeType;
    activityType: ActivityType;
    transactionVelocity: number;
    role: string | null;
    fallbacks: typeof ECONOMIC_FALLBACKS;
  }
): EconomicNodeProfile {
  const forkPreference: ForkPreference = defaults.fork_preference ?? NEUTRAL;
  return {
    nodeId: name,
    nodeType: kind.nodeType,
    activityType: kind.activityType,
    transactionVelocity: kind.transactionVelocity,
    forkPreference,
    ideologyStrength: defaults.ideology_strength ?? kind.fallbacks.ideologyStrength,
    switchingThreshold: defaults.switching_threshold ?? kind.fallbacks.switchingThreshold,
    custodyBtc: metadata.custody_btc ?? 0,
    dailyVolumeBtc: metadata.daily_volume_btc ?? 0,
    consensusWeight: metadata.consensus_weight ?? 0,
    hashratePct: metadata.hashrate_pct ?? defaults.hashrate_pct ?? 0,
    switchingCooldown: defaults.switching_cooldown ?? kind.fallbacks.switchingCooldown,
    maxLossPct: defaults.max_loss_pct ?? kind.fallbacks.maxLossPct,
    inertia: defaults.inertia ?? kind.fallbacks.inertia,
    role: kind.role,
    initialFork: inferInitialFork(name, metadata.image_tag),
  };
}

export function loadEconomicNodes(
  networkPath: string,
  configPath: string,
  scenarioName: string,
  activityProfilesPath: string = DEFAULT_ACTIVITY_PROFILES_PATH
): EconomicNodeProfile[] {
  const config = parseWithSchema(EconomicConfigSchema, readDocument(configPath), configPath);
  return buildEconomicNodes(
    loadNetworkMetadata(networkPath),
    config,
    scenarioName,
    loadActivityProfiles(activityProfilesPath)
  );
}

// ============================================================================
// Price oracle
// ============================================================================

/**
 * PriceOracle settings from a `price:` block; absent keys keep their defaults
 */
export function loadPriceOracleConfig(block: unknown): PriceOracleConfig {
  const parsed = parseWithSchema(PriceBlockSchema, block ?? {}, 'price config');
  const defaults = defaultPriceConfig();
  return {
    basePrice: parsed.base_price ?? defaults.basePrice,
    maxDivergence: parsed.max_divergence ?? defaults.maxDivergence,
    minForkDepth: parsed.min_fork_depth ?? defaults.minForkDepth,
    coefficients: {
      chainWeight: parsed.coefficients.chain_weight ?? defaults.coefficients.chainWeight,
      economicWeight: parsed.coefficients.economic_weight ?? defaults.coefficients.economicWeight,
      hashrateWeight: parsed.coefficients.hashrate_weight ?? defaults.coefficients.hashrateWeight,
    },
  };
}

// ============================================================================
// Simulation
// ============================================================================

export interface LoadedSimulation {
  durationSeconds: number;
  config: Partial<ForkSimulationConfig>;
  pools: PoolProfile[];
  economicNodes: EconomicNodeProfile[];
}

/**
 * Reads a simulation file and the rosters it points at
 * Roster paths are resolved against the simulation file's directory.
 */
export function loadSimulationConfig(filePath: string): LoadedSimulation {
  const file = parseWithSchema(SimulationFileSchema, readDocument(filePath), filePath);
  const baseDir = path.dirname(filePath);
  const resolve = (relative: string) => path.resolve(baseDir, relative);
  const { simulation, rosters } = file;

  let pools: PoolProfile[] = [];
  if (rosters.pools_file) {
    pools = loadPools(resolve(rosters.pools_file), rosters.pool_scenario ?? 'realistic_current');
  }

  let economicNodes: EconomicNodeProfile[] = [];
  if (rosters.economic_file && rosters.network_file) {
    economicNodes = loadEconomicNodes(
      resolve(rosters.network_file),
      resolve(rosters.economic_file),
      rosters.economic_scenario ?? 'realistic_current',
      rosters.activity_profiles_file ? resolve(rosters.activity_profiles_file) : DEFAULT_ACTIVITY_PROFILES_PATH
    );
  }

  const difficulty = definedEntries<DifficultyOracleConfig>({
    targetBlockInterval: file.difficulty.target_block_interval,
    retargetInterval: file.difficulty.retarget_interval,
    preForkDifficulty: file.difficulty.pre_fork_difficulty,
    maxAdjustmentFactor: file.difficulty.max_adjustment_factor,
    minDifficulty: file.difficulty.min_difficulty,
    enableEda: file.difficulty.enable_eda,
    edaThreshold: file.difficulty.eda_threshold,
    edaReduction: file.difficulty.eda_reduction,
  });

  const fee = definedEntries<FeeOracleConfig>({
    baseFeeRate: file.fee.base_fee_rate,
    sustainabilityTracking: file.fee.sustainability_tracking,
  });

  const pool = definedEntries<MiningPoolStrategyConfig>({
    decisionInterval: file.pools.decision_interval,
    blockSubsidyBtc: file.pools.block_subsidy_btc,
    miningCostUsd: file.pools.mining_cost_usd,
    assumedForkHashratePct: file.pools.assumed_fork_hashrate_pct,
  });

  const config: Partial<ForkSimulationConfig> = {
    ...definedEntries<ForkSimulationConfig>({
      startHeight: simulation.start_height,
      tickInterval: simulation.tick_interval,
      economicUpdateInterval: simulation.economic_update_interval,
      hashrateUpdateInterval: simulation.hashrate_update_interval,
      priceUpdateInterval: simulation.price_update_interval,
      useChainworkWeight: simulation.use_chainwork_weight,
      propagationWindow: simulation.propagation_window,
      seed: simulation.seed,
    }),
    difficulty,
    price: loadPriceOracleConfig(file.price),
    fee,
    pool,
    portfolios: file.portfolios.map(actor => ({
      actorId: actor.actor_id,
      initialHoldingsBtc: actor.initial_holdings_btc,
    })),
    manipulation: file.manipulation
      ? {
          actorId: file.manipulation.actor_id,
          forkId: file.manipulation.fork,
          initialHoldingsBtc: file.manipulation.initial_holdings_btc,
          btcPerUpdate: file.manipulation.btc_per_update,
          startTime: file.manipulation.start_time,
          endTime: file.manipulation.end_time,
        }
      : null,
  };

  if (simulation.static_hashrate_pct) {
    config.staticHashratePct = toForkMap(simulation.static_hashrate_pct, `${filePath} simulation.static_hashrate_pct`);
  }

  if (SimulatorConfig.DEBUG_SIMULATION) {
    console.log(`[Config] Loaded ${filePath}: ${pools.length} pools, ${economicNodes.length} economic nodes`);
  }

  return {
    durationSeconds: simulation.duration,
    config,
    pools,
    economicNodes,
  };
}
