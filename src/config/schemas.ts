/**
 * Schemas of the YAML and JSON documents under config/
 * Keys follow the files (snake_case); loaders map them onto the runtime profiles.
 */

import { z } from 'zod';

import { ActivityType, ForkId, NEUTRAL } from '../types/types';

export const ForkIdSchema = z.preprocess(
  value => (typeof value === 'string' ? value.toLowerCase() : value),
  z.nativeEnum(ForkId)
);

export const ForkPreferenceSchema = z.preprocess(
  value => (typeof value === 'string' ? value.toLowerCase() : value),
  z.union([z.nativeEnum(ForkId), z.literal(NEUTRAL)])
);

const fraction = () => z.number().min(0).max(1);

// ============================================================================
// Mining pools
// ============================================================================

export const PoolEntrySchema = z.object({
  pool_id: z.string().min(1),
  hashrate_pct: z.number().min(0).max(100),
  fork_preference: ForkPreferenceSchema.default(NEUTRAL),
  ideology_strength: fraction(),
  profitability_threshold: z.number().min(0),
  max_loss_usd: z.number().min(0).nullable().default(null),
  max_loss_pct: z.number().min(0).nullable().default(0.10),
});

export const PoolScenarioSchema = z.object({
  description: z.string().optional(),
  pools: z.array(PoolEntrySchema).min(1),
});

export const PoolConfigSchema = z.record(PoolScenarioSchema);

// ============================================================================
// Economic nodes
// ============================================================================

export const EconomicDefaultsSchema = z.object({
  fork_preference: ForkPreferenceSchema.optional(),
  ideology_strength: fraction().optional(),
  switching_threshold: z.number().min(0).optional(),
  switching_cooldown: z.number().min(0).optional(),
  max_loss_pct: z.number().min(0).optional(),
  inertia: z.number().min(0).optional(),
  activity_type: z.nativeEnum(ActivityType).optional(),
  transaction_velocity: fraction().optional(),
  hashrate_pct: z.number().min(0).max(100).optional(),
});

export const DistributionBucketSchema = z.object({
  pct: z.number().min(0).default(0),
  fork_preference: ForkPreferenceSchema.optional(),
  ideology_strength: fraction().optional(),
  switching_threshold: z.number().min(0).optional(),
  inertia: z.number().min(0).optional(),
  max_loss_pct: z.number().min(0).optional(),
  switching_cooldown: z.number().min(0).optional(),
});

export const EconomicScenarioSchema = z.object({
  description: z.string().optional(),
  economic_defaults: EconomicDefaultsSchema.default({}),
  user_defaults: EconomicDefaultsSchema.default({}),
  overrides: z.record(EconomicDefaultsSchema).default({}),
  distribution_pattern: z
    .object({
      economic: z.array(DistributionBucketSchema).optional(),
      user: z.array(DistributionBucketSchema).optional(),
    })
    .optional(),
});

export const EconomicConfigSchema = z.record(EconomicScenarioSchema);

// ============================================================================
// Network metadata
// ============================================================================

export const NodeMetadataSchema = z
  .object({
    node_type: z.string().optional(),
    role: z.string().optional(),
    entity_id: z.string().optional(),
    image_tag: z.coerce.string().optional(),
    custody_btc: z.number().min(0).optional(),
    daily_volume_btc: z.number().min(0).optional(),
    consensus_weight: z.number().min(0).optional(),
    hashrate_pct: z.number().min(0).max(100).optional(),
  })
  .passthrough();

export const NetworkNodeSchema = z
  .object({
    name: z.string().min(1),
    image: z.object({ tag: z.coerce.string().optional() }).passthrough().optional(),
    metadata: NodeMetadataSchema.default({}),
  })
  .passthrough();

export const NetworkSchema = z
  .object({
    nodes: z.array(NetworkNodeSchema).default([]),
  })
  .passthrough();

// ============================================================================
// Activity profiles
// ============================================================================

export const ActivityProfilesSchema = z
  .record(
    z.object({
      activity_type: z.nativeEnum(ActivityType),
      transaction_velocity: fraction(),
    })
  )
  .refine(profiles => 'default' in profiles, { message: 'activity profiles must define a "default" role' });

// ============================================================================
// Oracles and simulation
// ============================================================================

export const PriceBlockSchema = z.object({
  base_price: z.number().positive().optional(),
  max_divergence: z.number().min(0).optional(),
  min_fork_depth: z.number().int().min(0).optional(),
  coefficients: z
    .object({
      chain_weight: z.number().min(0).optional(),
      economic_weight: z.number().min(0).optional(),
      hashrate_weight: z.number().min(0).optional(),
    })
    .default({}),
});

export const DifficultyBlockSchema = z.object({
  target_block_interval: z.number().positive().optional(),
  retarget_interval: z.number().int().min(1).optional(),
  pre_fork_difficulty: z.number().positive().optional(),
  max_adjustment_factor: z.number().min(1).optional(),
  min_difficulty: z.number().positive().optional(),
  enable_eda: z.boolean().optional(),
  eda_threshold: z.number().positive().optional(),
  eda_reduction: fraction().optional(),
});

export const FeeBlockSchema = z.object({
  base_fee_rate: z.number().positive().optional(),
  sustainability_tracking: z.boolean().optional(),
});

export const PoolStrategyBlockSchema = z.object({
  decision_interval: z.number().min(0).optional(),
  block_subsidy_btc: z.number().min(0).optional(),
  mining_cost_usd: z.number().min(0).optional(),
  assumed_fork_hashrate_pct: z.number().min(0).max(100).nullable().optional(),
});

export const SimulationBlockSchema = z.object({
  duration: z.number().positive(),
  start_height: z.number().int().min(0).optional(),
  tick_interval: z.number().positive().optional(),
  economic_update_interval: z.number().min(0).optional(),
  hashrate_update_interval: z.number().min(0).optional(),
  price_update_interval: z.number().min(0).optional(),
  use_chainwork_weight: z.boolean().optional(),
  static_hashrate_pct: z.record(z.number().min(0)).optional(),
  propagation_window: z.number().min(0).optional(),
  seed: z.coerce.string().optional(),
});

export const RostersBlockSchema = z.object({
  pools_file: z.string().optional(),
  pool_scenario: z.string().optional(),
  economic_file: z.string().optional(),
  economic_scenario: z.string().optional(),
  network_file: z.string().optional(),
  activity_profiles_file: z.string().optional(),
});

export const ManipulationBlockSchema = z.object({
  actor_id: z.string().min(1).default('manipulator'),
  fork: ForkIdSchema,
  initial_holdings_btc: z.number().min(0),
  btc_per_update: z.number().min(0),
  start_time: z.number().min(0).default(0),
  end_time: z.number().min(0),
});

export const SimulationFileSchema = z.object({
  simulation: SimulationBlockSchema,
  rosters: RostersBlockSchema.default({}),
  difficulty: DifficultyBlockSchema.default({}),
  price: PriceBlockSchema.default({}),
  fee: FeeBlockSchema.default({}),
  pools: PoolStrategyBlockSchema.default({}),
  portfolios: z
    .array(z.object({ actor_id: z.string().min(1), initial_holdings_btc: z.number().min(0) }))
    .default([]),
  manipulation: ManipulationBlockSchema.nullable().default(null),
});

export type PoolConfigFile = z.infer<typeof PoolConfigSchema>;
export type EconomicScenario = z.infer<typeof EconomicScenarioSchema>;
export type EconomicConfigFile = z.infer<typeof EconomicConfigSchema>;
export type EconomicDefaults = z.infer<typeof EconomicDefaultsSchema>;
export type DistributionBucket = z.infer<typeof DistributionBucketSchema>;
export type NodeMetadata = z.infer<typeof NodeMetadataSchema>;
export type ActivityProfiles = z.infer<typeof ActivityProfilesSchema>;
export type PriceBlock = z.infer<typeof PriceBlockSchema>;
export type SimulationFile = z.infer<typeof SimulationFileSchema>;
