/**
 * Core module index file
 * Exports the oracles, strategies and simulation driver
 */

export * from './difficulty/difficultyOracle';
export * from './market/priceOracle';
export * from './market/feeOracle';
export * from './strategy/miningPoolStrategy';
export * from './strategy/economicNodeStrategy';
export * from './reorg/reorgOracle';
export * from './blockchain/chainTree';
export * from './simulation/forkSimulation';
export * from './simulation/summaryReport';
