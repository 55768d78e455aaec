export * from './types/types';
export * from './config/config';
export * from './config/scenarioLoader';
export * from './core';
export * from './network/blockProductionHost';
export * from './network/inMemoryChainHost';
export * from './utils/rng';
export * from './utils/cryptoUtils';
