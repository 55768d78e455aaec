/**
 * Plain-text rendering of a simulation run for the terminal
 */

import { FORK_IDS } from '../../types/types';
import { ReunionAnalysis } from '../reorg/reorgOracle';
import { SimulationSummary } from './forkSimulation';

const RULE = '='.repeat(70);

export function formatUsd(value: number): string {
  return `$${Math.round(value).toLocaleString('en-US')}`;
}

export function formatSummary(summary: SimulationSummary, reunion: ReunionAnalysis): string {
  const lines: string[] = [];
  lines.push(RULE);
  lines.push('FORK SIMULATION SUMMARY');
  lines.push(RULE);
  lines.push(`Simulated time: ${summary.simTime}s (${summary.ticks} ticks)`);
  lines.push(`Fork status: ${summary.forkSustained ? 'SUSTAINED' : 'natural split'}`);
  lines.push('');

  for (const forkId of FORK_IDS) {
    lines.push(
      `${forkId}: height=${summary.heights[forkId]} blocks=${summary.blocksMined[forkId]} ` +
      `difficulty=${summary.difficulty[forkId].toFixed(4)} chainwork=${summary.chainwork[forkId].toFixed(2)} ` +
      `hashrate=${summary.hashratePcts[forkId].toFixed(1)}% economic=${summary.economicPcts[forkId].toFixed(1)}% ` +
      `price=${formatUsd(summary.prices[forkId])} fee=${summary.fees[forkId].toFixed(2)} sats/vB`
    );
  }

  lines.push('');
  lines.push(`Winning fork (chainwork): ${summary.winningFork || 'none'}`);
  lines.push(`Reorg events: ${summary.reorgEvents}`);

  for (const loser of reunion.losingForks) {
    lines.push(
      `Reunion: ${loser.forkId} -> ${reunion.winningFork} depth=${loser.depth} ` +
      `nodes=${loser.nodes.length} reorgMass=${loser.reorgMass} orphans=${loser.additionalOrphans}`
    );
  }
  lines.push(RULE);

  return lines.join('\n');
}
