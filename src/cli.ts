#!/usr/bin/env node

import fs from 'node:fs';
import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { SimulatorConfig } from './config/config';
import { CONFIG_DIR, loadSimulationConfig } from './config/scenarioLoader';
import { ForkSimulation } from './core/simulation/forkSimulation';
import { formatSummary } from './core/simulation/summaryReport';

interface RunOptions {
  config: string;
  duration?: number;
  seed?: string;
  output?: string;
  verbose: boolean;
}

function runSimulation(options: RunOptions): void {
  if (options.verbose) {
    SimulatorConfig.DEBUG_SIMULATION = true;
  }

  const loaded = loadSimulationConfig(path.resolve(options.config));
  const simulation = new ForkSimulation({
    pools: loaded.pools,
    economicNodes: loaded.economicNodes,
    config: options.seed !== undefined ? { ...loaded.config, seed: options.seed } : loaded.config,
  });

  const mode = loaded.pools.length > 0 ? `${loaded.pools.length} pools` : 'static hashrate';
  console.log(`[Simulation] ${mode}, ${loaded.economicNodes.length} economic nodes`);

  const summary = simulation.run(options.duration ?? loaded.durationSeconds);
  console.log(formatSummary(summary, simulation.analyzeReunion()));

  if (options.output) {
    const outputPath = path.resolve(options.output);
    fs.mkdirSync(path.dirname(outputPath), { recursive: true });
    fs.writeFileSync(outputPath, JSON.stringify(simulation.exportToJson(), null, 2));
    console.log(`[Simulation] Results written to ${outputPath}`);
  }
}

yargs(hideBin(process.argv))
  .scriptName('fork-sim')
  .usage('$0 <command> [options]')
  .command(
    'run',
    'Run a fork simulation from a simulation config file.',
    (cmd) =>
      cmd
        .option('config', {
          alias: 'c',
          type: 'string',
          description: 'Simulation YAML file.',
          default: path.join(CONFIG_DIR, 'simulation.yaml')
        })
        .option('duration', {
          alias: 'd',
          type: 'number',
          description: 'Simulated seconds to run, overriding the config file.'
        })
        .option('seed', {
          type: 'string',
          description: 'Random seed, overriding the config file.'
        })
        .option('output', {
          alias: 'o',
          type: 'string',
          description: 'Write the combined JSON export to this file.'
        })
        .option('verbose', {
          alias: 'v',
          type: 'boolean',
          default: false,
          description: 'Log blocks and market refreshes as they happen.'
        }),
    (argv) => {
      runSimulation({
        config: argv.config,
        duration: argv.duration,
        seed: argv.seed,
        output: argv.output,
        verbose: argv.verbose
      });
    }
  )
  .demandCommand(1)
  .strict()
  .help()
  .parse();
