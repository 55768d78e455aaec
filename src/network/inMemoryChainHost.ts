/**
 * In-memory block production host
 *
 * Builds a shared trunk from genesis up to the split height, then grows one branch per
 * fork on request. Block hashes are sha256 over the header, so the tree (and the LCA
 * hash) is identical across runs with the same inputs.
 */

import { FORK_IDS, ForkId, ForkMap, forkMap } from '../types/types';
import { SimulatorConfig } from '../config/config';
import { ChainTree, ChainTreeNode, SimBlock, createBlock } from '../core/blockchain/chainTree';
import { shortHash } from '../utils/cryptoUtils';
import { BlockProductionHost } from './blockProductionHost';

export const PRE_FORK_MINER = 'pre-fork';

export class InMemoryChainHost implements BlockProductionHost {
  private tree: ChainTree;
  private ancestor: ChainTreeNode;
  private tips: Map<ForkId, ChainTreeNode>;

  constructor(splitHeight: number = SimulatorConfig.START_HEIGHT) {
    if (!Number.isInteger(splitHeight) || splitHeight < 0) {
      throw new Error(`splitHeight must be a non-negative integer (got ${splitHeight})`);
    }

    this.tree = new ChainTree();
    this.tips = new Map();

    let previous = this.append(createBlock({
      height: 0,
      previousHeaderHash: '',
      forkId: null,
      minerId: PRE_FORK_MINER,
      simTime: 0,
    }));

    for (let height = 1; height <= splitHeight; height++) {
      previous = this.append(createBlock({
        height,
        previousHeaderHash: previous.hash,
        forkId: null,
        minerId: PRE_FORK_MINER,
        simTime: 0,
      }));
    }

    this.ancestor = previous;
    for (const forkId of FORK_IDS) {
      this.tips.set(forkId, previous);
    }
  }

  private append(block: SimBlock): ChainTreeNode {
    const node = this.tree.addBlock(block);
    if (!node) {
      throw new Error(`Failed to append block ${shortHash(block.hash)} at height ${block.header.height}`);
    }
    return node;
  }

  private requireTip(forkId: ForkId): ChainTreeNode {
    const tip = this.tips.get(forkId);
    if (!tip) {
      throw new Error(`Unknown fork ${forkId}`);
    }
    return tip;
  }

  produceBlock(forkId: ForkId, minerId: string, simTime: number): number {
    const tip = this.requireTip(forkId);
    const node = this.append(createBlock({
      height: tip.block.header.height + 1,
      previousHeaderHash: tip.hash,
      forkId,
      minerId,
      simTime,
    }));
    this.tips.set(forkId, node);
    return node.block.header.height;
  }

  getHeight(forkId: ForkId): number {
    return this.requireTip(forkId).block.header.height;
  }

  getHeights(): ForkMap<number> {
    return forkMap(forkId => this.getHeight(forkId));
  }

  getLcaHash(): string {
    return this.ancestor.hash;
  }

  getLcaHeight(): number {
    return this.ancestor.block.header.height;
  }

  getTipHash(forkId: ForkId): string {
    return this.requireTip(forkId).hash;
  }

  /**
   * Blocks from genesis to the fork's tip
   */
  getChain(forkId: ForkId): SimBlock[] {
    return this.tree.getChain(this.getTipHash(forkId));
  }

  getTree(): ChainTree {
    return this.tree;
  }

  visualize(): string {
    return this.tree.visualize();
  }
}
