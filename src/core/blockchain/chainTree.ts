/**
 * Chain Tree
 *
 * Tree of every block produced during a run, rooted at a shared genesis block.
 * - Blocks up to the split height form one trunk shared by every fork
 * - Each fork extends its own branch from the common ancestor
 * - Leaves are the current fork tips
 */

import { ForkId } from '../../types/types';
import { sha256Hash, shortHash } from '../../utils/cryptoUtils';

export interface SimBlockHeader {
  height: number;
  previousHeaderHash: string;  // Empty for genesis
  forkId: ForkId | null;       // null for blocks before the split
  minerId: string;
  simTime: number;
}

export interface SimBlock {
  header: SimBlockHeader;
  hash: string;
}

/**
 * Tree node wrapping a block with its links
 */
export interface ChainTreeNode {
  block: SimBlock;
  hash: string;
  parent: ChainTreeNode | null;  // null only for genesis (root)
  children: ChainTreeNode[];
}

/**
 * Hashes the block header, the block's identity in the tree
 */
export function calculateBlockHeaderHash(header: SimBlockHeader): string {
  return sha256Hash({
    height: header.height,
    previousHeaderHash: header.previousHeaderHash,
    forkId: header.forkId,
    minerId: header.minerId,
    simTime: header.simTime,
  });
}

export function createBlock(header: SimBlockHeader): SimBlock {
  return { header, hash: calculateBlockHeaderHash(header) };
}

export class ChainTree {
  private root: ChainTreeNode | null;              // Genesis block (root of tree)
  private nodesByHash: Map<string, ChainTreeNode>; // Fast lookup by hash
  private leaves: Set<ChainTreeNode>;              // All leaf nodes (chain tips)

  constructor() {
    this.root = null;
    this.nodesByHash = new Map();
    this.leaves = new Set();
  }

  /**
   * Adds a block to the tree
   * Returns the new node, or null if the block is a duplicate or its parent is unknown
   */
  addBlock(block: SimBlock): ChainTreeNode | null {
    if (this.nodesByHash.has(block.hash)) {
      console.warn(`[ChainTree] Block ${shortHash(block.hash)} already exists in tree`);
      return null;
    }

    let parentNode: ChainTreeNode | null = null;
    if (block.header.height === 0) {
      if (this.root) {
        console.warn(`[ChainTree] Tree already has a genesis block`);
        return null;
      }
    } else {
      parentNode = this.nodesByHash.get(block.header.previousHeaderHash) ?? null;
      if (!parentNode) {
        console.warn(`[ChainTree] Parent block ${shortHash(block.header.previousHeaderHash)} not found in tree`);
        return null;
      }
    }

    const newNode: ChainTreeNode = {
      block,
      hash: block.hash,
      parent: parentNode,
      children: [],
    };

    if (parentNode) {
      parentNode.children.push(newNode);
      this.leaves.delete(parentNode);
    } else {
      this.root = newNode;
    }

    this.nodesByHash.set(newNode.hash, newNode);
    this.leaves.add(newNode);

    return newNode;
  }

  /**
   * Blocks from genesis to the given hash, in height order
   */
  getChain(blockHash: string): SimBlock[] {
    const chain: SimBlock[] = [];
    let current: ChainTreeNode | null | undefined = this.nodesByHash.get(blockHash);

    while (current) {
      chain.unshift(current.block);
      current = current.parent;
    }

    return chain;
  }

  getNode(hash: string): ChainTreeNode | undefined {
    return this.nodesByHash.get(hash);
  }

  getLeaves(): ChainTreeNode[] {
    return Array.from(this.leaves);
  }

  getRoot(): ChainTreeNode | null {
    return this.root;
  }

  /**
   * Deepest block that is an ancestor of (or equal to) both hashes
   */
  findCommonAncestor(hashA: string, hashB: string): ChainTreeNode | null {
    const ancestorsOfA = new Set<string>();
    let current: ChainTreeNode | null | undefined = this.nodesByHash.get(hashA);
    while (current) {
      ancestorsOfA.add(current.hash);
      current = current.parent;
    }

    current = this.nodesByHash.get(hashB);
    while (current) {
      if (ancestorsOfA.has(current.hash)) {
        return current;
      }
      current = current.parent;
    }
    return null;
  }

  getStats(): {
    totalBlocks: number;
    numberOfLeaves: number;
    numberOfForks: number;
  } {
    return {
      totalBlocks: this.nodesByHash.size,
      numberOfLeaves: this.leaves.size,
      numberOfForks: this.leaves.size - 1,
    };
  }

  /**
   * Text rendering of the tree for debugging
   * Runs of single-child blocks are collapsed into one line.
   */
  visualize(): string {
    if (!this.root) {
      return '[Empty tree - no genesis block]';
    }

    const lines: string[] = [];
    const label = (node: ChainTreeNode): string => {
      const fork = node.block.header.forkId ? ` [${node.block.header.forkId}]` : '';
      const genesis = node.block.header.height === 0 ? ' [GENESIS]' : '';
      return `Block ${node.block.header.height} (${shortHash(node.hash)})${fork}${genesis}`;
    };

    const traverse = (start: ChainTreeNode, prefix: string, isLast: boolean) => {
      let end = start;
      while (end.children.length === 1) {
        end = end.children[0];
      }

      const marker = isLast ? '└── ' : '├── ';
      const span = end === start ? label(start) : `${label(start)} .. ${label(end)}`;
      lines.push(`${prefix}${marker}${span}`);

      const childPrefix = prefix + (isLast ? '    ' : '│   ');
      end.children.forEach((child, index) => {
        traverse(child, childPrefix, index === end.children.length - 1);
      });
    };

    traverse(this.root, '', true);
    return lines.join('\n');
  }
}
