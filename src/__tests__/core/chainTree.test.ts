import { ChainTree, SimBlock, calculateBlockHeaderHash, createBlock } from '../../core/blockchain/chainTree';
import { ForkId } from '../../types/types';
import { shortHash } from '../../utils/cryptoUtils';

function child(parent: SimBlock, forkId: ForkId | null, minerId = 'miner'): SimBlock {
  return createBlock({
    height: parent.header.height + 1,
    previousHeaderHash: parent.hash,
    forkId,
    minerId,
    simTime: 0,
  });
}

describe('ChainTree', () => {
  const originalConsole = { ...console };

  beforeAll(() => {
    console.log = jest.fn();
    console.error = jest.fn();
    console.warn = jest.fn();
    console.info = jest.fn();
  });

  afterAll(() => {
    console.log = originalConsole.log;
    console.error = originalConsole.error;
    console.warn = originalConsole.warn;
    console.info = originalConsole.info;
  });

  const genesis = createBlock({ height: 0, previousHeaderHash: '', forkId: null, minerId: 'pre-fork', simTime: 0 });

  describe('block identity', () => {
    it('should hash headers deterministically', () => {
      const header = { height: 5, previousHeaderHash: 'abc', forkId: ForkId.V26, minerId: 'pool-a', simTime: 42 };

      expect(calculateBlockHeaderHash(header)).toBe(calculateBlockHeaderHash({ ...header }));
      expect(calculateBlockHeaderHash(header)).not.toBe(calculateBlockHeaderHash({ ...header, forkId: ForkId.V27 }));
      expect(createBlock(header).hash).toHaveLength(64);
    });
  });

  describe('addBlock', () => {
    it('should set genesis as root and leaf', () => {
      // Given: An empty tree
      const tree = new ChainTree();

      // When: Add genesis
      const node = tree.addBlock(genesis);

      // Then: Genesis is root and the only tip
      expect(node).not.toBeNull();
      expect(tree.getRoot()?.hash).toBe(genesis.hash);
      expect(tree.getLeaves().map(leaf => leaf.hash)).toEqual([genesis.hash]);
    });

    it('should replace the parent as a leaf when extending it', () => {
      const tree = new ChainTree();
      tree.addBlock(genesis);
      const block1 = child(genesis, null);

      tree.addBlock(block1);

      expect(tree.getLeaves().map(leaf => leaf.hash)).toEqual([block1.hash]);
      expect(tree.getNode(genesis.hash)?.children).toHaveLength(1);
    });

    it('should reject duplicates, a second genesis and orphans', () => {
      const tree = new ChainTree();
      tree.addBlock(genesis);
      const otherGenesis = createBlock({ height: 0, previousHeaderHash: '', forkId: null, minerId: 'other', simTime: 0 });
      const orphan = createBlock({ height: 7, previousHeaderHash: 'missing', forkId: ForkId.V27, minerId: 'x', simTime: 0 });

      expect(tree.addBlock(genesis)).toBeNull();
      expect(tree.addBlock(otherGenesis)).toBeNull();
      expect(tree.addBlock(orphan)).toBeNull();
      expect(tree.getStats().totalBlocks).toBe(1);
    });
  });

  describe('forks', () => {
    // genesis -> 1 -> 2, then 3a on v27 and 3b on v26
    const build = () => {
      const tree = new ChainTree();
      const block1 = child(genesis, null);
      const block2 = child(block1, null);
      const tipA = child(block2, ForkId.V27);
      const tipB = child(block2, ForkId.V26);
      for (const block of [genesis, block1, block2, tipA, tipB]) {
        tree.addBlock(block);
      }
      return { tree, block2, tipA, tipB };
    };

    it('should track every fork tip as a leaf', () => {
      const { tree } = build();

      expect(tree.getStats()).toEqual({ totalBlocks: 5, numberOfLeaves: 2, numberOfForks: 1 });
    });

    it('should walk a tip back to genesis', () => {
      const { tree, tipA } = build();

      const chain = tree.getChain(tipA.hash);

      expect(chain.map(block => block.header.height)).toEqual([0, 1, 2, 3]);
      expect(chain[3].header.forkId).toBe(ForkId.V27);
      expect(tree.getChain('unknown')).toEqual([]);
    });

    it('should find the split block as the common ancestor', () => {
      const { tree, block2, tipA, tipB } = build();

      expect(tree.findCommonAncestor(tipA.hash, tipB.hash)?.hash).toBe(block2.hash);
      expect(tree.findCommonAncestor(tipA.hash, block2.hash)?.hash).toBe(block2.hash);
      expect(tree.findCommonAncestor(tipA.hash, 'unknown')).toBeNull();
    });

    it('should collapse the trunk when visualizing', () => {
      const { tree, block2, tipA, tipB } = build();

      const expected = [
        `└── Block 0 (${shortHash(genesis.hash)}) [GENESIS] .. Block 2 (${shortHash(block2.hash)})`,
        `    ├── Block 3 (${shortHash(tipA.hash)}) [v27]`,
        `    └── Block 3 (${shortHash(tipB.hash)}) [v26]`,
      ].join('\n');

      expect(tree.visualize()).toBe(expected);
    });

    it('should describe an empty tree', () => {
      expect(new ChainTree().visualize()).toBe('[Empty tree - no genesis block]');
    });
  });
});
