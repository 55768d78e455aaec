import { ForkId } from '../types/types';

/**
 * Whatever actually appends blocks to the forks: an in-memory tree in tests and the CLI,
 * a node cluster in a live deployment.
 */
export interface BlockProductionHost {
  /**
   * Appends exactly one block mined by `minerId` to the fork
   * @returns The fork's new tip height
   */
  produceBlock(forkId: ForkId, minerId: string, simTime: number): number;

  getHeight(forkId: ForkId): number;

  /**
   * Hash of the last block shared by every fork
   */
  getLcaHash(): string;
}
