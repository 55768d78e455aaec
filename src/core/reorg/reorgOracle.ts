/**
 * Reorg Oracle
 *
 * Tracks the chain reorganizations miners and economic nodes go through when they
 * switch forks. A switch walks the node back from the old fork's tip to the common
 * ancestor, orphaning every block it mined on the old fork.
 *
 * Node-local events are clustered into network-level fork incidents when they share
 * the ancestor hash and the fork being adopted, and arrive within the propagation window.
 */

import { FORK_IDS, ForkId, ForkMap, NodeMetrics, ReorgEvent, forkMap } from '../../types/types';
import { SimulatorConfig } from '../../config/config';

/**
 * Network-level grouping of related reorg events
 */
export interface ForkIncident {
  incidentId: string;
  lcaHash: string;
  winningFork: ForkId;       // Fork the nodes switched to
  events: ReorgEvent[];
  firstObserved: number;
  lastObserved: number;
}

export interface ReunionLoser {
  forkId: ForkId;
  depth: number;             // Blocks on the fork since the ancestor
  nodes: string[];           // Nodes still on the fork
  reorgMass: number;         // depth * nodes
  additionalOrphans: number; // Blocks those nodes mined on the fork
}

/**
 * Projection of a network reunion onto the heaviest fork
 */
export interface ReunionAnalysis {
  winningFork: ForkId;
  losingForks: ReunionLoser[];
  nodesOnLosingForks: string[];
  reunionReorgMass: number;
  additionalOrphans: number;
  chainwork: ForkMap<number>;
}

export interface NetworkSummary {
  lcaHeight: number;
  lcaHash: string;
  finalHeights: ForkMap<number>;
  totalNodesTracked: number;
  totalBlocksMined: number;
  totalBlocksOrphaned: number;
  totalReorgEvents: number;
  totalForkIncidents: number;
  totalReorgMass: number;
  normalizedReorgMass: number;
  consensusStressScore: number;
}

export interface NodeSummary {
  nodeId: string;
  currentFork: ForkId;
  blocksMined: number;
  blocksMinedPerFork: ForkMap<number>;
  blocksOrphaned: number;
  orphanRate: number;
  reorgCount: number;
  totalExposure: number;
}

export interface MissingNodeSummary {
  nodeId: string;
  error: 'Node not found';
}

function incidentMass(incident: ForkIncident): number {
  return incident.events.reduce((sum, event) => sum + event.depth, 0);
}

export class ReorgOracle {
  private readonly lcaHeight: number;
  private readonly lcaHash: string;
  private readonly propagationWindow: number;
  private readonly totalNodes: number;

  private forkHeights: Map<ForkId, number>;
  private nodeMetrics: Map<string, NodeMetrics>;
  private nodeBlocks: Map<string, ForkMap<number[]>>;
  private reorgEvents: ReorgEvent[];
  private forkIncidents: ForkIncident[];
  private incidentCounter: number;

  constructor(
    lcaHeight: number,
    lcaHash: string = SimulatorConfig.LCA_HASH,
    propagationWindow: number = SimulatorConfig.PROPAGATION_WINDOW,
    totalNodes: number = 1
  ) {
    this.lcaHeight = lcaHeight;
    this.lcaHash = lcaHash;
    this.propagationWindow = propagationWindow;
    this.totalNodes = Math.max(1, totalNodes);

    this.forkHeights = new Map();
    this.nodeMetrics = new Map();
    this.nodeBlocks = new Map();
    this.reorgEvents = [];
    this.forkIncidents = [];
    this.incidentCounter = 0;
  }

  getLcaHeight(): number {
    return this.lcaHeight;
  }

  getLcaHash(): string {
    return this.lcaHash;
  }

  getTotalNodes(): number {
    return this.totalNodes;
  }

  initializeFork(forkId: ForkId, initialHeight: number): void {
    this.forkHeights.set(forkId, initialHeight);
  }

  /**
   * Starts tracking a node on its initial fork, resetting any previous metrics
   */
  registerNode(nodeId: string, forkId: ForkId): void {
    this.nodeMetrics.set(nodeId, {
      nodeId,
      forkId,
      blocksMined: 0,
      blocksMinedPerFork: forkMap(() => 0),
      blocksOrphaned: 0,
      totalExposure: 0,
      reorgCount: 0,
    });
    this.nodeBlocks.set(nodeId, forkMap<number[]>(() => []));
  }

  private requireMetrics(nodeId: string, forkId: ForkId): NodeMetrics {
    let metrics = this.nodeMetrics.get(nodeId);
    if (!metrics) {
      this.registerNode(nodeId, forkId);
      metrics = this.nodeMetrics.get(nodeId);
    }
    if (!metrics) {
      throw new Error(`Failed to register node ${nodeId}`);
    }
    return metrics;
  }

  private requireBlocks(nodeId: string): ForkMap<number[]> {
    let blocks = this.nodeBlocks.get(nodeId);
    if (!blocks) {
      blocks = forkMap<number[]>(() => []);
      this.nodeBlocks.set(nodeId, blocks);
    }
    return blocks;
  }

  /**
   * Attributes a block to the node that mined it; unknown nodes are registered on that fork
   */
  recordBlockMined(nodeId: string, forkId: ForkId, height: number): void {
    const metrics = this.requireMetrics(nodeId, forkId);
    metrics.blocksMined += 1;
    metrics.blocksMinedPerFork[forkId] += 1;
    this.requireBlocks(nodeId)[forkId].push(height);
  }

  updateForkHeights(heights: ForkMap<number>): void {
    for (const forkId of FORK_IDS) {
      this.forkHeights.set(forkId, heights[forkId]);
    }
  }

  getForkHeight(forkId: ForkId): number {
    return this.forkHeights.get(forkId) ?? this.lcaHeight;
  }

  private reorgDepth(oldFork: ForkId): number {
    return Math.max(0, this.getForkHeight(oldFork) - this.lcaHeight);
  }

  /**
   * Records a node abandoning `oldFork` for `newFork`
   *
   * The depth is the old fork's length past the ancestor. Every block the node mined
   * on the old fork is orphaned and forgotten.
   */
  recordForkSwitch(nodeId: string, oldFork: ForkId, newFork: ForkId, simTime: number): ReorgEvent {
    const metrics = this.requireMetrics(nodeId, oldFork);
    const blocks = this.requireBlocks(nodeId);

    const depth = this.reorgDepth(oldFork);
    const orphaned = [...blocks[oldFork]];

    const event: ReorgEvent = {
      timestamp: simTime,
      nodeId,
      lcaHeight: this.lcaHeight,
      lcaHash: this.lcaHash,
      depth,
      forkOld: oldFork,
      forkNew: newFork,
      blocksInvalidated: orphaned,
    };

    metrics.forkId = newFork;
    metrics.blocksOrphaned += orphaned.length;
    metrics.totalExposure += depth;
    metrics.reorgCount += 1;
    blocks[oldFork] = [];

    this.reorgEvents.push(event);
    this.clusterIntoIncident(event);

    if (SimulatorConfig.DEBUG_REORG) {
      console.log(`[Reorg] ${nodeId}: ${oldFork} -> ${newFork} at t=${simTime.toFixed(0)}s, depth=${depth}, orphaned=${orphaned.length}`);
    }

    return event;
  }

  private clusterIntoIncident(event: ReorgEvent): void {
    for (const incident of this.forkIncidents) {
      if (
        incident.lcaHash === event.lcaHash &&
        incident.winningFork === event.forkNew &&
        Math.abs(event.timestamp - incident.lastObserved) <= this.propagationWindow
      ) {
        incident.events.push(event);
        incident.lastObserved = Math.max(incident.lastObserved, event.timestamp);
        return;
      }
    }

    this.incidentCounter += 1;
    this.forkIncidents.push({
      incidentId: `incident-${this.incidentCounter}`,
      lcaHash: event.lcaHash,
      winningFork: event.forkNew,
      events: [event],
      firstObserved: event.timestamp,
      lastObserved: event.timestamp,
    });
  }

  /**
   * Share of all network nodes touched by an incident
   */
  getIncidentPenetration(incident: ForkIncident): number {
    const uniqueNodes = new Set(incident.events.map(event => event.nodeId));
    return uniqueNodes.size / this.totalNodes;
  }

  getNodeMetrics(nodeId: string): Readonly<NodeMetrics> | null {
    const metrics = this.nodeMetrics.get(nodeId);
    return metrics ? { ...metrics, blocksMinedPerFork: { ...metrics.blocksMinedPerFork } } : null;
  }

  getOrphanRate(nodeId: string): number {
    const metrics = this.nodeMetrics.get(nodeId);
    if (!metrics || metrics.blocksMined === 0) {
      return 0.0;
    }
    return metrics.blocksOrphaned / metrics.blocksMined;
  }

  getNodeExposure(nodeId: string): number {
    return this.nodeMetrics.get(nodeId)?.totalExposure ?? 0;
  }

  getReorgCount(nodeId: string): number {
    return this.nodeMetrics.get(nodeId)?.reorgCount ?? 0;
  }

  getReorgEvents(): readonly ReorgEvent[] {
    return this.reorgEvents;
  }

  getForkIncidents(): readonly ForkIncident[] {
    return this.forkIncidents;
  }

  getTotalReorgMass(): number {
    return this.reorgEvents.reduce((sum, event) => sum + event.depth, 0);
  }

  getNormalizedReorgMass(): number {
    return this.getTotalReorgMass() / this.totalNodes;
  }

  /**
   * Reorg mass per second of elapsed simulation time
   */
  getForkVolatilityIndex(elapsedSeconds: number): number {
    if (elapsedSeconds <= 0) {
      return 0.0;
    }
    return this.getTotalReorgMass() / elapsedSeconds;
  }

  /**
   * Sum over incidents of penetration * per-node reorg mass
   */
  getConsensusStressScore(): number {
    let stress = 0.0;
    for (const incident of this.forkIncidents) {
      const penetration = this.getIncidentPenetration(incident);
      const normalizedMass = incidentMass(incident) / Math.max(1, this.totalNodes);
      stress += penetration * normalizedMass;
    }
    return stress;
  }

  /**
   * What would happen if the partitions reconnected now
   * Does not change any state.
   */
  calculateReunionReorg(chainwork: ForkMap<number>): ReunionAnalysis {
    let winningFork = FORK_IDS[0];
    for (const forkId of FORK_IDS) {
      if (chainwork[forkId] > chainwork[winningFork]) {
        winningFork = forkId;
      }
    }

    const losingForks: ReunionLoser[] = FORK_IDS
      .filter(forkId => forkId !== winningFork)
      .map(forkId => {
        const depth = this.getForkHeight(forkId) - this.lcaHeight;
        const nodes: string[] = [];
        let additionalOrphans = 0;
        for (const metrics of this.nodeMetrics.values()) {
          if (metrics.forkId === forkId) {
            nodes.push(metrics.nodeId);
            additionalOrphans += metrics.blocksMinedPerFork[forkId];
          }
        }
        return { forkId, depth, nodes, reorgMass: depth * nodes.length, additionalOrphans };
      });

    return {
      winningFork,
      losingForks,
      nodesOnLosingForks: losingForks.flatMap(loser => loser.nodes),
      reunionReorgMass: losingForks.reduce((sum, loser) => sum + loser.reorgMass, 0),
      additionalOrphans: losingForks.reduce((sum, loser) => sum + loser.additionalOrphans, 0),
      chainwork: { ...chainwork },
    };
  }

  getNetworkSummary(): NetworkSummary {
    let totalBlocksMined = 0;
    let totalBlocksOrphaned = 0;
    for (const metrics of this.nodeMetrics.values()) {
      totalBlocksMined += metrics.blocksMined;
      totalBlocksOrphaned += metrics.blocksOrphaned;
    }

    return {
      lcaHeight: this.lcaHeight,
      lcaHash: this.lcaHash,
      finalHeights: forkMap(forkId => this.getForkHeight(forkId)),
      totalNodesTracked: this.nodeMetrics.size,
      totalBlocksMined,
      totalBlocksOrphaned,
      totalReorgEvents: this.reorgEvents.length,
      totalForkIncidents: this.forkIncidents.length,
      totalReorgMass: this.getTotalReorgMass(),
      normalizedReorgMass: this.getNormalizedReorgMass(),
      consensusStressScore: this.getConsensusStressScore(),
    };
  }

  getNodeSummary(nodeId: string): NodeSummary | MissingNodeSummary {
    const metrics = this.nodeMetrics.get(nodeId);
    if (!metrics) {
      return { nodeId, error: 'Node not found' };
    }
    return {
      nodeId,
      currentFork: metrics.forkId,
      blocksMined: metrics.blocksMined,
      blocksMinedPerFork: { ...metrics.blocksMinedPerFork },
      blocksOrphaned: metrics.blocksOrphaned,
      orphanRate: this.getOrphanRate(nodeId),
      reorgCount: metrics.reorgCount,
      totalExposure: metrics.totalExposure,
    };
  }

  getAllNodeSummaries(): Record<string, NodeSummary | MissingNodeSummary> {
    const summaries: Record<string, NodeSummary | MissingNodeSummary> = {};
    for (const nodeId of this.nodeMetrics.keys()) {
      summaries[nodeId] = this.getNodeSummary(nodeId);
    }
    return summaries;
  }

  exportToJson() {
    return {
      config: {
        lcaHeight: this.lcaHeight,
        lcaHash: this.lcaHash,
        propagationWindow: this.propagationWindow,
        totalNodes: this.totalNodes,
      },
      forkHeights: forkMap(forkId => this.getForkHeight(forkId)),
      networkSummary: this.getNetworkSummary(),
      nodeSummaries: this.getAllNodeSummaries(),
      reorgEvents: this.reorgEvents.map(event => ({
        timestamp: event.timestamp,
        nodeId: event.nodeId,
        lcaHeight: event.lcaHeight,
        depth: event.depth,
        forkOld: event.forkOld,
        forkNew: event.forkNew,
        blocksOrphaned: event.blocksInvalidated.length,
      })),
      forkIncidents: this.forkIncidents.map(incident => ({
        incidentId: incident.incidentId,
        lcaHash: incident.lcaHash,
        winningFork: incident.winningFork,
        eventCount: incident.events.length,
        reorgMass: incidentMass(incident),
        penetration: this.getIncidentPenetration(incident),
        firstObserved: incident.firstObserved,
        lastObserved: incident.lastObserved,
      })),
    };
  }
}
