import type { Board } from './Board';
import { GraphNode } from './GraphNode';
import { describeMove } from './moveNotation';

export interface BuildProgress {
  /** States dequeued and fully expanded so far. */
  expanded: number;
  /** Distinct states discovered so far, including the root. */
  discovered: number;
  /** States waiting in the frontier. */
  queued: number;
}

export interface DecisionGraphBuilderOptions {
  /**
   * Called after every `progressInterval` expansions. The builder never
   * logs on its own.
   */
  onProgress?: (progress: BuildProgress) => void;
  /** Expansions between progress callbacks; 0 disables them. Defaults to 0. */
  progressInterval?: number;
}

/**
 * Breadth-first exploration of every state reachable from an initial board.
 *
 * Each distinct canonical hash becomes exactly one GraphNode. Every observed
 * transition is recorded as an edge on the node that expanded it, so a state
 * reached from several parents carries an incoming edge from each of them.
 * Winning states are expanded like any other; the traversal only ends when
 * the frontier is empty.
 */
export class DecisionGraphBuilder {
  private readonly onProgress: ((progress: BuildProgress) => void) | undefined;
  private readonly progressInterval: number;
  private nodes: Map<string, GraphNode> = new Map();

  constructor(options: DecisionGraphBuilderOptions = {}) {
    this.onProgress = options.onProgress;
    this.progressInterval = Math.max(0, Math.floor(options.progressInterval ?? 0));
  }

  buildGraph(initialBoard: Board): GraphNode {
    const root = new GraphNode(initialBoard);
    root.isStarting = true;

    const allNodes = new Map<string, GraphNode>([[root.stateHash, root]]);
    this.nodes = allNodes;

    const queue: GraphNode[] = [root];
    let head = 0;

    while (head < queue.length) {
      const current = queue[head++];

      for (const nextBoard of current.board.getNextStates()) {
        const nextHash = nextBoard.getHash();

        let nextNode = allNodes.get(nextHash);
        if (!nextNode) {
          nextNode = new GraphNode(nextBoard);
          allNodes.set(nextHash, nextNode);
          queue.push(nextNode);
        }

        if (nextHash !== current.stateHash) {
          current.addChild(nextNode, describeMove(current.board, nextBoard));
        }
      }

      if (this.onProgress && this.progressInterval > 0 && head % this.progressInterval === 0) {
        this.onProgress({ expanded: head, discovered: allNodes.size, queued: queue.length - head });
      }
    }

    return root;
  }

  /** Signature → node map of the most recent buildGraph run. */
  getNodes(): ReadonlyMap<string, GraphNode> {
    return this.nodes;
  }
}
